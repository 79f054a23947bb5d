/**
 * Package Data Access Tests
 *
 * Metadata lookup against an in-process pool and object retrieval through a
 * stub fetcher.
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { createMockMetadata, silentLog } from '../../__tests__/fakes';
import type { RelationalPool, SqlParam, SqlRow } from '../../adapters/postgres';
import {
  parseStorageReference,
  UdimDataAccess,
  type ObjectFetcher,
  type StorageLocation,
} from '../udimDataAccess';

// =============================================================================
// TEST FIXTURES
// =============================================================================

class StubMetadataPool implements RelationalPool {
  rows: SqlRow[] = [];
  queries: Array<{ text: string; params: SqlParam[] }> = [];

  async query(text: string, params: SqlParam[] = []): Promise<SqlRow[]> {
    this.queries.push({ text, params });
    return this.rows;
  }

  async transaction(): Promise<void> {}

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {}
}

class StubObjectFetcher implements ObjectFetcher {
  objects = new Map<string, Uint8Array>();
  failWith: Error | null = null;
  requested: StorageLocation[] = [];

  async getObjectBytes(location: StorageLocation): Promise<Uint8Array | null> {
    this.requested.push(location);
    if (this.failWith) throw this.failWith;
    return this.objects.get(`${location.bucket}/${location.key}`) ?? null;
  }
}

const createRow = (overrides: SqlRow = {}): SqlRow => ({
  package_id: 'pkg-1',
  user_id: 'user-1',
  raw_data_reference: 's3://packages/user-1/pkg-1.txt',
  data_type: 'text/plain',
  source_description: null,
  consent_token_id: 'consent-token-1',
  original_filename: 'notes.txt',
  size_bytes: '42',
  ...overrides,
});

// =============================================================================
// TESTS
// =============================================================================

describe('parseStorageReference', () => {
  it('should split bucket and key', () => {
    expect(parseStorageReference('s3://packages/user-1/pkg-1.txt')).toEqual({
      bucket: 'packages',
      key: 'user-1/pkg-1.txt',
    });
  });

  it('should reject other references', () => {
    expect(parseStorageReference('https://example.com/pkg-1.txt')).toBeNull();
    expect(parseStorageReference('s3://packages')).toBeNull();
  });
});

describe('UdimDataAccess', () => {
  let pool: StubMetadataPool;
  let objects: StubObjectFetcher;
  let access: UdimDataAccess;

  beforeEach(() => {
    pool = new StubMetadataPool();
    objects = new StubObjectFetcher();
    access = new UdimDataAccess(pool, objects, silentLog);
  });

  describe('fetchPackageMetadata', () => {
    it('should map the package row', async () => {
      pool.rows = [createRow()];

      const metadata = await access.fetchPackageMetadata('pkg-1');

      expect(metadata).toEqual({
        packageID: 'pkg-1',
        userID: 'user-1',
        rawDataReference: 's3://packages/user-1/pkg-1.txt',
        dataType: 'text/plain',
        sourceDescription: null,
        consentTokenID: 'consent-token-1',
        originalFilename: 'notes.txt',
        sizeBytes: 42,
      });
      expect(pool.queries[0]?.params).toEqual(['pkg-1']);
    });

    it('should return null when no package exists', async () => {
      expect(await access.fetchPackageMetadata('pkg-missing')).toBeNull();
    });

    it('should return null for a malformed row', async () => {
      pool.rows = [createRow({ data_type: null })];
      expect(await access.fetchPackageMetadata('pkg-1')).toBeNull();
    });

    it('should reject when no metadata store is configured', async () => {
      const unconfigured = new UdimDataAccess(null, objects, silentLog);
      await expect(unconfigured.fetchPackageMetadata('pkg-1')).rejects.toThrow(
        'Package metadata store not configured'
      );
    });
  });

  describe('retrieveAndDecrypt', () => {
    it('should return the object bytes', async () => {
      const bytes = new TextEncoder().encode('hello');
      objects.objects.set('packages/user-1/pkg-1.txt', bytes);

      expect(await access.retrieveAndDecrypt(createMockMetadata())).toEqual(bytes);
    });

    it('should return null for a missing object or an unsupported reference', async () => {
      expect(await access.retrieveAndDecrypt(createMockMetadata())).toBeNull();
      expect(
        await access.retrieveAndDecrypt(createMockMetadata({ rawDataReference: 'file:///tmp/pkg-1.txt' }))
      ).toBeNull();
      expect(objects.requested).toHaveLength(1);
    });

    it('should return null when retrieval fails', async () => {
      objects.failWith = new Error('AccessDenied');
      expect(await access.retrieveAndDecrypt(createMockMetadata())).toBeNull();
    });
  });

  describe('extractText', () => {
    it('should decode text-like packages', async () => {
      const bytes = new TextEncoder().encode('Notes on stoicism\r\n');
      expect(await access.extractText(bytes, 'text/plain')).toBe('Notes on stoicism');
    });

    it('should return null for documents and binary types', async () => {
      const bytes = new Uint8Array([0x25, 0x50, 0x44, 0x46]);
      expect(await access.extractText(bytes, 'application/pdf')).toBeNull();
      expect(await access.extractText(bytes, 'image/png')).toBeNull();
    });
  });
});
