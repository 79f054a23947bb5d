/**
 * Data Access Facade backed by the package metadata database and S3.
 *
 * Objects are stored with SSE-KMS, so a successful GetObject already returns
 * plaintext.
 */

import { GetObjectCommand, NoSuchKey, S3Client } from '@aws-sdk/client-s3';
import { z } from 'zod';

import type { RelationalPool } from '../adapters/postgres';
import { errorMessage } from '../utils/errors';
import { logger as rootLogger, type Log } from '../utils/logger';
import type { DataAccessFacade, PackageMetadata } from './dataAccess';
import { decodePlainText, isDocumentType, isTextLike } from './textExtraction';

// =============================================================================
// OBJECT STORAGE
// =============================================================================

export interface StorageLocation {
  bucket: string;
  key: string;
}

/**
 * Parses `s3://bucket/key`. Anything else yields null.
 */
export function parseStorageReference(reference: string): StorageLocation | null {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(reference.trim());
  if (!match || !match[1] || !match[2]) {
    return null;
  }
  return { bucket: match[1], key: match[2] };
}

export interface ObjectFetcher {
  /** Null when the object does not exist. */
  getObjectBytes(location: StorageLocation): Promise<Uint8Array | null>;
}

export class S3ObjectFetcher implements ObjectFetcher {
  private readonly client: S3Client;

  constructor(options: { region: string; endpoint?: string | null }) {
    this.client = new S3Client({
      region: options.region,
      ...(options.endpoint ? { endpoint: options.endpoint, forcePathStyle: true } : {}),
    });
  }

  async getObjectBytes(location: StorageLocation): Promise<Uint8Array | null> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: location.bucket, Key: location.key })
      );
      if (!response.Body) {
        return null;
      }
      return await response.Body.transformToByteArray();
    } catch (error) {
      if (error instanceof NoSuchKey) {
        return null;
      }
      throw error;
    }
  }

  destroy(): void {
    this.client.destroy();
  }
}

// =============================================================================
// METADATA
// =============================================================================

const PACKAGE_METADATA_QUERY = `
  SELECT package_id, user_id, raw_data_reference, data_type, source_description,
         consent_token_id, original_filename, size_bytes
  FROM user_data_packages
  WHERE package_id = $1
  LIMIT 1
`;

const PackageRowSchema = z.object({
  package_id: z.coerce.string(),
  user_id: z.coerce.string(),
  raw_data_reference: z.string(),
  data_type: z.string(),
  source_description: z.string().nullable(),
  consent_token_id: z.string().nullable(),
  original_filename: z.string().nullable(),
  size_bytes: z.coerce.number().nullable(),
});

// =============================================================================
// FACADE
// =============================================================================

export class UdimDataAccess implements DataAccessFacade {
  private readonly log: Log;

  constructor(
    private readonly metadataPool: RelationalPool | null,
    private readonly objects: ObjectFetcher,
    log: Log = rootLogger
  ) {
    this.log = log.child({ component: 'data-access' });
  }

  async fetchPackageMetadata(packageID: string): Promise<PackageMetadata | null> {
    if (!this.metadataPool) {
      throw new Error('Package metadata store not configured');
    }

    const rows = await this.metadataPool.query(PACKAGE_METADATA_QUERY, [packageID]);
    const row = rows[0];
    if (!row) {
      this.log.warn('Package metadata not found', { packageID });
      return null;
    }

    const parsed = PackageRowSchema.safeParse(row);
    if (!parsed.success) {
      this.log.error('Package metadata row is malformed', {
        packageID,
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
      return null;
    }

    const r = parsed.data;
    return {
      packageID: r.package_id,
      userID: r.user_id,
      rawDataReference: r.raw_data_reference,
      dataType: r.data_type,
      sourceDescription: r.source_description,
      consentTokenID: r.consent_token_id,
      originalFilename: r.original_filename,
      sizeBytes: r.size_bytes,
    };
  }

  async retrieveAndDecrypt(metadata: PackageMetadata): Promise<Uint8Array | null> {
    const location = parseStorageReference(metadata.rawDataReference);
    if (!location) {
      this.log.error('Unsupported raw data reference', {
        packageID: metadata.packageID,
        reference: metadata.rawDataReference,
      });
      return null;
    }

    try {
      const bytes = await this.objects.getObjectBytes(location);
      if (!bytes) {
        this.log.error('Raw data object not found', { packageID: metadata.packageID, ...location });
      }
      return bytes;
    } catch (error) {
      this.log.error('Raw data retrieval failed', {
        packageID: metadata.packageID,
        ...location,
        error: errorMessage(error),
      });
      return null;
    }
  }

  async extractText(
    bytes: Uint8Array,
    dataType: string,
    filename?: string | null
  ): Promise<string | null> {
    if (isTextLike(dataType, filename)) {
      return decodePlainText(bytes);
    }
    if (isDocumentType(dataType)) {
      this.log.warn('Document text extraction is handled by the document parsing service', {
        dataType,
      });
      return null;
    }
    this.log.info('No text extractor for data type', { dataType });
    return null;
  }
}
