/**
 * Queue Message Validation Tests
 */

import { describe, it, expect } from 'vitest';

import { ValidationError } from '../errors';
import { parseJobMessage } from '../validation';

// =============================================================================
// TEST FIXTURES
// =============================================================================

const createMessageBody = (overrides: Record<string, unknown> = {}) =>
  JSON.stringify({
    packageID: 'pkg-1',
    userID: 'user-1',
    consentTokenID: 'consent-token-1',
    rawDataReference: 's3://packages/user-1/pkg-1.txt',
    dataType: 'text/plain',
    ...overrides,
  });

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

// =============================================================================
// TESTS
// =============================================================================

describe('parseJobMessage', () => {
  it('should parse a complete message and default the optional fields', () => {
    expect(parseJobMessage(createMessageBody(), 'msg-1')).toEqual({
      packageID: 'pkg-1',
      userID: 'user-1',
      consentTokenID: 'consent-token-1',
      rawDataReference: 's3://packages/user-1/pkg-1.txt',
      dataType: 'text/plain',
      sourceDescription: null,
      metadata: {},
      sqsMessageId: 'msg-1',
    });
  });

  it('should keep source description and metadata when present', () => {
    const job = parseJobMessage(
      createMessageBody({ sourceDescription: 'journal export', metadata: { device: 'laptop', pages: 3 } })
    );
    expect(job.sourceDescription).toBe('journal export');
    expect(job.metadata).toEqual({ device: 'laptop', pages: 3 });
  });

  it('should trim required fields', () => {
    expect(parseJobMessage(createMessageBody({ packageID: '  pkg-2  ' })).packageID).toBe('pkg-2');
  });

  it('should accept a message without a consent token', () => {
    expect(parseJobMessage(createMessageBody({ consentTokenID: undefined })).consentTokenID).toBeNull();
    expect(parseJobMessage(createMessageBody({ consentTokenID: null })).consentTokenID).toBeNull();
  });

  it('should reject a body that is not JSON', () => {
    const error = captureError(() => parseJobMessage('{not json'));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ message: 'Message body is not valid JSON', field: 'body' });
  });

  it('should name a missing required field', () => {
    const error = captureError(() => parseJobMessage(createMessageBody({ userID: undefined })));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ message: 'userID is required', field: 'userID' });
  });

  it('should reject a blank required field', () => {
    const error = captureError(() => parseJobMessage(createMessageBody({ dataType: '   ' })));
    expect(error).toMatchObject({ message: 'dataType must not be empty', field: 'dataType' });
  });
});
