/**
 * Candidate Store Writer Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { createMockCandidate, InMemoryCandidatePool, silentLog } from '../../__tests__/fakes';
import { CANDIDATE_TABLE_DDL, UPSERT_CANDIDATE_SQL, candidateParams } from '../../schemas/postgres-tables';
import { ensureCandidateTable, saveBatch, saveOne } from '../candidateStore';

// =============================================================================
// TEST FIXTURES
// =============================================================================

const LATER = new Date('2024-05-03T08:00:00.000Z');

// =============================================================================
// TESTS
// =============================================================================

describe('candidateParams', () => {
  it('should serialize the list columns as JSON in column order', () => {
    const candidate = createMockCandidate();
    const params = candidateParams(candidate);

    expect(params).toHaveLength(12);
    expect(params[0]).toBe(candidate.candidateID);
    expect(params[2]).toBe('Interest in AI Ethics');
    expect(params[5]).toBe(JSON.stringify(candidate.supportingEvidenceSnippets));
    expect(params[6]).toBe(0.65);
    expect(params[7]).toBe('["GeminiAdapter_test-model"]');
    expect(params[8]).toBe('["fs-1"]');
    expect(params[9]).toBe('candidate');
  });

  it('should keep a user-set status on conflict', () => {
    expect(UPSERT_CANDIDATE_SQL).toContain(
      "status = CASE WHEN extracted_trait_candidates.status = 'candidate' THEN EXCLUDED.status ELSE extracted_trait_candidates.status END"
    );
    expect(UPSERT_CANDIDATE_SQL).not.toContain('creation_timestamp = EXCLUDED');
  });
});

describe('candidate store writer', () => {
  let pool: InMemoryCandidatePool;

  beforeEach(() => {
    pool = new InMemoryCandidatePool();
  });

  it('should create the table and index', async () => {
    await ensureCandidateTable(pool);
    expect(pool.statements.map((statement) => statement.text)).toEqual([...CANDIDATE_TABLE_DDL]);
  });

  it('should upsert one candidate and return its id', async () => {
    const candidate = createMockCandidate();
    expect(await saveOne(pool, candidate, { log: silentLog })).toBe(candidate.candidateID);
    expect(pool.rows.size).toBe(1);
  });

  it('should return null without a pool or on a failed write', async () => {
    expect(await saveOne(null, createMockCandidate(), { log: silentLog })).toBeNull();
    pool.failWith = new Error('connection reset');
    expect(await saveOne(pool, createMockCandidate(), { log: silentLog })).toBeNull();
  });

  it('should write a batch in one transaction and return the count', async () => {
    const batch = [
      createMockCandidate(),
      createMockCandidate({ candidateID: 'c4d1a0b2-7e4f-5a1b-9c3d-2e8f6a4b1c70', traitName: 'Interest in Stoic Philosophy' }),
    ];
    expect(await saveBatch(pool, batch, { log: silentLog })).toBe(2);
    expect(pool.rows.size).toBe(2);
    expect(pool.statements.every((statement) => statement.text === UPSERT_CANDIDATE_SQL)).toBe(true);
  });

  it('should return 0 for an empty batch, a missing pool or a failed transaction', async () => {
    expect(await saveBatch(pool, [], { log: silentLog })).toBe(0);
    expect(await saveBatch(null, [createMockCandidate()], { log: silentLog })).toBe(0);
    pool.failWith = new Error('deadlock detected');
    expect(await saveBatch(pool, [createMockCandidate()], { log: silentLog })).toBe(0);
    expect(pool.rows.size).toBe(0);
  });

  it('should overwrite mutable columns and keep identity columns on replay', async () => {
    const original = createMockCandidate();
    await saveBatch(pool, [original], { log: silentLog });

    await saveBatch(
      pool,
      [
        createMockCandidate({
          traitDescription: 'A different description',
          confidenceScore: 0.9,
          creationTimestamp: LATER,
          lastUpdatedTimestamp: LATER,
        }),
      ],
      { log: silentLog }
    );

    const row = pool.rows.get(original.candidateID);
    expect(pool.rows.size).toBe(1);
    expect(row?.get('confidence_score')).toBe(0.9);
    expect(row?.get('trait_description')).toBe(original.traitDescription);
    expect(row?.get('creation_timestamp')).toEqual(original.creationTimestamp);
    expect(row?.get('last_updated_timestamp')).toEqual(LATER);
  });

  it('should not reset a status the user already decided', async () => {
    const candidate = createMockCandidate({ status: 'confirmed_by_user' });
    await saveOne(pool, candidate, { log: silentLog });

    await saveOne(pool, createMockCandidate({ status: 'candidate' }), { log: silentLog });

    expect(pool.rows.get(candidate.candidateID)?.get('status')).toBe('confirmed_by_user');
  });
});
