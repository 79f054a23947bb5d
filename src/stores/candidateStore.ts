/**
 * Candidate Store Writer
 *
 * Upserts trait candidates into `extracted_trait_candidates`. A conflict on
 * candidate_id overwrites only the mutable columns. Store errors, unique
 * violations included, come back as null or 0.
 */

import { isUniqueViolation, type RelationalPool } from '../adapters/postgres';
import {
  CANDIDATE_TABLE_DDL,
  UPSERT_CANDIDATE_SQL,
  candidateParams,
} from '../schemas/postgres-tables';
import type { ExtractedTraitCandidate } from '../types/models';
import { errorMessage, withTimeout } from '../utils/errors';
import { logger as rootLogger, type Log } from '../utils/logger';
import type { StoreWriterOptions } from './featureStore';

const DEFAULT_TIMEOUT_MS = 15000;

export async function ensureCandidateTable(pool: RelationalPool): Promise<void> {
  for (const statement of CANDIDATE_TABLE_DDL) {
    await pool.query(statement);
  }
}

/**
 * Returns the candidate id, or null when there is no pool or the write failed.
 */
export async function saveOne(
  pool: RelationalPool | null,
  candidate: ExtractedTraitCandidate,
  options: StoreWriterOptions = {}
): Promise<string | null> {
  if (!pool) {
    return null;
  }
  const log = (options.log ?? rootLogger).child({ component: 'candidate-store' });

  try {
    const rows = await withTimeout(
      () => pool.query(UPSERT_CANDIDATE_SQL, candidateParams(candidate)),
      options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      'candidate-store.saveOne'
    );
    const stored = rows[0]?.candidate_id;
    const id = typeof stored === 'string' ? stored : candidate.candidateID;
    log.info('Trait candidate stored', { candidateID: id, traitName: candidate.traitName });
    return id;
  } catch (error) {
    log.error(
      isUniqueViolation(error) ? 'Trait candidate unique violation' : 'Failed to store trait candidate',
      { candidateID: candidate.candidateID, error: errorMessage(error) }
    );
    return null;
  }
}

/**
 * Upserts the batch in one transaction. Returns the number of candidates
 * written, 0 for an empty batch, a missing pool, or a failed transaction.
 */
export async function saveBatch(
  pool: RelationalPool | null,
  candidates: readonly ExtractedTraitCandidate[],
  options: StoreWriterOptions = {}
): Promise<number> {
  if (candidates.length === 0 || !pool) {
    return 0;
  }
  const log = (options.log ?? rootLogger).child({ component: 'candidate-store' });

  try {
    await withTimeout(
      () =>
        pool.transaction(
          candidates.map((candidate) => ({
            text: UPSERT_CANDIDATE_SQL,
            params: candidateParams(candidate),
          }))
        ),
      options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      'candidate-store.saveBatch'
    );
    log.info('Trait candidate batch stored', { count: candidates.length });
    return candidates.length;
  } catch (error) {
    log.error(
      isUniqueViolation(error)
        ? 'Trait candidate batch unique violation'
        : 'Failed to store trait candidate batch',
      { count: candidates.length, error: errorMessage(error) }
    );
    return 0;
  }
}
