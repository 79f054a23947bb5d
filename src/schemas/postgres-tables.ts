/**
 * Candidate Store Table
 *
 * DDL and the upsert statement for `extracted_trait_candidates`. Column order
 * here is the parameter order of the upsert.
 */

import type { SqlParam } from '../adapters/postgres';
import type { ExtractedTraitCandidate } from '../types/models';

export const CANDIDATE_TABLE = 'extracted_trait_candidates';

export const CANDIDATE_COLUMNS = [
  'candidate_id',
  'user_id',
  'trait_name',
  'trait_description',
  'trait_category',
  'supporting_evidence_snippets',
  'confidence_score',
  'originating_models',
  'associated_feature_set_ids',
  'status',
  'creation_timestamp',
  'last_updated_timestamp',
] as const;

export type CandidateColumn = (typeof CANDIDATE_COLUMNS)[number];

const JSONB_COLUMNS: ReadonlySet<CandidateColumn> = new Set([
  'supporting_evidence_snippets',
  'originating_models',
  'associated_feature_set_ids',
]);

/**
 * Overwritten on conflict. Identity columns and the creation timestamp never
 * change, and a status other than `candidate` was set by the user and is kept.
 */
export const MUTABLE_CANDIDATE_COLUMNS = [
  'supporting_evidence_snippets',
  'confidence_score',
  'originating_models',
  'associated_feature_set_ids',
  'status',
  'last_updated_timestamp',
] as const satisfies readonly CandidateColumn[];

export const CANDIDATE_TABLE_DDL = [
  `CREATE TABLE IF NOT EXISTS ${CANDIDATE_TABLE} (
    candidate_id UUID PRIMARY KEY,
    user_id TEXT NOT NULL,
    trait_name TEXT NOT NULL,
    trait_description TEXT NOT NULL,
    trait_category TEXT NOT NULL,
    supporting_evidence_snippets JSONB NOT NULL DEFAULT '[]'::jsonb,
    confidence_score DOUBLE PRECISION NOT NULL CHECK (confidence_score >= 0 AND confidence_score <= 1),
    originating_models JSONB NOT NULL DEFAULT '[]'::jsonb,
    associated_feature_set_ids JSONB NOT NULL DEFAULT '[]'::jsonb,
    status TEXT NOT NULL DEFAULT 'candidate',
    creation_timestamp TIMESTAMPTZ NOT NULL,
    last_updated_timestamp TIMESTAMPTZ NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_${CANDIDATE_TABLE}_user_status
    ON ${CANDIDATE_TABLE} (user_id, status)`,
] as const;

function placeholder(column: CandidateColumn, index: number): string {
  return JSONB_COLUMNS.has(column) ? `$${index + 1}::jsonb` : `$${index + 1}`;
}

function assignment(column: CandidateColumn): string {
  if (column === 'status') {
    return `status = CASE WHEN ${CANDIDATE_TABLE}.status = 'candidate' THEN EXCLUDED.status ELSE ${CANDIDATE_TABLE}.status END`;
  }
  return `${column} = EXCLUDED.${column}`;
}

export const UPSERT_CANDIDATE_SQL = `
  INSERT INTO ${CANDIDATE_TABLE} (${CANDIDATE_COLUMNS.join(', ')})
  VALUES (${CANDIDATE_COLUMNS.map(placeholder).join(', ')})
  ON CONFLICT (candidate_id) DO UPDATE SET
    ${MUTABLE_CANDIDATE_COLUMNS.map(assignment).join(',\n    ')}
  RETURNING candidate_id
`;

/**
 * Parameters for `UPSERT_CANDIDATE_SQL`, in `CANDIDATE_COLUMNS` order.
 */
export function candidateParams(candidate: ExtractedTraitCandidate): SqlParam[] {
  const values: Record<CandidateColumn, SqlParam> = {
    candidate_id: candidate.candidateID,
    user_id: candidate.userID,
    trait_name: candidate.traitName,
    trait_description: candidate.traitDescription,
    trait_category: candidate.traitCategory,
    supporting_evidence_snippets: JSON.stringify(candidate.supportingEvidenceSnippets),
    confidence_score: candidate.confidenceScore,
    originating_models: JSON.stringify(candidate.originatingModels),
    associated_feature_set_ids: JSON.stringify(candidate.associatedFeatureSetIDs),
    status: candidate.status,
    creation_timestamp: candidate.creationTimestamp,
    last_updated_timestamp: candidate.lastUpdatedTimestamp,
  };
  return CANDIDATE_COLUMNS.map((column) => values[column]);
}
