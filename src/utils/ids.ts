/**
 * Deterministic identifiers. Replaying a job must land on the same documents,
 * rows and graph nodes, so every key derived from job content is a UUIDv5.
 */

import { v4 as uuidv4, v5 as uuidv5 } from 'uuid';

const PIPELINE_NAMESPACE = '3b1f6c2e-8a4d-5c7e-9f21-6d4b2a8e7c10';

function stableId(...parts: Array<string | null | undefined>): string {
  return uuidv5(parts.map((part) => part ?? '').join('\u001f'), PIPELINE_NAMESPACE);
}

export function featureSetId(packageID: string, analysisTask: string, modelIdentifier: string): string {
  return stableId('feature-set', packageID, analysisTask, modelIdentifier);
}

export function candidateId(userID: string, packageID: string, traitName: string): string {
  return stableId('trait-candidate', userID, packageID, traitName);
}

export function evidenceId(
  content: string,
  sourcePackageID: string | null,
  sourceDetail: string | null
): string {
  return stableId('evidence', content, sourcePackageID, sourceDetail);
}

/** Trim + lowercase; the key Concept nodes merge on. */
export function normalizeConceptName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function newTraitId(): string {
  return uuidv4();
}
