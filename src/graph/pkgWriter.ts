/**
 * PKG Writer
 *
 * Writes users, traits, evidence, concepts and communication style into the
 * persona knowledge graph. Each statement is its own write transaction run
 * through `GraphWriter.runIdempotentWrite`. Operations catch graph errors,
 * log them and report failure as `false` or `null`.
 */

import { z } from 'zod';

import type { GraphRecord, GraphWriter } from '../adapters/neo4j';
import {
  GRAPH_MUTATIONS,
  type CommunicationStyleEntryProperties,
  type GraphMutation,
  type TraitNodeProperties,
  type TraitOrigin,
  type TraitStatus,
} from '../schemas/neo4j-graph';
import type {
  EvidenceSnippet,
  ExtractedTraitCandidate,
  MentionedConcept,
  TraitCategory,
} from '../types/models';
import { GraphWriteError, errorMessage } from '../utils/errors';
import { evidenceId, newTraitId, normalizeConceptName } from '../utils/ids';
import { logger as rootLogger, type Log } from '../utils/logger';

// =============================================================================
// TYPES
// =============================================================================

export type TraitDecision = 'confirmed_asis' | 'confirmed_modified' | 'rejected';

export interface TraitModifications {
  refinedTraitName?: string;
  refinedTraitDescription?: string;
  refinedTraitCategory?: TraitCategory;
  /** 1-5 */
  userConfidenceRating?: number;
}

export interface OriginalTraitDetails {
  traitName?: string;
  traitDescription?: string;
  traitCategory?: TraitCategory;
  confidenceScore?: number;
}

export interface CustomTraitInput {
  name: string;
  category: TraitCategory;
  description?: string;
  evidenceTexts?: string[];
  /** 1-5 */
  userConfidence?: number;
}

export type StyleValue = string | number | boolean;

export interface PkgWriterOptions {
  log?: Log;
  now?: () => Date;
}

const DECISION_OUTCOMES: Record<TraitDecision, { status: TraitStatus; origin: TraitOrigin | null }> = {
  confirmed_asis: { status: 'active_user_confirmed', origin: 'ai_confirmed_user' },
  confirmed_modified: { status: 'active_user_modified', origin: 'ai_refined_user' },
  rejected: { status: 'rejected_by_user', origin: null },
};

const TraitRecordSchema = z.object({
  traitID: z.string(),
  name: z.string().nullable(),
  description: z.string().nullable(),
  category: z.string().nullable(),
  status: z
    .enum(['candidate', 'active', 'active_user_confirmed', 'active_user_modified', 'rejected_by_user'])
    .nullable(),
  origin: z.enum(['ai_derived', 'ai_confirmed_user', 'ai_refined_user', 'user_defined']).nullable(),
  userConfidence: z.number().nullable(),
  lastRefinedTimestamp: z.string().nullable(),
});

const StyleRecordSchema = z.object({
  userID: z.string(),
  styleDimension: z.string(),
  styleValue: z.union([z.string(), z.number(), z.boolean()]),
  lastUpdated: z.string(),
});

const USER_EVIDENCE_TYPE = 'user_provided_text';

// =============================================================================
// PKG WRITER
// =============================================================================

export class PkgWriter {
  private readonly log: Log;
  private readonly now: () => Date;

  constructor(
    private readonly graph: GraphWriter | null,
    options: PkgWriterOptions = {}
  ) {
    this.log = (options.log ?? rootLogger).child({ component: 'pkg-writer' });
    this.now = options.now ?? (() => new Date());
  }

  isConfigured(): boolean {
    return this.graph !== null;
  }

  private async write(
    mutation: GraphMutation,
    params: Record<string, unknown>
  ): Promise<GraphRecord[]> {
    if (!this.graph) {
      throw new GraphWriteError(mutation.cypher, 'Graph store not configured', {
        mutation: mutation.name,
      });
    }
    return this.graph.runIdempotentWrite(mutation, params);
  }

  private async writeEvidence(traitID: string, evidence: EvidenceSnippet): Promise<void> {
    const id = evidenceId(evidence.content, evidence.sourcePackageID, evidence.sourceDetail);
    await this.write(GRAPH_MUTATIONS.mergeEvidence, {
      evidenceID: id,
      type: evidence.type,
      content: evidence.content,
      sourcePackageID: evidence.sourcePackageID,
      sourceDetail: evidence.sourceDetail,
    });
    await this.write(GRAPH_MUTATIONS.mergeTraitSupportedBy, {
      traitID,
      evidenceID: id,
      relevanceScore: evidence.relevanceScore ?? null,
    });
  }

  // ===========================================================================
  // USERS
  // ===========================================================================

  async ensureUserNode(userID: string): Promise<boolean> {
    try {
      await this.write(GRAPH_MUTATIONS.mergeUser, { userID });
      return true;
    } catch (error) {
      this.log.error('Failed to ensure user node', { userID, error: errorMessage(error) });
      return false;
    }
  }

  // ===========================================================================
  // AI-DERIVED TRAITS
  // ===========================================================================

  /**
   * Trait node, User→Trait, then Evidence and Trait→Evidence per snippet.
   * Stops at the first failed write.
   */
  async addTraitCandidate(userID: string, candidate: ExtractedTraitCandidate): Promise<boolean> {
    const traitID = candidate.candidateID;
    try {
      await this.write(GRAPH_MUTATIONS.mergeTraitCandidate, {
        traitID,
        name: candidate.traitName,
        description: candidate.traitDescription,
        category: candidate.traitCategory,
        confidence: candidate.confidenceScore,
        originModels: candidate.originatingModels,
        featureSetIDs: candidate.associatedFeatureSetIDs,
      });
      await this.write(GRAPH_MUTATIONS.mergeUserHasTraitCandidate, {
        userID,
        traitID,
        confidence: candidate.confidenceScore,
      });
      for (const evidence of candidate.supportingEvidenceSnippets) {
        await this.writeEvidence(traitID, evidence);
      }
      this.log.info('Trait candidate added to graph', {
        userID,
        traitID,
        evidenceCount: candidate.supportingEvidenceSnippets.length,
      });
      return true;
    } catch (error) {
      this.log.error('Failed to add trait candidate', {
        userID,
        traitID,
        error: errorMessage(error),
      });
      return false;
    }
  }

  // ===========================================================================
  // CONCEPTS
  // ===========================================================================

  /**
   * Every concept is attempted even after a failure. True only when all
   * writes succeeded. Blank names are skipped.
   */
  async addMentionedConcepts(
    userID: string,
    concepts: readonly MentionedConcept[],
    sourcePackageID: string
  ): Promise<boolean> {
    let failures = 0;

    for (const concept of concepts) {
      const name = normalizeConceptName(concept.name);
      if (name === '') {
        this.log.warn('Skipping concept with blank name', { userID, sourcePackageID });
        continue;
      }

      try {
        await this.write(GRAPH_MUTATIONS.mergeConcept, {
          name,
          displayName: concept.name.trim(),
        });
        await this.write(GRAPH_MUTATIONS.mergeUserMentionsConcept, {
          userID,
          name,
          packageID: sourcePackageID,
          frequency: concept.frequency,
          sentiment: concept.sentiment ?? null,
        });
      } catch (error) {
        failures += 1;
        this.log.error('Failed to record mentioned concept', {
          userID,
          concept: name,
          error: errorMessage(error),
        });
      }
    }

    return failures === 0;
  }

  // ===========================================================================
  // USER DECISIONS
  // ===========================================================================

  /**
   * Applies a user's decision on a trait. `confirmed_modified` without any
   * modification is rejected before any write.
   */
  async updateTraitStatusAndProperties(
    userID: string,
    traitID: string,
    decision: TraitDecision,
    modifications: TraitModifications = {},
    originalDetails: OriginalTraitDetails = {}
  ): Promise<TraitNodeProperties | null> {
    const hasModifications =
      modifications.refinedTraitName !== undefined ||
      modifications.refinedTraitDescription !== undefined ||
      modifications.refinedTraitCategory !== undefined ||
      modifications.userConfidenceRating !== undefined;
    if (decision === 'confirmed_modified' && !hasModifications) {
      this.log.warn('Modified confirmation without modifications', { userID, traitID });
      return null;
    }

    const outcome = DECISION_OUTCOMES[decision];
    const properties: Record<string, string | number> = { status: outcome.status };
    if (outcome.origin) {
      properties.origin = outcome.origin;
    }

    const assign = (key: string, value: string | number | undefined) => {
      if (value !== undefined) properties[key] = value;
    };
    if (decision === 'confirmed_modified') {
      assign('name', modifications.refinedTraitName ?? originalDetails.traitName);
      assign('description', modifications.refinedTraitDescription ?? originalDetails.traitDescription);
      assign('category', modifications.refinedTraitCategory ?? originalDetails.traitCategory);
    } else if (decision === 'confirmed_asis') {
      assign('name', originalDetails.traitName);
      assign('description', originalDetails.traitDescription);
      assign('category', originalDetails.traitCategory);
      assign('aiConfidence', originalDetails.confidenceScore);
    }
    if (decision !== 'rejected') {
      assign('userConfidence', modifications.userConfidenceRating);
    }

    const refinedAt = this.now().toISOString();

    try {
      await this.write(GRAPH_MUTATIONS.mergeUser, { userID });
      const records = await this.write(GRAPH_MUTATIONS.setTraitDecision, {
        traitID,
        properties,
        refinedAt,
      });

      if (decision === 'rejected') {
        await this.write(GRAPH_MUTATIONS.deactivateUserTrait, { userID, traitID, refinedAt });
      } else {
        await this.write(GRAPH_MUTATIONS.activateUserTrait, {
          userID,
          traitID,
          origin: outcome.origin,
          userConfidence: modifications.userConfidenceRating ?? null,
          refinedAt,
        });
      }

      this.log.info('Trait decision applied', { userID, traitID, decision });
      return this.toTraitProperties(records[0]);
    } catch (error) {
      this.log.error('Failed to apply trait decision', {
        userID,
        traitID,
        decision,
        error: errorMessage(error),
      });
      return null;
    }
  }

  // ===========================================================================
  // USER-DEFINED TRAITS
  // ===========================================================================

  async addCustomTrait(userID: string, input: CustomTraitInput): Promise<TraitNodeProperties | null> {
    const traitID = newTraitId();
    const createdAt = this.now().toISOString();
    const userConfidence = input.userConfidence ?? null;

    try {
      await this.write(GRAPH_MUTATIONS.mergeUser, { userID });
      const records = await this.write(GRAPH_MUTATIONS.mergeCustomTrait, {
        traitID,
        name: input.name,
        description: input.description ?? null,
        category: input.category,
        userConfidence,
        createdAt,
      });
      await this.write(GRAPH_MUTATIONS.mergeUserHasCustomTrait, {
        userID,
        traitID,
        strength: userConfidence === null ? null : userConfidence / 5,
      });

      for (const text of input.evidenceTexts ?? []) {
        if (text.trim() === '') continue;
        await this.writeEvidence(traitID, {
          type: USER_EVIDENCE_TYPE,
          content: text.trim(),
          sourcePackageID: null,
          sourceDetail: `user_input:${userID}`,
        });
      }

      this.log.info('Custom trait added', { userID, traitID });
      return this.toTraitProperties(records[0]);
    } catch (error) {
      this.log.error('Failed to add custom trait', { userID, traitID, error: errorMessage(error) });
      return null;
    }
  }

  // ===========================================================================
  // COMMUNICATION STYLE
  // ===========================================================================

  async updateCommunicationStyle(
    userID: string,
    styleDimension: string,
    styleValue: StyleValue
  ): Promise<CommunicationStyleEntryProperties | null> {
    const updatedAt = this.now().toISOString();

    try {
      await this.write(GRAPH_MUTATIONS.mergeUser, { userID });
      const records = await this.write(GRAPH_MUTATIONS.mergeStyleEntry, {
        userID,
        styleDimension,
        styleValue,
        updatedAt,
      });
      await this.write(GRAPH_MUTATIONS.mergeUserAdoptsStyle, { userID, styleDimension, updatedAt });

      const parsed = StyleRecordSchema.safeParse(records[0]);
      if (!parsed.success) {
        this.log.error('Unexpected communication style record', { userID, styleDimension });
        return null;
      }
      return parsed.data;
    } catch (error) {
      this.log.error('Failed to update communication style', {
        userID,
        styleDimension,
        error: errorMessage(error),
      });
      return null;
    }
  }

  private toTraitProperties(record: GraphRecord | undefined): TraitNodeProperties | null {
    const parsed = TraitRecordSchema.safeParse(record);
    if (!parsed.success) {
      this.log.error('Unexpected trait record returned from graph');
      return null;
    }
    return parsed.data;
  }
}

export function createPkgWriter(graph: GraphWriter | null, options?: PkgWriterOptions): PkgWriter {
  return new PkgWriter(graph, options);
}
