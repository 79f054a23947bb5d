/**
 * Job Orchestrator
 *
 * Drives one ingestion job through the pipeline stages:
 *
 *   FETCH_METADATA → VERIFY_CONSENT → RETRIEVE_AND_DECRYPT → EXTRACT_TEXT →
 *   AI_ANALYZE → DERIVE_TRAITS → PERSIST_FEATURES → PERSIST_CANDIDATES →
 *   UPDATE_PKG
 *
 * Only a failed metadata lookup is retryable. Consent denials and AI errors
 * skip work without failing the job, and each store is written independently
 * of the others.
 */

import type { FeatureDocumentStore } from '../adapters/mongo';
import type { RelationalPool } from '../adapters/postgres';
import type { AIAdapter, AnalysisResult } from '../adapters/ai/types';
import { consentScopes, type ConsentVerifier } from '../consent/consentGate';
import type { DataAccessFacade, PackageMetadata } from '../data/dataAccess';
import { isDocumentType, isTextLike } from '../data/textExtraction';
import type { PkgWriter } from '../graph/pkgWriter';
import * as candidateStore from '../stores/candidateStore';
import * as featureStore from '../stores/featureStore';
import { extractConcepts } from '../traits/concepts';
import { deriveTraits } from '../traits/derivation';
import { err } from '../types/common';
import type {
  ExtractedTraitCandidate,
  IngestionJob,
  MentionedConcept,
  Modality,
  RawAnalysisFeatureSet,
} from '../types/models';
import { TimeoutError, errorMessage, withTimeout } from '../utils/errors';
import { featureSetId } from '../utils/ids';
import { logger as rootLogger, type Log } from '../utils/logger';
import {
  DEFAULT_ANALYSIS_TASKS,
  type AnalysisTask,
  type JobOutcome,
  type PersistenceReport,
  type PipelineStage,
  type SkippedAnalysis,
  type StoreOutcome,
} from './stages';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface OrchestratorDeps {
  dataAccess: DataAccessFacade;
  consent: ConsentVerifier;
  /** Null when no provider is configured; every analysis is then skipped */
  aiAdapter: AIAdapter | null;
  featureStore: FeatureDocumentStore | null;
  candidatePool: RelationalPool | null;
  pkgWriter: PkgWriter;
}

export interface OrchestratorOptions {
  log?: Log;
  tasks?: readonly AnalysisTask[];
  now?: () => Date;
  /** Bound on one adapter call */
  aiTimeoutMs?: number;
  /** Bound on one store writer call */
  storeWriteTimeoutMs?: number;
  /** Text beyond this length is cut before analysis */
  maxAnalysisChars?: number;
}

const DEFAULTS = {
  aiTimeoutMs: 90000,
  storeWriteTimeoutMs: 15000,
  maxAnalysisChars: 30000,
};

/**
 * Mutable bookkeeping for one run.
 */
interface RunContext {
  job: IngestionJob;
  log: Log;
  startedAt: number;
  stage: PipelineStage;
  completedStages: PipelineStage[];
  skipped: SkippedAnalysis[];
}

interface AnalysisProducts {
  featureSets: RawAnalysisFeatureSet[];
  candidates: ExtractedTraitCandidate[];
  concepts: MentionedConcept[];
}

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class JobOrchestrator {
  private readonly log: Log;
  private readonly tasks: readonly AnalysisTask[];
  private readonly now: () => Date;
  private readonly aiTimeoutMs: number;
  private readonly storeWriteTimeoutMs: number;
  private readonly maxAnalysisChars: number;

  constructor(
    private readonly deps: OrchestratorDeps,
    options: OrchestratorOptions = {}
  ) {
    this.log = (options.log ?? rootLogger).child({ component: 'orchestrator' });
    this.tasks = options.tasks ?? DEFAULT_ANALYSIS_TASKS;
    this.now = options.now ?? (() => new Date());
    this.aiTimeoutMs = options.aiTimeoutMs ?? DEFAULTS.aiTimeoutMs;
    this.storeWriteTimeoutMs = options.storeWriteTimeoutMs ?? DEFAULTS.storeWriteTimeoutMs;
    this.maxAnalysisChars = options.maxAnalysisChars ?? DEFAULTS.maxAnalysisChars;
  }

  async run(job: IngestionJob): Promise<JobOutcome> {
    const ctx: RunContext = {
      job,
      log: this.log.child({
        packageID: job.packageID,
        userID: job.userID,
        sqsMessageId: job.sqsMessageId,
      }),
      startedAt: Date.now(),
      stage: 'FETCH_METADATA',
      completedStages: [],
      skipped: [],
    };

    ctx.log.info('Job started', { dataType: job.dataType });

    try {
      return await this.execute(ctx);
    } catch (error) {
      return this.fail(ctx, `Unexpected error: ${errorMessage(error)}`, false);
    }
  }

  // ===========================================================================
  // STAGES
  // ===========================================================================

  private async execute(ctx: RunContext): Promise<JobOutcome> {
    const { job } = ctx;

    // FETCH_METADATA
    let metadata: PackageMetadata | null;
    try {
      metadata = await this.deps.dataAccess.fetchPackageMetadata(job.packageID);
    } catch (error) {
      return this.fail(ctx, `Metadata lookup failed: ${errorMessage(error)}`, true);
    }
    if (!metadata) {
      return this.fail(ctx, 'Package metadata not found', false);
    }
    this.complete(ctx, 'VERIFY_CONSENT');

    // VERIFY_CONSENT
    const consentTokenID = job.consentTokenID ?? metadata.consentTokenID;
    const permitted: Modality[] = [];
    for (const modality of this.modalitiesFor(ctx, metadata)) {
      const decision = await this.deps.consent.verify(
        job.userID,
        consentTokenID,
        this.modalityScope(modality, job.packageID)
      );
      if (decision.isValid) {
        permitted.push(modality);
      } else {
        ctx.skipped.push({
          modality,
          task: null,
          kind: 'consent_denied',
          reason: decision.deniedReason ?? 'Consent denied',
        });
      }
    }
    if (permitted.length === 0) {
      ctx.log.info('No modality permitted for analysis');
      return this.finish(ctx, emptyProducts(), allNothingToWrite());
    }
    this.complete(ctx, 'RETRIEVE_AND_DECRYPT');

    // RETRIEVE_AND_DECRYPT
    const bytes = await this.deps.dataAccess.retrieveAndDecrypt(metadata);
    if (!bytes) {
      return this.fail(ctx, 'No data retrieved for package', false);
    }

    try {
      this.complete(ctx, 'EXTRACT_TEXT');
      return await this.analyzeAndPersist(ctx, metadata, bytes, permitted, consentTokenID);
    } finally {
      bytes.fill(0);
    }
  }

  private async analyzeAndPersist(
    ctx: RunContext,
    metadata: PackageMetadata,
    bytes: Uint8Array,
    permitted: Modality[],
    consentTokenID: string | null
  ): Promise<JobOutcome> {
    const { job } = ctx;

    // EXTRACT_TEXT
    let text: string | null = null;
    if (permitted.includes('text')) {
      text = await this.deps.dataAccess.extractText(bytes, metadata.dataType, metadata.originalFilename);
      if (!text) {
        ctx.skipped.push({ modality: 'text', task: null, kind: 'no_text', reason: 'No text extracted' });
      }
    }
    this.complete(ctx, 'AI_ANALYZE');

    // AI_ANALYZE
    const featureSets = text ? await this.analyzeText(ctx, text, consentTokenID) : [];
    this.complete(ctx, 'DERIVE_TRAITS');

    // DERIVE_TRAITS
    const candidates = deriveTraits(job.userID, job.packageID, featureSets, { now: this.now });
    const concepts = extractConcepts(featureSets);
    ctx.log.info('Traits derived', {
      featureSets: featureSets.length,
      candidates: candidates.length,
      concepts: concepts.length,
    });
    this.complete(ctx, 'PERSIST_FEATURES');

    // PERSIST_FEATURES
    const features = await this.persistFeatures(ctx, featureSets);
    this.complete(ctx, 'PERSIST_CANDIDATES');

    // PERSIST_CANDIDATES
    const candidateOutcome = await this.persistCandidates(ctx, candidates);
    this.complete(ctx, 'UPDATE_PKG');

    // UPDATE_PKG
    const graph = await this.updateGraph(ctx, candidates, concepts);
    this.complete(ctx, null);

    return this.finish(
      ctx,
      { featureSets, candidates, concepts },
      { features, candidates: candidateOutcome, graph }
    );
  }

  // ===========================================================================
  // ANALYSIS
  // ===========================================================================

  private modalitiesFor(ctx: RunContext, metadata: PackageMetadata): Modality[] {
    if (isTextLike(metadata.dataType, metadata.originalFilename) || isDocumentType(metadata.dataType)) {
      return ['text'];
    }
    ctx.skipped.push({
      modality: 'text',
      task: null,
      kind: 'unsupported_type',
      reason: `No analysis available for data type ${metadata.dataType}`,
    });
    return [];
  }

  private modalityScope(modality: Modality, packageID: string): string {
    switch (modality) {
      case 'text':
        return consentScopes.extractText(packageID);
      default:
        return `action:extract_${modality},resource_package_id:${packageID}`;
    }
  }

  private async analyzeText(
    ctx: RunContext,
    fullText: string,
    consentTokenID: string | null
  ): Promise<RawAnalysisFeatureSet[]> {
    const { job } = ctx;
    const adapter = this.deps.aiAdapter;
    const tasks = this.tasks.filter((task) => task.modality === 'text');

    if (!adapter) {
      ctx.skipped.push({
        modality: 'text',
        task: null,
        kind: 'adapter_unavailable',
        reason: 'No AI adapter configured',
      });
      return [];
    }

    const text = fullText.slice(0, this.maxAnalysisChars);
    const featureSets: RawAnalysisFeatureSet[] = [];

    for (const task of tasks) {
      const scope = consentScopes.analyzeText(task.id, job.packageID, adapter.provider);
      const decision = await this.deps.consent.verify(job.userID, consentTokenID, scope);
      if (!decision.isValid) {
        ctx.skipped.push({
          modality: 'text',
          task: task.id,
          kind: 'consent_denied',
          reason: decision.deniedReason ?? 'Consent denied',
        });
        continue;
      }

      const started = Date.now();
      const result = await this.callAdapter(adapter, text, task);
      if (!result.ok) {
        ctx.log.warn('Analysis skipped after adapter error', {
          task: task.id,
          errorKind: result.errorKind,
          error: result.message,
        });
        ctx.skipped.push({
          modality: 'text',
          task: task.id,
          kind: 'adapter_error',
          reason: `${result.errorKind}: ${result.message}`,
        });
        continue;
      }

      const modelIdentifier = adapter.identifier();
      featureSets.push({
        featureSetID: featureSetId(job.packageID, task.id, modelIdentifier),
        userID: job.userID,
        sourceUserDataPackageID: job.packageID,
        modality: 'text',
        modelNameOrType: modelIdentifier,
        analysisTask: task.id,
        extractedFeatures: result.value,
        status: 'success',
        timestamp: this.now(),
        processingTimeMs: Date.now() - started,
        consentTokenIDUsed: consentTokenID ?? undefined,
        requiredScopeForConsent: scope,
      });
    }

    return featureSets;
  }

  private async callAdapter(
    adapter: AIAdapter,
    text: string,
    task: AnalysisTask
  ): Promise<AnalysisResult> {
    try {
      return await withTimeout(
        () => adapter.analyze(text, task.promptTemplate, task.params),
        this.aiTimeoutMs,
        `ai.${task.id}`
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        return err('timeout', error.message);
      }
      return err('provider_error', errorMessage(error));
    }
  }

  // ===========================================================================
  // PERSISTENCE
  // ===========================================================================

  private async persistFeatures(
    ctx: RunContext,
    featureSets: RawAnalysisFeatureSet[]
  ): Promise<StoreOutcome> {
    if (featureSets.length === 0) return 'nothing_to_write';
    if (!this.deps.featureStore) {
      ctx.log.error('Feature store not configured; feature sets not persisted', {
        count: featureSets.length,
      });
      return 'not_configured';
    }
    const ids = await featureStore.saveBatch(this.deps.featureStore, featureSets, {
      log: ctx.log,
      timeoutMs: this.storeWriteTimeoutMs,
    });
    return ids === null ? 'failed' : 'written';
  }

  private async persistCandidates(
    ctx: RunContext,
    candidates: ExtractedTraitCandidate[]
  ): Promise<StoreOutcome> {
    if (candidates.length === 0) return 'nothing_to_write';
    if (!this.deps.candidatePool) {
      ctx.log.error('Candidate store not configured; trait candidates not persisted', {
        count: candidates.length,
      });
      return 'not_configured';
    }
    const written = await candidateStore.saveBatch(this.deps.candidatePool, candidates, {
      log: ctx.log,
      timeoutMs: this.storeWriteTimeoutMs,
    });
    return written === 0 ? 'failed' : 'written';
  }

  private async updateGraph(
    ctx: RunContext,
    candidates: ExtractedTraitCandidate[],
    concepts: MentionedConcept[]
  ): Promise<StoreOutcome> {
    if (candidates.length === 0 && concepts.length === 0) return 'nothing_to_write';

    const { pkgWriter } = this.deps;
    if (!pkgWriter.isConfigured()) {
      ctx.log.error('Knowledge graph not configured; graph not updated');
      return 'not_configured';
    }

    const { userID, packageID } = ctx.job;
    if (!(await pkgWriter.ensureUserNode(userID))) {
      return 'failed';
    }

    let allWritten = true;
    for (const candidate of candidates) {
      allWritten = (await pkgWriter.addTraitCandidate(userID, candidate)) && allWritten;
    }
    if (concepts.length > 0) {
      allWritten = (await pkgWriter.addMentionedConcepts(userID, concepts, packageID)) && allWritten;
    }
    return allWritten ? 'written' : 'failed';
  }

  // ===========================================================================
  // BOOKKEEPING
  // ===========================================================================

  /** Marks the current stage done and moves to `next`. */
  private complete(ctx: RunContext, next: PipelineStage | null): void {
    ctx.completedStages.push(ctx.stage);
    if (next) {
      ctx.stage = next;
    }
  }

  private fail(ctx: RunContext, reason: string, retryable: boolean): JobOutcome {
    const outcome: JobOutcome = {
      status: 'FAILED',
      packageID: ctx.job.packageID,
      userID: ctx.job.userID,
      completedStages: [...ctx.completedStages],
      failedStage: ctx.stage,
      retryable,
      reason,
      featureSetIDs: [],
      candidateIDs: [],
      conceptCount: 0,
      skipped: [...ctx.skipped],
      persistence: allNothingToWrite(),
      durationMs: Date.now() - ctx.startedAt,
    };
    ctx.log.error('Job failed', { stage: ctx.stage, reason, retryable });
    return outcome;
  }

  private finish(
    ctx: RunContext,
    products: AnalysisProducts,
    persistence: PersistenceReport
  ): JobOutcome {
    const degraded = Object.values(persistence).some(
      (outcome) => outcome === 'failed' || outcome === 'not_configured'
    );
    const outcome: JobOutcome = {
      status: degraded ? 'PARTIAL_SUCCESS' : 'SUCCESS',
      packageID: ctx.job.packageID,
      userID: ctx.job.userID,
      completedStages: [...ctx.completedStages],
      retryable: false,
      featureSetIDs: products.featureSets.map((featureSet) => featureSet.featureSetID),
      candidateIDs: products.candidates.map((candidate) => candidate.candidateID),
      conceptCount: products.concepts.length,
      skipped: [...ctx.skipped],
      persistence,
      durationMs: Date.now() - ctx.startedAt,
    };
    ctx.log.info('Job finished', {
      status: outcome.status,
      persistence,
      skipped: outcome.skipped.length,
      durationMs: outcome.durationMs,
    });
    return outcome;
  }
}

function emptyProducts(): AnalysisProducts {
  return { featureSets: [], candidates: [], concepts: [] };
}

function allNothingToWrite(): PersistenceReport {
  return { features: 'nothing_to_write', candidates: 'nothing_to_write', graph: 'nothing_to_write' };
}

export function createJobOrchestrator(
  deps: OrchestratorDeps,
  options?: OrchestratorOptions
): JobOrchestrator {
  return new JobOrchestrator(deps, options);
}
