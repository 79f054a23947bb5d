/**
 * PKG Writer Tests
 *
 * Runs the writer against an in-memory graph that applies the catalog's MERGE
 * keys, so replays and partial failures can be observed.
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { createMockCandidate, fixedClock, FIXED_NOW, InMemoryGraph, silentLog } from '../../__tests__/fakes';
import { evidenceId } from '../../utils/ids';
import { createPkgWriter, type PkgWriter } from '../pkgWriter';

// =============================================================================
// TEST FIXTURES
// =============================================================================

const REFINED_AT = FIXED_NOW.toISOString();

const createWriter = (graph: InMemoryGraph | null): PkgWriter =>
  createPkgWriter(graph, { log: silentLog, now: fixedClock });

// =============================================================================
// USERS & CANDIDATES
// =============================================================================

describe('PkgWriter', () => {
  let graph: InMemoryGraph;
  let writer: PkgWriter;

  beforeEach(() => {
    graph = new InMemoryGraph();
    writer = createWriter(graph);
  });

  describe('without a graph', () => {
    it('should report not configured and fail every write', async () => {
      const unconfigured = createWriter(null);
      expect(unconfigured.isConfigured()).toBe(false);
      expect(await unconfigured.ensureUserNode('user-1')).toBe(false);
      expect(await unconfigured.addTraitCandidate('user-1', createMockCandidate())).toBe(false);
      expect(await unconfigured.updateCommunicationStyle('user-1', 'formality', 'formal')).toBeNull();
    });
  });

  describe('ensureUserNode', () => {
    it('should merge the user once however often it is called', async () => {
      expect(await writer.ensureUserNode('user-1')).toBe(true);
      expect(await writer.ensureUserNode('user-1')).toBe(true);
      expect([...graph.users]).toEqual(['user-1']);
    });

    it('should return false when the write fails', async () => {
      graph.failWhen = () => true;
      expect(await writer.ensureUserNode('user-1')).toBe(false);
    });
  });

  describe('addTraitCandidate', () => {
    it('should write the trait, the user link, the evidence and its link', async () => {
      const candidate = createMockCandidate();

      expect(await writer.addTraitCandidate('user-1', candidate)).toBe(true);

      expect(graph.callNames()).toEqual([
        'mergeTraitCandidate',
        'mergeUserHasTraitCandidate',
        'mergeEvidence',
        'mergeTraitSupportedBy',
      ]);
      expect(graph.calls[0].params).toEqual({
        traitID: candidate.candidateID,
        name: 'Interest in AI Ethics',
        description: 'Appears to discuss AI Ethics.',
        category: 'Interest',
        confidence: 0.65,
        originModels: ['GeminiAdapter_test-model'],
        featureSetIDs: ['fs-1'],
      });

      const snippet = candidate.supportingEvidenceSnippets[0];
      const expectedEvidenceID = evidenceId(snippet.content, 'pkg-1', 'GeminiAdapter_test-model');
      expect(graph.calls[2].params).toEqual({
        evidenceID: expectedEvidenceID,
        type: 'text_analysis_output_summary',
        content: snippet.content,
        sourcePackageID: 'pkg-1',
        sourceDetail: 'GeminiAdapter_test-model',
      });
      expect(graph.calls[3].params).toEqual({
        traitID: candidate.candidateID,
        evidenceID: expectedEvidenceID,
        relevanceScore: null,
      });
      expect(graph.traits.get(candidate.candidateID)?.status).toBe('candidate');
    });

    it('should not duplicate nodes or links when replayed', async () => {
      const candidate = createMockCandidate();

      await writer.addTraitCandidate('user-1', candidate);
      await writer.addTraitCandidate('user-1', candidate);

      expect(graph.traits.size).toBe(1);
      expect(graph.evidence.size).toBe(1);
      expect(graph.relationships.size).toBe(2);
    });

    it('should stop at the first failed write', async () => {
      graph.failWhen = (call) => call.name === 'mergeUserHasTraitCandidate';

      expect(await writer.addTraitCandidate('user-1', createMockCandidate())).toBe(false);
      expect(graph.callNames()).toEqual(['mergeTraitCandidate', 'mergeUserHasTraitCandidate']);
    });
  });

  // ===========================================================================
  // CONCEPTS
  // ===========================================================================

  describe('addMentionedConcepts', () => {
    it('should merge concepts by normalized name and skip blank ones', async () => {
      const written = await writer.addMentionedConcepts(
        'user-1',
        [
          { name: ' Machine Learning ', frequency: 2 },
          { name: '   ', frequency: 1 },
          { name: 'Chess', frequency: 1 },
        ],
        'pkg-1'
      );

      expect(written).toBe(true);
      expect([...graph.concepts.keys()]).toEqual(['machine learning', 'chess']);
      expect(graph.concepts.get('machine learning')?.displayName).toBe('Machine Learning');
      expect(graph.relationship('MENTIONS', 'user-1', 'machine learning')?.frequency).toBe(2);
    });

    it('should count a package only once and add frequencies from new packages', async () => {
      const concepts = [{ name: 'Chess', frequency: 3 }];

      await writer.addMentionedConcepts('user-1', concepts, 'pkg-1');
      await writer.addMentionedConcepts('user-1', concepts, 'pkg-1');
      expect(graph.relationship('MENTIONS', 'user-1', 'chess')?.frequency).toBe(3);

      await writer.addMentionedConcepts('user-1', concepts, 'pkg-2');
      expect(graph.relationship('MENTIONS', 'user-1', 'chess')?.frequency).toBe(6);
    });

    it('should keep going after a failed concept and report false', async () => {
      graph.failWhen = (call) => call.name === 'mergeConcept' && call.params.name === 'machine learning';

      const written = await writer.addMentionedConcepts(
        'user-1',
        [
          { name: 'Machine Learning', frequency: 1 },
          { name: 'Chess', frequency: 1 },
        ],
        'pkg-1'
      );

      expect(written).toBe(false);
      expect([...graph.concepts.keys()]).toEqual(['chess']);
    });
  });

  // ===========================================================================
  // USER DECISIONS
  // ===========================================================================

  describe('updateTraitStatusAndProperties', () => {
    const candidate = createMockCandidate();

    beforeEach(async () => {
      await writer.ensureUserNode('user-1');
      await writer.addTraitCandidate('user-1', candidate);
      graph.calls = [];
    });

    it('should confirm a trait as is and activate the user link', async () => {
      const result = await writer.updateTraitStatusAndProperties(
        'user-1',
        candidate.candidateID,
        'confirmed_asis',
        { userConfidenceRating: 4 },
        { traitName: 'Interest in AI Ethics' }
      );

      expect(result).toEqual({
        traitID: candidate.candidateID,
        name: 'Interest in AI Ethics',
        description: 'Appears to discuss AI Ethics.',
        category: 'Interest',
        status: 'active_user_confirmed',
        origin: 'ai_confirmed_user',
        userConfidence: 4,
        lastRefinedTimestamp: REFINED_AT,
      });
      expect(graph.callNames()).toEqual(['mergeUser', 'setTraitDecision', 'activateUserTrait']);
      expect(graph.relationship('HAS_TRAIT', 'user-1', candidate.candidateID)).toMatchObject({
        isActive: true,
        source: 'ai_confirmed_user',
        userConfidence: 4,
      });
    });

    it('should apply refinements on a modified confirmation', async () => {
      const result = await writer.updateTraitStatusAndProperties(
        'user-1',
        candidate.candidateID,
        'confirmed_modified',
        { refinedTraitName: 'Cares About AI Ethics' }
      );

      expect(result).toMatchObject({
        name: 'Cares About AI Ethics',
        status: 'active_user_modified',
        origin: 'ai_refined_user',
        userConfidence: null,
      });
    });

    it('should refuse a modified confirmation without modifications', async () => {
      const result = await writer.updateTraitStatusAndProperties('user-1', candidate.candidateID, 'confirmed_modified');

      expect(result).toBeNull();
      expect(graph.calls).toEqual([]);
    });

    it('should reject a trait and deactivate the user link', async () => {
      const result = await writer.updateTraitStatusAndProperties('user-1', candidate.candidateID, 'rejected');

      expect(result?.status).toBe('rejected_by_user');
      expect(result?.origin).toBe('ai_derived');
      expect(graph.callNames()).toEqual(['mergeUser', 'setTraitDecision', 'deactivateUserTrait']);
      expect(graph.relationship('HAS_TRAIT', 'user-1', candidate.candidateID)?.isActive).toBe(false);
    });

    it('should return null when a decision write fails', async () => {
      graph.failWhen = (call) => call.name === 'activateUserTrait';
      expect(
        await writer.updateTraitStatusAndProperties('user-1', candidate.candidateID, 'confirmed_asis')
      ).toBeNull();
    });
  });

  // ===========================================================================
  // USER-DEFINED TRAITS
  // ===========================================================================

  describe('addCustomTrait', () => {
    it('should create an active user-defined trait with its evidence', async () => {
      const result = await writer.addCustomTrait('user-1', {
        name: 'Night Owl',
        category: 'BehavioralPattern',
        description: 'Works late',
        evidenceTexts: ['I code best after midnight', '   '],
        userConfidence: 4,
      });

      expect(result).toMatchObject({
        name: 'Night Owl',
        description: 'Works late',
        category: 'BehavioralPattern',
        status: 'active',
        origin: 'user_defined',
        userConfidence: 4,
        lastRefinedTimestamp: REFINED_AT,
      });
      expect(graph.callNames()).toEqual([
        'mergeUser',
        'mergeCustomTrait',
        'mergeUserHasCustomTrait',
        'mergeEvidence',
        'mergeTraitSupportedBy',
      ]);

      const traitID = result?.traitID ?? '';
      expect(graph.relationship('HAS_TRAIT', 'user-1', traitID)?.strength).toBe(0.8);
      expect([...graph.evidence.values()]).toEqual([
        expect.objectContaining({
          type: 'user_provided_text',
          content: 'I code best after midnight',
          sourcePackageID: null,
          sourceDetail: 'user_input:user-1',
        }),
      ]);
    });

    it('should leave strength null without a confidence', async () => {
      const result = await writer.addCustomTrait('user-1', { name: 'Early Riser', category: 'BehavioralPattern' });

      expect(result?.userConfidence).toBeNull();
      expect(result?.description).toBeNull();
      expect(graph.relationship('HAS_TRAIT', 'user-1', result?.traitID ?? '')?.strength).toBeNull();
    });
  });

  // ===========================================================================
  // COMMUNICATION STYLE
  // ===========================================================================

  describe('updateCommunicationStyle', () => {
    it('should upsert the entry and return it', async () => {
      const result = await writer.updateCommunicationStyle('user-1', 'formality', 'formal');

      expect(result).toEqual({
        userID: 'user-1',
        styleDimension: 'formality',
        styleValue: 'formal',
        lastUpdated: REFINED_AT,
      });
      expect(graph.callNames()).toEqual(['mergeUser', 'mergeStyleEntry', 'mergeUserAdoptsStyle']);
    });

    it('should overwrite the value for the same dimension', async () => {
      await writer.updateCommunicationStyle('user-1', 'emoji_usage', 0.2);
      await writer.updateCommunicationStyle('user-1', 'emoji_usage', 0.7);

      expect(graph.styleEntries.size).toBe(1);
      expect(graph.styleEntries.get('user-1|emoji_usage')?.styleValue).toBe(0.7);
    });
  });
});
