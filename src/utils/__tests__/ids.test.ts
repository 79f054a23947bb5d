/**
 * Identifier Tests
 */

import { describe, it, expect } from 'vitest';

import { candidateId, evidenceId, featureSetId, newTraitId, normalizeConceptName } from '../ids';

const UUID_V5 = /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;
const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('deterministic ids', () => {
  it('should return the same feature set id for the same inputs', () => {
    const id = featureSetId('pkg-1', 'topics', 'GeminiAdapter_test-model');
    expect(id).toMatch(UUID_V5);
    expect(featureSetId('pkg-1', 'topics', 'GeminiAdapter_test-model')).toBe(id);
  });

  it('should differ by task and by model', () => {
    const base = featureSetId('pkg-1', 'topics', 'model-a');
    expect(featureSetId('pkg-1', 'style', 'model-a')).not.toBe(base);
    expect(featureSetId('pkg-1', 'topics', 'model-b')).not.toBe(base);
  });

  it('should not collide when parts shift between fields', () => {
    expect(candidateId('ab', 'c', 'Trait')).not.toBe(candidateId('a', 'bc', 'Trait'));
  });

  it('should keep kinds apart for identical parts', () => {
    expect(featureSetId('x', 'y', 'z')).not.toBe(candidateId('x', 'y', 'z'));
  });

  it('should treat a null evidence source like an empty one', () => {
    expect(evidenceId('text', null, null)).toBe(evidenceId('text', '', ''));
  });

  it('should generate random trait ids', () => {
    const first = newTraitId();
    expect(first).toMatch(UUID_V4);
    expect(newTraitId()).not.toBe(first);
  });
});

describe('normalizeConceptName', () => {
  it('should trim, lowercase and collapse whitespace', () => {
    expect(normalizeConceptName('  Machine   Learning\t')).toBe('machine learning');
  });

  it('should return an empty string for blank input', () => {
    expect(normalizeConceptName('   ')).toBe('');
  });
});
