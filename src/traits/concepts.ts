/**
 * Concept extraction from topic-analysis output. The topic prompt asks for
 * one topic per line; list markers and emphasis are stripped.
 */

import type { MentionedConcept, RawAnalysisFeatureSet } from '../types/models';
import { normalizeConceptName } from '../utils/ids';

export const TOPIC_TASK = 'topics';
const MAX_CONCEPT_LENGTH = 80;

export function parseTopicLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) =>
      line
        .replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '')
        .replace(/\*\*/g, '')
        .replace(/^["'`]+|["'`]+$/g, '')
        .replace(/[.;,]+$/, '')
        .trim()
    )
    .filter((line) => line !== '' && !line.endsWith(':') && line.length <= MAX_CONCEPT_LENGTH);
}

/**
 * Concepts mentioned across successful topic feature sets, merged by
 * normalized name in order of first appearance.
 */
export function extractConcepts(featureSets: readonly RawAnalysisFeatureSet[]): MentionedConcept[] {
  const concepts = new Map<string, MentionedConcept>();

  for (const featureSet of featureSets) {
    if (featureSet.status !== 'success' || featureSet.analysisTask !== TOPIC_TASK) continue;
    const output = featureSet.extractedFeatures.model_output_text;
    if (typeof output !== 'string') continue;

    for (const topic of parseTopicLines(output)) {
      const key = normalizeConceptName(topic);
      const existing = concepts.get(key);
      if (existing) {
        existing.frequency += 1;
      } else {
        concepts.set(key, { name: topic, frequency: 1 });
      }
    }
  }

  return Array.from(concepts.values());
}
