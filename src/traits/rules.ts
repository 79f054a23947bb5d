/**
 * Trait Rules
 *
 * Ordered phrase rules evaluated against successful feature sets. The order
 * here is the order evidence is merged in.
 */

import type { Modality, TraitCategory } from '../types/models';

export interface TraitRule {
  id: string;
  modality: Modality;
  /** Restrict to these analysis tasks; all tasks when omitted */
  tasks?: readonly string[];
  /** Lowercase phrases; any occurrence in the model output matches */
  phrases: readonly string[];
  traitName: string;
  traitDescription: string;
  traitCategory: TraitCategory;
  /** In [0, 1] */
  confidence: number;
  /** Evidence wording, given the adapter id and the excerpt */
  evidenceTemplate: (modelIdentifier: string, excerpt: string) => string;
}

const topicsEvidence = (model: string, excerpt: string) =>
  `Topics identified by ${model} included: '${excerpt}'`;

const styleEvidence = (model: string, excerpt: string) =>
  `Writing style described by ${model}: '${excerpt}'`;

export const TRAIT_RULES: readonly TraitRule[] = [
  {
    id: 'interest-ai-ethics',
    modality: 'text',
    phrases: ['ai ethics', 'artificial intelligence ethics'],
    traitName: 'Interest in AI Ethics',
    traitDescription:
      'Appears to discuss or be interested in the topic of AI Ethics based on text analysis.',
    traitCategory: 'Interest',
    confidence: 0.65,
    evidenceTemplate: topicsEvidence,
  },
  {
    id: 'stance-stoicism',
    modality: 'text',
    phrases: ['stoicism', 'stoic philosophy'],
    traitName: 'Interest in Stoic Philosophy',
    traitDescription: 'Shows an interest in Stoic Philosophy through text analysis.',
    traitCategory: 'PhilosophicalStance',
    confidence: 0.6,
    evidenceTemplate: (model, excerpt) => `Key topics from ${model}: '${excerpt}'`,
  },
  {
    id: 'style-formal',
    modality: 'text',
    tasks: ['style'],
    phrases: ['formal tone', 'highly formal', 'formal register'],
    traitName: 'Formal Communication Style',
    traitDescription: 'Tends to write in a formal register.',
    traitCategory: 'CommunicationStyle',
    confidence: 0.5,
    evidenceTemplate: styleEvidence,
  },
  {
    id: 'style-casual',
    modality: 'text',
    tasks: ['style'],
    phrases: ['casual tone', 'informal tone', 'conversational tone'],
    traitName: 'Casual Communication Style',
    traitDescription: 'Tends to write in a casual, conversational register.',
    traitCategory: 'CommunicationStyle',
    confidence: 0.5,
    evidenceTemplate: styleEvidence,
  },
  {
    id: 'linguistic-humor',
    modality: 'text',
    tasks: ['style'],
    phrases: ['humorous', 'witty', 'playful humor'],
    traitName: 'Uses Humor in Writing',
    traitDescription: 'Uses humor or wit when writing.',
    traitCategory: 'LinguisticStyle',
    confidence: 0.45,
    evidenceTemplate: styleEvidence,
  },
];
