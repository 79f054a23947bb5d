/**
 * Trait Derivation Engine
 *
 * Turns successful feature sets into trait candidates: every rule match
 * yields a provisional candidate, then provisional candidates sharing a
 * trait name are merged. Inputs are never mutated.
 */

import type {
  EvidenceSnippet,
  ExtractedTraitCandidate,
  RawAnalysisFeatureSet,
} from '../types/models';
import { candidateId } from '../utils/ids';
import { TRAIT_RULES, type TraitRule } from './rules';

export const EVIDENCE_EXCERPT_LENGTH = 150;
export const EVIDENCE_TYPE_TEXT_SUMMARY = 'text_analysis_output_summary';

export interface DerivationOptions {
  rules?: readonly TraitRule[];
  now?: () => Date;
}

interface ProvisionalCandidate {
  rule: TraitRule;
  evidence: EvidenceSnippet;
  modelIdentifier: string;
  featureSetID: string;
}

/**
 * Cuts on code points so a surrogate pair is never split.
 */
export function excerpt(text: string, length: number = EVIDENCE_EXCERPT_LENGTH): string {
  const chars = Array.from(text);
  return chars.length > length ? `${chars.slice(0, length).join('')}...` : text;
}

function outputText(featureSet: RawAnalysisFeatureSet): string | null {
  const value = featureSet.extractedFeatures.model_output_text;
  return typeof value === 'string' ? value : null;
}

function ruleApplies(rule: TraitRule, featureSet: RawAnalysisFeatureSet): boolean {
  if (rule.modality !== featureSet.modality) {
    return false;
  }
  return !rule.tasks || rule.tasks.includes(featureSet.analysisTask);
}

function evaluate(
  featureSet: RawAnalysisFeatureSet,
  rules: readonly TraitRule[]
): ProvisionalCandidate[] {
  if (featureSet.status !== 'success') {
    return [];
  }
  const text = outputText(featureSet);
  if (!text) {
    return [];
  }
  const haystack = text.toLowerCase();
  const model = featureSet.modelNameOrType;

  return rules
    .filter((rule) => ruleApplies(rule, featureSet))
    .filter((rule) => rule.phrases.some((phrase) => haystack.includes(phrase)))
    .map((rule) => ({
      rule,
      modelIdentifier: model,
      featureSetID: featureSet.featureSetID,
      evidence: {
        type: EVIDENCE_TYPE_TEXT_SUMMARY,
        content: rule.evidenceTemplate(model, excerpt(text)),
        sourcePackageID: featureSet.sourceUserDataPackageID,
        sourceDetail: model,
      },
    }));
}

function pushDistinct(values: string[], value: string): void {
  if (!values.includes(value)) {
    values.push(value);
  }
}

/**
 * Derives trait candidates for one package. Candidates come back in the
 * order their trait name was first produced.
 */
export function deriveTraits(
  userID: string,
  packageID: string,
  featureSets: readonly RawAnalysisFeatureSet[],
  options: DerivationOptions = {}
): ExtractedTraitCandidate[] {
  const rules = options.rules ?? TRAIT_RULES;
  const now = options.now ?? (() => new Date());
  const merged = new Map<string, ExtractedTraitCandidate>();

  for (const featureSet of featureSets) {
    for (const provisional of evaluate(featureSet, rules)) {
      const { rule } = provisional;
      const existing = merged.get(rule.traitName);

      if (!existing) {
        const timestamp = now();
        merged.set(rule.traitName, {
          candidateID: candidateId(userID, packageID, rule.traitName),
          userID,
          traitName: rule.traitName,
          traitDescription: rule.traitDescription,
          traitCategory: rule.traitCategory,
          supportingEvidenceSnippets: [provisional.evidence],
          confidenceScore: rule.confidence,
          originatingModels: [provisional.modelIdentifier],
          associatedFeatureSetIDs: [provisional.featureSetID],
          status: 'candidate',
          creationTimestamp: timestamp,
          lastUpdatedTimestamp: timestamp,
        });
        continue;
      }

      existing.supportingEvidenceSnippets.push(provisional.evidence);
      existing.confidenceScore = Math.max(existing.confidenceScore, rule.confidence);
      pushDistinct(existing.originatingModels, provisional.modelIdentifier);
      pushDistinct(existing.associatedFeatureSetIDs, provisional.featureSetID);
    }
  }

  return Array.from(merged.values());
}
