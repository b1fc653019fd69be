/**
 * Composite scorer: folds the five domain scores into one use-case score
 * with a 95% uncertainty band and an evidence-quality index.
 */
import type { CompositeScore, EvidenceDomain, EvidenceScore, UseCase } from "@/types/evidence";
import { EVIDENCE_DOMAINS, USE_CASES } from "@/types/evidence";
import { ScoringContractError } from "@/lib/errors";
import { DEFAULT_SCORING_CONFIG, sourceReliability, type DomainWeights, type ScoringConfig } from "@/lib/scoring-config";
import { roundTo } from "@/lib/statistics";

const Z_95 = 1.96;
const INTERVAL_UPPER_BOUND = 100;
/** Quality weight given to a domain that scored nothing. */
const EMPTY_DOMAIN_QUALITY_WEIGHT = 0.1;

export function isUseCase(value: string): value is UseCase {
  return USE_CASES.some((u) => u === value);
}

function assertScores(scores: readonly EvidenceScore[]): void {
  const seen = new Set<EvidenceDomain>();
  for (const s of scores) {
    if (!EVIDENCE_DOMAINS.includes(s.domain)) {
      throw new ScoringContractError(`Unknown evidence domain: ${String(s.domain)}`);
    }
    if (seen.has(s.domain)) {
      throw new ScoringContractError(`Duplicate score for domain ${s.domain}`);
    }
    seen.add(s.domain);
    if (!Number.isFinite(s.score) || s.score < 0) {
      throw new ScoringContractError(`Invalid ${s.domain} score: ${s.score}`);
    }
    if (!Number.isFinite(s.confidence) || s.confidence < 0 || s.confidence > 1) {
      throw new ScoringContractError(`Invalid ${s.domain} confidence: ${s.confidence}`);
    }
  }
}

/** Half-width of the 95% band, propagating (1 − confidence) as per-domain uncertainty. */
export function confidenceMargin(scores: readonly EvidenceScore[], weights: DomainWeights): number {
  let variance = 0;
  for (const s of scores) {
    const uncertainty = (1 - s.confidence) * s.score * weights[s.domain];
    variance += uncertainty ** 2;
  }
  return Z_95 * Math.sqrt(variance);
}

/** Score-weighted mean of confidence × source reliability. */
export function evidenceQuality(scores: readonly EvidenceScore[], config: ScoringConfig = DEFAULT_SCORING_CONFIG): number {
  let totalQuality = 0;
  let totalWeight = 0;
  for (const s of scores) {
    const weight = s.score > 0 ? s.score : EMPTY_DOMAIN_QUALITY_WEIGHT;
    totalQuality += s.confidence * sourceReliability(s.source, config) * weight;
    totalWeight += weight;
  }
  return totalWeight > 0 ? totalQuality / totalWeight : 0;
}

/**
 * Combine domain scores for one use case. A domain missing from `scores`
 * contributes nothing and reports 0 in component_scores.
 *
 * Throws ScoringContractError for an unknown use case, a duplicated domain,
 * or a negative/non-finite score or confidence.
 */
export function combineEvidenceScores(
  scores: readonly EvidenceScore[],
  useCase: UseCase,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): CompositeScore {
  if (!isUseCase(useCase)) {
    throw new ScoringContractError(`Unknown use case: ${String(useCase)}`);
  }
  assertScores(scores);

  const weights = config.useCaseWeights[useCase];
  const componentScores: Record<EvidenceDomain, number> = {
    clinical: 0,
    mechanistic: 0,
    publication: 0,
    genomic: 0,
    safety: 0,
  };

  let overall = 0;
  for (const s of scores) {
    overall += s.score * weights[s.domain];
    componentScores[s.domain] = s.score;
  }

  const margin = scores.length > 0 ? confidenceMargin(scores, weights) : 0;
  const lower = Math.max(0, overall - margin);
  const upper = Math.min(INTERVAL_UPPER_BOUND, overall + margin);

  return {
    overall_score: roundTo(overall, 2),
    component_scores: componentScores,
    confidence_interval: [roundTo(lower, 2), roundTo(upper, 2)],
    evidence_quality: roundTo(evidenceQuality(scores, config), 3),
    use_case: useCase,
    scoring_version: config.scoringVersion,
  };
}

/** One composite per use case, reusing the same five domain scores. */
export function combineForAllUseCases(
  scores: readonly EvidenceScore[],
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): Record<UseCase, CompositeScore> {
  return {
    drug_repurposing: combineEvidenceScores(scores, "drug_repurposing", config),
    biomarker_discovery: combineEvidenceScores(scores, "biomarker_discovery", config),
    pathway_analysis: combineEvidenceScores(scores, "pathway_analysis", config),
    therapeutic_targeting: combineEvidenceScores(scores, "therapeutic_targeting", config),
  };
}
