/**
 * Gene analytics: evidence profile of one gene from its stored composite scores.
 *
 * Strengths are each domain's mean stored component score over its ceiling.
 * Gaps and recommendations are fixed rule cascades over those strengths.
 */
import type { DrugEvidence, EvidenceDomain, UseCase } from "@/types/evidence";
import type { GeneAnalyticsProfile, StoredGeneContext, StoredGeneScores, TopDrug } from "@/types/analytics";
import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from "@/lib/scoring-config";
import { mean, roundTo, sampleVariance } from "@/lib/statistics";

const MAX_EVIDENCE_SOURCES = 6;
const EVIDENCE_SATURATION = 10;
const TOP_DRUG_LIMIT = 5;
/** Cross-use-case variance at which agreement drops to zero. */
const VARIANCE_SCALE = 1000;
const SINGLE_SCORE_CROSS_VALIDATION = 0.5;

export type DomainStrengths = Record<EvidenceDomain, number>;

// ─── Gap rules ───────────────────────────────────────────────

interface GapRule {
  metric: EvidenceDomain | "diversity";
  below: number;
  message: string;
}

export const EVIDENCE_GAP_RULES: readonly GapRule[] = [
  { metric: "diversity", below: 0.5, message: "Limited evidence source diversity - consider additional databases" },
  { metric: "clinical", below: 0.3, message: "Weak clinical evidence - search for clinical trials and FDA approvals" },
  { metric: "mechanistic", below: 0.4, message: "Limited mechanistic understanding - investigate pathway involvement" },
  { metric: "publication", below: 0.3, message: "Low publication support - expand literature search" },
  { metric: "genomic", below: 0.2, message: "Minimal genomic evidence - explore mutation and biomarker associations" },
  { metric: "safety", below: 0.3, message: "Limited safety data - investigate drug interaction profiles" },
];

export function identifyEvidenceGaps(diversity: number, strengths: DomainStrengths): string[] {
  return EVIDENCE_GAP_RULES
    .filter((rule) => (rule.metric === "diversity" ? diversity : strengths[rule.metric]) < rule.below)
    .map((rule) => rule.message);
}

// ─── Metrics ─────────────────────────────────────────────────

/** Distinct evidence categories: drugs, pathways, GO terms, plus each literature source. */
export function evidenceDiversity(context: StoredGeneContext): number {
  const sources = new Set<string>();
  if (Object.keys(context.drugs).length > 0) sources.add("drugs");
  if (context.pathways.length > 0) sources.add("pathways");
  if (Object.keys(context.go_terms).length > 0) sources.add("go_terms");
  for (const key of Object.keys(context.source_references)) sources.add(key);
  return Math.min(sources.size / MAX_EVIDENCE_SOURCES, 1);
}

export function crossValidationScore(useCaseScores: readonly number[]): number {
  if (useCaseScores.length < 2) return SINGLE_SCORE_CROSS_VALIDATION;
  return Math.max(0, 1 - sampleVariance(useCaseScores) / VARIANCE_SCALE);
}

export function priorityAreasFor(geneSymbol: string, config: ScoringConfig = DEFAULT_SCORING_CONFIG): string[] {
  return Object.entries(config.analytics.researchPriorities)
    .filter(([, genes]) => genes.includes(geneSymbol))
    .map(([area]) => area);
}

function humanize(useCase: UseCase): string {
  return useCase.replace(/_/g, " ");
}

export function generateRecommendations(
  priorityAreas: readonly string[],
  rankings: GeneAnalyticsProfile["use_case_rankings"],
  gapCount: number,
  clinicalStrength: number,
  confidence: number,
): string[] {
  const out: string[] = [];

  if (priorityAreas.length > 0) {
    out.push(`High priority for ${priorityAreas.join(", ")} research`);
  }

  const best = rankings[0];
  if (best && best.score >= 60) {
    out.push(`Strongly recommended for ${humanize(best.use_case)} (score: ${best.score.toFixed(1)})`);
  } else if (best && best.score >= 40) {
    out.push(`Consider for ${humanize(best.use_case)} with additional validation`);
  }

  if (clinicalStrength >= 0.7) {
    out.push("Ready for clinical development - strong evidence base");
  } else if (clinicalStrength >= 0.4) {
    out.push("Suitable for preclinical development - gather more clinical evidence");
  } else {
    out.push("Requires significant preclinical work before clinical development");
  }

  if (confidence >= 0.8) {
    out.push("High confidence target - prioritize for resource allocation");
  } else if (confidence >= 0.6) {
    out.push("Moderate confidence - validate with additional evidence");
  } else {
    out.push("Low confidence - extensive validation required");
  }

  if (gapCount <= 2) {
    out.push("Well-characterized target with comprehensive evidence");
  } else if (gapCount <= 4) {
    out.push("Good evidence base - address specific gaps identified");
  } else {
    out.push("Requires comprehensive evidence gathering across multiple dimensions");
  }

  return out;
}

// ─── Profile ─────────────────────────────────────────────────

/**
 * Build the analytics profile for one gene. Returns null when nothing has
 * been stored for it.
 */
export function analyzeGeneEvidenceProfile(
  geneSymbol: string,
  stored: StoredGeneScores | null,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): GeneAnalyticsProfile | null {
  if (!stored || stored.rows.length === 0) return null;
  const { rows, context } = stored;

  // Gene-level rows define the use-case score; drug rows only fill a use case with no gene-level row.
  const useCaseScores = new Map<UseCase, number>();
  for (const row of rows) {
    if (row.drug_id === null) useCaseScores.set(row.use_case, row.evidence_score.overall_score);
  }
  for (const row of rows) {
    if (row.drug_id !== null && !useCaseScores.has(row.use_case)) {
      useCaseScores.set(row.use_case, row.evidence_score.overall_score);
    }
  }

  const drugScores = new Map<string, number[]>();
  let totalEvidence = 0;
  for (const row of rows) {
    totalEvidence = Math.max(totalEvidence, row.evidence_count);
    if (row.drug_id !== null) {
      const list = drugScores.get(row.drug_id) ?? [];
      list.push(row.evidence_score.overall_score);
      drugScores.set(row.drug_id, list);
    }
  }

  const strength = (domain: EvidenceDomain): number => {
    const ceiling = config.domainCeilings[domain];
    return ceiling > 0 ? mean(rows.map((row) => row.evidence_score.component_scores[domain])) / ceiling : 0;
  };
  const strengths: DomainStrengths = {
    clinical: strength("clinical"),
    mechanistic: strength("mechanistic"),
    publication: strength("publication"),
    genomic: strength("genomic"),
    safety: strength("safety"),
  };

  const diversity = evidenceDiversity(context);
  const crossValidation = crossValidationScore([...useCaseScores.values()]);
  const confidence = mean([
    diversity,
    Math.min(totalEvidence / EVIDENCE_SATURATION, 1),
    strengths.clinical,
    crossValidation,
  ]);

  const rankings = [...useCaseScores.entries()]
    .map(([use_case, score]) => ({ use_case, score }))
    .sort((a, b) => b.score - a.score);

  const topDrugs: TopDrug[] = [...drugScores.entries()]
    .map(([drugId, scores]) => {
      const drug: DrugEvidence | undefined = context.drugs[drugId];
      return {
        drug_id: drugId,
        name: drug?.name ?? "Unknown",
        avg_score: roundTo(mean(scores), 2),
        max_phase: drug?.max_phase ?? 0,
        mechanism: drug?.mechanism ?? "Unknown",
      };
    })
    .sort((a, b) => b.avg_score - a.avg_score)
    .slice(0, TOP_DRUG_LIMIT);

  const gaps = identifyEvidenceGaps(diversity, strengths);
  const recommendations = generateRecommendations(
    priorityAreasFor(geneSymbol, config),
    rankings,
    gaps.length,
    strengths.clinical,
    confidence,
  );

  return {
    gene_symbol: geneSymbol,
    total_evidence_items: totalEvidence,
    evidence_diversity_score: roundTo(diversity, 3),
    clinical_strength: roundTo(strengths.clinical, 3),
    mechanistic_depth: roundTo(strengths.mechanistic, 3),
    publication_support: roundTo(strengths.publication, 3),
    genomic_relevance: roundTo(strengths.genomic, 3),
    safety_profile: roundTo(strengths.safety, 3),
    cross_validation_score: roundTo(crossValidation, 3),
    recommendation_confidence: roundTo(confidence, 3),
    use_case_rankings: rankings,
    top_drugs: topDrugs,
    evidence_gaps: gaps,
    recommendations,
  };
}
