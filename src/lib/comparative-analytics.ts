/**
 * Comparative (panel) analytics over stored scores: rankings, use-case
 * comparison, quality distribution, clinical readiness, research
 * opportunities and portfolio recommendations.
 */
import type { UseCase } from "@/types/evidence";
import type {
  AnalyticsError,
  AnalyticsReport,
  ComparativeAnalysis,
  ComparativeAnalysisResult,
  EvidenceQualityDistribution,
  GeneAnalyticsProfile,
  GeneProfileSummary,
  GeneRankings,
  ReadinessCategory,
  ResearchOpportunity,
  ResearchType,
  SkippedGene,
  StoredGeneScores,
  UseCaseComparison,
  UseCaseGeneScore,
} from "@/types/analytics";
import { createLogger } from "@/lib/logger";
import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from "@/lib/scoring-config";
import type { ScoreStore } from "@/lib/score-store";
import { analyzeGeneEvidenceProfile, priorityAreasFor } from "@/lib/gene-analytics";
import { countWhere, mean, median, roundTo, sampleStd } from "@/lib/statistics";

const log = createLogger("comparative-analytics");

export const NO_ANALYTICS_DATA = "no valid analytics data";

const RANKING_LIMIT = 20;
const TOP_GENES_PER_USE_CASE = 10;
const OPPORTUNITY_LIMIT = 25;
const EXECUTIVE_PRIORITY_LIMIT = 10;
const GAP_PENALTY = 5;

export interface ComparativeAnalysisOptions {
  config?: ScoringConfig;
  now?: () => Date;
}

type ProfileMap = Map<string, GeneAnalyticsProfile>;

function bestUseCase(profile: GeneAnalyticsProfile): { use_case: UseCase; score: number } | null {
  return profile.use_case_rankings[0] ?? null;
}

// ─── Rankings ────────────────────────────────────────────────

function topBy(profiles: ProfileMap, metric: (p: GeneAnalyticsProfile) => number): Array<[string, GeneAnalyticsProfile]> {
  return [...profiles.entries()].sort(([, a], [, b]) => metric(b) - metric(a)).slice(0, RANKING_LIMIT);
}

export function rankGenes(profiles: ProfileMap): GeneRankings {
  return {
    by_confidence: topBy(profiles, (p) => p.recommendation_confidence).map(([gene, p]) => ({
      gene,
      confidence: p.recommendation_confidence,
      evidence_items: p.total_evidence_items,
    })),
    by_clinical_strength: topBy(profiles, (p) => p.clinical_strength).map(([gene, p]) => ({
      gene,
      clinical_strength: p.clinical_strength,
      top_drugs_count: p.top_drugs.length,
    })),
    by_evidence_diversity: topBy(profiles, (p) => p.evidence_diversity_score).map(([gene, p]) => ({
      gene,
      diversity_score: p.evidence_diversity_score,
      evidence_gaps_count: p.evidence_gaps.length,
    })),
  };
}

// ─── Use cases ───────────────────────────────────────────────

export function compareUseCases(profiles: ProfileMap): Partial<Record<UseCase, UseCaseComparison>> {
  const byUseCase = new Map<UseCase, UseCaseGeneScore[]>();
  for (const [gene, profile] of profiles) {
    for (const { use_case, score } of profile.use_case_rankings) {
      const list = byUseCase.get(use_case) ?? [];
      list.push({ gene, score, confidence: profile.recommendation_confidence });
      byUseCase.set(use_case, list);
    }
  }

  const out: Partial<Record<UseCase, UseCaseComparison>> = {};
  for (const [useCase, entries] of byUseCase) {
    const scores = entries.map((e) => e.score);
    out[useCase] = {
      gene_count: entries.length,
      avg_score: roundTo(mean(scores), 2),
      std_score: roundTo(sampleStd(scores), 2),
      top_genes: [...entries].sort((a, b) => b.score - a.score).slice(0, TOP_GENES_PER_USE_CASE),
      score_distribution: {
        high: countWhere(scores, (s) => s > 70),
        medium: countWhere(scores, (s) => s >= 50 && s <= 70),
        low: countWhere(scores, (s) => s < 50),
      },
    };
  }
  return out;
}

// ─── Quality & readiness ─────────────────────────────────────

export function analyzeEvidenceQuality(profiles: ProfileMap): EvidenceQualityDistribution {
  const all = [...profiles.values()];
  const confidence = all.map((p) => p.recommendation_confidence);
  const diversity = all.map((p) => p.evidence_diversity_score);
  const volume = all.map((p) => p.total_evidence_items);

  return {
    confidence_distribution: {
      mean: roundTo(mean(confidence), 3),
      median: roundTo(median(confidence), 3),
      std: roundTo(sampleStd(confidence), 3),
      high_confidence_count: countWhere(confidence, (c) => c >= 0.8),
      medium_confidence_count: countWhere(confidence, (c) => c >= 0.5 && c < 0.8),
      low_confidence_count: countWhere(confidence, (c) => c < 0.5),
    },
    diversity_distribution: {
      mean: roundTo(mean(diversity), 3),
      median: roundTo(median(diversity), 3),
      high_diversity_count: countWhere(diversity, (d) => d >= 0.7),
    },
    evidence_volume: {
      mean_evidence_items: roundTo(mean(volume), 1),
      median_evidence_items: roundTo(median(volume), 1),
      well_evidenced_count: countWhere(volume, (e) => e >= 5),
    },
  };
}

export function classifyReadiness(profile: GeneAnalyticsProfile): ReadinessCategory {
  const clinical = profile.clinical_strength;
  const confidence = profile.recommendation_confidence;
  const evidence = profile.total_evidence_items;
  if (clinical >= 0.7 && confidence >= 0.8 && evidence >= 5) return "ready_for_clinical";
  if (clinical >= 0.4 && confidence >= 0.6 && evidence >= 3) return "ready_for_preclinical";
  if (evidence >= 2) return "requires_basic_research";
  return "insufficient_evidence";
}

export function assessClinicalReadiness(profiles: ProfileMap): Record<ReadinessCategory, string[]> {
  const out: Record<ReadinessCategory, string[]> = {
    ready_for_clinical: [],
    ready_for_preclinical: [],
    requires_basic_research: [],
    insufficient_evidence: [],
  };
  for (const [gene, profile] of profiles) out[classifyReadiness(profile)].push(gene);
  return out;
}

// ─── Opportunities & portfolio ───────────────────────────────

function researchTypesNeeded(profile: GeneAnalyticsProfile): ResearchType[] {
  const types: ResearchType[] = [];
  if (profile.clinical_strength < 0.3) types.push("clinical_trials");
  if (profile.mechanistic_depth < 0.4) types.push("mechanism_studies");
  if (profile.publication_support < 0.3) types.push("literature_validation");
  if (profile.safety_profile < 0.3) types.push("safety_assessment");
  return types;
}

export function prioritizeResearchOpportunities(profiles: ProfileMap, config: ScoringConfig): ResearchOpportunity[] {
  const opportunities = [...profiles.entries()].map(([gene, profile]): ResearchOpportunity => {
    const potential = bestUseCase(profile)?.score ?? 0;
    return {
      gene,
      opportunity_score: roundTo(potential - profile.evidence_gaps.length * GAP_PENALTY, 1),
      research_types_needed: researchTypesNeeded(profile),
      evidence_gaps_count: profile.evidence_gaps.length,
      confidence: profile.recommendation_confidence,
      priority_areas: priorityAreasFor(gene, config),
    };
  });
  return opportunities.sort((a, b) => b.opportunity_score - a.opportunity_score).slice(0, OPPORTUNITY_LIMIT);
}

export function generatePortfolioRecommendations(profiles: ProfileMap, config: ScoringConfig): string[] {
  const all = [...profiles.entries()];
  const total = all.length;
  const out: string[] = [];

  const highConfidence = countWhere(
    all.map(([, p]) => p.recommendation_confidence),
    (c) => c >= config.analytics.highConfidence,
  );
  out.push(
    highConfidence / total >= 0.3
      ? "Strong portfolio with high proportion of confident targets"
      : "Portfolio needs more high-confidence targets - focus on evidence gathering",
  );

  const clinicalReady = countWhere(all.map(([, p]) => p.clinical_strength), (c) => c >= 0.7);
  out.push(
    clinicalReady / total >= 0.2
      ? "Good clinical pipeline potential - prioritize clinical development"
      : "Limited clinical readiness - invest in preclinical development",
  );

  const bestCounts = new Map<UseCase, number>();
  for (const [, profile] of all) {
    const best = bestUseCase(profile);
    if (best) bestCounts.set(best.use_case, (bestCounts.get(best.use_case) ?? 0) + 1);
  }
  let dominant: [UseCase, number] | null = null;
  for (const entry of bestCounts) {
    if (!dominant || entry[1] > dominant[1]) dominant = entry;
  }
  out.push(
    dominant && dominant[1] / total > 0.5
      ? `Portfolio heavily weighted toward ${dominant[0]} - consider diversification`
      : "Well-balanced portfolio across use cases",
  );

  const priorityGenes = all.filter(([gene]) => priorityAreasFor(gene, config).length > 0).length;
  out.push(
    priorityGenes / total >= 0.4
      ? "Strong alignment with cancer research priorities"
      : "Consider including more high-priority cancer research targets",
  );

  return out;
}

// ─── Entry points ────────────────────────────────────────────

interface PanelAnalysis {
  result: ComparativeAnalysisResult;
  profiles: ProfileMap;
}

async function collectProfiles(
  geneList: readonly string[],
  store: ScoreStore,
  config: ScoringConfig,
): Promise<{ profiles: ProfileMap; skipped: SkippedGene[] }> {
  const profiles: ProfileMap = new Map();
  const skipped: SkippedGene[] = [];

  for (const gene of new Set(geneList)) {
    let stored: StoredGeneScores | null;
    try {
      stored = await store.getStoredScores(gene);
    } catch (err) {
      log.error(`Failed to read stored scores for ${gene}`, err);
      skipped.push({ gene, reason: "store_error" });
      continue;
    }
    const profile = analyzeGeneEvidenceProfile(gene, stored, config);
    if (profile) {
      profiles.set(gene, profile);
    } else {
      log.warn(`No stored evidence scores for ${gene}`);
      skipped.push({ gene, reason: "no_stored_scores" });
    }
  }
  return { profiles, skipped };
}

async function analyzePanel(
  geneList: readonly string[],
  store: ScoreStore,
  config: ScoringConfig,
  now: () => Date,
): Promise<PanelAnalysis> {
  const { profiles, skipped } = await collectProfiles(geneList, store, config);
  if (profiles.size === 0) {
    return { result: { error: NO_ANALYTICS_DATA, skipped_genes: skipped }, profiles };
  }

  log.info(`Comparing ${profiles.size} genes`, { skipped: skipped.length });

  const analysis: ComparativeAnalysis = {
    total_genes_analyzed: profiles.size,
    analysis_date: now().toISOString(),
    gene_rankings: rankGenes(profiles),
    use_case_comparison: compareUseCases(profiles),
    evidence_quality_distribution: analyzeEvidenceQuality(profiles),
    clinical_readiness_assessment: assessClinicalReadiness(profiles),
    research_priorities: prioritizeResearchOpportunities(profiles, config),
    portfolio_recommendations: generatePortfolioRecommendations(profiles, config),
    skipped_genes: skipped,
  };
  return { result: analysis, profiles };
}

export function isAnalyticsError<T extends object>(result: T | AnalyticsError): result is AnalyticsError {
  return "error" in result;
}

/**
 * Compare a gene panel. Never throws for sparse data: an empty panel, or one
 * where no gene has stored scores, yields `{ error: NO_ANALYTICS_DATA }`.
 */
export async function generateComparativeAnalysis(
  geneList: readonly string[],
  store: ScoreStore,
  options: ComparativeAnalysisOptions = {},
): Promise<ComparativeAnalysisResult> {
  const config = options.config ?? DEFAULT_SCORING_CONFIG;
  const { result } = await analyzePanel(geneList, store, config, options.now ?? (() => new Date()));
  return result;
}

function summarizeProfile(profile: GeneAnalyticsProfile): GeneProfileSummary {
  return {
    summary_metrics: {
      confidence: profile.recommendation_confidence,
      clinical_strength: profile.clinical_strength,
      evidence_diversity: profile.evidence_diversity_score,
      total_evidence: profile.total_evidence_items,
    },
    use_case_rankings: profile.use_case_rankings,
    top_drugs: profile.top_drugs,
    evidence_gaps: profile.evidence_gaps,
    recommendations: profile.recommendations,
  };
}

/**
 * Full JSON-shaped report: metadata, executive summary, the comparative
 * analysis and one profile summary per analysed gene. Writing it anywhere
 * is the caller's concern.
 */
export async function buildAnalyticsReport(
  geneList: readonly string[],
  store: ScoreStore,
  options: ComparativeAnalysisOptions = {},
): Promise<AnalyticsReport | AnalyticsError> {
  const config = options.config ?? DEFAULT_SCORING_CONFIG;
  const now = options.now ?? (() => new Date());

  const { result, profiles } = await analyzePanel(geneList, store, config, now);
  if (isAnalyticsError(result)) {
    log.error(`Analytics report failed: ${result.error}`);
    return result;
  }

  const individual: Record<string, GeneProfileSummary> = {};
  for (const [gene, profile] of profiles) individual[gene] = summarizeProfile(profile);

  return {
    report_metadata: {
      generated_date: now().toISOString(),
      gene_count: geneList.length,
      genes_analyzed: [...geneList],
      scoring_system_version: config.scoringVersion,
    },
    executive_summary: {
      total_genes_analyzed: result.total_genes_analyzed,
      clinical_readiness: result.clinical_readiness_assessment,
      top_priorities: result.research_priorities.slice(0, EXECUTIVE_PRIORITY_LIMIT),
      portfolio_recommendations: result.portfolio_recommendations,
    },
    detailed_analysis: result,
    individual_gene_profiles: individual,
  };
}
