/**
 * The five domain evidence calculators.
 *
 * Each maps a parsed GeneEvidenceRecord to a bounded EvidenceScore with a
 * breakdown of contributing facts. All are pure: no I/O, no mutation of the
 * record, and a record with no facts for the domain scores (0, 0).
 */
import type {
  DrugEvidence,
  EvidenceBreakdown,
  EvidenceComponent,
  EvidenceDomain,
  EvidenceScore,
  GeneEvidenceRecord,
  GoTermEvidence,
} from "@/types/evidence";
import { EVIDENCE_DOMAINS } from "@/types/evidence";
import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from "@/lib/scoring-config";
import {
  CANCER_KEYWORDS,
  CHEMBL_SOURCES,
  CLINICAL_SIGNIFICANCE_BONUS,
  CONFIDENCE_PER_FACT,
  DRUGCENTRAL_SOURCE,
  FDA_APPROVAL_BONUS,
  NUMERIC_PHASE_LABELS,
  PGKB_LEVEL_POINTS,
  REPURPOSING_HUB_SOURCES,
  REPURPOSING_PHASE_ALIASES,
  REPURPOSING_PHASE_POINTS,
  SAFETY_BASELINE,
  SAFETY_CONFIDENCE_WITHOUT_FACTS,
  SAFETY_KNOWLEDGE_PER_ANNOTATION,
  TOXICITY_PENALTY_PER_ANNOTATION,
  TRIAL_PHASE_POINTS,
  VARIANT_SCORE_TIERS,
  type RepurposingPhase,
} from "@/lib/scoring-constants";

export type DomainCalculator = (record: GeneEvidenceRecord, config?: ScoringConfig) => EvidenceScore;

// ─── Accumulator ─────────────────────────────────────────────

class EvidenceAccumulator {
  private score: number;
  private evidenceCount = 0;
  private readonly components: EvidenceComponent[] = [];
  private readonly bonuses: Record<string, number> = {};

  constructor(
    private readonly domain: EvidenceDomain,
    base = 0,
  ) {
    this.score = base;
  }

  add(type: string, points: number, facts: number, detail: EvidenceComponent["detail"] = {}): void {
    this.score += points;
    this.evidenceCount += facts;
    this.components.push({ type, score: points, detail });
  }

  /** Points (positive or negative) that are not tied to one component. */
  adjust(key: string, points: number, facts = 0): void {
    this.score += points;
    this.evidenceCount += facts;
    this.bonuses[key] = Math.abs(points);
  }

  get count(): number {
    return this.evidenceCount;
  }

  finish(config: ScoringConfig, emptyConfidence = 0): EvidenceScore {
    const ceiling = config.domainCeilings[this.domain];
    const score = Math.max(0, Math.min(this.score, ceiling));
    const confidence = this.evidenceCount > 0
      ? Math.min(config.confidenceCeilings[this.domain], this.evidenceCount * CONFIDENCE_PER_FACT[this.domain])
      : emptyConfidence;
    const metadata: EvidenceBreakdown = {
      components: this.components,
      evidence_count: this.evidenceCount,
      bonuses: this.bonuses,
    };
    return {
      score,
      confidence,
      source: `multiple_${this.domain}`,
      domain: this.domain,
      metadata,
    };
  }
}

// ─── Drug helpers ────────────────────────────────────────────

/** Collector keys such as "repurposing_hub" double as the source when none is given. */
function drugSource(key: string, drug: DrugEvidence): string {
  return (drug.source ?? key).toLowerCase();
}

function numericPhase(drug: DrugEvidence): number | null {
  if (drug.max_phase != null) return drug.max_phase;
  return typeof drug.clinical_phase === "number" ? drug.clinical_phase : null;
}

/** Map a hub phase (label or number) onto the scoring labels. Absent means preclinical. */
export function repurposingPhase(phase: DrugEvidence["clinical_phase"]): RepurposingPhase | null {
  if (phase == null) return "Preclinical";
  if (typeof phase === "number") return NUMERIC_PHASE_LABELS[phase] ?? null;
  const label = phase.trim();
  if (isRepurposingPhase(label)) return label;
  return REPURPOSING_PHASE_ALIASES[label] ?? null;
}

function isRepurposingPhase(label: string): label is RepurposingPhase {
  return Object.hasOwn(REPURPOSING_PHASE_POINTS, label);
}

function isRepurposingDrug(key: string, drug: DrugEvidence): boolean {
  return REPURPOSING_HUB_SOURCES.has(drugSource(key, drug));
}

// ─── Clinical ────────────────────────────────────────────────

export function computeClinicalEvidence(
  record: GeneEvidenceRecord,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): EvidenceScore {
  const acc = new EvidenceAccumulator("clinical");

  for (const [key, drug] of Object.entries(record.drugs)) {
    const source = drugSource(key, drug);

    for (const annotation of drug.clinical_annotations ?? []) {
      const level = annotation.evidence_level ?? "4";
      const significance = annotation.clinical_significance ?? "Unknown";
      const points = (PGKB_LEVEL_POINTS[level] ?? 0) + (CLINICAL_SIGNIFICANCE_BONUS[significance] ?? 0);
      acc.add("pharmgkb_clinical", points, 1, { drug: key, evidence_level: level, significance });
    }

    const trials = drug.clinical_trials ?? [];
    for (const trial of trials) {
      const phase = trial.phase ?? 0;
      acc.add("chembl_trial", TRIAL_PHASE_POINTS[phase] ?? 0, 1, { drug: key, phase });
    }
    if (trials.length === 0 && CHEMBL_SOURCES.has(source)) {
      const phase = numericPhase(drug);
      if (phase !== null) {
        acc.add("chembl_trial", TRIAL_PHASE_POINTS[phase] ?? 0, 1, { drug: key, phase });
      }
    }

    if (REPURPOSING_HUB_SOURCES.has(source)) {
      const phase = repurposingPhase(drug.clinical_phase);
      const points = phase ? REPURPOSING_PHASE_POINTS[phase] : 0;
      acc.add("repurposing_hub", points, 1, { drug: key, phase: phase ?? String(drug.clinical_phase) });
    }
  }

  const variants = record.pharmgkb_variants;
  if (variants) {
    const highImpact = variants.summary?.high_impact_variants ?? 0;
    const actionable = variants.summary?.clinical_actionable ?? 0;
    const maxScore = variants.summary?.max_pharmacogenomic_score ?? 0;
    const cyp450 = variants.cyp450_variants?.length ?? 0;
    const cancer = variants.cancer_relevant_variants?.length ?? 0;

    let points = 0;
    if (highImpact > 0) points += Math.min(8.0, highImpact * 0.5);
    if (actionable > 0) points += Math.min(6.0, actionable * 1.0);
    points += VARIANT_SCORE_TIERS.find((t) => maxScore >= t.minScore)?.bonus ?? 0;
    if (cyp450 > 0) points += Math.min(3.0, cyp450 * 0.3);
    if (cancer > 0) points += Math.min(5.0, cancer * 0.8);

    acc.add("pharmgkb_variants", points, highImpact + actionable + cyp450 + cancer, {
      high_impact_variants: highImpact,
      clinical_actionable: actionable,
      max_pharmgkb_score: maxScore,
      cyp450_variants: cyp450,
      cancer_variants: cancer,
    });
  }

  return acc.finish(config);
}

// ─── Mechanistic ─────────────────────────────────────────────

export function computeMechanisticEvidence(
  record: GeneEvidenceRecord,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): EvidenceScore {
  const acc = new EvidenceAccumulator("mechanistic");

  const pgkbPathways = Object.values(record.pharmgkb_pathways);
  if (pgkbPathways.length > 0) {
    const pathwayScore = Math.min(15.0, pgkbPathways.length * 2.0);
    const cancerRelevant = pgkbPathways.filter((p) => p.clinical_relevance?.cancer_relevance === true).length;
    const cancerBonus = Math.min(5.0, cancerRelevant * 1.0);
    acc.add("pharmgkb_pathways", pathwayScore + cancerBonus, pgkbPathways.length, {
      pathway_count: pgkbPathways.length,
      cancer_relevant: cancerRelevant,
    });
  }

  if (record.pathways.length > 0) {
    acc.add("reactome_pathways", Math.min(8.0, record.pathways.length * 0.5), record.pathways.length, {
      pathway_count: record.pathways.length,
    });
  }

  const targetInteractions = Object.entries(record.drugs)
    .filter(([key, drug]) => drugSource(key, drug) === DRUGCENTRAL_SOURCE).length;
  if (targetInteractions > 0) {
    acc.add("drugcentral_targets", Math.min(7.0, targetInteractions * 1.5), targetInteractions, {
      interaction_count: targetInteractions,
    });
  }

  return acc.finish(config);
}

// ─── Publication ─────────────────────────────────────────────

export function computePublicationEvidence(
  record: GeneEvidenceRecord,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): EvidenceScore {
  const acc = new EvidenceAccumulator("publication");
  let totalPublications = 0;

  for (const [source, refs] of Object.entries(record.source_references)) {
    if (refs.length === 0) continue;
    totalPublications += refs.length;
    const weight = config.sourceReliability[source] ?? config.defaultSourceReliability;
    acc.add(`${source}_publications`, refs.length * weight * 0.5, refs.length, {
      publication_count: refs.length,
      source_weight: weight,
    });
  }

  // Research-interest signal once the literature is substantial.
  if (totalPublications > 20) {
    acc.adjust("volume_bonus", Math.min(3.0, (totalPublications - 20) * 0.1));
  }

  return acc.finish(config);
}

// ─── Genomic ─────────────────────────────────────────────────

function isCancerRelevantTerm(term: GoTermEvidence): boolean {
  const name = (term.term ?? "").toLowerCase();
  return CANCER_KEYWORDS.some((keyword) => name.includes(keyword));
}

export function computeGenomicEvidence(
  record: GeneEvidenceRecord,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): EvidenceScore {
  const acc = new EvidenceAccumulator("genomic");

  const byAspect = new Map<string, GoTermEvidence[]>();
  for (const term of Object.values(record.go_terms)) {
    const aspect = term.aspect ?? "unknown";
    let terms = byAspect.get(aspect);
    if (!terms) {
      terms = [];
      byAspect.set(aspect, terms);
    }
    terms.push(term);
  }

  let cancerTerms = 0;
  for (const [aspect, terms] of byAspect) {
    acc.add(`go_${aspect}`, Math.min(3.0, terms.length * 0.2), terms.length, { term_count: terms.length });
    cancerTerms += terms.filter(isCancerRelevantTerm).length;
  }
  if (cancerTerms > 0) {
    acc.adjust("cancer_term_points", cancerTerms * 0.5);
    acc.adjust("cancer_relevance_bonus", Math.min(4.0, cancerTerms * 0.8));
  }

  const featureCount = Object.keys(record.features).length;
  if (featureCount > 0) {
    acc.add("gene_features", Math.min(2.0, featureCount * 0.3), featureCount, { feature_count: featureCount });
  }

  const functionCount = record.molecular_functions.length;
  if (functionCount > 0) {
    acc.add("molecular_functions", Math.min(2.0, functionCount * 0.4), functionCount, {
      function_count: functionCount,
    });
  }

  return acc.finish(config);
}

// ─── Safety ──────────────────────────────────────────────────

/**
 * Starts from a neutral baseline once the gene has any drug association;
 * a gene without drugs has no safety evidence and scores (0, 0).
 */
export function computeSafetyEvidence(
  record: GeneEvidenceRecord,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): EvidenceScore {
  const drugs = Object.entries(record.drugs);
  if (drugs.length === 0) {
    return new EvidenceAccumulator("safety").finish(config);
  }

  const acc = new EvidenceAccumulator("safety", SAFETY_BASELINE);

  const toxicity = drugs.flatMap(([, drug]) => drug.clinical_annotations ?? [])
    .filter((a) => (a.phenotype_category ?? "").toLowerCase().includes("toxicity"));
  if (toxicity.length > 0) {
    const penalty = toxicity.length * TOXICITY_PENALTY_PER_ANNOTATION;
    const knowledge = toxicity.length * SAFETY_KNOWLEDGE_PER_ANNOTATION;
    acc.add("pharmgkb_toxicity", knowledge - penalty, toxicity.length, {
      penalty,
      knowledge_bonus: knowledge,
      annotation_count: toxicity.length,
    });
  }

  const approved = drugs.some(
    ([key, drug]) => isRepurposingDrug(key, drug) && repurposingPhase(drug.clinical_phase) === "Approved",
  );
  if (approved) {
    acc.adjust("fda_approval_bonus", FDA_APPROVAL_BONUS, 1);
  }

  // Several concurrent drug associations raise interaction risk.
  if (drugs.length > 1) {
    acc.adjust("interaction_risk_penalty", -Math.min(2.0, (drugs.length - 1) * 0.2));
  }

  return acc.finish(config, SAFETY_CONFIDENCE_WITHOUT_FACTS);
}

// ─── All domains ─────────────────────────────────────────────

export const DOMAIN_CALCULATORS: Readonly<Record<EvidenceDomain, DomainCalculator>> = {
  clinical: computeClinicalEvidence,
  mechanistic: computeMechanisticEvidence,
  publication: computePublicationEvidence,
  genomic: computeGenomicEvidence,
  safety: computeSafetyEvidence,
};

/** Run every calculator once, in domain order. */
export function computeDomainScores(
  record: GeneEvidenceRecord,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): EvidenceScore[] {
  return EVIDENCE_DOMAINS.map((domain) => DOMAIN_CALCULATORS[domain](record, config));
}
