/**
 * Static lookup tables used by the domain calculators and analytics.
 * Tunable values (ceilings, weights, reliabilities) live in scoring-config.ts;
 * everything here is a categorical → points mapping or a fixed keyword list.
 */

import type { EvidenceDomain } from "@/types/evidence";

/** Confidence gained per independent contributing fact, before the domain's confidence ceiling. */
export const CONFIDENCE_PER_FACT: Readonly<Record<EvidenceDomain, number>> = {
  clinical: 0.2,
  mechanistic: 0.15,
  publication: 0.1,
  genomic: 0.05,
  safety: 0.3,
};

// ─── Clinical ───────────────────────────────────────────────

/** PharmGKB clinical-annotation evidence level → points. */
export const PGKB_LEVEL_POINTS: Readonly<Record<string, number>> = {
  "1A": 8.0,
  "1B": 6.0,
  "2A": 4.0,
  "2B": 2.0,
  "3": 1.0,
  "4": 0.0,
};

export const CLINICAL_SIGNIFICANCE_BONUS: Readonly<Record<string, number>> = {
  High: 2.0,
  Moderate: 1.0,
  Low: 0.5,
  Unknown: 0.0,
};

/** ChEMBL trial phase → points. */
export const TRIAL_PHASE_POINTS: Readonly<Record<number, number>> = {
  4: 12.0,
  3: 8.0,
  2: 4.0,
  1: 2.0,
  0: 0.5,
};

export type RepurposingPhase = "Approved" | "Phase 3" | "Phase 2" | "Phase 1" | "Preclinical";

export const REPURPOSING_PHASE_POINTS: Readonly<Record<RepurposingPhase, number>> = {
  Approved: 15.0,
  "Phase 3": 10.0,
  "Phase 2": 6.0,
  "Phase 1": 3.0,
  Preclinical: 1.0,
};

/** Hub labels that are spelled differently from the scoring labels. */
export const REPURPOSING_PHASE_ALIASES: Readonly<Record<string, RepurposingPhase>> = {
  Launched: "Approved",
};

export const NUMERIC_PHASE_LABELS: Readonly<Record<number, RepurposingPhase>> = {
  4: "Approved",
  3: "Phase 3",
  2: "Phase 2",
  1: "Phase 1",
  0: "Preclinical",
};

/** Tiered bonus on the maximum pharmacogenomic variant score, highest threshold first. */
export const VARIANT_SCORE_TIERS = [
  { minScore: 80, bonus: 4.0 },
  { minScore: 70, bonus: 2.0 },
  { minScore: 60, bonus: 1.0 },
] as const;

// ─── Source names ───────────────────────────────────────────

export const REPURPOSING_HUB_SOURCES: ReadonlySet<string> = new Set([
  "repurposing_hub",
  "drug_repurposing_hub",
]);

export const CHEMBL_SOURCES: ReadonlySet<string> = new Set(["chembl", "chembl_data"]);

export const DRUGCENTRAL_SOURCE = "drugcentral";

// ─── Genomic ────────────────────────────────────────────────

export const CANCER_KEYWORDS: readonly string[] = [
  "apoptosis",
  "cell death",
  "tumor",
  "cancer",
  "oncogene",
  "tumor suppressor",
  "cell cycle",
  "dna repair",
  "metastasis",
  "proliferation",
  "growth factor",
  "angiogenesis",
  "invasion",
  "migration",
  "transformation",
];

// ─── Safety ─────────────────────────────────────────────────

export const SAFETY_BASELINE = 5.0;
export const TOXICITY_PENALTY_PER_ANNOTATION = 0.5;
export const SAFETY_KNOWLEDGE_PER_ANNOTATION = 0.3;
export const FDA_APPROVAL_BONUS = 3.0;
export const SAFETY_CONFIDENCE_WITHOUT_FACTS = 0.3;
