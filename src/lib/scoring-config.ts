/**
 * Scoring configuration: domain ceilings, use-case weight vectors, source
 * reliabilities and analytics thresholds. Built once, deep-frozen, and passed
 * by reference into calculators, scorer, pipeline and analytics.
 */
import { z } from "zod";
import type { EvidenceDomain, UseCase } from "@/types/evidence";
import { EVIDENCE_DOMAINS, USE_CASES } from "@/types/evidence";
import { ScoringConfigError } from "@/lib/errors";
import researchPriorities from "@/data/research-priorities.json";

export type DomainWeights = Readonly<Record<EvidenceDomain, number>>;

export interface AnalyticsThresholds {
  /** recommendation_confidence at or above which a gene counts as high-confidence. */
  highConfidence: number;
  /** Research-area name → member gene symbols. */
  researchPriorities: Readonly<Record<string, readonly string[]>>;
}

export interface ScoringConfig {
  scoringVersion: string;
  domainCeilings: DomainWeights;
  confidenceCeilings: DomainWeights;
  useCaseWeights: Readonly<Record<UseCase, DomainWeights>>;
  sourceReliability: Readonly<Record<string, number>>;
  defaultSourceReliability: number;
  analytics: AnalyticsThresholds;
}

const WEIGHT_SUM_TOLERANCE = 1e-6;
const MAX_OVERALL_SCORE = 100;

// ─── Defaults ───────────────────────────────────────────────

const DEFAULTS: ScoringConfig = {
  scoringVersion: "1.0",
  domainCeilings: {
    clinical: 30.0,
    mechanistic: 25.0,
    publication: 20.0,
    genomic: 15.0,
    safety: 10.0,
  },
  confidenceCeilings: {
    clinical: 0.9,
    mechanistic: 0.9,
    publication: 0.8,
    genomic: 0.8,
    safety: 0.7,
  },
  useCaseWeights: {
    drug_repurposing: {
      clinical: 0.35,
      safety: 0.25,
      mechanistic: 0.20,
      publication: 0.15,
      genomic: 0.05,
    },
    biomarker_discovery: {
      genomic: 0.35,
      clinical: 0.25,
      publication: 0.20,
      mechanistic: 0.15,
      safety: 0.05,
    },
    pathway_analysis: {
      mechanistic: 0.40,
      publication: 0.25,
      genomic: 0.20,
      clinical: 0.10,
      safety: 0.05,
    },
    therapeutic_targeting: {
      clinical: 0.30,
      mechanistic: 0.25,
      genomic: 0.20,
      publication: 0.15,
      safety: 0.10,
    },
  },
  sourceReliability: {
    fda: 0.95,
    clinicaltrials_gov: 0.90,
    chembl: 0.90,
    pharmgkb: 0.85,
    drugcentral: 0.80,
    pubmed: 0.75,
    drug_repurposing_hub: 0.75,
    reactome: 0.70,
    go: 0.65,
    uniprot: 0.60,
  },
  defaultSourceReliability: 0.5,
  analytics: {
    highConfidence: 0.8,
    researchPriorities,
  },
};

// ─── Validation ─────────────────────────────────────────────

const fraction = z.number().finite().min(0).max(1);
const nonNegative = z.number().finite().nonnegative();

function domainRecord(value: z.ZodNumber) {
  return z.object({
    clinical: value,
    mechanistic: value,
    publication: value,
    genomic: value,
    safety: value,
  });
}

const weightVector = domainRecord(fraction).refine(
  (w) => Math.abs(EVIDENCE_DOMAINS.reduce((sum, d) => sum + w[d], 0) - 1) <= WEIGHT_SUM_TOLERANCE,
  { message: "use-case weights must sum to 1.0" },
);

const overridesSchema = z.object({
  scoringVersion: z.string().min(1).optional(),
  domainCeilings: domainRecord(nonNegative).partial().optional(),
  confidenceCeilings: domainRecord(fraction).partial().optional(),
  useCaseWeights: z.object({
    drug_repurposing: weightVector.optional(),
    biomarker_discovery: weightVector.optional(),
    pathway_analysis: weightVector.optional(),
    therapeutic_targeting: weightVector.optional(),
  }).optional(),
  sourceReliability: z.record(fraction).optional(),
  defaultSourceReliability: fraction.optional(),
  analytics: z.object({
    highConfidence: fraction.optional(),
    researchPriorities: z.record(z.array(z.string())).optional(),
  }).optional(),
});

export type ScoringConfigOverrides = z.input<typeof overridesSchema>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function assertWeightsSumToOne(weights: ScoringConfig["useCaseWeights"]): void {
  for (const useCase of USE_CASES) {
    const sum = EVIDENCE_DOMAINS.reduce((acc, d) => acc + weights[useCase][d], 0);
    if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
      throw new ScoringConfigError(`Weights for ${useCase} sum to ${sum}, expected 1.0`);
    }
  }
}

/** A use case whose ceilings could push the weighted overall past 100 is rejected. */
function assertOverallWithinBounds(config: ScoringConfig): void {
  for (const useCase of USE_CASES) {
    const weights = config.useCaseWeights[useCase];
    const maxOverall = EVIDENCE_DOMAINS.reduce((acc, d) => acc + config.domainCeilings[d] * weights[d], 0);
    if (maxOverall > MAX_OVERALL_SCORE + WEIGHT_SUM_TOLERANCE) {
      throw new ScoringConfigError(
        `Ceilings allow an overall score of ${maxOverall} for ${useCase}, above ${MAX_OVERALL_SCORE}`,
      );
    }
  }
}

/**
 * Build a frozen config from the defaults plus validated overrides.
 * Throws ScoringConfigError when an override is out of range, a weight
 * vector does not sum to 1, or the ceilings allow an overall above 100.
 */
export function createScoringConfig(overrides: ScoringConfigOverrides = {}): ScoringConfig {
  const parsed = overridesSchema.safeParse(overrides);
  if (!parsed.success) {
    throw ScoringConfigError.fromZod(parsed.error);
  }
  const o = parsed.data;

  const config: ScoringConfig = {
    scoringVersion: o.scoringVersion ?? DEFAULTS.scoringVersion,
    domainCeilings: { ...DEFAULTS.domainCeilings, ...o.domainCeilings },
    confidenceCeilings: { ...DEFAULTS.confidenceCeilings, ...o.confidenceCeilings },
    useCaseWeights: {
      drug_repurposing: o.useCaseWeights?.drug_repurposing ?? { ...DEFAULTS.useCaseWeights.drug_repurposing },
      biomarker_discovery: o.useCaseWeights?.biomarker_discovery ?? { ...DEFAULTS.useCaseWeights.biomarker_discovery },
      pathway_analysis: o.useCaseWeights?.pathway_analysis ?? { ...DEFAULTS.useCaseWeights.pathway_analysis },
      therapeutic_targeting: o.useCaseWeights?.therapeutic_targeting ?? { ...DEFAULTS.useCaseWeights.therapeutic_targeting },
    },
    sourceReliability: { ...DEFAULTS.sourceReliability, ...o.sourceReliability },
    defaultSourceReliability: o.defaultSourceReliability ?? DEFAULTS.defaultSourceReliability,
    analytics: {
      highConfidence: o.analytics?.highConfidence ?? DEFAULTS.analytics.highConfidence,
      researchPriorities: o.analytics?.researchPriorities ?? DEFAULTS.analytics.researchPriorities,
    },
  };

  assertWeightsSumToOne(config.useCaseWeights);
  assertOverallWithinBounds(config);
  return deepFreeze(structuredClone(config));
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = createScoringConfig();

/** Reliability of a score source, keyed by its first "_"-separated segment. */
export function sourceReliability(source: string, config: ScoringConfig = DEFAULT_SCORING_CONFIG): number {
  const key = source.split("_")[0];
  return config.sourceReliability[key] ?? config.defaultSourceReliability;
}
