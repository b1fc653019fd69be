import { describe, it, expect } from "vitest";
import fixture from "./fixtures/gene-records.json";
import { EVIDENCE_DOMAINS } from "@/types/evidence";
import { toGeneEvidenceRecord } from "@/lib/evidence-record";
import { createScoringConfig, DEFAULT_SCORING_CONFIG } from "@/lib/scoring-config";
import {
  computeClinicalEvidence,
  computeDomainScores,
  computeGenomicEvidence,
  computeMechanisticEvidence,
  computePublicationEvidence,
  computeSafetyEvidence,
  repurposingPhase,
} from "@/lib/domain-calculators";

const rec = toGeneEvidenceRecord;

// ─── Empty evidence ──────────────────────────────────────────

describe("empty record", () => {
  it("scores every domain (0, 0)", () => {
    const scores = computeDomainScores(rec({}));
    expect(scores.map((s) => s.domain)).toEqual([...EVIDENCE_DOMAINS]);
    for (const s of scores) {
      expect(s.score).toBe(0);
      expect(s.confidence).toBe(0);
      expect(s.metadata.evidence_count).toBe(0);
    }
  });

  it("names each source after its domain", () => {
    expect(computeDomainScores(rec({})).map((s) => s.source)).toEqual([
      "multiple_clinical",
      "multiple_mechanistic",
      "multiple_publication",
      "multiple_genomic",
      "multiple_safety",
    ]);
  });
});

// ─── Clinical ────────────────────────────────────────────────

describe("computeClinicalEvidence", () => {
  it("counts an approved repurposing-hub drug at 15 points", () => {
    const score = computeClinicalEvidence(rec({ drugs: { d1: { clinical_phase: 4, source: "repurposing_hub" } } }));
    expect(score.score).toBe(15);
    expect(score.confidence).toBe(0.2);
    expect(score.metadata.components).toEqual([
      { type: "repurposing_hub", score: 15, detail: { drug: "d1", phase: "Approved" } },
    ]);
  });

  it("adds evidence-level points and the significance bonus per annotation", () => {
    const score = computeClinicalEvidence(rec({
      drugs: {
        d1: {
          source: "pharmgkb",
          clinical_annotations: [
            { evidence_level: "1A", clinical_significance: "High" },
            { evidence_level: "2B" },
          ],
        },
      },
    }));
    expect(score.score).toBe(12);
    expect(score.confidence).toBe(0.4);
    expect(score.metadata.evidence_count).toBe(2);
  });

  it("scores ChEMBL trials, falling back to max_phase when a drug lists none", () => {
    const score = computeClinicalEvidence(rec({
      drugs: {
        chembl_data: { max_phase: 3 },
        d2: { source: "chembl", clinical_trials: [{ phase: 2 }, { phase: 4 }] },
      },
    }));
    expect(score.score).toBe(24);
    expect(score.metadata.evidence_count).toBe(3);
    expect(score.confidence).toBeCloseTo(0.6, 10);
  });

  it("caps the domain at 30", () => {
    const score = computeClinicalEvidence(rec({
      drugs: {
        a: { source: "repurposing_hub", clinical_phase: "Approved" },
        b: { source: "repurposing_hub", clinical_phase: "Launched" },
        c: { source: "drug_repurposing_hub", clinical_phase: 4 },
      },
    }));
    expect(score.score).toBe(30);
    expect(score.metadata.evidence_count).toBe(3);
  });

  it("sums the pharmacogenomic variant tiers", () => {
    const score = computeClinicalEvidence(rec({
      pharmgkb_variants: {
        summary: { high_impact_variants: 4, clinical_actionable: 2, max_pharmacogenomic_score: 75 },
        cyp450_variants: ["v1", "v2"],
        cancer_relevant_variants: ["v3"],
      },
    }));
    expect(score.score).toBeCloseTo(7.4, 10);
    expect(score.metadata.evidence_count).toBe(9);
    expect(score.confidence).toBe(0.9);
  });

  it("ignores an empty variant block", () => {
    const score = computeClinicalEvidence(rec({ pharmgkb_variants: {} }));
    expect(score.score).toBe(0);
    expect(score.metadata.components).toEqual([]);
  });
});

describe("repurposingPhase", () => {
  it("maps labels, aliases and numeric phases", () => {
    expect(repurposingPhase("Launched")).toBe("Approved");
    expect(repurposingPhase("Phase 3")).toBe("Phase 3");
    expect(repurposingPhase(2)).toBe("Phase 2");
    expect(repurposingPhase(0)).toBe("Preclinical");
    expect(repurposingPhase(undefined)).toBe("Preclinical");
  });

  it("returns null for phases it cannot place", () => {
    expect(repurposingPhase("Phase 9")).toBeNull();
    expect(repurposingPhase(2.5)).toBeNull();
  });
});

// ─── Mechanistic ─────────────────────────────────────────────

describe("computeMechanisticEvidence", () => {
  it("combines PharmGKB pathways, Reactome pathways and DrugCentral targets", () => {
    const score = computeMechanisticEvidence(rec({
      pharmgkb_pathways: {
        PA1: { clinical_relevance: { cancer_relevance: true } },
        PA2: {},
        PA3: { clinical_relevance: { cancer_relevance: true } },
      },
      pathways: ["p1", "p2", "p3", "p4"],
      drugs: { t1: { source: "drugcentral" }, t2: { source: "DrugCentral" } },
    }));
    expect(score.score).toBe(13);
    expect(score.metadata.evidence_count).toBe(9);
    expect(score.confidence).toBe(0.9);
    expect(score.metadata.components.map((c) => c.type)).toEqual([
      "pharmgkb_pathways",
      "reactome_pathways",
      "drugcentral_targets",
    ]);
  });

  it("treats duplicate pathway names as one", () => {
    const score = computeMechanisticEvidence(rec({ pathways: ["p1", "p1", "p2"] }));
    expect(score.score).toBe(1);
    expect(score.metadata.evidence_count).toBe(2);
  });
});

// ─── Publication ─────────────────────────────────────────────

describe("computePublicationEvidence", () => {
  it("weights each source by its reliability", () => {
    const score = computePublicationEvidence(rec({
      source_references: {
        pubmed: Array.from({ length: 10 }, (_, i) => `pm${i}`),
        pharmgkb: ["a", "b", "c", "d"],
        lab_notes: ["x", "y"],
      },
    }));
    expect(score.score).toBeCloseTo(5.95, 10);
    expect(score.metadata.evidence_count).toBe(16);
    expect(score.confidence).toBe(0.8);
    expect(score.metadata.bonuses).toEqual({});
  });

  it("adds a volume bonus past 20 publications", () => {
    const score = computePublicationEvidence(rec({
      source_references: { pubmed: Array.from({ length: 30 }, (_, i) => i) },
    }));
    expect(score.score).toBeCloseTo(12.25, 10);
    expect(score.metadata.bonuses.volume_bonus).toBeCloseTo(1, 10);
  });

  it("caps the domain at 20", () => {
    const score = computePublicationEvidence(rec({
      source_references: { pubmed: Array.from({ length: 60 }, (_, i) => i) },
    }));
    expect(score.score).toBe(20);
  });

  it("uses reliabilities from the supplied config", () => {
    const config = createScoringConfig({ sourceReliability: { pubmed: 1 } });
    const score = computePublicationEvidence(
      rec({ source_references: { pubmed: Array.from({ length: 10 }, (_, i) => i) } }),
      config,
    );
    expect(score.score).toBe(5);
  });
});

// ─── Genomic ─────────────────────────────────────────────────

describe("computeGenomicEvidence", () => {
  it("scores GO aspects, cancer-relevant terms, features and molecular functions", () => {
    const score = computeGenomicEvidence(rec({
      go_terms: {
        "GO:1": { term: "positive regulation of apoptosis", aspect: "biological_process" },
        "GO:2": { term: "kinase activity", aspect: "molecular_function" },
        "GO:3": { term: "DNA Repair", aspect: "biological_process" },
        "GO:4": { term: "nucleus", aspect: "cellular_component" },
      },
      features: { a: 1, b: 2, c: 3 },
      molecular_functions: ["binding", "catalysis"],
    }));
    expect(score.score).toBeCloseTo(5.1, 10);
    expect(score.metadata.evidence_count).toBe(9);
    expect(score.confidence).toBeCloseTo(0.45, 10);
    expect(score.metadata.bonuses.cancer_term_points).toBe(1);
    expect(score.metadata.bonuses.cancer_relevance_bonus).toBeCloseTo(1.6, 10);
  });

  it("keys a feature list by position", () => {
    const score = computeGenomicEvidence(rec({ features: ["f1", "f2"] }));
    expect(score.score).toBeCloseTo(0.6, 10);
    expect(score.metadata.evidence_count).toBe(2);
  });
});

// ─── Safety ──────────────────────────────────────────────────

describe("computeSafetyEvidence", () => {
  it("returns (0, 0) for a gene without drugs", () => {
    const score = computeSafetyEvidence(rec({ pathways: ["p1"] }));
    expect(score.score).toBe(0);
    expect(score.confidence).toBe(0);
  });

  it("starts from the neutral baseline with fallback confidence", () => {
    const score = computeSafetyEvidence(rec({ drugs: { d1: { source: "pharmgkb" } } }));
    expect(score.score).toBe(5);
    expect(score.confidence).toBe(0.3);
  });

  it("applies toxicity, approval and interaction adjustments", () => {
    const score = computeSafetyEvidence(rec({
      drugs: {
        d1: {
          source: "repurposing_hub",
          clinical_phase: "Launched",
          clinical_annotations: [
            { phenotype_category: "Toxicity" },
            { phenotype_category: "Metabolism/PK" },
            { phenotype_category: "Efficacy, Toxicity" },
          ],
        },
        d2: { source: "chembl" },
      },
    }));
    expect(score.score).toBeCloseTo(7.4, 10);
    expect(score.metadata.evidence_count).toBe(3);
    expect(score.confidence).toBe(0.7);
    expect(score.metadata.bonuses.fda_approval_bonus).toBe(3);
    expect(score.metadata.bonuses.interaction_risk_penalty).toBeCloseTo(0.2, 10);
  });

  it("never drops below zero", () => {
    const annotations = Array.from({ length: 30 }, () => ({ phenotype_category: "toxicity" }));
    const score = computeSafetyEvidence(rec({ drugs: { d1: { clinical_annotations: annotations } } }));
    expect(score.score).toBe(0);
    expect(score.confidence).toBe(0.7);
  });
});

// ─── Bounds ──────────────────────────────────────────────────

describe("bounds", () => {
  it("keeps every fixture score within its ceiling and confidence within [0, 1]", () => {
    for (const entry of fixture) {
      for (const s of computeDomainScores(rec(entry.record))) {
        expect(s.score).toBeGreaterThanOrEqual(0);
        expect(s.score).toBeLessThanOrEqual(DEFAULT_SCORING_CONFIG.domainCeilings[s.domain]);
        expect(s.confidence).toBeGreaterThanOrEqual(0);
        expect(s.confidence).toBeLessThanOrEqual(1);
      }
    }
  });
});
