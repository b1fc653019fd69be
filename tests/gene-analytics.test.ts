import { describe, it, expect } from "vitest";
import {
  analyzeGeneEvidenceProfile,
  crossValidationScore,
  evidenceDiversity,
  EVIDENCE_GAP_RULES,
  generateRecommendations,
  priorityAreasFor,
} from "@/lib/gene-analytics";
import { createScoringConfig } from "@/lib/scoring-config";
import { emptyContext, strongGene, weakGene } from "./helpers";

describe("analyzeGeneEvidenceProfile", () => {
  it("returns null when nothing is stored", () => {
    expect(analyzeGeneEvidenceProfile("BRCA1", null)).toBeNull();
    expect(analyzeGeneEvidenceProfile("BRCA1", { gene_symbol: "BRCA1", rows: [], context: emptyContext() })).toBeNull();
  });

  it("profiles a well-evidenced priority gene", () => {
    const { rows, context } = strongGene();
    const profile = analyzeGeneEvidenceProfile("BRCA1", { gene_symbol: "BRCA1", rows, context });

    expect(profile).toEqual({
      gene_symbol: "BRCA1",
      total_evidence_items: 12,
      evidence_diversity_score: 0.833,
      clinical_strength: 0.8,
      mechanistic_depth: 0.4,
      publication_support: 0.4,
      genomic_relevance: 0.4,
      safety_profile: 0.6,
      cross_validation_score: 0.892,
      recommendation_confidence: 0.881,
      use_case_rankings: [
        { use_case: "drug_repurposing", score: 65 },
        { use_case: "therapeutic_targeting", score: 55 },
        { use_case: "biomarker_discovery", score: 50 },
        { use_case: "pathway_analysis", score: 40 },
      ],
      top_drugs: [
        { drug_id: "cisp", name: "Cisplatin-test", avg_score: 70, max_phase: 0, mechanism: "Unknown" },
        { drug_id: "olap", name: "Olaparib-test", avg_score: 55, max_phase: 4, mechanism: "PARP inhibitor" },
      ],
      evidence_gaps: [],
      recommendations: [
        "High priority for tumor_suppressors, dna_repair research",
        "Strongly recommended for drug repurposing (score: 65.0)",
        "Ready for clinical development - strong evidence base",
        "High confidence target - prioritize for resource allocation",
        "Well-characterized target with comprehensive evidence",
      ],
    });
  });

  it("flags every gap for a thinly evidenced gene", () => {
    const { rows, context } = weakGene();
    const profile = analyzeGeneEvidenceProfile("GENEX", { gene_symbol: "GENEX", rows, context });

    expect(profile?.cross_validation_score).toBe(0.5);
    expect(profile?.recommendation_confidence).toBe(0.175);
    expect(profile?.evidence_gaps).toEqual(EVIDENCE_GAP_RULES.map((r) => r.message));
    expect(profile?.recommendations).toEqual([
      "Requires significant preclinical work before clinical development",
      "Low confidence - extensive validation required",
      "Requires comprehensive evidence gathering across multiple dimensions",
    ]);
  });

  it("reads priority panels from the supplied config", () => {
    const config = createScoringConfig({ analytics: { researchPriorities: { kinases: ["GENEX"] } } });
    const { rows, context } = weakGene();
    const profile = analyzeGeneEvidenceProfile("GENEX", { gene_symbol: "GENEX", rows, context }, config);
    expect(profile?.recommendations[0]).toBe("High priority for kinases research");
  });
});

describe("profile metrics", () => {
  it("caps diversity at six evidence categories", () => {
    const refs = Object.fromEntries(["a", "b", "c", "d", "e"].map((k) => [k, []]));
    expect(evidenceDiversity({ ...emptyContext(), pathways: ["p"], source_references: refs })).toBe(1);
    expect(evidenceDiversity(emptyContext())).toBe(0);
  });

  it("rewards agreement across use cases", () => {
    expect(crossValidationScore([10])).toBe(0.5);
    expect(crossValidationScore([20, 20, 20])).toBe(1);
    expect(crossValidationScore([0, 100])).toBe(0);
  });

  it("lists every priority area a gene belongs to", () => {
    expect(priorityAreasFor("RB1")).toEqual(["tumor_suppressors", "cell_cycle"]);
    expect(priorityAreasFor("NOT_A_GENE")).toEqual([]);
  });

  it("suggests validation for a mid-range best use case", () => {
    const recs = generateRecommendations([], [{ use_case: "pathway_analysis", score: 45 }], 3, 0.5, 0.65);
    expect(recs).toEqual([
      "Consider for pathway analysis with additional validation",
      "Suitable for preclinical development - gather more clinical evidence",
      "Moderate confidence - validate with additional evidence",
      "Good evidence base - address specific gaps identified",
    ]);
  });
});
