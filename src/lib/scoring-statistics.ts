import type { GeneScoringOutput, ScoringRunSummary, UseCase, UseCaseStatistics } from "@/types/evidence";
import { USE_CASES } from "@/types/evidence";
import { countWhere, mean, median, populationStd } from "@/lib/statistics";

/** Overall-score bands for the run summary (inclusive middle band). */
const HIGH_SCORE = 70;
const LOW_SCORE = 40;

/** Summary of one scoring run over every use-case overall score. */
export function summarizeScoringBatch(output: readonly GeneScoringOutput[]): ScoringRunSummary {
  const all: number[] = [];
  const byUseCase = new Map<UseCase, number[]>();

  for (const gene of output) {
    for (const useCase of USE_CASES) {
      const score = gene.use_case_scores[useCase].overall_score;
      all.push(score);
      const list = byUseCase.get(useCase) ?? [];
      list.push(score);
      byUseCase.set(useCase, list);
    }
  }

  const useCaseStatistics: Partial<Record<UseCase, UseCaseStatistics>> = {};
  for (const [useCase, scores] of byUseCase) {
    useCaseStatistics[useCase] = {
      mean: mean(scores),
      median: median(scores),
      high_confidence_genes: countWhere(scores, (s) => s > HIGH_SCORE),
      medium_confidence_genes: countWhere(scores, (s) => s >= LOW_SCORE && s <= HIGH_SCORE),
      low_confidence_genes: countWhere(scores, (s) => s < LOW_SCORE),
    };
  }

  return {
    total_genes_scored: output.length,
    overall_statistics: {
      mean: mean(all),
      median: median(all),
      std: populationStd(all),
      min: all.length > 0 ? all.reduce((a, b) => Math.min(a, b)) : 0,
      max: all.length > 0 ? all.reduce((a, b) => Math.max(a, b)) : 0,
    },
    use_case_statistics: useCaseStatistics,
  };
}
