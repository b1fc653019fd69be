/**
 * Batch scoring: parse each raw gene record, run the five calculators once,
 * combine for every use case and attach per-drug proxy scores.
 */
import type { DrugSpecificScore, GeneScoringOutput } from "@/types/evidence";
import { ScoringContractError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from "@/lib/scoring-config";
import { parseGeneEvidenceRecord } from "@/lib/evidence-record";
import { computeDomainScores } from "@/lib/domain-calculators";
import { combineForAllUseCases } from "@/lib/composite-scorer";

const log = createLogger("scoring-pipeline");

export interface ScoringBatchEntry {
  gene_id: string;
  gene_symbol?: string | null;
  /** Raw record as assembled by the collector; parsed here. */
  record: unknown;
}

export interface ScoringBatchOptions {
  config?: ScoringConfig;
  /** Checked between genes. */
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
  now?: () => Date;
}

export interface ScoringFailure {
  gene_id: string;
  error: string;
}

export interface ScoringBatchResult {
  genes: GeneScoringOutput[];
  failures: ScoringFailure[];
  aborted: boolean;
}

export function scoreGene(
  entry: ScoringBatchEntry,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
  now: () => Date = () => new Date(),
): GeneScoringOutput {
  const { record, issues } = parseGeneEvidenceRecord(entry.record);
  for (const issue of issues) {
    log.warn(`Skipped malformed evidence for ${entry.gene_id}`, { path: issue.path, reason: issue.message });
  }

  const evidenceScores = computeDomainScores(record, config);
  const useCaseScores = combineForAllUseCases(evidenceScores, config);

  // Every drug shares the therapeutic-targeting composite until per-drug scoring exists.
  const proxy = useCaseScores.therapeutic_targeting.overall_score;
  const drugSpecificScores: Record<string, DrugSpecificScore> = {};
  for (const [key, drug] of Object.entries(record.drugs)) {
    drugSpecificScores[key] = {
      drug_name: drug.name ?? key,
      score: proxy,
      source: drug.source ?? "unknown",
    };
  }

  return {
    gene_id: entry.gene_id,
    gene_symbol: entry.gene_symbol ?? entry.gene_id,
    evidence_scores: evidenceScores,
    use_case_scores: useCaseScores,
    drug_specific_scores: drugSpecificScores,
    evidence_count: evidenceScores.reduce((sum, s) => sum + s.metadata.evidence_count, 0),
    scoring_version: config.scoringVersion,
    last_updated: now().toISOString(),
  };
}

/**
 * Score every entry in input order. A gene whose record breaks the input
 * contract is reported in `failures`; the rest of the batch still runs.
 * Aborting returns the genes finished so far.
 */
export function runScoringBatch(
  entries: readonly ScoringBatchEntry[],
  options: ScoringBatchOptions = {},
): ScoringBatchResult {
  const config = options.config ?? DEFAULT_SCORING_CONFIG;
  const now = options.now ?? (() => new Date());
  const genes: GeneScoringOutput[] = [];
  const failures: ScoringFailure[] = [];

  log.info(`Scoring ${entries.length} genes`, { scoring_version: config.scoringVersion });

  for (let i = 0; i < entries.length; i++) {
    if (options.signal?.aborted) {
      log.warn("Scoring batch aborted", { completed: i, total: entries.length });
      return { genes, failures, aborted: true };
    }
    const entry = entries[i];
    try {
      genes.push(scoreGene(entry, config, now));
    } catch (err) {
      if (!(err instanceof ScoringContractError)) throw err;
      log.error(`Failed to score ${entry.gene_id}`, err);
      failures.push({ gene_id: entry.gene_id, error: err.message });
    }
    options.onProgress?.(i + 1, entries.length);
  }

  log.info("Scoring batch complete", { scored: genes.length, failed: failures.length });
  return { genes, failures, aborted: false };
}
