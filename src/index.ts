export * from "./types/evidence";
export * from "./types/analytics";
export * from "./lib/errors";
export * from "./lib/logger";
export * from "./lib/scoring-config";
export * from "./lib/evidence-record";
export * from "./lib/domain-calculators";
export * from "./lib/composite-scorer";
export * from "./lib/scoring-pipeline";
export * from "./lib/scoring-statistics";
export * from "./lib/score-store";
export * from "./lib/gene-analytics";
export * from "./lib/comparative-analytics";
