export { WorkspaceScanner } from "./scanner/scanner.js";
export { detectDocumentation, detectTests } from "./scanner/companions.js";
export { categorize } from "./scanner/category.js";
export { scoreCandidate, scoreAll, rankCandidates, isEligible, weightedScore } from "./scorer/scorer.js";
export { sizeSignal, recencySignal } from "./scorer/signals.js";
export { derivePublicName, normalizeProjectId, type NamingResult } from "./publisher/naming.js";
export { Publisher, type PublishMode, type PublishOutcome, type PublisherOptions } from "./publisher/publisher.js";
export { DestinationIndex, type IndexEntry } from "./publisher/destination-index.js";
export { EvolutionLog } from "./publisher/evolution-log.js";
export { withDestinationLock } from "./publisher/lock.js";
export { nextCandidateState, type CandidateState, type CandidateEvent } from "./publisher/lifecycle.js";
export { runPipeline, type PipelineOptions, type PipelineResult, type ReportEntry, type RunSummary } from "./core/pipeline.js";
export { BridgeError, type BridgeErrorCode } from "./core/errors.js";
export { loadConfig } from "./config/loader.js";
export { validateConfig } from "./config/validator.js";
export { DEFAULT_CONFIG } from "./config/defaults.js";
export type { Candidate, ScoredCandidate, ScanWarning, Category } from "./types/candidate.js";
export type { BridgeConfig, ScoringConfig, NamingConfig, ScannerConfig, PublisherConfig } from "./types/config.js";
export type { ExtractionManifest, EvolutionLogEntry } from "./types/manifest.js";
