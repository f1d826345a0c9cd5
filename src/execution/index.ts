export { chaseOrder } from "./chase.js";
export type { ChaseDeps } from "./chase.js";
export { detectFill, matchesOrder } from "./fill-detector.js";
export type { FillEvidenceCheck, TrackedOrder } from "./fill-detector.js";
export { SignalExecutor } from "./signal-executor.js";
export type { SignalExecutorConfig } from "./signal-executor.js";
export { computeOpenSize, expectedPosition, roundPrice, roundSize, withinTolerance } from "./sizing.js";
export { DEFAULT_CHASE_CONFIG, isChaseSuccess } from "./types.js";
export type { ChaseConfig, ChaseFailure, ChaseOutcome, ChaseRequest, FillEvidence, RunSummary } from "./types.js";
