export { AccessControl, normalizeNumericId, REMEDIATION_MESSAGE, type AccessDecision } from "./lib/access";
export { AdmissionPipeline, type Admission, type AdmissionRequest } from "./lib/admission";
export { loadCatalog, parseCatalog, type LabCatalog } from "./lib/catalog";
export { createOrchestrator, type Orchestrator, type OrchestratorDeps } from "./lib/command-context";
export { loadConfig, type LabkeeperConfig } from "./lib/config";
export { DockerDriver } from "./lib/docker-driver";
export { LAB_SECURITY_POLICY, type HostStats, type LaunchSpec, type RuntimeDriver } from "./lib/driver";
export { CliError, type CliErrorKind } from "./lib/errors";
export {
  LabController,
  type ActiveLab,
  type CleanupReport,
  type CreatedLab,
  type LabSummary,
  type ServerStats
} from "./lib/lifecycle";
export { createFileLogger, Logger, type LogEntry, type LogSink } from "./lib/logger";
export { RateLimiter, type RateLimitDecision } from "./lib/rate-limiter";
export { Reconciler } from "./lib/reconciler";
export { LabRegistry } from "./lib/registry";
export { handleRequest, REQUEST_ACTIONS, type LabRequest } from "./lib/requests";
export { fail, ok, settle, type CommandResult } from "./lib/result";
export { BLOCKED_PATTERNS, sanitizeInput, type SanitizeOutcome } from "./lib/sanitizer";
export { runCleanupLoop } from "./lib/scheduler";
export type { LabInstance, LabStatus, LabTypeDefinition } from "./lib/types";
