// Session Orchestrator - programmatic API

export * from "./types/index.js";
export * from "./infra/index.js";

export { SessionStore, type TransitionCheck } from "./core/state/session-store.js";
export type { ExternalStateGateway, BodyUpdate } from "./core/github/gateway.js";
export { GhGateway, type GhGatewayOptions } from "./core/github/gh-gateway.js";
export * as checklist from "./core/github/checklist.js";
export * as ledger from "./core/ledger/task-ledger.js";
export {
  FileTaskDocumentStore,
  type TaskDocumentStore,
} from "./core/ledger/task-documents.js";
export { GitOperations, type BranchInspector } from "./core/git/git-operations.js";
export {
  FinalizeEngine,
  ledgerPath,
  type FinalizeEngineOptions,
  type FinalizeInput,
} from "./core/engine/finalize-engine.js";
export {
  PublishEngine,
  type PublishEngineOptions,
  type PublishInput,
} from "./core/engine/publish-engine.js";
export {
  formatFinalizeResult,
  formatPublishResult,
  formatSessionStatus,
} from "./cli/output/reporter.js";
export { loadConfig } from "./cli/config/loader.js";
