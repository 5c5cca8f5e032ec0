export { AccessController, parseTeamReference } from "./access/controller";
export type { AccessControllerOptions, TeamReference } from "./access/controller";
export {
  CachedConfigurationProvider,
  StaticConfigurationProvider,
  parseAppConfig
} from "./config/appConfig";
export type {
  AppConfig,
  CachedConfigurationProviderOptions,
  ConfigurationProvider,
  IssueTemplate,
  PolicyConfig
} from "./config/appConfig";
export { DEFAULT_DATABASE_PATH, DEFAULT_GITHUB_API_URL, loadAppOptions } from "./config/appOptions";
export type { AppOptions } from "./config/appOptions";
export { SCAN_JOB_NAME, createComplianceEngine } from "./engine";
export type { ComplianceEngine, CreateComplianceEngineOptions } from "./engine";
export {
  ComplianceError,
  ConfigurationNotFoundError,
  CredentialExchangeError,
  GitHubApiError,
  InvalidAppOptionsError,
  InvalidConfigurationError,
  describeError,
  isGitHubApiError
} from "./errors";
export type { GitHubApiErrorKind } from "./errors";
export { GitHubRestClient } from "./github/client";
export type { GitHubRequestOptions, GitHubResponse, GitHubRestClientOptions, TokenSource } from "./github/client";
export { CredentialManager } from "./github/credentials";
export type { CredentialManagerOptions } from "./github/credentials";
export { GitHubRepositoryGateway } from "./github/gateway";
export type { GitHubRepositoryGatewayOptions } from "./github/gateway";
export type {
  CheckRunConclusion,
  GatewayCallOptions,
  RemoteCheckRun,
  RemoteComment,
  RemoteIssue,
  RemotePullRequest,
  RemoteRepository,
  RepositoryGateway
} from "./github/types";
export { componentLogger, createLogger, createSilentLogger } from "./logger";
export type { LogFormat, Logger, LoggerOptions } from "./logger";
export { evaluateRepository, throwIfCancelled } from "./policies/engine";
export type { EvaluateRepositoryOptions, PolicyReference } from "./policies/engine";
export { checkCatalogOwner, catalogInfoHasOwnerEvaluator } from "./policies/evaluators/catalogInfoOwner";
export type { OwnerCheck } from "./policies/evaluators/catalogInfoOwner";
export {
  createFilePresenceEvaluator,
  hasAgentsMdEvaluator,
  hasCatalogInfoYamlEvaluator
} from "./policies/evaluators/filePresence";
export { correctWorkflowPermissionsEvaluator } from "./policies/evaluators/workflowPermissions";
export { DEFAULT_EVALUATORS, EvaluatorRegistry, createDefaultRegistry } from "./policies/registry";
export type { EvaluationContext, EvaluationTarget, PolicyEvaluator, PolicyFinding } from "./policies/types";
export {
  ARCHIVE_REPO_ACTION,
  BLOCK_PRS_ACTION,
  COMMENT_ON_PRS_ACTION,
  CREATE_ISSUE_ACTION,
  DEFAULT_ISSUE_LABELS,
  DEFAULT_STATUS_CHECK_NAME,
  LOG_ONLY_ACTION,
  RemediationExecutor,
  hasMatchingBotComment,
  normalizeActionName,
  resolveIssue,
  resolvePullRequestComment
} from "./remediation/executor";
export type {
  ProcessActionsOptions,
  RemediationExecutorOptions,
  RemediationSummary,
  ResolvedIssue
} from "./remediation/executor";
export { REMEDIATION_JOB_NAME, ScanOrchestrator } from "./scanning/orchestrator";
export type { PerformScanOptions, ScanOrchestratorOptions, ScanOutcome } from "./scanning/orchestrator";
export { InProcessJobScheduler } from "./scheduler/jobScheduler";
export type { FailedJob, InProcessJobSchedulerOptions, JobHandler, JobScheduler } from "./scheduler/jobScheduler";
export { SqliteComplianceStore } from "./store/sqliteStore";
export type {
  ActionLogFilter,
  ActionLogInsert,
  ActionLogRecord,
  ActionOutcome,
  CompleteScanInput,
  ComplianceStatus,
  ComplianceStore,
  IntegrityReport,
  PolicyRecord,
  PolicyUpsert,
  RemoteRepositoryRef,
  RepositoryReconciliation,
  RepositoryRecord,
  RepositoryStatusUpdate,
  ScanRecord,
  ScanStatus,
  ViolationDetail,
  ViolationInsert,
  ViolationRecord
} from "./store/types";
