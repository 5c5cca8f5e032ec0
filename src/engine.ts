import { AccessController } from "./access/controller";
import type { ConfigurationProvider } from "./config/appConfig";
import type { AppOptions } from "./config/appOptions";
import { CredentialManager } from "./github/credentials";
import { GitHubRepositoryGateway } from "./github/gateway";
import { createLogger, type Logger } from "./logger";
import { createDefaultRegistry, type EvaluatorRegistry } from "./policies/registry";
import type { PolicyEvaluator } from "./policies/types";
import { RemediationExecutor } from "./remediation/executor";
import { ScanOrchestrator, type PerformScanOptions, type ScanOutcome } from "./scanning/orchestrator";
import { InProcessJobScheduler } from "./scheduler/jobScheduler";
import { SqliteComplianceStore } from "./store/sqliteStore";

export const SCAN_JOB_NAME = "scan";

export interface CreateComplianceEngineOptions {
  options: AppOptions;
  configuration: ConfigurationProvider;
  logger?: Logger;
  fetchImpl?: typeof fetch;
  /** Evaluators registered in addition to the built-in set. */
  evaluators?: readonly PolicyEvaluator[];
}

export interface ComplianceEngine {
  store: SqliteComplianceStore;
  credentials: CredentialManager;
  gateway: GitHubRepositoryGateway;
  registry: EvaluatorRegistry;
  remediation: RemediationExecutor;
  scheduler: InProcessJobScheduler;
  orchestrator: ScanOrchestrator;
  access: AccessController;
  scanNow: (options?: PerformScanOptions) => Promise<ScanOutcome>;
  isUserAuthorized: (userToken: string) => Promise<boolean>;
  /** Starts recurring scans when `scanIntervalMinutes` is positive. Returns false otherwise. */
  start: () => boolean;
  /** Stops recurring scans, waits for queued jobs, then closes the store. */
  close: () => Promise<void>;
}

export async function createComplianceEngine(input: CreateComplianceEngineOptions): Promise<ComplianceEngine> {
  const { options, configuration } = input;
  const logger = input.logger ?? createLogger({ level: options.logLevel });

  const store = await SqliteComplianceStore.open(options.databasePath);
  const credentials = new CredentialManager({
    appId: options.appId,
    privateKey: options.privateKey,
    installationId: options.installationId,
    apiBaseUrl: options.apiBaseUrl,
    fetchImpl: input.fetchImpl,
    logger
  });
  const gateway = new GitHubRepositoryGateway({
    credentials,
    organization: options.organization,
    logger
  });
  const registry = createDefaultRegistry(input.evaluators);
  const remediation = new RemediationExecutor({ store, gateway, logger });
  const scheduler = new InProcessJobScheduler({ logger });
  const orchestrator = new ScanOrchestrator({
    store,
    gateway,
    configuration,
    registry,
    scheduler,
    remediation,
    logger
  });
  const access = new AccessController({ gateway, configuration, logger });

  let stopRecurring: (() => void) | null = null;

  return {
    store,
    credentials,
    gateway,
    registry,
    remediation,
    scheduler,
    orchestrator,
    access,
    scanNow: (scanOptions) => orchestrator.performScan(scanOptions),
    isUserAuthorized: (userToken) => access.isUserAuthorized(userToken),
    start: () => {
      if (options.scanIntervalMinutes <= 0 || stopRecurring) {
        return stopRecurring !== null;
      }

      stopRecurring = scheduler.scheduleRecurring(SCAN_JOB_NAME, options.scanIntervalMinutes * 60_000, () =>
        orchestrator.performScan()
      );
      logger.info("Recurring scans scheduled", { intervalMinutes: options.scanIntervalMinutes });
      return true;
    },
    close: async () => {
      stopRecurring?.();
      stopRecurring = null;
      scheduler.stop();
      await scheduler.whenIdle();
      store.close();
    }
  };
}
