import type { ConfigurationProvider } from "../config/appConfig";
import { describeError } from "../errors";
import type { RepositoryGateway } from "../github/types";
import { componentLogger, type Logger } from "../logger";
import { evaluateRepository, throwIfCancelled } from "../policies/engine";
import type { EvaluatorRegistry } from "../policies/registry";
import type { RemediationExecutor } from "../remediation/executor";
import type { JobScheduler } from "../scheduler/jobScheduler";
import type {
  ComplianceStore,
  PolicyRecord,
  RepositoryStatusUpdate,
  ScanStatus,
  ViolationInsert
} from "../store/types";

export const REMEDIATION_JOB_NAME = "remediation";

export interface ScanOrchestratorOptions {
  store: ComplianceStore;
  gateway: RepositoryGateway;
  configuration: ConfigurationProvider;
  registry: EvaluatorRegistry;
  scheduler: JobScheduler;
  remediation: Pick<RemediationExecutor, "processActionsForScan">;
  now?: () => Date;
  logger?: Logger;
}

export interface PerformScanOptions {
  signal?: AbortSignal;
}

export interface ScanOutcome {
  scanId: number;
  status: ScanStatus;
  violationCount: number;
  repositoryCount: number;
  error?: string;
}

interface EvaluatedScan {
  violations: ViolationInsert[];
  statuses: RepositoryStatusUpdate[];
}

/**
 * One full compliance pass over the organization: reconcile policies and repositories,
 * evaluate every repository, persist the violations atomically and hand remediation off to
 * the job scheduler. A failure anywhere before persistence leaves the scan `Failed`.
 */
export class ScanOrchestrator {
  private readonly store: ComplianceStore;
  private readonly gateway: RepositoryGateway;
  private readonly configuration: ConfigurationProvider;
  private readonly registry: EvaluatorRegistry;
  private readonly scheduler: JobScheduler;
  private readonly remediation: Pick<RemediationExecutor, "processActionsForScan">;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: ScanOrchestratorOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.configuration = options.configuration;
    this.registry = options.registry;
    this.scheduler = options.scheduler;
    this.remediation = options.remediation;
    this.now = options.now ?? (() => new Date());
    this.logger = componentLogger(options.logger, "scan");
  }

  async performScan(options: PerformScanOptions = {}): Promise<ScanOutcome> {
    const { signal } = options;
    const scan = this.store.createScan(this.timestamp());
    this.logger.info("Scan started", { scanId: scan.id });

    let violationCount: number;
    let repositoryCount = 0;

    try {
      throwIfCancelled(signal, "loading configuration");
      const config = await this.configuration.getConfig(false);

      const policies = this.store.upsertPolicies(
        config.policies.map((policy) => ({
          key: policy.type,
          description: policy.name,
          actions: policy.actions,
          issueTemplate: policy.issueTemplate ?? null,
          prCommentMessage: policy.prCommentMessage ?? null,
          statusCheckName: policy.statusCheckName ?? null
        }))
      );

      throwIfCancelled(signal, "listing repositories");
      const remote = await this.gateway.listActiveRepositories({ signal });
      const reconciliation = this.store.reconcileRepositories(
        remote.map((repository) => ({ githubId: repository.id, name: repository.fullName }))
      );
      repositoryCount = reconciliation.repositories.length;
      this.logger.info("Repositories reconciled", {
        scanId: scan.id,
        repositories: repositoryCount,
        created: reconciliation.created,
        renamed: reconciliation.renamed,
        removed: reconciliation.removed
      });

      const evaluated = await this.evaluateAll(reconciliation.repositories, policies, signal);

      throwIfCancelled(signal, "persisting results");
      violationCount = this.store.completeScan(scan.id, {
        violations: evaluated.violations,
        repositoryStatuses: evaluated.statuses,
        completedAt: this.timestamp()
      });
    } catch (error) {
      const message = describeError(error);
      this.store.failScan(scan.id, this.timestamp());
      this.logger.error("Scan failed", { scanId: scan.id, error: message });
      return { scanId: scan.id, status: "Failed", violationCount: 0, repositoryCount, error: message };
    }

    this.logger.info("Scan completed", { scanId: scan.id, repositories: repositoryCount, violations: violationCount });

    if (violationCount > 0) {
      this.handOff(scan.id);
    }

    return { scanId: scan.id, status: "Completed", violationCount, repositoryCount };
  }

  private async evaluateAll(
    repositories: ReadonlyArray<{ id: number; githubId: number; name: string }>,
    policies: readonly PolicyRecord[],
    signal: AbortSignal | undefined
  ): Promise<EvaluatedScan> {
    const policyIds = new Map(policies.map((policy) => [policy.key, policy.id]));
    const references = policies.map((policy) => ({ type: policy.key }));
    const violations: ViolationInsert[] = [];
    const statuses: RepositoryStatusUpdate[] = [];

    for (const repository of repositories) {
      throwIfCancelled(signal, `evaluating ${repository.name}`);

      const findings = await evaluateRepository(
        { githubId: repository.githubId, name: repository.name },
        references,
        { registry: this.registry, gateway: this.gateway, signal, logger: this.logger }
      );

      for (const finding of findings) {
        const policyId = policyIds.get(finding.policyType);
        if (policyId !== undefined) {
          violations.push({ repositoryId: repository.id, policyId });
        }
      }

      statuses.push({ repositoryId: repository.id, status: findings.length > 0 ? "NonCompliant" : "Compliant" });
      this.logger.debug("Repository evaluated", { repository: repository.name, findings: findings.length });
    }

    return { violations, statuses };
  }

  private handOff(scanId: number): void {
    try {
      const jobId = this.scheduler.enqueue(
        REMEDIATION_JOB_NAME,
        (id: number) => this.remediation.processActionsForScan(id),
        scanId
      );
      this.logger.info("Remediation enqueued", { scanId, jobId });
    } catch (error) {
      this.logger.error("Failed to enqueue remediation; scan stays completed", {
        scanId,
        error: describeError(error)
      });
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
