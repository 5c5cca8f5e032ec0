import { describeError, isGitHubApiError } from "../errors";
import type { RemoteComment, RemotePullRequest, RepositoryGateway } from "../github/types";
import { componentLogger, type Logger } from "../logger";
import type { ActionOutcome, ComplianceStore, ViolationDetail } from "../store/types";

export const CREATE_ISSUE_ACTION = "create-issue";
export const ARCHIVE_REPO_ACTION = "archive-repo";
export const LOG_ONLY_ACTION = "log-only";
export const COMMENT_ON_PRS_ACTION = "comment-on-prs";
export const BLOCK_PRS_ACTION = "block-prs";

export const DEFAULT_ISSUE_LABELS: readonly string[] = ["policy-violation", "compliance"];
export const DEFAULT_STATUS_CHECK_NAME = "Policy Compliance Check";

const DUPLICATE_COMMENT_PREFIX_LENGTH = 50;

export interface RemediationExecutorOptions {
  store: ComplianceStore;
  gateway: RepositoryGateway;
  now?: () => Date;
  logger?: Logger;
}

export interface ProcessActionsOptions {
  /** Passed to every remote call; calls made after it aborts fail and are logged as such. */
  signal?: AbortSignal;
}

export interface RemediationSummary {
  scanId: number;
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

interface ActionResult {
  outcome: ActionOutcome;
  detail: string;
}

export function normalizeActionName(action: string): string {
  return action.trim().toLowerCase().replace(/_/g, "-");
}

export interface ResolvedIssue {
  title: string;
  body: string;
  labels: string[];
}

export function resolveIssue(violation: ViolationDetail): ResolvedIssue {
  const key = violation.policy.key;
  const template = violation.policy.issueTemplate;
  const labels = template?.labels && template.labels.length > 0 ? [...template.labels] : [...DEFAULT_ISSUE_LABELS];

  return {
    title: template?.title ?? `Compliance Violation: ${key}`,
    body:
      template?.body ??
      `This repository violates the ${key} policy. Please review and take appropriate action.`,
    labels
  };
}

export function resolvePullRequestComment(violation: ViolationDetail): string {
  return (
    violation.policy.prCommentMessage ??
    [
      "**Policy Compliance Violations Detected**",
      "",
      "This pull request is associated with a repository that violates the following policies:",
      "",
      `- ${violation.policy.key}`,
      "",
      "Please address these violations before merging."
    ].join("\n")
  );
}

function isBotComment(comment: RemoteComment): boolean {
  if (comment.userType?.toLowerCase() === "bot") {
    return true;
  }

  // covers `name[bot]` app accounts too
  return comment.userLogin?.toLowerCase().includes("bot") ?? false;
}

/** True when a bot already left a comment starting like `message` (case-insensitive). */
export function hasMatchingBotComment(comments: readonly RemoteComment[], message: string): boolean {
  const prefix = message.slice(0, DUPLICATE_COMMENT_PREFIX_LENGTH).toLowerCase();
  return comments.some((comment) => isBotComment(comment) && comment.body.toLowerCase().includes(prefix));
}

/**
 * Turns a scan's persisted violations into remediation actions and records every attempt in
 * the action log. Each action runs in its own failure boundary, and so does each write to the
 * log: a failure is counted as `Failed` and the batch moves on.
 */
export class RemediationExecutor {
  private readonly store: ComplianceStore;
  private readonly gateway: RepositoryGateway;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: RemediationExecutorOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.now = options.now ?? (() => new Date());
    this.logger = componentLogger(options.logger, "remediation");
  }

  async processActionsForScan(scanId: number, options: ProcessActionsOptions = {}): Promise<RemediationSummary> {
    const summary: RemediationSummary = { scanId, processed: 0, succeeded: 0, failed: 0, skipped: 0 };
    const violations = this.store.listViolationsForScan(scanId);

    if (violations.length === 0) {
      this.logger.info("No violations for scan; nothing to remediate", { scanId });
      return summary;
    }

    this.logger.info("Processing remediation actions", { scanId, violations: violations.length });

    for (const violation of violations) {
      for (const action of violation.policy.actions) {
        const normalized = normalizeActionName(action);
        const actionType = normalized.length > 0 ? normalized : action;
        let results: ActionResult[];

        try {
          results = await this.dispatch(normalized, action, violation, options.signal);
        } catch (error) {
          this.logger.error("Remediation action threw; continuing with remaining actions", {
            scanId,
            action,
            violationId: violation.id,
            error: describeError(error)
          });
          results = [{ outcome: "Failed", detail: `Exception: ${describeError(error)}` }];
        }

        for (const result of results) {
          const recorded = this.record(violation, actionType, result);
          summary.processed += 1;
          if (!recorded || result.outcome === "Failed") {
            summary.failed += 1;
          } else if (result.outcome === "Success") {
            summary.succeeded += 1;
          } else {
            summary.skipped += 1;
          }
        }
      }
    }

    this.logger.info("Remediation finished", { ...summary });
    return summary;
  }

  private async dispatch(
    normalized: string,
    raw: string,
    violation: ViolationDetail,
    signal: AbortSignal | undefined
  ): Promise<ActionResult[]> {
    switch (normalized) {
      case CREATE_ISSUE_ACTION:
        return [await this.createIssue(violation, signal)];
      case ARCHIVE_REPO_ACTION:
        return [await this.archiveRepository(violation, signal)];
      case COMMENT_ON_PRS_ACTION:
        return this.commentOnPullRequests(violation, signal);
      case BLOCK_PRS_ACTION:
        return this.blockPullRequests(violation, signal);
      case LOG_ONLY_ACTION:
        this.logger.info("Violation logged", {
          violationId: violation.id,
          repository: violation.repository.name,
          policy: violation.policy.key
        });
        return [{ outcome: "Success", detail: "Violation logged as configured" }];
      default:
        this.logger.warn("Unknown action type", { action: raw, violationId: violation.id });
        return [{ outcome: "Failed", detail: `Unknown action type: ${raw}` }];
    }
  }

  private async createIssue(violation: ViolationDetail, signal: AbortSignal | undefined): Promise<ActionResult> {
    const repositoryId = violation.repository.githubId;
    const issue = resolveIssue(violation);
    const primaryLabel = issue.labels[0] ?? "policy-violation";

    try {
      const openIssues = await this.gateway.listOpenIssues(repositoryId, primaryLabel, { signal });
      const wantedTitle = issue.title.toLowerCase();
      const duplicate = openIssues.find((candidate) => candidate.title.toLowerCase() === wantedTitle);

      if (duplicate) {
        this.logger.info("Matching open issue exists; skipping creation", {
          repository: violation.repository.name,
          issueUrl: duplicate.htmlUrl
        });
        return { outcome: "Skipped", detail: `Duplicate issue already exists: ${duplicate.htmlUrl}` };
      }

      const created = await this.gateway.createIssue(repositoryId, issue.title, issue.body, issue.labels, { signal });
      this.logger.info("Issue created for violation", {
        repository: violation.repository.name,
        issueNumber: created.number,
        issueUrl: created.htmlUrl
      });
      return { outcome: "Success", detail: `Created issue #${created.number}: ${created.htmlUrl}` };
    } catch (error) {
      this.logger.error("Failed to create issue", {
        repository: violation.repository.name,
        violationId: violation.id,
        error: describeError(error)
      });
      return { outcome: "Failed", detail: `Exception: ${describeError(error)}` };
    }
  }

  private async archiveRepository(violation: ViolationDetail, signal: AbortSignal | undefined): Promise<ActionResult> {
    const repositoryId = violation.repository.githubId;
    const context = { repository: violation.repository.name, githubId: repositoryId, violationId: violation.id };

    try {
      const settings = await this.gateway.getSettings(repositoryId, { signal });
      if (!settings) {
        this.logger.warn("Repository not found when archiving", context);
        return { outcome: "Failed", detail: "Repository not found" };
      }

      if (settings.archived) {
        this.logger.info("Repository already archived; skipping", context);
        return { outcome: "Skipped", detail: "Repository is already archived" };
      }

      const archived = await this.gateway.archiveRepository(repositoryId, { signal });
      if (!archived) {
        this.logger.warn("Repository not found when archiving", context);
        return { outcome: "Failed", detail: "Repository not found" };
      }

      this.logger.info("Repository archived", { ...context, policy: violation.policy.key });
      return {
        outcome: "Success",
        detail: `Repository archived due to ${violation.policy.description} policy violation`
      };
    } catch (error) {
      if (isGitHubApiError(error, "not_found")) {
        this.logger.warn("Repository not found when archiving", { ...context, error: describeError(error) });
        return { outcome: "Failed", detail: `Repository not found: ${describeError(error)}` };
      }

      if (isGitHubApiError(error, "forbidden")) {
        this.logger.warn("Insufficient permissions to archive repository", { ...context, error: describeError(error) });
        return { outcome: "Failed", detail: `Insufficient permissions: ${describeError(error)}` };
      }

      this.logger.error("Failed to archive repository", { ...context, error: describeError(error) });
      return { outcome: "Failed", detail: `Exception: ${describeError(error)}` };
    }
  }

  /** Open pull requests of the violating repository, or a single result when there are none to act on. */
  private async openPullRequests(
    violation: ViolationDetail,
    action: string,
    signal: AbortSignal | undefined
  ): Promise<RemotePullRequest[] | ActionResult> {
    try {
      const pullRequests = await this.gateway.listOpenPullRequests(violation.repository.githubId, { signal });
      if (pullRequests.length === 0) {
        this.logger.info("No open pull requests; skipping", { repository: violation.repository.name, action });
        return { outcome: "Skipped", detail: "No open pull requests found" };
      }

      return pullRequests;
    } catch (error) {
      this.logger.error("Failed to list open pull requests", {
        repository: violation.repository.name,
        action,
        violationId: violation.id,
        error: describeError(error)
      });
      return { outcome: "Failed", detail: `Exception: ${describeError(error)}` };
    }
  }

  private async commentOnPullRequests(violation: ViolationDetail, signal: AbortSignal | undefined): Promise<ActionResult[]> {
    const pullRequests = await this.openPullRequests(violation, COMMENT_ON_PRS_ACTION, signal);
    if (!Array.isArray(pullRequests)) {
      return [pullRequests];
    }

    const repositoryId = violation.repository.githubId;
    const message = resolvePullRequestComment(violation);
    const results: ActionResult[] = [];

    for (const pullRequest of pullRequests) {
      const context = { repository: violation.repository.name, pullRequest: pullRequest.number };
      try {
        const comments = await this.gateway.listPullRequestComments(repositoryId, pullRequest.number, { signal });
        if (hasMatchingBotComment(comments, message)) {
          this.logger.info("Bot already commented on pull request; skipping", context);
          results.push({ outcome: "Skipped", detail: `Already commented on PR #${pullRequest.number}` });
          continue;
        }

        await this.gateway.createPullRequestComment(repositoryId, pullRequest.number, message, { signal });
        this.logger.info("Commented on pull request", context);
        results.push({ outcome: "Success", detail: `Commented on PR #${pullRequest.number}` });
      } catch (error) {
        this.logger.error("Failed to comment on pull request", { ...context, error: describeError(error) });
        results.push({
          outcome: "Failed",
          detail: `Failed to comment on PR #${pullRequest.number}: ${describeError(error)}`
        });
      }
    }

    return results;
  }

  private async blockPullRequests(violation: ViolationDetail, signal: AbortSignal | undefined): Promise<ActionResult[]> {
    const pullRequests = await this.openPullRequests(violation, BLOCK_PRS_ACTION, signal);
    if (!Array.isArray(pullRequests)) {
      return [pullRequests];
    }

    const repositoryId = violation.repository.githubId;
    const checkName = violation.policy.statusCheckName ?? DEFAULT_STATUS_CHECK_NAME;
    const wantedName = checkName.toLowerCase();
    const results: ActionResult[] = [];

    for (const pullRequest of pullRequests) {
      const context = { repository: violation.repository.name, pullRequest: pullRequest.number, checkName };
      if (!pullRequest.headSha) {
        this.logger.warn("Pull request has no head SHA; skipping", context);
        results.push({ outcome: "Skipped", detail: `PR #${pullRequest.number} has no head SHA` });
        continue;
      }

      try {
        const runs = await this.gateway.listCheckRuns(repositoryId, pullRequest.headSha, { signal });
        const existing = runs.find((run) => run.name.toLowerCase() === wantedName);

        if (existing) {
          await this.gateway.updateCheckRun(repositoryId, existing.id, "failure", { signal });
          this.logger.info("Status check updated", { ...context, checkRunId: existing.id });
          results.push({ outcome: "Success", detail: `Updated status check for PR #${pullRequest.number}` });
        } else {
          const created = await this.gateway.createCheckRun(repositoryId, checkName, pullRequest.headSha, "failure", {
            signal
          });
          this.logger.info("Status check created", { ...context, checkRunId: created.id });
          results.push({ outcome: "Success", detail: `Created status check for PR #${pullRequest.number}` });
        }
      } catch (error) {
        this.logger.error("Failed to set status check on pull request", { ...context, error: describeError(error) });
        results.push({
          outcome: "Failed",
          detail: `Failed to block PR #${pullRequest.number}: ${describeError(error)}`
        });
      }
    }

    return results;
  }

  /** Returns false when the entry could not be written. */
  private record(violation: ViolationDetail, actionType: string, result: ActionResult): boolean {
    try {
      this.store.appendActionLog({
        repositoryId: violation.repositoryId,
        policyId: violation.policyId,
        actionType,
        outcome: result.outcome,
        detail: result.detail,
        timestamp: this.now().toISOString()
      });
      return true;
    } catch (error) {
      this.logger.error("Failed to write action log entry", {
        violationId: violation.id,
        repository: violation.repository.name,
        actionType,
        outcome: result.outcome,
        error: describeError(error)
      });
      return false;
    }
  }
}
