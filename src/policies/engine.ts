import { GitHubApiError } from "../errors";
import type { RepositoryGateway } from "../github/types";
import { componentLogger, type Logger } from "../logger";
import type { EvaluatorRegistry } from "./registry";
import type { EvaluationTarget, PolicyFinding } from "./types";

export interface PolicyReference {
  type: string;
}

export interface EvaluateRepositoryOptions {
  registry: EvaluatorRegistry;
  gateway: RepositoryGateway;
  signal?: AbortSignal;
  logger?: Logger;
}

export function throwIfCancelled(signal: AbortSignal | undefined, what: string): void {
  if (signal?.aborted) {
    throw new GitHubApiError("aborted", `Cancelled before ${what}`);
  }
}

/**
 * Runs every configured policy that has a registered evaluator against one repository.
 * Policy types without an evaluator are skipped; evaluator errors propagate to the caller.
 * Findings keep the configured policy type, so they line up with the stored policy keys.
 */
export async function evaluateRepository(
  repository: EvaluationTarget,
  policies: readonly PolicyReference[],
  options: EvaluateRepositoryOptions
): Promise<PolicyFinding[]> {
  const logger = componentLogger(options.logger, "evaluation");
  const findings: PolicyFinding[] = [];
  const seen = new Set<string>();

  for (const policy of policies) {
    if (seen.has(policy.type)) {
      continue;
    }
    seen.add(policy.type);

    const evaluator = options.registry.resolve(policy.type);
    if (!evaluator) {
      logger.debug("No evaluator registered for policy type; skipping", { policyType: policy.type });
      continue;
    }

    throwIfCancelled(options.signal, `evaluating ${policy.type} on ${repository.name}`);

    const finding = await evaluator.evaluate(repository, options.gateway, {
      signal: options.signal,
      logger
    });

    if (finding) {
      findings.push({ policyType: policy.type });
    }
  }

  return findings;
}
