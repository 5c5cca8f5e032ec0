import type { RepositoryGateway } from "../github/types";
import type { Logger } from "../logger";

export interface EvaluationTarget {
  githubId: number;
  name: string;
}

export interface EvaluationContext {
  signal?: AbortSignal;
  logger: Logger;
}

export interface PolicyFinding {
  policyType: string;
}

/**
 * One policy check. Evaluators hold no state, so running them in any order (or twice)
 * gives the same result for the same remote state.
 */
export interface PolicyEvaluator {
  readonly policyType: string;
  evaluate: (
    repository: EvaluationTarget,
    gateway: RepositoryGateway,
    context: EvaluationContext
  ) => Promise<PolicyFinding | null>;
}
