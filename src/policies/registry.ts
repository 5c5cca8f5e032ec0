import { catalogInfoHasOwnerEvaluator } from "./evaluators/catalogInfoOwner";
import { hasAgentsMdEvaluator, hasCatalogInfoYamlEvaluator } from "./evaluators/filePresence";
import { correctWorkflowPermissionsEvaluator } from "./evaluators/workflowPermissions";
import type { PolicyEvaluator } from "./types";

export const DEFAULT_EVALUATORS: readonly PolicyEvaluator[] = Object.freeze([
  hasAgentsMdEvaluator,
  hasCatalogInfoYamlEvaluator,
  correctWorkflowPermissionsEvaluator,
  catalogInfoHasOwnerEvaluator
]);

function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase();
}

export class EvaluatorRegistry {
  private readonly evaluators: ReadonlyMap<string, PolicyEvaluator>;

  constructor(evaluators: readonly PolicyEvaluator[]) {
    const byTag = new Map<string, PolicyEvaluator>();
    for (const evaluator of evaluators) {
      const tag = normalizeTag(evaluator.policyType);
      if (tag.length === 0) {
        throw new Error("E_EVALUATOR_INVALID: evaluator policyType must not be empty");
      }

      if (byTag.has(tag)) {
        throw new Error(`E_EVALUATOR_DUPLICATE: more than one evaluator registered for '${tag}'`);
      }

      byTag.set(tag, evaluator);
    }

    this.evaluators = byTag;
  }

  resolve(policyType: string): PolicyEvaluator | null {
    return this.evaluators.get(normalizeTag(policyType)) ?? null;
  }

  listPolicyTypes(): string[] {
    return [...this.evaluators.keys()].sort();
  }
}

export function createDefaultRegistry(extra: readonly PolicyEvaluator[] = []): EvaluatorRegistry {
  return new EvaluatorRegistry([...DEFAULT_EVALUATORS, ...extra]);
}
