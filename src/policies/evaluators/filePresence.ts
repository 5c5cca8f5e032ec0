import type { PolicyEvaluator } from "../types";

/**
 * Violation iff `filePath` is absent from the repository root. Gateway errors propagate,
 * so a failing API call never reads as compliant.
 */
export function createFilePresenceEvaluator(policyType: string, filePath: string): PolicyEvaluator {
  return {
    policyType,
    evaluate: async (repository, gateway, context) => {
      const exists = await gateway.fileExists(repository.githubId, filePath, { signal: context.signal });
      return exists ? null : { policyType };
    }
  };
}

export const hasAgentsMdEvaluator = createFilePresenceEvaluator("has_agents_md", "AGENTS.md");

export const hasCatalogInfoYamlEvaluator = createFilePresenceEvaluator("has_catalog_info_yaml", "catalog-info.yaml");
