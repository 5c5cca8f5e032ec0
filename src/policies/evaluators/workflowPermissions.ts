import type { PolicyEvaluator } from "../types";

const POLICY_TYPE = "correct_workflow_permissions";

export const correctWorkflowPermissionsEvaluator: PolicyEvaluator = {
  policyType: POLICY_TYPE,
  evaluate: async (repository, gateway, context) => {
    const permission = await gateway.getWorkflowPermissions(repository.githubId, { signal: context.signal });

    // null: Actions disabled for the repository
    if (permission === null || permission === "read") {
      return null;
    }

    return { policyType: POLICY_TYPE };
  }
};
