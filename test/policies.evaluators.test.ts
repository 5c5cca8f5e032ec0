import assert from "node:assert/strict";
import test from "node:test";

import { GitHubApiError } from "../src/errors";
import { createSilentLogger } from "../src/logger";
import { catalogInfoHasOwnerEvaluator, checkCatalogOwner } from "../src/policies/evaluators/catalogInfoOwner";
import {
  createFilePresenceEvaluator,
  hasAgentsMdEvaluator,
  hasCatalogInfoYamlEvaluator
} from "../src/policies/evaluators/filePresence";
import { correctWorkflowPermissionsEvaluator } from "../src/policies/evaluators/workflowPermissions";
import type { EvaluationContext, EvaluationTarget } from "../src/policies/types";
import { FakeRepositoryGateway } from "./fakes";

const context: EvaluationContext = { logger: createSilentLogger() };

function target(githubId: number): EvaluationTarget {
  return { githubId, name: `acme/repo-${githubId}` };
}

test("has_agents_md flags a repository without AGENTS.md", async () => {
  const gateway = new FakeRepositoryGateway();
  gateway.addRepository({ id: 1, name: "with-guide", files: { "AGENTS.md": "# Agents" } });
  gateway.addRepository({ id: 2, name: "without-guide" });

  assert.equal(await hasAgentsMdEvaluator.evaluate(target(1), gateway, context), null);
  assert.deepEqual(await hasAgentsMdEvaluator.evaluate(target(2), gateway, context), { policyType: "has_agents_md" });
});

test("has_catalog_info_yaml checks catalog-info.yaml", async () => {
  const gateway = new FakeRepositoryGateway();
  gateway.addRepository({ id: 1, name: "catalogued", files: { "catalog-info.yaml": "spec: {}" } });

  assert.equal(await hasCatalogInfoYamlEvaluator.evaluate(target(1), gateway, context), null);
  assert.equal(hasCatalogInfoYamlEvaluator.policyType, "has_catalog_info_yaml");
});

test("file presence evaluators propagate gateway failures", async () => {
  const gateway = new FakeRepositoryGateway();
  gateway.addRepository({ id: 1, name: "flaky" });
  gateway.failures.set("fileExists", new GitHubApiError("http_error", "upstream unavailable", { status: 503 }));
  const evaluator = createFilePresenceEvaluator("has_codeowners", "CODEOWNERS");

  await assert.rejects(
    evaluator.evaluate(target(1), gateway, context),
    (error: unknown) => error instanceof GitHubApiError && error.status === 503
  );
});

test("correct_workflow_permissions accepts read and null, flags anything else", async () => {
  const gateway = new FakeRepositoryGateway();
  gateway.addRepository({ id: 1, name: "read-only", workflowPermission: "read" });
  gateway.addRepository({ id: 2, name: "actions-disabled", workflowPermission: null });
  gateway.addRepository({ id: 3, name: "write-all", workflowPermission: "write" });
  gateway.addRepository({ id: 4, name: "shouting", workflowPermission: "READ" });

  assert.equal(await correctWorkflowPermissionsEvaluator.evaluate(target(1), gateway, context), null);
  assert.equal(await correctWorkflowPermissionsEvaluator.evaluate(target(2), gateway, context), null);
  assert.deepEqual(await correctWorkflowPermissionsEvaluator.evaluate(target(3), gateway, context), {
    policyType: "correct_workflow_permissions"
  });
  assert.deepEqual(await correctWorkflowPermissionsEvaluator.evaluate(target(4), gateway, context), {
    policyType: "correct_workflow_permissions"
  });
});

test("checkCatalogOwner explains what is missing", () => {
  assert.deepEqual(checkCatalogOwner({ spec: { owner: "team-platform" } }), { ok: true });
  assert.deepEqual(checkCatalogOwner({ spec: { owner: 1234 } }), { ok: true });
  assert.deepEqual(checkCatalogOwner({ metadata: {} }), { ok: false, reason: "missing 'spec' section" });
  assert.deepEqual(checkCatalogOwner({ spec: null }), { ok: false, reason: "'spec' section is empty" });
  assert.deepEqual(checkCatalogOwner({ spec: ["owner"] }), { ok: false, reason: "'spec' section is not an object" });
  assert.deepEqual(checkCatalogOwner({ spec: { type: "service" } }), {
    ok: false,
    reason: "missing 'owner' field in 'spec' section"
  });
  assert.deepEqual(checkCatalogOwner({ spec: { owner: "   " } }), { ok: false, reason: "'owner' field is empty" });
  assert.deepEqual(checkCatalogOwner("just text"), { ok: false, reason: "missing 'spec' section" });
});

test("catalog_info_has_owner treats an absent file as compliant", async () => {
  const gateway = new FakeRepositoryGateway();
  gateway.addRepository({ id: 1, name: "no-catalog" });

  assert.equal(await catalogInfoHasOwnerEvaluator.evaluate(target(1), gateway, context), null);
});

test("catalog_info_has_owner flags blank, unparsable and ownerless documents", async () => {
  const gateway = new FakeRepositoryGateway();
  gateway.addRepository({ id: 1, name: "owned", files: { "catalog-info.yaml": "kind: Component\nspec:\n  owner: team-a\n" } });
  gateway.addRepository({ id: 2, name: "blank", files: { "catalog-info.yaml": "  \n" } });
  gateway.addRepository({ id: 3, name: "broken", files: { "catalog-info.yaml": "spec: [unclosed\n" } });
  gateway.addRepository({ id: 4, name: "ownerless", files: { "catalog-info.yaml": "spec:\n  type: service\n" } });

  const violation = { policyType: "catalog_info_has_owner" };
  assert.equal(await catalogInfoHasOwnerEvaluator.evaluate(target(1), gateway, context), null);
  assert.deepEqual(await catalogInfoHasOwnerEvaluator.evaluate(target(2), gateway, context), violation);
  assert.deepEqual(await catalogInfoHasOwnerEvaluator.evaluate(target(3), gateway, context), violation);
  assert.deepEqual(await catalogInfoHasOwnerEvaluator.evaluate(target(4), gateway, context), violation);
});
