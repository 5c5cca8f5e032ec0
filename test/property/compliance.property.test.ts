import assert from "node:assert/strict";
import test from "node:test";

import fc from "fast-check";

import { evaluateRepository } from "../../src/policies/engine";
import { createDefaultRegistry } from "../../src/policies/registry";
import { normalizeActionName } from "../../src/remediation/executor";
import { SqliteComplianceStore } from "../../src/store/sqliteStore";
import { FakeRepositoryGateway } from "../fakes";

function resolveSeed(): number | undefined {
  const fromEnv = process.env.FAST_CHECK_SEED;
  if (!fromEnv) {
    return undefined;
  }

  const parsed = Number.parseInt(fromEnv, 10);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid FAST_CHECK_SEED '${fromEnv}'`);
  }

  return parsed;
}

const seed = resolveSeed();
const registry = createDefaultRegistry();
const policyTypes = ["has_agents_md", "has_catalog_info_yaml", "correct_workflow_permissions", "catalog_info_has_owner"];

const repositoryArbitrary = fc.record({
  hasAgents: fc.boolean(),
  catalog: fc.option(fc.constantFrom("", "spec:\n  owner: team-a\n", "spec:\n  type: service\n", "spec: [", "kind: x\n"), {
    nil: null
  }),
  permission: fc.option(fc.constantFrom("read", "write", "READ"), { nil: null }),
  policies: fc.array(fc.constantFrom(...policyTypes, "unknown_policy"), { maxLength: 6 })
});

test("evaluating the same repository twice yields identical findings", async () => {
  await fc.assert(
    fc.asyncProperty(repositoryArbitrary, async (input) => {
      const gateway = new FakeRepositoryGateway();
      const files: Record<string, string> = {};
      if (input.hasAgents) {
        files["AGENTS.md"] = "# guide";
      }
      if (input.catalog !== null) {
        files["catalog-info.yaml"] = input.catalog;
      }
      gateway.addRepository({ id: 1, name: "service", files, workflowPermission: input.permission });

      const policies = input.policies.map((type) => ({ type }));
      const target = { githubId: 1, name: "acme/service" };
      const first = await evaluateRepository(target, policies, { registry, gateway });
      const second = await evaluateRepository(target, policies, { registry, gateway });

      assert.deepEqual(second, first);
      assert.equal(new Set(first.map((finding) => finding.policyType)).size, first.length);
      assert.equal(first.some((finding) => finding.policyType === "unknown_policy"), false);
    }),
    { numRuns: 60, seed }
  );
});

test("no two violation rows share a scan, repository and policy", async () => {
  await fc.assert(
    fc.asyncProperty(
      fc.array(fc.tuple(fc.integer({ min: 0, max: 2 }), fc.integer({ min: 0, max: 2 })), { maxLength: 25 }),
      async (pairs) => {
        const store = await SqliteComplianceStore.open(":memory:");
        try {
          const policies = store.upsertPolicies(
            policyTypes.slice(0, 3).map((key) => ({ key, description: key, actions: ["log-only"] }))
          );
          const repositories = store.reconcileRepositories([
            { githubId: 10, name: "acme/a" },
            { githubId: 20, name: "acme/b" },
            { githubId: 30, name: "acme/c" }
          ]).repositories;
          const scan = store.createScan("2026-03-01T12:00:00.000Z");

          const violations = pairs.flatMap(([repositoryIndex, policyIndex]) => {
            const repository = repositories[repositoryIndex];
            const policy = policies[policyIndex];
            return repository && policy ? [{ repositoryId: repository.id, policyId: policy.id }] : [];
          });
          const inserted = store.insertViolations(scan.id, violations);
          store.insertViolations(scan.id, violations);

          const distinct = new Set(violations.map((violation) => `${violation.repositoryId}:${violation.policyId}`));
          const rows = store.listViolationsForScan(scan.id);

          assert.equal(inserted, distinct.size);
          assert.equal(rows.length, distinct.size);
          assert.equal(new Set(rows.map((row) => `${row.repositoryId}:${row.policyId}`)).size, rows.length);
        } finally {
          store.close();
        }
      }
    ),
    { numRuns: 50, seed }
  );
});

const catalogArbitrary = fc.record({
  repositoryCount: fc.integer({ min: 1, max: 4 }),
  policyCount: fc.integer({ min: 1, max: 3 }),
  violations: fc.array(fc.tuple(fc.nat(3), fc.nat(2)), { maxLength: 15 }),
  actionLogs: fc.array(fc.tuple(fc.nat(3), fc.nat(2)), { maxLength: 15 }),
  deletedRepositories: fc.uniqueArray(fc.nat(3), { maxLength: 4 }),
  deletedPolicies: fc.uniqueArray(fc.nat(2), { maxLength: 3 })
});

test("deleting repositories and policies leaves no orphaned violations or action logs", async () => {
  await fc.assert(
    fc.asyncProperty(catalogArbitrary, async (input) => {
      const store = await SqliteComplianceStore.open(":memory:");
      try {
        const policies = store.upsertPolicies(
          policyTypes.slice(0, input.policyCount).map((key) => ({ key, description: key, actions: ["log-only"] }))
        );
        const repositories = store.reconcileRepositories(
          Array.from({ length: input.repositoryCount }, (_, index) => ({
            githubId: (index + 1) * 10,
            name: `acme/repo-${index}`
          }))
        ).repositories;
        const scan = store.createScan("2026-03-01T12:00:00.000Z");

        const resolve = ([repositoryIndex, policyIndex]: [number, number]) => {
          const repository = repositories[repositoryIndex];
          const policy = policies[policyIndex];
          return repository && policy ? [{ repositoryId: repository.id, policyId: policy.id }] : [];
        };
        const violations = input.violations.flatMap(resolve);
        const actionLogs = input.actionLogs.flatMap(resolve);

        store.insertViolations(scan.id, violations);
        for (const entry of actionLogs) {
          store.appendActionLog({
            ...entry,
            actionType: "log-only",
            outcome: "Success",
            detail: "Violation logged as configured",
            timestamp: "2026-03-01T12:05:00.000Z"
          });
        }

        const removedRepositoryIds = new Set(
          repositories.filter((_, index) => input.deletedRepositories.includes(index)).map((repository) => repository.id)
        );
        const removedPolicyIds = new Set(
          policies.filter((_, index) => input.deletedPolicies.includes(index)).map((policy) => policy.id)
        );

        store.reconcileRepositories(
          repositories
            .filter((repository) => !removedRepositoryIds.has(repository.id))
            .map((repository) => ({ githubId: repository.githubId, name: repository.name }))
        );
        for (const policy of policies) {
          if (removedPolicyIds.has(policy.id)) {
            store.deletePolicy(policy.key);
          }
        }

        const survives = (entry: { repositoryId: number; policyId: number }): boolean =>
          !removedRepositoryIds.has(entry.repositoryId) && !removedPolicyIds.has(entry.policyId);
        const expectedViolations = new Set(
          violations.filter(survives).map((violation) => `${violation.repositoryId}:${violation.policyId}`)
        );

        assert.deepEqual(store.verifyIntegrity(), { orphanViolations: 0, orphanActionLogs: 0 });
        assert.equal(store.listViolationsForScan(scan.id).length, expectedViolations.size);
        assert.equal(store.listActionLogs().length, actionLogs.filter(survives).length);
        assert.equal(store.listActionLogs().every(survives), true);
      } finally {
        store.close();
      }
    }),
    { numRuns: 60, seed }
  );
});

test("action name normalization is idempotent", () => {
  fc.assert(
    fc.property(fc.string({ maxLength: 30 }), (action) => {
      const once = normalizeActionName(action);
      assert.equal(normalizeActionName(once), once);
      assert.equal(once.includes("_"), false);
    }),
    { numRuns: 200, seed }
  );
});
