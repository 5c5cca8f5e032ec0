import assert from "node:assert/strict";
import test from "node:test";

import { AccessController, parseTeamReference } from "../src/access/controller";
import { CachedConfigurationProvider, StaticConfigurationProvider } from "../src/config/appConfig";
import { GitHubApiError } from "../src/errors";
import { FakeRepositoryGateway } from "./fakes";

function controllerFor(authorizedTeam: string, gateway: FakeRepositoryGateway): AccessController {
  return new AccessController({
    gateway,
    configuration: new StaticConfigurationProvider({ authorizedTeam, policies: [] })
  });
}

test("parseTeamReference requires exactly org/team", () => {
  assert.deepEqual(parseTeamReference("acme/platform-admins"), { org: "acme", teamSlug: "platform-admins" });
  assert.deepEqual(parseTeamReference(" acme / admins "), { org: "acme", teamSlug: "admins" });
  assert.equal(parseTeamReference("acme"), null);
  assert.equal(parseTeamReference("acme/"), null);
  assert.equal(parseTeamReference("acme/admins/extra"), null);
});

test("members of the authorized team are allowed", async () => {
  const gateway = new FakeRepositoryGateway();
  gateway.teamMembers.set("acme/admins", new Set(["member-token"]));
  const controller = controllerFor("acme/admins", gateway);

  assert.equal(await controller.isUserAuthorized("member-token"), true);
  assert.equal(await controller.isUserAuthorized("outsider-token"), false);
  assert.equal(gateway.calls.isUserInTeam, 2);
});

test("a malformed team setting denies without a remote call", async () => {
  const gateway = new FakeRepositoryGateway();
  const controller = controllerFor("admins", gateway);

  assert.equal(await controller.isUserAuthorized("member-token"), false);
  assert.equal(gateway.calls.isUserInTeam, 0);
});

test("remote and configuration errors deny access", async () => {
  const gateway = new FakeRepositoryGateway();
  gateway.failures.set("isUserInTeam", new GitHubApiError("unauthorized", "Bad credentials", { status: 401 }));

  assert.equal(await controllerFor("acme/admins", gateway).isUserAuthorized("expired-token"), false);

  const missingConfig = new AccessController({
    gateway: new FakeRepositoryGateway(),
    configuration: new CachedConfigurationProvider({ load: async () => null })
  });
  assert.equal(await missingConfig.isUserAuthorized("member-token"), false);
});
