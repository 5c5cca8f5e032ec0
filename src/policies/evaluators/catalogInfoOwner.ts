import { parse as parseYaml } from "yaml";

import { describeError } from "../../errors";
import type { PolicyEvaluator, PolicyFinding } from "../types";

const POLICY_TYPE = "catalog_info_has_owner";
const CATALOG_INFO_PATH = "catalog-info.yaml";

export type OwnerCheck = { ok: true } | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function checkCatalogOwner(document: unknown): OwnerCheck {
  if (!isRecord(document) || !("spec" in document)) {
    return { ok: false, reason: "missing 'spec' section" };
  }

  const spec = document.spec;
  if (spec === null || spec === undefined) {
    return { ok: false, reason: "'spec' section is empty" };
  }

  if (!isRecord(spec)) {
    return { ok: false, reason: "'spec' section is not an object" };
  }

  if (!("owner" in spec)) {
    return { ok: false, reason: "missing 'owner' field in 'spec' section" };
  }

  const owner = spec.owner;
  const ownerText = typeof owner === "string" || typeof owner === "number" ? String(owner).trim() : "";
  if (ownerText.length === 0) {
    return { ok: false, reason: "'owner' field is empty" };
  }

  return { ok: true };
}

/**
 * Requires `spec.owner` in `catalog-info.yaml`. A missing file is compliant here; the
 * `has_catalog_info_yaml` policy covers presence. Content problems (blank file, YAML that
 * does not parse, missing fields) are violations; gateway errors propagate.
 */
export const catalogInfoHasOwnerEvaluator: PolicyEvaluator = {
  policyType: POLICY_TYPE,
  evaluate: async (repository, gateway, context) => {
    const content = await gateway.getFileContent(repository.githubId, CATALOG_INFO_PATH, { signal: context.signal });
    if (content === null) {
      return null;
    }

    const violation: PolicyFinding = { policyType: POLICY_TYPE };

    if (content.trim().length === 0) {
      context.logger.warn(`${CATALOG_INFO_PATH} is empty`, { repository: repository.name });
      return violation;
    }

    let document: unknown;
    try {
      document = parseYaml(content) as unknown;
    } catch (error) {
      context.logger.error(`Failed to parse ${CATALOG_INFO_PATH}; the file may be malformed`, {
        repository: repository.name,
        error: describeError(error)
      });
      return violation;
    }

    const check = checkCatalogOwner(document);
    if (!check.ok) {
      context.logger.warn(`${CATALOG_INFO_PATH} ${check.reason}`, { repository: repository.name });
      return violation;
    }

    return null;
  }
};
