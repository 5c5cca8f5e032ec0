import { z } from "zod";

import { ConfigurationNotFoundError, InvalidConfigurationError, describeError } from "../errors";
import { componentLogger, type Logger } from "../logger";

export interface IssueTemplate {
  title?: string;
  body?: string;
  labels?: string[];
}

export interface PolicyConfig {
  name: string;
  type: string;
  actions: string[];
  issueTemplate?: IssueTemplate;
  /** Body for `comment-on-prs`; a default listing the violated policy is used when unset. */
  prCommentMessage?: string;
  /** Check-run name for `block-prs`. */
  statusCheckName?: string;
}

export interface AppConfig {
  authorizedTeam: string;
  policies: PolicyConfig[];
}

export interface ConfigurationProvider {
  getConfig: (forceRefresh?: boolean) => Promise<AppConfig>;
}

const ActionListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : [value]))
  .transform((actions) => actions.map((action) => action.trim()).filter((action) => action.length > 0))
  .refine((actions) => actions.length > 0, { message: "must name at least one action" });

const IssueDetailsSchema = z
  .object({
    title: z.string().trim().min(1).optional(),
    body: z.string().trim().min(1).optional(),
    labels: z.array(z.string().trim().min(1)).optional()
  })
  .strict();

const PrCommentDetailsSchema = z
  .object({
    message: z.string().trim().min(1).optional()
  })
  .strict();

const BlockPrsDetailsSchema = z
  .object({
    status_check_name: z.string().trim().min(1).optional()
  })
  .strict();

const PolicyConfigSchema = z.object({
  name: z.string().trim().min(1),
  type: z.string().trim().min(1),
  action: ActionListSchema,
  issue_details: IssueDetailsSchema.optional(),
  pr_comment_details: PrCommentDetailsSchema.optional(),
  block_prs_details: BlockPrsDetailsSchema.optional()
});

const AppConfigSchema = z.object({
  access_control: z.object({
    authorized_team: z.string().trim().min(1)
  }),
  policies: z.array(PolicyConfigSchema).default([])
});

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const pathLabel = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${pathLabel} ${issue.message}`;
    })
    .join("; ")
    .slice(0, 500);
}

function freezeConfig(config: AppConfig): AppConfig {
  for (const policy of config.policies) {
    Object.freeze(policy.actions);
    if (policy.issueTemplate) {
      if (policy.issueTemplate.labels) {
        Object.freeze(policy.issueTemplate.labels);
      }
      Object.freeze(policy.issueTemplate);
    }
    Object.freeze(policy);
  }
  Object.freeze(config.policies);
  return Object.freeze(config);
}

/**
 * Validates a raw configuration document (the snake_case shape of `.github/config.yaml`)
 * and returns an immutable {@link AppConfig}.
 */
export function parseAppConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigurationError(formatZodIssues(result.error));
  }

  const parsed = result.data;
  const policies: PolicyConfig[] = parsed.policies.map((policy) => {
    const config: PolicyConfig = {
      name: policy.name,
      type: policy.type,
      actions: policy.action
    };

    if (policy.issue_details) {
      config.issueTemplate = { ...policy.issue_details };
    }

    if (policy.pr_comment_details?.message) {
      config.prCommentMessage = policy.pr_comment_details.message;
    }

    if (policy.block_prs_details?.status_check_name) {
      config.statusCheckName = policy.block_prs_details.status_check_name;
    }

    return config;
  });

  return freezeConfig({
    authorizedTeam: parsed.access_control.authorized_team,
    policies
  });
}

export class StaticConfigurationProvider implements ConfigurationProvider {
  private readonly config: AppConfig;

  constructor(config: AppConfig) {
    this.config = freezeConfig(config);
  }

  async getConfig(_forceRefresh?: boolean): Promise<AppConfig> {
    return this.config;
  }
}

export interface CachedConfigurationProviderOptions {
  /** Returns the raw document, or null when no configuration exists. */
  load: () => Promise<unknown>;
  ttlMs?: number;
  now?: () => number;
  logger?: Logger;
}

const DEFAULT_CONFIG_TTL_MS = 15 * 60 * 1_000;

export class CachedConfigurationProvider implements ConfigurationProvider {
  private readonly load: () => Promise<unknown>;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private cached: { config: AppConfig; expiresAt: number } | null = null;
  private inFlight: Promise<AppConfig> | null = null;

  constructor(options: CachedConfigurationProviderOptions) {
    this.load = options.load;
    this.ttlMs = Math.max(1, options.ttlMs ?? DEFAULT_CONFIG_TTL_MS);
    this.now = options.now ?? Date.now;
    this.logger = componentLogger(options.logger, "configuration");
  }

  async getConfig(forceRefresh = false): Promise<AppConfig> {
    if (!forceRefresh && this.cached && this.cached.expiresAt > this.now()) {
      // sliding expiration
      this.cached.expiresAt = this.now() + this.ttlMs;
      return this.cached.config;
    }

    if (!this.inFlight) {
      this.inFlight = this.refresh().finally(() => {
        this.inFlight = null;
      });
    }

    return this.inFlight;
  }

  private async refresh(): Promise<AppConfig> {
    let raw: unknown;
    try {
      raw = await this.load();
    } catch (error) {
      this.logger.error("Configuration load failed", { error: describeError(error) });
      throw new ConfigurationNotFoundError(`configuration could not be loaded: ${describeError(error)}`);
    }

    if (raw === null || raw === undefined) {
      this.logger.warn("Configuration document is absent");
      throw new ConfigurationNotFoundError("configuration document is absent");
    }

    const config = parseAppConfig(raw);
    this.cached = { config, expiresAt: this.now() + this.ttlMs };
    this.logger.info("Configuration loaded", { policies: config.policies.length });
    return config;
  }
}
