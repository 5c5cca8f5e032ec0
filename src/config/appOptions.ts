import path from "node:path";

import { z } from "zod";

import { InvalidAppOptionsError } from "../errors";

export const DEFAULT_GITHUB_API_URL = "https://api.github.com";

export const DEFAULT_DATABASE_PATH = path.join(".compliance", "compliance.db");

const AppOptionsSchema = z.object({
  appId: z.string().trim().regex(/^\d+$/, "must be a numeric GitHub App id"),
  privateKey: z
    .string()
    .transform((value) => value.replace(/\\n/g, "\n").trim())
    .refine((value) => value.includes("PRIVATE KEY"), { message: "must be a PEM encoded private key" }),
  installationId: z.string().trim().regex(/^\d+$/, "must be a numeric installation id"),
  organization: z.string().trim().min(1),
  apiBaseUrl: z
    .string()
    .trim()
    .url()
    .transform((value) => value.replace(/\/+$/, "")),
  databasePath: z.string().trim().min(1),
  logLevel: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]),
  scanIntervalMinutes: z.coerce.number().int().min(0).max(24 * 60)
});

export type AppOptions = z.infer<typeof AppOptionsSchema>;

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const pathLabel = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${pathLabel} ${issue.message}`;
    })
    .join("; ")
    .slice(0, 500);
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

export function loadAppOptions(env: NodeJS.ProcessEnv = process.env): AppOptions {
  const result = AppOptionsSchema.safeParse({
    appId: env.GITHUB_APP_ID,
    privateKey: env.GITHUB_APP_PRIVATE_KEY,
    installationId: env.GITHUB_APP_INSTALLATION_ID,
    organization: env.GITHUB_ORGANIZATION,
    apiBaseUrl: blankToUndefined(env.GITHUB_API_URL) ?? DEFAULT_GITHUB_API_URL,
    databasePath: blankToUndefined(env.COMPLIANCE_DATABASE_PATH) ?? DEFAULT_DATABASE_PATH,
    logLevel: blankToUndefined(env.LOG_LEVEL)?.trim().toLowerCase() ?? "info",
    scanIntervalMinutes: blankToUndefined(env.SCAN_INTERVAL_MINUTES) ?? 0
  });

  if (!result.success) {
    throw new InvalidAppOptionsError(formatZodIssues(result.error));
  }

  return result.data;
}
