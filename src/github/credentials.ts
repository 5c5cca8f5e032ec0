import jwt from "jsonwebtoken";

import { CredentialExchangeError, GitHubApiError, describeError, isGitHubApiError } from "../errors";
import { componentLogger, type Logger } from "../logger";
import { GitHubRestClient } from "./client";
import { asNonEmptyString, asObject } from "./payload";

export interface CredentialManagerOptions {
  appId: string;
  privateKey: string;
  installationId: string;
  apiBaseUrl: string;
  fetchImpl?: typeof fetch;
  now?: () => number;
  logger?: Logger;
  /** Cached tokens are refreshed once they are this close to expiry. */
  refreshMarginMs?: number;
}

interface CachedToken {
  token: string;
  expiresAt: number;
}

const JWT_CLOCK_SKEW_SECONDS = 60;
const JWT_LIFETIME_SECONDS = 9 * 60;
const DEFAULT_REFRESH_MARGIN_MS = 5 * 60 * 1_000;

/** Settles with `shared`, or rejects as soon as this caller's own signal aborts. */
function awaitOwnSignal<T>(shared: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return shared;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new GitHubApiError("aborted", "Installation token request cancelled"));
    };

    signal.addEventListener("abort", onAbort, { once: true });
    if (signal.aborted) {
      onAbort();
    }

    shared.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Owns the GitHub App identity.
 *
 * Installation tokens are cached on the instance and shared by every caller. A refresh in
 * progress is shared too: callers arriving while the exchange runs await the same promise.
 * The shared exchange carries no caller's signal; each caller stops waiting when its own
 * signal aborts. User-scoped clients never read or write that cache.
 */
export class CredentialManager {
  private readonly appId: string;
  private readonly privateKey: string;
  private readonly installationId: string;
  private readonly apiBaseUrl: string;
  private readonly fetchImpl: typeof fetch | undefined;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly refreshMarginMs: number;
  private cached: CachedToken | null = null;
  private inFlight: Promise<CachedToken> | null = null;

  constructor(options: CredentialManagerOptions) {
    this.appId = options.appId;
    this.privateKey = options.privateKey;
    this.installationId = options.installationId;
    this.apiBaseUrl = options.apiBaseUrl;
    this.fetchImpl = options.fetchImpl;
    this.now = options.now ?? Date.now;
    this.logger = componentLogger(options.logger, "credentials");
    this.refreshMarginMs = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS;
  }

  async getServiceToken(signal?: AbortSignal): Promise<string> {
    const cached = this.cached;
    if (cached && cached.expiresAt - this.now() > this.refreshMarginMs) {
      this.logger.debug("Installation token served from cache", { expiresAt: new Date(cached.expiresAt).toISOString() });
      return cached.token;
    }

    if (signal?.aborted) {
      throw new GitHubApiError("aborted", "Installation token request cancelled");
    }

    if (!this.inFlight) {
      this.logger.info("Installation token missing or near expiry; exchanging a new one");
      this.inFlight = this.exchange().finally(() => {
        this.inFlight = null;
      });
    }

    const fresh = await awaitOwnSignal(this.inFlight, signal);
    return fresh.token;
  }

  /** Client authenticated as the installation; every request asks for a current token. */
  createServiceClient(): GitHubRestClient {
    return new GitHubRestClient({
      baseUrl: this.apiBaseUrl,
      token: (signal) => this.getServiceToken(signal),
      fetchImpl: this.fetchImpl
    });
  }

  getUserScopedClient(userToken: string): GitHubRestClient {
    const token = asNonEmptyString(userToken);
    if (!token) {
      throw new CredentialExchangeError("user token must be a non-empty string");
    }

    return new GitHubRestClient({
      baseUrl: this.apiBaseUrl,
      token: async () => token,
      fetchImpl: this.fetchImpl
    });
  }

  createAppJwt(): string {
    const nowSeconds = Math.floor(this.now() / 1_000);

    try {
      return jwt.sign(
        {
          iat: nowSeconds - JWT_CLOCK_SKEW_SECONDS,
          exp: nowSeconds + JWT_LIFETIME_SECONDS,
          iss: this.appId
        },
        this.privateKey,
        { algorithm: "RS256" }
      );
    } catch (error) {
      throw new CredentialExchangeError(`could not sign the app JWT: ${describeError(error)}`, {
        appId: this.appId
      });
    }
  }

  invalidate(): void {
    this.cached = null;
  }

  private async exchange(): Promise<CachedToken> {
    const appJwt = this.createAppJwt();
    const appClient = new GitHubRestClient({
      baseUrl: this.apiBaseUrl,
      token: async () => appJwt,
      fetchImpl: this.fetchImpl
    });

    let body: unknown;
    try {
      const response = await appClient.request(`/app/installations/${encodeURIComponent(this.installationId)}/access_tokens`, {
        method: "POST"
      });
      body = response.body;
    } catch (error) {
      this.logger.error("Installation token exchange failed", { error: describeError(error) });
      throw new CredentialExchangeError(`installation token exchange failed: ${describeError(error)}`, {
        installationId: this.installationId,
        kind: isGitHubApiError(error) ? error.kind : "unknown"
      });
    }

    const payload: Record<string, unknown> = asObject(body) ?? {};
    const token = asNonEmptyString(payload.token);
    const expiresAtText = asNonEmptyString(payload.expires_at);
    const expiresAt = expiresAtText ? Date.parse(expiresAtText) : Number.NaN;

    if (!token || Number.isNaN(expiresAt)) {
      throw new CredentialExchangeError("installation token response is missing token or expires_at", {
        installationId: this.installationId
      });
    }

    const fresh: CachedToken = { token, expiresAt };
    this.cached = fresh;
    this.logger.info("Installation token issued", { expiresAt: new Date(expiresAt).toISOString() });
    return fresh;
  }
}
