import { GitHubApiError, type GitHubApiErrorKind } from "../errors";

export type TokenSource = (signal?: AbortSignal) => Promise<string>;

export interface GitHubRestClientOptions {
  baseUrl: string;
  token: TokenSource;
  fetchImpl?: typeof fetch;
  userAgent?: string;
}

export interface GitHubRequestOptions {
  method?: "GET" | "POST" | "PATCH" | "PUT" | "DELETE";
  query?: Record<string, string | number | undefined>;
  body?: unknown;
  signal?: AbortSignal;
  /** Resolve a 404 to `null` instead of raising a `not_found` error. */
  allowNotFound?: boolean;
}

export interface GitHubResponse {
  status: number;
  body: unknown;
  headers: Headers;
}

const MAX_ERROR_SNIPPET = 180;
const DEFAULT_USER_AGENT = "repo-compliance-engine";

function headersForGitHub(token: string, userAgent: string, hasBody: boolean): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/vnd.github+json",
    Authorization: `Bearer ${token}`,
    "User-Agent": userAgent,
    "X-GitHub-Api-Version": "2022-11-28"
  };

  if (hasBody) {
    headers["Content-Type"] = "application/json";
  }

  return headers;
}

export function parseRetryAfterMs(
  retryAfterHeader: string | null,
  rateLimitResetHeader: string | null,
  now: number = Date.now()
): number | null {
  if (retryAfterHeader && retryAfterHeader.trim().length > 0) {
    const seconds = Number.parseInt(retryAfterHeader.trim(), 10);
    if (Number.isFinite(seconds) && seconds >= 0) {
      return seconds * 1_000;
    }

    const asDate = Date.parse(retryAfterHeader);
    if (!Number.isNaN(asDate)) {
      return Math.max(0, asDate - now);
    }
  }

  if (rateLimitResetHeader && rateLimitResetHeader.trim().length > 0) {
    const resetEpochSeconds = Number.parseInt(rateLimitResetHeader.trim(), 10);
    if (Number.isFinite(resetEpochSeconds) && resetEpochSeconds >= 0) {
      return Math.max(0, resetEpochSeconds * 1_000 - now);
    }
  }

  return null;
}

export function classifyStatus(status: number, headers: Headers): GitHubApiErrorKind {
  if (status === 401) {
    return "unauthorized";
  }

  if (status === 429) {
    return "rate_limited";
  }

  if (status === 403) {
    return headers.get("x-ratelimit-remaining") === "0" ? "rate_limited" : "forbidden";
  }

  if (status === 404) {
    return "not_found";
  }

  return "http_error";
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

function buildUrl(baseUrl: string, path: string, query: GitHubRequestOptions["query"]): string {
  const url = `${baseUrl}${path.startsWith("/") ? path : `/${path}`}`;
  if (!query) {
    return url;
  }

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      params.set(key, String(value));
    }
  }

  const text = params.toString();
  return text.length > 0 ? `${url}?${text}` : url;
}

/**
 * Minimal REST client for the GitHub API. It authenticates every request through a
 * {@link TokenSource}, maps non-2xx responses to {@link GitHubApiError} and never retries.
 */
export class GitHubRestClient {
  readonly baseUrl: string;
  private readonly token: TokenSource;
  private readonly fetchImpl: typeof fetch | undefined;
  private readonly userAgent: string;

  constructor(options: GitHubRestClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.token = options.token;
    this.fetchImpl = options.fetchImpl;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  request(path: string, options: GitHubRequestOptions & { allowNotFound: true }): Promise<GitHubResponse | null>;
  request(path: string, options?: GitHubRequestOptions): Promise<GitHubResponse>;
  async request(path: string, options: GitHubRequestOptions = {}): Promise<GitHubResponse | null> {
    const method = options.method ?? "GET";
    const url = buildUrl(this.baseUrl, path, options.query);

    if (options.signal?.aborted) {
      throw new GitHubApiError("aborted", `Request cancelled before ${method} ${path}`, { url });
    }

    const token = await this.token(options.signal);
    const hasBody = options.body !== undefined;
    // resolved per call so tests that swap globalThis.fetch are honoured
    const fetchImpl = this.fetchImpl ?? globalThis.fetch;

    let response: Response;
    try {
      response = await fetchImpl(url, {
        method,
        headers: headersForGitHub(token, this.userAgent, hasBody),
        body: hasBody ? JSON.stringify(options.body) : undefined,
        signal: options.signal
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (isAbortError(error) || options.signal?.aborted) {
        throw new GitHubApiError("aborted", `Request cancelled: ${method} ${path}`, { url });
      }

      throw new GitHubApiError("fetch_error", `GitHub request failed: ${method} ${path}`, {
        url,
        error: message.slice(0, MAX_ERROR_SNIPPET)
      });
    }

    if (response.status === 404 && options.allowNotFound) {
      return null;
    }

    const text = await response.text();

    if (!response.ok) {
      const kind = classifyStatus(response.status, response.headers);
      const details: Record<string, unknown> = {
        url,
        method,
        status: response.status,
        responseText: text.trim().replace(/\s+/g, " ").slice(0, MAX_ERROR_SNIPPET)
      };

      if (kind === "rate_limited") {
        details.retryAfterMs = parseRetryAfterMs(
          response.headers.get("retry-after"),
          response.headers.get("x-ratelimit-reset")
        );
      }

      throw new GitHubApiError(kind, `GitHub API returned status ${response.status} for ${method} ${path}`, details);
    }

    if (text.trim().length === 0) {
      return { status: response.status, body: null, headers: response.headers };
    }

    let body: unknown;
    try {
      body = JSON.parse(text) as unknown;
    } catch {
      throw new GitHubApiError("malformed_response", `GitHub API returned invalid JSON for ${method} ${path}`, {
        url,
        status: response.status
      });
    }

    return { status: response.status, body, headers: response.headers };
  }
}
