import { GitHubApiError } from "../errors";
import { componentLogger, type Logger } from "../logger";
import type { GitHubRestClient } from "./client";
import type { CredentialManager } from "./credentials";
import { asNonEmptyString, asObject, asPositiveInt } from "./payload";
import type {
  CheckRunConclusion,
  GatewayCallOptions,
  RemoteCheckRun,
  RemoteComment,
  RemoteIssue,
  RemotePullRequest,
  RemoteRepository,
  RepositoryGateway
} from "./types";

export interface GitHubRepositoryGatewayOptions {
  credentials: CredentialManager;
  organization: string;
  maxPages?: number;
  logger?: Logger;
}

const PAGE_SIZE = 100;
const DEFAULT_MAX_PAGES = 50;

function encodePath(filePath: string): string {
  return filePath
    .split("/")
    .filter((segment) => segment.length > 0)
    .map((segment) => encodeURIComponent(segment))
    .join("/");
}

function malformed(what: string, details: Record<string, unknown> = {}): GitHubApiError {
  return new GitHubApiError("malformed_response", `GitHub API returned a malformed ${what}`, details);
}

export function toRemoteRepository(value: unknown): RemoteRepository {
  const obj = asObject(value);
  const id = asPositiveInt(obj?.id);
  const name = asNonEmptyString(obj?.name);
  if (!obj || !id || !name) {
    throw malformed("repository payload");
  }

  return {
    id,
    name,
    fullName: asNonEmptyString(obj.full_name) ?? name,
    archived: obj.archived === true,
    htmlUrl: asNonEmptyString(obj.html_url)
  };
}

export function toRemoteIssue(value: unknown): RemoteIssue {
  const obj = asObject(value);
  const number = asPositiveInt(obj?.number);
  const title = typeof obj?.title === "string" ? obj.title : null;
  if (!obj || !number || title === null) {
    throw malformed("issue payload");
  }

  const labels = Array.isArray(obj.labels)
    ? obj.labels
        .map((label) => (typeof label === "string" ? label : asNonEmptyString(asObject(label)?.name)))
        .filter((label): label is string => typeof label === "string" && label.length > 0)
    : [];

  return {
    number,
    title,
    htmlUrl: asNonEmptyString(obj.html_url) ?? "",
    labels
  };
}

export function toRemotePullRequest(value: unknown): RemotePullRequest {
  const obj = asObject(value);
  const number = asPositiveInt(obj?.number);
  if (!obj || !number) {
    throw malformed("pull request payload");
  }

  return {
    number,
    title: typeof obj.title === "string" ? obj.title : "",
    headSha: asNonEmptyString(asObject(obj.head)?.sha),
    htmlUrl: asNonEmptyString(obj.html_url) ?? ""
  };
}

export function toRemoteComment(value: unknown): RemoteComment {
  const obj = asObject(value);
  const id = asPositiveInt(obj?.id);
  if (!obj || !id) {
    throw malformed("comment payload");
  }

  const user = asObject(obj.user);
  return {
    id,
    body: typeof obj.body === "string" ? obj.body : "",
    userLogin: asNonEmptyString(user?.login),
    userType: asNonEmptyString(user?.type)
  };
}

export function toRemoteCheckRun(value: unknown): RemoteCheckRun {
  const obj = asObject(value);
  const id = asPositiveInt(obj?.id);
  const name = asNonEmptyString(obj?.name);
  if (!obj || !id || !name) {
    throw malformed("check run payload");
  }

  return { id, name };
}

/**
 * {@link RepositoryGateway} over the GitHub REST API, authenticated as the app installation.
 * Repositories are addressed by their immutable numeric id (`/repositories/{id}`), so
 * renames never break a lookup.
 */
export class GitHubRepositoryGateway implements RepositoryGateway {
  private readonly credentials: CredentialManager;
  private readonly client: GitHubRestClient;
  private readonly organization: string;
  private readonly maxPages: number;
  private readonly logger: Logger;

  constructor(options: GitHubRepositoryGatewayOptions) {
    this.credentials = options.credentials;
    this.client = options.credentials.createServiceClient();
    this.organization = options.organization;
    this.maxPages = Math.max(1, options.maxPages ?? DEFAULT_MAX_PAGES);
    this.logger = componentLogger(options.logger, "gateway");
  }

  async listActiveRepositories(options: GatewayCallOptions = {}): Promise<RemoteRepository[]> {
    const items = await this.paginate(`/orgs/${encodeURIComponent(this.organization)}/repos`, { type: "all" }, options);
    return items.map((item) => toRemoteRepository(item));
  }

  async fileExists(repositoryId: number, filePath: string, options: GatewayCallOptions = {}): Promise<boolean> {
    const response = await this.client.request(`/repositories/${repositoryId}/contents/${encodePath(filePath)}`, {
      signal: options.signal,
      allowNotFound: true
    });

    if (!response) {
      return false;
    }

    return Array.isArray(response.body) ? response.body.length > 0 : asObject(response.body) !== null;
  }

  async getFileContent(repositoryId: number, filePath: string, options: GatewayCallOptions = {}): Promise<string | null> {
    const response = await this.client.request(`/repositories/${repositoryId}/contents/${encodePath(filePath)}`, {
      signal: options.signal,
      allowNotFound: true
    });

    const file = asObject(response?.body);
    if (!file || file.type !== "file") {
      return null;
    }

    if (typeof file.content !== "string") {
      throw malformed("file content payload", { repositoryId, filePath });
    }

    if (file.encoding !== undefined && file.encoding !== "base64") {
      return file.content;
    }

    return Buffer.from(file.content, "base64").toString("utf8");
  }

  async getSettings(repositoryId: number, options: GatewayCallOptions = {}): Promise<RemoteRepository | null> {
    const response = await this.client.request(`/repositories/${repositoryId}`, {
      signal: options.signal,
      allowNotFound: true
    });

    return response ? toRemoteRepository(response.body) : null;
  }

  async getWorkflowPermissions(repositoryId: number, options: GatewayCallOptions = {}): Promise<string | null> {
    const response = await this.client.request(`/repositories/${repositoryId}/actions/permissions/workflow`, {
      signal: options.signal,
      allowNotFound: true
    });

    if (!response) {
      this.logger.warn("Workflow permissions not found; Actions may be disabled", { repositoryId });
      return null;
    }

    const body = asObject(response.body);
    if (!body) {
      throw malformed("workflow permissions payload", { repositoryId });
    }

    return typeof body.default_workflow_permissions === "string" ? body.default_workflow_permissions : null;
  }

  async createIssue(
    repositoryId: number,
    title: string,
    body: string,
    labels: string[],
    options: GatewayCallOptions = {}
  ): Promise<RemoteIssue> {
    const response = await this.client.request(`/repositories/${repositoryId}/issues`, {
      method: "POST",
      body: { title, body, labels },
      signal: options.signal
    });

    return toRemoteIssue(response.body);
  }

  async archiveRepository(repositoryId: number, options: GatewayCallOptions = {}): Promise<boolean> {
    const response = await this.client.request(`/repositories/${repositoryId}`, {
      method: "PATCH",
      body: { archived: true },
      signal: options.signal,
      allowNotFound: true
    });

    return response !== null;
  }

  async listOpenIssues(repositoryId: number, label: string, options: GatewayCallOptions = {}): Promise<RemoteIssue[]> {
    const items = await this.paginate(
      `/repositories/${repositoryId}/issues`,
      { state: "open", labels: label },
      options,
      true
    );

    // the issues endpoint also returns pull requests
    return items.filter((item) => !asObject(item)?.pull_request).map((item) => toRemoteIssue(item));
  }

  async listOpenPullRequests(repositoryId: number, options: GatewayCallOptions = {}): Promise<RemotePullRequest[]> {
    const items = await this.paginate(`/repositories/${repositoryId}/pulls`, { state: "open" }, options, true);
    return items.map((item) => toRemotePullRequest(item));
  }

  async listPullRequestComments(
    repositoryId: number,
    pullRequestNumber: number,
    options: GatewayCallOptions = {}
  ): Promise<RemoteComment[]> {
    const items = await this.paginate(
      `/repositories/${repositoryId}/issues/${pullRequestNumber}/comments`,
      {},
      options,
      true
    );
    return items.map((item) => toRemoteComment(item));
  }

  async createPullRequestComment(
    repositoryId: number,
    pullRequestNumber: number,
    body: string,
    options: GatewayCallOptions = {}
  ): Promise<RemoteComment> {
    const response = await this.client.request(`/repositories/${repositoryId}/issues/${pullRequestNumber}/comments`, {
      method: "POST",
      body: { body },
      signal: options.signal
    });

    return toRemoteComment(response.body);
  }

  async listCheckRuns(repositoryId: number, ref: string, options: GatewayCallOptions = {}): Promise<RemoteCheckRun[]> {
    const response = await this.client.request(
      `/repositories/${repositoryId}/commits/${encodeURIComponent(ref)}/check-runs`,
      { query: { per_page: PAGE_SIZE }, signal: options.signal, allowNotFound: true }
    );

    if (!response) {
      return [];
    }

    const runs = asObject(response.body)?.check_runs;
    if (!Array.isArray(runs)) {
      throw malformed("check runs payload", { repositoryId, ref });
    }

    return runs.map((run) => toRemoteCheckRun(run));
  }

  async createCheckRun(
    repositoryId: number,
    name: string,
    headSha: string,
    conclusion: CheckRunConclusion,
    options: GatewayCallOptions = {}
  ): Promise<RemoteCheckRun> {
    const response = await this.client.request(`/repositories/${repositoryId}/check-runs`, {
      method: "POST",
      body: { name, head_sha: headSha, status: "completed", conclusion },
      signal: options.signal
    });

    return toRemoteCheckRun(response.body);
  }

  async updateCheckRun(
    repositoryId: number,
    checkRunId: number,
    conclusion: CheckRunConclusion,
    options: GatewayCallOptions = {}
  ): Promise<RemoteCheckRun> {
    const response = await this.client.request(`/repositories/${repositoryId}/check-runs/${checkRunId}`, {
      method: "PATCH",
      body: { status: "completed", conclusion },
      signal: options.signal
    });

    return toRemoteCheckRun(response.body);
  }

  async isUserInTeam(userToken: string, org: string, teamSlug: string, options: GatewayCallOptions = {}): Promise<boolean> {
    const userClient = this.credentials.getUserScopedClient(userToken);

    const user = await userClient.request("/user", { signal: options.signal });
    const login = asNonEmptyString(asObject(user.body)?.login);
    if (!login) {
      throw malformed("user payload");
    }

    const membership = await userClient.request(
      `/orgs/${encodeURIComponent(org)}/teams/${encodeURIComponent(teamSlug)}/memberships/${encodeURIComponent(login)}`,
      { signal: options.signal, allowNotFound: true }
    );

    if (!membership) {
      this.logger.warn("Team membership not found", { org, teamSlug });
      return false;
    }

    return asNonEmptyString(asObject(membership.body)?.state)?.toLowerCase() === "active";
  }

  private async paginate(
    path: string,
    query: Record<string, string>,
    options: GatewayCallOptions,
    allowNotFound = false
  ): Promise<unknown[]> {
    const items: unknown[] = [];

    for (let page = 1; page <= this.maxPages; page += 1) {
      const request = { query: { ...query, per_page: PAGE_SIZE, page }, signal: options.signal };
      const response = allowNotFound
        ? await this.client.request(path, { ...request, allowNotFound: true as const })
        : await this.client.request(path, request);

      // a 404 ends the listing; pages already read are kept
      if (!response) {
        return items;
      }

      if (!Array.isArray(response.body)) {
        throw malformed("list payload", { path, page });
      }

      items.push(...response.body);
      if (response.body.length < PAGE_SIZE) {
        return items;
      }
    }

    throw new GitHubApiError("http_error", `GitHub pagination exceeded max pages ${this.maxPages}`, {
      path,
      maxPages: this.maxPages
    });
  }
}
