import { GitHubApiError } from "../src/errors";
import type {
  CheckRunConclusion,
  GatewayCallOptions,
  RemoteCheckRun,
  RemoteComment,
  RemoteIssue,
  RemotePullRequest,
  RemoteRepository,
  RepositoryGateway
} from "../src/github/types";

export interface FakeCheckRun extends RemoteCheckRun {
  headSha: string;
  conclusion: CheckRunConclusion;
}

export interface FakeRepositoryState {
  repository: RemoteRepository;
  files: Map<string, string>;
  workflowPermission: string | null;
  issues: RemoteIssue[];
  pullRequests: RemotePullRequest[];
  /** Comments keyed by pull request number. */
  comments: Map<number, RemoteComment[]>;
  checkRuns: FakeCheckRun[];
}

export interface FakeCallCounts {
  listActiveRepositories: number;
  fileExists: number;
  getFileContent: number;
  getSettings: number;
  getWorkflowPermissions: number;
  createIssue: number;
  archiveRepository: number;
  listOpenIssues: number;
  listOpenPullRequests: number;
  listPullRequestComments: number;
  createPullRequestComment: number;
  listCheckRuns: number;
  createCheckRun: number;
  updateCheckRun: number;
  isUserInTeam: number;
}

export interface CreatedIssue {
  repositoryId: number;
  title: string;
  body: string;
  labels: string[];
}

export interface AddRepositoryInput {
  id: number;
  name: string;
  archived?: boolean;
  files?: Record<string, string>;
  workflowPermission?: string | null;
  issues?: RemoteIssue[];
  pullRequests?: RemotePullRequest[];
  comments?: Record<number, RemoteComment[]>;
  checkRuns?: FakeCheckRun[];
}

/**
 * In-memory {@link RepositoryGateway}. Repositories live in a map keyed by remote id; every
 * call is counted, runs its entry in `hooks`, and can be made to fail through `failures`.
 * A call made with an aborted signal rejects with an `aborted` error.
 */
export class FakeRepositoryGateway implements RepositoryGateway {
  readonly repositories = new Map<number, FakeRepositoryState>();
  readonly createdIssues: CreatedIssue[] = [];
  readonly archived: number[] = [];
  readonly failures = new Map<keyof FakeCallCounts, Error>();
  readonly hooks = new Map<keyof FakeCallCounts, () => void>();
  readonly teamMembers = new Map<string, Set<string>>();
  readonly calls: FakeCallCounts = {
    listActiveRepositories: 0,
    fileExists: 0,
    getFileContent: 0,
    getSettings: 0,
    getWorkflowPermissions: 0,
    createIssue: 0,
    archiveRepository: 0,
    listOpenIssues: 0,
    listOpenPullRequests: 0,
    listPullRequestComments: 0,
    createPullRequestComment: 0,
    listCheckRuns: 0,
    createCheckRun: 0,
    updateCheckRun: 0,
    isUserInTeam: 0
  };
  private issueSequence = 100;
  private commentSequence = 500;
  private checkRunSequence = 900;

  addRepository(input: AddRepositoryInput): FakeRepositoryState {
    const state: FakeRepositoryState = {
      repository: {
        id: input.id,
        name: input.name,
        fullName: `acme/${input.name}`,
        archived: input.archived ?? false,
        htmlUrl: `https://github.com/acme/${input.name}`
      },
      files: new Map(Object.entries(input.files ?? {})),
      workflowPermission: input.workflowPermission === undefined ? "read" : input.workflowPermission,
      issues: input.issues ?? [],
      pullRequests: input.pullRequests ?? [],
      comments: new Map(Object.entries(input.comments ?? {}).map(([number, comments]) => [Number(number), comments])),
      checkRuns: input.checkRuns ?? []
    };
    this.repositories.set(input.id, state);
    return state;
  }

  rename(id: number, name: string): void {
    const state = this.require(id);
    state.repository = { ...state.repository, name, fullName: `acme/${name}` };
  }

  async listActiveRepositories(options: GatewayCallOptions = {}): Promise<RemoteRepository[]> {
    this.track("listActiveRepositories", options);
    return [...this.repositories.values()].map((state) => ({ ...state.repository }));
  }

  async fileExists(repositoryId: number, filePath: string, options: GatewayCallOptions = {}): Promise<boolean> {
    this.track("fileExists", options);
    return this.repositories.get(repositoryId)?.files.has(filePath) ?? false;
  }

  async getFileContent(repositoryId: number, filePath: string, options: GatewayCallOptions = {}): Promise<string | null> {
    this.track("getFileContent", options);
    return this.repositories.get(repositoryId)?.files.get(filePath) ?? null;
  }

  async getSettings(repositoryId: number, options: GatewayCallOptions = {}): Promise<RemoteRepository | null> {
    this.track("getSettings", options);
    const state = this.repositories.get(repositoryId);
    return state ? { ...state.repository } : null;
  }

  async getWorkflowPermissions(repositoryId: number, options: GatewayCallOptions = {}): Promise<string | null> {
    this.track("getWorkflowPermissions", options);
    return this.repositories.get(repositoryId)?.workflowPermission ?? null;
  }

  async createIssue(
    repositoryId: number,
    title: string,
    body: string,
    labels: string[],
    options: GatewayCallOptions = {}
  ): Promise<RemoteIssue> {
    this.track("createIssue", options);
    const state = this.require(repositoryId);
    this.issueSequence += 1;
    const issue: RemoteIssue = {
      number: this.issueSequence,
      title,
      htmlUrl: `https://github.com/${state.repository.fullName}/issues/${this.issueSequence}`,
      labels: [...labels]
    };
    state.issues.push(issue);
    this.createdIssues.push({ repositoryId, title, body, labels: [...labels] });
    return issue;
  }

  async archiveRepository(repositoryId: number, options: GatewayCallOptions = {}): Promise<boolean> {
    this.track("archiveRepository", options);
    const state = this.repositories.get(repositoryId);
    if (!state) {
      return false;
    }

    state.repository = { ...state.repository, archived: true };
    this.archived.push(repositoryId);
    return true;
  }

  async listOpenIssues(repositoryId: number, label: string, options: GatewayCallOptions = {}): Promise<RemoteIssue[]> {
    this.track("listOpenIssues", options);
    const state = this.repositories.get(repositoryId);
    return state ? state.issues.filter((issue) => issue.labels.includes(label)) : [];
  }

  async listOpenPullRequests(repositoryId: number, options: GatewayCallOptions = {}): Promise<RemotePullRequest[]> {
    this.track("listOpenPullRequests", options);
    return this.repositories.get(repositoryId)?.pullRequests.map((pullRequest) => ({ ...pullRequest })) ?? [];
  }

  async listPullRequestComments(
    repositoryId: number,
    pullRequestNumber: number,
    options: GatewayCallOptions = {}
  ): Promise<RemoteComment[]> {
    this.track("listPullRequestComments", options);
    return [...(this.repositories.get(repositoryId)?.comments.get(pullRequestNumber) ?? [])];
  }

  async createPullRequestComment(
    repositoryId: number,
    pullRequestNumber: number,
    body: string,
    options: GatewayCallOptions = {}
  ): Promise<RemoteComment> {
    this.track("createPullRequestComment", options);
    const state = this.require(repositoryId);
    this.commentSequence += 1;
    const comment: RemoteComment = { id: this.commentSequence, body, userLogin: "compliance-app[bot]", userType: "Bot" };
    state.comments.set(pullRequestNumber, [...(state.comments.get(pullRequestNumber) ?? []), comment]);
    return comment;
  }

  async listCheckRuns(repositoryId: number, ref: string, options: GatewayCallOptions = {}): Promise<RemoteCheckRun[]> {
    this.track("listCheckRuns", options);
    const runs = this.repositories.get(repositoryId)?.checkRuns ?? [];
    return runs.filter((run) => run.headSha === ref).map((run) => ({ id: run.id, name: run.name }));
  }

  async createCheckRun(
    repositoryId: number,
    name: string,
    headSha: string,
    conclusion: CheckRunConclusion,
    options: GatewayCallOptions = {}
  ): Promise<RemoteCheckRun> {
    this.track("createCheckRun", options);
    const state = this.require(repositoryId);
    this.checkRunSequence += 1;
    const run: FakeCheckRun = { id: this.checkRunSequence, name, headSha, conclusion };
    state.checkRuns.push(run);
    return { id: run.id, name };
  }

  async updateCheckRun(
    repositoryId: number,
    checkRunId: number,
    conclusion: CheckRunConclusion,
    options: GatewayCallOptions = {}
  ): Promise<RemoteCheckRun> {
    this.track("updateCheckRun", options);
    const state = this.require(repositoryId);
    const run = state.checkRuns.find((candidate) => candidate.id === checkRunId);
    if (!run) {
      throw new GitHubApiError("not_found", `check run ${checkRunId} not found`, { status: 404 });
    }

    run.conclusion = conclusion;
    return { id: run.id, name: run.name };
  }

  async isUserInTeam(userToken: string, org: string, teamSlug: string, options: GatewayCallOptions = {}): Promise<boolean> {
    this.track("isUserInTeam", options);
    return this.teamMembers.get(`${org}/${teamSlug}`)?.has(userToken) ?? false;
  }

  private track(method: keyof FakeCallCounts, options: GatewayCallOptions): void {
    if (options.signal?.aborted) {
      throw new GitHubApiError("aborted", `${method} cancelled`);
    }

    this.calls[method] += 1;
    this.hooks.get(method)?.();
    const failure = this.failures.get(method);
    if (failure) {
      throw failure;
    }
  }

  private require(id: number): FakeRepositoryState {
    const state = this.repositories.get(id);
    if (!state) {
      throw new GitHubApiError("not_found", `repository ${id} not found`, { status: 404 });
    }

    return state;
  }
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers }
  });
}

export function requestUrl(input: string | URL | Request): string {
  return typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
}

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
}

export type FetchRoute = (request: RecordedRequest) => Response;

function readHeaders(init: RequestInit | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
}

/**
 * Fetch stand-in that records every request and answers through `route`.
 */
export function createRecordingFetch(route: FetchRoute): { fetchImpl: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const request: RecordedRequest = {
      url: requestUrl(input),
      method: init?.method ?? "GET",
      headers: readHeaders(init),
      body: typeof init?.body === "string" ? (JSON.parse(init.body) as unknown) : undefined
    };
    requests.push(request);
    return route(request);
  };

  return { fetchImpl, requests };
}
