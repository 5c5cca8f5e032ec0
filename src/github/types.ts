export interface RemoteRepository {
  id: number;
  name: string;
  fullName: string;
  archived: boolean;
  htmlUrl: string | null;
}

export interface RemoteIssue {
  number: number;
  title: string;
  htmlUrl: string;
  labels: string[];
}

export interface RemotePullRequest {
  number: number;
  title: string;
  /** Head commit; null when GitHub reports none. */
  headSha: string | null;
  htmlUrl: string;
}

export interface RemoteComment {
  id: number;
  body: string;
  userLogin: string | null;
  /** Account type as GitHub reports it, e.g. `User` or `Bot`. */
  userType: string | null;
}

export type CheckRunConclusion = "success" | "failure" | "neutral";

export interface RemoteCheckRun {
  id: number;
  name: string;
}

export interface GatewayCallOptions {
  signal?: AbortSignal;
}

/**
 * Capabilities the compliance core needs from the remote API. A 404 is never an error at
 * this layer: it maps to `false`, `null` or an empty list. Everything else raises.
 */
export interface RepositoryGateway {
  listActiveRepositories: (options?: GatewayCallOptions) => Promise<RemoteRepository[]>;
  fileExists: (repositoryId: number, filePath: string, options?: GatewayCallOptions) => Promise<boolean>;
  /** Decoded UTF-8 file content, or null when the path is absent or not a file. */
  getFileContent: (repositoryId: number, filePath: string, options?: GatewayCallOptions) => Promise<string | null>;
  getSettings: (repositoryId: number, options?: GatewayCallOptions) => Promise<RemoteRepository | null>;
  /** `default_workflow_permissions`, or null when Actions is disabled or unavailable. */
  getWorkflowPermissions: (repositoryId: number, options?: GatewayCallOptions) => Promise<string | null>;
  createIssue: (
    repositoryId: number,
    title: string,
    body: string,
    labels: string[],
    options?: GatewayCallOptions
  ) => Promise<RemoteIssue>;
  /** Resolves false when the repository no longer exists. */
  archiveRepository: (repositoryId: number, options?: GatewayCallOptions) => Promise<boolean>;
  listOpenIssues: (repositoryId: number, label: string, options?: GatewayCallOptions) => Promise<RemoteIssue[]>;
  listOpenPullRequests: (repositoryId: number, options?: GatewayCallOptions) => Promise<RemotePullRequest[]>;
  listPullRequestComments: (
    repositoryId: number,
    pullRequestNumber: number,
    options?: GatewayCallOptions
  ) => Promise<RemoteComment[]>;
  createPullRequestComment: (
    repositoryId: number,
    pullRequestNumber: number,
    body: string,
    options?: GatewayCallOptions
  ) => Promise<RemoteComment>;
  /** Check runs on a commit; empty when the commit is unknown. */
  listCheckRuns: (repositoryId: number, ref: string, options?: GatewayCallOptions) => Promise<RemoteCheckRun[]>;
  createCheckRun: (
    repositoryId: number,
    name: string,
    headSha: string,
    conclusion: CheckRunConclusion,
    options?: GatewayCallOptions
  ) => Promise<RemoteCheckRun>;
  updateCheckRun: (
    repositoryId: number,
    checkRunId: number,
    conclusion: CheckRunConclusion,
    options?: GatewayCallOptions
  ) => Promise<RemoteCheckRun>;
  isUserInTeam: (userToken: string, org: string, teamSlug: string, options?: GatewayCallOptions) => Promise<boolean>;
}
