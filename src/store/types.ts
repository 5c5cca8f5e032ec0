import type { IssueTemplate } from "../config/appConfig";

export type ComplianceStatus = "Pending" | "Compliant" | "NonCompliant";

export type ScanStatus = "InProgress" | "Completed" | "Failed";

export type ActionOutcome = "Success" | "Failed" | "Skipped";

export interface RepositoryRecord {
  id: number;
  githubId: number;
  name: string;
  complianceStatus: ComplianceStatus;
  lastScannedAt: string | null;
}

export interface PolicyRecord {
  id: number;
  key: string;
  description: string;
  actions: string[];
  issueTemplate: IssueTemplate | null;
  prCommentMessage: string | null;
  statusCheckName: string | null;
}

export interface ScanRecord {
  id: number;
  status: ScanStatus;
  startedAt: string;
  completedAt: string | null;
}

export interface ViolationRecord {
  id: number;
  scanId: number;
  repositoryId: number;
  policyId: number;
}

export interface ViolationDetail extends ViolationRecord {
  repository: RepositoryRecord;
  policy: PolicyRecord;
}

export interface ActionLogRecord {
  id: number;
  repositoryId: number;
  policyId: number;
  actionType: string;
  outcome: ActionOutcome;
  detail: string;
  timestamp: string;
}

export interface PolicyUpsert {
  key: string;
  description: string;
  actions: string[];
  issueTemplate?: IssueTemplate | null;
  prCommentMessage?: string | null;
  statusCheckName?: string | null;
}

export interface RemoteRepositoryRef {
  githubId: number;
  name: string;
}

export interface RepositoryReconciliation {
  created: number;
  renamed: number;
  removed: number;
  repositories: RepositoryRecord[];
}

export interface ViolationInsert {
  repositoryId: number;
  policyId: number;
}

export interface RepositoryStatusUpdate {
  repositoryId: number;
  status: ComplianceStatus;
}

export interface CompleteScanInput {
  violations: ViolationInsert[];
  repositoryStatuses: RepositoryStatusUpdate[];
  completedAt: string;
}

export type ActionLogInsert = Omit<ActionLogRecord, "id">;

export interface ActionLogFilter {
  repositoryId?: number;
  policyId?: number;
}

export interface IntegrityReport {
  orphanViolations: number;
  orphanActionLogs: number;
}

/**
 * Relational persistence for the compliance catalog. Implementations guarantee one
 * violation row per (scan, repository, policy) and cascade deletes of repositories and
 * policies to their violations and action-log entries.
 */
export interface ComplianceStore {
  createScan: (startedAt: string) => ScanRecord;
  getScan: (scanId: number) => ScanRecord | null;
  listScans: () => ScanRecord[];
  /** Moves an in-progress scan to Completed together with its violations, atomically. Returns rows inserted. */
  completeScan: (scanId: number, input: CompleteScanInput) => number;
  /** Returns false when the scan was not in progress. */
  failScan: (scanId: number, completedAt: string) => boolean;
  upsertPolicies: (policies: PolicyUpsert[]) => PolicyRecord[];
  listPolicies: () => PolicyRecord[];
  deletePolicy: (key: string) => boolean;
  reconcileRepositories: (remote: RemoteRepositoryRef[]) => RepositoryReconciliation;
  listRepositories: () => RepositoryRecord[];
  insertViolations: (scanId: number, violations: ViolationInsert[]) => number;
  listViolationsForScan: (scanId: number) => ViolationDetail[];
  listViolationsForRepository: (repositoryId: number) => ViolationRecord[];
  appendActionLog: (entry: ActionLogInsert) => ActionLogRecord;
  listActionLogs: (filter?: ActionLogFilter) => ActionLogRecord[];
  verifyIntegrity: () => IntegrityReport;
  close: () => void;
}
