import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import initSqlJs, { type Database, type SqlJsStatic, type SqlValue } from "sql.js";

import type { IssueTemplate } from "../config/appConfig";
import { ComplianceError } from "../errors";
import { asNonEmptyString, asObject } from "../github/payload";
import type {
  ActionLogFilter,
  ActionLogInsert,
  ActionLogRecord,
  ActionOutcome,
  ComplianceStatus,
  ComplianceStore,
  CompleteScanInput,
  IntegrityReport,
  PolicyRecord,
  PolicyUpsert,
  RemoteRepositoryRef,
  RepositoryReconciliation,
  RepositoryRecord,
  ScanRecord,
  ScanStatus,
  ViolationDetail,
  ViolationInsert,
  ViolationRecord
} from "./types";

type Row = Record<string, SqlValue>;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS repositories (
    id                INTEGER PRIMARY KEY AUTOINCREMENT,
    github_id         INTEGER NOT NULL UNIQUE,
    name              TEXT    NOT NULL,
    compliance_status TEXT    NOT NULL DEFAULT 'Pending'
                      CHECK (compliance_status IN ('Pending', 'Compliant', 'NonCompliant')),
    last_scanned_at   TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_repositories_name ON repositories(name);

  CREATE TABLE IF NOT EXISTS policies (
    id                 INTEGER PRIMARY KEY AUTOINCREMENT,
    policy_key         TEXT    NOT NULL UNIQUE,
    description        TEXT    NOT NULL,
    actions            TEXT    NOT NULL,
    issue_template     TEXT,
    pr_comment_message TEXT,
    status_check_name  TEXT
  );

  CREATE TABLE IF NOT EXISTS scans (
    id           INTEGER PRIMARY KEY AUTOINCREMENT,
    status       TEXT    NOT NULL CHECK (status IN ('InProgress', 'Completed', 'Failed')),
    started_at   TEXT    NOT NULL,
    completed_at TEXT
  );

  CREATE TABLE IF NOT EXISTS violations (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    scan_id       INTEGER NOT NULL REFERENCES scans(id) ON DELETE CASCADE,
    repository_id INTEGER NOT NULL REFERENCES repositories(id) ON DELETE CASCADE,
    policy_id     INTEGER NOT NULL REFERENCES policies(id) ON DELETE CASCADE,
    UNIQUE (scan_id, repository_id, policy_id)
  );

  CREATE INDEX IF NOT EXISTS idx_violations_repository ON violations(repository_id);

  CREATE TABLE IF NOT EXISTS action_log (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    repository_id INTEGER NOT NULL REFERENCES repositories(id) ON DELETE CASCADE,
    policy_id     INTEGER NOT NULL REFERENCES policies(id) ON DELETE CASCADE,
    action_type   TEXT    NOT NULL,
    outcome       TEXT    NOT NULL CHECK (outcome IN ('Success', 'Failed', 'Skipped')),
    detail        TEXT    NOT NULL,
    timestamp     TEXT    NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_action_log_repository ON action_log(repository_id);
`;

const COMPLIANCE_STATUSES: readonly ComplianceStatus[] = ["Pending", "Compliant", "NonCompliant"];
const SCAN_STATUSES: readonly ScanStatus[] = ["InProgress", "Completed", "Failed"];
const ACTION_OUTCOMES: readonly ActionOutcome[] = ["Success", "Failed", "Skipped"];

let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs();
  }

  return sqlJs;
}

function corrupt(column: string, value: SqlValue | undefined): ComplianceError {
  return new ComplianceError("E_STORE_CORRUPT", `unexpected ${column} value '${String(value)}'`);
}

function intColumn(row: Row, column: string): number {
  const value = row[column];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw corrupt(column, value);
  }

  return value;
}

function textColumn(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== "string") {
    throw corrupt(column, value);
  }

  return value;
}

function nullableTextColumn(row: Row, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value !== "string") {
    throw corrupt(column, value);
  }

  return value;
}

function oneOf<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new ComplianceError("E_STORE_CORRUPT", `unexpected ${column} value '${value}'`);
  }

  return match;
}

function parseActions(text: string): string[] {
  const parsed = JSON.parse(text) as unknown;
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === "string") : [];
}

function parseIssueTemplate(text: string | null): IssueTemplate | null {
  if (text === null) {
    return null;
  }

  const obj = asObject(JSON.parse(text) as unknown);
  if (!obj) {
    return null;
  }

  const template: IssueTemplate = {};
  const title = asNonEmptyString(obj.title);
  const body = asNonEmptyString(obj.body);
  if (title) {
    template.title = title;
  }
  if (body) {
    template.body = body;
  }
  if (Array.isArray(obj.labels)) {
    template.labels = obj.labels.filter((label): label is string => typeof label === "string");
  }

  return template;
}

function mapRepository(row: Row, prefix = ""): RepositoryRecord {
  return {
    id: intColumn(row, `${prefix}id`),
    githubId: intColumn(row, `${prefix}github_id`),
    name: textColumn(row, `${prefix}name`),
    complianceStatus: oneOf(COMPLIANCE_STATUSES, textColumn(row, `${prefix}compliance_status`), "compliance_status"),
    lastScannedAt: nullableTextColumn(row, `${prefix}last_scanned_at`)
  };
}

function mapPolicy(row: Row, prefix = ""): PolicyRecord {
  return {
    id: intColumn(row, `${prefix}id`),
    key: textColumn(row, `${prefix}policy_key`),
    description: textColumn(row, `${prefix}description`),
    actions: parseActions(textColumn(row, `${prefix}actions`)),
    issueTemplate: parseIssueTemplate(nullableTextColumn(row, `${prefix}issue_template`)),
    prCommentMessage: nullableTextColumn(row, `${prefix}pr_comment_message`),
    statusCheckName: nullableTextColumn(row, `${prefix}status_check_name`)
  };
}

function mapScan(row: Row): ScanRecord {
  return {
    id: intColumn(row, "id"),
    status: oneOf(SCAN_STATUSES, textColumn(row, "status"), "status"),
    startedAt: textColumn(row, "started_at"),
    completedAt: nullableTextColumn(row, "completed_at")
  };
}

function mapViolation(row: Row): ViolationRecord {
  return {
    id: intColumn(row, "id"),
    scanId: intColumn(row, "scan_id"),
    repositoryId: intColumn(row, "repository_id"),
    policyId: intColumn(row, "policy_id")
  };
}

function mapActionLog(row: Row): ActionLogRecord {
  return {
    id: intColumn(row, "id"),
    repositoryId: intColumn(row, "repository_id"),
    policyId: intColumn(row, "policy_id"),
    actionType: textColumn(row, "action_type"),
    outcome: oneOf(ACTION_OUTCOMES, textColumn(row, "outcome"), "outcome"),
    detail: textColumn(row, "detail"),
    timestamp: textColumn(row, "timestamp")
  };
}

/**
 * {@link ComplianceStore} on SQLite compiled to WebAssembly (sql.js). The database lives in
 * memory; a file-backed store loads its file on open and writes the whole image back after
 * every committed change.
 */
export class SqliteComplianceStore implements ComplianceStore {
  private readonly db: Database;
  private readonly filePath: string | null;

  private constructor(db: Database, filePath: string | null) {
    this.db = db;
    this.filePath = filePath;
    this.db.run("PRAGMA foreign_keys = ON");
    this.db.exec(SCHEMA);
    this.persist();
  }

  /** Opens (or creates) the database at `dbPath`; `:memory:` keeps nothing on disk. */
  static async open(dbPath: string): Promise<SqliteComplianceStore> {
    const sql = await loadSqlJs();
    if (dbPath === ":memory:") {
      return new SqliteComplianceStore(new sql.Database(), null);
    }

    mkdirSync(dirname(dbPath), { recursive: true });
    const image = existsSync(dbPath) ? readFileSync(dbPath) : null;
    return new SqliteComplianceStore(new sql.Database(image), dbPath);
  }

  createScan(startedAt: string): ScanRecord {
    const id = this.insert("INSERT INTO scans (status, started_at) VALUES (?, ?)", ["InProgress", startedAt]);
    this.persist();

    return { id, status: "InProgress", startedAt, completedAt: null };
  }

  getScan(scanId: number): ScanRecord | null {
    const row = this.get("SELECT * FROM scans WHERE id = ?", [scanId]);
    return row ? mapScan(row) : null;
  }

  listScans(): ScanRecord[] {
    return this.all("SELECT * FROM scans ORDER BY id").map(mapScan);
  }

  completeScan(scanId: number, input: CompleteScanInput): number {
    return this.transaction((): number => {
      const inserted = this.insertViolationRows(scanId, input.violations);

      for (const update of input.repositoryStatuses) {
        this.run("UPDATE repositories SET compliance_status = ?, last_scanned_at = ? WHERE id = ?", [
          update.status,
          input.completedAt,
          update.repositoryId
        ]);
      }

      const finished = this.run(
        "UPDATE scans SET status = 'Completed', completed_at = ? WHERE id = ? AND status = 'InProgress'",
        [input.completedAt, scanId]
      );
      if (finished === 0) {
        throw new ComplianceError("E_SCAN_STATE", `scan ${scanId} is not in progress`, { scanId });
      }

      return inserted;
    });
  }

  failScan(scanId: number, completedAt: string): boolean {
    const changed = this.run(
      "UPDATE scans SET status = 'Failed', completed_at = ? WHERE id = ? AND status = 'InProgress'",
      [completedAt, scanId]
    );
    this.persist();

    return changed > 0;
  }

  upsertPolicies(policies: PolicyUpsert[]): PolicyRecord[] {
    return this.transaction((): PolicyRecord[] => {
      for (const policy of policies) {
        this.run(
          `INSERT INTO policies (policy_key, description, actions, issue_template, pr_comment_message, status_check_name)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(policy_key) DO UPDATE SET
             description = excluded.description,
             actions = excluded.actions,
             issue_template = excluded.issue_template,
             pr_comment_message = excluded.pr_comment_message,
             status_check_name = excluded.status_check_name`,
          [
            policy.key,
            policy.description,
            JSON.stringify(policy.actions),
            policy.issueTemplate ? JSON.stringify(policy.issueTemplate) : null,
            policy.prCommentMessage ?? null,
            policy.statusCheckName ?? null
          ]
        );
      }

      const records = new Map<string, PolicyRecord>();
      for (const policy of policies) {
        const row = this.get("SELECT * FROM policies WHERE policy_key = ?", [policy.key]);
        if (row) {
          records.set(policy.key, mapPolicy(row));
        }
      }

      return [...records.values()];
    });
  }

  listPolicies(): PolicyRecord[] {
    return this.all("SELECT * FROM policies ORDER BY id").map((row) => mapPolicy(row));
  }

  deletePolicy(key: string): boolean {
    const changed = this.run("DELETE FROM policies WHERE policy_key = ?", [key]);
    this.persist();

    return changed > 0;
  }

  reconcileRepositories(remote: RemoteRepositoryRef[]): RepositoryReconciliation {
    return this.transaction((): RepositoryReconciliation => {
      const remoteById = new Map<number, RemoteRepositoryRef>();
      for (const repository of remote) {
        remoteById.set(repository.githubId, repository);
      }

      const existing = new Map<number, RepositoryRecord>();
      for (const row of this.all("SELECT * FROM repositories")) {
        const record = mapRepository(row);
        existing.set(record.githubId, record);
      }

      let created = 0;
      let renamed = 0;
      let removed = 0;

      for (const repository of remoteById.values()) {
        const current = existing.get(repository.githubId);
        if (!current) {
          this.run("INSERT INTO repositories (github_id, name, compliance_status) VALUES (?, ?, 'Pending')", [
            repository.githubId,
            repository.name
          ]);
          created += 1;
        } else if (current.name !== repository.name) {
          this.run("UPDATE repositories SET name = ? WHERE id = ?", [repository.name, current.id]);
          renamed += 1;
        }
      }

      for (const record of existing.values()) {
        if (!remoteById.has(record.githubId)) {
          this.run("DELETE FROM repositories WHERE id = ?", [record.id]);
          removed += 1;
        }
      }

      const repositories: RepositoryRecord[] = [];
      for (const repository of remoteById.values()) {
        const row = this.get("SELECT * FROM repositories WHERE github_id = ?", [repository.githubId]);
        if (row) {
          repositories.push(mapRepository(row));
        }
      }

      return { created, renamed, removed, repositories };
    });
  }

  listRepositories(): RepositoryRecord[] {
    return this.all("SELECT * FROM repositories ORDER BY id").map((row) => mapRepository(row));
  }

  insertViolations(scanId: number, violations: ViolationInsert[]): number {
    return this.transaction((): number => this.insertViolationRows(scanId, violations));
  }

  listViolationsForScan(scanId: number): ViolationDetail[] {
    const rows = this.all(
      `SELECT v.id, v.scan_id, v.repository_id, v.policy_id,
              r.id                AS repo_id,
              r.github_id         AS repo_github_id,
              r.name              AS repo_name,
              r.compliance_status AS repo_compliance_status,
              r.last_scanned_at   AS repo_last_scanned_at,
              p.policy_key         AS policy_policy_key,
              p.description        AS policy_description,
              p.actions            AS policy_actions,
              p.issue_template     AS policy_issue_template,
              p.pr_comment_message AS policy_pr_comment_message,
              p.status_check_name  AS policy_status_check_name
       FROM violations v
       JOIN repositories r ON r.id = v.repository_id
       JOIN policies p ON p.id = v.policy_id
       WHERE v.scan_id = ?
       ORDER BY v.id`,
      [scanId]
    );

    return rows.map((row) => ({
      ...mapViolation(row),
      repository: mapRepository(row, "repo_"),
      policy: mapPolicy(row, "policy_")
    }));
  }

  listViolationsForRepository(repositoryId: number): ViolationRecord[] {
    return this.all("SELECT * FROM violations WHERE repository_id = ? ORDER BY id", [repositoryId]).map(mapViolation);
  }

  appendActionLog(entry: ActionLogInsert): ActionLogRecord {
    const id = this.insert(
      `INSERT INTO action_log (repository_id, policy_id, action_type, outcome, detail, timestamp)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [entry.repositoryId, entry.policyId, entry.actionType, entry.outcome, entry.detail, entry.timestamp]
    );
    this.persist();

    return { id, ...entry };
  }

  listActionLogs(filter: ActionLogFilter = {}): ActionLogRecord[] {
    const repositoryId = filter.repositoryId ?? null;
    const policyId = filter.policyId ?? null;

    return this.all(
      `SELECT * FROM action_log
       WHERE (? IS NULL OR repository_id = ?)
         AND (? IS NULL OR policy_id = ?)
       ORDER BY id`,
      [repositoryId, repositoryId, policyId, policyId]
    ).map(mapActionLog);
  }

  verifyIntegrity(): IntegrityReport {
    const orphanViolations = this.get(`
      SELECT COUNT(*) AS count FROM violations v
      WHERE NOT EXISTS (SELECT 1 FROM repositories r WHERE r.id = v.repository_id)
         OR NOT EXISTS (SELECT 1 FROM policies p WHERE p.id = v.policy_id)
         OR NOT EXISTS (SELECT 1 FROM scans s WHERE s.id = v.scan_id)
    `);
    const orphanActionLogs = this.get(`
      SELECT COUNT(*) AS count FROM action_log a
      WHERE NOT EXISTS (SELECT 1 FROM repositories r WHERE r.id = a.repository_id)
         OR NOT EXISTS (SELECT 1 FROM policies p WHERE p.id = a.policy_id)
    `);

    return {
      orphanViolations: orphanViolations ? intColumn(orphanViolations, "count") : 0,
      orphanActionLogs: orphanActionLogs ? intColumn(orphanActionLogs, "count") : 0
    };
  }

  close(): void {
    this.persist();
    this.db.close();
  }

  private insertViolationRows(scanId: number, violations: ViolationInsert[]): number {
    let inserted = 0;
    for (const violation of violations) {
      inserted += this.run("INSERT OR IGNORE INTO violations (scan_id, repository_id, policy_id) VALUES (?, ?, ?)", [
        scanId,
        violation.repositoryId,
        violation.policyId
      ]);
    }

    return inserted;
  }

  private all(sql: string, params: SqlValue[] = []): Row[] {
    const statement = this.db.prepare(sql);
    try {
      statement.bind(params);
      const rows: Row[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  private get(sql: string, params: SqlValue[] = []): Row | null {
    return this.all(sql, params)[0] ?? null;
  }

  /** Runs a write and returns the number of rows it changed. */
  private run(sql: string, params: SqlValue[]): number {
    this.db.run(sql, params);
    return this.db.getRowsModified();
  }

  private insert(sql: string, params: SqlValue[]): number {
    this.db.run(sql, params);
    const row = this.get("SELECT last_insert_rowid() AS id");
    if (!row) {
      throw new ComplianceError("E_STORE_CORRUPT", "insert returned no row id");
    }

    return intColumn(row, "id");
  }

  private transaction<T>(work: () => T): T {
    this.db.run("BEGIN");
    let result: T;
    try {
      result = work();
      this.db.run("COMMIT");
    } catch (error) {
      this.db.run("ROLLBACK");
      throw error;
    }

    this.persist();
    return result;
  }

  private persist(): void {
    if (!this.filePath) {
      return;
    }

    writeFileSync(this.filePath, this.db.export());
    // exporting reopens the connection, which resets connection pragmas
    this.db.run("PRAGMA foreign_keys = ON");
  }
}
