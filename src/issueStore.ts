import { parseEnum, placeholders, type Db } from "./storage.js";
import {
  ISSUE_STATUSES,
  ISSUE_TYPES,
  PRIORITIES,
  type Issue,
  type IssueStatus,
  type IssueType,
  type Priority,
} from "./types.js";

interface IssueRow {
  id: string;
  project_id: string;
  project_key: string;
  issue_number: number;
  title: string;
  description: string | null;
  issue_type: string;
  status: string;
  priority: string;
  reporter_id: string;
  assignee_id: string | null;
  created_at: string;
  updated_at: string;
}

// Every read joins the project so the display key is always resolved.
const SELECT_ISSUES = `
  SELECT i.*, p.key AS project_key
    FROM issues i
    JOIN projects p ON p.id = i.project_id`;

function toIssue(row: IssueRow): Issue {
  return {
    id: row.id,
    projectId: row.project_id,
    projectKey: row.project_key,
    issueNumber: row.issue_number,
    key: `${row.project_key}-${row.issue_number}`,
    title: row.title,
    description: row.description,
    issueType: parseEnum(ISSUE_TYPES, row.issue_type, "issues.issue_type"),
    status: parseEnum(ISSUE_STATUSES, row.status, "issues.status"),
    priority: parseEnum(PRIORITIES, row.priority, "issues.priority"),
    reporterId: row.reporter_id,
    assigneeId: row.assignee_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export interface IssueFilters {
  projectId?: string;
  /** Restrict to these projects; an empty list matches nothing. */
  projectIds?: readonly string[];
  assigneeId?: string;
  reporterId?: string;
  status?: IssueStatus;
  issueType?: IssueType;
}

export function findIssueById(db: Db, id: string): Issue | null {
  const row = db
    .prepare<[string], IssueRow>(`${SELECT_ISSUES} WHERE i.id = ?`)
    .get(id);
  return row ? toIssue(row) : null;
}

export function findIssueByNumber(
  db: Db,
  projectId: string,
  issueNumber: number
): Issue | null {
  const row = db
    .prepare<[string, number], IssueRow>(
      `${SELECT_ISSUES} WHERE i.project_id = ? AND i.issue_number = ?`
    )
    .get(projectId, issueNumber);
  return row ? toIssue(row) : null;
}

export function insertIssue(db: Db, issue: Issue): void {
  db.prepare(
    `INSERT INTO issues
       (id, project_id, issue_number, title, description, issue_type, status,
        priority, reporter_id, assignee_id, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  ).run(
    issue.id,
    issue.projectId,
    issue.issueNumber,
    issue.title,
    issue.description,
    issue.issueType,
    issue.status,
    issue.priority,
    issue.reporterId,
    issue.assigneeId,
    issue.createdAt,
    issue.updatedAt
  );
}

/** Write back the mutable columns. Project, number and reporter never change. */
export function saveIssue(db: Db, issue: Issue): void {
  db.prepare(
    `UPDATE issues
        SET title = ?, description = ?, issue_type = ?, status = ?, priority = ?,
            assignee_id = ?, updated_at = ?
      WHERE id = ?`
  ).run(
    issue.title,
    issue.description,
    issue.issueType,
    issue.status,
    issue.priority,
    issue.assigneeId,
    issue.updatedAt,
    issue.id
  );
}

export function deleteIssueRow(db: Db, id: string): boolean {
  return db.prepare("DELETE FROM issues WHERE id = ?").run(id).changes > 0;
}

function whereClause(filters: IssueFilters): { sql: string; params: string[] } {
  const conditions: string[] = [];
  const params: string[] = [];

  if (filters.projectId !== undefined) {
    conditions.push("i.project_id = ?");
    params.push(filters.projectId);
  }
  if (filters.projectIds !== undefined) {
    if (filters.projectIds.length === 0) {
      conditions.push("0");
    } else {
      conditions.push(`i.project_id IN (${placeholders(filters.projectIds.length)})`);
      params.push(...filters.projectIds);
    }
  }
  if (filters.assigneeId !== undefined) {
    conditions.push("i.assignee_id = ?");
    params.push(filters.assigneeId);
  }
  if (filters.reporterId !== undefined) {
    conditions.push("i.reporter_id = ?");
    params.push(filters.reporterId);
  }
  if (filters.status !== undefined) {
    conditions.push("i.status = ?");
    params.push(filters.status);
  }
  if (filters.issueType !== undefined) {
    conditions.push("i.issue_type = ?");
    params.push(filters.issueType);
  }

  return {
    sql: conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "",
    params,
  };
}

/** One page of matching issues, most recently updated first, plus the exact match count. */
export function queryIssues(
  db: Db,
  filters: IssueFilters,
  skip: number,
  limit: number
): { issues: Issue[]; total: number } {
  const { sql, params } = whereClause(filters);

  const issues = db
    .prepare<(string | number)[], IssueRow>(
      `${SELECT_ISSUES} ${sql}
        ORDER BY i.updated_at DESC, i.issue_number DESC
        LIMIT ? OFFSET ?`
    )
    .all(...params, limit, skip)
    .map(toIssue);
  const counted = db
    .prepare<string[], { total: number }>(
      `SELECT COUNT(*) AS total FROM issues i ${sql}`
    )
    .get(...params);

  return { issues, total: counted?.total ?? 0 };
}

/**
 * Stream every issue matching the filters, row by row, without loading the
 * whole result set. The database connection is busy until iteration ends.
 */
export function* iterateIssues(
  db: Db,
  filters: IssueFilters
): Generator<Issue, void, undefined> {
  const { sql, params } = whereClause(filters);
  const rows = db
    .prepare<string[], IssueRow>(
      `${SELECT_ISSUES} ${sql} ORDER BY i.updated_at DESC, i.issue_number DESC`
    )
    .iterate(...params);
  for (const row of rows) {
    yield toIssue(row);
  }
}

/** Issue counts per status; statuses with no issues are reported as 0. */
export function countIssuesByStatus(
  db: Db,
  projectId: string
): Record<IssueStatus, number> {
  const counts: Record<IssueStatus, number> = {
    backlog: 0,
    to_do: 0,
    in_progress: 0,
    done: 0,
  };
  const rows = db
    .prepare<[string], { status: string; count: number }>(
      `SELECT status, COUNT(*) AS count FROM issues
        WHERE project_id = ?
        GROUP BY status`
    )
    .all(projectId);
  for (const row of rows) {
    counts[parseEnum(ISSUE_STATUSES, row.status, "issues.status")] = row.count;
  }
  return counts;
}

/** Issues in `done` whose last update is at or after `since` (ISO timestamp). */
export function countCompletedSince(
  db: Db,
  filters: Pick<IssueFilters, "projectId" | "assigneeId">,
  since: string
): number {
  const { sql, params } = whereClause({ ...filters, status: "done" });
  const row = db
    .prepare<string[], { total: number }>(
      `SELECT COUNT(*) AS total FROM issues i ${sql} AND i.updated_at >= ?`
    )
    .get(...params, since);
  return row?.total ?? 0;
}

export interface WorkloadRow {
  assigneeId: string;
  priority: Priority;
  count: number;
}

/** Open (non-done) assigned issues in the given projects, counted per assignee and priority. */
export function countOpenWorkload(db: Db, projectIds: readonly string[]): WorkloadRow[] {
  if (projectIds.length === 0) return [];
  return db
    .prepare<string[], { assignee_id: string; priority: string; count: number }>(
      `SELECT assignee_id, priority, COUNT(*) AS count FROM issues
        WHERE project_id IN (${placeholders(projectIds.length)})
          AND status != 'done'
          AND assignee_id IS NOT NULL
        GROUP BY assignee_id, priority`
    )
    .all(...projectIds)
    .map((row) => ({
      assigneeId: row.assignee_id,
      priority: parseEnum(PRIORITIES, row.priority, "issues.priority"),
      count: row.count,
    }));
}
