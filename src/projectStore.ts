import { ConflictError } from "./errors.js";
import { isUniqueViolation, type Db } from "./storage.js";
import type { Project } from "./types.js";

interface ProjectRow {
  id: string;
  name: string;
  key: string;
  description: string | null;
  owner_id: string;
  default_assignee_id: string | null;
  issue_counter: number;
  created_at: string;
  updated_at: string;
}

function toProject(row: ProjectRow): Project {
  return {
    id: row.id,
    name: row.name,
    key: row.key,
    description: row.description,
    ownerId: row.owner_id,
    defaultAssigneeId: row.default_assignee_id,
    issueCounter: row.issue_counter,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rethrowKeyConflict(err: unknown, key: string): never {
  if (isUniqueViolation(err)) {
    throw new ConflictError(`Project key '${key}' already exists`);
  }
  throw err;
}

export function findProjectById(db: Db, id: string): Project | null {
  const row = db
    .prepare<[string], ProjectRow>("SELECT * FROM projects WHERE id = ?")
    .get(id);
  return row ? toProject(row) : null;
}

/** Keys compare case-insensitively (the column is COLLATE NOCASE). */
export function findProjectByKey(db: Db, key: string): Project | null {
  const row = db
    .prepare<[string], ProjectRow>("SELECT * FROM projects WHERE key = ?")
    .get(key.trim());
  return row ? toProject(row) : null;
}

export function isProjectKeyTaken(db: Db, key: string, excludeId?: string): boolean {
  const row = db
    .prepare<[string, string], { id: string }>(
      "SELECT id FROM projects WHERE key = ? AND id != ?"
    )
    .get(key, excludeId ?? "");
  return row !== undefined;
}

export function insertProject(db: Db, project: Project): void {
  try {
    db.prepare(
      `INSERT INTO projects
         (id, name, key, description, owner_id, default_assignee_id, issue_counter, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
    ).run(
      project.id,
      project.name,
      project.key,
      project.description,
      project.ownerId,
      project.defaultAssigneeId,
      project.issueCounter,
      project.createdAt,
      project.updatedAt
    );
  } catch (err) {
    rethrowKeyConflict(err, project.key);
  }
}

/** Write back the editable columns. The issue counter is only touched by {@link allocateIssueNumber}. */
export function saveProject(db: Db, project: Project): void {
  try {
    db.prepare(
      `UPDATE projects
          SET name = ?, key = ?, description = ?, default_assignee_id = ?, updated_at = ?
        WHERE id = ?`
    ).run(
      project.name,
      project.key,
      project.description,
      project.defaultAssigneeId,
      project.updatedAt,
      project.id
    );
  } catch (err) {
    rethrowKeyConflict(err, project.key);
  }
}

export function deleteProjectRow(db: Db, id: string): boolean {
  return db.prepare("DELETE FROM projects WHERE id = ?").run(id).changes > 0;
}

export function listProjects(db: Db): Project[] {
  return db
    .prepare<[], ProjectRow>("SELECT * FROM projects ORDER BY name, key")
    .all()
    .map(toProject);
}

export function listProjectsOwnedBy(db: Db, ownerId: string): Project[] {
  return db
    .prepare<[string], ProjectRow>(
      "SELECT * FROM projects WHERE owner_id = ? ORDER BY name, key"
    )
    .all(ownerId)
    .map(toProject);
}

/**
 * Bump the project's counter and return the new value. Must run inside a
 * write transaction; the UPDATE itself is atomic, so two allocations can
 * never observe the same value.
 */
export function allocateIssueNumber(db: Db, projectId: string): number {
  const row = db
    .prepare<[string], { issue_counter: number }>(
      `UPDATE projects SET issue_counter = issue_counter + 1
        WHERE id = ?
        RETURNING issue_counter`
    )
    .get(projectId);
  if (!row) {
    throw new Error(`Cannot allocate issue number: project ${projectId} vanished`);
  }
  return row.issue_counter;
}
