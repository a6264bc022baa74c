import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { allocateIssueNumber } from "./projectStore.js";
import {
  isUniqueViolation,
  openDatabase,
  parseEnum,
  placeholders,
  writeTransaction,
  type Db,
} from "./storage.js";
import { ISSUE_STATUSES } from "./types.js";

const T = "2026-01-01T00:00:00.000Z";

function insertUser(db: Db, id: string, email: string): void {
  db.prepare(
    "INSERT INTO users (id, email, full_name, created_at, updated_at) VALUES (?, ?, ?, ?, ?)"
  ).run(id, email, id, T, T);
}

function insertProject(db: Db, id: string, key: string, ownerId: string): void {
  db.prepare(
    "INSERT INTO projects (id, name, key, owner_id, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)"
  ).run(id, id, key, ownerId, T, T);
}

function insertIssue(db: Db, id: string, projectId: string, number: number): void {
  db.prepare(
    `INSERT INTO issues (id, project_id, issue_number, title, reporter_id, created_at, updated_at)
     VALUES (?, ?, ?, 'T', 'u1', ?, ?)`
  ).run(id, projectId, number, T, T);
}

const count = (db: Db, table: "issues" | "projects"): number =>
  db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0;

// ---------------------------------------------------------------------------
// openDatabase on disk
// ---------------------------------------------------------------------------
describe("openDatabase (file)", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "taskboard-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true });
  });

  it("creates the file in WAL mode and keeps data across reopen", () => {
    const file = path.join(tempDir, "board.db");
    const first = openDatabase(file);
    expect(first.pragma("journal_mode", { simple: true })).toBe("wal");
    insertUser(first, "u1", "a@example.com");
    first.close();

    const second = openDatabase(file);
    const row = second.prepare<[], { email: string }>("SELECT email FROM users").get();
    expect(row?.email).toBe("a@example.com");
    second.close();
  });

  it("never hands two connections the same issue number", () => {
    const file = path.join(tempDir, "board.db");
    const a = openDatabase(file);
    const b = openDatabase(file);
    b.pragma("busy_timeout = 0");
    insertUser(a, "u1", "a@example.com");
    insertProject(a, "p1", "DEMO", "u1");

    a.prepare("BEGIN IMMEDIATE").run();
    expect(allocateIssueNumber(a, "p1")).toBe(1);
    expect(() => writeTransaction(b, () => allocateIssueNumber(b, "p1"))).toThrow(
      "database is locked"
    );
    a.prepare("COMMIT").run();

    expect(writeTransaction(b, () => allocateIssueNumber(b, "p1"))).toBe(2);
    expect(writeTransaction(a, () => allocateIssueNumber(a, "p1"))).toBe(3);
    a.close();
    b.close();
  });
});

// ---------------------------------------------------------------------------
// schema constraints
// ---------------------------------------------------------------------------
describe("schema", () => {
  let db: Db;

  beforeEach(() => {
    db = openDatabase(":memory:");
    insertUser(db, "u1", "a@example.com");
    insertProject(db, "p1", "DEMO", "u1");
  });

  afterEach(() => {
    db.close();
  });

  it("enforces foreign keys", () => {
    expect(db.pragma("foreign_keys", { simple: true })).toBe(1);
  });

  it("compares emails and project keys case-insensitively", () => {
    expect(() => insertUser(db, "u2", "A@EXAMPLE.COM")).toThrow();
    let caught: unknown;
    try {
      insertProject(db, "p2", "demo", "u1");
    } catch (err) {
      caught = err;
    }
    expect(isUniqueViolation(caught)).toBe(true);
  });

  it("keeps issue numbers unique within a project", () => {
    insertProject(db, "p2", "OPS", "u1");
    insertIssue(db, "i1", "p1", 1);
    insertIssue(db, "i2", "p2", 1);
    expect(() => insertIssue(db, "i3", "p1", 1)).toThrow(/UNIQUE/);
  });

  it("deletes issues with their project and projects with their owner", () => {
    insertIssue(db, "i1", "p1", 1);
    db.prepare("DELETE FROM users WHERE id = 'u1'").run();
    expect(count(db, "projects")).toBe(0);
    expect(count(db, "issues")).toBe(0);
  });

  it("rejects keys longer than ten characters", () => {
    expect(() => insertProject(db, "p3", "ELEVENCHARS", "u1")).toThrow(/CHECK/);
  });
});

describe("writeTransaction", () => {
  it("rolls back everything when the body throws", () => {
    const db = openDatabase(":memory:");
    insertUser(db, "u1", "a@example.com");

    expect(() =>
      writeTransaction(db, () => {
        insertProject(db, "p1", "DEMO", "u1");
        throw new Error("abort");
      })
    ).toThrow("abort");
    expect(count(db, "projects")).toBe(0);
    db.close();
  });
});

describe("helpers", () => {
  it("isUniqueViolation ignores other errors", () => {
    expect(isUniqueViolation(new Error("UNIQUE constraint failed"))).toBe(false);
  });

  it("parseEnum narrows known values and rejects the rest", () => {
    expect(parseEnum(ISSUE_STATUSES, "done", "issues.status")).toBe("done");
    expect(() => parseEnum(ISSUE_STATUSES, "closed", "issues.status")).toThrow(
      "Unexpected issues.status value in database: closed"
    );
  });

  it("placeholders builds an IN list", () => {
    expect(placeholders(3)).toBe("?, ?, ?");
    expect(placeholders(0)).toBe("");
  });
});
