import express, { type NextFunction, type Request, type Response } from "express";
import type { Services } from "./container.js";
import { AppError } from "./errors.js";
import { mcpRoutes } from "./mcpTransport.js";
import { currentUser, requireAuth } from "./middleware/auth.js";
import { analyticsRoutes } from "./routes/analytics.js";
import { authRoutes } from "./routes/auth.js";
import { issueRoutes } from "./routes/issues.js";
import { projectRoutes } from "./routes/projects.js";
import { userRoutes } from "./routes/users.js";
import {
  ISSUE_STATUSES,
  type Issue,
  type IssueStatus,
  type IssueType,
  type KanbanBoard,
  type Priority,
  type Project,
} from "./types.js";

const STATUS_LABELS: Record<IssueStatus, string> = {
  backlog: "Backlog",
  to_do: "To Do",
  in_progress: "In Progress",
  done: "Done",
};

const STATUS_COLORS: Record<IssueStatus, string> = {
  backlog: "#6c757d",
  to_do: "#0d6efd",
  in_progress: "#fd7e14",
  done: "#198754",
};

const PRIORITY_COLORS: Record<Priority, string> = {
  highest: "#dc3545",
  high: "#fd7e14",
  medium: "#0d6efd",
  low: "#20c997",
  lowest: "#6c757d",
};

const TYPE_COLORS: Record<IssueType, string> = {
  bug: "#dc3545",
  task: "#0dcaf0",
  story: "#198754",
  epic: "#6f42c1",
};

function badge(text: string, color: string): string {
  return `<span style="background:${color};color:#fff;padding:2px 8px;border-radius:4px;font-size:0.8em;white-space:nowrap">${text}</span>`;
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function renderCard(issue: Issue): string {
  return `
      <div class="card">
        <div class="key">${escapeHtml(issue.key)}</div>
        <div class="title">${escapeHtml(issue.title)}</div>
        <div>${badge(issue.issueType, TYPE_COLORS[issue.issueType])} ${badge(issue.priority, PRIORITY_COLORS[issue.priority])}</div>
      </div>`;
}

function renderColumn(status: IssueStatus, issues: Issue[]): string {
  const cards =
    issues.length === 0
      ? `<div class="empty">No issues</div>`
      : issues.map(renderCard).join("");
  return `
    <section class="column">
      <h2 style="border-top:4px solid ${STATUS_COLORS[status]}">${STATUS_LABELS[status]} <span class="count">${issues.length}</span></h2>
      ${cards}
    </section>`;
}

export function renderBoardPage(project: Project, board: KanbanBoard): string {
  const total = ISSUE_STATUSES.reduce((sum, status) => sum + board[status].length, 0);
  const columns = ISSUE_STATUSES.map((status) => renderColumn(status, board[status])).join("");

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(project.key)} board</title>
  <style>
    body { font-family: system-ui, sans-serif; margin: 0; padding: 20px; background: #f8f9fa; }
    h1 { margin-bottom: 4px; color: #212529; }
    .subtitle { color: #6c757d; font-size: 0.9em; margin-bottom: 20px; }
    .board { display: grid; grid-template-columns: repeat(4, 1fr); gap: 16px; }
    .column { background: #e9ecef; border-radius: 8px; padding: 8px; }
    .column h2 { font-size: 1em; margin: 0 0 8px; padding-top: 8px; }
    .count { color: #6c757d; font-weight: normal; }
    .card { background: #fff; border-radius: 6px; padding: 8px 10px; margin-bottom: 8px;
            box-shadow: 0 1px 3px rgba(0,0,0,0.1); }
    .key { font-family: monospace; font-size: 0.8em; color: #6c757d; }
    .title { margin: 4px 0 6px; }
    .empty { color: #aaa; font-size: 0.85em; text-align: center; padding: 12px; }
  </style>
</head>
<body>
  <h1>${escapeHtml(project.name)} <small>(${escapeHtml(project.key)})</small></h1>
  <p class="subtitle">${total} issue(s)</p>
  <div class="board">${columns}</div>
</body>
</html>`;
}

function isMalformedJson(err: unknown): boolean {
  return (
    err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed"
  );
}

export function createWebServer(services: Services): express.Application {
  const app = express();
  app.use(express.json());

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.use("/api/auth", authRoutes(services));
  app.use("/api/users", userRoutes(services));
  app.use("/api/projects", projectRoutes(services));
  app.use("/api/issues", issueRoutes(services));
  app.use("/api/analytics", analyticsRoutes(services));
  app.use("/mcp", mcpRoutes(services));

  app.get("/board/:projectKey", requireAuth(services), async (req: Request<{ projectKey: string }>, res) => {
    const { project, board } = await services.issues.getProjectBoardByKey(
      req.params.projectKey,
      currentUser(req)
    );
    res.setHeader("Content-Type", "text/html; charset=utf-8");
    res.send(renderBoardPage(project, board));
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      res.status(err.status).json({ error: err.message });
      return;
    }
    if (isMalformedJson(err)) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    console.error("[HTTP] Unhandled error:", err);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
