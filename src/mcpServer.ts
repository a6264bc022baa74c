import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { Services } from "./container.js";
import { AppError } from "./errors.js";
import { parseIssueKey } from "./issueService.js";
import { ISSUE_STATUSES, ISSUE_TYPES, PRIORITIES, type Issue, type User } from "./types.js";
import { parseIssueUpdates } from "./updates.js";

interface ToolResult {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: boolean;
}

function text(body: string): ToolResult {
  return { content: [{ type: "text", text: body }] };
}

function json(value: unknown): ToolResult {
  return text(JSON.stringify(value, null, 2));
}

/** Domain errors become tool errors the agent can read; anything else is a server fault. */
async function respond(work: () => Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await work();
  } catch (err) {
    if (err instanceof AppError) {
      return { ...text(`Error: ${err.message}`), isError: true };
    }
    console.error("[MCP] Tool failed:", err);
    return { ...text("Error: internal server error"), isError: true };
  }
}

function summarize(issue: Issue) {
  return {
    key: issue.key,
    title: issue.title,
    type: issue.issueType,
    status: issue.status,
    priority: issue.priority,
    assigneeId: issue.assigneeId,
    updatedAt: issue.updatedAt,
  };
}

const issueKey = z.string().describe("Display key of the issue, e.g. DEMO-12");

/**
 * Tools for agents. `actor` yields the caller's current user record, read
 * afresh for every tool call so role and account changes apply immediately.
 */
export function createMcpServer(services: Services, actor: () => User): McpServer {
  const server = new McpServer({
    name: "taskboard",
    version: "1.0.0",
  });

  const asActor = (work: (user: User) => Promise<ToolResult>): Promise<ToolResult> =>
    respond(() => work(actor()));

  const findIssue = (key: string, user: User): Promise<Issue> => {
    const { projectKey, issueNumber } = parseIssueKey(key);
    return services.issues.getIssueByKey(projectKey, issueNumber, user);
  };

  server.tool(
    "list_projects",
    "List the projects visible to you (all projects for admins, owned projects otherwise).",
    async () =>
      asActor(async (user) => {
        const projects = await services.projects.listUserProjects(user);
        return json(
          projects.map((p) => ({ id: p.id, key: p.key, name: p.name, description: p.description }))
        );
      })
  );

  server.tool(
    "create_issue",
    "Create an issue in a project. It starts in the backlog.",
    {
      projectKey: z.string().describe("Key of the project, e.g. DEMO"),
      title: z.string().describe("Short title for the issue"),
      description: z.string().optional().describe("Longer description"),
      issueType: z.enum(ISSUE_TYPES).optional().describe("Defaults to task"),
      priority: z.enum(PRIORITIES).optional().describe("Defaults to medium"),
      assigneeId: z.string().optional().describe("User id of the assignee"),
    },
    async ({ projectKey, ...input }) =>
      asActor(async (user) => {
        const project = await services.projects.getProjectByKey(projectKey, user);
        const issue = await services.issues.createIssue({ ...input, projectId: project.id }, user);
        return text(
          `Issue created.\nKey: ${issue.key}\nTitle: ${issue.title}\nStatus: ${issue.status}`
        );
      })
  );

  server.tool(
    "list_issues",
    "List issues, most recently updated first. Read-only.",
    {
      projectKey: z.string().optional().describe("Only issues of this project"),
      status: z.enum(ISSUE_STATUSES).optional(),
      assigneeId: z.string().optional(),
      skip: z.number().int().min(0).optional(),
      limit: z.number().int().min(1).max(100).optional(),
    },
    async ({ projectKey, status, assigneeId, skip, limit }) =>
      asActor(async (user) => {
        const projectId =
          projectKey === undefined
            ? undefined
            : (await services.projects.getProjectByKey(projectKey, user)).id;
        const page = await services.issues.listIssues(
          { projectId, status, assigneeId },
          user,
          { skip, limit }
        );
        return json({ total: page.total, issues: page.items.map(summarize) });
      })
  );

  server.tool(
    "get_issue",
    "Fetch one issue by its display key.",
    { key: issueKey },
    async ({ key }) => asActor(async (user) => json(await findIssue(key, user)))
  );

  server.tool(
    "update_issue",
    "Change fields of an issue. Omitted fields are left as they are; assigneeId null unassigns.",
    {
      key: issueKey,
      title: z.string().optional(),
      description: z.string().optional(),
      priority: z.enum(PRIORITIES).optional(),
      assigneeId: z.string().nullable().optional(),
    },
    async ({ key, ...fields }) =>
      asActor(async (user) => {
        const issue = await findIssue(key, user);
        const present = Object.fromEntries(
          Object.entries(fields).filter(([, value]) => value !== undefined)
        );
        const updated = await services.issues.updateIssue(
          issue.id,
          parseIssueUpdates(present),
          user
        );
        return json(updated);
      })
  );

  server.tool(
    "transition_issue",
    "Move an issue to another board column. Any column may move to any other.",
    { key: issueKey, status: z.enum(ISSUE_STATUSES) },
    async ({ key, status }) =>
      asActor(async (user) => {
        const issue = await findIssue(key, user);
        const moved = await services.issues.transitionIssueStatus(issue.id, status, user);
        return text(`${moved.key} moved from ${issue.status} to ${moved.status}.`);
      })
  );

  server.tool(
    "kanban_board",
    "Show a project's board: issues per column, highest priority first.",
    { projectKey: z.string() },
    async ({ projectKey }) =>
      asActor(async (user) => {
        const { board } = await services.issues.getProjectBoardByKey(projectKey, user);
        return json({
          backlog: board.backlog.map(summarize),
          to_do: board.to_do.map(summarize),
          in_progress: board.in_progress.map(summarize),
          done: board.done.map(summarize),
        });
      })
  );

  return server;
}
