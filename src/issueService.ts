import { v4 as uuidv4 } from "uuid";
import { canAccessProject } from "./accessPolicy.js";
import type { ServiceContext } from "./container.js";
import { ForbiddenError, InvalidInputError, NotFoundError } from "./errors.js";
import {
  deleteIssueRow,
  findIssueById,
  findIssueByNumber,
  insertIssue,
  iterateIssues,
  queryIssues,
  saveIssue,
  type IssueFilters,
} from "./issueStore.js";
import { assignedNotification, statusChangedNotification } from "./notifications.js";
import { allocateIssueNumber, findProjectById, findProjectByKey } from "./projectStore.js";
import { now, writeTransaction } from "./storage.js";
import {
  ISSUE_STATUSES,
  PRIORITIES,
  type Issue,
  type IssueStatus,
  type IssueType,
  type KanbanBoard,
  type Page,
  type Priority,
  type Project,
  type User,
} from "./types.js";
import { optionalText, requireText, type IssueUpdate } from "./updates.js";
import { findUserById } from "./userStore.js";

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 100;

export interface CreateIssueInput {
  projectId: string;
  title: string;
  description?: string | null;
  issueType?: IssueType;
  priority?: Priority;
  assigneeId?: string | null;
}

export interface ListIssuesFilters {
  projectId?: string;
  assigneeId?: string;
  reporterId?: string;
  status?: IssueStatus;
  issueType?: IssueType;
}

export interface Paging {
  skip?: number;
  limit?: number;
}

/** Split a display key such as `DEMO-12` into project key and number. */
export function parseIssueKey(key: string): { projectKey: string; issueNumber: number } {
  const match = /^([A-Za-z0-9]{1,10})-(\d+)$/.exec(key.trim());
  if (!match?.[1] || !match[2]) {
    throw new InvalidInputError(`Malformed issue key: ${key}`);
  }
  return { projectKey: match[1], issueNumber: Number(match[2]) };
}

export function resolvePaging(paging: Paging, maxLimit: number): { skip: number; limit: number } {
  const skip = paging.skip ?? 0;
  const limit = paging.limit ?? Math.min(DEFAULT_PAGE_SIZE, maxLimit);
  if (!Number.isInteger(skip) || skip < 0) {
    throw new InvalidInputError("skip must be a non-negative integer");
  }
  if (!Number.isInteger(limit) || limit < 1 || limit > maxLimit) {
    throw new InvalidInputError(`limit must be an integer between 1 and ${maxLimit}`);
  }
  return { skip, limit };
}

const priorityRank = (priority: Priority): number => PRIORITIES.indexOf(priority);

/**
 * Issue lifecycle: creation with per-project numbering, partial updates,
 * status transitions and deletion. Each operation is a single transaction;
 * notifications go out only after it commits.
 */
export class IssueService {
  constructor(private readonly ctx: ServiceContext) {}

  async createIssue(input: CreateIssueInput, reporter: User): Promise<Issue> {
    const { db } = this.ctx;

    const { issue, assignee } = writeTransaction(db, () => {
      const project = findProjectById(db, input.projectId);
      if (!project) {
        throw new NotFoundError("Project", input.projectId);
      }
      this.assertAccess(reporter, project, "Cannot create issues in this project");

      const title = requireText("title", input.title);
      const description = optionalText(input.description);

      let assignee: User | null = null;
      if (input.assigneeId !== undefined && input.assigneeId !== null) {
        assignee = this.requireActiveAssignee(input.assigneeId);
      } else if (project.defaultAssigneeId) {
        const fallback = findUserById(db, project.defaultAssigneeId);
        assignee = fallback?.isActive ? fallback : null;
      }

      const issueNumber = allocateIssueNumber(db, project.id);
      const timestamp = now();
      const issue: Issue = {
        id: uuidv4(),
        projectId: project.id,
        projectKey: project.key,
        issueNumber,
        key: `${project.key}-${issueNumber}`,
        title,
        description,
        issueType: input.issueType ?? "task",
        status: "backlog",
        priority: input.priority ?? "medium",
        reporterId: reporter.id,
        assigneeId: assignee?.id ?? null,
        createdAt: timestamp,
        updatedAt: timestamp,
      };
      insertIssue(db, issue);
      return { issue, assignee };
    });

    if (assignee) {
      this.ctx.notifications.enqueue(assignedNotification(issue, assignee));
    }
    return issue;
  }

  async getIssue(issueId: string, user: User): Promise<Issue> {
    const issue = findIssueById(this.ctx.db, issueId);
    if (!issue) {
      throw new NotFoundError("Issue", issueId);
    }
    this.assertAccess(user, this.projectOf(issue), "Cannot view this issue");
    return issue;
  }

  async getIssueByKey(projectKey: string, issueNumber: number, user: User): Promise<Issue> {
    const { db } = this.ctx;
    const project = findProjectByKey(db, projectKey);
    if (!project) {
      throw new NotFoundError("Project", projectKey);
    }
    const issue = findIssueByNumber(db, project.id, issueNumber);
    if (!issue) {
      throw new NotFoundError("Issue", `${project.key}-${issueNumber}`);
    }
    this.assertAccess(user, project, "Cannot view this issue");
    return issue;
  }

  /**
   * One page of issues, newest activity first. Without a project filter,
   * non-admins only see projects their membership grants.
   */
  async listIssues(
    filters: ListIssuesFilters,
    user: User,
    paging: Paging = {}
  ): Promise<Page<Issue>> {
    const { db, membership } = this.ctx;
    const { skip, limit } = resolvePaging(paging, MAX_PAGE_SIZE);
    const query: IssueFilters = { ...filters };

    if (filters.projectId !== undefined) {
      const project = findProjectById(db, filters.projectId);
      if (project && !canAccessProject(user, project, membership)) {
        return { items: [], total: 0, skip, limit };
      }
    } else if (user.role !== "admin") {
      const accessible = membership.accessibleProjectIds(user);
      if (accessible !== "all") {
        query.projectIds = accessible;
      }
    }

    const { issues, total } = queryIssues(db, query, skip, limit);
    return { items: issues, total, skip, limit };
  }

  async updateIssue(issueId: string, updates: IssueUpdate[], user: User): Promise<Issue> {
    const { db } = this.ctx;

    const { issue, previous, newAssignee } = writeTransaction(db, () => {
      const previous = findIssueById(db, issueId);
      if (!previous) {
        throw new NotFoundError("Issue", issueId);
      }
      this.assertAccess(user, this.projectOf(previous), "Cannot modify this issue");

      let next: Issue = { ...previous };
      let newAssignee: User | null = null;
      for (const update of updates) {
        switch (update.field) {
          case "title":
            next.title = requireText("title", update.value);
            break;
          case "description":
            next.description = requireText("description", update.value);
            break;
          case "priority":
            next.priority = update.value;
            break;
          case "assigneeId":
            if (update.value === null) {
              next.assigneeId = null;
              newAssignee = null;
            } else {
              const assignee = this.requireActiveAssignee(update.value);
              newAssignee = assignee.id === previous.assigneeId ? null : assignee;
              next.assigneeId = assignee.id;
            }
            break;
          case "status":
            next = this.applyTransition(next, update.value);
            break;
        }
      }

      if (!sameFields(previous, next)) {
        next.updatedAt = now();
        saveIssue(db, next);
      }
      return { issue: next, previous, newAssignee };
    });

    if (newAssignee) {
      this.ctx.notifications.enqueue(assignedNotification(issue, newAssignee));
    }
    this.notifyStatusChange(previous, issue, user);
    return issue;
  }

  /**
   * Move an issue to another column. Every status may move to every other
   * status, backwards included.
   */
  async transitionIssueStatus(
    issueId: string,
    newStatus: IssueStatus,
    user: User
  ): Promise<Issue> {
    const { db } = this.ctx;
    if (!ISSUE_STATUSES.includes(newStatus)) {
      throw new InvalidInputError(`Unknown status: ${String(newStatus)}`);
    }

    const { issue, previous } = writeTransaction(db, () => {
      const previous = findIssueById(db, issueId);
      if (!previous) {
        throw new NotFoundError("Issue", issueId);
      }
      this.assertAccess(user, this.projectOf(previous), "Cannot change issue status");

      const issue = this.applyTransition(previous, newStatus);
      if (issue.status !== previous.status) {
        issue.updatedAt = now();
        saveIssue(db, issue);
      }
      return { issue, previous };
    });

    this.notifyStatusChange(previous, issue, user);
    return issue;
  }

  async deleteIssue(issueId: string, user: User): Promise<void> {
    const { db } = this.ctx;
    writeTransaction(db, () => {
      const issue = findIssueById(db, issueId);
      if (!issue) {
        throw new NotFoundError("Issue", issueId);
      }
      this.assertAccess(user, this.projectOf(issue), "Cannot delete this issue");
      deleteIssueRow(db, issueId);
    });
  }

  /** Issues grouped into board columns; each column by priority, then most recently updated. */
  async getKanbanBoard(projectId: string, user: User): Promise<KanbanBoard> {
    const { db } = this.ctx;
    const project = findProjectById(db, projectId);
    if (!project) {
      throw new NotFoundError("Project", projectId);
    }
    this.assertAccess(user, project, "Cannot view this board");

    const board: KanbanBoard = { backlog: [], to_do: [], in_progress: [], done: [] };
    for (const issue of iterateIssues(db, { projectId })) {
      board[issue.status].push(issue);
    }
    for (const status of ISSUE_STATUSES) {
      // Stable sort keeps the updated-at order within a priority.
      board[status].sort((a, b) => priorityRank(a.priority) - priorityRank(b.priority));
    }
    return board;
  }

  async getProjectBoardByKey(
    projectKey: string,
    user: User
  ): Promise<{ project: Project; board: KanbanBoard }> {
    const project = findProjectByKey(this.ctx.db, projectKey);
    if (!project) {
      throw new NotFoundError("Project", projectKey);
    }
    return { project, board: await this.getKanbanBoard(project.id, user) };
  }

  private applyTransition(issue: Issue, status: IssueStatus): Issue {
    return { ...issue, status };
  }

  private notifyStatusChange(previous: Issue, issue: Issue, actor: User): void {
    if (previous.status === issue.status || !issue.assigneeId || issue.assigneeId === actor.id) {
      return;
    }
    const assignee = findUserById(this.ctx.db, issue.assigneeId);
    if (assignee?.isActive) {
      this.ctx.notifications.enqueue(
        statusChangedNotification(issue, previous.status, actor, assignee)
      );
    }
  }

  private projectOf(issue: Issue): Project {
    const project = findProjectById(this.ctx.db, issue.projectId);
    if (!project) {
      throw new NotFoundError("Project", issue.projectId);
    }
    return project;
  }

  private assertAccess(user: User, project: Project, message: string): void {
    if (!canAccessProject(user, project, this.ctx.membership)) {
      throw new ForbiddenError(message);
    }
  }

  private requireActiveAssignee(userId: string): User {
    const assignee = findUserById(this.ctx.db, userId);
    if (!assignee || !assignee.isActive) {
      throw new InvalidInputError("Invalid assignee");
    }
    return assignee;
  }
}

function sameFields(a: Issue, b: Issue): boolean {
  return (
    a.title === b.title &&
    a.description === b.description &&
    a.priority === b.priority &&
    a.assigneeId === b.assigneeId &&
    a.status === b.status
  );
}
