import { canAccessProject, canViewProjectAnalytics } from "./accessPolicy.js";
import type { ServiceContext } from "./container.js";
import { ForbiddenError, InvalidInputError, NotFoundError } from "./errors.js";
import {
  countCompletedSince,
  countIssuesByStatus,
  countOpenWorkload,
  iterateIssues,
} from "./issueStore.js";
import type { ProjectService } from "./projectService.js";
import { findProjectById } from "./projectStore.js";
import {
  ISSUE_STATUSES,
  type Issue,
  type IssueStatus,
  type Priority,
  type Project,
  type User,
} from "./types.js";
import { findUserById, listAllUsers } from "./userStore.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const WEEK_MS = 7 * DAY_MS;
const VELOCITY_PERIOD_DAYS = 30;
const BURNDOWN_PERIODS = 10;
export const DEFAULT_WEEKS = 4;

const PRIORITY_WEIGHTS: Record<Priority, number> = {
  highest: 4,
  high: 3,
  medium: 2,
  low: 1,
  lowest: 0,
};

export type AgingBucket = "fresh" | "normal" | "aging" | "stalled";

export interface AgingEntry {
  key: string;
  title: string;
  days: number;
  status: IssueStatus;
}

export interface ProjectOverview {
  project: Pick<Project, "id" | "name" | "key">;
  overview: { totalIssues: number; completionRate: number };
  issuesByStatus: Record<IssueStatus, number>;
  velocity: { periodDays: number; completedIssues: number; dailyAverage: number };
  aging: Record<AgingBucket, AgingEntry[]>;
}

export interface Burndown {
  labels: string[];
  datasets: { label: string; data: number[] }[];
  summary: {
    totalIssues: number;
    completed: number;
    remaining: number;
    completionPercentage: number;
  };
}

export interface UserVelocity {
  userId: string;
  userName: string;
  periodWeeks: number;
  completedIssues: number;
}

export interface TeamVelocity {
  period: { weeks: number; startDate: string; endDate: string };
  teamSize: number;
  totalCompleted: number;
  averageVelocity: number;
  members: { userId: string; fullName: string; completedIssues: number }[];
}

export interface StatusAgingEntry {
  issueKey: string;
  title: string;
  days: number;
  assignee: string;
}

export interface AgingReport {
  agingByStatus: Partial<Record<IssueStatus, StatusAgingEntry[]>>;
  summary: Partial<
    Record<IssueStatus, { issueCount: number; avgDays: number; maxDays: number; minDays: number }>
  >;
  generatedAt: string;
}

export interface WorkloadEntry {
  userId: string;
  userName: string;
  userEmail: string;
  totalIssues: number;
  byPriority: Partial<Record<Priority, number>>;
  workloadScore: number;
}

export interface WorkloadReport {
  workloadDistribution: WorkloadEntry[];
  metadata: { projectIds: string[]; generatedAt: string; statusFilter: string };
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Whole days elapsed since `timestamp`. */
function daysSince(timestamp: string, at: Date): number {
  return Math.floor((at.getTime() - new Date(timestamp).getTime()) / DAY_MS);
}

function agingBucket(days: number): AgingBucket {
  if (days <= 1) return "fresh";
  if (days <= 3) return "normal";
  if (days <= 7) return "aging";
  return "stalled";
}

function checkWeeks(weeks: number): void {
  if (!Number.isInteger(weeks) || weeks < 1 || weeks > 52) {
    throw new InvalidInputError("weeks must be an integer between 1 and 52");
  }
}

/**
 * Read-only reports over the issue store. Empty projects and empty teams
 * produce zeros and empty lists.
 */
export class AnalyticsService {
  constructor(
    private readonly ctx: ServiceContext,
    private readonly projects: ProjectService
  ) {}

  async projectOverview(projectId: string, user: User): Promise<ProjectOverview> {
    const project = this.analyticsProject(projectId, user);
    const { db } = this.ctx;
    const at = new Date();

    const issuesByStatus = countIssuesByStatus(db, project.id);
    const totalIssues = Object.values(issuesByStatus).reduce((sum, n) => sum + n, 0);
    const since = new Date(at.getTime() - VELOCITY_PERIOD_DAYS * DAY_MS).toISOString();
    const completedIssues = countCompletedSince(db, { projectId: project.id }, since);

    const aging: Record<AgingBucket, AgingEntry[]> = {
      fresh: [],
      normal: [],
      aging: [],
      stalled: [],
    };
    for (const issue of this.openIssues([project.id])) {
      const days = daysSince(issue.updatedAt, at);
      aging[agingBucket(days)].push({
        key: issue.key,
        title: issue.title,
        days,
        status: issue.status,
      });
    }

    return {
      project: { id: project.id, name: project.name, key: project.key },
      overview: {
        totalIssues,
        completionRate: round((issuesByStatus.done / Math.max(totalIssues, 1)) * 100, 1),
      },
      issuesByStatus,
      velocity: {
        periodDays: VELOCITY_PERIOD_DAYS,
        completedIssues,
        dailyAverage: round(completedIssues / VELOCITY_PERIOD_DAYS, 2),
      },
      aging,
    };
  }

  async burndown(projectId: string, user: User): Promise<Burndown> {
    const project = this.analyticsProject(projectId, user);
    const counts = countIssuesByStatus(this.ctx.db, project.id);
    const total = Object.values(counts).reduce((sum, n) => sum + n, 0);
    const completed = counts.done;
    const remaining = total - completed;

    const points = BURNDOWN_PERIODS + 1;
    const ideal = Array.from({ length: points }, (_, i) =>
      round(total - (total * i) / BURNDOWN_PERIODS, 1)
    );
    const actual = Array.from({ length: points }, (_, i) => (i === 0 ? total : remaining));

    return {
      labels: Array.from({ length: points }, (_, i) => `Period ${i + 1}`),
      datasets: [
        { label: "Ideal Burndown", data: ideal },
        { label: "Actual Progress", data: actual },
      ],
      summary: {
        totalIssues: total,
        completed,
        remaining,
        completionPercentage: round((completed / Math.max(total, 1)) * 100, 1),
      },
    };
  }

  async userVelocity(userId: string, user: User, weeks = DEFAULT_WEEKS): Promise<UserVelocity> {
    checkWeeks(weeks);
    if (user.id !== userId && user.role !== "admin") {
      throw new ForbiddenError("Can only view own velocity metrics");
    }
    const target = findUserById(this.ctx.db, userId);
    if (!target) {
      throw new NotFoundError("User", userId);
    }
    return {
      userId: target.id,
      userName: target.fullName,
      periodWeeks: weeks,
      completedIssues: this.completedBy(target.id, weeks, new Date()),
    };
  }

  /** Admins get every user; everyone else a team of one. */
  async teamVelocity(user: User, weeks = DEFAULT_WEEKS): Promise<TeamVelocity> {
    checkWeeks(weeks);
    const at = new Date();
    const team = user.role === "admin" ? listAllUsers(this.ctx.db) : [user];

    const members = team.map((member) => ({
      userId: member.id,
      fullName: member.fullName,
      completedIssues: this.completedBy(member.id, weeks, at),
    }));
    const totalCompleted = members.reduce((sum, m) => sum + m.completedIssues, 0);

    return {
      period: {
        weeks,
        startDate: new Date(at.getTime() - weeks * WEEK_MS).toISOString(),
        endDate: at.toISOString(),
      },
      teamSize: team.length,
      totalCompleted,
      averageVelocity: round(totalCompleted / Math.max(team.length, 1), 1),
      members,
    };
  }

  async agingReport(projectIds: string[] | undefined, user: User): Promise<AgingReport> {
    const ids = await this.reportProjectIds(projectIds, user);
    const at = new Date();
    const names = new Map<string, string>();

    // Materialise first: the connection is busy while a statement iterates.
    const issues = [...this.openIssues(ids)];
    const agingByStatus: AgingReport["agingByStatus"] = {};
    for (const issue of issues) {
      const entries = agingByStatus[issue.status] ?? [];
      entries.push({
        issueKey: issue.key,
        title: issue.title,
        days: daysSince(issue.updatedAt, at),
        assignee: this.assigneeName(issue, names),
      });
      agingByStatus[issue.status] = entries;
    }

    const summary: AgingReport["summary"] = {};
    for (const status of ISSUE_STATUSES) {
      const days = agingByStatus[status]?.map((e) => e.days) ?? [];
      if (days.length === 0) continue;
      summary[status] = {
        issueCount: days.length,
        avgDays: round(days.reduce((sum, d) => sum + d, 0) / days.length, 1),
        maxDays: Math.max(...days),
        minDays: Math.min(...days),
      };
    }

    return { agingByStatus, summary, generatedAt: at.toISOString() };
  }

  /** Open assigned work per person, weighted by priority, heaviest first. */
  async workload(projectIds: string[] | undefined, user: User): Promise<WorkloadReport> {
    const ids = await this.reportProjectIds(projectIds, user);
    const { db } = this.ctx;

    const byAssignee = new Map<string, WorkloadEntry>();
    for (const row of countOpenWorkload(db, ids)) {
      let entry = byAssignee.get(row.assigneeId);
      if (!entry) {
        const assignee = findUserById(db, row.assigneeId);
        if (!assignee) continue;
        entry = {
          userId: assignee.id,
          userName: assignee.fullName,
          userEmail: assignee.email,
          totalIssues: 0,
          byPriority: {},
          workloadScore: 0,
        };
        byAssignee.set(row.assigneeId, entry);
      }
      entry.totalIssues += row.count;
      entry.byPriority[row.priority] = row.count;
      entry.workloadScore += row.count * PRIORITY_WEIGHTS[row.priority];
    }

    const workloadDistribution = [...byAssignee.values()].sort(
      (a, b) => b.workloadScore - a.workloadScore
    );
    return {
      workloadDistribution,
      metadata: {
        projectIds: ids,
        generatedAt: new Date().toISOString(),
        statusFilter: "active (non-done)",
      },
    };
  }

  private analyticsProject(projectId: string, user: User): Project {
    const project = findProjectById(this.ctx.db, projectId);
    if (!project) {
      throw new NotFoundError("Project", projectId);
    }
    if (!canViewProjectAnalytics(user, project)) {
      throw new ForbiddenError("Access denied to project analytics");
    }
    return project;
  }

  /**
   * Explicit ids are kept only where the project exists and is accessible;
   * without ids the user's own project list is used.
   */
  private async reportProjectIds(projectIds: string[] | undefined, user: User): Promise<string[]> {
    if (projectIds === undefined) {
      const projects = await this.projects.listUserProjects(user);
      return projects.map((p) => p.id);
    }
    const { db, membership } = this.ctx;
    return [...new Set(projectIds)].filter((id) => {
      const project = findProjectById(db, id);
      return project !== null && canAccessProject(user, project, membership);
    });
  }

  private *openIssues(projectIds: readonly string[]): Generator<Issue, void, undefined> {
    for (const issue of iterateIssues(this.ctx.db, { projectIds })) {
      if (issue.status !== "done") yield issue;
    }
  }

  private completedBy(userId: string, weeks: number, at: Date): number {
    const since = new Date(at.getTime() - weeks * WEEK_MS).toISOString();
    return countCompletedSince(this.ctx.db, { assigneeId: userId }, since);
  }

  private assigneeName(issue: Issue, cache: Map<string, string>): string {
    if (!issue.assigneeId) return "Unassigned";
    const cached = cache.get(issue.assigneeId);
    if (cached !== undefined) return cached;
    const name = findUserById(this.ctx.db, issue.assigneeId)?.fullName ?? "Unassigned";
    cache.set(issue.assigneeId, name);
    return name;
  }
}
