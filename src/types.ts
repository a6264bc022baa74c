export const ROLES = ["admin", "manager", "developer"] as const;
export type Role = (typeof ROLES)[number];

export const ISSUE_TYPES = ["bug", "task", "story", "epic"] as const;
export type IssueType = (typeof ISSUE_TYPES)[number];

// Board column order.
export const ISSUE_STATUSES = ["backlog", "to_do", "in_progress", "done"] as const;
export type IssueStatus = (typeof ISSUE_STATUSES)[number];

// Highest first.
export const PRIORITIES = ["highest", "high", "medium", "low", "lowest"] as const;
export type Priority = (typeof PRIORITIES)[number];

export interface User {
  id: string;
  email: string;
  fullName: string;
  passwordHash: string | null;
  avatarUrl: string | null;
  role: Role;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

/** User as it leaves the service boundary: never carries the credential hash. */
export type PublicUser = Omit<User, "passwordHash">;

export interface Project {
  id: string;
  name: string;
  key: string;
  description: string | null;
  ownerId: string;
  defaultAssigneeId: string | null;
  issueCounter: number;
  createdAt: string;
  updatedAt: string;
}

export interface Issue {
  id: string;
  projectId: string;
  /** Resolved by join from the owning project. */
  projectKey: string;
  issueNumber: number;
  /** `{projectKey}-{issueNumber}` */
  key: string;
  title: string;
  description: string | null;
  issueType: IssueType;
  status: IssueStatus;
  priority: Priority;
  reporterId: string;
  assigneeId: string | null;
  createdAt: string;
  updatedAt: string;
}

export type KanbanBoard = Record<IssueStatus, Issue[]>;

export interface Page<T> {
  items: T[];
  total: number;
  skip: number;
  limit: number;
}
