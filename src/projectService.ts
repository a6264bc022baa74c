import { v4 as uuidv4 } from "uuid";
import {
  canAccessProject,
  canCreateProject,
  canManageProject,
  canViewProjectStats,
} from "./accessPolicy.js";
import type { ServiceContext } from "./container.js";
import { ConflictError, ForbiddenError, InvalidInputError, NotFoundError } from "./errors.js";
import { countIssuesByStatus } from "./issueStore.js";
import {
  deleteProjectRow,
  findProjectById,
  findProjectByKey,
  insertProject,
  isProjectKeyTaken,
  listProjects,
  listProjectsOwnedBy,
  saveProject,
} from "./projectStore.js";
import { now, writeTransaction } from "./storage.js";
import type { IssueStatus, Project, User } from "./types.js";
import { optionalText, requireText, type ProjectUpdate } from "./updates.js";
import { findUserById } from "./userStore.js";

export const MAX_KEY_LENGTH = 10;

export interface CreateProjectInput {
  name: string;
  key: string;
  description?: string | null;
}

export interface ProjectStats {
  project: Pick<Project, "id" | "key" | "name">;
  issues: Record<IssueStatus, number>;
  totals: {
    total: number;
    completed: number;
    completionRate: number;
  };
}

/** Trim and uppercase a project key, rejecting anything but 1-10 ASCII letters and digits. */
export function normalizeProjectKey(raw: string): string {
  const key = raw.trim().toUpperCase();
  if (key.length === 0) {
    throw new InvalidInputError("Project key cannot be empty");
  }
  if (!/^[A-Z0-9]+$/.test(key)) {
    throw new InvalidInputError("Project key must be alphanumeric ASCII characters only");
  }
  if (key.length > MAX_KEY_LENGTH) {
    throw new InvalidInputError(`Project key cannot exceed ${MAX_KEY_LENGTH} characters`);
  }
  return key;
}

export class ProjectService {
  constructor(private readonly ctx: ServiceContext) {}

  async createProject(input: CreateProjectInput, owner: User): Promise<Project> {
    if (!canCreateProject(owner)) {
      throw new ForbiddenError("Insufficient permissions to create projects");
    }
    const key = normalizeProjectKey(input.key);
    const name = requireText("name", input.name);
    const description = optionalText(input.description);
    const { db } = this.ctx;

    return writeTransaction(db, () => {
      if (isProjectKeyTaken(db, key)) {
        throw new ConflictError(`Project key '${key}' already exists`);
      }
      const timestamp = now();
      const project: Project = {
        id: uuidv4(),
        name,
        key,
        description,
        ownerId: owner.id,
        defaultAssigneeId: null,
        issueCounter: 0,
        createdAt: timestamp,
        updatedAt: timestamp,
      };
      insertProject(db, project);
      return project;
    });
  }

  async getProject(projectId: string, user: User): Promise<Project> {
    const project = findProjectById(this.ctx.db, projectId);
    if (!project) {
      throw new NotFoundError("Project", projectId);
    }
    this.assertAccess(user, project);
    return project;
  }

  async getProjectByKey(projectKey: string, user: User): Promise<Project> {
    const project = findProjectByKey(this.ctx.db, projectKey);
    if (!project) {
      throw new NotFoundError("Project", projectKey);
    }
    this.assertAccess(user, project);
    return project;
  }

  async updateProject(projectId: string, updates: ProjectUpdate[], user: User): Promise<Project> {
    if (updates.length === 0) {
      throw new InvalidInputError("No valid fields to update");
    }
    const { db } = this.ctx;

    return writeTransaction(db, () => {
      const project = findProjectById(db, projectId);
      if (!project) {
        throw new NotFoundError("Project", projectId);
      }
      if (!canManageProject(user, project)) {
        throw new ForbiddenError("Can only edit projects you own");
      }

      const next: Project = { ...project };
      for (const update of updates) {
        switch (update.field) {
          case "name":
            next.name = requireText("name", update.value);
            break;
          case "key": {
            const key = normalizeProjectKey(update.value);
            if (isProjectKeyTaken(db, key, project.id)) {
              throw new ConflictError(`Project key '${key}' already exists`);
            }
            next.key = key;
            break;
          }
          case "description":
            next.description = optionalText(update.value);
            break;
          case "defaultAssigneeId":
            if (update.value !== null) {
              const assignee = findUserById(db, update.value);
              if (!assignee || !assignee.isActive) {
                throw new InvalidInputError("Invalid default assignee");
              }
            }
            next.defaultAssigneeId = update.value;
            break;
        }
      }

      next.updatedAt = now();
      saveProject(db, next);
      return next;
    });
  }

  /** Deletes the project and, by cascade, every issue in it. */
  async deleteProject(projectId: string, user: User): Promise<void> {
    const { db } = this.ctx;
    writeTransaction(db, () => {
      const project = findProjectById(db, projectId);
      if (!project) {
        throw new NotFoundError("Project", projectId);
      }
      if (!canManageProject(user, project)) {
        throw new ForbiddenError("Can only delete projects you own");
      }
      deleteProjectRow(db, projectId);
    });
  }

  /**
   * Admins see every project, everyone else the projects they own. This is
   * narrower than issue access, which is open to all members.
   */
  async listUserProjects(user: User): Promise<Project[]> {
    return user.role === "admin"
      ? listProjects(this.ctx.db)
      : listProjectsOwnedBy(this.ctx.db, user.id);
  }

  async getProjectStats(projectId: string, user: User): Promise<ProjectStats> {
    const { db } = this.ctx;
    const project = findProjectById(db, projectId);
    if (!project) {
      throw new NotFoundError("Project", projectId);
    }
    if (!canViewProjectStats(user, project)) {
      throw new ForbiddenError("Cannot access project statistics");
    }

    const issues = countIssuesByStatus(db, project.id);
    const total = issues.backlog + issues.to_do + issues.in_progress + issues.done;
    const completed = issues.done;
    return {
      project: { id: project.id, key: project.key, name: project.name },
      issues,
      totals: {
        total,
        completed,
        completionRate: total > 0 ? completed / total : 0,
      },
    };
  }

  private assertAccess(user: User, project: Project): void {
    if (!canAccessProject(user, project, this.ctx.membership)) {
      throw new ForbiddenError("Access denied to this project");
    }
  }
}
