import { describe, expect, it } from "vitest";
import {
  canAccessProject,
  canChangeRole,
  canCreateProject,
  canDeactivate,
  canEditProfile,
  canListAllUsers,
  canManageProject,
  canViewProjectAnalytics,
  canViewProjectStats,
  type MembershipLookup,
} from "./accessPolicy.js";
import type { Project, Role, User } from "./types.js";

function makeUser(role: Role, id = `${role}-1`, isActive = true): User {
  return {
    id,
    email: `${id}@example.com`,
    fullName: id,
    passwordHash: null,
    avatarUrl: null,
    role,
    isActive,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
  };
}

const admin = makeUser("admin");
const manager = makeUser("manager");
const otherManager = makeUser("manager", "manager-2");
const developer = makeUser("developer");

const project: Project = {
  id: "project-1",
  name: "Demo",
  key: "DEMO",
  description: null,
  ownerId: manager.id,
  defaultAssigneeId: null,
  issueCounter: 0,
  createdAt: "2026-01-01T00:00:00.000Z",
  updatedAt: "2026-01-01T00:00:00.000Z",
};

const nobody: MembershipLookup = {
  isMember: () => false,
  accessibleProjectIds: () => [],
};

describe("canManageProject", () => {
  it("allows admins and the owning manager", () => {
    expect(canManageProject(admin, project)).toBe(true);
    expect(canManageProject(manager, project)).toBe(true);
    expect(canManageProject(otherManager, project)).toBe(false);
    expect(canManageProject(developer, project)).toBe(false);
  });
});

describe("canAccessProject", () => {
  it("is open to active users by default", () => {
    expect(canAccessProject(developer, project)).toBe(true);
    expect(canAccessProject(makeUser("developer", "dev-2", false), project)).toBe(false);
  });

  it("defers to the membership lookup, except for admins", () => {
    expect(canAccessProject(developer, project, nobody)).toBe(false);
    expect(canAccessProject(admin, project, nobody)).toBe(true);
  });
});

describe("role predicates", () => {
  it("lets admins and managers create projects and list users", () => {
    expect([admin, manager, developer].map(canCreateProject)).toEqual([true, true, false]);
    expect([admin, manager, developer].map(canListAllUsers)).toEqual([true, true, false]);
  });

  it("only lets admins change roles", () => {
    expect([admin, manager, developer].map(canChangeRole)).toEqual([true, false, false]);
  });

  it("never lets an admin deactivate themselves", () => {
    expect(canDeactivate(admin, developer)).toBe(true);
    expect(canDeactivate(admin, admin)).toBe(false);
    expect(canDeactivate(manager, developer)).toBe(false);
  });
});

describe("project reporting", () => {
  it("shows stats to admins, managers and the owner", () => {
    expect(canViewProjectStats(otherManager, project)).toBe(true);
    expect(canViewProjectStats(developer, project)).toBe(false);
    expect(canViewProjectStats(developer, { ...project, ownerId: developer.id })).toBe(true);
  });

  it("shows analytics to admins and the owner only", () => {
    expect(canViewProjectAnalytics(admin, project)).toBe(true);
    expect(canViewProjectAnalytics(manager, project)).toBe(true);
    expect(canViewProjectAnalytics(otherManager, project)).toBe(false);
  });
});

describe("canEditProfile", () => {
  it("allows self, admins and managers over developers", () => {
    expect(canEditProfile(developer, developer)).toBe(true);
    expect(canEditProfile(admin, manager)).toBe(true);
    expect(canEditProfile(manager, developer)).toBe(true);
    expect(canEditProfile(manager, otherManager)).toBe(false);
    expect(canEditProfile(developer, makeUser("developer", "dev-2"))).toBe(false);
  });
});
