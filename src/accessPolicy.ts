import type { Project, User } from "./types.js";

/**
 * Answers "which projects may this user work in". Admins never reach it.
 */
export interface MembershipLookup {
  isMember(user: User, project: Project): boolean;
  /** Project ids the user may access, or "all". */
  accessibleProjectIds(user: User): readonly string[] | "all";
}

/**
 * Every authenticated, active user may read and write every project's
 * issues. Swap in a membership-backed lookup to restrict it.
 */
export const openMembership: MembershipLookup = {
  isMember: () => true,
  accessibleProjectIds: () => "all",
};

export function isAdminOrManager(user: User): boolean {
  return user.role === "admin" || user.role === "manager";
}

export function canManageProject(user: User, project: Project): boolean {
  return (
    user.role === "admin" ||
    (user.role === "manager" && project.ownerId === user.id)
  );
}

export function canAccessProject(
  user: User,
  project: Project,
  membership: MembershipLookup = openMembership
): boolean {
  if (!user.isActive) return false;
  return user.role === "admin" || membership.isMember(user, project);
}

export function canCreateProject(user: User): boolean {
  return isAdminOrManager(user);
}

export function canListAllUsers(user: User): boolean {
  return isAdminOrManager(user);
}

export function canDeactivate(user: User, target: User): boolean {
  return user.role === "admin" && user.id !== target.id;
}

export function canViewProjectStats(user: User, project: Project): boolean {
  return isAdminOrManager(user) || project.ownerId === user.id;
}

export function canViewProjectAnalytics(user: User, project: Project): boolean {
  return user.role === "admin" || project.ownerId === user.id;
}

export function canEditProfile(user: User, target: User): boolean {
  return (
    user.id === target.id ||
    user.role === "admin" ||
    (user.role === "manager" && target.role === "developer")
  );
}

export function canChangeRole(user: User): boolean {
  return user.role === "admin";
}
