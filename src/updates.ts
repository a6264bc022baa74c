import { z } from "zod";
import { InvalidInputError } from "./errors.js";
import {
  ISSUE_STATUSES,
  PRIORITIES,
  ROLES,
  type IssueStatus,
  type Priority,
  type Role,
} from "./types.js";

/*
 * Partial updates arrive as loose JSON objects. Each entity has a closed set
 * of updatable fields; every field has its own parser, and anything outside
 * the set is rejected rather than ignored.
 */

export type IssueUpdate =
  | { field: "title"; value: string }
  | { field: "description"; value: string }
  | { field: "priority"; value: Priority }
  | { field: "assigneeId"; value: string | null }
  | { field: "status"; value: IssueStatus };

export type ProjectUpdate =
  | { field: "name"; value: string }
  | { field: "key"; value: string }
  | { field: "description"; value: string | null }
  | { field: "defaultAssigneeId"; value: string | null };

export type ProfileUpdate =
  | { field: "fullName"; value: string }
  | { field: "avatarUrl"; value: string | null }
  | { field: "password"; value: string }
  | { field: "role"; value: Role };

type Parsers<U extends { field: string }> = {
  [F in U["field"]]: (value: unknown) => Extract<U, { field: F }>;
};

function parseValue<T>(schema: z.ZodType<T>, field: string, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? "invalid value";
    throw new InvalidInputError(`Invalid ${field}: ${reason}`);
  }
  return result.data;
}

function parseUpdates<U extends { field: string }>(
  body: unknown,
  parsers: Parsers<U>,
  entity: string
): U[] {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new InvalidInputError(`${entity} update must be a JSON object`);
  }
  const isField = (name: string): name is U["field"] =>
    Object.prototype.hasOwnProperty.call(parsers, name);

  const entries: [string, unknown][] = Object.entries(body);
  const updates: U[] = [];
  for (const [name, value] of entries) {
    if (!isField(name)) {
      throw new InvalidInputError(`Unknown ${entity.toLowerCase()} field: ${name}`);
    }
    updates.push(parsers[name](value));
  }
  return updates;
}

const text = z.string();
const optionalId = z.string().min(1).nullable();

const issueParsers: Parsers<IssueUpdate> = {
  title: (value) => ({ field: "title", value: parseValue(text, "title", value) }),
  description: (value) => ({
    field: "description",
    value: parseValue(text, "description", value),
  }),
  priority: (value) => ({
    field: "priority",
    value: parseValue(z.enum(PRIORITIES), "priority", value),
  }),
  assigneeId: (value) => ({
    field: "assigneeId",
    value: parseValue(optionalId, "assigneeId", value),
  }),
  status: (value) => ({
    field: "status",
    value: parseValue(z.enum(ISSUE_STATUSES), "status", value),
  }),
};

const projectParsers: Parsers<ProjectUpdate> = {
  name: (value) => ({ field: "name", value: parseValue(text, "name", value) }),
  key: (value) => ({ field: "key", value: parseValue(text, "key", value) }),
  description: (value) => ({
    field: "description",
    value: parseValue(text.nullable(), "description", value),
  }),
  defaultAssigneeId: (value) => ({
    field: "defaultAssigneeId",
    value: parseValue(optionalId, "defaultAssigneeId", value),
  }),
};

const profileParsers: Parsers<ProfileUpdate> = {
  fullName: (value) => ({ field: "fullName", value: parseValue(text, "fullName", value) }),
  avatarUrl: (value) => ({
    field: "avatarUrl",
    value: parseValue(z.string().url().nullable(), "avatarUrl", value),
  }),
  password: (value) => ({
    field: "password",
    value: parseValue(z.string().min(8, "must be at least 8 characters"), "password", value),
  }),
  role: (value) => ({ field: "role", value: parseValue(z.enum(ROLES), "role", value) }),
};

export function parseIssueUpdates(body: unknown): IssueUpdate[] {
  return parseUpdates(body, issueParsers, "Issue");
}

export function parseProjectUpdates(body: unknown): ProjectUpdate[] {
  return parseUpdates(body, projectParsers, "Project");
}

export function parseProfileUpdates(body: unknown): ProfileUpdate[] {
  return parseUpdates(body, profileParsers, "Profile");
}

/** Trim; reject if nothing is left. */
export function requireText(field: string, value: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new InvalidInputError(`${field} cannot be empty`);
  }
  return trimmed;
}

/** Trim; blank becomes null. */
export function optionalText(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : null;
}
