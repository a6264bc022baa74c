import { v4 as uuidv4 } from "uuid";
import type { MembershipLookup } from "../accessPolicy.js";
import { TokenService } from "../auth.js";
import { createServices, type Services } from "../container.js";
import {
  NotificationDispatcher,
  type Notification,
  type NotificationTransport,
} from "../notifications.js";
import { now, openDatabase } from "../storage.js";
import type { User } from "../types.js";
import { insertUser } from "../userStore.js";

export const TEST_SECRET = "test-secret-value-123";

/** Keeps every notification instead of sending it. */
export class RecordingTransport implements NotificationTransport {
  readonly sent: Notification[] = [];

  async send(notification: Notification): Promise<void> {
    this.sent.push(notification);
  }
}

export interface TestHarness {
  services: Services;
  transport: RecordingTransport;
}

/** Fresh in-memory database wired to a recording notification transport. */
export function createTestServices(membership?: MembershipLookup): TestHarness {
  const transport = new RecordingTransport();
  const services = createServices({
    db: openDatabase(":memory:"),
    tokens: new TokenService(TEST_SECRET, 1800),
    notifications: new NotificationDispatcher(transport),
    membership,
  });
  return { services, transport };
}

let seeded = 0;

/** Insert a user directly, skipping password hashing. */
export function seedUser(
  services: Services,
  overrides: Partial<Pick<User, "email" | "fullName" | "role" | "isActive">> = {}
): User {
  seeded += 1;
  const timestamp = now();
  const user: User = {
    id: uuidv4(),
    email: overrides.email ?? `user${seeded}@example.com`,
    fullName: overrides.fullName ?? `User ${seeded}`,
    passwordHash: null,
    avatarUrl: null,
    role: overrides.role ?? "developer",
    isActive: overrides.isActive ?? true,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
  insertUser(services.db, user);
  return user;
}
