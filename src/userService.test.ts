import { beforeEach, describe, expect, it } from "vitest";
import type { Services } from "./container.js";
import {
  ConflictError,
  ForbiddenError,
  InvalidInputError,
  NotFoundError,
  UnauthenticatedError,
} from "./errors.js";
import { createTestServices, seedUser, type RecordingTransport } from "./testing/fixtures.js";
import type { User } from "./types.js";

let services: Services;
let transport: RecordingTransport;
let admin: User;

beforeEach(() => {
  ({ services, transport } = createTestServices());
  admin = seedUser(services, { role: "admin" });
});

function registerAlice(): Promise<User> {
  return services.users.registerUser({
    email: "  Alice@Example.COM ",
    fullName: "Alice Smith",
    password: "correct-horse",
  });
}

// ---------------------------------------------------------------------------
// registration and login
// ---------------------------------------------------------------------------
describe("registerUser", () => {
  it("normalises the email and stores a scrypt hash", async () => {
    const user = await registerAlice();
    expect(user.email).toBe("alice@example.com");
    expect(user.role).toBe("developer");
    expect(user.isActive).toBe(true);
    expect(user.passwordHash).toMatch(/^scrypt\$[0-9a-f]{32}\$[0-9a-f]{128}$/);
  });

  it("sends a welcome notification", async () => {
    await registerAlice();
    await services.notifications.idle();
    expect(transport.sent.map((n) => n.recipient)).toEqual(["alice@example.com"]);
  });

  it("rejects a duplicate email regardless of case", async () => {
    await registerAlice();
    await expect(
      services.users.registerUser({
        email: "ALICE@example.com",
        fullName: "Other Alice",
        password: "another-pass",
      })
    ).rejects.toBeInstanceOf(ConflictError);
  });

  it("validates the email and password", async () => {
    await expect(
      services.users.registerUser({ email: "not-an-email", fullName: "X", password: "long-enough" })
    ).rejects.toThrow("Invalid email address");
    await expect(
      services.users.registerUser({ email: "x@example.com", fullName: "X", password: "short" })
    ).rejects.toThrow("Password must be at least 8 characters");
  });
});

describe("authenticate / login", () => {
  it("accepts the right password with any email casing", async () => {
    const alice = await registerAlice();
    const user = await services.users.authenticate("ALICE@example.com", "correct-horse");
    expect(user.id).toBe(alice.id);
  });

  it("fails the same way for a wrong password and an unknown email", async () => {
    await registerAlice();
    await expect(
      services.users.authenticate("alice@example.com", "wrong-password")
    ).rejects.toThrow("Incorrect email or password");
    await expect(
      services.users.authenticate("bob@example.com", "correct-horse")
    ).rejects.toBeInstanceOf(UnauthenticatedError);
  });

  it("refuses deactivated accounts", async () => {
    const alice = await registerAlice();
    await services.users.deactivateUser(alice.id, admin);
    await expect(
      services.users.authenticate("alice@example.com", "correct-horse")
    ).rejects.toThrow("Account is deactivated");
  });

  it("issues a token that resolves back to the user", async () => {
    const alice = await registerAlice();
    const { token, user } = await services.users.login("alice@example.com", "correct-horse");
    expect(user.id).toBe(alice.id);
    expect(token.tokenType).toBe("bearer");
    expect(token.expiresIn).toBe(1800);

    const resolved = await services.users.authenticateToken(token.accessToken);
    expect(resolved.id).toBe(alice.id);
  });

  it("rejects tokens of deleted users", async () => {
    const alice = await registerAlice();
    const { token } = await services.users.login("alice@example.com", "correct-horse");
    await services.users.deleteUser(alice.id, admin);
    await expect(services.users.authenticateToken(token.accessToken)).rejects.toBeInstanceOf(
      UnauthenticatedError
    );
  });
});

// ---------------------------------------------------------------------------
// reading users
// ---------------------------------------------------------------------------
describe("getUser", () => {
  it("lets developers read only themselves", async () => {
    const dev = seedUser(services);
    const other = seedUser(services);
    expect((await services.users.getUser(dev.id, dev)).id).toBe(dev.id);
    await expect(services.users.getUser(other.id, dev)).rejects.toBeInstanceOf(ForbiddenError);
  });

  it("lets managers read anyone", async () => {
    const manager = seedUser(services, { role: "manager" });
    const dev = seedUser(services);
    expect((await services.users.getUser(dev.id, manager)).id).toBe(dev.id);
    await expect(services.users.getUser("missing", manager)).rejects.toBeInstanceOf(
      NotFoundError
    );
  });
});

describe("listUsers", () => {
  it("searches name and email case-insensitively", async () => {
    await registerAlice();
    const page = await services.users.listUsers(admin, { search: "ALI" });
    expect(page.total).toBe(1);
    expect(page.items[0]?.fullName).toBe("Alice Smith");
  });

  it("pages through everyone without a search", async () => {
    seedUser(services);
    seedUser(services);
    const page = await services.users.listUsers(admin, { skip: 0, limit: 2 });
    expect(page.total).toBe(3);
    expect(page.items).toHaveLength(2);
    expect(page.limit).toBe(2);
  });

  it("caps the page size at 200", async () => {
    await expect(services.users.listUsers(admin, { limit: 201 })).rejects.toBeInstanceOf(
      InvalidInputError
    );
  });

  it("forbids developers", async () => {
    const dev = seedUser(services);
    await expect(services.users.listUsers(dev)).rejects.toBeInstanceOf(ForbiddenError);
  });
});

// ---------------------------------------------------------------------------
// updateProfile
// ---------------------------------------------------------------------------
describe("updateProfile", () => {
  it("lets users edit their own name and avatar", async () => {
    const dev = seedUser(services);
    const updated = await services.users.updateProfile(
      dev.id,
      [
        { field: "fullName", value: " New Name " },
        { field: "avatarUrl", value: "https://example.com/a.png" },
      ],
      dev
    );
    expect(updated.fullName).toBe("New Name");
    expect(updated.avatarUrl).toBe("https://example.com/a.png");
  });

  it("changes the password", async () => {
    const alice = await registerAlice();
    await services.users.updateProfile(
      alice.id,
      [{ field: "password", value: "brand-new-pass" }],
      alice
    );
    const user = await services.users.authenticate("alice@example.com", "brand-new-pass");
    expect(user.id).toBe(alice.id);
  });

  it("only lets admins change roles", async () => {
    const dev = seedUser(services);
    await expect(
      services.users.updateProfile(dev.id, [{ field: "role", value: "admin" }], dev)
    ).rejects.toThrow("Only administrators can change roles");

    const promoted = await services.users.updateProfile(
      dev.id,
      [{ field: "role", value: "manager" }],
      admin
    );
    expect(promoted.role).toBe("manager");
  });

  it("lets managers edit developers but not other managers", async () => {
    const manager = seedUser(services, { role: "manager" });
    const otherManager = seedUser(services, { role: "manager" });
    const dev = seedUser(services);

    const edited = await services.users.updateProfile(
      dev.id,
      [{ field: "fullName", value: "Edited" }],
      manager
    );
    expect(edited.fullName).toBe("Edited");
    await expect(
      services.users.updateProfile(otherManager.id, [{ field: "fullName", value: "X" }], manager)
    ).rejects.toBeInstanceOf(ForbiddenError);
  });
});

// ---------------------------------------------------------------------------
// deactivation and deletion
// ---------------------------------------------------------------------------
describe("deactivateUser", () => {
  it("deactivates another user", async () => {
    const dev = seedUser(services);
    const result = await services.users.deactivateUser(dev.id, admin);
    expect(result.isActive).toBe(false);
  });

  it("refuses self-deactivation and non-admins", async () => {
    const manager = seedUser(services, { role: "manager" });
    await expect(services.users.deactivateUser(admin.id, admin)).rejects.toThrow(
      "Cannot deactivate your own account"
    );
    await expect(services.users.deactivateUser(admin.id, manager)).rejects.toBeInstanceOf(
      ForbiddenError
    );
  });
});

describe("deleteUser", () => {
  it("cascades to the user's projects", async () => {
    const manager = seedUser(services, { role: "manager" });
    const project = await services.projects.createProject({ name: "Demo", key: "DEMO" }, manager);

    await services.users.deleteUser(manager.id, admin);

    await expect(services.projects.getProject(project.id, admin)).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it("clears the default assignee of other projects", async () => {
    const manager = seedUser(services, { role: "manager" });
    const dev = seedUser(services);
    const project = await services.projects.createProject({ name: "Demo", key: "DEMO" }, manager);
    await services.projects.updateProject(
      project.id,
      [{ field: "defaultAssigneeId", value: dev.id }],
      manager
    );

    await services.users.deleteUser(dev.id, admin);

    expect((await services.projects.getProject(project.id, admin)).defaultAssigneeId).toBeNull();
  });

  it("is admin-only and never self", async () => {
    const dev = seedUser(services);
    await expect(services.users.deleteUser(admin.id, dev)).rejects.toBeInstanceOf(ForbiddenError);
    await expect(services.users.deleteUser(admin.id, admin)).rejects.toBeInstanceOf(
      ForbiddenError
    );
    await expect(services.users.deleteUser("missing", admin)).rejects.toBeInstanceOf(
      NotFoundError
    );
  });
});

describe("ensureAdmin", () => {
  it("creates the administrator once", async () => {
    const seed = { email: "root@example.com", password: "root-password", fullName: "Root" };
    const first = await services.users.ensureAdmin(seed);
    const second = await services.users.ensureAdmin(seed);

    expect(first.created).toBe(true);
    expect(first.user.role).toBe("admin");
    expect(second.created).toBe(false);
    expect(second.user.id).toBe(first.user.id);
  });
});
