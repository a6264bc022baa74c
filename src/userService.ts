import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import {
  canChangeRole,
  canDeactivate,
  canEditProfile,
  canListAllUsers,
} from "./accessPolicy.js";
import { hashPassword, verifyPassword, type IssuedToken, type TokenService } from "./auth.js";
import type { ServiceContext } from "./container.js";
import {
  ConflictError,
  ForbiddenError,
  InvalidInputError,
  NotFoundError,
  UnauthenticatedError,
} from "./errors.js";
import { resolvePaging, type Paging } from "./issueService.js";
import { welcomeNotification } from "./notifications.js";
import { now, writeTransaction } from "./storage.js";
import type { Page, Role, User } from "./types.js";
import { requireText, type ProfileUpdate } from "./updates.js";
import {
  deleteUserRow,
  findUserByEmail,
  findUserById,
  insertUser,
  saveUser,
  searchUsers,
} from "./userStore.js";

export const MIN_PASSWORD_LENGTH = 8;
export const MAX_USER_PAGE_SIZE = 200;

export interface RegisterInput {
  email: string;
  fullName: string;
  password: string;
  role?: Role;
}

export interface LoginResult {
  token: IssuedToken;
  user: User;
}

const emailSchema = z.string().trim().toLowerCase().email();

function normalizeEmail(raw: string): string {
  const parsed = emailSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError("Invalid email address");
  }
  return parsed.data;
}

function checkPassword(password: string): void {
  if (password.length < MIN_PASSWORD_LENGTH) {
    throw new InvalidInputError(
      `Password must be at least ${MIN_PASSWORD_LENGTH} characters`
    );
  }
}

export class UserService {
  constructor(
    private readonly ctx: ServiceContext,
    private readonly tokens: TokenService
  ) {}

  async registerUser(input: RegisterInput): Promise<User> {
    const email = normalizeEmail(input.email);
    const fullName = requireText("fullName", input.fullName);
    checkPassword(input.password);
    // Hashing is slow; keep it outside the write lock.
    const passwordHash = await hashPassword(input.password);
    const { db } = this.ctx;

    const user = writeTransaction(db, () => {
      if (findUserByEmail(db, email)) {
        throw new ConflictError("User with this email already exists");
      }
      const timestamp = now();
      const user: User = {
        id: uuidv4(),
        email,
        fullName,
        passwordHash,
        avatarUrl: null,
        role: input.role ?? "developer",
        isActive: true,
        createdAt: timestamp,
        updatedAt: timestamp,
      };
      insertUser(db, user);
      return user;
    });

    this.ctx.notifications.enqueue(welcomeNotification(user));
    return user;
  }

  /** Check credentials. Unknown email and wrong password fail the same way. */
  async authenticate(email: string, password: string): Promise<User> {
    const user = findUserByEmail(this.ctx.db, email);
    const valid = await verifyPassword(password, user?.passwordHash ?? null);
    if (!user || !valid) {
      throw new UnauthenticatedError("Incorrect email or password");
    }
    if (!user.isActive) {
      throw new ForbiddenError("Account is deactivated");
    }
    return user;
  }

  async login(email: string, password: string): Promise<LoginResult> {
    const user = await this.authenticate(email, password);
    return { token: this.tokens.issue(user), user };
  }

  /** Resolve a bearer token to the live user record it was issued for. */
  async authenticateToken(token: string): Promise<User> {
    const claims = this.tokens.verify(token);
    const user = findUserById(this.ctx.db, claims.sub);
    if (!user) {
      throw new UnauthenticatedError();
    }
    if (!user.isActive) {
      throw new ForbiddenError("Account is deactivated");
    }
    return user;
  }

  async getUser(userId: string, actor: User): Promise<User> {
    if (userId !== actor.id && !canListAllUsers(actor)) {
      throw new ForbiddenError("Can only view your own profile");
    }
    const user = findUserById(this.ctx.db, userId);
    if (!user) {
      throw new NotFoundError("User", userId);
    }
    return user;
  }

  async listUsers(
    actor: User,
    options: Paging & { search?: string } = {}
  ): Promise<Page<User>> {
    if (!canListAllUsers(actor)) {
      throw new ForbiddenError("Insufficient permissions to list users");
    }
    const { skip, limit } = resolvePaging(options, MAX_USER_PAGE_SIZE);
    const search = options.search?.trim();
    const { users, total } = searchUsers(this.ctx.db, {
      search: search || undefined,
      skip,
      limit,
    });
    return { items: users, total, skip, limit };
  }

  async updateProfile(userId: string, updates: ProfileUpdate[], actor: User): Promise<User> {
    if (updates.length === 0) {
      throw new InvalidInputError("No valid fields to update");
    }
    if (updates.some((u) => u.field === "role") && !canChangeRole(actor)) {
      throw new ForbiddenError("Only administrators can change roles");
    }

    let passwordHash: string | undefined;
    for (const update of updates) {
      if (update.field === "password") {
        checkPassword(update.value);
        passwordHash = await hashPassword(update.value);
      }
    }

    const { db } = this.ctx;
    return writeTransaction(db, () => {
      const target = findUserById(db, userId);
      if (!target) {
        throw new NotFoundError("User", userId);
      }
      if (!canEditProfile(actor, target)) {
        throw new ForbiddenError("Cannot edit this user's profile");
      }

      const next: User = { ...target };
      for (const update of updates) {
        switch (update.field) {
          case "fullName":
            next.fullName = requireText("fullName", update.value);
            break;
          case "avatarUrl":
            next.avatarUrl = update.value;
            break;
          case "password":
            next.passwordHash = passwordHash ?? next.passwordHash;
            break;
          case "role":
            next.role = update.value;
            break;
        }
      }
      next.updatedAt = now();
      saveUser(db, next);
      return next;
    });
  }

  async deactivateUser(userId: string, actor: User): Promise<User> {
    const { db } = this.ctx;
    return writeTransaction(db, () => {
      const target = findUserById(db, userId);
      if (!target) {
        throw new NotFoundError("User", userId);
      }
      if (!canDeactivate(actor, target)) {
        throw new ForbiddenError(
          actor.id === target.id
            ? "Cannot deactivate your own account"
            : "Only administrators can deactivate users"
        );
      }
      if (!target.isActive) return target;

      const next: User = { ...target, isActive: false, updatedAt: now() };
      saveUser(db, next);
      return next;
    });
  }

  /**
   * Hard delete. Projects the user owns and issues they reported or were
   * assigned go with them.
   */
  async deleteUser(userId: string, actor: User): Promise<void> {
    if (actor.role !== "admin") {
      throw new ForbiddenError("Only administrators can delete users");
    }
    if (actor.id === userId) {
      throw new ForbiddenError("Cannot delete your own account");
    }
    const { db } = this.ctx;
    writeTransaction(db, () => {
      if (!deleteUserRow(db, userId)) {
        throw new NotFoundError("User", userId);
      }
    });
  }

  /** Create the bootstrap administrator unless that email is already registered. */
  async ensureAdmin(seed: {
    email: string;
    password: string;
    fullName: string;
  }): Promise<{ user: User; created: boolean }> {
    const existing = findUserByEmail(this.ctx.db, seed.email);
    if (existing) {
      return { user: existing, created: false };
    }
    const user = await this.registerUser({ ...seed, role: "admin" });
    return { user, created: true };
  }
}
