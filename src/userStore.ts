import { ConflictError } from "./errors.js";
import { isUniqueViolation, parseEnum, type Db } from "./storage.js";
import { ROLES, type PublicUser, type User } from "./types.js";

interface UserRow {
  id: string;
  email: string;
  full_name: string;
  password_hash: string | null;
  avatar_url: string | null;
  role: string;
  is_active: number;
  created_at: string;
  updated_at: string;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    fullName: row.full_name,
    passwordHash: row.password_hash,
    avatarUrl: row.avatar_url,
    role: parseEnum(ROLES, row.role, "users.role"),
    isActive: row.is_active === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _omitted, ...rest } = user;
  return rest;
}

export function findUserById(db: Db, id: string): User | null {
  const row = db
    .prepare<[string], UserRow>("SELECT * FROM users WHERE id = ?")
    .get(id);
  return row ? toUser(row) : null;
}

export function findUserByEmail(db: Db, email: string): User | null {
  const row = db
    .prepare<[string], UserRow>("SELECT * FROM users WHERE email = ?")
    .get(email.trim().toLowerCase());
  return row ? toUser(row) : null;
}

export function insertUser(db: Db, user: User): void {
  try {
    db.prepare(
      `INSERT INTO users
         (id, email, full_name, password_hash, avatar_url, role, is_active, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
    ).run(
      user.id,
      user.email,
      user.fullName,
      user.passwordHash,
      user.avatarUrl,
      user.role,
      user.isActive ? 1 : 0,
      user.createdAt,
      user.updatedAt
    );
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new ConflictError("User with this email already exists");
    }
    throw err;
  }
}

/** Write back every mutable column. */
export function saveUser(db: Db, user: User): void {
  db.prepare(
    `UPDATE users
        SET full_name = ?, password_hash = ?, avatar_url = ?, role = ?,
            is_active = ?, updated_at = ?
      WHERE id = ?`
  ).run(
    user.fullName,
    user.passwordHash,
    user.avatarUrl,
    user.role,
    user.isActive ? 1 : 0,
    user.updatedAt,
    user.id
  );
}

export function deleteUserRow(db: Db, id: string): boolean {
  return db.prepare("DELETE FROM users WHERE id = ?").run(id).changes > 0;
}

export function listAllUsers(db: Db): User[] {
  return db
    .prepare<[], UserRow>("SELECT * FROM users ORDER BY full_name, email")
    .all()
    .map(toUser);
}

export function searchUsers(
  db: Db,
  options: { search?: string; skip: number; limit: number }
): { users: User[]; total: number } {
  const params: string[] = [];
  let where = "";
  if (options.search) {
    const pattern = `%${options.search.toLowerCase()}%`;
    where = "WHERE lower(full_name) LIKE ? OR lower(email) LIKE ?";
    params.push(pattern, pattern);
  }

  const users = db
    .prepare<(string | number)[], UserRow>(
      `SELECT * FROM users ${where} ORDER BY full_name, email LIMIT ? OFFSET ?`
    )
    .all(...params, options.limit, options.skip)
    .map(toUser);
  const counted = db
    .prepare<string[], { total: number }>(
      `SELECT COUNT(*) AS total FROM users ${where}`
    )
    .get(...params);

  return { users, total: counted?.total ?? 0 };
}
