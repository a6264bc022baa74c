import { createHmac, randomBytes, scrypt, timingSafeEqual } from "crypto";
import { z } from "zod";
import { UnauthenticatedError } from "./errors.js";
import { ROLES, type User } from "./types.js";

const KEY_LENGTH = 64;

function deriveKey(password: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, (err, key) => {
      if (err) reject(err);
      else resolve(key);
    });
  });
}

/** Hash a password as `scrypt$<salt hex>$<key hex>`. */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(16);
  const key = await deriveKey(password, salt);
  return `scrypt$${salt.toString("hex")}$${key.toString("hex")}`;
}

const DUMMY_SALT = Buffer.alloc(16);

/**
 * Check a password against a stored hash. A missing or unreadable hash still
 * costs one key derivation, so unknown accounts answer as slowly as known ones.
 */
export async function verifyPassword(
  password: string,
  stored: string | null
): Promise<boolean> {
  const [scheme, saltHex, keyHex] = (stored ?? "").split("$");
  if (scheme !== "scrypt" || !saltHex || !keyHex) {
    await deriveKey(password, DUMMY_SALT);
    return false;
  }

  const expected = Buffer.from(keyHex, "hex");
  const actual = await deriveKey(password, Buffer.from(saltHex, "hex"));
  if (actual.length !== expected.length) return false;
  return timingSafeEqual(actual, expected);
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(ROLES),
  exp: z.number().int(),
});

export type TokenClaims = z.infer<typeof claimsSchema>;

export interface IssuedToken {
  accessToken: string;
  tokenType: "bearer";
  expiresIn: number;
}

/**
 * Signs and verifies bearer tokens: `<base64url claims>.<base64url HMAC-SHA256>`.
 * The secret is supplied by configuration.
 */
export class TokenService {
  constructor(
    private readonly secret: string,
    private readonly ttlSeconds: number
  ) {
    if (secret.length === 0) {
      throw new Error("TokenService requires a signing secret");
    }
  }

  issue(user: Pick<User, "id" | "role">): IssuedToken {
    const claims: TokenClaims = {
      sub: user.id,
      role: user.role,
      exp: Math.floor(Date.now() / 1000) + this.ttlSeconds,
    };
    const payload = Buffer.from(JSON.stringify(claims)).toString("base64url");
    return {
      accessToken: `${payload}.${this.sign(payload)}`,
      tokenType: "bearer",
      expiresIn: this.ttlSeconds,
    };
  }

  /** Return the claims of a well-formed, correctly signed, unexpired token. */
  verify(token: string): TokenClaims {
    const [payload, signature, extra] = token.split(".");
    if (!payload || !signature || extra !== undefined) {
      throw new UnauthenticatedError();
    }

    const expected = Buffer.from(this.sign(payload));
    const given = Buffer.from(signature);
    if (expected.length !== given.length || !timingSafeEqual(expected, given)) {
      throw new UnauthenticatedError();
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(Buffer.from(payload, "base64url").toString("utf-8"));
    } catch {
      throw new UnauthenticatedError();
    }
    const claims = claimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new UnauthenticatedError();
    }
    if (claims.data.exp <= Math.floor(Date.now() / 1000)) {
      throw new UnauthenticatedError("Token has expired");
    }
    return claims.data;
  }

  private sign(payload: string): string {
    return createHmac("sha256", this.secret).update(payload).digest("base64url");
  }
}
