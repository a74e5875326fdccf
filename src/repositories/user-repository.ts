import type Database from "better-sqlite3";
import { v4 as uuidv4 } from "uuid";
import { AuthError, ConflictError, NotFoundError, ValidationError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { SecureStore } from "../services/secure-store.js";
import type { User } from "../types.js";
import { hashPassword, isPbkdf2Hash, verifyLegacyPassword, verifyPassword } from "../utils/password.js";

const log = createLogger("auth");

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
export const MIN_PASSWORD_LENGTH = 8;

interface UserRow {
  id: string;
  email: string;
  name: string | null;
  passwordHash: string;
  onboardingCompleted: number;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    onboardingCompleted: row.onboardingCompleted === 1,
  };
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/** Local accounts; the signed-in user id lives in the secure store. */
export class UserRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly secure: SecureStore
  ) {}

  async signUp(email: string, password: string, name?: string | null): Promise<string> {
    const normalized = normalizeEmail(email);
    if (!EMAIL_PATTERN.test(normalized)) {
      throw new ValidationError(`Invalid email address: ${email}`);
    }
    if (password.length < MIN_PASSWORD_LENGTH) {
      throw new ValidationError(`Password must have at least ${MIN_PASSWORD_LENGTH} characters`);
    }
    if (this.findByEmail(normalized)) {
      throw new ConflictError(`An account already exists for ${normalized}`);
    }

    const id = uuidv4();
    this.db
      .prepare<[string, string, string, string | null]>(
        "INSERT INTO User (id, email, passwordHash, name) VALUES (?, ?, ?, ?)"
      )
      .run(id, normalized, hashPassword(password), name?.trim() || null);

    await this.secure.saveCurrentUserId(id);
    log.info(`Account created for ${normalized}`);
    return id;
  }

  async signIn(email: string, password: string): Promise<User | null> {
    const row = this.findByEmail(normalizeEmail(email));
    if (!row) return null;

    let ok = verifyPassword(password, row.passwordHash);

    // Upgrade legacy salted sha256 hashes once the password is proven
    if (!ok && !isPbkdf2Hash(row.passwordHash) && verifyLegacyPassword(password, row.passwordHash)) {
      this.db
        .prepare<[string, string]>("UPDATE User SET passwordHash = ? WHERE id = ?")
        .run(hashPassword(password), row.id);
      log.info(`Upgraded legacy password hash for ${row.email}`);
      ok = true;
    }

    if (!ok) return null;

    await this.secure.saveCurrentUserId(row.id);
    return toUser(row);
  }

  async currentUser(): Promise<User | null> {
    const id = await this.secure.readCurrentUserId();
    if (!id) return null;
    return this.getById(id);
  }

  async requireUser(): Promise<User> {
    const user = await this.currentUser();
    if (!user) {
      throw new AuthError("Not signed in. Use sign_in or sign_up first.");
    }
    return user;
  }

  getById(id: string): User | null {
    const row = this.db
      .prepare<[string], UserRow>(
        "SELECT id, email, name, passwordHash, onboardingCompleted FROM User WHERE id = ? LIMIT 1"
      )
      .get(id);
    return row ? toUser(row) : null;
  }

  updateName(userId: string, name: string | null): User {
    const result = this.db
      .prepare<[string | null, string]>("UPDATE User SET name = ? WHERE id = ?")
      .run(name?.trim() || null, userId);
    if (result.changes === 0) {
      throw new NotFoundError(`User ${userId} not found`);
    }
    const updated = this.getById(userId);
    if (!updated) {
      throw new NotFoundError(`User ${userId} not found`);
    }
    return updated;
  }

  signOut(): Promise<void> {
    return this.secure.clearSession();
  }

  /** Deletes the signed-in user and every row it owns, then wipes local secrets. */
  async deleteAccount(): Promise<boolean> {
    const id = await this.secure.readCurrentUserId();
    if (!id) return false;

    const result = this.db.prepare<[string]>("DELETE FROM User WHERE id = ?").run(id);

    await this.secure.clearSession();
    await this.secure.wipe();
    log.info(`Account ${id} deleted`);
    return result.changes > 0;
  }

  private findByEmail(normalizedEmail: string): UserRow | undefined {
    return this.db
      .prepare<[string], UserRow>(
        "SELECT id, email, name, passwordHash, onboardingCompleted FROM User WHERE lower(email) = ? LIMIT 1"
      )
      .get(normalizedEmail);
  }
}
