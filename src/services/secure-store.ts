import crypto from "crypto";
import fs from "fs/promises";
import path from "path";

export interface KeyValueStore {
  read(key: string): Promise<string | null>;
  write(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
  deleteAll(): Promise<void>;
}

/** Owner-only JSON file; stands in for the platform keychain on a desktop/server host. */
export class FileKeyValueStore implements KeyValueStore {
  constructor(private readonly filePath: string) {}

  async read(key: string): Promise<string | null> {
    const data = await this.load();
    return data[key] ?? null;
  }

  async write(key: string, value: string): Promise<void> {
    const data = await this.load();
    data[key] = value;
    await this.save(data);
  }

  async delete(key: string): Promise<void> {
    const data = await this.load();
    if (!(key in data)) return;
    delete data[key];
    await this.save(data);
  }

  async deleteAll(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }

  private async load(): Promise<Record<string, string>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return {};
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    const data: Record<string, string> = {};
    if (parsed && typeof parsed === "object") {
      for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === "string") data[key] = value;
      }
    }
    return data;
  }

  private async save(data: Record<string, string>): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(data, null, 2), { mode: 0o600 });
  }
}

export class MemoryKeyValueStore implements KeyValueStore {
  private readonly data = new Map<string, string>();

  async read(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async write(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }

  async deleteAll(): Promise<void> {
    this.data.clear();
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

// Keys carry a version suffix so their format can change later
const CURRENT_USER_KEY = "nutri.current_user_id.v1";
const DB_KEY = "nutri.db_key.v1";

/**
 * Session and secret persistence.
 * The database key is reserved for an encrypted database file; nothing encrypts with it yet.
 */
export class SecureStore {
  constructor(private readonly backend: KeyValueStore) {}

  saveCurrentUserId(userId: string): Promise<void> {
    return this.backend.write(CURRENT_USER_KEY, userId);
  }

  readCurrentUserId(): Promise<string | null> {
    return this.backend.read(CURRENT_USER_KEY);
  }

  clearSession(): Promise<void> {
    return this.backend.delete(CURRENT_USER_KEY);
  }

  /** 256-bit base64url key, generated and persisted on first call. */
  async getOrCreateDbKey(): Promise<string> {
    const existing = await this.backend.read(DB_KEY);
    if (existing) return existing;

    const key = crypto.randomBytes(32).toString("base64url");
    await this.backend.write(DB_KEY, key);
    return key;
  }

  wipe(): Promise<void> {
    return this.backend.deleteAll();
  }
}
