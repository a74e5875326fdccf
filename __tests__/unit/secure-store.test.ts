/**
 * Unit tests for the secure store and its backends
 */

import fs from "fs";
import os from "os";
import path from "path";
import { FileKeyValueStore, MemoryKeyValueStore, SecureStore } from "../../src/services/secure-store.js";

describe("SecureStore", () => {
  it("should save, read and clear the session user", async () => {
    const store = new SecureStore(new MemoryKeyValueStore());
    expect(await store.readCurrentUserId()).toBeNull();

    await store.saveCurrentUserId("user-1");
    expect(await store.readCurrentUserId()).toBe("user-1");

    await store.clearSession();
    expect(await store.readCurrentUserId()).toBeNull();
  });

  it("should create the database key once and keep it", async () => {
    const store = new SecureStore(new MemoryKeyValueStore());
    const key = await store.getOrCreateDbKey();

    expect(Buffer.from(key, "base64url")).toHaveLength(32);
    expect(await store.getOrCreateDbKey()).toBe(key);
  });

  it("should forget everything on wipe", async () => {
    const store = new SecureStore(new MemoryKeyValueStore());
    await store.saveCurrentUserId("user-1");
    const key = await store.getOrCreateDbKey();

    await store.wipe();

    expect(await store.readCurrentUserId()).toBeNull();
    expect(await store.getOrCreateDbKey()).not.toBe(key);
  });
});

describe("FileKeyValueStore", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "nutri-store-"));
    file = path.join(dir, "nested", "store.json");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should read null before anything is written", async () => {
    expect(await new FileKeyValueStore(file).read("missing")).toBeNull();
  });

  it("should persist values across instances in an owner-only file", async () => {
    await new FileKeyValueStore(file).write("nutri.current_user_id.v1", "user-1");

    expect(await new FileKeyValueStore(file).read("nutri.current_user_id.v1")).toBe("user-1");
    expect(JSON.parse(fs.readFileSync(file, "utf8"))).toEqual({ "nutri.current_user_id.v1": "user-1" });
    expect(fs.statSync(file).mode & 0o777).toBe(0o600);
  });

  it("should delete single keys and remove the file on deleteAll", async () => {
    const store = new FileKeyValueStore(file);
    await store.write("a", "1");
    await store.write("b", "2");

    await store.delete("a");
    expect(await store.read("a")).toBeNull();
    expect(await store.read("b")).toBe("2");

    await store.deleteAll();
    expect(fs.existsSync(file)).toBe(false);
  });
});
