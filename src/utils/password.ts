import crypto from "crypto";

/**
 * Password hashing with PBKDF2-HMAC-SHA256.
 *
 * Stored format: `pbkdf2$<iterations>$<dkLen>$<saltB64url>$<hashB64url>`
 */
const PREFIX = "pbkdf2";
const ITERATIONS = 120_000;
const SALT_LENGTH = 16;
const KEY_LENGTH = 32;
const DIGEST = "sha256";

export function hashPassword(password: string): string {
  const salt = crypto.randomBytes(SALT_LENGTH);
  const derived = crypto.pbkdf2Sync(password, salt, ITERATIONS, KEY_LENGTH, DIGEST);
  return [PREFIX, ITERATIONS, KEY_LENGTH, salt.toString("base64url"), derived.toString("base64url")].join("$");
}

export function verifyPassword(password: string, stored: string): boolean {
  const parts = stored.split("$");
  if (parts.length !== 5 || parts[0] !== PREFIX) return false;

  const iterations = Number(parts[1]);
  const keyLength = Number(parts[2]);
  if (!Number.isInteger(iterations) || iterations <= 0) return false;
  if (!Number.isInteger(keyLength) || keyLength <= 0) return false;

  const salt = Buffer.from(parts[3], "base64url");
  const expected = Buffer.from(parts[4], "base64url");
  if (salt.length === 0 || expected.length !== keyLength) return false;

  const derived = crypto.pbkdf2Sync(password, salt, iterations, keyLength, DIGEST);
  return crypto.timingSafeEqual(derived, expected);
}

export function isPbkdf2Hash(stored: string): boolean {
  return stored.startsWith(`${PREFIX}$`);
}

// Legacy format: `<salt>$<b64url(sha256("<salt>::<password>"))>`, upgraded on sign-in
export function legacyHash(password: string, salt: string): string {
  const digest = crypto.createHash("sha256").update(`${salt}::${password}`, "utf8").digest();
  return `${salt}$${digest.toString("base64url")}`;
}

export function verifyLegacyPassword(password: string, stored: string): boolean {
  const parts = stored.split("$");
  if (parts.length !== 2) return false;
  const [salt, encoded] = parts;

  const expected = Buffer.from(encoded, "base64url");
  const actual = crypto.createHash("sha256").update(`${salt}::${password}`, "utf8").digest();
  return expected.length === actual.length && crypto.timingSafeEqual(expected, actual);
}
