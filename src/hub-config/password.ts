/**
 * Password hashing for hub credentials
 *
 * The dashboard credential is an htpasswd entry ("user:hash"); the initial
 * Portainer admin password is a bare hash. Both use bcrypt, which Traefik's
 * basicAuth middleware and Portainer's --admin-password flag accept.
 */

import * as bcrypt from "bcryptjs";
import { ConfigValidationError, UsageError } from "../errors";

/** bcrypt cost factor for new hashes */
export const DEFAULT_BCRYPT_ROUNDS = 10;

/**
 * Hash a password with a fresh salt
 *
 * - "s3cret" -> "$2a$10$..."
 */
export function hashPassword(password: string, rounds = DEFAULT_BCRYPT_ROUNDS): string {
  if (password === "") {
    throw new UsageError("Password must not be empty");
  }
  return bcrypt.hashSync(password, rounds);
}

/**
 * Build an htpasswd entry
 *
 * - ("admin", "s3cret") -> "admin:$2a$10$..."
 *
 * @throws UsageError for an empty username, or one containing ":" or whitespace
 */
export function hashUsernamePassword(
  username: string,
  password: string,
  rounds = DEFAULT_BCRYPT_ROUNDS
): string {
  if (username === "" || /[:\s]/.test(username)) {
    throw new UsageError(`Invalid username "${username}": must be non-empty, without ":" or whitespace`);
  }
  return `${username}:${hashPassword(password, rounds)}`;
}

/**
 * Check a username and password against an htpasswd entry
 *
 * @returns false when the username differs or the password does not match
 * @throws ConfigValidationError when the entry has no "username:" prefix
 */
export function checkUsernamePassword(entry: string, username: string, password: string): boolean {
  const separator = entry.indexOf(":");
  if (separator < 0) {
    throw new ConfigValidationError("credential", [
      { code: "INVALID_CREDENTIAL", message: 'Invalid credential: expected "user:hash"' },
    ]);
  }
  if (entry.slice(0, separator) !== username) return false;
  return bcrypt.compareSync(password, entry.slice(separator + 1));
}
