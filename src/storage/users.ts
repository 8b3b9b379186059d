/**
 * User directory backed by SQLite
 *
 * Emails are stored lower-cased and compared case-insensitively. The
 * credential hash leaves this module only through `findCredentials`.
 */

import { z } from "zod";
import type { DatabaseHandle } from "./db";
import { isUniqueViolation } from "./db";
import { DuplicateCredentialError } from "../api/errors";
import type { AccountCredentials, NewAccount, UserProfile } from "../types";

/**
 * What the identity layer needs from account storage
 */
export interface UserDirectory {
  findById(id: number): Promise<UserProfile | null>;
  findByEmail(email: string): Promise<UserProfile | null>;
  findCredentials(email: string): Promise<AccountCredentials | null>;
  existsByEmail(email: string): Promise<boolean>;
  /** Throws DuplicateCredentialError when the email is taken */
  create(account: NewAccount): Promise<UserProfile>;
}

const ProfileRow = z.object({
  id: z.number().int(),
  email: z.string(),
  display_name: z.string().nullable(),
  created_at: z.string(),
});

type ProfileRow = z.infer<typeof ProfileRow>;

const CredentialsRow = z.object({
  id: z.number().int(),
  email: z.string(),
  password_hash: z.string(),
});

const FoundRow = z.object({ found: z.number() });

const PROFILE_COLUMNS = "id, email, display_name, created_at";

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function toProfile(row: ProfileRow): UserProfile {
  return {
    id: row.id,
    email: row.email,
    displayName: row.display_name,
    createdAt: row.created_at,
  };
}

export class SqliteUserDirectory implements UserDirectory {
  constructor(private readonly db: DatabaseHandle) {}

  async findById(id: number): Promise<UserProfile | null> {
    const row = this.db.get(`SELECT ${PROFILE_COLUMNS} FROM users WHERE id = ?`, ProfileRow, [id]);
    return row ? toProfile(row) : null;
  }

  async findByEmail(email: string): Promise<UserProfile | null> {
    const row = this.db.get(`SELECT ${PROFILE_COLUMNS} FROM users WHERE email = ?`, ProfileRow, [
      normalizeEmail(email),
    ]);
    return row ? toProfile(row) : null;
  }

  async findCredentials(email: string): Promise<AccountCredentials | null> {
    const row = this.db.get(
      "SELECT id, email, password_hash FROM users WHERE email = ?",
      CredentialsRow,
      [normalizeEmail(email)]
    );
    return row ? { userId: row.id, email: row.email, credentialHash: row.password_hash } : null;
  }

  async existsByEmail(email: string): Promise<boolean> {
    const row = this.db.get("SELECT 1 AS found FROM users WHERE email = ?", FoundRow, [
      normalizeEmail(email),
    ]);
    return row !== null;
  }

  async create(account: NewAccount): Promise<UserProfile> {
    try {
      const row = this.db.get(
        `INSERT INTO users (email, password_hash, display_name)
         VALUES (?, ?, ?)
         RETURNING ${PROFILE_COLUMNS}`,
        ProfileRow,
        [normalizeEmail(account.email), account.credentialHash, account.displayName ?? null]
      );

      if (!row) {
        throw new Error("Insert into users returned no row");
      }
      return toProfile(row);
    } catch (err) {
      // Two registrations racing past the existence check
      if (isUniqueViolation(err)) {
        throw new DuplicateCredentialError();
      }
      throw err;
    }
  }
}
