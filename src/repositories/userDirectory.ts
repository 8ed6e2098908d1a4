/**
 * Account lookup across the masters, employees and administrators tables.
 *
 * Logins are unique per table; when the same login exists in more than one
 * table the masters table wins, then employees, then administrators.
 *
 * @module repositories/userDirectory
 */

import { query } from '../utils/db.js';
import { ROLES } from '../types/index.js';
import type { Credential, Role, UserType } from '../types/index.js';

export interface UserDirectory {
  findByIdentity(identity: string): Promise<Credential | null>;
}

// ─── Row Mapping ─────────────────────────────────────────────────────────────

/** Raw row shape returned by the lookup query. */
interface AccountRow {
  user_type: UserType;
  id: number;
  login: string;
  password_hash: string;
  status: string | null;
  role_name: string | null;
}

function toRole(name: string | null): Role | null {
  return ROLES.find((role) => role === name) ?? null;
}

/**
 * Map a row to a credential. Rows whose role is not one the service
 * knows are dropped: such an account cannot be authorised for anything.
 */
export function mapRowToCredential(row: AccountRow): Credential | null {
  const role = row.user_type === 'master' ? 'master' : toRole(row.role_name);
  if (!role) return null;

  return {
    identity: row.login,
    userId: row.id,
    userType: row.user_type,
    role,
    passwordHash: row.password_hash,
    status: row.status === 'active' ? 'active' : 'inactive',
  };
}

// ─── Queries ─────────────────────────────────────────────────────────────────

export const FIND_ACCOUNT_SQL = `
  SELECT user_type, id, login, password_hash, status, role_name
  FROM (
    SELECT 1 AS precedence, 'master' AS user_type, m.id, m.login, m.password_hash,
           m.status, NULL AS role_name
    FROM masters m
    WHERE m.login = $1
    UNION ALL
    SELECT 2, 'employee', e.id, e.login, e.password_hash, e.status, r.name
    FROM employees e
    JOIN roles r ON r.id = e.role_id
    WHERE e.login = $1
    UNION ALL
    SELECT 3, 'administrator', a.id, a.login, a.password_hash, a.status, r.name
    FROM administrators a
    JOIN roles r ON r.id = a.role_id
    WHERE a.login = $1
  ) accounts
  ORDER BY precedence
  LIMIT 1`;

export async function findByIdentity(identity: string): Promise<Credential | null> {
  const result = await query<AccountRow>(FIND_ACCOUNT_SQL, [identity]);
  const row = result.rows[0];
  return row ? mapRowToCredential(row) : null;
}

/** The directory backed by the shared PostgreSQL pool. */
export const pgUserDirectory: UserDirectory = { findByIdentity };
