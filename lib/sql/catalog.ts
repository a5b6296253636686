/**
 * Schema and user tables built up while analyzing a batch of statements.
 * Each analyzer run owns a fresh pair; nothing here is shared between runs.
 */

import type { ColumnType, Privilege } from "./types";

export interface ColumnInfo {
  name: string;
  type: ColumnType;
}

export interface GrantInfo {
  table: string;
  privilege: Privilege;
}

export interface UserInfo {
  password: string;
  grants: GrantInfo[];
}

/**
 * Plain snapshot of the schema table: table name to columns in declaration order
 */
export type SchemaSnapshot = Record<string, ColumnInfo[]>;

/**
 * Plain snapshot of the user table
 */
export type UserSnapshot = Record<string, UserInfo>;

export class SchemaTable {
  private tables = new Map<string, Map<string, ColumnType>>();

  has(table: string): boolean {
    return this.tables.has(table);
  }

  /**
   * Register a table. Callers check for duplicates first.
   */
  define(table: string, columns: ColumnInfo[]): void {
    this.tables.set(table, new Map(columns.map((column) => [column.name, column.type])));
  }

  /**
   * Declared type of a column, or undefined when the table or column is unknown
   */
  columnType(table: string, column: string): ColumnType | undefined {
    return this.tables.get(table)?.get(column);
  }

  columns(table: string): ColumnInfo[] {
    const columns = this.tables.get(table);
    if (!columns) return [];
    return Array.from(columns, ([name, type]) => ({ name, type }));
  }

  tableNames(): string[] {
    return Array.from(this.tables.keys());
  }

  toJSON(): SchemaSnapshot {
    const snapshot: SchemaSnapshot = {};
    for (const table of this.tables.keys()) {
      snapshot[table] = this.columns(table);
    }
    return snapshot;
  }
}

export class UserTable {
  private users = new Map<string, UserInfo>();

  has(username: string): boolean {
    return this.users.has(username);
  }

  create(username: string, password: string): void {
    this.users.set(username, { password, grants: [] });
  }

  /**
   * Record a grant. Granting a pair the user already holds changes nothing.
   *
   * @returns "granted" when the pair was added, "duplicate" when it was already
   * present, "unknown-user" when there is no such user
   */
  grant(username: string, table: string, privilege: Privilege): "granted" | "duplicate" | "unknown-user" {
    const user = this.users.get(username);
    if (!user) return "unknown-user";

    if (user.grants.some((grant) => grant.table === table && grant.privilege === privilege)) {
      return "duplicate";
    }

    user.grants.push({ table, privilege });
    return "granted";
  }

  grants(username: string): GrantInfo[] {
    return [...(this.users.get(username)?.grants ?? [])];
  }

  hasPrivilege(username: string, table: string, privilege: Privilege): boolean {
    return this.grants(username).some((grant) => grant.table === table && grant.privilege === privilege);
  }

  usernames(): string[] {
    return Array.from(this.users.keys());
  }

  toJSON(): UserSnapshot {
    const snapshot: UserSnapshot = {};
    for (const [username, user] of this.users) {
      snapshot[username] = {
        password: user.password,
        grants: user.grants.map((grant) => ({ ...grant })),
      };
    }
    return snapshot;
  }
}
