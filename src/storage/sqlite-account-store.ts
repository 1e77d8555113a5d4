// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * SQLite-backed AccountStore using better-sqlite3.
 */

import Database from "better-sqlite3";
import { z } from "zod";
import type { AccountRecord, AccountStore, NewAccount, StorageMetadata } from "./account-store.js";

export interface SQLiteAccountStoreOptions {
  dbPath: string;
}

interface UserRow {
  user_id: string;
  display_name: string | null;
  emails: string;
  created_at: string;
}

const EmailsSchema = z.array(z.string());

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}

function toAccountRecord(row: UserRow): AccountRecord {
  return {
    userId: row.user_id,
    displayName: row.display_name,
    emails: EmailsSchema.parse(JSON.parse(row.emails)),
    createdAt: row.created_at,
  };
}

export class SQLiteAccountStore implements AccountStore {
  private readonly db: Database.Database;
  private initialized = false;

  constructor(options: SQLiteAccountStoreOptions) {
    this.db = new Database(options.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        user_id TEXT PRIMARY KEY,
        display_name TEXT,
        emails TEXT NOT NULL DEFAULT '[]',
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_users_lower_user_id ON users (lower(user_id));

      CREATE TABLE IF NOT EXISTS user_external_ids (
        auth_provider TEXT NOT NULL,
        external_id TEXT NOT NULL,
        user_id TEXT NOT NULL REFERENCES users (user_id),
        PRIMARY KEY (auth_provider, external_id)
      );
    `);

    this.initialized = true;
  }

  async findBindingByExternalId(authProvider: string, externalId: string): Promise<string | null> {
    const row = this.db
      .prepare<[string, string], { user_id: string }>(
        "SELECT user_id FROM user_external_ids WHERE auth_provider = ? AND external_id = ?",
      )
      .get(authProvider, externalId);
    return row?.user_id ?? null;
  }

  async findAccountsByCaseInsensitiveId(userId: string): Promise<Map<string, AccountRecord>> {
    const rows = this.db
      .prepare<[string], UserRow>(
        "SELECT user_id, display_name, emails, created_at FROM users WHERE lower(user_id) = lower(?)",
      )
      .all(userId);
    return new Map(rows.map((row) => [row.user_id, toAccountRecord(row)]));
  }

  async createBinding(authProvider: string, externalId: string, userId: string): Promise<void> {
    try {
      this.db
        .prepare<[string, string, string]>(
          "INSERT INTO user_external_ids (auth_provider, external_id, user_id) VALUES (?, ?, ?)",
        )
        .run(authProvider, externalId, userId);
    } catch (error) {
      throw new Error(
        `Failed to record external id ${authProvider}:${externalId} for ${userId}: ${errorMessage(error)}`,
      );
    }
  }

  async createAccount(account: NewAccount): Promise<AccountRecord> {
    const record: AccountRecord = {
      userId: account.userId,
      displayName: account.displayName,
      emails: [...account.emails],
      createdAt: new Date().toISOString(),
    };

    try {
      this.db
        .prepare<[string, string | null, string, string]>(
          "INSERT INTO users (user_id, display_name, emails, created_at) VALUES (?, ?, ?, ?)",
        )
        .run(record.userId, record.displayName, JSON.stringify(record.emails), record.createdAt);
    } catch (error) {
      throw new Error(`Failed to create account ${account.userId}: ${errorMessage(error)}`);
    }

    return record;
  }

  getMetadata(): StorageMetadata {
    return {
      adapterName: "sqlite",
      adapterVersion: "1.0.0",
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
