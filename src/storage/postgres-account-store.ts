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
 * PostgreSQL-backed AccountStore using postgres.js.
 */

import postgres from "postgres";
import { z } from "zod";
import type { AccountRecord, AccountStore, NewAccount, StorageMetadata } from "./account-store.js";

export interface PostgresAccountStoreOptions {
  connectionString: string;
  max?: number;
}

interface UserRow {
  user_id: string;
  display_name: string | null;
  emails: unknown;
  created_at: Date;
}

const EmailsSchema = z.array(z.string());

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}

export class PostgresAccountStore implements AccountStore {
  private readonly sql: postgres.Sql;
  private initialized = false;

  constructor(options: PostgresAccountStoreOptions) {
    this.sql = postgres(options.connectionString, {
      max: options.max ?? 10,
    });
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    try {
      await this.sql.unsafe(`
        CREATE TABLE IF NOT EXISTS users (
          user_id TEXT PRIMARY KEY,
          display_name TEXT,
          emails JSONB NOT NULL DEFAULT '[]'::jsonb,
          created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
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
    } catch (error) {
      throw new Error(`Failed to initialize database schema: ${errorMessage(error)}`);
    }
  }

  async findBindingByExternalId(authProvider: string, externalId: string): Promise<string | null> {
    try {
      const rows = await this.sql<{ user_id: string }[]>`
        SELECT user_id FROM user_external_ids
        WHERE auth_provider = ${authProvider} AND external_id = ${externalId}
      `;
      return rows[0]?.user_id ?? null;
    } catch (error) {
      throw new Error(`Failed to look up external id ${authProvider}:${externalId}: ${errorMessage(error)}`);
    }
  }

  async findAccountsByCaseInsensitiveId(userId: string): Promise<Map<string, AccountRecord>> {
    let rows: UserRow[];
    try {
      rows = await this.sql<UserRow[]>`
        SELECT user_id, display_name, emails, created_at FROM users
        WHERE lower(user_id) = lower(${userId})
      `;
    } catch (error) {
      throw new Error(`Failed to look up users matching ${userId}: ${errorMessage(error)}`);
    }

    return new Map(
      rows.map((row) => [
        row.user_id,
        {
          userId: row.user_id,
          displayName: row.display_name,
          emails: EmailsSchema.parse(row.emails),
          createdAt: row.created_at.toISOString(),
        },
      ]),
    );
  }

  async createBinding(authProvider: string, externalId: string, userId: string): Promise<void> {
    try {
      await this.sql`
        INSERT INTO user_external_ids (auth_provider, external_id, user_id)
        VALUES (${authProvider}, ${externalId}, ${userId})
      `;
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
      await this.sql`
        INSERT INTO users (user_id, display_name, emails, created_at)
        VALUES (${record.userId}, ${record.displayName}, ${this.sql.json(record.emails)}, ${record.createdAt})
      `;
    } catch (error) {
      throw new Error(`Failed to create account ${account.userId}: ${errorMessage(error)}`);
    }

    return record;
  }

  getMetadata(): StorageMetadata {
    return {
      adapterName: "postgres",
      adapterVersion: "1.0.0",
    };
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
