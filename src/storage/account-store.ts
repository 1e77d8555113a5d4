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
 * AccountStore interface: durable users and external-identity bindings.
 * Implementations: SQLite (better-sqlite3) and PostgreSQL (postgres.js).
 */

export interface AccountRecord {
  userId: string;
  displayName: string | null;
  emails: string[];
  createdAt: string;
}

export interface NewAccount {
  userId: string;
  displayName: string | null;
  emails: readonly string[];
}

export interface StorageMetadata {
  adapterName: string;
  adapterVersion: string;
}

export interface AccountStore {
  initialize(): Promise<void>;

  /** The local user bound to `(authProvider, externalId)`, or null. */
  findBindingByExternalId(authProvider: string, externalId: string): Promise<string | null>;

  /** Every account whose user ID equals `userId` ignoring case, keyed by exact user ID. */
  findAccountsByCaseInsensitiveId(userId: string): Promise<Map<string, AccountRecord>>;

  /** @throws when the binding already exists. */
  createBinding(authProvider: string, externalId: string, userId: string): Promise<void>;

  /** @throws when the user ID is already taken. */
  createAccount(account: NewAccount): Promise<AccountRecord>;

  getMetadata(): StorageMetadata;

  close(): Promise<void>;
}
