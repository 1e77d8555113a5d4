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

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const { mockPostgresStore, mockSqliteStore } = vi.hoisted(() => {
  const mockPostgresStore = {
    initialize: vi.fn().mockResolvedValue(undefined),
    close: vi.fn().mockResolvedValue(undefined),
    getMetadata: vi.fn().mockReturnValue({ adapterName: "postgres", adapterVersion: "1.0.0" }),
  };
  const mockSqliteStore = {
    initialize: vi.fn().mockResolvedValue(undefined),
    close: vi.fn().mockResolvedValue(undefined),
    getMetadata: vi.fn().mockReturnValue({ adapterName: "sqlite", adapterVersion: "1.0.0" }),
  };
  return { mockPostgresStore, mockSqliteStore };
});

vi.mock("../../../src/storage/postgres-account-store.js", () => ({
  PostgresAccountStore: vi.fn().mockImplementation(() => mockPostgresStore),
}));
vi.mock("../../../src/storage/sqlite-account-store.js", () => ({
  SQLiteAccountStore: vi.fn().mockImplementation(() => mockSqliteStore),
}));

import {
  closeAccountStore,
  createAccountStore,
  getAccountStore,
  resetAccountStore,
} from "../../../src/storage/factory.js";
import { PostgresAccountStore } from "../../../src/storage/postgres-account-store.js";
import { SQLiteAccountStore } from "../../../src/storage/sqlite-account-store.js";

function removeEnv(key: string): void {
  Reflect.deleteProperty(process.env, key);
}

describe("createAccountStore", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("selects PostgreSQL for postgres:// URLs", () => {
    expect(createAccountStore({ DATABASE_URL: "postgres://localhost:5432/sso" })).toBe(
      mockPostgresStore,
    );
    expect(PostgresAccountStore).toHaveBeenCalledWith({
      connectionString: "postgres://localhost:5432/sso",
    });
  });

  it("selects PostgreSQL for postgresql:// URLs", () => {
    expect(createAccountStore({ DATABASE_URL: "postgresql://localhost:5432/sso" })).toBe(
      mockPostgresStore,
    );
  });

  it("falls back to SQLite for other URLs", () => {
    expect(createAccountStore({ DATABASE_URL: "mysql://localhost:3306/sso" })).toBe(
      mockSqliteStore,
    );
    expect(SQLiteAccountStore).toHaveBeenCalledWith({ dbPath: "data/sso.db" });
  });

  it("uses DB_PATH for SQLite", () => {
    createAccountStore({ DB_PATH: "/tmp/custom.db" });
    expect(SQLiteAccountStore).toHaveBeenCalledWith({ dbPath: "/tmp/custom.db" });
  });
});

describe("getAccountStore", () => {
  let savedDatabaseUrl: string | undefined;
  let savedDbPath: string | undefined;

  beforeEach(() => {
    savedDatabaseUrl = process.env.DATABASE_URL;
    savedDbPath = process.env.DB_PATH;
    removeEnv("DATABASE_URL");
    removeEnv("DB_PATH");
    resetAccountStore();
    vi.clearAllMocks();
  });

  afterEach(() => {
    if (savedDatabaseUrl !== undefined) {
      process.env.DATABASE_URL = savedDatabaseUrl;
    } else {
      removeEnv("DATABASE_URL");
    }
    if (savedDbPath !== undefined) {
      process.env.DB_PATH = savedDbPath;
    } else {
      removeEnv("DB_PATH");
    }
  });

  it("reads DATABASE_URL from the environment", async () => {
    process.env.DATABASE_URL = "postgres://localhost:5432/sso";

    await expect(getAccountStore()).resolves.toBe(mockPostgresStore);
  });

  it("returns the same initialized instance on subsequent calls", async () => {
    const first = await getAccountStore();
    const second = await getAccountStore();

    expect(first).toBe(second);
    expect(mockSqliteStore.initialize).toHaveBeenCalledTimes(1);
  });

  it("shares one initialization between concurrent callers", async () => {
    const [first, second] = await Promise.all([getAccountStore(), getAccountStore()]);

    expect(first).toBe(second);
    expect(SQLiteAccountStore).toHaveBeenCalledTimes(1);
    expect(mockSqliteStore.initialize).toHaveBeenCalledTimes(1);
  });

  it("retries initialization after a failure", async () => {
    mockSqliteStore.initialize.mockRejectedValueOnce(new Error("disk full"));

    await expect(getAccountStore()).rejects.toThrow("disk full");
    await expect(getAccountStore()).resolves.toBe(mockSqliteStore);
    expect(mockSqliteStore.initialize).toHaveBeenCalledTimes(2);
  });

  it("closeAccountStore() closes the store and forgets it", async () => {
    await getAccountStore();
    await closeAccountStore();
    expect(mockSqliteStore.close).toHaveBeenCalledTimes(1);

    vi.clearAllMocks();
    await getAccountStore();
    expect(mockSqliteStore.initialize).toHaveBeenCalledTimes(1);
  });

  it("resetAccountStore() forgets the store without closing it", async () => {
    await getAccountStore();
    resetAccountStore();
    vi.clearAllMocks();

    await getAccountStore();
    expect(mockSqliteStore.close).not.toHaveBeenCalled();
    expect(mockSqliteStore.initialize).toHaveBeenCalledTimes(1);
  });
});
