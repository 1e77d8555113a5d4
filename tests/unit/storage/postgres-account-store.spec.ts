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
 * Unit tests for PostgresAccountStore.
 * Mocks the postgres module to test store logic without a real database.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

const { mockSql, mockPostgres } = vi.hoisted(() => {
  const mockSql = vi.fn() as ReturnType<typeof vi.fn> & {
    unsafe: ReturnType<typeof vi.fn>;
    end: ReturnType<typeof vi.fn>;
    json: ReturnType<typeof vi.fn>;
  };
  mockSql.unsafe = vi.fn();
  mockSql.end = vi.fn();
  mockSql.json = vi.fn((val: unknown) => val);

  const mockPostgres = vi.fn(() => mockSql);

  return { mockSql, mockPostgres };
});

vi.mock("postgres", () => ({
  default: mockPostgres,
}));

import { PostgresAccountStore } from "../../../src/storage/postgres-account-store.js";

/** Interpolated values of the nth tagged-template call. */
function queryValues(call: number): unknown[] {
  return mockSql.mock.calls[call]?.slice(1) ?? [];
}

describe("PostgresAccountStore", () => {
  let store: PostgresAccountStore;

  beforeEach(() => {
    vi.clearAllMocks();
    mockSql.mockResolvedValue([]);
    mockSql.unsafe.mockResolvedValue([]);
    mockSql.end.mockResolvedValue(undefined);
    store = new PostgresAccountStore({ connectionString: "postgres://localhost:5432/sso" });
  });

  describe("constructor", () => {
    it("creates a sql instance with the default pool size", () => {
      expect(mockPostgres).toHaveBeenCalledWith("postgres://localhost:5432/sso", { max: 10 });
    });

    it("honours a custom pool size", () => {
      vi.clearAllMocks();
      new PostgresAccountStore({ connectionString: "postgres://localhost/db", max: 25 });
      expect(mockPostgres).toHaveBeenCalledWith("postgres://localhost/db", { max: 25 });
    });
  });

  describe("initialize", () => {
    it("creates both tables and the case-insensitive index", async () => {
      await store.initialize();

      expect(mockSql.unsafe).toHaveBeenCalledTimes(1);
      const ddl = String(mockSql.unsafe.mock.calls[0]?.[0]);
      expect(ddl).toContain("CREATE TABLE IF NOT EXISTS users");
      expect(ddl).toContain("CREATE INDEX IF NOT EXISTS idx_users_lower_user_id");
      expect(ddl).toContain("CREATE TABLE IF NOT EXISTS user_external_ids");
    });

    it("is idempotent", async () => {
      await store.initialize();
      await store.initialize();

      expect(mockSql.unsafe).toHaveBeenCalledTimes(1);
    });

    it("wraps schema errors", async () => {
      mockSql.unsafe.mockRejectedValueOnce(new Error("connection refused"));

      await expect(store.initialize()).rejects.toThrow(
        "Failed to initialize database schema: connection refused",
      );
    });
  });

  describe("findBindingByExternalId", () => {
    it("returns the bound user ID", async () => {
      mockSql.mockResolvedValueOnce([{ user_id: "@alice:example.org" }]);

      await expect(store.findBindingByExternalId("saml", "alice")).resolves.toBe(
        "@alice:example.org",
      );
      expect(queryValues(0)).toEqual(["saml", "alice"]);
    });

    it("returns null when there is no binding", async () => {
      await expect(store.findBindingByExternalId("saml", "nobody")).resolves.toBeNull();
    });

    it("wraps query errors", async () => {
      mockSql.mockRejectedValueOnce(new Error("timeout"));

      await expect(store.findBindingByExternalId("saml", "alice")).rejects.toThrow(
        "Failed to look up external id saml:alice: timeout",
      );
    });
  });

  describe("findAccountsByCaseInsensitiveId", () => {
    it("maps rows to account records", async () => {
      mockSql.mockResolvedValueOnce([
        {
          user_id: "@Bob:example.org",
          display_name: null,
          emails: ["bob@example.org"],
          created_at: new Date("2026-01-02T03:04:05.000Z"),
        },
      ]);

      const found = await store.findAccountsByCaseInsensitiveId("@bob:example.org");

      expect(found).toEqual(
        new Map([
          [
            "@Bob:example.org",
            {
              userId: "@Bob:example.org",
              displayName: null,
              emails: ["bob@example.org"],
              createdAt: "2026-01-02T03:04:05.000Z",
            },
          ],
        ]),
      );
      expect(queryValues(0)).toEqual(["@bob:example.org"]);
    });

    it("rejects rows with malformed emails", async () => {
      mockSql.mockResolvedValueOnce([
        {
          user_id: "@bob:example.org",
          display_name: null,
          emails: "not-a-list",
          created_at: new Date("2026-01-02T03:04:05.000Z"),
        },
      ]);

      await expect(store.findAccountsByCaseInsensitiveId("@bob:example.org")).rejects.toThrow();
    });
  });

  describe("createBinding", () => {
    it("inserts the binding", async () => {
      await store.createBinding("saml", "alice", "@alice:example.org");

      expect(queryValues(0)).toEqual(["saml", "alice", "@alice:example.org"]);
    });

    it("wraps insert errors", async () => {
      mockSql.mockRejectedValueOnce(new Error("duplicate key value"));

      await expect(store.createBinding("saml", "alice", "@alice:example.org")).rejects.toThrow(
        "Failed to record external id saml:alice for @alice:example.org: duplicate key value",
      );
    });
  });

  describe("createAccount", () => {
    it("stores emails as JSON and returns the record", async () => {
      const record = await store.createAccount({
        userId: "@alice:example.org",
        displayName: "Alice",
        emails: ["alice@example.org"],
      });

      expect(mockSql.json).toHaveBeenCalledWith(["alice@example.org"]);
      expect(record).toMatchObject({
        userId: "@alice:example.org",
        displayName: "Alice",
        emails: ["alice@example.org"],
      });
      expect(queryValues(0)).toEqual([
        "@alice:example.org",
        "Alice",
        ["alice@example.org"],
        record.createdAt,
      ]);
    });

    it("wraps insert errors", async () => {
      mockSql.mockRejectedValueOnce(new Error("duplicate key value"));

      await expect(
        store.createAccount({ userId: "@alice:example.org", displayName: null, emails: [] }),
      ).rejects.toThrow("Failed to create account @alice:example.org: duplicate key value");
    });
  });

  it("close ends the pool", async () => {
    await store.close();
    expect(mockSql.end).toHaveBeenCalledTimes(1);
  });

  it("reports its metadata", () => {
    expect(store.getMetadata()).toEqual({ adapterName: "postgres", adapterVersion: "1.0.0" });
  });
});
