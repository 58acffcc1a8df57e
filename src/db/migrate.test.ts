import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { initRegistrySchema } from "./migrate.js";

function tableNames(sqlite: Database.Database): string[] {
  const rows = sqlite
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
    .all() as Array<{ name: string }>;
  return rows.map((r) => r.name);
}

describe("initRegistrySchema", () => {
  let sqlite: Database.Database;

  beforeEach(() => {
    sqlite = new Database(":memory:");
  });

  afterEach(() => {
    sqlite.close();
  });

  it("creates the datasets, api_keys and usage_logs tables", () => {
    initRegistrySchema(sqlite);
    expect(tableNames(sqlite)).toEqual(["api_keys", "datasets", "usage_logs"]);
  });

  it("is idempotent and keeps existing rows", () => {
    initRegistrySchema(sqlite);
    sqlite.prepare("INSERT INTO datasets (id, name, url) VALUES ('d1', 'Iris', 'https://x.test/iris.csv')").run();

    initRegistrySchema(sqlite);

    const row = sqlite.prepare("SELECT COUNT(*) AS n FROM datasets").get() as { n: number };
    expect(row.n).toBe(1);
  });

  it("defaults new api keys to active with no quota", () => {
    initRegistrySchema(sqlite);
    sqlite.prepare("INSERT INTO api_keys (key_hash, created_at) VALUES ('h1', '2024-01-01T00:00:00.000Z')").run();

    const row = sqlite.prepare("SELECT label, active, quota FROM api_keys").get();
    expect(row).toEqual({ label: "", active: 1, quota: null });
  });
});
