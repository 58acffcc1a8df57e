import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openDatabase } from "../../db/index.js";
import type { DatasetRecord } from "../../domain/entities/dataset-record.js";
import { DrizzleSearchMirror, escapeLikePattern } from "./drizzle-search-mirror.js";

function record(id: string, extra: Partial<DatasetRecord> = {}): DatasetRecord {
  return { id, name: `Dataset ${id}`, url: `https://example.com/${id}`, tags: [], ...extra };
}

describe("escapeLikePattern", () => {
  it("escapes percent, underscore and backslash", () => {
    expect(escapeLikePattern("50%_a\\b")).toBe("50\\%\\_a\\\\b");
  });

  it("leaves ordinary text alone", () => {
    expect(escapeLikePattern("weather")).toBe("weather");
  });
});

describe("DrizzleSearchMirror", () => {
  let sqlite: Database.Database;
  let mirror: DrizzleSearchMirror;

  beforeEach(() => {
    const opened = openDatabase(":memory:");
    sqlite = opened.sqlite;
    mirror = new DrizzleSearchMirror(opened.db);
  });

  afterEach(() => {
    sqlite.close();
  });

  it("finds a record by a word in its description", () => {
    mirror.upsertMany([
      record("iris", { name: "Iris", description: "Measurements of flower petals", tags: ["botany"] }),
      record("cars", { name: "Cars", description: "Fuel economy", tags: ["auto"] }),
    ]);
    expect(mirror.search("flower", 50).map((r) => r.id)).toEqual(["iris"]);
  });

  it("matches name, description and tags", () => {
    mirror.upsertMany([
      record("a", { name: "Ocean temperatures" }),
      record("b", { description: "Sea level and ocean currents" }),
      record("c", { tags: ["ocean"] }),
      record("d", { name: "Deserts" }),
    ]);
    expect(mirror.search("ocean", 50).map((r) => r.id)).toEqual(["a", "b", "c"]);
  });

  it("ignores ASCII case", () => {
    mirror.upsertMany([record("iris", { name: "Iris" })]);
    expect(mirror.search("IRIS", 50).map((r) => r.id)).toEqual(["iris"]);
    expect(mirror.search("iRiS", 50).map((r) => r.id)).toEqual(["iris"]);
  });

  it("treats LIKE wildcards in the keyword literally", () => {
    mirror.upsertMany([
      record("pct", { name: "Growth 100% sample" }),
      record("plain", { name: "Growth 100 sample" }),
      record("under", { name: "col_name index" }),
      record("other", { name: "colXname index" }),
    ]);
    expect(mirror.search("100%", 50).map((r) => r.id)).toEqual(["pct"]);
    expect(mirror.search("col_name", 50).map((r) => r.id)).toEqual(["under"]);
    expect(mirror.search("%", 50).map((r) => r.id)).toEqual(["pct"]);
  });

  it("orders results by id and honors the limit", () => {
    mirror.upsertMany([record("c"), record("a"), record("b")]);
    expect(mirror.search("Dataset", 2).map((r) => r.id)).toEqual(["a", "b"]);
  });

  it("returns every record for an empty keyword", () => {
    mirror.upsertMany([record("b"), record("a")]);
    expect(mirror.search("", 10).map((r) => r.id)).toEqual(["a", "b"]);
  });

  it("round-trips optional fields, tags and columns", () => {
    const full = record("full", {
      updated: "2024-03-01T12:00:00Z",
      rows: 150,
      columns: ["sepal_length", "species"],
      description: "Full record",
      tags: ["botany", "classic"],
    });
    const minimal = record("minimal");
    mirror.upsertMany([full, minimal]);

    expect(mirror.search("full", 10)).toEqual([full]);
    expect(mirror.search("minimal", 10)).toEqual([minimal]);
  });

  it("omits absent optional fields instead of returning null", () => {
    mirror.upsertMany([record("minimal")]);
    const [found] = mirror.search("minimal", 10);
    expect(found).toBeDefined();
    expect(found && "description" in found).toBe(false);
    expect(found && "rows" in found).toBe(false);
  });

  it("updates an existing row on conflict", () => {
    mirror.upsertMany([record("a", { name: "Before" })]);
    mirror.upsertMany([record("a", { name: "After" })]);
    expect(mirror.count()).toBe(1);
    expect(mirror.search("After", 10).map((r) => r.name)).toEqual(["After"]);
  });

  it("never prunes rows missing from a later batch", () => {
    mirror.upsertMany([record("a"), record("b")]);
    mirror.upsertMany([record("a")]);
    expect(mirror.count()).toBe(2);
  });

  it("ensureSchema is idempotent", () => {
    mirror.upsertMany([record("a")]);
    mirror.ensureSchema();
    mirror.ensureSchema();
    expect(mirror.count()).toBe(1);
  });
});
