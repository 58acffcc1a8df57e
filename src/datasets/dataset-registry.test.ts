import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openDatabase } from "../db/index.js";
import { NotFoundError, StorageCorruptionError, ValidationError } from "../domain/errors.js";
import { createDatasetRegistry, type DatasetRegistry } from "./dataset-registry.js";

const iris = {
  id: "iris",
  name: "Iris",
  url: "https://example.com/iris.csv",
  updated: "2024-01-15",
  rows: 150,
  columns: ["sepal_length", "species"],
  description: "Measurements of flower petals",
  tags: ["botany", "classic"],
};

describe("DatasetRegistry", () => {
  let dir: string;
  let documentPath: string;
  let sqlite: Database.Database;
  let registry: DatasetRegistry;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "dataset-registry-"));
    documentPath = join(dir, "datasets.json");
    const opened = openDatabase(":memory:");
    sqlite = opened.sqlite;
    registry = createDatasetRegistry({ documentPath, db: opened.db });
  });

  afterEach(() => {
    sqlite.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("makes an upserted record searchable immediately", async () => {
    await registry.upsert(iris);
    expect(registry.search("flower", 50).map((r) => r.id)).toEqual(["iris"]);
    expect(await registry.queryAll()).toEqual([iris]);
  });

  it("defaults tags to an empty list", async () => {
    const stored = await registry.upsert({ id: "x", name: "X", url: "http://example.com/x" });
    expect(stored.tags).toEqual([]);
  });

  it("rejects an invalid record before touching the store", async () => {
    await expect(registry.upsert({ id: "bad", name: "Bad", url: "ftp://example.com/bad" })).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(await registry.queryAll()).toEqual([]);
    expect(registry.mirroredCount()).toBe(0);
  });

  it("get returns the record or throws NotFoundError", async () => {
    await registry.upsert(iris);
    expect(await registry.get("iris")).toEqual(iris);
    await expect(registry.get("nope")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("queryLatest returns the most recently updated records", async () => {
    await registry.upsert({ ...iris, id: "older", updated: "2023-05-01" });
    await registry.upsert(iris);
    expect((await registry.queryLatest(1)).map((r) => r.id)).toEqual(["iris"]);
  });

  it("search rejects a non-positive limit", () => {
    expect(() => registry.search("x", 0)).toThrow(ValidationError);
  });

  it("rebuildAll mirrors a document written outside the registry", async () => {
    writeFileSync(documentPath, JSON.stringify([iris]));
    expect(registry.mirroredCount()).toBe(0);

    expect(await registry.rebuildAll()).toBe(1);
    expect(registry.search("petals", 10).map((r) => r.id)).toEqual(["iris"]);
  });

  it("rebuildAll keeps mirror rows whose record left the document", async () => {
    await registry.upsert(iris);
    writeFileSync(documentPath, "[]");

    expect(await registry.rebuildAll()).toBe(0);
    expect(registry.mirroredCount()).toBe(1);
  });

  it("surfaces a corrupt document as StorageCorruptionError", async () => {
    writeFileSync(documentPath, "not json");
    await expect(registry.queryAll()).rejects.toBeInstanceOf(StorageCorruptionError);
  });

  it("stats counts records, reports the latest update and tallies tags", async () => {
    await registry.upsert(iris);
    await registry.upsert({ id: "wine", name: "Wine", url: "https://example.com/wine", updated: "2024-02-01", tags: ["classic"] });
    await registry.upsert({ id: "blank", name: "Blank", url: "https://example.com/blank" });

    expect(await registry.stats()).toEqual({
      count: 3,
      lastUpdated: "2024-02-01",
      tagCounts: { botany: 1, classic: 2 },
    });
  });

  it("stats on an empty registry", async () => {
    expect(await registry.stats()).toEqual({ count: 0, lastUpdated: null, tagCounts: {} });
  });
});
