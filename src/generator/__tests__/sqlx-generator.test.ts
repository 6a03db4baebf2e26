import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { toDocument } from "../../compiler/normalize.ts";
import {
  DEFAULT_FINAL_NAME,
  generateSqlx,
  renderCteQuery,
  writeSqlxFiles,
} from "../sqlx-generator.ts";

const HEADER_TEMP = 'config { type: "table", schema: "temp" }';
const HEADER_ANALYTICS = 'config { type: "table", schema: "analytics" }';

const ORDERS_DOC = toDocument({
  models: [
    {
      name: "stg_orders",
      layer: "staging",
      sources: ["orders"],
      column_mapping: [{ target_column: "order_id", from_table: "orders", from_column: "id" }],
      filters: [{ applies_to: "returns", predicate: "orders.returned = FALSE" }],
    },
    {
      name: "dim_dates",
      layer: "final",
      ctes: [{ name: "days", select: "SELECT day FROM calendar" }],
      final_select: "SELECT day FROM days",
    },
  ],
});

describe("renderCteQuery", () => {
  test("renders a WITH block followed by the final select", () => {
    const sqlx = renderCteQuery(
      "analytics",
      [
        { name: "a", select: "  SELECT 1 AS x  " },
        { name: "b", select: "SELECT x FROM a" },
      ],
      "SELECT * FROM b",
    );
    expect(sqlx).toBe(
      `${HEADER_ANALYTICS}\n\nWITH\na AS (\nSELECT 1 AS x\n),\n\nb AS (\nSELECT x FROM a\n)\nSELECT * FROM b\n`,
    );
  });

  test("falls back to the placeholder without a final select", () => {
    expect(renderCteQuery("temp", [], undefined)).toBe(`${HEADER_TEMP}\n\nSELECT 1 AS placeholder\n`);
    expect(renderCteQuery("temp", [], "   ")).toBe(`${HEADER_TEMP}\n\nSELECT 1 AS placeholder\n`);
  });
});

describe("generateSqlx", () => {
  test("renders one output per model in document order", () => {
    const outputs = generateSqlx(ORDERS_DOC);
    expect([...outputs.keys()]).toEqual(["stg_orders", "dim_dates"]);
    expect(outputs.get("stg_orders")).toBe(
      `${HEADER_TEMP}\n\nSELECT\n       orders.id AS order_id\nFROM \${ref('orders')}\n`,
    );
  });

  test("renders models without mappings from their CTEs", () => {
    expect(generateSqlx(ORDERS_DOC).get("dim_dates")).toBe(
      `${HEADER_ANALYTICS}\n\nWITH\ndays AS (\nSELECT day FROM calendar\n)\nSELECT day FROM days\n`,
    );
  });

  test("uses the document's filter scopes unless overridden", () => {
    const scoped = { ...ORDERS_DOC, filter_scopes: ["returns"] };
    expect(generateSqlx(scoped).get("stg_orders")).toContain("WHERE orders.returned = FALSE");
    expect(generateSqlx(scoped, { filterScopes: ["orders"] }).get("stg_orders")).not.toContain("WHERE");
    expect(generateSqlx(ORDERS_DOC).get("stg_orders")).not.toContain("WHERE");
  });

  test("renders document-level transforms when there are no models", () => {
    const doc = toDocument({
      transforms: [{ name: "base", select: "SELECT 1 AS n" }],
      final: { name: "summary", select: "SELECT n FROM base" },
    });
    const outputs = generateSqlx(doc);
    expect([...outputs.keys()]).toEqual(["summary"]);
    expect(outputs.get("summary")).toBe(
      `${HEADER_ANALYTICS}\n\nWITH\nbase AS (\nSELECT 1 AS n\n)\nSELECT n FROM base\n`,
    );
  });

  test("names the transform output by default", () => {
    const doc = toDocument({ transforms: [{ name: "base", select: "SELECT 1" }] });
    expect([...generateSqlx(doc).keys()]).toEqual([DEFAULT_FINAL_NAME]);
  });

  test("produces nothing for an empty document", () => {
    expect(generateSqlx(toDocument({})).size).toBe(0);
  });
});

describe("writeSqlxFiles", () => {
  let outDir: string;

  beforeEach(async () => {
    outDir = await mkdtemp(join(tmpdir(), "pipespec-sqlx-"));
  });

  afterEach(async () => {
    await rm(outDir, { recursive: true, force: true });
  });

  test("writes one .sqlx file per output", async () => {
    const target = join(outDir, "definitions");
    const written = await writeSqlxFiles(ORDERS_DOC, target);
    expect(written).toEqual([join(target, "stg_orders.sqlx"), join(target, "dim_dates.sqlx")]);

    const content = await readFile(join(target, "stg_orders.sqlx"), "utf-8");
    expect(content).toBe(generateSqlx(ORDERS_DOC).get("stg_orders"));
  });
});
