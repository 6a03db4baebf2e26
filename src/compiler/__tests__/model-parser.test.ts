import { describe, expect, test } from "vitest";
import { layerForSchema, parseModels } from "../model-parser.ts";

const ORDERS_DOC = `# Order pipeline

### Model: stg_orders (schema: temp)

Sources: \`raw.orders, commerce.raw.order_items\`

Column mapping
\`\`\`markdown
| target_column | type | from_table | from_column | transform | nullable | tests | description |
|---|---|---|---|---|---|---|---|
| order_id | INT64 | orders | id | | no | unique, not_null | Order key |
| amount | NUMERIC | orders | amt | ROUND({from}, 2) | yes | | Rounded amount |
| | STRING | orders | note | | | | Undocumented |
\`\`\`

Joins
\`\`\`markdown
| left_table | right_table | type | condition |
|---|---|---|---|
| orders | order_items | inner | orders.id = order_items.order_id |
\`\`\`

Filters
\`\`\`markdown
| applies_to | predicate | rationale |
|---|---|---|
| (none) | orders.amt > 0 | Drop refunds |
\`\`\`

Output constraints
\`\`\`markdown
| primary_key | grain |
|---|---|
| order_id | |
| | one row per order |
\`\`\`

### Model: fct_daily_revenue (schema: analytics)

Sources: \`temp.stg_orders\`

Aggregations
\`\`\`markdown
| metric_column | type | formula | tests | description |
|---|---|---|---|---|
| revenue | NUMERIC | SUM(amount) | non_negative | Daily revenue |
\`\`\`

Group by
\`\`\`markdown
| group_key |
|---|
| order_date |
| |
\`\`\`
`;

describe("parseModels", () => {
  const models = parseModels(ORDERS_DOC);

  test("finds every model section in document order", () => {
    expect(models.map((m) => m.name)).toEqual(["stg_orders", "fct_daily_revenue"]);
  });

  test("infers the layer from the declared schema", () => {
    expect(models[0]?.layer).toBe("staging");
    expect(models[1]?.layer).toBe("final");
  });

  test("keeps only the last dot segment of each source", () => {
    expect(models[0]?.sources).toEqual(["orders", "order_items"]);
    expect(models[1]?.sources).toEqual(["stg_orders"]);
  });

  test("reads column mappings with typed fields", () => {
    const columns = models[0]?.column_mapping ?? [];
    expect(columns).toHaveLength(3);
    expect(columns[0]).toEqual({
      target_column: "order_id",
      type: "INT64",
      from_table: "orders",
      from_column: "id",
      transform: "",
      nullable: false,
      tests: ["unique", "not_null"],
      description: "Order key",
    });
    expect(columns[1]?.transform).toBe("ROUND({from}, 2)");
    expect(columns[1]?.nullable).toBe(true);
    // Rows without a target are kept for documentation
    expect(columns[2]?.target_column).toBe("");
  });

  test("reads joins and filters", () => {
    expect(models[0]?.joins).toEqual([
      {
        left_table: "orders",
        right_table: "order_items",
        type: "inner",
        condition: "orders.id = order_items.order_id",
      },
    ]);
    expect(models[0]?.filters).toEqual([
      { applies_to: "(none)", predicate: "orders.amt > 0", rationale: "Drop refunds" },
    ]);
  });

  test("merges constraint rows into one mapping, skipping empty cells", () => {
    expect(models[0]?.constraints).toEqual({
      primary_key: "order_id",
      grain: "one row per order",
    });
  });

  test("reads aggregations and non-empty group keys", () => {
    expect(models[1]?.aggregations).toEqual([
      {
        metric_column: "revenue",
        type: "NUMERIC",
        formula: "SUM(amount)",
        tests: ["non_negative"],
        description: "Daily revenue",
      },
    ]);
    expect(models[1]?.group_by).toEqual(["order_date"]);
  });

  test("missing sub-tables become empty collections", () => {
    expect(models[1]?.column_mapping).toEqual([]);
    expect(models[1]?.joins).toEqual([]);
    expect(models[1]?.filters).toEqual([]);
    expect(models[1]?.constraints).toEqual({});
    expect(models[0]?.aggregations).toEqual([]);
    expect(models[0]?.group_by).toEqual([]);
  });
});

describe("parseModels edge cases", () => {
  test("returns nothing for a document without model headers", () => {
    expect(parseModels("# Just prose\n\nNo models here.")).toEqual([]);
  });

  test("accepts backtick-quoted name and schema", () => {
    const [model] = parseModels("### Model: `stg_users` (schema: `temp`)\n");
    expect(model?.name).toBe("stg_users");
    expect(model?.layer).toBe("staging");
    expect(model?.sources).toEqual([]);
  });

  test("uses the given staging schema token", () => {
    const text = "### Model: stg_users (schema: staging)\n### Model: dim_users (schema: temp)\n";
    const models = parseModels(text, { stagingSchema: "staging" });
    expect(models.map((m) => m.layer)).toEqual(["staging", "final"]);
  });

  test("keeps the first of two models with the same name", () => {
    const text = [
      "### Model: stg_users (schema: temp)",
      "Sources: `raw.users`",
      "### Model: stg_users (schema: temp)",
      "Sources: `raw.accounts`",
    ].join("\n");
    const models = parseModels(text);
    expect(models).toHaveLength(1);
    expect(models[0]?.sources).toEqual(["users"]);
  });

  test("reads an unquoted sources line", () => {
    const [model] = parseModels("### Model: stg_users (schema: temp)\nSources: raw.users, raw.roles\n");
    expect(model?.sources).toEqual(["users", "roles"]);
  });

  test("a blank Sources line yields no sources", () => {
    const text = [
      "### Model: stg_x (schema: temp)",
      "",
      "Sources:   ",
      "",
      "Column mapping",
      "```markdown",
      "| target_column | from_table | from_column |",
      "|---|---|---|",
      "| id | t | id |",
      "```",
    ].join("\n");
    const [model] = parseModels(text);
    expect(model?.sources).toEqual([]);
    expect(model?.column_mapping.map((c) => c.target_column)).toEqual(["id"]);
  });

  test("a model without a Sources line has no sources", () => {
    const [model] = parseModels("### Model: stg_x (schema: temp)\n\nColumn mapping\n");
    expect(model?.sources).toEqual([]);
  });

  test("accepts a titled fence without a language tag", () => {
    const text = [
      "### Model: stg_users (schema: temp)",
      "#### Group by:",
      "```",
      "| group_key |",
      "|---|",
      "| user_id |",
      "```",
    ].join("\n");
    expect(parseModels(text)[0]?.group_by).toEqual(["user_id"]);
  });

  test("ignores headings at other levels", () => {
    expect(parseModels("## Model: stg_users (schema: temp)\n")).toEqual([]);
  });
});

describe("layerForSchema", () => {
  test("staging only when the schema equals the staging token", () => {
    expect(layerForSchema("temp", "temp")).toBe("staging");
    expect(layerForSchema("analytics", "temp")).toBe("final");
    expect(layerForSchema("Temp", "temp")).toBe("final");
  });
});
