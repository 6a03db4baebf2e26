import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { toModel } from "../../compiler/normalize.ts";
import { parseRequirements } from "../../compiler/requirements-parser.ts";
import { parseSpecJson } from "../../project/loader.ts";
import { markdownTable, renderModelDoc, toSpecJson, writeSpecArtifacts } from "../spec-writer.ts";

const REQUIREMENTS = `\`\`\`yaml
project: shop
sources:
  - name: orders
    schema: raw
mocks:
  orders: |
    id,amount
    1,10
\`\`\`

### Model: stg_orders (schema: temp)

Sources: \`raw.orders\`

Column mapping
\`\`\`markdown
| target_column | type | from_table | from_column | transform | nullable | tests | description |
|---|---|---|---|---|---|---|---|
| order_id | INT64 | orders | id | | no | unique, not_null | Key |
\`\`\`

Output constraints
\`\`\`markdown
| primary_key |
|---|
| order_id |
\`\`\`
`;

describe("markdownTable", () => {
  test("sizes the separator to each header", () => {
    expect(markdownTable(["a", "bb"], [["1", "2"]])).toBe("| a | bb |\n|---|----|\n| 1 | 2 |");
  });
});

describe("renderModelDoc", () => {
  test("renders present sections only", () => {
    const [model] = parseRequirements(REQUIREMENTS).models;
    const lines = model ? renderModelDoc(model).split("\n") : [];

    expect(lines[0]).toBe("# Model: stg_orders (layer: staging)");
    expect(lines[2]).toBe("Sources: orders");
    expect(lines[4]).toBe("## Column mapping");
    expect(lines).toContain("| order_id | INT64 | orders | id |  | false | unique,not_null | Key |");
    expect(lines).toContain("## Output constraints");
    expect(lines).not.toContain("## Joins");
    expect(lines.at(-2)).toBe("| order_id |");
  });

  test("renders just the title for an empty model", () => {
    expect(renderModelDoc(toModel({ name: "empty" }))).toBe("# Model: empty (layer: staging)\n");
  });

  test("renders group keys one per row", () => {
    const doc = renderModelDoc(toModel({ name: "fct", layer: "final", group_by: ["day", "region"] }));
    expect(doc).toBe(
      "# Model: fct (layer: final)\n\n## Group by\n\n| group_key |\n|-----------|\n| day |\n| region |\n",
    );
  });
});

describe("toSpecJson", () => {
  test("places metadata keys before the document keys", () => {
    const json = toSpecJson(parseRequirements(REQUIREMENTS));
    expect(Object.keys(json)).toEqual(["project", "schema", "models", "sources", "mocks"]);
  });
});

describe("writeSpecArtifacts", () => {
  let outRoot: string;

  beforeEach(async () => {
    outRoot = await mkdtemp(join(tmpdir(), "pipespec-spec-"));
  });

  afterEach(async () => {
    await rm(outRoot, { recursive: true, force: true });
  });

  test("writes spec.json and a mapping document per model", async () => {
    const doc = parseRequirements(REQUIREMENTS);
    const artifacts = await writeSpecArtifacts(doc, outRoot);

    expect(artifacts.specJson).toBe(join(outRoot, "spec.json"));
    expect(artifacts.mappingDocs).toEqual([join(outRoot, "mappings", "stg_orders.md")]);

    const mapping = await readFile(join(outRoot, "mappings", "stg_orders.md"), "utf-8");
    expect(mapping.startsWith("# Model: stg_orders (layer: staging)\n")).toBe(true);
  });

  test("spec.json loads back to the same document", async () => {
    const doc = parseRequirements(REQUIREMENTS);
    const { specJson } = await writeSpecArtifacts(doc, outRoot);
    const loaded = parseSpecJson(await readFile(specJson, "utf-8"), specJson);
    expect(loaded).toEqual(doc);
  });
});
