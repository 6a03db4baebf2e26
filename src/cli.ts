#!/usr/bin/env tsx
/**
 * pipespec CLI: entry point for the command-line interface.
 *
 * Commands:
 *   pipespec init-req [--out <path>]              Write a sample requirements document
 *   pipespec spec-from-req --req <md>             Write spec.json and mapping docs
 *   pipespec sqlx-from-spec --spec <json>         Write one .sqlx per model
 *   pipespec tests-from-spec --spec <json>        Write one test .sql per model
 *   pipespec serve                                Start the MCP server on stdio
 *   pipespec version                              Print version
 */

import { access, copyFile, mkdir } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { PipelineConfig } from "./types/config.ts";
import { MODEL_ENV_VAR } from "./types/config.ts";
import { loadPipelineConfig } from "./config/loader.ts";
import { loadRequirementsFile, loadSpecFile } from "./project/loader.ts";
import { TEMPLATE_PATH } from "./project/template.ts";
import { writeSpecArtifacts } from "./generator/spec-writer.ts";
import { writeSqlxFiles } from "./generator/sqlx-generator.ts";
import { writeTestFiles } from "./generator/test-generator.ts";
import {
  generateSqlxWithLLM,
  generateTestsWithLLM,
} from "./generator/llm-generator.ts";
import { LLMClient } from "./llm/client.ts";
import { startServer } from "./server/stdio-server.ts";

const VERSION = "0.1.0";

type Flags = Map<string, string | true>;

async function main(): Promise<void> {
  const [command, ...rest] = process.argv.slice(2);
  const flags = parseFlags(rest);

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printUsage();
    return;
  }

  if (command === "version" || command === "--version" || command === "-v") {
    console.log(`pipespec v${VERSION}`);
    return;
  }

  // Environment lookups stay here; everything below takes explicit config
  const config = await loadPipelineConfig(process.cwd());
  const model = stringFlag(flags, "model") ?? process.env[MODEL_ENV_VAR];
  if (model) config.llm.model = model;

  switch (command) {
    case "init-req":
      await initRequirements(stringFlag(flags, "out") ?? "requirements.md");
      return;
    case "spec-from-req":
      await specFromReq(flags);
      return;
    case "sqlx-from-spec":
      await sqlxFromSpec(flags, config);
      return;
    case "tests-from-spec":
      await testsFromSpec(flags, config);
      return;
    case "serve":
      await startServer(config, VERSION);
      return;
    default:
      fail(`Unknown command "${command}". Run "pipespec help" for usage.`);
  }
}

/** Copy the sample requirements document, never overwriting */
async function initRequirements(target: string): Promise<void> {
  const out = resolve(target);
  if (await exists(out)) {
    console.log(`File already exists: ${out}`);
    return;
  }

  await mkdir(dirname(out), { recursive: true });
  await copyFile(TEMPLATE_PATH, out);
  console.log(`Wrote sample requirements to ${out}`);
}

async function specFromReq(flags: Flags): Promise<void> {
  const reqPath = requiredFlag(flags, "req");
  const outRoot = resolve(stringFlag(flags, "out-root") ?? "technical_requirements");

  const doc = await loadRequirementsFile(reqPath);
  const artifacts = await writeSpecArtifacts(doc, outRoot);

  console.log(`Spec JSON: ${artifacts.specJson}`);
  console.log(`Mapping docs: ${artifacts.mappingDocs.length} -> ${resolve(outRoot, "mappings")}`);
}

async function sqlxFromSpec(flags: Flags, config: PipelineConfig): Promise<void> {
  const doc = await loadSpecFile(requiredFlag(flags, "spec"));
  const outDir = resolve(stringFlag(flags, "out-dir") ?? "definitions");

  if (flags.has("use-llm")) {
    const llm = requireLLM(config);
    console.error(`[pipespec] Generating SQLX with ${llm.model}...`);
    const written = await generateSqlxWithLLM(doc, outDir, llm);
    console.log(`Generated SQLX (LLM): ${written.length} -> ${outDir}`);
    return;
  }

  const written = await writeSqlxFiles(doc, outDir, {
    filterScopes: config.filterScopes,
  });
  console.log(`Generated SQLX: ${written.length} -> ${outDir}`);
}

async function testsFromSpec(flags: Flags, config: PipelineConfig): Promise<void> {
  const specPath = requiredFlag(flags, "spec");
  const doc = await loadSpecFile(specPath);
  const outDir = resolve(stringFlag(flags, "out-dir") ?? "tests");

  if (flags.has("use-llm")) {
    const llm = requireLLM(config);
    console.error(`[pipespec] Generating tests with ${llm.model}...`);
    const written = await generateTestsWithLLM(doc, outDir, llm);
    console.log(`Generated tests (LLM): ${written.length} -> ${outDir}`);
    return;
  }

  const source = stringFlag(flags, "req-source") ?? specPath;
  const written = await writeTestFiles(doc, outDir, source);
  console.log(`Generated tests: ${written.length} -> ${outDir}`);
}

function requireLLM(config: PipelineConfig): LLMClient {
  const llm = new LLMClient(config.llm);
  if (!llm.isConfigured()) {
    fail(`LLM API key not configured. Set ${config.llm.apiKeyEnvVar} to use --use-llm.`);
  }
  return llm;
}

/** Parse `--name value` and bare `--flag` arguments */
function parseFlags(args: string[]): Flags {
  const flags: Flags = new Map();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (!arg.startsWith("--")) continue;

    const name = arg.slice(2);
    const next = args[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      flags.set(name, next);
      i++;
    } else {
      flags.set(name, true);
    }
  }
  return flags;
}

function stringFlag(flags: Flags, name: string): string | undefined {
  const value = flags.get(name);
  return typeof value === "string" ? value : undefined;
}

function requiredFlag(flags: Flags, name: string): string {
  const value = stringFlag(flags, name);
  if (!value) fail(`Missing required option --${name}`);
  return resolve(value);
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function printUsage(): void {
  console.log(`
pipespec v${VERSION}: requirements documents to specs, SQLX and SQL tests

Usage:
  pipespec init-req [--out <path>]
  pipespec spec-from-req --req <requirements.md> [--out-root <dir>]
  pipespec sqlx-from-spec --spec <spec.json> [--out-dir <dir>] [--use-llm] [--model <name>]
  pipespec tests-from-spec --spec <spec.json> [--out-dir <dir>] [--req-source <md>] [--use-llm] [--model <name>]
  pipespec serve                      Start the MCP server on stdio
  pipespec version                    Print version

Configuration is read from config/pipeline.md in the working directory.
${MODEL_ENV_VAR} overrides the configured LLM model; --model overrides both.
  `.trim());
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
