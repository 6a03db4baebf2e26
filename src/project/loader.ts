import { readFile } from "node:fs/promises";
import type { RequirementsDocument } from "../types/requirements.ts";
import { parseRequirements } from "../compiler/requirements-parser.ts";
import { isRecord, toDocument } from "../compiler/normalize.ts";

/** Read and parse a requirements document */
export async function loadRequirementsFile(
  path: string,
): Promise<RequirementsDocument> {
  const content = await readFile(path, "utf-8");
  return parseRequirements(content);
}

/** Read a spec.json written by the spec writer (or by hand) */
export async function loadSpecFile(path: string): Promise<RequirementsDocument> {
  const content = await readFile(path, "utf-8");
  return parseSpecJson(content, path);
}

/** Parse spec.json text, applying the same defaults as the parser */
export function parseSpecJson(
  content: string,
  sourcePath = "spec.json",
): RequirementsDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new SpecLoadError(
      sourcePath,
      err instanceof Error ? err.message : String(err),
    );
  }

  if (!isRecord(raw)) {
    throw new SpecLoadError(sourcePath, "top-level value must be an object");
  }
  return toDocument(raw);
}

export class SpecLoadError extends Error {
  readonly sourcePath: string;

  constructor(sourcePath: string, message: string) {
    super(`Could not load spec ${sourcePath}: ${message}`);
    this.name = "SpecLoadError";
    this.sourcePath = sourcePath;
  }
}
