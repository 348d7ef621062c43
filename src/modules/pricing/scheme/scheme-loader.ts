/**
 * Scheme Loader
 *
 * Reads a scheme file from disk. A missing or unreadable file is the one
 * fatal error: nothing can be priced without a catalog.
 */

import { readFile } from "node:fs/promises";

import { describeError, SchemeFileError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

import { buildScheme, type SchemeBuildResult } from "./scheme-builder";

const logger = createLogger("scheme-loader");

export async function loadScheme(path: string): Promise<SchemeBuildResult> {
  let source: string;
  try {
    source = await readFile(path, "utf-8");
  } catch (error) {
    throw new SchemeFileError(`Cannot read scheme file ${path}: ${describeError(error)}`, {
      cause: error,
    });
  }

  const result = buildScheme(source);
  logger.info("Scheme loaded", {
    path,
    items: result.scheme.items.length,
    rules: result.scheme.rules.length,
    skipped: result.diagnostics.length,
  });

  return result;
}
