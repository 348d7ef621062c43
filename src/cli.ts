#!/usr/bin/env node

import { Command } from "commander";

import { env } from "@/lib/env";
import { isAppError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import {
  Checkout,
  DEFAULT_SCAN_SEQUENCE,
  formatScanResult,
  formatSummary,
  readScanFile,
  runScans,
} from "@/modules/checkout";
import { loadScheme } from "@/modules/pricing/scheme";

const logger = createLogger("cli");

function print(lines: string[]): void {
  for (const line of lines) {
    process.stdout.write(`${line}\n`);
  }
}

async function scanCommand(schemePath: string | undefined, scansPath: string | undefined) {
  const path = schemePath ?? env.SCHEME_PATH;
  const { scheme, diagnostics } = await loadScheme(path);

  for (const diagnostic of diagnostics) {
    process.stderr.write(`${path}:${diagnostic.line}: ${diagnostic.message}\n`);
  }

  const ids = scansPath ? await readScanFile(scansPath) : DEFAULT_SCAN_SEQUENCE;
  const checkout = new Checkout(scheme);
  const summary = runScans(checkout, ids, {
    onResult: (result) => print(formatScanResult(result)),
  });

  print(formatSummary(summary));
}

const program = new Command();

program
  .name("scan-pricing")
  .description("Price a sequence of scanned items against a bundle and coupon scheme")
  .argument("[scheme]", "scheme file (defaults to SCHEME_PATH)")
  .argument("[scans]", "file with one scanned id per line (defaults to a demo basket)")
  .action(scanCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  if (isAppError(error)) {
    logger.error("Checkout aborted", { code: error.code, error: error.message });
    process.stderr.write(`${error.message}\n`);
  } else {
    logger.error("Unexpected failure", { error: error instanceof Error ? error.stack : String(error) });
  }
  process.exitCode = 1;
});
