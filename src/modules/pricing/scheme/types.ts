/**
 * Scheme Types
 */

import type { AppErrorCode, MalformedSchemeEntryError } from "@/lib/errors";

/**
 * One classified line of a scheme file
 */
export type SchemeEntry =
  | { type: "SKIP"; line: number }
  | { type: "ITEM"; line: number; id: string; expression: string }
  | { type: "RULE"; line: number; name: string; itemIds: string[]; expression: string };

/**
 * A source line with its classification or parse failure
 */
export type ParsedSchemeLine =
  | { line: number; text: string; entry: SchemeEntry }
  | { line: number; text: string; error: MalformedSchemeEntryError };

/**
 * Why a scheme line was skipped
 */
export interface SchemeDiagnostic {
  line: number;
  code: AppErrorCode;
  message: string;
  text: string;
}
