export { Scheme } from "./scheme";
export { buildScheme, SchemeBuilder, type SchemeBuildResult } from "./scheme-builder";
export { loadScheme } from "./scheme-loader";
export { parseSchemeLine, parseSchemeSource } from "./scheme-parser";
export type { ParsedSchemeLine, SchemeDiagnostic, SchemeEntry } from "./types";
