export { Checkout, type CheckoutOptions } from "./checkout";
export {
  DEFAULT_SCAN_SEQUENCE,
  formatAmount,
  formatScanResult,
  formatSummary,
  readScanFile,
  runScans,
  type RunScansOptions,
} from "./scan-runner";
export type { CheckoutSummary, RuleAppliedListener, ScanResult } from "./types";
