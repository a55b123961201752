/**
 * Findings module
 *
 * @module findings
 */

export type { Finding, FindingsReport, ScannerName, Severity } from './types';
export {
  SEVERITY_ORDER,
  SUPPORTED_SCANNERS,
  compareSeverity,
  isAtOrAbove,
  isSupportedScanner,
  parseSeverity,
  severityRank,
} from './types';
export { FindingsDocumentSchema } from './schema';
export type { FindingsDocument, RawFinding } from './schema';
export {
  LoadError,
  UnsupportedScannerError,
  loadFindings,
  resolveFindingsPath,
} from './loader';
export type { LoadErrorKind } from './loader';
