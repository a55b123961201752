/**
 * Output module
 *
 * Exports output generation functionality.
 *
 * @module output
 */

export type { AnnotationResult } from './annotations';
export { emitFindingAnnotations, formatAnnotationMessage, getAnnotationLevel } from './annotations';
export type { ReportOptions } from './report';
export {
  formatFindingList,
  generateLoadFailureMarkdown,
  generateReportMarkdown,
  reportFileName,
  writeReport,
  writeSummary,
} from './report';
export type { GateMetadata } from './metadata';
export { buildGateMetadata, writeArtifactMetadata } from './metadata';
