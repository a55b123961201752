/**
 * Findings document schema
 *
 * Zod schema for the normalised findings document the scanner collaborator
 * writes. Severity is kept as a raw string here; the loader normalises it so
 * unknown levels get their own error.
 *
 * @module findings/schema
 */

import { z } from 'zod';

export const RawFindingSchema = z.object({
  id: z.string().min(1),
  severity: z.string().min(1),
  package: z.string().min(1),
  fixedVersion: z.string().optional(),
  installedVersion: z.string().optional(),
  title: z.string().optional(),
});
export type RawFinding = z.infer<typeof RawFindingSchema>;

export const FindingsDocumentSchema = z.object({
  tool: z.string().min(1),
  target: z.string().min(1),
  timestamp: z.string().optional(),
  findings: z.array(RawFindingSchema),
});
export type FindingsDocument = z.infer<typeof FindingsDocumentSchema>;
