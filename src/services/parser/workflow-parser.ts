/**
 * Workflow Parser
 *
 * Line-oriented extraction of `uses:` action references. Workflows are
 * treated as text, not as YAML documents, so every byte outside a
 * recognized reference survives a rewrite untouched.
 */

import { InvalidFormatError } from '../../core/errors.js';
import {
  isLocalReference,
  parseActionReference,
  type ActionReference
} from '../../models/action-reference.js';
import type { Occurrence, ParsedFile } from '../../models/workflow.js';

/**
 * Captures: 1: everything up to the token (indent, list marker, `uses:`), 2: `repository@locator`.
 * The token must end at whitespace, a comment or end of line; quoted values are not recognized.
 * A repository never contains `:`, so `docker://image@sha256:...` sources are not references.
 */
const USES_LINE_PATTERN = /^(\s*(?:-\s*)?uses:\s+)([^@\s#'":]+@[^\s#'"]+)(?=\s|#|$)/;

/**
 * Parses a single line, returning the occurrence it declares (if any)
 */
export function parseUsesLine(line: string, lineNumber: number): Occurrence | null {
  const match = USES_LINE_PATTERN.exec(line);
  if (!match) return null;

  let reference: ActionReference;
  try {
    reference = parseActionReference(match[2]);
  } catch (error) {
    if (error instanceof InvalidFormatError) return null;
    throw error;
  }

  if (isLocalReference(reference)) return null;

  return { lineNumber, prefix: match[1], reference };
}

/**
 * Extracts every non-local action reference from workflow text, in line order.
 * Lines are split on `\n` only; a `\r` before it stays part of the line.
 */
export function extractOccurrences(content: string): Occurrence[] {
  const occurrences: Occurrence[] = [];
  const lines = content.split('\n');

  lines.forEach((line, index) => {
    const occurrence = parseUsesLine(line, index + 1);
    if (occurrence) {
      occurrences.push(occurrence);
    }
  });

  return occurrences;
}

export function parseWorkflow(path: string, content: string): ParsedFile {
  return { path, content, occurrences: extractOccurrences(content) };
}

/**
 * Occurrences still using a tag or branch
 */
export function mutableOccurrences(file: ParsedFile): Occurrence[] {
  return file.occurrences.filter(o => !o.reference.isImmutable);
}

export function pinnedCount(file: ParsedFile): number {
  return file.occurrences.filter(o => o.reference.isImmutable).length;
}
