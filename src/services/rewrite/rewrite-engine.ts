/**
 * Rewrite Engine
 *
 * Pure text transformation: substitutes resolved commit SHAs into the lines
 * recorded as occurrences and copies every other byte through unchanged.
 */

import {
  formatPinnedReference,
  referenceKey,
  type ResolvedReference
} from '../../models/action-reference.js';
import type { PinRecord } from '../../models/summary.js';
import type { Occurrence } from '../../models/workflow.js';

/**
 * Rewritten text plus one audit record per substitution
 */
export interface RewriteResult {
  content: string;
  records: PinRecord[];
}

/**
 * Rewrites `content`, replacing each occurrence whose key is in `resolutions`
 * with `<prefix>repository@sha # original`. Occurrences without a resolution
 * keep their line verbatim. A `\r` line terminator is kept, and the result
 * ends with a newline iff the input does.
 */
export function rewriteContent(
  file: string,
  content: string,
  occurrences: readonly Occurrence[],
  resolutions: ReadonlyMap<string, ResolvedReference>
): RewriteResult {
  const byLine = new Map<number, Occurrence>();
  for (const occurrence of occurrences) {
    byLine.set(occurrence.lineNumber, occurrence);
  }

  const records: PinRecord[] = [];
  const lines = content.split('\n');

  const rewritten = lines.map((line, index) => {
    const occurrence = byLine.get(index + 1);
    if (!occurrence) return line;

    const resolved = resolutions.get(referenceKey(occurrence.reference));
    if (!resolved) return line;

    records.push({
      file,
      repository: occurrence.reference.repository,
      oldLocator: occurrence.reference.locator,
      newLocator: resolved.resolvedLocator
    });

    const terminator = line.endsWith('\r') ? '\r' : '';
    return `${occurrence.prefix}${formatPinnedReference(resolved)}${terminator}`;
  });

  return { content: rewritten.join('\n'), records };
}
