/**
 * Summary rendering
 *
 * Text and JSON views over the same ProcessSummary. The JSON document keeps
 * snake_case keys; downstream tooling reads them.
 */

import type { ProcessSummary } from '../../models/summary.js';
import type { ScanResult } from '../pin/pin-service.js';

const RULE = '─'.repeat(50);

/**
 * JSON wire shape of a summary
 */
export interface SummaryDocument {
  files_processed: number;
  actions_found: number;
  actions_pinned: number;
  already_pinned: number;
  errors: number;
  dry_run: boolean;
  pinned_actions: Array<{
    file: string;
    action: string;
    old_ref: string;
    sha: string;
  }>;
}

export function toSummaryDocument(summary: ProcessSummary): SummaryDocument {
  return {
    files_processed: summary.filesProcessed,
    actions_found: summary.actionsFound,
    actions_pinned: summary.actionsPinned,
    already_pinned: summary.alreadyPinned,
    errors: summary.errors,
    dry_run: summary.dryRun,
    pinned_actions: summary.pinnedActions.map(record => ({
      file: record.file,
      action: record.repository,
      old_ref: record.oldLocator,
      sha: record.newLocator
    }))
  };
}

export function renderJson(summary: ProcessSummary): string {
  return JSON.stringify(toSummaryDocument(summary), null, 2);
}

export function renderText(summary: ProcessSummary): string {
  const lines = [
    '',
    '📊 Summary',
    RULE,
    `  Files processed:  ${summary.filesProcessed}`,
    `  Actions found:    ${summary.actionsFound}`,
    summary.dryRun
      ? `  Would pin:        ${summary.actionsPinned}`
      : `  Actions pinned:   ${summary.actionsPinned}`,
    `  Already pinned:   ${summary.alreadyPinned}`,
    `  Errors:           ${summary.errors}`,
    RULE,
    ''
  ];

  if (summary.dryRun) {
    lines.push('ℹ Dry run mode - no files were modified');
  } else if (summary.actionsPinned > 0) {
    lines.push('✓ All unpinned actions have been pinned to commit SHAs');
  } else {
    lines.push('✓ No actions needed pinning');
  }

  return lines.join('\n');
}

/**
 * One `<file>:<line> <reference>` line per mutable use
 */
export function renderScan(result: ScanResult): string {
  if (result.mutable.length === 0) {
    return `✓ All action references in ${result.filesProcessed} file(s) are pinned to commit SHAs`;
  }

  const lines = [`⚠ ${result.mutable.length} mutable action reference(s):`];
  for (const use of result.mutable) {
    const { repository, locator } = use.occurrence.reference;
    lines.push(`  ${use.file}:${use.occurrence.lineNumber} ${repository}@${locator}`);
  }
  return lines.join('\n');
}
