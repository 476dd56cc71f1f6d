// Summary renderer tests

import { describe, it, expect } from 'vitest';
import { renderJson, renderScan, renderText, toSummaryDocument } from './summary-renderer.js';
import { emptySummary, type ProcessSummary } from '../../models/summary.js';
import { createActionReference } from '../../models/action-reference.js';

const SHA = '11bd71901bbe5b1630ceea73d27597364c9af683';

function summary(overrides: Partial<ProcessSummary> = {}): ProcessSummary {
  return {
    ...emptySummary(),
    filesProcessed: 2,
    actionsFound: 3,
    actionsPinned: 1,
    alreadyPinned: 2,
    pinnedActions: [
      { file: '.github/workflows/ci.yml', repository: 'actions/checkout', oldLocator: 'v4', newLocator: SHA }
    ],
    ...overrides
  };
}

describe('toSummaryDocument', () => {
  it('should map the summary to snake_case keys', () => {
    expect(toSummaryDocument(summary())).toEqual({
      files_processed: 2,
      actions_found: 3,
      actions_pinned: 1,
      already_pinned: 2,
      errors: 0,
      dry_run: false,
      pinned_actions: [
        { file: '.github/workflows/ci.yml', action: 'actions/checkout', old_ref: 'v4', sha: SHA }
      ]
    });
  });
});

describe('renderJson', () => {
  it('should produce parseable, two-space indented JSON', () => {
    const json = renderJson(summary());
    expect(JSON.parse(json)).toEqual(toSummaryDocument(summary()));
    expect(json.split('\n')[1]).toBe('  "files_processed": 2,');
  });
});

describe('renderText', () => {
  it('should list every counter', () => {
    const lines = renderText(summary({ errors: 1 })).split('\n');
    expect(lines).toContain('  Files processed:  2');
    expect(lines).toContain('  Actions found:    3');
    expect(lines).toContain('  Actions pinned:   1');
    expect(lines).toContain('  Already pinned:   2');
    expect(lines).toContain('  Errors:           1');
  });

  it('should announce a completed pinning run', () => {
    const text = renderText(summary());
    expect(text.split('\n').at(-1)).toBe('✓ All unpinned actions have been pinned to commit SHAs');
  });

  it('should say when nothing needed pinning', () => {
    const text = renderText(summary({ actionsPinned: 0, pinnedActions: [] }));
    expect(text.split('\n').at(-1)).toBe('✓ No actions needed pinning');
  });

  it('should describe dry runs as would-be pins', () => {
    const lines = renderText(summary({ dryRun: true })).split('\n');
    expect(lines).toContain('  Would pin:        1');
    expect(lines.at(-1)).toBe('ℹ Dry run mode - no files were modified');
  });
});

describe('renderScan', () => {
  it('should list each mutable use with its location', () => {
    const text = renderScan({
      filesProcessed: 1,
      errors: 0,
      mutable: [{
        file: 'ci.yml',
        occurrence: { lineNumber: 7, prefix: '  - uses: ', reference: createActionReference('actions/checkout', 'v4') }
      }]
    });
    expect(text).toBe('⚠ 1 mutable action reference(s):\n  ci.yml:7 actions/checkout@v4');
  });

  it('should confirm when everything is pinned', () => {
    expect(renderScan({ filesProcessed: 3, errors: 0, mutable: [] }))
      .toBe('✓ All action references in 3 file(s) are pinned to commit SHAs');
  });
});
