// Run summary model

/**
 * Audit record for one substituted occurrence
 */
export interface PinRecord {
  file: string;
  repository: string;
  oldLocator: string;
  newLocator: string;
}

/**
 * Aggregate result of one pinning run
 */
export interface ProcessSummary {
  /** Files successfully read and parsed */
  filesProcessed: number;
  /** Occurrences found across all parsed files */
  actionsFound: number;
  /** Successful substitutions (would-be substitutions in dry-run mode) */
  actionsPinned: number;
  /** Occurrences already referencing a commit SHA */
  alreadyPinned: number;
  /** Read, resolve and write failures */
  errors: number;
  dryRun: boolean;
  pinnedActions: PinRecord[];
}

export function emptySummary(dryRun: boolean = false): ProcessSummary {
  return {
    filesProcessed: 0,
    actionsFound: 0,
    actionsPinned: 0,
    alreadyPinned: 0,
    errors: 0,
    dryRun,
    pinnedActions: []
  };
}
