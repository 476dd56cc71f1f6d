// Workflow file model

import { ActionReference } from './action-reference.js';

/**
 * File extensions recognized as workflow definitions
 */
export const WORKFLOW_EXTENSIONS = ['.yml', '.yaml'] as const;

/**
 * One reference-bearing line of a workflow file
 */
export interface Occurrence {
  /** 1-based line number */
  lineNumber: number;
  /** Verbatim text before the reference token, including indentation, list marker and `uses:` */
  prefix: string;
  reference: ActionReference;
}

/**
 * A workflow file with its original content and extracted occurrences,
 * ordered by ascending line number (at most one per line)
 */
export interface ParsedFile {
  path: string;
  content: string;
  occurrences: Occurrence[];
}
