/**
 * Pin Service
 *
 * Orchestrates a pinning run: parse every workflow, resolve each unique
 * mutable reference once across all files, rewrite the files and account
 * for every outcome. Per-file and per-reference failures are counted, never
 * fatal.
 */

import { logger as defaultLogger, type Logger } from '../../core/logger.js';
import {
  emptySummary,
  referenceKey,
  type ActionReference,
  type Occurrence,
  type ParsedFile,
  type ProcessSummary,
  type ResolvedReference
} from '../../models/index.js';
import { mutableOccurrences, pinnedCount } from '../parser/workflow-parser.js';
import type { ActionResolver } from '../resolver/action-resolver.js';
import { rewriteContent } from '../rewrite/rewrite-engine.js';
import { validateWorkflowsDir, type IWorkflowStore } from '../storage/workflow-store.js';

/**
 * Options for a pinning run
 */
export interface PinServiceOptions {
  /** Compute and report changes without writing */
  dryRun: boolean;
  /** Keep a `.bak` copy of each file before overwriting it */
  backup: boolean;
  /** Maximum remote lookups in flight */
  concurrency: number;
  logger: Logger;
}

/**
 * A mutable occurrence reported by {@link scanDirectory}
 */
export interface MutableUse {
  file: string;
  occurrence: Occurrence;
}

/**
 * Result of a read-only scan
 */
export interface ScanResult {
  filesProcessed: number;
  errors: number;
  mutable: MutableUse[];
}

export class PinService {
  private resolver: ActionResolver;
  private store: IWorkflowStore;
  private config: PinServiceOptions;

  constructor(resolver: ActionResolver, store: IWorkflowStore, options: Partial<PinServiceOptions> = {}) {
    this.resolver = resolver;
    this.store = store;
    this.config = {
      dryRun: options.dryRun ?? false,
      backup: options.backup ?? false,
      concurrency: options.concurrency ?? 10,
      logger: options.logger ?? defaultLogger
    };
  }

  /**
   * Validates the directory, discovers its workflow files and processes them
   */
  async pinDirectory(dir: string): Promise<ProcessSummary> {
    const files = await this.discover(dir);
    if (files.length === 0) {
      this.config.logger.info('No workflow files found');
      return emptySummary(this.config.dryRun);
    }
    this.config.logger.info(`Found ${files.length} workflow file(s)`);
    return this.process(files);
  }

  /**
   * Pins every mutable reference in the given files
   */
  async process(files: readonly string[]): Promise<ProcessSummary> {
    const { logger } = this.config;
    const summary = emptySummary(this.config.dryRun);

    const parsed = await this.readAll(files, summary);
    summary.filesProcessed = parsed.length;

    const unresolved = new Map<string, ActionReference>();
    for (const file of parsed) {
      summary.actionsFound += file.occurrences.length;
      summary.alreadyPinned += pinnedCount(file);

      for (const occurrence of mutableOccurrences(file)) {
        const key = referenceKey(occurrence.reference);
        if (!unresolved.has(key)) {
          unresolved.set(key, occurrence.reference);
        }
      }
    }

    const resolutions = new Map<string, ResolvedReference>();
    if (unresolved.size === 0) {
      logger.info('No actions need pinning');
    } else {
      logger.info(`Resolving ${unresolved.size} unique action(s)`);
      const outcomes = await this.resolver.batchResolve([...unresolved.values()], this.config.concurrency);
      for (const [key, outcome] of outcomes) {
        if (outcome.ok) {
          resolutions.set(key, outcome.value);
        } else {
          summary.errors++;
        }
      }
    }

    for (const file of parsed) {
      const { content, records } = rewriteContent(file.path, file.content, file.occurrences, resolutions);
      if (records.length === 0) continue;

      if (this.config.dryRun) {
        logger.debug(`Dry run: would write to ${file.path}`);
      } else {
        const written = await this.store.write(file.path, content, { backup: this.config.backup });
        if (!written.ok) {
          logger.error(`Failed to rewrite ${file.path}`, { reason: written.error.message });
          summary.errors++;
          continue;
        }
      }

      for (const record of records) {
        logger.info(`📌 ${record.repository}@${record.oldLocator} → ${record.newLocator.slice(0, 8)}`);
      }
      summary.actionsPinned += records.length;
      summary.pinnedActions.push(...records);
    }

    return summary;
  }

  private async discover(dir: string): Promise<string[]> {
    await validateWorkflowsDir(dir);
    return this.store.discover(dir);
  }

  private async readAll(files: readonly string[], summary: ProcessSummary): Promise<ParsedFile[]> {
    const { parsed, errors } = await readWorkflows(this.store, files, this.config.logger);
    summary.errors += errors;
    return parsed;
  }
}

/**
 * Lists mutable references in a directory without resolving or writing anything
 */
export async function scanDirectory(
  store: IWorkflowStore,
  dir: string,
  logger: Logger = defaultLogger
): Promise<ScanResult> {
  await validateWorkflowsDir(dir);
  const files = await store.discover(dir);
  const { parsed, errors } = await readWorkflows(store, files, logger);

  const mutable: MutableUse[] = [];
  for (const file of parsed) {
    for (const occurrence of mutableOccurrences(file)) {
      mutable.push({ file: file.path, occurrence });
    }
  }

  return { filesProcessed: parsed.length, errors, mutable };
}

async function readWorkflows(
  store: IWorkflowStore,
  files: readonly string[],
  logger: Logger
): Promise<{ parsed: ParsedFile[]; errors: number }> {
  const parsed: ParsedFile[] = [];
  let errors = 0;
  for (const filePath of files) {
    const result = await store.read(filePath);
    if (result.ok) {
      parsed.push(result.value);
    } else {
      logger.error(`Failed to parse ${filePath}`, { reason: result.error.message });
      errors++;
    }
  }
  return { parsed, errors };
}
