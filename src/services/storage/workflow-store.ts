// Workflow file store: discovery, reading and writing of workflow files

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigurationError, FileReadError, FileWriteError } from '../../core/errors.js';
import { logger as defaultLogger, type Logger } from '../../core/logger.js';
import { err, ok, type Result } from '../../core/result.js';
import { WORKFLOW_EXTENSIONS, type ParsedFile } from '../../models/workflow.js';
import { parseWorkflow } from '../parser/workflow-parser.js';

/**
 * Suffix appended to a workflow path for its backup copy
 */
export const BACKUP_SUFFIX = '.bak';

/**
 * Options for writing a workflow file
 */
export interface WriteOptions {
  /** Copy the current file to `<path>.bak` before overwriting */
  backup?: boolean;
}

/**
 * Reads, parses and writes workflow files
 */
export interface IWorkflowStore {
  discover(dir: string): Promise<string[]>;
  read(filePath: string): Promise<Result<ParsedFile, FileReadError>>;
  write(filePath: string, content: string, options?: WriteOptions): Promise<Result<void, FileWriteError>>;
}

// Invalid UTF-8 fails the read rather than being replaced; a BOM stays part of the content.
const UTF8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function isWorkflowFile(name: string): boolean {
  const ext = path.extname(name).toLowerCase();
  return WORKFLOW_EXTENSIONS.some(candidate => candidate === ext);
}

/**
 * Fails with a ConfigurationError unless `dir` exists and is a directory
 */
export async function validateWorkflowsDir(dir: string): Promise<void> {
  const stats = await fs.stat(dir).catch(() => null);
  if (!stats) {
    throw new ConfigurationError(`Workflows directory not found: ${dir}`, 'workflowsDir');
  }
  if (!stats.isDirectory()) {
    throw new ConfigurationError(`Not a directory: ${dir}`, 'workflowsDir');
  }
}

/**
 * File-system backed workflow store
 */
export class WorkflowStore implements IWorkflowStore {
  private logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Lists `.yml`/`.yaml` files directly inside `dir`, sorted by name. Not recursive.
   */
  async discover(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && isWorkflowFile(entry.name))
      .map(entry => entry.name)
      .sort()
      .map(name => path.join(dir, name));
  }

  async read(filePath: string): Promise<Result<ParsedFile, FileReadError>> {
    try {
      const content = UTF8.decode(await fs.readFile(filePath));
      return ok(parseWorkflow(filePath, content));
    } catch (error) {
      return err(new FileReadError(filePath, error));
    }
  }

  async write(
    filePath: string,
    content: string,
    options: WriteOptions = {}
  ): Promise<Result<void, FileWriteError>> {
    if (options.backup) {
      const backupPath = `${filePath}${BACKUP_SUFFIX}`;
      try {
        await fs.copyFile(filePath, backupPath);
        this.logger.debug(`Created backup: ${backupPath}`);
      } catch (error) {
        return err(new FileWriteError(backupPath, error));
      }
    }

    try {
      await fs.writeFile(filePath, content, 'utf-8');
      return ok(undefined);
    } catch (error) {
      return err(new FileWriteError(filePath, error));
    }
  }
}
