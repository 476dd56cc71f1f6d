/**
 * Configuration Service
 *
 * Loads optional defaults from .pin-actions.yaml and merges them with
 * command-line flags (flag > file > built-in default).
 */

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import type { ZodError } from 'zod';
import { ConfigurationError, describeCause } from '../../core/errors.js';
import {
  ConfigFileSchema,
  PinOptionsSchema,
  type ConfigFile,
  type PinOptions
} from '../../core/schemas.js';

/**
 * Config file looked up in the working directory when none is given
 */
export const CONFIG_FILE_NAME = '.pin-actions.yaml';

/**
 * Built-in defaults
 */
export const DEFAULT_PIN_OPTIONS: PinOptions = {
  workflowsDir: '.github/workflows',
  jobs: 10,
  backup: false,
  dryRun: false,
  verbose: false,
  format: 'text',
  timeoutMs: 30000,
  host: 'https://github.com'
};

/**
 * Values supplied on the command line; unset flags are undefined
 */
export interface CliOverrides {
  workflowsDir?: string;
  jobs?: string | number;
  backup?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  format?: string;
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class ConfigService {
  private configPath: string;
  private explicit: boolean;
  private cachedConfig: ConfigFile | null = null;

  constructor(options: { configPath?: string } = {}) {
    this.configPath = options.configPath ?? CONFIG_FILE_NAME;
    this.explicit = options.configPath !== undefined;
  }

  /**
   * Load configuration from file, with caching. A missing default file yields
   * an empty configuration; a missing explicit file or invalid content fails.
   */
  async load(): Promise<ConfigFile> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error) && !this.explicit) {
        this.cachedConfig = {};
        return this.cachedConfig;
      }
      throw new ConfigurationError(
        `Cannot read config file ${this.configPath}: ${describeCause(error)}`,
        'config'
      );
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Invalid YAML in ${this.configPath}: ${describeCause(error)}`, 'config');
    }

    const result = ConfigFileSchema.safeParse(parsed ?? {});
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid config file ${this.configPath}: ${formatZodError(result.error)}`,
        'config'
      );
    }

    this.cachedConfig = result.data;
    return this.cachedConfig;
  }

  /**
   * Clear the cached configuration
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  /**
   * Merges flags over the config file over defaults and validates the result
   */
  async resolveOptions(overrides: CliOverrides = {}): Promise<PinOptions> {
    const file = await this.load();

    const merged = {
      workflowsDir: overrides.workflowsDir ?? file.workflowsDir ?? DEFAULT_PIN_OPTIONS.workflowsDir,
      jobs: overrides.jobs !== undefined ? Number(overrides.jobs) : file.jobs ?? DEFAULT_PIN_OPTIONS.jobs,
      backup: overrides.backup ?? file.backup ?? DEFAULT_PIN_OPTIONS.backup,
      dryRun: overrides.dryRun ?? DEFAULT_PIN_OPTIONS.dryRun,
      verbose: overrides.verbose ?? DEFAULT_PIN_OPTIONS.verbose,
      format: overrides.format ?? file.format ?? DEFAULT_PIN_OPTIONS.format,
      timeoutMs: file.timeoutMs ?? DEFAULT_PIN_OPTIONS.timeoutMs,
      host: file.host ?? DEFAULT_PIN_OPTIONS.host
    };

    const result = PinOptionsSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigurationError(`Invalid options: ${formatZodError(result.error)}`);
    }
    return result.data;
  }
}
