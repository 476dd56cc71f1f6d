/**
 * Pin command
 *
 * Rewrites tag and branch action references in workflow files to commit
 * SHAs, keeping the original ref as a trailing comment.
 */

import { Command } from 'commander';
import { Logger, LogLevel, logger } from '../../core/logger.js';
import { ConfigService, type CliOverrides } from '../../services/config/config-service.js';
import { PinService } from '../../services/pin/pin-service.js';
import { renderJson, renderText } from '../../services/report/summary-renderer.js';
import { ActionResolver } from '../../services/resolver/action-resolver.js';
import { GitRefLister, type RemoteRefLister } from '../../services/resolver/git-ref-lister.js';
import { WorkflowStore } from '../../services/storage/workflow-store.js';
import { withErrorHandling } from '../utils/error-handler.js';

export interface PinCommandOptions extends CliOverrides {
  config?: string;
}

/**
 * Collaborators a caller may substitute
 */
export interface PinCommandDeps {
  lister?: RemoteRefLister;
}

/**
 * Register the pin command (the default command) with the CLI program
 */
export function registerPinCommand(program: Command): void {
  program
    .command('pin', { isDefault: true })
    .description('Pin action references in workflow files to commit SHAs')
    .option('-w, --workflows-dir <dir>', 'Workflows directory (default: .github/workflows)')
    .option('-n, --dry-run', 'Report what would be pinned without modifying files')
    .option('-b, --backup', 'Create <file>.bak before modifying a file')
    .option('-j, --jobs <n>', 'Concurrent remote lookups (default: 10)')
    .option('-v, --verbose', 'Verbose output')
    .option('-f, --format <format>', 'Output format: text or json (default: text)')
    .option('-c, --config <file>', 'Config file (default: .pin-actions.yaml)')
    .action(withErrorHandling(async (options: PinCommandOptions) => {
      process.exitCode = await executePin(options);
    }));
}

/**
 * Execute a pinning run and print its summary. Resolves to the exit code:
 * 1 when any file or reference failed, 0 otherwise.
 */
export async function executePin(options: PinCommandOptions, deps: PinCommandDeps = {}): Promise<number> {
  const { config, ...overrides } = options;
  const settings = await new ConfigService({ configPath: config }).resolveOptions(overrides);

  Logger.configure({
    level: settings.verbose ? LogLevel.DEBUG : LogLevel.INFO,
    stream: settings.format === 'json' ? 'stderr' : 'stdout'
  });

  const lister = deps.lister ?? new GitRefLister({
    timeoutMs: settings.timeoutMs,
    maxConcurrentProcesses: settings.jobs
  });
  const resolver = new ActionResolver(lister, { host: settings.host });
  const service = new PinService(resolver, new WorkflowStore(), {
    dryRun: settings.dryRun,
    backup: settings.backup,
    concurrency: settings.jobs
  });

  logger.info(`🔍 Scanning workflows in ${settings.workflowsDir}`);
  const summary = await service.pinDirectory(settings.workflowsDir);

  console.log(settings.format === 'json' ? renderJson(summary) : renderText(summary));

  if (summary.errors > 0) {
    logger.warn(`⚠ Completed with ${summary.errors} error(s)`);
    return 1;
  }
  return 0;
}
