// Check command - list mutable action references without resolving them

import { Command } from 'commander';
import { ConfigService } from '../../services/config/config-service.js';
import { scanDirectory } from '../../services/pin/pin-service.js';
import { renderScan } from '../../services/report/summary-renderer.js';
import { WorkflowStore } from '../../services/storage/workflow-store.js';
import { withErrorHandling } from '../utils/error-handler.js';

export interface CheckCommandOptions {
  workflowsDir?: string;
  config?: string;
}

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('List action references that are not pinned to a commit SHA (exit 1 if any)')
    .option('-w, --workflows-dir <dir>', 'Workflows directory (default: .github/workflows)')
    .option('-c, --config <file>', 'Config file (default: .pin-actions.yaml)')
    .action(withErrorHandling(async (options: CheckCommandOptions) => {
      process.exitCode = await executeCheck(options);
    }));
}

/**
 * Resolves to 1 when a mutable reference or an unreadable file was found
 */
export async function executeCheck(options: CheckCommandOptions): Promise<number> {
  const settings = await new ConfigService({ configPath: options.config })
    .resolveOptions({ workflowsDir: options.workflowsDir });

  const result = await scanDirectory(new WorkflowStore(), settings.workflowsDir);

  console.log(renderScan(result));

  return result.mutable.length > 0 || result.errors > 0 ? 1 : 0;
}
