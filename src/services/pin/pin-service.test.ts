/**
 * Tests for the Pin Service
 *
 * End-to-end runs over temporary workflow directories with an in-memory
 * remote standing in for git.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PinService, scanDirectory } from './pin-service.js';
import { ActionResolver } from '../resolver/action-resolver.js';
import { InMemoryRefLister } from '../resolver/in-memory-ref-lister.js';
import { WorkflowStore } from '../storage/workflow-store.js';
import { Logger, LogLevel } from '../../core/logger.js';
import { FileWriteError } from '../../core/errors.js';
import { err } from '../../core/result.js';

const PINNED_CHECKOUT = 'b4ffde65f46336ab88eb53be808477a3936bae11';
const CHECKOUT_V4 = '11bd71901bbe5b1630ceea73d27597364c9af683';
const SETUP_NODE_V3 = '1a4442cacd436585916779262731d5b162bc6ec7';

const CHECKOUT_URL = 'https://github.com/actions/checkout.git';
const SETUP_NODE_URL = 'https://github.com/actions/setup-node.git';

const MIXED_WORKFLOW = [
  'name: Test',
  'on: [push]',
  'jobs:',
  '  test:',
  '    runs-on: ubuntu-latest',
  '    steps:',
  '      - uses: actions/checkout@v4',
  `      - uses: actions/checkout@${PINNED_CHECKOUT} # v4`,
  ''
].join('\n');

describe('PinService', () => {
  let dir: string;
  let lister: InMemoryRefLister;
  let store: WorkflowStore;
  const silent = new Logger({ level: LogLevel.SILENT });

  function service(options: { dryRun?: boolean; backup?: boolean } = {}, workflowStore = store): PinService {
    const resolver = new ActionResolver(lister, { logger: silent });
    return new PinService(resolver, workflowStore, { ...options, concurrency: 4, logger: silent });
  }

  async function writeWorkflow(name: string, content: string): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, content);
    return file;
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pin-service-'));
    lister = new InMemoryRefLister()
      .setRefs(CHECKOUT_URL, [
        { name: 'HEAD', sha: CHECKOUT_V4 },
        { name: 'refs/tags/v4', sha: CHECKOUT_V4 }
      ])
      .setRefs(SETUP_NODE_URL, [{ name: 'refs/tags/v3', sha: SETUP_NODE_V3 }]);
    store = new WorkflowStore({ logger: silent });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('process', () => {
    it('should pin the mutable reference and leave the pinned one unchanged', async () => {
      const file = await writeWorkflow('test.yml', MIXED_WORKFLOW);

      const summary = await service().process([file]);

      const content = await fs.readFile(file, 'utf-8');
      expect(content.split('\n')[6]).toBe(`      - uses: actions/checkout@${CHECKOUT_V4} # v4`);
      expect(content.split('\n')[7]).toBe(`      - uses: actions/checkout@${PINNED_CHECKOUT} # v4`);
      expect(content.endsWith('\n')).toBe(true);

      expect(summary).toEqual({
        filesProcessed: 1,
        actionsFound: 2,
        actionsPinned: 1,
        alreadyPinned: 1,
        errors: 0,
        dryRun: false,
        pinnedActions: [
          { file, repository: 'actions/checkout', oldLocator: 'v4', newLocator: CHECKOUT_V4 }
        ]
      });
    });

    it('should report but not write in dry-run mode', async () => {
      const file = await writeWorkflow('test.yml', MIXED_WORKFLOW);

      const summary = await service({ dryRun: true }).process([file]);

      expect(await fs.readFile(file, 'utf-8')).toBe(MIXED_WORKFLOW);
      expect(summary.dryRun).toBe(true);
      expect(summary.actionsPinned).toBe(1);
      expect(summary.pinnedActions).toHaveLength(1);
      await expect(fs.access(`${file}.bak`)).rejects.toThrow();
    });

    it('should resolve a reference shared by several files exactly once', async () => {
      const a = await writeWorkflow('a.yml', '  - uses: actions/checkout@v4\n');
      const b = await writeWorkflow('b.yml', '  - uses: actions/checkout@v4\n  - uses: actions/checkout@v4\n');
      const resolver = new ActionResolver(lister, { logger: silent });
      const batch = vi.spyOn(resolver, 'batchResolve');
      const pin = new PinService(resolver, store, { concurrency: 4, logger: silent });

      const summary = await pin.process([a, b]);

      expect(batch).toHaveBeenCalledTimes(1);
      expect(batch.mock.calls[0][0].map(ref => `${ref.repository}@${ref.locator}`)).toEqual(['actions/checkout@v4']);
      expect(lister.getCalls()).toEqual([CHECKOUT_URL]);
      expect(await fs.readFile(a, 'utf-8')).toBe(`  - uses: actions/checkout@${CHECKOUT_V4} # v4\n`);
      expect(await fs.readFile(b, 'utf-8')).toBe(
        `  - uses: actions/checkout@${CHECKOUT_V4} # v4\n  - uses: actions/checkout@${CHECKOUT_V4} # v4\n`
      );
      expect(summary.actionsPinned).toBe(3);
    });

    it('should rewrite resolvable references and keep failing ones verbatim', async () => {
      const content = [
        '  - uses: actions/setup-node@v3',
        '  - uses: actions/checkout@v9',
        '  - uses: actions/setup-node@v3'
      ].join('\n');
      const file = await writeWorkflow('ci.yml', content);

      const summary = await service().process([file]);

      expect(await fs.readFile(file, 'utf-8')).toBe([
        `  - uses: actions/setup-node@${SETUP_NODE_V3} # v3`,
        '  - uses: actions/checkout@v9',
        `  - uses: actions/setup-node@${SETUP_NODE_V3} # v3`
      ].join('\n'));
      expect(summary.errors).toBe(1);
      expect(summary.actionsPinned).toBe(2);
    });

    it('should never resolve or modify local actions', async () => {
      const content = '  - uses: ./local-action@v1\n';
      const file = await writeWorkflow('local.yml', content);

      const summary = await service().process([file]);

      expect(await fs.readFile(file, 'utf-8')).toBe(content);
      expect(lister.getCalls()).toEqual([]);
      expect(summary.actionsFound).toBe(0);
    });

    it('should count an unreadable file as an error and carry on', async () => {
      const good = await writeWorkflow('good.yml', '  - uses: actions/checkout@v4\n');

      const summary = await service().process([path.join(dir, 'missing.yml'), good]);

      expect(summary.filesProcessed).toBe(1);
      expect(summary.errors).toBe(1);
      expect(summary.actionsPinned).toBe(1);
    });

    it('should log a read failure with its reason as context', async () => {
      const log = new Logger({ level: LogLevel.SILENT });
      const error = vi.spyOn(log, 'error').mockImplementation(() => undefined);
      const missing = path.join(dir, 'missing.yml');
      const pinService = new PinService(new ActionResolver(lister, { logger: silent }), store, { logger: log });

      await pinService.process([missing]);

      expect(error).toHaveBeenCalledWith(`Failed to parse ${missing}`, {
        reason: expect.stringContaining(`Failed to read workflow file: ${missing}`)
      });
    });

    it('should count a failed write as an error without counting its substitutions', async () => {
      const a = await writeWorkflow('a.yml', '  - uses: actions/checkout@v4\n');
      const b = await writeWorkflow('b.yml', '  - uses: actions/setup-node@v3\n');
      const failing = new WorkflowStore({ logger: silent });
      const realWrite = failing.write.bind(failing);
      vi.spyOn(failing, 'write').mockImplementation(async (filePath, content, options) =>
        filePath === a ? err(new FileWriteError(filePath, new Error('EACCES'))) : realWrite(filePath, content, options)
      );

      const summary = await service({}, failing).process([a, b]);

      expect(summary.errors).toBe(1);
      expect(summary.actionsPinned).toBe(1);
      expect(summary.pinnedActions.map(r => r.file)).toEqual([b]);
      expect(await fs.readFile(b, 'utf-8')).toBe(`  - uses: actions/setup-node@${SETUP_NODE_V3} # v3\n`);
    });

    it('should create a backup only for files it rewrites', async () => {
      const changed = await writeWorkflow('changed.yml', '  - uses: actions/checkout@v4\n');
      const untouched = await writeWorkflow('untouched.yml', `  - uses: actions/checkout@${PINNED_CHECKOUT}\n`);

      await service({ backup: true }).process([changed, untouched]);

      expect(await fs.readFile(`${changed}.bak`, 'utf-8')).toBe('  - uses: actions/checkout@v4\n');
      await expect(fs.access(`${untouched}.bak`)).rejects.toThrow();
    });

    it('should skip resolution entirely when everything is pinned', async () => {
      const file = await writeWorkflow('pinned.yml', `  - uses: actions/checkout@${PINNED_CHECKOUT} # v4\n`);

      const summary = await service().process([file]);

      expect(lister.getCalls()).toEqual([]);
      expect(summary.alreadyPinned).toBe(1);
      expect(summary.actionsPinned).toBe(0);
      expect(summary.errors).toBe(0);
    });
    it('should neither resolve nor count docker image sources', async () => {
      const content = `      - uses: docker://alpine@sha256:${'ab'.repeat(32)}\n`;
      const file = await writeWorkflow('docker.yml', content);

      const summary = await service().process([file]);

      expect(lister.getCalls()).toEqual([]);
      expect(summary.actionsFound).toBe(0);
      expect(summary.errors).toBe(0);
      expect(await fs.readFile(file, 'utf-8')).toBe(content);
    });

    it('should exclude a file that is not valid UTF-8 and leave its bytes untouched', async () => {
      const bytes = Buffer.concat([
        Buffer.from('# caf'),
        Buffer.from([0xe9]),
        Buffer.from('\n  - uses: actions/checkout@v4\n')
      ]);
      const file = path.join(dir, 'latin1.yml');
      await fs.writeFile(file, bytes);

      const summary = await service().process([file]);

      expect(summary.filesProcessed).toBe(0);
      expect(summary.errors).toBe(1);
      expect(lister.getCalls()).toEqual([]);
      expect(await fs.readFile(file)).toEqual(bytes);
    });
  });

  describe('pinDirectory', () => {
    it('should return an empty summary for a directory without workflows', async () => {
      const summary = await service().pinDirectory(dir);
      expect(summary.filesProcessed).toBe(0);
      expect(summary.errors).toBe(0);
    });

    it('should process the workflows it discovers', async () => {
      await writeWorkflow('ci.yml', '  - uses: actions/checkout@v4\n');
      await writeWorkflow('notes.txt', '  - uses: actions/setup-node@v3\n');

      const summary = await service().pinDirectory(dir);

      expect(summary.filesProcessed).toBe(1);
      expect(summary.actionsPinned).toBe(1);
    });

    it('should fail for a missing directory', async () => {
      await expect(service().pinDirectory(path.join(dir, 'missing'))).rejects.toThrow('Workflows directory not found');
    });
  });

  describe('scanDirectory', () => {
    it('should list mutable uses by file and line', async () => {
      await writeWorkflow('ci.yml', MIXED_WORKFLOW);

      const result = await scanDirectory(store, dir, silent);

      expect(result.filesProcessed).toBe(1);
      expect(result.errors).toBe(0);
      expect(result.mutable.map(use => [path.basename(use.file), use.occurrence.lineNumber])).toEqual([['ci.yml', 7]]);
    });
  });
});
