/**
 * Remote ref listing
 *
 * The resolver only ever needs "list every advertised ref of a repository",
 * i.e. `git ls-remote <url>`, anonymously and read-only.
 */

import { simpleGit, SimpleGit } from 'simple-git';

/**
 * A ref advertised by a remote
 */
export interface RemoteRef {
  /** Fully-qualified name, e.g. `refs/tags/v4` or `HEAD` */
  name: string;
  sha: string;
}

/**
 * Lists the refs of a remote repository in the order the remote advertises them
 */
export interface RemoteRefLister {
  listRefs(url: string): Promise<RemoteRef[]>;
}

/**
 * Options for the git-backed lister
 */
export interface GitRefListerOptions {
  /** Per-lookup timeout in milliseconds */
  timeoutMs: number;
  /** Upper bound on concurrently spawned git processes */
  maxConcurrentProcesses: number;
}

const DEFAULT_OPTIONS: GitRefListerOptions = {
  timeoutMs: 30000,
  maxConcurrentProcesses: 10
};

/**
 * Parses `git ls-remote` output (`<sha>\t<name>` per line), skipping anything malformed
 */
export function parseLsRemoteOutput(output: string): RemoteRef[] {
  const refs: RemoteRef[] = [];

  for (const line of output.split('\n')) {
    const tab = line.indexOf('\t');
    if (tab === -1) continue;

    const sha = line.slice(0, tab).trim();
    const name = line.slice(tab + 1).trim();
    if (!/^[0-9a-f]{40}$/.test(sha) || name.length === 0) continue;

    refs.push({ name, sha });
  }

  return refs;
}

/**
 * Lists remote refs by running `git ls-remote` through simple-git
 */
export class GitRefLister implements RemoteRefLister {
  private git: SimpleGit;

  constructor(options: Partial<GitRefListerOptions> = {}) {
    const config = { ...DEFAULT_OPTIONS, ...options };
    this.git = simpleGit({
      maxConcurrentProcesses: config.maxConcurrentProcesses,
      timeout: { block: config.timeoutMs }
    }).env({ ...process.env, GIT_TERMINAL_PROMPT: '0' });
  }

  async listRefs(url: string): Promise<RemoteRef[]> {
    const output = await this.git.listRemote([url]);
    return parseLsRemoteOutput(output);
  }
}
