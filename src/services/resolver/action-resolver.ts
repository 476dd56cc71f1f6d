/**
 * Action Resolver
 *
 * Resolves mutable action references (tags, branches) to commit SHAs by
 * listing the remote's refs, with a shared per-run cache and a bounded
 * number of lookups in flight.
 */

import { mapWithConcurrency } from '../../core/concurrency.js';
import {
  NetworkError,
  ReferenceNotFoundError,
  type ResolutionError
} from '../../core/errors.js';
import { logger as defaultLogger, type Logger } from '../../core/logger.js';
import { err, ok, type Result } from '../../core/result.js';
import {
  createResolvedReference,
  referenceKey,
  repositoryUrl,
  type ActionReference,
  type ResolvedReference
} from '../../models/action-reference.js';
import type { RemoteRef, RemoteRefLister } from './git-ref-lister.js';
import { ResolutionCache } from './resolution-cache.js';

export type MatchKind = 'exact' | 'suffix';

/**
 * The remote ref a locator was matched against
 */
export interface RefMatch {
  name: string;
  sha: string;
  kind: MatchKind;
}

export type ResolutionOutcome = Result<ResolvedReference, ResolutionError>;

/**
 * Resolver options
 */
export interface ActionResolverOptions {
  /** Base URL of the git host */
  host: string;
  cache: ResolutionCache;
  logger: Logger;
}

const PEELED_SUFFIX = '^{}';

/**
 * Candidate ref names for a locator, in priority order: tag, branch, literal
 */
export function candidateRefNames(locator: string): string[] {
  return [`refs/tags/${locator}`, `refs/heads/${locator}`, locator];
}

/**
 * Picks the remote ref a locator refers to.
 *
 * Exact matches are tried per candidate in priority order. An exact tag match
 * resolves to its peeled commit (`<tag>^{}`) when the remote advertises one.
 * Otherwise the first ref, in listing order, whose name ends with the locator
 * is used. That fallback is best-effort: an unrelated ref sharing the suffix
 * can win.
 */
export function selectRemoteRef(refs: readonly RemoteRef[], locator: string): RefMatch | null {
  for (const candidate of candidateRefNames(locator)) {
    const exact = refs.find(ref => ref.name === candidate);
    if (!exact) continue;

    if (candidate.startsWith('refs/tags/')) {
      const peeled = refs.find(ref => ref.name === `${candidate}${PEELED_SUFFIX}`);
      if (peeled) {
        return { name: peeled.name, sha: peeled.sha, kind: 'exact' };
      }
    }
    return { name: exact.name, sha: exact.sha, kind: 'exact' };
  }

  const suffix = refs.find(ref => ref.name.endsWith(locator));
  if (suffix) {
    return { name: suffix.name, sha: suffix.sha, kind: 'suffix' };
  }

  return null;
}

/**
 * Resolves action references to commit SHAs
 */
export class ActionResolver {
  private lister: RemoteRefLister;
  private config: ActionResolverOptions;
  private pending: Map<string, Promise<string>> = new Map();

  constructor(lister: RemoteRefLister, options: Partial<ActionResolverOptions> = {}) {
    this.lister = lister;
    this.config = {
      host: options.host ?? 'https://github.com',
      cache: options.cache ?? new ResolutionCache(),
      logger: options.logger ?? defaultLogger
    };
  }

  get cache(): ResolutionCache {
    return this.config.cache;
  }

  /**
   * Resolves one reference to its commit SHA.
   *
   * A cached answer is returned without network activity. Immutable
   * references resolve to themselves. Concurrent calls for the same key share
   * one lookup. Rejects with {@link ReferenceNotFoundError} or {@link NetworkError};
   * failures are not cached.
   */
  async resolve(reference: ActionReference): Promise<string> {
    if (reference.isImmutable) {
      return reference.locator;
    }

    const key = referenceKey(reference);
    const cached = this.config.cache.get(key);
    if (cached !== undefined) {
      this.config.logger.debug(`Cache hit for ${key}`);
      return cached;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight;
    }

    const lookup = this.lookup(reference).then(
      sha => {
        this.pending.delete(key);
        return this.config.cache.setIfAbsent(key, sha);
      },
      (error: unknown) => {
        this.pending.delete(key);
        throw error;
      }
    );
    this.pending.set(key, lookup);
    return lookup;
  }

  /**
   * Resolves every reference, with at most `maxConcurrency` lookups in flight.
   * Each unique key gets exactly one outcome; a failure never affects another key.
   */
  async batchResolve(
    references: readonly ActionReference[],
    maxConcurrency: number
  ): Promise<Map<string, ResolutionOutcome>> {
    const unique = new Map<string, ActionReference>();
    for (const reference of references) {
      const key = referenceKey(reference);
      if (!unique.has(key)) {
        unique.set(key, reference);
      }
    }

    const outcomes = await mapWithConcurrency(
      [...unique.values()],
      maxConcurrency,
      async (reference): Promise<[string, ResolutionOutcome]> => {
        const key = referenceKey(reference);
        try {
          const sha = await this.resolve(reference);
          this.config.logger.debug(`Resolved ${key} → ${sha}`);
          return [key, ok(createResolvedReference(reference, sha))];
        } catch (error) {
          const failure = toResolutionError(error, repositoryUrl(reference, this.config.host));
          this.config.logger.warn(`Failed to resolve ${key}: ${failure.message}`);
          return [key, err(failure)];
        }
      }
    );

    return new Map(outcomes);
  }

  private async lookup(reference: ActionReference): Promise<string> {
    const url = repositoryUrl(reference, this.config.host);
    this.config.logger.debug(`Resolving ${reference.locator} from ${url}`);

    let refs: RemoteRef[];
    try {
      refs = await this.lister.listRefs(url);
    } catch (error) {
      throw new NetworkError(url, error);
    }

    const match = selectRemoteRef(refs, reference.locator);
    if (!match) {
      throw new ReferenceNotFoundError(reference.locator, url);
    }

    if (match.kind === 'suffix') {
      this.config.logger.warn(
        `No exact ref for ${referenceKey(reference)}; using suffix match ${match.name}`
      );
    }

    return match.sha;
  }
}

function toResolutionError(error: unknown, url: string): ResolutionError {
  if (error instanceof ReferenceNotFoundError || error instanceof NetworkError) {
    return error;
  }
  return new NetworkError(url, error);
}
