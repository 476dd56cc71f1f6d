// Action reference model: `repository@locator`

import { InvalidFormatError } from '../core/errors.js';

/**
 * Locator assumed when a reference names no `@locator`: the remote's default branch
 */
export const DEFAULT_LOCATOR = 'HEAD';

/**
 * Marker for actions living inside the same repository
 */
export const LOCAL_PATH_MARKER = './';

const REFERENCE_PATTERN = /^([^@\s#]+)(?:@([^\s#]+))?/;
const COMMIT_SHA_PATTERN = /^[0-9a-f]{40}$/;

/**
 * A parsed action reference. `isImmutable` is derived from the locator, never supplied.
 */
export interface ActionReference {
  readonly repository: string;
  readonly locator: string;
  readonly isImmutable: boolean;
}

/**
 * A reference paired with the commit it resolved to
 */
export interface ResolvedReference {
  readonly reference: ActionReference;
  /** 40-hex commit identifier */
  readonly resolvedLocator: string;
  /** The mutable locator the reference was written with, kept for the audit comment */
  readonly originalLocator: string;
}

/**
 * True iff the locator is a full lowercase commit SHA
 */
export function isCommitSha(locator: string): boolean {
  return COMMIT_SHA_PATTERN.test(locator);
}

export function createActionReference(repository: string, locator: string = DEFAULT_LOCATOR): ActionReference {
  return Object.freeze({
    repository,
    locator,
    isImmutable: isCommitSha(locator)
  });
}

/**
 * Parses `owner/repo@ref` or a bare `owner/repo` (defaults to {@link DEFAULT_LOCATOR}).
 * Anything after the locator (whitespace, `# comment`) is ignored.
 */
export function parseActionReference(text: string): ActionReference {
  const trimmed = text.trim();
  const match = REFERENCE_PATTERN.exec(trimmed);
  if (!match) {
    throw new InvalidFormatError(trimmed);
  }
  return createActionReference(match[1], match[2] ?? DEFAULT_LOCATOR);
}

export function isLocalReference(reference: ActionReference): boolean {
  return reference.repository.startsWith(LOCAL_PATH_MARKER);
}

/**
 * Canonical `repository@locator` form, used for display, caching and deduplication
 */
export function referenceKey(reference: ActionReference): string {
  return `${reference.repository}@${reference.locator}`;
}

export function referencesEqual(a: ActionReference, b: ActionReference): boolean {
  return a.repository === b.repository && a.locator === b.locator;
}

/**
 * Git URL of the repository hosting the action. Sub-directory actions
 * (`owner/repo/path`) live in `owner/repo`.
 */
export function repositoryUrl(reference: ActionReference, host: string = 'https://github.com'): string {
  const [owner, repo] = reference.repository.split('/');
  const slug = repo ? `${owner}/${repo}` : owner;
  return `${host.replace(/\/+$/, '')}/${slug}.git`;
}

export function createResolvedReference(reference: ActionReference, sha: string): ResolvedReference {
  return Object.freeze({
    reference,
    resolvedLocator: sha,
    originalLocator: reference.locator
  });
}

/**
 * `repository@sha # original`, the pinned form written back into workflows
 */
export function formatPinnedReference(resolved: ResolvedReference): string {
  return `${resolved.reference.repository}@${resolved.resolvedLocator} # ${resolved.originalLocator}`;
}
