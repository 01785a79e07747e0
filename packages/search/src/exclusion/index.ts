import ignore, { type Ignore } from 'ignore';
import type { SessionConfig } from '@treescout/shared';
import type { Entry } from '../types';

/** The entry fields the policy looks at; the walker has these before any stat. */
export type PruneCandidate = Pick<Entry, 'name' | 'relativePath' | 'kind'>;

export interface ExclusionPolicyOptions {
  /** Names or gitignore-style globs, matched at any depth */
  excludes?: readonly string[];
  /** When false, dot-files and dot-directories are pruned */
  searchHidden?: boolean;
  /** Extra gitignore rule text, e.g. the root `.gitignore` */
  rules?: readonly string[];
}

/**
 * Decides whether an entry is pruned before descent (directories) or before
 * matching (files). Holds no I/O: rule text is read by the caller.
 */
export class ExclusionPolicy {
  private readonly ig: Ignore;
  private readonly searchHidden: boolean;

  constructor(options: ExclusionPolicyOptions = {}) {
    this.searchHidden = options.searchHidden ?? false;
    this.ig = ignore();
    if (options.excludes && options.excludes.length > 0) {
      this.ig.add([...options.excludes]);
    }
    for (const rules of options.rules ?? []) {
      this.ig.add(rules);
    }
  }

  static fromConfig(config: SessionConfig, rules: readonly string[] = []): ExclusionPolicy {
    return new ExclusionPolicy({
      excludes: [...config.defaultExcludes, ...config.extraExcludes],
      searchHidden: config.searchHidden,
      rules,
    });
  }

  shouldPrune(candidate: PruneCandidate): boolean {
    // The root itself is never pruned.
    if (candidate.relativePath === '') {
      return false;
    }
    if (!this.searchHidden && candidate.name.startsWith('.')) {
      return true;
    }
    // Directories get a trailing slash so directory-only patterns (`build/`) apply.
    const target = candidate.kind === 'directory' ? `${candidate.relativePath}/` : candidate.relativePath;
    // Names made only of dots (`...`) are legal on disk but not ignore paths.
    if (!ignore.isPathValid(target)) {
      return false;
    }
    return this.ig.ignores(target);
  }
}

/**
 * One-shot form of {@link ExclusionPolicy.shouldPrune} built from a session config.
 */
export function shouldPrune(candidate: PruneCandidate, config: SessionConfig): boolean {
  return ExclusionPolicy.fromConfig(config).shouldPrune(candidate);
}
