import type { Diagnostics } from '../diagnostics';
import type { ExclusionPolicy } from '../exclusion';

export interface WalkerOptions {
  policy: ExclusionPolicy;
  /** Receives unreadable directories and failed stat calls */
  diagnostics: Diagnostics;
  followSymlinks?: boolean;
  /** Also yield directory entries, not only files */
  includeDirectories?: boolean;
  /** Deepest entry depth yielded; direct children of the root have depth 1 */
  maxDepth?: number;
}

export interface WalkerStats {
  directoriesRead: number;
  entriesEmitted: number;
}
