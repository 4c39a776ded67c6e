import type { GraphError, Result } from "@structgraph/core";

import type { SourceFile } from "../model.js";

export interface LoadOptions {
  /** Extensions to include, e.g. `[".java"]` */
  extensions: string[];
  /** Directory names skipped wherever they appear */
  ignoreDirectories: string[];
}

export interface LoadedSources {
  root: string;
  files: SourceFile[];
  /** Files found but not readable; each is skipped */
  failures: GraphError[];
}

/**
 * Port for collecting `(path, text)` pairs under a root directory.
 */
export interface SourceLoader {
  /**
   * Load every matching file below `rootPath`.
   *
   * @returns Err only when the root itself is unusable
   */
  load(rootPath: string, options: LoadOptions): Promise<Result<LoadedSources, GraphError>>;
}
