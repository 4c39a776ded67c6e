import fs from "node:fs";
import path from "node:path";
import { Err, GraphError, Ok, type Result } from "@structgraph/core";

import type { SourceFile } from "../../core/model.js";
import type { LoadedSources, LoadOptions, SourceLoader } from "../../core/ports/SourceLoader.js";

// VCS metadata and build output
export const DEFAULT_IGNORED_DIRECTORIES = [
  ".git",
  ".github",
  ".svn",
  ".hg",
  "node_modules",
  "target",
  "build",
  "out",
  ".idea",
  ".gradle",
];

export const DEFAULT_LOAD_OPTIONS: LoadOptions = {
  extensions: [".java"],
  ignoreDirectories: DEFAULT_IGNORED_DIRECTORIES,
};

/**
 * Node.js implementation of SourceLoader.
 * Recursively scans the root; symbolic links are not followed.
 */
export class NodeSourceLoader implements SourceLoader {
  async load(
    rootPath: string,
    options: LoadOptions = DEFAULT_LOAD_OPTIONS
  ): Promise<Result<LoadedSources, GraphError>> {
    const root = path.resolve(rootPath);

    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(root);
    } catch (error) {
      return Err(
        new GraphError("SOURCE_ROOT_NOT_FOUND", `Source root not found: ${rootPath}`, rootPath, error)
      );
    }
    if (!stat.isDirectory()) {
      return Err(
        new GraphError("SOURCE_ROOT_NOT_DIRECTORY", `Source root is not a directory: ${rootPath}`, rootPath)
      );
    }

    const extensions = new Set(options.extensions.map((e) => e.toLowerCase()));
    const ignored = new Set(options.ignoreDirectories);
    const found: string[] = [];
    const failures: GraphError[] = [];

    this.scanDirectory(root, root, extensions, ignored, found, failures);
    found.sort();

    const files: SourceFile[] = [];
    for (const relativePath of found) {
      try {
        const text = await fs.promises.readFile(path.join(root, relativePath), "utf-8");
        files.push({ path: relativePath, text });
      } catch (error) {
        failures.push(
          new GraphError("READ_FAILURE", `Cannot read ${relativePath}`, relativePath, error)
        );
      }
    }

    return Ok({ root, files, failures });
  }

  private scanDirectory(
    rootPath: string,
    currentPath: string,
    extensions: Set<string>,
    ignored: Set<string>,
    results: string[],
    failures: GraphError[]
  ): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(currentPath, { withFileTypes: true });
    } catch (error) {
      const relativePath = toPosix(path.relative(rootPath, currentPath));
      failures.push(
        new GraphError("READ_FAILURE", `Cannot list ${relativePath}/`, relativePath, error)
      );
      return;
    }

    for (const entry of entries) {
      if (entry.isSymbolicLink()) continue;

      const fullPath = path.join(currentPath, entry.name);

      if (entry.isDirectory()) {
        if (!ignored.has(entry.name)) {
          this.scanDirectory(rootPath, fullPath, extensions, ignored, results, failures);
        }
      } else if (entry.isFile()) {
        const ext = path.extname(entry.name).toLowerCase();
        if (extensions.has(ext)) {
          results.push(toPosix(path.relative(rootPath, fullPath)));
        }
      }
    }
  }
}

function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}
