import type { Result } from "@structgraph/core";

import type { CompilationUnit, Language, SyntaxIssue } from "../model.js";

export interface ParseResult {
  unit: CompilationUnit;
  /** Recoverable syntax errors; the unit is still usable */
  issues: SyntaxIssue[];
}

/**
 * Port for turning source text into a declaration tree.
 */
export interface AstProvider {
  /**
   * Parse one file.
   *
   * @param source - File contents
   * @param filePath - Path relative to the analyzed root, stored on the unit
   * @returns The declaration tree, or an error when no tree can be produced
   */
  parse(source: string, filePath: string): Promise<Result<ParseResult, Error>>;

  /** Languages this provider understands */
  languages(): Language[];

  supportsFile(filePath: string): boolean;
}
