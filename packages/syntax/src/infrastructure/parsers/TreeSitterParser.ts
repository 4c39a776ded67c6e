import { Err, Ok, type Result } from "@structgraph/core";
import Parser from "tree-sitter";

import { JAVA, type Language, type SyntaxIssue } from "../../core/model.js";
import type { AstProvider, ParseResult } from "../../core/ports/AstProvider.js";
import { extractBodies } from "./BodyExtractor.js";
import { extractImports, extractPackage, extractTypes } from "./DeclarationExtractor.js";
import { nodeToSpan, type SyntaxNode } from "./nodes.js";

// Tree-sitter language type (uses any in the typings)
type TreeSitterLanguage = unknown;

// Language grammars - dynamically imported
type GrammarLoader = () => Promise<TreeSitterLanguage>;

const GRAMMAR_LOADERS: Record<string, GrammarLoader> = {
  java: async () => {
    const mod = await import("tree-sitter-java");
    return mod.default;
  },
};

const LANGUAGES: Language[] = [JAVA];

const MIN_BUFFER_SIZE = 32 * 1024;

/**
 * Tree-sitter based AstProvider.
 *
 * A tree with syntax errors is still returned; the errors come back as issues.
 * A file is rejected only when nothing could be recovered from it.
 */
export class TreeSitterParser implements AstProvider {
  private readonly parser: Parser;
  private readonly loadedGrammars = new Map<string, TreeSitterLanguage>();

  constructor() {
    this.parser = new Parser();
  }

  async parse(source: string, filePath: string): Promise<Result<ParseResult, Error>> {
    const lang = this.detectLanguage(filePath);
    if (!lang) {
      return Err(new Error(`Unsupported file type: ${filePath}`));
    }

    try {
      const grammar = await this.getGrammar(lang.id);
      this.parser.setLanguage(grammar);

      // the default 32 KiB buffer rejects larger inputs
      const tree = this.parser.parse(source, undefined, {
        bufferSize: Math.max(MIN_BUFFER_SIZE, source.length * 2),
      });
      const root = tree.rootNode;

      const packageName = extractPackage(root);
      const imports = extractImports(root);
      const types = extractTypes(root);
      const issues = extractIssues(root);

      if (issues.length > 0 && packageName === null && imports.length === 0 && types.length === 0) {
        return Err(new Error(`No declarations recovered (${issues.length} syntax errors)`));
      }

      const { locals, calls } = extractBodies(root);

      return Ok({
        unit: { path: filePath, packageName, imports, types, locals, calls },
        issues,
      });
    } catch (error) {
      return Err(error instanceof Error ? error : new Error(String(error)));
    }
  }

  languages(): Language[] {
    return LANGUAGES;
  }

  supportsFile(filePath: string): boolean {
    return this.detectLanguage(filePath) !== undefined;
  }

  private detectLanguage(filePath: string): Language | undefined {
    const lower = filePath.toLowerCase();
    return LANGUAGES.find((lang) => lang.extensions.some((ext) => lower.endsWith(ext)));
  }

  private async getGrammar(languageId: string): Promise<TreeSitterLanguage> {
    const cached = this.loadedGrammars.get(languageId);
    if (cached) return cached;

    const loader = GRAMMAR_LOADERS[languageId];
    if (!loader) {
      throw new Error(`No grammar loader for: ${languageId}`);
    }

    const grammar = await loader();
    this.loadedGrammars.set(languageId, grammar);
    return grammar;
  }
}

/**
 * Outermost ERROR nodes of a tree; nested errors are reported once.
 */
export function extractIssues(root: SyntaxNode): SyntaxIssue[] {
  const issues: SyntaxIssue[] = [];

  const walk = (node: SyntaxNode): void => {
    if (node.type === "ERROR") {
      const span = nodeToSpan(node);
      issues.push({
        message: `Syntax error at line ${span.start.line}, column ${span.start.column}`,
        span,
      });
      return;
    }
    for (const child of node.children) {
      walk(child);
    }
  };

  walk(root);
  return issues;
}
