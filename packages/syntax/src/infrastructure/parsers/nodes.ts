/**
 * Small helpers over tree-sitter nodes shared by the extractors.
 */
import type Parser from "tree-sitter";

import { MODIFIERS, type Modifier, type Span } from "../../core/model.js";

export type SyntaxNode = Parser.SyntaxNode;

const COMMENTS = new Set(["line_comment", "block_comment", "comment"]);

/**
 * Convert an AST node to a Span.
 */
export function nodeToSpan(node: SyntaxNode): Span {
  return {
    start: {
      line: node.startPosition.row + 1,
      column: node.startPosition.column + 1,
      offset: node.startIndex,
    },
    end: {
      line: node.endPosition.row + 1,
      column: node.endPosition.column + 1,
      offset: node.endIndex,
    },
  };
}

export function namedChildOfType(node: SyntaxNode, ...types: string[]): SyntaxNode | null {
  return node.namedChildren.find((c) => types.includes(c.type)) ?? null;
}

export function namedChildrenOfType(node: SyntaxNode, type: string): SyntaxNode[] {
  return node.namedChildren.filter((c) => c.type === type);
}

/**
 * Named children without comments; comments can sit anywhere between tokens.
 */
export function codeChildren(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter((c) => !COMMENTS.has(c.type));
}

export function countArguments(argumentList: SyntaxNode | null): number {
  return argumentList ? codeChildren(argumentList).length : 0;
}

function isModifier(keyword: string): keyword is Modifier {
  return MODIFIERS.has(keyword);
}

/**
 * Keyword modifiers of a declaration; annotations are dropped.
 */
export function readModifiers(declaration: SyntaxNode): Modifier[] {
  const modifiers = namedChildOfType(declaration, "modifiers");
  if (!modifiers) return [];

  const result: Modifier[] = [];
  for (const child of modifiers.children) {
    const keyword = child.type;
    if (isModifier(keyword) && !result.includes(keyword)) {
      result.push(keyword);
    }
  }
  return result;
}

/** Dotted name with any whitespace or comments between segments removed. */
export function dottedName(node: SyntaxNode): string {
  return node.text.replace(/\/\*[\s\S]*?\*\//g, "").replace(/\s+/g, "");
}
