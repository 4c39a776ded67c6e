/**
 * Erasure of written types: annotations and type arguments dropped,
 * array brackets counted.
 */
import type { TypeRef } from "../../core/model.js";
import { nodeToSpan, type SyntaxNode } from "./nodes.js";

const ANNOTATION = /@[\w.$]+(\s*\([^()]*\))?/g;

export interface ErasedType {
  name: string;
  dimensions: number;
}

/**
 * `@NonNull Map<String, List<Item>>[]` → `{ name: "Map", dimensions: 1 }`.
 * `Outer<String>.Inner` → `{ name: "Outer.Inner", dimensions: 0 }`.
 */
export function normalizeTypeText(text: string): ErasedType {
  let stripped = text.replace(ANNOTATION, "");

  let erased = "";
  let depth = 0;
  for (const ch of stripped) {
    if (ch === "<") {
      depth++;
    } else if (ch === ">") {
      depth = Math.max(0, depth - 1);
    } else if (depth === 0) {
      erased += ch;
    }
  }
  stripped = erased.replace(/\s+/g, "");

  let dimensions = 0;
  while (stripped.endsWith("[]")) {
    dimensions++;
    stripped = stripped.slice(0, -2);
  }

  return { name: stripped, dimensions };
}

/**
 * Number of `[]` pairs in a `dimensions` node (`int a[][]`).
 */
export function countDimensions(node: SyntaxNode | null): number {
  if (!node) return 0;
  return (node.text.match(/\[\s*\]/g) ?? []).length;
}

export function typeRefFromNode(node: SyntaxNode, extraDimensions = 0): TypeRef {
  const erased = normalizeTypeText(node.text);
  return {
    name: erased.name,
    dimensions: erased.dimensions + extraDimensions,
    span: nodeToSpan(node),
  };
}
