/**
 * Entity/relation model of the dependency graph.
 */

import type { GraphError } from "@structgraph/core";
import type { Span } from "@structgraph/syntax";

export const ENTITY_KINDS = [
  "FILE",
  "PACKAGE",
  "DIRECTORY",
  "CLASS",
  "INTERFACE",
  "ENUM",
  "METHOD",
  "CONSTRUCTOR",
  "EXTERNAL",
] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

export const RELATION_KINDS = [
  "CONTAINS", // parent → child in the containment forest
  "INHERITS", // subtype → supertype
  "INVOKES", // caller → callee, one per call site and target
  "IMPORTS", // file → imported entity
] as const;

export type RelationKind = (typeof RELATION_KINDS)[number];

export type EntityModifier =
  | "PUBLIC"
  | "PROTECTED"
  | "PRIVATE"
  | "STATIC"
  | "FINAL"
  | "ABSTRACT"
  | "DEFAULT"
  | "SYNCHRONIZED"
  | "NATIVE"
  /** No source declaration: default constructors, `<init>`, `<clinit>` */
  | "SYNTHETIC";

/**
 * A node in the graph.
 */
export interface Entity {
  /** Stable qualified id, see ids.ts */
  id: string;
  kind: EntityKind;
  /** Simple name */
  name: string;
  /** File declaring the entity; null for structural and external entities */
  declaringFile: string | null;
  /** Sorted, without duplicates */
  modifiers: EntityModifier[];
  /** CONTAINS parent; null for roots */
  containerId: string | null;
  /** Declaration range; null for synthetic, structural and external entities */
  range: Span | null;
  /** Erased parameter types of methods and constructors, `T...` for varargs */
  parameterTypes?: string[];
  returnType?: string;
}

/**
 * An edge in the graph.
 */
export interface Relation {
  sourceId: string;
  targetId: string;
  kind: RelationKind;
  /** File of the declaration or call site; null for structural edges */
  file: string | null;
  /** 1-indexed line of the site; null for structural edges */
  line: number | null;
}

export interface GraphStats {
  entities: Record<EntityKind, number>;
  relations: Record<RelationKind, number>;
  totalEntities: number;
  totalRelations: number;
}

export type WarningKind = "SYNTAX_ERROR" | "DUPLICATE_TYPE" | "INHERITANCE_CYCLE";

export interface BuildWarning {
  kind: WarningKind;
  file: string;
  line: number | null;
  message: string;
}

export interface BuildReport {
  /** Files that produced a FILE entity */
  filesIndexed: number;
  /** Files skipped: unreadable or without a tree */
  failures: GraphError[];
  warnings: BuildWarning[];
  durationMs: number;
}
