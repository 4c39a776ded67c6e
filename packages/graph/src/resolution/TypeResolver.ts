/**
 * Type-name resolution.
 *
 * A simple name is looked up in order: the enclosing types and their member
 * types, top-level types of the same file, single-type imports, the same
 * package, wildcard imports over indexed packages, then the implicit
 * `java.lang` names. A dotted name resolves its first segment and walks
 * member types, then falls back to a fully qualified project type.
 */

import javaLangNames from "../data/java-lang.json" with { type: "json" };
import { DEFAULT_PACKAGE } from "../ids.js";
import type { FileSymbols, SymbolTable } from "../indexing/SymbolTable.js";
import type { ExternalType } from "./Placeholders.js";

const PRIMITIVES = new Set([
  "boolean",
  "byte",
  "char",
  "short",
  "int",
  "long",
  "float",
  "double",
  "void",
  "var",
]);

const JAVA_LANG = new Set<string>(javaLangNames);

export type TypeLookup =
  | { kind: "project"; typeId: string }
  | ({ kind: "external" } & ExternalType);

export interface ResolutionContext {
  file: FileSymbols;
  /** Innermost type the name appears in; null at file level */
  typeId: string | null;
}

/**
 * Supertype order of project types, available once supertypes are linked.
 */
export interface Hierarchy {
  /** The type, its superclass chain, then interfaces breadth-first */
  linearize(typeId: string): string[];
  superclassOf(typeId: string): string | null;
}

export function isPrimitive(name: string): boolean {
  return PRIMITIVES.has(name);
}

function project(typeId: string): TypeLookup {
  return { kind: "project", typeId };
}

function lastSegment(name: string): string {
  return name.slice(name.lastIndexOf(".") + 1);
}

/**
 * Package part of a qualified name: the segments before the first capitalized
 * one, so `java.util.Map.Entry` lives in `java.util`.
 */
export function packageOf(qualifiedName: string): string {
  const segments = qualifiedName.split(".");
  if (segments.length === 1) return DEFAULT_PACKAGE;

  const firstType = segments.findIndex((s) => /^[A-Z]/.test(s));
  if (firstType > 0) return segments.slice(0, firstType).join(".");
  return segments.slice(0, -1).join(".");
}

export class TypeResolver {
  constructor(
    private readonly table: SymbolTable,
    private readonly builtinPrefixes: readonly string[],
    private readonly hierarchy: Hierarchy | null = null
  ) {}

  /**
   * A resolver that also finds member types inherited from supertypes.
   */
  withHierarchy(hierarchy: Hierarchy): TypeResolver {
    return new TypeResolver(this.table, this.builtinPrefixes, hierarchy);
  }

  isBuiltin(qualifiedName: string): boolean {
    return this.builtinPrefixes.some((prefix) => qualifiedName.startsWith(prefix));
  }

  /**
   * Placeholder description of a name the project does not declare.
   */
  externalFor(qualifiedName: string): ExternalType {
    return {
      namespace: this.isBuiltin(qualifiedName) ? "stdlib" : "external",
      qualifiedName,
      packageName: packageOf(qualifiedName),
    };
  }

  /**
   * @returns null for primitives and for names nothing declares or imports
   */
  resolve(name: string, context: ResolutionContext): TypeLookup | null {
    if (name === "" || isPrimitive(name)) return null;

    const segments = name.split(".");
    return segments.length === 1
      ? this.resolveSimple(name, context)
      : this.resolveDotted(segments, context);
  }

  /**
   * Like `resolve`, but an unresolved reference type becomes a placeholder.
   */
  resolveOrPlaceholder(name: string, context: ResolutionContext): TypeLookup | null {
    if (name === "" || isPrimitive(name)) return null;
    const found = this.resolve(name, context);
    if (found) return found;
    return { kind: "external", ...this.externalFor(name) };
  }

  /**
   * Member type of a project type, searching supertypes once linked.
   */
  memberType(typeId: string, name: string): string | null {
    const direct = this.table.getType(typeId)?.memberTypes.get(name);
    if (direct) return direct;
    if (!this.hierarchy) return null;

    for (const supertypeId of this.hierarchy.linearize(typeId).slice(1)) {
      const inherited = this.table.getType(supertypeId)?.memberTypes.get(name);
      if (inherited) return inherited;
    }
    return null;
  }

  private resolveSimple(name: string, context: ResolutionContext): TypeLookup | null {
    const { file } = context;

    let current = context.typeId ? this.table.getType(context.typeId) : null;
    while (current) {
      if (current.name === name) return project(current.id);
      const member = this.memberType(current.id, name);
      if (member) return project(member);
      current = current.enclosingId ? this.table.getType(current.enclosingId) : null;
    }

    const sameFile = file.topLevelTypes.get(name);
    if (sameFile) return project(sameFile);

    for (const imported of file.unit.imports) {
      if (imported.isWildcard || lastSegment(imported.path) !== name) continue;
      if (this.table.hasType(imported.path)) return project(imported.path);
      if (!imported.isStatic) return { kind: "external", ...this.externalFor(imported.path) };
    }

    const samePackage = this.table.typeInPackage(file.packageKey, name);
    if (samePackage) return project(samePackage);

    for (const imported of file.unit.imports) {
      if (!imported.isWildcard) continue;
      const inPackage = imported.isStatic ? null : this.table.typeInPackage(imported.path, name);
      if (inPackage) return project(inPackage);
      if (this.table.hasType(imported.path)) {
        const member = this.memberType(imported.path, name);
        if (member) return project(member);
      }
    }

    if (JAVA_LANG.has(name)) {
      return { kind: "external", namespace: "stdlib", qualifiedName: `java.lang.${name}`, packageName: "java.lang" };
    }

    return null;
  }

  private resolveDotted(segments: string[], context: ResolutionContext): TypeLookup | null {
    const [first, ...rest] = segments;
    const head = this.resolveSimple(first, context);

    if (head?.kind === "project") {
      const walked = this.walkMemberTypes(head.typeId, rest);
      if (walked) return project(walked);
    }

    for (let k = segments.length; k >= 2; k--) {
      const prefix = segments.slice(0, k).join(".");
      if (!this.table.hasType(prefix)) continue;
      const walked = this.walkMemberTypes(prefix, segments.slice(k));
      if (walked) return project(walked);
    }

    if (head?.kind === "external") {
      return {
        kind: "external",
        namespace: head.namespace,
        qualifiedName: [head.qualifiedName, ...rest].join("."),
        packageName: head.packageName,
      };
    }

    return null;
  }

  private walkMemberTypes(typeId: string, path: string[]): string | null {
    let current: string | null = typeId;
    for (const segment of path) {
      if (!current) return null;
      current = this.memberType(current, segment);
    }
    return current;
  }
}
