/**
 * Name lookup at a call site.
 *
 * Tiers, innermost first:
 *   1. locals and parameters visible at the site
 *   2. fields of the enclosing type
 *   3. fields inherited from its supertypes, most-derived first
 *   4. fields of enclosing types (and their supertypes) up to a static boundary
 *   5-7. type names: imports, same package, wildcard imports
 */

import { spanContains, type TypeRef } from "@structgraph/syntax";

import type { FileSymbols, SymbolTable } from "../indexing/SymbolTable.js";
import type { Hierarchy, ResolutionContext, TypeLookup, TypeResolver } from "./TypeResolver.js";

/** Where a lookup happens */
export interface CallSiteContext {
  file: FileSymbols;
  /** Innermost project type containing the site */
  typeId: string;
  /** Executable member owning the site */
  ownerId: string;
  offset: number;
}

export type Binding =
  | {
      kind: "local";
      name: string;
      type: TypeRef | null;
      context: ResolutionContext;
    }
  | {
      kind: "field";
      name: string;
      type: TypeRef;
      isStatic: boolean;
      /** Type declaring the field */
      declaringTypeId: string;
      context: ResolutionContext;
    }
  | { kind: "type"; name: string; lookup: TypeLookup };

export interface LookupOptions {
  /** `this.name`: only fields of the enclosing type and its supertypes */
  viaThis?: boolean;
}

export class ScopeResolver {
  constructor(
    private readonly table: SymbolTable,
    private readonly types: TypeResolver,
    private readonly hierarchy: Hierarchy
  ) {}

  /**
   * The first binding of `name` at the site.
   */
  resolveName(name: string, site: CallSiteContext, options: LookupOptions = {}): Binding | null {
    return this.lookupChain(name, site, options)[0] ?? null;
  }

  /**
   * Every binding of `name` at the site, in lookup order.
   */
  lookupChain(name: string, site: CallSiteContext, options: LookupOptions = {}): Binding[] {
    const chain: Binding[] = [];
    const context: ResolutionContext = { file: site.file, typeId: site.typeId };

    if (!options.viaThis) {
      const local = this.findLocal(name, site);
      if (local) chain.push({ kind: "local", name, type: local.type, context });
    }

    chain.push(...this.fieldsInHierarchy(site.typeId, name));

    if (options.viaThis) return chain;

    let current = this.table.getType(site.typeId);
    while (current && !current.isStaticBoundary && current.enclosingId) {
      chain.push(...this.fieldsInHierarchy(current.enclosingId, name));
      current = this.table.getType(current.enclosingId);
    }

    const type = this.types.resolve(name, context);
    if (type) chain.push({ kind: "type", name, lookup: type });

    return chain;
  }

  /**
   * Static type of a variable binding.
   *
   * @returns null for primitives, arrays and unresolvable declared types
   */
  typeOf(binding: Binding): TypeLookup | null {
    switch (binding.kind) {
      case "type":
        return binding.lookup;
      case "local":
      case "field":
        if (!binding.type || binding.type.dimensions > 0) return null;
        return this.types.resolve(binding.type.name, binding.context);
    }
  }

  /**
   * A field of a project type or of its supertypes.
   */
  findField(typeId: string, name: string): Binding | null {
    return this.fieldsInHierarchy(typeId, name)[0] ?? null;
  }

  /**
   * Tier 1: the latest declaration whose scope contains the site and that is
   * declared before it, then the owning member's parameters.
   */
  private findLocal(name: string, site: CallSiteContext): { type: TypeRef | null } | null {
    let best: { declaredAt: number; type: TypeRef | null } | null = null;
    for (const local of site.file.unit.locals) {
      if (local.name !== name) continue;
      if (local.declaredAt > site.offset || !spanContains(local.scope, site.offset)) continue;
      if (!best || local.declaredAt >= best.declaredAt) {
        best = { declaredAt: local.declaredAt, type: local.type };
      }
    }
    if (best) return { type: best.type };

    const owner = this.table.getType(site.typeId);
    const executable = owner
      ? [...owner.methods, ...owner.constructors].find((m) => m.id === site.ownerId)
      : undefined;
    const parameter = executable?.parameters.find((p) => p.name === name);
    if (parameter) {
      return {
        type: parameter.variadic
          ? { ...parameter.type, dimensions: parameter.type.dimensions + 1 }
          : parameter.type,
      };
    }

    return null;
  }

  private fieldsInHierarchy(typeId: string, name: string): Binding[] {
    const bindings: Binding[] = [];
    for (const id of this.hierarchy.linearize(typeId)) {
      const type = this.table.getType(id);
      const file = this.table.fileOf(id);
      if (!type || !file) continue;

      // interface fields are indexed as static constants
      const field = type.fields.find((f) => f.name === name);
      if (!field) continue;

      bindings.push({
        kind: "field",
        name,
        type: field.type,
        isStatic: field.isStatic,
        declaringTypeId: id,
        context: { file, typeId: id },
      });
    }
    return bindings;
  }
}
