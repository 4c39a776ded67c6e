/**
 * Call-site resolution: INVOKES edges from the executable member owning each
 * call to the statically nearest declarations it can reach.
 *
 * Method lookup stops at the first type in the receiver's hierarchy that
 * declares the name. Candidates there are narrowed by argument count; if no
 * overload fits, all of them are kept. Remaining ties fan out, one edge each,
 * in declaration order.
 */

import { spanContains, spanLength, type CallSite, type Receiver } from "@structgraph/syntax";

import type { GraphStore } from "../GraphStore.js";
import type { ExecutableSymbol, FileSymbols, SymbolTable, TypeSymbol } from "../indexing/SymbolTable.js";
import type { CallSiteContext, ScopeResolver } from "./ScopeResolver.js";
import type { Hierarchy, TypeResolver } from "./TypeResolver.js";

/**
 * Overloads accepting `argumentCount` arguments, or all of them when none does.
 */
export function selectByArity(candidates: ExecutableSymbol[], argumentCount: number): ExecutableSymbol[] {
  const matching = candidates.filter((c) =>
    c.variadic
      ? argumentCount >= c.parameters.length - 1
      : argumentCount === c.parameters.length
  );
  return matching.length > 0 ? matching : candidates;
}

function lastSegment(path: string): string {
  return path.slice(path.lastIndexOf(".") + 1);
}

export class InvocationResolver {
  constructor(
    private readonly store: GraphStore,
    private readonly table: SymbolTable,
    private readonly types: TypeResolver,
    private readonly scopes: ScopeResolver,
    private readonly hierarchy: Hierarchy
  ) {}

  /**
   * Resolve every call site of every file, in path order.
   */
  resolveAll(): void {
    for (const file of this.table.allFiles()) {
      this.resolveFile(file);
    }
  }

  resolveFile(file: FileSymbols): void {
    for (const call of file.unit.calls) {
      const site = this.siteOf(file, call.span.start.offset);
      if (!site) continue;
      for (const target of this.resolveCall(call, site)) {
        this.emit(site.ownerId, target.id, file.path, call.span.start.line);
      }
    }

    // each enum constant runs the enum's constructor during class initialization
    for (const typeId of file.typeIds) {
      const type = this.table.getType(typeId);
      if (!type || !type.staticInitializerId) continue;
      for (const constant of type.declaration.enumConstants) {
        for (const target of selectByArity(type.constructors, constant.argumentCount)) {
          this.emit(type.staticInitializerId, target.id, file.path, constant.span.start.line);
        }
      }
    }
  }

  /**
   * Callee candidates of one call site.
   */
  resolveCall(call: CallSite, site: CallSiteContext): ExecutableSymbol[] {
    switch (call.kind) {
      case "unqualified":
        return this.resolveUnqualified(call.name, call.argumentCount, site);
      case "qualified": {
        const receiverType = this.receiverType(call.receiver, site);
        return receiverType ? this.findMethods(receiverType, call.name, call.argumentCount) : [];
      }
      case "instantiation": {
        const lookup = this.types.resolve(call.type.name, { file: site.file, typeId: site.typeId });
        return lookup?.kind === "project" ? this.findConstructors(lookup.typeId, call.argumentCount) : [];
      }
      case "delegation": {
        const typeId =
          call.target === "this" ? site.typeId : this.hierarchy.superclassOf(site.typeId);
        return typeId ? this.findConstructors(typeId, call.argumentCount) : [];
      }
    }
  }

  /**
   * The innermost type containing `offset` and the member of it that owns the
   * code there: a method or constructor, or the initializer that field
   * initializers, initializer blocks and enum constants run in.
   */
  siteOf(file: FileSymbols, offset: number): CallSiteContext | null {
    let innermost: TypeSymbol | null = null;
    for (const typeId of file.typeIds) {
      const type = this.table.getType(typeId);
      if (!type || !spanContains(type.span, offset)) continue;
      if (!innermost || spanLength(type.span) < spanLength(innermost.span)) {
        innermost = type;
      }
    }
    if (!innermost) return null;

    const ownerId = this.ownerIn(innermost, offset);
    return ownerId ? { file, typeId: innermost.id, ownerId, offset } : null;
  }

  private ownerIn(type: TypeSymbol, offset: number): string | null {
    const executable = [...type.methods, ...type.constructors].find(
      (m) => m.span !== null && spanContains(m.span, offset)
    );
    if (executable) return executable.id;

    const { declaration } = type;
    const isInterface = declaration.kind === "interface" || declaration.kind === "annotation";

    const block = declaration.initializers.find((i) => spanContains(i.span, offset));
    if (block) {
      return block.isStatic ? type.staticInitializerId : type.instanceInitializerId;
    }

    const field = declaration.fields.find((f) => spanContains(f.span, offset));
    if (field) {
      return isInterface || field.modifiers.includes("static")
        ? type.staticInitializerId
        : type.instanceInitializerId;
    }

    if (declaration.enumConstants.some((c) => spanContains(c.span, offset))) {
      return type.staticInitializerId;
    }

    return null;
  }

  /**
   * `f(args)`: the enclosing type's hierarchy, then each enclosing type
   * outward, then static imports.
   */
  private resolveUnqualified(name: string, argumentCount: number, site: CallSiteContext): ExecutableSymbol[] {
    let current = this.table.getType(site.typeId);
    while (current) {
      const found = this.findMethods(current.id, name, argumentCount);
      if (found.length > 0) return found;
      current = current.enclosingId ? this.table.getType(current.enclosingId) : null;
    }

    const imports = site.file.unit.imports.filter((i) => i.isStatic);

    for (const imported of imports) {
      if (imported.isWildcard || lastSegment(imported.path) !== name) continue;
      const owner = imported.path.slice(0, imported.path.lastIndexOf("."));
      if (!this.table.hasType(owner)) continue;
      const found = this.findMethods(owner, name, argumentCount);
      if (found.length > 0) return found;
    }

    for (const imported of imports) {
      if (!imported.isWildcard || !this.table.hasType(imported.path)) continue;
      const found = this.findMethods(imported.path, name, argumentCount);
      if (found.length > 0) return found;
    }

    return [];
  }

  /**
   * Static type of a receiver, when it is a project type.
   */
  private receiverType(receiver: Receiver, site: CallSiteContext): string | null {
    switch (receiver.kind) {
      case "this":
        return site.typeId;
      case "super":
        return this.hierarchy.superclassOf(site.typeId);
      case "new": {
        const lookup = this.types.resolve(receiver.type.name, { file: site.file, typeId: site.typeId });
        return lookup?.kind === "project" ? lookup.typeId : null;
      }
      case "name":
        return this.namePathType(receiver.path, receiver.viaThis, site);
      case "expression":
        return null;
    }
  }

  /**
   * `a.b.c`: a variable followed by fields, a type followed by static members
   * or member types, or a qualified type name.
   */
  private namePathType(path: string[], viaThis: boolean, site: CallSiteContext): string | null {
    const [first, ...rest] = path;
    const binding = this.scopes.resolveName(first, site, { viaThis });

    if (binding) {
      const lookup = this.scopes.typeOf(binding);
      if (lookup?.kind !== "project") return null;
      return this.walkMembers(lookup.typeId, rest, binding.kind === "type");
    }

    for (let k = path.length; k >= 2; k--) {
      const prefix = path.slice(0, k).join(".");
      if (this.table.hasType(prefix)) {
        return this.walkMembers(prefix, path.slice(k), true);
      }
    }
    return null;
  }

  /**
   * Follow fields (and, from a type, member types) from a project type.
   */
  private walkMembers(typeId: string, path: string[], startsAtType: boolean): string | null {
    let current = typeId;
    let atType = startsAtType;

    for (const segment of path) {
      const field = this.scopes.findField(current, segment);
      if (field) {
        const lookup = this.scopes.typeOf(field);
        if (lookup?.kind !== "project") return null;
        current = lookup.typeId;
        atType = false;
        continue;
      }

      const member = atType ? this.types.memberType(current, segment) : null;
      if (!member) return null;
      current = member;
    }

    return current;
  }

  /**
   * Overloads named `name` at the first type in the hierarchy declaring any.
   */
  private findMethods(typeId: string, name: string, argumentCount: number): ExecutableSymbol[] {
    for (const id of this.hierarchy.linearize(typeId)) {
      const declared = this.table.getType(id)?.methods.filter((m) => m.name === name) ?? [];
      if (declared.length > 0) return selectByArity(declared, argumentCount);
    }
    return [];
  }

  /** Constructors declared on the type itself, including the synthetic default. */
  private findConstructors(typeId: string, argumentCount: number): ExecutableSymbol[] {
    const constructors = this.table.getType(typeId)?.constructors ?? [];
    return constructors.length > 0 ? selectByArity(constructors, argumentCount) : [];
  }

  private emit(sourceId: string, targetId: string, file: string, line: number): void {
    this.store.addRelation({ sourceId, targetId, kind: "INVOKES", file, line });
  }
}
