/**
 * Supertype resolution.
 *
 * `collect` runs in the indexing phase: it resolves every extends/implements
 * clause, creating placeholders for unknown supertypes, and skips links that
 * would close a cycle. A type is linked after its enclosing types and after
 * any type whose supertypes its clauses search for inherited member types. `emit` runs after the barrier and writes the INHERITS
 * edges, superclass first. The collected links also answer hierarchy queries.
 */

import type { TypeRef } from "@structgraph/syntax";

import type { GraphStore } from "../GraphStore.js";
import type { BuildWarning } from "../model.js";
import type { SymbolTable, TypeSymbol } from "../indexing/SymbolTable.js";
import type { Placeholders } from "./Placeholders.js";
import type { Hierarchy, TypeResolver } from "./TypeResolver.js";

export interface SupertypeLink {
  targetId: string;
  /** Whether the target is a project type rather than a placeholder */
  isProject: boolean;
  role: "superclass" | "interface";
  line: number;
}

export class InheritanceResolver implements Hierarchy {
  private links = new Map<string, SupertypeLink[]>();
  private linearized = new Map<string, string[]>();
  private started = new Set<string>();
  private collecting = false;
  private warnings: BuildWarning[] = [];
  private readonly types: TypeResolver;

  constructor(
    private readonly store: GraphStore,
    private readonly table: SymbolTable,
    types: TypeResolver,
    private readonly placeholders: Placeholders
  ) {
    this.types = types.withHierarchy(this);
  }

  /**
   * Resolve supertypes of every type.
   *
   * @returns warnings for links dropped because they close a cycle
   */
  collect(): BuildWarning[] {
    this.collecting = true;
    this.warnings = [];

    for (const type of this.table.allTypes()) {
      this.link(type);
    }

    this.collecting = false;
    this.linearized.clear();
    return this.warnings;
  }

  /**
   * Write INHERITS edges for the collected links.
   */
  emit(): void {
    for (const type of this.table.allTypes()) {
      for (const link of this.links.get(type.id) ?? []) {
        this.store.addRelation({
          sourceId: type.id,
          targetId: link.targetId,
          kind: "INHERITS",
          file: type.file,
          line: link.line,
        });
      }
    }
  }

  supertypesOf(typeId: string): SupertypeLink[] {
    if (this.collecting) {
      const type = this.table.getType(typeId);
      if (type) this.link(type);
    }
    return this.links.get(typeId) ?? [];
  }

  superclassOf(typeId: string): string | null {
    const link = this.supertypesOf(typeId).find((l) => l.role === "superclass" && l.isProject);
    return link ? link.targetId : null;
  }

  /**
   * The type, its project superclass chain, then project interfaces
   * breadth-first, each once.
   */
  linearize(typeId: string): string[] {
    // links are still growing while collecting
    const cached = this.collecting ? undefined : this.linearized.get(typeId);
    if (cached) return cached;

    const order: string[] = [typeId];
    const seen = new Set(order);

    let current = this.superclassOf(typeId);
    while (current && !seen.has(current)) {
      order.push(current);
      seen.add(current);
      current = this.superclassOf(current);
    }

    const queue = [...order];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined) break;
      for (const link of this.supertypesOf(next)) {
        if (link.role !== "interface" || !link.isProject || seen.has(link.targetId)) continue;
        order.push(link.targetId);
        seen.add(link.targetId);
        queue.push(link.targetId);
      }
    }

    if (!this.collecting) this.linearized.set(typeId, order);
    return order;
  }

  private link(type: TypeSymbol): void {
    if (this.started.has(type.id)) return;
    this.started.add(type.id);

    const enclosing = type.enclosingId ? this.table.getType(type.enclosingId) : null;
    if (enclosing) this.link(enclosing);

    // visible to cycle checks while later clauses link other types
    const links: SupertypeLink[] = [];
    this.links.set(type.id, links);
    const clauses: Array<{ ref: TypeRef; role: SupertypeLink["role"] }> = [
      ...(type.superclass ? [{ ref: type.superclass, role: "superclass" as const }] : []),
      ...type.interfaces.map((ref) => ({ ref, role: "interface" as const })),
    ];

    for (const { ref, role } of clauses) {
      const link = this.resolveClause(type, ref, role);
      if (!link) continue;

      if (link.isProject && this.reaches(link.targetId, type.id)) {
        this.warnings.push({
          kind: "INHERITANCE_CYCLE",
          file: type.file,
          line: ref.span.start.line,
          message: `${type.id} → ${link.targetId} would close an inheritance cycle`,
        });
        continue;
      }
      if (!links.some((l) => l.targetId === link.targetId)) {
        links.push(link);
      }
    }
  }

  private resolveClause(
    type: TypeSymbol,
    ref: TypeRef,
    role: SupertypeLink["role"]
  ): SupertypeLink | null {
    const file = this.table.getFile(type.file);
    if (!file) return null;

    const lookup = this.types.resolveOrPlaceholder(ref.name, { file, typeId: type.enclosingId });
    if (!lookup) return null;

    const line = ref.span.start.line;
    if (lookup.kind === "project") {
      return { targetId: lookup.typeId, isProject: true, role, line };
    }
    return { targetId: this.placeholders.ensureType(lookup), isProject: false, role, line };
  }

  /** Whether `to` is reachable from `from` over project links accepted so far. */
  private reaches(from: string, to: string): boolean {
    const stack = [from];
    const visited = new Set<string>();
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      if (id === to) return true;
      if (visited.has(id)) continue;
      visited.add(id);
      for (const link of this.links.get(id) ?? []) {
        if (link.isProject) stack.push(link.targetId);
      }
    }
    return false;
  }
}
