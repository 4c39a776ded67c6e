/**
 * Resolves import declarations to project entities or placeholders and
 * emits one IMPORTS edge per (file, target).
 */

import type { ImportDeclaration } from "@structgraph/syntax";

import type { GraphStore } from "../GraphStore.js";
import type { FileSymbols, SymbolTable } from "../indexing/SymbolTable.js";
import type { Placeholders } from "./Placeholders.js";
import type { TypeResolver } from "./TypeResolver.js";

function splitMember(path: string): { owner: string; member: string } {
  const dot = path.lastIndexOf(".");
  return { owner: path.slice(0, dot), member: path.slice(dot + 1) };
}

export class ImportResolver {
  constructor(
    private readonly store: GraphStore,
    private readonly table: SymbolTable,
    private readonly types: TypeResolver,
    private readonly placeholders: Placeholders
  ) {}

  /**
   * Resolve every import of every file, in path order.
   */
  resolveAll(): void {
    for (const file of this.table.allFiles()) {
      this.resolveFile(file);
    }
  }

  resolveFile(file: FileSymbols): void {
    for (const declaration of file.unit.imports) {
      for (const targetId of this.targetsOf(declaration)) {
        this.store.addRelation({
          sourceId: file.path,
          targetId,
          kind: "IMPORTS",
          file: file.path,
          line: declaration.span.start.line,
        });
      }
    }
  }

  /**
   * Entities an import refers to. Only a static import of an overloaded
   * method yields more than one.
   */
  targetsOf(declaration: ImportDeclaration): string[] {
    const { path } = declaration;

    if (declaration.isStatic) {
      return declaration.isWildcard ? [this.typeTarget(path)] : this.staticMemberTargets(path);
    }

    if (declaration.isWildcard) {
      if (this.table.isProjectPackage(path) && this.store.hasEntity(path)) return [path];
      if (this.table.hasType(path)) return [path];
      const target = this.types.externalFor(path);
      const namesType = /(^|\.)[A-Z]/.test(path);
      return [this.placeholders.ensureWildcard(namesType ? target : { ...target, packageName: path })];
    }

    return [this.typeTarget(path)];
  }

  private typeTarget(qualifiedName: string): string {
    if (this.table.hasType(qualifiedName)) return qualifiedName;
    return this.placeholders.ensureType(this.types.externalFor(qualifiedName));
  }

  private staticMemberTargets(path: string): string[] {
    const { owner, member } = splitMember(path);
    const type = this.table.getType(owner);
    if (!type) {
      return [this.typeTarget(owner)];
    }

    const methods = type.methods.filter((m) => m.name === member).map((m) => m.id);
    if (methods.length > 0) return methods;

    return [type.memberTypes.get(member) ?? owner];
  }
}
