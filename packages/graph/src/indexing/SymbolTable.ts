/**
 * Project-wide symbol table built in the indexing phase and read during
 * resolution. Types are keyed by entity id.
 */

import type {
  CompilationUnit,
  DeclarationKind,
  Parameter,
  Span,
  TypeDeclaration,
  TypeRef,
} from "@structgraph/syntax";

export interface FieldSymbol {
  name: string;
  type: TypeRef;
  isStatic: boolean;
}

/** A method or constructor, declared or synthetic */
export interface ExecutableSymbol {
  id: string;
  name: string;
  parameters: Parameter[];
  variadic: boolean;
  isStatic: boolean;
  /** Null for synthetic members */
  span: Span | null;
}

export interface TypeSymbol {
  id: string;
  name: string;
  kind: DeclarationKind;
  file: string;
  /** Declared package of the file, null for the unnamed package */
  packageName: string | null;
  enclosingId: string | null;
  /** Enclosing scopes past this type are not searched for fields */
  isStaticBoundary: boolean;
  superclass: TypeRef | null;
  interfaces: TypeRef[];
  /** Fields, record components and enum constants */
  fields: FieldSymbol[];
  methods: ExecutableSymbol[];
  /** Declared constructors, or the synthetic default one */
  constructors: ExecutableSymbol[];
  memberTypes: Map<string, string>;
  staticInitializerId: string | null;
  instanceInitializerId: string | null;
  declaration: TypeDeclaration;
  span: Span;
}

export interface FileSymbols {
  path: string;
  unit: CompilationUnit;
  /** Package lookup key: the package name, or "" for the unnamed package */
  packageKey: string;
  /** Top-level type names declared in this file */
  topLevelTypes: Map<string, string>;
  /** Ids of every type this file contributed, outer types first */
  typeIds: string[];
}

export function packageKeyOf(packageName: string | null): string {
  return packageName ?? "";
}

export class SymbolTable {
  private types = new Map<string, TypeSymbol>();
  private files = new Map<string, FileSymbols>();
  private packages = new Map<string, Map<string, string>>();
  private packageNames = new Set<string>();

  addFile(file: FileSymbols): void {
    this.files.set(file.path, file);
    if (file.unit.packageName) {
      const segments = file.unit.packageName.split(".");
      for (let i = 1; i <= segments.length; i++) {
        this.packageNames.add(segments.slice(0, i).join("."));
      }
    }
  }

  addType(type: TypeSymbol): void {
    this.types.set(type.id, type);
    if (type.enclosingId === null) {
      const key = packageKeyOf(type.packageName);
      let members = this.packages.get(key);
      if (!members) {
        members = new Map();
        this.packages.set(key, members);
      }
      if (!members.has(type.name)) {
        members.set(type.name, type.id);
      }
    }
  }

  hasType(id: string): boolean {
    return this.types.has(id);
  }

  getType(id: string): TypeSymbol | null {
    return this.types.get(id) ?? null;
  }

  getFile(path: string): FileSymbols | null {
    return this.files.get(path) ?? null;
  }

  /** Files in path order */
  allFiles(): FileSymbols[] {
    return [...this.files.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  /** Types in file path order, outer types first within a file */
  allTypes(): TypeSymbol[] {
    const result: TypeSymbol[] = [];
    for (const file of this.allFiles()) {
      for (const id of file.typeIds) {
        const type = this.types.get(id);
        if (type) result.push(type);
      }
    }
    return result;
  }

  /**
   * Top-level type of a package by simple name.
   */
  typeInPackage(packageKey: string, name: string): string | null {
    return this.packages.get(packageKey)?.get(name) ?? null;
  }

  /**
   * Whether a package, or a parent of one, is declared by an indexed file.
   */
  isProjectPackage(name: string): boolean {
    return this.packageNames.has(name);
  }

  fileOf(typeId: string): FileSymbols | null {
    const type = this.types.get(typeId);
    return type ? this.getFile(type.file) : null;
  }
}
