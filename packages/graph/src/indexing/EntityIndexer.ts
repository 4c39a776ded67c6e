/**
 * Turns one file's declaration tree into entities, CONTAINS edges and type
 * symbols. Pure per file: the builder merges results in path order.
 */

import type {
  CompilationUnit,
  ConstructorDeclaration,
  DeclarationKind,
  MethodDeclaration,
  Modifier,
  Parameter,
  TypeDeclaration,
} from "@structgraph/syntax";

import {
  PROJECT_ROOT_ID,
  directoryChain,
  initializerId,
  lastSegment,
  memberTypeId,
  methodId,
  packageChain,
  parameterTypeText,
  topLevelTypeId,
  typeText,
} from "../ids.js";
import type { Entity, EntityKind, EntityModifier, Relation } from "../model.js";
import {
  packageKeyOf,
  type ExecutableSymbol,
  type FieldSymbol,
  type FileSymbols,
  type TypeSymbol,
} from "./SymbolTable.js";

export interface IndexedType {
  symbol: TypeSymbol;
  /** The type entity followed by its members; nested types are separate */
  entities: Entity[];
  relations: Relation[];
}

export interface FileIndex {
  file: FileSymbols;
  /** Root, package or directory chain, and the FILE entity */
  structure: { entities: Entity[]; relations: Relation[] };
  /** Every type of the file, outer types first */
  types: IndexedType[];
}

const ENTITY_KIND: Record<DeclarationKind, EntityKind> = {
  class: "CLASS",
  record: "CLASS",
  interface: "INTERFACE",
  annotation: "INTERFACE",
  enum: "ENUM",
};

const ENTITY_MODIFIERS: Partial<Record<Modifier, EntityModifier>> = {
  public: "PUBLIC",
  protected: "PROTECTED",
  private: "PRIVATE",
  static: "STATIC",
  final: "FINAL",
  abstract: "ABSTRACT",
  default: "DEFAULT",
  synchronized: "SYNCHRONIZED",
  native: "NATIVE",
};

export function toEntityModifiers(modifiers: Modifier[], extra: EntityModifier[] = []): EntityModifier[] {
  const result = new Set<EntityModifier>(extra);
  for (const modifier of modifiers) {
    const mapped = ENTITY_MODIFIERS[modifier];
    if (mapped) result.add(mapped);
  }
  return [...result].sort();
}

function contains(sourceId: string, targetId: string): Relation {
  return { sourceId, targetId, kind: "CONTAINS", file: null, line: null };
}

/**
 * A nested type does not see the instance state of its enclosers when it is
 * static, an interface, enum, record or annotation, or a member of an interface.
 */
function isStaticBoundary(declaration: TypeDeclaration, enclosing: TypeDeclaration | null): boolean {
  if (!enclosing) return true;
  if (declaration.kind !== "class") return true;
  if (enclosing.kind === "interface" || enclosing.kind === "annotation") return true;
  return declaration.modifiers.includes("static");
}

export function indexFile(unit: CompilationUnit): FileIndex {
  const structure = indexStructure(unit);

  const file: FileSymbols = {
    path: unit.path,
    unit,
    packageKey: packageKeyOf(unit.packageName),
    topLevelTypes: new Map(),
    typeIds: [],
  };

  const types: IndexedType[] = [];
  for (const declaration of unit.types) {
    const id = topLevelTypeId(unit.packageName, declaration.name);
    if (!file.topLevelTypes.has(declaration.name)) {
      file.topLevelTypes.set(declaration.name, id);
    }
    indexType(declaration, id, null, unit, types);
  }

  return { file, structure, types };
}

function indexStructure(unit: CompilationUnit): FileIndex["structure"] {
  const entities: Entity[] = [
    structural(PROJECT_ROOT_ID, "DIRECTORY", PROJECT_ROOT_ID, null),
  ];
  const relations: Relation[] = [];

  let parent = PROJECT_ROOT_ID;
  if (unit.packageName) {
    for (const id of packageChain(unit.packageName)) {
      entities.push(structural(id, "PACKAGE", lastSegment(id, "."), parent));
      relations.push(contains(parent, id));
      parent = id;
    }
  } else {
    for (const id of directoryChain(unit.path)) {
      entities.push(structural(id, "DIRECTORY", lastSegment(id, "/"), parent));
      relations.push(contains(parent, id));
      parent = id;
    }
  }

  entities.push({
    id: unit.path,
    kind: "FILE",
    name: lastSegment(unit.path, "/"),
    declaringFile: unit.path,
    modifiers: [],
    containerId: parent,
    range: null,
  });
  relations.push(contains(parent, unit.path));

  return { entities, relations };
}

function structural(id: string, kind: EntityKind, name: string, containerId: string | null): Entity {
  return { id, kind, name, declaringFile: null, modifiers: [], containerId, range: null };
}

function indexType(
  declaration: TypeDeclaration,
  id: string,
  enclosing: { id: string; declaration: TypeDeclaration } | null,
  unit: CompilationUnit,
  into: IndexedType[]
): void {
  const containerId = enclosing ? enclosing.id : unit.path;
  const entities: Entity[] = [
    {
      id,
      kind: ENTITY_KIND[declaration.kind],
      name: declaration.name,
      declaringFile: unit.path,
      modifiers: toEntityModifiers(declaration.modifiers),
      containerId,
      range: declaration.span,
    },
  ];
  const relations: Relation[] = [contains(containerId, id)];

  const member = (entity: Entity): void => {
    if (entities.some((e) => e.id === entity.id)) return;
    entities.push(entity);
    relations.push(contains(id, entity.id));
  };

  const isInterface = declaration.kind === "interface" || declaration.kind === "annotation";

  const methods: ExecutableSymbol[] = [];
  for (const method of declaration.methods) {
    const symbol = executable(id, method.name, method.parameters, method);
    if (methods.some((m) => m.id === symbol.id)) continue;
    methods.push(symbol);
    member(methodEntity(symbol, method, unit.path, id));
  }

  const constructors: ExecutableSymbol[] = [];
  for (const constructor of declaration.constructors) {
    const symbol = executable(id, declaration.name, constructor.parameters, constructor);
    if (constructors.some((c) => c.id === symbol.id)) continue;
    constructors.push(symbol);
    member(constructorEntity(symbol, constructor, unit.path, id));
  }

  const defaultConstructor = syntheticConstructor(declaration, id, constructors);
  if (defaultConstructor) {
    constructors.push(defaultConstructor);
    member({
      id: defaultConstructor.id,
      kind: "CONSTRUCTOR",
      name: declaration.name,
      declaringFile: unit.path,
      modifiers: ["SYNTHETIC"],
      containerId: id,
      range: null,
      parameterTypes: defaultConstructor.parameters.map((p) => parameterTypeText(p.type, p.variadic)),
    });
  }

  const fields: FieldSymbol[] = [
    ...declaration.recordComponents.map((c) => ({ name: c.name, type: c.type, isStatic: false })),
    ...declaration.enumConstants.map((c) => ({
      name: c.name,
      type: { name: declaration.name, dimensions: 0, span: c.span },
      isStatic: true,
    })),
    ...declaration.fields.map((f) => ({
      name: f.name,
      type: f.type,
      isStatic: isInterface || f.modifiers.includes("static"),
    })),
  ];

  const hasStaticCode =
    declaration.enumConstants.length > 0 ||
    declaration.initializers.some((i) => i.isStatic) ||
    declaration.fields.some((f) => f.hasInitializer && (isInterface || f.modifiers.includes("static")));
  const hasInstanceCode =
    declaration.initializers.some((i) => !i.isStatic) ||
    (!isInterface && declaration.fields.some((f) => f.hasInitializer && !f.modifiers.includes("static")));

  const staticInitializerId = hasStaticCode ? initializerId(id, true) : null;
  if (staticInitializerId) {
    member(initializerEntity(staticInitializerId, true, unit.path, id));
  }
  const instanceInitializerId = hasInstanceCode ? initializerId(id, false) : null;
  if (instanceInitializerId) {
    member(initializerEntity(instanceInitializerId, false, unit.path, id));
  }

  const memberTypes = new Map<string, string>();
  for (const nested of declaration.types) {
    if (!memberTypes.has(nested.name)) {
      memberTypes.set(nested.name, memberTypeId(id, nested.name));
    }
  }

  into.push({
    symbol: {
      id,
      name: declaration.name,
      kind: declaration.kind,
      file: unit.path,
      packageName: unit.packageName,
      enclosingId: enclosing ? enclosing.id : null,
      isStaticBoundary: isStaticBoundary(declaration, enclosing ? enclosing.declaration : null),
      superclass: declaration.superclass,
      interfaces: declaration.interfaces,
      fields,
      methods,
      constructors,
      memberTypes,
      staticInitializerId,
      instanceInitializerId,
      declaration,
      span: declaration.span,
    },
    entities,
    relations,
  });

  for (const nested of declaration.types) {
    indexType(nested, memberTypeId(id, nested.name), { id, declaration }, unit, into);
  }
}

function executable(
  typeId: string,
  name: string,
  parameters: Parameter[],
  declaration: MethodDeclaration | ConstructorDeclaration
): ExecutableSymbol {
  return {
    id: methodId(
      typeId,
      name,
      parameters.map((p) => parameterTypeText(p.type, p.variadic))
    ),
    name,
    parameters,
    variadic: parameters.some((p) => p.variadic),
    isStatic: declaration.modifiers.includes("static"),
    span: declaration.span,
  };
}

function methodEntity(symbol: ExecutableSymbol, method: MethodDeclaration, file: string, typeId: string): Entity {
  return {
    id: symbol.id,
    kind: "METHOD",
    name: method.name,
    declaringFile: file,
    modifiers: toEntityModifiers(method.modifiers),
    containerId: typeId,
    range: method.span,
    parameterTypes: method.parameters.map((p) => parameterTypeText(p.type, p.variadic)),
    returnType: typeText(method.returnType),
  };
}

function constructorEntity(
  symbol: ExecutableSymbol,
  constructor: ConstructorDeclaration,
  file: string,
  typeId: string
): Entity {
  return {
    id: symbol.id,
    kind: "CONSTRUCTOR",
    name: symbol.name,
    declaringFile: file,
    modifiers: toEntityModifiers(constructor.modifiers),
    containerId: typeId,
    range: constructor.span,
    parameterTypes: constructor.parameters.map((p) => parameterTypeText(p.type, p.variadic)),
  };
}

/**
 * The implicit constructor of a class or enum that declares none, or the
 * canonical constructor of a record that does not declare it.
 */
function syntheticConstructor(
  declaration: TypeDeclaration,
  typeId: string,
  declared: ExecutableSymbol[]
): ExecutableSymbol | null {
  if (declaration.kind === "interface" || declaration.kind === "annotation") return null;

  const parameters = declaration.kind === "record" ? declaration.recordComponents : [];
  const id = methodId(
    typeId,
    declaration.name,
    parameters.map((p) => parameterTypeText(p.type, p.variadic))
  );

  if (declaration.kind === "record" ? declared.some((c) => c.id === id) : declared.length > 0) {
    return null;
  }

  return {
    id,
    name: declaration.name,
    parameters,
    variadic: parameters.some((p) => p.variadic),
    isStatic: false,
    span: null,
  };
}

function initializerEntity(id: string, isStatic: boolean, file: string, typeId: string): Entity {
  return {
    id,
    kind: "METHOD",
    name: lastSegment(id, "."),
    declaringFile: file,
    modifiers: isStatic ? ["STATIC", "SYNTHETIC"] : ["SYNTHETIC"],
    containerId: typeId,
    range: null,
    parameterTypes: [],
    returnType: "void",
  };
}
