/**
 * Declaration extraction: package, imports and the type declaration tree.
 */
import type {
  ConstructorDeclaration,
  DeclarationKind,
  EnumConstant,
  FieldDeclaration,
  ImportDeclaration,
  InitializerBlock,
  MethodDeclaration,
  Parameter,
  TypeDeclaration,
  TypeRef,
} from "../../core/model.js";
import {
  countArguments,
  dottedName,
  namedChildOfType,
  namedChildrenOfType,
  nodeToSpan,
  readModifiers,
  type SyntaxNode,
} from "./nodes.js";
import { countDimensions, typeRefFromNode } from "./typeNames.js";

const TYPE_DECLARATIONS: Record<string, DeclarationKind> = {
  class_declaration: "class",
  interface_declaration: "interface",
  enum_declaration: "enum",
  record_declaration: "record",
  annotation_type_declaration: "annotation",
};

export function declarationKindOf(node: SyntaxNode): DeclarationKind | null {
  return TYPE_DECLARATIONS[node.type] ?? null;
}

export function extractPackage(root: SyntaxNode): string | null {
  const declaration = namedChildOfType(root, "package_declaration");
  if (!declaration) return null;

  const name = namedChildOfType(declaration, "scoped_identifier", "identifier");
  return name ? dottedName(name) : null;
}

export function extractImports(root: SyntaxNode): ImportDeclaration[] {
  const imports: ImportDeclaration[] = [];

  for (const node of namedChildrenOfType(root, "import_declaration")) {
    const name = namedChildOfType(node, "scoped_identifier", "identifier");
    if (!name) continue;

    imports.push({
      path: dottedName(name),
      isStatic: node.children.some((c) => c.type === "static"),
      isWildcard: node.children.some((c) => c.type === "asterisk" || c.type === "*"),
      span: nodeToSpan(node),
    });
  }

  return imports;
}

/**
 * Top-level type declarations with their members, nested to any depth.
 */
export function extractTypes(root: SyntaxNode): TypeDeclaration[] {
  const types: TypeDeclaration[] = [];
  for (const child of root.namedChildren) {
    const kind = declarationKindOf(child);
    if (!kind) continue;
    const declaration = extractType(child, kind);
    if (declaration) types.push(declaration);
  }
  return types;
}

function extractType(node: SyntaxNode, kind: DeclarationKind): TypeDeclaration | null {
  const nameNode = node.childForFieldName("name");
  if (!nameNode) return null;

  const recordHeader = kind === "record" ? node.childForFieldName("parameters") : null;

  const declaration: TypeDeclaration = {
    kind,
    name: nameNode.text,
    modifiers: readModifiers(node),
    superclass: kind === "class" ? extractSuperclass(node) : null,
    interfaces: extractInterfaces(node, kind),
    recordComponents: recordHeader ? extractParameters(recordHeader) : [],
    fields: [],
    methods: [],
    constructors: [],
    initializers: [],
    enumConstants: [],
    types: [],
    span: nodeToSpan(node),
  };

  const body = node.childForFieldName("body");
  if (body) {
    collectMembers(body, declaration);
  }

  return declaration;
}

function extractSuperclass(node: SyntaxNode): TypeRef | null {
  const clause = namedChildOfType(node, "superclass");
  const type = clause?.namedChildren[0];
  return type ? typeRefFromNode(type) : null;
}

function extractInterfaces(node: SyntaxNode, kind: DeclarationKind): TypeRef[] {
  const clause =
    kind === "interface"
      ? namedChildOfType(node, "extends_interfaces")
      : namedChildOfType(node, "super_interfaces");
  const list = clause ? namedChildOfType(clause, "type_list") : null;
  return list ? list.namedChildren.map((type) => typeRefFromNode(type)) : [];
}

function collectMembers(body: SyntaxNode, into: TypeDeclaration): void {
  for (const member of body.namedChildren) {
    const nestedKind = declarationKindOf(member);
    if (nestedKind) {
      const nested = extractType(member, nestedKind);
      if (nested) addNestedType(into, nested);
      continue;
    }

    switch (member.type) {
      case "field_declaration":
      case "constant_declaration":
        into.fields.push(...extractFields(member));
        break;
      case "method_declaration": {
        const method = extractMethod(member);
        if (method) into.methods.push(method);
        collectLocalTypes(member, into);
        break;
      }
      case "constructor_declaration": {
        const constructor = extractConstructor(member);
        if (constructor) into.constructors.push(constructor);
        collectLocalTypes(member, into);
        break;
      }
      case "compact_constructor_declaration":
        into.constructors.push({
          name: into.name,
          modifiers: readModifiers(member),
          parameters: into.recordComponents,
          span: nodeToSpan(member),
        });
        collectLocalTypes(member, into);
        break;
      case "static_initializer":
        into.initializers.push(initializer(member, true));
        collectLocalTypes(member, into);
        break;
      case "block":
        into.initializers.push(initializer(member, false));
        collectLocalTypes(member, into);
        break;
      case "enum_constant": {
        const constant = extractEnumConstant(member);
        if (constant) into.enumConstants.push(constant);
        break;
      }
      case "enum_body_declarations":
        collectMembers(member, into);
        break;
      default:
        break;
    }
  }
}

/** Nested type names are unique per type; the first declaration wins. */
function addNestedType(into: TypeDeclaration, nested: TypeDeclaration): void {
  if (!into.types.some((t) => t.name === nested.name)) into.types.push(nested);
}

/**
 * Local types declared in an executable body join the enclosing type's
 * nested types. Anonymous class bodies are not entered.
 */
function collectLocalTypes(node: SyntaxNode, into: TypeDeclaration): void {
  for (const child of node.namedChildren) {
    const kind = declarationKindOf(child);
    if (kind) {
      const local = extractType(child, kind);
      if (local) addNestedType(into, local);
      continue;
    }
    if (child.type === "class_body") continue;
    collectLocalTypes(child, into);
  }
}

function initializer(node: SyntaxNode, isStatic: boolean): InitializerBlock {
  return { isStatic, span: nodeToSpan(node) };
}

function extractFields(node: SyntaxNode): FieldDeclaration[] {
  const typeNode = node.childForFieldName("type");
  if (!typeNode) return [];

  const modifiers = readModifiers(node);
  const span = nodeToSpan(node);
  const fields: FieldDeclaration[] = [];

  for (const declarator of namedChildrenOfType(node, "variable_declarator")) {
    const name = declarator.childForFieldName("name");
    if (!name) continue;
    fields.push({
      name: name.text,
      type: typeRefFromNode(typeNode, countDimensions(declarator.childForFieldName("dimensions"))),
      modifiers,
      hasInitializer: declarator.childForFieldName("value") !== null,
      span,
    });
  }

  return fields;
}

function extractMethod(node: SyntaxNode): MethodDeclaration | null {
  const name = node.childForFieldName("name");
  const returnType = node.childForFieldName("type");
  if (!name || !returnType) return null;

  const parameters = node.childForFieldName("parameters");
  return {
    name: name.text,
    modifiers: readModifiers(node),
    parameters: parameters ? extractParameters(parameters) : [],
    returnType: typeRefFromNode(returnType, countDimensions(node.childForFieldName("dimensions"))),
    span: nodeToSpan(node),
  };
}

function extractConstructor(node: SyntaxNode): ConstructorDeclaration | null {
  const name = node.childForFieldName("name");
  if (!name) return null;

  const parameters = node.childForFieldName("parameters");
  return {
    name: name.text,
    modifiers: readModifiers(node),
    parameters: parameters ? extractParameters(parameters) : [],
    span: nodeToSpan(node),
  };
}

/**
 * Parameters of a `formal_parameters` list; receiver parameters are skipped.
 */
export function extractParameters(list: SyntaxNode): Parameter[] {
  const parameters: Parameter[] = [];

  for (const child of list.namedChildren) {
    if (child.type === "formal_parameter") {
      const type = child.childForFieldName("type");
      const name = child.childForFieldName("name");
      if (!type || !name) continue;
      parameters.push({
        name: name.text,
        type: typeRefFromNode(type, countDimensions(child.childForFieldName("dimensions"))),
        variadic: false,
      });
    } else if (child.type === "spread_parameter") {
      const type = child.namedChildren.find(
        (c) => c.type !== "modifiers" && c.type !== "variable_declarator"
      );
      const declarator = namedChildOfType(child, "variable_declarator");
      const name = declarator?.childForFieldName("name");
      if (!type || !name) continue;
      parameters.push({ name: name.text, type: typeRefFromNode(type), variadic: true });
    }
  }

  return parameters;
}

function extractEnumConstant(node: SyntaxNode): EnumConstant | null {
  const name = node.childForFieldName("name");
  if (!name) return null;
  return {
    name: name.text,
    argumentCount: countArguments(node.childForFieldName("arguments")),
    span: nodeToSpan(node),
  };
}
