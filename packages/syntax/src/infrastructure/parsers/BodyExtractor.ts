/**
 * Executable-body extraction: variables with their visibility scopes and
 * call sites with receiver shapes, in source order.
 */
import type { CallSite, LocalVariable, Receiver, TypeRef } from "../../core/model.js";
import { extractParameters } from "./DeclarationExtractor.js";
import { codeChildren, countArguments, namedChildOfType, nodeToSpan, type SyntaxNode } from "./nodes.js";
import { countDimensions, typeRefFromNode } from "./typeNames.js";

const EXPRESSION_TEXT_LIMIT = 80;

export interface BodyFacts {
  locals: LocalVariable[];
  calls: CallSite[];
}

export function extractBodies(root: SyntaxNode): BodyFacts {
  const facts: BodyFacts = { locals: [], calls: [] };
  visit(root, facts);
  return facts;
}

function visit(node: SyntaxNode, facts: BodyFacts): void {
  switch (node.type) {
    case "method_invocation": {
      const call = methodCall(node);
      if (call) facts.calls.push(call);
      break;
    }
    case "object_creation_expression": {
      const type = node.childForFieldName("type");
      if (type) {
        facts.calls.push({
          kind: "instantiation",
          type: typeRefFromNode(type),
          argumentCount: countArguments(node.childForFieldName("arguments")),
          span: nodeToSpan(node),
        });
      }
      break;
    }
    case "explicit_constructor_invocation": {
      const target = node.childForFieldName("constructor")?.type;
      if (target === "this" || target === "super") {
        facts.calls.push({
          kind: "delegation",
          target,
          argumentCount: countArguments(node.childForFieldName("arguments")),
          span: nodeToSpan(node),
        });
      }
      break;
    }
    case "formal_parameters":
      collectParameters(node, facts.locals);
      break;
    case "lambda_expression":
      collectLambdaParameters(node, facts.locals);
      break;
    case "local_variable_declaration":
      collectDeclarators(node, node.parent ?? node, facts.locals);
      break;
    case "catch_formal_parameter":
      collectCatchParameter(node, facts.locals);
      break;
    case "enhanced_for_statement":
      collectLoopVariable(node, facts.locals);
      break;
    case "resource":
      collectResource(node, facts.locals);
      break;
    case "instanceof_expression":
      collectPatternVariable(node, node.childForFieldName("right"), node.childForFieldName("name"), facts.locals);
      break;
    case "type_pattern": {
      const [type, name] = node.namedChildren.filter((c) => c.type !== "modifiers");
      collectPatternVariable(node, type ?? null, name?.type === "identifier" ? name : null, facts.locals);
      break;
    }
    default:
      break;
  }

  for (const child of node.namedChildren) {
    visit(child, facts);
  }
}

function methodCall(node: SyntaxNode): CallSite | null {
  const name = node.childForFieldName("name");
  if (!name) return null;

  const argumentCount = countArguments(node.childForFieldName("arguments"));
  const span = nodeToSpan(node);
  const object = node.childForFieldName("object");

  if (!object) {
    return { kind: "unqualified", name: name.text, argumentCount, span };
  }
  return { kind: "qualified", receiver: toReceiver(object), name: name.text, argumentCount, span };
}

/**
 * Classify a call's receiver expression.
 */
export function toReceiver(node: SyntaxNode): Receiver {
  switch (node.type) {
    case "this":
      return { kind: "this" };
    case "super":
      return { kind: "super" };
    case "identifier":
      return { kind: "name", path: [node.text], viaThis: false };
    case "field_access":
      return fieldAccessReceiver(node);
    case "object_creation_expression": {
      const type = node.childForFieldName("type");
      return type ? { kind: "new", type: typeRefFromNode(type) } : expression(node);
    }
    case "parenthesized_expression": {
      const inner = codeChildren(node)[0];
      return inner ? toReceiver(inner) : expression(node);
    }
    default:
      return expression(node);
  }
}

function fieldAccessReceiver(node: SyntaxNode): Receiver {
  const path: string[] = [];
  let current: SyntaxNode | null = node;

  while (current && current.type === "field_access") {
    const field = current.childForFieldName("field");
    if (!field) return expression(node);
    path.unshift(field.text);
    current = current.childForFieldName("object");
  }

  if (!current) return expression(node);

  // `Outer.this.f()` is an instance call on the enclosing type.
  const qualifiedThis = path.indexOf("this");
  if (qualifiedThis >= 0) {
    if (current.type !== "identifier" || qualifiedThis !== path.length - 1) {
      return expression(node);
    }
    return { kind: "name", path: [current.text, ...path.slice(0, qualifiedThis)], viaThis: false };
  }

  switch (current.type) {
    case "identifier":
      return { kind: "name", path: [current.text, ...path], viaThis: false };
    case "this":
      return { kind: "name", path, viaThis: true };
    default:
      return expression(node);
  }
}

function expression(node: SyntaxNode): Receiver {
  return { kind: "expression", text: node.text.slice(0, EXPRESSION_TEXT_LIMIT) };
}

function local(
  name: SyntaxNode,
  type: TypeRef | null,
  declaredAt: number,
  scope: SyntaxNode
): LocalVariable {
  return { name: name.text, type, declaredAt, scope: nodeToSpan(scope) };
}

function declaredType(node: SyntaxNode | null, extraDimensions = 0): TypeRef | null {
  if (!node || node.text === "var") return null;
  return typeRefFromNode(node, extraDimensions);
}

/**
 * Method, constructor and lambda parameters, scoped to their declaration.
 * Record headers declare fields, not variables.
 */
function collectParameters(list: SyntaxNode, into: LocalVariable[]): void {
  const owner = list.parent;
  if (!owner || owner.type === "record_declaration") return;

  for (const parameter of extractParameters(list)) {
    into.push({
      name: parameter.name,
      type: parameter.variadic
        ? { ...parameter.type, dimensions: parameter.type.dimensions + 1 }
        : parameter.type,
      declaredAt: list.startIndex,
      scope: nodeToSpan(owner),
    });
  }
}

function collectLambdaParameters(lambda: SyntaxNode, into: LocalVariable[]): void {
  const parameters = lambda.childForFieldName("parameters");
  if (!parameters) return;

  if (parameters.type === "identifier") {
    into.push(local(parameters, null, parameters.startIndex, lambda));
  } else if (parameters.type === "inferred_parameters") {
    for (const name of parameters.namedChildren) {
      if (name.type === "identifier") {
        into.push(local(name, null, name.startIndex, lambda));
      }
    }
  }
  // typed `formal_parameters` are collected when the walk reaches them
}

function collectDeclarators(declaration: SyntaxNode, scope: SyntaxNode, into: LocalVariable[]): void {
  const typeNode = declaration.childForFieldName("type");

  for (const declarator of declaration.namedChildren) {
    if (declarator.type !== "variable_declarator") continue;
    const name = declarator.childForFieldName("name");
    if (!name) continue;
    const dimensions = countDimensions(declarator.childForFieldName("dimensions"));
    into.push(local(name, declaredType(typeNode, dimensions), declarator.startIndex, scope));
  }
}

function collectCatchParameter(parameter: SyntaxNode, into: LocalVariable[]): void {
  const name = parameter.childForFieldName("name");
  const clause = parameter.parent;
  if (!name || !clause) return;

  // multi-catch `A | B` has no single static type
  const catchType = namedChildOfType(parameter, "catch_type");
  const alternatives = catchType ? catchType.namedChildren : [];
  const type = alternatives.length === 1 ? typeRefFromNode(alternatives[0]) : null;

  into.push(local(name, type, parameter.startIndex, clause));
}

function collectLoopVariable(loop: SyntaxNode, into: LocalVariable[]): void {
  const name = loop.childForFieldName("name");
  if (!name) return;
  into.push(local(name, declaredType(loop.childForFieldName("type")), loop.startIndex, loop));
}

/**
 * `o instanceof T t` and `case T t`, visible in the enclosing statement.
 */
function collectPatternVariable(
  node: SyntaxNode,
  type: SyntaxNode | null,
  name: SyntaxNode | null,
  into: LocalVariable[]
): void {
  if (!type || !name) return;

  let scope: SyntaxNode = node;
  while (scope.parent && !isStatementLike(scope)) {
    scope = scope.parent;
  }
  into.push(local(name, declaredType(type), name.startIndex, scope));
}

function isStatementLike(node: SyntaxNode): boolean {
  return (
    node.type.endsWith("_statement") ||
    node.type === "local_variable_declaration" ||
    node.type === "switch_block_statement_group" ||
    node.type === "switch_rule" ||
    node.type === "lambda_expression"
  );
}

function collectResource(resource: SyntaxNode, into: LocalVariable[]): void {
  const name = resource.childForFieldName("name");
  if (!name) return;

  const statement = resource.parent?.parent ?? resource;
  into.push(local(name, declaredType(resource.childForFieldName("type")), resource.startIndex, statement));
}
