/**
 * Declaration tree produced by an AstProvider for one source file.
 *
 * Everything the graph builder needs is here; the grammar's node shapes
 * never leave the parser.
 */

export interface Location {
  /** 1-indexed line number */
  line: number;
  /** 1-indexed column number */
  column: number;
  /** 0-indexed offset from start of file */
  offset: number;
}

export interface Span {
  start: Location;
  end: Location;
}

export type Modifier =
  | "public"
  | "protected"
  | "private"
  | "static"
  | "final"
  | "abstract"
  | "default"
  | "synchronized"
  | "native"
  | "transient"
  | "volatile"
  | "strictfp"
  | "sealed"
  | "non-sealed";

export const MODIFIERS: ReadonlySet<string> = new Set<Modifier>([
  "public",
  "protected",
  "private",
  "static",
  "final",
  "abstract",
  "default",
  "synchronized",
  "native",
  "transient",
  "volatile",
  "strictfp",
  "sealed",
  "non-sealed",
]);

/**
 * A type as written in source, reduced to its erased name.
 * `Map<String, List<Item>>[]` becomes `{ name: "Map", dimensions: 1 }`.
 */
export interface TypeRef {
  /** Simple or dotted name without type arguments or annotations */
  name: string;
  /** Array dimensions */
  dimensions: number;
  span: Span;
}

export interface ImportDeclaration {
  /** Imported path without the trailing `.*` */
  path: string;
  isStatic: boolean;
  isWildcard: boolean;
  span: Span;
}

export type DeclarationKind = "class" | "interface" | "enum" | "record" | "annotation";

export interface Parameter {
  name: string;
  type: TypeRef;
  /** `T... args` */
  variadic: boolean;
}

export interface MethodDeclaration {
  name: string;
  modifiers: Modifier[];
  parameters: Parameter[];
  returnType: TypeRef;
  span: Span;
}

export interface ConstructorDeclaration {
  name: string;
  modifiers: Modifier[];
  parameters: Parameter[];
  span: Span;
}

/** One declarator of a field declaration; `int a = 1, b;` yields two. */
export interface FieldDeclaration {
  name: string;
  type: TypeRef;
  modifiers: Modifier[];
  hasInitializer: boolean;
  /** Span of the whole declaration statement */
  span: Span;
}

export interface InitializerBlock {
  isStatic: boolean;
  span: Span;
}

export interface EnumConstant {
  name: string;
  argumentCount: number;
  span: Span;
}

export interface TypeDeclaration {
  kind: DeclarationKind;
  name: string;
  modifiers: Modifier[];
  /** `extends` of a class */
  superclass: TypeRef | null;
  /** `implements` of a class, enum or record; `extends` of an interface */
  interfaces: TypeRef[];
  /** Record header components */
  recordComponents: Parameter[];
  fields: FieldDeclaration[];
  methods: MethodDeclaration[];
  constructors: ConstructorDeclaration[];
  initializers: InitializerBlock[];
  enumConstants: EnumConstant[];
  /** Member types, in declaration order */
  types: TypeDeclaration[];
  span: Span;
}

/**
 * A variable visible inside an executable body: a local, a lambda, catch,
 * for-each or resource variable.
 */
export interface LocalVariable {
  name: string;
  /** Null for `var` and untyped lambda parameters */
  type: TypeRef | null;
  /** Offset of the declarator; the variable is visible after it */
  declaredAt: number;
  /** The block or statement the variable is scoped to */
  scope: Span;
}

/**
 * What a qualified call is made on.
 */
export type Receiver =
  | { kind: "this" }
  | { kind: "super" }
  /** `a.b.c` made only of identifiers; `viaThis` when written `this.a.b` */
  | { kind: "name"; path: string[]; viaThis: boolean }
  | { kind: "new"; type: TypeRef }
  /** Anything whose type needs inference: call results, casts, literals */
  | { kind: "expression"; text: string };

export type CallSite =
  /** `f(args)` */
  | { kind: "unqualified"; name: string; argumentCount: number; span: Span }
  /** `recv.f(args)` */
  | { kind: "qualified"; receiver: Receiver; name: string; argumentCount: number; span: Span }
  /** `new T(args)`, with or without an anonymous body */
  | { kind: "instantiation"; type: TypeRef; argumentCount: number; span: Span }
  /** `this(args)` or `super(args)` inside a constructor */
  | { kind: "delegation"; target: "this" | "super"; argumentCount: number; span: Span };

export interface CompilationUnit {
  /** Path relative to the analyzed root, `/`-separated */
  path: string;
  /** Declared package, null for the unnamed package */
  packageName: string | null;
  imports: ImportDeclaration[];
  /** Top-level types, in declaration order */
  types: TypeDeclaration[];
  /** Every local-like variable of every body in the file */
  locals: LocalVariable[];
  /** Every call site in the file, in source order */
  calls: CallSite[];
}

export interface SyntaxIssue {
  message: string;
  span: Span;
}

export interface SourceFile {
  /** Path relative to the analyzed root, `/`-separated */
  path: string;
  text: string;
}

export interface Language {
  id: string;
  name: string;
  extensions: string[];
}

export const JAVA: Language = {
  id: "java",
  name: "Java",
  extensions: [".java"],
};

/**
 * Whether `offset` falls inside `span` (inclusive start, exclusive end).
 */
export function spanContains(span: Span, offset: number): boolean {
  return offset >= span.start.offset && offset < span.end.offset;
}

export function spanLength(span: Span): number {
  return span.end.offset - span.start.offset;
}
