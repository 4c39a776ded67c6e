export type {
  Location,
  Span,
  Modifier,
  TypeRef,
  ImportDeclaration,
  DeclarationKind,
  Parameter,
  MethodDeclaration,
  ConstructorDeclaration,
  FieldDeclaration,
  InitializerBlock,
  EnumConstant,
  TypeDeclaration,
  LocalVariable,
  Receiver,
  CallSite,
  CompilationUnit,
  SyntaxIssue,
  SourceFile,
  Language,
} from "./core/model.js";
export { MODIFIERS, JAVA, spanContains, spanLength } from "./core/model.js";

export type { AstProvider, ParseResult } from "./core/ports/AstProvider.js";
export type { SourceLoader, LoadOptions, LoadedSources } from "./core/ports/SourceLoader.js";

export { TreeSitterParser, extractIssues } from "./infrastructure/parsers/TreeSitterParser.js";
export { normalizeTypeText, type ErasedType } from "./infrastructure/parsers/typeNames.js";
export {
  NodeSourceLoader,
  DEFAULT_IGNORED_DIRECTORIES,
  DEFAULT_LOAD_OPTIONS,
} from "./infrastructure/loader/NodeSourceLoader.js";
