/**
 * @structgraph/graph
 * Cross-file dependency graph of Java sources.
 */

// Model
export type {
  Entity,
  EntityKind,
  EntityModifier,
  Relation,
  RelationKind,
  GraphStats,
  BuildReport,
  BuildWarning,
  WarningKind,
} from "./model.js";
export { ENTITY_KINDS, RELATION_KINDS } from "./model.js";
export * as ids from "./ids.js";

// Store
export { GraphStore } from "./GraphStore.js";

// Build
export type { BuildOutput, GraphBuilderOptions } from "./GraphBuilder.js";
export { GraphBuilder, buildGraph } from "./GraphBuilder.js";
export type { BuildOptions, BuildOptionsInput } from "./config.js";
export {
  BuildOptionsSchema,
  BUILTIN_PREFIXES,
  CONFIG_FILE_NAME,
  parseBuildOptions,
  readConfigFile,
  resolveBuildOptions,
} from "./config.js";
export { mapWithConcurrency } from "./concurrency.js";

// Indexing and resolution
export type { FileIndex, IndexedType } from "./indexing/EntityIndexer.js";
export { indexFile } from "./indexing/EntityIndexer.js";
export { SymbolTable } from "./indexing/SymbolTable.js";
export { TypeResolver } from "./resolution/TypeResolver.js";
export { ImportResolver } from "./resolution/ImportResolver.js";
export { InheritanceResolver } from "./resolution/InheritanceResolver.js";
export { ScopeResolver } from "./resolution/ScopeResolver.js";
export { InvocationResolver, selectByArity } from "./resolution/InvocationResolver.js";

// Session and tools
export { GraphSession, NOT_INITIALIZED } from "./GraphSession.js";
export { registerAllTools, type Services } from "./tools/index.js";
