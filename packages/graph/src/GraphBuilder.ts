/**
 * Build pipeline.
 *
 * Indexing: parse and index files concurrently, merge in path order, resolve
 * imports and supertypes (creating placeholders), then seal the entity table.
 * Resolution: emit INHERITS and INVOKES edges over the sealed table.
 */

import { consoleLogger, GraphError, Ok, type Logger, type Result } from "@structgraph/core";
import {
  NodeSourceLoader,
  TreeSitterParser,
  type AstProvider,
  type SourceFile,
  type SourceLoader,
} from "@structgraph/syntax";

import { mapWithConcurrency } from "./concurrency.js";
import { parseBuildOptions, resolveBuildOptions, type BuildOptions, type BuildOptionsInput } from "./config.js";
import { GraphStore } from "./GraphStore.js";
import { indexFile, type FileIndex } from "./indexing/EntityIndexer.js";
import { SymbolTable } from "./indexing/SymbolTable.js";
import type { BuildReport, BuildWarning } from "./model.js";
import { ImportResolver } from "./resolution/ImportResolver.js";
import { InheritanceResolver } from "./resolution/InheritanceResolver.js";
import { InvocationResolver } from "./resolution/InvocationResolver.js";
import { Placeholders } from "./resolution/Placeholders.js";
import { ScopeResolver } from "./resolution/ScopeResolver.js";
import { TypeResolver } from "./resolution/TypeResolver.js";

export interface BuildOutput {
  store: GraphStore;
  report: BuildReport;
}

export interface GraphBuilderOptions {
  parser?: AstProvider;
  loader?: SourceLoader;
  logger?: Logger;
}

type FileOutcome =
  | { ok: true; index: FileIndex; warnings: BuildWarning[] }
  | { ok: false; error: GraphError };

export class GraphBuilder {
  private readonly parser: AstProvider;
  private readonly loader: SourceLoader;
  private readonly log: Logger;

  constructor(options: GraphBuilderOptions = {}) {
    this.parser = options.parser ?? new TreeSitterParser();
    this.loader = options.loader ?? new NodeSourceLoader();
    this.log = options.logger ?? consoleLogger("graph");
  }

  /**
   * Build the graph of the sources below `rootPath`. Options from
   * `structgraph.config.json` in the root apply under `overrides`.
   *
   * @returns Err when the root is unusable or the options are invalid
   */
  async buildFromDirectory(
    rootPath: string,
    overrides: BuildOptionsInput = {}
  ): Promise<Result<BuildOutput, GraphError>> {
    const options = await resolveBuildOptions(rootPath, overrides);
    if (!options.ok) return options;

    const loaded = await this.loader.load(rootPath, {
      extensions: options.value.extensions,
      ignoreDirectories: options.value.ignoreDirectories,
    });
    if (!loaded.ok) return loaded;

    for (const failure of loaded.value.failures) {
      this.log("warn", failure.message);
    }

    return this.run(loaded.value.files, options.value, loaded.value.failures);
  }

  /**
   * Build the graph of an explicit list of sources.
   */
  async build(
    sources: SourceFile[],
    input: BuildOptionsInput = {}
  ): Promise<Result<BuildOutput, GraphError>> {
    const options = parseBuildOptions(input);
    if (!options.ok) return options;
    return this.run(sources, options.value, []);
  }

  private async run(
    sources: SourceFile[],
    options: BuildOptions,
    loadFailures: GraphError[]
  ): Promise<Result<BuildOutput, GraphError>> {
    const startedAt = Date.now();
    const ordered = [...sources].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

    // Indexing
    const outcomes = await mapWithConcurrency(ordered, options.concurrency, (source) =>
      this.indexSource(source)
    );

    const store = new GraphStore();
    const table = new SymbolTable();
    const failures = [...loadFailures];
    const warnings: BuildWarning[] = [];
    let filesIndexed = 0;

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        failures.push(outcome.error);
        this.log("warn", outcome.error.message);
        continue;
      }
      warnings.push(...outcome.warnings);
      warnings.push(...this.merge(outcome.index, store, table));
      filesIndexed++;
    }

    const types = new TypeResolver(table, options.builtinPrefixes);
    const placeholders = new Placeholders(store);
    new ImportResolver(store, table, types, placeholders).resolveAll();
    const inheritance = new InheritanceResolver(store, table, types, placeholders);
    warnings.push(...inheritance.collect());

    store.seal();

    // Resolution
    inheritance.emit();
    const resolvedTypes = types.withHierarchy(inheritance);
    const scopes = new ScopeResolver(table, resolvedTypes, inheritance);
    new InvocationResolver(store, table, resolvedTypes, scopes, inheritance).resolveAll();

    for (const warning of warnings) {
      this.log("debug", `${warning.file}${warning.line ? `:${warning.line}` : ""} ${warning.message}`);
    }

    const report: BuildReport = {
      filesIndexed,
      failures,
      warnings,
      durationMs: Date.now() - startedAt,
    };
    const stats = store.stats();
    this.log(
      "info",
      `indexed ${filesIndexed} files: ${stats.totalEntities} entities, ${stats.totalRelations} relations` +
        (failures.length > 0 ? `, ${failures.length} failed` : "")
    );

    return Ok({ store, report });
  }

  private async indexSource(source: SourceFile): Promise<FileOutcome> {
    const parsed = await this.parser.parse(source.text, source.path);
    if (!parsed.ok) {
      return {
        ok: false,
        error: new GraphError(
          "PARSE_FAILURE",
          `Cannot parse ${source.path}: ${parsed.error.message}`,
          source.path,
          parsed.error
        ),
      };
    }

    const warnings: BuildWarning[] = parsed.value.issues.map((issue) => ({
      kind: "SYNTAX_ERROR",
      file: source.path,
      line: issue.span.start.line,
      message: issue.message,
    }));
    return { ok: true, index: indexFile(parsed.value.unit), warnings };
  }

  /**
   * Add one file's entities. A type whose id another file already declared is
   * dropped with its members and nested types.
   */
  private merge(index: FileIndex, store: GraphStore, table: SymbolTable): BuildWarning[] {
    const warnings: BuildWarning[] = [];

    for (const entity of index.structure.entities) store.addEntity(entity);
    for (const relation of index.structure.relations) store.addRelation(relation);

    const dropped = new Set<string>();
    for (const { symbol, entities, relations } of index.types) {
      if (symbol.enclosingId !== null && dropped.has(symbol.enclosingId)) {
        dropped.add(symbol.id);
        continue;
      }
      if (table.hasType(symbol.id) || store.hasEntity(symbol.id)) {
        dropped.add(symbol.id);
        warnings.push({
          kind: "DUPLICATE_TYPE",
          file: index.file.path,
          line: symbol.span.start.line,
          message: `${symbol.id} is already declared in ${table.getType(symbol.id)?.file ?? "another entity"}`,
        });
        continue;
      }

      for (const entity of entities) store.addEntity(entity);
      for (const relation of relations) store.addRelation(relation);
      table.addType(symbol);
      index.file.typeIds.push(symbol.id);
    }

    table.addFile(index.file);
    return warnings;
  }
}

/**
 * Build with default collaborators.
 */
export async function buildGraph(
  sources: SourceFile[],
  options?: BuildOptionsInput,
  logger?: Logger
): Promise<Result<BuildOutput, GraphError>> {
  return new GraphBuilder({ logger }).build(sources, options);
}
