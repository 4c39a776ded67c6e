/**
 * In-memory graph storage with query methods.
 *
 * Entities are idempotent by id. CONTAINS, INHERITS and IMPORTS edges have set
 * semantics; INVOKES edges are kept one per call site and target.
 * After `seal()` the entity table is frozen; edges can still be appended.
 */

import type { Entity, EntityKind, GraphStats, Relation, RelationKind } from "./model.js";

function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

function uniqueById(entities: Entity[]): Entity[] {
  const seen = new Set<string>();
  return entities.filter((e) => {
    if (seen.has(e.id)) return false;
    seen.add(e.id);
    return true;
  });
}

export class GraphStore {
  private entities = new Map<string, Entity>();
  private entitiesOfKind = new Map<EntityKind, Entity[]>();
  private relations: Relation[] = [];
  private outgoingEdges = new Map<string, Relation[]>(); // source -> edges
  private incomingEdges = new Map<string, Relation[]>(); // target -> edges
  private relationKeys = new Set<string>();
  private sealed = false;

  /**
   * Add an entity.
   *
   * @returns false when the id is already present (the stored entity is kept)
   * @throws Error when a new id is added after `seal()`
   */
  addEntity(entity: Entity): boolean {
    if (this.entities.has(entity.id)) return false;
    if (this.sealed) {
      throw new Error(`Cannot add entity ${entity.id}: the entity table is sealed`);
    }

    this.entities.set(entity.id, entity);
    pushTo(this.entitiesOfKind, entity.kind, entity);
    return true;
  }

  /**
   * Add a relation between two known entities.
   *
   * @returns false when a deduplicated relation was already present
   * @throws Error when either endpoint is unknown
   */
  addRelation(relation: Relation): boolean {
    for (const endpoint of [relation.sourceId, relation.targetId]) {
      if (!this.entities.has(endpoint)) {
        throw new Error(`Cannot add ${relation.kind} relation: unknown entity ${endpoint}`);
      }
    }

    if (relation.kind !== "INVOKES") {
      const key = `${relation.kind}|${relation.sourceId}|${relation.targetId}`;
      if (this.relationKeys.has(key)) return false;
      this.relationKeys.add(key);
    }

    this.relations.push(relation);
    pushTo(this.outgoingEdges, relation.sourceId, relation);
    pushTo(this.incomingEdges, relation.targetId, relation);
    return true;
  }

  /**
   * Freeze the entity table.
   */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  getEntity(id: string): Entity | null {
    return this.entities.get(id) ?? null;
  }

  hasEntity(id: string): boolean {
    return this.entities.has(id);
  }

  /**
   * Entities of one kind, in insertion order.
   */
  entitiesByKind(kind: EntityKind): Entity[] {
    return [...(this.entitiesOfKind.get(kind) ?? [])];
  }

  allEntities(): Entity[] {
    return Array.from(this.entities.values());
  }

  allRelations(): Relation[] {
    return [...this.relations];
  }

  relationsByKind(kind: RelationKind): Relation[] {
    return this.relations.filter((r) => r.kind === kind);
  }

  outgoing(id: string, kind?: RelationKind): Relation[] {
    const edges = this.outgoingEdges.get(id) ?? [];
    return kind ? edges.filter((e) => e.kind === kind) : [...edges];
  }

  incoming(id: string, kind?: RelationKind): Relation[] {
    const edges = this.incomingEdges.get(id) ?? [];
    return kind ? edges.filter((e) => e.kind === kind) : [...edges];
  }

  /**
   * Entities invoking `id`, once each, in edge order.
   */
  callers(id: string): Entity[] {
    return uniqueById(this.resolveEndpoints(this.incoming(id, "INVOKES"), "sourceId"));
  }

  /**
   * Entities invoked by `id`, once each, in edge order.
   */
  callees(id: string): Entity[] {
    return uniqueById(this.resolveEndpoints(this.outgoing(id, "INVOKES"), "targetId"));
  }

  children(id: string): Entity[] {
    return this.resolveEndpoints(this.outgoing(id, "CONTAINS"), "targetId");
  }

  /**
   * Search entities whose name or id matches.
   */
  findEntities(pattern: RegExp, kinds?: EntityKind[], limit: number = 50): Entity[] {
    const results: Entity[] = [];

    for (const entity of this.entities.values()) {
      if (results.length >= limit) break;
      if (kinds && !kinds.includes(entity.kind)) continue;
      if (pattern.test(entity.name) || pattern.test(entity.id)) {
        results.push(entity);
      }
    }

    return results;
  }

  /**
   * Counts per entity and relation kind; every kind is present.
   */
  stats(): GraphStats {
    const entities: Record<EntityKind, number> = {
      FILE: 0,
      PACKAGE: 0,
      DIRECTORY: 0,
      CLASS: 0,
      INTERFACE: 0,
      ENUM: 0,
      METHOD: 0,
      CONSTRUCTOR: 0,
      EXTERNAL: 0,
    };
    for (const [kind, list] of this.entitiesOfKind) {
      entities[kind] = list.length;
    }

    const relations: Record<RelationKind, number> = {
      CONTAINS: 0,
      INHERITS: 0,
      INVOKES: 0,
      IMPORTS: 0,
    };
    for (const relation of this.relations) {
      relations[relation.kind]++;
    }

    return {
      entities,
      relations,
      totalEntities: this.entities.size,
      totalRelations: this.relations.length,
    };
  }

  isEmpty(): boolean {
    return this.entities.size === 0;
  }

  private resolveEndpoints(edges: Relation[], end: "sourceId" | "targetId"): Entity[] {
    const result: Entity[] = [];
    for (const edge of edges) {
      const entity = this.entities.get(edge[end]);
      if (entity) result.push(entity);
    }
    return result;
  }
}
