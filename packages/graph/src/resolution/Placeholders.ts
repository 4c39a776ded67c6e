/**
 * EXTERNAL placeholder entities for names the project does not declare.
 * Placeholders hang under a synthetic package below a namespace root and
 * never contain anything themselves.
 */

import {
  NAMESPACE_ROOT_IDS,
  placeholderPackageId,
  placeholderTypeId,
  wildcardPlaceholderId,
  type Namespace,
} from "../ids.js";
import type { GraphStore } from "../GraphStore.js";
import type { Entity } from "../model.js";

export interface ExternalType {
  namespace: Namespace;
  qualifiedName: string;
  packageName: string;
}

export class Placeholders {
  constructor(private readonly store: GraphStore) {}

  /**
   * Id of the placeholder for an external type, created on first use.
   */
  ensureType(type: ExternalType): string {
    const packageId = this.ensurePackage(type.namespace, type.packageName);
    const id = placeholderTypeId(type.namespace, type.qualifiedName);
    this.add(external(id, simpleName(type.qualifiedName), packageId), packageId);
    return id;
  }

  /**
   * Id of the shared placeholder for every member of an unindexed package,
   * or of an unindexed type (`java.util.Map.*` sits in `java.util`).
   */
  ensureWildcard(target: ExternalType): string {
    const packageId = this.ensurePackage(target.namespace, target.packageName);
    const id = wildcardPlaceholderId(target.namespace, target.qualifiedName);
    this.add(external(id, `${target.qualifiedName}.*`, packageId), packageId);
    return id;
  }

  private ensurePackage(namespace: Namespace, packageName: string): string {
    const rootId = NAMESPACE_ROOT_IDS[namespace];
    this.store.addEntity({
      id: rootId,
      kind: "DIRECTORY",
      name: rootId,
      declaringFile: null,
      modifiers: [],
      containerId: null,
      range: null,
    });

    const id = placeholderPackageId(namespace, packageName);
    this.add(
      {
        id,
        kind: "PACKAGE",
        name: packageName,
        declaringFile: null,
        modifiers: [],
        containerId: rootId,
        range: null,
      },
      rootId
    );
    return id;
  }

  private add(entity: Entity, containerId: string): void {
    if (this.store.addEntity(entity)) {
      this.store.addRelation({
        sourceId: containerId,
        targetId: entity.id,
        kind: "CONTAINS",
        file: null,
        line: null,
      });
    }
  }
}

function external(id: string, name: string, containerId: string): Entity {
  return { id, kind: "EXTERNAL", name, declaringFile: null, modifiers: [], containerId, range: null };
}

function simpleName(qualifiedName: string): string {
  return qualifiedName.slice(qualifiedName.lastIndexOf(".") + 1);
}
