/**
 * Markdown fragments shared by the graph tools.
 */

import type { Entity, Relation } from "../model.js";

export function location(entity: Entity): string {
  if (!entity.declaringFile) return "";
  return entity.range ? `${entity.declaringFile}:${entity.range.start.line}` : entity.declaringFile;
}

export function entityLine(entity: Entity): string {
  const where = location(entity);
  return `- **${entity.id}** (${entity.kind})${where ? ` - ${where}` : ""}`;
}

export function relationLine(relation: Relation, direction: "outgoing" | "incoming"): string {
  const other = direction === "outgoing" ? `→ ${relation.targetId}` : `← ${relation.sourceId}`;
  const site = relation.file ? ` at ${relation.file}:${relation.line ?? "?"}` : "";
  return `- ${relation.kind} ${other}${site}`;
}
