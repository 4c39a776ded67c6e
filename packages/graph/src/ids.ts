/**
 * Entity id scheme. Ids derive from declarations only, so the same source
 * tree yields the same ids on every run.
 *
 * | Entity           | Id                                   |
 * | ---------------- | ------------------------------------ |
 * | project root     | `/`                                  |
 * | directory        | `src/main/`                          |
 * | package          | `com.acme.shop`                      |
 * | file             | `src/main/java/com/acme/Cart.java`   |
 * | type             | `com.acme.Cart`, `com.acme.Cart.Line` |
 * | method           | `com.acme.Cart.add(Item,int)`        |
 * | constructor      | `com.acme.Cart.Cart()`               |
 * | initializers     | `com.acme.Cart.<init>`, `.<clinit>`  |
 * | placeholder pkg  | `stdlib/java.util`, `external/<default>` |
 * | placeholders     | `stdlib:java.util.List`, `external:org.slf4j.*` |
 */

import type { TypeRef } from "@structgraph/syntax";

export const PROJECT_ROOT_ID = "/";

export type Namespace = "stdlib" | "external";

export const NAMESPACE_ROOT_IDS: Record<Namespace, string> = {
  stdlib: "<stdlib>",
  external: "<external>",
};

/** Package of placeholders for unqualified names nobody declares */
export const DEFAULT_PACKAGE = "<default>";

export const INSTANCE_INITIALIZER = "<init>";
export const STATIC_INITIALIZER = "<clinit>";

/**
 * Directory ids enclosing a file, outermost first.
 * `src/util/Strings.java` → `["src/", "src/util/"]`.
 */
export function directoryChain(filePath: string): string[] {
  const segments = filePath.split("/").slice(0, -1);
  const chain: string[] = [];
  let prefix = "";
  for (const segment of segments) {
    prefix += `${segment}/`;
    chain.push(prefix);
  }
  return chain;
}

/**
 * `com.acme.shop` → `["com", "com.acme", "com.acme.shop"]`.
 */
export function packageChain(packageName: string): string[] {
  const segments = packageName.split(".");
  return segments.map((_, i) => segments.slice(0, i + 1).join("."));
}

/** Last segment of a directory id or dotted name. */
export function lastSegment(id: string, separator: "." | "/"): string {
  const trimmed = separator === "/" && id.endsWith("/") ? id.slice(0, -1) : id;
  return trimmed.slice(trimmed.lastIndexOf(separator) + 1);
}

/**
 * Id of a type declared directly in a package (`null` for the unnamed package)
 * or inside another type.
 */
export function topLevelTypeId(packageName: string | null, name: string): string {
  return packageName ? `${packageName}.${name}` : name;
}

export function memberTypeId(enclosingTypeId: string, name: string): string {
  return `${enclosingTypeId}.${name}`;
}

/** `String[]`, `int...` */
export function parameterTypeText(type: TypeRef, variadic: boolean): string {
  return `${type.name}${"[]".repeat(type.dimensions)}${variadic ? "..." : ""}`;
}

export function typeText(type: TypeRef): string {
  return parameterTypeText(type, false);
}

export function methodId(typeId: string, name: string, parameterTypes: string[]): string {
  return `${typeId}.${name}(${parameterTypes.join(",")})`;
}

export function initializerId(typeId: string, isStatic: boolean): string {
  return `${typeId}.${isStatic ? STATIC_INITIALIZER : INSTANCE_INITIALIZER}`;
}

/** Slash-separated so a package never shares an id with a placeholder type */
export function placeholderPackageId(namespace: Namespace, packageName: string): string {
  return `${namespace}/${packageName}`;
}

export function placeholderTypeId(namespace: Namespace, qualifiedName: string): string {
  return `${namespace}:${qualifiedName}`;
}

/** The shared placeholder standing for every member of an unindexed package or type */
export function wildcardPlaceholderId(namespace: Namespace, path: string): string {
  return `${namespace}:${path}.*`;
}
