/**
 * Build options, validated with zod. Options come from the caller and,
 * for directory builds, from `structgraph.config.json` in the analyzed root.
 */

import fs from "node:fs";
import path from "node:path";
import * as z from "zod/v4";
import { Err, GraphError, Ok, type Result } from "@structgraph/core";
import { DEFAULT_IGNORED_DIRECTORIES } from "@structgraph/syntax";

export const CONFIG_FILE_NAME = "structgraph.config.json";

/** Import prefixes that belong to the platform, not to a third party */
export const BUILTIN_PREFIXES = [
  "java.",
  "javax.",
  "jdk.",
  "sun.",
  "com.sun.",
  "org.w3c.dom.",
  "org.xml.sax.",
  "org.ietf.jgss.",
  "org.omg.",
];

export const BuildOptionsSchema = z.strictObject({
  concurrency: z.number().int().min(1).max(64).default(8),
  extensions: z.array(z.string().startsWith(".")).min(1).default([".java"]),
  ignoreDirectories: z.array(z.string().min(1)).default([...DEFAULT_IGNORED_DIRECTORIES]),
  builtinPrefixes: z.array(z.string().min(1)).default([...BUILTIN_PREFIXES]),
});

export type BuildOptions = z.output<typeof BuildOptionsSchema>;
export type BuildOptionsInput = z.input<typeof BuildOptionsSchema>;

/**
 * Validate raw options, filling defaults.
 */
export function parseBuildOptions(
  input: unknown,
  source: string = "build options"
): Result<BuildOptions, GraphError> {
  const parsed = BuildOptionsSchema.safeParse(input ?? {});
  if (parsed.success) {
    return Ok(parsed.data);
  }

  const details = parsed.error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
  return Err(new GraphError("INVALID_CONFIG", `Invalid ${source}: ${details}`));
}

/**
 * Read the config file of an analyzed root.
 *
 * @returns Ok(null) when there is no config file, or the root is not a
 *   directory (the loader reports that)
 */
export async function readConfigFile(rootPath: string): Promise<Result<object | null, GraphError>> {
  const configPath = path.join(rootPath, CONFIG_FILE_NAME);

  let text: string;
  try {
    text = await fs.promises.readFile(configPath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return Ok(null);
    }
    return Err(new GraphError("INVALID_CONFIG", `Cannot read ${CONFIG_FILE_NAME}`, configPath, error));
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return Err(
      new GraphError("INVALID_CONFIG", `${CONFIG_FILE_NAME} is not valid JSON`, configPath, error)
    );
  }

  if (typeof json !== "object" || json === null || Array.isArray(json)) {
    return Err(new GraphError("INVALID_CONFIG", `${CONFIG_FILE_NAME} must hold an object`, configPath));
  }
  return Ok(json);
}

/**
 * Config file values overridden by explicit options, validated together.
 */
export async function resolveBuildOptions(
  rootPath: string,
  overrides: BuildOptionsInput = {}
): Promise<Result<BuildOptions, GraphError>> {
  const file = await readConfigFile(rootPath);
  if (!file.ok) return file;

  return parseBuildOptions(
    { ...(file.value ?? {}), ...overrides },
    file.value ? CONFIG_FILE_NAME : "build options"
  );
}
