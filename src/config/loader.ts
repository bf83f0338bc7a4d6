import { readFile } from "node:fs/promises";
import { parse as yamlParse } from "yaml";
import { readinessConfigSchema } from "./schema.js";
import type { ReadinessConfig, SearchProfile } from "../types.js";

/** Read and validate a YAML configuration file. Read errors propagate as-is. */
export async function loadConfig(path: string): Promise<ReadinessConfig> {
  const content = await readFile(path, "utf-8");
  const data: unknown = yamlParse(content);
  return readinessConfigSchema.parse(data ?? {});
}

export function findProfile(
  config: ReadinessConfig,
  id: string,
): SearchProfile | undefined {
  return config.profiles.find((p) => p.id === id);
}
