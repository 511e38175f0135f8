import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigSchema, type Dec19Config } from "./schema.js";

export type ConfigLoadResult = {
  config: Dec19Config;
  path?: string;
};

const DEFAULT_CONFIG_PATH = ".dec19.yml";

export function loadConfig(cwd: string): ConfigLoadResult {
  const configPath = path.join(cwd, DEFAULT_CONFIG_PATH);
  if (!fs.existsSync(configPath)) {
    return { config: ConfigSchema.parse({}), path: undefined };
  }

  const raw = fs.readFileSync(configPath, "utf-8");
  const parsed: unknown = YAML.parse(raw);
  try {
    return { config: ConfigSchema.parse(parsed ?? {}), path: configPath };
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown config error.";
    throw new Error(`Invalid ${DEFAULT_CONFIG_PATH}: ${message}`);
  }
}
