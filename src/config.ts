import fs from "node:fs/promises";
import { parse } from "yaml";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { mainConfigSchema, type SchemaConfig } from "./schema-config.js";

const SIZE_UNITS: Record<string, number> = {
  "": 1,
  k: 1024,
  m: 1024 * 1024,
  g: 1024 * 1024 * 1024,
};

export async function parseYamlConfig(filePath: string) {
  const fileContent = await fs.readFile(filePath, "utf8");
  const configParsed = parse(fileContent);
  return JSON.stringify(configParsed);
}

export async function validateConfiguration(
  config: string
): Promise<SchemaConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(config);
  } catch (error) {
    throw new ConfigurationError(
      `Configuration is not valid JSON: ${String(error)}`
    );
  }

  const result = await mainConfigSchema.safeParseAsync(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `No valid configuration:\n${z.prettifyError(result.error)}`
    );
  }
  return result.data;
}

export async function loadConfigFile(
  filePath: string
): Promise<SchemaConfig> {
  return validateConfiguration(await parseYamlConfig(filePath));
}

/**
 * Converts an nginx-style size (`10m`, `512k`, `1g`, `2048`) into bytes.
 */
export function parseSize(size: string | number): number {
  if (typeof size === "number") {
    return size;
  }

  const match = /^\s*(\d+)\s*([kmg]?)\s*$/i.exec(size);
  if (!match) {
    throw new ConfigurationError(`Invalid size: ${size}`);
  }

  const [, amount, unit] = match;
  return Number(amount) * SIZE_UNITS[unit.toLowerCase()];
}
