import * as fs from "node:fs/promises";
import { z } from "zod";
import { logger } from "./logger.js";

const RiskWeightsSchema = z
  .object({
    port: z.number().nonnegative(),
    cve: z.number().nonnegative(),
    outdated_version: z.number().nonnegative(),
    weak_cipher: z.number().nonnegative(),
  })
  .partial();

export const ConfigSchema = z.object({
  risk_weights: RiskWeightsSchema.optional(),
  reference_dir: z.string().min(1).optional(),
});

export type ScanFusionConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: ScanFusionConfig = {};

export function parseConfig(value: unknown): ScanFusionConfig {
  return ConfigSchema.parse(value);
}

// A config problem is never fatal: warn and run with defaults
export async function loadConfig(configPath?: string): Promise<ScanFusionConfig> {
  if (!configPath) return DEFAULT_CONFIG;

  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (err: unknown) {
    logger.warn({ err, file: configPath }, "could not read config file, using defaults");
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    logger.warn({ err, file: configPath }, "config file is not valid JSON, using defaults");
    return DEFAULT_CONFIG;
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    logger.warn({ file: configPath, issues: result.error.issues }, "invalid config file, using defaults");
    return DEFAULT_CONFIG;
  }
  return result.data;
}
