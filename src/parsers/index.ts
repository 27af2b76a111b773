import * as fs from "node:fs/promises";
import { logger } from "../logger.js";
import type { InputRecord, ScanFormat, ScanParser } from "../types.js";
import { nmapXmlParser } from "./nmap.js";
import { gnmapParser } from "./gnmap.js";
import { normalParser } from "./normal.js";

const parserRegistry = new Map<ScanFormat, ScanParser>();

parserRegistry.set("xml", nmapXmlParser);
parserRegistry.set("gnmap", gnmapParser);
parserRegistry.set("nmap", normalParser);

export function isScanFormat(value: string): value is ScanFormat {
  return value === "xml" || value === "gnmap" || value === "nmap";
}

export function getParser(format: string): ScanParser | undefined {
  const key = format.toLowerCase();
  return isScanFormat(key) ? parserRegistry.get(key) : undefined;
}

export function getSupportedFormats(): ScanFormat[] {
  return Array.from(parserRegistry.keys());
}

/**
 * Read and parse one scan file. A file that cannot be read or parsed is
 * logged and contributes no records, so one bad file never aborts a batch.
 */
export async function parseFile(format: ScanFormat, filePath: string): Promise<InputRecord[]> {
  const parser = parserRegistry.get(format);
  if (!parser) {
    logger.warn({ file: filePath, format }, "no parser registered for format");
    return [];
  }

  try {
    const content = await fs.readFile(filePath, "utf-8");
    const records = await parser.parse(content, filePath);
    logger.debug({ file: filePath, format, hosts: records.length }, "parsed scan file");
    return records;
  } catch (err: unknown) {
    logger.warn({ err, file: filePath, format }, "failed to parse scan file");
    return [];
  }
}

export { parserRegistry };
