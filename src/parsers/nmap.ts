import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import type { InputRecord, PortObservation, ScanParser, ScriptFinding, ScriptTable } from "../types.js";
import { extractFindings, makeScriptFinding } from "./findings.js";

// ── Parsed XML shape ──

type XmlElem = string | { "#text"?: string; "@_key"?: string };

interface XmlTable {
  "@_key"?: string;
  elem?: XmlElem[];
  table?: (XmlTable | string)[];
}

const attr = z.string().optional();

// Empty elements come back from the parser as ""
function element<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === "" ? undefined : value), schema.optional());
}

const ElemSchema = z.union([z.string(), z.object({ "#text": attr, "@_key": attr })]);

const TableSchema: z.ZodType<XmlTable> = z.lazy(() =>
  z.object({
    "@_key": attr,
    elem: z.array(ElemSchema).optional(),
    table: z.array(z.union([TableSchema, z.string()])).optional(),
  })
);

const ScriptSchema = z.object({
  "@_id": attr,
  "@_output": attr,
  elem: z.array(ElemSchema).optional(),
  table: z.array(z.union([TableSchema, z.string()])).optional(),
});

const PortSchema = z.object({
  "@_protocol": attr,
  "@_portid": attr,
  state: element(z.object({ "@_state": attr })),
  service: element(
    z.object({
      "@_name": attr,
      "@_product": attr,
      "@_version": attr,
      "@_extrainfo": attr,
    })
  ),
  script: z.array(ScriptSchema).optional(),
});

const OsClassSchema = z.object({ "@_osfamily": attr });

const HostSchema = z.object({
  address: z.array(z.object({ "@_addr": attr, "@_addrtype": attr })).optional(),
  hostnames: element(z.object({ hostname: z.array(z.object({ "@_name": attr })).optional() })),
  ports: element(z.object({ port: z.array(PortSchema).optional() })),
  os: element(
    z.object({
      osmatch: z.array(z.object({ "@_name": attr, osclass: z.array(OsClassSchema).optional() })).optional(),
      osclass: z.array(OsClassSchema).optional(),
    })
  ),
  hostscript: element(z.object({ script: z.array(ScriptSchema).optional() })),
});

const NmapRunSchema = z.object({
  nmaprun: z.object({
    "@_args": attr,
    "@_start": attr,
    host: z.array(HostSchema).optional(),
  }),
});

type XmlHost = z.infer<typeof HostSchema>;
type XmlPort = z.infer<typeof PortSchema>;
type XmlScript = z.infer<typeof ScriptSchema>;

// ── Conversion ──

function tableToRecord(table: XmlTable): ScriptTable {
  const out: ScriptTable = {};
  for (const elem of table.elem ?? []) {
    if (typeof elem === "string") continue;
    const key = elem["@_key"];
    if (key) out[key] = elem["#text"] ?? "";
  }
  for (const child of table.table ?? []) {
    if (typeof child === "string") continue;
    const key = child["@_key"];
    if (key) {
      out[key] = tableToRecord(child);
    } else {
      Object.assign(out, tableToRecord(child));
    }
  }
  return out;
}

function convertScript(script: XmlScript): ScriptFinding | undefined {
  const tables: ScriptTable[] = [];
  for (const table of script.table ?? []) {
    if (typeof table === "string") continue;
    const data = tableToRecord(table);
    const key = table["@_key"];
    if (key) {
      tables.push({ [key]: data });
    } else if (Object.keys(data).length > 0) {
      tables.push(data);
    }
  }
  return makeScriptFinding(script["@_id"] ?? "", script["@_output"] ?? "", tables);
}

function toEpochIso(start: string | undefined): string | undefined {
  if (!start) return undefined;
  const seconds = Number(start);
  if (!Number.isFinite(seconds) || seconds <= 0) return undefined;
  return new Date(seconds * 1000).toISOString();
}

function pickOs(host: XmlHost): string {
  const matches = host.os?.osmatch ?? [];
  if (matches.length > 0 && matches[0]["@_name"]) {
    return matches[0]["@_name"];
  }
  const osClass = host.os?.osclass?.[0] ?? matches[0]?.osclass?.[0];
  return osClass?.["@_osfamily"] || "unknown";
}

function convertPort(p: XmlPort, record: InputRecord): PortObservation | undefined {
  if (p.state?.["@_state"] !== "open") return undefined;

  const portNumber = Number.parseInt(p["@_portid"] ?? "", 10);
  const observation: PortObservation = {
    port: Number.isFinite(portNumber) ? portNumber : 0,
    protocol: p["@_protocol"] || "tcp",
    state: "open",
    service: p.service?.["@_name"] || "unknown",
    version: p.service?.["@_version"] || "unknown",
    product: p.service?.["@_product"] ?? "",
    extrainfo: p.service?.["@_extrainfo"] ?? "",
    scripts: [],
  };

  // Port scripts are also reported at host level
  for (const raw of p.script ?? []) {
    const script = convertScript(raw);
    if (!script) continue;
    observation.scripts.push(script);
    record.scripts.push(script);
    extractFindings(script, record, observation.port);
  }

  return observation;
}

function convertHost(host: XmlHost, command: string, timestamp: string | undefined, sourceFile: string): InputRecord | undefined {
  const addresses = host.address ?? [];
  const address =
    addresses.find((a) => a["@_addrtype"] === "ipv4") ?? addresses.find((a) => a["@_addrtype"] === "ipv6");
  if (!address?.["@_addr"]) return undefined;

  const record: InputRecord = {
    ip: address["@_addr"],
    hostname: host.hostnames?.hostname?.[0]?.["@_name"] ?? "",
    os: pickOs(host),
    ports: [],
    scripts: [],
    weak_ciphers: [],
    cves: [],
    command,
    timestamp,
    source_file: sourceFile,
  };

  for (const p of host.ports?.port ?? []) {
    const observation = convertPort(p, record);
    if (observation) record.ports.push(observation);
  }

  for (const raw of host.hostscript?.script ?? []) {
    const script = convertScript(raw);
    if (!script) continue;
    record.scripts.push(script);
    extractFindings(script, record, null);
  }

  return record;
}

export function parseNmapXml(content: string, sourceFile: string): InputRecord[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    parseTagValue: false,
    parseAttributeValue: false,
    htmlEntities: true,
    isArray: (name, _jpath, _isLeaf, isAttribute) =>
      !isAttribute &&
      ["host", "address", "hostname", "port", "script", "osmatch", "osclass", "elem", "table"].includes(name),
  });

  const parsed: unknown = parser.parse(content);
  const result = NmapRunSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid nmap XML: ${result.error.issues[0]?.message ?? "missing <nmaprun> root element"}`);
  }

  const run = result.data.nmaprun;
  const command = run["@_args"] ?? "";
  const timestamp = toEpochIso(run["@_start"]);

  const records: InputRecord[] = [];
  for (const host of run.host ?? []) {
    const record = convertHost(host, command, timestamp, sourceFile);
    if (record) records.push(record);
  }
  return records;
}

export const nmapXmlParser: ScanParser = {
  format: "xml",
  async parse(content: string, sourceFile: string): Promise<InputRecord[]> {
    return parseNmapXml(content, sourceFile);
  },
};
