import type { CveFinding, ScriptFinding, ScriptTable, WeakCipherFinding } from "../types.js";

const CVE_PATTERN = /CVE-\d{4}-\d{4,7}/gi;
const WEAK_CIPHER_INDICATORS = ["weak", "DES", "RC4", "MD5", "export", "low"];
const MAX_OUTPUT_LENGTH = 200;

export function cleanScriptOutput(output: string): string {
  const lines = output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("|_"));

  const cleaned = lines.join("; ").replace(/\s+/g, " ");
  return cleaned.length > MAX_OUTPUT_LENGTH ? cleaned.slice(0, MAX_OUTPUT_LENGTH) + "..." : cleaned;
}

export function makeScriptFinding(id: string, output: string, tables: ScriptTable[] = []): ScriptFinding | undefined {
  if (!id || !output) return undefined;
  return {
    id,
    output: cleanScriptOutput(output),
    full_output: output,
    tables,
  };
}

// CVE ids, weak TLS settings and expired certificates mentioned by a script
export function extractFindings(
  script: ScriptFinding,
  target: { cves: CveFinding[]; weak_ciphers: WeakCipherFinding[] },
  port: number | null
): void {
  const seen = new Set<string>();
  for (const match of script.full_output.matchAll(CVE_PATTERN)) {
    const id = match[0].toUpperCase();
    if (seen.has(id)) continue;
    seen.add(id);
    target.cves.push({ id, script: script.id, port });
  }

  const lowered = script.full_output.toLowerCase();

  if (script.id.includes("ssl-enum-ciphers")) {
    for (const indicator of WEAK_CIPHER_INDICATORS) {
      if (lowered.includes(indicator.toLowerCase())) {
        target.weak_ciphers.push({ cipher: indicator, script: script.id, port });
      }
    }
  }

  if (script.id.includes("ssl-cert") && lowered.includes("expired")) {
    target.weak_ciphers.push({ cipher: "expired_certificate", script: script.id, port });
  }
}

export function extractCommand(headerLine: string): string {
  const match = headerLine.match(/as:\s+(.+?)\s*$/);
  return match ? match[1] : "";
}
