import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { getParser, getSupportedFormats, parseFile } from "../parsers/index.js";
import { cleanScriptOutput, extractCommand, extractFindings, makeScriptFinding } from "../parsers/findings.js";
import { parsePortEntries } from "../parsers/gnmap.js";
import { parseNmapXml } from "../parsers/nmap.js";
import type { CveFinding, WeakCipherFinding } from "../types.js";
import { FIXTURES_DIR } from "./helpers.js";

const fixture = (name: string) => path.join(FIXTURES_DIR, name);

function emptyTarget(): { cves: CveFinding[]; weak_ciphers: WeakCipherFinding[] } {
  return { cves: [], weak_ciphers: [] };
}

describe("parser registry", () => {
  it("lists the supported formats", () => {
    assert.deepEqual(getSupportedFormats(), ["xml", "gnmap", "nmap"]);
  });

  it("looks parsers up case-insensitively", () => {
    assert.equal(getParser("XML")?.format, "xml");
    assert.equal(getParser("masscan"), undefined);
  });

  it("returns no records for a missing file", async () => {
    assert.deepEqual(await parseFile("xml", fixture("does-not-exist.xml")), []);
  });

  it("returns no records for malformed XML", async () => {
    assert.deepEqual(await parseFile("xml", fixture("sample.gnmap")), []);
  });
});

describe("script findings", () => {
  it("cleans multi-line output", () => {
    assert.equal(cleanScriptOutput("  first line \n\n|_ignored\n  second   line  "), "first line; second line");
  });

  it("truncates long output", () => {
    const cleaned = cleanScriptOutput("x".repeat(250));
    assert.equal(cleaned, "x".repeat(200) + "...");
  });

  it("drops scripts without id or output", () => {
    assert.equal(makeScriptFinding("", "out"), undefined);
    assert.equal(makeScriptFinding("id", ""), undefined);
  });

  it("extracts distinct CVE ids from the full output", () => {
    const script = makeScriptFinding("vulners", "cve-2019-0001\n" + "x".repeat(300) + "\nCVE-2019-0001 CVE-2020-12345");
    assert.ok(script);
    const target = emptyTarget();
    extractFindings(script, target, 80);
    assert.deepEqual(target.cves, [
      { id: "CVE-2019-0001", script: "vulners", port: 80 },
      { id: "CVE-2020-12345", script: "vulners", port: 80 },
    ]);
  });

  it("flags weak cipher indicators and expired certificates", () => {
    const target = emptyTarget();
    const ciphers = makeScriptFinding("ssl-enum-ciphers", "TLS_RSA_WITH_3DES_EDE_CBC_SHA (MD5)");
    const cert = makeScriptFinding("ssl-cert", "Certificate EXPIRED");
    assert.ok(ciphers && cert);
    extractFindings(ciphers, target, 443);
    extractFindings(cert, target, 443);
    assert.deepEqual(
      target.weak_ciphers.map((c) => c.cipher),
      ["DES", "MD5", "expired_certificate"]
    );
  });

  it("reads the command from a header line", () => {
    assert.equal(extractCommand("# Nmap 7.94 scan initiated Mon as: nmap -sS 10.0.0.1"), "nmap -sS 10.0.0.1");
    assert.equal(extractCommand("# no command here"), "");
  });
});

describe("XML parser", () => {
  it("parses hosts, open ports, scripts and findings", async () => {
    const records = await parseFile("xml", fixture("sample.xml"));
    assert.equal(records.length, 2);

    const [web, snmp] = records;
    assert.equal(web.ip, "10.0.0.5");
    assert.equal(web.hostname, "web1.lab.test");
    assert.equal(web.os, "Linux 5.4");
    assert.equal(web.command, "nmap -sV -sC -oX sample.xml 10.0.0.0/24");
    assert.equal(web.timestamp, "2023-11-14T22:13:20.000Z");
    assert.equal(web.source_file, fixture("sample.xml"));

    assert.deepEqual(
      web.ports.map((p) => [p.port, p.service, p.version, p.product]),
      [
        [22, "ssh", "8.9p1", "OpenSSH"],
        [443, "https", "unknown", "nginx"],
      ]
    );
    assert.equal(web.ports[0].extrainfo, "Ubuntu Linux; protocol 2.0");
    assert.deepEqual(
      web.ports[1].scripts.map((s) => s.id),
      ["ssl-enum-ciphers", "http-vuln-test"]
    );
    assert.deepEqual(web.ports[1].scripts[0].tables, [{ "TLSv1.0": { "least strength": "C" } }]);
    assert.deepEqual(
      web.scripts.map((s) => s.id),
      ["ssl-enum-ciphers", "http-vuln-test", "smb-os-discovery"]
    );
    assert.deepEqual(web.cves, [{ id: "CVE-2021-41773", script: "http-vuln-test", port: 443 }]);
    assert.deepEqual(web.weak_ciphers, [{ cipher: "RC4", script: "ssl-enum-ciphers", port: 443 }]);

    assert.equal(snmp.ip, "10.0.0.7");
    assert.equal(snmp.hostname, "");
    assert.equal(snmp.os, "unknown");
    assert.deepEqual(
      snmp.ports.map((p) => `${p.port}/${p.protocol}`),
      ["161/udp"]
    );
  });

  it("prefers ipv4 and falls back to the os family", () => {
    const xml = `<nmaprun args="nmap -6"><host>
      <address addr="2001:db8::1" addrtype="ipv6"/>
      <os><osclass osfamily="Windows"/></os>
    </host></nmaprun>`;
    const [record] = parseNmapXml(xml, "v6.xml");
    assert.equal(record.ip, "2001:db8::1");
    assert.equal(record.os, "Windows");
    assert.equal(record.timestamp, undefined);
  });

  it("rejects documents without an nmaprun root", () => {
    assert.throws(() => parseNmapXml("<report></report>", "bad.xml"), /Invalid nmap XML/);
  });
});

describe("greppable parser", () => {
  it("merges lines for the same host", async () => {
    const records = await parseFile("gnmap", fixture("sample.gnmap"));
    assert.equal(records.length, 2);

    const [web, db] = records;
    assert.equal(web.ip, "10.0.0.5");
    assert.equal(web.hostname, "web1.lab.test");
    assert.equal(web.os, "Linux 5.4");
    assert.equal(web.command, "nmap -sV -oG sample.gnmap 10.0.0.0/24");
    assert.deepEqual(
      web.ports.map((p) => [p.port, p.service, p.version]),
      [
        [22, "ssh", "OpenSSH 8.9p1 Ubuntu 3ubuntu0.1 (Ubuntu Linux; protocol 2.0)"],
        [80, "http", "nginx 1.18.0"],
      ]
    );

    assert.equal(db.ip, "10.0.0.9");
    assert.equal(db.hostname, "");
    assert.deepEqual(
      db.ports.map((p) => [p.port, p.service, p.version]),
      [[3306, "mysql", "MySQL 5.1.73"]]
    );
  });

  it("accepts the legacy port layout", () => {
    const [port] = parsePortEntries("8080/tcp/open/http-proxy/Jetty 9.4");
    assert.equal(port.port, 8080);
    assert.equal(port.protocol, "tcp");
    assert.equal(port.service, "http-proxy");
    assert.equal(port.version, "Jetty 9.4");
  });

  it("skips empty version fields and confidence markers", () => {
    const [port] = parsePortEntries("53/open/udp//domain//none/conf=3/");
    assert.equal(port.version, "unknown");
    assert.equal(port.protocol, "udp");
  });
});

describe("normal output parser", () => {
  it("parses hosts, ports and script blocks", async () => {
    const content = await fs.readFile(fixture("sample.nmap"), "utf-8");
    const parser = getParser("nmap");
    assert.ok(parser);
    const records = await parser.parse(content, "sample.nmap");
    assert.equal(records.length, 2);

    const [web, db] = records;
    assert.equal(web.ip, "10.0.0.5");
    assert.equal(web.hostname, "web1.lab.test");
    assert.equal(web.os, "Linux 5.4");
    assert.equal(web.command, "nmap -sV -sC -oN sample.nmap 10.0.0.5");

    assert.deepEqual(
      web.ports.map((p) => [p.port, p.service, p.version]),
      [
        [22, "ssh", "OpenSSH 8.9p1 Ubuntu 3ubuntu0.1 (Ubuntu Linux; protocol 2.0)"],
        [80, "http", "nginx 1.18.0"],
      ]
    );
    assert.deepEqual(
      web.ports[0].scripts.map((s) => [s.id, s.output]),
      [["ssh-hostkey", "256 aa:bb (ECDSA); 256 cc:dd (ED25519)"]]
    );
    assert.deepEqual(
      web.ports[1].scripts.map((s) => [s.id, s.output]),
      [["http-title", "Lab Portal"]]
    );

    // the block under the filtered port is dropped with it
    assert.deepEqual(
      web.scripts.map((s) => s.id),
      ["ssh-hostkey", "http-title", "smb-security-mode"]
    );
    assert.equal(web.scripts[2].output, "message_signing: disabled; see CVE-2020-1472 on port 445");
    assert.deepEqual(web.cves, [{ id: "CVE-2020-1472", script: "smb-security-mode", port: null }]);

    assert.equal(db.ip, "10.0.0.9");
    assert.equal(db.hostname, "");
    assert.deepEqual(
      db.ports.map((p) => [p.port, p.service, p.version]),
      [[3306, "mysql", "unknown"]]
    );
  });

  it("flushes a host when the footer is missing", async () => {
    const parser = getParser("nmap");
    assert.ok(parser);
    const records = await parser.parse(
      "Nmap scan report for 10.0.0.3\nPORT STATE SERVICE\n21/tcp open ftp\n",
      "cut.nmap"
    );
    assert.equal(records.length, 1);
    assert.equal(records[0].ports[0].service, "ftp");
  });
});
