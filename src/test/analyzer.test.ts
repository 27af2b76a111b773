import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { analyze, mostCommonService, scriptSummary, versionLabel } from "../analysis/analyzer.js";
import { compareIps, groupBySubnet, sortByIp } from "../analysis/sort.js";
import { Enricher } from "../enrich/enricher.js";
import { extractSubnet } from "../fusion/index.js";
import type { UnifiedHost } from "../types.js";
import { makeUnifiedHost, makeUnifiedPort } from "./helpers.js";

function host(ip: string, overrides: Partial<UnifiedHost> = {}): UnifiedHost {
  return makeUnifiedHost({ ip, subnet: extractSubnet(ip), ...overrides });
}

const script = (id: string, output: string) => ({ id, output, full_output: output, tables: [] });

const alpha = host("10.0.1.20", {
  hostname: "alpha",
  os: "Linux",
  ports: [
    makeUnifiedPort({ port: 80, scripts: [script("http-title", "A".repeat(60))] }),
    makeUnifiedPort({ port: 53, protocol: "udp", service: "domain" }),
    makeUnifiedPort({ port: 22, service: "openssh" }),
  ],
  scripts: [script("smb2-time", "Message on port 80 seen")],
});
const bravo = host("10.0.0.5", {
  ports: [makeUnifiedPort({ port: 22, service: "ssh" }), makeUnifiedPort({ service: "http-proxy" })],
});
const charlie = host("10.0.0.10", {
  ports: [
    makeUnifiedPort(),
    makeUnifiedPort({ port: 443, service: "https" }),
    makeUnifiedPort({ port: 8443, service: "unknown" }),
  ],
});
const delta = host("2001:db8::1", { ports: [makeUnifiedPort()] });

const enriched = new Enricher().enrichHosts([alpha, delta, charlie, bravo]);

describe("ip ordering", () => {
  it("compares addresses numerically", () => {
    assert.ok(compareIps("10.0.0.9", "10.0.0.10") < 0);
    assert.ok(compareIps("10.0.0.10", "9.255.255.255") > 0);
    assert.ok(compareIps("2001:db8::2", "2001:db8::1") > 0);
    assert.equal(compareIps("10.0.0.1", "10.0.0.1"), 0);
  });

  it("puts ipv4 before ipv6 and invalid addresses last", () => {
    const sorted = sortByIp([{ ip: "not-an-ip" }, { ip: "::1" }, { ip: "192.168.1.1" }, { ip: "::ffff:10.0.0.1" }]);
    assert.deepEqual(
      sorted.map((h) => h.ip),
      ["192.168.1.1", "::1", "::ffff:10.0.0.1", "not-an-ip"]
    );
  });

  it("breaks ties between equal addresses on the raw text", () => {
    assert.ok(compareIps("2001:db8::1", "2001:db8:0:0:0:0:0:1") > 0);
  });

  it("orders subnet groups by their lowest address", () => {
    const groups = groupBySubnet([
      { ip: "10.0.10.4" },
      { ip: "10.0.2.9" },
      { ip: "10.0.2.1" },
    ]);
    assert.deepEqual(
      groups.map((g) => [g.subnet, g.hosts.map((h) => h.ip)]),
      [
        ["10.0.2.0/24", ["10.0.2.1", "10.0.2.9"]],
        ["10.0.10.0/24", ["10.0.10.4"]],
      ]
    );
  });
});

describe("helpers", () => {
  it("picks the most common service, first seen on ties", () => {
    assert.equal(mostCommonService(["http", "http-proxy", "http"]), "http");
    assert.equal(mostCommonService(["ssh", "openssh"]), "ssh");
    assert.equal(mostCommonService([]), "unknown");
  });

  it("summarizes port scripts and host scripts that mention the port", () => {
    const [target] = new Enricher().enrichHosts([alpha]);
    assert.deepEqual(scriptSummary(target.ports[0], target), [
      `http-title: ${"A".repeat(50)}`,
      "smb2-time: Message on port 80 seen",
    ]);
    assert.deepEqual(scriptSummary(target.ports[2], target), []);
  });

  it("appends service detail to the version", () => {
    assert.equal(
      versionLabel({ version: "OpenSSH 8.9p1", extrainfo: "Ubuntu Linux; protocol 2.0" }),
      "OpenSSH 8.9p1 (Ubuntu Linux; protocol 2.0)"
    );
    assert.equal(versionLabel({ version: "unknown", extrainfo: "workgroup: LAB" }), "(workgroup: LAB)");
    assert.equal(versionLabel({ version: "nginx 1.18.0", extrainfo: "" }), "nginx 1.18.0");
    assert.equal(
      versionLabel({ version: "OpenSSH 8.9p1 (Ubuntu Linux; protocol 2.0)", extrainfo: "Ubuntu Linux; protocol 2.0" }),
      "OpenSSH 8.9p1 (Ubuntu Linux; protocol 2.0)"
    );
  });

  it("caps the script summary at three entries", () => {
    const [busy] = new Enricher().enrichHosts([
      host("10.0.0.1", {
        ports: [makeUnifiedPort({ scripts: ["a", "b", "c", "d"].map((id) => script(id, "x")) })],
      }),
    ]);
    assert.deepEqual(scriptSummary(busy.ports[0], busy), ["a: x", "b: x", "c: x"]);
  });
});

describe("analyze", () => {
  const result = analyze(enriched);

  it("sorts hosts by subnet then address", () => {
    assert.deepEqual(
      result.sorted_hosts.map((h) => h.ip),
      ["10.0.0.5", "10.0.0.10", "10.0.1.20", "2001:db8::1"]
    );
    assert.deepEqual(result.subnets, [
      { subnet: "10.0.0.0/24", host_count: 2, ip_range: "10.0.0.5 - 10.0.0.10" },
      { subnet: "10.0.1.0/24", host_count: 1, ip_range: "10.0.1.20 - 10.0.1.20" },
      { subnet: "2001:db8::1::/64", host_count: 1, ip_range: "2001:db8::1 - 2001:db8::1" },
    ]);
  });

  it("builds the host summary table", () => {
    assert.deepEqual(result.table1[2], {
      ip: "10.0.1.20",
      hostname: "alpha",
      total_ports: 3,
      tcp_ports: 2,
      udp_ports: 1,
      total_services: 3,
      os: "Linux",
      risk_level: "low",
    });
    // "unknown" is not a service
    assert.equal(result.table1[1].total_services, 2);
  });

  it("builds host details with ports in port order", () => {
    const detail = result.table2[2];
    assert.deepEqual(
      detail.ports.map((p) => `${p.port}/${p.protocol}`),
      ["22/tcp", "53/udp", "80/tcp"]
    );
    assert.deepEqual(detail.ports[0], {
      port: 22,
      protocol: "tcp",
      service: "openssh",
      version: "unknown",
      risk: "low",
      script_summary: [],
      business_function: "other",
    });
    assert.equal(detail.ports[2].script_summary.length, 2);
  });

  it("counts port frequency across hosts", () => {
    assert.deepEqual(result.table3, [
      { port: 22, protocol: "tcp", count: 2, ip_list: ["10.0.0.5", "10.0.1.20"], service: "ssh" },
      { port: 53, protocol: "udp", count: 1, ip_list: ["10.0.1.20"], service: "domain" },
      {
        port: 80,
        protocol: "tcp",
        count: 4,
        ip_list: ["10.0.0.5", "10.0.0.10", "10.0.1.20", "2001:db8::1"],
        service: "http",
      },
      { port: 443, protocol: "tcp", count: 1, ip_list: ["10.0.0.10"], service: "https" },
      { port: 8443, protocol: "tcp", count: 1, ip_list: ["10.0.0.10"], service: "unknown" },
    ]);
  });

  it("lists every exposed host per port", () => {
    const web = result.table4[2];
    assert.equal(web.port, 80);
    assert.equal(web.host_count, 4);
    assert.equal(web.service, "http");
    assert.deepEqual(web.hosts[0], {
      ip: "10.0.0.5",
      hostname: "",
      os: "unknown",
      service: "http-proxy",
      version: "unknown",
      business_function: "other",
      risk: "low",
    });
  });

  it("shows service detail in the detail and exposure tables", () => {
    const [ssh] = new Enricher().enrichHosts([
      host("10.0.0.3", {
        ports: [makeUnifiedPort({ port: 22, service: "ssh", version: "OpenSSH 8.9p1", extrainfo: "protocol 2.0" })],
      }),
    ]);
    const tables = analyze([ssh]);
    assert.equal(tables.table2[0].ports[0].version, "OpenSSH 8.9p1 (protocol 2.0)");
    assert.equal(tables.table4[0].hosts[0].version, "OpenSSH 8.9p1 (protocol 2.0)");
    assert.equal(tables.sorted_hosts[0].ports[0].version, "OpenSSH 8.9p1");
  });

  it("returns empty tables for no hosts", () => {
    const empty = analyze([]);
    assert.deepEqual(empty.table1, []);
    assert.deepEqual(empty.table3, []);
    assert.deepEqual(empty.subnets, []);
  });
});
