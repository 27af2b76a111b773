import { describe, it, before, after } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { DEFAULT_CONFIG, loadConfig, parseConfig } from "../config.js";
import { makeTempDir } from "./helpers.js";

describe("config", () => {
  let dir: string;

  before(async () => {
    dir = await makeTempDir("config");
  });

  after(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(name: string, content: string): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, content);
    return file;
  }

  it("uses defaults without a path", async () => {
    assert.deepEqual(await loadConfig(), DEFAULT_CONFIG);
  });

  it("loads weights and the reference directory", async () => {
    const file = await writeConfig(
      "good.json",
      JSON.stringify({ risk_weights: { cve: 8, weak_cipher: 1 }, reference_dir: "/srv/reference" })
    );
    assert.deepEqual(await loadConfig(file), {
      risk_weights: { cve: 8, weak_cipher: 1 },
      reference_dir: "/srv/reference",
    });
  });

  it("falls back to defaults for a missing file", async () => {
    assert.deepEqual(await loadConfig(path.join(dir, "missing.json")), DEFAULT_CONFIG);
  });

  it("falls back to defaults for invalid JSON", async () => {
    const file = await writeConfig("broken.json", "{ risk_weights: ");
    assert.deepEqual(await loadConfig(file), DEFAULT_CONFIG);
  });

  it("falls back to defaults for negative weights", async () => {
    const file = await writeConfig("negative.json", JSON.stringify({ risk_weights: { port: -1 } }));
    assert.deepEqual(await loadConfig(file), DEFAULT_CONFIG);
  });

  it("rejects invalid values when parsed directly", () => {
    assert.throws(() => parseConfig({ reference_dir: "" }));
    assert.deepEqual(parseConfig({}), {});
  });
});
