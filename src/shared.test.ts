import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { findDataDir, loadDotEnv, readJsonFile, resolveEnvPath, round } from "./shared.js";

describe("loadDotEnv", () => {
  const keys = ["BRIDGE_TEST_ALPHA", "BRIDGE_TEST_BETA"];

  afterEach(() => {
    for (const key of keys) delete process.env[key];
  });

  it("sets unset variables and skips comments", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bridge-env-"));
    const file = path.join(dir, ".env");
    fs.writeFileSync(file, "# comment\nBRIDGE_TEST_ALPHA = one\n\nnot a pair\nBRIDGE_TEST_BETA=two=2\n");
    process.env.BRIDGE_TEST_BETA = "kept";

    loadDotEnv(file);

    expect(process.env.BRIDGE_TEST_ALPHA).toBe("one");
    expect(process.env.BRIDGE_TEST_BETA).toBe("kept");
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("ignores a missing file", () => {
    expect(() => loadDotEnv(path.join(os.tmpdir(), "no-such-dir", ".env"))).not.toThrow();
  });
});

describe("readJsonFile", () => {
  it("resolves bare names in the data directory", () => {
    const vehicles = readJsonFile("vehicles.json");
    expect(vehicles).toHaveProperty("3 tonne");
  });

  it("names the file when parsing fails", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bridge-json-"));
    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, "{ broken");
    expect(() => readJsonFile(file)).toThrow(`Failed to parse ${file}`);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe("round", () => {
  it("rounds to the given decimals", () => {
    expect(round(1298.2857142857, 2)).toBe(1298.29);
    expect(round(0.16723582, 3)).toBe(0.167);
  });
});

describe("findDataDir", () => {
  it("finds data/ two levels up, as from dist/src", () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "bridge-data-"));
    fs.mkdirSync(path.join(root, "data"));
    const nested = path.join(root, "dist", "src");
    fs.mkdirSync(nested, { recursive: true });

    expect(findDataDir(nested)).toBe(path.join(root, "data"));
    fs.rmSync(root, { recursive: true, force: true });
  });
});

describe("resolveEnvPath", () => {
  it("resolves a relative value against the working directory", () => {
    expect(resolveEnvPath("config/code.json", "/fallback.json")).toBe(path.resolve(process.cwd(), "config/code.json"));
  });

  it("keeps an absolute value and falls back when unset or empty", () => {
    const absolute = path.join(os.tmpdir(), "code.json");
    expect(resolveEnvPath(absolute, "/fallback.json")).toBe(absolute);
    expect(resolveEnvPath(undefined, "/fallback.json")).toBe("/fallback.json");
    expect(resolveEnvPath("", "/fallback.json")).toBe("/fallback.json");
  });
});
