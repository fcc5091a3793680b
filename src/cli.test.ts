import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseArgs, run } from "./cli.js";

const shortSpan = {
  bridge_type: "simply_supported",
  span_length: 2,
  material: "steel",
  grade: "S355",
  flange_width: 300,
  flange_thickness: 20,
  web_thickness: 10,
  beam_depth: 640,
  loading_type: "HA",
  loaded_width: 3.65,
  lane_width: 3.65,
  condition_factor: 1,
};

describe("parseArgs", () => {
  it("reads the input path and --json flag", () => {
    expect(parseArgs(["input.json", "--json"])).toEqual({ inputPath: "input.json", json: true });
    expect(parseArgs(["input.json"])).toEqual({ inputPath: "input.json", json: false });
  });

  it("rejects a missing or extra path", () => {
    expect(parseArgs([])).toBeNull();
    expect(parseArgs(["a.json", "b.json"])).toBeNull();
  });
});

describe("run", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "bridge-assess-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeInput(params: unknown): string {
    const file = path.join(dir, "input.json");
    fs.writeFileSync(file, JSON.stringify(params));
    return file;
  }

  it("prints the JSON record and exits 0 for a completed assessment", async () => {
    const code = await run([writeInput(shortSpan), "--json"]);
    expect(code).toBe(0);
    const printed = JSON.parse(String(vi.mocked(console.log).mock.calls[0]?.[0]));
    expect(printed.Result).toBe("Pass");
  });

  it("exits 1 for an error outcome", async () => {
    const code = await run([writeInput({ ...shortSpan, grade: "S999" })]);
    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("exits 2 for a file that is not a parameter object", async () => {
    expect(await run([writeInput([1, 2, 3])])).toBe(2);
    expect(await run([path.join(dir, "missing.json")])).toBe(2);
  });

  it("prints usage without arguments", async () => {
    expect(await run([])).toBe(2);
    expect(console.error).toHaveBeenCalledWith("Usage: bridge-assess <input.json> [--json]");
  });
});
