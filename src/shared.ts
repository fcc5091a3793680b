/**
 * Shared setup code used by both the CLI (entry.ts) and the web server (server.ts).
 */
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

// ─── .env loading ────────────────────────────────────────────────────────────

export function loadDotEnv(envPath: string = path.join(process.cwd(), ".env")) {
  if (!fs.existsSync(envPath)) return;
  const content = fs.readFileSync(envPath, "utf-8");
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    const value = trimmed.slice(eqIdx + 1).trim();
    if (key && !(key in process.env)) {
      process.env[key] = value;
    }
  }
}

// Load .env immediately so env vars are available for module-level constants
loadDotEnv();

// ─── Configuration ───────────────────────────────────────────────────────────

export const SERVICE_NAME = "bridge-assess";
export const SERVICE_VERSION = "0.1.0";

export const PORT = parseInt(process.env.PORT ?? "3001", 10);
export const LOG_REQUESTS = (process.env.BRIDGE_LOG_REQUESTS ?? "true") !== "false";

/** Nearest data/ directory above `fromDir`: src/ runs one level below it, dist/src/ two. */
export function findDataDir(fromDir: string): string {
  let dir = fromDir;
  for (;;) {
    const candidate = path.join(dir, "data");
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve(fromDir, "../data");
    dir = parent;
  }
}

export const DATA_DIR = findDataDir(path.dirname(fileURLToPath(import.meta.url)));

/** Env-supplied paths are relative to the working directory. */
export function resolveEnvPath(value: string | undefined, fallback: string): string {
  return value ? path.resolve(process.cwd(), value) : fallback;
}

/** Alternative design-code coefficients file; defaults to data/design-code.json */
export const DESIGN_CODE_FILE = resolveEnvPath(
  process.env.BRIDGE_DESIGN_CODE_FILE,
  path.join(DATA_DIR, "design-code.json"),
);

// ─── Data files ──────────────────────────────────────────────────────────────

/**
 * Read and parse a JSON file. Bare names resolve inside DATA_DIR.
 */
export function readJsonFile(fileOrName: string): unknown {
  const filePath = path.isAbsolute(fileOrName) ? fileOrName : path.join(DATA_DIR, fileOrName);
  const raw = fs.readFileSync(filePath, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse ${filePath}: ${reason}`);
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
