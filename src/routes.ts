/**
 * HTTP routes for the assessment service. server.ts owns the listening
 * socket; everything here works on plain headers and streams.
 */
import type { IncomingHttpHeaders, IncomingMessage, ServerResponse } from "node:http";
import type { Readable } from "node:stream";
import { Busboy } from "@fastify/busboy";
import { LOG_REQUESTS, SERVICE_NAME, SERVICE_VERSION, isRecord } from "./shared.js";
import { DESIGN_CODE, VEHICLE_PRESETS } from "./tools/bridge/catalog.js";
import { MATERIAL_KINDS, listGrades } from "./tools/bridge/material-catalog.js";
import { ACCESS_TYPES, BRIDGE_TYPES, LOADING_TYPES, type RawParams } from "./tools/bridge/params.js";
import { createAllToolDefinitions } from "./tools/index.js";
import { createBridgeAssessmentToolDefinition } from "./tools/bridge/bridge-assessment.js";

const MAX_JSON_BYTES = 1_000_000;

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

export interface RouteResponse {
  status: number;
  body: unknown;
}

// ─── Form fields ─────────────────────────────────────────────────────────────

export type FormFields = Map<string, string[]>;

/** Repeated form fields that are zipped row by row into list parameters */
const LOAD_COLUMNS: Record<string, string> = {
  load_description: "description",
  load_value: "value",
  load_type: "type",
  load_material: "load_material",
  load_distribution: "load_distribution",
};

const BAR_COLUMNS: Record<string, string> = {
  bar_count: "bar_count",
  bar_diameter: "bar_diameter",
  bar_cover: "cover",
};

/**
 * Collect every urlencoded or multipart field, keeping repeats in order.
 * File parts are drained and ignored.
 */
export function readFormFields(headers: IncomingHttpHeaders, stream: Readable): Promise<FormFields> {
  const contentType = headers["content-type"];
  if (!contentType) {
    return Promise.reject(new BadRequestError("Missing Content-Type header"));
  }

  return new Promise<FormFields>((resolve, reject) => {
    const fields: FormFields = new Map();
    try {
      const busboy = new Busboy({ headers: { ...headers, "content-type": contentType } });
      busboy.on("field", (name: string, value: string) => {
        const key = name.endsWith("[]") ? name.slice(0, -2) : name;
        const values = fields.get(key);
        if (values) values.push(value);
        else fields.set(key, [value]);
      });
      busboy.on("file", (_name: string, file: Readable) => {
        file.resume();
      });
      busboy.on("finish", () => resolve(fields));
      busboy.on("error", (err: Error) => reject(new BadRequestError(err.message)));
      // pipe() does not forward source failures
      stream.on("error", (err: Error) => reject(new BadRequestError(err.message)));
      stream.on("aborted", () => reject(new BadRequestError("Request aborted")));
      stream.pipe(busboy);
    } catch (err) {
      // Thrown for content types Busboy cannot parse
      reject(new BadRequestError(err instanceof Error ? err.message : String(err)));
    }
  });
}

function zipColumns(fields: FormFields, columns: Record<string, string>): RawParams[] {
  const names = Object.keys(columns);
  const rows = Math.max(0, ...names.map((name) => fields.get(name)?.length ?? 0));
  const result: RawParams[] = [];
  for (let i = 0; i < rows; i++) {
    const row: RawParams = {};
    let blank = true;
    for (const name of names) {
      const value = fields.get(name)?.[i] ?? "";
      if (value.trim() !== "") blank = false;
      row[columns[name] ?? name] = value;
    }
    if (!blank) result.push(row);
  }
  return result;
}

/** Flatten form fields into the engine's parameter mapping. Last value wins for scalars. */
export function formFieldsToParams(fields: FormFields): RawParams {
  const params: RawParams = {};
  for (const [name, values] of fields) {
    if (name in LOAD_COLUMNS || name in BAR_COLUMNS) continue;
    params[name] = values[values.length - 1];
  }
  const loads = zipColumns(fields, LOAD_COLUMNS);
  if (loads.length > 0) params.additional_loads = loads;
  const bars = zipColumns(fields, BAR_COLUMNS);
  if (bars.length > 0) params.reinforcement_layers = bars;
  return params;
}

// ─── Request bodies ──────────────────────────────────────────────────────────

/** Buffer the whole body and decode it once, so multi-byte characters survive chunk splits. */
export function readBody(stream: Readable, limit: number = MAX_JSON_BYTES): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    stream.on("data", (chunk: Buffer | string) => {
      const buf = typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk;
      size += buf.length;
      if (size > limit) {
        reject(new BadRequestError("Request body too large"));
        stream.destroy();
        return;
      }
      chunks.push(buf);
    });
    stream.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    stream.on("error", reject);
    stream.on("aborted", () => reject(new BadRequestError("Request aborted")));
  });
}

/** Read assessment parameters from a JSON, urlencoded or multipart body. */
export async function readAssessParams(
  headers: IncomingHttpHeaders,
  stream: Readable,
): Promise<RawParams> {
  const contentType = headers["content-type"] ?? "";
  if (contentType.includes("application/json")) {
    const body = await readBody(stream);
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new BadRequestError("Invalid JSON. Expected an object of assessment parameters.");
    }
    if (!isRecord(parsed)) {
      throw new BadRequestError("Invalid JSON. Expected an object of assessment parameters.");
    }
    return parsed;
  }
  if (contentType.includes("multipart/form-data") || contentType.includes("application/x-www-form-urlencoded")) {
    return formFieldsToParams(await readFormFields(headers, stream));
  }
  throw new BadRequestError(
    "Expected application/json, application/x-www-form-urlencoded or multipart/form-data",
  );
}

// ─── Handlers ────────────────────────────────────────────────────────────────

export async function assess(params: RawParams): Promise<RouteResponse> {
  const tool = createBridgeAssessmentToolDefinition();
  const { details } = await tool.execute("http", params);
  return { status: details.ok ? 200 : 422, body: details.record };
}

export function status(): RouteResponse {
  return {
    status: 200,
    body: {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      tools: createAllToolDefinitions().map((tool) => tool.name),
    },
  };
}

export function catalog(): RouteResponse {
  return {
    status: 200,
    body: {
      materials: Object.fromEntries(MATERIAL_KINDS.map((kind) => [kind, listGrades(kind)])),
      vehicles: VEHICLE_PRESETS,
      bridge_types: BRIDGE_TYPES,
      loading_types: LOADING_TYPES,
      access_types: ACCESS_TYPES,
      access_multipliers: DESIGN_CODE.access_multipliers,
    },
  };
}

// ─── Dispatch ────────────────────────────────────────────────────────────────

export function corsHeaders(): Record<string, string> {
  return {
    "Access-Control-Allow-Origin": "*",
    "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type",
  };
}

function jsonResponse(res: ServerResponse, status: number, data: unknown) {
  res.writeHead(status, { ...corsHeaders(), "Content-Type": "application/json" });
  res.end(JSON.stringify(data));
}

export async function route(
  method: string,
  pathname: string,
  headers: IncomingHttpHeaders,
  body: Readable,
): Promise<RouteResponse> {
  if (method === "POST" && pathname === "/api/assess") {
    try {
      return await assess(await readAssessParams(headers, body));
    } catch (err) {
      if (err instanceof BadRequestError) return { status: 400, body: { error: err.message } };
      throw err;
    }
  }
  if (method === "GET" && pathname === "/api/status") return status();
  if (method === "GET" && pathname === "/api/catalog") return catalog();
  return { status: 404, body: { error: "Not found" } };
}

export async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
  const started = Date.now();
  const url = new URL(req.url ?? "/", "http://localhost");
  const method = req.method?.toUpperCase() ?? "GET";

  // CORS preflight
  if (method === "OPTIONS") {
    res.writeHead(204, corsHeaders());
    res.end();
    return;
  }

  let response: RouteResponse;
  try {
    response = await route(method, url.pathname, req.headers, req);
  } catch (err) {
    console.error(`\x1b[31mError handling ${method} ${url.pathname}:\x1b[0m`, err);
    response = { status: 500, body: { error: err instanceof Error ? err.message : String(err) } };
  }

  jsonResponse(res, response.status, response.body);
  if (LOG_REQUESTS) {
    console.log(`\x1b[2m${method} ${url.pathname} ${response.status} (${Date.now() - started} ms)\x1b[0m`);
  }
}
