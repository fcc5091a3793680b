#!/usr/bin/env node
/**
 * bridge-assess web server: JSON/form HTTP backend for member assessments.
 */
import http from "node:http";
import { DESIGN_CODE_FILE, PORT, SERVICE_NAME, SERVICE_VERSION } from "./shared.js";
import { handleRequest } from "./routes.js";
import { createAllToolDefinitions } from "./tools/index.js";

const toolNames = createAllToolDefinitions().map((tool) => tool.name);

const server = http.createServer((req, res) => {
  handleRequest(req, res).catch((err: unknown) => {
    console.error(`\x1b[31mUnhandled request error:\x1b[0m`, err);
    if (!res.headersSent) res.writeHead(500);
    res.end();
  });
});

server.listen(PORT, () => {
  console.log(`\x1b[2m┌ ${SERVICE_NAME} web server v${SERVICE_VERSION}\x1b[0m`);
  console.log(`\x1b[2m│ http://localhost:${PORT}\x1b[0m`);
  console.log(`\x1b[2m│ design code: ${DESIGN_CODE_FILE}\x1b[0m`);
  console.log(`\x1b[2m└ tools: ${toolNames.join(", ")}\x1b[0m`);
});
