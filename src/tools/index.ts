/**
 * Barrel file: exports all tool definitions for bridge-assess.
 *
 * Each tool follows the pattern: createXxxToolDefinition() → ToolDefinition
 */

// ─── Bridge ─────────────────────────────────────────────────────────────────
import { createBridgeAssessmentToolDefinition } from "./bridge/bridge-assessment.js";

export { createBridgeAssessmentToolDefinition };

// ─── Convenience: build all tools at once ───────────────────────────────────

export function createAllToolDefinitions() {
  return [
    // Bridge
    createBridgeAssessmentToolDefinition(),
  ];
}

export type ToolDefinition = ReturnType<typeof createAllToolDefinitions>[number];
