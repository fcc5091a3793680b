/**
 * Bridge member assessment tool.
 *
 * Checks a steel, reinforced concrete or timber bridge member against HA/HB
 * highway loading, an optional two-axle vehicle and additional dead/live
 * loads. Reports moment and shear capacity, applied effects, a numbered
 * calculation narrative and a Pass/Fail verdict.
 */
import { isRecord, round } from "../../shared.js";
import { assessBridge, type AssessmentOutcome } from "./assessment.js";
import { VEHICLE_PRESETS } from "./catalog.js";
import { MATERIAL_KINDS } from "./material-catalog.js";
import { formatNarrative } from "./narrative.js";
import {
  ACCESS_TYPES,
  BRIDGE_TYPES,
  DURATIONS,
  EXPOSURES,
  LOADING_TYPES,
  SHARING_MODES,
  STEEL_SHAPES,
} from "./params.js";
import { toPresentationRecord, type PresentationRecord } from "./presentation.js";

export interface ToolContent {
  type: "text";
  text: string;
}

export interface BridgeAssessmentToolResult {
  content: ToolContent[];
  details: {
    ok: boolean;
    result: "Pass" | "Fail" | "Error";
    record: PresentationRecord;
    outcome: AssessmentOutcome;
  };
}

// ─── Summary text ────────────────────────────────────────────────────────────

export function summarizeOutcome(outcome: AssessmentOutcome): string {
  if (!outcome.ok) {
    const field = outcome.error.field ? ` [${outcome.error.field}]` : "";
    return `Bridge Assessment: ERROR (${outcome.error.kind}${field})\n${outcome.error.message}`;
  }

  const { input, capacity, demand, vehicle } = outcome;
  const lines = [
    `Bridge Assessment: ${input.bridge_type.replace(/_/g, " ")} | Span: ${input.span_length_m} m`,
    `Member: ${input.member.kind} ${outcome.material.grade} | Loading: ${outcome.highway.loading_type}`,
    ``,
    `Capacity:`,
    `  Moment: ${round(capacity.moment_capacity_knm, 2)} kN·m`,
    `  Shear: ${round(capacity.shear_capacity_kn, 2)} kN`,
    ``,
    `Demand:`,
    `  Dead moment: ${round(demand.dead_moment_knm, 2)} kN·m`,
    `  Live moment: ${round(demand.live_moment_knm, 2)} kN·m`,
    `  Shear: ${round(demand.total_shear_kn, 2)} kN`,
  ];
  if (vehicle) {
    lines.push(
      `  Vehicle: ${round(vehicle.max_moment_knm, 2)} kN·m / ${round(vehicle.max_shear_kn, 2)} kN`,
    );
  }
  lines.push(
    ``,
    `Utilisation: moment ${outcome.moment_utilisation.toFixed(3)}, shear ${outcome.shear_utilisation.toFixed(3)}`,
    ``,
    `Calculation:`,
    ...formatNarrative(outcome.steps).map((line) => `  ${line}`),
    ``,
    `Result: ${outcome.passed ? "Pass" : "Fail"}`,
  );
  return lines.join("\n");
}

// ─── Tool definition ─────────────────────────────────────────────────────────

export function createBridgeAssessmentToolDefinition() {
  return {
    name: "bridge_assessment",
    label: "Bridge Member Assessment",
    description:
      "Assess the moment and shear capacity of a bridge member (steel I/box girder, reinforced " +
      "concrete beam or timber beam) against HA or HB highway loading, an optional two-axle " +
      "vehicle and additional dead/live loads. Returns capacities, applied effects, a numbered " +
      "calculation narrative and a Pass/Fail result.",
    parameters: {
      type: "object",
      properties: {
        bridge_type: { type: "string", enum: [...BRIDGE_TYPES], description: "Support condition." },
        span_length: { type: "number", exclusiveMinimum: 0, description: "Span length in meters." },
        effective_member_length: {
          type: "number",
          exclusiveMinimum: 0,
          description: "Member length used for lateral-torsional buckling. Defaults to the span.",
        },
        material: { type: "string", enum: [...MATERIAL_KINDS] },
        grade: { type: "string", description: "Material grade, e.g. 'S355', 'C32/40', 'C24'." },
        section_shape: { type: "string", enum: [...STEEL_SHAPES], description: "Steel only. Default i_beam." },
        flange_width: { type: "number", description: "Steel flange width (mm)." },
        flange_thickness: { type: "number", description: "Steel flange thickness (mm)." },
        web_thickness: { type: "number", description: "Steel web thickness (mm)." },
        beam_depth: { type: "number", description: "Overall member depth (mm)." },
        beam_width: { type: "number", description: "Concrete or timber member width (mm)." },
        k1: { type: "number", description: "Steel effective length factor k1. Default 1." },
        k2: { type: "number", description: "Steel effective length factor k2. Default 1." },
        reinforcement_layers: {
          type: "array",
          description: "Concrete tension steel, one entry per layer.",
          items: {
            type: "object",
            properties: {
              bar_count: { type: "integer", minimum: 1 },
              bar_diameter: { type: "number", description: "Bar diameter (mm)." },
              cover: { type: "number", description: "Tension face to layer centroid (mm)." },
            },
            required: ["bar_count", "bar_diameter", "cover"],
          },
        },
        reinforcement_strength: { type: "number", description: "Reinforcement yield strength (MPa). Default 500." },
        exposure: { type: "string", enum: [...EXPOSURES], description: "Timber only. Default dry." },
        load_duration: { type: "string", enum: [...DURATIONS], description: "Timber only. Default long." },
        loading_type: { type: "string", enum: [...LOADING_TYPES] },
        loaded_width: { type: "number", description: "Carriageway width carrying highway load (m)." },
        lane_width: { type: "number", description: "Notional lane width (m)." },
        access_type: { type: "string", enum: [...ACCESS_TYPES], description: "Default none." },
        hb_units: { type: "number", description: "HB units. Default 30." },
        condition_factor: { type: "number", exclusiveMinimum: 0, maximum: 1 },
        vehicle_type: {
          type: "string",
          enum: ["none", "custom", ...VEHICLE_PRESETS.map((preset) => preset.name)],
        },
        front_axle_load: { type: "number", description: "Front axle load (kN)." },
        rear_axle_load: { type: "number", description: "Rear axle load (kN)." },
        axle_spacing: { type: "number", description: "Axle spacing (m)." },
        impact_factor: { type: "number", description: "Default 1.0." },
        dispersion: { type: "number", description: "Load dispersion reduction (%). Default 0." },
        load_sharing: { type: "string", enum: [...SHARING_MODES], description: "Default full." },
        include_self_weight: { type: "boolean" },
        load_factor_dead: { type: "number" },
        load_factor_live: { type: "number" },
        safety_factor_steel: { type: "number" },
        safety_factor_concrete: { type: "number" },
        safety_factor_reinforcement: { type: "number" },
        safety_factor_concrete_shear: { type: "number" },
        safety_factor_timber: { type: "number" },
        additional_loads: {
          type: "array",
          items: {
            type: "object",
            properties: {
              description: { type: "string" },
              value: { type: "number", minimum: 0, description: "kN/m (uniform) or kN (point)." },
              type: { type: "string", enum: ["dead", "live"] },
              load_material: { type: "string" },
              load_distribution: { type: "string", enum: ["uniform", "point"] },
            },
            required: ["value", "type"],
          },
        },
      },
      required: [
        "bridge_type",
        "span_length",
        "material",
        "grade",
        "beam_depth",
        "loading_type",
        "loaded_width",
        "lane_width",
        "condition_factor",
      ],
    },
    execute: async (_toolCallId: string, args: unknown): Promise<BridgeAssessmentToolResult> => {
      const params = isRecord(args) ? args : {};
      const outcome = assessBridge(params);
      const record = toPresentationRecord(outcome);

      return {
        content: [
          { type: "text", text: summarizeOutcome(outcome) },
          { type: "text", text: JSON.stringify(record, null, 2) },
        ],
        details: {
          ok: outcome.ok,
          result: outcome.ok ? (outcome.passed ? "Pass" : "Fail") : "Error",
          record,
          outcome,
        },
      };
    },
  };
}
