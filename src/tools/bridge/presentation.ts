/**
 * Flat, display-ready record for presentation layers (HTML, PDF, CLI).
 * Field names are stable and consumed verbatim.
 */
import { round } from "../../shared.js";
import type { AssessmentOutcome } from "./assessment.js";
import { formatNarrative } from "./narrative.js";
import type { LoadDistribution, LoadNature } from "./types.js";

export interface AdditionalLoadRow {
  description: string;
  value: number;
  type: LoadNature;
  load_material: string;
  load_distribution: LoadDistribution;
}

export type PresentationValue = number | string | string[] | AdditionalLoadRow[];
export type PresentationRecord = Record<string, PresentationValue>;

export function toPresentationRecord(outcome: AssessmentOutcome): PresentationRecord {
  if (!outcome.ok) {
    return { Error: outcome.error.message };
  }

  const { input, demand, capacity, highway, vehicle } = outcome;
  const record: PresentationRecord = {
    "Moment Capacity (kNm)": round(capacity.moment_capacity_knm, 2),
    "Shear Capacity (kN)": round(capacity.shear_capacity_kn, 2),
    "Applied Dead Load Moment (kNm)": round(demand.dead_moment_knm, 2),
    "Applied Live Load Moment (kNm)": round(demand.live_moment_knm, 2),
    "Applied Shear (kN)": round(demand.total_shear_kn, 2),
  };

  if (input.include_self_weight) {
    record["Self Weight Moment (kNm)"] = round(demand.self_weight_moment_knm, 2);
  }
  if (vehicle) {
    record["Vehicle Maximum Moment (kNm)"] = round(vehicle.max_moment_knm, 2);
    record["Vehicle Maximum Shear (kN)"] = round(vehicle.max_shear_kn, 2);
  }

  record["Span Length (m)"] = input.span_length_m;
  record["Effective Member Length (m)"] = round(outcome.effective_length.effective_length_m, 3);
  record["Reduction Factor"] = round(outcome.effective_length.reduction_factor, 3);
  record["Loading Type"] = highway.loading_type;
  record[`${highway.loading_type} UDL (kN/m)`] = round(highway.udl_kn_m, 2);
  record["Additional Loads"] = input.load_cases.map((lc) => ({
    description: lc.description,
    value: lc.magnitude,
    type: lc.type,
    load_material: lc.load_material,
    load_distribution: lc.distribution,
  }));
  record["Calculation Process"] = formatNarrative(outcome.steps);
  record["Result"] = outcome.passed ? "Pass" : "Fail";

  return record;
}
