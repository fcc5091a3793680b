import { describe, expect, it } from "vitest";
import { assessBridge } from "./assessment.js";
import type { RawParams } from "./params.js";
import { toPresentationRecord } from "./presentation.js";

const shortSpan: RawParams = {
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

describe("toPresentationRecord", () => {
  it("produces the display fields for a passing member", () => {
    const record = toPresentationRecord(assessBridge(shortSpan));
    expect(Object.keys(record)).toEqual([
      "Moment Capacity (kNm)",
      "Shear Capacity (kN)",
      "Applied Dead Load Moment (kNm)",
      "Applied Live Load Moment (kNm)",
      "Applied Shear (kN)",
      "Span Length (m)",
      "Effective Member Length (m)",
      "Reduction Factor",
      "Loading Type",
      "HA UDL (kN/m)",
      "Additional Loads",
      "Calculation Process",
      "Result",
    ]);
    expect(record["Moment Capacity (kNm)"]).toBe(1562);
    expect(record["Shear Capacity (kN)"]).toBe(1298.29);
    expect(record["Applied Dead Load Moment (kNm)"]).toBe(0);
    expect(record["Applied Live Load Moment (kNm)"]).toBe(165.59);
    expect(record["Applied Shear (kN)"]).toBe(331.18);
    expect(record["Span Length (m)"]).toBe(2);
    expect(record["Reduction Factor"]).toBe(1);
    expect(record["HA UDL (kN/m)"]).toBe(211.18);
    expect(record["Additional Loads"]).toEqual([]);
    expect(record["Result"]).toBe("Pass");
  });

  it("numbers the calculation process lines", () => {
    const record = toPresentationRecord(assessBridge(shortSpan));
    const lines = record["Calculation Process"];
    expect(Array.isArray(lines)).toBe(true);
    if (!Array.isArray(lines)) return;
    expect(lines[0]).toBe("1. Bridge type: simply supported");
    expect(lines[1]).toBe("2. Span length: 2 m");
    expect(lines[lines.length - 1]).toBe(`${lines.length}. Result: Pass`);
  });

  it("adds self weight, vehicle and additional load fields when present", () => {
    const record = toPresentationRecord(
      assessBridge({
        ...shortSpan,
        span_length: 10,
        include_self_weight: true,
        vehicle_type: "3 tonne",
        additional_loads: [{ description: "Services", value: 0.8, type: "dead", load_material: "steel pipe" }],
      }),
    );
    expect(record["Self Weight Moment (kNm)"]).toBeCloseTo(17.325, 2);
    expect(record["Vehicle Maximum Moment (kNm)"]).toBeTypeOf("number");
    // rear axle at the support: 1.3 × (18 + 11 × 8/10)
    expect(record["Vehicle Maximum Shear (kN)"]).toBeCloseTo(34.84, 9);
    expect(record["Additional Loads"]).toEqual([
      { description: "Services", value: 0.8, type: "dead", load_material: "steel pipe", load_distribution: "uniform" },
    ]);
  });

  it("shows only the error message for a failed assessment", () => {
    expect(toPresentationRecord(assessBridge({ ...shortSpan, grade: "S999" }))).toEqual({
      Error: "Unknown steel grade 'S999'. Available: S235, S275, S355, S420, S460.",
    });
  });
});
