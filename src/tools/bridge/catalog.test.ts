import { describe, expect, it } from "vitest";
import { isRecord, readJsonFile } from "../../shared.js";
import { DESIGN_CODE, VEHICLE_PRESETS, parseDesignCode, parseVehiclePresets } from "./catalog.js";

function designCodeWith(curve: unknown): unknown {
  const raw = readJsonFile("design-code.json");
  if (!isRecord(raw) || !isRecord(raw.steel)) throw new Error("design-code.json must be an object");
  return { ...raw, steel: { ...raw.steel, slenderness_curve: curve } };
}

describe("catalog", () => {
  it("loads the vehicle presets", () => {
    expect(VEHICLE_PRESETS.map((preset) => preset.name)).toEqual(["3 tonne", "7.5 tonne", "18 tonne"]);
    expect(VEHICLE_PRESETS[2]).toEqual({
      name: "18 tonne",
      front_axle_kn: 64,
      rear_axle_kn: 113,
      axle_spacing_m: 3,
      impact_factor: 1.3,
    });
  });

  it("freezes the design code", () => {
    expect(Object.isFrozen(DESIGN_CODE)).toBe(true);
    expect(Object.isFrozen(DESIGN_CODE.access_multipliers)).toBe(true);
    expect(DESIGN_CODE.access_multipliers).toEqual({ none: 1, company: 1.3, public: 1.5 });
  });

  it("rejects a slenderness curve that rises", () => {
    expect(() => parseDesignCode(designCodeWith([[0, 0.9], [50, 1]]))).toThrow(/must not increase/);
  });

  it("rejects a slenderness curve out of order", () => {
    expect(() => parseDesignCode(designCodeWith([[50, 1], [20, 0.9]]))).toThrow(/strictly increasing/);
  });

  it("names the missing vehicle field", () => {
    expect(() => parseVehiclePresets({ van: { front_axle_kn: 10, rear_axle_kn: 12 } })).toThrow(
      'vehicles["van"].axle_spacing_m must be a finite number.',
    );
  });
});
