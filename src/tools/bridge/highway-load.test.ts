import { describe, expect, it } from "vitest";
import { InvalidLoadingParametersError } from "./errors.js";
import { computeHighwayLoad, haLaneIntensity, notionalLanes, type HighwayLoadParams } from "./highway-load.js";

const base: HighwayLoadParams = {
  loading_type: "HA",
  bridge_type: "simply_supported",
  span_length_m: 20,
  loaded_width_m: 7.3,
  lane_width_m: 3.65,
  access_type: "none",
  hb_units: 0,
};

describe("notionalLanes", () => {
  it("floors the lane count with a minimum of one", () => {
    expect(notionalLanes(7.3, 3.65)).toBe(2);
    expect(notionalLanes(10, 3.65)).toBe(2);
    expect(notionalLanes(3.65, 3.65)).toBe(1);
  });
});

describe("haLaneIntensity", () => {
  it("follows the short-span curve up to 50 m", () => {
    expect(haLaneIntensity(10)).toBeCloseTo(71.8355, 3);
    expect(haLaneIntensity(50)).toBeCloseTo(24.4360, 3);
  });

  it("switches to the long-span curve beyond 50 m", () => {
    expect(haLaneIntensity(100)).toBeCloseTo(22.7145, 3);
  });

  it("never increases with span", () => {
    let previous = Infinity;
    for (let span = 1; span <= 200; span += 0.5) {
      const w = haLaneIntensity(span);
      expect(w).toBeLessThanOrEqual(previous);
      previous = w;
    }
  });
});

describe("computeHighwayLoad", () => {
  it("computes HA UDL and KEL over all lanes", () => {
    const load = computeHighwayLoad(base);
    expect(load.notional_lanes).toBe(2);
    expect(load.access_multiplier).toBe(1);
    expect(load.udl_kn_m).toBeCloseTo(90.2982, 3);
    expect(load.kel_kn).toBe(240);
    expect(load.kel_position_m).toBe(10);
  });

  it("places the KEL at the free end of a cantilever", () => {
    expect(computeHighwayLoad({ ...base, bridge_type: "cantilever" }).kel_position_m).toBe(20);
  });

  it("scales HA by the access multiplier", () => {
    const none = computeHighwayLoad(base);
    const publicAccess = computeHighwayLoad({ ...base, access_type: "public" });
    expect(publicAccess.udl_kn_m).toBeCloseTo(none.udl_kn_m * 1.5, 9);
    expect(publicAccess.kel_kn).toBeCloseTo(360, 9);
  });

  it("shares HB units over the notional lanes", () => {
    const load = computeHighwayLoad({ ...base, loading_type: "HB", hb_units: 30 });
    expect(load.basic_intensity_kn_m).toBe(300);
    expect(load.udl_kn_m).toBe(150);
    expect(load.kel_kn).toBe(0);
  });

  it("rejects loaded width narrower than one lane", () => {
    try {
      computeHighwayLoad({ ...base, loaded_width_m: 3 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidLoadingParametersError);
      if (err instanceof InvalidLoadingParametersError) expect(err.field).toBe("loaded_width");
    }
  });

  it("rejects non-positive HB units", () => {
    expect(() => computeHighwayLoad({ ...base, loading_type: "HB", hb_units: 0 })).toThrow(/hb_units/);
  });

  it("rejects a non-positive lane width", () => {
    expect(() => computeHighwayLoad({ ...base, lane_width_m: 0 })).toThrow(InvalidLoadingParametersError);
  });
});
