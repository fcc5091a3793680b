import { describe, expect, it } from "vitest";
import { InvalidVehicleSpacingError, ValidationError } from "./errors.js";
import { maxVehicleEnvelope, vehicleLoadFactor, type VehicleEnvelopeParams } from "./vehicle-envelope.js";

const eighteenTonne: VehicleEnvelopeParams = {
  span_m: 12,
  front_axle_kn: 64,
  rear_axle_kn: 113,
  axle_spacing_m: 3,
  impact_factor: 1.3,
  dispersion_percent: 0,
  sharing: "per_beam",
};

describe("vehicleLoadFactor", () => {
  it("combines impact, dispersion and sharing", () => {
    expect(vehicleLoadFactor(eighteenTonne)).toBeCloseTo(0.65, 12);
    expect(vehicleLoadFactor({ ...eighteenTonne, dispersion_percent: 20, sharing: "full" })).toBeCloseTo(1.04, 12);
  });
});

describe("maxVehicleEnvelope", () => {
  it("finds the critical position for an 18 tonne vehicle with per-beam sharing", () => {
    const envelope = maxVehicleEnvelope(eighteenTonne);
    expect(envelope.front_axle_kn).toBeCloseTo(41.6, 9);
    expect(envelope.rear_axle_kn).toBeCloseTo(73.45, 9);
    expect(envelope.governing_axle).toBe("rear");
    expect(envelope.both_axles_on_span).toBe(true);
    expect(envelope.critical_position_m).toBeCloseTo(5.457627, 5);
    expect(envelope.max_moment_knm).toBeCloseTo(285.5703, 3);
    expect(envelope.max_shear_kn).toBeCloseTo(104.65, 9);
  });

  it("matches the closed form for equal axles", () => {
    const P = 100;
    const L = 10;
    const s = 2;
    const envelope = maxVehicleEnvelope({
      span_m: L,
      front_axle_kn: P,
      rear_axle_kn: P,
      axle_spacing_m: s,
      impact_factor: 1,
      dispersion_percent: 0,
      sharing: "full",
    });
    const R = 2 * P;
    expect(envelope.max_moment_knm).toBeCloseTo((R / L) * Math.pow(L / 2 - s / 4, 2), 9);
    expect(envelope.max_moment_knm).toBeCloseTo(405, 9);
    expect(envelope.critical_position_m).toBeCloseTo(4.5, 12);
    expect(envelope.max_shear_kn).toBeCloseTo(180, 9);
  });

  it("keeps the single heavy axle when the light axle adds little", () => {
    const envelope = maxVehicleEnvelope({
      span_m: 4,
      front_axle_kn: 5,
      rear_axle_kn: 100,
      axle_spacing_m: 3.5,
      impact_factor: 1,
      dispersion_percent: 0,
      sharing: "full",
    });
    expect(envelope.both_axles_on_span).toBe(false);
    expect(envelope.governing_axle).toBe("rear");
    expect(envelope.max_moment_knm).toBeCloseTo(100, 9);
  });

  it("loads a cantilever with the heavier axle at the tip", () => {
    const envelope = maxVehicleEnvelope({
      span_m: 6,
      front_axle_kn: 20,
      rear_axle_kn: 40,
      axle_spacing_m: 2,
      impact_factor: 1,
      dispersion_percent: 0,
      sharing: "full",
      bridge_type: "cantilever",
    });
    expect(envelope.max_moment_knm).toBe(40 * 6 + 20 * 4);
    expect(envelope.max_shear_kn).toBe(60);
    expect(envelope.critical_position_m).toBe(6);
  });

  it("returns a zero envelope for zero axle loads", () => {
    const envelope = maxVehicleEnvelope({ ...eighteenTonne, front_axle_kn: 0, rear_axle_kn: 0 });
    expect(envelope.max_moment_knm).toBe(0);
    expect(envelope.max_shear_kn).toBe(0);
    expect(envelope.governing_axle).toBe("none");
  });

  it("rejects axle spacing at or beyond the span", () => {
    expect(() => maxVehicleEnvelope({ ...eighteenTonne, axle_spacing_m: 12 })).toThrow(InvalidVehicleSpacingError);
    expect(() => maxVehicleEnvelope({ ...eighteenTonne, axle_spacing_m: 15 })).toThrow(InvalidVehicleSpacingError);
  });

  it("rejects a dispersion of 100 percent or more", () => {
    expect(() => maxVehicleEnvelope({ ...eighteenTonne, dispersion_percent: 100 })).toThrow(ValidationError);
  });
});
