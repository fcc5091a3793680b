/**
 * Effective length and lateral-torsional buckling reduction for steel members.
 */
import { DESIGN_CODE, type SlendernessCurve } from "./catalog.js";
import { ValidationError } from "./errors.js";
import type { MaterialSpec, SectionGeometry } from "./types.js";

export interface EffectiveLengthResult {
  /** k1 · k2 · actual length (m) */
  effective_length_m: number;
  /** Normalised slenderness (le/ry)·√(fy/355); 0 for non-steel members */
  slenderness: number;
  reduction_factor: number;
}

/**
 * Linear interpolation on a slenderness/reduction curve. Below the first
 * point the first factor applies; beyond the last point the curve's floor.
 */
export function interpolateReduction(curve: SlendernessCurve, slenderness: number): number {
  const first = curve[0];
  const last = curve[curve.length - 1];
  if (!first || !last) return 1;
  if (slenderness <= first[0]) return first[1];
  if (slenderness >= last[0]) return last[1];

  for (let i = 1; i < curve.length; i++) {
    const lo = curve[i - 1];
    const hi = curve[i];
    if (!lo || !hi) continue;
    if (slenderness <= hi[0]) {
      const t = (slenderness - lo[0]) / (hi[0] - lo[0]);
      return lo[1] + t * (hi[1] - lo[1]);
    }
  }
  return last[1];
}

export function resolveEffectiveLength(
  material: MaterialSpec,
  section: SectionGeometry,
  actualLengthM: number,
  k1: number,
  k2: number,
  curve: SlendernessCurve = DESIGN_CODE.steel.slenderness_curve,
): EffectiveLengthResult {
  if (!Number.isFinite(actualLengthM) || actualLengthM <= 0) {
    throw new ValidationError(
      "effective_member_length",
      `effective_member_length must be a positive number (received ${actualLengthM}).`,
    );
  }
  if (!Number.isFinite(k1) || k1 <= 0) {
    throw new ValidationError("k1", `k1 must be a positive number (received ${k1}).`);
  }
  if (!Number.isFinite(k2) || k2 <= 0) {
    throw new ValidationError("k2", `k2 must be a positive number (received ${k2}).`);
  }

  const le = k1 * k2 * actualLengthM;

  if (material.kind !== "steel" || section.kind !== "steel") {
    return { effective_length_m: le, slenderness: 0, reduction_factor: 1 };
  }

  const leOverRy = (le * 1000) / section.ry_mm;
  const slenderness = leOverRy * Math.sqrt(material.fy_mpa / DESIGN_CODE.steel.reference_yield_mpa);
  const factor = Math.min(1, interpolateReduction(curve, slenderness));

  return { effective_length_m: le, slenderness, reduction_factor: factor };
}
