/**
 * Moving two-axle vehicle envelope.
 *
 * For a simply supported span the moment under an axle peaks when midspan
 * bisects the distance between that axle and the resultant of the axle pair.
 * Both axles are tried in that position, together with the heavier axle alone
 * at midspan, and the largest moment is kept. Maximum shear has one axle over
 * a support and the other one axle spacing into the span.
 */
import { InvalidVehicleSpacingError, ValidationError } from "./errors.js";
import type { BridgeType, LoadSharing } from "./types.js";

export interface VehicleEnvelopeParams {
  span_m: number;
  front_axle_kn: number;
  rear_axle_kn: number;
  axle_spacing_m: number;
  impact_factor: number;
  dispersion_percent: number;
  sharing: LoadSharing;
  bridge_type?: BridgeType;
}

export type GoverningAxle = "front" | "rear" | "none";

export interface VehicleEnvelope {
  max_moment_knm: number;
  max_shear_kn: number;
  /** Position of the governing axle measured from the left (or fixed) support (m) */
  critical_position_m: number;
  governing_axle: GoverningAxle;
  /** Both axles on the span at the critical position */
  both_axles_on_span: boolean;
  /** impact × (1 − dispersion/100) × sharing */
  load_factor: number;
  front_axle_kn: number;
  rear_axle_kn: number;
}

const zeroEnvelope: VehicleEnvelope = {
  max_moment_knm: 0,
  max_shear_kn: 0,
  critical_position_m: 0,
  governing_axle: "none",
  both_axles_on_span: false,
  load_factor: 0,
  front_axle_kn: 0,
  rear_axle_kn: 0,
};

export const ZERO_ENVELOPE = Object.freeze(zeroEnvelope);

export const SHARING_FACTORS: Record<LoadSharing, number> = {
  full: 1.0,
  per_beam: 0.5,
};

interface Candidate {
  moment: number;
  position: number;
  axle: GoverningAxle;
  bothOnSpan: boolean;
}

function validate(p: VehicleEnvelopeParams): void {
  if (!Number.isFinite(p.span_m) || p.span_m <= 0) {
    throw new ValidationError("span_length", `span_length must be a positive number (received ${p.span_m}).`);
  }
  if (!Number.isFinite(p.axle_spacing_m) || p.axle_spacing_m <= 0) {
    throw new ValidationError(
      "axle_spacing",
      `axle_spacing must be a positive number (received ${p.axle_spacing_m}).`,
    );
  }
  if (p.axle_spacing_m >= p.span_m) {
    throw new InvalidVehicleSpacingError(
      `axle_spacing (${p.axle_spacing_m} m) must be less than span_length (${p.span_m} m) for both axles to fit on the span.`,
    );
  }
  if (!Number.isFinite(p.front_axle_kn) || p.front_axle_kn < 0) {
    throw new ValidationError("front_axle_load", "front_axle_load must be zero or a positive number.");
  }
  if (!Number.isFinite(p.rear_axle_kn) || p.rear_axle_kn < 0) {
    throw new ValidationError("rear_axle_load", "rear_axle_load must be zero or a positive number.");
  }
  if (!Number.isFinite(p.impact_factor) || p.impact_factor <= 0) {
    throw new ValidationError("impact_factor", "impact_factor must be a positive number.");
  }
  if (!Number.isFinite(p.dispersion_percent) || p.dispersion_percent < 0 || p.dispersion_percent >= 100) {
    throw new ValidationError("dispersion", "dispersion must be a percentage from 0 up to (but excluding) 100.");
  }
}

export function vehicleLoadFactor(p: VehicleEnvelopeParams): number {
  return p.impact_factor * (1 - p.dispersion_percent / 100) * SHARING_FACTORS[p.sharing];
}

function simplySupportedEnvelope(L: number, P1: number, P2: number, s: number): {
  best: Candidate;
  shear: number;
} {
  const R = P1 + P2;
  const candidates: Candidate[] = [];

  // Rear axle at x, front axle at x + s. Resultant lies s·P1/R ahead of the rear axle.
  const rearToResultant = (s * P1) / R;
  const xRear = L / 2 - rearToResultant / 2;
  if (xRear >= 0 && xRear + s <= L) {
    const leftReaction = (R * (L - (xRear + rearToResultant))) / L;
    candidates.push({ moment: leftReaction * xRear, position: xRear, axle: "rear", bothOnSpan: true });
  }

  // Front axle at y, rear axle at y − s. Resultant lies s·P2/R behind the front axle.
  const frontToResultant = (s * P2) / R;
  const yFront = L / 2 + frontToResultant / 2;
  if (yFront <= L && yFront - s >= 0) {
    const rightReaction = (R * (yFront - frontToResultant)) / L;
    candidates.push({
      moment: rightReaction * (L - yFront),
      position: yFront,
      axle: "front",
      bothOnSpan: true,
    });
  }

  // Heavier axle alone at midspan
  const heavier: GoverningAxle = P2 >= P1 ? "rear" : "front";
  candidates.push({ moment: (Math.max(P1, P2) * L) / 4, position: L / 2, axle: heavier, bothOnSpan: false });

  let best: Candidate = candidates[0] ?? { moment: 0, position: 0, axle: "none", bothOnSpan: false };
  for (const c of candidates) {
    if (c.moment > best.moment) best = c;
  }

  const shearRearAtSupport = P2 + (P1 * (L - s)) / L;
  const shearFrontAtSupport = P1 + (P2 * (L - s)) / L;

  return { best, shear: Math.max(shearRearAtSupport, shearFrontAtSupport) };
}

function cantileverEnvelope(L: number, P1: number, P2: number, s: number): {
  best: Candidate;
  shear: number;
} {
  // Heavier axle at the free end, the other one spacing back towards the root
  const heavierIsRear = P2 >= P1;
  const heavy = heavierIsRear ? P2 : P1;
  const light = heavierIsRear ? P1 : P2;
  return {
    best: {
      moment: heavy * L + light * (L - s),
      position: L,
      axle: heavierIsRear ? "rear" : "front",
      bothOnSpan: true,
    },
    shear: P1 + P2,
  };
}

export function maxVehicleEnvelope(params: VehicleEnvelopeParams): VehicleEnvelope {
  validate(params);

  const factor = vehicleLoadFactor(params);
  const P1 = params.front_axle_kn * factor;
  const P2 = params.rear_axle_kn * factor;
  if (P1 + P2 === 0) {
    return { ...ZERO_ENVELOPE, load_factor: factor };
  }

  const L = params.span_m;
  const s = params.axle_spacing_m;
  const { best, shear } =
    params.bridge_type === "cantilever"
      ? cantileverEnvelope(L, P1, P2, s)
      : simplySupportedEnvelope(L, P1, P2, s);

  return {
    max_moment_knm: best.moment,
    max_shear_kn: shear,
    critical_position_m: best.position,
    governing_axle: best.axle,
    both_axles_on_span: best.bothOnSpan,
    load_factor: factor,
    front_axle_kn: P1,
    rear_axle_kn: P2,
  };
}
