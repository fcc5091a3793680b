/**
 * Load combination into dead and live moment/shear demand.
 *
 * Simply supported: UDL M = wL²/8, V = wL/2; point load at midspan
 * M = PL/4, V = P. Cantilever: UDL M = wL²/2, V = wL; point load at the
 * free end M = PL, V = P.
 */
import { ValidationError } from "./errors.js";
import type { HighwayLoad } from "./highway-load.js";
import type { BridgeType, LoadCase, LoadDistribution, LoadNature } from "./types.js";
import type { VehicleEnvelope } from "./vehicle-envelope.js";

export interface LoadEffect {
  moment_knm: number;
  shear_kn: number;
}

export interface LoadContribution extends LoadEffect {
  description: string;
  type: LoadNature;
  source: "load_case" | "self_weight" | "highway_udl" | "highway_kel" | "vehicle";
}

export interface CombineLoadsParams {
  bridge_type: BridgeType;
  span_length_m: number;
  load_cases: readonly LoadCase[];
  /** Self weight of the member (kN/m); 0 when not included */
  self_weight_kn_m: number;
  highway: HighwayLoad;
  vehicle: VehicleEnvelope;
  load_factors: { dead: number; live: number };
}

export interface CombinedLoads {
  dead_moment_knm: number;
  live_moment_knm: number;
  dead_shear_kn: number;
  live_shear_kn: number;
  self_weight_moment_knm: number;
  self_weight_shear_kn: number;
  highway_moment_knm: number;
  highway_shear_kn: number;
  vehicle_moment_knm: number;
  vehicle_shear_kn: number;
  total_moment_knm: number;
  total_shear_kn: number;
  /** Unfactored effect of each load, in input order */
  contributions: LoadContribution[];
}

export function loadEffect(
  bridgeType: BridgeType,
  spanM: number,
  magnitude: number,
  distribution: LoadDistribution,
): LoadEffect {
  const L = spanM;
  if (bridgeType === "cantilever") {
    return distribution === "uniform"
      ? { moment_knm: (magnitude * L * L) / 2, shear_kn: magnitude * L }
      : { moment_knm: magnitude * L, shear_kn: magnitude };
  }
  return distribution === "uniform"
    ? { moment_knm: (magnitude * L * L) / 8, shear_kn: (magnitude * L) / 2 }
    : { moment_knm: (magnitude * L) / 4, shear_kn: magnitude };
}

/**
 * Order-independent sum: values are sorted before adding so the total does
 * not depend on the order the load cases were listed in.
 */
function sum(values: number[]): number {
  return [...values].sort((a, b) => a - b).reduce((acc, v) => acc + v, 0);
}

export function combineLoads(params: CombineLoadsParams): CombinedLoads {
  const { bridge_type, span_length_m: L, highway, vehicle, load_factors } = params;

  if (!Number.isFinite(load_factors.dead) || load_factors.dead <= 0) {
    throw new ValidationError("load_factor_dead", "load_factor_dead must be a positive number.");
  }
  if (!Number.isFinite(load_factors.live) || load_factors.live <= 0) {
    throw new ValidationError("load_factor_live", "load_factor_live must be a positive number.");
  }

  const contributions: LoadContribution[] = params.load_cases.map((lc): LoadContribution => ({
    description: lc.description,
    type: lc.type,
    source: "load_case",
    ...loadEffect(bridge_type, L, lc.magnitude, lc.distribution),
  }));

  const selfWeight = loadEffect(bridge_type, L, params.self_weight_kn_m, "uniform");
  if (params.self_weight_kn_m > 0) {
    contributions.push({ description: "Self weight", type: "dead", source: "self_weight", ...selfWeight });
  }

  const udl = loadEffect(bridge_type, L, highway.udl_kn_m, "uniform");
  contributions.push({
    description: `${highway.loading_type} UDL`,
    type: "live",
    source: "highway_udl",
    ...udl,
  });

  // The KEL sits at midspan (simple span) or the free end (cantilever),
  // which are the point-load positions loadEffect assumes
  const kel = loadEffect(bridge_type, L, highway.kel_kn, "point");
  if (highway.kel_kn > 0) {
    contributions.push({ description: `${highway.loading_type} KEL`, type: "live", source: "highway_kel", ...kel });
  }

  if (vehicle.max_moment_knm > 0 || vehicle.max_shear_kn > 0) {
    contributions.push({
      description: "Vehicle envelope",
      type: "live",
      source: "vehicle",
      moment_knm: vehicle.max_moment_knm,
      shear_kn: vehicle.max_shear_kn,
    });
  }

  const bucket = (type: LoadNature, key: keyof LoadEffect) =>
    sum(contributions.filter((c) => c.type === type).map((c) => c[key]));

  const deadMoment = bucket("dead", "moment_knm") * load_factors.dead;
  const deadShear = bucket("dead", "shear_kn") * load_factors.dead;
  const liveMoment = bucket("live", "moment_knm") * load_factors.live;
  const liveShear = bucket("live", "shear_kn") * load_factors.live;

  return {
    dead_moment_knm: deadMoment,
    live_moment_knm: liveMoment,
    dead_shear_kn: deadShear,
    live_shear_kn: liveShear,
    self_weight_moment_knm: selfWeight.moment_knm * load_factors.dead,
    self_weight_shear_kn: selfWeight.shear_kn * load_factors.dead,
    highway_moment_knm: (udl.moment_knm + kel.moment_knm) * load_factors.live,
    highway_shear_kn: (udl.shear_kn + kel.shear_kn) * load_factors.live,
    vehicle_moment_knm: vehicle.max_moment_knm * load_factors.live,
    vehicle_shear_kn: vehicle.max_shear_kn * load_factors.live,
    total_moment_knm: deadMoment + liveMoment,
    total_shear_kn: deadShear + liveShear,
    contributions,
  };
}
