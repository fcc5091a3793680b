/**
 * Process-wide reference data: material grades, vehicle presets and the
 * design-code coefficients. Loaded once from data/*.json and frozen.
 */
import { DESIGN_CODE_FILE, isRecord, readJsonFile } from "../../shared.js";
import type {
  AccessType,
  ConcreteMaterial,
  LoadDuration,
  SteelMaterial,
  TimberExposure,
  TimberMaterial,
} from "./types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface MaterialCatalogData {
  steel: readonly SteelMaterial[];
  concrete: readonly ConcreteMaterial[];
  timber: readonly TimberMaterial[];
}

export interface VehiclePreset {
  name: string;
  front_axle_kn: number;
  rear_axle_kn: number;
  axle_spacing_m: number;
  /** Dynamic amplification applied when the request gives none */
  impact_factor: number;
}

/** Pairs of [slenderness, reduction factor] */
export type SlendernessCurve = ReadonlyArray<readonly [number, number]>;

export interface DesignCode {
  ha: {
    short_span_limit_m: number;
    short_span_coefficient: number;
    short_span_exponent: number;
    long_span_coefficient: number;
    long_span_exponent: number;
    kel_per_lane_kn: number;
  };
  hb: {
    unit_conversion_kn: number;
    default_units: number;
  };
  access_multipliers: Record<AccessType, number>;
  steel: {
    shear_strength_ratio: number;
    reference_yield_mpa: number;
    compact_flange_outstand_ratio: number;
    compact_internal_flange_ratio: number;
    compact_web_ratio: number;
    slenderness_curve: SlendernessCurve;
  };
  concrete: {
    alpha_cc: number;
    stress_block_ratio: number;
    max_neutral_axis_ratio: number;
    max_lever_arm_ratio: number;
    shear_coefficient: number;
    max_steel_ratio_percent: number;
    max_shear_fcu_mpa: number;
    depth_factor_reference_mm: number;
    depth_factor_min: number;
    depth_factor_max: number;
  };
  timber: {
    exposure: Record<TimberExposure, { bending: number; shear: number }>;
    duration: Record<LoadDuration, number>;
    rectangular_shear_ratio: number;
  };
  safety_factors: {
    steel: number;
    concrete: number;
    reinforcement: number;
    concrete_shear: number;
    timber: number;
    dead_load: number;
    live_load: number;
  };
  reinforcement_strength_mpa: number;
}

// ─── Readers ─────────────────────────────────────────────────────────────────

function section(raw: unknown, where: string): Record<string, unknown> {
  if (!isRecord(raw)) throw new Error(`${where} must be an object.`);
  return raw;
}

function num(obj: Record<string, unknown>, key: string, where: string): number {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${where}.${key} must be a finite number.`);
  }
  return value;
}

function str(obj: Record<string, unknown>, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string" || !value) {
    throw new Error(`${where}.${key} must be a non-empty string.`);
  }
  return value;
}

function list(raw: unknown, where: string): unknown[] {
  if (!Array.isArray(raw)) throw new Error(`${where} must be an array.`);
  return raw;
}

export function parseMaterialCatalog(raw: unknown): MaterialCatalogData {
  const root = section(raw, "materials");
  const steel = list(root.steel, "materials.steel").map((entry, i): SteelMaterial => {
    const where = `materials.steel[${i}]`;
    const e = section(entry, where);
    return {
      kind: "steel",
      grade: str(e, "grade", where),
      fy_mpa: num(e, "fy_mpa", where),
      E_mpa: num(e, "E_mpa", where),
      unit_weight_kn_m3: num(e, "unit_weight_kn_m3", where),
    };
  });
  const concrete = list(root.concrete, "materials.concrete").map((entry, i): ConcreteMaterial => {
    const where = `materials.concrete[${i}]`;
    const e = section(entry, where);
    return {
      kind: "concrete",
      grade: str(e, "grade", where),
      fck_mpa: num(e, "fck_mpa", where),
      fcu_mpa: num(e, "fcu_mpa", where),
      E_mpa: num(e, "E_mpa", where),
      unit_weight_kn_m3: num(e, "unit_weight_kn_m3", where),
    };
  });
  const timber = list(root.timber, "materials.timber").map((entry, i): TimberMaterial => {
    const where = `materials.timber[${i}]`;
    const e = section(entry, where);
    return {
      kind: "timber",
      grade: str(e, "grade", where),
      bending_mpa: num(e, "bending_mpa", where),
      shear_mpa: num(e, "shear_mpa", where),
      E_mpa: num(e, "E_mpa", where),
      unit_weight_kn_m3: num(e, "unit_weight_kn_m3", where),
    };
  });
  return { steel, concrete, timber };
}

export function parseVehiclePresets(raw: unknown): VehiclePreset[] {
  const root = section(raw, "vehicles");
  return Object.entries(root).map(([name, entry]) => {
    const where = `vehicles["${name}"]`;
    const e = section(entry, where);
    return {
      name,
      front_axle_kn: num(e, "front_axle_kn", where),
      rear_axle_kn: num(e, "rear_axle_kn", where),
      axle_spacing_m: num(e, "axle_spacing_m", where),
      impact_factor: num(e, "impact_factor", where),
    };
  });
}

export function parseDesignCode(raw: unknown): DesignCode {
  const root = section(raw, "design-code");
  const steel = section(root.steel, "steel");
  const curve = list(steel.slenderness_curve, "steel.slenderness_curve").map(
    (point, i): readonly [number, number] => {
      const pair = list(point, `steel.slenderness_curve[${i}]`);
      const [lambda, factor] = pair;
      if (
        pair.length !== 2 ||
        typeof lambda !== "number" ||
        typeof factor !== "number"
      ) {
        throw new Error(`steel.slenderness_curve[${i}] must be a [slenderness, factor] pair.`);
      }
      return [lambda, factor] as const;
    },
  );
  if (curve.length < 2) {
    throw new Error("steel.slenderness_curve needs at least two points.");
  }
  for (let i = 1; i < curve.length; i++) {
    const prev = curve[i - 1];
    const cur = curve[i];
    if (!prev || !cur) continue;
    if (cur[0] <= prev[0]) {
      throw new Error("steel.slenderness_curve slenderness values must be strictly increasing.");
    }
    if (cur[1] > prev[1]) {
      throw new Error("steel.slenderness_curve reduction factors must not increase with slenderness.");
    }
  }

  const timber = section(root.timber, "timber");
  const exposure = section(timber.exposure, "timber.exposure");
  const dry = section(exposure.dry, "timber.exposure.dry");
  const wet = section(exposure.wet, "timber.exposure.wet");
  const duration = section(timber.duration, "timber.duration");
  const ha = section(root.ha, "ha");
  const hb = section(root.hb, "hb");
  const access = section(root.access_multipliers, "access_multipliers");
  const concrete = section(root.concrete, "concrete");
  const safety = section(root.safety_factors, "safety_factors");

  const reinforcement = num(root, "reinforcement_strength_mpa", "design-code");
  if (reinforcement <= 0) {
    throw new Error("reinforcement_strength_mpa must be a positive number.");
  }

  return {
    ha: {
      short_span_limit_m: num(ha, "short_span_limit_m", "ha"),
      short_span_coefficient: num(ha, "short_span_coefficient", "ha"),
      short_span_exponent: num(ha, "short_span_exponent", "ha"),
      long_span_coefficient: num(ha, "long_span_coefficient", "ha"),
      long_span_exponent: num(ha, "long_span_exponent", "ha"),
      kel_per_lane_kn: num(ha, "kel_per_lane_kn", "ha"),
    },
    hb: {
      unit_conversion_kn: num(hb, "unit_conversion_kn", "hb"),
      default_units: num(hb, "default_units", "hb"),
    },
    access_multipliers: {
      none: num(access, "none", "access_multipliers"),
      company: num(access, "company", "access_multipliers"),
      public: num(access, "public", "access_multipliers"),
    },
    steel: {
      shear_strength_ratio: num(steel, "shear_strength_ratio", "steel"),
      reference_yield_mpa: num(steel, "reference_yield_mpa", "steel"),
      compact_flange_outstand_ratio: num(steel, "compact_flange_outstand_ratio", "steel"),
      compact_internal_flange_ratio: num(steel, "compact_internal_flange_ratio", "steel"),
      compact_web_ratio: num(steel, "compact_web_ratio", "steel"),
      slenderness_curve: curve,
    },
    concrete: {
      alpha_cc: num(concrete, "alpha_cc", "concrete"),
      stress_block_ratio: num(concrete, "stress_block_ratio", "concrete"),
      max_neutral_axis_ratio: num(concrete, "max_neutral_axis_ratio", "concrete"),
      max_lever_arm_ratio: num(concrete, "max_lever_arm_ratio", "concrete"),
      shear_coefficient: num(concrete, "shear_coefficient", "concrete"),
      max_steel_ratio_percent: num(concrete, "max_steel_ratio_percent", "concrete"),
      max_shear_fcu_mpa: num(concrete, "max_shear_fcu_mpa", "concrete"),
      depth_factor_reference_mm: num(concrete, "depth_factor_reference_mm", "concrete"),
      depth_factor_min: num(concrete, "depth_factor_min", "concrete"),
      depth_factor_max: num(concrete, "depth_factor_max", "concrete"),
    },
    timber: {
      exposure: {
        dry: {
          bending: num(dry, "bending", "timber.exposure.dry"),
          shear: num(dry, "shear", "timber.exposure.dry"),
        },
        wet: {
          bending: num(wet, "bending", "timber.exposure.wet"),
          shear: num(wet, "shear", "timber.exposure.wet"),
        },
      },
      duration: {
        long: num(duration, "long", "timber.duration"),
        medium: num(duration, "medium", "timber.duration"),
        short: num(duration, "short", "timber.duration"),
        very_short: num(duration, "very_short", "timber.duration"),
      },
      rectangular_shear_ratio: num(timber, "rectangular_shear_ratio", "timber"),
    },
    safety_factors: {
      steel: num(safety, "steel", "safety_factors"),
      concrete: num(safety, "concrete", "safety_factors"),
      reinforcement: num(safety, "reinforcement", "safety_factors"),
      concrete_shear: num(safety, "concrete_shear", "safety_factors"),
      timber: num(safety, "timber", "safety_factors"),
      dead_load: num(safety, "dead_load", "safety_factors"),
      live_load: num(safety, "live_load", "safety_factors"),
    },
    reinforcement_strength_mpa: reinforcement,
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

// ─── Process-wide constants ──────────────────────────────────────────────────

export const MATERIALS: MaterialCatalogData = deepFreeze(
  parseMaterialCatalog(readJsonFile("materials.json")),
);

export const VEHICLE_PRESETS: readonly VehiclePreset[] = deepFreeze(
  parseVehiclePresets(readJsonFile("vehicles.json")),
);

export const DESIGN_CODE: DesignCode = deepFreeze(parseDesignCode(readJsonFile(DESIGN_CODE_FILE)));
