/**
 * Flat parameter parsing.
 *
 * Turns the flat name → value mapping collected by a form or JSON client into
 * a typed AssessmentInput. Numbers may arrive as decimal strings. A missing
 * required field is an error; only the documented defaults are filled in.
 */
import { isRecord } from "../../shared.js";
import { DESIGN_CODE, VEHICLE_PRESETS } from "./catalog.js";
import {
  InvalidGeometryError,
  InvalidLoadingParametersError,
  UnknownMaterialError,
  ValidationError,
} from "./errors.js";
import { MATERIAL_KINDS, isMaterialKind } from "./material-catalog.js";
import type {
  AccessType,
  AssessmentInput,
  BridgeType,
  HighwayLoadingParams,
  LoadCase,
  LoadDistribution,
  LoadDuration,
  LoadNature,
  LoadSharing,
  LoadingType,
  MemberInput,
  ReinforcementLayer,
  SafetyFactors,
  SteelShape,
  TimberExposure,
  VehicleSpec,
} from "./types.js";

export type RawParams = Record<string, unknown>;

type FieldErrorFactory = (field: string, message: string) => Error;

const validationError: FieldErrorFactory = (field, message) => new ValidationError(field, message);
const geometryError: FieldErrorFactory = (field, message) => new InvalidGeometryError(field, message);
const loadingError: FieldErrorFactory = (field, message) =>
  new InvalidLoadingParametersError(field, message);

// ─── Primitive readers ───────────────────────────────────────────────────────

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

function toNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string") return Number(value.trim());
  return Number.NaN;
}

function requireNumber(raw: RawParams, field: string, makeError: FieldErrorFactory = validationError): number {
  const value = raw[field];
  if (isBlank(value)) throw makeError(field, `${field} is required.`);
  const n = toNumber(value);
  if (!Number.isFinite(n)) throw makeError(field, `${field} must be a number (received '${String(value)}').`);
  return n;
}

function optionalNumber(raw: RawParams, field: string, fallback: number): number {
  return isBlank(raw[field]) ? fallback : requireNumber(raw, field);
}

function requirePositiveNumber(
  raw: RawParams,
  field: string,
  makeError: FieldErrorFactory = validationError,
): number {
  const n = requireNumber(raw, field, makeError);
  if (n <= 0) throw makeError(field, `${field} must be a positive number (received ${n}).`);
  return n;
}

function optionalPositiveNumber(raw: RawParams, field: string, fallback: number): number {
  return isBlank(raw[field]) ? fallback : requirePositiveNumber(raw, field);
}

function requireString(raw: RawParams, field: string, makeError: FieldErrorFactory = validationError): string {
  const value = raw[field];
  if (isBlank(value)) throw makeError(field, `${field} is required.`);
  if (typeof value !== "string" && typeof value !== "number") {
    throw makeError(field, `${field} must be text.`);
  }
  return String(value).trim();
}

/** "Simply Supported" → "simply_supported", "per-beam" → "per_beam" */
function normalizeToken(value: string): string {
  return value.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

function parseChoice<T extends string>(
  field: string,
  value: string,
  choices: readonly T[],
  makeError: FieldErrorFactory = validationError,
  aliases: Record<string, T> = {},
): T {
  const token = normalizeToken(value);
  const aliased = aliases[token];
  if (aliased) return aliased;
  const match = choices.find((choice) => normalizeToken(choice) === token);
  if (!match) {
    throw makeError(field, `Invalid ${field} '${value}'. Must be one of: ${choices.join(", ")}.`);
  }
  return match;
}

function requireChoice<T extends string>(
  raw: RawParams,
  field: string,
  choices: readonly T[],
  makeError: FieldErrorFactory = validationError,
  aliases: Record<string, T> = {},
): T {
  return parseChoice(field, requireString(raw, field, makeError), choices, makeError, aliases);
}

function optionalChoice<T extends string>(
  raw: RawParams,
  field: string,
  choices: readonly T[],
  fallback: T,
  makeError: FieldErrorFactory = validationError,
  aliases: Record<string, T> = {},
): T {
  return isBlank(raw[field]) ? fallback : requireChoice(raw, field, choices, makeError, aliases);
}

function parseBoolean(raw: RawParams, field: string): boolean {
  const value = raw[field];
  if (isBlank(value)) return false;
  if (typeof value === "boolean") return value;
  const token = String(value).trim().toLowerCase();
  if (["true", "on", "yes", "1"].includes(token)) return true;
  if (["false", "off", "no", "0"].includes(token)) return false;
  throw new ValidationError(field, `${field} must be true or false (received '${String(value)}').`);
}

function recordList(raw: RawParams, field: string): RawParams[] {
  const value = raw[field];
  if (isBlank(value)) return [];
  if (!Array.isArray(value)) throw new ValidationError(field, `${field} must be a list.`);
  return value.map((entry, i) => {
    if (!isRecord(entry)) throw new ValidationError(`${field}[${i}]`, `${field}[${i}] must be an object.`);
    return entry;
  });
}

// ─── Choices ─────────────────────────────────────────────────────────────────

export const BRIDGE_TYPES: readonly BridgeType[] = ["simply_supported", "cantilever"];
export const LOADING_TYPES: readonly LoadingType[] = ["HA", "HB"];
export const ACCESS_TYPES: readonly AccessType[] = ["none", "company", "public"];
export const STEEL_SHAPES: readonly SteelShape[] = ["i_beam", "box"];
export const EXPOSURES: readonly TimberExposure[] = ["dry", "wet"];
export const DURATIONS: readonly LoadDuration[] = ["long", "medium", "short", "very_short"];
export const SHARING_MODES: readonly LoadSharing[] = ["full", "per_beam"];
const LOAD_NATURES: readonly LoadNature[] = ["dead", "live"];
const DISTRIBUTIONS: readonly LoadDistribution[] = ["uniform", "point"];

const STEEL_SHAPE_ALIASES: Record<string, SteelShape> = {
  i: "i_beam",
  ibeam: "i_beam",
  box_girder: "box",
};
const DISTRIBUTION_ALIASES: Record<string, LoadDistribution> = {
  udl: "uniform",
  distributed: "uniform",
  point_load: "point",
};

// ─── Sections ────────────────────────────────────────────────────────────────

function parseMember(raw: RawParams): MemberInput {
  const materialName = requireString(raw, "material");
  const kind = materialName.toLowerCase();
  if (!isMaterialKind(kind)) {
    throw new UnknownMaterialError(
      "material",
      `Unknown material '${materialName}'. Must be one of: ${MATERIAL_KINDS.join(", ")}.`,
    );
  }
  const grade = requireString(raw, "grade");

  switch (kind) {
    case "steel":
      return {
        kind,
        grade,
        section: {
          shape: optionalChoice(raw, "section_shape", STEEL_SHAPES, "i_beam", geometryError, STEEL_SHAPE_ALIASES),
          flange_width_mm: requirePositiveNumber(raw, "flange_width", geometryError),
          flange_thickness_mm: requirePositiveNumber(raw, "flange_thickness", geometryError),
          web_thickness_mm: requirePositiveNumber(raw, "web_thickness", geometryError),
          depth_mm: requirePositiveNumber(raw, "beam_depth", geometryError),
        },
        k1: optionalPositiveNumber(raw, "k1", 1),
        k2: optionalPositiveNumber(raw, "k2", 1),
      };
    case "concrete":
      return {
        kind,
        grade,
        section: {
          width_mm: requirePositiveNumber(raw, "beam_width", geometryError),
          depth_mm: requirePositiveNumber(raw, "beam_depth", geometryError),
          layers: parseReinforcement(raw),
        },
        reinforcement_strength_mpa: optionalPositiveNumber(
          raw,
          "reinforcement_strength",
          DESIGN_CODE.reinforcement_strength_mpa,
        ),
      };
    case "timber":
      return {
        kind,
        grade,
        section: {
          width_mm: requirePositiveNumber(raw, "beam_width", geometryError),
          depth_mm: requirePositiveNumber(raw, "beam_depth", geometryError),
        },
        exposure: optionalChoice(raw, "exposure", EXPOSURES, "dry"),
        duration: optionalChoice(raw, "load_duration", DURATIONS, "long"),
      };
  }
}

function parseReinforcement(raw: RawParams): ReinforcementLayer[] {
  const layers = recordList(raw, "reinforcement_layers");
  if (layers.length === 0) {
    throw new InvalidGeometryError(
      "reinforcement_layers",
      "reinforcement_layers is required for concrete members (at least one layer).",
    );
  }
  return layers.map((layer, i) => {
    const prefix = `reinforcement_layers[${i}]`;
    const read = (key: string) => {
      const value = layer[key];
      if (isBlank(value)) throw new InvalidGeometryError(`${prefix}.${key}`, `${prefix}.${key} is required.`);
      const n = toNumber(value);
      if (!Number.isFinite(n)) {
        throw new InvalidGeometryError(`${prefix}.${key}`, `${prefix}.${key} must be a number.`);
      }
      return n;
    };
    return {
      bar_count: read("bar_count"),
      bar_diameter_mm: read("bar_diameter"),
      cover_mm: read("cover"),
    };
  });
}

// ─── Loads ───────────────────────────────────────────────────────────────────

function parseLoading(raw: RawParams): HighwayLoadingParams {
  const loadingType = requireChoice(raw, "loading_type", LOADING_TYPES, loadingError);
  return {
    loading_type: loadingType,
    loaded_width_m: requirePositiveNumber(raw, "loaded_width", loadingError),
    lane_width_m: requirePositiveNumber(raw, "lane_width", loadingError),
    access_type: optionalChoice(raw, "access_type", ACCESS_TYPES, "none", loadingError),
    hb_units:
      loadingType === "HB"
        ? isBlank(raw.hb_units)
          ? DESIGN_CODE.hb.default_units
          : requirePositiveNumber(raw, "hb_units", loadingError)
        : 0,
  };
}

function parseLoadCases(raw: RawParams): LoadCase[] {
  return recordList(raw, "additional_loads").map((entry, i) => {
    const field = (key: string) => `additional_loads[${i}].${key}`;
    const magnitude = toNumber(entry.value);
    if (isBlank(entry.value) || !Number.isFinite(magnitude) || magnitude < 0) {
      throw new ValidationError(field("value"), `${field("value")} must be zero or a positive number.`);
    }
    const typeRaw = entry.type;
    if (typeof typeRaw !== "string" || isBlank(typeRaw)) {
      throw new ValidationError(field("type"), `${field("type")} is required (dead or live).`);
    }
    const distributionRaw = entry.load_distribution;
    const description = entry.description;
    const loadMaterial = entry.load_material;
    return {
      description:
        typeof description === "string" && description.trim() ? description.trim() : `Additional load ${i + 1}`,
      magnitude,
      type: parseChoice(field("type"), typeRaw, LOAD_NATURES),
      load_material: typeof loadMaterial === "string" ? loadMaterial.trim() : "",
      distribution:
        typeof distributionRaw === "string" && !isBlank(distributionRaw)
          ? parseChoice(field("load_distribution"), distributionRaw, DISTRIBUTIONS, validationError, DISTRIBUTION_ALIASES)
          : "uniform",
    };
  });
}

function findPreset(vehicleType: string) {
  const token = normalizeToken(vehicleType);
  return VEHICLE_PRESETS.find((preset) => normalizeToken(preset.name) === token);
}

function parseVehicle(raw: RawParams): VehicleSpec | null {
  if (isBlank(raw.vehicle_type)) return null;
  const vehicleType = requireString(raw, "vehicle_type");
  const token = normalizeToken(vehicleType);
  if (token === "none") return null;

  const preset = findPreset(vehicleType);
  if (!preset && token !== "custom") {
    const names = [...VEHICLE_PRESETS.map((p) => p.name), "custom", "none"];
    throw new ValidationError(
      "vehicle_type",
      `Unknown vehicle_type '${vehicleType}'. Must be one of: ${names.join(", ")}.`,
    );
  }

  const front = preset
    ? optionalNumber(raw, "front_axle_load", preset.front_axle_kn)
    : requireNumber(raw, "front_axle_load");
  const rear = preset
    ? optionalNumber(raw, "rear_axle_load", preset.rear_axle_kn)
    : requireNumber(raw, "rear_axle_load");
  const spacing = preset
    ? optionalNumber(raw, "axle_spacing", preset.axle_spacing_m)
    : requireNumber(raw, "axle_spacing");

  return {
    vehicle_type: preset ? preset.name : "custom",
    front_axle_kn: front,
    rear_axle_kn: rear,
    axle_spacing_m: spacing,
    impact_factor: optionalNumber(raw, "impact_factor", preset ? preset.impact_factor : 1),
    dispersion_percent: optionalNumber(raw, "dispersion", 0),
    sharing: optionalChoice(raw, "load_sharing", SHARING_MODES, "full"),
  };
}

function parseSafetyFactors(raw: RawParams): SafetyFactors {
  const defaults = DESIGN_CODE.safety_factors;
  return {
    steel: optionalPositiveNumber(raw, "safety_factor_steel", defaults.steel),
    concrete: optionalPositiveNumber(raw, "safety_factor_concrete", defaults.concrete),
    reinforcement: optionalPositiveNumber(raw, "safety_factor_reinforcement", defaults.reinforcement),
    concrete_shear: optionalPositiveNumber(raw, "safety_factor_concrete_shear", defaults.concrete_shear),
    timber: optionalPositiveNumber(raw, "safety_factor_timber", defaults.timber),
    dead_load: optionalPositiveNumber(raw, "load_factor_dead", defaults.dead_load),
    live_load: optionalPositiveNumber(raw, "load_factor_live", defaults.live_load),
  };
}

// ─── Entry point ─────────────────────────────────────────────────────────────

export function parseAssessmentParams(raw: RawParams): AssessmentInput {
  const bridgeType = requireChoice(raw, "bridge_type", BRIDGE_TYPES);
  const span = requirePositiveNumber(raw, "span_length");
  const member = parseMember(raw);

  const conditionFactor = requireNumber(raw, "condition_factor");
  if (conditionFactor <= 0 || conditionFactor > 1) {
    throw new ValidationError(
      "condition_factor",
      `condition_factor must be greater than 0 and at most 1 (received ${conditionFactor}).`,
    );
  }

  const input: AssessmentInput = {
    bridge_type: bridgeType,
    span_length_m: span,
    effective_member_length_m: optionalPositiveNumber(raw, "effective_member_length", span),
    member,
    loading: parseLoading(raw),
    condition_factor: conditionFactor,
    safety_factors: parseSafetyFactors(raw),
    load_cases: Object.freeze(parseLoadCases(raw)),
    vehicle: parseVehicle(raw),
    include_self_weight: parseBoolean(raw, "include_self_weight"),
  };
  return input;
}
