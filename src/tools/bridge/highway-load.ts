/**
 * HA and HB highway loading intensities.
 *
 * HA: lane UDL W = 336·(1/L)^0.67 kN/m up to 50 m, 36·(1/L)^0.1 beyond,
 * plus a 120 kN knife-edge load per notional lane. HB: HB units × 10 kN/m
 * shared over the notional lanes. Both scaled by the access multiplier.
 * Coefficients come from data/design-code.json.
 */
import { DESIGN_CODE, type DesignCode } from "./catalog.js";
import { InvalidLoadingParametersError } from "./errors.js";
import type { AccessType, BridgeType, LoadingType } from "./types.js";

export interface HighwayLoadParams {
  loading_type: LoadingType;
  bridge_type: BridgeType;
  span_length_m: number;
  loaded_width_m: number;
  lane_width_m: number;
  access_type: AccessType;
  hb_units: number;
}

export interface HighwayLoad {
  loading_type: LoadingType;
  notional_lanes: number;
  access_multiplier: number;
  /** Intensity per notional lane before lanes and access are applied (kN/m) */
  basic_intensity_kn_m: number;
  /** Total UDL carried by the member (kN/m) */
  udl_kn_m: number;
  /** Total knife-edge load (kN); 0 for HB */
  kel_kn: number;
  /** Distance of the KEL from the fixed/left support (m) */
  kel_position_m: number;
}

export function notionalLanes(loadedWidthM: number, laneWidthM: number): number {
  return Math.max(1, Math.floor(loadedWidthM / laneWidthM));
}

/** Per-lane HA UDL for a loaded length (kN/m). */
export function haLaneIntensity(spanM: number, code: DesignCode["ha"] = DESIGN_CODE.ha): number {
  if (spanM <= code.short_span_limit_m) {
    return code.short_span_coefficient * Math.pow(1 / spanM, code.short_span_exponent);
  }
  return code.long_span_coefficient * Math.pow(1 / spanM, code.long_span_exponent);
}

export function computeHighwayLoad(
  params: HighwayLoadParams,
  code: DesignCode = DESIGN_CODE,
): HighwayLoad {
  const { loading_type, span_length_m: L, loaded_width_m, lane_width_m, access_type } = params;

  if (!Number.isFinite(L) || L <= 0) {
    throw new InvalidLoadingParametersError(
      "span_length",
      `span_length must be a positive number (received ${L}).`,
    );
  }
  if (!Number.isFinite(lane_width_m) || lane_width_m <= 0) {
    throw new InvalidLoadingParametersError(
      "lane_width",
      `lane_width must be a positive number (received ${lane_width_m}).`,
    );
  }
  if (!Number.isFinite(loaded_width_m) || loaded_width_m < lane_width_m) {
    throw new InvalidLoadingParametersError(
      "loaded_width",
      `loaded_width (${loaded_width_m} m) must be at least lane_width (${lane_width_m} m).`,
    );
  }

  const multiplier = code.access_multipliers[access_type];
  if (multiplier === undefined) {
    throw new InvalidLoadingParametersError(
      "access_type",
      `Invalid access_type '${access_type}'. Must be one of: ${Object.keys(code.access_multipliers).join(", ")}.`,
    );
  }

  const lanes = notionalLanes(loaded_width_m, lane_width_m);

  switch (loading_type) {
    case "HA": {
      const W = haLaneIntensity(L, code.ha);
      return {
        loading_type,
        notional_lanes: lanes,
        access_multiplier: multiplier,
        basic_intensity_kn_m: W,
        udl_kn_m: W * lanes * multiplier,
        kel_kn: code.ha.kel_per_lane_kn * lanes * multiplier,
        // Midspan for a simple span, the free end for a cantilever
        kel_position_m: params.bridge_type === "cantilever" ? L : L / 2,
      };
    }
    case "HB": {
      if (!Number.isFinite(params.hb_units) || params.hb_units <= 0) {
        throw new InvalidLoadingParametersError(
          "hb_units",
          `hb_units must be a positive number (received ${params.hb_units}).`,
        );
      }
      const intensity = params.hb_units * code.hb.unit_conversion_kn;
      return {
        loading_type,
        notional_lanes: lanes,
        access_multiplier: multiplier,
        basic_intensity_kn_m: intensity,
        udl_kn_m: (intensity / lanes) * multiplier,
        kel_kn: 0,
        kel_position_m: 0,
      };
    }
    default:
      throw new InvalidLoadingParametersError(
        "loading_type",
        `Invalid loading_type '${String(loading_type)}'. Must be one of: HA, HB.`,
      );
  }
}
