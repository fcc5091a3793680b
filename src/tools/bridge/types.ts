/**
 * Domain types for the bridge member capacity assessment.
 *
 * Units: lengths in metres for spans and loads, millimetres for section
 * dimensions; stresses in N/mm² (MPa); forces in kN; moments in kN·m.
 */

// ─── Enumerations ────────────────────────────────────────────────────────────

export type MaterialKind = "steel" | "concrete" | "timber";
export type BridgeType = "simply_supported" | "cantilever";
export type LoadingType = "HA" | "HB";
export type AccessType = "none" | "company" | "public";
export type SteelShape = "i_beam" | "box";
export type TimberExposure = "dry" | "wet";
export type LoadDuration = "long" | "medium" | "short" | "very_short";
export type LoadSharing = "full" | "per_beam";
export type LoadNature = "dead" | "live";
export type LoadDistribution = "uniform" | "point";

// ─── Materials ───────────────────────────────────────────────────────────────

export interface SteelMaterial {
  kind: "steel";
  grade: string;
  fy_mpa: number;
  E_mpa: number;
  unit_weight_kn_m3: number;
}

export interface ConcreteMaterial {
  kind: "concrete";
  grade: string;
  /** Characteristic cylinder strength */
  fck_mpa: number;
  /** Characteristic cube strength */
  fcu_mpa: number;
  E_mpa: number;
  unit_weight_kn_m3: number;
}

export interface TimberMaterial {
  kind: "timber";
  grade: string;
  /** Grade bending stress parallel to grain */
  bending_mpa: number;
  /** Grade shear stress parallel to grain */
  shear_mpa: number;
  E_mpa: number;
  unit_weight_kn_m3: number;
}

export type MaterialSpec = SteelMaterial | ConcreteMaterial | TimberMaterial;

// ─── Section dimensions (input) ──────────────────────────────────────────────

export interface SteelDimensions {
  shape: SteelShape;
  flange_width_mm: number;
  flange_thickness_mm: number;
  web_thickness_mm: number;
  depth_mm: number;
}

export interface ReinforcementLayer {
  bar_count: number;
  bar_diameter_mm: number;
  /** Distance from the tension face to the layer centroid */
  cover_mm: number;
}

export interface ConcreteDimensions {
  width_mm: number;
  depth_mm: number;
  layers: ReinforcementLayer[];
}

export interface TimberDimensions {
  width_mm: number;
  depth_mm: number;
}

export type SectionDimensions =
  | ({ kind: "steel" } & SteelDimensions)
  | ({ kind: "concrete" } & ConcreteDimensions)
  | ({ kind: "timber" } & TimberDimensions);

// ─── Section geometry (derived) ──────────────────────────────────────────────

export interface SteelSection extends SteelDimensions {
  kind: "steel";
  A_mm2: number;
  Ix_mm4: number;
  Iy_mm4: number;
  ry_mm: number;
  /** Elastic section modulus about the major axis */
  Zel_mm3: number;
  /** Plastic section modulus about the major axis */
  Zpl_mm3: number;
  /** Web area resisting shear */
  Av_mm2: number;
  web_depth_mm: number;
}

export interface ConcreteSection {
  kind: "concrete";
  width_mm: number;
  depth_mm: number;
  layers: readonly ReinforcementLayer[];
  A_mm2: number;
  As_mm2: number;
  weighted_cover_mm: number;
  effective_depth_mm: number;
}

export interface TimberSection extends TimberDimensions {
  kind: "timber";
  A_mm2: number;
  Z_mm3: number;
  I_mm4: number;
}

export type SectionGeometry = SteelSection | ConcreteSection | TimberSection;

// ─── Loads ───────────────────────────────────────────────────────────────────

export interface LoadCase {
  description: string;
  /** kN/m for uniform loads, kN for point loads */
  magnitude: number;
  type: LoadNature;
  load_material: string;
  distribution: LoadDistribution;
}

export interface VehicleSpec {
  vehicle_type: string;
  front_axle_kn: number;
  rear_axle_kn: number;
  axle_spacing_m: number;
  impact_factor: number;
  /** Percentage reduction for load dispersal through surfacing and fill */
  dispersion_percent: number;
  sharing: LoadSharing;
}

export interface HighwayLoadingParams {
  loading_type: LoadingType;
  loaded_width_m: number;
  lane_width_m: number;
  access_type: AccessType;
  hb_units: number;
}

export interface SafetyFactors {
  steel: number;
  concrete: number;
  reinforcement: number;
  concrete_shear: number;
  timber: number;
  dead_load: number;
  live_load: number;
}

// ─── Members (material-tagged input) ─────────────────────────────────────────

export interface SteelMember {
  kind: "steel";
  grade: string;
  section: SteelDimensions;
  k1: number;
  k2: number;
}

export interface ConcreteMember {
  kind: "concrete";
  grade: string;
  section: ConcreteDimensions;
  reinforcement_strength_mpa: number;
}

export interface TimberMember {
  kind: "timber";
  grade: string;
  section: TimberDimensions;
  exposure: TimberExposure;
  duration: LoadDuration;
}

export type MemberInput = SteelMember | ConcreteMember | TimberMember;

export interface AssessmentInput {
  bridge_type: BridgeType;
  span_length_m: number;
  effective_member_length_m: number;
  member: MemberInput;
  loading: HighwayLoadingParams;
  condition_factor: number;
  safety_factors: SafetyFactors;
  load_cases: readonly LoadCase[];
  vehicle: VehicleSpec | null;
  include_self_weight: boolean;
}
