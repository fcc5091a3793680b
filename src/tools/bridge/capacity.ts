/**
 * Moment and shear capacity per material.
 *
 * Steel: limit-state bending on the plastic (compact) or elastic modulus
 * reduced for lateral-torsional buckling; shear on the web area.
 * Concrete: rectangular stress block in equilibrium with the tension steel;
 * shear from the concrete shear-stress formula.
 * Timber: permissible stress with exposure (K2) and duration (K3) factors.
 */
import { DESIGN_CODE, type DesignCode } from "./catalog.js";
import { UnsupportedMaterialError, ValidationError } from "./errors.js";
import type { CalculationStep } from "./narrative.js";
import type {
  ConcreteMaterial,
  ConcreteSection,
  LoadDuration,
  MaterialSpec,
  SafetyFactors,
  SectionGeometry,
  SteelMaterial,
  SteelSection,
  TimberExposure,
  TimberMaterial,
  TimberSection,
} from "./types.js";

export interface CapacityParams {
  material: MaterialSpec;
  section: SectionGeometry;
  condition_factor: number;
  safety_factors: SafetyFactors;
  /** Lateral-torsional buckling reduction; 1.0 for non-steel members */
  slenderness_factor: number;
  reinforcement_strength_mpa?: number;
  exposure?: TimberExposure;
  duration?: LoadDuration;
}

export type CapacityMethod = "steel_limit_state" | "concrete_ultimate" | "timber_permissible_stress";

export interface Capacity {
  method: CapacityMethod;
  moment_capacity_knm: number;
  shear_capacity_kn: number;
  /** Intermediate values in calculation order */
  details: CalculationStep[];
}

function requireFactor(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(field, `${field} must be a positive number (received ${value}).`);
  }
}

// ─── Steel ───────────────────────────────────────────────────────────────────

export function isCompact(section: SteelSection, fyMpa: number, code: DesignCode["steel"]): boolean {
  const epsilon = Math.sqrt(code.reference_yield_mpa / fyMpa);
  const tf = section.flange_thickness_mm;
  const flangeOk =
    section.shape === "box"
      ? (section.flange_width_mm - 2 * section.web_thickness_mm) / tf <=
        code.compact_internal_flange_ratio * epsilon
      : (section.flange_width_mm - section.web_thickness_mm) / 2 / tf <=
        code.compact_flange_outstand_ratio * epsilon;
  const webOk = section.web_depth_mm / section.web_thickness_mm <= code.compact_web_ratio * epsilon;
  return flangeOk && webOk;
}

function steelCapacity(
  material: SteelMaterial,
  section: SteelSection,
  gamma: number,
  chi: number,
  code: DesignCode,
): Omit<Capacity, "method"> {
  const compact = isCompact(section, material.fy_mpa, code.steel);
  const Z = compact ? section.Zpl_mm3 : section.Zel_mm3;
  const fv = code.steel.shear_strength_ratio * material.fy_mpa;

  const moment = (Z * material.fy_mpa * chi) / gamma / 1e6;
  const shear = (section.Av_mm2 * fv) / gamma / 1e3;

  return {
    moment_capacity_knm: moment,
    shear_capacity_kn: shear,
    details: [
      { label: "Section classification", value: compact ? "compact" : "non-compact", unit: "" },
      { label: compact ? "Plastic modulus Zp" : "Elastic modulus Ze", value: Z, unit: "mm³" },
      { label: "Partial safety factor γm (steel)", value: gamma, unit: "" },
      { label: "Unfactored moment capacity Z·fy·χ/γm", value: moment, unit: "kNm" },
      { label: "Shear strength 0.6·fy", value: fv, unit: "N/mm²" },
      { label: "Shear area Av", value: section.Av_mm2, unit: "mm²" },
      { label: "Unfactored shear capacity Av·fv/γm", value: shear, unit: "kN" },
    ],
  };
}

// ─── Concrete ────────────────────────────────────────────────────────────────

function concreteCapacity(
  material: ConcreteMaterial,
  section: ConcreteSection,
  fy: number,
  factors: SafetyFactors,
  code: DesignCode,
): Omit<Capacity, "method"> {
  const c = code.concrete;
  const b = section.width_mm;
  const d = section.effective_depth_mm;
  const As = section.As_mm2;

  const tension = (As * fy) / factors.reinforcement; // N
  const fcd = (c.alpha_cc * material.fck_mpa) / factors.concrete;
  const blockLimit = c.stress_block_ratio * c.max_neutral_axis_ratio * d;

  let block = tension / (fcd * b);
  let force = tension;
  const overReinforced = block > blockLimit;
  if (overReinforced) {
    block = blockLimit;
    force = fcd * b * blockLimit;
  }
  const leverArm = Math.min(d - block / 2, c.max_lever_arm_ratio * d);
  const moment = (force * leverArm) / 1e6;

  const steelRatio = Math.min((100 * As) / (b * d), c.max_steel_ratio_percent);
  const fcu = Math.min(material.fcu_mpa, c.max_shear_fcu_mpa);
  const depthFactor = Math.min(
    c.depth_factor_max,
    Math.max(c.depth_factor_min, Math.pow(c.depth_factor_reference_mm / d, 0.25)),
  );
  const vc =
    (c.shear_coefficient / factors.concrete_shear) *
    Math.cbrt(steelRatio) *
    Math.cbrt(fcu) *
    depthFactor;
  const shear = (vc * b * d) / 1e3;

  return {
    moment_capacity_knm: moment,
    shear_capacity_kn: shear,
    details: [
      { label: "Steel tensile force As·fy/γs", value: tension / 1e3, unit: "kN" },
      { label: "Design concrete strength 0.85·fck/γc", value: fcd, unit: "N/mm²" },
      {
        label: "Compression block depth",
        value: block,
        unit: "mm",
        ...(overReinforced ? { note: "limited to the balanced depth; section over-reinforced" } : {}),
      },
      { label: "Lever arm z", value: leverArm, unit: "mm" },
      { label: "Unfactored moment capacity", value: moment, unit: "kNm" },
      { label: "Steel ratio 100As/bd", value: steelRatio, unit: "%" },
      { label: "Depth factor ξs", value: depthFactor, unit: "" },
      { label: "Concrete shear stress vc", value: vc, unit: "N/mm²" },
      { label: "Unfactored shear capacity vc·b·d", value: shear, unit: "kN" },
    ],
  };
}

// ─── Timber ──────────────────────────────────────────────────────────────────

function timberCapacity(
  material: TimberMaterial,
  section: TimberSection,
  gamma: number,
  exposure: TimberExposure,
  duration: LoadDuration,
  code: DesignCode,
): Omit<Capacity, "method"> {
  const K2 = code.timber.exposure[exposure];
  const K3 = code.timber.duration[duration];

  const bendingStress = material.bending_mpa * K2.bending * K3;
  const shearStress = material.shear_mpa * K2.shear * K3;
  const moment = (bendingStress * section.Z_mm3) / gamma / 1e6;
  const shear = (code.timber.rectangular_shear_ratio * shearStress * section.A_mm2) / gamma / 1e3;

  return {
    moment_capacity_knm: moment,
    shear_capacity_kn: shear,
    details: [
      { label: "Exposure factor K2 (bending / shear)", value: `${K2.bending} / ${K2.shear}`, unit: "", note: exposure },
      { label: "Load duration factor K3", value: K3, unit: "", note: duration.replace(/_/g, " ") },
      { label: "Permissible bending stress", value: bendingStress, unit: "N/mm²" },
      { label: "Permissible shear stress", value: shearStress, unit: "N/mm²" },
      { label: "Section modulus Z", value: section.Z_mm3, unit: "mm³" },
      { label: "Unfactored moment capacity", value: moment, unit: "kNm" },
      { label: "Unfactored shear capacity (2/3)·τ·A", value: shear, unit: "kN" },
    ],
  };
}

// ─── Entry point ─────────────────────────────────────────────────────────────

export function computeCapacity(params: CapacityParams, code: DesignCode = DESIGN_CODE): Capacity {
  const { material, section, condition_factor, safety_factors } = params;

  if (!Number.isFinite(condition_factor) || condition_factor <= 0 || condition_factor > 1) {
    throw new ValidationError(
      "condition_factor",
      `condition_factor must be greater than 0 and at most 1 (received ${condition_factor}).`,
    );
  }
  requireFactor("slenderness_factor", params.slenderness_factor);

  let method: CapacityMethod;
  let base: Omit<Capacity, "method">;

  if (material.kind === "steel" && section.kind === "steel") {
    requireFactor("safety_factor_steel", safety_factors.steel);
    method = "steel_limit_state";
    base = steelCapacity(material, section, safety_factors.steel, params.slenderness_factor, code);
  } else if (material.kind === "concrete" && section.kind === "concrete") {
    requireFactor("safety_factor_concrete", safety_factors.concrete);
    requireFactor("safety_factor_reinforcement", safety_factors.reinforcement);
    requireFactor("safety_factor_concrete_shear", safety_factors.concrete_shear);
    const fy = params.reinforcement_strength_mpa ?? code.reinforcement_strength_mpa;
    requireFactor("reinforcement_strength", fy);
    method = "concrete_ultimate";
    base = concreteCapacity(material, section, fy, safety_factors, code);
  } else if (material.kind === "timber" && section.kind === "timber") {
    requireFactor("safety_factor_timber", safety_factors.timber);
    method = "timber_permissible_stress";
    base = timberCapacity(
      material,
      section,
      safety_factors.timber,
      params.exposure ?? "dry",
      params.duration ?? "long",
      code,
    );
  } else {
    throw new UnsupportedMaterialError(
      "material",
      `No capacity method for ${material.kind} material with a ${section.kind} section.`,
    );
  }

  const moment = base.moment_capacity_knm * condition_factor;
  const shear = base.shear_capacity_kn * condition_factor;

  return {
    method,
    moment_capacity_knm: moment,
    shear_capacity_kn: shear,
    details: [
      ...base.details,
      { label: "Condition factor", value: condition_factor, unit: "" },
      { label: "Moment capacity", value: moment, unit: "kNm" },
      { label: "Shear capacity", value: shear, unit: "kN" },
    ],
  };
}
