/**
 * Bridge member assessment: validates the flat parameter set, resolves the
 * material and section, combines the loading, computes capacity and compares.
 *
 * Validating → Resolving → Combining → Comparing → Done | Failed
 *
 * Each call builds a fresh run with its own calculation log. Errors never
 * escape assessBridge(); they come back as a failed outcome with no numbers.
 */
import { computeCapacity, type Capacity } from "./capacity.js";
import { resolveEffectiveLength, type EffectiveLengthResult } from "./effective-length.js";
import { describeError, type AssessmentErrorDescriptor } from "./errors.js";
import { computeHighwayLoad, type HighwayLoad } from "./highway-load.js";
import { combineLoads, type CombinedLoads } from "./load-combination.js";
import { resolveMaterial } from "./material-catalog.js";
import { CalculationLog, type CalculationStep } from "./narrative.js";
import { parseAssessmentParams, type RawParams } from "./params.js";
import { deriveSection } from "./section-geometry.js";
import type {
  AssessmentInput,
  MaterialSpec,
  MemberInput,
  SectionDimensions,
  SectionGeometry,
} from "./types.js";
import { ZERO_ENVELOPE, maxVehicleEnvelope, type VehicleEnvelope } from "./vehicle-envelope.js";

export type AssessmentState = "Validating" | "Resolving" | "Combining" | "Comparing" | "Done" | "Failed";

export interface AssessmentResult {
  ok: true;
  input: AssessmentInput;
  material: MaterialSpec;
  section: SectionGeometry;
  effective_length: EffectiveLengthResult;
  highway: HighwayLoad;
  vehicle: VehicleEnvelope | null;
  demand: CombinedLoads;
  capacity: Capacity;
  moment_utilisation: number;
  shear_utilisation: number;
  moment_ok: boolean;
  shear_ok: boolean;
  passed: boolean;
  steps: readonly CalculationStep[];
}

export interface AssessmentFailure {
  ok: false;
  /** State the run was in when it failed */
  failed_in: Exclude<AssessmentState, "Done" | "Failed">;
  error: AssessmentErrorDescriptor;
}

export type AssessmentOutcome = AssessmentResult | AssessmentFailure;

interface Resolved {
  material: MaterialSpec;
  section: SectionGeometry;
  effectiveLength: EffectiveLengthResult;
}

interface Combined {
  highway: HighwayLoad;
  vehicle: VehicleEnvelope | null;
  demand: CombinedLoads;
}

function sectionDimensions(member: MemberInput): SectionDimensions {
  switch (member.kind) {
    case "steel":
      return { kind: "steel", ...member.section };
    case "concrete":
      return { kind: "concrete", ...member.section };
    case "timber":
      return { kind: "timber", ...member.section };
  }
}

function selfWeightIntensity(material: MaterialSpec, section: SectionGeometry): number {
  // kN/m³ × mm² → kN/m
  return (material.unit_weight_kn_m3 * section.A_mm2) / 1e6;
}

class AssessmentRun {
  private state: AssessmentState = "Validating";
  private readonly log = new CalculationLog();

  constructor(private readonly raw: RawParams) {}

  execute(): AssessmentOutcome {
    try {
      const input = this.validate();
      this.state = "Resolving";
      const resolved = this.resolve(input);
      this.state = "Combining";
      const combined = this.combine(input, resolved);
      this.state = "Comparing";
      const outcome = this.compare(input, resolved, combined);
      this.state = "Done";
      return outcome;
    } catch (err) {
      const failedIn = this.state;
      this.state = "Failed";
      return {
        ok: false,
        failed_in: failedIn === "Done" || failedIn === "Failed" ? "Comparing" : failedIn,
        error: describeError(err),
      };
    }
  }

  private validate(): AssessmentInput {
    const input = parseAssessmentParams(this.raw);
    this.log.record("Bridge type", input.bridge_type.replace(/_/g, " "));
    this.log.record("Span length", input.span_length_m, "m");
    this.log.record("Material", `${input.member.kind} ${input.member.grade}`);
    this.log.record("Loading type", input.loading.loading_type);
    this.log.record("Condition factor", input.condition_factor);
    return input;
  }

  private resolve(input: AssessmentInput): Resolved {
    const { member } = input;
    const material = resolveMaterial(member.kind, member.grade);
    switch (material.kind) {
      case "steel":
        this.log.record("Yield strength fy", material.fy_mpa, "N/mm²");
        break;
      case "concrete":
        this.log.record("Cylinder strength fck", material.fck_mpa, "N/mm²");
        this.log.record("Cube strength fcu", material.fcu_mpa, "N/mm²");
        break;
      case "timber":
        this.log.record("Grade bending stress", material.bending_mpa, "N/mm²");
        this.log.record("Grade shear stress", material.shear_mpa, "N/mm²");
        break;
    }
    this.log.record("Elastic modulus E", material.E_mpa, "N/mm²");

    const section = deriveSection(sectionDimensions(member));
    this.log.record("Section area A", section.A_mm2, "mm²");
    switch (section.kind) {
      case "steel":
        this.log.record("Second moment of area Ix", section.Ix_mm4, "mm⁴");
        this.log.record("Elastic modulus Ze", section.Zel_mm3, "mm³");
        this.log.record("Plastic modulus Zp", section.Zpl_mm3, "mm³");
        this.log.record("Minor-axis radius of gyration ry", section.ry_mm, "mm");
        break;
      case "concrete":
        this.log.record("Tension reinforcement area As", section.As_mm2, "mm²");
        this.log.record("Weighted cover", section.weighted_cover_mm, "mm");
        this.log.record("Effective depth d", section.effective_depth_mm, "mm");
        break;
      case "timber":
        this.log.record("Section modulus Z", section.Z_mm3, "mm³");
        break;
    }

    const k1 = member.kind === "steel" ? member.k1 : 1;
    const k2 = member.kind === "steel" ? member.k2 : 1;
    const effectiveLength = resolveEffectiveLength(material, section, input.effective_member_length_m, k1, k2);
    this.log.record(
      "Effective member length k1·k2·L",
      effectiveLength.effective_length_m,
      "m",
      `k1 = ${k1}, k2 = ${k2}`,
    );
    if (material.kind === "steel") {
      this.log.record("Slenderness λ", effectiveLength.slenderness);
    }
    this.log.record("Reduction factor", effectiveLength.reduction_factor);

    return { material, section, effectiveLength };
  }

  private combine(input: AssessmentInput, resolved: Resolved): Combined {
    const highway = computeHighwayLoad({
      ...input.loading,
      bridge_type: input.bridge_type,
      span_length_m: input.span_length_m,
    });
    this.log.record("Notional lanes", highway.notional_lanes);
    this.log.record("Access multiplier", highway.access_multiplier);
    this.log.record(`${highway.loading_type} lane intensity`, highway.basic_intensity_kn_m, "kN/m");
    this.log.record(`${highway.loading_type} UDL`, highway.udl_kn_m, "kN/m");
    if (highway.kel_kn > 0) {
      this.log.record(`${highway.loading_type} KEL`, highway.kel_kn, "kN", `at ${highway.kel_position_m} m`);
    }

    let vehicle: VehicleEnvelope | null = null;
    if (input.vehicle) {
      vehicle = maxVehicleEnvelope({
        span_m: input.span_length_m,
        front_axle_kn: input.vehicle.front_axle_kn,
        rear_axle_kn: input.vehicle.rear_axle_kn,
        axle_spacing_m: input.vehicle.axle_spacing_m,
        impact_factor: input.vehicle.impact_factor,
        dispersion_percent: input.vehicle.dispersion_percent,
        sharing: input.vehicle.sharing,
        bridge_type: input.bridge_type,
      });
      this.log.record("Vehicle", input.vehicle.vehicle_type);
      this.log.record("Vehicle axle load factor", vehicle.load_factor);
      this.log.record("Front axle load", vehicle.front_axle_kn, "kN");
      this.log.record("Rear axle load", vehicle.rear_axle_kn, "kN");
      this.log.record(
        "Vehicle maximum moment",
        vehicle.max_moment_knm,
        "kNm",
        `${vehicle.governing_axle} axle at ${vehicle.critical_position_m.toFixed(3)} m`,
      );
      this.log.record("Vehicle maximum shear", vehicle.max_shear_kn, "kN");
    }

    const selfWeight = input.include_self_weight
      ? selfWeightIntensity(resolved.material, resolved.section)
      : 0;
    if (input.include_self_weight) {
      this.log.record("Self weight", selfWeight, "kN/m");
    }

    const demand = combineLoads({
      bridge_type: input.bridge_type,
      span_length_m: input.span_length_m,
      load_cases: input.load_cases,
      self_weight_kn_m: selfWeight,
      highway,
      vehicle: vehicle ?? ZERO_ENVELOPE,
      load_factors: { dead: input.safety_factors.dead_load, live: input.safety_factors.live_load },
    });
    for (const c of demand.contributions.filter((entry) => entry.source === "load_case")) {
      this.log.record(`${c.description} (${c.type})`, c.moment_knm, "kNm", `shear ${c.shear_kn.toFixed(3)} kN`);
    }
    this.log.record("Applied dead load moment", demand.dead_moment_knm, "kNm");
    this.log.record("Applied live load moment", demand.live_moment_knm, "kNm");
    this.log.record("Total applied moment", demand.total_moment_knm, "kNm");
    this.log.record("Total applied shear", demand.total_shear_kn, "kN");

    return { highway, vehicle, demand };
  }

  private compare(input: AssessmentInput, resolved: Resolved, combined: Combined): AssessmentResult {
    const { member } = input;
    const capacity = computeCapacity({
      material: resolved.material,
      section: resolved.section,
      condition_factor: input.condition_factor,
      safety_factors: input.safety_factors,
      slenderness_factor: resolved.effectiveLength.reduction_factor,
      reinforcement_strength_mpa: member.kind === "concrete" ? member.reinforcement_strength_mpa : undefined,
      exposure: member.kind === "timber" ? member.exposure : undefined,
      duration: member.kind === "timber" ? member.duration : undefined,
    });
    this.log.append(capacity.details);

    const { demand } = combined;
    const momentOk = capacity.moment_capacity_knm >= demand.total_moment_knm;
    const shearOk = capacity.shear_capacity_kn >= demand.total_shear_kn;
    const momentUtil =
      capacity.moment_capacity_knm > 0 ? demand.total_moment_knm / capacity.moment_capacity_knm : Infinity;
    const shearUtil =
      capacity.shear_capacity_kn > 0 ? demand.total_shear_kn / capacity.shear_capacity_kn : Infinity;

    this.log.record("Moment utilisation", momentUtil, "", momentOk ? "OK" : "exceeds capacity");
    this.log.record("Shear utilisation", shearUtil, "", shearOk ? "OK" : "exceeds capacity");
    this.log.record("Result", momentOk && shearOk ? "Pass" : "Fail");

    return {
      ok: true,
      input,
      material: resolved.material,
      section: resolved.section,
      effective_length: resolved.effectiveLength,
      highway: combined.highway,
      vehicle: combined.vehicle,
      demand,
      capacity,
      moment_utilisation: momentUtil,
      shear_utilisation: shearUtil,
      moment_ok: momentOk,
      shear_ok: shearOk,
      passed: momentOk && shearOk,
      steps: this.log.snapshot(),
    };
  }
}

export function assessBridge(params: RawParams): AssessmentOutcome {
  return new AssessmentRun(params).execute();
}
