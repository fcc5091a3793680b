/**
 * Section property derivation for steel I/box girders and rectangular
 * concrete and timber members. All dimensions in mm.
 */
import { InvalidGeometryError } from "./errors.js";
import type {
  ConcreteDimensions,
  ConcreteSection,
  ReinforcementLayer,
  SectionDimensions,
  SectionGeometry,
  SteelDimensions,
  SteelSection,
  TimberDimensions,
  TimberSection,
} from "./types.js";

function requirePositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidGeometryError(field, `${field} must be a positive number (received ${value}).`);
  }
}

export function barArea(diameterMm: number): number {
  return (Math.PI * diameterMm * diameterMm) / 4;
}

// ─── Steel ───────────────────────────────────────────────────────────────────

/**
 * Idealised I or box shape: two flanges plus one (I) or two (box) webs,
 * root radii ignored.
 */
function deriveSteel(s: SteelDimensions): SteelSection {
  requirePositive("flange_width", s.flange_width_mm);
  requirePositive("flange_thickness", s.flange_thickness_mm);
  requirePositive("web_thickness", s.web_thickness_mm);
  requirePositive("beam_depth", s.depth_mm);

  const D = s.depth_mm;
  const bf = s.flange_width_mm;
  const tf = s.flange_thickness_mm;
  const tw = s.web_thickness_mm;
  const webs = s.shape === "box" ? 2 : 1;

  if (2 * tf >= D) {
    throw new InvalidGeometryError(
      "flange_thickness",
      `2 × flange_thickness (${2 * tf} mm) must be less than beam_depth (${D} mm).`,
    );
  }
  if (webs * tw >= bf) {
    throw new InvalidGeometryError(
      "web_thickness",
      s.shape === "box"
        ? `2 × web_thickness (${2 * tw} mm) must be less than flange_width (${bf} mm).`
        : `web_thickness (${tw} mm) must be less than flange_width (${bf} mm).`,
    );
  }

  const hw = D - 2 * tf; // clear web depth
  const voidWidth = bf - webs * tw;

  const A = 2 * bf * tf + webs * hw * tw;
  const Ix = (bf * Math.pow(D, 3) - voidWidth * Math.pow(hw, 3)) / 12;
  const Iy =
    s.shape === "box"
      ? (2 * tf * Math.pow(bf, 3)) / 12 + (hw * (Math.pow(bf, 3) - Math.pow(bf - 2 * tw, 3))) / 12
      : (2 * tf * Math.pow(bf, 3) + hw * Math.pow(tw, 3)) / 12;
  const Zel = (2 * Ix) / D;
  const Zpl = bf * tf * (D - tf) + (webs * tw * hw * hw) / 4;

  const section: SteelSection = {
    kind: "steel",
    shape: s.shape,
    flange_width_mm: bf,
    flange_thickness_mm: tf,
    web_thickness_mm: tw,
    depth_mm: D,
    A_mm2: A,
    Ix_mm4: Ix,
    Iy_mm4: Iy,
    ry_mm: Math.sqrt(Iy / A),
    Zel_mm3: Zel,
    Zpl_mm3: Zpl,
    Av_mm2: webs * D * tw,
    web_depth_mm: hw,
  };
  return Object.freeze(section);
}

// ─── Concrete ────────────────────────────────────────────────────────────────

function deriveConcrete(s: ConcreteDimensions): ConcreteSection {
  requirePositive("beam_width", s.width_mm);
  requirePositive("beam_depth", s.depth_mm);
  if (s.layers.length === 0) {
    throw new InvalidGeometryError(
      "reinforcement_layers",
      "reinforcement_layers must contain at least one layer of tension steel.",
    );
  }

  s.layers.forEach((layer, i) => {
    const prefix = `reinforcement_layers[${i}]`;
    if (!Number.isInteger(layer.bar_count) || layer.bar_count <= 0) {
      throw new InvalidGeometryError(
        `${prefix}.bar_count`,
        `${prefix}.bar_count must be a positive whole number (received ${layer.bar_count}).`,
      );
    }
    requirePositive(`${prefix}.bar_diameter`, layer.bar_diameter_mm);
    requirePositive(`${prefix}.cover`, layer.cover_mm);
    if (layer.cover_mm >= s.depth_mm) {
      throw new InvalidGeometryError(
        `${prefix}.cover`,
        `${prefix}.cover (${layer.cover_mm} mm) must be less than beam_depth (${s.depth_mm} mm).`,
      );
    }
  });

  // Canonical order (distance from the tension face ascending) so the sums
  // below are identical whatever order the layers were supplied in
  const layers: readonly ReinforcementLayer[] = Object.freeze(
    [...s.layers]
      .sort(
        (a, b) =>
          a.cover_mm - b.cover_mm ||
          a.bar_diameter_mm - b.bar_diameter_mm ||
          a.bar_count - b.bar_count,
      )
      .map((layer) => Object.freeze({ ...layer })),
  );

  let As = 0;
  let firstMoment = 0;
  for (const layer of layers) {
    const area = layer.bar_count * barArea(layer.bar_diameter_mm);
    As += area;
    firstMoment += area * layer.cover_mm;
  }

  const weightedCover = firstMoment / As;
  const d = s.depth_mm - weightedCover;

  const section: ConcreteSection = {
    kind: "concrete",
    width_mm: s.width_mm,
    depth_mm: s.depth_mm,
    layers,
    A_mm2: s.width_mm * s.depth_mm,
    As_mm2: As,
    weighted_cover_mm: weightedCover,
    effective_depth_mm: d,
  };
  return Object.freeze(section);
}

// ─── Timber ──────────────────────────────────────────────────────────────────

function deriveTimber(s: TimberDimensions): TimberSection {
  requirePositive("beam_width", s.width_mm);
  requirePositive("beam_depth", s.depth_mm);
  const b = s.width_mm;
  const h = s.depth_mm;
  const section: TimberSection = {
    kind: "timber",
    width_mm: b,
    depth_mm: h,
    A_mm2: b * h,
    Z_mm3: (b * h * h) / 6,
    I_mm4: (b * h * h * h) / 12,
  };
  return Object.freeze(section);
}

export function deriveSection(dimensions: SectionDimensions): SectionGeometry {
  switch (dimensions.kind) {
    case "steel":
      return deriveSteel(dimensions);
    case "concrete":
      return deriveConcrete(dimensions);
    case "timber":
      return deriveTimber(dimensions);
  }
}
