import { describe, expect, it } from "vitest";
import { InvalidGeometryError } from "./errors.js";
import { barArea, deriveSection } from "./section-geometry.js";

describe("deriveSection: steel", () => {
  const girder = {
    kind: "steel" as const,
    shape: "i_beam" as const,
    flange_width_mm: 300,
    flange_thickness_mm: 20,
    web_thickness_mm: 10,
    depth_mm: 640,
  };

  it("computes I-girder properties", () => {
    const section = deriveSection(girder);
    expect(section.kind).toBe("steel");
    if (section.kind !== "steel") return;
    expect(section.A_mm2).toBe(18000);
    expect(section.web_depth_mm).toBe(600);
    expect(section.Ix_mm4).toBe(1_333_600_000);
    expect(section.Iy_mm4).toBe(90_050_000);
    expect(section.Zel_mm3).toBe(4_167_500);
    expect(section.Zpl_mm3).toBe(4_620_000);
    expect(section.Av_mm2).toBe(6400);
    expect(section.ry_mm).toBeCloseTo(70.7303, 3);
  });

  it("counts two webs for a box girder", () => {
    const section = deriveSection({ ...girder, shape: "box" });
    if (section.kind !== "steel") throw new Error("expected steel");
    expect(section.A_mm2).toBe(24000);
    expect(section.Av_mm2).toBe(12800);
    expect(section.Zpl_mm3).toBe(4_620_000 - 900_000 + 1_800_000);
  });

  it("rejects flanges deeper than the section", () => {
    expect(() => deriveSection({ ...girder, flange_thickness_mm: 320 })).toThrow(InvalidGeometryError);
  });

  it("rejects a web wider than the flange", () => {
    expect(() => deriveSection({ ...girder, web_thickness_mm: 300 })).toThrow(/web_thickness/);
  });

  it("rejects non-positive dimensions", () => {
    try {
      deriveSection({ ...girder, depth_mm: 0 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidGeometryError);
      if (err instanceof InvalidGeometryError) expect(err.field).toBe("beam_depth");
    }
  });
});

describe("deriveSection: concrete", () => {
  it("computes steel area and effective depth", () => {
    const section = deriveSection({
      kind: "concrete",
      width_mm: 300,
      depth_mm: 600,
      layers: [{ bar_count: 4, bar_diameter_mm: 25, cover_mm: 50 }],
    });
    if (section.kind !== "concrete") throw new Error("expected concrete");
    expect(section.As_mm2).toBeCloseTo(1963.495, 3);
    expect(section.weighted_cover_mm).toBeCloseTo(50, 9);
    expect(section.effective_depth_mm).toBeCloseTo(550, 9);
    expect(section.A_mm2).toBe(180000);
  });

  it("weights cover by bar area across layers", () => {
    const section = deriveSection({
      kind: "concrete",
      width_mm: 300,
      depth_mm: 600,
      layers: [
        { bar_count: 2, bar_diameter_mm: 20, cover_mm: 50 },
        { bar_count: 2, bar_diameter_mm: 20, cover_mm: 100 },
      ],
    });
    if (section.kind !== "concrete") throw new Error("expected concrete");
    expect(section.weighted_cover_mm).toBeCloseTo(75, 9);
    expect(section.effective_depth_mm).toBeCloseTo(525, 9);
  });

  it("gives identical results whatever the layer order", () => {
    const a = { bar_count: 3, bar_diameter_mm: 16, cover_mm: 45 };
    const b = { bar_count: 2, bar_diameter_mm: 32, cover_mm: 95 };
    const c = { bar_count: 5, bar_diameter_mm: 12, cover_mm: 140 };
    const forward = deriveSection({ kind: "concrete", width_mm: 350, depth_mm: 700, layers: [a, b, c] });
    const reversed = deriveSection({ kind: "concrete", width_mm: 350, depth_mm: 700, layers: [c, b, a] });
    expect(reversed).toEqual(forward);
  });

  it("requires at least one layer", () => {
    expect(() => deriveSection({ kind: "concrete", width_mm: 300, depth_mm: 600, layers: [] })).toThrow(
      InvalidGeometryError,
    );
  });

  it("rejects a fractional bar count", () => {
    expect(() =>
      deriveSection({
        kind: "concrete",
        width_mm: 300,
        depth_mm: 600,
        layers: [{ bar_count: 2.5, bar_diameter_mm: 20, cover_mm: 50 }],
      }),
    ).toThrow(/reinforcement_layers\[0\]\.bar_count/);
  });

  it("rejects cover at or beyond the section depth", () => {
    expect(() =>
      deriveSection({
        kind: "concrete",
        width_mm: 300,
        depth_mm: 600,
        layers: [{ bar_count: 2, bar_diameter_mm: 20, cover_mm: 600 }],
      }),
    ).toThrow(/cover/);
  });
});

describe("deriveSection: timber", () => {
  it("computes rectangular properties", () => {
    const section = deriveSection({ kind: "timber", width_mm: 200, depth_mm: 400 });
    if (section.kind !== "timber") throw new Error("expected timber");
    expect(section.A_mm2).toBe(80000);
    expect(section.Z_mm3).toBeCloseTo(5_333_333.333, 2);
    expect(section.I_mm4).toBeCloseTo(1_066_666_666.667, 2);
  });
});

describe("barArea", () => {
  it("is the circle area of the bar", () => {
    expect(barArea(20)).toBeCloseTo(314.159, 3);
  });
});
