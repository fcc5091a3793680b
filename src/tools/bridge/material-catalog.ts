import { MATERIALS } from "./catalog.js";
import { UnknownMaterialError } from "./errors.js";
import type { MaterialKind, MaterialSpec } from "./types.js";

export const MATERIAL_KINDS: readonly MaterialKind[] = ["steel", "concrete", "timber"];

export function isMaterialKind(value: string): value is MaterialKind {
  return MATERIAL_KINDS.some((kind) => kind === value);
}

function normalizeGrade(grade: string): string {
  return grade.replace(/\s+/g, "").toUpperCase();
}

/**
 * Look up the characteristic properties of a material grade.
 * Grade matching ignores case and whitespace ("s 355" finds "S355").
 */
export function resolveMaterial(kind: string, grade: string): MaterialSpec {
  const normalizedKind = kind.trim().toLowerCase();
  if (!isMaterialKind(normalizedKind)) {
    throw new UnknownMaterialError(
      "material",
      `Unknown material '${kind}'. Must be one of: ${MATERIAL_KINDS.join(", ")}.`,
    );
  }

  const wanted = normalizeGrade(grade);
  const grades: readonly MaterialSpec[] = MATERIALS[normalizedKind];
  const match = grades.find((entry) => normalizeGrade(entry.grade) === wanted);
  if (!match) {
    throw new UnknownMaterialError(
      "grade",
      `Unknown ${normalizedKind} grade '${grade}'. Available: ${listGrades(normalizedKind).join(", ")}.`,
    );
  }
  return match;
}

export function listGrades(kind: MaterialKind): string[] {
  const grades: readonly MaterialSpec[] = MATERIALS[kind];
  return grades.map((entry) => entry.grade);
}
