/**
 * Error taxonomy for the bridge assessment engine.
 *
 * Every error names the input field it concerns so the message can be shown
 * to the user as-is.
 */

export type AssessmentErrorKind =
  | "UnknownMaterialError"
  | "InvalidGeometryError"
  | "InvalidLoadingParametersError"
  | "InvalidVehicleSpacingError"
  | "UnsupportedMaterialError"
  | "ValidationError"
  | "InternalError";

export interface AssessmentErrorDescriptor {
  kind: AssessmentErrorKind;
  field: string | null;
  message: string;
}

export class AssessmentError extends Error {
  readonly kind: AssessmentErrorKind;
  readonly field: string | null;

  constructor(kind: AssessmentErrorKind, field: string | null, message: string) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.field = field;
  }

  toDescriptor(): AssessmentErrorDescriptor {
    return { kind: this.kind, field: this.field, message: this.message };
  }
}

export class UnknownMaterialError extends AssessmentError {
  constructor(field: string, message: string) {
    super("UnknownMaterialError", field, message);
  }
}

export class InvalidGeometryError extends AssessmentError {
  constructor(field: string, message: string) {
    super("InvalidGeometryError", field, message);
  }
}

export class InvalidLoadingParametersError extends AssessmentError {
  constructor(field: string, message: string) {
    super("InvalidLoadingParametersError", field, message);
  }
}

export class InvalidVehicleSpacingError extends AssessmentError {
  constructor(message: string) {
    super("InvalidVehicleSpacingError", "axle_spacing", message);
  }
}

export class UnsupportedMaterialError extends AssessmentError {
  constructor(field: string, message: string) {
    super("UnsupportedMaterialError", field, message);
  }
}

export class ValidationError extends AssessmentError {
  constructor(field: string, message: string) {
    super("ValidationError", field, message);
  }
}

/** Convert anything thrown inside the engine into a descriptor. */
export function describeError(err: unknown): AssessmentErrorDescriptor {
  if (err instanceof AssessmentError) return err.toDescriptor();
  const message = err instanceof Error ? err.message : String(err);
  return { kind: "InternalError", field: null, message };
}
