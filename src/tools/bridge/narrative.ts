/**
 * Append-only calculation log. Each assessment run owns one.
 */

export interface CalculationStep {
  label: string;
  value: number | string;
  unit: string;
  note?: string;
}

export class CalculationLog {
  private readonly steps: CalculationStep[] = [];

  record(label: string, value: number | string, unit = "", note?: string): void {
    const step: CalculationStep = note === undefined ? { label, value, unit } : { label, value, unit, note };
    this.steps.push(Object.freeze(step));
  }

  append(steps: readonly CalculationStep[]): void {
    for (const step of steps) this.steps.push(Object.freeze({ ...step }));
  }

  get length(): number {
    return this.steps.length;
  }

  snapshot(): readonly CalculationStep[] {
    return Object.freeze([...this.steps]);
  }
}

function formatValue(value: number | string): string {
  if (typeof value === "string") return value;
  if (Number.isInteger(value)) return String(value);
  const abs = Math.abs(value);
  if (abs !== 0 && (abs >= 1e6 || abs < 1e-3)) return value.toExponential(3);
  return value.toFixed(3);
}

/** Render steps as numbered text lines, e.g. "3. Notional lanes: 2". */
export function formatNarrative(steps: readonly CalculationStep[]): string[] {
  return steps.map((step, i) => {
    const unit = step.unit ? ` ${step.unit}` : "";
    const note = step.note ? ` (${step.note})` : "";
    return `${i + 1}. ${step.label}: ${formatValue(step.value)}${unit}${note}`;
  });
}
