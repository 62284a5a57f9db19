import { InvalidOptionsError } from "./errors.js";

export interface ValidationError {
  rule: string;
  message: string;
  path?: string;
}

// Rule: Row counts must be non-negative integers (zero is a valid request)
export function checkCounts(
  counts: Record<string, number | undefined>,
  errors: ValidationError[]
): void {
  for (const [name, value] of Object.entries(counts)) {
    if (value === undefined) continue;
    if (!Number.isInteger(value) || value < 0) {
      errors.push({
        rule: "non-negative-count",
        message: `"${name}" must be a non-negative integer, got ${value}`,
        path: name,
      });
    }
  }
}

// Rule: Pool sizes, attempt factors and caps must be positive integers
export function checkPositive(
  values: Record<string, number | undefined>,
  errors: ValidationError[]
): void {
  for (const [name, value] of Object.entries(values)) {
    if (value === undefined) continue;
    if (!Number.isInteger(value) || value <= 0) {
      errors.push({
        rule: "positive-integer",
        message: `"${name}" must be a positive integer, got ${value}`,
        path: name,
      });
    }
  }
}

// Rule: Probabilities lie in [0, 1]
export function checkRate(
  name: string,
  value: number | undefined,
  errors: ValidationError[]
): void {
  if (value === undefined) return;
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    errors.push({
      rule: "rate-range",
      message: `"${name}" must be between 0 and 1, got ${value}`,
      path: name,
    });
  }
}

/** Throw every collected rule violation at once. */
export function throwIfInvalid(errors: ValidationError[]): void {
  if (errors.length > 0) {
    throw new InvalidOptionsError(errors);
  }
}
