// Path: src/utils/guards.ts
// Type guards for values read from configuration

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

export function isPort(value: unknown): value is number | string {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 && value <= 65535;
  }
  return typeof value === 'string' && /^\d{1,5}$/.test(value);
}
