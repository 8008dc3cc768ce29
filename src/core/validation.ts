export interface FieldError {
  path: string;
  message: string;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isInteger(v) ? v : undefined;
}

export function asNonNegativeInt(v: unknown): number | undefined {
  const n = asInt(v);
  return n !== undefined && n >= 0 ? n : undefined;
}

export function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === "string");
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}
