export type PlainRecord = { [key: string]: unknown };

export function isRecord(value: unknown): value is PlainRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function expectRecord(value: unknown, context: string): PlainRecord {
  if (!isRecord(value)) throw new Error(`${context} must be an object`);
  return value;
}

export function readString(obj: PlainRecord, key: string, context: string): string {
  const value = obj[key];
  if (typeof value !== 'string') throw new Error(`${context}.${key} must be a string`);
  return value;
}

export function readOptionalString(obj: PlainRecord, key: string, context: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') throw new Error(`${context}.${key} must be a string`);
  return value;
}

export function readOptionalBoolean(obj: PlainRecord, key: string, context: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') throw new Error(`${context}.${key} must be a boolean`);
  return value;
}

export function readBooleanMap(value: unknown, context: string): Record<string, boolean> {
  if (value === undefined || value === null) return {};
  const obj = expectRecord(value, context);
  const out: Record<string, boolean> = {};
  for (const [key, flag] of Object.entries(obj)) {
    if (typeof flag !== 'boolean') throw new Error(`${context}.${key} must be a boolean`);
    out[key] = flag;
  }
  return out;
}
