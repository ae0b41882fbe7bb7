// Lenient readers for raw RPC JSON: a missing or mistyped field yields the fallback.

export type JsonRecord = Record<string, unknown>;

export function asRecord(value: unknown): JsonRecord | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
  return Object.fromEntries(Object.entries(value));
}

export function field(value: unknown, key: string): unknown {
  return asRecord(value)?.[key];
}

export function item(value: unknown, index: number): unknown {
  return Array.isArray(value) ? value[index] : undefined;
}

export function readString(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

export function readInteger(value: unknown, fallback = 0): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : fallback;
}
