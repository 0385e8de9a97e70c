import type { RawWebhookFields } from '../types/webhook.types';

type FieldReader<T> = (value: unknown) => T | undefined;

export const readString: FieldReader<string> = (value) =>
  typeof value === 'string' && value !== '' ? value : undefined;

export const readBoolean: FieldReader<boolean> = (value) =>
  typeof value === 'boolean' ? value : undefined;

export const readNumber: FieldReader<number> = (value) =>
  typeof value === 'number' && Number.isFinite(value) ? value : undefined;

// Fractional values are truncated toward zero, never rounded; `+ 0` turns -0 into 0.
export const readInteger: FieldReader<number> = (value) => {
  const number = readNumber(value);
  return number === undefined ? undefined : Math.trunc(number) + 0;
};

/**
 * Returns the first candidate key whose value the reader accepts. Keys are
 * listed primary first, then the older names the sender used for the field.
 */
export function pickField<T>(
  raw: RawWebhookFields,
  keys: readonly string[],
  read: FieldReader<T>
): T | undefined {
  for (const key of keys) {
    if (!Object.prototype.hasOwnProperty.call(raw, key)) {
      continue;
    }
    const value = read(raw[key]);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
