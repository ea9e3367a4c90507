import type { SizeCalcFn } from '../ports/SizeCalcFn.js';

/** Every record costs `1`: only the count limit matters. Default size function. */
export const constantSize: SizeCalcFn<unknown> = () => 1;

/** UTF-8 byte length of a string, or the length of a binary payload. */
export function byteLength(record: string | Uint8Array): number {
  return typeof record === 'string' ? Buffer.byteLength(record, 'utf8') : record.byteLength;
}

/**
 * UTF-8 byte length of the record's JSON encoding.
 *
 * Values `JSON.stringify` cannot encode (`undefined`, functions) measure `0`.
 */
export function jsonByteLength(record: unknown): number {
  const json: string | undefined = JSON.stringify(record);
  return json === undefined ? 0 : Buffer.byteLength(json, 'utf8');
}
