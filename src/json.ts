import { NumberValueImpl } from '@aws-sdk/util-dynamodb';
import { LosslessNumber, isInteger, isSafeNumber, parse, stringify } from 'lossless-json';

/**
 * A number as read from JSON: a plain number when it's safe, otherwise a lossless representation
 * that DynamoDB stores as is (`bigint` for integers, `NumberValueImpl` for the others).
 */
export type JSONNumber = number | bigint | NumberValueImpl;
/**
 * Any value that JSON can represent; e.g. the opaque data of a movie.
 */
export type JSONValue = string | JSONNumber | boolean | null | JSONValue[] | JSONObject;
/**
 * A plain JSON object.
 */
export interface JSONObject {
  [key: string]: JSONValue;
}

/**
 * Whether a value is a plain object (not an array, nor null).
 */
export const isJSONObject = (value: unknown): value is JSONObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseNumber = (value: string): JSONNumber => {
  const number = Number(value);
  if (isSafeNumber(value) && (!Number.isInteger(number) || Number.isSafeInteger(number))) return number;
  return isInteger(value) ? BigInt(value) : new NumberValueImpl(value);
};

/**
 * Parse a JSON text without losing the precision of its numbers; it throws a `SyntaxError` on malformed text.
 */
export const parseJSON = (text: string): unknown => parse(text, null, parseNumber);

/**
 * A replacer that coerces the values JSON doesn't support natively (as they may come from DynamoDB);
 * numbers are kept as numbers, at full precision.
 */
export const jsonSafeReplacer = (_key: string, value: unknown): unknown => {
  if (value instanceof NumberValueImpl) return new LosslessNumber(value.toString());
  if (value instanceof Set) return Array.from(value);
  if (value instanceof Map) return Object.fromEntries(value);
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  return value;
};

/**
 * Serialize a value to a single line of JSON, coercing the values JSON doesn't support.
 */
export const toJSONLine = (value: unknown): string => stringify(value, jsonSafeReplacer) ?? 'null';

/**
 * Deep-copy a value as plain JSON, coercing the values JSON doesn't support.
 */
export const toJSONSafe = (value: unknown): JSONValue => {
  const line = stringify(value, jsonSafeReplacer);
  if (line === undefined) return null;
  const copy = parseJSON(line);
  return isJSONValue(copy) ? copy : null;
};

const isJSONValue = (value: unknown): value is JSONValue =>
  value !== undefined && typeof value !== 'function' && typeof value !== 'symbol';
