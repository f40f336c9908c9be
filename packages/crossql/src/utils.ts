/**
 * Core type utilities for crossql.
 * These types replace 'any' usage and provide strict type safety.
 */

/**
 * Primitive JSON values.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Recursive JSON value type.
 * Replaces 'any' for data that must be serializable.
 */
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/**
 * JSON object type - strictly typed alternative to Record<string, any>
 */
export interface JsonObject {
	[key: string]: JsonValue;
}

/**
 * JSON array type
 */
export interface JsonArray extends Array<JsonValue> {}

/**
 * Statement bindings accepted by the executor.
 * Arrays fill `?` / `??` placeholders, objects fill `:name` placeholders.
 */
export type Bindings = JsonPrimitive[] | Record<string, JsonPrimitive>;

/**
 * Narrow an unknown value to a plain (non-array) object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a driver value into something JSON can carry.
 * Dates become ISO strings, bigints become numbers when they fit, buffers become base64.
 */
export function toJsonValue(value: unknown): JsonValue {
	if (value === null || value === undefined) return null;
	if (typeof value === 'string' || typeof value === 'boolean') return value;
	if (typeof value === 'number') return Number.isFinite(value) ? value : null;
	if (typeof value === 'bigint') {
		return value <= BigInt(Number.MAX_SAFE_INTEGER) &&
			value >= BigInt(Number.MIN_SAFE_INTEGER)
			? Number(value)
			: value.toString();
	}
	if (value instanceof Date) return value.toISOString();
	if (Buffer.isBuffer(value)) return value.toString('base64');
	if (Array.isArray(value)) return value.map(toJsonValue);
	if (isRecord(value)) return toJsonObject(value);
	return String(value);
}

/**
 * Normalize a driver row into a JSON object.
 */
export function toJsonObject(row: Record<string, unknown>): JsonObject {
	const result: JsonObject = {};
	for (const [key, value] of Object.entries(row)) {
		result[key] = toJsonValue(value);
	}
	return result;
}

/**
 * Read a count-like value. Postgres returns COUNT(*) as a numeric string.
 */
export function toCount(value: JsonValue | undefined): number | undefined {
	if (typeof value === 'number') return value;
	if (typeof value === 'string' && value.trim() !== '') {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : undefined;
	}
	return undefined;
}
