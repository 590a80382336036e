/**
 * Core type utilities shared by the generation and evaluation stages.
 * These types replace 'any' for everything that is read from or written to disk.
 */

import { z } from "zod";

/**
 * Primitive JSON values.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Recursive JSON value type.
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
 * Recursively readonly view of a plain data type.
 */
export type DeepReadonly<T> = T extends (infer U)[]
	? readonly DeepReadonly<U>[]
	: T extends object
		? { readonly [K in keyof T]: DeepReadonly<T[K]> }
		: T;

/**
 * Zod schema accepting any JSON value.
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
	z.union([
		z.string(),
		z.number(),
		z.boolean(),
		z.null(),
		z.array(JsonValueSchema),
		z.record(JsonValueSchema),
	])
);

/**
 * Zod schema accepting a JSON object.
 */
export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

/**
 * Type guard for plain JSON objects (not arrays, not null).
 */
export function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert a raw database cell to a JSON-safe value.
 * Buffers become base64 strings; bigints become decimal strings.
 */
export function toJsonCell(value: unknown): JsonValue {
	if (value === null || value === undefined) return null;
	if (typeof value === "string" || typeof value === "boolean") return value;
	if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
	if (typeof value === "bigint") return value.toString();
	if (Buffer.isBuffer(value)) return value.toString("base64");
	return String(value);
}
