/**
 * A resolved scalar value as handed out by the expression converter.
 * Integer-family values are always bigint, including dates converted to day counts.
 */
export type ScalarValue = string | number | bigint | boolean | Uint8Array | null;

/**
 * Status codes attached to every TesseraError.
 * Numbering follows the SQLite-style codes used across the engine.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	INTERNAL = 2,
	ABORT = 4,
	NOTFOUND = 12,
	MISMATCH = 20,
	MISUSE = 21,
	FORMAT = 24,
	RANGE = 25,
	UNSUPPORTED = 30,
}

/** Smallest and largest values of the 64-bit integer domain. */
export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

/** 32-bit bounds; DATE day counts are confined to this range. */
export const INT32_MIN = -(2n ** 31n);
export const INT32_MAX = 2n ** 31n - 1n;
