import { StatusCode } from './types.js';

/**
 * Base class for Tessera specific errors
 * Carries a status code and, optionally, the underlying cause
 */
export class TesseraError extends Error {
	public code: number;
	public cause?: Error;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error) {
		super(message);
		this.code = code;
		this.name = 'TesseraError';
		this.cause = cause;

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, TesseraError);
		}
	}
}

/**
 * Thrown when a wire plan uses a construct this worker does not implement:
 * an unknown node variant, value-set kind, partitioning function or strategy.
 */
export class UnsupportedConstructError extends TesseraError {
	/** Tag or short description of the offending construct */
	public readonly construct: string;

	constructor(message: string, construct: string) {
		super(message, StatusCode.UNSUPPORTED);
		this.name = 'UnsupportedConstructError';
		this.construct = construct;
		Object.setPrototypeOf(this, UnsupportedConstructError.prototype);
	}
}

/**
 * Thrown when a coordinator-produced plan breaks a contract the translator relies on.
 * Points at a planner bug upstream rather than a missing worker feature.
 */
export class InvariantViolationError extends TesseraError {
	public readonly construct?: string;

	constructor(message: string, construct?: string) {
		super(message, StatusCode.INTERNAL);
		this.name = 'InvariantViolationError';
		this.construct = construct;
		Object.setPrototypeOf(this, InvariantViolationError.prototype);
	}
}

/**
 * Error thrown for malformed translator configuration
 */
export class ConfigError extends TesseraError {
	constructor(message: string, cause?: Error) {
		super(message, StatusCode.MISUSE, cause);
		this.name = 'ConfigError';
		Object.setPrototypeOf(this, ConfigError.prototype);
	}
}

/**
 * Throws an UnsupportedConstructError.
 * @param message Error message
 * @param construct Tag of the construct, included for diagnostics
 * @returns Never (always throws)
 */
export function unsupported(message: string, construct: string): never {
	throw new UnsupportedConstructError(message, construct);
}

/**
 * Throws an InvariantViolationError unless the condition holds.
 */
export function invariant(condition: boolean, message: string, construct?: string): asserts condition {
	if (!condition) {
		throw new InvariantViolationError(message, construct);
	}
}

/**
 * Reads the `@type` discriminator of a wire object that fell through an exhaustive switch.
 * Only reachable when the payload carries a tag newer than this worker knows.
 */
export function tagOf(value: unknown): string {
	if (typeof value === 'object' && value !== null && '@type' in value) {
		const tag = value['@type'];
		if (typeof tag === 'string') {
			return tag;
		}
	}
	return typeof value;
}
