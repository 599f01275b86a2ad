import { SaveError } from "./errors.js";

/** Ceilings checked before any buffer is allocated or decoded. */
export interface DecodeLimits {
	maxInputBytes: number;
	maxEntries: number;
	maxMemberBytes: number;
	maxNodes: number;
	maxAttributes: number;
}

const LIMIT_KEYS = ["maxInputBytes", "maxEntries", "maxMemberBytes", "maxNodes", "maxAttributes"] as const satisfies readonly (keyof DecodeLimits)[];

export const DEFAULT_LIMITS: Readonly<DecodeLimits> = Object.freeze({
	maxInputBytes: 2 * 1024 * 1024 * 1024 - 1,
	maxEntries: 100_000,
	maxMemberBytes: 512 * 1024 * 1024,
	maxNodes: 4_000_000,
	maxAttributes: 16_000_000
} satisfies DecodeLimits);

export function resolveLimits(overrides?: Partial<DecodeLimits>): DecodeLimits {
	const limits: DecodeLimits = { ...DEFAULT_LIMITS };
	if (!overrides) return limits;
	for (const key of LIMIT_KEYS) {
		const value = overrides[key];
		if (value === undefined) continue;
		if (!Number.isInteger(value) || value < 0) {
			throw new RangeError(`Invalid limit ${key}: ${value}`);
		}
		limits[key] = value;
	}
	return limits;
}

export function checkLimit(limits: DecodeLimits, key: keyof DecodeLimits, actual: number, entryName?: string): void {
	const max = limits[key];
	if (actual > max) {
		throw new SaveError("LIMIT_EXCEEDED", `${key} exceeded: ${actual} > ${max}`, {
			entryName,
			context: { limit: key, max: String(max), actual: String(actual) }
		});
	}
}
