/**
 * Fehler-Taxonomie für LSV/LSF-Decoding
 * Every failure surfaces as a SaveError with a stable code; nothing is recovered by guessing.
 */

export type SaveErrorCode =
	| "UNRECOGNIZED_FORMAT"
	| "UNSUPPORTED_COMPRESSION"
	| "UNSUPPORTED_TYPE"
	| "CORRUPT_DATA"
	| "INVALID_ENCODING"
	| "NOT_FOUND"
	| "TYPE_MISMATCH"
	| "LIMIT_EXCEEDED";

export interface SaveErrorOptions {
	/** Package member the error relates to. */
	entryName?: string | undefined;
	/** Byte offset in the buffer being decoded. */
	offset?: number | undefined;
	/** Raw attribute type tag, for UNSUPPORTED_TYPE. */
	typeTag?: number | undefined;
	context?: Record<string, string> | undefined;
	cause?: unknown;
}

export class SaveError extends Error {
	readonly code: SaveErrorCode;
	readonly entryName?: string | undefined;
	readonly offset?: number | undefined;
	readonly typeTag?: number | undefined;
	readonly context?: Record<string, string> | undefined;
	override readonly cause?: unknown;

	constructor(code: SaveErrorCode, message: string, options?: SaveErrorOptions) {
		super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
		this.name = "SaveError";
		this.code = code;
		this.entryName = options?.entryName;
		this.offset = options?.offset;
		this.typeTag = options?.typeTag;
		this.context = options?.context;
		this.cause = options?.cause;
	}

	/** JSON-safe form for CLI output and logs. */
	toJSON(): {
		name: string;
		code: SaveErrorCode;
		message: string;
		context: Record<string, string>;
		entryName?: string;
		offset?: number;
		typeTag?: number;
	} {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			context: { ...(this.context ?? {}) },
			...(this.entryName !== undefined ? { entryName: this.entryName } : {}),
			...(this.offset !== undefined ? { offset: this.offset } : {}),
			...(this.typeTag !== undefined ? { typeTag: this.typeTag } : {})
		};
	}
}

export function isSaveError(err: unknown, code?: SaveErrorCode): err is SaveError {
	return err instanceof SaveError && (code === undefined || err.code === code);
}

export function corrupt(message: string, options?: SaveErrorOptions): SaveError {
	return new SaveError("CORRUPT_DATA", message, options);
}

export function notFound(message: string, options?: SaveErrorOptions): SaveError {
	return new SaveError("NOT_FOUND", message, options);
}

/** Bounds check shared by every reader: [offset, offset + size) must lie inside a buffer of `length` bytes. */
export function ensureRange(length: number, offset: number, size: number, what: string, options?: SaveErrorOptions): void {
	if (offset < 0 || size < 0 || offset + size > length) {
		throw corrupt(`${what}: range ${offset}+${size} exceeds buffer length ${length}`, { offset, ...options });
	}
}

/** Re-raise a decoding error with the package member it came from. */
export function withEntryName(err: SaveError, entryName: string): SaveError {
	if (err.entryName !== undefined) return err;
	return new SaveError(err.code, `File '${entryName}': ${err.message}`, {
		entryName,
		offset: err.offset,
		typeTag: err.typeTag,
		context: err.context,
		cause: err
	});
}
