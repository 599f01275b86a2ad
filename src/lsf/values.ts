/**
 * Attribute value decoding. Values are sliced from the document's value stream on demand,
 * one closed case per NodeAttributeType.
 */

import { decodeUtf8 } from "../binary.js";
import { corrupt, ensureRange, SaveError } from "../errors.js";
import {
	NodeAttributeType,
	type Attribute,
	type DecodedValue,
	type MatrixAttributeType,
	type TranslatedFSString,
	type TranslatedFSStringArgument,
	type TranslatedString,
	type TranslatedStringLayout,
	type ValueLayout
} from "./types.js";

/** Nested TranslatedFSString arguments deeper than this are treated as damage. */
const MAX_FS_STRING_DEPTH = 64;

const DEFAULT_VALUE_LAYOUT: ValueLayout = { translatedString: "versioned", translatedFSString: "versioned" };

/** [rows, columns] */
const MATRIX_SHAPES: Readonly<Record<MatrixAttributeType, readonly [number, number]>> = {
	[NodeAttributeType.Mat2]: [2, 2],
	[NodeAttributeType.Mat3]: [3, 3],
	[NodeAttributeType.Mat3x4]: [3, 4],
	[NodeAttributeType.Mat4x3]: [4, 3],
	[NodeAttributeType.Mat4]: [4, 4]
};

/** Byte width of every fixed-size tag; string, translated and blob tags use the attribute length. */
const FIXED_WIDTHS: Readonly<Partial<Record<NodeAttributeType, number>>> = {
	[NodeAttributeType.None]: 0,
	[NodeAttributeType.Byte]: 1,
	[NodeAttributeType.Bool]: 1,
	[NodeAttributeType.Int8]: 1,
	[NodeAttributeType.Short]: 2,
	[NodeAttributeType.UShort]: 2,
	[NodeAttributeType.Int]: 4,
	[NodeAttributeType.UInt]: 4,
	[NodeAttributeType.Float]: 4,
	[NodeAttributeType.Double]: 8,
	[NodeAttributeType.ULongLong]: 8,
	[NodeAttributeType.Long]: 8,
	[NodeAttributeType.Int64]: 8,
	[NodeAttributeType.IVec2]: 8,
	[NodeAttributeType.Vec2]: 8,
	[NodeAttributeType.IVec3]: 12,
	[NodeAttributeType.Vec3]: 12,
	[NodeAttributeType.IVec4]: 16,
	[NodeAttributeType.Vec4]: 16,
	[NodeAttributeType.Mat2]: 16,
	[NodeAttributeType.Mat3]: 36,
	[NodeAttributeType.Mat3x4]: 48,
	[NodeAttributeType.Mat4x3]: 48,
	[NodeAttributeType.Mat4]: 64,
	[NodeAttributeType.UUID]: 16
};

export function fixedWidth(type: NodeAttributeType): number | undefined {
	return FIXED_WIDTHS[type];
}

/** The attribute's bytes in the value stream, bounds checked. */
function valueBytes(attribute: Attribute, values: Buffer): Buffer {
	ensureRange(values.length, attribute.offset, attribute.length, `Value of attribute '${attribute.name}'`);
	const width = FIXED_WIDTHS[attribute.type];
	if (width !== undefined && attribute.length !== width) {
		throw corrupt(`Attribute '${attribute.name}' of type ${NodeAttributeType[attribute.type]} has length ${attribute.length}, expected ${width}`, {
			offset: attribute.offset,
			typeTag: attribute.type
		});
	}
	return values.subarray(attribute.offset, attribute.offset + attribute.length);
}

/** LSF-Format: length bytes, letztes Byte = Null-Terminator */
function readLsfString(buf: Buffer, what: string, offset?: number): string {
	if (buf.length === 0) return "";
	if (buf[buf.length - 1] !== 0) {
		throw corrupt(`${what} is not NUL-terminated`, { offset });
	}
	let end = buf.length - 1;
	while (end > 0 && buf[end - 1] === 0) end--;
	return decodeUtf8(buf.subarray(0, end), what, offset);
}

function readFloats(buf: Buffer, count: number): number[] {
	const out: number[] = [];
	for (let i = 0; i < count; i++) out.push(buf.readFloatLE(i * 4));
	return out;
}

function readInts(buf: Buffer, count: number): number[] {
	const out: number[] = [];
	for (let i = 0; i < count; i++) out.push(buf.readInt32LE(i * 4));
	return out;
}

function readMatrix(buf: Buffer, type: MatrixAttributeType): number[][] {
	const [rows, cols] = MATRIX_SHAPES[type];
	const out: number[][] = [];
	for (let r = 0; r < rows; r++) {
		out.push(readFloats(buf.subarray(r * cols * 4, (r + 1) * cols * 4), cols));
	}
	return out;
}

/** GUIDs are stored with the last 8 bytes swapped pairwise. */
export function formatUuid(buf: Buffer, byteSwap = true): string {
	let b = buf;
	if (byteSwap) {
		b = Buffer.from(buf);
		for (let i = 8; i < 16; i += 2) {
			[b[i], b[i + 1]] = [b[i + 1], b[i]];
		}
	}
	return [
		b.subarray(0, 4).toString("hex"),
		b.subarray(4, 6).toString("hex"),
		b.subarray(6, 8).toString("hex"),
		b.subarray(8, 10).toString("hex"),
		b.subarray(10, 16).toString("hex")
	].join("-");
}

/** Sequential reader for the variable-length translated string payloads. */
class ValueCursor {
	private pos = 0;

	constructor(
		private readonly buf: Buffer,
		private readonly attribute: Attribute
	) {}

	get consumed(): number {
		return this.pos;
	}

	private take(size: number, what: string): Buffer {
		ensureRange(this.buf.length, this.pos, size, `${what} of attribute '${this.attribute.name}'`, {
			offset: this.attribute.offset + this.pos
		});
		const out = this.buf.subarray(this.pos, this.pos + size);
		this.pos += size;
		return out;
	}

	u16(what: string): number {
		return this.take(2, what).readUInt16LE(0);
	}

	i32(what: string): number {
		return this.take(4, what).readInt32LE(0);
	}

	/** i32 length followed by a NUL-terminated string of that many bytes */
	string(what: string): string {
		const length = this.i32(`${what} length`);
		if (length < 0) {
			throw corrupt(`Negative ${what} length ${length} in attribute '${this.attribute.name}'`, {
				offset: this.attribute.offset + this.pos - 4
			});
		}
		const start = this.attribute.offset + this.pos;
		return readLsfString(this.take(length, what), `${what} of attribute '${this.attribute.name}'`, start);
	}
}

/** DOS2: valueLength, value, handleLength, handle. BG3: Version (2B) statt value */
function readTranslatedString(cursor: ValueCursor, layout: TranslatedStringLayout): TranslatedString {
	if (layout === "versioned") {
		const version = cursor.u16("Translated string version");
		return { version, handle: cursor.string("Translated string handle") };
	}
	const value = cursor.string("Translated string value");
	return { version: 0, value, handle: cursor.string("Translated string handle") };
}

/** Wie TranslatedString, dann arguments mit key, String (rekursiv), value */
function readTranslatedFSString(cursor: ValueCursor, layout: TranslatedStringLayout, depth: number): TranslatedFSString {
	if (depth > MAX_FS_STRING_DEPTH) {
		throw corrupt(`Translated format string nested deeper than ${MAX_FS_STRING_DEPTH} levels`);
	}
	const base = readTranslatedString(cursor, layout);
	const count = cursor.i32("Argument count");
	if (count < 0) throw corrupt(`Negative translated format string argument count ${count}`);

	const args: TranslatedFSStringArgument[] = [];
	for (let i = 0; i < count; i++) {
		const key = cursor.string("Argument key");
		const string = readTranslatedFSString(cursor, layout, depth + 1);
		const value = cursor.string("Argument value");
		args.push({ key, string, value });
	}
	return { ...base, arguments: args };
}

function checkConsumed(attribute: Attribute, cursor: ValueCursor): void {
	if (cursor.consumed !== attribute.length) {
		throw corrupt(`Attribute '${attribute.name}' declares ${attribute.length} bytes, but its value spans ${cursor.consumed}`, {
			offset: attribute.offset,
			typeTag: attribute.type
		});
	}
}

/**
 * Decode one attribute's value. Every read is bounds checked against `values`;
 * a length that disagrees with the type's width is CORRUPT_DATA, never truncated or padded.
 */
export function decodeValue(attribute: Attribute, values: Buffer, layout: ValueLayout = DEFAULT_VALUE_LAYOUT): DecodedValue {
	const buf = valueBytes(attribute, values);
	const type = attribute.type;

	switch (type) {
		case NodeAttributeType.None:
			return { type, value: null };
		case NodeAttributeType.Byte:
			return { type, value: buf.readUInt8(0) };
		case NodeAttributeType.Int8:
			return { type, value: buf.readInt8(0) };
		case NodeAttributeType.Bool:
			return { type, value: buf[0] !== 0 };
		case NodeAttributeType.Short:
			return { type, value: buf.readInt16LE(0) };
		case NodeAttributeType.UShort:
			return { type, value: buf.readUInt16LE(0) };
		case NodeAttributeType.Int:
			return { type, value: buf.readInt32LE(0) };
		case NodeAttributeType.UInt:
			return { type, value: buf.readUInt32LE(0) };
		case NodeAttributeType.Float:
			return { type, value: buf.readFloatLE(0) };
		case NodeAttributeType.Double:
			return { type, value: buf.readDoubleLE(0) };
		case NodeAttributeType.ULongLong:
			return { type, value: buf.readBigUInt64LE(0) };
		case NodeAttributeType.Long:
		case NodeAttributeType.Int64:
			return { type, value: buf.readBigInt64LE(0) };
		case NodeAttributeType.IVec2:
		case NodeAttributeType.IVec3:
		case NodeAttributeType.IVec4:
			return { type, value: readInts(buf, buf.length / 4) };
		case NodeAttributeType.Vec2:
		case NodeAttributeType.Vec3:
		case NodeAttributeType.Vec4:
			return { type, value: readFloats(buf, buf.length / 4) };
		case NodeAttributeType.Mat2:
		case NodeAttributeType.Mat3:
		case NodeAttributeType.Mat3x4:
		case NodeAttributeType.Mat4x3:
		case NodeAttributeType.Mat4:
			return { type, value: readMatrix(buf, type) };
		case NodeAttributeType.String:
		case NodeAttributeType.Path:
		case NodeAttributeType.FixedString:
		case NodeAttributeType.LSString:
		case NodeAttributeType.WString:
		case NodeAttributeType.LSWString:
			return { type, value: readLsfString(buf, `String attribute '${attribute.name}'`, attribute.offset) };
		case NodeAttributeType.UUID:
			return { type, value: formatUuid(buf) };
		case NodeAttributeType.ScratchBuffer:
			return { type, value: Buffer.from(buf) };
		case NodeAttributeType.TranslatedString: {
			const cursor = new ValueCursor(buf, attribute);
			const value = readTranslatedString(cursor, layout.translatedString);
			checkConsumed(attribute, cursor);
			return { type, value };
		}
		case NodeAttributeType.TranslatedFSString: {
			const cursor = new ValueCursor(buf, attribute);
			const value = readTranslatedFSString(cursor, layout.translatedFSString, 0);
			checkConsumed(attribute, cursor);
			return { type, value };
		}
	}
}

/** Raw bytes of a ScratchBuffer attribute, copied out of the value stream. */
export function decodeBlob(attribute: Attribute, values: Buffer): Buffer {
	if (attribute.type !== NodeAttributeType.ScratchBuffer) {
		throw new SaveError("TYPE_MISMATCH", `Attribute '${attribute.name}' is ${NodeAttributeType[attribute.type]}, not ScratchBuffer`, {
			typeTag: attribute.type
		});
	}
	return Buffer.from(valueBytes(attribute, values));
}

/** Fewest significant digits that read back as the same single-precision value. */
function shortestSingle(v: number): { mantissa: string; exponent: number } {
	let text = v.toExponential(8);
	for (let digits = 1; digits < 9; digits++) {
		const candidate = v.toExponential(digits - 1);
		if (Math.fround(Number(candidate)) === v) {
			text = candidate;
			break;
		}
	}
	const [mantissa, exponent] = text.split("e");
	return { mantissa, exponent: Number(exponent) };
}

/**
 * Single-precision value in general notation: fixed point for decimal exponents -5 < e < 15,
 * otherwise `d.dddE±XX`.
 */
export function formatFloat(n: number): string {
	if (!Number.isFinite(n)) return String(n);
	const v = Math.fround(n);
	if (v === 0) return "0";
	const { mantissa, exponent } = shortestSingle(v);
	if (exponent > -5 && exponent < 15) return String(Number(`${mantissa}e${exponent}`));
	const sign = exponent < 0 ? "-" : "+";
	return `${mantissa}E${sign}${String(Math.abs(exponent)).padStart(2, "0")}`;
}

function formatTranslated(value: TranslatedString): string {
	const parts = [`handle=${value.handle}`, `version=${value.version}`];
	if (value.value !== undefined) parts.push(`value=${JSON.stringify(value.value)}`);
	return parts.join(" ");
}

function formatTranslatedFS(value: TranslatedFSString): string {
	const args = value.arguments.map((arg) => `${arg.key}=(${formatTranslatedFS(arg.string)}) ${JSON.stringify(arg.value)}`);
	return args.length > 0 ? `${formatTranslated(value)} arguments=[${args.join(", ")}]` : formatTranslated(value);
}

/** Display form used by the CLI; vector components are space separated, matrix rows by "; ". */
export function formatValue(decoded: DecodedValue): string {
	switch (decoded.type) {
		case NodeAttributeType.None:
			return "";
		case NodeAttributeType.Bool:
			return decoded.value ? "True" : "False";
		case NodeAttributeType.Float:
			return formatFloat(decoded.value);
		case NodeAttributeType.Vec2:
		case NodeAttributeType.Vec3:
		case NodeAttributeType.Vec4:
			return decoded.value.map(formatFloat).join(" ");
		case NodeAttributeType.IVec2:
		case NodeAttributeType.IVec3:
		case NodeAttributeType.IVec4:
			return decoded.value.join(" ");
		case NodeAttributeType.Mat2:
		case NodeAttributeType.Mat3:
		case NodeAttributeType.Mat3x4:
		case NodeAttributeType.Mat4x3:
		case NodeAttributeType.Mat4:
			return decoded.value.map((row) => row.map(formatFloat).join(" ")).join("; ");
		case NodeAttributeType.ScratchBuffer:
			return decoded.value.toString("base64");
		case NodeAttributeType.TranslatedString:
			return formatTranslated(decoded.value);
		case NodeAttributeType.TranslatedFSString:
			return formatTranslatedFS(decoded.value);
		default:
			return String(decoded.value);
	}
}
