import { SaveError } from "./errors.js";

const utf8DecoderFatal = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/** View a caller's bytes as a Buffer without copying. */
export function asBuffer(bytes: Uint8Array): Buffer {
	return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** Strict UTF-8: names and string values are load-bearing, so replacement characters are never produced. */
export function decodeUtf8(bytes: Uint8Array, what: string, offset?: number): string {
	try {
		return utf8DecoderFatal.decode(bytes);
	} catch (err) {
		throw new SaveError("INVALID_ENCODING", `${what} is not valid UTF-8`, { offset, cause: err });
	}
}

/** Fixed-size, NUL-padded name field (package file entries). */
export function nullTerminatedString(buf: Buffer, what: string): string {
	let end = 0;
	while (end < buf.length && buf[end] !== 0) end++;
	return decodeUtf8(buf.subarray(0, end), what);
}
