/**
 * Decompression for the LSV package and LSF resource formats
 * Supports Zlib, LZ4 block, LZ4 frame (DOS2/BG3) und Zstd (BG3)
 *
 * Every codec must produce exactly the size recorded by the caller; anything else is CORRUPT_DATA.
 */

import { inflateSync } from "node:zlib";
import { Decompress as ZstdDecompress } from "fzstd";
import lz4 from "lz4";
import { corrupt, ensureRange, isSaveError } from "../errors.js";
import { CompressionMethod } from "./types.js";

const LZ4_FRAME_MAGIC = 0x184d2204;
const LZ4_BLOCK_MAX_SIZES = [0, 0, 0, 0, 64 << 10, 256 << 10, 1 << 20, 4 << 20];
const LZ4_MIN_MATCH = 4;

function checkSize(method: CompressionMethod, actual: number, expected: number): void {
	if (actual !== expected) {
		throw corrupt(`${method} decompression produced ${actual} bytes, expected ${expected}`, {
			context: { method, actual: String(actual), expected: String(expected) }
		});
	}
}

export function decompressLZ4(compressed: Buffer, decompressedSize: number): Buffer {
	const output = Buffer.alloc(decompressedSize);
	if (decompressedSize === 0) {
		// Leerer Block: ein einzelnes Token ohne Literale
		if (compressed.length === 0 || (compressed.length === 1 && compressed[0] === 0)) return output;
		throw corrupt(`LZ4 block of ${compressed.length} bytes for an empty output`);
	}
	const result = lz4.decodeBlock(compressed, output);
	if (result < 0) {
		throw corrupt(`LZ4 block decompression failed: ${result} (expected ${decompressedSize} bytes)`, {
			context: { method: CompressionMethod.LZ4, code: String(result) }
		});
	}
	checkSize(CompressionMethod.LZ4, result, decompressedSize);
	return output;
}

/**
 * Linked LZ4 block (blockIndependence=0): matches may reach back into the output of earlier blocks,
 * so the block is decoded in place at `start` of the shared frame output.
 */
function decodeLinkedBlock(src: Buffer, dest: Buffer, start: number, end: number): number {
	let s = 0;
	let d = start;
	const readLength = (initial: number): number => {
		let length = initial;
		if (initial !== 15) return length;
		let b: number;
		do {
			if (s >= src.length) throw corrupt("Truncated LZ4 length field", { offset: s });
			b = src[s++];
			length += b;
		} while (b === 255);
		return length;
	};

	while (s < src.length) {
		const token = src[s++];
		const literalLength = readLength(token >>> 4);
		if (s + literalLength > src.length) throw corrupt("Truncated LZ4 literal run", { offset: s });
		if (d + literalLength > end) throw corrupt("LZ4 block exceeds expected output size", { offset: s });
		src.copy(dest, d, s, s + literalLength);
		s += literalLength;
		d += literalLength;
		// letzte Sequenz: nur Literale
		if (s === src.length) break;

		if (s + 2 > src.length) throw corrupt("Truncated LZ4 match offset", { offset: s });
		const matchOffset = src[s] | (src[s + 1] << 8);
		s += 2;
		if (matchOffset === 0 || matchOffset > d) throw corrupt(`Invalid LZ4 match offset ${matchOffset}`, { offset: s - 2 });
		const matchLength = readLength(token & 0x0f) + LZ4_MIN_MATCH;
		if (d + matchLength > end) throw corrupt("LZ4 block exceeds expected output size", { offset: s });
		// Overlap erlaubt, daher byteweise
		for (let i = 0; i < matchLength; i++) {
			dest[d] = dest[d - matchOffset];
			d++;
		}
	}
	return d;
}

/**
 * LZ4 frame. The content checksum trailer may be omitted, and the frame need not declare its
 * own size: the caller's expected size is authoritative.
 */
export function decompressLZ4Frame(raw: Buffer, decompressedSize: number): Buffer {
	ensureRange(raw.length, 0, 7, "LZ4 frame header");
	if (raw.readUInt32LE(0) !== LZ4_FRAME_MAGIC) {
		throw corrupt(`Invalid LZ4 frame magic 0x${raw.readUInt32LE(0).toString(16)}`, { offset: 0 });
	}
	let pos = 4;
	const flg = raw[pos++];
	const bd = raw[pos++];
	const version = flg >> 6;
	if (version !== 1) throw corrupt(`LZ4 frame version ${version} not supported`, { offset: 4 });
	const blockIndependence = ((flg >> 5) & 1) !== 0;
	const blockChecksum = ((flg >> 4) & 1) !== 0;
	const contentSize = ((flg >> 3) & 1) !== 0;
	const contentChecksum = ((flg >> 2) & 1) !== 0;
	const dictId = (flg & 1) !== 0;
	const blockMaxSize = LZ4_BLOCK_MAX_SIZES[(bd >> 4) & 0x7];
	if (!blockMaxSize) throw corrupt(`Invalid LZ4 block max size index ${(bd >> 4) & 0x7}`, { offset: 5 });

	if (contentSize) {
		ensureRange(raw.length, pos, 8, "LZ4 frame content size");
		const declared = raw.readBigUInt64LE(pos);
		if (declared !== BigInt(decompressedSize)) {
			throw corrupt(`LZ4 frame declares ${declared} bytes, expected ${decompressedSize}`, { offset: pos });
		}
		pos += 8;
	}
	if (dictId) pos += 4;
	// Header-Checksumme (nicht geprüft)
	pos += 1;
	ensureRange(raw.length, 0, pos, "LZ4 frame descriptor");

	const output = Buffer.alloc(decompressedSize);
	let outPos = 0;
	for (;;) {
		ensureRange(raw.length, pos, 4, "LZ4 frame block header");
		const blockSize = raw.readUInt32LE(pos);
		pos += 4;
		if (blockSize === 0) break; // EndMark

		const isUncompressed = (blockSize & 0x80000000) !== 0;
		const size = blockSize & 0x7fffffff;
		if (size > blockMaxSize) throw corrupt(`LZ4 frame block of ${size} bytes exceeds block max size ${blockMaxSize}`, { offset: pos - 4 });
		ensureRange(raw.length, pos, size, "LZ4 frame block");
		const blockData = raw.subarray(pos, pos + size);
		pos += size;
		if (blockChecksum) {
			ensureRange(raw.length, pos, 4, "LZ4 block checksum");
			pos += 4;
		}

		const room = decompressedSize - outPos;
		if (isUncompressed) {
			if (size > room) throw corrupt("LZ4 frame exceeds expected output size", { offset: pos });
			blockData.copy(output, outPos);
			outPos += size;
		} else if (blockIndependence) {
			const decoded = lz4.decodeBlock(blockData, output.subarray(outPos, outPos + Math.min(blockMaxSize, room)));
			if (decoded < 0) {
				throw corrupt(`LZ4 frame block decompression failed, code ${decoded}`, { offset: pos - size });
			}
			outPos += decoded;
		} else {
			outPos = decodeLinkedBlock(blockData, output, outPos, outPos + Math.min(blockMaxSize, room));
		}
	}

	checkSize(CompressionMethod.LZ4Frame, outPos, decompressedSize);
	const trailing = raw.length - pos;
	if (trailing !== 0 && !(contentChecksum && trailing === 4)) {
		throw corrupt(`${trailing} unexpected bytes after LZ4 frame end mark`, { offset: pos });
	}
	return output;
}

export function decompressZlib(compressed: Buffer, decompressedSize: number): Buffer {
	let out: Buffer;
	try {
		out = inflateSync(compressed, { maxOutputLength: Math.max(decompressedSize, 1) });
	} catch (err) {
		throw corrupt(`Zlib decompression failed: ${err instanceof Error ? err.message : String(err)}`, {
			cause: err,
			context: { method: CompressionMethod.Zlib }
		});
	}
	checkSize(CompressionMethod.Zlib, out.length, decompressedSize);
	return out;
}

/** Streams the frame into a buffer of the recorded size; output past that size is rejected as it arrives. */
export function decompressZstdBuffer(compressed: Buffer, decompressedSize: number): Buffer {
	const output = Buffer.alloc(decompressedSize);
	let written = 0;
	const stream = new ZstdDecompress((chunk) => {
		if (written + chunk.length > decompressedSize) {
			throw corrupt(`Zstd output exceeds ${decompressedSize} bytes`, { context: { method: CompressionMethod.Zstd } });
		}
		output.set(chunk, written);
		written += chunk.length;
	});
	try {
		stream.push(compressed, true);
	} catch (err) {
		if (isSaveError(err)) throw err;
		throw corrupt(`Zstd decompression failed: ${err instanceof Error ? err.message : String(err)}`, {
			cause: err,
			context: { method: CompressionMethod.Zstd }
		});
	}
	checkSize(CompressionMethod.Zstd, written, decompressedSize);
	return output;
}

export function decompress(input: Buffer, method: CompressionMethod, expectedOutputSize: number): Buffer {
	switch (method) {
		case CompressionMethod.None:
			checkSize(method, input.length, expectedOutputSize);
			return input;
		case CompressionMethod.Zlib:
			return decompressZlib(input, expectedOutputSize);
		case CompressionMethod.LZ4:
			return decompressLZ4(input, expectedOutputSize);
		case CompressionMethod.LZ4Frame:
			return decompressLZ4Frame(input, expectedOutputSize);
		case CompressionMethod.Zstd:
			return decompressZstdBuffer(input, expectedOutputSize);
	}
}
