/**
 * LSV Package Format Types (LSPK container)
 */

import { SaveError } from "../errors.js";

export const LSPK_SIGNATURE = 0x4b50534c; // "LSPK"

/** Package versions this reader understands; the header's version field picks the layout. */
export enum PackageVersion {
	/** DOS2 saves: header as trailer at the end of the file */
	V13 = 13,
	/** BG3 saves: header at the start of the file */
	V18 = 18
}

export enum CompressionMethod {
	None = "none",
	Zlib = "zlib",
	/** Raw LZ4 block, output size known from the table */
	LZ4 = "lz4",
	/** Chunked LZ4 frame; may carry its own content size */
	LZ4Frame = "lz4-frame",
	Zstd = "zstd"
}

export enum CompressionFlags {
	MethodNone = 0,
	MethodZlib = 1,
	MethodLZ4 = 2,
	MethodZstd = 3,
	FastCompress = 0x10,
	DefaultCompress = 0x20,
	MaxCompress = 0x40
}

/**
 * Low nibble = method, bits 4-6 = compression level. Anything else is rejected instead of guessed.
 * `chunked` selects the frame variant for LZ4 (LSF blocks from v2 on).
 */
export function getCompressionMethod(flags: number, chunked = false): CompressionMethod {
	const method = flags & 0x0f;
	if ((flags & ~0x7f) !== 0 || method > CompressionFlags.MethodZstd) {
		throw new SaveError("UNSUPPORTED_COMPRESSION", `Unsupported compression flags 0x${flags.toString(16)}`, {
			context: { flags: String(flags) }
		});
	}
	switch (method) {
		case CompressionFlags.MethodNone:
			return CompressionMethod.None;
		case CompressionFlags.MethodZlib:
			return CompressionMethod.Zlib;
		case CompressionFlags.MethodLZ4:
			return chunked ? CompressionMethod.LZ4Frame : CompressionMethod.LZ4;
		default:
			return CompressionMethod.Zstd;
	}
}

export interface FileEntry {
	/** Path inside the package, forward slashes */
	name: string;
	archivePart: number;
	offsetInFile: number;
	sizeOnDisk: number;
	uncompressedSize: number;
	flags: number;
	method: CompressionMethod;
	/** 0 when the layout carries no checksum */
	crc: number;
	/** LSLib deletion marker in the offset field */
	deleted: boolean;
}

export interface Package {
	version: PackageVersion;
	flags: number;
	priority: number;
	numParts: number;
	files: readonly FileEntry[];
	/** segments[0] is the package buffer itself, further parts follow */
	segments: readonly (Buffer | undefined)[];
	/** Byte range of the header and the file list in segment 0 */
	reserved: readonly { offset: number; size: number }[];
}
