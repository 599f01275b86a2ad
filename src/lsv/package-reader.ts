/**
 * LSV (Larian Savegame) Package Reader
 * Parses the LSPK header and file list and hands out decompressed members.
 *
 * Layouts: v13 (DOS2, header as trailer) and v18 (BG3, header at the start).
 */

import { asBuffer, nullTerminatedString } from "../binary.js";
import { crc32 } from "../crc32.js";
import { corrupt, ensureRange, isSaveError, notFound, SaveError, withEntryName } from "../errors.js";
import { checkLimit, resolveLimits, type DecodeLimits } from "../limits.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { decompress, decompressLZ4 } from "./compression.js";
import { CompressionMethod, getCompressionMethod, LSPK_SIGNATURE, PackageVersion, type FileEntry, type Package } from "./types.js";

const HEADER_16_SIZE = 40; // Signature(4), Version(4), FileListOffset(8), FileListSize(4), Flags(1), Priority(1), Md5(16), NumParts(2)
const HEADER_13_SIZE = 32; // Version(4), FileListOffset(4), FileListSize(4), NumParts(2), Flags(1), Priority(1), Md5(16)
const TRAILER_SIZE = 8; // HeaderSize(4), Signature(4)
const FILE_ENTRY_13_SIZE = 280; // Name(256), Offset(4), SizeOnDisk(4), UncompressedSize(4), Part(4), Flags(4), Crc(4)
const FILE_ENTRY_18_SIZE = 272; // Name(256), Off1(4), Off2(2), Part(1), Flags(1), SizeOnDisk(4), UncompressedSize(4)
const NAME_SIZE = 256;
const DELETION_MARKER = 0xbeefdeadbeef;

export interface ReadOptions {
	limits?: Partial<DecodeLimits>;
	logger?: Logger;
}

export interface PackageOptions extends ReadOptions {
	/** Archive parts 1..n of a multi-part package; part 0 is the main buffer. */
	parts?: readonly Uint8Array[];
}

interface PackageHeader {
	version: PackageVersion;
	fileListOffset: number;
	fileListSize: number;
	numParts: number;
	flags: number;
	priority: number;
	headerOffset: number;
	headerSize: number;
}

function unrecognized(message: string): SaveError {
	return new SaveError("UNRECOGNIZED_FORMAT", message);
}

function readHeader(data: Buffer): PackageHeader {
	if (data.length < TRAILER_SIZE) {
		throw unrecognized(`Not an LSPK package: only ${data.length} bytes`);
	}

	// BG3 v18: Signature am Anfang
	if (data.readUInt32LE(0) === LSPK_SIGNATURE) {
		if (data.length < HEADER_16_SIZE) throw unrecognized(`Truncated LSPK header (${data.length} bytes)`);
		const version = data.readUInt32LE(4);
		if (version !== PackageVersion.V18) throw unrecognized(`Unsupported package version ${version}`);
		return {
			version,
			fileListOffset: Number(data.readBigUInt64LE(8)),
			fileListSize: data.readUInt32LE(16),
			flags: data[20],
			priority: data[21],
			numParts: data.readUInt16LE(38),
			headerOffset: 0,
			headerSize: HEADER_16_SIZE
		};
	}

	// DOS2 v13: Trailer am Ende = [LSPKHeader13][headerSize][signature]
	const signature = data.readUInt32LE(data.length - 4);
	if (signature !== LSPK_SIGNATURE) {
		throw unrecognized(`Invalid LSV signature: expected LSPK (0x${LSPK_SIGNATURE.toString(16)}), got 0x${signature.toString(16)}`);
	}
	const headerSize = data.readUInt32LE(data.length - 8);
	if (headerSize < HEADER_13_SIZE + TRAILER_SIZE || headerSize > data.length) {
		throw unrecognized(`Invalid LSPK trailer size ${headerSize}`);
	}
	const headerOffset = data.length - headerSize;
	const version = data.readUInt32LE(headerOffset);
	if (version !== PackageVersion.V13) throw unrecognized(`Unsupported package version ${version}`);
	return {
		version,
		fileListOffset: data.readUInt32LE(headerOffset + 4),
		fileListSize: data.readUInt32LE(headerOffset + 8),
		numParts: data.readUInt16LE(headerOffset + 12),
		flags: data[headerOffset + 14],
		priority: data[headerOffset + 15],
		headerOffset,
		headerSize
	};
}

function entryMethod(name: string, flags: number): CompressionMethod {
	try {
		return getCompressionMethod(flags);
	} catch (err) {
		if (!isSaveError(err)) throw err;
		throw new SaveError(err.code, `File '${name}' has unsupported flags: ${flags}`, { entryName: name, context: err.context, cause: err });
	}
}

function parseEntry(entry: Buffer, version: PackageVersion): FileEntry {
	const name = nullTerminatedString(entry.subarray(0, NAME_SIZE), "File entry name");

	let offsetInFile: number;
	let sizeOnDisk: number;
	let uncompressedSize: number;
	let archivePart: number;
	let flags: number;
	let crc = 0;

	if (version === PackageVersion.V18) {
		offsetInFile = entry.readUInt32LE(256) + entry.readUInt16LE(260) * 0x1_0000_0000;
		archivePart = entry[262];
		flags = entry[263];
		sizeOnDisk = entry.readUInt32LE(264);
		uncompressedSize = entry.readUInt32LE(268);
	} else {
		offsetInFile = entry.readUInt32LE(256);
		sizeOnDisk = entry.readUInt32LE(260);
		uncompressedSize = entry.readUInt32LE(264);
		archivePart = entry.readUInt32LE(268);
		flags = entry.readUInt32LE(272);
		crc = entry.readUInt32LE(276);
	}

	const method = entryMethod(name, flags);
	return {
		name,
		archivePart,
		offsetInFile,
		sizeOnDisk,
		// Unkomprimierte Einträge tragen oft 0 als Größe
		uncompressedSize: method === CompressionMethod.None && uncompressedSize === 0 ? sizeOnDisk : uncompressedSize,
		flags,
		method,
		crc,
		deleted: offsetInFile === DELETION_MARKER
	};
}

function readFileList(data: Buffer, header: PackageHeader, limits: DecodeLimits, logger: Logger): { files: FileEntry[]; size: number } {
	const offset = header.fileListOffset;
	const isV18 = header.version === PackageVersion.V18;
	const prefixSize = isV18 ? 8 : 4;
	ensureRange(data.length, offset, prefixSize, "File list header");

	const numFiles = data.readUInt32LE(offset);
	checkLimit(limits, "maxEntries", numFiles);
	let compressedSize: number;
	if (isV18) {
		compressedSize = data.readUInt32LE(offset + 4);
	} else {
		if (header.fileListSize < prefixSize) throw corrupt(`Invalid file list size ${header.fileListSize}`, { offset });
		compressedSize = header.fileListSize - prefixSize;
	}
	ensureRange(data.length, offset + prefixSize, compressedSize, "Compressed file list");

	const entrySize = isV18 ? FILE_ENTRY_18_SIZE : FILE_ENTRY_13_SIZE;
	logger.debug("reading file list", { numFiles, compressedSize, entrySize });
	const list = decompressLZ4(data.subarray(offset + prefixSize, offset + prefixSize + compressedSize), numFiles * entrySize);

	const files: FileEntry[] = [];
	for (let i = 0; i < numFiles; i++) {
		files.push(parseEntry(list.subarray(i * entrySize, (i + 1) * entrySize), header.version));
	}
	return { files, size: prefixSize + compressedSize };
}

function overlaps(a: { offset: number; size: number }, b: { offset: number; size: number }): boolean {
	return a.size > 0 && b.size > 0 && a.offset < b.offset + b.size && b.offset < a.offset + a.size;
}

function validate(pkg: Package): void {
	const names = new Set<string>();
	for (const file of pkg.files) {
		if (names.has(file.name)) throw corrupt(`Duplicate file name '${file.name}' in package`, { entryName: file.name });
		names.add(file.name);
		if (file.deleted) continue;

		if (file.archivePart >= pkg.numParts) {
			throw corrupt(`File '${file.name}' references archive part ${file.archivePart} of ${pkg.numParts}`, { entryName: file.name });
		}
		const segment = pkg.segments[file.archivePart];
		if (!segment) continue;
		ensureRange(segment.length, file.offsetInFile, file.sizeOnDisk, `File '${file.name}'`, { entryName: file.name });
		if (file.archivePart !== 0) continue;
		const range = { offset: file.offsetInFile, size: file.sizeOnDisk };
		for (const reserved of pkg.reserved) {
			if (overlaps(range, reserved)) {
				throw corrupt(`File '${file.name}' overlaps the package header or file list at ${reserved.offset}`, {
					entryName: file.name,
					offset: file.offsetInFile
				});
			}
		}
	}
}

/**
 * Parse an LSV package and return its file table. Members are not decompressed here.
 */
export function openPackage(bytes: Uint8Array, options?: PackageOptions): Package {
	const limits = resolveLimits(options?.limits);
	const logger = options?.logger ?? silentLogger;
	const data = asBuffer(bytes);
	checkLimit(limits, "maxInputBytes", data.length);
	const parts = (options?.parts ?? []).map(asBuffer);
	for (const part of parts) checkLimit(limits, "maxInputBytes", part.length);

	const header = readHeader(data);
	logger.debug("found package header", {
		version: header.version,
		fileListOffset: header.fileListOffset,
		numParts: header.numParts
	});
	const { files, size } = readFileList(data, header, limits, logger);
	const numParts = Math.max(header.numParts, 1);

	const pkg: Package = {
		version: header.version,
		flags: header.flags,
		priority: header.priority,
		numParts,
		files,
		segments: Array.from({ length: numParts }, (_, i) => (i === 0 ? data : parts[i - 1])),
		reserved: [
			{ offset: header.headerOffset, size: header.headerSize },
			{ offset: header.fileListOffset, size }
		]
	};
	validate(pkg);
	return pkg;
}

export function listMembers(pkg: Package): string[] {
	return pkg.files.filter((f) => !f.deleted).map((f) => f.name);
}

export function findMember(pkg: Package, name: string, options?: { ignoreCase?: boolean }): FileEntry | undefined {
	if (options?.ignoreCase) {
		const lower = name.toLowerCase();
		return pkg.files.find((f) => !f.deleted && f.name.toLowerCase() === lower);
	}
	return pkg.files.find((f) => !f.deleted && f.name === name);
}

/** Decompress one entry. Nothing is cached; callers keep the result if they need it again. */
export function readEntry(pkg: Package, file: FileEntry, options?: ReadOptions): Buffer {
	const limits = resolveLimits(options?.limits);
	const logger = options?.logger ?? silentLogger;
	if (file.deleted) throw notFound(`File ${file.name} is marked as deleted`, { entryName: file.name });

	const segment = pkg.segments[file.archivePart];
	if (!segment) {
		throw notFound(`Archive part ${file.archivePart} for '${file.name}' was not supplied`, { entryName: file.name });
	}
	ensureRange(segment.length, file.offsetInFile, file.sizeOnDisk, `File '${file.name}'`, { entryName: file.name });
	checkLimit(limits, "maxMemberBytes", file.uncompressedSize, file.name);

	const chunk = segment.subarray(file.offsetInFile, file.offsetInFile + file.sizeOnDisk);
	if (file.crc !== 0) {
		const actual = crc32(chunk);
		if (actual !== file.crc) {
			throw corrupt(`CRC mismatch for '${file.name}': expected 0x${file.crc.toString(16)}, got 0x${actual.toString(16)}`, {
				entryName: file.name,
				offset: file.offsetInFile
			});
		}
	}

	logger.debug("extracting member", { name: file.name, method: file.method, sizeOnDisk: file.sizeOnDisk, uncompressedSize: file.uncompressedSize });
	try {
		return decompress(chunk, file.method, file.uncompressedSize);
	} catch (err) {
		if (!isSaveError(err)) throw err;
		throw withEntryName(err, file.name);
	}
}

export function readMember(pkg: Package, name: string, options?: ReadOptions): Buffer {
	const file = pkg.files.find((f) => f.name === name);
	if (!file) throw notFound(`File '${name}' not found in package`, { entryName: name });
	return readEntry(pkg, file, options);
}
