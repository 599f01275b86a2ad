/**
 * LSF resource reader: header, metadata and the compressed blocks around the node tree.
 *
 * File layout: LSFHeader (magic, version), engine version (Int32 < v5, Int64 >= v5),
 * LSFMetadataV5 (< v6) or LSFMetadataV6 (keys size pair), then strings, nodes, attributes, values, keys.
 */

import { asBuffer } from "../binary.js";
import { corrupt, ensureRange, SaveError } from "../errors.js";
import { checkLimit, resolveLimits, type DecodeLimits } from "../limits.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { decompress } from "../lsv/compression.js";
import { CompressionMethod, getCompressionMethod } from "../lsv/types.js";
import { parseNodeTree, resolveNodeLayout } from "./node-tree.js";
import { parseStringTable } from "./string-table.js";
import { LSFVersion, type EngineVersion, type LSFBlockSize, type LSFHeader, type LSFMetadataBlock, type ResourceDocument } from "./types.js";

const LSF_MAGIC = "LSOF";
const METADATA_V5_SIZE = 40; // 8×u32 Größen, Flags(1), Unknown(1), Unknown(2), MetadataFormat(4)
const METADATA_V6_SIZE = 48; // + Keys (2×u32)

export interface ResourceOptions {
	limits?: Partial<DecodeLimits>;
	logger?: Logger;
}

function isLSFVersion(version: number): version is LSFVersion {
	return Number.isInteger(version) && version >= LSFVersion.Initial && version <= LSFVersion.BG3Patch3;
}

function unrecognized(message: string): SaveError {
	return new SaveError("UNRECOGNIZED_FORMAT", message);
}

export class LSFReader {
	private readonly buffer: Buffer;
	private readonly limits: DecodeLimits;
	private readonly logger: Logger;
	private offset = 0;

	constructor(bytes: Uint8Array, options?: ResourceOptions) {
		this.buffer = asBuffer(bytes);
		this.limits = resolveLimits(options?.limits);
		this.logger = options?.logger ?? silentLogger;
		checkLimit(this.limits, "maxInputBytes", this.buffer.length);
	}

	public read(): ResourceDocument {
		this.offset = 0;
		const header = this.readHeader();
		const meta = this.readMetadata(header.version);
		const layout = resolveNodeLayout(header.version, meta.metadataFormat);
		this.logger.debug("reading LSF resource", {
			version: header.version,
			engineVersion: `${header.engineVersion.major}.${header.engineVersion.minor}.${header.engineVersion.revision}.${header.engineVersion.build}`,
			compressionFlags: meta.compressionFlags,
			metadataFormat: meta.metadataFormat,
			layout
		});

		// Strings sind nie gechunkt
		const strings = parseStringTable(this.readBlock(meta.strings, meta.compressionFlags, header.version, "strings", false));
		const nodes = this.readBlock(meta.nodes, meta.compressionFlags, header.version, "nodes", true);
		const attributes = this.readBlock(meta.attributes, meta.compressionFlags, header.version, "attributes", true);
		let values = this.readBlock(meta.values, meta.compressionFlags, header.version, "values", true);
		// Keys-Block (v6+) folgt danach und wird nicht benötigt

		// Unkomprimierte Blöcke zeigen noch in den Eingabepuffer
		if (values.buffer === this.buffer.buffer) values = Buffer.from(values);

		return parseNodeTree(
			nodes,
			attributes,
			values,
			strings,
			{ version: header.version, layout, engineVersion: header.engineVersion },
			{ limits: this.limits, logger: this.logger }
		);
	}

	public readHeader(): LSFHeader {
		if (this.buffer.length < 8) throw unrecognized(`Not an LSF resource: only ${this.buffer.length} bytes`);
		const magic = this.buffer.toString("latin1", 0, 4);
		if (magic !== LSF_MAGIC) {
			throw unrecognized(`Invalid LSF magic: ${JSON.stringify(magic)}`);
		}
		const version = this.buffer.readUInt32LE(4);
		if (!isLSFVersion(version)) throw unrecognized(`Unsupported LSF version ${version}`);

		// BG3 v5+ (VerBG3ExtendedHeader): Int64 EngineVersion
		const engineSize = version >= LSFVersion.BG3ExtendedHeader ? 8 : 4;
		if (this.buffer.length < 8 + engineSize) throw unrecognized("Truncated LSF header");
		const engineVersion =
			engineSize === 8 ? LSFReader.unpackEngineVersion64(this.buffer.readBigInt64LE(8)) : LSFReader.unpackEngineVersion32(this.buffer.readUInt32LE(8));
		this.offset = 8 + engineSize;
		return { magic, version, engineVersion };
	}

	/** major(4) minor(4) revision(8) build(16) */
	static unpackEngineVersion32(v: number): EngineVersion {
		return {
			major: (v >>> 28) & 0xf,
			minor: (v >>> 24) & 0xf,
			revision: (v >>> 16) & 0xff,
			build: v & 0xffff
		};
	}

	/** major(7) minor(8) revision(16) build(31); merged files without a version carry 0 */
	static unpackEngineVersion64(v: bigint): EngineVersion {
		const major = Number((v >> 55n) & 0x7fn);
		if (major === 0) return { major: 4, minor: 0, revision: 9, build: 0 };
		return {
			major,
			minor: Number((v >> 47n) & 0xffn),
			revision: Number((v >> 31n) & 0xffffn),
			build: Number(v & 0x7fffffffn)
		};
	}

	private readMetadata(version: LSFVersion): LSFMetadataBlock {
		const o = this.offset;
		const size = (at: number): LSFBlockSize => ({
			uncompressedSize: this.buffer.readUInt32LE(at),
			sizeOnDisk: this.buffer.readUInt32LE(at + 4)
		});

		// BG3 v6+ (VerBG3AdditionalBlob): LSFMetadataV6 mit Keys-Block
		if (version >= LSFVersion.BG3AdditionalBlob) {
			ensureRange(this.buffer.length, o, METADATA_V6_SIZE, "LSF metadata");
			this.offset = o + METADATA_V6_SIZE;
			return {
				strings: size(o),
				keys: size(o + 8),
				nodes: size(o + 16),
				attributes: size(o + 24),
				values: size(o + 32),
				compressionFlags: this.buffer[o + 40],
				metadataFormat: this.buffer.readUInt32LE(o + 44)
			};
		}

		ensureRange(this.buffer.length, o, METADATA_V5_SIZE, "LSF metadata");
		this.offset = o + METADATA_V5_SIZE;
		return {
			strings: size(o),
			nodes: size(o + 8),
			attributes: size(o + 16),
			values: size(o + 24),
			compressionFlags: this.buffer[o + 32],
			metadataFormat: this.buffer.readUInt32LE(o + 36)
		};
	}

	/**
	 * sizeOnDisk = 0 and uncompressed = 0: empty block; sizeOnDisk = 0: stored raw.
	 * Chunked blocks (LSF v2+, everything but strings) are LZ4 frames.
	 */
	private readBlock(block: LSFBlockSize, flags: number, version: LSFVersion, what: string, allowChunked: boolean): Buffer {
		const { sizeOnDisk, uncompressedSize } = block;
		if (sizeOnDisk === 0 && uncompressedSize === 0) return Buffer.alloc(0);
		checkLimit(this.limits, "maxMemberBytes", uncompressedSize);

		if (sizeOnDisk === 0) {
			ensureRange(this.buffer.length, this.offset, uncompressedSize, `LSF ${what} block`);
			const raw = this.buffer.subarray(this.offset, this.offset + uncompressedSize);
			this.offset += uncompressedSize;
			return raw;
		}

		const method = getCompressionMethod(flags, allowChunked && version >= LSFVersion.ChunkedCompress);
		const toRead = method === CompressionMethod.None ? uncompressedSize : sizeOnDisk;
		ensureRange(this.buffer.length, this.offset, toRead, `LSF ${what} block`);
		const raw = this.buffer.subarray(this.offset, this.offset + toRead);
		const start = this.offset;
		this.offset += toRead;

		this.logger.debug("reading LSF block", { block: what, method, sizeOnDisk, uncompressedSize });
		try {
			return decompress(raw, method, uncompressedSize);
		} catch (err) {
			if (!(err instanceof SaveError) || err.code !== "CORRUPT_DATA") throw err;
			throw corrupt(`LSF ${what} block at ${start}: ${err.message}`, { offset: start, context: err.context, cause: err });
		}
	}
}

/** Decode a complete LSF resource into a document. */
export function readResource(bytes: Uint8Array, options?: ResourceOptions): ResourceDocument {
	return new LSFReader(bytes, options).read();
}
