/**
 * LSV Extract
 *
 * Liest LSV-Savegame-Pakete (LSPK v13/v18) und die darin enthaltenen LSF-Ressourcen
 * und gibt einzelne Attributwerte, auch Binärdaten, zurück. Nur lesend.
 *
 * @example
 * ```ts
 * import { openPackage, listMembers, extractDocument, blobAt } from "lsv-extract";
 *
 * const data = readFileSync("Save.lsv");
 * console.log(listMembers(openPackage(data)));
 *
 * const doc = extractDocument(data, "meta.lsf");
 * const thumbnail = blobAt(doc, ["MetaData", "MetaData"], "Thumbnail");
 * ```
 */

export { SaveError, isSaveError } from "./errors.js";
export type { SaveErrorCode, SaveErrorOptions } from "./errors.js";
export { DEFAULT_LIMITS, resolveLimits } from "./limits.js";
export type { DecodeLimits } from "./limits.js";
export { createLogger, silentLogger } from "./logging/logger.js";
export type { Logger, LogLevel, LogSink } from "./logging/logger.js";
export { crc32 } from "./crc32.js";

export { decompress, decompressLZ4, decompressLZ4Frame, decompressZlib, decompressZstdBuffer } from "./lsv/compression.js";
export { openPackage, listMembers, findMember, readEntry, readMember } from "./lsv/package-reader.js";
export type { PackageOptions, ReadOptions } from "./lsv/package-reader.js";
export { CompressionMethod, PackageVersion, getCompressionMethod } from "./lsv/types.js";
export type { FileEntry, Package } from "./lsv/types.js";

export { StringTable, parseStringTable, unpackNameRef } from "./lsf/string-table.js";
export { parseNodeTree, resolveNodeLayout, resolveValueLayout, rootNodes, childNodes, nodeAttributes, nodePath } from "./lsf/node-tree.js";
export type { NodeTreeFormat, NodeTreeOptions } from "./lsf/node-tree.js";
export { decodeValue, decodeBlob, formatValue, formatFloat, formatUuid, fixedWidth } from "./lsf/values.js";
export { LSFReader, readResource } from "./lsf/reader.js";
export type { ResourceOptions } from "./lsf/reader.js";
export { LSFVersion, NodeAttributeType, NO_INDEX } from "./lsf/types.js";
export type {
	Attribute,
	DecodedValue,
	EngineVersion,
	NameRef,
	Node,
	NodeTreeLayout,
	ResourceDocument,
	TranslatedFSString,
	TranslatedFSStringArgument,
	TranslatedString,
	ValueLayout
} from "./lsf/types.js";

export { extractDocument, extractGlobals, findNode, findAttribute, valueAt, blobAt } from "./extract.js";
export type { ExtractOptions } from "./extract.js";
