/**
 * Extraction: package → member → LSF document → attribute values.
 *
 * @example
 * ```ts
 * const doc = extractDocument(readFileSync("Save.lsv"), "meta.lsf");
 * const blob = blobAt(doc, ["MetaData", "MetaData"], "Thumbnail");
 * ```
 */

import { isSaveError, notFound, withEntryName } from "./errors.js";
import { readResource } from "./lsf/reader.js";
import { childNodes, nodeAttributes, rootNodes } from "./lsf/node-tree.js";
import { decodeBlob, decodeValue } from "./lsf/values.js";
import type { Attribute, DecodedValue, Node, ResourceDocument } from "./lsf/types.js";
import { findMember, openPackage, readEntry, type PackageOptions } from "./lsv/package-reader.js";
import type { FileEntry, Package } from "./lsv/types.js";

export type ExtractOptions = PackageOptions;

function documentFromEntry(pkg: Package, entry: FileEntry, options?: ExtractOptions): ResourceDocument {
	const bytes = readEntry(pkg, entry, options);
	try {
		return readResource(bytes, options);
	} catch (err) {
		if (!isSaveError(err)) throw err;
		throw withEntryName(err, entry.name);
	}
}

/** Open the package, decompress one member and decode it as an LSF resource. */
export function extractDocument(packageBytes: Uint8Array, memberName: string, options?: ExtractOptions): ResourceDocument {
	const pkg = openPackage(packageBytes, options);
	const entry = findMember(pkg, memberName);
	if (!entry) throw notFound(`File '${memberName}' not found in package`, { entryName: memberName });
	return documentFromEntry(pkg, entry, options);
}

/** Globals.lsf, matched case-insensitively as saves spell it either way. */
export function extractGlobals(packageBytes: Uint8Array, options?: ExtractOptions): ResourceDocument {
	const pkg = openPackage(packageBytes, options);
	const entry = findMember(pkg, "Globals.lsf", { ignoreCase: true });
	if (!entry) throw notFound("No Globals.lsf in package", { entryName: "Globals.lsf" });
	return documentFromEntry(pkg, entry, options);
}

/** Walk from a root node down the child chains; segment 0 names the root. */
export function findNode(doc: ResourceDocument, path: readonly string[]): Node {
	if (path.length === 0) throw notFound("Empty node path");
	let candidates: Iterable<Node> = rootNodes(doc);
	let current: Node | undefined;
	for (let depth = 0; depth < path.length; depth++) {
		const segment = path[depth];
		current = undefined;
		for (const node of candidates) {
			if (node.name === segment) {
				current = node;
				break;
			}
		}
		if (!current) {
			throw notFound(`No node '${segment}' at ${path.slice(0, depth).join("/") || "root level"}`, {
				context: { path: path.join("/"), segment }
			});
		}
		candidates = childNodes(doc, current);
	}
	if (!current) throw notFound("Empty node path");
	return current;
}

export function findAttribute(doc: ResourceDocument, path: readonly string[], attributeName: string): Attribute {
	const node = findNode(doc, path);
	for (const attr of nodeAttributes(doc, node)) {
		if (attr.name === attributeName) return attr;
	}
	throw notFound(`Node '${path.join("/")}' has no attribute '${attributeName}'`, {
		context: { path: path.join("/"), attribute: attributeName }
	});
}

export function valueAt(doc: ResourceDocument, path: readonly string[], attributeName: string): DecodedValue {
	return decodeValue(findAttribute(doc, path, attributeName), doc.values, doc.valueLayout);
}

/** Raw bytes of a ScratchBuffer attribute; any other type is TYPE_MISMATCH. */
export function blobAt(doc: ResourceDocument, path: readonly string[], attributeName: string): Buffer {
	return decodeBlob(findAttribute(doc, path, attributeName), doc.values);
}
