/**
 * LSF node tree: flat node and attribute tables, linked by index.
 *
 * V2 ("compact", 12 B): node = NameHashTableIndex, FirstAttributeIndex, ParentIndex
 *                       attr = NameHashTableIndex, TypeAndLength, NodeIndex (offsets implicit)
 * V3 ("wide", 16 B):    node = NameHashTableIndex, ParentIndex, NextSiblingIndex, FirstAttributeIndex
 *                       attr = NameHashTableIndex, TypeAndLength, NextAttributeIndex, Offset
 */

import { corrupt, SaveError } from "../errors.js";
import { checkLimit, resolveLimits, type DecodeLimits } from "../limits.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { unpackNameRef, type StringTable } from "./string-table.js";
import {
	isNodeAttributeType,
	LSFVersion,
	NO_INDEX,
	type Attribute,
	type EngineVersion,
	type Node,
	type NodeAttributeType,
	type NodeTreeLayout,
	type ResourceDocument,
	type ValueLayout
} from "./types.js";

interface NodeRecord {
	name: number;
	parent: number;
	firstAttribute: number;
}

interface LayoutCodec {
	nodeSize: number;
	attributeSize: number;
	readNode(buf: Buffer, off: number): NodeRecord;
	/** Pass 2: read attribute records and thread them onto their nodes. */
	readAttributes(buf: Buffer, nodes: Node[], strings: StringTable): Attribute[];
}

export interface NodeTreeFormat {
	version: LSFVersion;
	layout: NodeTreeLayout;
	engineVersion?: EngineVersion;
	valueLayout?: ValueLayout;
}

export interface NodeTreeOptions {
	limits?: Partial<DecodeLimits>;
	logger?: Logger;
}

/** Selected once per file: wide records need LSF v3+ and the KeysAndAdjacency metadata format. */
export function resolveNodeLayout(version: LSFVersion, metadataFormat: number): NodeTreeLayout {
	return version >= LSFVersion.ExtendedNodes && metadataFormat === 1 ? "wide" : "compact";
}

export function resolveValueLayout(version: LSFVersion, engine: EngineVersion): ValueLayout {
	const versionedTranslatedString =
		version >= LSFVersion.BG3 ||
		engine.major > 4 ||
		(engine.major === 4 && engine.revision > 0) ||
		(engine.major === 4 && engine.revision === 0 && engine.build >= 0x1a);
	return {
		translatedString: versionedTranslatedString ? "versioned" : "inline",
		translatedFSString: version >= LSFVersion.BG3 ? "versioned" : "inline"
	};
}

function readAttributeType(typeAndLength: number, index: number): NodeAttributeType {
	const tag = typeAndLength & 0x3f;
	if (!isNodeAttributeType(tag)) {
		throw new SaveError("UNSUPPORTED_TYPE", `Attribute ${index} has unknown type tag ${tag}`, {
			typeTag: tag,
			context: { attribute: String(index) }
		});
	}
	return tag;
}

function recordCount(buf: Buffer, size: number, what: string): number {
	if (buf.length % size !== 0) {
		throw corrupt(`${what} block of ${buf.length} bytes is not a multiple of the ${size}-byte record size`);
	}
	return buf.length / size;
}

function newAttribute(index: number, name: number, typeAndLength: number, strings: StringTable): Attribute {
	const nameRef = unpackNameRef(name);
	return {
		index,
		name: strings.resolve(nameRef),
		nameRef,
		type: readAttributeType(typeAndLength, index),
		length: typeAndLength >>> 6,
		owner: NO_INDEX,
		next: NO_INDEX,
		offset: 0
	};
}

const compactLayout: LayoutCodec = {
	nodeSize: 12,
	attributeSize: 12,
	readNode: (buf, off) => ({
		name: buf.readUInt32LE(off),
		// FirstAttributeIndex wird aus den NodeIndex-Feldern der Attribute abgeleitet
		firstAttribute: NO_INDEX,
		parent: buf.readInt32LE(off + 8)
	}),
	readAttributes(buf, nodes, strings) {
		const count = recordCount(buf, 12, "Attribute");
		const attributes: Attribute[] = [];
		const lastAttribute = new Array<number>(nodes.length).fill(NO_INDEX);
		let dataOffset = 0;

		for (let i = 0; i < count; i++) {
			const off = i * 12;
			const attr = newAttribute(i, buf.readUInt32LE(off), buf.readUInt32LE(off + 4), strings);
			const nodeIndex = buf.readInt32LE(off + 8);
			if (nodeIndex < 0 || nodeIndex >= nodes.length) {
				throw corrupt(`Attribute ${i} belongs to node ${nodeIndex}, but there are ${nodes.length} nodes`, { offset: off });
			}
			attr.owner = nodeIndex;
			attr.offset = dataOffset;
			dataOffset += attr.length;

			const prev = lastAttribute[nodeIndex];
			if (prev === NO_INDEX) {
				nodes[nodeIndex].firstAttribute = i;
			} else {
				attributes[prev].next = i;
			}
			lastAttribute[nodeIndex] = i;
			attributes.push(attr);
		}
		return attributes;
	}
};

const wideLayout: LayoutCodec = {
	nodeSize: 16,
	attributeSize: 16,
	readNode: (buf, off) => ({
		name: buf.readUInt32LE(off),
		parent: buf.readInt32LE(off + 4),
		// NextSiblingIndex (off + 8) is not trusted; siblings follow from the parent fields
		firstAttribute: buf.readInt32LE(off + 12)
	}),
	readAttributes(buf, nodes, strings) {
		const count = recordCount(buf, 16, "Attribute");
		const attributes: Attribute[] = [];
		for (let i = 0; i < count; i++) {
			const off = i * 16;
			const attr = newAttribute(i, buf.readUInt32LE(off), buf.readUInt32LE(off + 4), strings);
			attr.next = buf.readInt32LE(off + 8);
			attr.offset = buf.readUInt32LE(off + 12);
			attributes.push(attr);
		}

		for (const node of nodes) {
			let prev = NO_INDEX;
			let idx = node.firstAttribute;
			while (idx !== NO_INDEX) {
				if (idx < 0 || idx >= count) {
					throw corrupt(`Node ${node.index} references attribute ${idx}, but there are ${count} attributes`);
				}
				// Ketten zeigen nur vorwärts, damit terminiert jeder Durchlauf
				if (idx <= prev) {
					throw corrupt(`Attribute chain of node ${node.index} points backwards from ${prev} to ${idx}`);
				}
				const attr = attributes[idx];
				if (attr.owner !== NO_INDEX) {
					throw corrupt(`Attribute ${idx} is shared by nodes ${attr.owner} and ${node.index}`);
				}
				attr.owner = node.index;
				prev = idx;
				idx = attr.next;
			}
		}
		return attributes;
	}
};

const LAYOUTS: Readonly<Record<NodeTreeLayout, LayoutCodec>> = {
	compact: compactLayout,
	wide: wideLayout
};

/** Pass 1: nodes in file order. A parent must precede its child, which rules out cycles. */
function readNodes(buf: Buffer, codec: LayoutCodec, strings: StringTable, limits: DecodeLimits): Node[] {
	const count = recordCount(buf, codec.nodeSize, "Node");
	checkLimit(limits, "maxNodes", count);

	const nodes: Node[] = [];
	const lastChild = new Array<number>(count).fill(NO_INDEX);
	let lastRoot = NO_INDEX;

	for (let i = 0; i < count; i++) {
		const off = i * codec.nodeSize;
		const record = codec.readNode(buf, off);
		if (record.parent !== NO_INDEX && (record.parent < 0 || record.parent >= i)) {
			throw corrupt(`Node ${i} has parent ${record.parent}; a parent must precede its children`, { offset: off });
		}
		if (record.firstAttribute < NO_INDEX) {
			throw corrupt(`Node ${i} has invalid first attribute index ${record.firstAttribute}`, { offset: off });
		}

		const nameRef = unpackNameRef(record.name);
		const node: Node = {
			index: i,
			name: strings.resolve(nameRef),
			nameRef,
			parent: record.parent,
			firstAttribute: record.firstAttribute,
			firstChild: NO_INDEX,
			nextSibling: NO_INDEX
		};

		if (record.parent === NO_INDEX) {
			if (lastRoot !== NO_INDEX) nodes[lastRoot].nextSibling = i;
			lastRoot = i;
		} else {
			const prev = lastChild[record.parent];
			if (prev === NO_INDEX) {
				nodes[record.parent].firstChild = i;
			} else {
				nodes[prev].nextSibling = i;
			}
			lastChild[record.parent] = i;
		}
		nodes.push(node);
	}
	return nodes;
}

/**
 * Build the document skeleton from the raw node, attribute and value blocks.
 * The value stream is only sliced later, per attribute.
 */
export function parseNodeTree(
	nodeBytes: Buffer,
	attributeBytes: Buffer,
	valueBytes: Buffer,
	strings: StringTable,
	format: NodeTreeFormat,
	options?: NodeTreeOptions
): ResourceDocument {
	const limits = resolveLimits(options?.limits);
	const logger = options?.logger ?? silentLogger;
	const codec = LAYOUTS[format.layout];
	const engineVersion = format.engineVersion ?? { major: 0, minor: 0, revision: 0, build: 0 };

	logger.debug("reading nodes", { layout: format.layout, bytes: nodeBytes.length });
	const nodes = readNodes(nodeBytes, codec, strings, limits);
	checkLimit(limits, "maxAttributes", Math.floor(attributeBytes.length / codec.attributeSize));
	logger.debug("reading attributes", { layout: format.layout, bytes: attributeBytes.length });
	const attributes = codec.readAttributes(attributeBytes, nodes, strings);

	return {
		version: format.version,
		engineVersion,
		layout: format.layout,
		valueLayout: format.valueLayout ?? resolveValueLayout(format.version, engineVersion),
		strings,
		nodes,
		attributes,
		values: valueBytes
	};
}

function indexOf(node: Node | number): number {
	return typeof node === "number" ? node : node.index;
}

/** Top-level nodes (regions) in file order. Node 0 is always the first of them. */
export function* rootNodes(doc: ResourceDocument): Generator<Node> {
	for (let idx = doc.nodes.length > 0 ? 0 : NO_INDEX; idx !== NO_INDEX; idx = doc.nodes[idx].nextSibling) {
		yield doc.nodes[idx];
	}
}

export function* childNodes(doc: ResourceDocument, node: Node | number): Generator<Node> {
	const parent = doc.nodes[indexOf(node)];
	if (!parent) return;
	for (let idx = parent.firstChild; idx !== NO_INDEX; idx = doc.nodes[idx].nextSibling) {
		yield doc.nodes[idx];
	}
}

export function* nodeAttributes(doc: ResourceDocument, node: Node | number): Generator<Attribute> {
	const owner = doc.nodes[indexOf(node)];
	if (!owner) return;
	for (let idx = owner.firstAttribute; idx !== NO_INDEX; idx = doc.attributes[idx].next) {
		yield doc.attributes[idx];
	}
}

/** Names from the root down to `node`, inclusive. */
export function nodePath(doc: ResourceDocument, node: Node | number): string[] {
	const path: string[] = [];
	for (let idx = indexOf(node); idx !== NO_INDEX; idx = doc.nodes[idx].parent) {
		path.unshift(doc.nodes[idx].name);
	}
	return path;
}
