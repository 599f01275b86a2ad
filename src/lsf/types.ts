/**
 * LSF Types – AttributeType numbering as in LSLib
 * https://github.com/Norbyte/lslib/blob/master/LSLib/LS/NodeAttribute.cs
 */

import type { StringTable } from "./string-table.js";

export enum NodeAttributeType {
	None = 0,
	Byte = 1,
	Short = 2,
	UShort = 3,
	Int = 4,
	UInt = 5,
	Float = 6,
	Double = 7,
	IVec2 = 8,
	IVec3 = 9,
	IVec4 = 10,
	Vec2 = 11,
	Vec3 = 12,
	Vec4 = 13,
	Mat2 = 14,
	Mat3 = 15,
	Mat3x4 = 16,
	Mat4x3 = 17,
	Mat4 = 18,
	Bool = 19,
	String = 20,
	Path = 21,
	FixedString = 22,
	LSString = 23,
	ULongLong = 24,
	ScratchBuffer = 25,
	Long = 26,
	Int8 = 27,
	TranslatedString = 28,
	WString = 29,
	LSWString = 30,
	UUID = 31,
	Int64 = 32,
	TranslatedFSString = 33
}

/** Last supported type tag; anything above is UNSUPPORTED_TYPE. */
export const MAX_ATTRIBUTE_TYPE = NodeAttributeType.TranslatedFSString;

export function isNodeAttributeType(tag: number): tag is NodeAttributeType {
	return Number.isInteger(tag) && tag >= 0 && tag <= MAX_ATTRIBUTE_TYPE;
}

export enum LSFVersion {
	Initial = 1,
	ChunkedCompress = 2,
	ExtendedNodes = 3,
	BG3 = 4,
	BG3ExtendedHeader = 5,
	BG3AdditionalBlob = 6,
	BG3Patch3 = 7
}

export interface EngineVersion {
	major: number;
	minor: number;
	revision: number;
	build: number;
}

export interface LSFHeader {
	magic: string;
	version: LSFVersion;
	engineVersion: EngineVersion;
}

export interface LSFBlockSize {
	uncompressedSize: number;
	sizeOnDisk: number;
}

export interface LSFMetadataBlock {
	strings: LSFBlockSize;
	/** BG3 v6+ (KeysAndAdjacency) */
	keys?: LSFBlockSize;
	nodes: LSFBlockSize;
	attributes: LSFBlockSize;
	values: LSFBlockSize;
	compressionFlags: number;
	metadataFormat: number;
}

/** Sentinel for "no parent / no attribute / no child / no sibling". */
export const NO_INDEX = -1;

/** String table reference; stored on disk as (page << 16) | index. */
export interface NameRef {
	page: number;
	index: number;
}

/** wide = 16-byte records with explicit chains, compact = 12-byte records with owner indices */
export type NodeTreeLayout = "wide" | "compact";

export interface Node {
	index: number;
	name: string;
	nameRef: NameRef;
	parent: number;
	firstAttribute: number;
	firstChild: number;
	nextSibling: number;
}

export interface Attribute {
	index: number;
	name: string;
	nameRef: NameRef;
	type: NodeAttributeType;
	/** Byte length in the value stream */
	length: number;
	/** Owning node, NO_INDEX if no chain reaches this attribute */
	owner: number;
	next: number;
	offset: number;
}

/** versioned = u16 version before the handle (BG3), inline = value text stored before the handle (DOS2) */
export type TranslatedStringLayout = "versioned" | "inline";

export interface ValueLayout {
	translatedString: TranslatedStringLayout;
	translatedFSString: TranslatedStringLayout;
}

export interface ResourceDocument {
	version: LSFVersion;
	engineVersion: EngineVersion;
	layout: NodeTreeLayout;
	valueLayout: ValueLayout;
	strings: StringTable;
	nodes: readonly Node[];
	attributes: readonly Attribute[];
	/** Decompressed value stream, owned by the document */
	values: Buffer;
}

export interface TranslatedString {
	version: number;
	/** Only present in the inline layout */
	value?: string;
	handle: string;
}

export interface TranslatedFSStringArgument {
	key: string;
	string: TranslatedFSString;
	value: string;
}

export interface TranslatedFSString extends TranslatedString {
	arguments: TranslatedFSStringArgument[];
}

export type IntegerAttributeType =
	| NodeAttributeType.Byte
	| NodeAttributeType.Short
	| NodeAttributeType.UShort
	| NodeAttributeType.Int
	| NodeAttributeType.UInt
	| NodeAttributeType.Int8;

export type BigIntegerAttributeType = NodeAttributeType.ULongLong | NodeAttributeType.Long | NodeAttributeType.Int64;

export type VectorAttributeType =
	| NodeAttributeType.IVec2
	| NodeAttributeType.IVec3
	| NodeAttributeType.IVec4
	| NodeAttributeType.Vec2
	| NodeAttributeType.Vec3
	| NodeAttributeType.Vec4;

export type MatrixAttributeType =
	| NodeAttributeType.Mat2
	| NodeAttributeType.Mat3
	| NodeAttributeType.Mat3x4
	| NodeAttributeType.Mat4x3
	| NodeAttributeType.Mat4;

export type StringAttributeType =
	| NodeAttributeType.String
	| NodeAttributeType.Path
	| NodeAttributeType.FixedString
	| NodeAttributeType.LSString
	| NodeAttributeType.WString
	| NodeAttributeType.LSWString;

export type DecodedValue =
	| { type: NodeAttributeType.None; value: null }
	| { type: IntegerAttributeType; value: number }
	| { type: BigIntegerAttributeType; value: bigint }
	| { type: NodeAttributeType.Float | NodeAttributeType.Double; value: number }
	| { type: NodeAttributeType.Bool; value: boolean }
	| { type: VectorAttributeType; value: number[] }
	/** rows × columns */
	| { type: MatrixAttributeType; value: number[][] }
	| { type: StringAttributeType; value: string }
	| { type: NodeAttributeType.UUID; value: string }
	| { type: NodeAttributeType.TranslatedString; value: TranslatedString }
	| { type: NodeAttributeType.TranslatedFSString; value: TranslatedFSString }
	| { type: NodeAttributeType.ScratchBuffer; value: Buffer };
