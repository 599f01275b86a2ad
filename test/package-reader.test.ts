import test from "node:test";
import assert from "node:assert/strict";
import { findMember, listMembers, openPackage, readEntry, readMember } from "../src/lsv/package-reader.js";
import { CompressionMethod, PackageVersion } from "../src/lsv/types.js";
import { expectSaveError } from "./helpers/assert.js";
import { repetitive } from "./helpers/codecs.js";
import { buildPackageV13, buildPackageV18 } from "./helpers/package.js";

const META = repetitive(3000, "<meta> ");
const GLOBALS = repetitive(5000, "globals ");

test("v18 package lists and extracts members", () => {
	const { data } = buildPackageV18([
		{ name: "meta.lsf", data: META },
		{ name: "Globals.lsf", data: GLOBALS, compression: "zlib" },
		{ name: "WorldMapPreview.png", data: Buffer.from("not really a png"), compression: "none" }
	]);
	const pkg = openPackage(data);
	assert.equal(pkg.version, PackageVersion.V18);
	assert.deepEqual(listMembers(pkg), ["meta.lsf", "Globals.lsf", "WorldMapPreview.png"]);
	assert.deepEqual(readMember(pkg, "meta.lsf"), META);
	assert.deepEqual(readMember(pkg, "Globals.lsf"), GLOBALS);
	assert.equal(readMember(pkg, "WorldMapPreview.png").toString(), "not really a png");
	assert.equal(pkg.files[1].method, CompressionMethod.Zlib);
});

test("v13 package with trailer header", () => {
	const { data } = buildPackageV13(
		[
			{ name: "meta.lsf", data: META },
			{ name: "Levels/FJ_FortJoy_Main/Globals.lsf", data: Buffer.from("short zstd member"), compression: "zstd" }
		],
		{ priority: 7 }
	);
	const pkg = openPackage(data);
	assert.equal(pkg.version, PackageVersion.V13);
	assert.equal(pkg.priority, 7);
	assert.deepEqual(readMember(pkg, "meta.lsf"), META);
	assert.equal(readMember(pkg, "Levels/FJ_FortJoy_Main/Globals.lsf").toString(), "short zstd member");
});

test("stored entries recorded with uncompressed size 0 use the size on disk", () => {
	const { data } = buildPackageV18([{ name: "raw.bin", data: Buffer.from([1, 2, 3]), compression: "none", zeroUncompressedSize: true }]);
	const pkg = openPackage(data);
	assert.equal(pkg.files[0].uncompressedSize, 3);
	assert.deepEqual([...readMember(pkg, "raw.bin")], [1, 2, 3]);
});

test("missing member is NOT_FOUND", () => {
	const { data } = buildPackageV18([{ name: "meta.lsf", data: META }]);
	const err = expectSaveError(() => readMember(openPackage(data), "Meta.lsf"), "NOT_FOUND");
	assert.equal(err.entryName, "Meta.lsf");
});

test("findMember can ignore case", () => {
	const { data } = buildPackageV18([{ name: "Globals.lsf", data: GLOBALS }]);
	const pkg = openPackage(data);
	assert.equal(findMember(pkg, "globals.LSF"), undefined);
	assert.equal(findMember(pkg, "globals.LSF", { ignoreCase: true })?.name, "Globals.lsf");
});

test("deleted entries are hidden and unreadable", () => {
	const { data } = buildPackageV18([
		{ name: "meta.lsf", data: META },
		{ name: "old.lsf", data: Buffer.from("gone"), deleted: true }
	]);
	const pkg = openPackage(data);
	assert.deepEqual(listMembers(pkg), ["meta.lsf"]);
	assert.equal(pkg.files[1].deleted, true);
	expectSaveError(() => readMember(pkg, "old.lsf"), "NOT_FOUND");
	expectSaveError(() => readEntry(pkg, pkg.files[1]), "NOT_FOUND");
});

test("missing signature is UNRECOGNIZED_FORMAT", () => {
	expectSaveError(() => openPackage(Buffer.from("this is not a save package")), "UNRECOGNIZED_FORMAT");
	expectSaveError(() => openPackage(Buffer.alloc(3)), "UNRECOGNIZED_FORMAT");
});

test("unsupported package version is UNRECOGNIZED_FORMAT", () => {
	const { data } = buildPackageV18([{ name: "meta.lsf", data: META }]);
	data.writeUInt32LE(16, 4);
	expectSaveError(() => openPackage(data), "UNRECOGNIZED_FORMAT");
});

test("unknown compression bits in an entry are UNSUPPORTED_COMPRESSION", () => {
	const { data } = buildPackageV18([{ name: "meta.lsf", data: META, flags: 0x06 }]);
	const err = expectSaveError(() => openPackage(data), "UNSUPPORTED_COMPRESSION");
	assert.equal(err.entryName, "meta.lsf");
});

test("entry range outside the file is CORRUPT_DATA", () => {
	const { data } = buildPackageV18([{ name: "meta.lsf", data: META, sizeOnDisk: 1_000_000 }]);
	const err = expectSaveError(() => openPackage(data), "CORRUPT_DATA");
	assert.equal(err.entryName, "meta.lsf");
});

test("entry overlapping the header is CORRUPT_DATA", () => {
	const { data } = buildPackageV18([{ name: "meta.lsf", data: META, offset: 10 }]);
	expectSaveError(() => openPackage(data), "CORRUPT_DATA");
});

test("file list offset beyond the end is CORRUPT_DATA", () => {
	const { data } = buildPackageV18([{ name: "meta.lsf", data: META }]);
	data.writeBigUInt64LE(BigInt(data.length + 100), 8);
	expectSaveError(() => openPackage(data), "CORRUPT_DATA");
});

test("duplicate names are CORRUPT_DATA", () => {
	const { data } = buildPackageV18([
		{ name: "meta.lsf", data: META },
		{ name: "meta.lsf", data: GLOBALS }
	]);
	expectSaveError(() => openPackage(data), "CORRUPT_DATA");
});

test("v13 CRC mismatch is CORRUPT_DATA at read time", () => {
	const { data } = buildPackageV13([{ name: "meta.lsf", data: META, crc: 0x12345678 }]);
	const pkg = openPackage(data);
	const err = expectSaveError(() => readMember(pkg, "meta.lsf"), "CORRUPT_DATA");
	assert.match(err.message, /CRC mismatch/);
});

test("v13 CRC of 0 skips the check", () => {
	const { data } = buildPackageV13([{ name: "meta.lsf", data: META, crc: 0 }]);
	assert.deepEqual(readMember(openPackage(data), "meta.lsf"), META);
});

test("a damaged member payload reports the member name", () => {
	const { data } = buildPackageV18([{ name: "meta.lsf", data: META, compression: "zlib" }]);
	// zlib-Header direkt nach dem 40-Byte-Header zerstören
	data[40] = 0x00;
	data[41] = 0x00;
	const err = expectSaveError(() => readMember(openPackage(data), "meta.lsf"), "CORRUPT_DATA");
	assert.equal(err.entryName, "meta.lsf");
});

test("multi-part package reads members from supplied parts", () => {
	const { data, parts } = buildPackageV18(
		[
			{ name: "meta.lsf", data: META },
			{ name: "Globals.lsf", data: GLOBALS, part: 1 }
		],
		{ numParts: 2 }
	);
	assert.equal(parts.length, 1);
	const pkg = openPackage(data, { parts });
	assert.equal(pkg.numParts, 2);
	assert.deepEqual(readMember(pkg, "Globals.lsf"), GLOBALS);
});

test("multi-part package without the part is NOT_FOUND for that member only", () => {
	const { data } = buildPackageV18(
		[
			{ name: "meta.lsf", data: META },
			{ name: "Globals.lsf", data: GLOBALS, part: 1 }
		],
		{ numParts: 2 }
	);
	const pkg = openPackage(data);
	assert.deepEqual(readMember(pkg, "meta.lsf"), META);
	expectSaveError(() => readMember(pkg, "Globals.lsf"), "NOT_FOUND");
});

test("entry referencing a part beyond numParts is CORRUPT_DATA", () => {
	const { data, parts } = buildPackageV18(
		[
			{ name: "meta.lsf", data: META },
			{ name: "Globals.lsf", data: GLOBALS, part: 1 }
		],
		{ numParts: 1 }
	);
	expectSaveError(() => openPackage(data, { parts }), "CORRUPT_DATA");
});

test("limits bound the entry count and member size", () => {
	const { data } = buildPackageV18([
		{ name: "a", data: META },
		{ name: "b", data: GLOBALS }
	]);
	expectSaveError(() => openPackage(data, { limits: { maxEntries: 1 } }), "LIMIT_EXCEEDED");
	const pkg = openPackage(data);
	const err = expectSaveError(() => readMember(pkg, "b", { limits: { maxMemberBytes: 4999 } }), "LIMIT_EXCEEDED");
	assert.equal(err.entryName, "b");
	assert.equal(err.context?.limit, "maxMemberBytes");
});

test("debug logging reports the package header", () => {
	const lines: string[] = [];
	const { data } = buildPackageV18([{ name: "meta.lsf", data: META }]);
	const logger = {
		debug: (msg: string) => lines.push(msg),
		info: () => undefined,
		warn: () => undefined,
		error: () => undefined
	};
	openPackage(data, { logger });
	assert.deepEqual(lines, ["found package header", "reading file list"]);
});
