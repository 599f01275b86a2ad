import test from "node:test";
import assert from "node:assert/strict";
import { blobAt, extractDocument, extractGlobals, findAttribute, findNode, valueAt } from "../src/extract.js";
import { listMembers, openPackage } from "../src/lsv/package-reader.js";
import { LSFVersion, NodeAttributeType } from "../src/lsf/types.js";
import { expectSaveError } from "./helpers/assert.js";
import { attr, buildResource, i32, lsString, type NodeSpec } from "./helpers/lsf.js";
import { buildPackageV13, buildPackageV18 } from "./helpers/package.js";

const META_NODES: NodeSpec[] = [
	{ name: "root", parent: -1 },
	{
		name: "data",
		parent: 0,
		attributes: [attr("count", NodeAttributeType.Int, i32(3)), attr("payload", NodeAttributeType.ScratchBuffer, Buffer.from([0xde, 0xad, 0xbe, 0xef]))]
	},
	{ name: "data", parent: 0, attributes: [attr("label", NodeAttributeType.LSString, lsString("zweites"))] },
	{ name: "Journal", parent: -1, attributes: [attr("entries", NodeAttributeType.Int, i32(0))] }
];

function metaPackage(): Buffer {
	return buildPackageV18([
		{ name: "meta", data: buildResource(META_NODES) },
		{ name: "WorldMapPreview.png", data: Buffer.from("preview"), compression: "none" }
	]).data;
}

test("blob attribute comes back byte for byte", () => {
	const doc = extractDocument(metaPackage(), "meta");
	assert.deepEqual([...blobAt(doc, ["root", "data"], "payload")], [0xde, 0xad, 0xbe, 0xef]);
});

test("members are listed in file table order", () => {
	assert.deepEqual(listMembers(openPackage(metaPackage())), ["meta", "WorldMapPreview.png"]);
});

test("valueAt decodes scalar attributes", () => {
	const doc = extractDocument(metaPackage(), "meta");
	assert.deepEqual(valueAt(doc, ["root", "data"], "count"), { type: NodeAttributeType.Int, value: 3 });
	assert.deepEqual(valueAt(doc, ["Journal"], "entries"), { type: NodeAttributeType.Int, value: 0 });
});

test("the first node with a matching name wins", () => {
	const doc = extractDocument(metaPackage(), "meta");
	assert.equal(findNode(doc, ["root", "data"]).index, 1);
	expectSaveError(() => findAttribute(doc, ["root", "data"], "label"), "NOT_FOUND");
});

test("a path segment without a matching child is NOT_FOUND", () => {
	const doc = extractDocument(metaPackage(), "meta");
	const err = expectSaveError(() => findAttribute(doc, ["root", "missing"], "payload"), "NOT_FOUND");
	assert.equal(err.message, "No node 'missing' at root");
	assert.deepEqual(err.context, { path: "root/missing", segment: "missing" });

	const atRoot = expectSaveError(() => findNode(doc, ["data"]), "NOT_FOUND");
	assert.equal(atRoot.message, "No node 'data' at root level");
	expectSaveError(() => findNode(doc, []), "NOT_FOUND");
});

test("a missing attribute is NOT_FOUND", () => {
	const doc = extractDocument(metaPackage(), "meta");
	const err = expectSaveError(() => findAttribute(doc, ["root", "data"], "Payload"), "NOT_FOUND");
	assert.deepEqual(err.context, { path: "root/data", attribute: "Payload" });
});

test("blobAt on a non-blob attribute is TYPE_MISMATCH", () => {
	const doc = extractDocument(metaPackage(), "meta");
	const err = expectSaveError(() => blobAt(doc, ["root", "data"], "count"), "TYPE_MISMATCH");
	assert.equal(err.typeTag, NodeAttributeType.Int);
});

test("a missing member is NOT_FOUND", () => {
	const err = expectSaveError(() => extractDocument(metaPackage(), "Meta"), "NOT_FOUND");
	assert.equal(err.entryName, "Meta");
});

test("a member that is not an LSF resource reports its name", () => {
	const err = expectSaveError(() => extractDocument(metaPackage(), "WorldMapPreview.png"), "UNRECOGNIZED_FORMAT");
	assert.equal(err.entryName, "WorldMapPreview.png");
	assert.match(err.message, /^File 'WorldMapPreview\.png': /);
});

test("Globals.lsf is found regardless of case", () => {
	const globals = buildResource([{ name: "Globals", parent: -1, attributes: [attr("Turn", NodeAttributeType.Int, i32(77))] }], {
		version: LSFVersion.ExtendedNodes
	});
	const { data } = buildPackageV13([
		{ name: "meta.lsf", data: buildResource(META_NODES, { version: LSFVersion.ExtendedNodes }) },
		{ name: "globals.lsf", data: globals, compression: "zlib" }
	]);
	const doc = extractGlobals(data);
	assert.equal(doc.version, LSFVersion.ExtendedNodes);
	assert.deepEqual(valueAt(doc, ["Globals"], "Turn"), { type: NodeAttributeType.Int, value: 77 });
});

test("a package without Globals.lsf is NOT_FOUND", () => {
	const err = expectSaveError(() => extractGlobals(metaPackage()), "NOT_FOUND");
	assert.equal(err.entryName, "Globals.lsf");
});

test("limits reach the resource decoder", () => {
	const err = expectSaveError(() => extractDocument(metaPackage(), "meta", { limits: { maxNodes: 3 } }), "LIMIT_EXCEEDED");
	assert.equal(err.entryName, "meta");
});
