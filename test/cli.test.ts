import test from "node:test";
import assert from "node:assert/strict";
import { formatSize, run, type CliIO } from "../src/cli.js";
import { NodeAttributeType } from "../src/lsf/types.js";
import { attr, buildResource, i32, type NodeSpec } from "./helpers/lsf.js";
import { buildPackageV18 } from "./helpers/package.js";

class FakeIO implements CliIO {
	readonly stdout: string[] = [];
	readonly stderr: string[] = [];
	readonly written = new Map<string, Buffer>();

	constructor(private readonly files: Record<string, Buffer>) {}

	out(line: string): void {
		this.stdout.push(line);
	}

	err(line: string): void {
		this.stderr.push(line);
	}

	readFile(path: string): Buffer {
		const data = this.files[path];
		if (!data) throw new Error(`ENOENT: ${path}`);
		return data;
	}

	writeFile(path: string, data: Buffer): void {
		this.written.set(path, data);
	}
}

const NODES: NodeSpec[] = [
	{ name: "root", parent: -1 },
	{
		name: "data",
		parent: 0,
		attributes: [attr("count", NodeAttributeType.Int, i32(3)), attr("payload", NodeAttributeType.ScratchBuffer, Buffer.from([0xde, 0xad, 0xbe, 0xef]))]
	}
];

function saveIO(): FakeIO {
	const { data } = buildPackageV18([
		{ name: "meta", data: buildResource(NODES) },
		{ name: "notes.txt", data: Buffer.alloc(100, 0x61), compression: "none" },
		{ name: "Globals.lsf", data: Buffer.alloc(2048, 0x62), compression: "zlib" },
		{ name: "old.lsf", data: Buffer.from("gone"), deleted: true }
	]);
	return new FakeIO({ "save.lsv": data });
}

test("list prints every live member", () => {
	const io = saveIO();
	assert.equal(run(["list", "save.lsv"], io), 0);
	assert.equal(io.stdout.length, 4);
	assert.match(io.stdout[0], /^meta\t\d+ B\tlz4$/);
	assert.deepEqual(io.stdout.slice(1), ["notes.txt\t100 B\tnone", "Globals.lsf\t2.0 KiB\tzlib", "3 Dateien (Paketversion 18)"]);
	assert.deepEqual(io.stderr, []);
});

test("dump prints the node tree with values", () => {
	const io = saveIO();
	assert.equal(run(["dump", "save.lsv", "meta"], io), 0);
	assert.deepEqual(io.stdout, [
		"root (1 children, 0 attributes)",
		"  data (0 children, 2 attributes)",
		"    count: 3",
		"    payload: binary data (4 bytes)"
	]);
});

test("value prints one formatted attribute", () => {
	const io = saveIO();
	assert.equal(run(["value", "save.lsv", "meta", "root/data", "count"], io), 0);
	assert.deepEqual(io.stdout, ["3"]);
});

test("blob writes the bytes or prints base64", () => {
	const io = saveIO();
	assert.equal(run(["blob", "save.lsv", "meta", "root/data", "payload", "out.bin"], io), 0);
	assert.deepEqual([...(io.written.get("out.bin") ?? [])], [0xde, 0xad, 0xbe, 0xef]);
	assert.deepEqual(io.stdout, ["Fertig: out.bin erstellt (4 B)"]);

	const printed = saveIO();
	assert.equal(run(["blob", "save.lsv", "meta", "root/data", "payload"], printed), 0);
	assert.deepEqual(printed.stdout, ["3q2+7w=="]);
});

test("decode errors exit with 2 and the error code", () => {
	const io = saveIO();
	assert.equal(run(["value", "save.lsv", "nope", "root", "count"], io), 2);
	assert.deepEqual(io.stderr, ["Fehler [NOT_FOUND]: File 'nope' not found in package"]);

	const typed = saveIO();
	assert.equal(run(["blob", "save.lsv", "meta", "root/data", "count"], typed), 2);
	assert.deepEqual(typed.stderr, ["Fehler [TYPE_MISMATCH]: Attribute 'count' is Int, not ScratchBuffer"]);
});

test("--max-member-bytes bounds extraction", () => {
	const io = saveIO();
	assert.equal(run(["dump", "save.lsv", "meta", "--max-member-bytes", "10"], io), 2);
	assert.equal(io.stderr.length, 1);
	assert.match(io.stderr[0], /^Fehler \[LIMIT_EXCEEDED\]: maxMemberBytes exceeded: \d+ > 10$/);
});

test("--part supplies further archive parts", () => {
	const { data, parts } = buildPackageV18(
		[
			{ name: "meta", data: buildResource(NODES) },
			{ name: "Globals.lsf", data: Buffer.from("zweiter Teil"), compression: "none", part: 1 }
		],
		{ numParts: 2 }
	);
	const [part1] = parts;
	assert.ok(part1);
	const io = new FakeIO({ "save.lsv": data, "save_1.lsv": part1 });
	assert.equal(run(["value", "save.lsv", "meta", "root/data", "count", "--part", "save_1.lsv"], io), 0);
	assert.deepEqual(io.stdout, ["3"]);
});

test("--verbose writes JSON debug lines to stderr", () => {
	const io = saveIO();
	assert.equal(run(["list", "save.lsv", "--verbose"], io), 0);
	const messages = io.stderr.map((line) => {
		const entry: unknown = JSON.parse(line);
		assert.ok(typeof entry === "object" && entry !== null && "msg" in entry);
		return entry.msg;
	});
	assert.deepEqual(messages, ["found package header", "reading file list"]);
});

test("usage errors exit with 1", () => {
	const empty = new FakeIO({});
	assert.equal(run([], empty), 1);
	assert.equal(empty.stdout.length, 1);

	const help = new FakeIO({});
	assert.equal(run(["--help"], help), 0);

	const option = new FakeIO({});
	assert.equal(run(["list", "save.lsv", "--frob"], option), 1);
	assert.deepEqual(option.stderr, ["Fehler: Unbekannte Option: --frob"]);

	const missingValue = new FakeIO({});
	assert.equal(run(["list", "save.lsv", "--part"], missingValue), 1);
	assert.deepEqual(missingValue.stderr, ["Fehler: --part braucht einen Wert"]);

	const args = saveIO();
	assert.equal(run(["value", "save.lsv", "meta"], args), 1);
	assert.deepEqual(args.stderr, ["Fehler: value braucht <member.lsf> <path> <attribute>"]);

	const command = saveIO();
	assert.equal(run(["frob", "save.lsv"], command), 1);
	assert.deepEqual(command.stderr, ["Unbekannter Befehl: frob"]);
});

test("unreadable input exits with 1", () => {
	const io = new FakeIO({});
	assert.equal(run(["list", "missing.lsv"], io), 1);
	assert.deepEqual(io.stderr, ["Fehler: ENOENT: missing.lsv"]);
});

test("sizes are shown in B, KiB and MiB", () => {
	assert.equal(formatSize(1023), "1023 B");
	assert.equal(formatSize(1536), "1.5 KiB");
	assert.equal(formatSize(3 * 1024 * 1024), "3.0 MiB");
});
