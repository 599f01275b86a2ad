#!/usr/bin/env node
/**
 * CLI für LSV-Savegames
 * Verwendung:
 *   list <save.lsv>                                  - Dateien im Paket
 *   dump <save.lsv> <member.lsf>                     - Knotenbaum ausgeben
 *   value <save.lsv> <member.lsf> <path> <attribute> - einzelnen Wert ausgeben
 *   blob <save.lsv> <member.lsf> <path> <attribute> [out.bin]
 */

import { existsSync, readFileSync, realpathSync, writeFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { isSaveError } from "./errors.js";
import { blobAt, extractDocument, valueAt, type ExtractOptions } from "./extract.js";
import { createLogger } from "./logging/logger.js";
import { childNodes, nodeAttributes, rootNodes } from "./lsf/node-tree.js";
import { NodeAttributeType, type Node, type ResourceDocument } from "./lsf/types.js";
import { decodeValue, formatValue } from "./lsf/values.js";
import { openPackage } from "./lsv/package-reader.js";

const HELP = `
LSV Extract - Savegame-Pakete und LSF-Ressourcen lesen

Verwendung:
  list <save.lsv>                                    - Dateien im Paket auflisten
  dump <save.lsv> <member.lsf>                       - Knotenbaum mit Werten ausgeben
  value <save.lsv> <member.lsf> <path> <attribute>   - einzelnen Attributwert ausgeben
  blob <save.lsv> <member.lsf> <path> <attribute> [out.bin]
                                                     - Binärattribut speichern (sonst Base64)

Optionen:
  --part <file>              - weiterer Archivteil (mehrfach, in Reihenfolge)
  --max-member-bytes <n>     - Obergrenze für entpackte Dateien
  --verbose                  - Debug-Log auf stderr

Pfade werden mit "/" getrennt, z.B. MetaData/MetaData.

Beispiele:
  node dist/src/cli.js list Save.lsv
  node dist/src/cli.js value Save.lsv meta.lsf MetaData/MetaData SaveTime
  node dist/src/cli.js blob Save.lsv meta.lsf MetaData/MetaData Thumbnail thumb.bin
`;

export interface CliIO {
	out(line: string): void;
	err(line: string): void;
	readFile(path: string): Buffer;
	writeFile(path: string, data: Buffer): void;
}

const consoleIO: CliIO = {
	out: (line) => console.log(line),
	err: (line) => console.error(line),
	readFile: (path) => readFileSync(path),
	writeFile: (path, data) => writeFileSync(path, data)
};

interface ParsedArgs {
	positional: string[];
	parts: string[];
	verbose: boolean;
	maxMemberBytes?: number;
	help: boolean;
}

class UsageError extends Error {}

function parseArgs(args: readonly string[]): ParsedArgs {
	const parsed: ParsedArgs = { positional: [], parts: [], verbose: false, help: false };
	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === "--help" || arg === "-h") {
			parsed.help = true;
		} else if (arg === "--verbose" || arg === "-v") {
			parsed.verbose = true;
		} else if (arg === "--part" || arg === "--max-member-bytes") {
			const value = args[++i];
			if (value === undefined) throw new UsageError(`${arg} braucht einen Wert`);
			if (arg === "--part") {
				parsed.parts.push(value);
			} else {
				const n = Number(value);
				if (!Number.isInteger(n) || n < 0) throw new UsageError(`Ungültiger Wert für --max-member-bytes: ${value}`);
				parsed.maxMemberBytes = n;
			}
		} else if (arg.startsWith("--")) {
			throw new UsageError(`Unbekannte Option: ${arg}`);
		} else {
			parsed.positional.push(arg);
		}
	}
	return parsed;
}

export function formatSize(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`;
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
	return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}

function splitPath(path: string): string[] {
	return path.split("/").filter((segment) => segment.length > 0);
}

function dumpNode(doc: ResourceDocument, node: Node, depth: number, io: CliIO): void {
	const indent = "  ".repeat(depth);
	const children = [...childNodes(doc, node)];
	const attributes = [...nodeAttributes(doc, node)];
	io.out(`${indent}${node.name} (${children.length} children, ${attributes.length} attributes)`);
	for (const attr of attributes) {
		if (attr.type === NodeAttributeType.ScratchBuffer) {
			io.out(`${indent}  ${attr.name}: binary data (${attr.length} bytes)`);
		} else {
			io.out(`${indent}  ${attr.name}: ${formatValue(decodeValue(attr, doc.values, doc.valueLayout))}`);
		}
	}
	for (const child of children) dumpNode(doc, child, depth + 1, io);
}

/** Runs one command and returns the process exit code. */
export function run(args: readonly string[], io: CliIO = consoleIO): number {
	let parsed: ParsedArgs;
	try {
		parsed = parseArgs(args);
	} catch (err) {
		if (!(err instanceof UsageError)) throw err;
		io.err(`Fehler: ${err.message}`);
		return 1;
	}

	const [command, inputPath, memberName, path, attributeName, outputPath] = parsed.positional;
	if (!command || parsed.help || command === "help") {
		io.out(HELP);
		return command || parsed.help ? 0 : 1;
	}
	if (!inputPath) {
		io.err(HELP);
		return 1;
	}

	const logger = createLogger(parsed.verbose ? "debug" : "warn", (line) => io.err(line));
	try {
		const options: ExtractOptions = {
			logger,
			parts: parsed.parts.map((part) => io.readFile(part)),
			...(parsed.maxMemberBytes !== undefined ? { limits: { maxMemberBytes: parsed.maxMemberBytes } } : {})
		};
		const data = io.readFile(inputPath);
		if (command === "list") {
			const pkg = openPackage(data, options);
			let count = 0;
			for (const file of pkg.files) {
				if (file.deleted) continue;
				io.out(`${file.name}\t${formatSize(file.uncompressedSize)}\t${file.method}`);
				count++;
			}
			io.out(`${count} Dateien (Paketversion ${pkg.version})`);
		} else if (command === "dump") {
			if (!memberName) throw new UsageError("dump braucht <member.lsf>");
			const doc = extractDocument(data, memberName, options);
			for (const root of rootNodes(doc)) dumpNode(doc, root, 0, io);
		} else if (command === "value") {
			if (!memberName || !path || !attributeName) throw new UsageError("value braucht <member.lsf> <path> <attribute>");
			const doc = extractDocument(data, memberName, options);
			io.out(formatValue(valueAt(doc, splitPath(path), attributeName)));
		} else if (command === "blob") {
			if (!memberName || !path || !attributeName) throw new UsageError("blob braucht <member.lsf> <path> <attribute>");
			const doc = extractDocument(data, memberName, options);
			const blob = blobAt(doc, splitPath(path), attributeName);
			if (outputPath) {
				io.writeFile(outputPath, blob);
				io.out(`Fertig: ${outputPath} erstellt (${formatSize(blob.length)})`);
			} else {
				io.out(blob.toString("base64"));
			}
		} else {
			io.err(`Unbekannter Befehl: ${command}`);
			return 1;
		}
		return 0;
	} catch (err) {
		if (err instanceof UsageError) {
			io.err(`Fehler: ${err.message}`);
			return 1;
		}
		if (isSaveError(err)) {
			logger.debug("decode failed", { error: err.toJSON() });
			io.err(`Fehler [${err.code}]: ${err.message}`);
			return 2;
		}
		io.err(`Fehler: ${err instanceof Error ? err.message : String(err)}`);
		return 1;
	}
}

function isMain(): boolean {
	const entry = process.argv[1];
	if (!entry) return false;
	return existsSync(entry) && realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isMain()) {
	process.exitCode = run(process.argv.slice(2));
}
