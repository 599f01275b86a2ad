/**
 * LSF string table: pages (hash buckets in LSLib) of length-prefixed UTF-8 names.
 * Layout: u32 pageCount, per page u16 count, per string u16 length + bytes.
 */

import { decodeUtf8 } from "../binary.js";
import { corrupt, ensureRange } from "../errors.js";
import type { NameRef } from "./types.js";

export class StringTable {
	constructor(readonly pages: readonly (readonly string[])[]) {}

	get size(): number {
		return this.pages.reduce((sum, page) => sum + page.length, 0);
	}

	get(page: number, index: number): string | undefined {
		return this.pages[page]?.[index];
	}

	/** Resolve a reference or fail; a dangling name means the resource is damaged. */
	resolve(ref: NameRef): string {
		const name = this.get(ref.page, ref.index);
		if (name === undefined) {
			throw corrupt(`Dangling string reference ${ref.page}:${ref.index}`, {
				context: { page: String(ref.page), index: String(ref.index) }
			});
		}
		return name;
	}

	*[Symbol.iterator](): IterableIterator<[NameRef, string]> {
		for (let page = 0; page < this.pages.length; page++) {
			const strings = this.pages[page];
			for (let index = 0; index < strings.length; index++) {
				yield [{ page, index }, strings[index]];
			}
		}
	}
}

export function unpackNameRef(packed: number): NameRef {
	return { page: packed >>> 16, index: packed & 0xffff };
}

export function parseStringTable(buffer: Buffer): StringTable {
	let off = 0;
	ensureRange(buffer.length, off, 4, "String table page count");
	const pageCount = buffer.readUInt32LE(off);
	off += 4;

	const pages: string[][] = [];
	for (let i = 0; i < pageCount; i++) {
		ensureRange(buffer.length, off, 2, `String table page ${i}`);
		const count = buffer.readUInt16LE(off);
		off += 2;
		const page: string[] = [];
		for (let j = 0; j < count; j++) {
			ensureRange(buffer.length, off, 2, `String ${i}:${j} length`);
			const length = buffer.readUInt16LE(off);
			off += 2;
			ensureRange(buffer.length, off, length, `String ${i}:${j}`);
			page.push(decodeUtf8(buffer.subarray(off, off + length), `String ${i}:${j}`, off));
			off += length;
		}
		pages.push(page);
	}
	return new StringTable(pages);
}
