import type { BinaryReader } from "./binary-reader.js";
import { FormatError } from "./errors.js";

/** Dedupliziertes String-Pool eines Containers: id → Text, nach dem Einlesen unveränderlich */
export class StringTable {
	private readonly strings = new Map<number, string>();

	/** i32 Anzahl, dann (Packed-Int id, String) Paare */
	public static read(reader: BinaryReader): StringTable {
		const table = new StringTable();
		const count = reader.readS32();
		for (let i = 0; i < count; i++) {
			const offset = reader.position;
			const id = reader.readPackedInt();
			const value = reader.readString();
			table.add(id, value, offset);
		}
		return table;
	}

	public static from(entries: Iterable<readonly [number, string]>): StringTable {
		const table = new StringTable();
		for (const [id, value] of entries) table.add(id, value);
		return table;
	}

	public get size(): number {
		return this.strings.size;
	}

	public get(id: number, offset?: number): string {
		const value = this.strings.get(id);
		if (value === undefined) {
			throw new FormatError("DCB_UNKNOWN_STRING_ID", `Unknown string id ${id}`, offset);
		}
		return value;
	}

	public entries(): IterableIterator<[number, string]> {
		return this.strings.entries();
	}

	private add(id: number, value: string, offset?: number) {
		if (this.strings.has(id)) {
			throw new FormatError("DCB_DUPLICATE_STRING_ID", `Duplicate string id ${id}`, offset);
		}
		this.strings.set(id, value);
	}
}
