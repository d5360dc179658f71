import { writeFileSync } from "node:fs";
import { toBinaryDate } from "./timestamp.js";
import { emitValue } from "./value-builder.js";
import { DCB_SIGNATURE, DCB_VERSION, ItemType, ScalarType, type ConfigValue, type Endianness } from "./types.js";

export interface DCBWriteEntry {
	/** Pfad mit "/" als Trenner */
	path: string;
	value: ConfigValue;
	checksum?: number;
	/** Standard: Länge des kodierten Payloads */
	size?: number;
	/** Roher i64-Zeitstempel; hat Vorrang vor `modified` */
	modifiedTicks?: bigint;
	modified?: Date;
}

export interface DCBWriteOptions {
	endianness?: Endianness;
	/** Mehrfach vorkommende Strings in die String-Tabelle (Standard: true) */
	internStrings?: boolean;
}

const MAX_FILE_COUNT = 0xffff;

class ByteSink {
	private readonly chunks: Buffer[] = [];
	private length = 0;

	constructor(private readonly endianness: Endianness) {}

	public get size(): number {
		return this.length;
	}

	public u8(value: number) {
		this.push(Buffer.from([value & 0xff]));
	}

	public u16(value: number) {
		const b = Buffer.alloc(2);
		if (this.endianness === "little") b.writeUInt16LE(value);
		else b.writeUInt16BE(value);
		this.push(b);
	}

	public u32(value: number) {
		const b = Buffer.alloc(4);
		if (this.endianness === "little") b.writeUInt32LE(value >>> 0);
		else b.writeUInt32BE(value >>> 0);
		this.push(b);
	}

	public s32(value: number) {
		const b = Buffer.alloc(4);
		if (this.endianness === "little") b.writeInt32LE(value | 0);
		else b.writeInt32BE(value | 0);
		this.push(b);
	}

	public s64(value: bigint) {
		const b = Buffer.alloc(8);
		if (this.endianness === "little") b.writeBigInt64LE(value);
		else b.writeBigInt64BE(value);
		this.push(b);
	}

	/** 7-Bit-Gruppen; negative Werte als 32-Bit unsigned (5 Gruppen) */
	public packedInt(value: number) {
		let v = value >>> 0;
		const bytes: number[] = [];
		while (v >= 0x80) {
			bytes.push((v & 0x7f) | 0x80);
			v >>>= 7;
		}
		bytes.push(v);
		this.push(Buffer.from(bytes));
	}

	public string(value: string) {
		const bytes = Buffer.from(value, "latin1");
		this.packedInt(bytes.length);
		this.push(bytes);
	}

	public bytes(): Buffer {
		return Buffer.concat(this.chunks, this.length);
	}

	public push(chunk: Buffer) {
		this.chunks.push(chunk);
		this.length += chunk.length;
	}
}

/** Strings mit mindestens zwei Vorkommen bekommen ids in Reihenfolge des ersten Auftretens */
function buildStringTable(entries: DCBWriteEntry[]): Map<string, number> {
	const counts = new Map<string, number>();
	for (const entry of entries) {
		// Keys und Werte in Dokumentreihenfolge
		emitValue(entry.value, {
			emit(event) {
				if (event.type === "scalar") counts.set(event.value, (counts.get(event.value) ?? 0) + 1);
			}
		});
	}
	const ids = new Map<string, number>();
	for (const [s, count] of counts) {
		if (count >= 2) ids.set(s, ids.size);
	}
	return ids;
}

function writeScalar(out: ByteSink, value: string, ids: Map<string, number>) {
	const id = ids.get(value);
	if (id !== undefined) {
		out.u8(ScalarType.Id);
		out.packedInt(id);
	} else {
		out.u8(ScalarType.Value);
		out.string(value);
	}
}

/** Expliziter Stapel statt Rekursion, wie beim Dekodieren */
function writeItem(out: ByteSink, value: ConfigValue, ids: Map<string, number>) {
	type Work = { item: ConfigValue } | { key: string };
	const stack: Work[] = [{ item: value }];

	let work: Work | undefined;
	while ((work = stack.pop()) !== undefined) {
		if ("key" in work) {
			writeScalar(out, work.key, ids);
			continue;
		}
		const item = work.item;
		if (typeof item === "string") {
			out.u8(ItemType.Scalar);
			writeScalar(out, item, ids);
		} else if (Array.isArray(item)) {
			out.u8(ItemType.Sequence);
			out.packedInt(item.length);
			for (let i = item.length - 1; i >= 0; i--) stack.push({ item: item[i] });
		} else {
			out.u8(ItemType.Mapping);
			out.packedInt(item.size);
			const pairs = [...item];
			for (let i = pairs.length - 1; i >= 0; i--) {
				stack.push({ item: pairs[i][1] });
				stack.push({ key: pairs[i][0] });
			}
		}
	}
}

export function writeDcbToBuffer(entries: DCBWriteEntry[], options?: DCBWriteOptions): Buffer {
	const endianness = options?.endianness ?? "little";
	if (entries.length > MAX_FILE_COUNT) {
		throw new RangeError(`Too many entries: ${entries.length} (max ${MAX_FILE_COUNT})`);
	}
	const ids = options?.internStrings === false ? new Map<string, number>() : buildStringTable(entries);

	const out = new ByteSink(endianness);
	// Magic immer als LE-u32 gelesen – BE-Container tragen die vertauschte Form
	const magic = Buffer.alloc(4);
	if (endianness === "little") magic.writeUInt32LE(DCB_SIGNATURE);
	else magic.writeUInt32BE(DCB_SIGNATURE);
	out.push(magic);
	out.u8(DCB_VERSION);
	out.u8(0); // compression
	out.u8(0); // encryption

	out.s32(ids.size);
	for (const [value, id] of ids) {
		out.packedInt(id);
		out.string(value);
	}

	out.u16(entries.length);
	for (const entry of entries) {
		const payload = new ByteSink(endianness);
		writeItem(payload, entry.value, ids);

		out.string(entry.path);
		out.u32(entry.checksum ?? 0);
		out.s32(entry.size ?? payload.size);
		out.s64(entry.modifiedTicks ?? toBinaryDate(entry.modified ?? new Date(0)));
		out.push(payload.bytes());
	}

	return out.bytes();
}

export function writeDcb(entries: DCBWriteEntry[], outputPath: string, options?: DCBWriteOptions): void {
	writeFileSync(outputPath, writeDcbToBuffer(entries, options));
}
