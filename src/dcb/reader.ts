import { readFileSync } from "node:fs";
import { BinaryReader } from "./binary-reader.js";
import { FormatError, UnsupportedFeatureError } from "./errors.js";
import { StringTable } from "./string-table.js";
import { fromBinaryDate } from "./timestamp.js";
import { decodeTree } from "./tree-decoder.js";
import { DCB_SIGNATURE, DCB_VERSION, MAX_COMPRESSION_METHOD, MAX_ENCRYPTION_METHOD, NULL_SINK, type DCBEntryInfo, type DCBHeader, type EventSink } from "./types.js";

export interface DCBEntry extends DCBEntryInfo {
	/**
	 * Payload dekodieren; muss vor dem nächsten Eintrag aufgerufen werden.
	 * Gibt die Anzahl gelesener Bytes zurück.
	 */
	decode(sink: EventSink): number;
}

function swap32(value: number): number {
	return (((value & 0xff) << 24) | ((value & 0xff00) << 8) | ((value >>> 8) & 0xff00) | (value >>> 24)) >>> 0;
}

/** Magic, Version, Methoden; setzt die Byte-Reihenfolge des Readers */
export function readHeader(reader: BinaryReader): DCBHeader {
	reader.endianness = "little";
	const magicOffset = reader.position;
	const magic = reader.readU32();
	if (magic !== DCB_SIGNATURE && swap32(magic) !== DCB_SIGNATURE) {
		throw new FormatError("DCB_BAD_MAGIC", `Invalid DCB magic: 0x${magic.toString(16).padStart(8, "0")}`, magicOffset);
	}
	const endianness = magic === DCB_SIGNATURE ? "little" : "big";

	const version = reader.readU8();
	if (version !== DCB_VERSION) {
		throw new FormatError("DCB_BAD_VERSION", `Unsupported DCB version ${version}`, reader.position - 1);
	}

	const compressionMethod = reader.readU8();
	if (compressionMethod > MAX_COMPRESSION_METHOD) {
		throw new FormatError("DCB_BAD_METHOD", `Invalid compression method ${compressionMethod}`, reader.position - 1);
	}

	const encryptionMethod = reader.readU8();
	if (encryptionMethod > MAX_ENCRYPTION_METHOD) {
		throw new FormatError("DCB_BAD_METHOD", `Invalid encryption method ${encryptionMethod}`, reader.position - 1);
	}

	if (compressionMethod !== 0) throw new UnsupportedFeatureError("compression", compressionMethod);
	if (encryptionMethod !== 0) throw new UnsupportedFeatureError("encryption", encryptionMethod);

	reader.endianness = endianness;
	return { magic, endianness, version, compressionMethod, encryptionMethod };
}

export class DCBReader {
	private readonly reader: BinaryReader;
	private header?: DCBHeader;
	private strings?: StringTable;
	private started = false;

	constructor(pathOrBuffer: string | Buffer) {
		this.reader = new BinaryReader(Buffer.isBuffer(pathOrBuffer) ? pathOrBuffer : readFileSync(pathOrBuffer));
	}

	/** Header und String-Tabelle (einmalig) */
	public read(): { header: DCBHeader; strings: StringTable } {
		if (!this.header || !this.strings) {
			this.header = readHeader(this.reader);
			this.strings = StringTable.read(this.reader);
		}
		return { header: this.header, strings: this.strings };
	}

	/**
	 * Einträge nacheinander. Einträge liegen ohne Längenpräfix hintereinander –
	 * wird ein Payload nicht dekodiert, überspringt der Generator ihn per Decoder.
	 */
	public *entries(): Generator<DCBEntry, void, undefined> {
		if (this.started) throw new Error("DCB entries can only be enumerated once");
		this.started = true;

		const { strings } = this.read();
		const reader = this.reader;
		const fileCount = reader.readU16();

		for (let i = 0; i < fileCount; i++) {
			const path = reader.readString();
			const checksum = reader.readU32();
			const size = reader.readS32();
			const ticksOffset = reader.position;
			const modifiedTicks = reader.readS64();
			const { date, kind } = fromBinaryDate(modifiedTicks, ticksOffset);
			const offset = reader.position;

			let decoded = false;
			const entry: DCBEntry = {
				path,
				checksum,
				size,
				modifiedTicks,
				modified: date,
				dateKind: kind,
				offset,
				decode(sink: EventSink): number {
					if (decoded) throw new Error(`Entry ${path} already decoded`);
					if (reader.position !== offset) throw new Error(`Entry ${path} decoded out of order`);
					decoded = true;
					decodeTree(reader, strings, sink);
					return reader.position - offset;
				}
			};

			yield entry;
			if (!decoded) entry.decode(NULL_SINK);
		}
	}
}
