import { FormatError } from "./errors.js";
import type { Endianness } from "./types.js";

/** Cursor über einen Container-Puffer; Byte-Reihenfolge wird vom Header gesetzt */
export class BinaryReader {
	private offset: number;
	public endianness: Endianness = "little";

	constructor(
		private readonly buffer: Buffer,
		offset: number = 0
	) {
		this.offset = offset;
	}

	public get position(): number {
		return this.offset;
	}

	public get remaining(): number {
		return this.buffer.length - this.offset;
	}

	public readU8(): number {
		this.ensure(1);
		return this.buffer.readUInt8(this.offset++);
	}

	public readU16(): number {
		this.ensure(2);
		const value = this.endianness === "little" ? this.buffer.readUInt16LE(this.offset) : this.buffer.readUInt16BE(this.offset);
		this.offset += 2;
		return value;
	}

	public readU32(): number {
		this.ensure(4);
		const value = this.endianness === "little" ? this.buffer.readUInt32LE(this.offset) : this.buffer.readUInt32BE(this.offset);
		this.offset += 4;
		return value;
	}

	public readS32(): number {
		this.ensure(4);
		const value = this.endianness === "little" ? this.buffer.readInt32LE(this.offset) : this.buffer.readInt32BE(this.offset);
		this.offset += 4;
		return value;
	}

	public readS64(): bigint {
		this.ensure(8);
		const value = this.endianness === "little" ? this.buffer.readBigInt64LE(this.offset) : this.buffer.readBigInt64BE(this.offset);
		this.offset += 8;
		return value;
	}

	public readBytes(length: number): Buffer {
		this.ensure(length);
		const bytes = this.buffer.subarray(this.offset, this.offset + length);
		this.offset += length;
		return bytes;
	}

	/**
	 * 7-Bit-Gruppen, Little-Endian, höchstes Bit = Fortsetzung. Höchstens 5 Gruppen;
	 * die 5. Gruppe läuft im 32-Bit-Akkumulator über das Vorzeichenbit (kein Fehler).
	 */
	public readPackedInt(): number {
		const start = this.offset;
		let value = 0;
		let shift = 0;
		let b: number;
		do {
			if (shift > 28) {
				throw new FormatError("DCB_PACKED_INT_OVERFLOW", "Packed integer longer than 5 bytes", start);
			}
			b = this.readU8();
			value |= (b & 0x7f) << shift;
			shift += 7;
		} while ((b & 0x80) !== 0);
		return value;
	}

	/** Länge als Packed Int, danach ASCII-Bytes (Werte > 0x7F werden unverändert durchgereicht) */
	public readString(): string {
		const start = this.offset;
		const length = this.readPackedInt();
		if (length < 0) {
			throw new FormatError("DCB_BAD_STRING_LENGTH", `Negative string length ${length}`, start);
		}
		return this.readBytes(length).toString("latin1");
	}

	private ensure(length: number) {
		if (this.offset + length > this.buffer.length) {
			throw new FormatError("DCB_TRUNCATED", `Unexpected end of data: need ${length} bytes, ${this.remaining} left`, this.offset);
		}
	}
}
