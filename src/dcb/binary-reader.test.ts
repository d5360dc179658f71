import { describe, it, expect } from "vitest";
import { BinaryReader } from "./binary-reader.js";
import { FormatError } from "./errors.js";

function reader(bytes: number[]): BinaryReader {
	return new BinaryReader(Buffer.from(bytes));
}

function captureError(fn: () => unknown): unknown {
	try {
		fn();
	} catch (err) {
		return err;
	}
	throw new Error("Expected an error");
}

/** Referenz-Encoder: 7-Bit-Gruppen über den 32-Bit-Wert */
function encodePacked(n: number): number[] {
	let v = n >>> 0;
	const out: number[] = [];
	while (v >= 0x80) {
		out.push((v & 0x7f) | 0x80);
		v >>>= 7;
	}
	out.push(v);
	return out;
}

describe("BinaryReader.readPackedInt", () => {
	it("decodes single and multi group values", () => {
		expect(reader([0x00]).readPackedInt()).toBe(0);
		expect(reader([0x7f]).readPackedInt()).toBe(127);
		expect(reader([0x80, 0x01]).readPackedInt()).toBe(128);
		expect(reader([0xac, 0x02]).readPackedInt()).toBe(300);
		expect(reader([0xff, 0xff, 0xff, 0xff, 0x07]).readPackedInt()).toBe(0x7fffffff);
	});

	it("advances by the number of groups consumed", () => {
		const r = reader([0xac, 0x02, 0x05]);
		r.readPackedInt();
		expect(r.position).toBe(2);
		expect(r.readPackedInt()).toBe(5);
	});

	it("wraps the fifth group into the sign bit", () => {
		expect(reader([0xff, 0xff, 0xff, 0xff, 0x0f]).readPackedInt()).toBe(-1);
		expect(reader([0x80, 0x80, 0x80, 0x80, 0x08]).readPackedInt()).toBe(-2147483648);
		expect(reader([0x80, 0x80, 0x80, 0x80, 0x7f]).readPackedInt()).toBe(-268435456);
		// Bits jenseits von 32 gehen verloren
		expect(reader([0x80, 0x80, 0x80, 0x80, 0x10]).readPackedInt()).toBe(0);
	});

	it("round-trips the representable range", () => {
		for (const n of [0, 1, 127, 128, 16383, 16384, 2 ** 21, 2 ** 28 - 1, 2 ** 28, 2 ** 31 - 1, -1, -(2 ** 31)]) {
			expect(reader(encodePacked(n)).readPackedInt()).toBe(n);
		}
	});

	it("rejects a sixth group", () => {
		const err = captureError(() => reader([0x80, 0x80, 0x80, 0x80, 0x80, 0x01]).readPackedInt());
		expect(err).toBeInstanceOf(FormatError);
		expect(err).toMatchObject({ code: "DCB_PACKED_INT_OVERFLOW", offset: 0 });
	});

	it("fails on truncated input", () => {
		const err = captureError(() => reader([0x80]).readPackedInt());
		expect(err).toBeInstanceOf(FormatError);
		expect(err).toMatchObject({ code: "DCB_TRUNCATED", offset: 1 });
	});
});

describe("BinaryReader.readString", () => {
	it("reads a length-prefixed ASCII string", () => {
		const r = reader([0x05, 0x68, 0x65, 0x6c, 0x6c, 0x6f, 0x21]);
		expect(r.readString()).toBe("hello");
		expect(r.position).toBe(6);
	});

	it("passes non-ASCII bytes through", () => {
		expect(reader([0x02, 0xe9, 0xff]).readString()).toBe("éÿ");
	});

	it("reads an empty string", () => {
		expect(reader([0x00]).readString()).toBe("");
	});

	it("rejects a wrapped negative length", () => {
		const err = captureError(() => reader([0xff, 0xff, 0xff, 0xff, 0x0f]).readString());
		expect(err).toMatchObject({ code: "DCB_BAD_STRING_LENGTH" });
	});

	it("rejects a length past the end of data", () => {
		const err = captureError(() => reader([0x04, 0x61, 0x62]).readString());
		expect(err).toMatchObject({ code: "DCB_TRUNCATED" });
	});
});

describe("BinaryReader fixed-width reads", () => {
	it("honours the byte order", () => {
		const le = reader([0x01, 0x02, 0x03, 0x04]);
		expect(le.readU32()).toBe(0x04030201);

		const be = reader([0x01, 0x02, 0x03, 0x04]);
		be.endianness = "big";
		expect(be.readU32()).toBe(0x01020304);
	});

	it("reads signed values", () => {
		const be = reader([0xff, 0xff, 0xff, 0xfe, 0xff, 0xfe]);
		be.endianness = "big";
		expect(be.readS32()).toBe(-2);
		expect(be.readU16()).toBe(0xfffe);

		expect(reader([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]).readS64()).toBe(-1n);
	});
});
