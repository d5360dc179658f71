import { describe, it, expect } from "vitest";
import { FormatError } from "./errors.js";
import { fromBinaryDate, toBinaryDate } from "./timestamp.js";

const UNIX_EPOCH_TICKS = 621_355_968_000_000_000n;

describe("fromBinaryDate", () => {
	it("decodes UTC stamps", () => {
		expect(fromBinaryDate(5_233_041_986_427_387_904n)).toEqual({ date: new Date(0), kind: "utc" });
	});

	it("decodes local stamps as the stored UTC instant", () => {
		expect(fromBinaryDate(-8_602_016_068_854_775_808n)).toEqual({ date: new Date(0), kind: "local" });
	});

	it("decodes unspecified stamps", () => {
		expect(fromBinaryDate(UNIX_EPOCH_TICKS + 10_000_000n)).toEqual({ date: new Date(1000), kind: "unspecified" });
	});

	it("unwraps local stamps stored just below tick zero", () => {
		// LocalMask | (TicksCeiling - 1): eine Tick vor 0001-01-01 UTC
		const { date, kind } = fromBinaryDate(-4_611_686_018_427_387_905n);
		expect(kind).toBe("local");
		expect(date.getTime()).toBe(-62_135_596_800_001);
	});

	it("rejects ticks after year 9999", () => {
		let err: unknown;
		try {
			fromBinaryDate((1n << 62n) | 3_155_378_976_000_000_000n, 12);
		} catch (e) {
			err = e;
		}
		expect(err).toBeInstanceOf(FormatError);
		expect(err).toMatchObject({ code: "DCB_BAD_TIMESTAMP", offset: 12 });
	});
});

describe("toBinaryDate", () => {
	it("encodes UTC-kind stamps", () => {
		expect(toBinaryDate(new Date(0))).toBe(5_233_041_986_427_387_904n);
	});

	it("round-trips with millisecond precision", () => {
		const date = new Date(Date.UTC(2021, 2, 4, 5, 6, 7, 890));
		expect(fromBinaryDate(toBinaryDate(date))).toEqual({ date, kind: "utc" });
	});
});
