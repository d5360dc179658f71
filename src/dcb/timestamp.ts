import { FormatError } from "./errors.js";
import type { DateTimeKind } from "./types.js";

/**
 * Binäres Datumsformat (i64): Bits 62–63 = Kind, Bits 0–61 = 100-ns-Ticks seit 0001-01-01.
 * Bei "local" sind die Ticks bereits UTC (beim Schreiben umgerechnet).
 */
const TICKS_PER_MILLISECOND = 10_000n;
const TICKS_PER_DAY = 864_000_000_000n;
const UNIX_EPOCH_TICKS = 621_355_968_000_000_000n;
const MAX_TICKS = 3_155_378_975_999_999_999n; // 9999-12-31T23:59:59.9999999
const TICKS_MASK = 0x3fff_ffff_ffff_ffffn;
const TICKS_CEILING = 0x4000_0000_0000_0000n;
const KIND_UTC = 0x4000_0000_0000_0000n;
const LOCAL_MASK = 0x8000_0000_0000_0000n;

export function fromBinaryDate(value: bigint, offset?: number): { date: Date; kind: DateTimeKind } {
	const raw = BigInt.asUintN(64, value);
	let ticks = raw & TICKS_MASK;
	let kind: DateTimeKind;

	if ((raw & LOCAL_MASK) !== 0n) {
		kind = "local";
		// UTC-Ticks kurz vor 0001-01-01 wurden beim Schreiben um TICKS_CEILING verschoben
		if (ticks > TICKS_CEILING - TICKS_PER_DAY) ticks -= TICKS_CEILING;
		if (ticks < -TICKS_PER_DAY || ticks > MAX_TICKS + TICKS_PER_DAY) {
			throw new FormatError("DCB_BAD_TIMESTAMP", `Timestamp 0x${raw.toString(16)} out of range`, offset);
		}
	} else {
		kind = raw >> 62n === 1n ? "utc" : "unspecified";
		if (ticks > MAX_TICKS) {
			throw new FormatError("DCB_BAD_TIMESTAMP", `Timestamp 0x${raw.toString(16)} out of range`, offset);
		}
	}

	const sinceEpoch = ticks - UNIX_EPOCH_TICKS;
	let ms = sinceEpoch / TICKS_PER_MILLISECOND;
	if (sinceEpoch < 0n && sinceEpoch % TICKS_PER_MILLISECOND !== 0n) ms -= 1n;
	return { date: new Date(Number(ms)), kind };
}

/** Date → i64 mit Kind UTC */
export function toBinaryDate(date: Date): bigint {
	const ticks = BigInt(date.getTime()) * TICKS_PER_MILLISECOND + UNIX_EPOCH_TICKS;
	if (ticks < 0n || ticks > MAX_TICKS) {
		throw new RangeError(`Date ${date.toISOString()} not representable`);
	}
	return BigInt.asIntN(64, ticks | KIND_UTC);
}
