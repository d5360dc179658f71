import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, statSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { FormatError, NestingLimitError, UnsupportedFeatureError } from "./errors.js";
import { MANIFEST_FILE, readManifest } from "./manifest.js";
import { collectPackEntries, packDcb } from "./packer.js";
import { toBinaryDate } from "./timestamp.js";
import type { ConfigValue } from "./types.js";
import { listDcb, readDcb, unpackDcb } from "./unpacker.js";
import { writeDcbToBuffer } from "./writer.js";

const ascii = (s: string) => [...Buffer.from(s, "latin1")];
const modified = new Date(Date.UTC(2021, 2, 4, 5, 6, 7));

/** Zwei Strings (0 = "a", 1 = "b"), ein Eintrag { a: alpha, b: beta } */
function handBuiltContainer(): Buffer {
	const ticks = Buffer.alloc(8);
	ticks.writeBigInt64LE(toBinaryDate(modified));
	// prettier-ignore
	return Buffer.concat([
		Buffer.from([0xe3, 0x4d, 0x4d, 0x33, 0x01, 0x00, 0x00]),
		Buffer.from([0x02, 0x00, 0x00, 0x00, 0x00, 0x01, ...ascii("a"), 0x01, 0x01, ...ascii("b")]),
		Buffer.from([0x01, 0x00, 0x0f, ...ascii("configs/app.cfg"), 0x78, 0x56, 0x34, 0x12, 0x20, 0x00, 0x00, 0x00]),
		ticks,
		Buffer.from([0x01, 0x02, 0xff, 0x00, 0x03, 0xf0, 0x05, ...ascii("alpha"), 0xff, 0x01, 0x03, 0xf0, 0x04, ...ascii("beta")])
	]);
}

/** Ein Eintrag "d" mit zweimal demselben Schlüssel: { k: 1, k: 2 } */
function repeatedKeyContainer(): Buffer {
	const ticks = Buffer.alloc(8);
	ticks.writeBigInt64LE(toBinaryDate(modified));
	// prettier-ignore
	return Buffer.concat([
		Buffer.from([0xe3, 0x4d, 0x4d, 0x33, 0x01, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00]),
		Buffer.from([0x01, 0x00, 0x01, ...ascii("d"), 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00]),
		ticks,
		Buffer.from([0x01, 0x02, 0xf0, 0x01, ...ascii("k"), 0x03, 0xf0, 0x01, ...ascii("1"), 0xf0, 0x01, ...ascii("k"), 0x03, 0xf0, 0x01, ...ascii("2")])
	]);
}

function nested(depth: number): ConfigValue {
	let value: ConfigValue = "x";
	for (let i = 0; i < depth; i++) value = [value];
	return value;
}

function captureError(fn: () => unknown): unknown {
	try {
		fn();
	} catch (err) {
		return err;
	}
	throw new Error("Expected an error");
}

let dir: string;

beforeEach(() => {
	dir = mkdtempSync(join(tmpdir(), "dcb-unpack-"));
});

afterEach(() => {
	rmSync(dir, { recursive: true, force: true });
});

describe("unpackDcb", () => {
	it("writes each entry as YAML with the entry's modification time", () => {
		const files = unpackDcb(handBuiltContainer(), dir);
		const out = join(dir, "configs", "app.cfg.yaml");
		expect(files).toHaveLength(1);
		expect(files[0].outputPath).toBe(out);
		expect(files[0].payloadLength).toBe(21);
		expect(files[0].entry).toMatchObject({ path: "configs/app.cfg", checksum: 0x12345678, size: 32, dateKind: "utc" });
		expect(readFileSync(out, "utf8")).toBe("a: alpha\nb: beta\n");
		expect(statSync(out).mtime.getTime()).toBe(modified.getTime());
	});

	it("writes XML when asked", () => {
		unpackDcb(handBuiltContainer(), dir, { format: "xml" });
		expect(readFileSync(join(dir, "configs", "app.cfg.xml"), "utf8")).toBe(
			'<?xml version="1.0" encoding="utf-8"?>\n<config>\n\t<map>\n\t\t<scalar key="a" value="alpha" />\n\t\t<scalar key="b" value="beta" />\n\t</map>\n</config>\n'
		);
	});

	it("skips filtered entries and still reads the following ones", () => {
		const container = writeDcbToBuffer([
			{ path: "skip/one", value: ["x", new Map([["y", "z"]])] },
			{ path: "keep/two", value: "v" }
		]);
		const files = unpackDcb(container, dir, { filter: (p) => p.startsWith("keep/") });
		expect(files.map((f) => f.entry.path)).toEqual(["keep/two"]);
		expect(readFileSync(join(dir, "keep", "two.yaml"), "utf8")).toBe("v\n");
		expect(existsSync(join(dir, "skip"))).toBe(false);
	});

	it("reports compression without writing anything", () => {
		const err = captureError(() => unpackDcb(Buffer.from([0xe3, 0x4d, 0x4d, 0x33, 0x01, 0x02, 0x00]), dir));
		expect(err).toBeInstanceOf(UnsupportedFeatureError);
		expect(err).toMatchObject({ message: "compression method 2 not implemented" });
		expect(readdirSync(dir)).toEqual([]);
	});

	it("refuses entry paths outside the output directory", () => {
		const err = captureError(() => unpackDcb(writeDcbToBuffer([{ path: "../evil", value: "x" }]), dir));
		expect(err).toBeInstanceOf(FormatError);
		expect(err).toMatchObject({ code: "DCB_UNSAFE_PATH" });
	});
});

describe("unpackDcb edge cases", () => {
	it("refuses an empty entry path", () => {
		const err = captureError(() => unpackDcb(writeDcbToBuffer([{ path: "", value: "x" }]), dir));
		expect(err).toMatchObject({ code: "DCB_UNSAFE_PATH", message: 'Entry path is empty: ""' });
		expect(readdirSync(dir)).toEqual([]);
	});

	it("keeps both pairs of a repeated key in the documents", () => {
		unpackDcb(repeatedKeyContainer(), dir);
		expect(readFileSync(join(dir, "d.yaml"), "utf8")).toBe("k: 1\nk: 2\n");
		unpackDcb(repeatedKeyContainer(), dir, { format: "xml" });
		expect(readFileSync(join(dir, "d.xml"), "utf8")).toContain('\t\t<scalar key="k" value="1" />\n\t\t<scalar key="k" value="2" />\n');
	});

	it("reports a repeated key instead of dropping a pair", () => {
		expect(() => readDcb(repeatedKeyContainer())).toThrow('Duplicate mapping key "k"');
		unpackDcb(repeatedKeyContainer(), dir, { format: "xml" });
		expect(() => collectPackEntries(dir)).toThrow('Duplicate mapping key "k"');
	});

	it("stops YAML output at the nesting limit", () => {
		const err = captureError(() => unpackDcb(writeDcbToBuffer([{ path: "deep", value: nested(1000) }]), dir));
		expect(err).toBeInstanceOf(NestingLimitError);
		expect(err).toMatchObject({ code: "DCB_NESTING_LIMIT" });
		expect(readdirSync(dir)).toEqual([]);
	});

	it("unpacks and repacks deep entries through XML", () => {
		const original = writeDcbToBuffer([{ path: "deep", value: nested(1000), modified }]);
		unpackDcb(original, dir, { format: "xml", manifest: true });
		const out = join(dir, "repacked.dcb");
		expect(packDcb(dir, out)).toBe(1);
		expect(readFileSync(out)).toEqual(original);
	});
});

describe("listDcb", () => {
	it("lists metadata without decoding values", () => {
		const listing = listDcb(handBuiltContainer());
		expect(listing.header).toMatchObject({ endianness: "little", version: 1 });
		expect(listing.stringCount).toBe(2);
		expect(listing.entries).toHaveLength(1);
		expect(listing.entries[0]).toMatchObject({ path: "configs/app.cfg", size: 32, payloadLength: 21, modified, offset: 51 });
	});
});

describe("packDcb", () => {
	it("rebuilds the original container from an unpacked directory with manifest", () => {
		const original = writeDcbToBuffer(
			[
				{ path: "a.cfg", value: new Map<string, ConfigValue>([["name", "x"], ["list", ["x", "y"]]]), checksum: 7, modified },
				{ path: "sub\\b.cfg", value: new Map([["name", "y"]]), size: 1000, modifiedTicks: -8_602_016_068_854_775_808n }
			],
			{ endianness: "big" }
		);
		unpackDcb(original, dir, { manifest: true });
		expect(readManifest(dir)?.files.map((f) => f.file)).toEqual(["a.cfg.yaml", "sub/b.cfg.yaml"]);

		const out = join(dir, "repacked.dcb");
		expect(packDcb(dir, out)).toBe(2);
		expect(readFileSync(out)).toEqual(original);
		expect(readDcb(out).header.endianness).toBe("big");
	});

	it("packs documents without manifest by file name", () => {
		writeFileSync(join(dir, "x.yaml"), "k: v\n");
		writeFileSync(join(dir, ".hidden.yaml"), "h: h\n");
		writeFileSync(join(dir, "notes.txt"), "nope");
		mkdirSync(join(dir, "sub"));
		writeFileSync(join(dir, "sub", "y.xml"), '<config><seq><scalar value="1" /></seq></config>');
		utimesSync(join(dir, "x.yaml"), modified, modified);

		const { entries, endianness } = collectPackEntries(dir);
		expect(endianness).toBe("little");
		expect(entries.map((e) => [e.path, e.value])).toEqual([
			["sub/y", ["1"]],
			["x", new Map([["k", "v"]])]
		]);
		expect(entries[1].modified?.getTime()).toBe(modified.getTime());
	});

	it("rejects an invalid manifest", () => {
		writeFileSync(join(dir, MANIFEST_FILE), JSON.stringify({ version: 1, endianness: "middle", files: [] }));
		expect(() => collectPackEntries(dir)).toThrow(/^Invalid manifest .*endianness/);
	});

	it("fails when a manifest file is missing", () => {
		writeFileSync(
			join(dir, MANIFEST_FILE),
			JSON.stringify({ version: 1, endianness: "little", files: [{ path: "p", file: "p.yaml", checksum: 0, size: 0, modifiedTicks: "0" }] })
		);
		expect(() => collectPackEntries(dir)).toThrow("File listed in manifest not found: p.yaml");
	});

	it("lets the option override the manifest byte order", () => {
		unpackDcb(writeDcbToBuffer([{ path: "a", value: "v" }], { endianness: "big" }), dir, { manifest: true });
		expect(collectPackEntries(dir, { endianness: "little" }).endianness).toBe("little");
	});
});
