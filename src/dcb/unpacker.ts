/**
 * DCB Unpacker – schreibt jeden Eintrag eines Containers als Textdokument
 * (YAML oder XML) unter seinem relativen Pfad, mit Änderungszeit des Eintrags.
 */

import { mkdirSync, statSync, utimesSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { XmlDocumentWriter } from "../xml/xml-writer.js";
import { YamlDocumentWriter } from "../yaml/yaml-writer.js";
import { MANIFEST_FILE, type DCBManifest } from "./manifest.js";
import { normalizeEntryPath } from "./paths.js";
import { DCBReader } from "./reader.js";
import { ValueBuilder } from "./value-builder.js";
import { NULL_SINK, type ConfigValue, type DCBEntryInfo, type DCBHeader, type DocumentWriter } from "./types.js";

export type OutputFormat = "yaml" | "xml";

export interface UnpackOptions {
	format?: OutputFormat;
	filter?: (path: string) => boolean;
	/** Manifest speichern für pack (Roundtrip) */
	manifest?: boolean;
}

export interface UnpackedFile {
	entry: DCBEntryInfo;
	outputPath: string;
	/** Tatsächlich dekodierte Bytes (vgl. entry.size) */
	payloadLength: number;
}

export interface DCBListing {
	header: DCBHeader;
	stringCount: number;
	entries: Array<DCBEntryInfo & { payloadLength: number }>;
}

export function createDocumentWriter(format: OutputFormat): DocumentWriter {
	return format === "xml" ? new XmlDocumentWriter() : new YamlDocumentWriter();
}

function entryInfo(entry: DCBEntryInfo): DCBEntryInfo {
	const { path, checksum, size, modifiedTicks, modified, dateKind, offset } = entry;
	return { path, checksum, size, modifiedTicks, modified, dateKind, offset };
}

/**
 * Container entpacken. Jeder Fehler bricht den gesamten Vorgang ab – nach einem
 * defekten Eintrag ist die Position des nächsten nicht bestimmbar.
 */
export function unpackDcb(input: string | Buffer, outputDir: string, options?: UnpackOptions): UnpackedFile[] {
	const format = options?.format ?? "yaml";
	const reader = new DCBReader(input);
	const { header } = reader.read();
	const extracted: UnpackedFile[] = [];
	const manifestFiles: DCBManifest["files"] = [];

	for (const entry of reader.entries()) {
		if (options?.filter && !options.filter(entry.path)) {
			continue;
		}

		const writer = createDocumentWriter(format);
		const payloadLength = entry.decode(writer);
		const text = writer.finish();

		const outPath = join(outputDir, `${normalizeEntryPath(entry.path)}.${format}`);
		mkdirSync(dirname(outPath), { recursive: true });
		writeFileSync(outPath, text, "utf8");
		utimesSync(outPath, statSync(outPath).atime, entry.modified);

		extracted.push({ entry: entryInfo(entry), outputPath: outPath, payloadLength });
		manifestFiles.push({
			path: entry.path,
			file: `${normalizeEntryPath(entry.path, "/")}.${format}`,
			checksum: entry.checksum,
			size: entry.size,
			modifiedTicks: entry.modifiedTicks.toString()
		});
	}

	if (options?.manifest) {
		const manifest: DCBManifest = {
			version: header.version,
			endianness: header.endianness,
			files: manifestFiles
		};
		writeFileSync(join(outputDir, MANIFEST_FILE), JSON.stringify(manifest, null, 2), "utf8");
	}

	return extracted;
}

/** Header und Metadaten aller Einträge (Payloads werden nur übersprungen) */
export function listDcb(input: string | Buffer): DCBListing {
	const reader = new DCBReader(input);
	const { header, strings } = reader.read();
	const entries: DCBListing["entries"] = [];
	for (const entry of reader.entries()) {
		const payloadLength = entry.decode(NULL_SINK);
		entries.push({ ...entryInfo(entry), payloadLength });
	}
	return { header, stringCount: strings.size, entries };
}

/** Alle Einträge mit dekodiertem Wert */
export function readDcb(input: string | Buffer): { header: DCBHeader; entries: Array<DCBEntryInfo & { value: ConfigValue }> } {
	const reader = new DCBReader(input);
	const { header } = reader.read();
	const entries: Array<DCBEntryInfo & { value: ConfigValue }> = [];
	for (const entry of reader.entries()) {
		const builder = new ValueBuilder();
		entry.decode(builder);
		entries.push({ ...entryInfo(entry), value: builder.value });
	}
	return { header, entries };
}
