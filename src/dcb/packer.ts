/**
 * DCB Packer – packt YAML/XML-Dokumente eines Verzeichnisses zurück in einen Container.
 * Verwendet das Manifest von unpack (--manifest) für Reihenfolge, Byte-Reihenfolge,
 * Prüfsumme, Größe und Zeitstempel.
 */

import { existsSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";
import { readXmlFile } from "../xml/xml-reader.js";
import { readYamlFile } from "../yaml/yaml-reader.js";
import { readManifest } from "./manifest.js";
import type { ConfigValue, Endianness } from "./types.js";
import { writeDcb, type DCBWriteEntry } from "./writer.js";

export interface PackOptions {
	/** Ohne Manifest: Standard "little" */
	endianness?: Endianness;
}

const DOCUMENT_EXTENSION = /\.(ya?ml|xml)$/i;

/** Verzeichnis rekursiv scannen, versteckte Dateien auslassen */
function scanDirectory(dir: string): string[] {
	const files: string[] = [];
	function walk(base: string) {
		for (const entry of readdirSync(join(dir, base), { withFileTypes: true })) {
			if (entry.name.startsWith(".")) continue;
			const rel = base ? `${base}/${entry.name}` : entry.name;
			if (entry.isDirectory()) {
				walk(rel);
			} else if (entry.isFile() && DOCUMENT_EXTENSION.test(entry.name)) {
				files.push(rel);
			}
		}
	}
	walk("");
	return files.sort();
}

function readDocument(path: string): ConfigValue {
	return /\.xml$/i.test(path) ? readXmlFile(path) : readYamlFile(path);
}

export function collectPackEntries(inputDir: string, options?: PackOptions): { entries: DCBWriteEntry[]; endianness: Endianness } {
	if (!existsSync(inputDir)) {
		throw new Error(`Directory not found: ${inputDir}`);
	}
	const manifest = readManifest(inputDir);
	const files = scanDirectory(inputDir);
	const entries: DCBWriteEntry[] = [];
	const packed = new Set<string>();

	for (const m of manifest?.files ?? []) {
		const full = join(inputDir, m.file);
		if (!existsSync(full)) {
			throw new Error(`File listed in manifest not found: ${m.file}`);
		}
		entries.push({
			path: m.path,
			value: readDocument(full),
			checksum: m.checksum,
			size: m.size,
			modifiedTicks: BigInt(m.modifiedTicks)
		});
		packed.add(m.file);
	}

	// Dateien ohne Manifest-Eintrag: Pfad = Dateiname ohne Endung, Zeitstempel = mtime
	for (const rel of files) {
		if (packed.has(rel)) continue;
		const full = join(inputDir, rel);
		entries.push({
			path: rel.replace(DOCUMENT_EXTENSION, ""),
			value: readDocument(full),
			modified: statSync(full).mtime
		});
	}

	return { entries, endianness: options?.endianness ?? manifest?.endianness ?? "little" };
}

export function packDcb(inputDir: string, outputPath: string, options?: PackOptions): number {
	const { entries, endianness } = collectPackEntries(inputDir, options);
	writeDcb(entries, outputPath, { endianness });
	return entries.length;
}
