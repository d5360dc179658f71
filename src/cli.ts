#!/usr/bin/env node
/**
 * CLI für DarkConfig Tools
 * Verwendung:
 *   unpack <input.dcb> [outputDir]  - Container zu YAML/XML entpacken
 *   list <input.dcb>                - Einträge anzeigen
 *   pack <inputDir> [output.dcb]    - YAML/XML-Ordner zurück zu DCB packen
 */

import { existsSync } from "node:fs";
import { join, parse } from "node:path";
import { NestingLimitError, UnsupportedFeatureError } from "./dcb/errors.js";
import { packDcb } from "./dcb/packer.js";
import { listDcb, unpackDcb, type OutputFormat } from "./dcb/unpacker.js";

const args = process.argv.slice(2);
const flags = new Set(["--manifest", "--big-endian", "-v", "--verbose", "-h", "--help"]);
const formatIdx = args.indexOf("--format");
const positional = args.filter((a, i) => !flags.has(a) && a !== "--format" && (formatIdx < 0 || i !== formatIdx + 1));
const command = positional[0];
const inputPath = positional[1];
const outputPath = positional[2];
const verbose = args.includes("-v") || args.includes("--verbose");

const HELP = `
DarkConfig Tools - DCB Entpacker & Packer

Verwendung:
  unpack <input.dcb> [outputDir]        - Container entpacken (ein Dokument pro Eintrag)
  unpack ... --format yaml|xml          - Ausgabeformat (default: yaml)
  unpack ... --manifest                 - Manifest für pack speichern
  list <input.dcb>                      - Header und Einträge anzeigen
  pack <inputDir> [output.dcb]          - YAML/XML-Ordner zurück zu DCB packen
  pack ... --big-endian                 - Big-Endian schreiben (ohne Manifest)
  -v, --verbose                         - Details pro Eintrag

Beispiele:
  node dist/cli.js unpack config.dcb ./config
  node dist/cli.js unpack config.dcb ./config-xml --format xml
  node dist/cli.js pack ./config config_repacked.dcb
`;

if (!command || args.includes("--help") || args.includes("-h") || command === "help") {
	console.log(HELP);
	process.exit(command ? 0 : 1);
}

if (!inputPath) {
	console.error(HELP);
	process.exit(1);
}

function parseFormat(): OutputFormat {
	if (formatIdx < 0) return "yaml";
	const value = args[formatIdx + 1];
	if (value !== "yaml" && value !== "xml") {
		console.error(`Fehler: Unbekanntes Format: ${value ?? ""}`);
		process.exit(1);
	}
	return value;
}

function describeTicks(ticks: bigint, modified: Date, kind: string): string {
	return `${modified.toISOString()} (${kind}, 0x${BigInt.asUintN(64, ticks).toString(16)})`;
}

try {
	if (command === "unpack") {
		const format = parseFormat();
		const parsed = parse(inputPath);
		const outputDir = outputPath ?? join(parsed.dir, `${parsed.name}_unpack`);
		if (!existsSync(inputPath)) {
			console.error(`Fehler: Datei nicht gefunden: ${inputPath}`);
			process.exit(1);
		}
		console.log(`Entpacke ${inputPath} nach ${outputDir}...`);
		const extracted = unpackDcb(inputPath, outputDir, { format, manifest: args.includes("--manifest") });
		for (const { entry, outputPath: file, payloadLength } of extracted) {
			console.log(`  - ${file}`);
			if (verbose) {
				console.log(`      Pfad: ${entry.path}, Prüfsumme: 0x${entry.checksum.toString(16).padStart(8, "0")}`);
				console.log(`      Geändert: ${describeTicks(entry.modifiedTicks, entry.modified, entry.dateKind)}`);
				const sizeNote = entry.size === payloadLength ? "" : ` (deklariert: ${entry.size})`;
				console.log(`      Payload: ${payloadLength} Bytes${sizeNote}`);
			}
		}
		console.log(`Fertig: ${extracted.length} Dateien extrahiert`);
	} else if (command === "list") {
		if (!existsSync(inputPath)) {
			console.error(`Fehler: Datei nicht gefunden: ${inputPath}`);
			process.exit(1);
		}
		const { header, stringCount, entries } = listDcb(inputPath);
		console.log(`Version ${header.version}, ${header.endianness === "little" ? "Little" : "Big"}-Endian, ${stringCount} Strings, ${entries.length} Einträge`);
		for (const entry of entries) {
			const sizeNote = verbose && entry.size !== entry.payloadLength ? ` (deklariert: ${entry.size})` : "";
			console.log(`  ${entry.path}  ${entry.payloadLength} Bytes${sizeNote}  ${entry.modified.toISOString()}`);
			if (verbose) {
				console.log(`      Offset: ${entry.offset}, Prüfsumme: 0x${entry.checksum.toString(16).padStart(8, "0")}, ${describeTicks(entry.modifiedTicks, entry.modified, entry.dateKind)}`);
			}
		}
	} else if (command === "pack") {
		const output = outputPath ?? join(process.cwd(), "repacked.dcb");
		if (!existsSync(inputPath)) {
			console.error(`Fehler: Verzeichnis nicht gefunden: ${inputPath}`);
			process.exit(1);
		}
		console.log(`Packe ${inputPath} → ${output}...`);
		const count = packDcb(inputPath, output, args.includes("--big-endian") ? { endianness: "big" } : undefined);
		console.log(`Fertig: ${output} erstellt (${count} Einträge)`);
	} else {
		console.error(`Unbekannter Befehl: ${command}`);
		process.exit(1);
	}
} catch (err) {
	if (err instanceof UnsupportedFeatureError) {
		console.error(`Fehler: ${err.message}`);
		console.error(
			`Hinweis: Der Container ist nicht beschädigt, verwendet aber ${err.feature === "compression" ? "Kompression" : "Verschlüsselung"} (Methode ${err.method}), die nicht unterstützt wird.`
		);
		process.exit(2);
	}
	if (err instanceof NestingLimitError) {
		console.error(`Fehler: ${err.message}`);
		console.error("Hinweis: Mit --format xml lassen sich beliebig tief verschachtelte Einträge entpacken.");
		process.exit(1);
	}
	console.error("Fehler:", err instanceof Error ? err.message : err);
	process.exit(1);
}
