/**
 * DCB Types – "packed config" Container (DarkConfig binary)
 */

/** '3MMp' in Little-Endian-Form */
export const DCB_SIGNATURE = 0x334d4de3;
export const DCB_VERSION = 1;

export const MAX_COMPRESSION_METHOD = 3;
export const MAX_ENCRYPTION_METHOD = 1;

export type Endianness = "little" | "big";

export enum ItemType {
	Mapping = 1,
	Sequence = 2,
	Scalar = 3
}

export enum ScalarType {
	Value = 0xf0,
	Id = 0xff
}

export interface DCBHeader {
	magic: number;
	endianness: Endianness;
	version: number;
	compressionMethod: number;
	encryptionMethod: number;
}

/** Art des Zeitstempels (Bits 62–63 des i64) */
export type DateTimeKind = "unspecified" | "utc" | "local";

export interface DCBEntryInfo {
	/** Pfad wie gespeichert (mit "/" oder "\\") */
	path: string;
	checksum: number;
	/** Deklarierte Größe – nur informativ, begrenzt den Decoder nicht */
	size: number;
	modifiedTicks: bigint;
	modified: Date;
	dateKind: DateTimeKind;
	/** Offset des Payloads (Tree) im Container */
	offset: number;
}

export type DocumentEvent =
	| { type: "mapping-start" }
	| { type: "mapping-end" }
	| { type: "sequence-start" }
	| { type: "sequence-end" }
	| { type: "scalar"; value: string };

export interface EventSink {
	emit(event: DocumentEvent): void;
}

/** Sink für Text-Ausgabe (YAML/XML) */
export interface DocumentWriter extends EventSink {
	finish(): string;
}

export type ConfigValue = string | ConfigValue[] | Map<string, ConfigValue>;

export const NULL_SINK: EventSink = {
	emit() {}
};
