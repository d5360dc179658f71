/**
 * DarkConfig Tools
 *
 * Entpackt "packed config"-Container (DCB) zu einem YAML- oder XML-Dokument pro
 * Eintrag und packt solche Dokumente wieder zu einem Container.
 *
 * @example
 * ```ts
 * import { listDcb, unpackDcb } from 'darkconfig-tools';
 *
 * // Nur Metadaten lesen
 * const { entries } = listDcb('config.dcb');
 * console.log(entries.map(e => e.path));
 *
 * // Komplett entpacken
 * unpackDcb('config.dcb', './config');
 * ```
 */

export { unpackDcb, listDcb, readDcb, createDocumentWriter } from "./dcb/unpacker.js";
export type { UnpackOptions, UnpackedFile, DCBListing, OutputFormat } from "./dcb/unpacker.js";
export { packDcb, collectPackEntries } from "./dcb/packer.js";
export type { PackOptions } from "./dcb/packer.js";
export { DCBReader, readHeader } from "./dcb/reader.js";
export type { DCBEntry } from "./dcb/reader.js";
export { BinaryReader } from "./dcb/binary-reader.js";
export { StringTable } from "./dcb/string-table.js";
export { decodeTree, readScalar } from "./dcb/tree-decoder.js";
export { ValueBuilder, emitValue } from "./dcb/value-builder.js";
export { writeDcb, writeDcbToBuffer } from "./dcb/writer.js";
export type { DCBWriteEntry, DCBWriteOptions } from "./dcb/writer.js";
export { fromBinaryDate, toBinaryDate } from "./dcb/timestamp.js";
export { normalizeEntryPath } from "./dcb/paths.js";
export { DCBError, FormatError, NestingLimitError, UnsupportedFeatureError } from "./dcb/errors.js";
export type { DCBErrorCode, UnsupportedFeature } from "./dcb/errors.js";
export { DCB_SIGNATURE, ItemType, ScalarType, NULL_SINK } from "./dcb/types.js";
export type { ConfigValue, DCBEntryInfo, DCBHeader, DateTimeKind, DocumentEvent, DocumentWriter, Endianness, EventSink } from "./dcb/types.js";
export { YamlDocumentWriter, YAML_MAX_DEPTH } from "./yaml/yaml-writer.js";
export { parseYaml, readYamlFile } from "./yaml/yaml-reader.js";
export { XmlDocumentWriter, escapeXml } from "./xml/xml-writer.js";
export type { XmlOptions } from "./xml/xml-writer.js";
export { parseXml, readXmlFile } from "./xml/xml-reader.js";
export { MANIFEST_FILE, readManifest } from "./dcb/manifest.js";
export type { DCBManifest } from "./dcb/manifest.js";
