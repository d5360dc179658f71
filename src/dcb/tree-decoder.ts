import type { BinaryReader } from "./binary-reader.js";
import { FormatError } from "./errors.js";
import type { StringTable } from "./string-table.js";
import { ItemType, ScalarType, type EventSink } from "./types.js";

/** Anweisungen auf dem Arbeitsstapel */
enum StackOp {
	Item,
	KeyValue,
	MappingEnd,
	SequenceEnd
}

/**
 * Dekodiert genau ein verschachteltes Item ab der aktuellen Position und liefert
 * die Events in Dokumentreihenfolge an `sink`.
 *
 * Kein rekursiver Abstieg: ein expliziter LIFO-Stapel ersetzt den Call-Stack, die
 * Tiefe ist also nur durch den Speicher begrenzt. Nach der Rückkehr steht der
 * Cursor exakt hinter dem Item (Beginn des nächsten Eintrags).
 */
export function decodeTree(reader: BinaryReader, strings: StringTable, sink: EventSink): void {
	const stack: StackOp[] = [StackOp.Item];

	let op: StackOp | undefined;
	while ((op = stack.pop()) !== undefined) {
		switch (op) {
			case StackOp.Item: {
				const offset = reader.position;
				const itemType = reader.readU8();
				switch (itemType) {
					case ItemType.Mapping: {
						sink.emit({ type: "mapping-start" });
						stack.push(StackOp.MappingEnd);
						// Gleiche Anweisungen hintereinander – Reihenfolge der Paare bleibt erhalten
						pushRepeated(stack, StackOp.KeyValue, reader);
						break;
					}
					case ItemType.Sequence: {
						sink.emit({ type: "sequence-start" });
						stack.push(StackOp.SequenceEnd);
						pushRepeated(stack, StackOp.Item, reader);
						break;
					}
					case ItemType.Scalar: {
						sink.emit({ type: "scalar", value: readScalar(reader, strings) });
						break;
					}
					default:
						throw new FormatError("DCB_BAD_ITEM_TYPE", `Unknown item type ${itemType}`, offset);
				}
				break;
			}

			case StackOp.KeyValue: {
				sink.emit({ type: "scalar", value: readScalar(reader, strings) });
				// Wert liegt über den restlichen Geschwister-Paaren und wird zuerst vollständig dekodiert
				stack.push(StackOp.Item);
				break;
			}

			case StackOp.MappingEnd:
				sink.emit({ type: "mapping-end" });
				break;

			case StackOp.SequenceEnd:
				sink.emit({ type: "sequence-end" });
				break;
		}
	}
}

/** 0xF0: Inline-String, 0xFF: Packed-Int id aus der String-Tabelle */
export function readScalar(reader: BinaryReader, strings: StringTable): string {
	const offset = reader.position;
	const scalarType = reader.readU8();
	switch (scalarType) {
		case ScalarType.Value:
			return reader.readString();
		case ScalarType.Id:
			return strings.get(reader.readPackedInt(), offset);
		default:
			throw new FormatError("DCB_BAD_SCALAR_TYPE", `Unknown scalar type 0x${scalarType.toString(16)}`, offset);
	}
}

/** Negative (übergelaufene) Anzahl ergibt eine leere Sammlung */
function pushRepeated(stack: StackOp[], op: StackOp, reader: BinaryReader) {
	const offset = reader.position;
	let count = reader.readPackedInt();
	// Jedes Element braucht mindestens ein Byte
	if (count > reader.remaining) {
		throw new FormatError("DCB_BAD_COUNT", `Element count ${count} exceeds remaining ${reader.remaining} bytes`, offset);
	}
	while (count-- > 0) {
		stack.push(op);
	}
}
