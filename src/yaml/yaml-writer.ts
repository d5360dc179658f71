import { Document, Pair, Scalar, YAMLMap, YAMLSeq } from "yaml";
import { NestingLimitError } from "../dcb/errors.js";
import type { DocumentEvent, DocumentWriter } from "../dcb/types.js";

/** `Document.toString()` arbeitet rekursiv; tiefere Einträge gehen nur als XML */
export const YAML_MAX_DEPTH = 256;

type Frame = { kind: "mapping"; node: YAMLMap; key?: Scalar<string> } | { kind: "sequence"; node: YAMLSeq };

/**
 * Event-Strom → YAML. Baut die Knoten eines `Document` über einen Stapel auf;
 * failsafe-Schema, da alle Scalars im Container Strings sind.
 */
export class YamlDocumentWriter implements DocumentWriter {
	private readonly doc = new Document(undefined, { schema: "failsafe" });
	private readonly stack: Frame[] = [];
	private hasRoot = false;

	public emit(event: DocumentEvent): void {
		switch (event.type) {
			case "mapping-start": {
				this.checkDepth();
				const node = new YAMLMap(this.doc.schema);
				this.attach(node);
				this.stack.push({ kind: "mapping", node });
				break;
			}
			case "sequence-start": {
				this.checkDepth();
				const node = new YAMLSeq(this.doc.schema);
				this.attach(node);
				this.stack.push({ kind: "sequence", node });
				break;
			}
			case "scalar": {
				const scalar = new Scalar(event.value);
				const top = this.stack[this.stack.length - 1];
				if (top?.kind === "mapping" && top.key === undefined) {
					top.key = scalar;
				} else {
					this.attach(scalar);
				}
				break;
			}
			case "mapping-end":
			case "sequence-end": {
				const frame = this.stack.pop();
				const expected = event.type === "mapping-end" ? "mapping" : "sequence";
				if (!frame || frame.kind !== expected) throw new Error(`Unbalanced ${event.type} event`);
				if (frame.kind === "mapping" && frame.key !== undefined) throw new Error(`Mapping key "${frame.key.value}" without value`);
				break;
			}
		}
	}

	public finish(): string {
		if (!this.hasRoot || this.stack.length > 0) throw new Error("Incomplete event stream");
		return this.doc.toString();
	}

	private checkDepth() {
		if (this.stack.length >= YAML_MAX_DEPTH) throw new NestingLimitError("YAML", YAML_MAX_DEPTH);
	}

	private attach(node: YAMLMap | YAMLSeq | Scalar<string>) {
		const top = this.stack[this.stack.length - 1];
		if (!top) {
			if (this.hasRoot) throw new Error("More than one root value");
			this.doc.contents = node;
			this.hasRoot = true;
		} else if (top.kind === "sequence") {
			top.node.items.push(node);
		} else {
			if (top.key === undefined) throw new Error("Mapping key must be a scalar");
			top.node.items.push(new Pair(top.key, node));
			top.key = undefined;
		}
	}
}
