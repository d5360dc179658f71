import type { DocumentEvent, DocumentWriter } from "../dcb/types.js";

export interface XmlOptions {
	/** Zeilenende (Standard "\n") */
	eol?: string;
}

type Frame = { tag: "map" | "seq"; depth: number; key?: string };

/**
 * Event-Strom → XML:
 *   <config>
 *   	<map>
 *   		<scalar key="name" value="..." />
 *   		<seq key="items" />
 *   	</map>
 *   </config>
 * Kinder einer <map> tragen ihren Schlüssel als key-Attribut, leere Sammlungen sind selbstschließend.
 */
export class XmlDocumentWriter implements DocumentWriter {
	private readonly eol: string;
	private readonly stack: Frame[] = [];
	private body = "";
	/** Öffnendes Tag wird erst beim nächsten Event geschrieben (für <map />) */
	private pendingOpen?: string;
	private hasRoot = false;

	constructor(options?: XmlOptions) {
		this.eol = options?.eol ?? "\n";
	}

	public emit(event: DocumentEvent): void {
		if (event.type === "mapping-end" || event.type === "sequence-end") {
			this.close(event.type === "mapping-end" ? "map" : "seq");
			return;
		}

		const parent = this.stack[this.stack.length - 1];
		if (this.pendingOpen !== undefined) {
			this.body += `${this.pendingOpen}>${this.eol}`;
			this.pendingOpen = undefined;
		}

		if (event.type === "scalar" && parent?.tag === "map" && parent.key === undefined) {
			parent.key = event.value;
			return;
		}

		let keyAttr = "";
		if (parent?.tag === "map") {
			if (parent.key === undefined) throw new Error("Mapping key must be a scalar");
			keyAttr = ` key="${escapeXml(parent.key)}"`;
			parent.key = undefined;
		} else if (!parent) {
			if (this.hasRoot) throw new Error("More than one root value");
			this.hasRoot = true;
		}

		const depth = this.stack.length + 1;
		const spacing = "\t".repeat(depth);
		if (event.type === "scalar") {
			this.body += `${spacing}<scalar${keyAttr} value="${escapeXml(event.value)}" />${this.eol}`;
			return;
		}

		const tag = event.type === "mapping-start" ? "map" : "seq";
		this.stack.push({ tag, depth });
		this.pendingOpen = `${spacing}<${tag}${keyAttr}`;
	}

	public finish(): string {
		if (!this.hasRoot || this.stack.length > 0) throw new Error("Incomplete event stream");
		let xml = '<?xml version="1.0" encoding="utf-8"?>' + this.eol;
		xml += "<config>" + this.eol;
		xml += this.body;
		xml += "</config>" + this.eol;
		return xml;
	}

	private close(tag: "map" | "seq") {
		const frame = this.stack.pop();
		if (!frame || frame.tag !== tag) throw new Error(`Unbalanced </${tag}>`);
		if (frame.key !== undefined) throw new Error(`Mapping key "${frame.key}" without value`);
		if (this.pendingOpen !== undefined) {
			this.body += `${this.pendingOpen} />${this.eol}`;
			this.pendingOpen = undefined;
			return;
		}
		this.body += `${"\t".repeat(frame.depth)}</${tag}>${this.eol}`;
	}
}

/** <>&" sowie Zeilenumbrüche/Tabs (würden in Attributen normalisiert) */
export function escapeXml(unsafe: string): string {
	return unsafe.replace(/[<>&"\n\r\t]/g, (c) => {
		switch (c) {
			case "<":
				return "&lt;";
			case ">":
				return "&gt;";
			case "&":
				return "&amp;";
			case '"':
				return "&quot;";
			case "\n":
				return "&#10;";
			case "\r":
				return "&#13;";
			case "\t":
				return "&#9;";
			default:
				return c;
		}
	});
}
