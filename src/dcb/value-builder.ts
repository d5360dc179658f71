import type { ConfigValue, DocumentEvent, EventSink } from "./types.js";

type Frame = { kind: "mapping"; value: Map<string, ConfigValue>; key?: string } | { kind: "sequence"; value: ConfigValue[] };

/** Baut aus dem Event-Strom wieder einen Wert auf (expliziter Stapel, keine Rekursion) */
export class ValueBuilder implements EventSink {
	private readonly stack: Frame[] = [];
	private root?: ConfigValue;

	public emit(event: DocumentEvent): void {
		switch (event.type) {
			case "mapping-start": {
				const value = new Map<string, ConfigValue>();
				this.attach(value);
				this.stack.push({ kind: "mapping", value });
				break;
			}
			case "sequence-start": {
				const value: ConfigValue[] = [];
				this.attach(value);
				this.stack.push({ kind: "sequence", value });
				break;
			}
			case "scalar": {
				const top = this.stack[this.stack.length - 1];
				if (top?.kind === "mapping" && top.key === undefined) {
					top.key = event.value;
				} else {
					this.attach(event.value);
				}
				break;
			}
			case "mapping-end":
			case "sequence-end": {
				const frame = this.stack.pop();
				const expected = event.type === "mapping-end" ? "mapping" : "sequence";
				if (!frame || frame.kind !== expected) throw new Error(`Unbalanced ${event.type} event`);
				if (frame.kind === "mapping" && frame.key !== undefined) throw new Error(`Mapping key "${frame.key}" without value`);
				break;
			}
		}
	}

	public get value(): ConfigValue {
		if (this.root === undefined || this.stack.length > 0) throw new Error("Incomplete event stream");
		return this.root;
	}

	private attach(value: ConfigValue) {
		const top = this.stack[this.stack.length - 1];
		if (!top) {
			if (this.root !== undefined) throw new Error("More than one root value");
			this.root = value;
		} else if (top.kind === "sequence") {
			top.value.push(value);
		} else {
			if (top.key === undefined) throw new Error("Mapping key must be a scalar");
			if (top.value.has(top.key)) throw new Error(`Duplicate mapping key "${top.key}"`);
			top.value.set(top.key, value);
			top.key = undefined;
		}
	}
}

/** Wert → Events (Gegenstück zu ValueBuilder) */
export function emitValue(value: ConfigValue, sink: EventSink): void {
	type Work = ConfigValue | { close: "mapping-end" | "sequence-end" } | { key: string; value: ConfigValue };
	const stack: Work[] = [value];

	let work: Work | undefined;
	while ((work = stack.pop()) !== undefined) {
		if (typeof work === "string") {
			sink.emit({ type: "scalar", value: work });
		} else if (Array.isArray(work)) {
			sink.emit({ type: "sequence-start" });
			stack.push({ close: "sequence-end" });
			for (let i = work.length - 1; i >= 0; i--) stack.push(work[i]);
		} else if (work instanceof Map) {
			sink.emit({ type: "mapping-start" });
			stack.push({ close: "mapping-end" });
			const pairs = [...work];
			for (let i = pairs.length - 1; i >= 0; i--) stack.push({ key: pairs[i][0], value: pairs[i][1] });
		} else if ("close" in work) {
			sink.emit({ type: work.close });
		} else {
			sink.emit({ type: "scalar", value: work.key });
			stack.push(work.value);
		}
	}
}
