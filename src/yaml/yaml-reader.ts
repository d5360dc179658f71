import { readFileSync } from "node:fs";
import { isAlias, isMap, isScalar, isSeq, parseDocument, type Document } from "yaml";
import type { ConfigValue } from "../dcb/types.js";

function scalarText(value: unknown): string {
	if (value === null || value === undefined) return "";
	return typeof value === "string" ? value : String(value);
}

function keyText(key: unknown): string {
	if (isScalar(key)) return scalarText(key.value);
	if (key === null || key === undefined) return "";
	throw new Error("YAML mapping keys must be scalars");
}

/** Knoten → Wert mit explizitem Stapel; jeder Eintrag weiß, wohin sein Ergebnis gehört */
function toConfigValue(root: unknown, doc: Document): ConfigValue {
	type Work = { node: unknown; assign: (value: ConfigValue) => void };
	let result: ConfigValue = "";
	const stack: Work[] = [{ node: root, assign: (value) => (result = value) }];

	let work: Work | undefined;
	while ((work = stack.pop()) !== undefined) {
		const node = isAlias(work.node) ? work.node.resolve(doc) : work.node;
		if (isMap(node)) {
			const map = new Map<string, ConfigValue>();
			work.assign(map);
			const pending: Work[] = [];
			for (const pair of node.items) {
				const key = keyText(pair.key);
				if (map.has(key)) throw new Error(`Duplicate mapping key "${key}"`);
				// Platzhalter hält die Reihenfolge der Paare
				map.set(key, "");
				pending.push({ node: pair.value, assign: (value) => map.set(key, value) });
			}
			for (let i = pending.length - 1; i >= 0; i--) stack.push(pending[i]);
		} else if (isSeq(node)) {
			const list: ConfigValue[] = node.items.map(() => "");
			work.assign(list);
			node.items.forEach((item, i) => stack.push({ node: item, assign: (value) => (list[i] = value) }));
		} else if (isScalar(node)) {
			work.assign(scalarText(node.value));
		} else if (node === null || node === undefined) {
			// Leerer Wert ("key:") ohne Knoten
			work.assign("");
		} else {
			throw new Error("Unsupported YAML node");
		}
	}
	return result;
}

/** YAML-Dokument → Wert; failsafe-Schema, damit "1" oder "true" Strings bleiben */
export function parseYaml(text: string): ConfigValue {
	const doc = parseDocument(text, { schema: "failsafe" });
	if (doc.errors.length > 0) {
		throw new Error(`Invalid YAML: ${doc.errors[0].message}`);
	}
	return toConfigValue(doc.contents, doc);
}

export function readYamlFile(path: string): ConfigValue {
	return parseYaml(readFileSync(path, "utf8"));
}
