import { readFileSync } from "node:fs";
import { XMLParser } from "fast-xml-parser";
import type { ConfigValue } from "../dcb/types.js";

interface XmlElement {
	name: string;
	attrs: Record<string, string>;
	/** preserveOrder-Kinderliste, noch nicht umgewandelt */
	children: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getAttrs(raw: unknown): Record<string, string> {
	const attrs: Record<string, string> = {};
	if (!isRecord(raw)) return attrs;
	for (const [k, v] of Object.entries(raw)) {
		if (k.startsWith("@_")) attrs[k.slice(2)] = String(v ?? "");
	}
	return attrs;
}

/** preserveOrder-Ausgabe: [{ tag: [...kinder], ":@": { "@_attr": "..." } }, { "#text": "..." }] */
function toElements(nodes: unknown): XmlElement[] {
	if (!Array.isArray(nodes)) return [];
	const list: unknown[] = nodes;
	const elements: XmlElement[] = [];
	for (const node of list) {
		if (!isRecord(node)) continue;
		for (const [name, children] of Object.entries(node)) {
			if (name === ":@" || name === "#text" || name === "#comment") continue;
			elements.push({ name, attrs: getAttrs(node[":@"]), children });
		}
	}
	return elements;
}

/** Elemente → Wert; Kinder werden erst beim Abarbeiten des Stapels ausgepackt */
function toConfigValue(root: XmlElement): ConfigValue {
	type Work = { el: XmlElement; assign: (value: ConfigValue) => void };
	let result: ConfigValue = "";
	const stack: Work[] = [{ el: root, assign: (value) => (result = value) }];

	let work: Work | undefined;
	while ((work = stack.pop()) !== undefined) {
		const el = work.el;
		switch (el.name) {
			case "scalar":
				work.assign(el.attrs.value ?? "");
				break;
			case "seq": {
				const children = toElements(el.children);
				const list: ConfigValue[] = children.map(() => "");
				work.assign(list);
				children.forEach((child, i) => stack.push({ el: child, assign: (value) => (list[i] = value) }));
				break;
			}
			case "map": {
				const map = new Map<string, ConfigValue>();
				work.assign(map);
				for (const child of toElements(el.children)) {
					const key = child.attrs.key;
					if (key === undefined) throw new Error(`<${child.name}> inside <map> without key attribute`);
					if (map.has(key)) throw new Error(`Duplicate mapping key "${key}"`);
					// Platzhalter hält die Reihenfolge der Kinder
					map.set(key, "");
					stack.push({ el: child, assign: (value) => map.set(key, value) });
				}
				break;
			}
			default:
				throw new Error(`Unexpected element <${el.name}>`);
		}
	}
	return result;
}

export function parseXml(xml: string): ConfigValue {
	const parser = new XMLParser({
		ignoreAttributes: false,
		attributeNamePrefix: "@_",
		preserveOrder: true,
		ignoreDeclaration: true,
		// Attributwerte nicht trimmen, " a " bleibt " a "
		trimValues: false,
		htmlEntities: true
	});
	const parsed: unknown = parser.parse(xml);
	const root = toElements(parsed).find((el) => el.name === "config");
	if (!root) throw new Error("Missing <config> root element");
	const values = toElements(root.children);
	if (values.length !== 1) throw new Error(`<config> must contain exactly one value, found ${values.length}`);
	return toConfigValue(values[0]);
}

export function readXmlFile(path: string): ConfigValue {
	return parseXml(readFileSync(path, "utf8"));
}
