import { sep } from "node:path";
import { FormatError } from "./errors.js";

/**
 * Eintragspfad → relativer Pfad mit Host-Trenner.
 * "/" und "\\" werden vereinheitlicht, Laufwerk ("C:") und Wurzel entfernt.
 */
export function normalizeEntryPath(entryPath: string, separator: string = sep): string {
	const withoutRoot = entryPath.replace(/^(?:[A-Za-z]:)?[\\/]*/, "");
	const segments = withoutRoot.split(/[\\/]+/).filter((s) => s !== "" && s !== ".");
	if (segments.includes("..")) {
		throw new FormatError("DCB_UNSAFE_PATH", `Entry path leaves the output directory: ${entryPath}`);
	}
	if (segments.length === 0) {
		throw new FormatError("DCB_UNSAFE_PATH", `Entry path is empty: "${entryPath}"`);
	}
	return segments.join(separator);
}
