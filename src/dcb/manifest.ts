import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";

export const MANIFEST_FILE = ".dcb.manifest.json";

const manifestSchema = z.object({
	version: z.number().int(),
	endianness: z.enum(["little", "big"]),
	files: z.array(
		z.object({
			/** Pfad wie im Container gespeichert */
			path: z.string(),
			/** Dokument relativ zum Verzeichnis, mit "/" */
			file: z.string(),
			checksum: z.number().int().min(0).max(0xffffffff),
			size: z.number().int(),
			/** i64 als Dezimalstring (JSON kennt kein bigint) */
			modifiedTicks: z.string().regex(/^-?\d+$/)
		})
	)
});

export type DCBManifest = z.infer<typeof manifestSchema>;

/** Manifest aus einem entpackten Verzeichnis; undefined, wenn keins existiert */
export function readManifest(dir: string): DCBManifest | undefined {
	const path = join(dir, MANIFEST_FILE);
	if (!existsSync(path)) return undefined;
	const result = manifestSchema.safeParse(JSON.parse(readFileSync(path, "utf8")));
	if (!result.success) {
		throw new Error(`Invalid manifest ${path}: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
	}
	return result.data;
}
