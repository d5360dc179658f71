/** Stabile Fehlercodes für DCB-Container. */
export type DCBErrorCode =
	| "DCB_TRUNCATED"
	| "DCB_BAD_MAGIC"
	| "DCB_BAD_VERSION"
	| "DCB_BAD_METHOD"
	| "DCB_PACKED_INT_OVERFLOW"
	| "DCB_BAD_STRING_LENGTH"
	| "DCB_DUPLICATE_STRING_ID"
	| "DCB_UNKNOWN_STRING_ID"
	| "DCB_BAD_ITEM_TYPE"
	| "DCB_BAD_SCALAR_TYPE"
	| "DCB_BAD_COUNT"
	| "DCB_BAD_TIMESTAMP"
	| "DCB_UNSAFE_PATH"
	| "DCB_UNSUPPORTED_FEATURE"
	| "DCB_NESTING_LIMIT";

export class DCBError extends Error {
	readonly code: DCBErrorCode;
	/** Byte-Offset im Container, falls bekannt */
	readonly offset?: number | undefined;

	constructor(code: DCBErrorCode, message: string, offset?: number) {
		super(offset === undefined ? message : `${message} (offset ${offset})`);
		this.name = "DCBError";
		this.code = code;
		this.offset = offset;
	}
}

/** Beschädigte oder fremde Daten – der Cursor ist danach nicht mehr vertrauenswürdig */
export class FormatError extends DCBError {
	constructor(code: Exclude<DCBErrorCode, "DCB_UNSUPPORTED_FEATURE" | "DCB_NESTING_LIMIT">, message: string, offset?: number) {
		super(code, message, offset);
		this.name = "FormatError";
	}
}

export type UnsupportedFeature = "compression" | "encryption";

/** Bekannte, aber nicht implementierte Methode (keine Beschädigung) */
export class UnsupportedFeatureError extends DCBError {
	readonly feature: UnsupportedFeature;
	readonly method: number;

	constructor(feature: UnsupportedFeature, method: number) {
		super("DCB_UNSUPPORTED_FEATURE", `${feature} method ${method} not implemented`);
		this.name = "UnsupportedFeatureError";
		this.feature = feature;
		this.method = method;
	}
}

/** Gültiger Eintrag, aber zu tief verschachtelt für das gewählte Ausgabeformat */
export class NestingLimitError extends DCBError {
	readonly format: string;
	readonly limit: number;

	constructor(format: string, limit: number) {
		super("DCB_NESTING_LIMIT", `${format} output supports at most ${limit} nesting levels`);
		this.name = "NestingLimitError";
		this.format = format;
		this.limit = limit;
	}
}
