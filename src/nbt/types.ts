// ─── Format ─────────────────────────────────────────────────────────────────

export type NbtFormat = "big" | "little";

export type NbtCompression = "none" | "gzip" | "zlib";

// ─── Tag type identifiers ───────────────────────────────────────────────────

export type NbtTagType =
	| "byte"
	| "short"
	| "int"
	| "long"
	| "float"
	| "double"
	| "byteArray"
	| "string"
	| "list"
	| "compound"
	| "intArray"
	| "longArray";

export type NbtListElementType = NbtTagType | "end";

// ─── Tag ID ↔ type mappings ────────────────────────────────────────────────

export const TAG_ID_TO_TYPE: Readonly<Record<number, NbtListElementType>> = {
	0: "end",
	1: "byte",
	2: "short",
	3: "int",
	4: "long",
	5: "float",
	6: "double",
	7: "byteArray",
	8: "string",
	9: "list",
	10: "compound",
	11: "intArray",
	12: "longArray",
};

export const TAG_TYPE_TO_ID: Readonly<Record<NbtListElementType, number>> = {
	end: 0,
	byte: 1,
	short: 2,
	int: 3,
	long: 4,
	float: 5,
	double: 6,
	byteArray: 7,
	string: 8,
	list: 9,
	compound: 10,
	intArray: 11,
	longArray: 12,
};

export const COMPOUND_TAG_ID = 10;

// ─── Individual tag types ───────────────────────────────────────────────────
//
// `name` is set on compound children (always equal to their key) and on the
// document root; list elements never carry one.

export type NbtByte = { readonly type: "byte"; name?: string; value: number };
export type NbtShort = { readonly type: "short"; name?: string; value: number };
export type NbtInt = { readonly type: "int"; name?: string; value: number };
export type NbtLong = { readonly type: "long"; name?: string; value: bigint };
export type NbtFloat = { readonly type: "float"; name?: string; value: number };
export type NbtDouble = {
	readonly type: "double";
	name?: string;
	value: number;
};
export type NbtString = {
	readonly type: "string";
	name?: string;
	value: string;
};
export type NbtByteArray = {
	readonly type: "byteArray";
	name?: string;
	value: Int8Array;
};
export type NbtIntArray = {
	readonly type: "intArray";
	name?: string;
	value: Int32Array;
};
export type NbtLongArray = {
	readonly type: "longArray";
	name?: string;
	value: BigInt64Array;
};
export type NbtList = {
	readonly type: "list";
	name?: string;
	elementType: NbtListElementType;
	readonly value: NbtTag[];
};
export type NbtCompound = {
	readonly type: "compound";
	name?: string;
	readonly value: Map<string, NbtTag>;
};

// ─── Union types ────────────────────────────────────────────────────────────

export type NbtTag =
	| NbtByte
	| NbtShort
	| NbtInt
	| NbtLong
	| NbtFloat
	| NbtDouble
	| NbtString
	| NbtByteArray
	| NbtIntArray
	| NbtLongArray
	| NbtList
	| NbtCompound;

export type NbtTagOf<T extends NbtTagType> = Extract<NbtTag, { type: T }>;

export type NbtTagValue = NbtTag["value"];

// ─── Raw values accepted where a tag of a known kind is expected ────────────

export type NbtInput =
	| NbtTag
	| number
	| bigint
	| string
	| ArrayLike<number>
	| ArrayLike<bigint>
	| ReadonlyMap<string, NbtTag>
	| { readonly [key: string]: NbtTag };

// ─── Vendor headers ─────────────────────────────────────────────────────────

/**
 * A fixed-size header some producers write before the root tag. Detection
 * runs on the decompressed bytes; `encode` rebuilds the header for a payload
 * of the given length.
 */
export type HeaderFormat = {
	readonly kind: string;
	readonly endian: NbtFormat;
	readonly detect: (
		data: Buffer,
	) => { readonly version: number; readonly size: number } | null;
	readonly encode: (version: number, payloadLength: number) => Buffer;
};

export type VendorHeader = {
	readonly format: HeaderFormat;
	readonly version: number;
};

// ─── Root NBT (compound with a name) ───────────────────────────────────────

export type DocumentFraming = {
	readonly endian: NbtFormat;
	readonly compression: NbtCompression;
	readonly header: VendorHeader | null;
};

export type NbtRoot = NbtCompound & {
	name: string;
	framing?: DocumentFraming;
};

/** A root compound as loaded from bytes, remembering how it was framed. */
export type NbtDocument = NbtRoot & { framing: DocumentFraming };

// ─── Read result (value + bytes consumed) ───────────────────────────────────

export type ReadResult<T> = { readonly value: T; readonly size: number };

// ─── Options ────────────────────────────────────────────────────────────────

export type ReadOptions = {
	readonly format?: NbtFormat;
	readonly maxDepth?: number;
};

export type LoadOptions = {
	readonly endian?: NbtFormat;
	readonly compression?: NbtCompression | "auto";
	readonly headerFormats?: readonly HeaderFormat[];
	readonly maxDepth?: number;
};

export type SaveOptions = {
	readonly endian?: NbtFormat;
	readonly compression?: NbtCompression;
	readonly dropHeader?: boolean;
};
