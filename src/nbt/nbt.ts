import { NbtError } from "./errors.ts";
import { mutf8Length } from "./mutf8.ts";
import type {
	NbtByte,
	NbtByteArray,
	NbtCompound,
	NbtDouble,
	NbtFloat,
	NbtInput,
	NbtInt,
	NbtIntArray,
	NbtList,
	NbtListElementType,
	NbtLong,
	NbtLongArray,
	NbtRoot,
	NbtShort,
	NbtString,
	NbtTag,
	NbtTagOf,
	NbtTagType,
} from "./types.ts";
import { TAG_TYPE_TO_ID } from "./types.ts";

// ─── Range checks ───────────────────────────────────────────────────────────

const INT_RANGES = {
	byte: [-0x80, 0x7f],
	short: [-0x8000, 0x7fff],
	int: [-0x80000000, 0x7fffffff],
} as const;

const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;
export const MAX_STRING_BYTES = 0xffff;

const describeInput = (input: unknown): string => {
	if (isNbtTag(input)) return input.type;
	if (input === null) return "null";
	if (Array.isArray(input)) return "array";
	if (ArrayBuffer.isView(input)) return input.constructor.name;
	if (input instanceof Map) return "map";
	return typeof input;
};

export const typeMismatch = (
	expected: string,
	input: unknown,
	message?: string,
): NbtError => {
	const actual = describeInput(input);
	return new NbtError(
		"TYPE_MISMATCH",
		message ?? `Expected ${expected}, got ${actual}`,
		{ expected, actual },
	);
};

export const checkInteger = (
	type: keyof typeof INT_RANGES,
	value: number,
): number => {
	const [min, max] = INT_RANGES[type];
	if (!Number.isInteger(value) || value < min || value > max) {
		throw typeMismatch(
			type,
			value,
			`${String(value)} does not fit in a ${type} tag`,
		);
	}
	return value;
};

export const checkLong = (value: bigint | number): bigint => {
	if (typeof value === "number") {
		if (!Number.isInteger(value)) {
			throw typeMismatch("long", value, `${value} is not an integer`);
		}
		value = BigInt(value);
	} else if (typeof value !== "bigint") {
		throw typeMismatch("long", value);
	}
	if (value < INT64_MIN || value > INT64_MAX) {
		throw typeMismatch("long", value, `${value} does not fit in a long tag`);
	}
	return value;
};

/** Float values are rounded to single precision, the width they are stored at. */
export const checkFloat = (
	type: "float" | "double",
	value: number,
): number => {
	if (typeof value !== "number") throw typeMismatch(type, value);
	if (type === "double") return value;
	const rounded = Math.fround(value);
	if (Number.isFinite(value) && !Number.isFinite(rounded)) {
		throw typeMismatch(type, value, `${value} does not fit in a float tag`);
	}
	return rounded;
};

export const checkString = (value: string): string => {
	if (typeof value !== "string") throw typeMismatch("string", value);
	if (mutf8Length(value) > MAX_STRING_BYTES) {
		throw typeMismatch(
			"string",
			value,
			`String of ${value.length} characters exceeds ${MAX_STRING_BYTES} encoded bytes`,
		);
	}
	return value;
};

// ─── Tag recognition ────────────────────────────────────────────────────────

export const isNbtTag = (input: unknown): input is NbtTag =>
	typeof input === "object" &&
	input !== null &&
	"type" in input &&
	"value" in input &&
	typeof input.type === "string" &&
	input.type !== "end" &&
	Object.hasOwn(TAG_TYPE_TO_ID, input.type);

export const isTagOf = <T extends NbtTagType>(
	tag: NbtTag,
	type: T,
): tag is NbtTagOf<T> => tag.type === type;

type CompoundEntries =
	| Readonly<Record<string, NbtTag>>
	| ReadonlyMap<string, NbtTag>
	| readonly (readonly [string, NbtTag])[];

const isEntryIterable = (
	entries: CompoundEntries,
): entries is
	| ReadonlyMap<string, NbtTag>
	| readonly (readonly [string, NbtTag])[] =>
	entries instanceof Map || Array.isArray(entries);

const isPlainRecord = (
	input: NbtInput,
): input is Readonly<Record<string, NbtTag>> =>
	typeof input === "object" &&
	input !== null &&
	!Array.isArray(input) &&
	!ArrayBuffer.isView(input) &&
	!(input instanceof Map) &&
	!isNbtTag(input);

// ─── Builder functions ──────────────────────────────────────────────────────

export const nbtByte = (value: number): NbtByte => ({
	type: "byte",
	value: checkInteger("byte", value),
});

export const nbtShort = (value: number): NbtShort => ({
	type: "short",
	value: checkInteger("short", value),
});

export const nbtInt = (value: number): NbtInt => ({
	type: "int",
	value: checkInteger("int", value),
});

export const nbtLong = (value: bigint | number): NbtLong => ({
	type: "long",
	value: checkLong(value),
});

export const nbtFloat = (value: number): NbtFloat => ({
	type: "float",
	value: checkFloat("float", value),
});

export const nbtDouble = (value: number): NbtDouble => ({
	type: "double",
	value: checkFloat("double", value),
});

export const nbtString = (value: string): NbtString => ({
	type: "string",
	value: checkString(value),
});

/** Signed bytes; a Uint8Array is reinterpreted bit-for-bit. */
export const nbtByteArray = (
	values: Int8Array | Uint8Array | ArrayLike<number> = [],
): NbtByteArray => {
	if (values instanceof Int8Array) {
		return { type: "byteArray", value: values.slice() };
	}
	if (values instanceof Uint8Array) {
		return { type: "byteArray", value: new Int8Array(values) };
	}
	const value = new Int8Array(values.length);
	for (let i = 0; i < values.length; i++) {
		value[i] = checkInteger("byte", values[i]);
	}
	return { type: "byteArray", value };
};

export const nbtIntArray = (
	values: Int32Array | ArrayLike<number> = [],
): NbtIntArray => {
	if (values instanceof Int32Array) {
		return { type: "intArray", value: values.slice() };
	}
	const value = new Int32Array(values.length);
	for (let i = 0; i < values.length; i++) {
		value[i] = checkInteger("int", values[i]);
	}
	return { type: "intArray", value };
};

export const nbtLongArray = (
	values: BigInt64Array | ArrayLike<bigint | number> = [],
): NbtLongArray => {
	if (values instanceof BigInt64Array) {
		return { type: "longArray", value: values.slice() };
	}
	const value = new BigInt64Array(values.length);
	for (let i = 0; i < values.length; i++) {
		value[i] = checkLong(values[i]);
	}
	return { type: "longArray", value };
};

/**
 * Build a compound whose children are named after their keys. Pass a Map or
 * an entry array when key order matters for integer-like keys, which plain
 * objects reorder.
 */
export const nbtCompound = (
	entries: CompoundEntries = {},
	name = "",
): NbtRoot => {
	const compound: NbtRoot = { type: "compound", name, value: new Map() };
	const pairs = isEntryIterable(entries) ? entries : Object.entries(entries);
	for (const [key, tag] of pairs) compoundSet(compound, key, tag);
	return compound;
};

/**
 * Build a list of one element kind. Raw values are converted to that kind;
 * anything that cannot be represented in it fails with TYPE_MISMATCH.
 */
export const nbtList = (
	elementType: NbtListElementType = "end",
	items: readonly NbtInput[] = [],
): NbtList => {
	const list: NbtList = { type: "list", elementType, value: [] };
	for (const item of items) listPush(list, item);
	return list;
};

/** Booleans are stored as byte tags holding 0 or 1. */
export const nbtBool = (value = false): NbtByte => ({
	type: "byte",
	value: value ? 1 : 0,
});

// ─── Coercion ───────────────────────────────────────────────────────────────

const expectNumber = (type: NbtTagType, input: NbtInput): number => {
	if (typeof input !== "number") throw typeMismatch(type, input);
	return input;
};

/** Convert `input` into a tag of kind `type`, or fail with TYPE_MISMATCH. */
export const coerceTag = (type: NbtTagType, input: NbtInput): NbtTag => {
	if (isNbtTag(input)) {
		if (input.type !== type) throw typeMismatch(type, input);
		return input;
	}
	switch (type) {
		case "byte":
			return nbtByte(expectNumber(type, input));
		case "short":
			return nbtShort(expectNumber(type, input));
		case "int":
			return nbtInt(expectNumber(type, input));
		case "float":
			return nbtFloat(expectNumber(type, input));
		case "double":
			return nbtDouble(expectNumber(type, input));
		case "long":
			if (typeof input === "bigint" || typeof input === "number") {
				return nbtLong(input);
			}
			break;
		case "string":
			if (typeof input === "string") return nbtString(input);
			break;
		case "byteArray":
			if (
				input instanceof Int8Array ||
				input instanceof Uint8Array ||
				Array.isArray(input)
			) {
				return nbtByteArray(input);
			}
			break;
		case "intArray":
			if (input instanceof Int32Array || Array.isArray(input)) {
				return nbtIntArray(input);
			}
			break;
		case "longArray":
			if (input instanceof BigInt64Array || Array.isArray(input)) {
				return nbtLongArray(input);
			}
			break;
		case "compound":
			if (input instanceof Map) return nbtCompound(input);
			if (isPlainRecord(input)) return nbtCompound(input);
			break;
		case "list":
			break;
	}
	throw typeMismatch(type, input);
};

// ─── Compound operations ────────────────────────────────────────────────────

/** Insert `tag` under `key`; the tag's name becomes `key`. */
export const compoundSet = (
	compound: NbtCompound,
	key: string,
	tag: NbtTag,
): void => {
	if (typeof key !== "string") throw typeMismatch("string key", key);
	if (!isNbtTag(tag)) throw typeMismatch("tag", tag);
	tag.name = key;
	compound.value.set(key, tag);
};

export const compoundGet = (
	compound: NbtCompound,
	key: string,
): NbtTag | undefined => {
	if (typeof key !== "string") throw typeMismatch("string key", key);
	return compound.value.get(key);
};

/** Like `compoundGet`, but the child must be of kind `type`. */
export const compoundGetAs = <T extends NbtTagType>(
	compound: NbtCompound,
	key: string,
	type: T,
): NbtTagOf<T> | undefined => {
	const tag = compoundGet(compound, key);
	if (tag === undefined) return undefined;
	if (!isTagOf(tag, type)) {
		throw typeMismatch(type, tag, `"${key}" is a ${tag.type} tag, not ${type}`);
	}
	return tag;
};

export const compoundHas = (compound: NbtCompound, key: string): boolean =>
	compound.value.has(key);

export const compoundDelete = (compound: NbtCompound, key: string): boolean =>
	compound.value.delete(key);

// ─── List operations ────────────────────────────────────────────────────────

const coerceElement = (list: NbtList, input: NbtInput): NbtTag => {
	if (list.elementType === "end") {
		throw typeMismatch(
			"nothing",
			input,
			"A list declared with element type end cannot hold elements",
		);
	}
	const tag = coerceTag(list.elementType, input);
	delete tag.name;
	return tag;
};

export const listPush = (list: NbtList, input: NbtInput): void => {
	list.value.push(coerceElement(list, input));
};

export const listGet = (list: NbtList, index: number): NbtTag | undefined =>
	list.value[index];

export const listSet = (list: NbtList, index: number, input: NbtInput): void => {
	if (!Number.isInteger(index) || index < 0 || index >= list.value.length) {
		throw new RangeError(
			`List index ${index} out of range (length ${list.value.length})`,
		);
	}
	list.value[index] = coerceElement(list, input);
};

// ─── Simplify (strip type wrappers → plain JS values) ──────────────────────

export const simplifyNbt = (tag: NbtTag): unknown => {
	switch (tag.type) {
		case "compound":
			return Object.fromEntries(
				[...tag.value].map(([key, child]) => [key, simplifyNbt(child)]),
			);
		case "list":
			return tag.value.map(simplifyNbt);
		case "byteArray":
		case "intArray":
			return Array.from(tag.value);
		case "longArray":
			return Array.from(tag.value);
		default:
			return tag.value;
	}
};

// ─── Equality (deep structural comparison) ──────────────────────────────────

const equalArrays = <T>(a: ArrayLike<T>, b: ArrayLike<T>): boolean => {
	if (a.length !== b.length) return false;
	for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
	return true;
};

/** Kind, name and value must all match; compound key order is ignored. */
export const equalNbt = (a: NbtTag, b: NbtTag): boolean => {
	if (a.name !== b.name) return false;

	switch (a.type) {
		case "compound": {
			if (!isTagOf(b, "compound")) return false;
			if (a.value.size !== b.value.size) return false;
			for (const [key, val] of a.value) {
				const other = b.value.get(key);
				if (other === undefined || !equalNbt(val, other)) return false;
			}
			return true;
		}
		case "list": {
			if (!isTagOf(b, "list")) return false;
			if (a.elementType !== b.elementType) return false;
			if (a.value.length !== b.value.length) return false;
			return a.value.every((item, i) => equalNbt(item, b.value[i]));
		}
		case "byteArray":
			return isTagOf(b, "byteArray") && equalArrays(a.value, b.value);
		case "intArray":
			return isTagOf(b, "intArray") && equalArrays(a.value, b.value);
		case "longArray":
			return isTagOf(b, "longArray") && equalArrays(a.value, b.value);
		case "float":
		case "double":
			return (
				a.type === b.type &&
				(a.value === b.value || (Number.isNaN(a.value) && Number.isNaN(b.value)))
			);
		default:
			return a.type === b.type && a.value === b.value;
	}
};
