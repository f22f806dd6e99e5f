import { NbtError } from "./errors.ts";
import { decodeMutf8 } from "./mutf8.ts";
import type {
	NbtCompound,
	NbtFormat,
	NbtList,
	NbtRoot,
	NbtTag,
	NbtTagType,
	ReadOptions,
	ReadResult,
} from "./types.ts";
import { COMPOUND_TAG_ID, TAG_ID_TO_TYPE } from "./types.ts";

export const DEFAULT_MAX_DEPTH = 512;

// ─── Bounds ─────────────────────────────────────────────────────────────────

const need = (buf: Buffer, offset: number, size: number): void => {
	if (offset + size > buf.length) {
		throw new NbtError(
			"UNEXPECTED_END_OF_INPUT",
			`Needed ${size} bytes but only ${Math.max(0, buf.length - offset)} remain`,
			{ offset },
		);
	}
};

const checkCount = (count: number, offset: number): number => {
	if (count < 0) {
		throw new NbtError("MALFORMED_LENGTH", `Negative length ${count}`, {
			offset,
		});
	}
	return count;
};

// ─── Format reader interface ────────────────────────────────────────────────

type FormatReader = {
	readonly readInt16: (buf: Buffer, offset: number) => ReadResult<number>;
	readonly readUint16: (buf: Buffer, offset: number) => ReadResult<number>;
	readonly readInt32: (buf: Buffer, offset: number) => ReadResult<number>;
	readonly readInt64: (buf: Buffer, offset: number) => ReadResult<bigint>;
	readonly readFloat32: (buf: Buffer, offset: number) => ReadResult<number>;
	readonly readFloat64: (buf: Buffer, offset: number) => ReadResult<number>;
};

// ─── Big-endian primitives ──────────────────────────────────────────────────

const bigEndianReader: FormatReader = {
	readInt16: (buf, offset) => {
		need(buf, offset, 2);
		return { value: buf.readInt16BE(offset), size: 2 };
	},
	readUint16: (buf, offset) => {
		need(buf, offset, 2);
		return { value: buf.readUInt16BE(offset), size: 2 };
	},
	readInt32: (buf, offset) => {
		need(buf, offset, 4);
		return { value: buf.readInt32BE(offset), size: 4 };
	},
	readInt64: (buf, offset) => {
		need(buf, offset, 8);
		return { value: buf.readBigInt64BE(offset), size: 8 };
	},
	readFloat32: (buf, offset) => {
		need(buf, offset, 4);
		return { value: buf.readFloatBE(offset), size: 4 };
	},
	readFloat64: (buf, offset) => {
		need(buf, offset, 8);
		return { value: buf.readDoubleBE(offset), size: 8 };
	},
};

// ─── Little-endian primitives ───────────────────────────────────────────────

const littleEndianReader: FormatReader = {
	readInt16: (buf, offset) => {
		need(buf, offset, 2);
		return { value: buf.readInt16LE(offset), size: 2 };
	},
	readUint16: (buf, offset) => {
		need(buf, offset, 2);
		return { value: buf.readUInt16LE(offset), size: 2 };
	},
	readInt32: (buf, offset) => {
		need(buf, offset, 4);
		return { value: buf.readInt32LE(offset), size: 4 };
	},
	readInt64: (buf, offset) => {
		need(buf, offset, 8);
		return { value: buf.readBigInt64LE(offset), size: 8 };
	},
	readFloat32: (buf, offset) => {
		need(buf, offset, 4);
		return { value: buf.readFloatLE(offset), size: 4 };
	},
	readFloat64: (buf, offset) => {
		need(buf, offset, 8);
		return { value: buf.readDoubleLE(offset), size: 8 };
	},
};

const getReader = (format: NbtFormat): FormatReader =>
	format === "little" ? littleEndianReader : bigEndianReader;

type ReadContext = {
	readonly buf: Buffer;
	readonly reader: FormatReader;
	readonly maxDepth: number;
};

// ─── Tag payload readers ────────────────────────────────────────────────────

const readUint8 = (buf: Buffer, offset: number): number => {
	need(buf, offset, 1);
	return buf.readUInt8(offset);
};

const readString = (ctx: ReadContext, offset: number): ReadResult<string> => {
	const { value: length } = ctx.reader.readUint16(ctx.buf, offset);
	need(ctx.buf, offset + 2, length);
	return {
		value: decodeMutf8(
			ctx.buf.subarray(offset + 2, offset + 2 + length),
			offset + 2,
		),
		size: 2 + length,
	};
};

const readArrayLength = (
	ctx: ReadContext,
	offset: number,
	elementSize: number,
): number => {
	const { value } = ctx.reader.readInt32(ctx.buf, offset);
	const count = checkCount(value, offset);
	need(ctx.buf, offset + 4, count * elementSize);
	return count;
};

const readByteArray = (
	ctx: ReadContext,
	offset: number,
): ReadResult<Int8Array> => {
	const count = readArrayLength(ctx, offset, 1);
	// copies, so the tree never aliases the source buffer
	const value = new Int8Array(
		ctx.buf.subarray(offset + 4, offset + 4 + count),
	);
	return { value, size: 4 + count };
};

const readIntArray = (
	ctx: ReadContext,
	offset: number,
): ReadResult<Int32Array> => {
	const count = readArrayLength(ctx, offset, 4);
	const value = new Int32Array(count);
	let pos = offset + 4;
	for (let i = 0; i < count; i++) {
		value[i] = ctx.reader.readInt32(ctx.buf, pos).value;
		pos += 4;
	}
	return { value, size: pos - offset };
};

const readLongArray = (
	ctx: ReadContext,
	offset: number,
): ReadResult<BigInt64Array> => {
	const count = readArrayLength(ctx, offset, 8);
	const value = new BigInt64Array(count);
	let pos = offset + 4;
	for (let i = 0; i < count; i++) {
		value[i] = ctx.reader.readInt64(ctx.buf, pos).value;
		pos += 8;
	}
	return { value, size: pos - offset };
};

const tagTypeFromId = (tagId: number, offset: number): NbtTagType => {
	const tagType = TAG_ID_TO_TYPE[tagId];
	if (tagType === undefined || tagType === "end") {
		throw new NbtError("UNKNOWN_TAG_KIND", `Unknown tag ID: ${tagId}`, {
			offset,
			actual: String(tagId),
		});
	}
	return tagType;
};

// Smallest payload per kind; lets a huge declared list count fail before
// the loop runs.
const MIN_PAYLOAD_SIZE: Readonly<Record<NbtTagType, number>> = {
	byte: 1,
	short: 2,
	int: 4,
	long: 8,
	float: 4,
	double: 8,
	byteArray: 4,
	string: 2,
	list: 5,
	compound: 1,
	intArray: 4,
	longArray: 4,
};

const readList = (
	ctx: ReadContext,
	offset: number,
	depth: number,
): ReadResult<NbtList> => {
	const tagId = readUint8(ctx.buf, offset);
	const { value: rawCount } = ctx.reader.readInt32(ctx.buf, offset + 1);
	const count = checkCount(rawCount, offset + 1);
	let pos = offset + 5;

	if (tagId === 0) {
		if (count !== 0) {
			throw new NbtError(
				"MALFORMED_LENGTH",
				`List of end tags declares ${count} elements`,
				{ offset: offset + 1 },
			);
		}
		return { value: { type: "list", elementType: "end", value: [] }, size: 5 };
	}

	const elementType = tagTypeFromId(tagId, offset);
	need(ctx.buf, pos, count * MIN_PAYLOAD_SIZE[elementType]);
	const items: NbtTag[] = [];
	for (let i = 0; i < count; i++) {
		const result = readPayload(ctx, pos, elementType, depth);
		items.push(result.value);
		pos += result.size;
	}
	return {
		value: { type: "list", elementType, value: items },
		size: pos - offset,
	};
};

const readCompound = (
	ctx: ReadContext,
	offset: number,
	depth: number,
): ReadResult<NbtCompound> => {
	const entries = new Map<string, NbtTag>();
	let pos = offset;
	for (;;) {
		const tagId = readUint8(ctx.buf, pos);
		if (tagId === 0) {
			pos += 1;
			break;
		}
		const tagType = tagTypeFromId(tagId, pos);
		const result = readNamed(ctx, pos + 1, tagType, depth);
		// duplicate names: the last occurrence wins
		entries.set(result.value.name ?? "", result.value);
		pos += 1 + result.size;
	}
	return { value: { type: "compound", value: entries }, size: pos - offset };
};

const readPayload = (
	ctx: ReadContext,
	offset: number,
	tagType: NbtTagType,
	depth: number,
): ReadResult<NbtTag> => {
	const { buf, reader } = ctx;
	switch (tagType) {
		case "byte": {
			need(buf, offset, 1);
			return { value: { type: "byte", value: buf.readInt8(offset) }, size: 1 };
		}
		case "short": {
			const { value, size } = reader.readInt16(buf, offset);
			return { value: { type: "short", value }, size };
		}
		case "int": {
			const { value, size } = reader.readInt32(buf, offset);
			return { value: { type: "int", value }, size };
		}
		case "long": {
			const { value, size } = reader.readInt64(buf, offset);
			return { value: { type: "long", value }, size };
		}
		case "float": {
			const { value, size } = reader.readFloat32(buf, offset);
			return { value: { type: "float", value }, size };
		}
		case "double": {
			const { value, size } = reader.readFloat64(buf, offset);
			return { value: { type: "double", value }, size };
		}
		case "byteArray": {
			const { value, size } = readByteArray(ctx, offset);
			return { value: { type: "byteArray", value }, size };
		}
		case "string": {
			const { value, size } = readString(ctx, offset);
			return { value: { type: "string", value }, size };
		}
		case "intArray": {
			const { value, size } = readIntArray(ctx, offset);
			return { value: { type: "intArray", value }, size };
		}
		case "longArray": {
			const { value, size } = readLongArray(ctx, offset);
			return { value: { type: "longArray", value }, size };
		}
		case "list":
		case "compound": {
			if (depth >= ctx.maxDepth) {
				throw new NbtError(
					"NESTING_TOO_DEEP",
					`Tags nested deeper than ${ctx.maxDepth} levels`,
					{ offset },
				);
			}
			return tagType === "list"
				? readList(ctx, offset, depth + 1)
				: readCompound(ctx, offset, depth + 1);
		}
	}
};

const readNamed = (
	ctx: ReadContext,
	offset: number,
	tagType: NbtTagType,
	depth: number,
): ReadResult<NbtTag> => {
	const name = readString(ctx, offset);
	const payload = readPayload(ctx, offset + name.size, tagType, depth);
	payload.value.name = name.value;
	return { value: payload.value, size: name.size + payload.size };
};

const createContext = (buf: Buffer, options: ReadOptions): ReadContext => ({
	buf,
	reader: getReader(options.format ?? "big"),
	maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
});

// ─── Single tag reader ──────────────────────────────────────────────────────

/**
 * Decode one tag of a known kind at `offset`. With `hasName` the payload is
 * preceded by its name string, as for compound children; list elements have
 * none.
 */
export const readTag = (
	buf: Buffer,
	offset: number,
	tagType: NbtTagType,
	hasName: boolean,
	options: ReadOptions = {},
): ReadResult<NbtTag> => {
	const ctx = createContext(buf, options);
	return hasName
		? readNamed(ctx, offset, tagType, 0)
		: readPayload(ctx, offset, tagType, 0);
};

// ─── Root tag reader ────────────────────────────────────────────────────────

export const readRootTag = (
	buf: Buffer,
	offset: number,
	options: ReadOptions = {},
): ReadResult<NbtRoot> => {
	const ctx = createContext(buf, options);
	const tagId = readUint8(buf, offset);
	if (tagId !== COMPOUND_TAG_ID) {
		throw new NbtError(
			"NOT_A_COMPOUND_DOCUMENT",
			`Expected compound tag (10), got ${tagId}`,
			{ offset, expected: "10", actual: String(tagId) },
		);
	}
	const name = readString(ctx, offset + 1);
	const compound = readCompound(ctx, offset + 1 + name.size, 1);
	return {
		value: { type: "compound", name: name.value, value: compound.value.value },
		size: 1 + name.size + compound.size,
	};
};
