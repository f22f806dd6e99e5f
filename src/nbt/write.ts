import { NbtError } from "./errors.ts";
import { encodeMutf8 } from "./mutf8.ts";
import { DEFAULT_MAX_DEPTH } from "./read.ts";
import {
	checkFloat,
	checkInteger,
	checkLong,
	MAX_STRING_BYTES,
	typeMismatch,
} from "./nbt.ts";
import type {
	NbtCompound,
	NbtFormat,
	NbtList,
	NbtRoot,
	NbtTag,
} from "./types.ts";
import { COMPOUND_TAG_ID, TAG_TYPE_TO_ID } from "./types.ts";

// ─── Growable output ────────────────────────────────────────────────────────

type ByteSink = { buf: Buffer; offset: number };

const createSink = (initialSize = 256): ByteSink => ({
	buf: Buffer.alloc(initialSize),
	offset: 0,
});

const reserve = (out: ByteSink, size: number): number => {
	const needed = out.offset + size;
	if (needed > out.buf.length) {
		const grown = Buffer.alloc(Math.max(out.buf.length * 2, needed));
		out.buf.copy(grown, 0, 0, out.offset);
		out.buf = grown;
	}
	const at = out.offset;
	out.offset = needed;
	return at;
};

const finish = (out: ByteSink): Buffer =>
	Buffer.from(out.buf.subarray(0, out.offset));

// ─── Format writer interface ────────────────────────────────────────────────

type FormatWriter = {
	readonly writeInt16: (out: ByteSink, value: number) => void;
	readonly writeUint16: (out: ByteSink, value: number) => void;
	readonly writeInt32: (out: ByteSink, value: number) => void;
	readonly writeInt64: (out: ByteSink, value: bigint) => void;
	readonly writeFloat32: (out: ByteSink, value: number) => void;
	readonly writeFloat64: (out: ByteSink, value: number) => void;
};

// ─── Big-endian primitives ──────────────────────────────────────────────────

const bigEndianWriter: FormatWriter = {
	writeInt16: (out, value) => {
		const at = reserve(out, 2);
		out.buf.writeInt16BE(value, at);
	},
	writeUint16: (out, value) => {
		const at = reserve(out, 2);
		out.buf.writeUInt16BE(value, at);
	},
	writeInt32: (out, value) => {
		const at = reserve(out, 4);
		out.buf.writeInt32BE(value, at);
	},
	writeInt64: (out, value) => {
		const at = reserve(out, 8);
		out.buf.writeBigInt64BE(value, at);
	},
	writeFloat32: (out, value) => {
		const at = reserve(out, 4);
		out.buf.writeFloatBE(value, at);
	},
	writeFloat64: (out, value) => {
		const at = reserve(out, 8);
		out.buf.writeDoubleBE(value, at);
	},
};

// ─── Little-endian primitives ───────────────────────────────────────────────

const littleEndianWriter: FormatWriter = {
	writeInt16: (out, value) => {
		const at = reserve(out, 2);
		out.buf.writeInt16LE(value, at);
	},
	writeUint16: (out, value) => {
		const at = reserve(out, 2);
		out.buf.writeUInt16LE(value, at);
	},
	writeInt32: (out, value) => {
		const at = reserve(out, 4);
		out.buf.writeInt32LE(value, at);
	},
	writeInt64: (out, value) => {
		const at = reserve(out, 8);
		out.buf.writeBigInt64LE(value, at);
	},
	writeFloat32: (out, value) => {
		const at = reserve(out, 4);
		out.buf.writeFloatLE(value, at);
	},
	writeFloat64: (out, value) => {
		const at = reserve(out, 8);
		out.buf.writeDoubleLE(value, at);
	},
};

const getWriter = (format: NbtFormat): FormatWriter =>
	format === "little" ? littleEndianWriter : bigEndianWriter;

// ─── Tag payload writers ────────────────────────────────────────────────────

const writeUint8 = (out: ByteSink, value: number): void => {
	const at = reserve(out, 1);
	out.buf.writeUInt8(value, at);
};

const writeString = (
	out: ByteSink,
	value: string,
	writer: FormatWriter,
): void => {
	const bytes = encodeMutf8(value);
	if (bytes.length > MAX_STRING_BYTES) {
		throw new NbtError(
			"MALFORMED_LENGTH",
			`String encodes to ${bytes.length} bytes, more than ${MAX_STRING_BYTES}`,
		);
	}
	writer.writeUint16(out, bytes.length);
	const at = reserve(out, bytes.length);
	bytes.copy(out.buf, at);
};

const writeList = (
	out: ByteSink,
	list: NbtList,
	writer: FormatWriter,
	depth: number,
): void => {
	if (list.elementType === "end" && list.value.length > 0) {
		throw typeMismatch(
			"nothing",
			list.value[0],
			"A list declared with element type end cannot hold elements",
		);
	}
	writeUint8(out, TAG_TYPE_TO_ID[list.elementType]);
	writer.writeInt32(out, list.value.length);
	for (const item of list.value) {
		if (item.type !== list.elementType) throw typeMismatch(list.elementType, item);
		writePayload(out, item, writer, depth);
	}
};

const writeCompound = (
	out: ByteSink,
	compound: NbtCompound,
	writer: FormatWriter,
	depth: number,
): void => {
	for (const [key, tag] of compound.value) {
		if (tag.name !== undefined && tag.name !== key) {
			throw typeMismatch(
				`name "${key}"`,
				tag,
				`Compound entry "${key}" holds a tag named "${tag.name}"`,
			);
		}
		writeNamed(out, key, tag, writer, depth);
	}
	writeUint8(out, 0);
};

const writeNamed = (
	out: ByteSink,
	name: string,
	tag: NbtTag,
	writer: FormatWriter,
	depth: number,
): void => {
	writeUint8(out, TAG_TYPE_TO_ID[tag.type]);
	writeString(out, name, writer);
	writePayload(out, tag, writer, depth);
};

const writePayload = (
	out: ByteSink,
	tag: NbtTag,
	writer: FormatWriter,
	depth: number,
): void => {
	switch (tag.type) {
		case "byte": {
			const value = checkInteger("byte", tag.value);
			const at = reserve(out, 1);
			out.buf.writeInt8(value, at);
			return;
		}
		case "short":
			writer.writeInt16(out, checkInteger("short", tag.value));
			return;
		case "int":
			writer.writeInt32(out, checkInteger("int", tag.value));
			return;
		case "long":
			writer.writeInt64(out, checkLong(tag.value));
			return;
		case "float":
			writer.writeFloat32(out, checkFloat("float", tag.value));
			return;
		case "double":
			writer.writeFloat64(out, checkFloat("double", tag.value));
			return;
		case "byteArray": {
			writer.writeInt32(out, tag.value.length);
			const at = reserve(out, tag.value.length);
			Buffer.from(
				tag.value.buffer,
				tag.value.byteOffset,
				tag.value.byteLength,
			).copy(out.buf, at);
			return;
		}
		case "string":
			writeString(out, tag.value, writer);
			return;
		case "list":
		case "compound":
			// mirrors the reader's limit
			if (depth >= DEFAULT_MAX_DEPTH) {
				throw new NbtError(
					"NESTING_TOO_DEEP",
					`Tags nested deeper than ${DEFAULT_MAX_DEPTH} levels`,
				);
			}
			if (tag.type === "list") writeList(out, tag, writer, depth + 1);
			else writeCompound(out, tag, writer, depth + 1);
			return;
		case "intArray":
			writer.writeInt32(out, tag.value.length);
			for (const int of tag.value) writer.writeInt32(out, int);
			return;
		case "longArray":
			writer.writeInt32(out, tag.value.length);
			for (const long of tag.value) writer.writeInt64(out, long);
			return;
	}
};

// ─── Single tag writer ──────────────────────────────────────────────────────

/**
 * Encode one tag. A named tag is written the way compound children are
 * (kind id, name, payload); an unnamed one as a bare payload, the way list
 * elements are.
 */
export const writeTag = (
	tag: NbtTag,
	named: boolean,
	format: NbtFormat = "big",
): Buffer => {
	const out = createSink();
	const writer = getWriter(format);
	if (named) writeNamed(out, tag.name ?? "", tag, writer, 0);
	else writePayload(out, tag, writer, 0);
	return finish(out);
};

// ─── Root tag writer ────────────────────────────────────────────────────────

export const writeRootTag = (root: NbtRoot, format: NbtFormat = "big"): Buffer => {
	const out = createSink(1024);
	const writer = getWriter(format);
	writeUint8(out, COMPOUND_TAG_ID);
	writeString(out, root.name, writer);
	writeCompound(out, root, writer, 1);
	return finish(out);
};
