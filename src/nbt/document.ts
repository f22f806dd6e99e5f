import { promises as fs } from "node:fs";
import { deflateSync, gunzipSync, gzipSync, inflateSync } from "node:zlib";
import { NbtError } from "./errors.ts";
import { readRootTag } from "./read.ts";
import type {
	DocumentFraming,
	HeaderFormat,
	LoadOptions,
	NbtCompression,
	NbtDocument,
	NbtRoot,
	SaveOptions,
	VendorHeader,
} from "./types.ts";
import { COMPOUND_TAG_ID } from "./types.ts";
import { writeRootTag } from "./write.ts";

// ─── Vendor headers ─────────────────────────────────────────────────────────

const ENTITIES_MAGIC = Buffer.from("ENT\0", "latin1");

/** `ENT\0`, u32 version, u32 payload length; written by pocket entities.dat. */
export const ENTITIES_HEADER: HeaderFormat = {
	kind: "entities",
	endian: "little",
	detect: (data) => {
		if (data.length < 12) return null;
		if (!data.subarray(0, 4).equals(ENTITIES_MAGIC)) return null;
		return { version: data.readUInt32LE(4), size: 12 };
	},
	encode: (version, payloadLength) => {
		const header = Buffer.alloc(12);
		ENTITIES_MAGIC.copy(header, 0);
		header.writeUInt32LE(version, 4);
		header.writeUInt32LE(payloadLength, 8);
		return header;
	},
};

/** u32 version, u32 payload length; written by pocket level.dat. */
export const LEVEL_HEADER: HeaderFormat = {
	kind: "level",
	endian: "little",
	detect: (data) => {
		if (data.length < 8 || data[0] === COMPOUND_TAG_ID) return null;
		if (data.readUInt32LE(4) !== data.length - 8) return null;
		return { version: data.readUInt32LE(0), size: 8 };
	},
	encode: (version, payloadLength) => {
		const header = Buffer.alloc(8);
		header.writeUInt32LE(version, 0);
		header.writeUInt32LE(payloadLength, 4);
		return header;
	},
};

export const DEFAULT_HEADER_FORMATS: readonly HeaderFormat[] = [
	ENTITIES_HEADER,
	LEVEL_HEADER,
];

const detectHeader = (
	data: Buffer,
	formats: readonly HeaderFormat[],
): { header: VendorHeader; size: number } | null => {
	for (const format of formats) {
		const found = format.detect(data);
		if (found) return { header: { format, version: found.version }, size: found.size };
	}
	return null;
};

// ─── Compression ────────────────────────────────────────────────────────────

const hasGzipHeader = (data: Buffer): boolean =>
	data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b;

const hasZlibHeader = (data: Buffer): boolean =>
	data.length >= 2 &&
	(data[0] & 0x0f) === 8 &&
	((data[0] << 8) | data[1]) % 31 === 0;

export const detectCompression = (data: Buffer): NbtCompression => {
	if (hasGzipHeader(data)) return "gzip";
	// a bare document starts with 0x0a, which never passes the zlib check
	if (hasZlibHeader(data)) return "zlib";
	return "none";
};

export const decompress = (data: Buffer, compression: NbtCompression): Buffer => {
	try {
		if (compression === "gzip") return gunzipSync(data);
		if (compression === "zlib") return inflateSync(data);
		return data;
	} catch (err) {
		throw new NbtError(
			"INVALID_COMPRESSED_DATA",
			`Could not decompress ${compression} stream`,
			{},
			{ cause: err },
		);
	}
};

export const compress = (data: Buffer, compression: NbtCompression): Buffer => {
	if (compression === "gzip") return gzipSync(data);
	if (compression === "zlib") return deflateSync(data);
	return data;
};

// ─── Load ───────────────────────────────────────────────────────────────────

const toBuffer = (data: Buffer | Uint8Array): Buffer =>
	Buffer.isBuffer(data)
		? data
		: Buffer.from(data.buffer, data.byteOffset, data.byteLength);

/**
 * Decode a whole document: strip compression, sniff a vendor header, then
 * read the root compound. The result is the root itself, with the framing it
 * was found in recorded for `saveNbt`.
 */
export const loadNbt = (
	data: Buffer | Uint8Array,
	options: LoadOptions = {},
): NbtDocument => {
	const raw = toBuffer(data);
	const compression =
		!options.compression || options.compression === "auto"
			? detectCompression(raw)
			: options.compression;
	const decompressed = decompress(raw, compression);

	const detected = detectHeader(
		decompressed,
		options.headerFormats ?? DEFAULT_HEADER_FORMATS,
	);
	const endian = options.endian ?? detected?.header.format.endian ?? "big";
	const { value } = readRootTag(decompressed, detected?.size ?? 0, {
		format: endian,
		maxDepth: options.maxDepth,
	});

	const framing: DocumentFraming = {
		endian,
		compression,
		header: detected?.header ?? null,
	};
	return { ...value, framing };
};

// ─── Save ───────────────────────────────────────────────────────────────────

/**
 * Encode a root compound. Options default to the framing the document was
 * loaded with; a vendor header is rebuilt for the new payload length unless
 * `dropHeader` is set.
 */
export const saveNbt = (root: NbtRoot, options: SaveOptions = {}): Buffer => {
	const framing = root.framing;
	const endian = options.endian ?? framing?.endian ?? "big";
	const compression = options.compression ?? framing?.compression ?? "none";
	const header = options.dropHeader ? null : (framing?.header ?? null);

	const payload = writeRootTag(root, endian);
	const framed = header
		? Buffer.concat([header.format.encode(header.version, payload.length), payload])
		: payload;
	return compress(framed, compression);
};

// ─── Files ──────────────────────────────────────────────────────────────────

export const readNbtFile = async (
	path: string,
	options: LoadOptions = {},
): Promise<NbtDocument> => loadNbt(await fs.readFile(path), options);

export const writeNbtFile = async (
	path: string,
	root: NbtRoot,
	options: SaveOptions = {},
): Promise<void> => {
	await fs.writeFile(path, saveNbt(root, options));
};
