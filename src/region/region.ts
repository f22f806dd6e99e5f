import { promises as fs } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import { basename, join } from "node:path";
import { promisify } from "node:util";
import { deflate, gunzip, gzip, inflate } from "node:zlib";
import { loadNbt, NbtError, saveNbt } from "../nbt/index.ts";
import type { NbtDocument, NbtRoot } from "../nbt/index.ts";

const deflateAsync = promisify(deflate);
const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);
const inflateAsync = promisify(inflate);

export const SECTOR_BYTES = 4096;
const SECTOR_INTS = SECTOR_BYTES / 4;
const HEADER_BYTES = SECTOR_BYTES * 2;
const CHUNK_HEADER_SIZE = 5;
const MAX_CHUNK_SECTORS = 255;

export const SCHEME_ERASED = 0;
export const SCHEME_GZIP = 1;
export const SCHEME_ZLIB = 2;
export const SCHEME_NONE = 3;

export type RegionCompression = "gzip" | "zlib" | "none";

const SCHEME_IDS: Readonly<Record<RegionCompression, number>> = {
	gzip: SCHEME_GZIP,
	zlib: SCHEME_ZLIB,
	none: SCHEME_NONE,
};

export type RegionFile = {
	readonly fileName: string;
	readonly file: FileHandle;
	readonly readOnly: boolean;
	/** Packed `sectorOffset << 8 | sectorCount` per slot, 0 when empty. */
	readonly locations: number[];
	readonly timestamps: number[];
	readonly sectorFree: boolean[];
};

export type OpenRegionOptions = {
	readonly readOnly?: boolean;
	/** Create the file when missing (ignored when read-only). Default true. */
	readonly create?: boolean;
};

export type WriteChunkOptions = {
	readonly compression?: RegionCompression;
	/** Seconds since the epoch; defaults to now. */
	readonly timestamp?: number;
};

export type ChunkCoord = {
	readonly index: number;
	/** Position inside the region, 0..31. */
	readonly x: number;
	readonly z: number;
	/** World chunk position; present when the file is named `r.<x>.<z>.mca`. */
	readonly worldX?: number;
	readonly worldZ?: number;
};

export type RegionChunkResult =
	| {
			readonly ok: true;
			readonly x: number;
			readonly z: number;
			readonly timestamp: number;
			readonly chunk: NbtDocument;
	  }
	| {
			readonly ok: false;
			readonly x: number;
			readonly z: number;
			readonly timestamp: number;
			readonly error: NbtError;
	  };

// ─── Location table ─────────────────────────────────────────────────────────

const chunkIndex = (x: number, z: number): number => {
	if (
		!Number.isInteger(x) ||
		!Number.isInteger(z) ||
		x < 0 ||
		x > 31 ||
		z < 0 ||
		z > 31
	) {
		throw new RangeError(`Chunk (${x}, ${z}) is outside a region (0..31)`);
	}
	return x + z * 32;
};

export const decodeLocation = (
	location: number,
): { readonly sectorOffset: number; readonly sectorCount: number } => ({
	sectorOffset: location >>> 8,
	sectorCount: location & 0xff,
});

const isErrno = (err: unknown, code: string): boolean =>
	err instanceof Error && "code" in err && err.code === code;

const openHandle = async (
	path: string,
	options: OpenRegionOptions,
): Promise<FileHandle> => {
	if (options.readOnly) return fs.open(path, "r");
	try {
		return await fs.open(path, "r+");
	} catch (err) {
		if (options.create === false || !isErrno(err, "ENOENT")) throw err;
		return fs.open(path, "w+");
	}
};

/** Open a region file, reading both header tables. */
export const openRegionFile = async (
	path: string,
	options: OpenRegionOptions = {},
): Promise<RegionFile> => {
	const readOnly = options.readOnly ?? false;
	const file = await openHandle(path, options);
	try {
		return await readHeader(path, file, readOnly);
	} catch (err) {
		await file.close();
		throw err;
	}
};

const readHeader = async (
	path: string,
	file: FileHandle,
	readOnly: boolean,
): Promise<RegionFile> => {
	let size = (await file.stat()).size;

	if (!readOnly) {
		if (size < HEADER_BYTES) {
			await file.write(Buffer.alloc(HEADER_BYTES - size), 0, HEADER_BYTES - size, size);
			size = HEADER_BYTES;
		}
		if (size % SECTOR_BYTES !== 0) {
			const remaining = SECTOR_BYTES - (size % SECTOR_BYTES);
			await file.write(Buffer.alloc(remaining), 0, remaining, size);
			size += remaining;
		}
	}

	const header = Buffer.alloc(HEADER_BYTES);
	await file.read(header, 0, Math.min(HEADER_BYTES, size), 0);

	const nSectors = Math.max(2, Math.ceil(size / SECTOR_BYTES));
	const sectorFree = new Array<boolean>(nSectors).fill(true);
	sectorFree[0] = false; // location table
	sectorFree[1] = false; // timestamps

	const locations: number[] = [];
	const timestamps: number[] = [];
	for (let i = 0; i < SECTOR_INTS; i++) {
		const location = header.readUInt32BE(i * 4);
		locations.push(location);
		timestamps.push(header.readUInt32BE(SECTOR_BYTES + i * 4));

		const { sectorOffset, sectorCount } = decodeLocation(location);
		if (location !== 0 && sectorOffset + sectorCount <= nSectors) {
			for (let s = 0; s < sectorCount; s++) sectorFree[sectorOffset + s] = false;
		}
	}

	return { fileName: path, file, readOnly, locations, timestamps, sectorFree };
};

/** Check if a chunk exists in the region. */
export const hasChunk = (region: RegionFile, x: number, z: number): boolean =>
	region.locations[chunkIndex(x, z)] !== 0;

/** Last-modified time of a chunk in seconds since the epoch, 0 if never written. */
export const getChunkTimestamp = (
	region: RegionFile,
	x: number,
	z: number,
): number => region.timestamps[chunkIndex(x, z)];

// ─── Reading ────────────────────────────────────────────────────────────────

const readExactly = async (
	region: RegionFile,
	length: number,
	position: number,
	x: number,
	z: number,
): Promise<Buffer> => {
	const buf = Buffer.alloc(length);
	const { bytesRead } = await region.file.read(buf, 0, length, position);
	if (bytesRead < length) {
		throw new NbtError(
			"UNEXPECTED_END_OF_INPUT",
			`Chunk (${x}, ${z}) data ends after ${bytesRead} of ${length} bytes`,
			{ offset: position + bytesRead, x, z },
		);
	}
	return buf;
};

const decompressChunk = async (
	scheme: number,
	data: Buffer,
	x: number,
	z: number,
): Promise<Buffer> => {
	if (scheme === SCHEME_NONE) return data;
	if (scheme !== SCHEME_GZIP && scheme !== SCHEME_ZLIB) {
		throw new NbtError(
			"UNSUPPORTED_COMPRESSION_SCHEME",
			`Chunk (${x}, ${z}) uses unknown compression scheme ${scheme}`,
			{ actual: String(scheme), x, z },
		);
	}
	try {
		return scheme === SCHEME_GZIP
			? await gunzipAsync(data)
			: await inflateAsync(data);
	} catch (err) {
		throw new NbtError(
			"INVALID_COMPRESSED_DATA",
			`Chunk (${x}, ${z}) could not be decompressed`,
			{ x, z },
			{ cause: err },
		);
	}
};

/** Read a chunk's tag tree from the region file. Returns null if not present. */
export const readRegionChunk = async (
	region: RegionFile,
	x: number,
	z: number,
): Promise<NbtDocument | null> => {
	const location = region.locations[chunkIndex(x, z)];
	if (location === 0) return null;

	const { sectorOffset, sectorCount } = decodeLocation(location);
	if (sectorOffset < 2 || sectorOffset + sectorCount > region.sectorFree.length) {
		throw new NbtError(
			"MALFORMED_LENGTH",
			`Chunk (${x}, ${z}) points at sectors ${sectorOffset}+${sectorCount}, outside the file`,
			{ x, z },
		);
	}

	const position = sectorOffset * SECTOR_BYTES;
	const head = await readExactly(region, CHUNK_HEADER_SIZE, position, x, z);
	const length = head.readUInt32BE(0);
	const scheme = head.readUInt8(4);

	// an erased slot still holds a location
	if (scheme === SCHEME_ERASED) return null;

	if (length < 1 || length + 4 > sectorCount * SECTOR_BYTES) {
		throw new NbtError(
			"MALFORMED_LENGTH",
			`Chunk (${x}, ${z}) declares ${length} bytes in ${sectorCount} sectors`,
			{ offset: position, x, z },
		);
	}

	const data = await readExactly(
		region,
		length - 1,
		position + CHUNK_HEADER_SIZE,
		x,
		z,
	);
	const decompressed = await decompressChunk(scheme, data, x, z);
	return loadNbt(decompressed, {
		endian: "big",
		compression: "none",
		headerFormats: [],
	});
};

/**
 * Read every occupied slot in index order. A chunk that fails to decode is
 * reported in its result instead of stopping the walk.
 */
export const readRegionChunks = async (
	region: RegionFile,
): Promise<RegionChunkResult[]> => {
	const results: RegionChunkResult[] = [];
	for (let index = 0; index < SECTOR_INTS; index++) {
		if (region.locations[index] === 0) continue;
		const x = index & 0x1f;
		const z = index >> 5;
		const timestamp = region.timestamps[index];
		try {
			const chunk = await readRegionChunk(region, x, z);
			if (chunk) results.push({ ok: true, x, z, timestamp, chunk });
		} catch (err) {
			if (!(err instanceof NbtError)) throw err;
			results.push({ ok: false, x, z, timestamp, error: err });
		}
	}
	return results;
};

/**
 * List the occupied chunk slots of a region file by reading only its location
 * table. World coordinates are filled in from the file name when it follows
 * the `r.<x>.<z>.mca` pattern.
 */
export const scanRegionFile = async (path: string): Promise<ChunkCoord[]> => {
	const region = parseRegionFileName(path);
	const file = await fs.open(path, "r");
	try {
		const table = Buffer.alloc(SECTOR_BYTES);
		const { bytesRead } = await file.read(table, 0, SECTOR_BYTES, 0);
		if (bytesRead === 0) return [];
		if (bytesRead < SECTOR_BYTES) {
			throw new NbtError(
				"UNEXPECTED_END_OF_INPUT",
				`Region location table is ${bytesRead} bytes, expected ${SECTOR_BYTES}`,
				{ offset: bytesRead },
			);
		}
		const coords: ChunkCoord[] = [];
		for (let index = 0; index < SECTOR_INTS; index++) {
			if (table.readUInt32BE(index * 4) === 0) continue;
			const x = index & 0x1f;
			const z = index >> 5;
			coords.push(
				region
					? { index, x, z, worldX: region.regionX * 32 + x, worldZ: region.regionZ * 32 + z }
					: { index, x, z },
			);
		}
		return coords;
	} finally {
		await file.close();
	}
};

// ─── Writing ────────────────────────────────────────────────────────────────

const assertWritable = (region: RegionFile): void => {
	if (region.readOnly) {
		throw new Error(`Region file ${region.fileName} was opened read-only`);
	}
};

const compressChunk = async (
	data: Buffer,
	compression: RegionCompression,
): Promise<Buffer> => {
	if (compression === "gzip") return gzipAsync(data);
	if (compression === "zlib") return deflateAsync(data);
	return data;
};

const findFreeRun = (sectorFree: readonly boolean[], needed: number): number => {
	let runStart = -1;
	let runLength = 0;
	for (let i = 0; i < sectorFree.length; i++) {
		if (!sectorFree[i]) {
			runLength = 0;
			continue;
		}
		if (runLength === 0) runStart = i;
		runLength++;
		if (runLength >= needed) return runStart;
	}
	return -1;
};

const setLocation = async (
	region: RegionFile,
	index: number,
	location: number,
): Promise<void> => {
	region.locations[index] = location;
	const buf = Buffer.alloc(4);
	buf.writeUInt32BE(location, 0);
	await region.file.write(buf, 0, 4, index * 4);
};

const setTimestamp = async (
	region: RegionFile,
	index: number,
	value: number,
): Promise<void> => {
	region.timestamps[index] = value;
	const buf = Buffer.alloc(4);
	buf.writeUInt32BE(value, 0);
	await region.file.write(buf, 0, 4, SECTOR_BYTES + index * 4);
};

const freeSectors = (region: RegionFile, location: number): void => {
	const { sectorOffset, sectorCount } = decodeLocation(location);
	for (let i = 0; i < sectorCount; i++) {
		if (sectorOffset + i < region.sectorFree.length) {
			region.sectorFree[sectorOffset + i] = true;
		}
	}
};

/** Write a chunk's tag tree to the region file. */
export const writeRegionChunk = async (
	region: RegionFile,
	x: number,
	z: number,
	root: NbtRoot,
	options: WriteChunkOptions = {},
): Promise<void> => {
	assertWritable(region);
	const index = chunkIndex(x, z);
	const compression = options.compression ?? "zlib";

	const uncompressed = saveNbt(root, {
		endian: "big",
		compression: "none",
		dropHeader: true,
	});
	const compressed = await compressChunk(uncompressed, compression);

	const length = compressed.length + 1;
	const sectorsNeeded = Math.ceil((length + 4) / SECTOR_BYTES);
	if (sectorsNeeded > MAX_CHUNK_SECTORS) {
		throw new NbtError(
			"MALFORMED_LENGTH",
			`Chunk (${x}, ${z}) needs ${sectorsNeeded} sectors, more than ${MAX_CHUNK_SECTORS}`,
			{ x, z },
		);
	}

	const previous = region.locations[index];
	const { sectorOffset: previousOffset, sectorCount: previousCount } =
		decodeLocation(previous);

	let sectorNumber: number;
	if (previous !== 0 && previousCount === sectorsNeeded) {
		sectorNumber = previousOffset;
	} else {
		if (previous !== 0) freeSectors(region, previous);
		sectorNumber = findFreeRun(region.sectorFree, sectorsNeeded);
		if (sectorNumber === -1) {
			sectorNumber = region.sectorFree.length;
			for (let i = 0; i < sectorsNeeded; i++) region.sectorFree.push(false);
		}
		for (let i = 0; i < sectorsNeeded; i++) {
			region.sectorFree[sectorNumber + i] = false;
		}
	}

	// whole sectors, so the file stays sector-aligned when it grows
	const blob = Buffer.alloc(sectorsNeeded * SECTOR_BYTES);
	blob.writeUInt32BE(length, 0);
	blob.writeUInt8(SCHEME_IDS[compression], 4);
	compressed.copy(blob, CHUNK_HEADER_SIZE);
	await region.file.write(blob, 0, blob.length, sectorNumber * SECTOR_BYTES);

	await setLocation(region, index, sectorNumber * 256 + sectorsNeeded);
	await setTimestamp(
		region,
		index,
		options.timestamp ?? Math.floor(Date.now() / 1000),
	);
};

/** Remove a chunk from the region, releasing its sectors for reuse. */
export const deleteRegionChunk = async (
	region: RegionFile,
	x: number,
	z: number,
): Promise<boolean> => {
	assertWritable(region);
	const index = chunkIndex(x, z);
	const location = region.locations[index];
	if (location === 0) return false;
	freeSectors(region, location);
	await setLocation(region, index, 0);
	await setTimestamp(region, index, 0);
	return true;
};

/** Close the region file handle. */
export const closeRegionFile = async (region: RegionFile): Promise<void> => {
	await region.file.close();
};

// ─── Region naming ──────────────────────────────────────────────────────────

/** Path of the region file holding world chunk (chunkX, chunkZ). */
export const regionFileName = (
	dir: string,
	chunkX: number,
	chunkZ: number,
): string => join(dir, `r.${chunkX >> 5}.${chunkZ >> 5}.mca`);

/** Region coordinates encoded in an `r.<x>.<z>.mca` file name, or null. */
export const parseRegionFileName = (
	path: string,
): { readonly regionX: number; readonly regionZ: number } | null => {
	const match = /^r\.(-?\d+)\.(-?\d+)\.mc[ar]$/.exec(basename(path));
	if (!match) return null;
	return { regionX: Number(match[1]), regionZ: Number(match[2]) };
};
