import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	compoundGetAs,
	equalNbt,
	NbtError,
	nbtByteArray,
	nbtCompound,
	nbtInt,
	nbtList,
	nbtString,
} from "../src/nbt/index.ts";
import {
	closeRegionFile,
	decodeLocation,
	deleteRegionChunk,
	getChunkTimestamp,
	hasChunk,
	openRegionFile,
	parseRegionFileName,
	readRegionChunk,
	readRegionChunks,
	regionFileName,
	scanRegionFile,
	SECTOR_BYTES,
	writeRegionChunk,
} from "../src/region/index.ts";

const makeTmpDir = async () => {
	const dir = join(tmpdir(), `region-test-${randomBytes(4).toString("hex")}`);
	await fs.mkdir(dir, { recursive: true });
	return dir;
};

const rejectionCode = async (promise: Promise<unknown>): Promise<string> => {
	try {
		await promise;
	} catch (err) {
		return err instanceof NbtError ? err.code : `not an NbtError: ${err}`;
	}
	return "resolved";
};

const chunkNbt = (x: number, z: number) =>
	nbtCompound({
		xPos: nbtInt(x),
		zPos: nbtInt(z),
		Status: nbtString("minecraft:full"),
		Heightmaps: nbtList("long", [1, 2, 3]),
	});

/** Overwrite bytes of a closed region file in place. */
const patchFile = async (path: string, position: number, bytes: number[]) => {
	const file = await fs.open(path, "r+");
	try {
		await file.write(Buffer.from(bytes), 0, bytes.length, position);
	} finally {
		await file.close();
	}
};

describe("region file", () => {
	let tmpDir: string;
	let path: string;

	beforeEach(async () => {
		tmpDir = await makeTmpDir();
		path = join(tmpDir, "r.0.0.mca");
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it("creates a new region file", async () => {
		const region = await openRegionFile(path);
		expect(region.locations).toHaveLength(1024);
		expect(region.timestamps).toHaveLength(1024);
		expect(hasChunk(region, 0, 0)).toBe(false);
		expect(await readRegionChunk(region, 0, 0)).toBeNull();
		await closeRegionFile(region);

		expect((await fs.stat(path)).size).toBe(2 * SECTOR_BYTES);
	});

	it("does not create a file when asked not to", async () => {
		await expect(openRegionFile(path, { create: false })).rejects.toThrow();
	});

	it("writes and reads a chunk", async () => {
		const region = await openRegionFile(path);
		const nbt = chunkNbt(0, 0);
		await writeRegionChunk(region, 0, 0, nbt);

		expect(hasChunk(region, 0, 0)).toBe(true);
		const read = await readRegionChunk(region, 0, 0);
		expect(read && equalNbt(read, nbt)).toBe(true);
		await closeRegionFile(region);
	});

	it("persists chunks and timestamps across open/close", async () => {
		const region = await openRegionFile(path);
		await writeRegionChunk(region, 5, 3, chunkNbt(5, 3), { timestamp: 1700000000 });
		await closeRegionFile(region);

		const reopened = await openRegionFile(path, { readOnly: true });
		expect(getChunkTimestamp(reopened, 5, 3)).toBe(1700000000);
		expect(getChunkTimestamp(reopened, 0, 0)).toBe(0);
		const read = await readRegionChunk(reopened, 5, 3);
		expect(read && compoundGetAs(read, "xPos", "int")?.value).toBe(5);
		await closeRegionFile(reopened);
	});

	it("stamps writes with the current time by default", async () => {
		const before = Math.floor(Date.now() / 1000);
		const region = await openRegionFile(path);
		await writeRegionChunk(region, 1, 1, chunkNbt(1, 1));
		const after = Math.floor(Date.now() / 1000);

		const stamp = getChunkTimestamp(region, 1, 1);
		expect(stamp).toBeGreaterThanOrEqual(before);
		expect(stamp).toBeLessThanOrEqual(after);
		await closeRegionFile(region);
	});

	it("reads every compression scheme", async () => {
		const region = await openRegionFile(path);
		await writeRegionChunk(region, 0, 0, chunkNbt(0, 0), { compression: "gzip" });
		await writeRegionChunk(region, 1, 0, chunkNbt(1, 0), { compression: "zlib" });
		await writeRegionChunk(region, 2, 0, chunkNbt(2, 0), { compression: "none" });

		const schemeOf = async (index: number) => {
			const { sectorOffset } = decodeLocation(region.locations[index]);
			const head = Buffer.alloc(5);
			await region.file.read(head, 0, 5, sectorOffset * SECTOR_BYTES);
			return head.readUInt8(4);
		};
		expect([await schemeOf(0), await schemeOf(1), await schemeOf(2)]).toEqual([1, 2, 3]);

		for (const x of [0, 1, 2]) {
			const read = await readRegionChunk(region, x, 0);
			expect(read && equalNbt(read, chunkNbt(x, 0))).toBe(true);
		}
		await closeRegionFile(region);
	});

	it("lists the same chunks a full load decodes", async () => {
		const region = await openRegionFile(path);
		for (const [x, z] of [
			[31, 31],
			[0, 0],
			[5, 3],
		]) {
			await writeRegionChunk(region, x, z, chunkNbt(x, z));
		}

		const scanned = await scanRegionFile(path);
		expect(scanned).toEqual([
			{ index: 0, x: 0, z: 0, worldX: 0, worldZ: 0 },
			{ index: 101, x: 5, z: 3, worldX: 5, worldZ: 3 },
			{ index: 1023, x: 31, z: 31, worldX: 31, worldZ: 31 },
		]);

		const loaded = await readRegionChunks(region);
		expect(loaded.map(({ ok, x, z }) => ({ ok, x, z }))).toEqual([
			{ ok: true, x: 0, z: 0 },
			{ ok: true, x: 5, z: 3 },
			{ ok: true, x: 31, z: 31 },
		]);
		await closeRegionFile(region);
	});

	it("isolates a chunk with an unknown compression scheme", async () => {
		const region = await openRegionFile(path);
		await writeRegionChunk(region, 0, 0, chunkNbt(0, 0));
		await writeRegionChunk(region, 1, 0, chunkNbt(1, 0));
		const { sectorOffset } = decodeLocation(region.locations[0]);
		await closeRegionFile(region);

		await patchFile(path, sectorOffset * SECTOR_BYTES + 4, [9]);

		const reopened = await openRegionFile(path);
		expect(await rejectionCode(readRegionChunk(reopened, 0, 0))).toBe(
			"UNSUPPORTED_COMPRESSION_SCHEME",
		);

		const results = await readRegionChunks(reopened);
		expect(results).toHaveLength(2);
		const [bad, good] = results;
		expect(bad.ok).toBe(false);
		if (!bad.ok) {
			expect(bad.error.code).toBe("UNSUPPORTED_COMPRESSION_SCHEME");
			expect(bad.error.details).toMatchObject({ x: 0, z: 0 });
		}
		expect(good.ok && equalNbt(good.chunk, chunkNbt(1, 0))).toBe(true);
		await closeRegionFile(reopened);
	});

	it("treats an erased slot as absent", async () => {
		const region = await openRegionFile(path);
		await writeRegionChunk(region, 0, 0, chunkNbt(0, 0));
		const { sectorOffset } = decodeLocation(region.locations[0]);
		await closeRegionFile(region);

		await patchFile(path, sectorOffset * SECTOR_BYTES + 4, [0]);

		const reopened = await openRegionFile(path);
		expect(hasChunk(reopened, 0, 0)).toBe(true);
		expect(await readRegionChunk(reopened, 0, 0)).toBeNull();
		expect(await readRegionChunks(reopened)).toEqual([]);
		await closeRegionFile(reopened);
	});

	it("reports a location that points past the end of the file", async () => {
		const header = Buffer.alloc(2 * SECTOR_BYTES);
		header.writeUInt32BE((100 << 8) | 1, 0);
		await fs.writeFile(path, header);

		const region = await openRegionFile(path, { readOnly: true });
		expect(await rejectionCode(readRegionChunk(region, 0, 0))).toBe(
			"MALFORMED_LENGTH",
		);
		await closeRegionFile(region);
	});

	it("deletes a chunk and reuses its sectors", async () => {
		const region = await openRegionFile(path);
		await writeRegionChunk(region, 0, 0, chunkNbt(0, 0));
		expect(decodeLocation(region.locations[0])).toEqual({
			sectorOffset: 2,
			sectorCount: 1,
		});

		expect(await deleteRegionChunk(region, 0, 0)).toBe(true);
		expect(hasChunk(region, 0, 0)).toBe(false);
		expect(getChunkTimestamp(region, 0, 0)).toBe(0);
		expect(await deleteRegionChunk(region, 0, 0)).toBe(false);

		await writeRegionChunk(region, 1, 0, chunkNbt(1, 0));
		expect(decodeLocation(region.locations[1]).sectorOffset).toBe(2);
		await closeRegionFile(region);
	});

	it("moves a chunk that outgrows its sectors", async () => {
		const region = await openRegionFile(path);
		await writeRegionChunk(region, 0, 0, chunkNbt(0, 0));
		await writeRegionChunk(region, 1, 0, chunkNbt(1, 0));

		const big = nbtCompound({ d: nbtByteArray(new Int8Array(5000).fill(7)) });
		await writeRegionChunk(region, 0, 0, big, { compression: "none" });

		expect(decodeLocation(region.locations[0])).toEqual({
			sectorOffset: 4,
			sectorCount: 2,
		});
		expect(decodeLocation(region.locations[1]).sectorOffset).toBe(3);
		const read = await readRegionChunk(region, 0, 0);
		expect(read && equalNbt(read, big)).toBe(true);
		await closeRegionFile(region);

		expect((await fs.stat(path)).size).toBe(6 * SECTOR_BYTES);
	});

	it("refuses to write when opened read-only", async () => {
		await closeRegionFile(await openRegionFile(path));
		const region = await openRegionFile(path, { readOnly: true });
		await expect(writeRegionChunk(region, 0, 0, chunkNbt(0, 0))).rejects.toThrow(
			"read-only",
		);
		await closeRegionFile(region);
	});

	it("closes the handle when the header cannot be read", async () => {
		const open = vi.spyOn(fs, "open");
		try {
			// a directory opens read-only but fails on read
			await expect(openRegionFile(tmpDir, { readOnly: true })).rejects.toThrow();
			expect(open).toHaveBeenCalledTimes(1);
			const handle = await open.mock.results[0].value;
			expect(handle.fd).toBe(-1);
		} finally {
			open.mockRestore();
		}
	});

	it("writes chunks larger than the encoder's first buffer", async () => {
		const region = await openRegionFile(path);
		const nbt = nbtCompound({
			Sections: nbtList(
				"compound",
				Array.from({ length: 24 }, (_, y) => ({
					Y: nbtInt(y),
					BlockStates: nbtByteArray(new Int8Array(512).fill(y)),
				})),
			),
		});
		await writeRegionChunk(region, 7, 9, nbt);
		const read = await readRegionChunk(region, 7, 9);
		expect(read && equalNbt(read, nbt)).toBe(true);
		await closeRegionFile(region);
	});

	it("rejects coordinates outside the region", async () => {
		const region = await openRegionFile(path);
		expect(() => hasChunk(region, 32, 0)).toThrow(RangeError);
		expect(() => hasChunk(region, 0, -1)).toThrow(RangeError);
		await closeRegionFile(region);
	});
});

describe("scanRegionFile", () => {
	let tmpDir: string;

	beforeEach(async () => {
		tmpDir = await makeTmpDir();
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it("returns nothing for an empty file", async () => {
		const path = join(tmpDir, "r.0.0.mca");
		await fs.writeFile(path, Buffer.alloc(0));
		expect(await scanRegionFile(path)).toEqual([]);
	});

	it("offsets chunk positions by the region named in the file", async () => {
		const path = join(tmpDir, "r.1.-2.mca");
		const region = await openRegionFile(path);
		await writeRegionChunk(region, 3, 4, chunkNbt(35, -60));
		await closeRegionFile(region);

		expect(await scanRegionFile(path)).toEqual([
			{ index: 131, x: 3, z: 4, worldX: 35, worldZ: -60 },
		]);
	});

	it("gives region-local positions only for other file names", async () => {
		const path = join(tmpDir, "chunks.bin");
		const region = await openRegionFile(path);
		await writeRegionChunk(region, 3, 4, chunkNbt(3, 4));
		await closeRegionFile(region);

		expect(await scanRegionFile(path)).toEqual([{ index: 131, x: 3, z: 4 }]);
	});

	it("reports a truncated location table", async () => {
		const path = join(tmpDir, "r.0.0.mca");
		await fs.writeFile(path, Buffer.alloc(100));
		expect(await rejectionCode(scanRegionFile(path))).toBe("UNEXPECTED_END_OF_INPUT");
	});
});

describe("region naming", () => {
	it("builds region file names from chunk coordinates", () => {
		expect(regionFileName("region", -1, 33)).toBe(join("region", "r.-1.1.mca"));
		expect(regionFileName("region", 0, 31)).toBe(join("region", "r.0.0.mca"));
	});

	it("parses region coordinates from a path", () => {
		expect(parseRegionFileName("/world/region/r.-1.1.mca")).toEqual({
			regionX: -1,
			regionZ: 1,
		});
		expect(parseRegionFileName("r.2.-3.mcr")).toEqual({ regionX: 2, regionZ: -3 });
		expect(parseRegionFileName("level.dat")).toBeNull();
	});
});
