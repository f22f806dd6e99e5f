import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gunzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { HeaderFormat } from "../src/nbt/index.ts";
import {
	compoundGetAs,
	compoundSet,
	detectCompression,
	equalNbt,
	loadNbt,
	NbtError,
	nbtCompound,
	nbtInt,
	nbtList,
	nbtString,
	readNbtFile,
	saveNbt,
	writeNbtFile,
	writeRootTag,
} from "../src/nbt/index.ts";

const errorCode = (fn: () => unknown): string => {
	try {
		fn();
	} catch (err) {
		return err instanceof NbtError ? err.code : `not an NbtError: ${err}`;
	}
	return "no error";
};

const sample = () =>
	nbtCompound(
		{
			LevelName: nbtString("Test World"),
			SpawnX: nbtInt(128),
			Tags: nbtList("string", ["a", "b"]),
		},
		"",
	);

const levelHeader = (version: number, payload: Buffer): Buffer => {
	const header = Buffer.alloc(8);
	header.writeUInt32LE(version, 0);
	header.writeUInt32LE(payload.length, 4);
	return Buffer.concat([header, payload]);
};

const entitiesHeader = (version: number, payload: Buffer): Buffer => {
	const header = Buffer.alloc(12);
	header.write("ENT\0", 0, "latin1");
	header.writeUInt32LE(version, 4);
	header.writeUInt32LE(payload.length, 8);
	return Buffer.concat([header, payload]);
};

describe("compression", () => {
	it("detects gzip, zlib and plain data", () => {
		const raw = saveNbt(sample());
		expect(detectCompression(raw)).toBe("none");
		expect(detectCompression(saveNbt(sample(), { compression: "gzip" }))).toBe("gzip");
		expect(detectCompression(saveNbt(sample(), { compression: "zlib" }))).toBe("zlib");
	});

	it("loads gzip documents and saves them gzipped again", () => {
		const gzipped = saveNbt(sample(), { compression: "gzip" });
		expect([gzipped[0], gzipped[1]]).toEqual([0x1f, 0x8b]);

		const doc = loadNbt(gzipped);
		expect(doc.framing.compression).toBe("gzip");
		expect(equalNbt(doc, sample())).toBe(true);
		expect(gunzipSync(saveNbt(doc))).toEqual(saveNbt(sample()));
	});

	it("loads zlib documents", () => {
		const doc = loadNbt(saveNbt(sample(), { compression: "zlib" }));
		expect(doc.framing.compression).toBe("zlib");
		expect(equalNbt(doc, sample())).toBe(true);
	});

	it("honours an explicit compression option", () => {
		const doc = loadNbt(saveNbt(sample()), { compression: "none" });
		expect(doc.framing).toEqual({ endian: "big", compression: "none", header: null });
	});

	it("reports corrupt compressed data", () => {
		expect(
			errorCode(() => loadNbt(Buffer.from([1, 2, 3]), { compression: "gzip" })),
		).toBe("INVALID_COMPRESSED_DATA");
		expect(errorCode(() => loadNbt(Buffer.from([0x1f, 0x8b, 0x00])))).toBe(
			"INVALID_COMPRESSED_DATA",
		);
	});
});

describe("vendor headers", () => {
	it("reads a level header and writes it back unchanged", () => {
		const data = levelHeader(8, writeRootTag(sample(), "little"));
		const doc = loadNbt(data);

		expect(doc.framing.endian).toBe("little");
		expect(doc.framing.header?.format.kind).toBe("level");
		expect(doc.framing.header?.version).toBe(8);
		expect(equalNbt(doc, sample())).toBe(true);
		expect(saveNbt(doc)).toEqual(data);
	});

	it("reads an entities header", () => {
		const data = entitiesHeader(1, writeRootTag(sample(), "little"));
		const doc = loadNbt(data);

		expect(doc.framing.header?.format.kind).toBe("entities");
		expect(doc.framing.header?.version).toBe(1);
		expect(equalNbt(doc, sample())).toBe(true);
		expect(saveNbt(doc)).toEqual(data);
	});

	it("recomputes the declared length after an edit", () => {
		const doc = loadNbt(levelHeader(9, writeRootTag(sample(), "little")));
		compoundSet(doc, "SpawnZ", nbtInt(-64));

		const out = saveNbt(doc);
		expect(out.readUInt32LE(0)).toBe(9);
		expect(out.readUInt32LE(4)).toBe(out.length - 8);
		expect(compoundGetAs(loadNbt(out), "SpawnZ", "int")?.value).toBe(-64);
	});

	it("drops the header on request", () => {
		const doc = loadNbt(levelHeader(8, writeRootTag(sample(), "little")));
		expect(saveNbt(doc, { dropHeader: true })).toEqual(
			writeRootTag(sample(), "little"),
		);
	});

	it("does not mistake a bare empty document for a header", () => {
		const doc = loadNbt(Buffer.from([0x0a, 0x00, 0x00, 0x00]));
		expect(doc.framing.header).toBeNull();
		expect(doc.value.size).toBe(0);
	});

	it("skips sniffing when no header formats are given", () => {
		const data = levelHeader(8, writeRootTag(sample(), "little"));
		expect(errorCode(() => loadNbt(data, { headerFormats: [] }))).toBe(
			"NOT_A_COMPOUND_DOCUMENT",
		);
	});

	it("accepts custom header formats", () => {
		const magic = Buffer.from("TEST", "latin1");
		const custom: HeaderFormat = {
			kind: "test",
			endian: "big",
			detect: (data) =>
				data.subarray(0, 4).equals(magic) ? { version: 0, size: 4 } : null,
			encode: () => magic,
		};
		const data = Buffer.concat([magic, writeRootTag(sample())]);
		const doc = loadNbt(data, { headerFormats: [custom] });

		expect(doc.framing.header?.format).toBe(custom);
		expect(saveNbt(doc)).toEqual(data);
	});
});

describe("files", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "nbt-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("writes and reads a gzipped file", async () => {
		const path = join(dir, "level.dat");
		await writeNbtFile(path, sample(), { compression: "gzip" });

		const raw = await readFile(path);
		expect([raw[0], raw[1]]).toEqual([0x1f, 0x8b]);

		const doc = await readNbtFile(path);
		expect(doc.framing.compression).toBe("gzip");
		expect(equalNbt(doc, sample())).toBe(true);
	});
});
