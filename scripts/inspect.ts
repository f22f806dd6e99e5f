import { resolve } from "node:path";
import { prettyNbt, readNbtFile } from "../src/nbt/index.ts";
import {
	closeRegionFile,
	openRegionFile,
	parseRegionFileName,
	readRegionChunks,
	scanRegionFile,
} from "../src/region/index.ts";

const path = process.argv[2];
if (!path) {
	console.error("Usage: npm run inspect -- <file.nbt | r.X.Z.mca> [--full]");
	process.exit(1);
}
const full = process.argv.includes("--full");
const target = resolve(path);

const region = parseRegionFileName(target);
if (region) {
	const coords = await scanRegionFile(target);
	console.log(
		`[region] r.${region.regionX}.${region.regionZ}: ${coords.length} chunks`,
	);
	if (full) {
		const file = await openRegionFile(target, { readOnly: true });
		try {
			for (const result of await readRegionChunks(file)) {
				const at = `(${region.regionX * 32 + result.x}, ${region.regionZ * 32 + result.z})`;
				if (result.ok) console.log(`[chunk] ${at}\n${prettyNbt(result.chunk)}`);
				else console.error(`[chunk] ${at} failed:`, result.error.message);
			}
		} finally {
			await closeRegionFile(file);
		}
	} else {
		for (const { worldX, worldZ } of coords) console.log(`[chunk] (${worldX}, ${worldZ})`);
	}
} else {
	const doc = await readNbtFile(target);
	const { endian, compression, header } = doc.framing;
	console.log(
		`[nbt] ${endian}-endian, ${compression}${header ? `, ${header.format.kind} header v${header.version}` : ""}`,
	);
	console.log(prettyNbt(doc));
}
