export {
	type ChunkCoord,
	closeRegionFile,
	decodeLocation,
	deleteRegionChunk,
	getChunkTimestamp,
	hasChunk,
	type OpenRegionOptions,
	openRegionFile,
	parseRegionFileName,
	type RegionChunkResult,
	type RegionCompression,
	type RegionFile,
	readRegionChunk,
	readRegionChunks,
	regionFileName,
	SCHEME_ERASED,
	SCHEME_GZIP,
	SCHEME_NONE,
	SCHEME_ZLIB,
	SECTOR_BYTES,
	scanRegionFile,
	type WriteChunkOptions,
	writeRegionChunk,
} from "./region.ts";
