export {
	compress,
	DEFAULT_HEADER_FORMATS,
	decompress,
	detectCompression,
	ENTITIES_HEADER,
	LEVEL_HEADER,
	loadNbt,
	readNbtFile,
	saveNbt,
	writeNbtFile,
} from "./document.ts";
export { isNbtError, NbtError, type NbtErrorCode, type NbtErrorDetails } from "./errors.ts";
export { decodeMutf8, encodeMutf8, mutf8Length } from "./mutf8.ts";
export {
	coerceTag,
	compoundDelete,
	compoundGet,
	compoundGetAs,
	compoundHas,
	compoundSet,
	equalNbt,
	isNbtTag,
	isTagOf,
	listGet,
	listPush,
	listSet,
	nbtBool,
	nbtByte,
	nbtByteArray,
	nbtCompound,
	nbtDouble,
	nbtFloat,
	nbtInt,
	nbtIntArray,
	nbtList,
	nbtLong,
	nbtLongArray,
	nbtShort,
	nbtString,
	simplifyNbt,
} from "./nbt.ts";
export { prettyNbt } from "./pretty.ts";
export { DEFAULT_MAX_DEPTH, readRootTag, readTag } from "./read.ts";
export {
	COMPOUND_TAG_ID,
	type DocumentFraming,
	type HeaderFormat,
	type LoadOptions,
	type NbtByte,
	type NbtByteArray,
	type NbtCompound,
	type NbtCompression,
	type NbtDocument,
	type NbtDouble,
	type NbtFloat,
	type NbtFormat,
	type NbtInput,
	type NbtInt,
	type NbtIntArray,
	type NbtList,
	type NbtListElementType,
	type NbtLong,
	type NbtLongArray,
	type NbtRoot,
	type NbtShort,
	type NbtString,
	type NbtTag,
	type NbtTagOf,
	type NbtTagType,
	type NbtTagValue,
	type ReadOptions,
	type ReadResult,
	type SaveOptions,
	TAG_ID_TO_TYPE,
	TAG_TYPE_TO_ID,
	type VendorHeader,
} from "./types.ts";
export { writeRootTag, writeTag } from "./write.ts";
