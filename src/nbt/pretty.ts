import type { NbtListElementType, NbtTag } from "./types.ts";

const TAG_NAMES: Readonly<Record<NbtListElementType, string>> = {
	end: "TAG_End",
	byte: "TAG_Byte",
	short: "TAG_Short",
	int: "TAG_Int",
	long: "TAG_Long",
	float: "TAG_Float",
	double: "TAG_Double",
	byteArray: "TAG_Byte_Array",
	string: "TAG_String",
	list: "TAG_List",
	compound: "TAG_Compound",
	intArray: "TAG_Int_Array",
	longArray: "TAG_Long_Array",
};

const count = (n: number, singular: string, plural: string): string =>
	`${n} ${n === 1 ? singular : plural}`;

const block = (
	head: string,
	children: readonly NbtTag[],
	depth: number,
	indentUnit: string,
): string[] => {
	const pad = indentUnit.repeat(depth);
	return [
		head,
		`${pad}{`,
		...children.flatMap((child) => render(child, depth + 1, indentUnit)),
		`${pad}}`,
	];
};

const render = (tag: NbtTag, depth: number, indentUnit: string): string[] => {
	const label = tag.name === undefined ? "" : `(${JSON.stringify(tag.name)})`;
	const head = `${indentUnit.repeat(depth)}${TAG_NAMES[tag.type]}${label}: `;
	switch (tag.type) {
		case "compound":
			return block(
				head + count(tag.value.size, "entry", "entries"),
				[...tag.value.values()],
				depth,
				indentUnit,
			);
		case "list":
			return block(
				`${head}${count(tag.value.length, "entry", "entries")} of ${TAG_NAMES[tag.elementType]}`,
				tag.value,
				depth,
				indentUnit,
			);
		case "byteArray":
			return [head + `[${count(tag.value.length, "byte", "bytes")}]`];
		case "intArray":
			return [head + `[${count(tag.value.length, "int", "ints")}]`];
		case "longArray":
			return [head + `[${count(tag.value.length, "long", "longs")}]`];
		case "string":
			return [head + JSON.stringify(tag.value)];
		default:
			return [head + String(tag.value)];
	}
};

/** Render a tag tree as indented text for debugging. */
export const prettyNbt = (tag: NbtTag, indentUnit = "  "): string =>
	render(tag, 0, indentUnit).join("\n");
