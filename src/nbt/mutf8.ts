import { NbtError } from "./errors.ts";

// Modified UTF-8: every UTF-16 code unit is encoded on its own (so characters
// outside the BMP become two 3-byte surrogate sequences) and U+0000 takes the
// two-byte form C0 80.

/** Number of bytes `text` occupies once encoded. */
export const mutf8Length = (text: string): number => {
	let length = 0;
	for (let i = 0; i < text.length; i++) {
		const unit = text.charCodeAt(i);
		if (unit >= 0x01 && unit <= 0x7f) length += 1;
		else if (unit <= 0x7ff) length += 2;
		else length += 3;
	}
	return length;
};

export const encodeMutf8 = (text: string): Buffer => {
	const out = Buffer.alloc(mutf8Length(text));
	let pos = 0;
	for (let i = 0; i < text.length; i++) {
		const unit = text.charCodeAt(i);
		if (unit >= 0x01 && unit <= 0x7f) {
			out[pos++] = unit;
		} else if (unit <= 0x7ff) {
			out[pos++] = 0xc0 | (unit >> 6);
			out[pos++] = 0x80 | (unit & 0x3f);
		} else {
			out[pos++] = 0xe0 | (unit >> 12);
			out[pos++] = 0x80 | ((unit >> 6) & 0x3f);
			out[pos++] = 0x80 | (unit & 0x3f);
		}
	}
	return out;
};

const continuation = (
	bytes: Uint8Array,
	index: number,
	baseOffset: number,
): number => {
	if (index >= bytes.length) {
		throw new NbtError(
			"INVALID_ENCODING",
			"Truncated modified UTF-8 sequence",
			{ offset: baseOffset + index },
		);
	}
	const byte = bytes[index];
	if ((byte & 0xc0) !== 0x80) {
		throw new NbtError(
			"INVALID_ENCODING",
			`Expected continuation byte, got 0x${byte.toString(16)}`,
			{ offset: baseOffset + index },
		);
	}
	return byte & 0x3f;
};

/**
 * Decode a modified UTF-8 byte sequence. `baseOffset` only feeds error
 * details, so failures point at the byte in the enclosing document.
 */
export const decodeMutf8 = (bytes: Uint8Array, baseOffset = 0): string => {
	const units: number[] = [];
	let i = 0;
	while (i < bytes.length) {
		const lead = bytes[i];
		if (lead < 0x80) {
			units.push(lead);
			i += 1;
		} else if ((lead & 0xe0) === 0xc0) {
			units.push(((lead & 0x1f) << 6) | continuation(bytes, i + 1, baseOffset));
			i += 2;
		} else if ((lead & 0xf0) === 0xe0) {
			units.push(
				((lead & 0x0f) << 12) |
					(continuation(bytes, i + 1, baseOffset) << 6) |
					continuation(bytes, i + 2, baseOffset),
			);
			i += 3;
		} else {
			throw new NbtError(
				"INVALID_ENCODING",
				`Invalid modified UTF-8 lead byte 0x${lead.toString(16)}`,
				{ offset: baseOffset + i },
			);
		}
	}

	let text = "";
	for (let start = 0; start < units.length; start += 8192) {
		text += String.fromCharCode(...units.slice(start, start + 8192));
	}
	return text;
};
