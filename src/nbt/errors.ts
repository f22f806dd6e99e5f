export type NbtErrorCode =
	| "UNEXPECTED_END_OF_INPUT"
	| "UNKNOWN_TAG_KIND"
	| "NOT_A_COMPOUND_DOCUMENT"
	| "MALFORMED_LENGTH"
	| "INVALID_ENCODING"
	| "UNSUPPORTED_COMPRESSION_SCHEME"
	| "TYPE_MISMATCH"
	| "NESTING_TOO_DEEP"
	| "INVALID_COMPRESSED_DATA";

export type NbtErrorDetails = {
	readonly offset?: number;
	readonly expected?: string;
	readonly actual?: string;
	readonly x?: number;
	readonly z?: number;
};

/** Every failure raised while encoding, decoding or framing tag trees. */
export class NbtError extends Error {
	readonly code: NbtErrorCode;
	readonly details: NbtErrorDetails;

	constructor(
		code: NbtErrorCode,
		message: string,
		details: NbtErrorDetails = {},
		options?: { cause?: unknown },
	) {
		super(
			details.offset === undefined
				? message
				: `${message} (at byte ${details.offset})`,
			options,
		);
		this.name = "NbtError";
		this.code = code;
		this.details = details;
	}
}

export const isNbtError = (err: unknown): err is NbtError =>
	err instanceof NbtError;
