import { z } from "zod";

export type Codec<T> = {
	encode: (value: T) => Uint8Array;
	decode: (bytes: Uint8Array) => T;
};

type ZodLike<T> = { parse: (data: unknown) => T };

/**
 * Compact JSON codec: no whitespace on encode, schema validation on decode.
 * Decoding a document this codec produced and encoding it again yields the
 * same bytes.
 */
export function json_codec<T>(schema: ZodLike<T>): Codec<T> {
	return {
		encode: (value) => new TextEncoder().encode(JSON.stringify(value)),
		decode: (bytes) => schema.parse(JSON.parse(new TextDecoder().decode(bytes))),
	};
}

/** `[date, water_level]` pair as stored in the statewide document. */
export const StatewidePairSchema = z.tuple([z.string().regex(/^\d{4}-\d{2}-\d{2}$/), z.number().int()]);

export const StatewideDocumentSchema = z.object({
	observations: z.array(StatewidePairSchema),
});

export type StatewideDocument = z.infer<typeof StatewideDocumentSchema>;

export const statewide_document_codec = json_codec(StatewideDocumentSchema);
