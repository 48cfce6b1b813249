import { describe, test, expect } from "vitest";
import { statewide_document_codec } from "../../codec";

const decode_text = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

describe("statewide document codec", () => {
	test("encodes compactly in insertion order", () => {
		const bytes = statewide_document_codec.encode({
			observations: [
				["2023-06-15", 1234567],
				["2023-06-14", 1234000],
			],
		});
		expect(decode_text(bytes)).toBe('{"observations":[["2023-06-15",1234567],["2023-06-14",1234000]]}');
	});

	test("decode then encode reproduces the same bytes", () => {
		const text = '{"observations":[["2023-01-01",1],["2023-01-02",-5]]}';
		const decoded = statewide_document_codec.decode(new TextEncoder().encode(text));
		expect(decoded.observations).toEqual([
			["2023-01-01", 1],
			["2023-01-02", -5],
		]);
		expect(decode_text(statewide_document_codec.encode(decoded))).toBe(text);
	});

	test("rejects pairs with a non-canonical date", () => {
		const bytes = new TextEncoder().encode('{"observations":[["20230101",1]]}');
		expect(() => statewide_document_codec.decode(bytes)).toThrow();
	});
});
