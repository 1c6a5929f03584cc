import { BadRequestException } from "@nestjs/common";
import { decodeProof, parseU64 } from "./amounts";

describe("parseU64", () => {
	it("parses decimal strings across the whole range", () => {
		expect(parseU64("0", "amount")).toBe(0n);
		expect(parseU64("18446744073709551615", "amount")).toBe(
			18_446_744_073_709_551_615n,
		);
	});

	it("rejects values past u64", () => {
		expect(() => parseU64("18446744073709551616", "amount")).toThrow(
			"amount is outside the u64 range",
		);
	});

	it.each(["-1", "1.5", "1e3", " 7", ""])("rejects %p", (raw) => {
		expect(() => parseU64(raw, "amount")).toThrow(BadRequestException);
	});
});

describe("decodeProof", () => {
	it("decodes base64 proof bytes", () => {
		expect(Array.from(decodeProof("cHJvb2Y="))).toEqual([
			0x70, 0x72, 0x6f, 0x6f, 0x66,
		]);
	});

	it("turns malformed input into a 400", () => {
		expect(() => decodeProof("not base64!")).toThrow("Invalid proof encoding");
	});
});
