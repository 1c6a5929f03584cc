import { BadRequestException } from "@nestjs/common";
import { base64 } from "@scure/base";
import { isU64 } from "../lending/ledger/ledger-math";

const DECIMAL = /^\d+$/;

/** Parses a decimal-string u64 from a request, rejecting anything else with a 400. */
export function parseU64(raw: string, field: string): bigint {
	if (!DECIMAL.test(raw)) {
		throw new BadRequestException(`${field} must be a decimal integer`);
	}
	const value = BigInt(raw);
	if (!isU64(value)) {
		throw new BadRequestException(`${field} is outside the u64 range`);
	}
	return value;
}

export function decodeProof(raw: string): Uint8Array {
	try {
		return base64.decode(raw);
	} catch {
		throw new BadRequestException("Invalid proof encoding");
	}
}
