import { ValueTransformer } from "typeorm";
import { EncryptedAmount } from "./encrypted-amount";

/** u64/i64 balances are stored as decimal text so SQLite never rounds them. */
export const bigintTransformer: ValueTransformer = {
	to: (value: bigint | null | undefined) =>
		value === null || value === undefined ? value : value.toString(),
	from: (value: string | null) => (value === null ? value : BigInt(value)),
};

export const encryptedAmountTransformer: ValueTransformer = {
	to: (value: EncryptedAmount | null | undefined) =>
		value === null || value === undefined ? value : value.seal(),
	from: (value: string | null) =>
		value === null ? value : EncryptedAmount.unseal(value),
};
