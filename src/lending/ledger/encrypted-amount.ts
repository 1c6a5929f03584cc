import { base64 } from "@scure/base";
import { LedgerError } from "../../common/errors";
import { checkedAdd, isU64 } from "./ledger-math";

const SEALED_PREFIX = "enc:v1:";

/**
 * Placeholder for a confidential balance.
 *
 * The value is plaintext inside the ledger, but call sites only ever add,
 * subtract and compare through this type so a real confidential-arithmetic
 * backend can replace it. Outside the ledger the amount is only shown in its
 * sealed form.
 */
export class EncryptedAmount {
	private constructor(private readonly value: bigint) {}

	static zero(): EncryptedAmount {
		return new EncryptedAmount(0n);
	}

	static fromPlain(value: bigint): EncryptedAmount {
		if (!isU64(value)) {
			throw new LedgerError(
				"MathOverflow",
				`Amount ${value} is outside the u64 range`,
			);
		}
		return new EncryptedAmount(value);
	}

	static unseal(sealed: string): EncryptedAmount {
		if (!sealed.startsWith(SEALED_PREFIX)) {
			throw new Error(`Malformed sealed amount: ${sealed}`);
		}
		const bytes = base64.decode(sealed.slice(SEALED_PREFIX.length));
		if (bytes.length !== 8) {
			throw new Error(`Sealed amount must be 8 bytes, got ${bytes.length}`);
		}
		const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
		return new EncryptedAmount(view.getBigUint64(0));
	}

	/** Fails with `MathOverflow` past the u64 range. */
	add(amount: bigint): EncryptedAmount {
		return new EncryptedAmount(checkedAdd(this.value, amount));
	}

	/** Never goes below zero. */
	saturatingSub(amount: bigint): EncryptedAmount {
		return new EncryptedAmount(amount >= this.value ? 0n : this.value - amount);
	}

	covers(threshold: bigint): boolean {
		return this.value >= threshold;
	}

	isZero(): boolean {
		return this.value === 0n;
	}

	/** Floor of half the amount. */
	half(): bigint {
		return this.value / 2n;
	}

	equals(other: EncryptedAmount): boolean {
		return this.value === other.value;
	}

	seal(): string {
		const bytes = new Uint8Array(8);
		new DataView(bytes.buffer).setBigUint64(0, this.value);
		return `${SEALED_PREFIX}${base64.encode(bytes)}`;
	}

	/**
	 * Plaintext view for interest accrual. Ledger-internal: never put the result
	 * in a response.
	 */
	reveal(): bigint {
		return this.value;
	}

	toJSON(): string {
		return this.seal();
	}
}
