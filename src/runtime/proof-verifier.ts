import { Logger } from "@nestjs/common";

/**
 * Checks a confidential-value proof. The ledger only ever asks whether a proof
 * is valid; it never builds one.
 */
export interface ProofVerifier {
	verify(proof: Uint8Array): Promise<boolean>;
}

export const PROOF_VERIFIER_MODES = ["accept-all", "non-empty"] as const;
export type ProofVerifierMode = (typeof PROOF_VERIFIER_MODES)[number];

export class AcceptAllProofVerifier implements ProofVerifier {
	async verify(_proof: Uint8Array): Promise<boolean> {
		return true;
	}
}

export class NonEmptyProofVerifier implements ProofVerifier {
	async verify(proof: Uint8Array): Promise<boolean> {
		return proof.length > 0;
	}
}

export function createProofVerifier(mode: ProofVerifierMode): ProofVerifier {
	switch (mode) {
		case "accept-all":
			Logger.warn(
				"Proof verification is disabled, every proof is accepted",
				"ProofVerifier",
			);
			return new AcceptAllProofVerifier();
		case "non-empty":
			return new NonEmptyProofVerifier();
	}
}
