import { registerAs } from "@nestjs/config";
import {
	PROOF_VERIFIER_MODES,
	type ProofVerifierMode,
} from "../runtime/proof-verifier";

export type LedgerConfig = {
	baseInterestRate: number;
	minCollateralLockTime: number;
	proofVerifier: ProofVerifierMode;
};

function readInteger(
	name: string,
	fallback: number,
	min: number,
	max: number,
): number {
	const raw = process.env[name];
	if (raw === undefined || raw === "") {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isInteger(value) || value < min || value > max) {
		throw new Error(`${name} must be an integer in [${min}, ${max}], got ${raw}`);
	}
	return value;
}

function readProofVerifierMode(): ProofVerifierMode {
	const raw = process.env.PROOF_VERIFIER ?? "accept-all";
	const mode = PROOF_VERIFIER_MODES.find((m) => m === raw);
	if (mode === undefined) {
		throw new Error(
			`PROOF_VERIFIER must be one of ${PROOF_VERIFIER_MODES.join(", ")}, got ${raw}`,
		);
	}
	return mode;
}

export default registerAs(
	"ledger",
	(): LedgerConfig => ({
		// u8 percent
		baseInterestRate: readInteger("LEDGER_BASE_INTEREST_RATE", 5, 0, 255),
		minCollateralLockTime: readInteger(
			"LEDGER_MIN_COLLATERAL_LOCK_TIME",
			600,
			0,
			Number.MAX_SAFE_INTEGER,
		),
		proofVerifier: readProofVerifierMode(),
	}),
);
