import ledgerConfig from "./ledger.config";

describe("ledgerConfig", () => {
	const saved = { ...process.env };

	beforeEach(() => {
		delete process.env.LEDGER_BASE_INTEREST_RATE;
		delete process.env.LEDGER_MIN_COLLATERAL_LOCK_TIME;
		delete process.env.PROOF_VERIFIER;
	});

	afterAll(() => {
		process.env = saved;
	});

	it("falls back to the protocol defaults", () => {
		expect(ledgerConfig()).toEqual({
			baseInterestRate: 5,
			minCollateralLockTime: 600,
			proofVerifier: "accept-all",
		});
	});

	it("reads overrides from the environment", () => {
		process.env.LEDGER_BASE_INTEREST_RATE = "12";
		process.env.LEDGER_MIN_COLLATERAL_LOCK_TIME = "0";
		process.env.PROOF_VERIFIER = "non-empty";

		expect(ledgerConfig()).toEqual({
			baseInterestRate: 12,
			minCollateralLockTime: 0,
			proofVerifier: "non-empty",
		});
	});

	it("rejects a rate that does not fit in a byte", () => {
		process.env.LEDGER_BASE_INTEREST_RATE = "256";

		expect(() => ledgerConfig()).toThrow(
			"LEDGER_BASE_INTEREST_RATE must be an integer in [0, 255], got 256",
		);
	});

	it("rejects an unknown proof verifier", () => {
		process.env.PROOF_VERIFIER = "groth16";

		expect(() => ledgerConfig()).toThrow(
			"PROOF_VERIFIER must be one of accept-all, non-empty, got groth16",
		);
	});
});
