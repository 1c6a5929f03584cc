export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}

export const LEDGER_ERROR_CODES = [
	"InvalidProof",
	"MathOverflow",
	"InsufficientCollateral",
	"InsufficientLiquidity",
	"RepayExceedsBorrow",
	"LiquidationNotAllowed",
	"UnauthorizedVoter",
	"InvalidProposal",
	"CollateralSufficient",
	"CollateralLockTimeNotMet",
	"UnauthorizedBorrower",
	"BorrowLimitExceeded",
	"LendingPoolMismatch",

	// raised by the runtime collaborators rather than the ledger rules
	"RecordNotFound",
	"TransferFailed",
] as const;
export type LedgerErrorCode = (typeof LEDGER_ERROR_CODES)[number];

const LEDGER_ERROR_MESSAGES: Record<LedgerErrorCode, string> = {
	InvalidProof: "Invalid zero-knowledge proof provided",
	MathOverflow: "Mathematical operation overflow",
	InsufficientCollateral: "Insufficient collateral provided",
	InsufficientLiquidity: "Not enough liquidity in the pool",
	RepayExceedsBorrow: "Repayment does not cover the borrowed amount plus interest",
	LiquidationNotAllowed: "Liquidation conditions are not met",
	UnauthorizedVoter: "Unauthorized voter",
	InvalidProposal: "Invalid proposal",
	CollateralSufficient: "Collateral still sufficient, liquidation not allowed",
	CollateralLockTimeNotMet:
		"Collateral lock time has not been met for flash loan protection",
	UnauthorizedBorrower: "Unauthorized borrower",
	BorrowLimitExceeded: "Borrow amount exceeds delegated credit limit",
	LendingPoolMismatch: "Open position belongs to another lending pool",
	RecordNotFound: "Ledger record not found",
	TransferFailed: "Token transfer failed",
};

/**
 * A named ledger failure. Throwing one inside an atomic transaction aborts it
 * and rolls back every write the operation made.
 */
export class LedgerError extends Error {
	constructor(
		readonly code: LedgerErrorCode,
		message?: string,
		options?: ErrorOptions,
	) {
		super(message ?? LEDGER_ERROR_MESSAGES[code], options);
		this.name = "LedgerError";
	}
}

export function isLedgerError(
	err: unknown,
	code?: LedgerErrorCode,
): err is LedgerError {
	return err instanceof LedgerError && (code === undefined || err.code === code);
}
