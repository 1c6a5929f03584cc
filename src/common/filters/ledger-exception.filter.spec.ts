import { HttpStatus } from "@nestjs/common";
import { statusForLedgerError } from "./ledger-exception.filter";

describe("statusForLedgerError", () => {
	it.each([
		["UnauthorizedBorrower", HttpStatus.FORBIDDEN],
		["UnauthorizedVoter", HttpStatus.FORBIDDEN],
		["RecordNotFound", HttpStatus.NOT_FOUND],
		["InsufficientCollateral", HttpStatus.UNPROCESSABLE_ENTITY],
		["CollateralLockTimeNotMet", HttpStatus.UNPROCESSABLE_ENTITY],
		["TransferFailed", HttpStatus.UNPROCESSABLE_ENTITY],
		["LendingPoolMismatch", HttpStatus.UNPROCESSABLE_ENTITY],
	] as const)("maps %s to %i", (code, status) => {
		expect(statusForLedgerError(code)).toBe(status);
	});
});
