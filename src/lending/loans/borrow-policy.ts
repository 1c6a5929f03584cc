import { LedgerError } from "../../common/errors";
import type { InstitutionalLendingPool } from "../pools/institutional-pool.entity";
import type { DelegatedBorrower } from "../positions/delegated-borrower.entity";

/** What the caller asks for, by record id. */
export type BorrowPolicyRequest =
	| { kind: "open" }
	| { kind: "institutional"; institutionalPoolId: string }
	| { kind: "delegated"; delegatedBorrowerId: string };

/** The same request with its records loaded. */
export type BorrowPolicy =
	| { kind: "open" }
	| { kind: "institutional"; pool: InstitutionalLendingPool }
	| { kind: "delegated"; credit: DelegatedBorrower };

export type BorrowPolicyKind = BorrowPolicy["kind"];

export function authorizeBorrow(
	policy: BorrowPolicy,
	signer: string,
	amount: bigint,
): void {
	switch (policy.kind) {
		case "open":
			return;
		case "institutional":
			if (!policy.pool.whitelist.includes(signer)) {
				throw new LedgerError("UnauthorizedBorrower");
			}
			return;
		case "delegated":
			if (policy.credit.delegate !== signer) {
				throw new LedgerError("UnauthorizedBorrower");
			}
			if (amount > policy.credit.maxBorrowAmount) {
				throw new LedgerError("BorrowLimitExceeded");
			}
			return;
	}
}

/**
 * Whose collateral secures the loan and whose debt grows. A delegate borrows
 * against the delegator's position; everyone else against their own.
 */
export function positionOwner(policy: BorrowPolicy, signer: string): string {
	return policy.kind === "delegated" ? policy.credit.delegator : signer;
}
