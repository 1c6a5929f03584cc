import { LedgerError } from "../../common/errors";

export const U64_MAX = (1n << 64n) - 1n;
export const I64_MAX = (1n << 63n) - 1n;
export const I64_MIN = -(1n << 63n);

/** 365-day year, the annualization base for interest. */
export const SECONDS_PER_YEAR = 31_536_000n;

// 1% of the borrowed principal goes to the treasury
export const BORROW_FEE_DIVISOR = 100n;
// 1% of every repayment is credited to the lending pool's lender rewards
export const LENDER_REWARD_DIVISOR = 100n;

function overflow(): never {
	throw new LedgerError("MathOverflow");
}

export function isU64(value: bigint): boolean {
	return value >= 0n && value <= U64_MAX;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
	const sum = a + b;
	return isU64(sum) ? sum : overflow();
}

export function checkedSub(a: bigint, b: bigint): bigint {
	const difference = a - b;
	return isU64(difference) ? difference : overflow();
}

export function checkedMul(a: bigint, b: bigint): bigint {
	const product = a * b;
	return isU64(product) ? product : overflow();
}

export function checkedAddI64(a: bigint, b: bigint): bigint {
	const sum = a + b;
	return sum >= I64_MIN && sum <= I64_MAX ? sum : overflow();
}

/**
 * Percentage of liquidity currently lent out, floored.
 *
 * Not clamped: when loans exceed liquidity the rate goes above 100.
 */
export function recomputeUtilization(
	totalLoans: bigint,
	totalLiquidity: bigint,
): bigint {
	if (totalLiquidity === 0n) {
		return 0n;
	}
	return (totalLoans * 100n) / totalLiquidity;
}

export type BorrowFeeSplit = {
	fee: bigint;
	netAmount: bigint;
};

export function splitBorrowFee(amount: bigint): BorrowFeeSplit {
	const fee = amount / BORROW_FEE_DIVISOR;
	return { fee, netAmount: checkedSub(amount, fee) };
}

export function lenderReward(repaidAmount: bigint): bigint {
	return repaidAmount / LENDER_REWARD_DIVISOR;
}

/**
 * Seconds since `timestamp`, or 0 when there is no open position or the
 * timestamp lies in the future.
 */
export function elapsedSince(now: number, timestamp: number): number {
	if (timestamp === 0 || now <= timestamp) {
		return 0;
	}
	return now - timestamp;
}

/**
 * Simple, non-compounding interest:
 * `floor(principal * ratePercent * elapsed / (SECONDS_PER_YEAR * 100))`.
 * Every intermediate product must stay within u64.
 */
export function accruedInterest(
	principal: bigint,
	ratePercent: number,
	elapsedSeconds: number,
): bigint {
	const scaled = checkedMul(
		checkedMul(principal, BigInt(ratePercent)),
		BigInt(elapsedSeconds),
	);
	return scaled / (SECONDS_PER_YEAR * 100n);
}
