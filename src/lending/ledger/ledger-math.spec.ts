import {
	I64_MAX,
	I64_MIN,
	U64_MAX,
	accruedInterest,
	checkedAddI64,
	checkedSub,
	elapsedSince,
	lenderReward,
	recomputeUtilization,
	splitBorrowFee,
} from "./ledger-math";

describe("ledger math", () => {
	describe("recomputeUtilization", () => {
		it("is 0 without liquidity", () => {
			expect(recomputeUtilization(0n, 0n)).toBe(0n);
			expect(recomputeUtilization(500n, 0n)).toBe(0n);
		});

		it("is 0 without loans", () => {
			expect(recomputeUtilization(0n, 9_600n)).toBe(0n);
		});

		it("is 100 when everything is lent out", () => {
			expect(recomputeUtilization(9_600n, 9_600n)).toBe(100n);
		});

		it("goes above 100 when loans exceed liquidity", () => {
			expect(recomputeUtilization(400n, 100n)).toBe(400n);
		});

		it("floors and never overflows on u64 extremes", () => {
			expect(recomputeUtilization(400n, 9_600n)).toBe(4n);
			expect(recomputeUtilization(U64_MAX, 1n)).toBe(U64_MAX * 100n);
		});
	});

	it("splits a 1% borrow fee", () => {
		expect(splitBorrowFee(400n)).toEqual({ fee: 4n, netAmount: 396n });
		expect(splitBorrowFee(99n)).toEqual({ fee: 0n, netAmount: 99n });
	});

	it("credits 1% of a repayment to lenders", () => {
		expect(lenderReward(420n)).toBe(4n);
	});

	it("clamps elapsed time to zero", () => {
		expect(elapsedSince(1_000, 0)).toBe(0);
		expect(elapsedSince(1_000, 2_000)).toBe(0);
		expect(elapsedSince(2_000, 1_000)).toBe(1_000);
	});

	it("accrues simple interest over a 365-day year", () => {
		expect(accruedInterest(400n, 5, 31_536_000)).toBe(20n);
		expect(accruedInterest(400n, 5, 15_768_000)).toBe(10n);
		expect(accruedInterest(400n, 5, 0)).toBe(0n);
	});

	it("fails on an intermediate product past u64", () => {
		expect(() => accruedInterest(U64_MAX, 5, 1)).toThrow(
			expect.objectContaining({ code: "MathOverflow" }),
		);
	});

	it("checks u64 underflow and i64 bounds", () => {
		expect(() => checkedSub(5n, 6n)).toThrow(
			expect.objectContaining({ code: "MathOverflow" }),
		);
		expect(checkedAddI64(0n, -1n)).toBe(-1n);
		expect(() => checkedAddI64(I64_MAX, 1n)).toThrow(
			expect.objectContaining({ code: "MathOverflow" }),
		);
		expect(() => checkedAddI64(I64_MIN, -1n)).toThrow(
			expect.objectContaining({ code: "MathOverflow" }),
		);
	});
});
