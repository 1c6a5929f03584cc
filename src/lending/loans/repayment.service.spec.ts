import {
	ALICE,
	DAVE,
	LENDING_MINT,
	PROOF,
	START_TIME,
	createLedgerTestingModule,
	seedLedger,
	stakeFor,
	type LedgerTestContext,
	type SeededLedger,
} from "../../../test/utils";
import { AdminService } from "../../admin/api/admin.service";
import { LedgerTokenTransfer } from "../../runtime/token-transfer.service";
import { PoolsService } from "../pools/pools.service";
import { PositionsService } from "../positions/positions.service";
import { ProtocolService } from "../protocol/protocol.service";
import { BorrowingService } from "./borrowing.service";
import { RepaymentService } from "./repayment.service";

const ONE_YEAR = 31_536_000;

describe("RepaymentService", () => {
	let ctx: LedgerTestContext;
	let ledger: SeededLedger;
	let repayment: RepaymentService;

	beforeEach(async () => {
		ctx = await createLedgerTestingModule();
		ledger = await seedLedger(ctx.moduleRef);
		repayment = ctx.moduleRef.get(RepaymentService);
		await stakeFor(ctx.moduleRef, ledger, ALICE, 1_000n);
		await ctx.moduleRef.get(BorrowingService).borrow({
			protocolId: ledger.protocolId,
			lendingPoolId: ledger.lendingPoolId,
			signer: ALICE,
			amount: 400n,
			proof: PROOF,
		});
	});

	afterEach(async () => {
		await ctx.moduleRef.close();
	});

	describe("quote", () => {
		it("charges no interest in the same second", async () => {
			expect(await repayment.quote(ledger.protocolId, ALICE)).toEqual({
				owner: ALICE,
				principal: "400",
				interest: "0",
				totalDue: "400",
				elapsedSeconds: 0,
			});
		});

		it("accrues simple interest at the base rate over a year", async () => {
			ctx.clock.advance(ONE_YEAR);

			expect(await repayment.quote(ledger.protocolId, ALICE)).toEqual({
				owner: ALICE,
				principal: "400",
				interest: "20",
				totalDue: "420",
				elapsedSeconds: ONE_YEAR,
			});
		});

		it("floors fractional interest", async () => {
			ctx.clock.advance(86_400);

			const quote = await repayment.quote(ledger.protocolId, ALICE);
			expect(quote.interest).toBe("0");
		});

		it("treats a clock behind the borrow time as no time elapsed", async () => {
			ctx.clock.set(START_TIME - 100);

			const quote = await repayment.quote(ledger.protocolId, ALICE);
			expect(quote.elapsedSeconds).toBe(0);
			expect(quote.totalDue).toBe("400");
		});
	});

	describe("repay", () => {
		beforeEach(async () => {
			ctx.clock.advance(ONE_YEAR);
			// covers the fee withheld at borrow time plus the interest
			await ctx.moduleRef.get(AdminService).mintTokens({
				owner: ALICE,
				assetMint: LENDING_MINT,
				amount: 24n,
			});
		});

		it("refuses anything short of principal plus interest", async () => {
			await expect(
				repayment.repay(ledger.protocolId, ledger.lendingPoolId, ALICE, 419n),
			).rejects.toMatchObject({ code: "RepayExceedsBorrow" });

			const quote = await repayment.quote(ledger.protocolId, ALICE);
			expect(quote.principal).toBe("400");
		});

		it("closes the position and rewards the pool", async () => {
			const receipt = await repayment.repay(
				ledger.protocolId,
				ledger.lendingPoolId,
				ALICE,
				420n,
			);

			expect(receipt).toEqual({
				protocolId: ledger.protocolId,
				lendingPoolId: ledger.lendingPoolId,
				owner: ALICE,
				amountPaid: "420",
				lenderReward: "4",
			});

			const position = await ctx.moduleRef
				.get(PositionsService)
				.getPosition(ledger.protocolId, ALICE);
			expect(position.sealedBorrowed).toBe("enc:v1:AAAAAAAAAAA=");
			expect(position.borrowTimestamp).toBe(0);
			expect(position.hasOpenPosition).toBe(false);

			const protocol = await ctx.moduleRef
				.get(ProtocolService)
				.getProtocol(ledger.protocolId);
			expect(protocol.totalLoans).toBe("0");
			expect(protocol.totalLiquidity).toBe("10020");
			expect(protocol.utilizationRate).toBe("0");

			const pool = await ctx.moduleRef
				.get(PoolsService)
				.getLendingPool(ledger.protocolId, ledger.lendingPoolId);
			expect(pool.lenderRewards).toBe("4");
			expect(pool.totalLiquidity).toBe("10020");
			expect(pool.totalLoans).toBe("0");

			const tokens = ctx.moduleRef.get(LedgerTokenTransfer);
			expect(await tokens.balanceOf(`wallet:${ALICE}:${LENDING_MINT}`)).toBe(
				0n,
			);
			expect(
				await tokens.balanceOf(`lending-pool:${ledger.lendingPoolId}`),
			).toBe(10_024n);
		});

		it("refuses to settle the position through a pool that did not lend it", async () => {
			const { externalId: otherPoolId } = await ctx.moduleRef
				.get(AdminService)
				.createLendingPool({
					protocolId: ledger.protocolId,
					poolAuthority: DAVE,
					assetMint: LENDING_MINT,
				});

			await expect(
				repayment.repay(ledger.protocolId, otherPoolId, ALICE, 420n),
			).rejects.toMatchObject({ code: "LendingPoolMismatch" });

			const pools = ctx.moduleRef.get(PoolsService);
			const lender = await pools.getLendingPool(
				ledger.protocolId,
				ledger.lendingPoolId,
			);
			const other = await pools.getLendingPool(ledger.protocolId, otherPoolId);
			const protocol = await ctx.moduleRef
				.get(ProtocolService)
				.getProtocol(ledger.protocolId);
			expect([lender.totalLoans, other.totalLoans, protocol.totalLoans]).toEqual(
				["400", "0", "400"],
			);
			expect(other.lenderRewards).toBe("0");
			expect(
				await ctx.moduleRef
					.get(LedgerTokenTransfer)
					.balanceOf(`wallet:${ALICE}:${LENDING_MINT}`),
			).toBe(420n);
		});

		it("frees the position for another pool once repaid", async () => {
			const admin = ctx.moduleRef.get(AdminService);
			const { externalId: otherPoolId } = await admin.createLendingPool({
				protocolId: ledger.protocolId,
				poolAuthority: DAVE,
				assetMint: LENDING_MINT,
			});
			await admin.mintTokens({
				owner: DAVE,
				assetMint: LENDING_MINT,
				amount: 1_000n,
			});
			await ctx.moduleRef
				.get(PoolsService)
				.supplyLiquidity(ledger.protocolId, otherPoolId, DAVE, 1_000n);
			await repayment.repay(
				ledger.protocolId,
				ledger.lendingPoolId,
				ALICE,
				420n,
			);

			const receipt = await ctx.moduleRef.get(BorrowingService).borrow({
				protocolId: ledger.protocolId,
				lendingPoolId: otherPoolId,
				signer: ALICE,
				amount: 100n,
				proof: PROOF,
			});

			expect(receipt.lendingPoolId).toBe(otherPoolId);
			const position = await ctx.moduleRef
				.get(PositionsService)
				.getPosition(ledger.protocolId, ALICE);
			expect(position.lendingPoolId).toBe(otherPoolId);
		});

		it("fails the transfer when the wallet is short and keeps the debt", async () => {
			await expect(
				repayment.repay(ledger.protocolId, ledger.lendingPoolId, ALICE, 500n),
			).rejects.toMatchObject({ code: "TransferFailed" });

			const position = await ctx.moduleRef
				.get(PositionsService)
				.getPosition(ledger.protocolId, ALICE);
			expect(position.hasOpenPosition).toBe(true);
		});
	});
});

describe("RepaymentService interest overflow", () => {
	const PRINCIPAL = 1_000_000_000_000_000n;
	let ctx: LedgerTestContext;

	beforeEach(async () => {
		ctx = await createLedgerTestingModule();
	});

	afterEach(async () => {
		await ctx.moduleRef.close();
	});

	it("fails with MathOverflow and leaves the debt in place", async () => {
		const ledger = await seedLedger(ctx.moduleRef, PRINCIPAL);
		await stakeFor(ctx.moduleRef, ledger, ALICE, PRINCIPAL);
		await ctx.moduleRef.get(BorrowingService).borrow({
			protocolId: ledger.protocolId,
			lendingPoolId: ledger.lendingPoolId,
			signer: ALICE,
			amount: PRINCIPAL,
			proof: PROOF,
		});
		// principal * 5 * one year is past u64
		ctx.clock.advance(ONE_YEAR);

		await expect(
			ctx.moduleRef
				.get(RepaymentService)
				.repay(ledger.protocolId, ledger.lendingPoolId, ALICE, PRINCIPAL),
		).rejects.toMatchObject({ code: "MathOverflow" });

		const position = await ctx.moduleRef
			.get(PositionsService)
			.getPosition(ledger.protocolId, ALICE);
		expect(position.borrowTimestamp).toBe(START_TIME);
		expect(position.lendingPoolId).toBe(ledger.lendingPoolId);
		const protocol = await ctx.moduleRef
			.get(ProtocolService)
			.getProtocol(ledger.protocolId);
		expect(protocol.totalLoans).toBe("1000000000000000");
		expect(
			await ctx.moduleRef
				.get(LedgerTokenTransfer)
				.balanceOf(`wallet:${ALICE}:${LENDING_MINT}`),
		).toBe(990_000_000_000_000n);
	});
});
