import {
	ALICE,
	BOB,
	PROOF,
	createLedgerTestingModule,
	seedLedger,
	stakeFor,
	type LedgerTestContext,
	type SeededLedger,
} from "../../../test/utils";
import { NonEmptyProofVerifier } from "../../runtime/proof-verifier";
import { PoolsService } from "../pools/pools.service";
import { PositionsService } from "../positions/positions.service";
import { LiquidationService } from "./liquidation.service";

describe("LiquidationService", () => {
	let ctx: LedgerTestContext;
	let ledger: SeededLedger;
	let liquidation: LiquidationService;

	beforeEach(async () => {
		ctx = await createLedgerTestingModule();
		ledger = await seedLedger(ctx.moduleRef, 0n);
		liquidation = ctx.moduleRef.get(LiquidationService);
	});

	afterEach(async () => {
		await ctx.moduleRef.close();
	});

	it("refuses to liquidate a position that still holds collateral", async () => {
		await stakeFor(ctx.moduleRef, ledger, ALICE, 1_000n);

		await expect(
			liquidation.liquidate(
				ledger.protocolId,
				ALICE,
				ledger.collateralPoolId,
				BOB,
				PROOF,
			),
		).rejects.toMatchObject({ code: "LiquidationNotAllowed" });

		const position = await ctx.moduleRef
			.get(PositionsService)
			.getPosition(ledger.protocolId, ALICE);
		expect(position.sealedCollateral).toBe("enc:v1:AAAAAAAAA+g=");
	});

	it("lets an empty position through and seizes nothing", async () => {
		await stakeFor(ctx.moduleRef, ledger, ALICE, 0n);

		const receipt = await liquidation.liquidate(
			ledger.protocolId,
			ALICE,
			ledger.collateralPoolId,
			BOB,
			PROOF,
		);

		expect(receipt).toEqual({
			protocolId: ledger.protocolId,
			borrower: ALICE,
			collateralPoolId: ledger.collateralPoolId,
			sealedCollateral: "enc:v1:AAAAAAAAAAA=",
			poolTotalCollateral: "0",
		});
		const pool = await ctx.moduleRef
			.get(PoolsService)
			.getCollateralPool(ledger.protocolId, ledger.collateralPoolId);
		expect(pool.totalCollateral).toBe("0");
	});

	it("requires the borrower to have an account", async () => {
		await expect(
			liquidation.liquidate(
				ledger.protocolId,
				ALICE,
				ledger.collateralPoolId,
				BOB,
				PROOF,
			),
		).rejects.toMatchObject({
			code: "RecordNotFound",
			message: `Borrower account of ${ALICE} not found`,
		});
	});

	it("checks the proof before anything else", async () => {
		await ctx.moduleRef.close();
		ctx = await createLedgerTestingModule({
			proofVerifier: new NonEmptyProofVerifier(),
		});
		liquidation = ctx.moduleRef.get(LiquidationService);

		await expect(
			liquidation.liquidate(
				"missing",
				ALICE,
				"missing",
				BOB,
				new Uint8Array(),
			),
		).rejects.toMatchObject({ code: "InvalidProof" });
	});
});
