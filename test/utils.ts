import type { INestApplication } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { EventEmitterModule } from "@nestjs/event-emitter";
import { Test, type TestingModule } from "@nestjs/testing";
import { TypeOrmModule } from "@nestjs/typeorm";
import request from "supertest";
import { AdminModule } from "../src/admin/api/admin.module";
import { AdminService } from "../src/admin/api/admin.service";
import { LendingModule } from "../src/lending/lending.module";
import { PoolsService } from "../src/lending/pools/pools.service";
import { PositionsService } from "../src/lending/positions/positions.service";
import { ProtocolService } from "../src/lending/protocol/protocol.service";
import { ManualClock } from "../src/runtime/clock";
import type { ProofVerifier } from "../src/runtime/proof-verifier";
import { CLOCK, PROOF_VERIFIER } from "../src/runtime/runtime.constants";

// placeholder x-only keys
export const ALICE = "a".repeat(64);
export const BOB = "b".repeat(64);
export const CAROL = "c".repeat(64);
export const DAVE = "d".repeat(64);

export const LENDING_MINT = "usdc";
export const COLLATERAL_MINT = "sol";

export const PROOF = new Uint8Array([1, 2, 3]);
// base64 of "proof"
export const PROOF_B64 = "cHJvb2Y=";

export const START_TIME = 1_700_000_000;

export const ADMIN_USER = "test-admin";
export const ADMIN_PASS = "test-secret";

export type LedgerTestContext = {
	moduleRef: TestingModule;
	clock: ManualClock;
};

/**
 * Lending and admin modules on a fresh in-memory database, with a clock the
 * test moves by hand.
 */
export async function createLedgerTestingModule(
	options: { proofVerifier?: ProofVerifier } = {},
): Promise<LedgerTestContext> {
	const clock = new ManualClock(START_TIME);
	let builder = Test.createTestingModule({
		imports: [
			ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
			EventEmitterModule.forRoot(),
			TypeOrmModule.forRoot({
				type: "better-sqlite3",
				database: ":memory:",
				synchronize: true,
				autoLoadEntities: true,
			}),
			LendingModule,
			AdminModule,
		],
	})
		.overrideProvider(CLOCK)
		.useValue(clock);
	if (options.proofVerifier) {
		builder = builder
			.overrideProvider(PROOF_VERIFIER)
			.useValue(options.proofVerifier);
	}
	const moduleRef = await builder.compile();
	await moduleRef.init();
	return { moduleRef, clock };
}

export type SeededLedger = {
	protocolId: string;
	lendingPoolId: string;
	collateralPoolId: string;
};

/**
 * A protocol with one lending pool holding `liquidity` supplied by DAVE, and
 * one collateral pool.
 */
export async function seedLedger(
	moduleRef: TestingModule,
	liquidity = 10_000n,
): Promise<SeededLedger> {
	const admin = moduleRef.get(AdminService);
	const { protocolId } = await moduleRef.get(ProtocolService).initialize();
	const { externalId: lendingPoolId } = await admin.createLendingPool({
		protocolId,
		poolAuthority: DAVE,
		assetMint: LENDING_MINT,
	});
	const { externalId: collateralPoolId } = await admin.createCollateralPool({
		protocolId,
		assetMint: COLLATERAL_MINT,
	});
	if (liquidity > 0n) {
		await admin.mintTokens({
			owner: DAVE,
			assetMint: LENDING_MINT,
			amount: liquidity,
		});
		await moduleRef
			.get(PoolsService)
			.supplyLiquidity(protocolId, lendingPoolId, DAVE, liquidity);
	}
	return { protocolId, lendingPoolId, collateralPoolId };
}

/** Mints collateral tokens for `owner` and stakes all of them. */
export async function stakeFor(
	moduleRef: TestingModule,
	ledger: SeededLedger,
	owner: string,
	amount: bigint,
): Promise<void> {
	await moduleRef.get(AdminService).mintTokens({
		owner,
		assetMint: COLLATERAL_MINT,
		amount,
	});
	await moduleRef
		.get(PositionsService)
		.stakeCollateral(
			ledger.protocolId,
			owner,
			ledger.collateralPoolId,
			amount,
			PROOF,
		);
}

export const adminAuthHeader = () =>
	`Basic ${Buffer.from(`${ADMIN_USER}:${ADMIN_PASS}`).toString("base64")}`;

export function adminPost(
	app: INestApplication,
	path: string,
	body: Record<string, unknown>,
) {
	return request(app.getHttpServer())
		.post(`/api/admin/v1/${path}`)
		.set("Authorization", adminAuthHeader())
		.send(body);
}
