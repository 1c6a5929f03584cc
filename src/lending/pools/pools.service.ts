import { Inject, Injectable, Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import type { EntityManager } from "typeorm";
import {
	LIQUIDITY_SUPPLIED_ID,
	type LiquiditySupplied,
	ledgerEventBase,
} from "../../common/ledger.event";
import { AtomicTransaction } from "../../runtime/atomic-transaction.service";
import {
	lendingEscrowAddress,
	walletAddress,
} from "../../runtime/escrow-addresses";
import { TOKEN_TRANSFER } from "../../runtime/runtime.constants";
import type { TokenTransfer } from "../../runtime/token-transfer.service";
import { checkedAdd } from "../ledger/ledger-math";
import { loadRecord, refreshUtilization } from "../ledger/ledger-records";
import { loadProtocolLedger } from "../protocol/protocol.service";
import { CollateralPool } from "./collateral-pool.entity";
import type { CollateralPoolDto, LendingPoolDto } from "./dto/pools.dto";
import { LendingPool } from "./lending-pool.entity";

@Injectable()
export class PoolsService {
	private readonly logger = new Logger(PoolsService.name);

	constructor(
		private readonly atomic: AtomicTransaction,
		private readonly events: EventEmitter2,
		@Inject(TOKEN_TRANSFER) private readonly tokens: TokenTransfer,
	) {}

	/**
	 * Moves a lender's tokens into the pool escrow and grows the pool and
	 * protocol liquidity by the same amount.
	 */
	async supplyLiquidity(
		protocolId: string,
		lendingPoolId: string,
		lender: string,
		amount: bigint,
	): Promise<LendingPoolDto> {
		const pool = await this.atomic.execute(
			"supply-liquidity",
			async (manager) => {
				const { state } = await loadProtocolLedger(manager, protocolId);
				const pool = await loadLendingPool(manager, protocolId, lendingPoolId);

				await this.tokens.move(
					manager,
					walletAddress(lender, pool.assetMint),
					lendingEscrowAddress(pool.externalId),
					amount,
				);

				pool.totalLiquidity = checkedAdd(pool.totalLiquidity, amount);
				refreshUtilization(pool);
				state.totalLiquidity = checkedAdd(state.totalLiquidity, amount);
				refreshUtilization(state);

				await manager.save(state);
				return manager.save(pool);
			},
		);
		this.logger.log(`${lender} supplied ${amount} to pool ${lendingPoolId}`);
		this.events.emit(LIQUIDITY_SUPPLIED_ID, {
			...ledgerEventBase(protocolId),
			lendingPoolId,
			lender,
			amount: amount.toString(),
		} satisfies LiquiditySupplied);
		return toLendingPoolDto(pool);
	}

	async getLendingPool(
		protocolId: string,
		lendingPoolId: string,
	): Promise<LendingPoolDto> {
		const pool = await this.atomic.execute("get-lending-pool", (manager) =>
			loadLendingPool(manager, protocolId, lendingPoolId),
		);
		return toLendingPoolDto(pool);
	}

	async getCollateralPool(
		protocolId: string,
		collateralPoolId: string,
	): Promise<CollateralPoolDto> {
		const pool = await this.atomic.execute("get-collateral-pool", (manager) =>
			loadCollateralPool(manager, protocolId, collateralPoolId),
		);
		return toCollateralPoolDto(pool);
	}
}

export function loadLendingPool(
	manager: EntityManager,
	protocolId: string,
	lendingPoolId: string,
): Promise<LendingPool> {
	return loadRecord(
		manager,
		LendingPool,
		{ externalId: lendingPoolId, protocolId },
		`Lending pool ${lendingPoolId}`,
	);
}

export function loadCollateralPool(
	manager: EntityManager,
	protocolId: string,
	collateralPoolId: string,
): Promise<CollateralPool> {
	return loadRecord(
		manager,
		CollateralPool,
		{ externalId: collateralPoolId, protocolId },
		`Collateral pool ${collateralPoolId}`,
	);
}

export const toLendingPoolDto = (pool: LendingPool): LendingPoolDto => ({
	lendingPoolId: pool.externalId,
	protocolId: pool.protocolId,
	poolAuthority: pool.poolAuthority,
	assetMint: pool.assetMint,
	totalLiquidity: pool.totalLiquidity.toString(),
	totalLoans: pool.totalLoans.toString(),
	baseInterestRate: pool.baseInterestRate,
	utilizationRate: pool.utilizationRate.toString(),
	lenderRewards: pool.lenderRewards.toString(),
});

export const toCollateralPoolDto = (pool: CollateralPool): CollateralPoolDto => ({
	collateralPoolId: pool.externalId,
	protocolId: pool.protocolId,
	assetMint: pool.assetMint,
	totalCollateral: pool.totalCollateral.toString(),
});
