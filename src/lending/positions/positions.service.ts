import { Inject, Injectable, Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import type { EntityManager } from "typeorm";
import {
	COLLATERAL_REBALANCED_ID,
	COLLATERAL_STAKED_ID,
	type CollateralRebalanced,
	type CollateralStaked,
	ledgerEventBase,
} from "../../common/ledger.event";
import { AtomicTransaction } from "../../runtime/atomic-transaction.service";
import {
	collateralEscrowAddress,
	walletAddress,
} from "../../runtime/escrow-addresses";
import type { ProofVerifier } from "../../runtime/proof-verifier";
import { PROOF_VERIFIER, TOKEN_TRANSFER } from "../../runtime/runtime.constants";
import type { TokenTransfer } from "../../runtime/token-transfer.service";
import { EncryptedAmount } from "../ledger/encrypted-amount";
import { checkedAdd } from "../ledger/ledger-math";
import {
	generateExternalId,
	loadRecord,
	requireValidProof,
} from "../ledger/ledger-records";
import { loadCollateralPool } from "../pools/pools.service";
import { loadProtocolLedger } from "../protocol/protocol.service";
import { BorrowerAccount } from "./borrower-account.entity";
import type { BorrowerPositionDto } from "./dto/positions.dto";

@Injectable()
export class PositionsService {
	private readonly logger = new Logger(PositionsService.name);

	constructor(
		private readonly atomic: AtomicTransaction,
		private readonly events: EventEmitter2,
		@Inject(TOKEN_TRANSFER) private readonly tokens: TokenTransfer,
		@Inject(PROOF_VERIFIER) private readonly verifier: ProofVerifier,
	) {}

	async stakeCollateral(
		protocolId: string,
		owner: string,
		collateralPoolId: string,
		amount: bigint,
		proof: Uint8Array,
	): Promise<BorrowerPositionDto> {
		const account = await this.atomic.execute(
			"stake-collateral",
			async (manager) => {
				await requireValidProof(this.verifier, proof);
				await loadProtocolLedger(manager, protocolId);
				const pool = await loadCollateralPool(
					manager,
					protocolId,
					collateralPoolId,
				);
				const account = await findOrOpenAccount(manager, protocolId, owner);

				account.encryptedCollateral = account.encryptedCollateral.add(amount);
				pool.totalCollateral = checkedAdd(pool.totalCollateral, amount);

				await this.tokens.move(
					manager,
					walletAddress(owner, pool.assetMint),
					collateralEscrowAddress(pool.externalId),
					amount,
				);

				await manager.save(pool);
				return manager.save(account);
			},
		);
		this.logger.log(`${owner} staked collateral in pool ${collateralPoolId}`);
		this.events.emit(COLLATERAL_STAKED_ID, {
			...ledgerEventBase(protocolId),
			collateralPoolId,
			owner,
		} satisfies CollateralStaked);
		return toPositionDto(account);
	}

	/**
	 * Grows the owner's recorded collateral by `delta`. No tokens move and no
	 * pool total changes.
	 */
	async rebalanceCollateral(
		protocolId: string,
		owner: string,
		delta: bigint,
		proof: Uint8Array,
	): Promise<BorrowerPositionDto> {
		const account = await this.atomic.execute(
			"rebalance-collateral",
			async (manager) => {
				await requireValidProof(this.verifier, proof);
				const account = await loadBorrowerAccount(manager, protocolId, owner);
				account.encryptedCollateral = account.encryptedCollateral.add(delta);
				return manager.save(account);
			},
		);
		this.events.emit(COLLATERAL_REBALANCED_ID, {
			...ledgerEventBase(protocolId),
			owner,
		} satisfies CollateralRebalanced);
		return toPositionDto(account);
	}

	async getPosition(
		protocolId: string,
		owner: string,
	): Promise<BorrowerPositionDto> {
		const account = await this.atomic.execute("get-position", (manager) =>
			loadBorrowerAccount(manager, protocolId, owner),
		);
		return toPositionDto(account);
	}
}

export function loadBorrowerAccount(
	manager: EntityManager,
	protocolId: string,
	owner: string,
): Promise<BorrowerAccount> {
	return loadRecord(
		manager,
		BorrowerAccount,
		{ protocolId, owner },
		`Borrower account of ${owner}`,
	);
}

async function findOrOpenAccount(
	manager: EntityManager,
	protocolId: string,
	owner: string,
): Promise<BorrowerAccount> {
	const existing = await manager.findOne(BorrowerAccount, {
		where: { protocolId, owner },
	});
	return (
		existing ??
		manager.create(BorrowerAccount, {
			externalId: generateExternalId(),
			protocolId,
			owner,
			encryptedCollateral: EncryptedAmount.zero(),
			encryptedBorrowed: EncryptedAmount.zero(),
			borrowTimestamp: 0,
			lendingPoolId: null,
		})
	);
}

export const toPositionDto = (
	account: BorrowerAccount,
): BorrowerPositionDto => ({
	protocolId: account.protocolId,
	owner: account.owner,
	sealedCollateral: account.encryptedCollateral.seal(),
	sealedBorrowed: account.encryptedBorrowed.seal(),
	borrowTimestamp: account.borrowTimestamp,
	lendingPoolId: account.lendingPoolId,
	hasOpenPosition: account.borrowTimestamp !== 0,
});
