import { Inject, Injectable, Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import type { EntityManager } from "typeorm";
import { LedgerError } from "../../common/errors";
import {
	LOAN_BORROWED_ID,
	type LoanBorrowed,
	ledgerEventBase,
} from "../../common/ledger.event";
import { AtomicTransaction } from "../../runtime/atomic-transaction.service";
import type { Clock } from "../../runtime/clock";
import {
	lendingEscrowAddress,
	walletAddress,
} from "../../runtime/escrow-addresses";
import type { ProofVerifier } from "../../runtime/proof-verifier";
import {
	CLOCK,
	PROOF_VERIFIER,
	TOKEN_TRANSFER,
} from "../../runtime/runtime.constants";
import type { TokenTransfer } from "../../runtime/token-transfer.service";
import { checkedAdd, checkedSub, splitBorrowFee } from "../ledger/ledger-math";
import {
	loadRecord,
	refreshUtilization,
	requireValidProof,
} from "../ledger/ledger-records";
import { InstitutionalLendingPool } from "../pools/institutional-pool.entity";
import { loadLendingPool } from "../pools/pools.service";
import { DelegatedBorrower } from "../positions/delegated-borrower.entity";
import { loadBorrowerAccount } from "../positions/positions.service";
import { loadProtocolLedger } from "../protocol/protocol.service";
import {
	type BorrowPolicy,
	type BorrowPolicyRequest,
	authorizeBorrow,
	positionOwner,
} from "./borrow-policy";
import type { BorrowReceiptDto } from "./dto/loans.dto";

export type BorrowCommand = {
	protocolId: string;
	lendingPoolId: string;
	signer: string;
	amount: bigint;
	proof: Uint8Array;
};

@Injectable()
export class BorrowingService {
	private readonly logger = new Logger(BorrowingService.name);

	constructor(
		private readonly atomic: AtomicTransaction,
		private readonly events: EventEmitter2,
		@Inject(TOKEN_TRANSFER) private readonly tokens: TokenTransfer,
		@Inject(PROOF_VERIFIER) private readonly verifier: ProofVerifier,
		@Inject(CLOCK) private readonly clock: Clock,
	) {}

	borrow(command: BorrowCommand): Promise<BorrowReceiptDto> {
		return this.executeBorrow(command, { kind: "open" });
	}

	institutionalBorrow(
		command: BorrowCommand,
		institutionalPoolId: string,
	): Promise<BorrowReceiptDto> {
		return this.executeBorrow(command, {
			kind: "institutional",
			institutionalPoolId,
		});
	}

	delegatedBorrow(
		command: BorrowCommand,
		delegatedBorrowerId: string,
	): Promise<BorrowReceiptDto> {
		return this.executeBorrow(command, {
			kind: "delegated",
			delegatedBorrowerId,
		});
	}

	/**
	 * The single borrow path shared by every policy. Checks run in a fixed
	 * order and the first failure aborts the whole operation.
	 */
	async executeBorrow(
		{ protocolId, lendingPoolId, signer, amount, proof }: BorrowCommand,
		request: BorrowPolicyRequest,
	): Promise<BorrowReceiptDto> {
		const receipt = await this.atomic.execute(
			`borrow:${request.kind}`,
			async (manager) => {
				await requireValidProof(this.verifier, proof);

				const { state, treasury } = await loadProtocolLedger(
					manager,
					protocolId,
				);
				const pool = await loadLendingPool(manager, protocolId, lendingPoolId);
				const policy = await resolvePolicy(manager, protocolId, request);
				authorizeBorrow(policy, signer, amount);

				const owner = positionOwner(policy, signer);
				const account = await loadBorrowerAccount(manager, protocolId, owner);
				if (
					account.lendingPoolId !== null &&
					account.lendingPoolId !== pool.externalId
				) {
					throw new LedgerError("LendingPoolMismatch");
				}

				// flash-loan protection
				const now = this.clock.now();
				if (
					account.borrowTimestamp !== 0 &&
					now - account.borrowTimestamp < state.minCollateralLockTime
				) {
					throw new LedgerError("CollateralLockTimeNotMet");
				}
				account.borrowTimestamp = now;

				if (!account.encryptedCollateral.covers(amount)) {
					throw new LedgerError("InsufficientCollateral");
				}

				const { fee, netAmount } = splitBorrowFee(amount);
				await this.tokens.move(
					manager,
					lendingEscrowAddress(pool.externalId),
					walletAddress(signer, pool.assetMint),
					netAmount,
				);

				treasury.totalFeesCollected = checkedAdd(
					treasury.totalFeesCollected,
					fee,
				);
				account.encryptedBorrowed = account.encryptedBorrowed.add(amount);
				account.lendingPoolId = pool.externalId;

				state.totalLoans = checkedAdd(state.totalLoans, amount);
				state.totalLiquidity = checkedSub(state.totalLiquidity, amount);
				refreshUtilization(state);

				pool.totalLoans = checkedAdd(pool.totalLoans, amount);
				pool.totalLiquidity = checkedSub(pool.totalLiquidity, amount);
				refreshUtilization(pool);

				await manager.save(state);
				await manager.save(treasury);
				await manager.save(pool);
				await manager.save(account);

				return {
					protocolId,
					lendingPoolId,
					policy: policy.kind,
					positionOwner: owner,
					recipient: signer,
					amount: amount.toString(),
					fee: fee.toString(),
					netAmount: netAmount.toString(),
					borrowTimestamp: now,
				} satisfies BorrowReceiptDto;
			},
		);
		this.logger.log(
			`${receipt.policy} borrow by ${signer} against ${receipt.positionOwner}`,
		);
		this.events.emit(LOAN_BORROWED_ID, {
			...ledgerEventBase(protocolId),
			lendingPoolId,
			policy: receipt.policy,
			positionOwner: receipt.positionOwner,
			recipient: signer,
			fee: receipt.fee,
		} satisfies LoanBorrowed);
		return receipt;
	}
}

async function resolvePolicy(
	manager: EntityManager,
	protocolId: string,
	request: BorrowPolicyRequest,
): Promise<BorrowPolicy> {
	switch (request.kind) {
		case "open":
			return { kind: "open" };
		case "institutional":
			return {
				kind: "institutional",
				pool: await loadRecord(
					manager,
					InstitutionalLendingPool,
					{ externalId: request.institutionalPoolId, protocolId },
					`Institutional pool ${request.institutionalPoolId}`,
				),
			};
		case "delegated":
			return {
				kind: "delegated",
				credit: await loadRecord(
					manager,
					DelegatedBorrower,
					{ externalId: request.delegatedBorrowerId, protocolId },
					`Credit line ${request.delegatedBorrowerId}`,
				),
			};
	}
}
