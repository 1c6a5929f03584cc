import { Inject, Injectable, Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { LedgerError } from "../../common/errors";
import {
	LOAN_REPAID_ID,
	type LoanRepaid,
	ledgerEventBase,
} from "../../common/ledger.event";
import { AtomicTransaction } from "../../runtime/atomic-transaction.service";
import type { Clock } from "../../runtime/clock";
import {
	lendingEscrowAddress,
	walletAddress,
} from "../../runtime/escrow-addresses";
import { CLOCK, TOKEN_TRANSFER } from "../../runtime/runtime.constants";
import type { TokenTransfer } from "../../runtime/token-transfer.service";
import { EncryptedAmount } from "../ledger/encrypted-amount";
import {
	accruedInterest,
	checkedAdd,
	checkedSub,
	elapsedSince,
	lenderReward,
} from "../ledger/ledger-math";
import { refreshUtilization } from "../ledger/ledger-records";
import { loadLendingPool } from "../pools/pools.service";
import type { BorrowerAccount } from "../positions/borrower-account.entity";
import { loadBorrowerAccount } from "../positions/positions.service";
import type { ProtocolState } from "../protocol/protocol-state.entity";
import { loadProtocolLedger } from "../protocol/protocol.service";
import type { RepaymentQuoteDto, RepayReceiptDto } from "./dto/loans.dto";

export type AmountDue = {
	principal: bigint;
	interest: bigint;
	totalDue: bigint;
	elapsedSeconds: number;
};

export function amountDue(
	account: BorrowerAccount,
	state: ProtocolState,
	now: number,
): AmountDue {
	const elapsedSeconds = elapsedSince(now, account.borrowTimestamp);
	const principal = account.encryptedBorrowed.reveal();
	const interest = accruedInterest(
		principal,
		state.baseInterestRate,
		elapsedSeconds,
	);
	return {
		principal,
		interest,
		totalDue: checkedAdd(principal, interest),
		elapsedSeconds,
	};
}

@Injectable()
export class RepaymentService {
	private readonly logger = new Logger(RepaymentService.name);

	constructor(
		private readonly atomic: AtomicTransaction,
		private readonly events: EventEmitter2,
		@Inject(TOKEN_TRANSFER) private readonly tokens: TokenTransfer,
		@Inject(CLOCK) private readonly clock: Clock,
	) {}

	/**
	 * Closes the owner's whole position through the pool that lent it. Anything
	 * short of principal plus accrued interest is refused; anything above it is
	 * kept by the pool.
	 */
	async repay(
		protocolId: string,
		lendingPoolId: string,
		owner: string,
		amount: bigint,
	): Promise<RepayReceiptDto> {
		const receipt = await this.atomic.execute("repay", async (manager) => {
			const { state } = await loadProtocolLedger(manager, protocolId);
			const pool = await loadLendingPool(manager, protocolId, lendingPoolId);
			const account = await loadBorrowerAccount(manager, protocolId, owner);
			if (
				account.lendingPoolId !== null &&
				account.lendingPoolId !== pool.externalId
			) {
				throw new LedgerError("LendingPoolMismatch");
			}

			const { principal, totalDue } = amountDue(
				account,
				state,
				this.clock.now(),
			);
			if (amount < totalDue) {
				throw new LedgerError("RepayExceedsBorrow");
			}

			await this.tokens.move(
				manager,
				walletAddress(owner, pool.assetMint),
				lendingEscrowAddress(pool.externalId),
				amount,
			);

			const reward = lenderReward(amount);
			pool.lenderRewards = checkedAdd(pool.lenderRewards, reward);

			account.encryptedBorrowed = EncryptedAmount.zero();
			account.borrowTimestamp = 0;
			account.lendingPoolId = null;

			state.totalLoans = checkedSub(state.totalLoans, principal);
			state.totalLiquidity = checkedAdd(state.totalLiquidity, amount);
			refreshUtilization(state);

			pool.totalLoans = checkedSub(pool.totalLoans, principal);
			pool.totalLiquidity = checkedAdd(pool.totalLiquidity, amount);
			refreshUtilization(pool);

			await manager.save(state);
			await manager.save(pool);
			await manager.save(account);

			return {
				protocolId,
				lendingPoolId,
				owner,
				amountPaid: amount.toString(),
				lenderReward: reward.toString(),
			} satisfies RepayReceiptDto;
		});
		this.logger.log(`${owner} repaid through pool ${lendingPoolId}`);
		this.events.emit(LOAN_REPAID_ID, {
			...ledgerEventBase(protocolId),
			lendingPoolId,
			owner,
			lenderReward: receipt.lenderReward,
		} satisfies LoanRepaid);
		return receipt;
	}

	async quote(protocolId: string, owner: string): Promise<RepaymentQuoteDto> {
		const due = await this.atomic.execute("repayment-quote", async (manager) => {
			const { state } = await loadProtocolLedger(manager, protocolId);
			const account = await loadBorrowerAccount(manager, protocolId, owner);
			return amountDue(account, state, this.clock.now());
		});
		return {
			owner,
			principal: due.principal.toString(),
			interest: due.interest.toString(),
			totalDue: due.totalDue.toString(),
			elapsedSeconds: due.elapsedSeconds,
		};
	}
}
