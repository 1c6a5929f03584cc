import { Inject, Injectable, Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { LedgerError } from "../../common/errors";
import {
	POSITION_LIQUIDATED_ID,
	type PositionLiquidated,
	ledgerEventBase,
} from "../../common/ledger.event";
import { AtomicTransaction } from "../../runtime/atomic-transaction.service";
import type { ProofVerifier } from "../../runtime/proof-verifier";
import { PROOF_VERIFIER } from "../../runtime/runtime.constants";
import { checkedSub } from "../ledger/ledger-math";
import { requireValidProof } from "../ledger/ledger-records";
import { loadCollateralPool } from "../pools/pools.service";
import { loadBorrowerAccount } from "../positions/positions.service";
import type { LiquidationReceiptDto } from "./dto/liquidation.dto";

@Injectable()
export class LiquidationService {
	private readonly logger = new Logger(LiquidationService.name);

	constructor(
		private readonly atomic: AtomicTransaction,
		private readonly events: EventEmitter2,
		@Inject(PROOF_VERIFIER) private readonly verifier: ProofVerifier,
	) {}

	/**
	 * Seizes half of the borrower's collateral. The position only counts as
	 * under-collateralized once its collateral is zero, so every permitted
	 * seizure is currently of zero.
	 */
	async liquidate(
		protocolId: string,
		borrower: string,
		collateralPoolId: string,
		liquidator: string,
		proof: Uint8Array,
	): Promise<LiquidationReceiptDto> {
		const receipt = await this.atomic.execute("liquidate", async (manager) => {
			await requireValidProof(this.verifier, proof);
			const account = await loadBorrowerAccount(manager, protocolId, borrower);
			const pool = await loadCollateralPool(
				manager,
				protocolId,
				collateralPoolId,
			);

			// TODO: compare debt against collateral with a margin ratio once a price source exists
			if (!account.encryptedCollateral.isZero()) {
				throw new LedgerError("LiquidationNotAllowed");
			}

			const seized = account.encryptedCollateral.half();
			account.encryptedCollateral = account.encryptedCollateral.saturatingSub(seized);
			pool.totalCollateral = checkedSub(pool.totalCollateral, seized);

			await manager.save(account);
			await manager.save(pool);

			return {
				protocolId,
				borrower,
				collateralPoolId,
				sealedCollateral: account.encryptedCollateral.seal(),
				poolTotalCollateral: pool.totalCollateral.toString(),
			} satisfies LiquidationReceiptDto;
		});
		this.logger.log(`${liquidator} liquidated ${borrower}`);
		this.events.emit(POSITION_LIQUIDATED_ID, {
			...ledgerEventBase(protocolId),
			collateralPoolId,
			borrower,
			liquidator,
		} satisfies PositionLiquidated);
		return receipt;
	}
}
