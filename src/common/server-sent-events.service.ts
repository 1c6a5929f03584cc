import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, type Observable, Subject } from "rxjs";
import {
	COLLATERAL_REBALANCED_ID,
	COLLATERAL_STAKED_ID,
	type CollateralRebalanced,
	type CollateralStaked,
	LIQUIDITY_SUPPLIED_ID,
	LOAN_BORROWED_ID,
	LOAN_REPAID_ID,
	type LiquiditySupplied,
	type LoanBorrowed,
	type LoanRepaid,
	POSITION_LIQUIDATED_ID,
	PROPOSAL_CREATED_ID,
	PROTOCOL_INITIALIZED_ID,
	type PositionLiquidated,
	type ProposalCreated,
	type ProtocolInitialized,
	VOTE_CAST_ID,
	type VoteCast,
} from "./ledger.event";

export type LedgerSse =
	| { type: "protocol_initialized"; protocolId: string }
	| { type: "liquidity_supplied"; protocolId: string; lendingPoolId: string }
	| { type: "position_updated"; protocolId: string; owner: string }
	| { type: "position_liquidated"; protocolId: string; owner: string }
	| { type: "governance_updated"; protocolId: string; governanceId: string };

export type SseEvent<T> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<LedgerSse>();

	ledgerEvents(protocolId?: string): Observable<LedgerSse> {
		if (protocolId) {
			return this.events$.pipe(filter((e) => e.protocolId === protocolId));
		}
		return this.events$.asObservable();
	}

	@OnEvent(PROTOCOL_INITIALIZED_ID)
	onProtocolInitialized(evt: ProtocolInitialized) {
		this.events$.next({
			type: "protocol_initialized",
			protocolId: evt.protocolId,
		});
	}

	@OnEvent(LIQUIDITY_SUPPLIED_ID)
	onLiquiditySupplied(evt: LiquiditySupplied) {
		this.events$.next({
			type: "liquidity_supplied",
			protocolId: evt.protocolId,
			lendingPoolId: evt.lendingPoolId,
		});
	}

	@OnEvent(COLLATERAL_STAKED_ID)
	onCollateralStaked(evt: CollateralStaked) {
		this.positionUpdated(evt.protocolId, evt.owner);
	}

	@OnEvent(COLLATERAL_REBALANCED_ID)
	onCollateralRebalanced(evt: CollateralRebalanced) {
		this.positionUpdated(evt.protocolId, evt.owner);
	}

	@OnEvent(LOAN_BORROWED_ID)
	onLoanBorrowed(evt: LoanBorrowed) {
		this.positionUpdated(evt.protocolId, evt.positionOwner);
	}

	@OnEvent(LOAN_REPAID_ID)
	onLoanRepaid(evt: LoanRepaid) {
		this.positionUpdated(evt.protocolId, evt.owner);
	}

	@OnEvent(POSITION_LIQUIDATED_ID)
	onPositionLiquidated(evt: PositionLiquidated) {
		this.events$.next({
			type: "position_liquidated",
			protocolId: evt.protocolId,
			owner: evt.borrower,
		});
	}

	@OnEvent(PROPOSAL_CREATED_ID)
	onProposalCreated(evt: ProposalCreated) {
		this.governanceUpdated(evt.protocolId, evt.governanceId);
	}

	@OnEvent(VOTE_CAST_ID)
	onVoteCast(evt: VoteCast) {
		this.governanceUpdated(evt.protocolId, evt.governanceId);
	}

	private positionUpdated(protocolId: string, owner: string) {
		this.events$.next({ type: "position_updated", protocolId, owner });
	}

	private governanceUpdated(protocolId: string, governanceId: string) {
		this.events$.next({ type: "governance_updated", protocolId, governanceId });
	}
}
