import { nanoid } from "nanoid";

export type ProtocolId = string;

export type LedgerEventBase = {
	eventId: string;
	protocolId: ProtocolId;
	occurredAt: string; // ISO timestamp
};

export const PROTOCOL_INITIALIZED_ID = "protocol.initialized";
export type ProtocolInitialized = LedgerEventBase;

export const LIQUIDITY_SUPPLIED_ID = "liquidity.supplied";
export type LiquiditySupplied = LedgerEventBase & {
	lendingPoolId: string;
	lender: string;
	amount: string;
};

export const COLLATERAL_STAKED_ID = "collateral.staked";
export type CollateralStaked = LedgerEventBase & {
	collateralPoolId: string;
	owner: string;
};

export const COLLATERAL_REBALANCED_ID = "collateral.rebalanced";
export type CollateralRebalanced = LedgerEventBase & {
	owner: string;
};

export const LOAN_BORROWED_ID = "loan.borrowed";
export type LoanBorrowed = LedgerEventBase & {
	lendingPoolId: string;
	policy: "open" | "institutional" | "delegated";
	positionOwner: string;
	recipient: string;
	fee: string;
};

export const LOAN_REPAID_ID = "loan.repaid";
export type LoanRepaid = LedgerEventBase & {
	lendingPoolId: string;
	owner: string;
	lenderReward: string;
};

export const POSITION_LIQUIDATED_ID = "position.liquidated";
export type PositionLiquidated = LedgerEventBase & {
	collateralPoolId: string;
	borrower: string;
	liquidator: string;
};

export const PROPOSAL_CREATED_ID = "governance.proposal-created";
export type ProposalCreated = LedgerEventBase & {
	governanceId: string;
	proposer: string;
	proposalId: string;
	proposalType: number;
	newValue: string;
};

export const VOTE_CAST_ID = "governance.vote-cast";
export type VoteCast = LedgerEventBase & {
	governanceId: string;
	proposalId: string;
	voter: string;
	votes: string;
};

export const ledgerEventBase = (protocolId: ProtocolId): LedgerEventBase => ({
	eventId: nanoid(8),
	protocolId,
	occurredAt: new Date().toISOString(),
});
