import { Injectable, Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import type { EntityManager } from "typeorm";
import { LedgerError } from "../../common/errors";
import {
	PROPOSAL_CREATED_ID,
	type ProposalCreated,
	VOTE_CAST_ID,
	type VoteCast,
	ledgerEventBase,
} from "../../common/ledger.event";
import { AtomicTransaction } from "../../runtime/atomic-transaction.service";
import { checkedAdd, checkedAddI64 } from "../ledger/ledger-math";
import { loadRecord } from "../ledger/ledger-records";
import { InstitutionalLendingPool } from "../pools/institutional-pool.entity";
import type { GovernanceDto } from "./dto/governance.dto";
import { Governance } from "./governance.entity";

@Injectable()
export class GovernanceService {
	private readonly logger = new Logger(GovernanceService.name);

	constructor(
		private readonly atomic: AtomicTransaction,
		private readonly events: EventEmitter2,
	) {}

	/** Replaces the live proposal; its tally starts over from zero. */
	async proposeChange(
		governanceId: string,
		proposer: string,
		proposalType: number,
		newValue: bigint,
	): Promise<GovernanceDto> {
		const governance = await this.atomic.execute(
			"propose-change",
			async (manager) => {
				const governance = await loadGovernance(manager, governanceId);
				governance.proposalId = checkedAdd(governance.proposalId, 1n);
				governance.proposalType = proposalType;
				governance.newValue = newValue;
				governance.votes = 0n;
				return manager.save(governance);
			},
		);
		this.logger.log(
			`Proposal ${governance.proposalId} opened on ${governanceId} by ${proposer}`,
		);
		this.events.emit(PROPOSAL_CREATED_ID, {
			...ledgerEventBase(governance.protocolId),
			governanceId,
			proposer,
			proposalId: governance.proposalId.toString(),
			proposalType,
			newValue: newValue.toString(),
		} satisfies ProposalCreated);
		return toGovernanceDto(governance);
	}

	/**
	 * Adds one vote for or against the live proposal. Voting rights come from
	 * the institutional pool whitelist; a voter may vote more than once.
	 */
	async vote(
		governanceId: string,
		institutionalPoolId: string,
		voter: string,
		proposalId: bigint,
		inFavor: boolean,
	): Promise<GovernanceDto> {
		const governance = await this.atomic.execute("vote", async (manager) => {
			const governance = await loadGovernance(manager, governanceId);
			const pool = await loadRecord(
				manager,
				InstitutionalLendingPool,
				{
					externalId: institutionalPoolId,
					protocolId: governance.protocolId,
				},
				`Institutional pool ${institutionalPoolId}`,
			);
			if (!pool.whitelist.includes(voter)) {
				throw new LedgerError("UnauthorizedVoter");
			}
			if (governance.proposalId !== proposalId) {
				throw new LedgerError("InvalidProposal");
			}
			governance.votes = checkedAddI64(governance.votes, inFavor ? 1n : -1n);
			return manager.save(governance);
		});
		this.events.emit(VOTE_CAST_ID, {
			...ledgerEventBase(governance.protocolId),
			governanceId,
			proposalId: proposalId.toString(),
			voter,
			votes: governance.votes.toString(),
		} satisfies VoteCast);
		return toGovernanceDto(governance);
	}

	async getGovernance(governanceId: string): Promise<GovernanceDto> {
		const governance = await this.atomic.execute("get-governance", (manager) =>
			loadGovernance(manager, governanceId),
		);
		return toGovernanceDto(governance);
	}
}

function loadGovernance(
	manager: EntityManager,
	governanceId: string,
): Promise<Governance> {
	return loadRecord(
		manager,
		Governance,
		{ externalId: governanceId },
		`Governance ${governanceId}`,
	);
}

export const toGovernanceDto = (governance: Governance): GovernanceDto => ({
	governanceId: governance.externalId,
	protocolId: governance.protocolId,
	proposalId: governance.proposalId.toString(),
	proposalType: governance.proposalType,
	newValue: governance.newValue.toString(),
	votes: governance.votes.toString(),
});
