import { Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { type EntityManager, Not, type Repository } from "typeorm";
import { Governance } from "../../lending/governance/governance.entity";
import {
	generateExternalId,
	loadRecord,
} from "../../lending/ledger/ledger-records";
import { CollateralPool } from "../../lending/pools/collateral-pool.entity";
import { InstitutionalLendingPool } from "../../lending/pools/institutional-pool.entity";
import { LendingPool } from "../../lending/pools/lending-pool.entity";
import { BorrowerAccount } from "../../lending/positions/borrower-account.entity";
import { BorrowerReputation } from "../../lending/positions/borrower-reputation.entity";
import { DelegatedBorrower } from "../../lending/positions/delegated-borrower.entity";
import { ProtocolState } from "../../lending/protocol/protocol-state.entity";
import { AtomicTransaction } from "../../runtime/atomic-transaction.service";
import { walletAddress } from "../../runtime/escrow-addresses";
import { LedgerTokenTransfer } from "../../runtime/token-transfer.service";
import type GetAdminStatsDto from "./get-admin-stats";
import type {
	CreatedRecordOutDto,
	ReputationOutDto,
	TokenAccountOutDto,
} from "./provisioning-in.dto";

/**
 * Creates the records participant operations act on. Every pool, credit line
 * and governance record belongs to an existing protocol.
 */
@Injectable()
export class AdminService {
	private readonly logger = new Logger(AdminService.name);

	constructor(
		private readonly atomic: AtomicTransaction,
		private readonly tokens: LedgerTokenTransfer,
		@InjectRepository(ProtocolState)
		private readonly protocolRepository: Repository<ProtocolState>,
		@InjectRepository(BorrowerAccount)
		private readonly accountRepository: Repository<BorrowerAccount>,
		@InjectRepository(LendingPool)
		private readonly lendingPoolRepository: Repository<LendingPool>,
	) {}

	async getStats(): Promise<GetAdminStatsDto> {
		const [protocols, accounts, open, lendingPools] = await Promise.all([
			this.protocolRepository.count(),
			this.accountRepository.count(),
			this.accountRepository.count({ where: { borrowTimestamp: Not(0) } }),
			this.lendingPoolRepository.count(),
		]);
		return { protocols, positions: { accounts, open }, lendingPools };
	}

	async createLendingPool(input: {
		protocolId: string;
		poolAuthority: string;
		assetMint: string;
	}): Promise<CreatedRecordOutDto> {
		const pool = await this.atomic.execute(
			"admin:create-lending-pool",
			async (manager) => {
				const state = await loadRecord(
					manager,
					ProtocolState,
					{ externalId: input.protocolId },
					`Protocol ${input.protocolId}`,
				);
				return manager.save(
					manager.create(LendingPool, {
						externalId: generateExternalId(),
						protocolId: state.externalId,
						poolAuthority: input.poolAuthority.toLowerCase(),
						assetMint: input.assetMint,
						totalLiquidity: 0n,
						totalLoans: 0n,
						baseInterestRate: state.baseInterestRate,
						utilizationRate: 0n,
						lenderRewards: 0n,
					}),
				);
			},
		);
		this.logger.log(`Lending pool ${pool.externalId} created`);
		return { externalId: pool.externalId };
	}

	async createCollateralPool(input: {
		protocolId: string;
		assetMint: string;
	}): Promise<CreatedRecordOutDto> {
		const pool = await this.atomic.execute(
			"admin:create-collateral-pool",
			async (manager) => {
				await this.requireProtocol(manager, input.protocolId);
				return manager.save(
					manager.create(CollateralPool, {
						externalId: generateExternalId(),
						protocolId: input.protocolId,
						assetMint: input.assetMint,
						totalCollateral: 0n,
					}),
				);
			},
		);
		this.logger.log(`Collateral pool ${pool.externalId} created`);
		return { externalId: pool.externalId };
	}

	async createInstitutionalPool(input: {
		protocolId: string;
		poolOwner: string;
		fixedInterestRate: number;
		whitelist: string[];
	}): Promise<CreatedRecordOutDto> {
		const pool = await this.atomic.execute(
			"admin:create-institutional-pool",
			async (manager) => {
				await this.requireProtocol(manager, input.protocolId);
				return manager.save(
					manager.create(InstitutionalLendingPool, {
						externalId: generateExternalId(),
						protocolId: input.protocolId,
						poolOwner: input.poolOwner.toLowerCase(),
						totalLiquidity: 0n,
						fixedInterestRate: input.fixedInterestRate,
						whitelist: [
							...new Set(input.whitelist.map((k) => k.toLowerCase())),
						],
					}),
				);
			},
		);
		this.logger.log(`Institutional pool ${pool.externalId} created`);
		return { externalId: pool.externalId };
	}

	async createCreditLine(input: {
		protocolId: string;
		delegator: string;
		delegate: string;
		maxBorrowAmount: bigint;
	}): Promise<CreatedRecordOutDto> {
		const credit = await this.atomic.execute(
			"admin:create-credit-line",
			async (manager) => {
				await this.requireProtocol(manager, input.protocolId);
				return manager.save(
					manager.create(DelegatedBorrower, {
						externalId: generateExternalId(),
						protocolId: input.protocolId,
						delegator: input.delegator.toLowerCase(),
						delegate: input.delegate.toLowerCase(),
						maxBorrowAmount: input.maxBorrowAmount,
					}),
				);
			},
		);
		this.logger.log(`Credit line ${credit.externalId} created`);
		return { externalId: credit.externalId };
	}

	async createGovernance(protocolId: string): Promise<CreatedRecordOutDto> {
		const governance = await this.atomic.execute(
			"admin:create-governance",
			async (manager) => {
				await this.requireProtocol(manager, protocolId);
				return manager.save(
					manager.create(Governance, {
						externalId: generateExternalId(),
						protocolId,
						proposalId: 0n,
						proposalType: 0,
						newValue: 0n,
						votes: 0n,
					}),
				);
			},
		);
		return { externalId: governance.externalId };
	}

	async setReputation(
		borrower: string,
		reputationScore: bigint,
	): Promise<ReputationOutDto> {
		const key = borrower.toLowerCase();
		const saved = await this.atomic.execute(
			"admin:set-reputation",
			async (manager) => {
				const existing = await manager.findOne(BorrowerReputation, {
					where: { borrower: key },
				});
				const record =
					existing ?? manager.create(BorrowerReputation, { borrower: key });
				record.reputationScore = reputationScore;
				return manager.save(record);
			},
		);
		return {
			borrower: saved.borrower,
			reputationScore: saved.reputationScore.toString(),
		};
	}

	async mintTokens(input: {
		owner: string;
		assetMint: string;
		amount: bigint;
	}): Promise<TokenAccountOutDto> {
		const address = walletAddress(input.owner.toLowerCase(), input.assetMint);
		const balance = await this.atomic.execute("admin:mint", (manager) =>
			this.tokens.mint(manager, address, input.amount),
		);
		this.logger.log(`Minted ${input.amount} into ${address}`);
		return { address, balance: balance.toString() };
	}

	async getTokenAccount(address: string): Promise<TokenAccountOutDto> {
		const balance = await this.tokens.balanceOf(address);
		return { address, balance: balance.toString() };
	}

	private async requireProtocol(
		manager: EntityManager,
		protocolId: string,
	): Promise<void> {
		await loadRecord(
			manager,
			ProtocolState,
			{ externalId: protocolId },
			`Protocol ${protocolId}`,
		);
	}
}
