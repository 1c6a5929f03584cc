import { Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import type { EntityManager, Repository } from "typeorm";
import { LedgerError, isLedgerError } from "../common/errors";
import { checkedAdd } from "../lending/ledger/ledger-math";
import type { TokenAccountAddress } from "./escrow-addresses";
import { TokenAccount } from "./token-account.entity";

/**
 * Moves fungible tokens between custodial accounts. Every call runs on the
 * caller's transaction manager so a transfer is undone together with the
 * operation that made it.
 */
export interface TokenTransfer {
	move(
		manager: EntityManager,
		from: TokenAccountAddress,
		to: TokenAccountAddress,
		amount: bigint,
	): Promise<void>;
}

@Injectable()
export class LedgerTokenTransfer implements TokenTransfer {
	private readonly logger = new Logger(LedgerTokenTransfer.name);

	constructor(
		@InjectRepository(TokenAccount)
		private readonly accounts: Repository<TokenAccount>,
	) {}

	async move(
		manager: EntityManager,
		from: TokenAccountAddress,
		to: TokenAccountAddress,
		amount: bigint,
	): Promise<void> {
		const repo = manager.getRepository(TokenAccount);
		const source = await repo.findOne({ where: { address: from } });
		if (!source) {
			throw new LedgerError("TransferFailed", `Unknown token account ${from}`);
		}
		if (source.balance < amount) {
			throw new LedgerError(
				"TransferFailed",
				`Token account ${from} holds less than ${amount}`,
			);
		}
		if (from === to) {
			return;
		}
		source.balance -= amount;
		await repo.save(source);
		await this.credit(manager, to, amount);
		this.logger.debug(`moved ${amount} from ${from} to ${to}`);
	}

	/** Creates tokens out of thin air; provisioning and tests only. */
	async mint(
		manager: EntityManager,
		to: TokenAccountAddress,
		amount: bigint,
	): Promise<bigint> {
		const account = await this.credit(manager, to, amount);
		return account.balance;
	}

	async balanceOf(address: TokenAccountAddress): Promise<bigint> {
		const account = await this.accounts.findOne({ where: { address } });
		return account?.balance ?? 0n;
	}

	private async credit(
		manager: EntityManager,
		to: TokenAccountAddress,
		amount: bigint,
	): Promise<TokenAccount> {
		const repo = manager.getRepository(TokenAccount);
		const account =
			(await repo.findOne({ where: { address: to } })) ??
			repo.create({ address: to, balance: 0n });
		try {
			account.balance = checkedAdd(account.balance, amount);
		} catch (err) {
			if (isLedgerError(err, "MathOverflow")) {
				throw new LedgerError(
					"TransferFailed",
					`Token account ${to} would overflow`,
					{ cause: err },
				);
			}
			throw err;
		}
		return repo.save(account);
	}
}
