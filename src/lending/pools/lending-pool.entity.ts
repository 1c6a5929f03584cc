import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../ledger/column-transformers";

@Entity("lending_pools")
export class LendingPool {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Index()
	@Column({ type: "text" })
	protocolId!: string;

	@Column({ type: "text" })
	poolAuthority!: string;

	/** Mint of the asset lent out and repaid through this pool. */
	@Column({ type: "text" })
	assetMint!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	totalLiquidity!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	totalLoans!: bigint;

	@Column({ type: "integer" })
	baseInterestRate!: number;

	@Column({ type: "text", transformer: bigintTransformer })
	utilizationRate!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	lenderRewards!: bigint;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
