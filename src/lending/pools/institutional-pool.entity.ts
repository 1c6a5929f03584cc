import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../ledger/column-transformers";

/**
 * Whitelist gate shared by institutional borrowing and governance voting.
 */
@Entity("institutional_pools")
export class InstitutionalLendingPool {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Index()
	@Column({ type: "text" })
	protocolId!: string;

	@Column({ type: "text" })
	poolOwner!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	totalLiquidity!: bigint;

	@Column({ type: "integer" })
	fixedInterestRate!: number;

	@Column({ type: "simple-json" })
	whitelist!: string[];

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
