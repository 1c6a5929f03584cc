import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../ledger/column-transformers";

@Entity("protocol_states")
export class ProtocolState {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	totalCollateral!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	totalLoans!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	totalLiquidity!: bigint;

	/** Annual rate in percent. */
	@Column({ type: "integer" })
	baseInterestRate!: number;

	/** Always `floor(totalLoans * 100 / totalLiquidity)`, 0 without liquidity. */
	@Column({ type: "text", transformer: bigintTransformer })
	utilizationRate!: bigint;

	/** Seconds that must pass between two borrows against one position. */
	@Column({ type: "integer" })
	minCollateralLockTime!: number;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
