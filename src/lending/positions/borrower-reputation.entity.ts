import {
	Column,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../ledger/column-transformers";

@Entity("borrower_reputations")
export class BorrowerReputation {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	borrower!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	reputationScore!: bigint;

	@UpdateDateColumn()
	updatedAt!: Date;
}
