import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
} from "typeorm";
import { bigintTransformer } from "../ledger/column-transformers";

/** A credit line: `delegate` may borrow up to `maxBorrowAmount` against `delegator`'s position. */
@Entity("delegated_borrowers")
export class DelegatedBorrower {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Index()
	@Column({ type: "text" })
	protocolId!: string;

	@Column({ type: "text" })
	delegator!: string;

	@Index()
	@Column({ type: "text" })
	delegate!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	maxBorrowAmount!: bigint;

	@CreateDateColumn()
	createdAt!: Date;
}
