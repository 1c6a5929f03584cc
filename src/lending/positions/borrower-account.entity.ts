import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { EncryptedAmount } from "../ledger/encrypted-amount";
import { encryptedAmountTransformer } from "../ledger/column-transformers";

@Entity("borrower_accounts")
@Index(["protocolId", "owner"], { unique: true })
export class BorrowerAccount {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Column({ type: "text" })
	protocolId!: string;

	@Column({ type: "text" })
	owner!: string;

	@Column({ type: "text", transformer: encryptedAmountTransformer })
	encryptedCollateral!: EncryptedAmount;

	@Column({ type: "text", transformer: encryptedAmountTransformer })
	encryptedBorrowed!: EncryptedAmount;

	/** Seconds of the last borrow, 0 while no position is open. */
	@Column({ type: "integer" })
	borrowTimestamp!: number;

	/** Lending pool the open position was borrowed from. */
	@Column({ type: "text", nullable: true })
	lendingPoolId!: string | null;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
