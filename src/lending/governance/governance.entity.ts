import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../ledger/column-transformers";

@Entity("governance")
export class Governance {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Index()
	@Column({ type: "text" })
	protocolId!: string;

	/** Id of the live proposal; 0 until the first one is made. */
	@Column({ type: "text", transformer: bigintTransformer })
	proposalId!: bigint;

	@Column({ type: "integer" })
	proposalType!: number;

	@Column({ type: "text", transformer: bigintTransformer })
	newValue!: bigint;

	// signed tally
	@Column({ type: "text", transformer: bigintTransformer })
	votes!: bigint;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
