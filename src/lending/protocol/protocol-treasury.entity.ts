import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../ledger/column-transformers";

@Entity("protocol_treasuries")
export class ProtocolTreasury {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	protocolId!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	totalFeesCollected!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	governanceFund!: bigint;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
