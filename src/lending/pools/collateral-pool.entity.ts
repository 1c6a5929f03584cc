import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../ledger/column-transformers";

@Entity("collateral_pools")
export class CollateralPool {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Index()
	@Column({ type: "text" })
	protocolId!: string;

	@Column({ type: "text" })
	assetMint!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	totalCollateral!: bigint;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
