import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { LendingModule } from "../../lending/lending.module";
import { BorrowerAccount } from "../../lending/positions/borrower-account.entity";
import { LendingPool } from "../../lending/pools/lending-pool.entity";
import { ProtocolState } from "../../lending/protocol/protocol-state.entity";
import { RuntimeModule } from "../../runtime/runtime.module";
import { AdminController } from "./admin.controller";
import { AdminService } from "./admin.service";

@Module({
	imports: [
		TypeOrmModule.forFeature([ProtocolState, BorrowerAccount, LendingPool]),
		RuntimeModule,
		LendingModule,
	],
	controllers: [AdminController],
	providers: [AdminService],
})
export class AdminModule {}
