import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";
import ledgerConfig from "../config/ledger.config";
import { ServerSentEventsService } from "../common/server-sent-events.service";
import { RuntimeModule } from "../runtime/runtime.module";
import { GovernanceController } from "./governance/governance.controller";
import { Governance } from "./governance/governance.entity";
import { GovernanceService } from "./governance/governance.service";
import { LedgerEventsController } from "./ledger-events.controller";
import { LiquidationController } from "./liquidation/liquidation.controller";
import { LiquidationService } from "./liquidation/liquidation.service";
import { BorrowingService } from "./loans/borrowing.service";
import { LoansController } from "./loans/loans.controller";
import { RepaymentService } from "./loans/repayment.service";
import { CollateralPool } from "./pools/collateral-pool.entity";
import { InstitutionalLendingPool } from "./pools/institutional-pool.entity";
import { LendingPool } from "./pools/lending-pool.entity";
import { PoolsController } from "./pools/pools.controller";
import { PoolsService } from "./pools/pools.service";
import { BorrowerAccount } from "./positions/borrower-account.entity";
import { BorrowerReputation } from "./positions/borrower-reputation.entity";
import { DelegatedBorrower } from "./positions/delegated-borrower.entity";
import { PositionsController } from "./positions/positions.controller";
import { PositionsService } from "./positions/positions.service";
import { ProtocolController } from "./protocol/protocol.controller";
import { ProtocolState } from "./protocol/protocol-state.entity";
import { ProtocolTreasury } from "./protocol/protocol-treasury.entity";
import { ProtocolService } from "./protocol/protocol.service";

@Module({
	imports: [
		TypeOrmModule.forFeature([
			ProtocolState,
			ProtocolTreasury,
			LendingPool,
			CollateralPool,
			InstitutionalLendingPool,
			BorrowerAccount,
			DelegatedBorrower,
			BorrowerReputation,
			Governance,
		]),
		ConfigModule.forFeature(ledgerConfig),
		RuntimeModule,
	],
	controllers: [
		ProtocolController,
		PoolsController,
		PositionsController,
		LoansController,
		LiquidationController,
		GovernanceController,
		LedgerEventsController,
	],
	providers: [
		ProtocolService,
		PoolsService,
		PositionsService,
		BorrowingService,
		RepaymentService,
		LiquidationService,
		GovernanceService,
		ServerSentEventsService,
	],
	exports: [ServerSentEventsService],
})
export class LendingModule {}
