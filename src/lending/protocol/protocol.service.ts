import { Inject, Injectable, Logger } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import type { EntityManager } from "typeorm";
import ledgerConfig from "../../config/ledger.config";
import {
	PROTOCOL_INITIALIZED_ID,
	type ProtocolInitialized,
	ledgerEventBase,
} from "../../common/ledger.event";
import { AtomicTransaction } from "../../runtime/atomic-transaction.service";
import { generateExternalId, loadRecord } from "../ledger/ledger-records";
import type { ProtocolDto } from "./dto/protocol.dto";
import { ProtocolState } from "./protocol-state.entity";
import { ProtocolTreasury } from "./protocol-treasury.entity";

export type ProtocolLedger = {
	state: ProtocolState;
	treasury: ProtocolTreasury;
};

@Injectable()
export class ProtocolService {
	private readonly logger = new Logger(ProtocolService.name);

	constructor(
		private readonly atomic: AtomicTransaction,
		private readonly events: EventEmitter2,
		@Inject(ledgerConfig.KEY)
		private readonly cfg: ConfigType<typeof ledgerConfig>,
	) {}

	/**
	 * Creates a fresh ProtocolState and its treasury. Not idempotent: every
	 * call yields an independent protocol.
	 */
	async initialize(): Promise<ProtocolDto> {
		const ledger = await this.atomic.execute("initialize", async (manager) => {
			const state = await manager.save(
				manager.create(ProtocolState, {
					externalId: generateExternalId(),
					totalCollateral: 0n,
					totalLoans: 0n,
					totalLiquidity: 0n,
					baseInterestRate: this.cfg.baseInterestRate,
					utilizationRate: 0n,
					minCollateralLockTime: this.cfg.minCollateralLockTime,
				}),
			);
			const treasury = await manager.save(
				manager.create(ProtocolTreasury, {
					protocolId: state.externalId,
					totalFeesCollected: 0n,
					governanceFund: 0n,
				}),
			);
			return { state, treasury };
		});
		this.logger.log(`Protocol ${ledger.state.externalId} initialized`);
		this.events.emit(
			PROTOCOL_INITIALIZED_ID,
			ledgerEventBase(ledger.state.externalId) satisfies ProtocolInitialized,
		);
		return toProtocolDto(ledger);
	}

	async getProtocol(protocolId: string): Promise<ProtocolDto> {
		const ledger = await this.atomic.execute("get-protocol", (manager) =>
			loadProtocolLedger(manager, protocolId),
		);
		return toProtocolDto(ledger);
	}
}

export async function loadProtocolLedger(
	manager: EntityManager,
	protocolId: string,
): Promise<ProtocolLedger> {
	const state = await loadRecord(
		manager,
		ProtocolState,
		{ externalId: protocolId },
		`Protocol ${protocolId}`,
	);
	const treasury = await loadRecord(
		manager,
		ProtocolTreasury,
		{ protocolId },
		`Treasury of protocol ${protocolId}`,
	);
	return { state, treasury };
}

export function toProtocolDto({ state, treasury }: ProtocolLedger): ProtocolDto {
	return {
		protocolId: state.externalId,
		totalCollateral: state.totalCollateral.toString(),
		totalLoans: state.totalLoans.toString(),
		totalLiquidity: state.totalLiquidity.toString(),
		baseInterestRate: state.baseInterestRate,
		utilizationRate: state.utilizationRate.toString(),
		minCollateralLockTime: state.minCollateralLockTime,
		treasury: {
			totalFeesCollected: treasury.totalFeesCollected.toString(),
			governanceFund: treasury.governanceFund.toString(),
		},
	};
}
