import {
	createLedgerTestingModule,
	type LedgerTestContext,
} from "../../../test/utils";
import {
	type LedgerSse,
	ServerSentEventsService,
} from "../../common/server-sent-events.service";
import { ProtocolService } from "./protocol.service";

describe("ProtocolService", () => {
	let ctx: LedgerTestContext;
	let protocols: ProtocolService;

	beforeEach(async () => {
		ctx = await createLedgerTestingModule();
		protocols = ctx.moduleRef.get(ProtocolService);
	});

	afterEach(async () => {
		await ctx.moduleRef.close();
	});

	it("initializes an empty ledger with the configured defaults", async () => {
		const protocol = await protocols.initialize();

		expect(protocol).toEqual({
			protocolId: expect.stringMatching(/^[0-9a-z]{16}$/),
			totalCollateral: "0",
			totalLoans: "0",
			totalLiquidity: "0",
			baseInterestRate: 5,
			utilizationRate: "0",
			minCollateralLockTime: 600,
			treasury: { totalFeesCollected: "0", governanceFund: "0" },
		});
	});

	it("creates an independent protocol on every call", async () => {
		const first = await protocols.initialize();
		const second = await protocols.initialize();

		expect(first.protocolId).not.toBe(second.protocolId);
		expect(await protocols.getProtocol(second.protocolId)).toEqual(second);
	});

	it("fails on an unknown protocol", async () => {
		await expect(protocols.getProtocol("0000000000000000")).rejects.toMatchObject(
			{
				code: "RecordNotFound",
				message: "Protocol 0000000000000000 not found",
			},
		);
	});

	it("announces the new protocol on the event stream", async () => {
		const seen: LedgerSse[] = [];
		const subscription = ctx.moduleRef
			.get(ServerSentEventsService)
			.ledgerEvents()
			.subscribe((event) => seen.push(event));

		const { protocolId } = await protocols.initialize();
		subscription.unsubscribe();

		expect(seen).toEqual([{ type: "protocol_initialized", protocolId }]);
	});
});
