import {
	ALICE,
	BOB,
	CAROL,
	createLedgerTestingModule,
	type LedgerTestContext,
} from "../../../test/utils";
import { AdminService } from "../../admin/api/admin.service";
import { AtomicTransaction } from "../../runtime/atomic-transaction.service";
import { I64_MAX, I64_MIN, U64_MAX } from "../ledger/ledger-math";
import { ProtocolService } from "../protocol/protocol.service";
import { Governance } from "./governance.entity";
import { GovernanceService } from "./governance.service";

describe("GovernanceService", () => {
	let ctx: LedgerTestContext;
	let governance: GovernanceService;
	let governanceId: string;
	let institutionalPoolId: string;

	beforeEach(async () => {
		ctx = await createLedgerTestingModule();
		governance = ctx.moduleRef.get(GovernanceService);
		const admin = ctx.moduleRef.get(AdminService);
		const { protocolId } = await ctx.moduleRef
			.get(ProtocolService)
			.initialize();
		({ externalId: governanceId } = await admin.createGovernance(protocolId));
		({ externalId: institutionalPoolId } =
			await admin.createInstitutionalPool({
				protocolId,
				poolOwner: CAROL,
				fixedInterestRate: 3,
				whitelist: [ALICE, BOB.toUpperCase()],
			}));
	});

	afterEach(async () => {
		await ctx.moduleRef.close();
	});

	const overwrite = (patch: Partial<Pick<Governance, "proposalId" | "votes">>) =>
		ctx.moduleRef
			.get(AtomicTransaction)
			.execute("test:overwrite-governance", async (manager) => {
				const record = await manager.findOneByOrFail(Governance, {
					externalId: governanceId,
				});
				await manager.save(Object.assign(record, patch));
			});

	it("starts with no proposal", async () => {
		expect(await governance.getGovernance(governanceId)).toMatchObject({
			proposalId: "0",
			proposalType: 0,
			newValue: "0",
			votes: "0",
		});
	});

	it("numbers proposals and resets the tally on each one", async () => {
		await governance.proposeChange(governanceId, ALICE, 1, 7n);
		await governance.vote(governanceId, institutionalPoolId, ALICE, 1n, true);

		const second = await governance.proposeChange(governanceId, BOB, 2, 9n);

		expect(second).toMatchObject({
			governanceId,
			proposalId: "2",
			proposalType: 2,
			newValue: "9",
			votes: "0",
		});
	});

	it("tallies votes for and against, repeated votes included", async () => {
		await governance.proposeChange(governanceId, ALICE, 1, 7n);

		await governance.vote(governanceId, institutionalPoolId, ALICE, 1n, true);
		await governance.vote(governanceId, institutionalPoolId, BOB, 1n, false);
		const tally = await governance.vote(
			governanceId,
			institutionalPoolId,
			BOB,
			1n,
			false,
		);

		expect(tally.votes).toBe("-1");
	});

	it("only counts votes on the live proposal", async () => {
		await governance.proposeChange(governanceId, ALICE, 1, 7n);
		await governance.proposeChange(governanceId, ALICE, 1, 8n);

		await expect(
			governance.vote(governanceId, institutionalPoolId, ALICE, 1n, true),
		).rejects.toMatchObject({ code: "InvalidProposal" });
		expect((await governance.getGovernance(governanceId)).votes).toBe("0");
	});

	it("rejects voters outside the whitelist before checking the proposal", async () => {
		await governance.proposeChange(governanceId, ALICE, 1, 7n);

		await expect(
			governance.vote(governanceId, institutionalPoolId, CAROL, 5n, true),
		).rejects.toMatchObject({ code: "UnauthorizedVoter" });
	});

	it("fails on an unknown governance record", async () => {
		await expect(
			governance.proposeChange("0000000000000000", ALICE, 1, 7n),
		).rejects.toMatchObject({
			code: "RecordNotFound",
			message: "Governance 0000000000000000 not found",
		});
	});

	it("fails with MathOverflow once proposal ids run out", async () => {
		await overwrite({ proposalId: U64_MAX });

		await expect(
			governance.proposeChange(governanceId, ALICE, 1, 7n),
		).rejects.toMatchObject({ code: "MathOverflow" });
		expect(await governance.getGovernance(governanceId)).toMatchObject({
			proposalId: "18446744073709551615",
			proposalType: 0,
			newValue: "0",
		});
	});

	it("fails with MathOverflow when the tally is at the i64 bounds", async () => {
		await governance.proposeChange(governanceId, ALICE, 1, 7n);

		await overwrite({ votes: I64_MAX });
		await expect(
			governance.vote(governanceId, institutionalPoolId, ALICE, 1n, true),
		).rejects.toMatchObject({ code: "MathOverflow" });
		expect((await governance.getGovernance(governanceId)).votes).toBe(
			"9223372036854775807",
		);

		await overwrite({ votes: I64_MIN });
		await expect(
			governance.vote(governanceId, institutionalPoolId, BOB, 1n, false),
		).rejects.toMatchObject({ code: "MathOverflow" });
		expect((await governance.getGovernance(governanceId)).votes).toBe(
			"-9223372036854775808",
		);
	});
});
