import { createLedgerTestingModule, type LedgerTestContext } from "../../test/utils";
import { isLedgerError } from "../common/errors";
import { U64_MAX } from "../lending/ledger/ledger-math";
import { AtomicTransaction } from "./atomic-transaction.service";
import { LedgerTokenTransfer } from "./token-transfer.service";

describe("LedgerTokenTransfer", () => {
	let ctx: LedgerTestContext;
	let atomic: AtomicTransaction;
	let tokens: LedgerTokenTransfer;

	beforeEach(async () => {
		ctx = await createLedgerTestingModule();
		atomic = ctx.moduleRef.get(AtomicTransaction);
		tokens = ctx.moduleRef.get(LedgerTokenTransfer);
		await atomic.execute("seed", (manager) =>
			tokens.mint(manager, "wallet:alice:usdc", 100n),
		);
	});

	afterEach(async () => {
		await ctx.moduleRef.close();
	});

	it("moves tokens and opens the destination account", async () => {
		await atomic.execute("move", (manager) =>
			tokens.move(manager, "wallet:alice:usdc", "lending-pool:p1", 60n),
		);
		expect(await tokens.balanceOf("wallet:alice:usdc")).toBe(40n);
		expect(await tokens.balanceOf("lending-pool:p1")).toBe(60n);
	});

	it("fails on an unknown source", async () => {
		await expect(
			atomic.execute("move", (manager) =>
				tokens.move(manager, "wallet:nobody:usdc", "lending-pool:p1", 1n),
			),
		).rejects.toMatchObject({
			code: "TransferFailed",
			message: "Unknown token account wallet:nobody:usdc",
		});
	});

	it("fails on an insufficient balance and leaves both sides untouched", async () => {
		await expect(
			atomic.execute("move", (manager) =>
				tokens.move(manager, "wallet:alice:usdc", "lending-pool:p1", 101n),
			),
		).rejects.toMatchObject({ code: "TransferFailed" });
		expect(await tokens.balanceOf("wallet:alice:usdc")).toBe(100n);
		expect(await tokens.balanceOf("lending-pool:p1")).toBe(0n);
	});

	it("reports destination overflow as a transfer failure", async () => {
		await atomic.execute("seed", (manager) =>
			tokens.mint(manager, "lending-pool:p1", U64_MAX),
		);
		const err = await atomic
			.execute("move", (manager) =>
				tokens.move(manager, "wallet:alice:usdc", "lending-pool:p1", 1n),
			)
			.catch((e: unknown) => e);
		expect(isLedgerError(err, "TransferFailed")).toBe(true);
		expect(await tokens.balanceOf("wallet:alice:usdc")).toBe(100n);
	});
});
