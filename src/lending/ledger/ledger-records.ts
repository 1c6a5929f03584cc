import type {
	EntityManager,
	EntityTarget,
	FindOptionsWhere,
	ObjectLiteral,
} from "typeorm";
import { customAlphabet } from "nanoid";
import { LedgerError } from "../../common/errors";
import type { ProofVerifier } from "../../runtime/proof-verifier";
import { recomputeUtilization } from "./ledger-math";

export const generateExternalId = customAlphabet(
	"0123456789abcdefghijklmnopqrstuvwxyz",
	16,
);

/** Loads a record the operation declared, failing with `RecordNotFound`. */
export async function loadRecord<T extends ObjectLiteral>(
	manager: EntityManager,
	entity: EntityTarget<T>,
	where: FindOptionsWhere<T>,
	label: string,
): Promise<T> {
	const found = await manager.findOne(entity, { where });
	if (!found) {
		throw new LedgerError("RecordNotFound", `${label} not found`);
	}
	return found;
}

export async function requireValidProof(
	verifier: ProofVerifier,
	proof: Uint8Array,
): Promise<void> {
	if (!(await verifier.verify(proof))) {
		throw new LedgerError("InvalidProof");
	}
}

type UtilizationTracked = {
	totalLoans: bigint;
	totalLiquidity: bigint;
	utilizationRate: bigint;
};

export function refreshUtilization(record: UtilizationTracked) {
	record.utilizationRate = recomputeUtilization(
		record.totalLoans,
		record.totalLiquidity,
	);
}
