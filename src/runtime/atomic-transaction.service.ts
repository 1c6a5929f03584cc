import { Injectable, Logger } from "@nestjs/common";
import { InjectDataSource } from "@nestjs/typeorm";
import type { DataSource, EntityManager } from "typeorm";
import { toError } from "../common/errors";

/**
 * Runs ledger operations one at a time, in submission order, each inside a
 * single database transaction. Anything thrown by `work` rolls back every
 * write it made, token transfers included.
 */
@Injectable()
export class AtomicTransaction {
	private readonly logger = new Logger(AtomicTransaction.name);
	private tail: Promise<unknown> = Promise.resolve();

	constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

	execute<T>(
		label: string,
		work: (manager: EntityManager) => Promise<T>,
	): Promise<T> {
		const next = this.tail.then(() => this.run(label, work));
		// the caller sees the rejection through `next`, the queue only needs ordering
		this.tail = next.catch(() => undefined);
		return next;
	}

	private async run<T>(
		label: string,
		work: (manager: EntityManager) => Promise<T>,
	): Promise<T> {
		this.logger.debug(`${label}: begin`);
		try {
			const result = await this.dataSource.transaction(work);
			this.logger.debug(`${label}: committed`);
			return result;
		} catch (e) {
			const err = toError(e);
			this.logger.warn(`${label}: rolled back (${err.message})`);
			throw err;
		}
	}
}
