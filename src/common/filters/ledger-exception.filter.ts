import {
	type ArgumentsHost,
	Catch,
	type ExceptionFilter,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import { LedgerError, type LedgerErrorCode } from "../errors";

const STATUS_BY_CODE: Partial<Record<LedgerErrorCode, HttpStatus>> = {
	UnauthorizedBorrower: HttpStatus.FORBIDDEN,
	UnauthorizedVoter: HttpStatus.FORBIDDEN,
	RecordNotFound: HttpStatus.NOT_FOUND,
};

export const statusForLedgerError = (code: LedgerErrorCode): HttpStatus =>
	STATUS_BY_CODE[code] ?? HttpStatus.UNPROCESSABLE_ENTITY;

@Catch(LedgerError)
export class LedgerExceptionFilter implements ExceptionFilter<LedgerError> {
	private readonly logger = new Logger(LedgerExceptionFilter.name);

	catch(exception: LedgerError, host: ArgumentsHost) {
		const res = host.switchToHttp().getResponse<Response>();
		const statusCode = statusForLedgerError(exception.code);
		this.logger.debug(`${exception.code}: ${exception.message}`);
		res.status(statusCode).json({
			statusCode,
			error: exception.code,
			message: exception.message,
		});
	}
}
