import {
	type ArgumentsHost,
	Catch,
	type ExceptionFilter,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import { LedgerError, type LedgerErrorKind } from "@stablecoin-escrow/ledger";
import type { Response } from "express";

export const STATUS_BY_KIND: Record<LedgerErrorKind, HttpStatus> = {
	validation: HttpStatus.BAD_REQUEST,
	authorization: HttpStatus.FORBIDDEN,
	"not-found": HttpStatus.NOT_FOUND,
	state: HttpStatus.CONFLICT,
	reinitialization: HttpStatus.CONFLICT,
	deadline: HttpStatus.UNPROCESSABLE_ENTITY,
	funds: HttpStatus.UNPROCESSABLE_ENTITY,
};

export type LedgerErrorBody = {
	statusCode: number;
	error: LedgerErrorKind;
	code: string;
	message: string;
};

/**
 * Maps ledger failures to HTTP. Everything else falls through to Nest's
 * default handling.
 */
@Catch(LedgerError)
export class LedgerExceptionFilter implements ExceptionFilter<LedgerError> {
	private readonly logger = new Logger(LedgerExceptionFilter.name);

	catch(exception: LedgerError, host: ArgumentsHost) {
		const res = host.switchToHttp().getResponse<Response>();
		const status = STATUS_BY_KIND[exception.kind];
		this.logger.warn(`${exception.code}: ${exception.message}`);
		const body: LedgerErrorBody = {
			statusCode: status,
			error: exception.kind,
			code: exception.code,
			message: exception.message,
		};
		res.status(status).json(body);
	}
}
