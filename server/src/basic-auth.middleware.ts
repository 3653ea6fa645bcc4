import { timingSafeEqual } from "node:crypto";
import {
	Injectable,
	Logger,
	type NestMiddleware,
	ServiceUnavailableException,
	UnauthorizedException,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { NextFunction, Request, Response } from "express";

const REALM = 'Basic realm="escrow-admin"';

/**
 * Guards the admin surface with HTTP basic credentials from
 * BACKOFFICE_BASIC_USER / BACKOFFICE_BASIC_PASS.
 */
@Injectable()
export class BasicAuthMiddleware implements NestMiddleware {
	private readonly logger = new Logger(BasicAuthMiddleware.name);

	constructor(private readonly config: ConfigService) {}

	use(req: Request, res: Response, next: NextFunction) {
		const user = this.config.get<string>("BACKOFFICE_BASIC_USER");
		const pass = this.config.get<string>("BACKOFFICE_BASIC_PASS");
		if (!user || !pass) {
			this.logger.warn("Admin credentials not configured, admin routes disabled");
			throw new ServiceUnavailableException("Admin access disabled");
		}

		const credentials = parseBasic(req.header("authorization"));
		if (
			!credentials ||
			!sameSecret(credentials.user, user) ||
			!sameSecret(credentials.pass, pass)
		) {
			res.setHeader("WWW-Authenticate", REALM);
			throw new UnauthorizedException("Admin credentials required");
		}
		next();
	}
}

function parseBasic(header: string | undefined): { user: string; pass: string } | null {
	const match = header?.match(/^Basic\s+(\S+)$/);
	if (!match) return null;
	const decoded = Buffer.from(match[1], "base64").toString("utf8");
	const colon = decoded.indexOf(":");
	if (colon < 0) return null;
	return { user: decoded.slice(0, colon), pass: decoded.slice(colon + 1) };
}

function sameSecret(given: string, expected: string): boolean {
	const a = Buffer.from(given);
	const b = Buffer.from(expected);
	// timingSafeEqual requires equal lengths
	return a.length === b.length && timingSafeEqual(a, b);
}
