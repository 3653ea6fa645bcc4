import {
	BadRequestException,
	type CanActivate,
	type ExecutionContext,
	Injectable,
	Logger,
	UnauthorizedException,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { hexToBytes } from "@noble/hashes/utils";
import { schnorr } from "@noble/secp256k1";
import type { Request } from "express";
import { signatureMaxSkewMs } from "../config/ledger.config";
import {
	SIGNATURE_HEADER,
	SIGNER_HEADER,
	TIMESTAMP_HEADER,
	serializeBody,
	signedRequestDigest,
} from "./signed-request";

const X_ONLY_KEY = /^[0-9a-fA-F]{64}$/;
const SCHNORR_SIGNATURE = /^[0-9a-fA-F]{128}$/;

export type SignedRequest = Request & { signer?: string };

/**
 * Authenticates a party by a BIP-340 signature over the request. The
 * verified x-only key becomes the actor for the ledger operation.
 */
@Injectable()
export class SignatureGuard implements CanActivate {
	private readonly logger = new Logger(SignatureGuard.name);
	private readonly maxSkewMs: number;

	constructor(config: ConfigService) {
		this.maxSkewMs = signatureMaxSkewMs(config);
	}

	async canActivate(context: ExecutionContext): Promise<boolean> {
		const req = context.switchToHttp().getRequest<SignedRequest>();

		const signer = req.header(SIGNER_HEADER);
		const timestamp = req.header(TIMESTAMP_HEADER);
		const signature = req.header(SIGNATURE_HEADER);
		if (!signer || !timestamp || !signature) {
			throw new UnauthorizedException("Missing signature headers");
		}
		if (!X_ONLY_KEY.test(signer)) {
			throw new UnauthorizedException("Invalid signer key");
		}
		if (!SCHNORR_SIGNATURE.test(signature)) {
			throw new UnauthorizedException("Invalid signature encoding");
		}

		const signedAt = Number(timestamp);
		if (!Number.isSafeInteger(signedAt)) {
			throw new UnauthorizedException("Invalid timestamp");
		}
		if (Math.abs(Date.now() - signedAt) > this.maxSkewMs) {
			throw new UnauthorizedException("Request timestamp outside the allowed window");
		}

		const digest = signedRequestDigest({
			timestamp,
			method: req.method,
			path: req.originalUrl,
			body: serializeBody(req.body),
		});

		let ok = false;
		try {
			ok = await schnorr.verify(hexToBytes(signature), digest, hexToBytes(signer));
		} catch (cause) {
			throw new BadRequestException("Invalid signature input", { cause });
		}
		if (!ok) {
			this.logger.debug(`Rejected signature from ${signer} on ${req.method} ${req.originalUrl}`);
			throw new UnauthorizedException("Invalid signature");
		}

		req.signer = signer.toLowerCase();
		return true;
	}
}
