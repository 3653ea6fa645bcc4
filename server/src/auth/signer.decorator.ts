import {
	type ExecutionContext,
	UnauthorizedException,
	UseGuards,
	applyDecorators,
	createParamDecorator,
} from "@nestjs/common";
import { ApiHeader, ApiUnauthorizedResponse } from "@nestjs/swagger";
import { type SignedRequest, SignatureGuard } from "./signature.guard";
import {
	SIGNATURE_HEADER,
	SIGNER_HEADER,
	TIMESTAMP_HEADER,
} from "./signed-request";

/**
 * The x-only key verified by SignatureGuard.
 */
export const Signer = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): string => {
		const req = ctx.switchToHttp().getRequest<SignedRequest>();
		if (!req.signer) {
			throw new UnauthorizedException("Unsigned request");
		}
		return req.signer;
	},
);

export function Signed() {
	return applyDecorators(
		UseGuards(SignatureGuard),
		ApiHeader({ name: SIGNER_HEADER, description: "x-only public key, hex" }),
		ApiHeader({ name: TIMESTAMP_HEADER, description: "Unix epoch in milliseconds" }),
		ApiHeader({
			name: SIGNATURE_HEADER,
			description: "BIP-340 signature of sha256('{timestamp}:{METHOD}:{path}:{body}')",
		}),
		ApiUnauthorizedResponse({ description: "Missing/invalid signature" }),
	);
}
