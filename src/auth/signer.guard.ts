import {
	type CanActivate,
	type ExecutionContext,
	Injectable,
	UnauthorizedException,
} from "@nestjs/common";
import type { Request } from "express";

export const SIGNER_HEADER = "x-signer-pubkey";

// x-only (32 bytes) or compressed (33 bytes) public key
const PUBKEY_HEX = /^(?:[0-9a-f]{64}|[0-9a-f]{66})$/;

export type SignedRequest = Request & { signer?: string };

/**
 * Resolves the participant a request acts for. The key is trusted as given:
 * signing is left to the transport in front of the service.
 */
@Injectable()
export class SignerGuard implements CanActivate {
	canActivate(context: ExecutionContext): boolean {
		const req = context.switchToHttp().getRequest<SignedRequest>();
		const header = req.header(SIGNER_HEADER)?.trim().toLowerCase();
		if (!header || !PUBKEY_HEX.test(header)) {
			throw new UnauthorizedException(
				`Missing or malformed ${SIGNER_HEADER} header`,
			);
		}
		req.signer = header;
		return true;
	}
}
