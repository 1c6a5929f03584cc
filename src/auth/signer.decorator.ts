import {
	createParamDecorator,
	type ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import type { SignedRequest } from "./signer.guard";

export const Signer = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): string => {
		const req = ctx.switchToHttp().getRequest<SignedRequest>();
		if (!req.signer) {
			throw new UnauthorizedException("No signer on request");
		}
		return req.signer;
	},
);
