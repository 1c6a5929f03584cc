export type TokenAccountAddress = string;

export const walletAddress = (
	owner: string,
	mint: string,
): TokenAccountAddress => `wallet:${owner}:${mint}`;

export const lendingEscrowAddress = (poolId: string): TokenAccountAddress =>
	`lending-pool:${poolId}`;

export const collateralEscrowAddress = (poolId: string): TokenAccountAddress =>
	`collateral-pool:${poolId}`;
