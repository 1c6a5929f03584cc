export const PROOF_VERIFIER = "PROOF_VERIFIER";
export const TOKEN_TRANSFER = "TOKEN_TRANSFER";
export const CLOCK = "CLOCK";
