/**
 * Verify module exports
 */

export type { VerifyOptions } from "./verifier";
export { verifyArchive } from "./verifier";
