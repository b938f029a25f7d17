/**
 * @azvmclone/cloning
 *
 * Azure VM cloning workflow: source resolution, target validation, the
 * snapshot → disk → network → VM provisioning pipeline and its rollback.
 */

export const AZVMCLONE_VERSION = "0.1.0";

export * from "./types";
export * from "./errors";
export * from "./result";
export * from "./resource-id";
export * from "./naming";
export * from "./security-rules";
export * from "./ledger";
export * from "./managers";
export * from "./azure-manager-factory";
export * from "./source-resolver";
export * from "./target-config";
export * from "./pipeline";
