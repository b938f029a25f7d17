/**
 * Azure Managers
 *
 * Re-exports all manager classes and interfaces used by the clone workflow.
 */

export * from "./azure-session-manager";
export * from "./azure-resource-manager";
export * from "./azure-compute-manager";
export * from "./azure-network-manager";
export * from "./azure-storage-manager";
export * from "./interfaces";
