/**
 * Azure Manager Interfaces
 *
 * Re-exports all manager interfaces for dependency injection and testing.
 */

export type { IAzureSessionManager, SessionInfo } from "./azure-session-manager.interface";
export type { IAzureResourceManager, ResourceGroupAccess } from "./azure-resource-manager.interface";
export type {
  IAzureComputeManager,
  CreateSnapshotOptions,
  CreateDiskFromSnapshotOptions,
} from "./azure-compute-manager.interface";
export type {
  IAzureNetworkManager,
  CreateNsgOptions,
  CreateNicOptions,
} from "./azure-network-manager.interface";
export type {
  IAzureStorageManager,
  CreateStorageAccountOptions,
} from "./azure-storage-manager.interface";
