/**
 * Azure Storage Manager Interface
 *
 * Storage accounts used for VM boot diagnostics.
 */

import type { StorageAccount } from "@azure/arm-storage";

export interface CreateStorageAccountOptions {
  location: string;
  tags?: Record<string, string>;
}

export interface IAzureStorageManager {
  listStorageAccounts(resourceGroup: string): Promise<StorageAccount[]>;

  /**
   * True when the name is free across all of Azure.
   */
  isNameAvailable(name: string): Promise<boolean>;

  /**
   * Create a Standard_LRS StorageV2 account.
   */
  createStorageAccount(
    resourceGroup: string,
    name: string,
    options: CreateStorageAccountOptions
  ): Promise<StorageAccount>;

  deleteStorageAccount(resourceGroup: string, name: string): Promise<void>;
}
