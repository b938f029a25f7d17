/**
 * Azure Storage Manager
 *
 * Boot diagnostics storage accounts.
 */

import type { StorageManagementClient, StorageAccount } from "@azure/arm-storage";
import { isNotFoundError } from "../errors";
import type { CloneLogCallback } from "../types";
import type { IAzureStorageManager, CreateStorageAccountOptions } from "./interfaces";
import { collect } from "./paging";

export class AzureStorageManager implements IAzureStorageManager {
  constructor(
    private readonly storageClient: StorageManagementClient,
    private readonly log: CloneLogCallback
  ) {}

  async listStorageAccounts(resourceGroup: string): Promise<StorageAccount[]> {
    return collect(this.storageClient.storageAccounts.listByResourceGroup(resourceGroup));
  }

  async isNameAvailable(name: string): Promise<boolean> {
    const result = await this.storageClient.storageAccounts.checkNameAvailability({
      name,
      type: "Microsoft.Storage/storageAccounts",
    });
    return result.nameAvailable === true;
  }

  async createStorageAccount(
    resourceGroup: string,
    name: string,
    options: CreateStorageAccountOptions
  ): Promise<StorageAccount> {
    this.log(`  Creating storage account: ${name}`);
    const result = await this.storageClient.storageAccounts.beginCreateAndWait(
      resourceGroup,
      name,
      {
        location: options.location,
        sku: { name: "Standard_LRS" },
        kind: "StorageV2",
        tags: options.tags,
      }
    );
    this.log(`  Storage account created: ${name}`);
    return result;
  }

  async deleteStorageAccount(resourceGroup: string, name: string): Promise<void> {
    try {
      await this.storageClient.storageAccounts.delete(resourceGroup, name);
      this.log(`Storage account deleted: ${name}`);
    } catch (error: unknown) {
      if (isNotFoundError(error)) {
        this.log(`Storage account not found (skipped): ${name}`);
        return;
      }
      throw error;
    }
  }
}
