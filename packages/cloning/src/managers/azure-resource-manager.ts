/**
 * Azure Resource Manager
 *
 * Resource group lookups.
 */

import type { ResourceManagementClient, ResourceGroup } from "@azure/arm-resources";
import { getStatusCode, isNotFoundError } from "../errors";
import type { CloneLogCallback } from "../types";
import type { IAzureResourceManager, ResourceGroupAccess } from "./interfaces";
import { collect } from "./paging";

export class AzureResourceManager implements IAzureResourceManager {
  constructor(
    private readonly resourceClient: ResourceManagementClient,
    private readonly log: CloneLogCallback
  ) {}

  async getResourceGroup(name: string): Promise<ResourceGroup | undefined> {
    try {
      return await this.resourceClient.resourceGroups.get(name);
    } catch (error: unknown) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async listResourceGroups(): Promise<ResourceGroup[]> {
    return collect(this.resourceClient.resourceGroups.list());
  }

  async checkResourceGroupAccess(name: string): Promise<ResourceGroupAccess> {
    try {
      await this.resourceClient.resourceGroups.get(name);
      return "readable";
    } catch (error: unknown) {
      const statusCode = getStatusCode(error);
      if (statusCode === 403) {
        this.log(`  Read access denied on resource group: ${name}`, "warn");
        return "forbidden";
      }
      if (statusCode === 404) {
        return "missing";
      }
      throw error;
    }
  }
}
