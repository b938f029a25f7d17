/**
 * Azure Resource Manager Interface
 *
 * Read-only access to resource groups.
 */

import type { ResourceGroup } from "@azure/arm-resources";

/**
 * Result of probing a resource group for read access.
 */
export type ResourceGroupAccess = "readable" | "forbidden" | "missing";

export interface IAzureResourceManager {
  /**
   * Get a resource group.
   *
   * @returns Resource group or undefined if not found
   */
  getResourceGroup(name: string): Promise<ResourceGroup | undefined>;

  listResourceGroups(): Promise<ResourceGroup[]>;

  /**
   * Check whether the caller can read a resource group.
   * Errors other than 403/404 are re-thrown.
   */
  checkResourceGroupAccess(name: string): Promise<ResourceGroupAccess>;
}
