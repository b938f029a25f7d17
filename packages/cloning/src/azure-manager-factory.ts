/**
 * Azure Manager Factory
 *
 * Creates and wires up all Azure managers with their SDK clients.
 */

import { ComputeManagementClient } from "@azure/arm-compute";
import { NetworkManagementClient } from "@azure/arm-network";
import { ResourceManagementClient } from "@azure/arm-resources";
import { StorageManagementClient } from "@azure/arm-storage";
import {
  ClientSecretCredential,
  DefaultAzureCredential,
  TokenCredential,
} from "@azure/identity";

import {
  AzureSessionManager,
  AzureResourceManager,
  AzureComputeManager,
  AzureNetworkManager,
  AzureStorageManager,
} from "./managers";
import type {
  IAzureSessionManager,
  IAzureResourceManager,
  IAzureComputeManager,
  IAzureNetworkManager,
  IAzureStorageManager,
} from "./managers";
import type { CloneLogCallback } from "./types";

/**
 * Service principal credentials. When all three are set a
 * ClientSecretCredential is used instead of the default chain.
 */
export interface ServicePrincipalConfig {
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
}

/**
 * Configuration for the Azure manager factory.
 */
export interface AzureManagerFactoryConfig {
  /** Azure subscription ID */
  subscriptionId: string;
  /** Azure credentials (optional, uses DefaultAzureCredential if not provided) */
  credentials?: TokenCredential;
  /** Log callback function */
  log: CloneLogCallback;
}

/**
 * Collection of all Azure managers.
 */
export interface AzureManagers {
  sessionManager: IAzureSessionManager;
  resourceManager: IAzureResourceManager;
  computeManager: IAzureComputeManager;
  networkManager: IAzureNetworkManager;
  storageManager: IAzureStorageManager;
}

/**
 * Pick a credential: service principal when fully configured, otherwise the
 * default chain (environment, managed identity, Azure CLI, ...).
 */
export function createCredential(config: ServicePrincipalConfig = {}): TokenCredential {
  if (config.tenantId && config.clientId && config.clientSecret) {
    return new ClientSecretCredential(config.tenantId, config.clientId, config.clientSecret);
  }
  return new DefaultAzureCredential();
}

/**
 * Factory class for creating Azure managers with proper wiring.
 *
 * @example
 * ```typescript
 * const managers = AzureManagerFactory.createManagers({
 *   subscriptionId: "00000000-0000-0000-0000-000000000000",
 *   log: (msg) => console.log(msg),
 * });
 * ```
 */
export class AzureManagerFactory {
  static createManagers(config: AzureManagerFactoryConfig): AzureManagers {
    const { subscriptionId, credentials, log } = config;

    const credential = credentials ?? new DefaultAzureCredential();

    const computeClient = new ComputeManagementClient(credential, subscriptionId);
    const networkClient = new NetworkManagementClient(credential, subscriptionId);
    const resourceClient = new ResourceManagementClient(credential, subscriptionId);
    const storageClient = new StorageManagementClient(credential, subscriptionId);

    return {
      sessionManager: new AzureSessionManager(credential, subscriptionId, log),
      resourceManager: new AzureResourceManager(resourceClient, log),
      computeManager: new AzureComputeManager(computeClient, log),
      networkManager: new AzureNetworkManager(networkClient, log),
      storageManager: new AzureStorageManager(storageClient, log),
    };
  }
}
