/**
 * Azure Network Manager
 *
 * Handles NIC, Subnet, NSG and VNet operations for the clone workflow.
 */

import type {
  NetworkManagementClient,
  NetworkInterface,
  NetworkSecurityGroup,
  Subnet,
  VirtualNetwork,
} from "@azure/arm-network";
import { isNotFoundError } from "../errors";
import { toSdkSecurityRule } from "../security-rules";
import type { CloneLogCallback } from "../types";
import type { IAzureNetworkManager, CreateNsgOptions, CreateNicOptions } from "./interfaces";
import { collect } from "./paging";

export class AzureNetworkManager implements IAzureNetworkManager {
  constructor(
    private readonly networkClient: NetworkManagementClient,
    private readonly log: CloneLogCallback
  ) {}

  async getNic(resourceGroup: string, name: string): Promise<NetworkInterface | undefined> {
    try {
      return await this.networkClient.networkInterfaces.get(resourceGroup, name);
    } catch (error: unknown) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async getSubnet(
    resourceGroup: string,
    vnetName: string,
    subnetName: string
  ): Promise<Subnet | undefined> {
    try {
      return await this.networkClient.subnets.get(resourceGroup, vnetName, subnetName);
    } catch (error: unknown) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async getNsg(resourceGroup: string, name: string): Promise<NetworkSecurityGroup | undefined> {
    try {
      return await this.networkClient.networkSecurityGroups.get(resourceGroup, name);
    } catch (error: unknown) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async createNsg(
    resourceGroup: string,
    name: string,
    options: CreateNsgOptions
  ): Promise<NetworkSecurityGroup> {
    this.log(`  Creating NSG: ${name} (${options.rules.length} rules)`);
    return this.networkClient.networkSecurityGroups.beginCreateOrUpdateAndWait(
      resourceGroup,
      name,
      {
        location: options.location,
        securityRules: options.rules.map(toSdkSecurityRule),
        tags: options.tags,
      }
    );
  }

  async createNic(
    resourceGroup: string,
    name: string,
    options: CreateNicOptions
  ): Promise<NetworkInterface> {
    this.log(`  Creating NIC: ${name}`);
    return this.networkClient.networkInterfaces.beginCreateOrUpdateAndWait(resourceGroup, name, {
      location: options.location,
      ipConfigurations: [
        {
          name: "ipconfig1",
          subnet: { id: options.subnetId },
          privateIPAllocationMethod: "Dynamic",
        },
      ],
      ...(options.nsgId ? { networkSecurityGroup: { id: options.nsgId } } : {}),
      tags: options.tags,
    });
  }

  async deleteNic(resourceGroup: string, name: string): Promise<void> {
    try {
      await this.networkClient.networkInterfaces.beginDeleteAndWait(resourceGroup, name);
      this.log(`NIC deleted: ${name}`);
    } catch (error: unknown) {
      if (isNotFoundError(error)) {
        this.log(`NIC not found (skipped): ${name}`);
        return;
      }
      throw error;
    }
  }

  async listVirtualNetworks(resourceGroup?: string): Promise<VirtualNetwork[]> {
    return resourceGroup
      ? collect(this.networkClient.virtualNetworks.list(resourceGroup))
      : collect(this.networkClient.virtualNetworks.listAll());
  }
}
