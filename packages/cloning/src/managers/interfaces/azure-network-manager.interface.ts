/**
 * Azure Network Manager Interface
 *
 * Provides abstraction for NIC, Subnet, NSG and VNet operations.
 * Enables dependency injection for testing and modularity.
 */

import type {
  NetworkInterface,
  NetworkSecurityGroup,
  Subnet,
  VirtualNetwork,
} from "@azure/arm-network";
import type { SecurityRuleSpec } from "../../types";

export interface CreateNsgOptions {
  location: string;
  rules: SecurityRuleSpec[];
  tags?: Record<string, string>;
}

export interface CreateNicOptions {
  location: string;
  subnetId: string;
  /** NSG to attach to the NIC (omit to inherit from the subnet) */
  nsgId?: string;
  tags?: Record<string, string>;
}

/**
 * Interface for managing Azure networking resources.
 */
export interface IAzureNetworkManager {
  /**
   * @returns NIC or undefined if not found
   */
  getNic(resourceGroup: string, name: string): Promise<NetworkInterface | undefined>;

  /**
   * @returns Subnet or undefined if not found
   */
  getSubnet(
    resourceGroup: string,
    vnetName: string,
    subnetName: string
  ): Promise<Subnet | undefined>;

  /**
   * @returns NSG or undefined if not found
   */
  getNsg(resourceGroup: string, name: string): Promise<NetworkSecurityGroup | undefined>;

  /**
   * Create an NSG with exactly the given rules.
   */
  createNsg(
    resourceGroup: string,
    name: string,
    options: CreateNsgOptions
  ): Promise<NetworkSecurityGroup>;

  /**
   * Create a NIC with a single dynamic private IP configuration.
   */
  createNic(
    resourceGroup: string,
    name: string,
    options: CreateNicOptions
  ): Promise<NetworkInterface>;

  deleteNic(resourceGroup: string, name: string): Promise<void>;

  /**
   * List VNets in a resource group, or in the whole subscription when omitted.
   */
  listVirtualNetworks(resourceGroup?: string): Promise<VirtualNetwork[]>;
}
