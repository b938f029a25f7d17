/**
 * VM Clone Type Definitions
 *
 * Shared types for the clone workflow and its managers.
 */

/**
 * Operating system family of a VM. Decides the remote-management port
 * and the disk attach variant.
 */
export type OsKind = "Windows" | "Linux";

/**
 * Where the source NIC's NSG is bound.
 */
export type NsgAssociation = "nic" | "subnet" | "none";

/**
 * Policy used to give the new NIC a network security group.
 */
export type NsgMode = "reuse" | "hardened" | "copy";

/**
 * Log severity. The CLI maps each level to a color.
 */
export type CloneLogLevel = "info" | "success" | "warn" | "error";

/**
 * Type alias for log callback function.
 * Level is optional and defaults to "info".
 */
export type CloneLogCallback = (message: string, level?: CloneLogLevel) => void;

export interface OsDiskInfo {
  id: string;
  name: string;
  /** Storage SKU (e.g., "Standard_LRS", "Premium_LRS") */
  sku: string;
  sizeGb?: number;
  /** Attachment state reported by Azure (e.g., "Attached") */
  diskState?: string;
}

export interface NicInfo {
  id: string;
  name: string;
  resourceGroup: string;
  subnetId: string;
  /** NSG bound directly to the NIC */
  nsgId?: string;
}

/**
 * The VM being cloned. Never mutated by any code path.
 */
export interface SourceVm {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  size: string;
  osType: OsKind;
  osDisk: OsDiskInfo;
  nic: NicInfo;
}

/**
 * Components of a subnet resource ID.
 */
export interface SubnetRef {
  subscriptionId: string;
  resourceGroup: string;
  vnetName: string;
  subnetName: string;
}

/**
 * NSG security rule definition.
 */
export interface SecurityRuleSpec {
  /** Rule name */
  name: string;
  description?: string;
  /** Rule priority (100-4096) */
  priority: number;
  direction: "Inbound" | "Outbound";
  access: "Allow" | "Deny";
  /** Network protocol (e.g., "Tcp", "Udp", "*") */
  protocol: string;
  sourceAddressPrefix?: string;
  sourceAddressPrefixes?: string[];
  sourcePortRange?: string;
  sourcePortRanges?: string[];
  destinationAddressPrefix?: string;
  destinationAddressPrefixes?: string[];
  destinationPortRange?: string;
  destinationPortRanges?: string[];
}

/**
 * Minimal view of a resource returned by a manager.
 */
export interface ResourceRef {
  id: string;
  name: string;
}

export interface StorageAccountRef extends ResourceRef {
  /** Primary blob endpoint used for boot diagnostics */
  blobEndpoint?: string;
}

export type CreatedResourceKind =
  | "snapshot"
  | "disk"
  | "nsg"
  | "nic"
  | "storageAccount"
  | "vm";

/**
 * A resource created by this run, as recorded in the ledger.
 */
export interface CreatedResource {
  kind: CreatedResourceKind;
  id: string;
  name: string;
  resourceGroup: string;
}
