/**
 * Azure Compute Manager Interface
 *
 * Provides abstraction for VM, Disk, and Snapshot operations.
 * Enables dependency injection for testing and modularity.
 */

import type { VirtualMachine, Disk, Snapshot } from "@azure/arm-compute";
import type { OsKind } from "../../types";

export interface CreateSnapshotOptions {
  location: string;
  /** Resource ID of the disk to copy */
  sourceDiskId: string;
  /** Snapshot storage SKU (e.g., "Standard_LRS") */
  sku: string;
  tags?: Record<string, string>;
}

export interface CreateDiskFromSnapshotOptions {
  location: string;
  snapshotId: string;
  /** Disk storage SKU (e.g., "Standard_LRS", "Premium_LRS") */
  sku: string;
  osType?: OsKind;
  tags?: Record<string, string>;
}

/**
 * Interface for managing Azure compute resources.
 *
 * Read operations return undefined on 404. Deleting a resource that no longer
 * exists is a no-op; every other failure is thrown.
 */
export interface IAzureComputeManager {
  getVm(resourceGroup: string, name: string): Promise<VirtualMachine | undefined>;

  /**
   * List VMs in a resource group, or in the whole subscription when omitted.
   */
  listVms(resourceGroup?: string): Promise<VirtualMachine[]>;

  getDisk(resourceGroup: string, name: string): Promise<Disk | undefined>;

  /**
   * Create a full-copy snapshot of a managed disk.
   */
  createSnapshot(
    resourceGroup: string,
    name: string,
    options: CreateSnapshotOptions
  ): Promise<Snapshot>;

  /**
   * List snapshots in a resource group, or in the whole subscription when omitted.
   */
  listSnapshots(resourceGroup?: string): Promise<Snapshot[]>;

  /**
   * Create a managed disk whose content is copied from a snapshot.
   */
  createDiskFromSnapshot(
    resourceGroup: string,
    name: string,
    options: CreateDiskFromSnapshotOptions
  ): Promise<Disk>;

  /**
   * Create a VM from a complete definition.
   */
  createVm(resourceGroup: string, name: string, definition: VirtualMachine): Promise<VirtualMachine>;

  deleteVm(resourceGroup: string, name: string): Promise<void>;
  deleteDisk(resourceGroup: string, name: string): Promise<void>;
  deleteSnapshot(resourceGroup: string, name: string): Promise<void>;
}
