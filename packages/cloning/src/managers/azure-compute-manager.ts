/**
 * Azure Compute Manager
 *
 * Handles VM, Disk, and Snapshot operations for the clone workflow.
 */

import type {
  ComputeManagementClient,
  VirtualMachine,
  Disk,
  Snapshot,
} from "@azure/arm-compute";
import { isNotFoundError } from "../errors";
import type { CloneLogCallback } from "../types";
import type {
  IAzureComputeManager,
  CreateSnapshotOptions,
  CreateDiskFromSnapshotOptions,
} from "./interfaces";
import { collect } from "./paging";

export class AzureComputeManager implements IAzureComputeManager {
  constructor(
    private readonly computeClient: ComputeManagementClient,
    private readonly log: CloneLogCallback
  ) {}

  async getVm(resourceGroup: string, name: string): Promise<VirtualMachine | undefined> {
    try {
      return await this.computeClient.virtualMachines.get(resourceGroup, name);
    } catch (error: unknown) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async listVms(resourceGroup?: string): Promise<VirtualMachine[]> {
    return resourceGroup
      ? collect(this.computeClient.virtualMachines.list(resourceGroup))
      : collect(this.computeClient.virtualMachines.listAll());
  }

  async getDisk(resourceGroup: string, name: string): Promise<Disk | undefined> {
    try {
      return await this.computeClient.disks.get(resourceGroup, name);
    } catch (error: unknown) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async createSnapshot(
    resourceGroup: string,
    name: string,
    options: CreateSnapshotOptions
  ): Promise<Snapshot> {
    this.log(`  Creating snapshot: ${name}`);
    return this.computeClient.snapshots.beginCreateOrUpdateAndWait(resourceGroup, name, {
      location: options.location,
      sku: { name: options.sku },
      creationData: {
        createOption: "Copy",
        sourceResourceId: options.sourceDiskId,
      },
      tags: options.tags,
    });
  }

  async listSnapshots(resourceGroup?: string): Promise<Snapshot[]> {
    return resourceGroup
      ? collect(this.computeClient.snapshots.listByResourceGroup(resourceGroup))
      : collect(this.computeClient.snapshots.list());
  }

  async createDiskFromSnapshot(
    resourceGroup: string,
    name: string,
    options: CreateDiskFromSnapshotOptions
  ): Promise<Disk> {
    this.log(`  Creating managed disk: ${name} (${options.sku})`);
    return this.computeClient.disks.beginCreateOrUpdateAndWait(resourceGroup, name, {
      location: options.location,
      sku: { name: options.sku },
      osType: options.osType,
      creationData: {
        createOption: "Copy",
        sourceResourceId: options.snapshotId,
      },
      tags: options.tags,
    });
  }

  async createVm(
    resourceGroup: string,
    name: string,
    definition: VirtualMachine
  ): Promise<VirtualMachine> {
    this.log(`  Creating VM: ${name}`);
    return this.computeClient.virtualMachines.beginCreateOrUpdateAndWait(
      resourceGroup,
      name,
      definition
    );
  }

  async deleteVm(resourceGroup: string, name: string): Promise<void> {
    try {
      await this.computeClient.virtualMachines.beginDeleteAndWait(resourceGroup, name);
      this.log(`VM deleted: ${name}`);
    } catch (error: unknown) {
      if (isNotFoundError(error)) {
        this.log(`VM not found (skipped): ${name}`);
        return;
      }
      throw error;
    }
  }

  async deleteDisk(resourceGroup: string, name: string): Promise<void> {
    try {
      await this.computeClient.disks.beginDeleteAndWait(resourceGroup, name);
      this.log(`Disk deleted: ${name}`);
    } catch (error: unknown) {
      if (isNotFoundError(error)) {
        this.log(`Disk not found (skipped): ${name}`);
        return;
      }
      throw error;
    }
  }

  async deleteSnapshot(resourceGroup: string, name: string): Promise<void> {
    try {
      await this.computeClient.snapshots.beginDeleteAndWait(resourceGroup, name);
      this.log(`Snapshot deleted: ${name}`);
    } catch (error: unknown) {
      if (isNotFoundError(error)) {
        this.log(`Snapshot not found (skipped): ${name}`);
        return;
      }
      throw error;
    }
  }
}
