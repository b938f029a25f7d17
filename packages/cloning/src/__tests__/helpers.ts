import type { AzureManagers } from "../azure-manager-factory";
import type { ClonePrompter } from "../pipeline/context";
import type { CloneLogCallback, SourceVm } from "../types";

// ── Resource IDs ────────────────────────────────────────────────────────

export const SUBSCRIPTION_ID = "sub-123";

export function armId(resourceGroup: string, provider: string, ...path: string[]): string {
  return `/subscriptions/${SUBSCRIPTION_ID}/resourceGroups/${resourceGroup}/providers/${provider}/${path.join("/")}`;
}

export const SOURCE_VM_ID = armId("rg1", "Microsoft.Compute", "virtualMachines", "web01");
export const SOURCE_DISK_ID = armId("rg1", "Microsoft.Compute", "disks", "osdisk-web01");
export const SOURCE_NIC_ID = armId("rg1", "Microsoft.Network", "networkInterfaces", "web01-nic");
export const SUBNET_ID = armId("rg1", "Microsoft.Network", "virtualNetworks", "vnet1", "subnets", "default");
export const SOURCE_NSG_ID = armId("rg1", "Microsoft.Network", "networkSecurityGroups", "web01-nsg");

/** 2024-01-15 10:30:45 local time */
export const FROZEN_NOW = new Date(2024, 0, 15, 10, 30, 45);
export const FROZEN_TIMESTAMP = "20240115103045";

// ── Fixtures ────────────────────────────────────────────────────────────

export function createSourceVm(overrides: Partial<SourceVm> = {}): SourceVm {
  return {
    id: SOURCE_VM_ID,
    name: "web01",
    resourceGroup: "rg1",
    location: "eastus",
    size: "Standard_B2s",
    osType: "Linux",
    osDisk: {
      id: SOURCE_DISK_ID,
      name: "osdisk-web01",
      sku: "Standard_LRS",
      sizeGb: 30,
      diskState: "Attached",
    },
    nic: {
      id: SOURCE_NIC_ID,
      name: "web01-nic",
      resourceGroup: "rg1",
      subnetId: SUBNET_ID,
    },
    ...overrides,
  };
}

// ── Mock Managers ───────────────────────────────────────────────────────

export type MockManagers = { [K in keyof AzureManagers]: jest.Mocked<AzureManagers[K]> };

export function createMockManagers(): MockManagers {
  return {
    sessionManager: {
      verifySession: jest.fn().mockResolvedValue({
        subscriptionId: SUBSCRIPTION_ID,
        expiresOn: new Date(2030, 0, 1),
      }),
    },
    resourceManager: {
      getResourceGroup: jest.fn().mockResolvedValue({ name: "rg1", location: "eastus" }),
      listResourceGroups: jest.fn().mockResolvedValue([{ name: "rg1", location: "eastus" }]),
      checkResourceGroupAccess: jest.fn().mockResolvedValue("readable"),
    },
    computeManager: {
      getVm: jest.fn().mockResolvedValue(undefined),
      listVms: jest.fn().mockResolvedValue([]),
      getDisk: jest.fn().mockResolvedValue(undefined),
      createSnapshot: jest.fn().mockImplementation(async (rg: string, name: string) => ({
        id: armId(rg, "Microsoft.Compute", "snapshots", name),
        name,
      })),
      listSnapshots: jest.fn().mockResolvedValue([]),
      createDiskFromSnapshot: jest.fn().mockImplementation(async (rg: string, name: string) => ({
        id: armId(rg, "Microsoft.Compute", "disks", name),
        name,
      })),
      createVm: jest.fn().mockImplementation(async (rg: string, name: string) => ({
        id: armId(rg, "Microsoft.Compute", "virtualMachines", name),
        name,
        location: "eastus",
        provisioningState: "Succeeded",
      })),
      deleteVm: jest.fn().mockResolvedValue(undefined),
      deleteDisk: jest.fn().mockResolvedValue(undefined),
      deleteSnapshot: jest.fn().mockResolvedValue(undefined),
    },
    networkManager: {
      getNic: jest.fn().mockResolvedValue(undefined),
      getSubnet: jest.fn().mockResolvedValue({ id: SUBNET_ID, name: "default" }),
      getNsg: jest.fn().mockResolvedValue(undefined),
      createNsg: jest.fn().mockImplementation(async (rg: string, name: string) => ({
        id: armId(rg, "Microsoft.Network", "networkSecurityGroups", name),
        name,
      })),
      createNic: jest.fn().mockImplementation(async (rg: string, name: string) => ({
        id: armId(rg, "Microsoft.Network", "networkInterfaces", name),
        name,
      })),
      deleteNic: jest.fn().mockResolvedValue(undefined),
      listVirtualNetworks: jest.fn().mockResolvedValue([]),
    },
    storageManager: {
      listStorageAccounts: jest.fn().mockResolvedValue([]),
      isNameAvailable: jest.fn().mockResolvedValue(true),
      createStorageAccount: jest.fn().mockImplementation(async (rg: string, name: string) => ({
        id: armId(rg, "Microsoft.Storage", "storageAccounts", name),
        name,
        location: "eastus",
        primaryEndpoints: { blob: `https://${name}.blob.core.windows.net/` },
      })),
      deleteStorageAccount: jest.fn().mockResolvedValue(undefined),
    },
  };
}

export function createMockPrompter(): jest.Mocked<ClonePrompter> {
  return {
    confirmPremiumUpgrade: jest.fn().mockResolvedValue(false),
    chooseNsgMode: jest.fn().mockResolvedValue("hardened"),
    confirmReuseDiagnosticsStorage: jest.fn().mockResolvedValue(true),
  };
}

export function createLog(): jest.MockedFunction<CloneLogCallback> {
  return jest.fn();
}
