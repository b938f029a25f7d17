import { AzureComputeManager } from "../azure-compute-manager";
import type { CloneLogCallback } from "../../types";

// ── Mock SDK Clients ─────────────────────────────────────────────────────

function pages<T>(...items: T[]): AsyncIterable<T> {
  return (async function* () {
    yield* items;
  })();
}

function createMockComputeClient() {
  return {
    virtualMachines: {
      get: jest.fn(),
      list: jest.fn(),
      listAll: jest.fn(),
      beginCreateOrUpdateAndWait: jest.fn(),
      beginDeleteAndWait: jest.fn(),
    },
    disks: {
      get: jest.fn(),
      beginCreateOrUpdateAndWait: jest.fn(),
      beginDeleteAndWait: jest.fn(),
    },
    snapshots: {
      list: jest.fn(),
      listByResourceGroup: jest.fn(),
      beginCreateOrUpdateAndWait: jest.fn(),
      beginDeleteAndWait: jest.fn(),
    },
  };
}

function createManager() {
  const computeClient = createMockComputeClient();
  const log: CloneLogCallback = jest.fn();
  const manager = new AzureComputeManager(computeClient as never, log);
  return { manager, computeClient, log };
}

// ── Tests ────────────────────────────────────────────────────────────────

describe("AzureComputeManager", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe("getVm", () => {
    it("should return the VM", async () => {
      const { manager, computeClient } = createManager();
      computeClient.virtualMachines.get.mockResolvedValue({ id: "vm-id", name: "web01" });

      const vm = await manager.getVm("rg1", "web01");

      expect(vm).toEqual({ id: "vm-id", name: "web01" });
      expect(computeClient.virtualMachines.get).toHaveBeenCalledWith("rg1", "web01");
    });

    it("should return undefined on 404", async () => {
      const { manager, computeClient } = createManager();
      computeClient.virtualMachines.get.mockRejectedValue({ statusCode: 404 });

      await expect(manager.getVm("rg1", "ghost")).resolves.toBeUndefined();
    });

    it("should rethrow other errors", async () => {
      const { manager, computeClient } = createManager();
      computeClient.virtualMachines.get.mockRejectedValue({ statusCode: 500 });

      await expect(manager.getVm("rg1", "web01")).rejects.toEqual({ statusCode: 500 });
    });
  });

  describe("listVms", () => {
    it("should list VMs in a resource group", async () => {
      const { manager, computeClient } = createManager();
      computeClient.virtualMachines.list.mockReturnValue(pages({ name: "a" }, { name: "b" }));

      const vms = await manager.listVms("rg1");

      expect(vms).toEqual([{ name: "a" }, { name: "b" }]);
      expect(computeClient.virtualMachines.listAll).not.toHaveBeenCalled();
    });

    it("should list VMs across the subscription without a resource group", async () => {
      const { manager, computeClient } = createManager();
      computeClient.virtualMachines.listAll.mockReturnValue(pages({ name: "a" }));

      await expect(manager.listVms()).resolves.toEqual([{ name: "a" }]);
    });
  });

  describe("createSnapshot", () => {
    it("should copy the source disk", async () => {
      const { manager, computeClient } = createManager();
      computeClient.snapshots.beginCreateOrUpdateAndWait.mockResolvedValue({
        id: "snap-id",
        name: "snap",
      });

      const snapshot = await manager.createSnapshot("rg1", "snap", {
        location: "eastus",
        sourceDiskId: "disk-id",
        sku: "Standard_LRS",
        tags: { sourceVm: "web01" },
      });

      expect(snapshot.id).toBe("snap-id");
      expect(computeClient.snapshots.beginCreateOrUpdateAndWait).toHaveBeenCalledWith("rg1", "snap", {
        location: "eastus",
        sku: { name: "Standard_LRS" },
        creationData: { createOption: "Copy", sourceResourceId: "disk-id" },
        tags: { sourceVm: "web01" },
      });
    });
  });

  describe("createDiskFromSnapshot", () => {
    it("should copy the snapshot with the requested SKU and OS type", async () => {
      const { manager, computeClient } = createManager();
      computeClient.disks.beginCreateOrUpdateAndWait.mockResolvedValue({ id: "disk-id" });

      await manager.createDiskFromSnapshot("rg1", "web02-osdisk", {
        location: "eastus",
        snapshotId: "snap-id",
        sku: "Premium_LRS",
        osType: "Windows",
      });

      expect(computeClient.disks.beginCreateOrUpdateAndWait).toHaveBeenCalledWith(
        "rg1",
        "web02-osdisk",
        {
          location: "eastus",
          sku: { name: "Premium_LRS" },
          osType: "Windows",
          creationData: { createOption: "Copy", sourceResourceId: "snap-id" },
          tags: undefined,
        }
      );
    });
  });

  describe("listSnapshots", () => {
    it("should list snapshots in a resource group", async () => {
      const { manager, computeClient } = createManager();
      computeClient.snapshots.listByResourceGroup.mockReturnValue(pages({ name: "s1" }));

      await expect(manager.listSnapshots("rg1")).resolves.toEqual([{ name: "s1" }]);
      expect(computeClient.snapshots.listByResourceGroup).toHaveBeenCalledWith("rg1");
    });
  });

  describe("delete operations", () => {
    it("should delete a VM", async () => {
      const { manager, computeClient, log } = createManager();
      computeClient.virtualMachines.beginDeleteAndWait.mockResolvedValue(undefined);

      await manager.deleteVm("rg1", "web02");

      expect(computeClient.virtualMachines.beginDeleteAndWait).toHaveBeenCalledWith("rg1", "web02");
      expect(log).toHaveBeenCalledWith("VM deleted: web02");
    });

    it("should treat an already deleted disk as success", async () => {
      const { manager, computeClient, log } = createManager();
      computeClient.disks.beginDeleteAndWait.mockRejectedValue({ statusCode: 404 });

      await expect(manager.deleteDisk("rg1", "web02-osdisk")).resolves.toBeUndefined();
      expect(log).toHaveBeenCalledWith("Disk not found (skipped): web02-osdisk");
    });

    it("should rethrow snapshot delete failures", async () => {
      const { manager, computeClient } = createManager();
      computeClient.snapshots.beginDeleteAndWait.mockRejectedValue(new Error("locked"));

      await expect(manager.deleteSnapshot("rg1", "snap")).rejects.toThrow("locked");
    });
  });
});
