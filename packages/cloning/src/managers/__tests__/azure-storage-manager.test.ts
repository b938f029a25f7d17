import { AzureStorageManager } from "../azure-storage-manager";
import type { CloneLogCallback } from "../../types";

// ── Mock SDK Clients ─────────────────────────────────────────────────────

function createMockStorageClient() {
  return {
    storageAccounts: {
      listByResourceGroup: jest.fn(),
      checkNameAvailability: jest.fn(),
      beginCreateAndWait: jest.fn(),
      delete: jest.fn(),
    },
  };
}

function createManager() {
  const storageClient = createMockStorageClient();
  const log: CloneLogCallback = jest.fn();
  const manager = new AzureStorageManager(storageClient as never, log);
  return { manager, storageClient, log };
}

// ── Tests ────────────────────────────────────────────────────────────────

describe("AzureStorageManager", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it("should list storage accounts in the resource group", async () => {
    const { manager, storageClient } = createManager();
    storageClient.storageAccounts.listByResourceGroup.mockReturnValue(
      (async function* () {
        yield { name: "bootdiag000001" };
        yield { name: "appdata" };
      })()
    );

    const accounts = await manager.listStorageAccounts("rg1");

    expect(accounts.map((a) => a.name)).toEqual(["bootdiag000001", "appdata"]);
  });

  it("should check global name availability", async () => {
    const { manager, storageClient } = createManager();
    storageClient.storageAccounts.checkNameAvailability.mockResolvedValue({ nameAvailable: false });

    await expect(manager.isNameAvailable("bootdiag000042")).resolves.toBe(false);
    expect(storageClient.storageAccounts.checkNameAvailability).toHaveBeenCalledWith({
      name: "bootdiag000042",
      type: "Microsoft.Storage/storageAccounts",
    });
  });

  it("should create a Standard_LRS StorageV2 account", async () => {
    const { manager, storageClient } = createManager();
    storageClient.storageAccounts.beginCreateAndWait.mockResolvedValue({
      id: "sa-id",
      name: "bootdiag000042",
    });

    const account = await manager.createStorageAccount("rg1", "bootdiag000042", {
      location: "eastus",
      tags: { purpose: "bootdiagnostics" },
    });

    expect(account.id).toBe("sa-id");
    expect(storageClient.storageAccounts.beginCreateAndWait).toHaveBeenCalledWith(
      "rg1",
      "bootdiag000042",
      {
        location: "eastus",
        sku: { name: "Standard_LRS" },
        kind: "StorageV2",
        tags: { purpose: "bootdiagnostics" },
      }
    );
  });

  it("should treat a missing account as deleted", async () => {
    const { manager, storageClient, log } = createManager();
    storageClient.storageAccounts.delete.mockRejectedValue({ statusCode: 404 });

    await manager.deleteStorageAccount("rg1", "bootdiag000042");

    expect(log).toHaveBeenCalledWith("Storage account not found (skipped): bootdiag000042");
  });

  it("should rethrow other delete errors", async () => {
    const { manager, storageClient } = createManager();
    storageClient.storageAccounts.delete.mockRejectedValue({ statusCode: 409 });

    await expect(manager.deleteStorageAccount("rg1", "bootdiag000042")).rejects.toEqual({
      statusCode: 409,
    });
  });
});
