import { createMockManagers, MockManagers } from "../../../../../../cloning/src/__tests__/helpers";
import { createConfig, SUBSCRIPTION_GUID } from "../../../../__tests__/helpers";
import { AzureSdkCheck } from "../azure-sdk.check";
import type { DoctorContext } from "../check.interface";
import { ConfigCheck } from "../config.check";
import { ResourceGroupsCheck } from "../resource-groups.check";
import { SessionCheck } from "../session.check";
import { VirtualMachinesCheck, VirtualNetworksCheck } from "../list-access.check";

function createContext(managers: MockManagers, resourceGroup?: string): DoctorContext {
  return { config: createConfig(), resourceGroup, managers: () => managers };
}

describe("Doctor checks", () => {
  let managers: MockManagers;

  beforeEach(() => {
    jest.clearAllMocks();
    managers = createMockManagers();
  });

  describe("AzureSdkCheck", () => {
    it("should pass when every SDK module resolves", async () => {
      const check = new AzureSdkCheck(() => "/resolved.js");

      await expect(check.run()).resolves.toEqual({
        name: "Azure SDK modules",
        status: "pass",
        message: "5 modules installed",
      });
    });

    it("should name the modules that do not resolve", async () => {
      const check = new AzureSdkCheck((moduleName) => {
        if (moduleName === "@azure/arm-network" || moduleName === "@azure/arm-storage") {
          throw new Error(`Cannot find module '${moduleName}'`);
        }
        return "/resolved.js";
      });

      await expect(check.run()).resolves.toEqual({
        name: "Azure SDK modules",
        status: "fail",
        message: "Missing: @azure/arm-network, @azure/arm-storage",
        fix: "Run: npm install",
      });
    });
  });

  describe("ConfigCheck", () => {
    const check = new ConfigCheck();

    it("should report the credential in use", async () => {
      const result = await check.run(createContext(managers));

      expect(result).toEqual({
        name: "Configuration",
        status: "pass",
        message: `Subscription ${SUBSCRIPTION_GUID} (default credential chain)`,
      });
    });

    it("should recognise a complete service principal", async () => {
      const config = createConfig({
        servicePrincipal: { tenantId: "tenant-1", clientId: "client-1", clientSecret: "test-secret" },
      });

      const result = await check.run({ config, managers: () => managers });

      expect(result.message).toBe(`Subscription ${SUBSCRIPTION_GUID} (service principal)`);
    });

    it("should warn about a partial service principal", async () => {
      const config = createConfig({ servicePrincipal: { clientId: "client-1" } });

      const result = await check.run({ config, managers: () => managers });

      expect(result.status).toBe("warn");
    });
  });

  describe("SessionCheck", () => {
    const check = new SessionCheck();

    it("should report the token expiry", async () => {
      managers.sessionManager.verifySession.mockResolvedValue({
        subscriptionId: "sub-123",
        expiresOn: new Date(Date.UTC(2030, 0, 1, 12, 0, 0)),
      });

      const result = await check.run(createContext(managers));

      expect(result).toEqual({
        name: "Azure session",
        status: "pass",
        message: "Token valid until 2030-01-01T12:00:00.000Z",
      });
    });
  });

  describe("ResourceGroupsCheck", () => {
    const check = new ResourceGroupsCheck();

    it("should count visible resource groups", async () => {
      managers.resourceManager.listResourceGroups.mockResolvedValue([
        { name: "rg1", location: "eastus" },
        { name: "rg2", location: "westus" },
      ]);

      const result = await check.run(createContext(managers));

      expect(result).toEqual({ name: "Resource groups", status: "pass", message: "2 visible" });
    });

    it("should warn when no resource group is visible", async () => {
      managers.resourceManager.listResourceGroups.mockResolvedValue([]);

      const result = await check.run(createContext(managers));

      expect(result.status).toBe("warn");
      expect(result.message).toBe("No resource groups visible");
    });

    it("should fail on a forbidden resource group", async () => {
      managers.resourceManager.checkResourceGroupAccess.mockResolvedValue("forbidden");

      const result = await check.run(createContext(managers, "rg-locked"));

      expect(result).toEqual({
        name: "Resource groups",
        status: "fail",
        message: "No read access to rg-locked",
        fix: "Grant the Reader role on rg-locked",
      });
    });

    it("should fail on a missing resource group", async () => {
      managers.resourceManager.checkResourceGroupAccess.mockResolvedValue("missing");

      const result = await check.run(createContext(managers, "rg-gone"));

      expect(result.status).toBe("fail");
      expect(result.message).toBe("rg-gone not found");
    });
  });

  describe("list access checks", () => {
    it("should count VMs across the subscription", async () => {
      managers.computeManager.listVms.mockResolvedValue([
        { location: "eastus", name: "web01" },
        { location: "eastus", name: "db01" },
      ]);

      const result = await new VirtualMachinesCheck().run(createContext(managers));

      expect(managers.computeManager.listVms).toHaveBeenCalledWith(undefined);
      expect(result.message).toBe("2 VM(s)");
    });

    it("should warn rather than fail when listing is not allowed", async () => {
      managers.networkManager.listVirtualNetworks.mockRejectedValue(new Error("AuthorizationFailed"));

      const result = await new VirtualNetworksCheck().run(createContext(managers, "rg1"));

      expect(result.status).toBe("warn");
      expect(result.message).toBe("Cannot list VNet(s) in rg1: AuthorizationFailed");
    });
  });
});
