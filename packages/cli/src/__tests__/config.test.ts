import { CloneError } from "@azvmclone/cloning";
import { hasPartialServicePrincipal, loadConfig, usesServicePrincipal } from "../config";
import { SUBSCRIPTION_GUID } from "./helpers";

describe("loadConfig", () => {
  it("should read the subscription and service principal from the environment", () => {
    const config = loadConfig({
      AZURE_SUBSCRIPTION_ID: SUBSCRIPTION_GUID,
      AZURE_TENANT_ID: "tenant-1",
      AZURE_CLIENT_ID: "client-1",
      AZURE_CLIENT_SECRET: "test-secret",
      AZVMCLONE_CREATED_BY: "ops-team",
    });

    expect(config).toEqual({
      subscriptionId: SUBSCRIPTION_GUID,
      servicePrincipal: { tenantId: "tenant-1", clientId: "client-1", clientSecret: "test-secret" },
      createdBy: "ops-team",
    });
    expect(usesServicePrincipal(config)).toBe(true);
    expect(hasPartialServicePrincipal(config)).toBe(false);
  });

  it("should prefer the subscription flag over the environment", () => {
    const config = loadConfig(
      { AZURE_SUBSCRIPTION_ID: "99999999-8888-7777-6666-555555555555" },
      { subscriptionId: SUBSCRIPTION_GUID }
    );

    expect(config.subscriptionId).toBe(SUBSCRIPTION_GUID);
  });

  it("should treat blank values as unset", () => {
    const config = loadConfig({ AZURE_SUBSCRIPTION_ID: "  ", AZURE_CLIENT_ID: "" });

    expect(config.subscriptionId).toBeUndefined();
    expect(config.servicePrincipal.clientId).toBeUndefined();
  });

  it("should fall back to the login user, then a fixed name, for createdBy", () => {
    expect(loadConfig({ USER: "alex" }).createdBy).toBe("alex");
    expect(loadConfig({ USERNAME: "sam" }).createdBy).toBe("sam");
    expect(loadConfig({}).createdBy).toBe("azvmclone");
  });

  it("should reject a malformed subscription ID", () => {
    const load = () => loadConfig({ AZURE_SUBSCRIPTION_ID: "not-a-guid" });

    expect(load).toThrow(CloneError);
    expect(load).toThrow("Invalid configuration: subscriptionId: Subscription ID must be a GUID");
  });

  it("should flag an incomplete service principal", () => {
    const config = loadConfig({ AZURE_TENANT_ID: "tenant-1", AZURE_CLIENT_ID: "client-1" });

    expect(usesServicePrincipal(config)).toBe(false);
    expect(hasPartialServicePrincipal(config)).toBe(true);
  });
});
