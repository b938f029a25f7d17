import { CloneError } from "../errors";
import {
  formatResourceId,
  parseResourceId,
  parseSubnetId,
  resourceNameFromId,
  sameResourceGroup,
} from "../resource-id";
import { SOURCE_DISK_ID, SUBNET_ID } from "./helpers";

describe("parseResourceId", () => {
  it("should split a top-level resource ID", () => {
    expect(parseResourceId(SOURCE_DISK_ID)).toEqual({
      subscriptionId: "sub-123",
      resourceGroup: "rg1",
      namespace: "Microsoft.Compute",
      types: ["disks"],
      names: ["osdisk-web01"],
    });
  });

  it("should split a child resource ID", () => {
    const parsed = parseResourceId(SUBNET_ID);
    expect(parsed.types).toEqual(["virtualNetworks", "subnets"]);
    expect(parsed.names).toEqual(["vnet1", "default"]);
  });

  it("should match segment keys case-insensitively", () => {
    const parsed = parseResourceId(
      "/SUBSCRIPTIONS/sub-123/resourcegroups/RG-Mixed/PROVIDERS/Microsoft.Network/networkInterfaces/nic1"
    );
    expect(parsed.resourceGroup).toBe("RG-Mixed");
    expect(parsed.names).toEqual(["nic1"]);
  });

  it("should reject an ID with too few segments", () => {
    expect(() => parseResourceId("/subscriptions/sub-123/resourceGroups/rg1")).toThrow(
      'Invalid resource ID "/subscriptions/sub-123/resourceGroups/rg1": too few segments'
    );
  });

  it("should reject an ID missing the providers segment", () => {
    expect(() =>
      parseResourceId("/subscriptions/sub-123/resourceGroups/rg1/things/Microsoft.Compute/disks/d1")
    ).toThrow("expected 'providers' segment");
  });

  it("should reject a resource type without a name", () => {
    expect(() =>
      parseResourceId(
        "/subscriptions/sub-123/resourceGroups/rg1/providers/Microsoft.Network/virtualNetworks/vnet1/subnets"
      )
    ).toThrow("resource type without a name");
  });

  it("should throw CloneError with kind InvalidResourceId", () => {
    let caught: unknown;
    try {
      parseResourceId("not-an-id");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CloneError);
    expect(caught).toMatchObject({ kind: "InvalidResourceId" });
  });
});

describe("parseSubnetId", () => {
  it("should return the subnet components", () => {
    expect(parseSubnetId(SUBNET_ID)).toEqual({
      subscriptionId: "sub-123",
      resourceGroup: "rg1",
      vnetName: "vnet1",
      subnetName: "default",
    });
  });

  it("should reject a non-network provider", () => {
    expect(() => parseSubnetId(SOURCE_DISK_ID)).toThrow(
      "expected provider Microsoft.Network, got Microsoft.Compute"
    );
  });

  it("should reject a network resource that is not a subnet", () => {
    expect(() =>
      parseSubnetId(
        "/subscriptions/sub-123/resourceGroups/rg1/providers/Microsoft.Network/networkInterfaces/nic1"
      )
    ).toThrow("expected virtualNetworks/{vnet}/subnets/{subnet}");
  });
});

describe("resource ID helpers", () => {
  it("should read the resource name from the last segment", () => {
    expect(resourceNameFromId(SUBNET_ID)).toBe("default");
    expect(resourceNameFromId(`${SOURCE_DISK_ID}/`)).toBe("osdisk-web01");
  });

  it("should build an ID that parses back to its parts", () => {
    const id = formatResourceId("sub-123", "rg1", "Microsoft.Compute", "disks", "web02-osdisk");

    expect(id).toBe(
      "/subscriptions/sub-123/resourceGroups/rg1/providers/Microsoft.Compute/disks/web02-osdisk"
    );
    expect(parseResourceId(id)).toMatchObject({ resourceGroup: "rg1", types: ["disks"], names: ["web02-osdisk"] });
  });

  it("should compare resource groups case-insensitively", () => {
    expect(sameResourceGroup("RG1", "rg1")).toBe(true);
    expect(sameResourceGroup("rg1", "rg-network")).toBe(false);
  });
});
