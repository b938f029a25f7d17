/**
 * Azure Resource ID parsing
 *
 * Resource IDs have the shape
 *   /subscriptions/{sub}/resourceGroups/{rg}/providers/{namespace}/{type}/{name}[/{childType}/{childName}...]
 * Segment keys are matched case-insensitively since Azure does not normalise them.
 */

import { CloneError } from "./errors";
import type { SubnetRef } from "./types";

export interface ParsedResourceId {
  subscriptionId: string;
  resourceGroup: string;
  /** Provider namespace (e.g., "Microsoft.Network") */
  namespace: string;
  /** Resource types from outermost to innermost (e.g., ["virtualNetworks", "subnets"]) */
  types: string[];
  /** Resource names matching `types` */
  names: string[];
}

function invalid(id: string, reason: string): CloneError {
  return new CloneError("InvalidResourceId", `Invalid resource ID "${id}": ${reason}`);
}

/**
 * Parse an ARM resource ID into its components.
 *
 * @throws CloneError with kind "InvalidResourceId" when the ID is malformed
 */
export function parseResourceId(id: string): ParsedResourceId {
  const segments = id.split("/").filter((segment) => segment.length > 0);

  if (segments.length < 8) {
    throw invalid(id, "too few segments");
  }
  if (segments[0].toLowerCase() !== "subscriptions") {
    throw invalid(id, "expected 'subscriptions' segment");
  }
  if (segments[2].toLowerCase() !== "resourcegroups") {
    throw invalid(id, "expected 'resourceGroups' segment");
  }
  if (segments[4].toLowerCase() !== "providers") {
    throw invalid(id, "expected 'providers' segment");
  }

  const typeSegments = segments.slice(6);
  if (typeSegments.length % 2 !== 0) {
    throw invalid(id, "resource type without a name");
  }

  const types: string[] = [];
  const names: string[] = [];
  for (let i = 0; i < typeSegments.length; i += 2) {
    types.push(typeSegments[i]);
    names.push(typeSegments[i + 1]);
  }

  return {
    subscriptionId: segments[1],
    resourceGroup: segments[3],
    namespace: segments[5],
    types,
    names,
  };
}

/**
 * Parse a subnet ID into subscription, resource group, VNet and subnet names.
 *
 * @throws CloneError with kind "InvalidResourceId" when the ID is not a subnet
 */
export function parseSubnetId(id: string): SubnetRef {
  const parsed = parseResourceId(id);

  if (parsed.namespace.toLowerCase() !== "microsoft.network") {
    throw invalid(id, `expected provider Microsoft.Network, got ${parsed.namespace}`);
  }
  if (
    parsed.types.length !== 2 ||
    parsed.types[0].toLowerCase() !== "virtualnetworks" ||
    parsed.types[1].toLowerCase() !== "subnets"
  ) {
    throw invalid(id, "expected virtualNetworks/{vnet}/subnets/{subnet}");
  }

  return {
    subscriptionId: parsed.subscriptionId,
    resourceGroup: parsed.resourceGroup,
    vnetName: parsed.names[0],
    subnetName: parsed.names[1],
  };
}

/**
 * Last segment of a resource ID, which is the resource's own name.
 */
export function resourceNameFromId(id: string): string {
  const segments = id.split("/").filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? "";
}

/**
 * Build the ID of a top-level resource.
 */
export function formatResourceId(
  subscriptionId: string,
  resourceGroup: string,
  namespace: string,
  type: string,
  name: string
): string {
  return `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}/providers/${namespace}/${type}/${name}`;
}

export function sameResourceGroup(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
