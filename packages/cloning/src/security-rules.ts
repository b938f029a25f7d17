/**
 * NSG rule sets for cloned VMs.
 */

import type { SecurityRule } from "@azure/arm-network";
import type { OsKind, SecurityRuleSpec } from "./types";

export const SSH_PORT = 22;
export const RDP_PORT = 3389;

/** Ports blocked from the Internet on every hardened NSG (SSH, RDP, WinRM HTTP/HTTPS). */
export const MANAGEMENT_PORTS = [22, 3389, 5985, 5986] as const;

export const ALLOW_MANAGEMENT_PRIORITY = 100;
export const DENY_INTERNET_PRIORITY = 4000;

export function managementPort(osType: OsKind): number {
  return osType === "Windows" ? RDP_PORT : SSH_PORT;
}

/**
 * Rules for a freshly hardened NSG.
 *
 * Remote management (RDP on Windows, SSH otherwise) is reachable from inside
 * the virtual network only, and every management port is denied from the Internet.
 */
export function getHardenedSecurityRules(osType: OsKind): SecurityRuleSpec[] {
  const protocolName = osType === "Windows" ? "RDP" : "SSH";

  return [
    {
      name: `Allow-${protocolName}-VNet`,
      description: `Allow ${protocolName} from within the virtual network`,
      priority: ALLOW_MANAGEMENT_PRIORITY,
      direction: "Inbound",
      access: "Allow",
      protocol: "Tcp",
      sourceAddressPrefix: "VirtualNetwork",
      sourcePortRange: "*",
      destinationAddressPrefix: "*",
      destinationPortRange: String(managementPort(osType)),
    },
    {
      name: "Deny-Management-Internet",
      description: "Deny management ports from the Internet",
      priority: DENY_INTERNET_PRIORITY,
      direction: "Inbound",
      access: "Deny",
      protocol: "Tcp",
      sourceAddressPrefix: "Internet",
      sourcePortRange: "*",
      destinationAddressPrefix: "*",
      destinationPortRanges: MANAGEMENT_PORTS.map(String),
    },
  ];
}

function nonEmpty(values: string[] | undefined): string[] | undefined {
  return values && values.length > 0 ? values : undefined;
}

/**
 * Copy the user-defined rules of an existing NSG. Default rules are not copied;
 * Azure adds them to every NSG.
 *
 * Rules missing a name, priority, direction or access are skipped.
 */
export function copySecurityRules(rules: SecurityRule[] | undefined): SecurityRuleSpec[] {
  const copied: SecurityRuleSpec[] = [];

  for (const rule of rules ?? []) {
    if (!rule.name || rule.priority === undefined || !rule.direction || !rule.access) {
      continue;
    }
    copied.push({
      name: rule.name,
      description: rule.description,
      priority: rule.priority,
      direction: rule.direction === "Outbound" ? "Outbound" : "Inbound",
      access: rule.access === "Deny" ? "Deny" : "Allow",
      protocol: rule.protocol ?? "*",
      sourceAddressPrefix: rule.sourceAddressPrefix,
      sourceAddressPrefixes: nonEmpty(rule.sourceAddressPrefixes),
      sourcePortRange: rule.sourcePortRange,
      sourcePortRanges: nonEmpty(rule.sourcePortRanges),
      destinationAddressPrefix: rule.destinationAddressPrefix,
      destinationAddressPrefixes: nonEmpty(rule.destinationAddressPrefixes),
      destinationPortRange: rule.destinationPortRange,
      destinationPortRanges: nonEmpty(rule.destinationPortRanges),
    });
  }

  return copied;
}

/**
 * Convert a rule definition to the SDK shape, omitting unset fields.
 */
export function toSdkSecurityRule(rule: SecurityRuleSpec): SecurityRule {
  const sdkRule: SecurityRule = {
    name: rule.name,
    priority: rule.priority,
    direction: rule.direction,
    access: rule.access,
    protocol: rule.protocol,
  };

  if (rule.description !== undefined) sdkRule.description = rule.description;
  if (rule.sourceAddressPrefix !== undefined) sdkRule.sourceAddressPrefix = rule.sourceAddressPrefix;
  if (rule.sourceAddressPrefixes) sdkRule.sourceAddressPrefixes = rule.sourceAddressPrefixes;
  if (rule.sourcePortRange !== undefined) sdkRule.sourcePortRange = rule.sourcePortRange;
  if (rule.sourcePortRanges) sdkRule.sourcePortRanges = rule.sourcePortRanges;
  if (rule.destinationAddressPrefix !== undefined) {
    sdkRule.destinationAddressPrefix = rule.destinationAddressPrefix;
  }
  if (rule.destinationAddressPrefixes) {
    sdkRule.destinationAddressPrefixes = rule.destinationAddressPrefixes;
  }
  if (rule.destinationPortRange !== undefined) sdkRule.destinationPortRange = rule.destinationPortRange;
  if (rule.destinationPortRanges) sdkRule.destinationPortRanges = rule.destinationPortRanges;

  return sdkRule;
}
