/**
 * Target Configuration
 *
 * Validates the new VM's name and picks its size.
 */

import type { AzureManagers } from "./azure-manager-factory";
import { CloneError } from "./errors";
import { attempt, StageResult } from "./result";
import type { OsKind, SourceVm } from "./types";

export const TARGET_CONFIGURATION_STAGE = "target-configuration";

export interface VmNameValidationResult {
  valid: boolean;
  errors: string[];
}

/** Windows computer names are limited to 15 characters (NetBIOS). */
const MAX_WINDOWS_NAME_LENGTH = 15;
const MAX_LINUX_NAME_LENGTH = 64;

/**
 * Validate an Azure VM name.
 *
 * Azure VM naming rules:
 * - 1-64 characters (1-15 for Windows, since the name is also the computer name)
 * - Letters, numbers, hyphens, periods and underscores
 * - Must start with a letter or number
 * - Cannot end with a hyphen or period
 */
export function validateVmName(vmName: string, osType: OsKind = "Linux"): VmNameValidationResult {
  const errors: string[] = [];
  const name = vmName.trim();

  if (!name) {
    return { valid: false, errors: ["VM name is required"] };
  }

  const maxLength = osType === "Windows" ? MAX_WINDOWS_NAME_LENGTH : MAX_LINUX_NAME_LENGTH;
  if (name.length > maxLength) {
    errors.push(`VM name must be 1-${maxLength} characters long for ${osType} VMs`);
  }

  if (!/^[a-z0-9]/i.test(name)) {
    errors.push("VM name must start with a letter or number");
  }

  if (/[-.]$/.test(name)) {
    errors.push("VM name cannot end with a hyphen or period");
  }

  if (!/^[a-z0-9._-]+$/i.test(name)) {
    errors.push("VM name can only contain letters, numbers, hyphens, periods and underscores");
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Check that no VM with the candidate name exists in the source resource group.
 *
 * Fails with PreconditionFailed for a malformed name and Conflict for a taken one.
 */
export async function checkTargetName(
  managers: Pick<AzureManagers, "computeManager">,
  source: Pick<SourceVm, "resourceGroup" | "osType">,
  name: string
): Promise<StageResult<string>> {
  return attempt(TARGET_CONFIGURATION_STAGE, async () => {
    const candidate = name.trim();
    const validation = validateVmName(candidate, source.osType);
    if (!validation.valid) {
      throw new CloneError("PreconditionFailed", validation.errors.join("; "));
    }

    const existing = await managers.computeManager.getVm(source.resourceGroup, candidate);
    if (existing) {
      throw new CloneError(
        "Conflict",
        `A VM named '${candidate}' already exists in resource group '${source.resourceGroup}'`
      );
    }

    return candidate;
  });
}

/**
 * Size for the new VM: the requested one, or the source's when none is given.
 * Availability in the region is not checked here; VM creation fails if it is not offered.
 */
export function resolveTargetSize(source: Pick<SourceVm, "size">, requested?: string): string {
  const size = requested?.trim();
  return size ? size : source.size;
}
