/**
 * Source Resolution
 *
 * Looks up the VM to clone together with its OS disk and primary NIC.
 * Read-only: nothing here creates, updates or deletes a resource.
 */

import type { NetworkInterfaceReference } from "@azure/arm-compute";
import type { NetworkInterface } from "@azure/arm-network";
import type { AzureManagers } from "./azure-manager-factory";
import { CloneError } from "./errors";
import { parseResourceId } from "./resource-id";
import { attempt, StageResult } from "./result";
import type { CloneLogCallback, NicInfo, OsDiskInfo, OsKind, SourceVm } from "./types";

export const SOURCE_RESOLUTION_STAGE = "source-resolution";

type SourceManagers = Pick<AzureManagers, "resourceManager" | "computeManager" | "networkManager">;

/**
 * Choose the NIC to clone. The NIC flagged primary wins; a VM with a single
 * NIC has it as primary implicitly.
 */
export function selectPrimaryNic(
  nics: NetworkInterfaceReference[],
  log: CloneLogCallback
): NetworkInterfaceReference | undefined {
  if (nics.length === 0) {
    return undefined;
  }
  if (nics.length === 1) {
    return nics[0];
  }

  const primary = nics.find((nic) => nic.primary === true);
  if (primary) {
    return primary;
  }

  log(`  VM has ${nics.length} NICs and none is marked primary; using the first`, "warn");
  return nics[0];
}

function primarySubnetId(nic: NetworkInterface): string | undefined {
  const configs = nic.ipConfigurations ?? [];
  const config = configs.find((c) => c.primary === true) ?? configs[0];
  return config?.subnet?.id;
}

/**
 * Resolve the source VM with its OS disk and primary NIC.
 *
 * Fails with NotFound when the resource group, VM, disk or NIC is missing and
 * with PreconditionFailed when the VM has no NIC, no managed OS disk or no subnet.
 */
export async function resolveSourceVm(
  managers: SourceManagers,
  resourceGroup: string,
  vmName: string,
  log: CloneLogCallback
): Promise<StageResult<SourceVm>> {
  return attempt(SOURCE_RESOLUTION_STAGE, async () => {
    const { resourceManager, computeManager, networkManager } = managers;

    const group = await resourceManager.getResourceGroup(resourceGroup);
    if (!group) {
      throw new CloneError("NotFound", `Resource group '${resourceGroup}' not found`);
    }

    const vm = await computeManager.getVm(resourceGroup, vmName);
    if (!vm || !vm.id) {
      throw new CloneError("NotFound", `VM '${vmName}' not found in resource group '${resourceGroup}'`);
    }

    const size = vm.hardwareProfile?.vmSize;
    if (!size) {
      throw new CloneError("PreconditionFailed", `VM '${vmName}' reports no size`);
    }

    // ── OS disk ──
    const osDiskRef = vm.storageProfile?.osDisk;
    const diskId = osDiskRef?.managedDisk?.id;
    if (!diskId) {
      throw new CloneError(
        "PreconditionFailed",
        `VM '${vmName}' has no managed OS disk; unmanaged disks cannot be snapshotted`
      );
    }
    const diskRef = parseResourceId(diskId);
    const diskName = diskRef.names[diskRef.names.length - 1];
    const disk = await computeManager.getDisk(diskRef.resourceGroup, diskName);
    if (!disk || !disk.id) {
      throw new CloneError("NotFound", `OS disk '${diskName}' of VM '${vmName}' not found`);
    }

    let osType: OsKind;
    const reportedOsType = osDiskRef?.osType ?? disk.osType;
    if (reportedOsType === "Windows" || reportedOsType === "Linux") {
      osType = reportedOsType;
    } else {
      log(`  OS type of '${vmName}' not reported; assuming Linux`, "warn");
      osType = "Linux";
    }

    const osDisk: OsDiskInfo = {
      id: disk.id,
      name: disk.name ?? diskName,
      sku: disk.sku?.name ?? "Standard_LRS",
      sizeGb: disk.diskSizeGB,
      diskState: disk.diskState,
    };

    // ── Primary NIC ──
    const nicRef = selectPrimaryNic(vm.networkProfile?.networkInterfaces ?? [], log);
    if (!nicRef?.id) {
      throw new CloneError("PreconditionFailed", `VM '${vmName}' has no network interface`);
    }
    const parsedNic = parseResourceId(nicRef.id);
    const nicName = parsedNic.names[parsedNic.names.length - 1];
    const nic = await networkManager.getNic(parsedNic.resourceGroup, nicName);
    if (!nic || !nic.id) {
      throw new CloneError("NotFound", `Network interface '${nicName}' of VM '${vmName}' not found`);
    }

    const subnetId = primarySubnetId(nic);
    if (!subnetId) {
      throw new CloneError(
        "PreconditionFailed",
        `Network interface '${nicName}' is not bound to a subnet`
      );
    }

    const nicInfo: NicInfo = {
      id: nic.id,
      name: nic.name ?? nicName,
      resourceGroup: parsedNic.resourceGroup,
      subnetId,
      nsgId: nic.networkSecurityGroup?.id,
    };

    return {
      id: vm.id,
      name: vm.name ?? vmName,
      resourceGroup,
      location: vm.location,
      size,
      osType,
      osDisk,
      nic: nicInfo,
    };
  });
}
