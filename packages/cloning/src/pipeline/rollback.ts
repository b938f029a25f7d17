/**
 * Rollback
 *
 * Best-effort removal of everything a failed run created, newest first.
 * NSGs are never removed automatically: an NSG may be shared or pre-existing.
 * Deletion failures are logged and reported, never thrown.
 */

import type { AzureManagers } from "../azure-manager-factory";
import { errorMessage } from "../errors";
import type { ResourceLedger } from "../ledger";
import type { CloneLogCallback, CreatedResource } from "../types";

export interface RollbackFailure {
  resource: CreatedResource;
  error: string;
}

export interface RollbackReport {
  deleted: CreatedResource[];
  failed: RollbackFailure[];
  /** Resources deliberately left in place */
  retained: CreatedResource[];
}

async function deleteResource(managers: AzureManagers, resource: CreatedResource): Promise<void> {
  const { resourceGroup, name } = resource;
  switch (resource.kind) {
    case "vm":
      return managers.computeManager.deleteVm(resourceGroup, name);
    case "nic":
      return managers.networkManager.deleteNic(resourceGroup, name);
    case "disk":
      return managers.computeManager.deleteDisk(resourceGroup, name);
    case "snapshot":
      return managers.computeManager.deleteSnapshot(resourceGroup, name);
    case "storageAccount":
      return managers.storageManager.deleteStorageAccount(resourceGroup, name);
    case "nsg":
      throw new Error("NSGs are not removed by rollback");
  }
}

export async function rollback(
  ledger: ResourceLedger,
  managers: AzureManagers,
  log: CloneLogCallback
): Promise<RollbackReport> {
  const report: RollbackReport = { deleted: [], failed: [], retained: [] };

  log(`Rolling back ${ledger.size} created resource(s)...`, "warn");

  // Strictly newest first. The boot diagnostics account is created after the
  // NIC, so it goes before the NIC; nothing references it once the VM is gone.
  for (const resource of ledger.reversed()) {
    if (resource.kind === "nsg") {
      log(`  Leaving NSG in place: ${resource.name} (delete it manually if unused)`, "warn");
      report.retained.push(resource);
      continue;
    }

    try {
      await deleteResource(managers, resource);
      report.deleted.push(resource);
      log(`  Removed ${resource.kind}: ${resource.name}`);
    } catch (error: unknown) {
      const message = errorMessage(error);
      report.failed.push({ resource, error: message });
      log(`  Failed to remove ${resource.kind} ${resource.name}: ${message}`, "error");
    }
  }

  if (report.failed.length === 0) {
    log("Rollback complete", "success");
  } else {
    log(`Rollback finished with ${report.failed.length} failure(s); remove those resources manually`, "warn");
  }

  return report;
}
