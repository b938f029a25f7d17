import type { AzureManagers } from "../azure-manager-factory";
import { attempt, StageResult } from "../result";
import type { CloneLogCallback, ResourceRef } from "../types";

/**
 * Delete the snapshot a successful run used. The cloned disk is independent
 * of it once created.
 */
export async function deleteIntermediateSnapshot(
  managers: Pick<AzureManagers, "computeManager">,
  resourceGroup: string,
  snapshot: ResourceRef,
  log: CloneLogCallback
): Promise<StageResult<void>> {
  const result = await attempt("snapshot-cleanup", () =>
    managers.computeManager.deleteSnapshot(resourceGroup, snapshot.name)
  );
  if (result.ok) {
    log(`Snapshot removed: ${snapshot.name}`, "success");
  } else {
    log(`Could not remove snapshot ${snapshot.name}: ${result.error.message}`, "warn");
  }
  return result;
}
