import { AzureManagers, errorMessage } from "@azvmclone/cloning";
import type { CheckResult, DoctorContext, IDoctorCheck } from "./check.interface";

/**
 * Read access to one resource type, checked by listing it. A failure is
 * reported as a warning: the clone may still work within a narrower scope.
 */
export abstract class ListAccessCheck implements IDoctorCheck {
  abstract readonly id: string;
  abstract readonly name: string;
  /** Plural noun for the listed resources */
  protected abstract readonly noun: string;
  readonly dependsOn = ["session"];

  protected abstract list(managers: AzureManagers, resourceGroup?: string): Promise<unknown[]>;

  async run(context: DoctorContext): Promise<CheckResult> {
    const scope = context.resourceGroup ? ` in ${context.resourceGroup}` : "";
    try {
      const items = await this.list(context.managers(), context.resourceGroup);
      return { name: this.name, status: "pass", message: `${items.length} ${this.noun}${scope}` };
    } catch (error: unknown) {
      return {
        name: this.name,
        status: "warn",
        message: `Cannot list ${this.noun}${scope}: ${errorMessage(error)}`,
        fix: "Grant the Reader role (or a role with list access) on the scope",
      };
    }
  }
}

export class VirtualMachinesCheck extends ListAccessCheck {
  readonly id = "virtual-machines";
  readonly name = "Virtual machines";
  protected readonly noun = "VM(s)";

  protected list(managers: AzureManagers, resourceGroup?: string): Promise<unknown[]> {
    return managers.computeManager.listVms(resourceGroup);
  }
}

export class SnapshotsCheck extends ListAccessCheck {
  readonly id = "snapshots";
  readonly name = "Snapshots";
  protected readonly noun = "snapshot(s)";

  protected list(managers: AzureManagers, resourceGroup?: string): Promise<unknown[]> {
    return managers.computeManager.listSnapshots(resourceGroup);
  }
}

export class VirtualNetworksCheck extends ListAccessCheck {
  readonly id = "virtual-networks";
  readonly name = "Virtual networks";
  protected readonly noun = "VNet(s)";

  protected list(managers: AzureManagers, resourceGroup?: string): Promise<unknown[]> {
    return managers.networkManager.listVirtualNetworks(resourceGroup);
  }
}
