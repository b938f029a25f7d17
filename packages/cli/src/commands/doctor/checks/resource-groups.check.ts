import { errorMessage, type ResourceGroupAccess } from "@azvmclone/cloning";
import type { CheckResult, DoctorContext, IDoctorCheck } from "./check.interface";

/**
 * Resource group read access: the named group when one is given, otherwise
 * every group in the subscription.
 */
export class ResourceGroupsCheck implements IDoctorCheck {
  readonly id = "resource-groups";
  readonly name = "Resource groups";
  readonly dependsOn = ["session"];

  async run(context: DoctorContext): Promise<CheckResult> {
    try {
      const { resourceManager } = context.managers();
      if (context.resourceGroup) {
        const access = await resourceManager.checkResourceGroupAccess(context.resourceGroup);
        return this.checkOne(context.resourceGroup, access);
      }

      const groups = await resourceManager.listResourceGroups();
      if (groups.length === 0) {
        return {
          name: this.name,
          status: "warn",
          message: "No resource groups visible",
          fix: "Check the subscription ID and your role assignments",
        };
      }
      return { name: this.name, status: "pass", message: `${groups.length} visible` };
    } catch (error: unknown) {
      return {
        name: this.name,
        status: "fail",
        message: errorMessage(error),
        fix: "Grant the Reader role on the subscription or resource group",
      };
    }
  }

  private checkOne(name: string, access: ResourceGroupAccess): CheckResult {
    switch (access) {
      case "readable":
        return { name: this.name, status: "pass", message: `${name} readable` };
      case "forbidden":
        return {
          name: this.name,
          status: "fail",
          message: `No read access to ${name}`,
          fix: `Grant the Reader role on ${name}`,
        };
      case "missing":
        return { name: this.name, status: "fail", message: `${name} not found` };
    }
  }
}
