import { hasPartialServicePrincipal, usesServicePrincipal } from "../../../config";
import type { CheckResult, DoctorContext, IDoctorCheck } from "./check.interface";

export class ConfigCheck implements IDoctorCheck {
  readonly id = "config";
  readonly name = "Configuration";

  async run(context: DoctorContext): Promise<CheckResult> {
    const { config } = context;

    if (!config.subscriptionId) {
      return {
        name: this.name,
        status: "fail",
        message: "No subscription configured",
        fix: "Set AZURE_SUBSCRIPTION_ID or pass --subscription <id>",
      };
    }

    if (hasPartialServicePrincipal(config)) {
      return {
        name: this.name,
        status: "warn",
        message: `Subscription ${config.subscriptionId}; service principal variables incomplete, using the default credential chain`,
        fix: "Set all of AZURE_TENANT_ID, AZURE_CLIENT_ID and AZURE_CLIENT_SECRET, or none",
      };
    }

    const auth = usesServicePrincipal(config) ? "service principal" : "default credential chain";
    return {
      name: this.name,
      status: "pass",
      message: `Subscription ${config.subscriptionId} (${auth})`,
    };
  }
}
