import { errorMessage } from "@azvmclone/cloning";
import type { CheckResult, DoctorContext, IDoctorCheck } from "./check.interface";

export class SessionCheck implements IDoctorCheck {
  readonly id = "session";
  readonly name = "Azure session";
  readonly dependsOn = ["azure-sdk", "config"];

  async run(context: DoctorContext): Promise<CheckResult> {
    try {
      const session = await context.managers().sessionManager.verifySession();
      return {
        name: this.name,
        status: "pass",
        message: `Token valid until ${session.expiresOn.toISOString()}`,
      };
    } catch (error: unknown) {
      return {
        name: this.name,
        status: "fail",
        message: errorMessage(error),
        fix: "Run 'az login', or set AZURE_TENANT_ID, AZURE_CLIENT_ID and AZURE_CLIENT_SECRET",
      };
    }
  }
}
