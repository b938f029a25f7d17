import type { CheckResult, IDoctorCheck } from "./check.interface";

export const AZURE_SDK_MODULES = [
  "@azure/identity",
  "@azure/arm-compute",
  "@azure/arm-network",
  "@azure/arm-storage",
  "@azure/arm-resources",
] as const;

export type ModuleResolver = (moduleName: string) => string;

export class AzureSdkCheck implements IDoctorCheck {
  readonly id = "azure-sdk";
  readonly name = "Azure SDK modules";

  constructor(private readonly resolve: ModuleResolver = (moduleName) => require.resolve(moduleName)) {}

  async run(): Promise<CheckResult> {
    const missing = AZURE_SDK_MODULES.filter((moduleName) => {
      try {
        this.resolve(moduleName);
        return false;
      } catch {
        return true;
      }
    });

    if (missing.length === 0) {
      return {
        name: this.name,
        status: "pass",
        message: `${AZURE_SDK_MODULES.length} modules installed`,
      };
    }
    return {
      name: this.name,
      status: "fail",
      message: `Missing: ${missing.join(", ")}`,
      fix: "Run: npm install",
    };
  }
}
