/**
 * Doctor Command Handler
 *
 * Thin handler that wires components for the doctor command.
 */

import type { AzureManagers, CloneLogCallback } from "@azvmclone/cloning";
import type { AzvmcloneConfig } from "../../config";
import type { IOutputService } from "../../interfaces/output.interface";
import type { ManagersProvider } from "../clone/clone.handler";
import { CheckRegistry } from "./check-registry";
import { CheckRunner } from "./check-runner";
import type { DoctorContext } from "./checks/check.interface";

export class DoctorHandler {
  private readonly runner: CheckRunner;

  /**
   * @param registry - Optional check registry (allows injection for testing)
   */
  constructor(
    private readonly output: IOutputService,
    private readonly createManagers: ManagersProvider,
    registry?: CheckRegistry
  ) {
    this.runner = new CheckRunner(registry ?? new CheckRegistry(), output);
  }

  /**
   * Execute the doctor command.
   * @returns True when no check failed
   */
  async execute(config: AzvmcloneConfig, resourceGroup?: string): Promise<boolean> {
    this.output.header("azvmclone doctor", "🔧");
    this.output.newline();
    this.output.dim("Checking Azure environment...");
    this.output.newline();

    this.output.startSpinner("Running diagnostics...");
    const results = await this.runner.runAll(this.createContext(config, resourceGroup));
    this.output.stopSpinner();

    this.runner.displayResults(results);
    return this.runner.getSummary(results).fail === 0;
  }

  private createContext(config: AzvmcloneConfig, resourceGroup?: string): DoctorContext {
    let managers: AzureManagers | undefined;
    // Manager logs would interleave with the check list.
    const quiet: CloneLogCallback = () => undefined;

    return {
      config,
      resourceGroup,
      managers: () => {
        if (!config.subscriptionId) {
          throw new Error("No subscription configured");
        }
        managers ??= this.createManagers(config.subscriptionId, config, quiet);
        return managers;
      },
    };
  }
}
