/**
 * Doctor Check Interface
 */

import type { AzureManagers } from "@azvmclone/cloning";
import type { AzvmcloneConfig } from "../../../config";
import type { ResultStatus } from "../../../interfaces/output.interface";

export type CheckStatus = ResultStatus;

export interface CheckResult {
  name: string;
  status: CheckStatus;
  message: string;
  fix?: string;
}

export interface DoctorContext {
  config: AzvmcloneConfig;
  /** Limits read checks to one resource group */
  resourceGroup?: string;
  /**
   * Azure managers for the configured subscription. Created on first use;
   * throws when no subscription is configured.
   */
  managers(): AzureManagers;
}

export interface IDoctorCheck {
  /** Unique identifier */
  id: string;
  /** Display name */
  name: string;
  /**
   * IDs of checks that must not have failed or been skipped for this one to run.
   */
  dependsOn?: string[];
  run(context: DoctorContext): Promise<CheckResult>;
}
