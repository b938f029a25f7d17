/**
 * Check Registry
 *
 * Holds the doctor checks in run order.
 */

import type { IDoctorCheck } from "./checks/check.interface";
import { AzureSdkCheck } from "./checks/azure-sdk.check";
import { ConfigCheck } from "./checks/config.check";
import { SessionCheck } from "./checks/session.check";
import { ResourceGroupsCheck } from "./checks/resource-groups.check";
import {
  SnapshotsCheck,
  VirtualMachinesCheck,
  VirtualNetworksCheck,
} from "./checks/list-access.check";

export class CheckRegistry {
  private checks: Map<string, IDoctorCheck> = new Map();

  /**
   * Create a registry.
   * @param registerDefaults - If true, registers built-in checks. Set to false for testing.
   */
  constructor(registerDefaults: boolean = true) {
    if (registerDefaults) {
      this.registerDefaultChecks();
    }
  }

  /**
   * Create a registry with specific checks (for testing).
   */
  static withChecks(checks: IDoctorCheck[]): CheckRegistry {
    const registry = new CheckRegistry(false);
    for (const check of checks) {
      registry.register(check);
    }
    return registry;
  }

  register(check: IDoctorCheck): void {
    this.checks.set(check.id, check);
  }

  unregister(checkId: string): void {
    this.checks.delete(checkId);
  }

  getCheck(id: string): IDoctorCheck | undefined {
    return this.checks.get(id);
  }

  /**
   * All checks, in registration order.
   */
  getChecks(): IDoctorCheck[] {
    return Array.from(this.checks.values());
  }

  private registerDefaultChecks(): void {
    // Local environment
    this.register(new AzureSdkCheck());
    this.register(new ConfigCheck());

    // Azure
    this.register(new SessionCheck());
    this.register(new ResourceGroupsCheck());
    this.register(new VirtualMachinesCheck());
    this.register(new SnapshotsCheck());
    this.register(new VirtualNetworksCheck());
  }
}
