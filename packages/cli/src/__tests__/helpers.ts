import type { AzvmcloneConfig } from "../config";
import type { IOutputService } from "../interfaces/output.interface";
import type { IClonePrompts, VmChoice } from "../interfaces/prompts.interface";

export const SUBSCRIPTION_GUID = "11111111-2222-3333-4444-555555555555";

export function createConfig(overrides: Partial<AzvmcloneConfig> = {}): AzvmcloneConfig {
  return {
    subscriptionId: SUBSCRIPTION_GUID,
    servicePrincipal: {},
    createdBy: "tester",
    ...overrides,
  };
}

export function createMockOutput(): jest.Mocked<IOutputService> {
  return {
    header: jest.fn(),
    info: jest.fn(),
    success: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    dim: jest.fn(),
    newline: jest.fn(),
    table: jest.fn(),
    result: jest.fn(),
    startSpinner: jest.fn(),
    succeedSpinner: jest.fn(),
    failSpinner: jest.fn(),
    stopSpinner: jest.fn(),
  };
}

/**
 * Prompts that accept every default: the offered name and size, go ahead
 * with the clone, keep the snapshot, hardened NSG, reuse diagnostics storage.
 */
export function createMockPrompts(): jest.Mocked<IClonePrompts> {
  return {
    selectResourceGroup: jest.fn().mockImplementation(async (groups: string[]) => groups[0]),
    selectVm: jest.fn().mockImplementation(async (vms: VmChoice[]) => vms[0].name),
    inputVmName: jest.fn().mockImplementation(async (defaultName: string) => defaultName),
    inputVmSize: jest.fn().mockImplementation(async (defaultSize: string) => defaultSize),
    confirmClone: jest.fn().mockResolvedValue(true),
    confirmSnapshotCleanup: jest.fn().mockResolvedValue(false),
    confirmPremiumUpgrade: jest.fn().mockResolvedValue(false),
    chooseNsgMode: jest.fn().mockResolvedValue("hardened"),
    confirmReuseDiagnosticsStorage: jest.fn().mockResolvedValue(true),
  };
}
