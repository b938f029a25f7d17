/**
 * Clone Pipeline Context
 *
 * The single value threaded through every pipeline stage. Each stage reads
 * what earlier stages produced and writes its own output; the ledger records
 * every resource created along the way.
 */

import type { VirtualMachine } from "@azure/arm-compute";
import type { AzureManagers } from "../azure-manager-factory";
import { CloneError } from "../errors";
import { ResourceLedger } from "../ledger";
import { formatResourceId, parseResourceId } from "../resource-id";
import type {
  CloneLogCallback,
  CreatedResourceKind,
  NsgAssociation,
  NsgMode,
  ResourceRef,
  SourceVm,
  StorageAccountRef,
  SubnetRef,
} from "../types";

/**
 * Pipeline states, in order. "Failed" is reachable from any non-terminal state.
 */
export type PipelineState =
  | "Init"
  | "SnapshotCreated"
  | "DiskCreated"
  | "NetworkResolved"
  | "NSGResolved"
  | "NICCreated"
  | "DiagStorageResolved"
  | "VMConfigured"
  | "VMCreated"
  | "Failed";

export interface NsgModeChoice {
  /** Name of the source NSG, when the source has one */
  sourceNsgName?: string;
  /** Where the source NSG is bound */
  association: NsgAssociation;
  defaultMode: NsgMode;
}

/**
 * Decisions the pipeline needs from the operator while it runs.
 */
export interface ClonePrompter {
  /**
   * Asked once, only when the source disk is Standard_LRS.
   */
  confirmPremiumUpgrade(currentSku: string): Promise<boolean>;

  chooseNsgMode(choice: NsgModeChoice): Promise<NsgMode>;

  /**
   * Asked when an existing diagnostics storage account is found.
   */
  confirmReuseDiagnosticsStorage(accountName: string): Promise<boolean>;
}

export interface CloneRequest {
  source: SourceVm;
  /** Validated, unused VM name */
  targetName: string;
  targetSize: string;
}

export interface NetworkResolution {
  subnetId: string;
  subnet: SubnetRef;
  /** True when the VNet lives outside the source VM's resource group */
  crossResourceGroup: boolean;
  /** NSG protecting the source NIC, bound to the NIC or to its subnet */
  sourceNsgId?: string;
  nsgAssociation: NsgAssociation;
}

export interface NsgResolution {
  mode: NsgMode;
  nsg: ResourceRef;
  /** True when this run created the NSG */
  created: boolean;
  /** False only when reusing a subnet-level NSG, which the new NIC inherits */
  attachToNic: boolean;
}

export interface DiagnosticsResolution {
  account: StorageAccountRef;
  /** True when an existing account was reused */
  reused: boolean;
}

export interface ClonedDiskRef extends ResourceRef {
  sku: string;
}

export interface CloneContext {
  readonly request: CloneRequest;
  readonly managers: AzureManagers;
  readonly prompter: ClonePrompter;
  readonly log: CloneLogCallback;
  readonly ledger: ResourceLedger;
  /** Value of the createdBy tag */
  readonly createdBy: string;
  /** Clock reading taken once at the start of the run */
  readonly startedAt: Date;
  readonly randomSuffix?: () => number;

  state: PipelineState;
  snapshot?: ResourceRef;
  disk?: ClonedDiskRef;
  network?: NetworkResolution;
  nsg?: NsgResolution;
  nic?: ResourceRef;
  diagnostics?: DiagnosticsResolution;
  vmDefinition?: VirtualMachine;
  vm?: ResourceRef;
}

export interface CreateContextOptions {
  request: CloneRequest;
  managers: AzureManagers;
  prompter: ClonePrompter;
  log: CloneLogCallback;
  createdBy: string;
  startedAt: Date;
  randomSuffix?: () => number;
}

export function createCloneContext(options: CreateContextOptions): CloneContext {
  return {
    ...options,
    ledger: new ResourceLedger(),
    state: "Init",
  };
}

/**
 * Read an output of an earlier stage, failing if that stage has not run.
 */
export function requireOutput<T>(value: T | undefined, what: string): T {
  if (value === undefined) {
    throw new CloneError("PreconditionFailed", `Pipeline stage output missing: ${what}`);
  }
  return value;
}

/**
 * Provenance tags shared by the resources a run creates.
 */
export function provenanceTags(ctx: CloneContext): Record<string, string> {
  return {
    sourceVm: ctx.request.source.name,
    createdBy: ctx.createdBy,
    createdAt: ctx.startedAt.toISOString(),
  };
}

const RESOURCE_TYPES: Record<CreatedResourceKind, { namespace: string; type: string; label: string }> = {
  snapshot: { namespace: "Microsoft.Compute", type: "snapshots", label: "Snapshot" },
  disk: { namespace: "Microsoft.Compute", type: "disks", label: "Disk" },
  nsg: { namespace: "Microsoft.Network", type: "networkSecurityGroups", label: "NSG" },
  nic: { namespace: "Microsoft.Network", type: "networkInterfaces", label: "NIC" },
  storageAccount: { namespace: "Microsoft.Storage", type: "storageAccounts", label: "Storage account" },
  vm: { namespace: "Microsoft.Compute", type: "virtualMachines", label: "VM" },
};

/**
 * Record a resource the provider accepted, in the source resource group.
 *
 * A create call that resolves without an ID has still created the resource,
 * so it is recorded under the ID it must have before the stage fails.
 *
 * @returns The resource ID
 * @throws CloneError with kind "ProviderFailure" when the provider returned no ID
 */
export function recordCreated(
  ctx: CloneContext,
  kind: CreatedResourceKind,
  name: string,
  id: string | undefined
): string {
  const { resourceGroup } = ctx.request.source;
  const { namespace, type, label } = RESOURCE_TYPES[kind];
  const subscriptionId = parseResourceId(ctx.request.source.id).subscriptionId;

  ctx.ledger.record({
    kind,
    id: id ?? formatResourceId(subscriptionId, resourceGroup, namespace, type, name),
    name,
    resourceGroup,
  });
  if (!id) {
    throw new CloneError("ProviderFailure", `${label} '${name}' returned no resource ID`);
  }
  return id;
}
