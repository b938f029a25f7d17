/**
 * Clone Command Handler
 *
 * Session check → source selection → target name and size → provisioning
 * pipeline → summary and optional snapshot cleanup.
 */

import {
  AzureManagers,
  CloneError,
  CloneLogCallback,
  CloneOutcome,
  ClonePipeline,
  CloneSummary,
  NsgMode,
  RollbackReport,
  SourceVm,
  StageResult,
  attempt,
  checkTargetName,
  deleteIntermediateSnapshot,
  resolveSourceVm,
  resolveTargetSize,
  validateVmName,
} from "@azvmclone/cloning";
import type { AzvmcloneConfig } from "../../config";
import type { IOutputService } from "../../interfaces/output.interface";
import type { IClonePrompts, VmChoice } from "../../interfaces/prompts.interface";
import { createLogCallback } from "../../log";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export interface CloneOptions {
  subscription?: string;
  resourceGroup?: string;
  vm?: string;
  name?: string;
  size?: string;
  nsg?: string;
  premium?: boolean;
  yes?: boolean;
}

const NSG_MODES: readonly NsgMode[] = ["reuse", "hardened", "copy"];

export function parseNsgMode(value: string | undefined): NsgMode | undefined {
  if (value === undefined) {
    return undefined;
  }
  const mode = NSG_MODES.find((candidate) => candidate === value.toLowerCase());
  if (!mode) {
    throw new CloneError(
      "PreconditionFailed",
      `Invalid --nsg value '${value}' (expected ${NSG_MODES.join(", ")})`
    );
  }
  return mode;
}

export type ManagersProvider = (
  subscriptionId: string,
  config: AzvmcloneConfig,
  log: CloneLogCallback
) => AzureManagers;

export class CloneHandler {
  private readonly log: CloneLogCallback;

  constructor(
    private readonly output: IOutputService,
    private readonly prompts: IClonePrompts,
    private readonly createManagers: ManagersProvider,
    private readonly now: () => Date = () => new Date()
  ) {
    this.log = createLogCallback(output);
  }

  /**
   * Run the clone workflow.
   * @returns Process exit code
   */
  async execute(config: AzvmcloneConfig, options: CloneOptions = {}): Promise<number> {
    this.output.header("azvmclone clone", "🖥");
    this.output.newline();

    const subscriptionId = config.subscriptionId;
    if (!subscriptionId) {
      this.output.error("No subscription configured.");
      this.output.dim("Set AZURE_SUBSCRIPTION_ID or pass --subscription <id>");
      return EXIT_FAILURE;
    }

    const managers = this.createManagers(subscriptionId, config, this.log);

    // ── Session ──
    this.output.startSpinner("Checking Azure session...");
    const session = await attempt("session", () => managers.sessionManager.verifySession());
    if (!session.ok) {
      this.output.failSpinner("No usable Azure session");
      return this.reportError(session.error);
    }
    this.output.succeedSpinner(`Authenticated (subscription ${session.value.subscriptionId})`);

    // ── Source ──
    const source = await this.selectSource(managers, options);
    if (!source.ok) {
      return this.reportError(source.error);
    }
    this.showSource(source.value);

    // ── Target ──
    const targetName = await this.selectTargetName(managers, source.value, options.name);
    if (!targetName.ok) {
      return this.reportError(targetName.error);
    }
    const targetSize = resolveTargetSize(
      source.value,
      options.size ?? (await this.prompts.inputVmSize(source.value.size))
    );

    this.output.newline();
    this.output.info("Clone plan:");
    this.output.table([
      ["Source VM", `${source.value.resourceGroup}/${source.value.name}`],
      ["New VM", `${source.value.resourceGroup}/${targetName.value}`],
      ["Size", targetSize],
    ]);
    this.output.newline();

    if (!(await this.prompts.confirmClone())) {
      this.output.warn("Clone cancelled.");
      return EXIT_OK;
    }

    // ── Pipeline ──
    const pipeline = new ClonePipeline({
      managers,
      prompter: this.prompts,
      log: this.log,
      createdBy: config.createdBy,
      now: this.now,
    });
    const outcome = await pipeline.run({
      source: source.value,
      targetName: targetName.value,
      targetSize,
    });

    return this.report(managers, outcome);
  }

  private async selectSource(
    managers: AzureManagers,
    options: CloneOptions
  ): Promise<StageResult<SourceVm>> {
    const resourceGroup = await this.chooseResourceGroup(managers, options.resourceGroup);
    if (!resourceGroup.ok) {
      return resourceGroup;
    }
    const vmName = await this.chooseVm(managers, resourceGroup.value, options.vm);
    if (!vmName.ok) {
      return vmName;
    }

    this.output.startSpinner(`Resolving ${vmName.value}...`);
    const source = await resolveSourceVm(managers, resourceGroup.value, vmName.value, this.log);
    if (source.ok) {
      this.output.succeedSpinner(`Found ${source.value.name}`);
    } else {
      this.output.failSpinner(`Could not resolve ${vmName.value}`);
    }
    return source;
  }

  private async chooseResourceGroup(
    managers: AzureManagers,
    preset: string | undefined
  ): Promise<StageResult<string>> {
    if (preset) {
      return { ok: true, value: preset };
    }
    return attempt("source-resolution", async () => {
      const groups = (await managers.resourceManager.listResourceGroups())
        .map((group) => group.name)
        .filter((name): name is string => Boolean(name))
        .sort((a, b) => a.localeCompare(b));
      if (groups.length === 0) {
        throw new CloneError("NotFound", "No resource groups visible in this subscription");
      }
      return this.prompts.selectResourceGroup(groups);
    });
  }

  private async chooseVm(
    managers: AzureManagers,
    resourceGroup: string,
    preset: string | undefined
  ): Promise<StageResult<string>> {
    if (preset) {
      return { ok: true, value: preset };
    }
    return attempt("source-resolution", async () => {
      const vms = await managers.computeManager.listVms(resourceGroup);
      const choices: VmChoice[] = [];
      for (const vm of vms) {
        if (vm.name) {
          choices.push({
            name: vm.name,
            size: vm.hardwareProfile?.vmSize,
            osType: vm.storageProfile?.osDisk?.osType,
          });
        }
      }
      if (choices.length === 0) {
        throw new CloneError("NotFound", `No VMs found in resource group '${resourceGroup}'`);
      }
      return this.prompts.selectVm(choices);
    });
  }

  private async selectTargetName(
    managers: AzureManagers,
    source: SourceVm,
    preset: string | undefined
  ): Promise<StageResult<string>> {
    const name =
      preset ??
      (await this.prompts.inputVmName(`${source.name}-clone`, (candidate) => {
        const validation = validateVmName(candidate, source.osType);
        return validation.valid ? true : validation.errors.join("; ");
      }));
    return checkTargetName(managers, source, name);
  }

  private showSource(source: SourceVm): void {
    this.output.newline();
    this.output.table([
      ["VM", source.name],
      ["Location", source.location],
      ["Size", source.size],
      ["OS", source.osType],
      ["OS disk", `${source.osDisk.name} (${source.osDisk.sku})`],
      ["NIC", source.nic.name],
    ]);
    this.output.newline();
  }

  private async report(managers: AzureManagers, outcome: CloneOutcome): Promise<number> {
    if (!outcome.ok) {
      this.output.newline();
      if (outcome.rollback) {
        this.showRollback(outcome.rollback);
      }
      return this.reportError(outcome.error, outcome.rollback);
    }

    const { summary } = outcome;
    this.output.newline();
    this.output.success(`✓ VM ${summary.vm.name} created`);
    this.output.newline();
    this.output.table(summaryRows(summary));
    this.output.newline();

    if (await this.prompts.confirmSnapshotCleanup(summary.snapshot.name)) {
      await deleteIntermediateSnapshot(
        managers,
        summary.source.resourceGroup,
        summary.snapshot,
        this.log
      );
    } else {
      this.output.dim(`Snapshot kept: ${summary.snapshot.name}`);
    }
    return EXIT_OK;
  }

  private showRollback(report: RollbackReport): void {
    for (const resource of report.retained) {
      this.output.warn(`Left in place: ${resource.kind} ${resource.name}`);
    }
    for (const failure of report.failed) {
      this.output.error(
        `Not removed: ${failure.resource.kind} ${failure.resource.name} (${failure.error})`
      );
    }
  }

  private reportError(error: CloneError, rollback?: RollbackReport): number {
    const stage = error.stage ? ` [${error.stage}]` : "";
    const cause = error.cause instanceof CloneError ? ` (${error.cause.kind})` : "";
    this.output.error(`${error.kind}${stage}: ${error.message}${cause}`);
    const hint = hintFor(error, rollback);
    if (hint) {
      this.output.dim(hint);
    }
    return EXIT_FAILURE;
  }
}

export function summaryRows(summary: CloneSummary): Array<[string, string]> {
  const nsgState = summary.nsg.created ? "created" : "existing";
  const rows: Array<[string, string]> = [
    ["Source VM", summary.source.name],
    ["New VM", summary.vm.name],
    ["Size", summary.size],
    ["OS disk", `${summary.disk.name} (${summary.disk.sku})`],
    ["Snapshot", summary.snapshot.name],
    ["NIC", summary.nic.name],
    ["NSG", `${summary.nsg.nsg.name} (${summary.nsg.mode}, ${nsgState})`],
    [
      "Boot diagnostics",
      `${summary.diagnostics.account.name} (${summary.diagnostics.reused ? "reused" : "created"})`,
    ],
  ];
  if (summary.crossResourceGroupNetwork) {
    rows.push(["Network", "VNet in another resource group"]);
  }
  return rows;
}

function hintFor(error: CloneError, rollback?: RollbackReport): string | undefined {
  switch (error.kind) {
    case "Unauthenticated":
      return "Run 'az login', or set AZURE_TENANT_ID, AZURE_CLIENT_ID and AZURE_CLIENT_SECRET";
    case "PermissionDenied":
      return "Check your role assignments on the resource groups involved";
    case "PartialFailure": {
      const leftovers = rollback?.failed.length ?? 0;
      const rolledBack =
        leftovers > 0
          ? `Rollback could not remove ${leftovers} resource(s); delete them manually`
          : "Created resources were rolled back";
      const causeHint = error.cause instanceof CloneError ? hintFor(error.cause) : undefined;
      return causeHint ? `${rolledBack}. ${causeHint}` : rolledBack;
    }
    default:
      return undefined;
  }
}
