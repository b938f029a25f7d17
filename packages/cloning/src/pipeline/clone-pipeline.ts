/**
 * Clone Pipeline
 *
 * Runs the provisioning stages in order:
 *
 *   Init → SnapshotCreated → DiskCreated → NetworkResolved → NSGResolved
 *        → NICCreated → DiagStorageResolved → VMConfigured → VMCreated
 *
 * Each stage returns a StageResult. The first failure stops the run; if any
 * resource was created by then, the run is rolled back and reported as a
 * PartialFailure wrapping the original error.
 */

import type { AzureManagers } from "../azure-manager-factory";
import { CloneError } from "../errors";
import type { CloneLogCallback, CreatedResource, ResourceRef, SourceVm } from "../types";
import {
  CloneContext,
  ClonePrompter,
  CloneRequest,
  DiagnosticsResolution,
  NsgResolution,
  PipelineState,
  ClonedDiskRef,
  createCloneContext,
  requireOutput,
} from "./context";
import { rollback, RollbackReport } from "./rollback";
import {
  PipelineStage,
  snapshotStage,
  diskStage,
  networkStage,
  nsgStage,
  nicStage,
  diagnosticsStage,
  vmAssemblyStage,
  vmCreationStage,
} from "./stages";

export const PIPELINE_STAGES: readonly PipelineStage[] = [
  snapshotStage,
  diskStage,
  networkStage,
  nsgStage,
  nicStage,
  diagnosticsStage,
  vmAssemblyStage,
  vmCreationStage,
];

export interface CloneSummary {
  source: SourceVm;
  vm: ResourceRef;
  size: string;
  snapshot: ResourceRef;
  disk: ClonedDiskRef;
  nic: ResourceRef;
  nsg: NsgResolution;
  diagnostics: DiagnosticsResolution;
  crossResourceGroupNetwork: boolean;
  /** Resources created by the run, in creation order */
  created: CreatedResource[];
}

export type CloneOutcome =
  | { ok: true; summary: CloneSummary }
  | {
      ok: false;
      error: CloneError;
      failedStage: string;
      /** State reached before the failure */
      lastState: PipelineState;
      /** Present when rollback ran */
      rollback?: RollbackReport;
    };

export interface ClonePipelineOptions {
  managers: AzureManagers;
  prompter: ClonePrompter;
  log: CloneLogCallback;
  /** Value of the createdBy tag */
  createdBy: string;
  /** Clock, injectable for tests */
  now?: () => Date;
  /** Random suffix source for storage account names, injectable for tests */
  randomSuffix?: () => number;
}

export class ClonePipeline {
  private readonly now: () => Date;

  constructor(private readonly options: ClonePipelineOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async run(request: CloneRequest): Promise<CloneOutcome> {
    const { managers, prompter, log, createdBy, randomSuffix } = this.options;
    const ctx = createCloneContext({
      request,
      managers,
      prompter,
      log,
      createdBy,
      randomSuffix,
      startedAt: this.now(),
    });

    log(`Cloning ${request.source.name} → ${request.targetName} (${request.targetSize})`);

    const total = PIPELINE_STAGES.length;
    for (const [index, stage] of PIPELINE_STAGES.entries()) {
      log(`[${index + 1}/${total}] ${stage.description}...`);

      const result = await stage.run(ctx);
      if (!result.ok) {
        return this.fail(ctx, stage, result.error);
      }
      ctx.state = stage.completes;
    }

    return { ok: true, summary: this.summarize(ctx) };
  }

  private async fail(
    ctx: CloneContext,
    stage: PipelineStage,
    error: CloneError
  ): Promise<CloneOutcome> {
    const lastState = ctx.state;
    ctx.state = "Failed";
    this.options.log(`Stage '${stage.name}' failed: ${error.message}`, "error");

    if (ctx.ledger.isEmpty) {
      return { ok: false, error, failedStage: stage.name, lastState };
    }

    const report = await rollback(ctx.ledger, ctx.managers, ctx.log);
    return {
      ok: false,
      error: new CloneError("PartialFailure", error.message, {
        stage: stage.name,
        cause: error,
      }),
      failedStage: stage.name,
      lastState,
      rollback: report,
    };
  }

  private summarize(ctx: CloneContext): CloneSummary {
    return {
      source: ctx.request.source,
      vm: requireOutput(ctx.vm, "vm"),
      size: ctx.request.targetSize,
      snapshot: requireOutput(ctx.snapshot, "snapshot"),
      disk: requireOutput(ctx.disk, "disk"),
      nic: requireOutput(ctx.nic, "nic"),
      nsg: requireOutput(ctx.nsg, "nsg"),
      diagnostics: requireOutput(ctx.diagnostics, "diagnostics"),
      crossResourceGroupNetwork: requireOutput(ctx.network, "network").crossResourceGroup,
      created: ctx.ledger.list(),
    };
  }
}
