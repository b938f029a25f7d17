/**
 * VM stages: assemble the VM definition, then create it.
 */

import type { VirtualMachine } from "@azure/arm-compute";
import { CloneError, errorMessage, toCloneError } from "../../errors";
import { attempt, fail, ok } from "../../result";
import type { OsKind, StorageAccountRef } from "../../types";
import { CloneContext, provenanceTags, recordCreated, requireOutput } from "../context";
import type { PipelineStage } from "./stage";

export interface VmDefinitionInput {
  location: string;
  size: string;
  osType: OsKind;
  nicId: string;
  diskId: string;
  diskName: string;
  diagnosticsAccount: StorageAccountRef;
  tags: Record<string, string>;
}

export function blobEndpointFor(account: StorageAccountRef): string {
  return account.blobEndpoint ?? `https://${account.name}.blob.core.windows.net/`;
}

/**
 * Build the VM body. The OS disk already exists, so it is attached rather
 * than created from an image, and no OS profile is sent.
 */
export function buildVmDefinition(input: VmDefinitionInput): VirtualMachine {
  return {
    location: input.location,
    hardwareProfile: {
      vmSize: input.size,
    },
    storageProfile: {
      osDisk: {
        name: input.diskName,
        osType: input.osType,
        createOption: "Attach",
        managedDisk: {
          id: input.diskId,
        },
      },
    },
    networkProfile: {
      networkInterfaces: [
        {
          id: input.nicId,
          primary: true,
        },
      ],
    },
    diagnosticsProfile: {
      bootDiagnostics: {
        enabled: true,
        storageUri: blobEndpointFor(input.diagnosticsAccount),
      },
    },
    tags: input.tags,
  };
}

export const vmAssemblyStage: PipelineStage = {
  name: "vm-assembly",
  description: "Assembling VM configuration",
  completes: "VMConfigured",

  run: (ctx) =>
    attempt("vm-assembly", async () => {
      const { source, targetSize } = ctx.request;
      const disk = requireOutput(ctx.disk, "disk");
      const nic = requireOutput(ctx.nic, "nic");
      const snapshot = requireOutput(ctx.snapshot, "snapshot");
      const diagnostics = requireOutput(ctx.diagnostics, "diagnostics");

      ctx.vmDefinition = buildVmDefinition({
        location: source.location,
        size: targetSize,
        osType: source.osType,
        nicId: nic.id,
        diskId: disk.id,
        diskName: disk.name,
        diagnosticsAccount: diagnostics.account,
        tags: {
          ...provenanceTags(ctx),
          sourceSnapshot: snapshot.name,
        },
      });
      ctx.log(`  VM configuration: ${targetSize}, ${source.osType}, boot diagnostics on`);
    }),
};

/**
 * Record a VM that Azure left behind after a failed create, so rollback removes it.
 */
async function recordLeftoverVm(ctx: CloneContext): Promise<void> {
  const { source, targetName } = ctx.request;
  try {
    const leftover = await ctx.managers.computeManager.getVm(source.resourceGroup, targetName);
    if (leftover?.id) {
      ctx.ledger.record({
        kind: "vm",
        id: leftover.id,
        name: targetName,
        resourceGroup: source.resourceGroup,
      });
    }
  } catch (error: unknown) {
    ctx.log(`  Could not check for a partially created VM: ${errorMessage(error)}`, "warn");
  }
}

export const vmCreationStage: PipelineStage = {
  name: "vm-creation",
  description: "Creating virtual machine",
  completes: "VMCreated",

  async run(ctx) {
    const { source, targetName } = ctx.request;

    let definition: VirtualMachine;
    try {
      definition = requireOutput(ctx.vmDefinition, "vmDefinition");
    } catch (error: unknown) {
      return fail(toCloneError(error, "vm-creation"));
    }

    let vm: VirtualMachine;
    try {
      vm = await ctx.managers.computeManager.createVm(source.resourceGroup, targetName, definition);
    } catch (error: unknown) {
      await recordLeftoverVm(ctx);
      return fail(toCloneError(error, "vm-creation"));
    }

    let id: string;
    try {
      id = recordCreated(ctx, "vm", targetName, vm.id);
    } catch (error: unknown) {
      return fail(toCloneError(error, "vm-creation"));
    }

    if (vm.provisioningState === "Failed") {
      return fail(
        new CloneError("ProviderFailure", `VM '${targetName}' provisioning failed`, {
          stage: "vm-creation",
        })
      );
    }

    ctx.vm = { id, name: targetName };
    ctx.log(`VM created: ${targetName}`, "success");
    return ok(undefined);
  },
};
