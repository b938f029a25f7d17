/**
 * Disk stage: managed disk built from the snapshot.
 */

import { deriveDiskName } from "../../naming";
import { attempt } from "../../result";
import { provenanceTags, recordCreated, requireOutput } from "../context";
import type { PipelineStage } from "./stage";

export const STANDARD_DISK_SKU = "Standard_LRS";
export const PREMIUM_DISK_SKU = "Premium_LRS";

export const diskStage: PipelineStage = {
  name: "disk",
  description: "Creating managed disk from snapshot",
  completes: "DiskCreated",

  run: (ctx) =>
    attempt("disk", async () => {
      const { source, targetName } = ctx.request;
      const snapshot = requireOutput(ctx.snapshot, "snapshot");

      let sku = source.osDisk.sku;
      if (sku === STANDARD_DISK_SKU && (await ctx.prompter.confirmPremiumUpgrade(sku))) {
        sku = PREMIUM_DISK_SKU;
        ctx.log(`  Disk SKU upgraded to ${PREMIUM_DISK_SKU}`);
      }

      const name = deriveDiskName(targetName);
      const disk = await ctx.managers.computeManager.createDiskFromSnapshot(
        source.resourceGroup,
        name,
        {
          location: source.location,
          snapshotId: snapshot.id,
          sku,
          osType: source.osType,
          tags: {
            ...provenanceTags(ctx),
            sourceSnapshot: snapshot.name,
          },
        }
      );
      const id = recordCreated(ctx, "disk", name, disk.id);
      ctx.disk = { id, name, sku };
      ctx.log(`Managed disk created: ${name} (${sku})`, "success");
    }),
};
