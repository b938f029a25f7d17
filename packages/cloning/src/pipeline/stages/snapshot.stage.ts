/**
 * Snapshot stage: full copy of the source OS disk.
 *
 * The source VM keeps running; the snapshot is crash-consistent.
 */

import { deriveSnapshotName } from "../../naming";
import { attempt } from "../../result";
import { provenanceTags, recordCreated } from "../context";
import type { PipelineStage } from "./stage";

export const SNAPSHOT_SKU = "Standard_LRS";

export const snapshotStage: PipelineStage = {
  name: "snapshot",
  description: "Creating snapshot of source OS disk",
  completes: "SnapshotCreated",

  run: (ctx) =>
    attempt("snapshot", async () => {
      const { source } = ctx.request;
      const name = deriveSnapshotName(source.osDisk.name, ctx.startedAt);

      const snapshot = await ctx.managers.computeManager.createSnapshot(source.resourceGroup, name, {
        location: source.location,
        sourceDiskId: source.osDisk.id,
        sku: SNAPSHOT_SKU,
        tags: {
          ...provenanceTags(ctx),
          sourceDisk: source.osDisk.name,
        },
      });
      const id = recordCreated(ctx, "snapshot", name, snapshot.id);
      ctx.snapshot = { id, name };
      ctx.log(`Snapshot created: ${name}`, "success");
    }),
};
