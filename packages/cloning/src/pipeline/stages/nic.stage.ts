/**
 * NIC stage: network interface in the source subnet.
 */

import { deriveNicName } from "../../naming";
import { attempt } from "../../result";
import { provenanceTags, recordCreated, requireOutput } from "../context";
import type { PipelineStage } from "./stage";

export const nicStage: PipelineStage = {
  name: "nic",
  description: "Creating network interface",
  completes: "NICCreated",

  run: (ctx) =>
    attempt("nic", async () => {
      const { source, targetName } = ctx.request;
      const network = requireOutput(ctx.network, "network");
      const nsg = requireOutput(ctx.nsg, "nsg");

      const name = deriveNicName(targetName);
      const nic = await ctx.managers.networkManager.createNic(source.resourceGroup, name, {
        location: source.location,
        subnetId: network.subnetId,
        nsgId: nsg.attachToNic ? nsg.nsg.id : undefined,
        tags: provenanceTags(ctx),
      });
      const id = recordCreated(ctx, "nic", name, nic.id);
      ctx.nic = { id, name };
      ctx.log(`Network interface created: ${name}`, "success");
    }),
};
