/**
 * NSG stage: give the new NIC a network security group.
 *
 * - reuse:    attach the source's NSG (no new resource)
 * - hardened: new NSG allowing remote management from the VNet only (default)
 * - copy:     new NSG with every rule of the source NSG
 *
 * reuse and copy fall back to hardened when the source has no NSG.
 */

import { CloneError } from "../../errors";
import { deriveNsgName } from "../../naming";
import { parseResourceId, resourceNameFromId } from "../../resource-id";
import { attempt } from "../../result";
import { copySecurityRules, getHardenedSecurityRules } from "../../security-rules";
import type { NsgMode, SecurityRuleSpec } from "../../types";
import {
  CloneContext,
  NetworkResolution,
  provenanceTags,
  recordCreated,
  requireOutput,
} from "../context";
import type { PipelineStage } from "./stage";

export const DEFAULT_NSG_MODE: NsgMode = "hardened";

async function loadSourceRules(ctx: CloneContext, sourceNsgId: string): Promise<SecurityRuleSpec[]> {
  const ref = parseResourceId(sourceNsgId);
  const name = ref.names[ref.names.length - 1];
  const sourceNsg = await ctx.managers.networkManager.getNsg(ref.resourceGroup, name);
  if (!sourceNsg) {
    throw new CloneError("NotFound", `Source NSG '${name}' not found`);
  }
  return copySecurityRules(sourceNsg.securityRules);
}

async function chooseMode(ctx: CloneContext, network: NetworkResolution): Promise<NsgMode> {
  const mode = await ctx.prompter.chooseNsgMode({
    sourceNsgName: network.sourceNsgId ? resourceNameFromId(network.sourceNsgId) : undefined,
    association: network.nsgAssociation,
    defaultMode: DEFAULT_NSG_MODE,
  });

  if (mode !== "hardened" && !network.sourceNsgId) {
    ctx.log(`  Source VM has no NSG; cannot ${mode} it. Creating a hardened NSG instead`, "warn");
    return "hardened";
  }
  return mode;
}

export const nsgStage: PipelineStage = {
  name: "nsg",
  description: "Resolving network security group",
  completes: "NSGResolved",

  run: (ctx) =>
    attempt("nsg", async () => {
      const { source, targetName } = ctx.request;
      const network = requireOutput(ctx.network, "network");
      const mode = await chooseMode(ctx, network);

      if (mode === "reuse" && network.sourceNsgId) {
        const attachToNic = network.nsgAssociation !== "subnet";
        ctx.nsg = {
          mode,
          nsg: { id: network.sourceNsgId, name: resourceNameFromId(network.sourceNsgId) },
          created: false,
          attachToNic,
        };
        ctx.log(
          attachToNic
            ? `Reusing source NSG: ${ctx.nsg.nsg.name}`
            : `Source NSG ${ctx.nsg.nsg.name} is bound to the subnet; new NIC inherits it`,
          "success"
        );
        return;
      }

      const name = deriveNsgName(targetName);
      const existing = await ctx.managers.networkManager.getNsg(source.resourceGroup, name);
      if (existing?.id) {
        ctx.log(`  NSG '${name}' already exists; reusing it. Review its rules before use`, "warn");
        ctx.nsg = { mode, nsg: { id: existing.id, name }, created: false, attachToNic: true };
        return;
      }

      const rules =
        mode === "copy" && network.sourceNsgId
          ? await loadSourceRules(ctx, network.sourceNsgId)
          : getHardenedSecurityRules(source.osType);

      const nsg = await ctx.managers.networkManager.createNsg(source.resourceGroup, name, {
        location: source.location,
        rules,
        tags: provenanceTags(ctx),
      });
      const id = recordCreated(ctx, "nsg", name, nsg.id);
      ctx.nsg = { mode, nsg: { id, name }, created: true, attachToNic: true };
      ctx.log(`NSG created: ${name} (${mode}, ${rules.length} rules)`, "success");
    }),
};
