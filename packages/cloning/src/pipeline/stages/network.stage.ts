/**
 * Network resolution stage: locate the source subnet and check it is usable.
 *
 * The new VM always goes into the source VM's resource group, even when the
 * VNet lives in another one.
 */

import { CloneError } from "../../errors";
import { parseSubnetId, sameResourceGroup } from "../../resource-id";
import { attempt } from "../../result";
import type { NsgAssociation } from "../../types";
import type { PipelineStage } from "./stage";

export const networkStage: PipelineStage = {
  name: "network",
  description: "Resolving virtual network and subnet",
  completes: "NetworkResolved",

  run: (ctx) =>
    attempt("network", async () => {
      const { source } = ctx.request;
      const subnetId = source.nic.subnetId;
      const subnetRef = parseSubnetId(subnetId);

      const crossResourceGroup = !sameResourceGroup(subnetRef.resourceGroup, source.resourceGroup);
      if (crossResourceGroup) {
        ctx.log(
          `  VNet '${subnetRef.vnetName}' is in resource group '${subnetRef.resourceGroup}' ` +
            `(source VM is in '${source.resourceGroup}')`,
          "warn"
        );

        const access = await ctx.managers.resourceManager.checkResourceGroupAccess(
          subnetRef.resourceGroup
        );
        if (access === "forbidden") {
          throw new CloneError(
            "PermissionDenied",
            `No read access to resource group '${subnetRef.resourceGroup}' holding VNet '${subnetRef.vnetName}'`
          );
        }
        if (access === "missing") {
          throw new CloneError(
            "NotFound",
            `Resource group '${subnetRef.resourceGroup}' holding VNet '${subnetRef.vnetName}' not found`
          );
        }
      }

      const subnet = await ctx.managers.networkManager.getSubnet(
        subnetRef.resourceGroup,
        subnetRef.vnetName,
        subnetRef.subnetName
      );
      if (!subnet) {
        throw new CloneError(
          "NotFound",
          `Subnet '${subnetRef.subnetName}' not found in VNet '${subnetRef.vnetName}'`
        );
      }

      const subnetNsgId = subnet.networkSecurityGroup?.id;
      let nsgAssociation: NsgAssociation = "none";
      if (source.nic.nsgId) {
        nsgAssociation = "nic";
      } else if (subnetNsgId) {
        nsgAssociation = "subnet";
      }

      ctx.network = {
        subnetId,
        subnet: subnetRef,
        crossResourceGroup,
        sourceNsgId: source.nic.nsgId ?? subnetNsgId,
        nsgAssociation,
      };
      ctx.log(`Network resolved: ${subnetRef.vnetName}/${subnetRef.subnetName}`, "success");
    }),
};
