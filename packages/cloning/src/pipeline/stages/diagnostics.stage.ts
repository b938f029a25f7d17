/**
 * Diagnostics storage stage: storage account for boot diagnostics.
 *
 * An existing account in the resource group whose name contains "bootdiag"
 * (preferred) or "diag" is offered for reuse; otherwise a new one is created.
 */

import type { StorageAccount } from "@azure/arm-storage";
import { CloneError } from "../../errors";
import { DIAG_STORAGE_PREFIX, generateDiagStorageName, isDiagnosticsStorageName } from "../../naming";
import { attempt } from "../../result";
import { CloneContext, recordCreated } from "../context";
import type { PipelineStage } from "./stage";

const MAX_NAME_ATTEMPTS = 5;

/**
 * Pick the account most likely to hold boot diagnostics.
 */
export function findDiagnosticsAccount(accounts: StorageAccount[]): StorageAccount | undefined {
  const matching = (marker?: string) =>
    accounts.find((account) => account.name && isDiagnosticsStorageName(account.name, marker));
  return matching(DIAG_STORAGE_PREFIX) ?? matching();
}

async function pickAvailableName(ctx: CloneContext): Promise<string> {
  for (let i = 0; i < MAX_NAME_ATTEMPTS; i++) {
    const name = generateDiagStorageName(ctx.randomSuffix);
    if (await ctx.managers.storageManager.isNameAvailable(name)) {
      return name;
    }
    ctx.log(`  Storage account name ${name} is taken; generating another`);
  }
  throw new CloneError(
    "ProviderFailure",
    `No available storage account name after ${MAX_NAME_ATTEMPTS} attempts`
  );
}

export const diagnosticsStage: PipelineStage = {
  name: "diagnostics",
  description: "Resolving boot diagnostics storage",
  completes: "DiagStorageResolved",

  run: (ctx) =>
    attempt("diagnostics", async () => {
      const { source, targetName } = ctx.request;
      const storage = ctx.managers.storageManager;

      const candidate = findDiagnosticsAccount(await storage.listStorageAccounts(source.resourceGroup));
      if (candidate?.id && candidate.name) {
        if (await ctx.prompter.confirmReuseDiagnosticsStorage(candidate.name)) {
          ctx.diagnostics = {
            account: {
              id: candidate.id,
              name: candidate.name,
              blobEndpoint: candidate.primaryEndpoints?.blob,
            },
            reused: true,
          };
          ctx.log(`Reusing diagnostics storage: ${candidate.name}`, "success");
          return;
        }
      }

      const name = await pickAvailableName(ctx);
      const account = await storage.createStorageAccount(source.resourceGroup, name, {
        location: source.location,
        tags: {
          purpose: "bootdiagnostics",
          createdBy: ctx.createdBy,
          targetVm: targetName,
        },
      });
      const id = recordCreated(ctx, "storageAccount", name, account.id);
      ctx.diagnostics = {
        account: { id, name, blobEndpoint: account.primaryEndpoints?.blob },
        reused: false,
      };
      ctx.log(`Diagnostics storage created: ${name}`, "success");
    }),
};

