#!/usr/bin/env node

import { Command, CommanderError } from "commander";
import chalk from "chalk";
import {
  AZVMCLONE_VERSION,
  AzureManagerFactory,
  createCredential,
  errorMessage,
} from "@azvmclone/cloning";
import { loadConfig } from "./config";
import { CloneHandler, CloneOptions, ManagersProvider, parseNsgMode } from "./commands/clone/clone.handler";
import { DoctorHandler } from "./commands/doctor/doctor.handler";
import { ConsoleOutputService } from "./services/console-output.service";
import { InquirerPrompts } from "./services/inquirer-prompts.service";

const EXIT_INTERRUPTED = 130;

interface DoctorOptions {
  subscription?: string;
  resourceGroup?: string;
}

const createManagers: ManagersProvider = (subscriptionId, config, log) =>
  AzureManagerFactory.createManagers({
    subscriptionId,
    credentials: createCredential(config.servicePrincipal),
    log,
  });

const program = new Command();

program
  .name("azvmclone")
  .description("Clone an Azure VM from a snapshot of its OS disk")
  .version(AZVMCLONE_VERSION);

program
  .command("clone", { isDefault: true })
  .description("Interactively clone a VM in its resource group")
  .option("-s, --subscription <id>", "Subscription ID (defaults to AZURE_SUBSCRIPTION_ID)")
  .option("-g, --resource-group <name>", "Source resource group")
  .option("-v, --vm <name>", "Source VM name")
  .option("-n, --name <name>", "Name of the new VM")
  .option("--size <size>", "Size of the new VM (defaults to the source size)")
  .option("--nsg <mode>", "NSG strategy: reuse, hardened or copy")
  .option("--premium", "Use Premium_LRS for the new OS disk when the size allows it")
  .option("-y, --yes", "Accept defaults instead of prompting")
  .action(async (options: CloneOptions) => {
    const output = new ConsoleOutputService();
    const config = loadConfig(process.env, { subscriptionId: options.subscription });
    const prompts = new InquirerPrompts({
      yes: options.yes,
      premium: options.premium,
      nsgMode: parseNsgMode(options.nsg),
    });
    const handler = new CloneHandler(output, prompts, createManagers);
    process.exitCode = await handler.execute(config, options);
  });

program
  .command("doctor")
  .description("Check credentials, permissions and SDK modules without changing anything")
  .option("-s, --subscription <id>", "Subscription ID (defaults to AZURE_SUBSCRIPTION_ID)")
  .option("-g, --resource-group <name>", "Resource group to check access to")
  .action(async (options: DoctorOptions) => {
    const output = new ConsoleOutputService();
    const config = loadConfig(process.env, { subscriptionId: options.subscription });
    const handler = new DoctorHandler(output, createManagers);
    const healthy = await handler.execute(config, options.resourceGroup);
    process.exitCode = healthy ? 0 : 1;
  });

// Inquirer re-raises SIGINT after closing its prompt. Nothing is rolled back
// here; resources created before the prompt stay in place.
process.on("SIGINT", () => {
  console.log();
  console.log(chalk.yellow("Interrupted."));
  process.exit(EXIT_INTERRUPTED);
});

// Add error handling
program.exitOverride();

program.parseAsync().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    if (error.code !== "commander.help" && error.code !== "commander.version" && error.code !== "commander.helpDisplayed") {
      process.exitCode = error.exitCode || 1;
    }
    return;
  }
  console.error(chalk.red("Error:"), errorMessage(error));
  process.exitCode = 1;
});
