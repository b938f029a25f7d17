import chalk from "chalk";
import inquirer, { Answers, QuestionCollection } from "inquirer";
import type { NsgMode, NsgModeChoice } from "@azvmclone/cloning";
import type { IClonePrompts, VmChoice } from "../interfaces/prompts.interface";

export type PromptFn = <T extends Answers>(questions: QuestionCollection<T>) => Promise<T>;

/**
 * Answers given on the command line. A flag answers its question without
 * prompting; `yes` accepts the default of every remaining question.
 */
export interface PromptPresets {
  yes?: boolean;
  premium?: boolean;
  nsgMode?: NsgMode;
}

const NSG_MODE_LABELS: Record<NsgMode, string> = {
  reuse: "Reuse the source NSG",
  hardened: "Create a hardened NSG (management from the VNet only)",
  copy: "Create a new NSG with the source NSG's rules",
};

export class InquirerPrompts implements IClonePrompts {
  constructor(
    private readonly presets: PromptPresets = {},
    private readonly prompt: PromptFn = inquirer.prompt
  ) {}

  async selectResourceGroup(groups: string[]): Promise<string> {
    if (this.presets.yes && groups.length === 1) {
      return groups[0];
    }
    const { resourceGroup } = await this.prompt<{ resourceGroup: string }>([
      {
        type: "list",
        name: "resourceGroup",
        message: "Select source resource group:",
        choices: groups,
        pageSize: 15,
      },
    ]);
    return resourceGroup;
  }

  async selectVm(vms: VmChoice[]): Promise<string> {
    if (this.presets.yes && vms.length === 1) {
      return vms[0].name;
    }
    const { vm } = await this.prompt<{ vm: string }>([
      {
        type: "list",
        name: "vm",
        message: "Select VM to clone:",
        choices: vms.map((choice) => ({
          name: [choice.name, choice.size, choice.osType].filter(Boolean).join("  "),
          value: choice.name,
        })),
        pageSize: 15,
      },
    ]);
    return vm;
  }

  async inputVmName(defaultName: string, validate: (name: string) => true | string): Promise<string> {
    if (this.presets.yes) {
      return defaultName;
    }
    const { name } = await this.prompt<{ name: string }>([
      {
        type: "input",
        name: "name",
        message: "New VM name:",
        default: defaultName,
        validate,
      },
    ]);
    return name;
  }

  async inputVmSize(defaultSize: string): Promise<string> {
    if (this.presets.yes) {
      return defaultSize;
    }
    const { size } = await this.prompt<{ size: string }>([
      {
        type: "input",
        name: "size",
        message: "New VM size:",
        default: defaultSize,
      },
    ]);
    return size;
  }

  async confirmClone(): Promise<boolean> {
    if (this.presets.yes) {
      return true;
    }
    const { confirm } = await this.prompt<{ confirm: boolean }>([
      {
        type: "confirm",
        name: "confirm",
        message: chalk.yellow("This will create Azure resources. Continue?"),
        default: false,
      },
    ]);
    return confirm;
  }

  async confirmSnapshotCleanup(snapshotName: string): Promise<boolean> {
    if (this.presets.yes) {
      return false;
    }
    const { cleanup } = await this.prompt<{ cleanup: boolean }>([
      {
        type: "confirm",
        name: "cleanup",
        message: `Delete intermediate snapshot ${snapshotName}?`,
        default: false,
      },
    ]);
    return cleanup;
  }

  async confirmPremiumUpgrade(currentSku: string): Promise<boolean> {
    if (this.presets.premium !== undefined) {
      return this.presets.premium;
    }
    if (this.presets.yes) {
      return false;
    }
    const { upgrade } = await this.prompt<{ upgrade: boolean }>([
      {
        type: "confirm",
        name: "upgrade",
        message: `Source disk is ${currentSku}. Upgrade the new disk to Premium_LRS?`,
        default: false,
      },
    ]);
    return upgrade;
  }

  async chooseNsgMode(choice: NsgModeChoice): Promise<NsgMode> {
    if (this.presets.nsgMode) {
      return this.presets.nsgMode;
    }
    if (this.presets.yes) {
      return choice.defaultMode;
    }

    const noSourceNsg = choice.sourceNsgName ? false : "source VM has no NSG";
    const source = choice.sourceNsgName
      ? `Source NSG: ${choice.sourceNsgName} (on the ${choice.association === "subnet" ? "subnet" : "NIC"})`
      : "Source VM has no NSG";

    const { mode } = await this.prompt<{ mode: NsgMode }>([
      {
        type: "list",
        name: "mode",
        message: `Network security group for the new VM? ${chalk.gray(source)}`,
        choices: [
          { name: NSG_MODE_LABELS.hardened, value: "hardened" },
          { name: NSG_MODE_LABELS.reuse, value: "reuse", disabled: noSourceNsg },
          { name: NSG_MODE_LABELS.copy, value: "copy", disabled: noSourceNsg },
        ],
        default: choice.defaultMode,
      },
    ]);
    return mode;
  }

  async confirmReuseDiagnosticsStorage(accountName: string): Promise<boolean> {
    if (this.presets.yes) {
      return true;
    }
    const { reuse } = await this.prompt<{ reuse: boolean }>([
      {
        type: "confirm",
        name: "reuse",
        message: `Use existing storage account ${accountName} for boot diagnostics?`,
        default: true,
      },
    ]);
    return reuse;
  }
}
