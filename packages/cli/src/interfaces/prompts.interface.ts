import type { ClonePrompter } from "@azvmclone/cloning";

export interface VmChoice {
  name: string;
  size?: string;
  osType?: string;
}

/**
 * Operator prompts for the clone command. Extends the decisions the pipeline
 * asks for mid-run with the questions asked before it starts.
 */
export interface IClonePrompts extends ClonePrompter {
  selectResourceGroup(groups: string[]): Promise<string>;
  selectVm(vms: VmChoice[]): Promise<string>;

  /**
   * @param validate - Returns true, or the message to show for an invalid name
   */
  inputVmName(defaultName: string, validate: (name: string) => true | string): Promise<string>;
  inputVmSize(defaultSize: string): Promise<string>;

  confirmClone(): Promise<boolean>;
  /** Defaults to keeping the snapshot */
  confirmSnapshotCleanup(snapshotName: string): Promise<boolean>;
}
