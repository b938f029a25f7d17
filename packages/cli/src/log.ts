import type { CloneLogCallback } from "@azvmclone/cloning";
import type { IOutputService } from "./interfaces/output.interface";

/**
 * Route workflow log lines to the console by level.
 */
export function createLogCallback(output: IOutputService): CloneLogCallback {
  return (message, level = "info") => {
    switch (level) {
      case "success":
        output.success(message);
        break;
      case "warn":
        output.warn(message);
        break;
      case "error":
        output.error(message);
        break;
      default:
        output.info(message);
    }
  };
}
