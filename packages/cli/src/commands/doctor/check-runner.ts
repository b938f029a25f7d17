/**
 * Check Runner
 *
 * Runs the registered checks one after another and renders their results.
 */

import { errorMessage } from "@azvmclone/cloning";
import type { IOutputService } from "../../interfaces/output.interface";
import type { CheckRegistry } from "./check-registry";
import type { CheckResult, DoctorContext } from "./checks/check.interface";

export interface CheckSummary {
  pass: number;
  fail: number;
  warn: number;
  skip: number;
}

export class CheckRunner {
  constructor(
    private readonly registry: CheckRegistry,
    private readonly output: IOutputService
  ) {}

  /**
   * Run every check. A check whose dependency failed or was skipped is skipped.
   */
  async runAll(context: DoctorContext): Promise<CheckResult[]> {
    const results: CheckResult[] = [];
    const statusById = new Map<string, CheckResult["status"]>();

    for (const check of this.registry.getChecks()) {
      const blocker = (check.dependsOn ?? []).find((id) => {
        const status = statusById.get(id);
        return status === "fail" || status === "skip";
      });

      let result: CheckResult;
      if (blocker) {
        const dependency = this.registry.getCheck(blocker)?.name ?? blocker;
        result = { name: check.name, status: "skip", message: `Skipped: ${dependency} did not pass` };
      } else {
        result = await check.run(context).catch(
          (error: unknown): CheckResult => ({
            name: check.name,
            status: "fail",
            message: errorMessage(error),
          })
        );
      }

      statusById.set(check.id, result.status);
      results.push(result);
    }

    return results;
  }

  getSummary(results: CheckResult[]): CheckSummary {
    const summary: CheckSummary = { pass: 0, fail: 0, warn: 0, skip: 0 };
    for (const result of results) {
      summary[result.status]++;
    }
    return summary;
  }

  displayResults(results: CheckResult[]): void {
    for (const result of results) {
      this.output.result(result.status, `${result.name}: ${result.message}`);
      if (result.fix && result.status !== "pass") {
        this.output.dim(`   Fix: ${result.fix}`);
      }
    }
    this.output.newline();

    const summary = this.getSummary(results);
    if (summary.fail === 0 && summary.warn === 0) {
      this.output.success("✓ All checks passed!");
      return;
    }

    const parts = [`${summary.pass} passed`];
    if (summary.fail > 0) parts.push(`${summary.fail} failed`);
    if (summary.warn > 0) parts.push(`${summary.warn} warnings`);
    if (summary.skip > 0) parts.push(`${summary.skip} skipped`);
    this.output.info(`Summary: ${parts.join(", ")}`);

    if (summary.fail > 0) {
      this.output.newline();
      this.output.error("Please fix the failed checks before cloning.");
    }
  }
}
