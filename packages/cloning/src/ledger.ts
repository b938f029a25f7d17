import type { CreatedResource } from "./types";

/**
 * Ordered record of the resources a clone run has created.
 *
 * Rollback is driven from this ledger, never from re-reading Azure state.
 * Reused resources (an existing NSG, a discovered storage account) are not
 * recorded here.
 */
export class ResourceLedger {
  private readonly entries: CreatedResource[] = [];

  record(resource: CreatedResource): void {
    this.entries.push({ ...resource });
  }

  /**
   * Entries in creation order.
   */
  list(): CreatedResource[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  /**
   * Entries in reverse creation order.
   */
  reversed(): CreatedResource[] {
    return this.list().reverse();
  }

  get size(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }
}
