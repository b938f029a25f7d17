/**
 * Resource name derivation for cloned resources.
 *
 * Names are deterministic for a given VM name and clock reading so a run can
 * be reasoned about (and tested) without touching Azure. The only random
 * name is the diagnostics storage account, which must be globally unique.
 */

import { randomInt } from "node:crypto";

/** Storage account names are 3-24 lowercase alphanumerics, globally unique. */
export const DIAG_STORAGE_PREFIX = "bootdiag";
const DIAG_STORAGE_SUFFIX_DIGITS = 6;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Format a date as yyyyMMddHHmmss in local time.
 */
export function formatTimestamp(date: Date): string {
  return [
    pad(date.getFullYear(), 4),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join("");
}

export function deriveSnapshotName(osDiskName: string, now: Date): string {
  return `${osDiskName}-snapshot-${formatTimestamp(now)}`;
}

export function deriveDiskName(vmName: string): string {
  return `${vmName}-osdisk`;
}

export function deriveNicName(vmName: string): string {
  return `${vmName}-nic`;
}

export function deriveNsgName(vmName: string): string {
  return `${vmName}-nsg`;
}

/**
 * Generate a boot diagnostics storage account name with a random numeric suffix.
 *
 * @param random - Returns an integer in [0, 10^6); injectable for tests
 */
export function generateDiagStorageName(
  random: () => number = () => randomInt(0, 10 ** DIAG_STORAGE_SUFFIX_DIGITS)
): string {
  const suffix = String(random()).padStart(DIAG_STORAGE_SUFFIX_DIGITS, "0");
  return `${DIAG_STORAGE_PREFIX}${suffix}`;
}

/**
 * True when a storage account name looks like it holds boot diagnostics.
 *
 * @param marker - Substring to look for, case-insensitively
 */
export function isDiagnosticsStorageName(name: string, marker: string = "diag"): boolean {
  return name.toLowerCase().includes(marker);
}
