import type { Device } from "./types.js";

export const INACTIVE_COLUMNS = [
  "DeviceName",
  "UserPrincipalName",
  "DeviceId",
  "ComplianceState",
  "LastSyncDateTime",
  "DaysSinceLastSync",
] as const;

export type InactiveDeviceRow = Record<(typeof INACTIVE_COLUMNS)[number], string>;

export interface InactiveDeviceReport {
  columns: string[];
  rows: InactiveDeviceRow[];
  days: number;
}

export const DEFAULT_INACTIVE_DAYS = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Whole days since the last sync, or undefined when the device never synced. */
export function daysSinceSync(lastSyncDateTime: string, now: Date): number | undefined {
  if (!lastSyncDateTime) return undefined;
  const t = Date.parse(lastSyncDateTime);
  // Intune reports 0001-01-01T00:00:00Z for devices that never checked in
  if (!Number.isFinite(t) || t <= 0) return undefined;
  return Math.floor((now.getTime() - t) / DAY_MS);
}

/**
 * Devices that have not synced within `days`, never-synced ones first, then
 * the stalest; equal staleness keeps listing order.
 */
export function findInactiveDevices(
  devices: readonly Device[],
  opts: { days?: number; now?: Date } = {}
): InactiveDeviceReport {
  const days = opts.days ?? DEFAULT_INACTIVE_DAYS;
  const now = opts.now ?? new Date();

  const stale = devices
    .map((d, index) => ({ d, index, age: daysSinceSync(d.lastSyncDateTime, now) }))
    .filter((x) => x.age === undefined || x.age >= days)
    .sort((a, b) => {
      const ageA = a.age ?? Number.POSITIVE_INFINITY;
      const ageB = b.age ?? Number.POSITIVE_INFINITY;
      if (ageA !== ageB) return ageB - ageA;
      return a.index - b.index;
    });

  const rows = stale.map(({ d, age }): InactiveDeviceRow => ({
    DeviceName: d.deviceName,
    UserPrincipalName: d.userPrincipalName,
    DeviceId: d.id,
    ComplianceState: d.complianceState,
    LastSyncDateTime: d.lastSyncDateTime,
    DaysSinceLastSync: age === undefined ? "never" : String(age),
  }));

  return { columns: [...INACTIVE_COLUMNS], rows, days };
}
