import type { ColumnSet, ComplianceSource, Device, ReportRow } from "./types.js";
import { NO_STATE } from "./types.js";
import { describeError } from "./errors.js";
import { deviceLabel, fetchDeviceSettings, resolveSettingName, type PassOptions } from "./columns.js";
import { mapInOrder } from "./pool.js";

export function identityCells(d: Device) {
  return {
    DeviceName: d.deviceName,
    UserPrincipalName: d.userPrincipalName,
    DeviceId: d.id,
    ComplianceState: d.complianceState,
    LastSyncDateTime: d.lastSyncDateTime,
  };
}

/**
 * Pass 2: one row for one device against a fixed column set.
 * When two policies report the same setting, the one the source returned
 * last wins.
 */
export async function buildRow(
  device: Device,
  columns: ColumnSet,
  source: ComplianceSource,
  opts: PassOptions
): Promise<ReportRow> {
  const cells = new Map<string, string>(columns.map((c) => [c, NO_STATE]));

  try {
    for (const s of await fetchDeviceSettings(source, device.id)) {
      const name = resolveSettingName(s);
      if (name !== undefined && cells.has(name)) cells.set(name, s.state);
    }
  } catch (e) {
    // Settings are applied only after every fetch succeeded, so all cells are still the sentinel.
    const line = `row for ${deviceLabel(device)} left at "${NO_STATE}": ${describeError(e)}`;
    opts.logger.warn(line);
    opts.onWarning?.(line);
  }

  // fromEntries defines own keys, so a setting named "__proto__" stays a column.
  return Object.fromEntries([
    ...Object.entries(identityCells(device)),
    ...columns.map((c): [string, string] => [c, cells.get(c) ?? NO_STATE]),
  ]);
}

export function buildRows(
  devices: readonly Device[],
  columns: ColumnSet,
  source: ComplianceSource,
  opts: PassOptions
): Promise<ReportRow[]> {
  return mapInOrder(devices, opts.concurrency ?? 1, (d) => buildRow(d, columns, source, opts));
}
