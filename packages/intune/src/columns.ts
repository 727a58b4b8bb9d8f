import type { ColumnSet, ComplianceSource, Device, Logger, SettingState } from "./types.js";
import { IDENTITY_COLUMNS } from "./types.js";
import { describeError } from "./errors.js";
import { mapInOrder } from "./pool.js";

export interface PassOptions {
  logger: Logger;
  /** Per-device fetches in flight at once; 1 keeps the pass sequential. */
  concurrency?: number;
  /** Receives one line per device whose fetch failed. */
  onWarning?: (line: string) => void;
}

const IDENTITY = new Set<string>(IDENTITY_COLUMNS);

/** `settingName`, then `setting`; undefined when neither carries a name. */
export function resolveSettingName(s: SettingState): string | undefined {
  if (s.settingName) return s.settingName;
  if (s.setting) return s.setting;
  return undefined;
}

/** Ordinal comparison so header order never depends on the host locale. */
export function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Every setting record of a device, in the order the source returned policies, then settings. */
export async function fetchDeviceSettings(source: ComplianceSource, deviceId: string): Promise<SettingState[]> {
  const out: SettingState[] = [];
  const policies = await source.listCompliancePolicies(deviceId);
  for (const policy of policies) {
    out.push(...(await source.listSettingStates(deviceId, policy.id)));
  }
  return out;
}

export function deviceLabel(d: Device): string {
  return d.deviceName ? `${d.deviceName} (${d.id})` : d.id;
}

/**
 * Pass 1: scan every device's policy/setting records and return the sorted,
 * duplicate-free set of setting names that become report columns.
 */
export async function discoverColumns(
  devices: readonly Device[],
  source: ComplianceSource,
  opts: PassOptions
): Promise<ColumnSet> {
  const names = new Set<string>();
  const collided = new Set<string>();

  const perDevice = await mapInOrder(devices, opts.concurrency ?? 1, async (device) => {
    try {
      return await fetchDeviceSettings(source, device.id);
    } catch (e) {
      const line = `column discovery skipped ${deviceLabel(device)}: ${describeError(e)}`;
      opts.logger.warn(line);
      opts.onWarning?.(line);
      return [];
    }
  });

  for (const settings of perDevice) {
    for (const s of settings) {
      const name = resolveSettingName(s);
      if (name === undefined) continue;
      if (IDENTITY.has(name)) {
        if (!collided.has(name)) {
          collided.add(name);
          opts.logger.warn(`setting "${name}" shares a name with an identity column; not exported`);
        }
        continue;
      }
      names.add(name);
    }
  }

  return [...names].sort(compareOrdinal);
}
