// packages/intune/src/clients.graph.ts
import { z } from "zod";
import type { ComplianceSource, Device, DeviceSource, PolicyState, SettingState } from "./types.js";
import { NO_STATE } from "./types.js";
import { DeviceSourceError, isAuthFailure, normalizeGraphError } from "./errors.js";

/** The slice of `@microsoft/microsoft-graph-client`'s Client this source calls. */
export interface GraphLike {
  api(path: string): { get(): Promise<unknown> };
}

export type GraphApiVersion = "v1.0" | "beta";

export interface GraphIntuneSourceOptions {
  /** e.g. https://graph.microsoft.com or https://graph.microsoft.us */
  graphResource?: string;
  /** Per-policy settingStates are only exposed on beta. */
  apiVersion?: GraphApiVersion;
}

const PageSchema = z.object({
  value: z.array(z.unknown()).default([]),
  "@odata.nextLink": z.string().optional(),
});

const ManagedDeviceSchema = z
  .object({
    id: z.string(),
    deviceName: z.string().nullish(),
    userPrincipalName: z.string().nullish(),
    complianceState: z.string().nullish(),
    lastSyncDateTime: z.string().nullish(),
  })
  .passthrough()
  .transform(
    (d): Device => ({
      id: d.id,
      deviceName: d.deviceName ?? "",
      userPrincipalName: d.userPrincipalName ?? "",
      complianceState: d.complianceState ?? "unknown",
      lastSyncDateTime: d.lastSyncDateTime ?? "",
    })
  );

const PolicyStateSchema = z
  .object({ id: z.string(), displayName: z.string().nullish(), state: z.string().nullish() })
  .passthrough()
  .transform(
    (p): PolicyState => ({ id: p.id, displayName: p.displayName ?? undefined, state: p.state ?? undefined })
  );

const SettingStateSchema = z
  .object({ settingName: z.string().nullish(), setting: z.string().nullish(), state: z.string().nullish() })
  .passthrough()
  .transform((s): SettingState => ({ settingName: s.settingName, setting: s.setting, state: s.state ?? NO_STATE }));

const DEVICE_SELECT = ["id", "deviceName", "userPrincipalName", "complianceState", "lastSyncDateTime"];

/** Intune managed devices and their compliance policy/setting states over Microsoft Graph. */
export class GraphIntuneSource implements DeviceSource, ComplianceSource {
  private readonly root: string;

  constructor(private readonly graph: GraphLike, opts: GraphIntuneSourceOptions = {}) {
    const resource = (opts.graphResource ?? "https://graph.microsoft.com").replace(/\/+$/, "");
    this.root = `${resource}/${opts.apiVersion ?? "beta"}/deviceManagement/managedDevices`;
  }

  /** Follows `@odata.nextLink` until the collection is exhausted. */
  async pagedGet<T>(path: string, item: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T[]> {
    const items: T[] = [];
    let next: string | undefined = path;
    while (next) {
      const page = PageSchema.parse(await this.graph.api(next).get());
      for (const raw of page.value) items.push(item.parse(raw));
      next = page["@odata.nextLink"];
    }
    return items;
  }

  async listDevices(filter?: string): Promise<Device[]> {
    const query = [`$select=${DEVICE_SELECT.join(",")}`];
    if (filter) query.push(`$filter=${encodeURIComponent(filter)}`);
    try {
      return await this.pagedGet(`${this.root}?${query.join("&")}`, ManagedDeviceSchema);
    } catch (e) {
      const n = normalizeGraphError(e);
      throw new DeviceSourceError(isAuthFailure(n) ? "auth" : "transport", n.error, { cause: e });
    }
  }

  listCompliancePolicies(deviceId: string): Promise<PolicyState[]> {
    return this.pagedGet(`${this.root}/${encodeURIComponent(deviceId)}/deviceCompliancePolicyStates`, PolicyStateSchema);
  }

  listSettingStates(deviceId: string, policyId: string): Promise<SettingState[]> {
    return this.pagedGet(
      `${this.root}/${encodeURIComponent(deviceId)}/deviceCompliancePolicyStates/${encodeURIComponent(policyId)}/settingStates`,
      SettingStateSchema
    );
  }
}
