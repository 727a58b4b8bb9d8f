export type ComplianceState =
  | "unknown"
  | "compliant"
  | "noncompliant"
  | "conflict"
  | "error"
  | "inGracePeriod"
  | "configManager"
  | (string & {});

export interface Device {
  id: string;
  deviceName: string;
  userPrincipalName: string;
  complianceState: ComplianceState;
  lastSyncDateTime: string; // ISO-8601, "" when Graph has none
}

export interface PolicyState {
  id: string;
  displayName?: string;
  state?: string;
}

export interface SettingState {
  settingName?: string | null; // primary name field
  setting?: string | null;     // fallback name field
  state: string;               // "compliant", "error", "none", ...
}

/** Column names in header order. */
export type ColumnSet = readonly string[];

export type ReportRow = Record<string, string>;

export interface ComplianceReport {
  columns: string[];
  rows: ReportRow[];
  warnings: string[];
}

export interface DeviceSource {
  listDevices(filter?: string): Promise<Device[]>;
}

export interface ComplianceSource {
  listCompliancePolicies(deviceId: string): Promise<PolicyState[]>;
  listSettingStates(deviceId: string, policyId: string): Promise<SettingState[]>;
}

export interface Logger {
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export const IDENTITY_COLUMNS = [
  "DeviceName",
  "UserPrincipalName",
  "DeviceId",
  "ComplianceState",
  "LastSyncDateTime",
] as const;

export type IdentityColumn = (typeof IDENTITY_COLUMNS)[number];

/** Literal written for a setting with no recorded state on a device. */
export const NO_STATE = "none";
