import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { listFleet, runComplianceReport, runInactiveDevicesReport } from "../src/report.js";
import { DeviceSourceError, ExportError, FleetError } from "../src/errors.js";
import { FakeFleet, dev, setting, testLogger, twoDeviceFleet, type FakeDevice } from "./fakes.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "intune-report-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function deps(fleet: FakeDevice[]) {
  const source = new FakeFleet(fleet);
  return { devices: source, compliance: source, logger: testLogger() };
}

describe("runComplianceReport", () => {
  it("exports the BitLocker/Firewall fleet with sentinel gaps", async () => {
    const out = path.join(dir, "compliance.csv");
    const report = await runComplianceReport(deps(twoDeviceFleet()), { path: out });

    expect(report.columns).toEqual([
      "DeviceName",
      "UserPrincipalName",
      "DeviceId",
      "ComplianceState",
      "LastSyncDateTime",
      "BitLocker",
      "Firewall",
    ]);
    expect(report.rows.map((r) => [r.BitLocker, r.Firewall])).toEqual([
      ["compliant", "none"],
      ["error", "compliant"],
    ]);
    expect(fs.readFileSync(out, "utf8")).toBe(
      [
        "DeviceName,UserPrincipalName,DeviceId,ComplianceState,LastSyncDateTime,BitLocker,Firewall",
        "A,a@contoso.test,id-a,compliant,2026-10-01T08:00:00Z,compliant,none",
        "B,b@contoso.test,id-b,noncompliant,2026-10-01T08:00:00Z,error,compliant",
      ].join("\r\n")
    );
    expect(report.warnings).toEqual([]);
  });

  it("passes the device filter to the source", async () => {
    const d = deps(twoDeviceFleet());
    await runComplianceReport(d, { filter: "operatingSystem eq 'Windows'" });
    expect(d.devices.lastFilter).toBe("operatingSystem eq 'Windows'");
  });

  it("gives a device with no resolvable settings a row of sentinels", async () => {
    const fleet = [
      ...twoDeviceFleet(),
      { device: dev("id-c", "C"), policies: [{ id: "p1", settings: [{ state: "compliant" }] }] },
    ];
    const report = await runComplianceReport(deps(fleet));
    expect(report.columns.slice(5)).toEqual(["BitLocker", "Firewall"]);
    expect(report.rows[2]).toMatchObject({ DeviceId: "id-c", BitLocker: "none", Firewall: "none" });
  });

  it("uses the row-building fetch when only discovery failed for a device", async () => {
    const fleet = [
      ...twoDeviceFleet(),
      {
        device: dev("id-d", "D"),
        policies: [{ id: "p1", settings: [setting("BitLocker", "error"), setting("Encryption", "compliant")] }],
        failOnCalls: [1],
      },
    ];
    const report = await runComplianceReport(deps(fleet));
    expect(report.columns.slice(5)).toEqual(["BitLocker", "Firewall"]);
    expect(report.rows[2]).toMatchObject({ DeviceId: "id-d", BitLocker: "error", Firewall: "none" });
    expect(report.rows[2]).not.toHaveProperty("Encryption");
    expect(report.warnings).toEqual(["column discovery skipped D (id-d): graph unavailable for id-d"]);
  });

  it("isolates a device that fails in both passes", async () => {
    const healthy = [
      ...twoDeviceFleet(),
      { device: dev("id-e", "E"), policies: [{ id: "p1", settings: [setting("Antivirus", "compliant")] }] },
    ];
    const broken: FakeDevice = {
      device: dev("id-d", "D"),
      policies: [{ id: "p1", settings: [setting("Encryption", "compliant")] }],
      failOnCalls: [1, 2],
    };

    const baseline = await runComplianceReport(deps(healthy));
    const withFailure = await runComplianceReport(deps([healthy[0], broken, healthy[1], healthy[2]]));

    expect(withFailure.rows).toHaveLength(4);
    expect(withFailure.columns).toEqual(baseline.columns);
    expect(withFailure.rows.filter((r) => r.DeviceId !== "id-d")).toEqual(baseline.rows);
    expect(withFailure.rows[1]).toEqual({
      DeviceName: "D",
      UserPrincipalName: "d@contoso.test",
      DeviceId: "id-d",
      ComplianceState: "compliant",
      LastSyncDateTime: "2026-10-01T08:00:00Z",
      Antivirus: "none",
      BitLocker: "none",
      Firewall: "none",
    });
    expect(withFailure.warnings).toHaveLength(2);
  });

  it("produces identical output on repeated runs", async () => {
    const first = path.join(dir, "first.csv");
    const second = path.join(dir, "second.csv");
    const a = await runComplianceReport(deps(twoDeviceFleet()), { path: first });
    const b = await runComplianceReport(deps(twoDeviceFleet()), { path: second });
    expect(b).toEqual(a);
    expect(fs.readFileSync(second)).toEqual(fs.readFileSync(first));
  });

  it("matches the sequential result when devices are fetched in parallel", async () => {
    const fleet = [
      ...twoDeviceFleet(),
      { device: dev("id-e", "E"), policies: [{ id: "p1", settings: [setting("Antivirus", "error")] }] },
      { device: dev("id-f", "F"), policies: [{ id: "p1", settings: [setting("Firewall", "error")] }] },
    ];
    const sequential = await runComplianceReport(deps(fleet));
    const parallel = await runComplianceReport(deps(fleet), { concurrency: 4 });
    expect(parallel).toEqual(sequential);
  });

  it("aborts without exporting when the caller is not authorized", async () => {
    const out = path.join(dir, "denied.csv");
    const source = new FakeFleet(
      [],
      new DeviceSourceError("auth", { type: "AuthorizationError", message: "Forbidden", statusCode: 403, throttled: false, retryable: false })
    );
    const logger = testLogger();
    const err = await runComplianceReport({ devices: source, compliance: source, logger }, { path: out }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FleetError);
    expect(err).toMatchObject({ reason: "auth", message: "not authorized to list managed devices: Forbidden" });
    expect(logger.error).toHaveBeenCalledWith("not authorized to list managed devices: Forbidden");
    expect(fs.existsSync(out)).toBe(false);
  });

  it("reports transport failures while listing separately", async () => {
    const source = new FakeFleet([], new Error("socket hang up"));
    const err = await listFleet(source, testLogger()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FleetError);
    expect(err).toMatchObject({ reason: "transport", message: "listing managed devices failed: socket hang up" });
  });

  it("treats an empty fleet as fatal", async () => {
    const out = path.join(dir, "empty.csv");
    const err = await runComplianceReport(deps([]), { path: out, filter: "operatingSystem eq 'iOS'" }).catch(
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(FleetError);
    expect(err).toMatchObject({ reason: "empty", message: `no managed devices matching "operatingSystem eq 'iOS'"` });
    expect(fs.existsSync(out)).toBe(false);
  });

  it("attaches the built report when the file cannot be written", async () => {
    const out = path.join(dir, "missing-dir", "compliance.csv");
    const err = await runComplianceReport(deps(twoDeviceFleet()), { path: out }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExportError);
    if (!(err instanceof ExportError)) return;
    expect(err.path).toBe(out);
    expect(err.report).toMatchObject({
      columns: ["DeviceName", "UserPrincipalName", "DeviceId", "ComplianceState", "LastSyncDateTime", "BitLocker", "Firewall"],
      rows: [{ DeviceId: "id-a" }, { DeviceId: "id-b" }],
    });
  });
});

describe("runInactiveDevicesReport", () => {
  it("writes only devices past the threshold", async () => {
    const out = path.join(dir, "inactive.csv");
    const fleet: FakeDevice[] = [
      { device: dev("id-1", "Fresh", { lastSyncDateTime: "2026-10-18T00:00:00Z" }), policies: [] },
      { device: dev("id-2", "Stale", { lastSyncDateTime: "2026-08-01T00:00:00Z" }), policies: [] },
    ];
    const report = await runInactiveDevicesReport(
      { devices: new FakeFleet(fleet), logger: testLogger() },
      { path: out, days: 30, now: new Date("2026-10-19T00:00:00Z") }
    );
    expect(report.rows.map((r) => r.DeviceId)).toEqual(["id-2"]);
    expect(fs.readFileSync(out, "utf8")).toBe(
      [
        "DeviceName,UserPrincipalName,DeviceId,ComplianceState,LastSyncDateTime,DaysSinceLastSync",
        "Stale,stale@contoso.test,id-2,compliant,2026-08-01T00:00:00Z,79",
      ].join("\r\n")
    );
  });
});
