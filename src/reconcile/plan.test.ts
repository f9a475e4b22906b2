import { describe, it, expect } from "vitest";
import { findBackupClient, isChange, planAction } from "./plan.js";
import type { BackupClient, BackupDetails } from "../provider/types.js";
import { UnhandledStateError } from "../util/errors.js";
import type { DesiredState } from "../config/schema.js";

const mysql: BackupClient = {
  id: "client-mysql",
  type: "MySQL",
  storagePolicy: "30 Day Storage Policy",
  schedulePolicy: "12AM - 6AM",
};

const linux: BackupClient = {
  id: "client-linux",
  type: "FA.Linux",
  storagePolicy: "14 Day Storage Policy",
  schedulePolicy: "6PM - 12AM",
};

function details(clients: BackupClient[]): BackupDetails {
  return { targetId: "srv-1", servicePlan: "Enterprise", clients };
}

describe("findBackupClient", () => {
  it("finds the client of the requested type", () => {
    expect(findBackupClient(details([linux, mysql]), "MySQL")).toBe(mysql);
  });

  it("returns undefined when no client matches", () => {
    expect(findBackupClient(details([linux]), "PostgreSQL")).toBeUndefined();
  });

  it("returns undefined for a target without clients", () => {
    expect(findBackupClient(details([]), "MySQL")).toBeUndefined();
  });

  it("takes the first match when the provider returns duplicates", () => {
    const second = { ...mysql, id: "client-mysql-2" };
    expect(findBackupClient(details([mysql, second]), "MySQL")?.id).toBe("client-mysql");
  });
});

describe("planAction", () => {
  it("does nothing for absent without a client", () => {
    expect(planAction("absent", undefined, details([]))).toEqual({ kind: "noop" });
  });

  it("removes an existing client for absent", () => {
    expect(planAction("absent", mysql, details([mysql]))).toEqual({ kind: "remove", client: mysql });
  });

  it("adds a client for present without one", () => {
    expect(planAction("present", undefined, details([linux]))).toEqual({ kind: "add" });
  });

  it("re-applies the current service plan for present with a client", () => {
    expect(planAction("present", mysql, details([mysql]))).toEqual({
      kind: "modify",
      client: mysql,
      servicePlan: "Enterprise",
    });
  });

  it("rejects an unknown desired state", () => {
    const bogus = "archived" as unknown as DesiredState;
    expect(() => planAction(bogus, undefined, details([]))).toThrow(UnhandledStateError);
  });
});

describe("isChange", () => {
  it("counts every action except noop", () => {
    expect(isChange({ kind: "noop" })).toBe(false);
    expect(isChange({ kind: "add" })).toBe(true);
    expect(isChange({ kind: "remove", client: mysql })).toBe(true);
    expect(isChange({ kind: "modify", client: mysql, servicePlan: "Essentials" })).toBe(true);
  });
});
