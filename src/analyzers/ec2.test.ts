import { describe, test, expect } from "vitest";
import { readFileSync } from "node:fs";
import { checkInstance, checkInstances, extractInstances, summarizeInstances } from "./ec2.ts";
import { UserError } from "../core/errors.ts";

const fixture: unknown = JSON.parse(
  readFileSync(new URL("../../fixtures/ec2_describe_instances.json", import.meta.url), "utf-8"),
);

describe("extractInstances", () => {
  test("flattens reservations and sorts by instance id", () => {
    expect(extractInstances(fixture).map((i) => i.InstanceId)).toEqual([
      "i-0a9e2d7c1b3f4e502",
      "i-0b7d8e9f0a1c2d304",
      "i-0c3f6a1d2b4e5f601",
      "i-0f1e2d3c4b5a69703",
    ]);
  });

  test("empty document yields no instances", () => {
    expect(extractInstances({})).toEqual([]);
  });

  test("rejects documents of the wrong shape", () => {
    expect(() => extractInstances({ Reservations: "nope" })).toThrow(UserError);
  });
});

describe("summarizeInstances", () => {
  test("maps instance fields", () => {
    const [first] = summarizeInstances(fixture);
    expect(first).toEqual({
      id: "i-0a9e2d7c1b3f4e502",
      name: "web-2",
      type: "t3.medium",
      state: "running",
      zone: "us-east-1b",
      privateIp: "10.0.2.34",
      publicIp: "",
      launchTime: "2025-11-02T09:14:35+00:00",
    });
  });

  test("is deterministic for the same input", () => {
    expect(summarizeInstances(fixture)).toEqual(summarizeInstances(fixture));
  });
});

describe("checkInstance", () => {
  test("healthy running instance", () => {
    const report = checkInstance({
      InstanceId: "i-1",
      State: { Name: "running" },
      Tags: [{ Key: "Name", Value: "api" }],
      MetadataOptions: { HttpTokens: "required" },
      Monitoring: { State: "enabled" },
    });
    expect(report).toEqual({ id: "i-1", name: "api", state: "running", status: "ok", issues: [] });
  });

  test("stopped instance is critical", () => {
    const report = checkInstance({
      InstanceId: "i-2",
      State: { Name: "stopped" },
      Tags: [{ Key: "Name", Value: "worker" }],
      MetadataOptions: { HttpTokens: "required" },
      Monitoring: { State: "enabled" },
    });
    expect(report.status).toBe("critical");
    expect(report.issues).toEqual(["instance is stopped"]);
  });

  test("missing state, tags and hardening produce warnings", () => {
    const report = checkInstance({ InstanceId: "i-3", PublicIpAddress: "203.0.113.9" });
    expect(report.status).toBe("warn");
    expect(report.state).toBe("unknown");
    expect(report.issues).toEqual([
      "missing Name tag",
      "public IP 203.0.113.9",
      "IMDSv1 allowed",
      "detailed monitoring disabled",
    ]);
  });
});

describe("checkInstances", () => {
  test("reports every fixture instance", () => {
    expect(checkInstances(fixture)).toEqual([
      { id: "i-0a9e2d7c1b3f4e502", name: "web-2", state: "running", status: "ok", issues: [] },
      {
        id: "i-0b7d8e9f0a1c2d304",
        name: "",
        state: "pending",
        status: "warn",
        issues: ["instance is pending", "missing Name tag"],
      },
      {
        id: "i-0c3f6a1d2b4e5f601",
        name: "web-1",
        state: "running",
        status: "warn",
        issues: ["public IP 54.210.11.7"],
      },
      {
        id: "i-0f1e2d3c4b5a69703",
        name: "batch-worker",
        state: "stopped",
        status: "critical",
        issues: ["instance is stopped", "IMDSv1 allowed", "detailed monitoring disabled"],
      },
    ]);
  });
});
