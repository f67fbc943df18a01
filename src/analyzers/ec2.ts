import { z } from "zod";
import { UserError } from "../core/errors.ts";

const TagSchema = z.object({ Key: z.string(), Value: z.string().optional() });

const InstanceSchema = z.object({
  InstanceId: z.string(),
  InstanceType: z.string().optional(),
  State: z.object({ Name: z.string() }).optional(),
  LaunchTime: z.string().optional(),
  Placement: z.object({ AvailabilityZone: z.string().optional() }).optional(),
  PrivateIpAddress: z.string().optional(),
  PublicIpAddress: z.string().optional(),
  Monitoring: z.object({ State: z.string().optional() }).optional(),
  MetadataOptions: z.object({ HttpTokens: z.string().optional() }).optional(),
  Tags: z.array(TagSchema).optional(),
});

export const DescribeInstancesSchema = z.object({
  Reservations: z
    .array(z.object({ Instances: z.array(InstanceSchema).default([]) }))
    .default([]),
});

export type Instance = z.infer<typeof InstanceSchema>;

export interface InstanceSummary {
  id: string;
  name: string;
  type: string;
  state: string;
  zone: string;
  privateIp: string;
  publicIp: string;
  launchTime: string;
}

export type HealthStatus = "ok" | "warn" | "critical";

export interface HealthReport {
  id: string;
  name: string;
  state: string;
  status: HealthStatus;
  issues: string[];
}

const CRITICAL_STATES = new Set(["stopped", "terminated", "shutting-down"]);
const TRANSITIONAL_STATES = new Set(["pending", "stopping"]);

/** Flatten an `ec2 describe-instances` document into its instances, sorted by id. */
export function extractInstances(doc: unknown): Instance[] {
  const parsed = DescribeInstancesSchema.safeParse(doc);
  if (!parsed.success) {
    throw new UserError(
      "Instance data is not an ec2 describe-instances document.",
      parsed.error.issues[0]?.message,
    );
  }
  return parsed.data.Reservations.flatMap((r) => r.Instances).sort((a, b) =>
    a.InstanceId.localeCompare(b.InstanceId),
  );
}

export function instanceName(instance: Instance): string {
  return instance.Tags?.find((t) => t.Key === "Name")?.Value ?? "";
}

export function summarizeInstances(doc: unknown): InstanceSummary[] {
  return extractInstances(doc).map((i) => ({
    id: i.InstanceId,
    name: instanceName(i),
    type: i.InstanceType ?? "",
    state: i.State?.Name ?? "unknown",
    zone: i.Placement?.AvailabilityZone ?? "",
    privateIp: i.PrivateIpAddress ?? "",
    publicIp: i.PublicIpAddress ?? "",
    launchTime: i.LaunchTime ?? "",
  }));
}

/** Inspect one instance. Any critical finding outranks every warning. */
export function checkInstance(instance: Instance): HealthReport {
  const state = instance.State?.Name ?? "unknown";
  const issues: string[] = [];
  let status: HealthStatus = "ok";

  if (CRITICAL_STATES.has(state)) {
    issues.push(`instance is ${state}`);
    status = "critical";
  } else if (TRANSITIONAL_STATES.has(state)) {
    issues.push(`instance is ${state}`);
  }

  if (!instanceName(instance)) issues.push("missing Name tag");
  if (instance.PublicIpAddress) issues.push(`public IP ${instance.PublicIpAddress}`);
  if (instance.MetadataOptions?.HttpTokens !== "required") issues.push("IMDSv1 allowed");
  if (instance.Monitoring?.State !== "enabled") issues.push("detailed monitoring disabled");

  if (status === "ok" && issues.length > 0) status = "warn";

  return {
    id: instance.InstanceId,
    name: instanceName(instance),
    state,
    status,
    issues,
  };
}

export function checkInstances(doc: unknown): HealthReport[] {
  return extractInstances(doc).map(checkInstance);
}
