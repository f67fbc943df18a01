import { defineNamespace } from "../../core/define-namespace.ts";
import { ec2HealthCommand } from "./health.ts";
import { ec2ListCommand } from "./list.ts";

export const ec2Namespace = defineNamespace(
  "ec2",
  "Inspect EC2 instances.",
  [ec2ListCommand, ec2HealthCommand],
);
