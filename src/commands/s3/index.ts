import { defineNamespace } from "../../core/define-namespace.ts";
import { s3CleanCommand } from "./clean.ts";

export const s3Namespace = defineNamespace("s3", "Manage S3 buckets.", [s3CleanCommand]);
