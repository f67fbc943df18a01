import { defineNamespace } from "../../core/define-namespace.ts";
import { logsAnalyzeCommand } from "./analyze.ts";

export const logsNamespace = defineNamespace("logs", "Analyze local log files.", [logsAnalyzeCommand]);
