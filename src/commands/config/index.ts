import { defineNamespace } from "../../core/define-namespace.ts";
import { configShowCommand } from "./show.ts";

export const configNamespace = defineNamespace(
  "config",
  "Inspect toolkit configuration.",
  [configShowCommand],
);
