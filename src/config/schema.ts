import { z } from "zod";

export const ConfigFileSchema = z.object({
  mode: z.enum(["mock", "live"]).optional(),
  format: z.enum(["table", "json"]).optional(),
  profile: z.string().min(1).optional(),
  region: z.string().min(1).optional(),
  aws_bin: z.string().min(1).optional(),
  fixtures_dir: z.string().min(1).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
