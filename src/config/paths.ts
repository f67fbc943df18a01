import { existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";

const CONFIG_FILE = "opskit.json";

export function getConfigCandidates(env: NodeJS.ProcessEnv = process.env): string[] {
  const home = homedir();
  const paths: string[] = [];

  if (env.XDG_CONFIG_HOME) {
    paths.push(join(env.XDG_CONFIG_HOME, CONFIG_FILE));
  }

  paths.push(
    join(home, ".config", CONFIG_FILE),
    join(home, `.${CONFIG_FILE}`),
    join("/etc", CONFIG_FILE),
  );

  return paths;
}

export function findConfigFile(env: NodeJS.ProcessEnv = process.env): string | null {
  for (const p of getConfigCandidates(env)) {
    if (existsSync(p)) return p;
  }
  return null;
}
