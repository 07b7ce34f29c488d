import { existsSync } from "fs";
import { join } from "path";
import { homedir } from "os";

export function getConfigCandidates(): string[] {
  const home = homedir();
  const paths: string[] = [];

  if (process.env.XDG_CONFIG_HOME) {
    paths.push(join(process.env.XDG_CONFIG_HOME, "sqlsh.json"));
  }

  paths.push(
    join(home, ".config", "sqlsh.json"),
    join(home, ".sqlsh.json"),
    "/etc/sqlsh.json",
  );

  return paths;
}

export function findConfigFile(): string | null {
  for (const p of getConfigCandidates()) {
    if (existsSync(p)) return p;
  }
  return null;
}

/** Startup script run before any input: `~/.sqlshrc`. */
export function getStartupScriptPath(): string {
  return join(homedir(), ".sqlshrc");
}
