import { homedir } from "node:os";
import { join } from "node:path";

export interface StateDirOptions {
  env?: NodeJS.ProcessEnv;
  home?: string;
}

function expandHome(path: string, home: string): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

/**
 * Where the bot keeps its tags: `state_dir` when configured, else
 * `$XDG_STATE_HOME/<name>`, else `~/.local/state/<name>`.
 */
export function resolveStateDir(
  configured: string | undefined,
  botName: string,
  options: StateDirOptions = {},
): string {
  const env = options.env ?? process.env;
  const home = options.home ?? homedir();

  if (configured !== undefined) return expandHome(configured, home);

  const xdg = env.XDG_STATE_HOME;
  if (xdg !== undefined && xdg !== "") return join(xdg, botName);

  return join(home, ".local", "state", botName);
}
