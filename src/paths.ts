/**
 * Filesystem path helpers for agent data and the bot's login state files.
 */

import os from "node:os";
import path from "node:path";
import type { StatePaths } from "./types";

export function getAgentDir(): string {
  return process.env.PI_CODING_AGENT_DIR ?? path.join(os.homedir(), ".pi", "agent");
}

export function getConfigPath(): string {
  return path.join(getAgentDir(), "session-warning.json");
}

export function getLogPath(): string {
  return path.join(getAgentDir(), "session-warning.log");
}

export function getBotRootDir(): string {
  return process.env.SESSION_WARNING_BOT_DIR ?? process.cwd();
}

export function resolveStatePaths(botRootDir: string): StatePaths {
  const clientRoot = path.join(botRootDir, "lib", "wx849", "WechatAPI");
  return {
    deviceInfoPath: path.join(botRootDir, "wx849_device_info.json"),
    loginStatPaths: ["Client", "Client2", "Client3"].map((client) => path.join(clientRoot, client, "login_stat.json")),
    scratchDir: path.join(botRootDir, "tmp"),
  };
}
