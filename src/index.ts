import type { ExtensionAPI, ExtensionContext } from "@mariozechner/pi-coding-agent";
import {
  COMMAND_CONFIG,
  COMMAND_DISABLE,
  COMMAND_ENABLE,
  COMMAND_STATUS,
  COMMAND_TEST,
  COMMAND_THRESHOLD,
  REPORT_MESSAGE_TYPE,
  STATUS_KEY,
} from "./constants";
import { createComponentLogger, initializeLogger } from "./logger";
import { SessionWarningPlugin } from "./plugin";
import { registerReportRenderer } from "./renderer";
import { buildHelpText, buildStatusLine } from "./report";
import { describeError } from "./utils";

type ChatCommand = {
  literal: string;
  description: string;
};

const CHAT_COMMANDS: ChatCommand[] = [
  { literal: COMMAND_STATUS, description: "Show online time and the projected session expiry" },
  { literal: COMMAND_CONFIG, description: "Show session warning configuration" },
  { literal: COMMAND_ENABLE, description: "Enable automatic session expiry warnings" },
  { literal: COMMAND_DISABLE, description: "Disable automatic session expiry warnings" },
  { literal: COMMAND_THRESHOLD, description: "Set the warning threshold, e.g. 2h" },
  { literal: COMMAND_TEST, description: "Send a test warning and login QR code" },
];

export default function sessionWarningExtension(pi: ExtensionAPI): void {
  const logger = createComponentLogger("extension", initializeLogger());
  let loading: Promise<SessionWarningPlugin> | undefined;

  const getPlugin = (): Promise<SessionWarningPlugin> => {
    loading ??= SessionWarningPlugin.load({ logger });
    return loading;
  };

  const applyStatus = (ctx: ExtensionContext, plugin: SessionWarningPlugin): void => {
    ctx.ui.setStatus(STATUS_KEY, buildStatusLine(plugin.config.settings, plugin.monitor.state));
  };

  const sendReport = (content: string): void => {
    pi.sendMessage({ customType: REPORT_MESSAGE_TYPE, content, display: true });
  };

  registerReportRenderer(pi);

  pi.on("session_start", async (_event, ctx) => {
    try {
      applyStatus(ctx, await getPlugin());
    } catch (error) {
      logger.error("Failed to start session warning plugin", { error: describeError(error) });
      ctx.ui.notify(`Session warning failed to start: ${describeError(error)}`, "warning");
    }
  });

  pi.on("session_shutdown", async () => {
    if (!loading) return;
    const plugin = await loading;
    loading = undefined;
    await plugin.shutdown();
  });

  // Chat commands are exposed as /预警状态 etc.; arguments are passed through.
  for (const command of CHAT_COMMANDS) {
    pi.registerCommand(command.literal.slice(1), {
      description: command.description,
      handler: async (args, ctx) => {
        const plugin = await getPlugin();
        const extra = (args ?? "").trim();
        const reply = await plugin.commands.handle(extra ? `${command.literal} ${extra}` : command.literal);
        sendReport(reply ?? buildHelpText());
        applyStatus(ctx, plugin);
      },
    });
  }

  pi.registerCommand("session-warning", {
    description: "Session expiry warning help (supports reload)",
    handler: async (args, ctx) => {
      const tokens = (args ?? "")
        .trim()
        .split(/\s+/)
        .filter(Boolean);

      if (tokens.length === 0 || tokens[0] === "help") {
        sendReport(buildHelpText());
        return;
      }

      if (tokens[0] !== "reload" || tokens.length > 1) {
        ctx.ui.notify("Unknown subcommand. Use /session-warning [help|reload]", "warning");
        return;
      }

      const plugin = await getPlugin();
      await plugin.reload();
      applyStatus(ctx, plugin);
      ctx.ui.notify(`Session warning config reloaded from ${plugin.config.path}`, "info");
    },
  });
}
