/**
 * Custom message renderer for warning command replies.
 */

import type { ExtensionAPI } from "@mariozechner/pi-coding-agent";
import { Box, Text } from "@mariozechner/pi-tui";
import { REPORT_MESSAGE_TYPE } from "./constants";

const FIELD_PATTERN = /^(\s+)([^:：]+)([:：])\s*(.*)$/;

export function registerReportRenderer(pi: ExtensionAPI): void {
  pi.registerMessageRenderer(REPORT_MESSAGE_TYPE, (message, _options, theme) => {
    const raw = typeof message.content === "string" ? message.content : "";
    const styled = raw
      .split("\n")
      .map((line, index) => {
        if (line.startsWith("❌") || line.startsWith("🔴")) {
          return theme.fg("error", theme.bold(line));
        }

        if (line.startsWith("⚠️") || line.startsWith("⛔️")) {
          return theme.fg("warning", theme.bold(line));
        }

        if (index === 0) {
          return theme.fg("accent", theme.bold(line));
        }

        const field = FIELD_PATTERN.exec(line);
        if (field) {
          const [, indent = "", key = "", colon = ":", value = ""] = field;
          return `${indent}${theme.fg("muted", `${key}${colon}`)} ${theme.fg("text", value)}`;
        }

        if (line.startsWith("•") || line.startsWith("/")) {
          return theme.fg("dim", line);
        }

        return line;
      })
      .join("\n");

    const box = new Box(1, 1, (t) => theme.bg("customMessageBg", t));
    box.addChild(new Text(styled, 0, 0));
    return box;
  });
}
