/**
 * Human-readable reply and notification texts.
 */

import {
  COMMAND_CONFIG,
  COMMAND_DISABLE,
  COMMAND_ENABLE,
  COMMAND_STATUS,
  COMMAND_TEST,
  COMMAND_THRESHOLD,
} from "./constants";
import { triggerHours } from "./expiry";
import type { ExpiryReport, Identity, MonitorState, Settings } from "./types";
import { formatHours, formatThreshold } from "./utils";

export const MISSING_IDENTITY_TEXT = "❌ 无法获取当前登录信息，请确保微信已正常登录。";
export const MISSING_LOGIN_TIME_TEXT = "❌ 无法获取登录时间信息。";
export const MISSING_RECIPIENT_TEXT = "❌ 未设置预警接收者，无法发送登录二维码。";
export const ENABLED_TEXT = "✅ 已启用自动掉线预警功能";
export const DISABLED_TEXT = "⛔️ 已禁用自动掉线预警功能";

/** Manual status query: one decimal place. */
export function buildStatusText(report: ExpiryReport): string {
  const online = formatHours(report.onlineHours, 1);
  if (report.expired) {
    return `🔴 当前预警状态\n您已持续在线超过${online}小时，session可能已过期，建议立即重新登录！`;
  }
  return `⚠️ 当前预警状态\n您已持续在线超过${online}小时，预计${formatHours(report.remainingHours, 1)}小时内即将掉线。`;
}

function describeRemaining(report: ExpiryReport): string {
  const online = formatHours(report.onlineHours, 0);
  if (report.expired) {
    return `您已持续在线超过${online}小时，session可能已过期。`;
  }
  return `您已持续在线超过${online}小时，预计${formatHours(report.remainingHours, 0)}小时内即将掉线。`;
}

/** Automatic warning pushed to the configured recipient. */
export function buildWarningText(report: ExpiryReport): string {
  return `⚠️ 登录状态预警\n\n${describeRemaining(report)}\n\n为避免服务中断，请手动扫码重新登录！\n稍后将为您发送登录二维码。`;
}

export function buildTestText(report: ExpiryReport): string {
  return `⚠️ 掉线预警测试\n${describeRemaining(report)}\n为避免服务中断，请手动扫码重新登录！稍后将为您发送登录二维码。`;
}

export function buildConfigText(settings: Settings, identity: Identity | null, monitorState: MonitorState): string {
  const lines: string[] = [];
  lines.push("📋 配置信息:");
  lines.push(`   API服务器: ${settings.apiHost}:${settings.apiPort}${settings.apiPathPrefix}`);
  lines.push(`   登录微信ID: ${identity?.id || "未获取到"}`);
  lines.push(`   设备ID: ${identity?.deviceId || "未获取到"}`);
  lines.push(`   预警接收者: ${settings.target || "未设置"}`);
  lines.push(`   预警状态: ${settings.enabled ? "已启用" : "已禁用"}`);
  lines.push(`   预警阈值: ${formatThreshold(settings.thresholdHours)}小时`);
  lines.push(`   会话时长: ${formatThreshold(settings.sessionLifetimeHours)}小时`);
  lines.push(`   检查间隔: ${formatThreshold(settings.pollIntervalHours)}小时`);
  lines.push(`   后台检查: ${monitorState === "running" ? "运行中" : "已停止"}`);
  return lines.join("\n");
}

export function buildThresholdText(thresholdHours: number, sessionLifetimeHours: number): string {
  const trigger = triggerHours(sessionLifetimeHours, thresholdHours);
  return `✅ 已调整预警阈值为${formatThreshold(thresholdHours)}小时，当持续在线时长超过${formatThreshold(trigger)}小时时将自动触发预警。`;
}

export function buildFailureText(operation: string, message: string): string {
  return `❌ ${operation}失败: ${message}`;
}

export function buildHelpText(): string {
  return [
    "🔔 自动掉线预警帮助",
    "",
    "指令说明：",
    `• ${COMMAND_STATUS} - 查询当前在线状态和预计掉线时间`,
    `• ${COMMAND_CONFIG} - 获取当前预警配置信息`,
    `• ${COMMAND_ENABLE} - 开启自动掉线预警功能`,
    `• ${COMMAND_DISABLE} - 关闭自动掉线预警功能`,
    `• ${COMMAND_THRESHOLD} xh - 设置预警阈值（如：${COMMAND_THRESHOLD} 2h）`,
    `• ${COMMAND_TEST} - 手动进行掉线预警测试`,
    "",
    "/session-warning reload - 重新加载配置文件",
  ].join("\n");
}

/** One-line footer status for the pi UI. */
export function buildStatusLine(settings: Settings, monitorState: MonitorState): string {
  if (!settings.enabled) return "Session warning: off";
  const loop = monitorState === "running" ? "" : " (stopped)";
  return `Session warning: on, ${formatThreshold(settings.thresholdHours)}h before expiry${loop}`;
}
