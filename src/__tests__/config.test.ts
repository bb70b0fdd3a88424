import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ConfigStore, defaultPluginConfig, readPluginConfig, toSettings, writePluginConfig } from "../config";
import { createTestLogger, makeTempDir, removeDir, writeJson } from "./helpers/test-env";

describe("plugin config", () => {
  let dir: string;
  let configPath: string;
  const logger = createTestLogger();

  beforeEach(async () => {
    dir = await makeTempDir("session-warning-config");
    configPath = path.join(dir, "nested", "session-warning.json");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  test("defaults match the documented values", () => {
    expect(defaultPluginConfig()).toEqual({
      auto_session_warning_enabled: true,
      auto_session_warning_threshold: 2,
      auto_session_warning_target: "",
      api_host: "127.0.0.1",
      api_port: 9000,
      api_path_prefix: "/VXAPI",
      session_duration_hours: 72,
      check_interval_hours: 2,
    });
  });

  test("derives the API base URL from host, port, and prefix", () => {
    const settings = toSettings({ ...defaultPluginConfig(), api_host: "10.0.0.5", api_port: 9011, api_path_prefix: "/api" });
    expect(settings.apiBaseUrl).toBe("http://10.0.0.5:9011/api");
  });

  test("uses defaults when the file is missing or not JSON", async () => {
    expect(await readPluginConfig(configPath, logger)).toEqual(defaultPluginConfig());

    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, "{not json", "utf8");
    expect(await readPluginConfig(configPath, logger)).toEqual(defaultPluginConfig());
  });

  test("falls back per field when values are invalid", async () => {
    await writeJson(configPath, {
      auto_session_warning_enabled: false,
      auto_session_warning_threshold: 90,
      auto_session_warning_target: "wxid_ops",
      api_port: "not-a-port",
      check_interval_hours: 0.5,
    });

    const config = await readPluginConfig(configPath, logger);
    expect(config.auto_session_warning_enabled).toBe(false);
    expect(config.auto_session_warning_threshold).toBe(2);
    expect(config.auto_session_warning_target).toBe("wxid_ops");
    expect(config.api_port).toBe(9000);
    expect(config.check_interval_hours).toBe(0.5);
  });

  test("writing keeps keys owned by other tools", async () => {
    await writeJson(configPath, { other_plugin_key: "keep-me", auto_session_warning_enabled: true });
    await writePluginConfig(configPath, { ...defaultPluginConfig(), auto_session_warning_enabled: false });

    const saved: unknown = JSON.parse(await fs.readFile(configPath, "utf8"));
    expect(saved).toMatchObject({ other_plugin_key: "keep-me", auto_session_warning_enabled: false, api_port: 9000 });
  });

  test("ConfigStore persists each mutation immediately", async () => {
    const store = await ConfigStore.load(configPath, logger);
    expect(store.settings.enabled).toBe(true);

    await store.setThreshold(4.5);
    await store.setEnabled(false);
    expect(store.settings).toMatchObject({ thresholdHours: 4.5, enabled: false });

    const reloaded = await ConfigStore.load(configPath, logger);
    expect(reloaded.settings).toMatchObject({ thresholdHours: 4.5, enabled: false });
  });

  test("a failed save leaves the in-memory settings unchanged", async () => {
    const store = await ConfigStore.load(configPath, logger);
    await fs.mkdir(configPath, { recursive: true });

    await expect(store.setEnabled(false)).rejects.toThrow();
    await expect(store.setThreshold(9)).rejects.toThrow();
    expect(store.settings).toMatchObject({ enabled: true, thresholdHours: 2 });
  });

  test("reload picks up edits made on disk", async () => {
    const store = await ConfigStore.load(configPath, logger);
    await writeJson(configPath, { auto_session_warning_target: "wxid_new", session_duration_hours: 48 });

    const settings = await store.reload();
    expect(settings.target).toBe("wxid_new");
    expect(settings.sessionLifetimeHours).toBe(48);
    expect(settings.enabled).toBe(true);
  });
});
