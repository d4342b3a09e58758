export { buildServer } from "./server/server.js";
export type { ServerOptions } from "./server/server.js";
export { DEFAULT_CONFIG_FILE, LOG_LEVELS, loadConfig, loadSettings, resolveSettings } from "./config/config.js";
export type { AppConfig, LogLevel, ResolvedSettings, SettingFlags, SettingSource } from "./config/config.js";
export { DEFAULT_FACTORS_PATH, loadFactorTable } from "./config/factors.js";
