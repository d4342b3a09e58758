import { readFile } from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import { type ReportingPeriod, isReportingPeriod } from "@carbontally/emission-core";
import { extractErrorCode } from "@carbontally/shared";
import { DEFAULT_FACTORS_PATH } from "./factors.js";

export const DEFAULT_CONFIG_FILE = "carbontally.config.json";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface AppConfig {
    factorsPath?: string;
    period?: ReportingPeriod;
    server?: {
        host?: string;
        port?: number;
        logLevel?: LogLevel;
    };
}

export type SettingSource = "cli" | "config" | "default";

export interface ResolvedSettings {
    factorsPath: string;
    period: ReportingPeriod;
    host: string;
    port: number;
    logLevel: LogLevel;
    sources: {
        factorsPath: SettingSource;
        period: SettingSource;
    };
}

export interface SettingFlags {
    factors?: string;
    period?: string;
    host?: string;
    port?: string;
    logLevel?: string;
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parsePort(name: string, value: unknown): number {
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0 || value > 65535) {
        throw new Error(`${name} must be an integer between 0 and 65535`);
    }
    return value;
}

function parseConfig(parsed: unknown, configDir: string): AppConfig {
    if (!isRecord(parsed)) {
        throw new Error("--config: invalid JSON object");
    }
    const config: AppConfig = {};

    if (parsed.factorsPath !== undefined) {
        if (typeof parsed.factorsPath !== "string") throw new Error("--config: factorsPath must be a string");
        // relative to the config file, not to the cwd
        config.factorsPath = path.resolve(configDir, parsed.factorsPath);
    }

    if (parsed.period !== undefined) {
        if (typeof parsed.period !== "string" || !isReportingPeriod(parsed.period)) {
            throw new Error(`--config: period must be "as-reported" or "weekly"`);
        }
        config.period = parsed.period;
    }

    if (parsed.server !== undefined) {
        const server = parsed.server;
        if (!isRecord(server)) throw new Error("--config: server must be an object");
        config.server = {};
        if (server.host !== undefined) {
            if (typeof server.host !== "string") throw new Error("--config: server.host must be a string");
            config.server.host = server.host;
        }
        if (server.port !== undefined) {
            config.server.port = parsePort("--config: server.port", server.port);
        }
        if (server.logLevel !== undefined) {
            if (typeof server.logLevel !== "string" || !isLogLevel(server.logLevel)) {
                throw new Error(`--config: server.logLevel must be one of ${LOG_LEVELS.join(", ")}`);
            }
            config.server.logLevel = server.logLevel;
        }
    }

    return config;
}

/**
 * Load a JSON config file. A missing file is fine for the implicit default
 * location (returns undefined) and an error when the path was given with --config.
 */
export async function loadConfig(configPath: string, options: { explicit?: boolean } = {}): Promise<AppConfig | undefined> {
    let raw: string;
    try {
        raw = await readFile(configPath, 'utf-8');
    } catch (error) {
        const code = extractErrorCode(error);
        if (code === 'ENOENT') {
            if (!options.explicit) return undefined;
            throw new Error(`[--config]: no such file ${configPath}`);
        }
        throw error;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new Error(`--config: ${configPath} is not valid JSON`, { cause: error });
    }
    return parseConfig(parsed, path.dirname(configPath));
}

//parameter resolution order
//CLI FLAGS > CONFIG > DEFAULT
export function resolveSettings(flags: SettingFlags, config?: AppConfig): ResolvedSettings {
    let period: ReportingPeriod = config?.period ?? "as-reported";
    if (flags.period !== undefined) {
        if (!isReportingPeriod(flags.period)) {
            throw new Error(`--period must be "as-reported" or "weekly"`);
        }
        period = flags.period;
    }

    let logLevel: LogLevel = config?.server?.logLevel ?? "info";
    if (flags.logLevel !== undefined) {
        if (!isLogLevel(flags.logLevel)) {
            throw new Error(`--log-level must be one of ${LOG_LEVELS.join(", ")}`);
        }
        logLevel = flags.logLevel;
    }

    const port = flags.port !== undefined ? parsePort("--port", Number(flags.port)) : config?.server?.port ?? 3000;

    return {
        factorsPath: flags.factors ? path.resolve(flags.factors) : config?.factorsPath ?? DEFAULT_FACTORS_PATH,
        period,
        host: flags.host ?? config?.server?.host ?? "127.0.0.1",
        port,
        logLevel,
        sources: {
            factorsPath: flags.factors ? "cli" : config?.factorsPath ? "config" : "default",
            period: flags.period !== undefined ? "cli" : config?.period ? "config" : "default",
        },
    };
}

/** --config when given (must exist), else ./carbontally.config.json when present */
export async function loadSettings(flags: SettingFlags & { config?: string }): Promise<ResolvedSettings> {
    const configPath = flags.config ?? path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);
    const config = await loadConfig(configPath, { explicit: flags.config !== undefined });
    return resolveSettings(flags, config);
}
