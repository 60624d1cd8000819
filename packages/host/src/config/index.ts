/**
 * Host configuration
 *
 * Loads `config.json` from the tunnelkeeper home directory and fills in the
 * defaults of the selected forwarding engine. A missing file yields the
 * defaults; a malformed one is a ValidationError.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { StoreIOError, ValidationError, formatIssues } from "@tunnelkeeper/shared";
import { isNodeError } from "../lib/fs.js";

export const DEFAULT_HOME = "/etc/tunnelkeeper";
export const HOME_ENV = "TUNNELKEEPER_HOME";

export const ForwardEngineSchema = z.enum(["haproxy", "nginx"]);
export type ForwardEngine = z.infer<typeof ForwardEngineSchema>;

const DaemonConfigSchema = z
    .object({
        /** Quiet period after the last rule change before reconciling */
        debounceMs: z.number().int().min(0).default(2000),
        /** Upper bound on how long a burst of changes can defer reconciliation */
        maxWaitMs: z.number().int().min(0).default(15000),
        pollIntervalMs: z.number().int().min(100).default(5000),
        driftIntervalMs: z.number().int().min(1000).default(60000),
    })
    .strict();

export const HostConfigSchema = z
    .object({
        logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
        forwardEngine: ForwardEngineSchema.default("haproxy"),
        proxyBinary: z.string().min(1).optional(),
        proxyConfigPath: z.string().min(1).optional(),
        proxyService: z.string().min(1).optional(),
        meshBinary: z.string().min(1).default("/usr/local/bin/easytier-core"),
        meshCliBinary: z.string().min(1).default("/usr/local/bin/easytier-cli"),
        systemdDir: z.string().min(1).default("/etc/systemd/system"),
        workerConcurrency: z.number().int().min(1).max(64).default(4),
        settleMs: z.number().int().min(0).default(3000),
        retainOnFailure: z.boolean().default(false),
        daemon: DaemonConfigSchema.default({}),
    })
    .strict();

type ParsedHostConfig = z.infer<typeof HostConfigSchema>;

export type DaemonConfig = z.infer<typeof DaemonConfigSchema>;

export type HostConfig = Omit<ParsedHostConfig, "proxyBinary" | "proxyConfigPath" | "proxyService"> & {
    proxyBinary: string;
    proxyConfigPath: string;
    proxyService: string;
};

const ENGINE_DEFAULTS: Record<
    ForwardEngine,
    Pick<HostConfig, "proxyBinary" | "proxyConfigPath" | "proxyService">
> = {
    haproxy: {
        proxyBinary: "/usr/sbin/haproxy",
        proxyConfigPath: "/etc/haproxy/haproxy.cfg",
        proxyService: "haproxy",
    },
    nginx: {
        proxyBinary: "/usr/sbin/nginx",
        proxyConfigPath: "/etc/nginx/nginx.conf",
        proxyService: "nginx",
    },
};

/**
 * Paths of everything tunnelkeeper keeps under its home directory
 */
export interface StorePaths {
    home: string;
    configFile: string;
    tunnelsDir: string;
    rulesDir: string;
    stateDir: string;
    lastApplyFile: string;
    storeLock: string;
    applyLock: string;
}

export function resolveHome(env: NodeJS.ProcessEnv = process.env): string {
    const fromEnv = env[HOME_ENV]?.trim();
    return fromEnv ? path.resolve(fromEnv) : DEFAULT_HOME;
}

export function resolvePaths(home: string): StorePaths {
    return {
        home,
        configFile: path.join(home, "config.json"),
        tunnelsDir: path.join(home, "tunnels"),
        rulesDir: path.join(home, "rules"),
        stateDir: path.join(home, "state"),
        lastApplyFile: path.join(home, "state", "last-apply.json"),
        storeLock: path.join(home, ".store.lock"),
        applyLock: path.join(home, ".apply.lock"),
    };
}

/**
 * Validates raw configuration and applies engine defaults
 */
export function parseHostConfig(raw: unknown): HostConfig {
    const result = HostConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ValidationError(formatIssues(result.error).map((issue) => `config.json ${issue}`));
    }

    const parsed = result.data;
    const defaults = ENGINE_DEFAULTS[parsed.forwardEngine];
    return {
        ...parsed,
        proxyBinary: parsed.proxyBinary ?? defaults.proxyBinary,
        proxyConfigPath: parsed.proxyConfigPath ?? defaults.proxyConfigPath,
        proxyService: parsed.proxyService ?? defaults.proxyService,
    };
}

/**
 * Reads config.json from the home directory
 */
export async function loadHostConfig(home: string): Promise<HostConfig> {
    const file = resolvePaths(home).configFile;

    let text: string;
    try {
        text = await fs.readFile(file, "utf8");
    } catch (error) {
        if (isNodeError(error) && error.code === "ENOENT") {
            return parseHostConfig({});
        }
        throw new StoreIOError(file, "cannot read host configuration", { cause: error });
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ValidationError([
            `config.json is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        ]);
    }
    return parseHostConfig(raw);
}
