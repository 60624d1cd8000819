/**
 * Mesh tunnel driver
 *
 * Each mesh tunnel is an easytier-core process supervised by its own systemd
 * unit. The shared secret lives in an owner-only environment file next to the
 * store rather than in the world-readable unit file.
 */

import * as path from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import {
    type MeshTunnelConfig,
    type ObservedState,
    TunnelError,
    createLogger,
    errorMessage,
} from "@tunnelkeeper/shared";
import type { HostConfig } from "../../config/index.js";
import { type CommandResult, type CommandRunner, runChecked } from "../../lib/command.js";
import { readTextIfExists, removeFile, writeFileAtomic } from "../../lib/fs.js";
import { parseLinkFlags } from "./l2tp.js";
import type { DriverContext, EnsureUpOptions, TunnelDriver } from "./types.js";

const log = createLogger("mesh");

/** systemctl exit status for a unit that is not loaded */
export const UNIT_NOT_LOADED = 5;

export function meshUnitName(id: string): string {
    return `tunnelkeeper-mesh-${id}.service`;
}

/**
 * Builds the easytier-core argument list. The secret is referenced through
 * the unit's environment so it never appears in the unit file.
 */
export function meshCommandArgs(config: MeshTunnelConfig, meshBinary: string): string[] {
    return [
        meshBinary,
        "-i", config.overlayIp,
        "--hostname", config.hostname,
        "--network-secret", "${MESH_SECRET}",
        "--default-protocol", "tcp",
        "--listeners", `tcp://[::]:${config.listenPort}`, `tcp://0.0.0.0:${config.listenPort}`,
        "--multi-thread",
        "--dev-name", config.interfaceName,
        "--rpc-portal", `127.0.0.1:${config.rpcPort}`,
        "--peers", `tcp://${config.peerIp}:${config.listenPort}`,
    ];
}

/**
 * Generates the systemd unit for a mesh tunnel
 */
export function generateMeshUnit(config: MeshTunnelConfig, host: HostConfig, envFile: string): string {
    return `[Unit]
Description=tunnelkeeper mesh tunnel ${config.id}
After=network-online.target
Wants=network-online.target
StartLimitIntervalSec=60
StartLimitBurst=5

[Service]
Type=simple

# Shared secret (owner-only file)
EnvironmentFile=${envFile}

ExecStart=${meshCommandArgs(config, host.meshBinary).join(" ")}
Restart=on-failure
RestartSec=5

# Logging to journal
StandardOutput=journal
StandardError=journal
SyslogIdentifier=tunnelkeeper-mesh-${config.id}

[Install]
WantedBy=multi-user.target
`;
}

/**
 * Generates the environment file holding the shared secret
 */
export function generateMeshEnv(config: MeshTunnelConfig): string {
    const escaped = config.secret.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
    return `# tunnelkeeper mesh tunnel ${config.id}
MESH_SECRET="${escaped}"
`;
}

export interface MeshPeer {
    ipv4: string;
    hostname: string;
    cost: string;
    latency: string | null;
    loss: string | null;
    rx: string | null;
    tx: string | null;
    tunnel: string | null;
    nat: string | null;
}

const BOX_RULE = /[┌├└─┬┴┼]/;

/**
 * Parses the box-drawing table printed by `easytier-cli peer`
 *
 *   │ ipv4        │ hostname │ cost  │ lat_ms │ loss │ rx_bytes │ tx_bytes │ tunnel_proto │ nat_type │
 *   │ 10.155.155.2│ kharej   │ p2p   │ 41.20  │ 0.0% │ 1.2 MB   │ 900 kB   │ tcp          │ FullCone │
 */
export function parseMeshPeers(output: string): MeshPeer[] {
    const peers: MeshPeer[] = [];
    const dash = (value: string | undefined): string | null =>
        value === undefined || value === "" || value === "-" ? null : value;

    for (const raw of output.split("\n")) {
        const line = raw.trim();
        if (!line.startsWith("│") || BOX_RULE.test(line)) continue;

        const cells = line
            .split("│")
            .slice(1, -1)
            .map((cell) => cell.trim());
        if (cells.length < 7) continue;

        const first = cells[0].toLowerCase();
        if (first === "ipv4" || cells[1].toLowerCase() === "hostname") continue;

        peers.push({
            ipv4: cells[0],
            hostname: cells[1],
            cost: cells[2],
            latency: dash(cells[3]),
            loss: dash(cells[4]),
            rx: dash(cells[5]),
            tx: dash(cells[6]),
            tunnel: dash(cells[7]),
            nat: dash(cells[8]),
        });
    }
    return peers;
}

export class MeshDriver implements TunnelDriver<MeshTunnelConfig> {
    readonly kind = "mesh";
    private readonly runner: CommandRunner;
    private readonly host: HostConfig;
    private readonly envDir: string;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(context: DriverContext) {
        this.runner = context.runner;
        this.host = context.host;
        this.envDir = path.join(context.paths.home, "mesh");
        this.sleep = context.sleep ?? ((ms) => delay(ms));
    }

    unitFile(id: string): string {
        return path.join(this.host.systemdDir, meshUnitName(id));
    }

    envFile(id: string): string {
        return path.join(this.envDir, `${id}.env`);
    }

    async ensureUp(
        config: MeshTunnelConfig,
        options: EnsureUpOptions = {}
    ): Promise<ObservedState> {
        const unit = meshUnitName(config.id);
        try {
            const changed = await this.writeUnitFiles(config);
            const state = await this.activeState(unit);

            if (changed || options.recreate || state !== "active") {
                await this.systemctl(["enable", unit]);
                const verb = state === "active" ? "restart" : "start";
                await this.systemctl([verb, unit]);
                log.info(`${config.id}: ${verb}ed ${unit}${changed ? " with new parameters" : ""}`);
                await this.sleep(this.host.settleMs);
            }
        } catch (error) {
            throw new TunnelError(config.id, errorMessage(error), { cause: error });
        }

        return this.status(config);
    }

    async ensureDown(config: MeshTunnelConfig): Promise<void> {
        const unit = meshUnitName(config.id);
        const unitFile = this.unitFile(config.id);
        try {
            const installed = (await readTextIfExists(unitFile)) !== null;
            if (installed) {
                await this.systemctlTolerant(["stop", unit]);
                await this.systemctlTolerant(["disable", unit]);
            }
            await removeFile(unitFile);
            await removeFile(this.envFile(config.id));
            if (installed) {
                await this.systemctl(["daemon-reload"]);
                log.info(`${config.id}: stopped and removed ${unit}`);
            }
        } catch (error) {
            throw new TunnelError(config.id, errorMessage(error), { cause: error });
        }
    }

    async status(config: MeshTunnelConfig): Promise<ObservedState> {
        const base = { tunnelId: config.id };
        const unit = meshUnitName(config.id);

        let installedUnit: string | null;
        let installedEnv: string | null;
        let state: string;
        try {
            installedUnit = await readTextIfExists(this.unitFile(config.id));
            installedEnv = await readTextIfExists(this.envFile(config.id));
            if (installedUnit === null) {
                return { ...base, presence: "absent", detail: `${unit} not installed` };
            }
            state = await this.activeState(unit);
        } catch (error) {
            return { ...base, presence: "error", detail: `cannot probe ${unit}`, error: errorMessage(error) };
        }

        switch (state) {
            case "active":
                break;
            case "failed":
                return { ...base, presence: "error", detail: `${unit} failed`, error: `${unit} is in failed state` };
            case "inactive":
                return { ...base, presence: "absent", detail: `${unit} installed but inactive` };
            default:
                return { ...base, presence: "degraded", detail: `${unit} is ${state}` };
        }

        const envFile = this.envFile(config.id);
        const stale =
            installedUnit !== generateMeshUnit(config, this.host, envFile) ||
            installedEnv !== generateMeshEnv(config);
        if (stale) {
            return { ...base, presence: "degraded", detail: `${unit} runs with outdated parameters` };
        }

        const link = await this.runner.run("ip", ["-o", "link", "show", "dev", config.interfaceName]);
        const flags = link.exitCode === 0 ? parseLinkFlags(link.stdout)?.flags ?? [] : [];
        if (!flags.includes("UP")) {
            return {
                ...base,
                presence: "degraded",
                detail: `${unit} running, interface ${config.interfaceName} not up`,
            };
        }

        return {
            ...base,
            presence: "up",
            detail: `${unit} running, ${config.overlayIp} on ${config.interfaceName} via ${config.peerIp}:${config.listenPort}`,
        };
    }

    /**
     * Lists the peers the local mesh node currently sees
     */
    async listPeers(config: MeshTunnelConfig): Promise<MeshPeer[]> {
        const result = await this.runner.run(this.host.meshCliBinary, [
            "-p",
            `127.0.0.1:${config.rpcPort}`,
            "peer",
        ]);
        if (result.exitCode !== 0) {
            throw new TunnelError(
                config.id,
                `easytier-cli peer failed: ${result.stderr.trim() || `exit ${result.exitCode}`}`
            );
        }
        return parseMeshPeers(result.stdout);
    }

    /**
     * Writes the unit and environment files when they differ from the record.
     * Returns whether anything changed.
     */
    private async writeUnitFiles(config: MeshTunnelConfig): Promise<boolean> {
        const unitFile = this.unitFile(config.id);
        const envFile = this.envFile(config.id);
        const unit = generateMeshUnit(config, this.host, envFile);
        const env = generateMeshEnv(config);

        const unitChanged = (await readTextIfExists(unitFile)) !== unit;
        const envChanged = (await readTextIfExists(envFile)) !== env;
        if (!unitChanged && !envChanged) return false;

        if (envChanged) await writeFileAtomic(envFile, env, 0o600);
        if (unitChanged) await writeFileAtomic(unitFile, unit, 0o644);
        await this.systemctl(["daemon-reload"]);
        return true;
    }

    private async activeState(unit: string): Promise<string> {
        // is-active exits nonzero for every state but "active" and still prints the state
        const result = await this.runner.run("systemctl", ["is-active", unit]);
        const state = result.stdout.trim();
        if (!state) {
            throw new Error(`systemctl is-active ${unit} failed: ${result.stderr.trim()}`);
        }
        return state;
    }

    private systemctl(args: string[]): Promise<CommandResult> {
        return runChecked(this.runner, "systemctl", args);
    }

    private async systemctlTolerant(args: string[]): Promise<void> {
        const result = await this.runner.run("systemctl", args);
        if (result.exitCode !== 0 && result.exitCode !== UNIT_NOT_LOADED) {
            log.warn(`systemctl ${args.join(" ")}: ${result.stderr.trim() || `exit ${result.exitCode}`}`);
        }
    }
}
