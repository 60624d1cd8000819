/**
 * Supervisor hooks
 *
 * Registers the two tunnelkeeper entry points with systemd:
 *
 * - tunnelkeeper-apply.service: oneshot full apply at boot
 * - tunnelkeeper-forward.service: the forward daemon, restarted on exit
 */

import * as path from "node:path";
import { createLogger } from "@tunnelkeeper/shared";
import type { HostConfig, StorePaths } from "../../config/index.js";
import { CommandError, type CommandRunner, runChecked } from "../../lib/command.js";
import { readTextIfExists, removeFile, writeFileAtomic } from "../../lib/fs.js";
import { UNIT_NOT_LOADED, meshUnitName } from "../tunnel/mesh.js";

const log = createLogger("supervisor");

export const APPLY_UNIT = "tunnelkeeper-apply.service";
export const FORWARD_UNIT = "tunnelkeeper-forward.service";
export const SUPERVISED_UNITS = [APPLY_UNIT, FORWARD_UNIT] as const;

export type SupervisedUnit = (typeof SUPERVISED_UNITS)[number];

export interface SupervisorOptions {
    runner: CommandRunner;
    host: HostConfig;
    paths: StorePaths;
    /** Command line that runs the tunnelkeeper CLI, e.g. "/usr/bin/node /opt/tunnelkeeper/dist/index.js" */
    command: string;
}

export interface UnitStatus {
    unit: string;
    installed: boolean;
    enabled: string;
    active: string;
}

/**
 * Generates the boot-time apply unit
 */
export function generateApplyUnit(command: string, home: string): string {
    return `[Unit]
Description=tunnelkeeper: bring up tunnels and forwards at boot
After=network-online.target
Wants=network-online.target

[Service]
Type=oneshot
RemainAfterExit=yes
Environment=TUNNELKEEPER_HOME=${home}
ExecStart=${command} apply --wait

# Logging to journal
StandardOutput=journal
StandardError=journal
SyslogIdentifier=tunnelkeeper-apply

[Install]
WantedBy=multi-user.target
`;
}

/**
 * Generates the forward daemon unit
 */
export function generateForwardUnit(command: string, home: string): string {
    return `[Unit]
Description=tunnelkeeper forward daemon
After=network-online.target ${APPLY_UNIT}
Wants=network-online.target

[Service]
Type=simple
Environment=TUNNELKEEPER_HOME=${home}
ExecStart=${command} daemon
Restart=always
RestartSec=5

# Logging to journal
StandardOutput=journal
StandardError=journal
SyslogIdentifier=tunnelkeeper-forward

[Install]
WantedBy=multi-user.target
`;
}

/**
 * journalctl arguments for the supervised units, or for one mesh tunnel
 */
export function journalArgs(options: { tunnel?: string; lines?: number; follow?: boolean }): string[] {
    const units = options.tunnel ? [meshUnitName(options.tunnel)] : [...SUPERVISED_UNITS];
    const args = units.flatMap((unit) => ["-u", unit]);
    args.push("-n", String(options.lines ?? 100), "--no-pager");
    if (options.follow) args.push("-f");
    return args;
}

export class Supervisor {
    private readonly runner: CommandRunner;
    private readonly host: HostConfig;
    private readonly paths: StorePaths;
    private readonly command: string;

    constructor(options: SupervisorOptions) {
        this.runner = options.runner;
        this.host = options.host;
        this.paths = options.paths;
        this.command = options.command;
    }

    unitFile(unit: SupervisedUnit): string {
        return path.join(this.host.systemdDir, unit);
    }

    /**
     * Writes both units and enables them. Idempotent.
     */
    async install(): Promise<void> {
        const contents: Record<SupervisedUnit, string> = {
            [APPLY_UNIT]: generateApplyUnit(this.command, this.paths.home),
            [FORWARD_UNIT]: generateForwardUnit(this.command, this.paths.home),
        };

        let changed = false;
        for (const unit of SUPERVISED_UNITS) {
            const file = this.unitFile(unit);
            if ((await readTextIfExists(file)) !== contents[unit]) {
                await writeFileAtomic(file, contents[unit], 0o644);
                changed = true;
                log.info(`wrote ${file}`);
            }
        }

        if (changed) {
            await this.systemctl(["daemon-reload"]);
        }
        await this.systemctl(["enable", ...SUPERVISED_UNITS]);
    }

    /**
     * Stops, disables and removes both units
     */
    async uninstall(): Promise<void> {
        await this.runner.run("systemctl", ["disable", "--now", ...SUPERVISED_UNITS]);
        for (const unit of SUPERVISED_UNITS) {
            await removeFile(this.unitFile(unit));
        }
        await this.systemctl(["daemon-reload"]);
        log.info("removed supervised units");
    }

    async start(units: readonly SupervisedUnit[] = SUPERVISED_UNITS): Promise<void> {
        await this.systemctl(["start", ...units]);
    }

    /**
     * Stops the units. A unit that is stopped or not installed counts as stopped.
     */
    async stop(units: readonly SupervisedUnit[] = SUPERVISED_UNITS): Promise<void> {
        const args = ["stop", ...units];
        const result = await this.runner.run("systemctl", args);
        if (result.exitCode === UNIT_NOT_LOADED) {
            log.debug(`systemctl stop: ${result.stderr.trim() || "unit not loaded"}`);
            return;
        }
        if (result.exitCode !== 0) {
            throw new CommandError("systemctl", args, result);
        }
    }

    async status(): Promise<UnitStatus[]> {
        const statuses: UnitStatus[] = [];
        for (const unit of SUPERVISED_UNITS) {
            const installed = (await readTextIfExists(this.unitFile(unit))) !== null;
            const enabled = await this.runner.run("systemctl", ["is-enabled", unit]);
            const active = await this.runner.run("systemctl", ["is-active", unit]);
            statuses.push({
                unit,
                installed,
                enabled: enabled.stdout.trim() || "unknown",
                active: active.stdout.trim() || "unknown",
            });
        }
        return statuses;
    }

    private async systemctl(args: string[]): Promise<void> {
        await runChecked(this.runner, "systemctl", args);
    }
}
