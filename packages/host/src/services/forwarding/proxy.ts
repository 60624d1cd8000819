/**
 * Proxy activation
 *
 * A new document goes live in four steps: write a staging file beside the
 * live one, run the engine's validator on it, rename it over the live file,
 * then ask systemd to reload the proxy. The live file is untouched until the
 * validator passes, and it is restored when the reload fails.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
    type ForwardRule,
    ReloadError,
    type ReloadStage,
    createLogger,
    errorMessage,
} from "@tunnelkeeper/shared";
import type { ForwardEngine, HostConfig } from "../../config/index.js";
import type { CommandResult, CommandRunner } from "../../lib/command.js";
import { readTextIfExists, removeFile, writeFileAtomic } from "../../lib/fs.js";
import { parseLiveRules } from "./markers.js";
import type { ConfigDocument } from "./types.js";

const log = createLogger("proxy");

const PROXY_FILE_MODE = 0o644;

/**
 * Arguments that make each engine check a configuration file and exit
 */
export function validatorArgs(engine: ForwardEngine, file: string): string[] {
    return engine === "haproxy" ? ["-c", "-f", file] : ["-t", "-c", file];
}

export type ActivateOutcome = "applied" | "unchanged";

function commandOutput(result: CommandResult): string {
    return (result.stderr || result.stdout).trim() || `exit ${result.exitCode}`;
}

export class ProxyController {
    private readonly runner: CommandRunner;
    private readonly host: HostConfig;

    constructor(context: { runner: CommandRunner; host: HostConfig }) {
        this.runner = context.runner;
        this.host = context.host;
    }

    get configPath(): string {
        return this.host.proxyConfigPath;
    }

    get stagingPath(): string {
        const file = this.host.proxyConfigPath;
        return path.join(path.dirname(file), `.${path.basename(file)}.tunnelkeeper-staging`);
    }

    /**
     * Current content of the live configuration file, or null when absent
     */
    async readLive(): Promise<string | null> {
        try {
            return await readTextIfExists(this.configPath);
        } catch (error) {
            throw new ReloadError("write", `cannot read ${this.configPath}: ${errorMessage(error)}`, {
                cause: error,
            });
        }
    }

    /**
     * Rules present in the live configuration
     */
    async liveRules(): Promise<ForwardRule[]> {
        const text = await this.readLive();
        return text === null ? [] : parseLiveRules(text);
    }

    /**
     * Makes `document` the active proxy configuration.
     * Throws ReloadError; the previous configuration stays active on failure.
     */
    async activate(document: ConfigDocument): Promise<ActivateOutcome> {
        const previous = await this.readLive();
        if (previous === document.text) {
            log.debug(`${this.configPath} unchanged, skipping reload`);
            return "unchanged";
        }

        const staging = this.stagingPath;
        await this.step("write", `cannot write ${staging}`, () =>
            writeFileAtomic(staging, document.text, PROXY_FILE_MODE)
        );

        const check = await this.runner.run(
            this.host.proxyBinary,
            validatorArgs(document.engine, staging)
        );
        if (check.exitCode !== 0) {
            await removeFile(staging);
            throw new ReloadError(
                "validate",
                `${document.engine} rejected the generated configuration: ${commandOutput(check)}`
            );
        }

        await this.step("write", `cannot replace ${this.configPath}`, () =>
            fs.rename(staging, this.configPath)
        );

        const reload = await this.reloadService();
        if (reload.exitCode !== 0) {
            await this.restore(previous);
            throw new ReloadError(
                "reload",
                `reloading ${this.host.proxyService} failed: ${commandOutput(reload)}`
            );
        }

        log.info(
            `activated ${document.rules.length} rule(s) in ${this.configPath} ` +
                `and reloaded ${this.host.proxyService}`
        );
        return "applied";
    }

    /**
     * Reloads a running proxy; starts one that is not running
     */
    private async reloadService(): Promise<CommandResult> {
        const service = this.host.proxyService;
        const active = await this.runner.run("systemctl", ["is-active", service]);
        const verb = active.stdout.trim() === "active" ? "reload" : "start";
        return this.runner.run("systemctl", [verb, service]);
    }

    private async restore(previous: string | null): Promise<void> {
        try {
            if (previous === null) {
                await removeFile(this.configPath);
            } else {
                await writeFileAtomic(this.configPath, previous, PROXY_FILE_MODE);
            }
            log.warn(`reload failed, restored previous ${this.configPath}`);
        } catch (error) {
            throw new ReloadError(
                "reload",
                `reload failed and ${this.configPath} could not be restored: ${errorMessage(error)}`,
                { cause: error }
            );
        }
    }

    private async step<T>(stage: ReloadStage, message: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            throw new ReloadError(stage, `${message}: ${errorMessage(error)}`, { cause: error });
        }
    }
}
