/**
 * Reconciler
 *
 * The single control operation behind `apply`, the boot unit and the forward
 * daemon. One pass:
 *
 *   1. snapshot the store
 *   2. bring tunnels up (or only probe them) through the worker pool
 *   3. admit the rules of tunnels that are up
 *   4. compile the admitted rules
 *   5. activate the document unless it matches the live file
 *   6. record and return the report
 *
 * Passes and tunnel removal are exclusive per host through the apply lock.
 * Status reads never take that lock.
 */

import {
    ApplyInProgressError,
    type ApplyMode,
    type ApplyReport,
    CompileError,
    type ForwardRule,
    type ObservedState,
    type ReloadOutcome,
    ReloadError,
    type StatusReport,
    StoreIOError,
    type TunnelConfig,
    type TunnelOutcome,
    ValidationError,
    createLogger,
    errorMessage,
} from "@tunnelkeeper/shared";
import type { HostConfig } from "../../config/index.js";
import { LONG_WAIT, acquireLock, isLocked } from "../../lib/lock.js";
import { WorkerPool } from "../../lib/pool.js";
import { compile } from "../forwarding/compiler.js";
import { parseLiveRules } from "../forwarding/markers.js";
import type { ProxyController } from "../forwarding/proxy.js";
import type { ConfigStore } from "../store/index.js";
import type { TunnelDrivers } from "../tunnel/index.js";
import { admitRules, containsRule, summarizeRules } from "./report.js";

export { admitRules, containsRule, reportExitCode, statusExitCode, summarizeRules } from "./report.js";

const log = createLogger("reconciler");

export interface ReconcilerDeps {
    store: ConfigStore;
    drivers: TunnelDrivers;
    proxy: ProxyController;
    host: HostConfig;
    now?: () => Date;
}

export interface ApplyOptions {
    /** Act on this tunnel only; the others are probed */
    tunnel?: string;
    /** Recreate the selected tunnel even when it matches its record */
    restart?: boolean;
    /** Wait for a running pass instead of failing with ApplyInProgressError */
    wait?: boolean;
    /** Called as each tunnel enters and leaves the pending state */
    onProgress?: (outcome: TunnelOutcome) => void;
}

export interface ForwardingOptions {
    wait?: boolean;
}

export interface RemoveOptions {
    /** Delete the tunnel's forward rules with it */
    cascade?: boolean;
    wait?: boolean;
}

export interface TunnelRemoval {
    /** Rules deleted along with the tunnel */
    removed: ForwardRule[];
    /** Forwarding pass run after the record was deleted */
    report: ApplyReport;
}

type TunnelAction = "ensure" | "recreate" | "probe";

export class Reconciler {
    private readonly store: ConfigStore;
    private readonly drivers: TunnelDrivers;
    private readonly proxy: ProxyController;
    private readonly host: HostConfig;
    private readonly now: () => Date;

    constructor(deps: ReconcilerDeps) {
        this.store = deps.store;
        this.drivers = deps.drivers;
        this.proxy = deps.proxy;
        this.host = deps.host;
        this.now = deps.now ?? (() => new Date());
    }

    /**
     * Full pass, or a pass acting on one tunnel when `tunnel` is set
     */
    async apply(options: ApplyOptions = {}): Promise<ApplyReport> {
        const mode: ApplyMode = options.tunnel === undefined ? "full" : "tunnel";

        return this.exclusive(options.wait ?? false, async () => {
            const snapshot = await this.store.snapshot();
            if (
                options.tunnel !== undefined &&
                !snapshot.tunnels.some((tunnel) => tunnel.id === options.tunnel)
            ) {
                throw new ValidationError([`tunnel "${options.tunnel}" does not exist`]);
            }

            const action = (tunnel: TunnelConfig): TunnelAction => {
                if (options.tunnel !== undefined && tunnel.id !== options.tunnel) return "probe";
                return options.restart ? "recreate" : "ensure";
            };

            const tunnels = await this.visitTunnels(snapshot.tunnels, action, options.onProgress);
            return this.record(await this.finishPass(mode, snapshot.rules, tunnels));
        });
    }

    /**
     * Forwarding-only pass: tunnels are probed, never touched
     */
    async applyForwarding(options: ForwardingOptions = {}): Promise<ApplyReport> {
        return this.exclusive(options.wait ?? false, async () => this.record(await this.forwardingPass()));
    }

    /**
     * Tears a tunnel down, deletes its record and drops its forwards
     *
     * The record is kept when the teardown fails so the tunnel can still be
     * managed. Refuses while the tunnel owns rules unless `cascade` is set.
     */
    async removeTunnel(id: string, options: RemoveOptions = {}): Promise<TunnelRemoval> {
        return this.exclusive(options.wait ?? false, async () => {
            const tunnel = await this.store.get(id);
            if (tunnel === null) {
                throw new ValidationError([`tunnel "${id}" does not exist`]);
            }
            const owned = await this.store.listRules(tunnel.id);
            if (owned.length > 0 && !options.cascade) {
                throw new ValidationError([
                    `tunnel "${tunnel.id}" still owns ${owned.length} forward rule(s); ` +
                        "remove them first or delete with cascade",
                ]);
            }

            await this.drivers.ensureDown(tunnel);
            const removed = await this.store.delete(tunnel.id, { cascade: options.cascade });
            const report = await this.record(await this.forwardingPass());
            return { removed, report };
        });
    }

    /**
     * Probes every tunnel without taking the apply lock
     */
    async probeTunnels(): Promise<TunnelOutcome[]> {
        const tunnels = await this.store.list();
        return this.visitTunnels(tunnels, () => "probe");
    }

    /**
     * Read-only view of the host; never waits for a running pass
     */
    async status(): Promise<StatusReport> {
        const observedAt = this.now().toISOString();
        const applyInProgress = await isLocked(this.store.paths.applyLock);
        const lastApply = await this.store.readLastApply();
        const tunnels = await this.probeTunnels();
        const rules = await this.store.listRules();

        let live: string | null = null;
        try {
            live = await this.proxy.readLive();
        } catch (error) {
            log.warn(errorMessage(error));
        }
        const liveRules = live === null ? [] : parseLiveRules(live);

        return {
            observedAt,
            applyInProgress,
            lastApply,
            tunnels,
            rules: rules.map((rule) => ({ ...rule, live: containsRule(liveRules, rule) })),
            proxy: {
                engine: this.host.forwardEngine,
                configPath: this.proxy.configPath,
                present: live !== null,
            },
        };
    }

    private async exclusive<T>(wait: boolean, work: () => Promise<T>): Promise<T> {
        const lockPath = this.store.paths.applyLock;
        const lock = await acquireLock({ lockPath, retries: wait ? LONG_WAIT : 0 });
        if (!lock.acquired) {
            if (lock.held) throw new ApplyInProgressError();
            throw new StoreIOError(lockPath, lock.error ?? "cannot take the apply lock");
        }

        try {
            return await work();
        } finally {
            await lock.release();
        }
    }

    private async record(report: ApplyReport): Promise<ApplyReport> {
        try {
            await this.store.writeLastApply({ finishedAt: this.now().toISOString(), report });
        } catch (error) {
            log.warn(`could not record the pass: ${errorMessage(error)}`);
        }
        return report;
    }

    private async forwardingPass(): Promise<ApplyReport> {
        const snapshot = await this.store.snapshot();
        const tunnels = await this.visitTunnels(snapshot.tunnels, () => "probe");
        return this.finishPass("forwarding", snapshot.rules, tunnels);
    }

    private async visitTunnels(
        tunnels: readonly TunnelConfig[],
        action: (tunnel: TunnelConfig) => TunnelAction,
        onProgress?: (outcome: TunnelOutcome) => void
    ): Promise<TunnelOutcome[]> {
        const pool = new WorkerPool(this.host.workerConcurrency);

        return Promise.all(
            tunnels.map((tunnel) =>
                pool.run(tunnel.id, async (): Promise<TunnelOutcome> => {
                    const step = action(tunnel);
                    if (step !== "probe") {
                        onProgress?.({
                            tunnelId: tunnel.id,
                            kind: tunnel.kind,
                            presence: "pending",
                            detail: step === "recreate" ? "recreating" : "bringing up",
                        });
                    }

                    const observed = await this.visitTunnel(tunnel, step);
                    const outcome: TunnelOutcome = { ...observed, kind: tunnel.kind };
                    if (step !== "probe") onProgress?.(outcome);
                    return outcome;
                })
            )
        );
    }

    private async visitTunnel(tunnel: TunnelConfig, step: TunnelAction): Promise<ObservedState> {
        try {
            if (step === "probe") {
                return await this.drivers.status(tunnel);
            }

            const observed = await this.drivers.ensureUp(tunnel, { recreate: step === "recreate" });
            if (observed.presence !== "up") {
                log.warn(`${tunnel.id}: ${observed.presence} after bring-up: ${observed.detail}`);
            }
            return observed;
        } catch (error) {
            log.error(`${tunnel.id}: ${errorMessage(error)}`);
            return {
                tunnelId: tunnel.id,
                presence: "error",
                detail: step === "probe" ? "probe failed" : "bring-up failed",
                error: errorMessage(error),
            };
        }
    }

    private async finishPass(
        mode: ApplyMode,
        rules: readonly ForwardRule[],
        tunnels: TunnelOutcome[]
    ): Promise<ApplyReport> {
        const retain = this.host.retainOnFailure;
        let liveRules: ForwardRule[] = [];
        if (retain && tunnels.some((tunnel) => tunnel.presence !== "up")) {
            try {
                liveRules = await this.proxy.liveRules();
            } catch (error) {
                log.warn(`cannot read live rules to retain: ${errorMessage(error)}`);
            }
        }

        const outcomes = admitRules(rules, tunnels, liveRules, retain, this.host.forwardEngine);
        const reload = await this.activate(outcomes.filter((rule) => rule.status !== "skipped"));

        const up = tunnels.filter((tunnel) => tunnel.presence === "up").length;
        log.info(
            `${mode} pass: ${up}/${tunnels.length} tunnel(s) up, ` +
                `rules ${summarizeRules(outcomes)}, reload ${reload.status}`
        );
        return { mode, tunnels, rules: outcomes, reload };
    }

    private async activate(rules: readonly ForwardRule[]): Promise<ReloadOutcome> {
        try {
            const document = compile(rules, { engine: this.host.forwardEngine });
            const outcome = await this.proxy.activate(document);
            return { status: outcome };
        } catch (error) {
            if (error instanceof CompileError) {
                log.error(error.message);
                return { status: "failed", stage: "compile", error: error.message };
            }
            if (error instanceof ReloadError) {
                log.error(error.message);
                return { status: "failed", stage: error.stage, error: error.message };
            }
            throw error;
        }
    }
}
