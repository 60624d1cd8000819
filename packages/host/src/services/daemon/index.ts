/**
 * Forward daemon
 *
 * Long-lived loop that keeps the proxy in line with the rule set:
 *
 * - polls a fingerprint of the rules (fs.watch events only cause an early poll)
 * - debounces change bursts into one forwarding pass
 * - probes tunnels on a slower interval and re-applies any that is not up
 *
 * It holds nothing that cannot be rebuilt from the store and the live proxy
 * file, so the supervisor can restart it at any time.
 */

import * as fs from "node:fs";
import {
    ApplyInProgressError,
    type ApplyReport,
    type TunnelOutcome,
    createLogger,
    errorMessage,
} from "@tunnelkeeper/shared";
import type { DaemonConfig } from "../../config/index.js";
import { ensureDir } from "../../lib/fs.js";
import { summarizeRules } from "../reconciler/report.js";
import { Debouncer } from "./debounce.js";

export { Debouncer } from "./debounce.js";

const log = createLogger("daemon");

export interface DaemonReconciler {
    apply(options: { tunnel?: string }): Promise<ApplyReport>;
    applyForwarding(): Promise<ApplyReport>;
    probeTunnels(): Promise<TunnelOutcome[]>;
}

export interface DaemonStore {
    readonly paths: { rulesDir: string };
    rulesFingerprint(): Promise<string>;
}

export interface ForwardDaemonOptions {
    reconciler: DaemonReconciler;
    store: DaemonStore;
    config: DaemonConfig;
    /** Subscribe to filesystem events on the rules directory (default: true) */
    watch?: boolean;
}

export class ForwardDaemon {
    private readonly reconciler: DaemonReconciler;
    private readonly store: DaemonStore;
    private readonly config: DaemonConfig;
    private readonly watchEnabled: boolean;
    private readonly debouncer: Debouncer;

    private pollTimer: ReturnType<typeof setInterval> | null = null;
    private driftTimer: ReturnType<typeof setInterval> | null = null;
    private watcher: fs.FSWatcher | null = null;
    private fingerprint: string | null = null;
    private polling = false;
    private running = false;
    /** Serializes passes started by this daemon */
    private queue: Promise<void> = Promise.resolve();

    constructor(options: ForwardDaemonOptions) {
        this.reconciler = options.reconciler;
        this.store = options.store;
        this.config = options.config;
        this.watchEnabled = options.watch ?? true;
        this.debouncer = new Debouncer(
            () => this.enqueue(() => this.forwardingPass()),
            this.config.debounceMs,
            this.config.maxWaitMs
        );
    }

    get isRunning(): boolean {
        return this.running;
    }

    /**
     * Runs the initial pass and starts the timers
     */
    async start(): Promise<void> {
        if (this.running) return;
        this.running = true;

        log.info(
            `starting (poll ${this.config.pollIntervalMs}ms, debounce ${this.config.debounceMs}ms, ` +
                `max wait ${this.config.maxWaitMs}ms, drift ${this.config.driftIntervalMs}ms)`
        );

        try {
            this.fingerprint = await this.store.rulesFingerprint();
        } catch (error) {
            log.error(`cannot read rules: ${errorMessage(error)}`);
        }
        this.enqueue(() => this.forwardingPass());

        this.pollTimer = setInterval(() => {
            void this.poll();
        }, this.config.pollIntervalMs);
        this.driftTimer = setInterval(() => {
            this.enqueue(() => this.driftProbe());
        }, this.config.driftIntervalMs);

        if (this.watchEnabled) {
            await this.startWatcher();
        }

        await this.queue;
    }

    /**
     * Stops the timers and waits for a running pass to finish
     */
    async stop(): Promise<void> {
        if (!this.running) return;
        this.running = false;

        if (this.pollTimer) clearInterval(this.pollTimer);
        if (this.driftTimer) clearInterval(this.driftTimer);
        this.pollTimer = null;
        this.driftTimer = null;
        this.watcher?.close();
        this.watcher = null;
        this.debouncer.cancel();

        await this.queue;
        log.info("stopped");
    }

    /**
     * Reports an out-of-band rule change (e.g. from a CLI mutation in-process)
     */
    notifyChange(): void {
        if (this.running) this.debouncer.trigger();
    }

    /**
     * Compares the rules fingerprint against the last one seen
     */
    async poll(): Promise<void> {
        if (this.polling || !this.running) return;
        this.polling = true;

        try {
            const next = await this.store.rulesFingerprint();
            if (next !== this.fingerprint) {
                log.debug("rule set changed");
                this.fingerprint = next;
                this.debouncer.trigger();
            }
        } catch (error) {
            log.error(`cannot read rules: ${errorMessage(error)}`);
        } finally {
            this.polling = false;
        }
    }

    /**
     * Drains the pass queue (for callers that need to observe a settled daemon)
     */
    idle(): Promise<void> {
        return this.queue;
    }

    private enqueue(task: () => Promise<void>): void {
        this.queue = this.queue.then(task);
    }

    private async forwardingPass(): Promise<void> {
        if (!this.running) return;
        try {
            const report = await this.reconciler.applyForwarding();
            log.info(`forwarding pass: rules ${summarizeRules(report.rules)}, reload ${report.reload.status}`);
            if (report.reload.status === "failed") {
                log.error(`proxy not updated (${report.reload.stage}): ${report.reload.error}`);
            }
        } catch (error) {
            if (error instanceof ApplyInProgressError) {
                log.info("another apply pass is running, retrying after the debounce window");
                this.debouncer.trigger();
                return;
            }
            log.error(`forwarding pass failed: ${errorMessage(error)}`);
        }
    }

    private async driftProbe(): Promise<void> {
        if (!this.running) return;
        let tunnels: TunnelOutcome[];
        try {
            tunnels = await this.reconciler.probeTunnels();
        } catch (error) {
            log.error(`drift probe failed: ${errorMessage(error)}`);
            return;
        }

        for (const tunnel of tunnels) {
            if (tunnel.presence === "up" || !this.running) continue;
            log.warn(`${tunnel.tunnelId} is ${tunnel.presence} (${tunnel.detail}), re-applying`);
            try {
                const report = await this.reconciler.apply({ tunnel: tunnel.tunnelId });
                const after = report.tunnels.find((t) => t.tunnelId === tunnel.tunnelId);
                log.info(`${tunnel.tunnelId} is ${after?.presence ?? "unknown"} after re-apply`);
            } catch (error) {
                log.error(`re-applying ${tunnel.tunnelId} failed: ${errorMessage(error)}`);
            }
        }
    }

    private async startWatcher(): Promise<void> {
        const dir = this.store.paths.rulesDir;
        try {
            await ensureDir(dir);
            this.watcher = fs.watch(dir, () => {
                void this.poll();
            });
            this.watcher.on("error", (error) => {
                log.warn(`watching ${dir} stopped: ${error.message}; polling continues`);
                this.watcher?.close();
                this.watcher = null;
            });
        } catch (error) {
            log.warn(`cannot watch ${dir}: ${errorMessage(error)}; polling only`);
        }
    }
}
