/**
 * Type definitions for tunnel drivers
 */

import type { ObservedState, TunnelConfig } from "@tunnelkeeper/shared";
import type { HostConfig, StorePaths } from "../../config/index.js";
import type { CommandRunner } from "../../lib/command.js";

export interface EnsureUpOptions {
    /** Tear down and rebuild even when live state already matches */
    recreate?: boolean;
}

/**
 * Brings one kind of tunnel in line with its record.
 * Drivers keep no tunnel state between calls; every answer comes from a fresh probe.
 */
export interface TunnelDriver<C extends TunnelConfig> {
    readonly kind: C["kind"];
    /** Idempotent. Returns the state probed after acting. Throws TunnelError. */
    ensureUp(config: C, options?: EnsureUpOptions): Promise<ObservedState>;
    /** Tears the tunnel down. A tunnel that is already gone is a success. */
    ensureDown(config: C): Promise<void>;
    /** Read-only probe */
    status(config: C): Promise<ObservedState>;
}

export interface DriverContext {
    runner: CommandRunner;
    host: HostConfig;
    paths: StorePaths;
    /** Waits after starting a process before probing it */
    sleep?: (ms: number) => Promise<void>;
}
