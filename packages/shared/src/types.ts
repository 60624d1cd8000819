/**
 * Domain types shared across tunnelkeeper packages
 */

import type { z } from "zod";
import type {
    ForwardRuleSchema,
    L2tpTunnelConfigSchema,
    MeshTunnelConfigSchema,
    ProtocolSchema,
    TunnelConfigSchema,
    TunnelRoleSchema,
} from "./schema.js";

export type TunnelRole = z.infer<typeof TunnelRoleSchema>;
export type Protocol = z.infer<typeof ProtocolSchema>;

export type L2tpTunnelConfig = z.infer<typeof L2tpTunnelConfigSchema>;
export type MeshTunnelConfig = z.infer<typeof MeshTunnelConfigSchema>;
export type TunnelConfig = z.infer<typeof TunnelConfigSchema>;
export type TunnelKind = TunnelConfig["kind"];

export type ForwardRule = z.infer<typeof ForwardRuleSchema>;

/**
 * Listener identity of a forward rule. Unique across the host.
 */
export interface RuleKey {
    listenPort: number;
    protocol: Protocol;
}

/**
 * Live condition of a tunnel
 *
 * - absent: no kernel objects or peer process
 * - pending: an action is in flight
 * - up: kernel objects or process present and the link is confirmed
 * - degraded: objects or process present but the link is not confirmed
 * - error: the probe failed or the live objects contradict the record
 */
export type TunnelPresence = "absent" | "pending" | "up" | "degraded" | "error";

/**
 * Observed state of one tunnel. Rebuilt on every probe, never stored as truth.
 */
export interface ObservedState {
    tunnelId: string;
    presence: TunnelPresence;
    /** Short human-readable description of what was observed */
    detail: string;
    /** Failure message when the probe or an action failed */
    error?: string;
}

export interface TunnelOutcome extends ObservedState {
    kind: TunnelKind;
}

export type RuleStatus = "admitted" | "skipped" | "retained";

export interface RuleOutcome extends ForwardRule {
    status: RuleStatus;
    reason?: string;
}

export type ReloadStage = "compile" | "validate" | "write" | "reload";

export type ReloadOutcome =
    | { status: "applied" }
    | { status: "unchanged" }
    | { status: "failed"; stage: ReloadStage; error: string };

export type ApplyMode = "full" | "tunnel" | "forwarding";

/**
 * Result of one reconciliation pass
 */
export interface ApplyReport {
    mode: ApplyMode;
    tunnels: TunnelOutcome[];
    rules: RuleOutcome[];
    reload: ReloadOutcome;
}

export interface RuleState extends ForwardRule {
    /** Whether the proxy's live configuration includes the rule */
    live: boolean;
}

/**
 * Read-only view of the host, produced without waiting for an apply pass
 */
export interface StatusReport {
    /** When the probes behind this report ran */
    observedAt: string;
    applyInProgress: boolean;
    lastApply: { finishedAt: string; report: ApplyReport } | null;
    tunnels: TunnelOutcome[];
    rules: RuleState[];
    proxy: { engine: string; configPath: string; present: boolean };
}

/**
 * Builds the default interface name for a tunnel
 */
export function defaultInterfaceName(kind: TunnelKind, id: string): string {
    const prefix = kind === "l2tpv3" ? "l2tp-" : "mesh-";
    return `${prefix}${id}`.slice(0, 15);
}

/**
 * Orders rules by listen port, then protocol
 */
export function compareRules(a: RuleKey, b: RuleKey): number {
    if (a.listenPort !== b.listenPort) return a.listenPort - b.listenPort;
    return a.protocol < b.protocol ? -1 : a.protocol > b.protocol ? 1 : 0;
}

/**
 * Formats a rule key as "443/tcp"
 */
export function ruleKeyLabel(key: RuleKey): string {
    return `${key.listenPort}/${key.protocol}`;
}
