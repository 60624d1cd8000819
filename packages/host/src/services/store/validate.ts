/**
 * Cross-record invariants
 *
 * Schemas check each record on its own; these functions check a candidate
 * record against everything else in the store. Each returns a list of issues,
 * empty when the candidate may be committed.
 */

import {
    type ForwardRule,
    type L2tpTunnelConfig,
    type TunnelConfig,
    ruleKeyLabel,
} from "@tunnelkeeper/shared";
import type { ForwardEngine } from "../../config/index.js";
import { engineCarries } from "../forwarding/compiler.js";

/**
 * Two l2tpv3 records describe the two ends of one tunnel when their
 * endpoints are mirrored or one of them names the other as its peer.
 */
export function arePeers(a: L2tpTunnelConfig, b: L2tpTunnelConfig): boolean {
    const mirrored = a.localIp === b.remoteIp && a.remoteIp === b.localIp;
    return mirrored || a.peer === b.id || b.peer === a.id;
}

export function mirrorIssues(a: L2tpTunnelConfig, b: L2tpTunnelConfig): string[] {
    const issues: string[] = [];
    if (a.tunnelId !== b.peerTunnelId || a.peerTunnelId !== b.tunnelId) {
        issues.push(
            `tunnel ids of "${a.id}" (${a.tunnelId}/${a.peerTunnelId}) do not mirror ` +
                `peer "${b.id}" (${b.tunnelId}/${b.peerTunnelId})`
        );
    }
    if (a.sessionId !== b.peerSessionId || a.peerSessionId !== b.sessionId) {
        issues.push(
            `session ids of "${a.id}" (${a.sessionId}/${a.peerSessionId}) do not mirror ` +
                `peer "${b.id}" (${b.sessionId}/${b.peerSessionId})`
        );
    }
    if (a.role === b.role) {
        issues.push(`"${a.id}" and its peer "${b.id}" both have role ${a.role}`);
    }
    return issues;
}

/**
 * Checks a tunnel record against the other records of the store
 *
 * @param others - every stored tunnel except the one being replaced
 */
export function tunnelIssues(
    candidate: TunnelConfig,
    others: readonly TunnelConfig[],
    rules: readonly ForwardRule[]
): string[] {
    const issues: string[] = [];

    for (const other of others) {
        if (other.id === candidate.id) {
            issues.push(`tunnel "${candidate.id}" already exists`);
        }
        if (other.interfaceName === candidate.interfaceName) {
            issues.push(
                `interface ${candidate.interfaceName} is already used by tunnel "${other.id}"`
            );
        }
    }

    if (candidate.kind === "l2tpv3") {
        if (candidate.peer === candidate.id) {
            issues.push(`tunnel "${candidate.id}" cannot be its own peer`);
        }
        if (candidate.localIp === candidate.remoteIp) {
            issues.push(`local and remote address of "${candidate.id}" are both ${candidate.localIp}`);
        }

        for (const other of others) {
            if (other.kind !== "l2tpv3") {
                if (candidate.peer === other.id) {
                    issues.push(`peer "${other.id}" is a ${other.kind} tunnel, not l2tpv3`);
                }
                continue;
            }
            if (other.tunnelId === candidate.tunnelId) {
                issues.push(`kernel tunnel id ${candidate.tunnelId} is already used by "${other.id}"`);
            }
            if (other.sessionId === candidate.sessionId) {
                issues.push(`kernel session id ${candidate.sessionId} is already used by "${other.id}"`);
            }
            if (arePeers(candidate, other)) {
                issues.push(...mirrorIssues(candidate, other));
            }
        }
    } else {
        for (const other of others) {
            if (other.kind !== "mesh") continue;
            if (other.listenPort === candidate.listenPort) {
                issues.push(`mesh listen port ${candidate.listenPort} is already used by "${other.id}"`);
            }
            if (other.rpcPort === candidate.rpcPort) {
                issues.push(`mesh rpc port ${candidate.rpcPort} is already used by "${other.id}"`);
            }
        }
        for (const rule of rules) {
            if (rule.protocol !== "tcp") continue;
            if (rule.listenPort === candidate.listenPort || rule.listenPort === candidate.rpcPort) {
                issues.push(
                    `port ${rule.listenPort} is already forwarded by a rule of tunnel "${rule.tunnelId}"`
                );
            }
        }
    }

    return issues;
}

/**
 * Checks new forward rules against the stored tunnels and rules
 *
 * @param engine - when set, rules the engine cannot carry are refused
 */
export function ruleIssues(
    candidates: readonly ForwardRule[],
    tunnels: readonly TunnelConfig[],
    existing: readonly ForwardRule[],
    engine?: ForwardEngine
): string[] {
    const issues: string[] = [];
    const claimed = new Map<string, string>();
    for (const rule of existing) {
        claimed.set(ruleKeyLabel(rule), rule.tunnelId);
    }

    const meshPorts = new Map<number, string>();
    for (const tunnel of tunnels) {
        if (tunnel.kind !== "mesh") continue;
        meshPorts.set(tunnel.listenPort, tunnel.id);
        meshPorts.set(tunnel.rpcPort, tunnel.id);
    }

    for (const rule of candidates) {
        const label = ruleKeyLabel(rule);

        if (!tunnels.some((tunnel) => tunnel.id === rule.tunnelId)) {
            issues.push(`${label}: tunnel "${rule.tunnelId}" does not exist`);
        }

        const owner = claimed.get(label);
        if (owner !== undefined) {
            issues.push(`${label} is already forwarded by tunnel "${owner}"`);
        } else {
            claimed.set(label, rule.tunnelId);
        }

        if (engine !== undefined && !engineCarries(engine, rule.protocol)) {
            issues.push(
                `${label}: the ${engine} engine cannot forward ${rule.protocol}; set forwardEngine to nginx`
            );
        }

        const meshOwner = rule.protocol === "tcp" ? meshPorts.get(rule.listenPort) : undefined;
        if (meshOwner !== undefined) {
            issues.push(`${label} collides with a listener of mesh tunnel "${meshOwner}"`);
        }
    }

    return issues;
}
