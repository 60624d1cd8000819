/**
 * Port list parsing for bulk rule commands
 *
 * Accepts comma-separated ports and inclusive ranges: "80,443,8000-8010".
 */

import {
    type ForwardRule,
    type Protocol,
    type RuleKey,
    type TunnelConfig,
    ValidationError,
} from "@tunnelkeeper/shared";

export const PROTOCOL_CHOICES = ["tcp", "udp", "both"] as const;

function isPort(value: number): boolean {
    return Number.isInteger(value) && value >= 1 && value <= 65535;
}

/**
 * Parses a port list into sorted, unique ports
 */
export function parsePortList(text: string): number[] {
    const ports = new Set<number>();
    const issues: string[] = [];

    for (const raw of text.split(",")) {
        const token = raw.trim();
        if (!token) continue;

        const range = /^(\d+)\s*-\s*(\d+)$/.exec(token);
        if (range) {
            const start = Number(range[1]);
            const end = Number(range[2]);
            if (!isPort(start) || !isPort(end)) {
                issues.push(`${token}: ports must be between 1 and 65535`);
            } else if (start > end) {
                issues.push(`${token}: range start is greater than its end`);
            } else {
                for (let port = start; port <= end; port++) ports.add(port);
            }
            continue;
        }

        if (/^\d+$/.test(token)) {
            const port = Number(token);
            if (isPort(port)) ports.add(port);
            else issues.push(`${token}: ports must be between 1 and 65535`);
            continue;
        }

        issues.push(`${token}: not a port or a range`);
    }

    if (issues.length > 0) throw new ValidationError(issues);
    if (ports.size === 0) throw new ValidationError(["no ports given"]);
    return [...ports].sort((a, b) => a - b);
}

export function protocolsFor(value: string): Protocol[] {
    switch (value) {
        case "tcp":
            return ["tcp"];
        case "udp":
            return ["udp"];
        case "both":
            return ["tcp", "udp"];
        default:
            throw new ValidationError([`unknown protocol "${value}" (expected tcp, udp or both)`]);
    }
}

export interface RuleRequest {
    tunnel: TunnelConfig;
    ports: readonly number[];
    protocols: readonly Protocol[];
    /** Defaults to the tunnel's remoteForwardIp */
    targetIp?: string;
    /** Defaults to the listen port; only valid for a single port */
    targetPort?: number;
}

/**
 * Expands a request into one rule per port and protocol
 */
export function buildRules(request: RuleRequest): ForwardRule[] {
    const { tunnel, ports, protocols } = request;

    const targetIp = request.targetIp ?? tunnel.remoteForwardIp;
    if (targetIp === undefined) {
        throw new ValidationError([`tunnel "${tunnel.id}" has no remoteForwardIp; pass --target-ip`]);
    }
    if (request.targetPort !== undefined && ports.length > 1) {
        throw new ValidationError(["--target-port needs a single listen port"]);
    }

    return ports.flatMap((port) =>
        protocols.map((protocol) => ({
            tunnelId: tunnel.id,
            listenPort: port,
            targetIp,
            targetPort: request.targetPort ?? port,
            protocol,
        }))
    );
}

export function ruleKeys(ports: readonly number[], protocols: readonly Protocol[]): RuleKey[] {
    return ports.flatMap((listenPort) => protocols.map((protocol) => ({ listenPort, protocol })));
}
