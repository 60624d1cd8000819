/**
 * L2TPv3 tunnel driver
 *
 * Manages static (unmanaged) L2TPv3 tunnels with IP encapsulation through
 * iproute2. A tunnel is one kernel tunnel plus one Ethernet session whose
 * interface carries the configured address.
 */

import {
    type L2tpTunnelConfig,
    type ObservedState,
    TunnelError,
    createLogger,
    errorMessage,
} from "@tunnelkeeper/shared";
import { type CommandResult, type CommandRunner, runChecked } from "../../lib/command.js";
import type { DriverContext, EnsureUpOptions, TunnelDriver } from "./types.js";

const log = createLogger("l2tp");

/** Modules needed for IP-encapsulated Ethernet sessions */
const KERNEL_MODULES = ["l2tp_ip", "l2tp_eth"];

export interface LiveL2tpTunnel {
    tunnelId: number;
    peerTunnelId: number | null;
    encap: string | null;
    localIp: string | null;
    remoteIp: string | null;
}

export interface LiveL2tpSession {
    sessionId: number;
    tunnelId: number;
    peerSessionId: number | null;
    interfaceName: string | null;
}

export interface LinkInfo {
    flags: string[];
}

/**
 * Parses `ip l2tp show tunnel`
 *
 *   Tunnel 1000, encap IP
 *     From 1.2.3.4 to 5.6.7.8
 *     Peer tunnel 2000
 *     L2TP version 3
 */
export function parseL2tpTunnels(output: string): LiveL2tpTunnel[] {
    const tunnels: LiveL2tpTunnel[] = [];
    let current: LiveL2tpTunnel | null = null;

    for (const raw of output.split("\n")) {
        const line = raw.trim();
        const header = /^Tunnel (\d+), encap (\S+)/.exec(line);
        if (header) {
            current = {
                tunnelId: Number(header[1]),
                peerTunnelId: null,
                encap: header[2].toLowerCase(),
                localIp: null,
                remoteIp: null,
            };
            tunnels.push(current);
            continue;
        }
        if (!current) continue;

        const endpoints = /^From (\S+) to (\S+)/.exec(line);
        if (endpoints) {
            current.localIp = endpoints[1];
            current.remoteIp = endpoints[2];
            continue;
        }
        const peer = /^Peer tunnel (\d+)/.exec(line);
        if (peer) {
            current.peerTunnelId = Number(peer[1]);
        }
    }
    return tunnels;
}

/**
 * Parses `ip l2tp show session`
 *
 *   Session 10 in tunnel 1000
 *     Peer session 20, tunnel 2000
 *     interface name: l2tp-t1
 *     offset 0, peer offset 0
 */
export function parseL2tpSessions(output: string): LiveL2tpSession[] {
    const sessions: LiveL2tpSession[] = [];
    let current: LiveL2tpSession | null = null;

    for (const raw of output.split("\n")) {
        const line = raw.trim();
        const header = /^Session (\d+) in tunnel (\d+)/.exec(line);
        if (header) {
            current = {
                sessionId: Number(header[1]),
                tunnelId: Number(header[2]),
                peerSessionId: null,
                interfaceName: null,
            };
            sessions.push(current);
            continue;
        }
        if (!current) continue;

        const peer = /^Peer session (\d+)/.exec(line);
        if (peer) {
            current.peerSessionId = Number(peer[1]);
            continue;
        }
        const ifname = /^interface name: (\S+)/.exec(line);
        if (ifname) {
            current.interfaceName = ifname[1];
        }
    }
    return sessions;
}

/**
 * Parses the flags of `ip -o link show dev <if>`
 *
 *   7: l2tp-t1: <BROADCAST,MULTICAST,UP,LOWER_UP> mtu 1446 qdisc fq_codel state UNKNOWN ...
 */
export function parseLinkFlags(output: string): LinkInfo | null {
    const match = /^\d+:\s+\S+:\s+<([^>]*)>/m.exec(output);
    if (!match) return null;
    return { flags: match[1].split(",").filter(Boolean) };
}

/**
 * Extracts the IPv4 addresses of `ip -o -4 addr show dev <if>`
 *
 *   7: l2tp-t1    inet 10.30.30.1/30 scope global l2tp-t1\       valid_lft forever ...
 */
export function parseInetAddresses(output: string): string[] {
    const addresses: string[] = [];
    for (const match of output.matchAll(/\binet (\d+\.\d+\.\d+\.\d+\/\d+)/g)) {
        addresses.push(match[1]);
    }
    return addresses;
}

/**
 * Lists what differs between a live tunnel and its record
 */
export function tunnelDifferences(config: L2tpTunnelConfig, live: LiveL2tpTunnel): string[] {
    const diffs: string[] = [];
    if (live.peerTunnelId !== config.peerTunnelId) {
        diffs.push(`peer tunnel ${live.peerTunnelId ?? "?"} != ${config.peerTunnelId}`);
    }
    if (live.encap !== "ip") {
        diffs.push(`encap ${live.encap ?? "?"} != ip`);
    }
    if (live.localIp !== config.localIp || live.remoteIp !== config.remoteIp) {
        diffs.push(
            `endpoints ${live.localIp ?? "?"} -> ${live.remoteIp ?? "?"} != ${config.localIp} -> ${config.remoteIp}`
        );
    }
    return diffs;
}

export function sessionDifferences(config: L2tpTunnelConfig, live: LiveL2tpSession): string[] {
    const diffs: string[] = [];
    if (live.peerSessionId !== config.peerSessionId) {
        diffs.push(`peer session ${live.peerSessionId ?? "?"} != ${config.peerSessionId}`);
    }
    if (live.interfaceName !== config.interfaceName) {
        diffs.push(`interface ${live.interfaceName ?? "?"} != ${config.interfaceName}`);
    }
    return diffs;
}

interface KernelView {
    tunnel: LiveL2tpTunnel | undefined;
    sessions: LiveL2tpSession[];
}

export class L2tpDriver implements TunnelDriver<L2tpTunnelConfig> {
    readonly kind = "l2tpv3";
    private readonly runner: CommandRunner;
    private kernelChecked = false;

    constructor(context: Pick<DriverContext, "runner">) {
        this.runner = context.runner;
    }

    async ensureUp(
        config: L2tpTunnelConfig,
        options: EnsureUpOptions = {}
    ): Promise<ObservedState> {
        try {
            await this.ensureKernelSupport();

            const view = await this.readKernel(config.tunnelId);
            let { tunnel } = view;
            let sessions = view.sessions;

            const diffs = tunnel ? tunnelDifferences(config, tunnel) : [];
            const stray = sessions.filter((session) => session.sessionId !== config.sessionId);
            const own = sessions.find((session) => session.sessionId === config.sessionId);
            const sessionDiffs = own ? sessionDifferences(config, own) : [];

            if (tunnel && (options.recreate || diffs.length > 0)) {
                const reason = options.recreate ? "restart requested" : diffs.join(", ");
                log.info(`${config.id}: recreating kernel tunnel ${config.tunnelId} (${reason})`);
                await this.teardown(config.tunnelId, sessions);
                tunnel = undefined;
                sessions = [];
            } else if (stray.length > 0 || sessionDiffs.length > 0) {
                const dropped = sessionDiffs.length > 0 && own ? [...stray, own] : stray;
                log.info(
                    `${config.id}: removing session(s) ${dropped.map((s) => s.sessionId).join(", ")} ` +
                        `from tunnel ${config.tunnelId}`
                );
                await this.deleteSessions(config.tunnelId, dropped);
                sessions = sessions.filter((session) => !dropped.includes(session));
            }

            if (!tunnel) {
                await this.ip([
                    "l2tp", "add", "tunnel",
                    "tunnel_id", String(config.tunnelId),
                    "peer_tunnel_id", String(config.peerTunnelId),
                    "encap", "ip",
                    "local", config.localIp,
                    "remote", config.remoteIp,
                ]);
                log.info(`${config.id}: created kernel tunnel ${config.tunnelId}`);
            }

            if (!sessions.some((session) => session.sessionId === config.sessionId)) {
                await this.ip([
                    "l2tp", "add", "session",
                    "name", config.interfaceName,
                    "tunnel_id", String(config.tunnelId),
                    "session_id", String(config.sessionId),
                    "peer_session_id", String(config.peerSessionId),
                ]);
                log.info(`${config.id}: created session ${config.sessionId} on ${config.interfaceName}`);
            }

            await this.ip(["link", "set", config.interfaceName, "up"]);

            const addresses = parseInetAddresses(
                (await this.ip(["-o", "-4", "addr", "show", "dev", config.interfaceName])).stdout
            );
            if (!addresses.includes(config.interfaceAddress)) {
                if (addresses.length > 0) {
                    await this.ip(["addr", "flush", "dev", config.interfaceName]);
                }
                await this.ip(["addr", "add", config.interfaceAddress, "dev", config.interfaceName]);
                log.info(`${config.id}: assigned ${config.interfaceAddress} to ${config.interfaceName}`);
            }
        } catch (error) {
            if (error instanceof TunnelError) throw error;
            throw new TunnelError(config.id, errorMessage(error), { cause: error });
        }

        return this.status(config);
    }

    async ensureDown(config: L2tpTunnelConfig): Promise<void> {
        try {
            const view = await this.readKernel(config.tunnelId);
            if (!view.tunnel && view.sessions.length === 0) {
                log.debug(`${config.id}: kernel tunnel ${config.tunnelId} already absent`);
                return;
            }
            await this.teardown(config.tunnelId, view.sessions, view.tunnel !== undefined);
            log.info(`${config.id}: removed kernel tunnel ${config.tunnelId}`);
        } catch (error) {
            throw new TunnelError(config.id, errorMessage(error), { cause: error });
        }
    }

    async status(config: L2tpTunnelConfig): Promise<ObservedState> {
        const observed = (
            presence: ObservedState["presence"],
            detail: string,
            error?: string
        ): ObservedState =>
            error === undefined
                ? { tunnelId: config.id, presence, detail }
                : { tunnelId: config.id, presence, detail, error };

        let view: KernelView;
        try {
            view = await this.readKernel(config.tunnelId);
        } catch (error) {
            return observed("error", "cannot read kernel l2tp state", errorMessage(error));
        }

        const { tunnel, sessions } = view;
        if (!tunnel && sessions.length === 0) {
            return observed("absent", "no kernel tunnel");
        }
        if (!tunnel) {
            return observed(
                "error",
                "sessions without a kernel tunnel",
                `orphan sessions in tunnel ${config.tunnelId}`
            );
        }

        const diffs = tunnelDifferences(config, tunnel);
        if (diffs.length > 0) {
            return observed("error", "kernel tunnel diverges from record", diffs.join(", "));
        }
        const session = sessions.find((s) => s.sessionId === config.sessionId);
        if (!session) {
            return observed(
                "error",
                "kernel tunnel without its session",
                `session ${config.sessionId} missing`
            );
        }
        const sessionDiffs = sessionDifferences(config, session);
        if (sessionDiffs.length > 0) {
            return observed("error", "kernel session diverges from record", sessionDiffs.join(", "));
        }

        const ifname = config.interfaceName;
        const linkResult = await this.runner.run("ip", ["-o", "link", "show", "dev", ifname]);
        const link = linkResult.exitCode === 0 ? parseLinkFlags(linkResult.stdout) : null;
        if (!link) {
            return observed("error", `interface ${ifname} missing`, linkResult.stderr.trim() || undefined);
        }
        if (!link.flags.includes("UP") || !link.flags.includes("LOWER_UP")) {
            return observed("degraded", `interface ${ifname} is down`);
        }

        const addrResult = await this.runner.run("ip", ["-o", "-4", "addr", "show", "dev", ifname]);
        const addresses = addrResult.exitCode === 0 ? parseInetAddresses(addrResult.stdout) : [];
        if (!addresses.includes(config.interfaceAddress)) {
            return observed("degraded", `address ${config.interfaceAddress} missing on ${ifname}`);
        }

        return observed(
            "up",
            `tunnel ${config.tunnelId}/${config.peerTunnelId} ` +
                `session ${config.sessionId}/${config.peerSessionId} on ${ifname} ${config.interfaceAddress}`
        );
    }

    /**
     * Loads the kernel modules before first use
     */
    private async ensureKernelSupport(): Promise<void> {
        if (this.kernelChecked) return;
        for (const module of KERNEL_MODULES) {
            const result = await this.runner.run("modprobe", [module]);
            if (result.exitCode !== 0) {
                const reason = result.stderr.trim() || `exit ${result.exitCode}`;
                throw new Error(`L2TP kernel support unavailable (modprobe ${module}: ${reason})`);
            }
        }
        this.kernelChecked = true;
    }

    private async readKernel(tunnelId: number): Promise<KernelView> {
        const tunnels = parseL2tpTunnels((await this.ip(["l2tp", "show", "tunnel"])).stdout);
        const sessions = parseL2tpSessions((await this.ip(["l2tp", "show", "session"])).stdout);
        return {
            tunnel: tunnels.find((tunnel) => tunnel.tunnelId === tunnelId),
            sessions: sessions.filter((session) => session.tunnelId === tunnelId),
        };
    }

    private async deleteSessions(
        tunnelId: number,
        sessions: readonly LiveL2tpSession[]
    ): Promise<void> {
        for (const session of sessions) {
            await this.ip([
                "l2tp", "del", "session",
                "tunnel_id", String(tunnelId),
                "session_id", String(session.sessionId),
            ]);
        }
    }

    private async teardown(
        tunnelId: number,
        sessions: readonly LiveL2tpSession[],
        withTunnel = true
    ): Promise<void> {
        await this.deleteSessions(tunnelId, sessions);
        if (withTunnel) {
            await this.ip(["l2tp", "del", "tunnel", "tunnel_id", String(tunnelId)]);
        }
    }

    private ip(args: string[]): Promise<CommandResult> {
        return runChecked(this.runner, "ip", args);
    }
}
