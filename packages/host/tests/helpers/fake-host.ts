/**
 * In-process stand-in for the commands tunnelkeeper runs on a host
 *
 * Simulates enough of iproute2 (l2tp, link, addr), systemctl, modprobe,
 * modinfo, the proxy validators and easytier-cli to drive the drivers, the
 * proxy controller and the reconciler without touching the machine.
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { type HostConfig, parseHostConfig } from "../../src/config/index.js";
import type { CommandResult, CommandRunner } from "../../src/lib/command.js";

interface FakeTunnel {
    tunnelId: number;
    peerTunnelId: number;
    encap: string;
    localIp: string;
    remoteIp: string;
}

interface FakeSession {
    tunnelId: number;
    sessionId: number;
    peerSessionId: number;
    interfaceName: string;
}

interface FakeLink {
    up: boolean;
    addresses: string[];
}

interface Failure {
    prefix: string;
    result: CommandResult;
    remaining: number;
}

const ok = (stdout = ""): CommandResult => ({ exitCode: 0, stdout, stderr: "" });
const fail = (exitCode: number, stderr: string, stdout = ""): CommandResult => ({
    exitCode,
    stdout,
    stderr,
});

/** Reads the value following `key` in an argument list */
function arg(args: readonly string[], key: string): string {
    const index = args.indexOf(key);
    const value = index >= 0 ? args[index + 1] : undefined;
    if (value === undefined) throw new Error(`fake host: missing ${key} in ${args.join(" ")}`);
    return value;
}

export class FakeHost implements CommandRunner {
    readonly tunnels = new Map<number, FakeTunnel>();
    readonly sessions: FakeSession[] = [];
    readonly links = new Map<string, FakeLink>();
    readonly units = new Map<string, string>();
    readonly enabled = new Set<string>();
    /** Every command line run, in order */
    readonly calls: string[] = [];
    /** Output of `easytier-cli peer` */
    peerTable = "";
    private readonly failures: Failure[] = [];
    private readonly meshInterfaces = new Map<string, string>();

    /**
     * Makes commands whose line starts with `prefix` fail
     *
     * @param times - how many matching calls fail (default: all)
     */
    failWhen(prefix: string, result: Partial<CommandResult> = {}, times = Infinity): void {
        this.failures.push({
            prefix,
            result: { exitCode: 1, stdout: "", stderr: "simulated failure", ...result },
            remaining: times,
        });
    }

    /** Starting `unit` brings up `interfaceName`, as easytier-core does */
    bindMeshInterface(unit: string, interfaceName: string): void {
        this.meshInterfaces.set(unit, interfaceName);
    }

    callsMatching(prefix: string): string[] {
        return this.calls.filter((line) => line.startsWith(prefix));
    }

    /** Number of proxy reloads and starts */
    proxyReloads(service: string): number {
        return this.calls.filter(
            (line) => line === `systemctl reload ${service}` || line === `systemctl start ${service}`
        ).length;
    }

    async run(command: string, args: readonly string[]): Promise<CommandResult> {
        const line = [path.basename(command), ...args].join(" ");
        this.calls.push(line);

        const failure = this.failures.find((f) => f.remaining > 0 && line.startsWith(f.prefix));
        if (failure) {
            failure.remaining -= 1;
            return failure.result;
        }

        switch (path.basename(command)) {
            case "ip":
                return this.ip(args);
            case "systemctl":
                return this.systemctl(args);
            case "modprobe":
                return ok();
            case "modinfo":
                return ok(`/lib/modules/6.1.0/kernel/net/l2tp/${args[args.length - 1]}.ko\n`);
            case "haproxy":
                return args[0] === "-v" ? ok("HAProxy version 2.6.12\n") : ok("Configuration file is valid\n");
            case "nginx":
                return args[0] === "-v"
                    ? fail(0, "nginx version: nginx/1.22.1")
                    : fail(0, "nginx: configuration file test is successful");
            case "easytier-cli":
                return ok(this.peerTable);
            case "easytier-core":
                return ok("easytier-core 2.1.2\n");
            default:
                return fail(127, `${command}: command not found`);
        }
    }

    private ip(args: readonly string[]): CommandResult {
        const line = args.join(" ");

        if (line === "-V") return ok("ip utility, iproute2-6.1.0\n");
        if (line === "l2tp show tunnel") return ok(this.renderTunnels());
        if (line === "l2tp show session") return ok(this.renderSessions());

        if (line.startsWith("l2tp add tunnel")) {
            const tunnelId = Number(arg(args, "tunnel_id"));
            if (this.tunnels.has(tunnelId)) return fail(2, "RTNETLINK answers: File exists");
            this.tunnels.set(tunnelId, {
                tunnelId,
                peerTunnelId: Number(arg(args, "peer_tunnel_id")),
                encap: arg(args, "encap"),
                localIp: arg(args, "local"),
                remoteIp: arg(args, "remote"),
            });
            return ok();
        }
        if (line.startsWith("l2tp add session")) {
            const tunnelId = Number(arg(args, "tunnel_id"));
            const sessionId = Number(arg(args, "session_id"));
            const interfaceName = arg(args, "name");
            if (!this.tunnels.has(tunnelId)) return fail(2, "RTNETLINK answers: No such file or directory");
            if (this.sessions.some((s) => s.tunnelId === tunnelId && s.sessionId === sessionId)) {
                return fail(2, "RTNETLINK answers: File exists");
            }
            this.sessions.push({
                tunnelId,
                sessionId,
                peerSessionId: Number(arg(args, "peer_session_id")),
                interfaceName,
            });
            this.links.set(interfaceName, { up: false, addresses: [] });
            return ok();
        }
        if (line.startsWith("l2tp del session")) {
            const tunnelId = Number(arg(args, "tunnel_id"));
            const sessionId = Number(arg(args, "session_id"));
            const index = this.sessions.findIndex((s) => s.tunnelId === tunnelId && s.sessionId === sessionId);
            if (index < 0) return fail(2, "RTNETLINK answers: No such file or directory");
            const [removed] = this.sessions.splice(index, 1);
            this.links.delete(removed.interfaceName);
            return ok();
        }
        if (line.startsWith("l2tp del tunnel")) {
            const tunnelId = Number(arg(args, "tunnel_id"));
            if (!this.tunnels.delete(tunnelId)) return fail(2, "RTNETLINK answers: No such file or directory");
            for (const session of this.sessions.filter((s) => s.tunnelId === tunnelId)) {
                this.sessions.splice(this.sessions.indexOf(session), 1);
                this.links.delete(session.interfaceName);
            }
            return ok();
        }

        if (args[0] === "link" && args[1] === "set") {
            const link = this.links.get(args[2]);
            if (!link) return fail(1, `Cannot find device "${args[2]}"`);
            link.up = args[3] === "up";
            return ok();
        }
        if (line.startsWith("-o link show dev ")) {
            const name = args[args.length - 1];
            const link = this.links.get(name);
            if (!link) return fail(1, `Device "${name}" does not exist.`);
            const flags = link.up ? "BROADCAST,MULTICAST,UP,LOWER_UP" : "BROADCAST,MULTICAST";
            return ok(`7: ${name}: <${flags}> mtu 1446 qdisc fq_codel state UNKNOWN mode DEFAULT\n`);
        }
        if (line.startsWith("-o -4 addr show dev ")) {
            const name = args[args.length - 1];
            const link = this.links.get(name);
            if (!link) return fail(1, `Device "${name}" does not exist.`);
            return ok(
                link.addresses
                    .map((a) => `7: ${name}    inet ${a} scope global ${name}\\       valid_lft forever\n`)
                    .join("")
            );
        }
        if (args[0] === "addr" && (args[1] === "flush" || args[1] === "add")) {
            const name = args[args.length - 1];
            const link = this.links.get(name);
            if (!link) return fail(1, `Cannot find device "${name}"`);
            if (args[1] === "flush") link.addresses = [];
            else link.addresses.push(args[2]);
            return ok();
        }

        return fail(1, `fake ip: unsupported ${line}`);
    }

    private systemctl(args: readonly string[]): CommandResult {
        const [verb, ...rest] = args;
        const units = rest.filter((unit) => !unit.startsWith("-"));

        switch (verb) {
            case "--version":
                return ok("systemd 252 (252.22-1)\n");
            case "daemon-reload":
                return ok();
            case "is-active": {
                const state = this.units.get(units[0]) ?? "inactive";
                return { exitCode: state === "active" ? 0 : 3, stdout: `${state}\n`, stderr: "" };
            }
            case "is-enabled": {
                const enabled = this.enabled.has(units[0]);
                return { exitCode: enabled ? 0 : 1, stdout: enabled ? "enabled\n" : "disabled\n", stderr: "" };
            }
            case "enable":
                units.forEach((unit) => this.enabled.add(unit));
                return ok();
            case "disable":
                units.forEach((unit) => this.enabled.delete(unit));
                if (rest.includes("--now")) units.forEach((unit) => this.setState(unit, "inactive"));
                return ok();
            case "start":
            case "restart":
                units.forEach((unit) => this.setState(unit, "active"));
                return ok();
            case "stop":
                units.forEach((unit) => this.setState(unit, "inactive"));
                return ok();
            case "reload":
                if (this.units.get(units[0]) !== "active") {
                    return fail(1, `${units[0]} is not active, cannot reload.`);
                }
                return ok();
            default:
                return fail(1, `fake systemctl: unsupported ${args.join(" ")}`);
        }
    }

    private setState(unit: string, state: string): void {
        this.units.set(unit, state);
        const ifname = this.meshInterfaces.get(unit);
        if (ifname === undefined) return;
        if (state === "active") this.links.set(ifname, { up: true, addresses: [] });
        else this.links.delete(ifname);
    }

    private renderTunnels(): string {
        return [...this.tunnels.values()]
            .map(
                (t) =>
                    `Tunnel ${t.tunnelId}, encap ${t.encap.toUpperCase()}\n` +
                    `  From ${t.localIp} to ${t.remoteIp}\n` +
                    `  Peer tunnel ${t.peerTunnelId}\n` +
                    "  L2TP version 3\n"
            )
            .join("");
    }

    private renderSessions(): string {
        return this.sessions
            .map(
                (s) =>
                    `Session ${s.sessionId} in tunnel ${s.tunnelId}\n` +
                    `  Peer session ${s.peerSessionId}, tunnel ${this.tunnels.get(s.tunnelId)?.peerTunnelId ?? 0}\n` +
                    `  interface name: ${s.interfaceName}\n` +
                    "  offset 0, peer offset 0\n"
            )
            .join("");
    }
}

export interface TestHome {
    home: string;
    config: HostConfig;
    cleanup: () => Promise<void>;
}

/**
 * Creates a temporary tunnelkeeper home with its systemd and proxy paths
 * redirected inside it
 */
export async function createTestHome(overrides: Record<string, unknown> = {}): Promise<TestHome> {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "tunnelkeeper-test-"));
    const home = path.join(root, "home");
    const engine = overrides.forwardEngine === "nginx" ? "nginx" : "haproxy";
    const config = parseHostConfig({
        systemdDir: path.join(root, "systemd"),
        proxyConfigPath: path.join(root, engine, engine === "nginx" ? "nginx.conf" : "haproxy.cfg"),
        settleMs: 0,
        ...overrides,
    });
    return {
        home,
        config,
        cleanup: () => fs.rm(root, { recursive: true, force: true }),
    };
}
