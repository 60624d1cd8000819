/**
 * Unit tests for the L2TPv3 driver and its iproute2 parsers
 */

import { describe, expect, it } from "vitest";
import { TunnelError } from "@tunnelkeeper/shared";
import {
    L2tpDriver,
    parseInetAddresses,
    parseL2tpSessions,
    parseL2tpTunnels,
    parseLinkFlags,
    tunnelDifferences,
} from "../../src/services/tunnel/l2tp.js";
import { FakeHost } from "../helpers/fake-host.js";
import { l2tpTunnel } from "../helpers/fixtures.js";

// ============================================================================
// Parsers
// ============================================================================

describe("parseL2tpTunnels", () => {
    it("should parse every tunnel block", () => {
        const output = [
            "Tunnel 1000, encap IP",
            "  From 198.51.100.10 to 203.0.113.20",
            "  Peer tunnel 2000",
            "  L2TP version 3",
            "Tunnel 1001, encap UDP",
            "  From 198.51.100.10 to 203.0.113.21",
            "  Peer tunnel 2001",
            "  UDP source / dest ports: 5000/5000",
        ].join("\n");

        expect(parseL2tpTunnels(output)).toEqual([
            {
                tunnelId: 1000,
                peerTunnelId: 2000,
                encap: "ip",
                localIp: "198.51.100.10",
                remoteIp: "203.0.113.20",
            },
            {
                tunnelId: 1001,
                peerTunnelId: 2001,
                encap: "udp",
                localIp: "198.51.100.10",
                remoteIp: "203.0.113.21",
            },
        ]);
    });

    it("should return nothing for empty output", () => {
        expect(parseL2tpTunnels("")).toEqual([]);
    });
});

describe("parseL2tpSessions", () => {
    it("should parse session blocks", () => {
        const output = [
            "Session 10 in tunnel 1000",
            "  Peer session 20, tunnel 2000",
            "  interface name: l2tp-t1",
            "  offset 0, peer offset 0",
        ].join("\n");

        expect(parseL2tpSessions(output)).toEqual([
            { sessionId: 10, tunnelId: 1000, peerSessionId: 20, interfaceName: "l2tp-t1" },
        ]);
    });
});

describe("parseLinkFlags", () => {
    it("should extract the flag list", () => {
        const output = "7: l2tp-t1: <BROADCAST,MULTICAST,UP,LOWER_UP> mtu 1446 qdisc fq_codel state UNKNOWN\n";

        expect(parseLinkFlags(output)).toEqual({ flags: ["BROADCAST", "MULTICAST", "UP", "LOWER_UP"] });
    });

    it("should return null for unrelated output", () => {
        expect(parseLinkFlags('Device "l2tp-t1" does not exist.')).toBeNull();
    });
});

describe("parseInetAddresses", () => {
    it("should collect every IPv4 address with its prefix", () => {
        const output =
            "7: l2tp-t1    inet 10.30.30.1/30 scope global l2tp-t1\\       valid_lft forever\n" +
            "7: l2tp-t1    inet 10.40.40.1/24 scope global l2tp-t1\\       valid_lft forever\n";

        expect(parseInetAddresses(output)).toEqual(["10.30.30.1/30", "10.40.40.1/24"]);
    });
});

describe("tunnelDifferences", () => {
    it("should report endpoint and peer mismatches", () => {
        const diffs = tunnelDifferences(l2tpTunnel(), {
            tunnelId: 1000,
            peerTunnelId: 2001,
            encap: "ip",
            localIp: "198.51.100.10",
            remoteIp: "203.0.113.99",
        });

        expect(diffs).toEqual([
            "peer tunnel 2001 != 2000",
            "endpoints 198.51.100.10 -> 203.0.113.99 != 198.51.100.10 -> 203.0.113.20",
        ]);
    });
});

// ============================================================================
// Driver
// ============================================================================

describe("L2tpDriver", () => {
    it("should create the tunnel, session, link and address on a clean host", async () => {
        const host = new FakeHost();
        const driver = new L2tpDriver({ runner: host });

        const state = await driver.ensureUp(l2tpTunnel());

        expect(state).toEqual({
            tunnelId: "t1",
            presence: "up",
            detail: "tunnel 1000/2000 session 10/20 on l2tp-t1 10.30.30.1/30",
        });
        expect(host.callsMatching("modprobe")).toEqual(["modprobe l2tp_ip", "modprobe l2tp_eth"]);
        expect(host.callsMatching("ip l2tp add")).toEqual([
            "ip l2tp add tunnel tunnel_id 1000 peer_tunnel_id 2000 encap ip local 198.51.100.10 remote 203.0.113.20",
            "ip l2tp add session name l2tp-t1 tunnel_id 1000 session_id 10 peer_session_id 20",
        ]);
        expect(host.links.get("l2tp-t1")).toEqual({ up: true, addresses: ["10.30.30.1/30"] });
    });

    it("should change nothing on a second call", async () => {
        const host = new FakeHost();
        const driver = new L2tpDriver({ runner: host });
        await driver.ensureUp(l2tpTunnel());
        const before = host.calls.length;

        const state = await driver.ensureUp(l2tpTunnel());

        expect(state.presence).toBe("up");
        const mutations = host.calls
            .slice(before)
            .filter((line) => / (add|del|flush) /.test(line) || line.startsWith("modprobe"));
        expect(mutations).toEqual([]);
    });

    it("should rebuild a kernel tunnel whose endpoints diverge", async () => {
        const host = new FakeHost();
        const driver = new L2tpDriver({ runner: host });
        await driver.ensureUp(l2tpTunnel({ remoteIp: "203.0.113.99" }));

        const state = await driver.ensureUp(l2tpTunnel());

        expect(state.presence).toBe("up");
        expect(host.tunnels.get(1000)?.remoteIp).toBe("203.0.113.20");
        expect(host.callsMatching("ip l2tp del")).toEqual([
            "ip l2tp del session tunnel_id 1000 session_id 10",
            "ip l2tp del tunnel tunnel_id 1000",
        ]);
    });

    it("should recreate a matching tunnel when asked", async () => {
        const host = new FakeHost();
        const driver = new L2tpDriver({ runner: host });
        await driver.ensureUp(l2tpTunnel());

        await driver.ensureUp(l2tpTunnel(), { recreate: true });

        expect(host.callsMatching("ip l2tp del tunnel")).toEqual(["ip l2tp del tunnel tunnel_id 1000"]);
        expect(host.callsMatching("ip l2tp add tunnel")).toHaveLength(2);
    });

    it("should replace a wrong interface address", async () => {
        const host = new FakeHost();
        const driver = new L2tpDriver({ runner: host });
        await driver.ensureUp(l2tpTunnel());
        const link = host.links.get("l2tp-t1");
        if (link) link.addresses = ["10.99.99.1/30"];

        expect((await driver.status(l2tpTunnel())).presence).toBe("degraded");
        await driver.ensureUp(l2tpTunnel());

        expect(host.callsMatching("ip addr flush")).toEqual(["ip addr flush dev l2tp-t1"]);
        expect(host.links.get("l2tp-t1")?.addresses).toEqual(["10.30.30.1/30"]);
    });

    it("should wrap command failures in a TunnelError", async () => {
        const host = new FakeHost();
        host.failWhen("ip l2tp add tunnel", { exitCode: 2, stderr: "RTNETLINK answers: Operation not permitted" });
        const driver = new L2tpDriver({ runner: host });

        const attempt = driver.ensureUp(l2tpTunnel());

        await expect(attempt).rejects.toBeInstanceOf(TunnelError);
        await expect(attempt).rejects.toThrow(
            "t1: `ip l2tp add tunnel tunnel_id 1000 peer_tunnel_id 2000 encap ip local 198.51.100.10 " +
                "remote 203.0.113.20` exited with 2: RTNETLINK answers: Operation not permitted"
        );
    });

    it("should fail when the kernel modules cannot be loaded", async () => {
        const host = new FakeHost();
        host.failWhen("modprobe l2tp_eth", { stderr: "modprobe: FATAL: Module l2tp_eth not found." });
        const driver = new L2tpDriver({ runner: host });

        await expect(driver.ensureUp(l2tpTunnel())).rejects.toThrow(
            "t1: L2TP kernel support unavailable (modprobe l2tp_eth: modprobe: FATAL: Module l2tp_eth not found.)"
        );
        expect(host.tunnels.size).toBe(0);
    });

    it("should report a missing tunnel as absent", async () => {
        const driver = new L2tpDriver({ runner: new FakeHost() });

        expect(await driver.status(l2tpTunnel())).toEqual({
            tunnelId: "t1",
            presence: "absent",
            detail: "no kernel tunnel",
        });
    });

    it("should report a down link as degraded", async () => {
        const host = new FakeHost();
        const driver = new L2tpDriver({ runner: host });
        await driver.ensureUp(l2tpTunnel());
        const link = host.links.get("l2tp-t1");
        if (link) link.up = false;

        expect(await driver.status(l2tpTunnel())).toEqual({
            tunnelId: "t1",
            presence: "degraded",
            detail: "interface l2tp-t1 is down",
        });
    });

    it("should report a diverging kernel tunnel as an error", async () => {
        const host = new FakeHost();
        const driver = new L2tpDriver({ runner: host });
        await driver.ensureUp(l2tpTunnel({ peerTunnelId: 2001 }));

        expect(await driver.status(l2tpTunnel())).toEqual({
            tunnelId: "t1",
            presence: "error",
            detail: "kernel tunnel diverges from record",
            error: "peer tunnel 2001 != 2000",
        });
    });

    it("should tear the tunnel down and treat a second teardown as success", async () => {
        const host = new FakeHost();
        const driver = new L2tpDriver({ runner: host });
        await driver.ensureUp(l2tpTunnel());

        await driver.ensureDown(l2tpTunnel());
        await driver.ensureDown(l2tpTunnel());

        expect(host.tunnels.size).toBe(0);
        expect(host.links.has("l2tp-t1")).toBe(false);
        expect(host.callsMatching("ip l2tp del")).toHaveLength(2);
    });
});
