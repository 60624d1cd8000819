/**
 * Unit tests for the mesh driver
 *
 * Unit and environment files land in a temporary directory; systemctl and
 * easytier-cli are simulated by FakeHost.
 */

import * as fs from "node:fs/promises";
import { type Mock, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolvePaths } from "../../src/config/index.js";
import {
    MeshDriver,
    generateMeshEnv,
    generateMeshUnit,
    meshCommandArgs,
    meshUnitName,
    parseMeshPeers,
} from "../../src/services/tunnel/mesh.js";
import { FakeHost, createTestHome, type TestHome } from "../helpers/fake-host.js";
import { meshTunnel } from "../helpers/fixtures.js";

const UNIT = "tunnelkeeper-mesh-m1.service";

const PEER_TABLE = `┌──────────────┬──────────┬───────┬────────┬──────┬──────────┬──────────┬──────────────┬──────────┐
│ ipv4         │ hostname │ cost  │ lat_ms │ loss │ rx_bytes │ tx_bytes │ tunnel_proto │ nat_type │
├──────────────┼──────────┼───────┼────────┼──────┼──────────┼──────────┼──────────────┼──────────┤
│ 10.144.144.1 │ iran-edge│ Local │ -      │ -    │ -        │ -        │ -            │ FullCone │
├──────────────┼──────────┼───────┼────────┼──────┼──────────┼──────────┼──────────────┼──────────┤
│ 10.144.144.2 │ far-edge │ p2p   │ 41.20  │ 0.0% │ 1.2 MB   │ 900 kB   │ tcp          │ FullCone │
└──────────────┴──────────┴───────┴────────┴──────┴──────────┴──────────┴──────────────┴──────────┘
`;

let testHome: TestHome;
let host: FakeHost;
let driver: MeshDriver;
let sleep: Mock<[number], Promise<void>>;

beforeEach(async () => {
    testHome = await createTestHome({ settleMs: 250 });
    host = new FakeHost();
    host.bindMeshInterface(UNIT, "mesh-m1");
    sleep = vi.fn<[number], Promise<void>>(async () => undefined);
    driver = new MeshDriver({
        runner: host,
        host: testHome.config,
        paths: resolvePaths(testHome.home),
        sleep,
    });
});

afterEach(async () => {
    vi.restoreAllMocks();
    await testHome.cleanup();
});

// ============================================================================
// Generated files
// ============================================================================

describe("meshCommandArgs", () => {
    it("should build the easytier-core command line", () => {
        expect(meshCommandArgs(meshTunnel(), "/usr/local/bin/easytier-core")).toEqual([
            "/usr/local/bin/easytier-core",
            "-i", "10.144.144.1",
            "--hostname", "iran-edge",
            "--network-secret", "${MESH_SECRET}",
            "--default-protocol", "tcp",
            "--listeners", "tcp://[::]:11010", "tcp://0.0.0.0:11010",
            "--multi-thread",
            "--dev-name", "mesh-m1",
            "--rpc-portal", "127.0.0.1:15888",
            "--peers", "tcp://203.0.113.30:11010",
        ]);
    });
});

describe("generateMeshUnit", () => {
    it("should reference the secret through the environment file only", () => {
        const unit = generateMeshUnit(meshTunnel(), testHome.config, "/etc/tunnelkeeper/mesh/m1.env");

        expect(unit).toContain("EnvironmentFile=/etc/tunnelkeeper/mesh/m1.env\n");
        expect(unit).toContain("SyslogIdentifier=tunnelkeeper-mesh-m1\n");
        expect(unit).not.toContain("test-secret");
    });
});

describe("generateMeshEnv", () => {
    it("should quote and escape the secret", () => {
        const env = generateMeshEnv(meshTunnel({ secret: 'te"st\\x' }));

        expect(env.split("\n")[1]).toBe('MESH_SECRET="te\\"st\\\\x"');
    });
});

describe("meshUnitName", () => {
    it("should prefix the tunnel id", () => {
        expect(meshUnitName("m1")).toBe(UNIT);
    });
});

describe("parseMeshPeers", () => {
    it("should parse rows and turn dashes into null", () => {
        expect(parseMeshPeers(PEER_TABLE)).toEqual([
            {
                ipv4: "10.144.144.1",
                hostname: "iran-edge",
                cost: "Local",
                latency: null,
                loss: null,
                rx: null,
                tx: null,
                tunnel: null,
                nat: "FullCone",
            },
            {
                ipv4: "10.144.144.2",
                hostname: "far-edge",
                cost: "p2p",
                latency: "41.20",
                loss: "0.0%",
                rx: "1.2 MB",
                tx: "900 kB",
                tunnel: "tcp",
                nat: "FullCone",
            },
        ]);
    });

    it("should return nothing for an empty table", () => {
        expect(parseMeshPeers("")).toEqual([]);
    });
});

// ============================================================================
// Driver
// ============================================================================

describe("MeshDriver", () => {
    it("should install, enable and start the unit", async () => {
        const state = await driver.ensureUp(meshTunnel());

        expect(state).toEqual({
            tunnelId: "m1",
            presence: "up",
            detail: `${UNIT} running, 10.144.144.1 on mesh-m1 via 203.0.113.30:11010`,
        });
        expect(host.callsMatching("systemctl")).toEqual([
            "systemctl daemon-reload",
            `systemctl is-active ${UNIT}`,
            `systemctl enable ${UNIT}`,
            `systemctl start ${UNIT}`,
            `systemctl is-active ${UNIT}`,
        ]);
        expect(sleep).toHaveBeenCalledWith(250);
    });

    it("should keep the secret in an owner-only file", async () => {
        await driver.ensureUp(meshTunnel());

        const stat = await fs.stat(driver.envFile("m1"));
        expect(stat.mode & 0o777).toBe(0o600);
        expect(await fs.readFile(driver.envFile("m1"), "utf8")).toContain('MESH_SECRET="test-secret"');
    });

    it("should leave a running unit alone when nothing changed", async () => {
        await driver.ensureUp(meshTunnel());
        const before = host.calls.length;

        await driver.ensureUp(meshTunnel());

        expect(host.calls.slice(before)).toEqual([
            `systemctl is-active ${UNIT}`,
            `systemctl is-active ${UNIT}`,
            "ip -o link show dev mesh-m1",
        ]);
        expect(sleep).toHaveBeenCalledTimes(1);
    });

    it("should restart the unit when the secret changes", async () => {
        await driver.ensureUp(meshTunnel());

        await driver.ensureUp(meshTunnel({ secret: "other-secret" }));

        expect(host.callsMatching(`systemctl restart ${UNIT}`)).toHaveLength(1);
        expect(await fs.readFile(driver.envFile("m1"), "utf8")).toContain('MESH_SECRET="other-secret"');
    });

    it("should restart a running unit when recreate is requested", async () => {
        await driver.ensureUp(meshTunnel());

        await driver.ensureUp(meshTunnel(), { recreate: true });

        expect(host.callsMatching(`systemctl restart ${UNIT}`)).toHaveLength(1);
    });

    it("should report a missing unit as absent", async () => {
        expect(await driver.status(meshTunnel())).toEqual({
            tunnelId: "m1",
            presence: "absent",
            detail: `${UNIT} not installed`,
        });
    });

    it("should report a failed unit as an error", async () => {
        await driver.ensureUp(meshTunnel());
        host.units.set(UNIT, "failed");

        expect(await driver.status(meshTunnel())).toMatchObject({
            presence: "error",
            error: `${UNIT} is in failed state`,
        });
    });

    it("should report a unit running outdated parameters as degraded", async () => {
        await driver.ensureUp(meshTunnel());

        expect(await driver.status(meshTunnel({ peerIp: "203.0.113.31" }))).toEqual({
            tunnelId: "m1",
            presence: "degraded",
            detail: `${UNIT} runs with outdated parameters`,
        });
    });

    it("should stop, disable and remove the unit", async () => {
        await driver.ensureUp(meshTunnel());

        await driver.ensureDown(meshTunnel());

        expect(host.units.get(UNIT)).toBe("inactive");
        expect(host.enabled.has(UNIT)).toBe(false);
        await expect(fs.access(driver.unitFile("m1"))).rejects.toThrow();
        await expect(fs.access(driver.envFile("m1"))).rejects.toThrow();
        expect((await driver.status(meshTunnel())).presence).toBe("absent");
    });

    it("should list peers through the rpc portal", async () => {
        host.peerTable = PEER_TABLE;

        const peers = await driver.listPeers(meshTunnel());

        expect(peers.map((peer) => peer.hostname)).toEqual(["iran-edge", "far-edge"]);
        expect(host.calls).toEqual(["easytier-cli -p 127.0.0.1:15888 peer"]);
    });
});
