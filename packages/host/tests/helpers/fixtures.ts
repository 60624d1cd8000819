/**
 * Tunnel and rule records shared by the host tests
 */

import type { ForwardRule, L2tpTunnelConfig, MeshTunnelConfig } from "@tunnelkeeper/shared";

export function l2tpTunnel(overrides: Partial<L2tpTunnelConfig> = {}): L2tpTunnelConfig {
    return {
        id: "t1",
        kind: "l2tpv3",
        role: "IRAN",
        interfaceName: "l2tp-t1",
        localIp: "198.51.100.10",
        remoteIp: "203.0.113.20",
        interfaceAddress: "10.30.30.1/30",
        tunnelId: 1000,
        peerTunnelId: 2000,
        sessionId: 10,
        peerSessionId: 20,
        remoteForwardIp: "10.30.30.2",
        ...overrides,
    };
}

/** The KHAREJ side of `l2tpTunnel()` */
export function l2tpPeer(overrides: Partial<L2tpTunnelConfig> = {}): L2tpTunnelConfig {
    return l2tpTunnel({
        id: "t1-far",
        role: "KHAREJ",
        interfaceName: "l2tp-t1far",
        localIp: "203.0.113.20",
        remoteIp: "198.51.100.10",
        interfaceAddress: "10.30.30.2/30",
        tunnelId: 2000,
        peerTunnelId: 1000,
        sessionId: 20,
        peerSessionId: 10,
        remoteForwardIp: "10.30.30.1",
        ...overrides,
    });
}

export function meshTunnel(overrides: Partial<MeshTunnelConfig> = {}): MeshTunnelConfig {
    return {
        id: "m1",
        kind: "mesh",
        role: "IRAN",
        interfaceName: "mesh-m1",
        overlayIp: "10.144.144.1",
        peerIp: "203.0.113.30",
        listenPort: 11010,
        secret: "test-secret",
        hostname: "iran-edge",
        rpcPort: 15888,
        ...overrides,
    };
}

export function rule(overrides: Partial<ForwardRule> = {}): ForwardRule {
    return {
        tunnelId: "t1",
        listenPort: 443,
        targetIp: "10.30.30.2",
        targetPort: 443,
        protocol: "tcp",
        ...overrides,
    };
}
