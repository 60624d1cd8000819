/**
 * Tunnel driver registry
 *
 * Dispatches on the record's `kind` so callers work with TunnelConfig and
 * never with a concrete driver.
 */

import type { ObservedState, TunnelConfig } from "@tunnelkeeper/shared";
import { L2tpDriver } from "./l2tp.js";
import { MeshDriver, type MeshPeer } from "./mesh.js";
import type { DriverContext, EnsureUpOptions } from "./types.js";

export * from "./types.js";
export {
    L2tpDriver,
    parseInetAddresses,
    parseL2tpSessions,
    parseL2tpTunnels,
    parseLinkFlags,
    sessionDifferences,
    tunnelDifferences,
} from "./l2tp.js";
export {
    MeshDriver,
    generateMeshEnv,
    generateMeshUnit,
    meshCommandArgs,
    meshUnitName,
    parseMeshPeers,
} from "./mesh.js";
export type { MeshPeer } from "./mesh.js";

export class TunnelDrivers {
    constructor(
        readonly l2tp: L2tpDriver,
        readonly mesh: MeshDriver
    ) {}

    static create(context: DriverContext): TunnelDrivers {
        return new TunnelDrivers(new L2tpDriver(context), new MeshDriver(context));
    }

    ensureUp(config: TunnelConfig, options?: EnsureUpOptions): Promise<ObservedState> {
        switch (config.kind) {
            case "l2tpv3":
                return this.l2tp.ensureUp(config, options);
            case "mesh":
                return this.mesh.ensureUp(config, options);
        }
    }

    ensureDown(config: TunnelConfig): Promise<void> {
        switch (config.kind) {
            case "l2tpv3":
                return this.l2tp.ensureDown(config);
            case "mesh":
                return this.mesh.ensureDown(config);
        }
    }

    status(config: TunnelConfig): Promise<ObservedState> {
        switch (config.kind) {
            case "l2tpv3":
                return this.l2tp.status(config);
            case "mesh":
                return this.mesh.status(config);
        }
    }

    /**
     * Peers seen by a mesh tunnel; l2tpv3 tunnels have exactly one fixed peer
     */
    async peers(config: TunnelConfig): Promise<MeshPeer[] | null> {
        return config.kind === "mesh" ? this.mesh.listPeers(config) : null;
    }
}
