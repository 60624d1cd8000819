/**
 * Field definitions and role-based defaults for `tunnel create`
 */

import { type TunnelKind, type TunnelRole, defaultInterfaceName } from "@tunnelkeeper/shared";

export type FieldValue = string | number;

export interface FieldSpec {
    /** Record key */
    key: string;
    /** Command-line flag, without dashes */
    flag: string;
    message: string;
    numeric?: boolean;
    secret?: boolean;
    /** Left out of the record when no value and no default exist */
    optional?: boolean;
}

const INTERFACE_FIELD: FieldSpec = { key: "interfaceName", flag: "interface", message: "Interface name:" };

const FORWARD_IP_FIELD: FieldSpec = {
    key: "remoteForwardIp",
    flag: "remote-forward-ip",
    message: "Default forward target on the far side:",
    optional: true,
};

export const L2TP_FIELDS: readonly FieldSpec[] = [
    INTERFACE_FIELD,
    { key: "localIp", flag: "local-ip", message: "Public IPv4 of this server:" },
    { key: "remoteIp", flag: "remote-ip", message: "Public IPv4 of the far server:" },
    { key: "interfaceAddress", flag: "address", message: "Tunnel interface address (CIDR):" },
    { key: "tunnelId", flag: "tunnel-id", message: "Local tunnel id:", numeric: true },
    { key: "peerTunnelId", flag: "peer-tunnel-id", message: "Peer tunnel id:", numeric: true },
    { key: "sessionId", flag: "session-id", message: "Local session id:", numeric: true },
    { key: "peerSessionId", flag: "peer-session-id", message: "Peer session id:", numeric: true },
    FORWARD_IP_FIELD,
];

export const MESH_FIELDS: readonly FieldSpec[] = [
    INTERFACE_FIELD,
    { key: "overlayIp", flag: "overlay-ip", message: "Overlay address of this server:" },
    { key: "peerIp", flag: "peer-ip", message: "Public IPv4 of the far server:" },
    { key: "listenPort", flag: "port", message: "Mesh listen port:", numeric: true },
    { key: "secret", flag: "secret", message: "Network secret:", secret: true },
    { key: "hostname", flag: "hostname", message: "Mesh hostname:" },
    { key: "rpcPort", flag: "rpc-port", message: "Local RPC port:", numeric: true },
    FORWARD_IP_FIELD,
];

export function fieldsFor(kind: TunnelKind): readonly FieldSpec[] {
    return kind === "l2tpv3" ? L2TP_FIELDS : MESH_FIELDS;
}

/**
 * Defaults keyed by record key. Both ends created with defaults mirror each other.
 */
export function tunnelDefaults(kind: TunnelKind, role: TunnelRole, id: string): Record<string, FieldValue> {
    const iran = role === "IRAN";
    const interfaceName = defaultInterfaceName(kind, id);

    if (kind === "l2tpv3") {
        return {
            interfaceName,
            interfaceAddress: iran ? "10.30.30.1/30" : "10.30.30.2/30",
            tunnelId: iran ? 1000 : 2000,
            peerTunnelId: iran ? 2000 : 1000,
            sessionId: iran ? 10 : 20,
            peerSessionId: iran ? 20 : 10,
            remoteForwardIp: iran ? "10.30.30.2" : "10.30.30.1",
        };
    }

    return {
        interfaceName,
        overlayIp: iran ? "10.155.155.1" : "10.155.155.2",
        listenPort: 2070,
        hostname: id,
        rpcPort: 15888,
        remoteForwardIp: iran ? "10.155.155.2" : "10.155.155.1",
    };
}

/**
 * Converts a flag or prompt answer to the type its field takes
 */
export function coerceField(field: FieldSpec, value: FieldValue): FieldValue {
    if (!field.numeric || typeof value === "number") return value;
    const trimmed = value.trim();
    return /^\d+$/.test(trimmed) ? Number(trimmed) : trimmed;
}

/**
 * Assembles the raw record handed to the store, which validates it
 */
export function buildTunnelRecord(
    base: { id: string; kind: TunnelKind; role: TunnelRole; peer?: string },
    values: Readonly<Record<string, FieldValue | undefined>>
): Record<string, unknown> {
    const record: Record<string, unknown> = { id: base.id, kind: base.kind, role: base.role };
    for (const field of fieldsFor(base.kind)) {
        const value = values[field.key];
        if (value === undefined || value === "") continue;
        record[field.key] = coerceField(field, value);
    }
    if (base.kind === "l2tpv3" && base.peer) {
        record.peer = base.peer;
    }
    return record;
}
