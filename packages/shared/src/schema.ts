/**
 * Record schemas
 *
 * Every record that crosses the store boundary (tunnel files, rule files and
 * CLI input) is parsed through these schemas, so a record on disk is always
 * well-formed before cross-record invariants are checked.
 */

import { isIPv4 } from "node:net";
import { z } from "zod";

const MAX_KERNEL_ID = 4294967295;

/** Linux caps interface names at 15 bytes (IFNAMSIZ - 1) */
const INTERFACE_NAME = /^[a-zA-Z0-9_.-]{1,15}$/;

/** Pasted into a unit's ExecStart, so no whitespace, quotes or `%` specifiers */
const MESH_HOSTNAME = /^[a-zA-Z0-9_][a-zA-Z0-9_.-]{0,62}$/;

export const TunnelIdSchema = z
    .string()
    .regex(/^[a-zA-Z0-9_-]{1,32}$/, "must be 1-32 characters of letters, digits, '-' or '_'");

export const Ipv4Schema = z.string().refine((value) => isIPv4(value), "must be an IPv4 address");

/**
 * IPv4 address with prefix length, e.g. 10.30.30.1/30
 */
export const CidrSchema = z.string().refine((value) => {
    const [address, prefix, ...rest] = value.split("/");
    if (rest.length > 0 || address === undefined || prefix === undefined) return false;
    if (!/^\d{1,2}$/.test(prefix)) return false;
    return isIPv4(address) && Number(prefix) <= 32;
}, "must be an IPv4 address with prefix length (a.b.c.d/p)");

export const PortSchema = z.number().int().min(1).max(65535);

const KernelIdSchema = z.number().int().min(1).max(MAX_KERNEL_ID);

export const TunnelRoleSchema = z.enum(["IRAN", "KHAREJ"]);

export const ProtocolSchema = z.enum(["tcp", "udp"]);

const TunnelBaseSchema = z.object({
    id: TunnelIdSchema,
    role: TunnelRoleSchema,
    interfaceName: z.string().regex(INTERFACE_NAME, "must be a valid interface name"),
    /** Default far-side address used as the target of new forward rules */
    remoteForwardIp: Ipv4Schema.optional(),
});

export const L2tpTunnelConfigSchema = TunnelBaseSchema.extend({
    kind: z.literal("l2tpv3"),
    localIp: Ipv4Schema,
    remoteIp: Ipv4Schema,
    interfaceAddress: CidrSchema,
    tunnelId: KernelIdSchema,
    peerTunnelId: KernelIdSchema,
    sessionId: KernelIdSchema,
    peerSessionId: KernelIdSchema,
    /** Id of the far side's record when both ends live in one store */
    peer: TunnelIdSchema.optional(),
}).strict();

export const MeshTunnelConfigSchema = TunnelBaseSchema.extend({
    kind: z.literal("mesh"),
    overlayIp: z.union([CidrSchema, Ipv4Schema]),
    peerIp: Ipv4Schema,
    listenPort: PortSchema,
    secret: z.string().min(1),
    hostname: z
        .string()
        .regex(MESH_HOSTNAME, "must be 1-63 letters, digits, '.', '-' or '_', not starting with '.' or '-'"),
    rpcPort: PortSchema.default(15888),
}).strict();

export const TunnelConfigSchema = z.discriminatedUnion("kind", [
    L2tpTunnelConfigSchema,
    MeshTunnelConfigSchema,
]);

export const ForwardRuleSchema = z
    .object({
        tunnelId: TunnelIdSchema,
        listenPort: PortSchema,
        targetIp: Ipv4Schema,
        targetPort: PortSchema,
        protocol: ProtocolSchema,
    })
    .strict();

export const ForwardRuleListSchema = z.array(ForwardRuleSchema);

/**
 * Formats zod issues as "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}
