/**
 * Text rendering for reports, status and listings
 */

import type { MeshPeer, PrereqResult, UnitStatus } from "@tunnelkeeper/host";
import {
    type ApplyReport,
    type ForwardRule,
    type ReloadOutcome,
    type RuleOutcome,
    type StatusReport,
    type TunnelConfig,
    type TunnelOutcome,
    type TunnelPresence,
    ruleKeyLabel,
} from "@tunnelkeeper/shared";

const PRESENCE_MARK: Record<TunnelPresence, string> = {
    up: "✓",
    degraded: "!",
    error: "✗",
    absent: "-",
    pending: "…",
};

export const SECRET_MASK = "********";

export function printJson(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
}

/**
 * Aligns rows into columns separated by two spaces. The last column is not padded.
 */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
    const widths = headers.map((header, index) =>
        Math.max(header.length, ...rows.map((row) => (row[index] ?? "").length))
    );
    const line = (cells: readonly string[]): string =>
        cells.map((cell, index) => (index === cells.length - 1 ? cell : cell.padEnd(widths[index] ?? 0))).join("  ");
    return [line(headers), ...rows.map(line)].join("\n");
}

export function ruleTarget(rule: ForwardRule): string {
    return `${rule.targetIp}:${rule.targetPort}`;
}

export function formatTunnelOutcome(outcome: TunnelOutcome): string {
    const detail = outcome.detail ? `: ${outcome.detail}` : "";
    const line = `${PRESENCE_MARK[outcome.presence]} ${outcome.tunnelId} (${outcome.kind}) ${outcome.presence}${detail}`;
    return outcome.error ? `${line}\n    ${outcome.error}` : line;
}

export function formatRuleOutcome(outcome: RuleOutcome): string {
    const line = `${ruleKeyLabel(outcome)} -> ${outcome.tunnelId} ${ruleTarget(outcome)}  ${outcome.status}`;
    return outcome.reason ? `${line} (${outcome.reason})` : line;
}

export function formatReload(reload: ReloadOutcome): string {
    switch (reload.status) {
        case "applied":
            return "reloaded";
        case "unchanged":
            return "unchanged";
        case "failed":
            return `not updated, ${reload.stage} failed: ${reload.error}`;
    }
}

function section(title: string, lines: readonly string[]): string[] {
    return [`${title}:`, ...(lines.length > 0 ? lines : ["(none)"]).map((line) => `  ${line}`)];
}

export function formatReport(report: ApplyReport): string {
    return [
        ...section("Tunnels", report.tunnels.map(formatTunnelOutcome)),
        ...section("Rules", report.rules.map(formatRuleOutcome)),
        `Proxy: ${formatReload(report.reload)}`,
    ].join("\n");
}

export function formatStatus(status: StatusReport): string {
    const lines = [`Observed at ${status.observedAt}${status.applyInProgress ? " (apply in progress)" : ""}`];

    if (status.lastApply) {
        const { finishedAt, report } = status.lastApply;
        lines.push(`Last apply: ${finishedAt} (${report.mode}, proxy ${formatReload(report.reload)})`);
    } else {
        lines.push("Last apply: never");
    }

    lines.push(...section("Tunnels", status.tunnels.map(formatTunnelOutcome)));
    lines.push(
        ...section(
            "Rules",
            status.rules.map(
                (rule) =>
                    `${ruleKeyLabel(rule)} -> ${rule.tunnelId} ${ruleTarget(rule)}  ${rule.live ? "live" : "not live"}`
            )
        )
    );

    const { engine, configPath, present } = status.proxy;
    lines.push(`Proxy: ${engine}, ${configPath}${present ? "" : " (missing)"}`);
    return lines.join("\n");
}

/**
 * Copy of a tunnel record that is safe to print
 */
export function redactTunnel(tunnel: TunnelConfig): TunnelConfig {
    return tunnel.kind === "mesh" ? { ...tunnel, secret: SECRET_MASK } : tunnel;
}

export function tunnelEndpoint(tunnel: TunnelConfig): string {
    return tunnel.kind === "l2tpv3"
        ? `${tunnel.localIp} -> ${tunnel.remoteIp}`
        : `${tunnel.overlayIp} -> ${tunnel.peerIp}:${tunnel.listenPort}`;
}

export function formatTunnelList(tunnels: readonly TunnelConfig[], rules: readonly ForwardRule[]): string {
    if (tunnels.length === 0) return "No tunnels configured.";
    const rows = tunnels.map((tunnel) => [
        tunnel.id,
        tunnel.kind,
        tunnel.role,
        tunnel.interfaceName,
        tunnelEndpoint(tunnel),
        String(rules.filter((rule) => rule.tunnelId === tunnel.id).length),
    ]);
    return formatTable(["ID", "KIND", "ROLE", "INTERFACE", "ENDPOINT", "RULES"], rows);
}

export function formatRuleList(rules: readonly ForwardRule[]): string {
    if (rules.length === 0) return "No forward rules configured.";
    const rows = rules.map((rule) => [String(rule.listenPort), rule.protocol, rule.tunnelId, ruleTarget(rule)]);
    return formatTable(["PORT", "PROTO", "TUNNEL", "TARGET"], rows);
}

export function formatPeers(peers: readonly MeshPeer[]): string {
    if (peers.length === 0) return "No peers connected.";
    const rows = peers.map((peer) => [peer.ipv4, peer.hostname, peer.cost, peer.latency ?? "-", peer.loss ?? "-"]);
    return formatTable(["IPV4", "HOSTNAME", "COST", "LATENCY", "LOSS"], rows);
}

export function formatPrereqs(results: readonly PrereqResult[]): string {
    return results
        .map((result) => {
            const mark = result.ok ? "✓" : result.required ? "✗" : "!";
            const optional = result.required ? "" : " (optional)";
            return `${mark} ${result.name}${optional}: ${result.detail}`;
        })
        .join("\n");
}

export function formatUnits(units: readonly UnitStatus[]): string {
    const rows = units.map((unit) => [
        unit.unit,
        unit.installed ? "yes" : "no",
        unit.enabled,
        unit.active,
    ]);
    return formatTable(["UNIT", "INSTALLED", "ENABLED", "ACTIVE"], rows);
}
