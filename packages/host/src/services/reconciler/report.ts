/**
 * Apply report helpers
 */

import {
    type ApplyReport,
    EXIT_CODES,
    type ForwardRule,
    type ObservedState,
    type RuleOutcome,
    type RuleState,
    type TunnelOutcome,
    ruleKeyLabel,
} from "@tunnelkeeper/shared";
import type { ForwardEngine } from "../../config/index.js";
import { engineCarries } from "../forwarding/compiler.js";

/**
 * Process exit code for a finished pass: 2 when the proxy was not updated,
 * 1 when any tunnel or rule did not make it, 0 otherwise.
 */
export function reportExitCode(report: ApplyReport): number {
    if (report.reload.status === "failed") return EXIT_CODES.reloadFailure;
    const tunnelFailed = report.tunnels.some((tunnel) => tunnel.presence !== "up");
    const ruleFailed = report.rules.some((rule) => rule.status !== "admitted");
    return tunnelFailed || ruleFailed ? EXIT_CODES.itemFailure : EXIT_CODES.ok;
}

/**
 * Exit code of a read-only view: 1 when a tunnel is not up or a stored rule
 * is not live, 0 otherwise
 */
export function statusExitCode(view: {
    tunnels: readonly Pick<ObservedState, "presence">[];
    rules: readonly RuleState[];
}): number {
    const tunnelFailed = view.tunnels.some((tunnel) => tunnel.presence !== "up");
    const ruleFailed = view.rules.some((rule) => !rule.live);
    return tunnelFailed || ruleFailed ? EXIT_CODES.itemFailure : EXIT_CODES.ok;
}

function sameRule(a: ForwardRule, b: ForwardRule): boolean {
    return (
        a.listenPort === b.listenPort &&
        a.protocol === b.protocol &&
        a.tunnelId === b.tunnelId &&
        a.targetIp === b.targetIp &&
        a.targetPort === b.targetPort
    );
}

export function containsRule(rules: readonly ForwardRule[], rule: ForwardRule): boolean {
    return rules.some((candidate) => sameRule(candidate, rule));
}

/**
 * Decides each rule's fate from its tunnel's outcome
 *
 * Rules of a tunnel that is not up are skipped. With `retainOnFailure` a
 * skipped rule that the live proxy already carries is kept instead. Rules the
 * engine cannot carry are always skipped.
 */
export function admitRules(
    rules: readonly ForwardRule[],
    tunnels: readonly TunnelOutcome[],
    live: readonly ForwardRule[],
    retainOnFailure: boolean,
    engine?: ForwardEngine
): RuleOutcome[] {
    const presence = new Map(tunnels.map((tunnel) => [tunnel.tunnelId, tunnel.presence]));

    return rules.map((rule): RuleOutcome => {
        if (engine !== undefined && !engineCarries(engine, rule.protocol)) {
            return { ...rule, status: "skipped", reason: `${engine} cannot forward ${rule.protocol}` };
        }
        const state = presence.get(rule.tunnelId) ?? "absent";
        if (state === "up") {
            return { ...rule, status: "admitted" };
        }
        if (retainOnFailure && containsRule(live, rule)) {
            return {
                ...rule,
                status: "retained",
                reason: `tunnel ${rule.tunnelId} is ${state}; kept from the live configuration`,
            };
        }
        return { ...rule, status: "skipped", reason: `tunnel ${rule.tunnelId} is ${state}` };
    });
}

export function summarizeRules(rules: readonly RuleOutcome[]): string {
    const count = (status: RuleOutcome["status"]): number =>
        rules.filter((rule) => rule.status === status).length;
    const skipped = rules.filter((rule) => rule.status === "skipped").map(ruleKeyLabel);
    return (
        `${count("admitted")} admitted, ${count("retained")} retained, ${count("skipped")} skipped` +
        (skipped.length > 0 ? ` (${skipped.join(", ")})` : "")
    );
}
