/**
 * Rule markers
 *
 * Each rendered rule is preceded by a comment naming it, which lets the live
 * proxy file be read back as a rule set without parsing engine syntax.
 */

import { type ForwardRule, compareRules } from "@tunnelkeeper/shared";

export const GENERATED_HEADER =
    "# Generated by tunnelkeeper. Changes are overwritten on the next apply.";

export function ruleMarker(rule: ForwardRule): string {
    return (
        `# rule ${rule.protocol}/${rule.listenPort} -> ` +
        `${rule.tunnelId} ${rule.targetIp}:${rule.targetPort}`
    );
}

const MARKER = /^\s*# rule (tcp|udp)\/(\d+) -> (\S+) (\d+\.\d+\.\d+\.\d+):(\d+)\s*$/gm;

/**
 * Reads the rules a rendered configuration carries
 */
export function parseLiveRules(text: string): ForwardRule[] {
    const rules: ForwardRule[] = [];
    for (const match of text.matchAll(MARKER)) {
        rules.push({
            protocol: match[1] === "udp" ? "udp" : "tcp",
            listenPort: Number(match[2]),
            tunnelId: match[3],
            targetIp: match[4],
            targetPort: Number(match[5]),
        });
    }
    return rules.sort(compareRules);
}
