/**
 * Forward-rule compiler
 *
 * Pure: the same rule set yields byte-identical output whatever order the
 * rules arrive in.
 */

import { CompileError, type ForwardRule, compareRules, ruleKeyLabel } from "@tunnelkeeper/shared";
import type { ForwardEngine } from "../../config/index.js";
import { haproxyRenderer } from "./haproxy.js";
import { nginxRenderer } from "./nginx.js";
import type { CompileOptions, ConfigDocument, EngineRenderer } from "./types.js";

const RENDERERS: Record<ForwardEngine, EngineRenderer> = {
    haproxy: haproxyRenderer,
    nginx: nginxRenderer,
};

/**
 * Whether an engine can forward a protocol at all
 */
export function engineCarries(engine: ForwardEngine, protocol: ForwardRule["protocol"]): boolean {
    return RENDERERS[engine].protocols.includes(protocol);
}

/**
 * Lists listener collisions and rules the engine cannot carry
 */
export function findConflicts(rules: readonly ForwardRule[], engine: ForwardEngine): string[] {
    const conflicts: string[] = [];
    const seen = new Map<string, ForwardRule>();

    for (const rule of [...rules].sort(compareRules)) {
        const label = ruleKeyLabel(rule);
        const first = seen.get(label);
        if (first) {
            conflicts.push(
                `${label} is claimed by both "${first.tunnelId}" and "${rule.tunnelId}"`
            );
        } else {
            seen.set(label, rule);
        }

        if (!engineCarries(engine, rule.protocol)) {
            conflicts.push(`${label}: ${engine} cannot forward ${rule.protocol}; use the nginx engine`);
        }
    }
    return conflicts;
}

export function compile(rules: readonly ForwardRule[], options: CompileOptions): ConfigDocument {
    const conflicts = findConflicts(rules, options.engine);
    if (conflicts.length > 0) {
        throw new CompileError(conflicts);
    }

    const sorted = rules
        .map((rule) => ({
            tunnelId: rule.tunnelId,
            listenPort: rule.listenPort,
            targetIp: rule.targetIp,
            targetPort: rule.targetPort,
            protocol: rule.protocol,
        }))
        .sort(compareRules);

    return {
        engine: options.engine,
        text: RENDERERS[options.engine].render(sorted),
        rules: sorted,
    };
}
