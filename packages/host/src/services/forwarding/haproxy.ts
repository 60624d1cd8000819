/**
 * HAProxy renderer (TCP only)
 */

import type { ForwardRule } from "@tunnelkeeper/shared";
import { GENERATED_HEADER, ruleMarker } from "./markers.js";
import type { EngineRenderer } from "./types.js";

function renderRule(rule: ForwardRule): string {
    const name = `tcp_${rule.listenPort}`;
    return `${ruleMarker(rule)}
frontend fwd_${name}
    bind 0.0.0.0:${rule.listenPort}
    default_backend bk_${name}

backend bk_${name}
    server ${rule.tunnelId} ${rule.targetIp}:${rule.targetPort}
`;
}

export const haproxyRenderer: EngineRenderer = {
    engine: "haproxy",
    protocols: ["tcp"],
    render(rules) {
        const header = `${GENERATED_HEADER}

global
    log /dev/log local0
    maxconn 20000

defaults
    mode tcp
    log global
    option dontlognull
    timeout connect 5s
    timeout client 1h
    timeout server 1h
`;
        return [header, ...rules.map(renderRule)].join("\n");
    },
};
