/**
 * nginx stream renderer (TCP and UDP)
 */

import type { ForwardRule } from "@tunnelkeeper/shared";
import { GENERATED_HEADER, ruleMarker } from "./markers.js";
import type { EngineRenderer } from "./types.js";

function renderServer(rule: ForwardRule): string {
    const listen = rule.protocol === "udp" ? `${rule.listenPort} udp` : `${rule.listenPort}`;
    const timeout = rule.protocol === "udp" ? "60s" : "1h";
    return `    ${ruleMarker(rule)}
    server {
        listen ${listen};
        proxy_pass ${rule.targetIp}:${rule.targetPort};
        proxy_connect_timeout 5s;
        proxy_timeout ${timeout};
    }
`;
}

export const nginxRenderer: EngineRenderer = {
    engine: "nginx",
    protocols: ["tcp", "udp"],
    render(rules) {
        const servers = rules.map(renderServer).join("\n");
        return `${GENERATED_HEADER}

worker_processes auto;
pid /run/nginx.pid;
include /etc/nginx/modules-enabled/*.conf;

events {
    worker_connections 4096;
}

stream {
${servers}}
`;
    },
};
