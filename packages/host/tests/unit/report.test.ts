/**
 * Unit tests for apply report helpers
 */

import { describe, expect, it } from "vitest";
import type { ApplyReport, TunnelOutcome } from "@tunnelkeeper/shared";
import {
    admitRules,
    reportExitCode,
    statusExitCode,
    summarizeRules,
} from "../../src/services/reconciler/report.js";
import { rule } from "../helpers/fixtures.js";

const up: TunnelOutcome = { tunnelId: "t1", kind: "l2tpv3", presence: "up", detail: "" };
const down: TunnelOutcome = { tunnelId: "t2", kind: "l2tpv3", presence: "degraded", detail: "" };

const ownRule = rule();
const otherRule = rule({ tunnelId: "t2", listenPort: 8443 });

describe("admitRules", () => {
    it("should admit rules of tunnels that are up and skip the rest", () => {
        expect(admitRules([ownRule, otherRule], [up, down], [], false)).toEqual([
            { ...ownRule, status: "admitted" },
            { ...otherRule, status: "skipped", reason: "tunnel t2 is degraded" },
        ]);
    });

    it("should treat a rule without a visited tunnel as absent", () => {
        expect(admitRules([otherRule], [up], [], false)).toEqual([
            { ...otherRule, status: "skipped", reason: "tunnel t2 is absent" },
        ]);
    });

    it("should retain a live rule only when asked to", () => {
        expect(admitRules([otherRule], [down], [otherRule], true)[0].status).toBe("retained");
        expect(admitRules([otherRule], [down], [otherRule], false)[0].status).toBe("skipped");
    });

    it("should not retain a live rule whose target changed", () => {
        const live = { ...otherRule, targetPort: 9443 };

        expect(admitRules([otherRule], [down], [live], true)[0].status).toBe("skipped");
    });

    it("should skip rules the engine cannot carry even when their tunnel is up", () => {
        const dns = rule({ listenPort: 53, targetPort: 53, protocol: "udp" });

        expect(admitRules([dns, ownRule], [up], [], false, "haproxy")).toEqual([
            { ...dns, status: "skipped", reason: "haproxy cannot forward udp" },
            { ...ownRule, status: "admitted" },
        ]);
        expect(admitRules([dns], [up], [dns], true, "haproxy")[0].status).toBe("skipped");
        expect(admitRules([dns], [up], [], false, "nginx")[0].status).toBe("admitted");
    });
});

describe("summarizeRules", () => {
    it("should count each status and name the skipped listeners", () => {
        const outcomes = admitRules([ownRule, otherRule], [up, down], [], false);

        expect(summarizeRules(outcomes)).toBe("1 admitted, 0 retained, 1 skipped (8443/tcp)");
    });
});

describe("reportExitCode", () => {
    const report = (overrides: Partial<ApplyReport>): ApplyReport => ({
        mode: "full",
        tunnels: [up],
        rules: [{ ...ownRule, status: "admitted" }],
        reload: { status: "applied" },
        ...overrides,
    });

    it("should be 0 when everything converged", () => {
        expect(reportExitCode(report({}))).toBe(0);
    });

    it("should be 1 when a tunnel is not up", () => {
        expect(reportExitCode(report({ tunnels: [up, down] }))).toBe(1);
    });

    it("should be 2 when the proxy was not updated", () => {
        expect(
            reportExitCode(report({ reload: { status: "failed", stage: "reload", error: "failed" } }))
        ).toBe(2);
    });
});

describe("statusExitCode", () => {
    it("should be 0 when every tunnel is up and every rule is live", () => {
        expect(statusExitCode({ tunnels: [up], rules: [{ ...ownRule, live: true }] })).toBe(0);
    });

    it("should be 1 when a tunnel is not up", () => {
        expect(statusExitCode({ tunnels: [up, down], rules: [] })).toBe(1);
    });

    it("should be 1 when a stored rule is not live", () => {
        expect(statusExitCode({ tunnels: [up], rules: [{ ...ownRule, live: false }] })).toBe(1);
    });
});
