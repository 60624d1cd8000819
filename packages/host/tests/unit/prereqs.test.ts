/**
 * Unit tests for host prerequisite checks
 *
 * Platform and privilege checks are mocked so the suite runs anywhere.
 */

import { afterEach, describe, expect, it, vi } from "vitest";

vi.mock("@tunnelkeeper/shared", async (importOriginal) => ({
    ...(await importOriginal<typeof import("@tunnelkeeper/shared")>()),
    isLinux: () => true,
    isRoot: () => true,
}));

import { parseHostConfig } from "../../src/config/index.js";
import { checkPrerequisites, prerequisitesMet } from "../../src/services/prereqs/index.js";
import { FakeHost } from "../helpers/fake-host.js";

const host = parseHostConfig({});

afterEach(() => {
    vi.restoreAllMocks();
});

describe("checkPrerequisites", () => {
    it("should report every facility of a complete host", async () => {
        const results = await checkPrerequisites({
            runner: new FakeHost(),
            host,
            kinds: new Set(["l2tpv3"]),
        });

        expect(results).toEqual([
            { name: "linux", ok: true, required: true, detail: "running on Linux" },
            { name: "root", ok: true, required: true, detail: "running as root" },
            { name: "systemd", ok: true, required: true, detail: "systemd 252 (252.22-1)" },
            { name: "iproute2", ok: true, required: true, detail: "ip utility, iproute2-6.1.0" },
            {
                name: "kernel module l2tp_ip",
                ok: true,
                required: true,
                detail: "/lib/modules/6.1.0/kernel/net/l2tp/l2tp_ip.ko",
            },
            {
                name: "kernel module l2tp_eth",
                ok: true,
                required: true,
                detail: "/lib/modules/6.1.0/kernel/net/l2tp/l2tp_eth.ko",
            },
            { name: "haproxy (/usr/sbin/haproxy)", ok: true, required: true, detail: "HAProxy version 2.6.12" },
            {
                name: "mesh (/usr/local/bin/easytier-core)",
                ok: true,
                required: false,
                detail: "easytier-core 2.1.2",
            },
        ]);
        expect(prerequisitesMet(results)).toBe(true);
    });

    it("should tolerate a missing optional facility", async () => {
        const fake = new FakeHost();
        fake.failWhen("easytier-core", { exitCode: 127, stderr: "easytier-core: command not found" });

        const results = await checkPrerequisites({ runner: fake, host, kinds: new Set(["l2tpv3"]) });

        expect(results.find((r) => r.name.startsWith("mesh"))).toMatchObject({
            ok: false,
            required: false,
            detail: "easytier-core: command not found",
        });
        expect(prerequisitesMet(results)).toBe(true);
    });

    it("should fail when a kernel module needed by stored tunnels is missing", async () => {
        const fake = new FakeHost();
        fake.failWhen("modinfo -F filename l2tp_eth", { stderr: "modinfo: ERROR: Module l2tp_eth not found." });

        const results = await checkPrerequisites({ runner: fake, host, kinds: new Set(["l2tpv3"]) });

        expect(results.find((r) => r.name === "kernel module l2tp_eth")).toEqual({
            name: "kernel module l2tp_eth",
            ok: false,
            required: true,
            detail: "l2tp_eth not available: modinfo: ERROR: Module l2tp_eth not found.",
        });
        expect(prerequisitesMet(results)).toBe(false);
    });

    it("should not require l2tp facilities on a mesh-only host", async () => {
        const fake = new FakeHost();
        fake.failWhen("modinfo");

        const results = await checkPrerequisites({ runner: fake, host, kinds: new Set(["mesh"]) });

        expect(results.filter((r) => r.name.startsWith("kernel module")).map((r) => r.required)).toEqual([
            false,
            false,
        ]);
        expect(prerequisitesMet(results)).toBe(true);
    });
});
