/**
 * Host prerequisite checks
 */

import { type TunnelKind, isLinux, isRoot } from "@tunnelkeeper/shared";
import type { HostConfig } from "../../config/index.js";
import type { CommandRunner } from "../../lib/command.js";

export interface PrereqResult {
    name: string;
    ok: boolean;
    /** A failed required check blocks tunnel management */
    required: boolean;
    detail: string;
}

export interface PrereqOptions {
    runner: CommandRunner;
    host: HostConfig;
    /** Kinds of tunnel recorded in the store; their facilities become required */
    kinds: ReadonlySet<TunnelKind>;
}

function firstLine(text: string): string {
    return text.trim().split("\n")[0] ?? "";
}

async function probe(
    runner: CommandRunner,
    command: string,
    args: string[]
): Promise<{ ok: boolean; detail: string }> {
    const result = await runner.run(command, args);
    const output = firstLine(result.stdout) || firstLine(result.stderr);
    if (result.exitCode === 0) {
        return { ok: true, detail: output || "ok" };
    }
    return { ok: false, detail: output || `${command} exited with ${result.exitCode}` };
}

export async function checkPrerequisites(options: PrereqOptions): Promise<PrereqResult[]> {
    const { runner, host, kinds } = options;
    const results: PrereqResult[] = [];

    results.push({
        name: "linux",
        ok: isLinux(),
        required: true,
        detail: isLinux() ? "running on Linux" : `running on ${process.platform}`,
    });
    results.push({
        name: "root",
        ok: isRoot(),
        required: true,
        detail: isRoot() ? "running as root" : "tunnel and proxy changes need root",
    });

    const systemd = await probe(runner, "systemctl", ["--version"]);
    results.push({ name: "systemd", required: true, ...systemd });

    const needsL2tp = kinds.has("l2tpv3");
    const iproute = await probe(runner, "ip", ["-V"]);
    results.push({ name: "iproute2", required: needsL2tp, ...iproute });
    for (const module of ["l2tp_ip", "l2tp_eth"]) {
        const found = await probe(runner, "modinfo", ["-F", "filename", module]);
        results.push({
            name: `kernel module ${module}`,
            required: needsL2tp,
            ok: found.ok,
            detail: found.ok ? found.detail : `${module} not available: ${found.detail}`,
        });
    }

    const proxy = await probe(runner, host.proxyBinary, ["-v"]);
    results.push({ name: `${host.forwardEngine} (${host.proxyBinary})`, required: true, ...proxy });

    const needsMesh = kinds.has("mesh");
    const mesh = await probe(runner, host.meshBinary, ["--version"]);
    results.push({ name: `mesh (${host.meshBinary})`, required: needsMesh, ...mesh });

    return results;
}

export function prerequisitesMet(results: readonly PrereqResult[]): boolean {
    return results.every((result) => result.ok || !result.required);
}
