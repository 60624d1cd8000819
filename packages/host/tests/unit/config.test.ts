/**
 * Unit tests for host configuration and store paths
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ValidationError } from "@tunnelkeeper/shared";
import {
    DEFAULT_HOME,
    loadHostConfig,
    parseHostConfig,
    resolveHome,
    resolvePaths,
} from "../../src/config/index.js";

describe("resolveHome", () => {
    it("should default to /etc/tunnelkeeper", () => {
        expect(resolveHome({})).toBe(DEFAULT_HOME);
    });

    it("should honour TUNNELKEEPER_HOME", () => {
        expect(resolveHome({ TUNNELKEEPER_HOME: "/srv/tk" })).toBe("/srv/tk");
    });

    it("should ignore a blank TUNNELKEEPER_HOME", () => {
        expect(resolveHome({ TUNNELKEEPER_HOME: "  " })).toBe(DEFAULT_HOME);
    });
});

describe("resolvePaths", () => {
    it("should lay out records, state and locks under the home", () => {
        expect(resolvePaths("/etc/tunnelkeeper")).toEqual({
            home: "/etc/tunnelkeeper",
            configFile: "/etc/tunnelkeeper/config.json",
            tunnelsDir: "/etc/tunnelkeeper/tunnels",
            rulesDir: "/etc/tunnelkeeper/rules",
            stateDir: "/etc/tunnelkeeper/state",
            lastApplyFile: "/etc/tunnelkeeper/state/last-apply.json",
            storeLock: "/etc/tunnelkeeper/.store.lock",
            applyLock: "/etc/tunnelkeeper/.apply.lock",
        });
    });
});

describe("parseHostConfig", () => {
    it("should fill haproxy defaults", () => {
        const config = parseHostConfig({});

        expect(config.forwardEngine).toBe("haproxy");
        expect(config.proxyBinary).toBe("/usr/sbin/haproxy");
        expect(config.proxyConfigPath).toBe("/etc/haproxy/haproxy.cfg");
        expect(config.proxyService).toBe("haproxy");
        expect(config.retainOnFailure).toBe(false);
        expect(config.daemon).toEqual({
            debounceMs: 2000,
            maxWaitMs: 15000,
            pollIntervalMs: 5000,
            driftIntervalMs: 60000,
        });
    });

    it("should fill nginx defaults and keep explicit paths", () => {
        const config = parseHostConfig({ forwardEngine: "nginx", proxyConfigPath: "/etc/nginx/stream.conf" });

        expect(config.proxyBinary).toBe("/usr/sbin/nginx");
        expect(config.proxyConfigPath).toBe("/etc/nginx/stream.conf");
        expect(config.proxyService).toBe("nginx");
    });

    it("should reject unknown keys", () => {
        expect(() => parseHostConfig({ forwardEngin: "nginx" })).toThrow(
            "config.json Unrecognized key(s) in object: 'forwardEngin'"
        );
    });

    it("should reject an unknown engine", () => {
        expect(() => parseHostConfig({ forwardEngine: "socat" })).toThrow(ValidationError);
    });
});

describe("loadHostConfig", () => {
    let home: string;

    beforeEach(async () => {
        home = await fs.mkdtemp(path.join(os.tmpdir(), "tunnelkeeper-config-"));
    });

    afterEach(async () => {
        await fs.rm(home, { recursive: true, force: true });
    });

    it("should return defaults when config.json is missing", async () => {
        expect(await loadHostConfig(home)).toEqual(parseHostConfig({}));
    });

    it("should read config.json", async () => {
        await fs.writeFile(path.join(home, "config.json"), JSON.stringify({ workerConcurrency: 2 }));

        expect((await loadHostConfig(home)).workerConcurrency).toBe(2);
    });

    it("should reject malformed JSON", async () => {
        await fs.writeFile(path.join(home, "config.json"), "{ workerConcurrency: 2 }");

        await expect(loadHostConfig(home)).rejects.toBeInstanceOf(ValidationError);
    });
});
