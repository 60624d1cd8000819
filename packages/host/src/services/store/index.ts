/**
 * Config Store
 *
 * Persists tunnels and forward rules as pretty-printed JSON under the
 * tunnelkeeper home directory:
 *
 *   tunnels/<id>.json        one TunnelConfig
 *   rules/<id>.json          the forward rules owned by tunnel <id>
 *   state/last-apply.json    report of the last apply pass
 *
 * Every mutation validates the complete invariant set before touching disk,
 * holds the store lock for its duration and replaces files atomically.
 */

import { createHash } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import {
    type ApplyReport,
    type ForwardRule,
    type RuleKey,
    type TunnelConfig,
    ForwardRuleListSchema,
    ForwardRuleSchema,
    StoreIOError,
    TunnelConfigSchema,
    TunnelIdSchema,
    ValidationError,
    compareRules,
    createLogger,
    errorMessage,
    formatIssues,
    ruleKeyLabel,
} from "@tunnelkeeper/shared";
import { type ForwardEngine, type StorePaths, resolvePaths } from "../../config/index.js";
import { ensureDir, isNodeError, readTextIfExists, writeFileAtomic } from "../../lib/fs.js";
import { SHORT_WAIT, acquireLock } from "../../lib/lock.js";
import { ruleIssues, tunnelIssues } from "./validate.js";

export { arePeers, mirrorIssues, ruleIssues, tunnelIssues } from "./validate.js";

const log = createLogger("store");

export interface StoreSnapshot {
    tunnels: TunnelConfig[];
    rules: ForwardRule[];
}

export interface LastApply {
    finishedAt: string;
    report: ApplyReport;
}

const TunnelOutcomeSchema = z.object({
    tunnelId: z.string(),
    kind: z.enum(["l2tpv3", "mesh"]),
    presence: z.enum(["absent", "pending", "up", "degraded", "error"]),
    detail: z.string(),
    error: z.string().optional(),
});

const RuleOutcomeSchema = ForwardRuleSchema.extend({
    status: z.enum(["admitted", "skipped", "retained"]),
    reason: z.string().optional(),
});

const LastApplySchema: z.ZodType<LastApply> = z.object({
    finishedAt: z.string(),
    report: z.object({
        mode: z.enum(["full", "tunnel", "forwarding"]),
        tunnels: z.array(TunnelOutcomeSchema),
        rules: z.array(RuleOutcomeSchema),
        reload: z.discriminatedUnion("status", [
            z.object({ status: z.literal("applied") }),
            z.object({ status: z.literal("unchanged") }),
            z.object({
                status: z.literal("failed"),
                stage: z.enum(["compile", "validate", "write", "reload"]),
                error: z.string(),
            }),
        ]),
    }),
});

export interface PutOptions {
    /** Overwrite an existing record with the same id */
    replace?: boolean;
}

export interface DeleteOptions {
    /** Remove the tunnel's forward rules along with it */
    cascade?: boolean;
}

function toJson(value: unknown): string {
    return `${JSON.stringify(value, null, 4)}\n`;
}

function parseRecordId(id: string): string {
    const result = TunnelIdSchema.safeParse(id);
    if (!result.success) {
        throw new ValidationError([`invalid tunnel id "${id}": ${formatIssues(result.error).join(", ")}`]);
    }
    return result.data;
}

export interface ConfigStoreOptions {
    /** Engine that will carry the rules; rules it cannot forward are refused */
    forwardEngine?: ForwardEngine;
}

export class ConfigStore {
    private readonly forwardEngine: ForwardEngine | undefined;

    constructor(
        readonly paths: StorePaths,
        options: ConfigStoreOptions = {}
    ) {
        this.forwardEngine = options.forwardEngine;
    }

    static at(home: string, options: ConfigStoreOptions = {}): ConfigStore {
        return new ConfigStore(resolvePaths(home), options);
    }

    // ------------------------------------------------------------------
    // Tunnels
    // ------------------------------------------------------------------

    /**
     * Lists every tunnel, ordered by id
     */
    async list(): Promise<TunnelConfig[]> {
        const files = await this.listJsonFiles(this.paths.tunnelsDir);
        const tunnels: TunnelConfig[] = [];
        for (const file of files) {
            tunnels.push(await this.readTunnelFile(path.join(this.paths.tunnelsDir, file)));
        }
        return tunnels.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    }

    async get(id: string): Promise<TunnelConfig | null> {
        const file = this.tunnelFile(parseRecordId(id));
        const text = await this.readText(file);
        return text === null ? null : this.parseTunnel(file, text);
    }

    /**
     * Validates and commits a tunnel record
     */
    async put(input: unknown, options: PutOptions = {}): Promise<TunnelConfig> {
        const parsed = TunnelConfigSchema.safeParse(input);
        if (!parsed.success) {
            throw new ValidationError(formatIssues(parsed.error));
        }
        const record = parsed.data;

        return this.withLock(async () => {
            const tunnels = await this.list();
            const exists = tunnels.some((tunnel) => tunnel.id === record.id);
            if (exists && !options.replace) {
                throw new ValidationError([`tunnel "${record.id}" already exists`]);
            }

            const others = tunnels.filter((tunnel) => tunnel.id !== record.id);
            const rules = (await this.listRules()).filter((rule) => rule.tunnelId !== record.id);
            const issues = tunnelIssues(record, others, rules);
            if (issues.length > 0) {
                throw new ValidationError(issues);
            }

            await this.write(this.tunnelFile(record.id), toJson(record));
            log.info(`${exists ? "updated" : "created"} tunnel ${record.id} (${record.kind})`);
            return record;
        });
    }

    /**
     * Deletes a tunnel. Refuses while the tunnel owns forward rules unless
     * `cascade` is set. Returns the rules removed with it.
     */
    async delete(id: string, options: DeleteOptions = {}): Promise<ForwardRule[]> {
        const tunnelId = parseRecordId(id);

        return this.withLock(async () => {
            const file = this.tunnelFile(tunnelId);
            if ((await this.readText(file)) === null) {
                throw new ValidationError([`tunnel "${tunnelId}" does not exist`]);
            }

            const rules = await this.listRules(tunnelId);
            if (rules.length > 0 && !options.cascade) {
                throw new ValidationError([
                    `tunnel "${tunnelId}" still owns ${rules.length} forward rule(s); ` +
                        "remove them first or delete with cascade",
                ]);
            }

            if (rules.length > 0) {
                await this.remove(this.rulesFile(tunnelId));
            }
            await this.remove(file);
            log.info(`deleted tunnel ${tunnelId}${rules.length > 0 ? ` and ${rules.length} rule(s)` : ""}`);
            return rules;
        });
    }

    // ------------------------------------------------------------------
    // Forward rules
    // ------------------------------------------------------------------

    /**
     * Lists forward rules ordered by (listenPort, protocol)
     */
    async listRules(tunnelId?: string): Promise<ForwardRule[]> {
        let files: string[];
        if (tunnelId === undefined) {
            files = await this.listJsonFiles(this.paths.rulesDir);
        } else {
            files = [`${parseRecordId(tunnelId)}.json`];
        }

        const rules: ForwardRule[] = [];
        for (const file of files) {
            rules.push(...(await this.readRulesFile(path.join(this.paths.rulesDir, file))));
        }
        return rules.sort(compareRules);
    }

    async putRule(input: unknown): Promise<ForwardRule> {
        const [rule] = await this.putRules([input]);
        return rule;
    }

    /**
     * Adds several rules in one mutation. Either all are committed or none.
     */
    async putRules(inputs: readonly unknown[]): Promise<ForwardRule[]> {
        const candidates: ForwardRule[] = [];
        const schemaIssues: string[] = [];
        inputs.forEach((input, index) => {
            const parsed = ForwardRuleSchema.safeParse(input);
            if (parsed.success) {
                candidates.push(parsed.data);
            } else {
                const prefix = inputs.length > 1 ? `rule ${index + 1} ` : "";
                schemaIssues.push(...formatIssues(parsed.error).map((issue) => `${prefix}${issue}`));
            }
        });
        if (schemaIssues.length > 0) {
            throw new ValidationError(schemaIssues);
        }
        if (candidates.length === 0) {
            return [];
        }

        return this.withLock(async () => {
            const tunnels = await this.list();
            const existing = await this.listRules();
            const issues = ruleIssues(candidates, tunnels, existing, this.forwardEngine);
            if (issues.length > 0) {
                throw new ValidationError(issues);
            }

            const owners = [...new Set(candidates.map((rule) => rule.tunnelId))];
            for (const owner of owners) {
                const next = existing
                    .filter((rule) => rule.tunnelId === owner)
                    .concat(candidates.filter((rule) => rule.tunnelId === owner))
                    .sort(compareRules);
                await this.write(this.rulesFile(owner), toJson(next));
            }

            log.info(`added ${candidates.map(ruleKeyLabel).join(", ")}`);
            return [...candidates].sort(compareRules);
        });
    }

    async deleteRule(listenPort: number, protocol: ForwardRule["protocol"]): Promise<ForwardRule> {
        const [removed] = await this.deleteRules([{ listenPort, protocol }]);
        return removed;
    }

    /**
     * Removes rules by listener. Every key must exist.
     */
    async deleteRules(keys: readonly RuleKey[]): Promise<ForwardRule[]> {
        if (keys.length === 0) return [];

        return this.withLock(async () => {
            const existing = await this.listRules();
            const wanted = new Set(keys.map(ruleKeyLabel));
            const removed = existing.filter((rule) => wanted.has(ruleKeyLabel(rule)));

            const found = new Set(removed.map(ruleKeyLabel));
            const missing = [...wanted].filter((label) => !found.has(label));
            if (missing.length > 0) {
                throw new ValidationError(missing.map((label) => `no forward rule on ${label}`));
            }

            const owners = [...new Set(removed.map((rule) => rule.tunnelId))];
            for (const owner of owners) {
                const remaining = existing.filter(
                    (rule) => rule.tunnelId === owner && !wanted.has(ruleKeyLabel(rule))
                );
                if (remaining.length === 0) {
                    await this.remove(this.rulesFile(owner));
                } else {
                    await this.write(this.rulesFile(owner), toJson(remaining));
                }
            }

            log.info(`removed ${removed.map(ruleKeyLabel).join(", ")}`);
            return removed;
        });
    }

    // ------------------------------------------------------------------
    // Snapshots and state
    // ------------------------------------------------------------------

    /**
     * Reads tunnels and rules as one consistent pair
     */
    async snapshot(): Promise<StoreSnapshot> {
        return this.withLock(async () => {
            const tunnels = await this.list();
            const rules = await this.listRules();
            return { tunnels, rules };
        });
    }

    /**
     * Hash of the complete rule set; changes whenever any rule does
     */
    async rulesFingerprint(): Promise<string> {
        const rules = await this.listRules();
        return createHash("sha256").update(JSON.stringify(rules)).digest("hex");
    }

    async readLastApply(): Promise<LastApply | null> {
        const file = this.paths.lastApplyFile;
        const text = await this.readText(file);
        if (text === null) return null;

        try {
            const result = LastApplySchema.safeParse(JSON.parse(text));
            if (result.success) return result.data;
            log.warn(`ignoring malformed ${file}: ${formatIssues(result.error).join("; ")}`);
        } catch (error) {
            log.warn(`ignoring unreadable ${file}: ${errorMessage(error)}`);
        }
        return null;
    }

    async writeLastApply(record: LastApply): Promise<void> {
        await this.write(this.paths.lastApplyFile, toJson(record));
    }

    /**
     * Creates the home directory tree with owner-only permissions
     */
    async init(): Promise<void> {
        for (const dir of [this.paths.home, this.paths.tunnelsDir, this.paths.rulesDir, this.paths.stateDir]) {
            await this.io(dir, "cannot create directory", () => ensureDir(dir));
        }
    }

    // ------------------------------------------------------------------
    // Internals
    // ------------------------------------------------------------------

    private tunnelFile(id: string): string {
        return path.join(this.paths.tunnelsDir, `${id}.json`);
    }

    private rulesFile(id: string): string {
        return path.join(this.paths.rulesDir, `${id}.json`);
    }

    private async withLock<T>(fn: () => Promise<T>): Promise<T> {
        await this.io(this.paths.home, "cannot create store directory", () => ensureDir(this.paths.home));
        const lock = await acquireLock({ lockPath: this.paths.storeLock, retries: SHORT_WAIT });
        if (!lock.acquired) {
            throw new StoreIOError(this.paths.storeLock, lock.error ?? "cannot lock the store");
        }
        try {
            return await fn();
        } finally {
            await lock.release();
        }
    }

    private async io<T>(target: string, message: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            throw new StoreIOError(target, `${message}: ${errorMessage(error)}`, { cause: error });
        }
    }

    private readText(file: string): Promise<string | null> {
        return this.io(file, "cannot read", () => readTextIfExists(file));
    }

    private write(file: string, content: string): Promise<void> {
        return this.io(file, "cannot write", () => writeFileAtomic(file, content));
    }

    private remove(file: string): Promise<void> {
        return this.io(file, "cannot remove", () => fs.rm(file, { force: true }));
    }

    private async listJsonFiles(dir: string): Promise<string[]> {
        try {
            const entries = await fs.readdir(dir);
            return entries.filter((name) => name.endsWith(".json") && !name.startsWith(".")).sort();
        } catch (error) {
            if (isNodeError(error) && error.code === "ENOENT") return [];
            throw new StoreIOError(dir, `cannot list: ${errorMessage(error)}`, { cause: error });
        }
    }

    private async readTunnelFile(file: string): Promise<TunnelConfig> {
        const text = await this.readText(file);
        if (text === null) {
            throw new StoreIOError(file, "tunnel record disappeared while reading");
        }
        return this.parseTunnel(file, text);
    }

    private parseTunnel(file: string, text: string): TunnelConfig {
        const result = TunnelConfigSchema.safeParse(this.parseJson(file, text));
        if (!result.success) {
            throw new StoreIOError(file, `invalid tunnel record: ${formatIssues(result.error).join("; ")}`);
        }
        if (`${result.data.id}.json` !== path.basename(file)) {
            throw new StoreIOError(file, `record id "${result.data.id}" does not match its file name`);
        }
        return result.data;
    }

    private async readRulesFile(file: string): Promise<ForwardRule[]> {
        const text = await this.readText(file);
        if (text === null) return [];

        const result = ForwardRuleListSchema.safeParse(this.parseJson(file, text));
        if (!result.success) {
            throw new StoreIOError(file, `invalid rule record: ${formatIssues(result.error).join("; ")}`);
        }
        const owner = path.basename(file, ".json");
        const stray = result.data.find((rule) => rule.tunnelId !== owner);
        if (stray) {
            throw new StoreIOError(file, `rule ${ruleKeyLabel(stray)} belongs to "${stray.tunnelId}"`);
        }
        return result.data;
    }

    private parseJson(file: string, text: string): unknown {
        try {
            return JSON.parse(text);
        } catch (error) {
            throw new StoreIOError(file, `not valid JSON: ${errorMessage(error)}`, { cause: error });
        }
    }
}
