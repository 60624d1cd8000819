/**
 * Lock file handling to keep store mutations and apply passes exclusive
 */

import * as lockfile from "proper-lockfile";
import * as fs from "node:fs";
import * as path from "node:path";
import { createLogger } from "@tunnelkeeper/shared";

const log = createLogger("lock");

export interface LockOptions {
    /** File the lock is taken on (created when missing) */
    lockPath: string;
    /** Stale lock timeout in milliseconds (default: 10 minutes) */
    staleTimeout?: number;
    /** Retry policy while another process holds the lock (default: fail immediately) */
    retries?: lockfile.LockOptions["retries"];
}

export interface LockResult {
    /** Whether lock was acquired */
    acquired: boolean;
    /** Release function (call when done) */
    release: () => Promise<void>;
    /** Whether another process holds the lock */
    held?: boolean;
    /** Error message if lock failed */
    error?: string;
}

/** Age after which a lock counts as stale, for taking and checking alike */
export const STALE_MS = 10 * 60 * 1000;

/** Retries for short critical sections such as a single store write */
export const SHORT_WAIT: lockfile.LockOptions["retries"] = {
    retries: 40,
    factor: 1,
    minTimeout: 50,
    maxTimeout: 100,
};

/** Retries for waiting out an entire apply pass */
export const LONG_WAIT: lockfile.LockOptions["retries"] = {
    retries: 1200,
    factor: 1,
    minTimeout: 500,
    maxTimeout: 500,
};

/**
 * Attempts to acquire an exclusive lock on a file
 */
export async function acquireLock(options: LockOptions): Promise<LockResult> {
    const { lockPath, staleTimeout = STALE_MS, retries = 0 } = options;
    const lockDir = path.dirname(lockPath);

    // Ensure lock directory exists
    if (!fs.existsSync(lockDir)) {
        fs.mkdirSync(lockDir, { recursive: true, mode: 0o700 });
    }

    // Ensure lock file exists (proper-lockfile requires it)
    if (!fs.existsSync(lockPath)) {
        fs.writeFileSync(lockPath, "", { mode: 0o600 });
    }

    try {
        const release = await lockfile.lock(lockPath, {
            stale: staleTimeout,
            retries,
            onCompromised: (error) => {
                log.warn(`lock ${lockPath} compromised: ${error.message}`);
            },
        });

        return {
            acquired: true,
            release: async () => {
                try {
                    await release();
                } catch (error) {
                    log.debug(
                        `releasing ${lockPath}: ${error instanceof Error ? error.message : String(error)}`
                    );
                }
            },
        };
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ELOCKED") {
            return {
                acquired: false,
                held: true,
                release: async () => {},
                error: "lock is held by another process",
            };
        }

        return {
            acquired: false,
            held: false,
            release: async () => {},
            error: `Failed to acquire lock: ${error instanceof Error ? error.message : String(error)}`,
        };
    }
}

/**
 * Checks whether a lock is currently held
 *
 * Uses the same staleness window as {@link acquireLock}, so a pass that holds
 * the lock reads as held for as long as it could not be taken over.
 */
export async function isLocked(lockPath: string, staleTimeout: number = STALE_MS): Promise<boolean> {
    if (!fs.existsSync(lockPath)) {
        return false;
    }

    try {
        return await lockfile.check(lockPath, { stale: staleTimeout });
    } catch {
        return false;
    }
}
