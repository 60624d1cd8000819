/**
 * File helpers for owner-only, crash-safe writes
 */

import { randomBytes } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";

export const FILE_MODE = 0o600;
export const DIR_MODE = 0o700;

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && "code" in error;
}

export async function ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true, mode: DIR_MODE });
}

/**
 * Writes a file by way of a temporary sibling that is synced and renamed
 * into place, so readers see either the old or the new content.
 */
export async function writeFileAtomic(
    file: string,
    content: string,
    mode: number = FILE_MODE
): Promise<void> {
    await ensureDir(path.dirname(file));
    const temp = path.join(
        path.dirname(file),
        `.${path.basename(file)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`
    );

    const handle = await fs.open(temp, "w", mode);
    try {
        await handle.writeFile(content, "utf8");
        await handle.sync();
    } finally {
        await handle.close();
    }

    try {
        await fs.chmod(temp, mode);
        await fs.rename(temp, file);
    } catch (error) {
        await fs.rm(temp, { force: true });
        throw error;
    }
}

/**
 * Returns the file content, or null when the file does not exist
 */
export async function readTextIfExists(file: string): Promise<string | null> {
    try {
        return await fs.readFile(file, "utf8");
    } catch (error) {
        if (isNodeError(error) && error.code === "ENOENT") return null;
        throw error;
    }
}

/**
 * Removes a file; a missing file is not an error
 */
export async function removeFile(file: string): Promise<void> {
    await fs.rm(file, { force: true });
}
