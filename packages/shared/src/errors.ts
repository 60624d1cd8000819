/**
 * Error taxonomy
 *
 * Each class carries a stable code and the process exit code the CLI reports
 * when the error ends a command.
 */

import type { ReloadStage } from "./types.js";

export const EXIT_CODES = {
    ok: 0,
    itemFailure: 1,
    reloadFailure: 2,
    validation: 3,
    storeIo: 4,
    applyInProgress: 5,
} as const;

export type ErrorCode =
    | "VALIDATION"
    | "TUNNEL"
    | "COMPILE"
    | "RELOAD"
    | "STORE_IO"
    | "APPLY_IN_PROGRESS";

export abstract class TunnelkeeperError extends Error {
    abstract readonly code: ErrorCode;
    abstract readonly exitCode: number;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Bad, duplicate or mismatched configuration. Never committed.
 */
export class ValidationError extends TunnelkeeperError {
    readonly code = "VALIDATION";
    readonly exitCode = EXIT_CODES.validation;

    constructor(readonly issues: string[]) {
        super(issues.length === 1 ? issues[0] : `${issues.length} problems:\n  ${issues.join("\n  ")}`);
    }
}

/**
 * A kernel or process action failed for one tunnel
 */
export class TunnelError extends TunnelkeeperError {
    readonly code = "TUNNEL";
    readonly exitCode = EXIT_CODES.itemFailure;

    constructor(
        readonly tunnelId: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(`${tunnelId}: ${message}`, options);
    }
}

/**
 * The rule set cannot be turned into a proxy configuration
 */
export class CompileError extends TunnelkeeperError {
    readonly code = "COMPILE";
    readonly exitCode = EXIT_CODES.reloadFailure;

    constructor(readonly conflicts: string[]) {
        super(`cannot compile forward rules: ${conflicts.join("; ")}`);
    }
}

/**
 * The proxy rejected or failed to load a new configuration.
 * The previous configuration stays active.
 */
export class ReloadError extends TunnelkeeperError {
    readonly code = "RELOAD";
    readonly exitCode = EXIT_CODES.reloadFailure;

    constructor(
        readonly stage: ReloadStage,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/**
 * The persistence layer is unavailable or holds an unreadable record
 */
export class StoreIOError extends TunnelkeeperError {
    readonly code = "STORE_IO";
    readonly exitCode = EXIT_CODES.storeIo;

    constructor(
        readonly path: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(`${message} (${path})`, options);
    }
}

/**
 * Another apply pass holds the host
 */
export class ApplyInProgressError extends TunnelkeeperError {
    readonly code = "APPLY_IN_PROGRESS";
    readonly exitCode = EXIT_CODES.applyInProgress;

    constructor(message = "another apply pass is in progress") {
        super(message);
    }
}

export function isTunnelkeeperError(error: unknown): error is TunnelkeeperError {
    return error instanceof TunnelkeeperError;
}

/**
 * Extracts a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
