/**
 * Shared plumbing for command handlers: opening the host runtime and turning
 * errors into exit codes.
 */

import type { Argv } from "yargs";
import { type HostRuntime, openHost } from "@tunnelkeeper/host";
import { EXIT_CODES, ValidationError, errorMessage, isTunnelkeeperError } from "@tunnelkeeper/shared";

/**
 * Arguments a command builder produces, for typing its handler
 */
export type ArgsOf<B> = B extends (yargs: Argv) => Argv<infer U> ? U : never;

export function openRuntime(): Promise<HostRuntime> {
    return openHost();
}

/**
 * True when prompts can be shown
 */
export function isInteractive(): boolean {
    return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

function isPromptCancel(error: unknown): boolean {
    return error instanceof Error && error.name === "ExitPromptError";
}

export function exitCodeFor(error: unknown): number {
    if (isTunnelkeeperError(error)) return error.exitCode;
    return EXIT_CODES.itemFailure;
}

export function describeError(error: unknown): string {
    if (isPromptCancel(error)) return "Cancelled.";
    if (isTunnelkeeperError(error)) return `Error: ${error.message}`;
    return `Fatal error: ${errorMessage(error)}`;
}

/**
 * Runs a handler body and records its exit code. Errors are printed, never rethrown.
 */
export async function runHandler(action: () => Promise<number>): Promise<void> {
    try {
        process.exitCode = await action();
    } catch (error) {
        console.error(`\n${describeError(error)}`);
        process.exitCode = exitCodeFor(error);
    }
}

/**
 * Looks up a tunnel or fails with a ValidationError
 */
export async function requireTunnel(runtime: HostRuntime, id: string) {
    const tunnel = await runtime.store.get(id);
    if (!tunnel) {
        throw new ValidationError([`tunnel "${id}" does not exist`]);
    }
    return tunnel;
}
