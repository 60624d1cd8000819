/**
 * External command execution
 *
 * Every call into iproute2, systemctl, modprobe, the proxy validator and the
 * mesh CLI goes through a CommandRunner so tests can replace the host.
 */

import { execa } from "execa";

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

export interface CommandRunner {
    run(command: string, args: readonly string[]): Promise<CommandResult>;
}

const COMMAND_TIMEOUT_MS = 30_000;

/**
 * Runs commands with execa. Failures come back as results, never as throws.
 */
export const execaRunner: CommandRunner = {
    async run(command, args) {
        const result = await execa(command, args, {
            reject: false,
            timeout: COMMAND_TIMEOUT_MS,
            stdin: "ignore",
        });

        let exitCode = result.exitCode ?? 127;
        if (result.timedOut) exitCode = 124;

        return {
            exitCode,
            stdout: result.stdout,
            stderr: result.stderr,
        };
    },
};

export class CommandError extends Error {
    constructor(
        readonly command: string,
        readonly args: readonly string[],
        readonly result: CommandResult
    ) {
        const output = (result.stderr || result.stdout).trim();
        super(
            `\`${[command, ...args].join(" ")}\` exited with ${result.exitCode}` +
                (output ? `: ${output}` : "")
        );
        this.name = "CommandError";
    }
}

/**
 * Runs a command and throws CommandError on a nonzero exit
 */
export async function runChecked(
    runner: CommandRunner,
    command: string,
    args: readonly string[]
): Promise<CommandResult> {
    const result = await runner.run(command, args);
    if (result.exitCode !== 0) {
        throw new CommandError(command, args, result);
    }
    return result;
}
