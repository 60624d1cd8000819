/**
 * apply command - Bring tunnels up and activate forward rules
 */

import type { Argv, CommandModule } from "yargs";
import { reportExitCode } from "@tunnelkeeper/host";
import { type TunnelOutcome, assertSupportedPlatform } from "@tunnelkeeper/shared";
import { type ArgsOf, openRuntime, runHandler } from "../utils/context.utils.js";
import { formatReport, formatTunnelOutcome, printJson } from "../utils/output.utils.js";

function printProgress(outcome: TunnelOutcome): void {
    if (outcome.presence === "pending") {
        console.log(`… ${outcome.tunnelId}: ${outcome.detail}`);
    } else {
        console.log(formatTunnelOutcome(outcome));
    }
}

const builder = (yargs: Argv) =>
    yargs
        .option("tunnel", {
            type: "string",
            description: "Act on this tunnel only; the others are probed",
        })
        .option("restart", {
            type: "boolean",
            description: "Recreate the tunnel even when it matches its record",
            default: false,
        })
        .option("wait", {
            type: "boolean",
            description: "Wait for a running apply instead of failing",
            default: false,
        })
        .option("json", {
            type: "boolean",
            description: "Print the report as JSON",
            default: false,
        })
        .example("$0 apply", "Converge every tunnel and the proxy configuration")
        .example("$0 apply --tunnel t1 --restart", "Recreate tunnel t1");

export const applyCommand: CommandModule<{}, ArgsOf<typeof builder>> = {
    command: "apply",
    describe: "Bring tunnels up and activate their forward rules",
    builder,
    handler: (argv) =>
        runHandler(async () => {
            assertSupportedPlatform();
            const runtime = await openRuntime();

            const report = await runtime.reconciler.apply({
                tunnel: argv.tunnel,
                restart: argv.restart,
                wait: argv.wait,
                onProgress: argv.json ? undefined : printProgress,
            });

            if (argv.json) {
                printJson(report);
            } else {
                console.log(`\n${formatReport(report)}`);
            }
            return reportExitCode(report);
        }),
};
