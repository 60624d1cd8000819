/**
 * status command - Show observed tunnel and forwarding state
 */

import type { Argv, CommandModule } from "yargs";
import { statusExitCode } from "@tunnelkeeper/host";
import { type ArgsOf, openRuntime, runHandler } from "../utils/context.utils.js";
import { formatStatus, printJson } from "../utils/output.utils.js";

const builder = (yargs: Argv) =>
    yargs.option("json", {
        type: "boolean",
        description: "Print the status as JSON",
        default: false,
    });

export const statusCommand: CommandModule<{}, ArgsOf<typeof builder>> = {
    command: "status",
    describe: "Show tunnels, forward rules and the last apply",
    builder,
    handler: (argv) =>
        runHandler(async () => {
            const runtime = await openRuntime();
            const status = await runtime.reconciler.status();

            if (argv.json) {
                printJson(status);
            } else {
                console.log(formatStatus(status));
            }
            return statusExitCode(status);
        }),
};
