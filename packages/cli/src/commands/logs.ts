/**
 * logs command - Show journal output of tunnelkeeper units
 */

import type { Argv, CommandModule } from "yargs";
import { execa } from "execa";
import { journalArgs } from "@tunnelkeeper/host";
import { EXIT_CODES, assertSupportedPlatform } from "@tunnelkeeper/shared";
import { type ArgsOf, runHandler } from "../utils/context.utils.js";

const builder = (yargs: Argv) =>
    yargs
        .option("tunnel", { type: "string", description: "Show the mesh unit of this tunnel instead" })
        .option("lines", { alias: "n", type: "number", description: "Number of lines", default: 100 })
        .option("follow", { alias: "f", type: "boolean", description: "Keep printing new lines", default: false })
        .example("$0 logs -f", "Follow the apply and forward daemon units")
        .example("$0 logs --tunnel m1", "Show the easytier output of mesh tunnel m1");

export const logsCommand: CommandModule<{}, ArgsOf<typeof builder>> = {
    command: "logs",
    describe: "Show logs of the supervised units",
    builder,
    handler: (argv) =>
        runHandler(async () => {
            assertSupportedPlatform();
            const args = journalArgs({ tunnel: argv.tunnel, lines: argv.lines, follow: argv.follow });

            try {
                const result = await execa("journalctl", args, { stdio: "inherit" });
                return result.exitCode ?? EXIT_CODES.ok;
            } catch {
                console.error("\nFailed to read the journal. Make sure:");
                console.error("  1. systemd-journald is running");
                console.error("  2. You are root or in the systemd-journal group");
                return EXIT_CODES.itemFailure;
            }
        }),
};
