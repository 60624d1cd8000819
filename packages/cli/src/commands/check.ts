/**
 * check command - Verify host prerequisites
 */

import type { CommandModule } from "yargs";
import { checkPrerequisites, prerequisitesMet } from "@tunnelkeeper/host";
import { EXIT_CODES } from "@tunnelkeeper/shared";
import { openRuntime, runHandler } from "../utils/context.utils.js";
import { formatPrereqs } from "../utils/output.utils.js";

export const checkCommand: CommandModule = {
    command: "check",
    describe: "Check the kernel modules, binaries and privileges tunnels need",
    handler: () =>
        runHandler(async () => {
            const runtime = await openRuntime();
            const tunnels = await runtime.store.list();
            const results = await checkPrerequisites({
                runner: runtime.runner,
                host: runtime.config,
                kinds: new Set(tunnels.map((tunnel) => tunnel.kind)),
            });

            console.log(formatPrereqs(results));

            if (prerequisitesMet(results)) {
                console.log("\nAll required prerequisites are met.");
                return EXIT_CODES.ok;
            }
            console.error("\nSome required prerequisites are missing. Install them and run the check again.");
            return EXIT_CODES.itemFailure;
        }),
};
