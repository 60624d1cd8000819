/**
 * daemon command - Run the forward daemon in the foreground
 *
 * Normally started by the tunnelkeeper-forward systemd unit.
 */

import type { CommandModule } from "yargs";
import { ForwardDaemon } from "@tunnelkeeper/host";
import { EXIT_CODES, assertSupportedPlatform, createLogger, errorMessage } from "@tunnelkeeper/shared";
import { openRuntime, runHandler } from "../utils/context.utils.js";

const log = createLogger("daemon");

export const daemonCommand: CommandModule = {
    command: "daemon",
    describe: "Watch forward rules and tunnel health, reconciling on change",
    handler: () =>
        runHandler(async () => {
            assertSupportedPlatform();
            const runtime = await openRuntime();
            const daemon = new ForwardDaemon({
                reconciler: runtime.reconciler,
                store: runtime.store,
                config: runtime.config.daemon,
            });

            const stopped = new Promise<void>((resolve) => {
                const shutdown = (signal: NodeJS.Signals): void => {
                    log.info(`received ${signal}, stopping`);
                    void daemon.stop().then(resolve, (error: unknown) => {
                        log.error(`stop failed: ${errorMessage(error)}`);
                        resolve();
                    });
                };
                process.once("SIGINT", shutdown);
                process.once("SIGTERM", shutdown);
            });

            await daemon.start();
            await stopped;
            return EXIT_CODES.ok;
        }),
};
