/**
 * service command - Install and control the systemd units
 */

import * as path from "node:path";
import type { Argv, CommandModule } from "yargs";
import { type HostRuntime, SUPERVISED_UNITS, Supervisor } from "@tunnelkeeper/host";
import { EXIT_CODES, assertSupportedPlatform } from "@tunnelkeeper/shared";
import { type ArgsOf, openRuntime, runHandler } from "../utils/context.utils.js";
import { formatUnits, printJson } from "../utils/output.utils.js";

/**
 * Command line that re-runs this CLI: the node binary plus the entry script
 */
export function defaultServiceCommand(execPath: string, script: string | undefined): string {
    return script ? `${execPath} ${path.resolve(script)}` : execPath;
}

function supervisorFor(runtime: HostRuntime, command?: string): Supervisor {
    return new Supervisor({
        runner: runtime.runner,
        host: runtime.config,
        paths: runtime.paths,
        command: command ?? defaultServiceCommand(process.execPath, process.argv[1]),
    });
}

const installBuilder = (yargs: Argv) =>
    yargs.option("command", {
        type: "string",
        description: "Command line that runs tunnelkeeper (default: this node binary and script)",
    });

export const serviceInstallCommand: CommandModule<{}, ArgsOf<typeof installBuilder>> = {
    command: "install",
    describe: "Write and enable the apply and forward daemon units",
    builder: installBuilder,
    handler: (argv) =>
        runHandler(async () => {
            assertSupportedPlatform();
            const runtime = await openRuntime();
            await runtime.store.init();
            await supervisorFor(runtime, argv.command).install();

            console.log(`\nInstalled and enabled ${SUPERVISED_UNITS.join(" and ")}.`);
            console.log("Run 'tunnelkeeper service start' to start them now.\n");
            return EXIT_CODES.ok;
        }),
};

export const serviceUninstallCommand: CommandModule = {
    command: "uninstall",
    describe: "Stop, disable and remove the units",
    handler: () =>
        runHandler(async () => {
            assertSupportedPlatform();
            const runtime = await openRuntime();
            await supervisorFor(runtime).uninstall();
            console.log("\nUnits removed. Tunnels and forwards stay as they are.\n");
            return EXIT_CODES.ok;
        }),
};

export const serviceStartCommand: CommandModule = {
    command: "start",
    describe: "Start the units",
    handler: () =>
        runHandler(async () => {
            assertSupportedPlatform();
            const runtime = await openRuntime();
            await supervisorFor(runtime).start();
            console.log(`Started ${SUPERVISED_UNITS.join(" and ")}.`);
            return EXIT_CODES.ok;
        }),
};

export const serviceStopCommand: CommandModule = {
    command: "stop",
    describe: "Stop the forward daemon and the apply unit",
    handler: () =>
        runHandler(async () => {
            assertSupportedPlatform();
            const runtime = await openRuntime();
            await supervisorFor(runtime).stop();
            console.log(`Stopped ${SUPERVISED_UNITS.join(" and ")}.`);
            return EXIT_CODES.ok;
        }),
};

const statusBuilder = (yargs: Argv) =>
    yargs.option("json", { type: "boolean", description: "Print unit states as JSON", default: false });

export const serviceStatusCommand: CommandModule<{}, ArgsOf<typeof statusBuilder>> = {
    command: "status",
    describe: "Show whether the units are installed, enabled and active",
    builder: statusBuilder,
    handler: (argv) =>
        runHandler(async () => {
            assertSupportedPlatform();
            const runtime = await openRuntime();
            const units = await supervisorFor(runtime).status();

            if (argv.json) {
                printJson(units);
            } else {
                console.log(formatUnits(units));
            }
            return EXIT_CODES.ok;
        }),
};

export const serviceCommand: CommandModule = {
    command: "service <command>",
    describe: "Manage the systemd units that keep tunnels and forwards up",
    builder: (yargs) =>
        yargs
            .command(serviceInstallCommand)
            .command(serviceUninstallCommand)
            .command(serviceStartCommand)
            .command(serviceStopCommand)
            .command(serviceStatusCommand)
            .demandCommand(1, "Specify a service command: install, uninstall, start, stop or status"),
    handler: () => undefined,
};
