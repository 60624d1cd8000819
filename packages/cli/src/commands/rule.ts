/**
 * rule command - Manage forward rules
 */

import type { Argv, CommandModule } from "yargs";
import { type HostRuntime, reportExitCode } from "@tunnelkeeper/host";
import { EXIT_CODES, assertSupportedPlatform, ruleKeyLabel } from "@tunnelkeeper/shared";
import { type ArgsOf, openRuntime, requireTunnel, runHandler } from "../utils/context.utils.js";
import { formatReport, formatRuleList, printJson, ruleTarget } from "../utils/output.utils.js";
import { PROTOCOL_CHOICES, buildRules, parsePortList, protocolsFor, ruleKeys } from "../utils/ports.utils.js";

async function applyNow(runtime: HostRuntime): Promise<number> {
    assertSupportedPlatform();
    const report = await runtime.reconciler.applyForwarding({ wait: true });
    console.log(`\n${formatReport(report)}`);
    return reportExitCode(report);
}

function applyHint(): void {
    console.log("The forward daemon picks this up; run 'tunnelkeeper apply' to activate it now.\n");
}

// ============================================================================
// add
// ============================================================================

const addBuilder = (yargs: Argv) =>
    yargs
        .option("tunnel", { type: "string", description: "Tunnel the forwards ride on", demandOption: true })
        .option("ports", {
            type: "string",
            description: "Listen ports, e.g. 80,443,8000-8010",
            demandOption: true,
        })
        .option("protocol", {
            type: "string",
            choices: PROTOCOL_CHOICES,
            description: "Protocol to forward (udp needs forwardEngine nginx)",
            default: "tcp",
        })
        .option("target-ip", { type: "string", description: "Target address (default: the tunnel's remoteForwardIp)" })
        .option("target-port", { type: "number", description: "Target port (default: the listen port)" })
        .option("apply", { type: "boolean", description: "Activate the rules now", default: false })
        .example("$0 rule add --tunnel t1 --ports 80,443", "Forward ports 80 and 443 over t1")
        .example("$0 rule add --tunnel t1 --ports 2222 --target-port 22", "Forward port 2222 to the far side's 22")
        .example(
            "$0 rule add --tunnel m1 --ports 51820 --protocol udp",
            "Forward a UDP port over a mesh tunnel (needs forwardEngine nginx)"
        );

export const ruleAddCommand: CommandModule<{}, ArgsOf<typeof addBuilder>> = {
    command: "add",
    describe: "Add forward rules",
    builder: addBuilder,
    handler: (argv) =>
        runHandler(async () => {
            const ports = parsePortList(argv.ports);
            const protocols = protocolsFor(argv.protocol);
            const runtime = await openRuntime();
            const tunnel = await requireTunnel(runtime, argv.tunnel);

            const rules = buildRules({
                tunnel,
                ports,
                protocols,
                targetIp: argv.targetIp,
                targetPort: argv.targetPort,
            });
            const added = await runtime.store.putRules(rules);

            console.log("");
            for (const rule of added) {
                console.log(`Added ${ruleKeyLabel(rule)} -> ${ruleTarget(rule)} via ${rule.tunnelId}`);
            }

            if (argv.apply) return applyNow(runtime);
            applyHint();
            return EXIT_CODES.ok;
        }),
};

// ============================================================================
// remove
// ============================================================================

const removeBuilder = (yargs: Argv) =>
    yargs
        .option("ports", { type: "string", description: "Listen ports, e.g. 80,443", demandOption: true })
        .option("protocol", {
            type: "string",
            choices: PROTOCOL_CHOICES,
            description: "Protocol of the rules to remove",
            default: "tcp",
        })
        .option("apply", { type: "boolean", description: "Deactivate the rules now", default: false });

export const ruleRemoveCommand: CommandModule<{}, ArgsOf<typeof removeBuilder>> = {
    command: "remove",
    describe: "Remove forward rules",
    builder: removeBuilder,
    handler: (argv) =>
        runHandler(async () => {
            const keys = ruleKeys(parsePortList(argv.ports), protocolsFor(argv.protocol));
            const runtime = await openRuntime();
            const removed = await runtime.store.deleteRules(keys);

            console.log("");
            for (const rule of removed) {
                console.log(`Removed ${ruleKeyLabel(rule)} (${rule.tunnelId})`);
            }

            if (argv.apply) return applyNow(runtime);
            applyHint();
            return EXIT_CODES.ok;
        }),
};

// ============================================================================
// list
// ============================================================================

const listBuilder = (yargs: Argv) =>
    yargs
        .option("tunnel", { type: "string", description: "Only rules of this tunnel" })
        .option("json", { type: "boolean", description: "Print the rules as JSON", default: false });

export const ruleListCommand: CommandModule<{}, ArgsOf<typeof listBuilder>> = {
    command: "list",
    describe: "List forward rules",
    builder: listBuilder,
    handler: (argv) =>
        runHandler(async () => {
            const runtime = await openRuntime();
            const rules = await runtime.store.listRules(argv.tunnel);

            if (argv.json) {
                printJson(rules);
            } else {
                console.log(formatRuleList(rules));
            }
            return EXIT_CODES.ok;
        }),
};

export const ruleCommand: CommandModule = {
    command: "rule <command>",
    describe: "Manage forward rules",
    builder: (yargs) =>
        yargs
            .command(ruleAddCommand)
            .command(ruleRemoveCommand)
            .command(ruleListCommand)
            .demandCommand(1, "Specify a rule command: add, remove or list"),
    handler: () => undefined,
};
