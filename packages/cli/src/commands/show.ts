/**
 * show command - Details of one tunnel
 */

import type { Argv, CommandModule } from "yargs";
import { type MeshPeer, containsRule, statusExitCode } from "@tunnelkeeper/host";
import { type ForwardRule, type RuleState, createLogger, errorMessage } from "@tunnelkeeper/shared";
import { type ArgsOf, openRuntime, requireTunnel, runHandler } from "../utils/context.utils.js";
import {
    formatPeers,
    formatRuleList,
    formatTunnelOutcome,
    printJson,
    redactTunnel,
} from "../utils/output.utils.js";

const log = createLogger("cli");

const builder = (yargs: Argv) =>
    yargs
        .positional("id", {
            type: "string",
            description: "Tunnel id",
            demandOption: true,
        })
        .option("json", {
            type: "boolean",
            description: "Print the details as JSON",
            default: false,
        });

export const showCommand: CommandModule<{}, ArgsOf<typeof builder>> = {
    command: "show <id>",
    describe: "Show a tunnel's record, live state, rules and peers",
    builder,
    handler: (argv) =>
        runHandler(async () => {
            const runtime = await openRuntime();
            const tunnel = await requireTunnel(runtime, argv.id);
            const state = await runtime.drivers.status(tunnel);
            const stored = await runtime.store.listRules(tunnel.id);

            let liveRules: ForwardRule[] = [];
            try {
                liveRules = await runtime.proxy.liveRules();
            } catch (error) {
                log.warn(errorMessage(error));
            }
            const rules: RuleState[] = stored.map((rule) => ({ ...rule, live: containsRule(liveRules, rule) }));
            const exitCode = statusExitCode({ tunnels: [state], rules });

            let peers: MeshPeer[] | null = null;
            if (tunnel.kind === "mesh" && state.presence === "up") {
                try {
                    peers = await runtime.drivers.peers(tunnel);
                } catch (error) {
                    log.warn(`could not list peers of ${tunnel.id}: ${errorMessage(error)}`);
                }
            }

            if (argv.json) {
                printJson({ tunnel: redactTunnel(tunnel), state: { ...state, kind: tunnel.kind }, rules, peers });
                return exitCode;
            }

            console.log(JSON.stringify(redactTunnel(tunnel), null, 2));
            console.log(`\n${formatTunnelOutcome({ ...state, kind: tunnel.kind })}`);
            console.log(`\n${formatRuleList(rules)}`);
            if (peers) {
                console.log(`\n${formatPeers(peers)}`);
            }
            return exitCode;
        }),
};
