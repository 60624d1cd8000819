/**
 * tunnel command - Create, delete, list and restart tunnels
 */

import type { Argv, CommandModule } from "yargs";
import { confirm, input, password, select } from "@inquirer/prompts";
import { reportExitCode } from "@tunnelkeeper/host";
import {
    EXIT_CODES,
    type TunnelKind,
    type TunnelRole,
    TunnelIdSchema,
    ValidationError,
    assertSupportedPlatform,
    ruleKeyLabel,
} from "@tunnelkeeper/shared";
import {
    type ArgsOf,
    isInteractive,
    openRuntime,
    requireTunnel,
    runHandler,
} from "../utils/context.utils.js";
import { formatReload, formatReport, formatTunnelList, printJson, redactTunnel } from "../utils/output.utils.js";
import {
    type FieldSpec,
    type FieldValue,
    buildTunnelRecord,
    fieldsFor,
    tunnelDefaults,
} from "../utils/tunnel-input.utils.js";

// ============================================================================
// create
// ============================================================================

const createBuilder = (yargs: Argv) =>
    yargs
        .option("id", { type: "string", description: "Tunnel id (letters, digits, '-' and '_')" })
        .option("kind", { type: "string", choices: ["l2tpv3", "mesh"], description: "Tunnel kind" })
        .option("role", { type: "string", choices: ["IRAN", "KHAREJ"], description: "Which end this host is" })
        .option("interface", { type: "string", description: "Interface name (default: l2tp-<id> or mesh-<id>)" })
        .option("local-ip", { type: "string", description: "l2tpv3: public IPv4 of this server" })
        .option("remote-ip", { type: "string", description: "l2tpv3: public IPv4 of the far server" })
        .option("address", { type: "string", description: "l2tpv3: interface address in CIDR form" })
        .option("tunnel-id", { type: "number", description: "l2tpv3: local tunnel id" })
        .option("peer-tunnel-id", { type: "number", description: "l2tpv3: peer tunnel id" })
        .option("session-id", { type: "number", description: "l2tpv3: local session id" })
        .option("peer-session-id", { type: "number", description: "l2tpv3: peer session id" })
        .option("peer", { type: "string", description: "l2tpv3: id of the far side's record in this store" })
        .option("overlay-ip", { type: "string", description: "mesh: overlay address of this server" })
        .option("peer-ip", { type: "string", description: "mesh: public IPv4 of the far server" })
        .option("port", { type: "number", description: "mesh: listen port" })
        .option("secret", { type: "string", description: "mesh: network secret" })
        .option("hostname", { type: "string", description: "mesh: hostname announced to peers" })
        .option("rpc-port", { type: "number", description: "mesh: local RPC port" })
        .option("remote-forward-ip", { type: "string", description: "Default target of new forward rules" })
        .option("replace", { type: "boolean", description: "Overwrite an existing tunnel", default: false })
        .option("apply", { type: "boolean", description: "Bring the tunnel up after saving", default: false })
        .option("yes", {
            alias: "y",
            type: "boolean",
            description: "Never prompt; unset fields take their defaults",
            default: false,
        })
        .example(
            "$0 tunnel create --id t1 --kind l2tpv3 --role IRAN --local-ip 198.51.100.10 --remote-ip 203.0.113.20 -y",
            "Create an l2tpv3 tunnel with default ids and addresses"
        )
        .example("$0 tunnel create", "Create a tunnel interactively");

async function askField(field: FieldSpec, fallback: FieldValue | undefined): Promise<FieldValue> {
    if (field.secret) {
        return password({ message: field.message, mask: "*" });
    }
    const answer = await input({
        message: field.message,
        default: fallback === undefined ? undefined : String(fallback),
    });
    return answer.trim();
}

async function resolveId(given: string | undefined, interactive: boolean): Promise<string> {
    if (given !== undefined) return given;
    if (!interactive) throw new ValidationError(["--id is required"]);
    return input({
        message: "Tunnel id:",
        validate: (value) => {
            const result = TunnelIdSchema.safeParse(value.trim());
            return result.success || "Use 1-32 letters, digits, '-' or '_'";
        },
    }).then((value) => value.trim());
}

async function resolveKind(given: string | undefined, interactive: boolean): Promise<TunnelKind> {
    const value =
        given ??
        (interactive
            ? await select({
                  message: "Tunnel kind:",
                  choices: [
                      { name: "l2tpv3 (kernel point-to-point)", value: "l2tpv3" },
                      { name: "mesh (easytier overlay)", value: "mesh" },
                  ],
              })
            : "l2tpv3");
    return value === "mesh" ? "mesh" : "l2tpv3";
}

async function resolveRole(given: string | undefined, interactive: boolean): Promise<TunnelRole> {
    if (given === "IRAN" || given === "KHAREJ") return given;
    if (!interactive) throw new ValidationError(["--role is required (IRAN or KHAREJ)"]);
    return select<TunnelRole>({
        message: "Which end is this server?",
        choices: [
            { name: "IRAN (entry point, runs the forwards)", value: "IRAN" },
            { name: "KHAREJ (exit point)", value: "KHAREJ" },
        ],
    });
}

export const tunnelCreateCommand: CommandModule<{}, ArgsOf<typeof createBuilder>> = {
    command: "create",
    describe: "Create a tunnel record",
    builder: createBuilder,
    handler: (argv) =>
        runHandler(async () => {
            const interactive = !argv.yes && isInteractive();

            const id = await resolveId(argv.id, interactive);
            const kind = await resolveKind(argv.kind, interactive);
            const role = await resolveRole(argv.role, interactive);

            const flags: Record<string, FieldValue | undefined> = {
                interface: argv.interface,
                "local-ip": argv.localIp,
                "remote-ip": argv.remoteIp,
                address: argv.address,
                "tunnel-id": argv.tunnelId,
                "peer-tunnel-id": argv.peerTunnelId,
                "session-id": argv.sessionId,
                "peer-session-id": argv.peerSessionId,
                "overlay-ip": argv.overlayIp,
                "peer-ip": argv.peerIp,
                port: argv.port,
                secret: argv.secret,
                hostname: argv.hostname,
                "rpc-port": argv.rpcPort,
                "remote-forward-ip": argv.remoteForwardIp,
            };

            const defaults = tunnelDefaults(kind, role, id);
            const values: Record<string, FieldValue | undefined> = {};
            for (const field of fieldsFor(kind)) {
                const given = flags[field.flag];
                values[field.key] =
                    given !== undefined
                        ? given
                        : interactive
                          ? await askField(field, defaults[field.key])
                          : defaults[field.key];
            }

            const runtime = await openRuntime();
            const tunnel = await runtime.store.put(buildTunnelRecord({ id, kind, role, peer: argv.peer }, values), {
                replace: argv.replace,
            });
            console.log(`\nTunnel '${tunnel.id}' saved (${tunnel.kind}, ${tunnel.role}, ${tunnel.interfaceName}).`);

            if (!argv.apply) {
                console.log(`Run 'tunnelkeeper apply --tunnel ${tunnel.id}' to bring it up.\n`);
                return EXIT_CODES.ok;
            }

            assertSupportedPlatform();
            const report = await runtime.reconciler.apply({ tunnel: tunnel.id, wait: true });
            console.log(`\n${formatReport(report)}`);
            return reportExitCode(report);
        }),
};

// ============================================================================
// delete
// ============================================================================

const deleteBuilder = (yargs: Argv) =>
    yargs
        .positional("id", { type: "string", description: "Tunnel id", demandOption: true })
        .option("cascade", {
            type: "boolean",
            description: "Delete the tunnel's forward rules too",
            default: false,
        })
        .option("yes", {
            alias: "y",
            type: "boolean",
            description: "Skip the confirmation prompt",
            default: false,
        });

export const tunnelDeleteCommand: CommandModule<{}, ArgsOf<typeof deleteBuilder>> = {
    command: "delete <id>",
    describe: "Tear a tunnel down and delete its record",
    builder: deleteBuilder,
    handler: (argv) =>
        runHandler(async () => {
            assertSupportedPlatform();
            const runtime = await openRuntime();
            const tunnel = await requireTunnel(runtime, argv.id);
            const rules = await runtime.store.listRules(tunnel.id);
            const interactive = !argv.yes && isInteractive();

            let cascade = argv.cascade;
            if (rules.length > 0 && !cascade) {
                const labels = rules.map(ruleKeyLabel).join(", ");
                if (!interactive) {
                    throw new ValidationError([
                        `tunnel "${tunnel.id}" still owns forward rules (${labels}); pass --cascade`,
                    ]);
                }
                cascade = await confirm({
                    message: `'${tunnel.id}' owns ${rules.length} forward rule(s) (${labels}). Delete them too?`,
                    default: false,
                });
                if (!cascade) {
                    console.log("Cancelled.");
                    return EXIT_CODES.ok;
                }
            }

            if (interactive) {
                const proceed = await confirm({
                    message: `Tear down ${tunnel.interfaceName} and delete '${tunnel.id}'?`,
                    default: false,
                });
                if (!proceed) {
                    console.log("Cancelled.");
                    return EXIT_CODES.ok;
                }
            }

            const { removed, report } = await runtime.reconciler.removeTunnel(tunnel.id, {
                cascade,
                wait: true,
            });
            console.log(`\nTunnel '${tunnel.id}' deleted.`);
            if (removed.length > 0) {
                console.log(`Removed ${removed.length} forward rule(s).`);
            }
            console.log(`Proxy: ${formatReload(report.reload)}`);
            return report.reload.status === "failed" ? EXIT_CODES.reloadFailure : EXIT_CODES.ok;
        }),
};

// ============================================================================
// list
// ============================================================================

const listBuilder = (yargs: Argv) =>
    yargs.option("json", { type: "boolean", description: "Print the records as JSON", default: false });

export const tunnelListCommand: CommandModule<{}, ArgsOf<typeof listBuilder>> = {
    command: "list",
    describe: "List tunnel records",
    builder: listBuilder,
    handler: (argv) =>
        runHandler(async () => {
            const runtime = await openRuntime();
            const { tunnels, rules } = await runtime.store.snapshot();

            if (argv.json) {
                printJson(tunnels.map(redactTunnel));
            } else {
                console.log(formatTunnelList(tunnels, rules));
            }
            return EXIT_CODES.ok;
        }),
};

// ============================================================================
// restart
// ============================================================================

const restartBuilder = (yargs: Argv) =>
    yargs
        .positional("id", { type: "string", description: "Tunnel id", demandOption: true })
        .option("wait", {
            type: "boolean",
            description: "Wait for a running apply instead of failing",
            default: false,
        });

export const tunnelRestartCommand: CommandModule<{}, ArgsOf<typeof restartBuilder>> = {
    command: "restart <id>",
    describe: "Recreate a tunnel from its record",
    builder: restartBuilder,
    handler: (argv) =>
        runHandler(async () => {
            assertSupportedPlatform();
            const runtime = await openRuntime();
            const report = await runtime.reconciler.apply({ tunnel: argv.id, restart: true, wait: argv.wait });
            console.log(formatReport(report));
            return reportExitCode(report);
        }),
};

export const tunnelCommand: CommandModule = {
    command: "tunnel <command>",
    describe: "Manage tunnels",
    builder: (yargs) =>
        yargs
            .command(tunnelCreateCommand)
            .command(tunnelDeleteCommand)
            .command(tunnelListCommand)
            .command(tunnelRestartCommand)
            .demandCommand(1, "Specify a tunnel command: create, delete, list or restart"),
    handler: () => undefined,
};
