#!/usr/bin/env node

/**
 * tunnelkeeper CLI
 *
 * Manages tunnel records and forward rules, and converges the host onto them.
 * Run `tunnelkeeper --help` for usage information.
 */

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { applyCommand } from "./commands/apply.js";
import { checkCommand } from "./commands/check.js";
import { daemonCommand } from "./commands/daemon.js";
import { logsCommand } from "./commands/logs.js";
import { ruleCommand } from "./commands/rule.js";
import { serviceCommand } from "./commands/service.js";
import { showCommand } from "./commands/show.js";
import { statusCommand } from "./commands/status.js";
import { tunnelCommand } from "./commands/tunnel.js";

await yargs(hideBin(process.argv))
    .scriptName("tunnelkeeper")
    .usage("$0 <command> [options]")
    .command(applyCommand)
    .command(statusCommand)
    .command(showCommand)
    .command(tunnelCommand)
    .command(ruleCommand)
    .command(daemonCommand)
    .command(serviceCommand)
    .command(checkCommand)
    .command(logsCommand)
    .demandCommand(1, "Please specify a command. Run tunnelkeeper --help for available commands.")
    .strict()
    .help()
    .alias("h", "help")
    .version("1.0.0")
    .alias("v", "version")
    .parseAsync();
