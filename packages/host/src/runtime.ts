/**
 * Wires the host library together for one process
 */

import { setLogLevel } from "@tunnelkeeper/shared";
import { type HostConfig, type StorePaths, loadHostConfig, resolveHome, resolvePaths } from "./config/index.js";
import { type CommandRunner, execaRunner } from "./lib/command.js";
import { ProxyController } from "./services/forwarding/proxy.js";
import { Reconciler } from "./services/reconciler/index.js";
import { ConfigStore } from "./services/store/index.js";
import { TunnelDrivers } from "./services/tunnel/index.js";

export interface HostRuntime {
    paths: StorePaths;
    config: HostConfig;
    runner: CommandRunner;
    store: ConfigStore;
    drivers: TunnelDrivers;
    proxy: ProxyController;
    reconciler: Reconciler;
}

export interface OpenHostOptions {
    /** Home directory (default: TUNNELKEEPER_HOME or /etc/tunnelkeeper) */
    home?: string;
    runner?: CommandRunner;
    /** Overrides config.json, mainly for tests */
    config?: HostConfig;
    sleep?: (ms: number) => Promise<void>;
    now?: () => Date;
}

export async function openHost(options: OpenHostOptions = {}): Promise<HostRuntime> {
    const home = options.home ?? resolveHome();
    const paths = resolvePaths(home);
    const config = options.config ?? (await loadHostConfig(home));
    const runner = options.runner ?? execaRunner;

    setLogLevel(config.logLevel);

    const store = new ConfigStore(paths, { forwardEngine: config.forwardEngine });
    const drivers = TunnelDrivers.create({ runner, host: config, paths, sleep: options.sleep });
    const proxy = new ProxyController({ runner, host: config });
    const reconciler = new Reconciler({ store, drivers, proxy, host: config, now: options.now });

    return { paths, config, runner, store, drivers, proxy, reconciler };
}
