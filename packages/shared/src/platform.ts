/**
 * Platform Detection Utilities
 *
 * Tunnel management depends on Linux networking (iproute2, the l2tp kernel
 * modules and systemd), so these helpers gate the commands that touch the host.
 */

import * as os from "node:os";

/**
 * Returns true if running on Linux
 */
export function isLinux(): boolean {
    return process.platform === "linux";
}

/**
 * Returns true if the current process runs as root on Linux
 */
export function isRoot(): boolean {
    return isLinux() && os.userInfo().uid === 0;
}

/**
 * Throws an error if the platform cannot host tunnels
 */
export function assertSupportedPlatform(): void {
    if (!isLinux()) {
        throw new Error(
            `Platform "${process.platform}" is not supported. ` +
                "Tunnels need the Linux l2tp kernel modules, iproute2 and systemd."
        );
    }
}
