/**
 * Type definitions for the forwarding layer
 */

import type { ForwardRule } from "@tunnelkeeper/shared";
import type { ForwardEngine } from "../../config/index.js";

/**
 * A complete proxy configuration file
 */
export interface ConfigDocument {
    engine: ForwardEngine;
    text: string;
    /** Rules rendered into `text`, in render order */
    rules: ForwardRule[];
}

export interface CompileOptions {
    engine: ForwardEngine;
}

/**
 * Renders sorted, conflict-free rules into one engine's configuration syntax
 */
export interface EngineRenderer {
    readonly engine: ForwardEngine;
    readonly protocols: readonly ForwardRule["protocol"][];
    render(rules: readonly ForwardRule[]): string;
}
