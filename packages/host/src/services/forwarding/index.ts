/**
 * Forwarding layer: rule compilation and proxy activation
 */

export * from "./types.js";
export { compile, findConflicts } from "./compiler.js";
export { GENERATED_HEADER, parseLiveRules, ruleMarker } from "./markers.js";
export { ProxyController, validatorArgs, type ActivateOutcome } from "./proxy.js";
export { haproxyRenderer } from "./haproxy.js";
export { nginxRenderer } from "./nginx.js";
