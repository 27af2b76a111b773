export { FusionEngine } from "./engine.js";
export { HostFusionRecord, selectBestOs } from "./host.js";
export { PortMergeUnit, comparePorts, portKey } from "./port.js";
export { extractSubnet, UNKNOWN_SUBNET } from "./subnet.js";
export { FusionStateError } from "./errors.js";
export type { FusionStateCode } from "./errors.js";
