export { AzureNetworkManager } from "./manager.js";

export type { VirtualNetworkSummary, PublicIPSummary } from "./types.js";
