export { AzureVMManager, toVMSummary } from "./manager.js";

export type { VMSummary, VMStatus, VMListOptions } from "./types.js";
