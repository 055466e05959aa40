export { AzureResourceGraphManager, buildDiscoveryQuery } from "./manager.js";
