export { AzureResourceManager, isDiscoverableResourceType } from "./manager.js";
