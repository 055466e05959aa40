export {
  AzureCredentialsManager,
  createCredentialsManager,
  createCredentialsManagerFromConfig,
} from "./manager.js";

export type {
  CredentialsManagerOptions,
  CredentialResolutionResult,
  CredentialProvider,
} from "./manager.js";
