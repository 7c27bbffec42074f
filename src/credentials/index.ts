export {
  LabCredentialsManager,
  createCredentialsManager,
  createCredentialsManagerFromConfig,
  type LabCredentialMethod,
  type CredentialsManagerOptions,
  type CredentialResolutionResult,
} from "./manager.js";
