export type { CommandResult, CommandRunner, RemoteScript } from "./types.js";
export {
  extractPayload,
  extractErrorMessage,
  scriptFailure,
  toCommandResult,
  runRecipe,
  clipToOutputLimit,
  RUN_COMMAND_OUTPUT_LIMIT,
} from "./payload.js";
export { AzureRunCommandRunner, readRunCommandOutput } from "./azure-runner.js";
export { RecordingRunner, type CannedAnswer, type AnswerFn, type RecordedCall } from "./recording-runner.js";
