export {
  AzureCLIWrapper,
  createCLIWrapper,
  createCommandRunner,
  runCommand,
  combineOutput,
} from "./wrapper.js";

export type {
  AzureCLIOptions,
  AzureCLIResult,
  AzureOutputFormat,
  CommandOptions,
} from "./wrapper.js";
