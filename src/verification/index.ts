export { DeploymentVerifier, createDeploymentVerifier, probeUrl } from "./manager.js";
export type {
  DeploymentTarget,
  DeploymentVerification,
  DeploymentVerifierOptions,
  HttpProbeResult,
} from "./manager.js";
