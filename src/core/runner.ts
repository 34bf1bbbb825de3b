export { DEFAULT_TIMEOUT_MS, runCommand, trimToTailWithinBytes, withDefaultPath } from "./runner/process-runner.js";
export type { OutputStream, RunCommandOptions } from "./runner/process-runner.js";
export {
  detectBuildCommand,
  detectTestCommand,
  resolveShellInvocation
} from "./runner/project-detection.js";
export type { ShellInvocation } from "./runner/project-detection.js";
export { combineOutput, runBuildVerification, runTestSuite } from "./runner/verify.js";
export type { VerificationOptions } from "./runner/verify.js";
