export { detectShell, killProcessTree, type ShellInvocation } from "./shell.js";
export { ProcessSupervisor } from "./supervisor.js";
export type {
  ManagedProcess,
  ProcessExit,
  Supervisor,
  SupervisorOptions,
  SupervisorStdio,
} from "./types.js";
