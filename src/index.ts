// scriptdock - script execution and interactive shell core
export { ExecutionCore } from './engine/bridge/ExecutionCore';
export type { ExecutionCoreOptions } from './engine/bridge/ExecutionCore';
export { immediateDispatch } from './engine/bridge/ExecutionBridge';
export type { Dispatch, ExecutionBridge, ScriptRunPort, ShellPort } from './engine/bridge/ExecutionBridge';

export { LanguageRegistry, languageRegistry, buildCommand, extensionOf, normalizeExtension, UNKNOWN_LANGUAGE } from './engine/runtime/LanguageRegistry';
export { SCRIPT_PATH_TOKEN } from './engine/runtime/LanguageBinding';
export type { LanguageBinding, ResolveResult, InterpreterCommand } from './engine/runtime/LanguageBinding';
export { BUILTIN_LANGUAGES, initializeBuiltinLanguages } from './engine/runtime/builtinLanguages';
export { ScriptRunner } from './engine/runtime/ScriptRunner';
export type { RunRequest, RunResult, RunOptions, ScriptRunnerOptions } from './engine/runtime/ScriptRunner';
export type { RunFailureKind } from './engine/runtime/executionErrors';

export { ShellSession, withShellSession } from './engine/cmd/shell/shellSession';
export type {
  CommandSubmission,
  OutputEvent,
  OutputSource,
  ShellSessionOptions,
  ShellState,
  ShellStateEvent,
  Unsubscribe,
} from './engine/cmd/shell/shellSession';
export { resolveDefaultShell, parseShellCommand } from './engine/cmd/shell/defaultShell';
export type { ShellCommand } from './engine/cmd/shell/defaultShell';
export { installSignalCleanup, terminateAllSessions } from './engine/cmd/shell/sessionScope';
export { nodeProcessLauncher } from './engine/cmd/shell/process';
export type { LaunchedProcess, LaunchOptions, ProcessLauncher } from './engine/cmd/shell/process';

export { resolveExecutionConfig, EXECUTION_CONFIG } from './constants/config';
export type { ExecutionConfig } from './constants/config';
export { loggerStore, setConsoleMirror, clearAllLogs } from './stores/loggerStore';
export { terminalOutputStore, getTerminalText, clearTerminalOutput } from './stores/terminalOutputStore';
export {
  terminalHistoryStore,
  previousTerminalHistory,
  nextTerminalHistory,
  clearTerminalHistory,
} from './stores/terminalHistoryStore';
