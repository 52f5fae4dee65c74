export type {
  LogEvent,
  LogEventLevel,
  LoginMode,
  RunnerState,
  SessionConfig,
  StopReason,
} from "./session/types";
export { LOG_EVENT_LEVELS, TERMINAL_RUNNER_STATES, isTerminalState } from "./session/types";
export {
  SessionConfigInputSchema,
  createSessionConfig,
  describeSessionConfig,
  type SessionConfigInput,
} from "./session/config";
export {
  AnswerError,
  AuthenticationError,
  DetectionError,
  DuplicateSessionTokenError,
  InvalidSessionConfigError,
  formatError,
} from "./session/errors";
export {
  DefaultSessionErrorPolicy,
  isTransientError,
  type SessionErrorDecision,
  type SessionErrorPolicy,
} from "./session/error-policy";
export { systemClock, type Clock } from "./session/clock";
export { LogChannel, type LogChannelOptions, type LogEventListener } from "./session/log-channel";
export { SessionRunner, type SessionLogger, type SessionRunnerDeps } from "./session/runner";
export { SessionRegistry } from "./session/registry";
export {
  generateSessionToken,
  getSessionRegistry,
  startSession,
  stopSession,
  type SessionHandle,
  type StartSessionDeps,
  type StopSessionResult,
} from "./session/manager";
export {
  CapabilityError,
  CapabilityLoadError,
  isPollCapability,
  loadPollCapability,
  resolveCapabilityExport,
  type AuthenticateParams,
  type PollCapability,
  type PollCapabilityFactory,
} from "./capability";
export { ControllerServer, type ControllerServerOptions } from "./controller/server";
export { formatLogLine, renderLogLines } from "./controller/render";
export {
  loadConfig,
  loadConfigOrDefaults,
  PollbotConfigSchema,
  type ConfigLoadResult,
  type PollbotConfig,
} from "./config";
export { logger, configureLogger } from "./logger";
export { APP_VERSION } from "./version";
