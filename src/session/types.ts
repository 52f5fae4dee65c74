import type { LoginMode } from "../config/schema/sessions";

export type { LoginMode };

export interface SessionConfig {
  readonly identity: string;
  readonly secret: string;
  readonly host: string;
  readonly loginMode: LoginMode;
  readonly lifetimeSeconds: number;
  readonly closedWaitSeconds: number;
  readonly openWaitSeconds: number;
}

export type RunnerState =
  | "idle"
  | "authenticating"
  | "watching"
  | "answering"
  | "stopped"
  | "failed";

export const TERMINAL_RUNNER_STATES: ReadonlySet<RunnerState> = new Set(["stopped", "failed"]);

export function isTerminalState(state: RunnerState): boolean {
  return TERMINAL_RUNNER_STATES.has(state);
}

export const LOG_EVENT_LEVELS = ["debug", "info", "success", "poll", "error"] as const;
export type LogEventLevel = (typeof LOG_EVENT_LEVELS)[number];

export interface LogEvent {
  readonly seq: number;
  readonly timestamp: Date;
  readonly level: LogEventLevel;
  readonly message: string;
}

export type StopReason = "stop_requested" | "lifetime_elapsed" | "failed";
