import type { LoginMode } from "../session/types";

export interface AuthenticateParams {
  identity: string;
  secret: string;
  host: string;
  loginMode: LoginMode;
}

/**
 * The polling service as the session runner sees it. Implementations own transport,
 * scraping and answer selection; the runner only sequences the calls.
 */
export interface PollCapability {
  /** Logs in and returns the token that authorizes `detectNewPoll` calls. */
  authenticate(params: AuthenticateParams): Promise<string>;
  /** Returns the id of a newly opened poll, or null when nothing new is open. */
  detectNewPoll(watchToken: string): Promise<string | null>;
  /** Submits a response and returns a human-readable description of it. */
  submitAnswer(pollId: string): Promise<string>;
}

export type PollCapabilityFactory = (
  options: Record<string, unknown>,
) => PollCapability | Promise<PollCapability>;
