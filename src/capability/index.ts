export type { AuthenticateParams, PollCapability, PollCapabilityFactory } from "./types";
export {
  CapabilityLoadError,
  isPollCapability,
  loadPollCapability,
  resolveCapabilityExport,
} from "./loader";
export { CapabilityError } from "../session/errors";
