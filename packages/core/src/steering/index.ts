export { DEFAULT_CANCEL_REASON, SteeringChannel } from "./channel";
export type {
  ConfirmationGateOptions,
  ConfirmationPolicy,
  PendingConfirmation,
  PolicyDecision,
} from "./confirmation";
export { ConfirmationGate } from "./confirmation";
export type { AskHuman, ConfirmWithHuman, HumanToolOptions } from "./human-tools";
export { createAskHumanTool, createConfirmationTool } from "./human-tools";
