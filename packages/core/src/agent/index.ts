export type {
  AgentEvent,
  LoopOutcome,
  LoopStatus,
  ReactLoopConfig,
  ToolExecutionMode,
} from "./types";
export { DEFAULT_MAX_ITERATIONS } from "./types";
export { reactLoop } from "./loop";
export type { AgentInput, ReActAgentOptions } from "./agent";
export { ReActAgent } from "./agent";
