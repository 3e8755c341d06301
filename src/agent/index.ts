export {
  ProblemSolvingAgent,
  DEFAULT_AGENT_CONFIG,
  trackUncertainties,
  stripProtocolLines
} from './ProblemSolvingAgent.js';
export type {
  AgentSession,
  ProblemSolvingAgentConfig,
  ProblemSolvingAgentDeps,
  SolveResult,
  StopReason
} from './ProblemSolvingAgent.js';
export { RetryPolicy, DEFAULT_RETRY_CONFIG, isRetryableError } from './RetryPolicy.js';
export type { RetryPolicyConfig, RetryPolicyOptions, Sleep } from './RetryPolicy.js';
export { buildSystemPrompt, GROUNDING_RULES, BASE_PROMPT, CITATION_GUIDE, UNCERTAINTY_PROTOCOL } from './prompts.js';
export type { SystemPromptInput } from './prompts.js';
