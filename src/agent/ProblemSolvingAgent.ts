/**
 * Problem Solving Agent
 *
 * Closed loop over an LLM with tools. Each iteration asks the model for its
 * next step, runs the tool calls it makes (subject to the commitment
 * policy), records every result as an observation, and lets the strategy
 * gate decide whether to keep going, nudge the model, or wrap up. The final
 * text is always passed through the grounded answer generator.
 *
 * Every solve() gets a fresh session; nothing is shared between problems.
 */

import { ProvenanceRegistry } from '../provenance/ProvenanceRegistry.js';
import { ClaimExtractor } from '../provenance/ClaimExtractor.js';
import {
  GroundedAnswerGenerator,
  type GroundedAnswer,
  type GroundedAnswerGeneratorConfig
} from '../provenance/GroundedAnswerGenerator.js';
import type { Clock } from '../provenance/types.js';
import { CognitiveState } from '../cognitive/CognitiveState.js';
import { StrategyGate } from '../cognitive/StrategyGate.js';
import { MinimalCommitmentPolicy } from '../cognitive/MinimalCommitmentPolicy.js';
import {
  StrategyDecision,
  type StrategyGateConfig,
  type StrategyPath,
  type ToolRisk
} from '../cognitive/types.js';
import { ToolRegistry, outcomeToObservation, outcomeText } from '../tools/ToolRegistry.js';
import { ToolResult } from '../tools/ToolResult.js';
import type { ChatToolDefinition, ExecutionOutcome } from '../tools/types.js';
import type { ChatClient, ChatMessage, ChatResponse, ToolCall } from '../providers/types.js';
import { RetryPolicy, type RetryPolicyConfig, type Sleep } from './RetryPolicy.js';
import { buildSystemPrompt } from './prompts.js';

// ==========================================
// CONFIGURATION
// ==========================================

export interface ProblemSolvingAgentConfig {
  maxIterations: number;
  verbose: boolean;
  gate: Partial<StrategyGateConfig>;
  generator: Partial<GroundedAnswerGeneratorConfig>;
  retry: Partial<RetryPolicyConfig>;
  riskThresholds: Partial<Record<ToolRisk, number>>;
}

export const DEFAULT_AGENT_CONFIG: ProblemSolvingAgentConfig = {
  maxIterations: 10,
  verbose: false,
  gate: {},
  generator: {},
  retry: {},
  riskThresholds: {}
};

export interface ProblemSolvingAgentDeps {
  client: ChatClient;
  tools: ToolRegistry;
  clock?: Clock;
  sleep?: Sleep;
}

// ==========================================
// SESSION & RESULT
// ==========================================

/**
 * Everything one solve() owns
 */
export interface AgentSession {
  problem: string;
  registry: ProvenanceRegistry;
  state: CognitiveState;
  gate: StrategyGate;
  policy: MinimalCommitmentPolicy;
  extractor: ClaimExtractor;
  generator: GroundedAnswerGenerator;
}

export type StopReason = 'final_answer' | 'concluded' | 'degraded' | 'max_iterations';

export interface SolveResult {
  answer: GroundedAnswer;
  iterations: number;
  decisions: StrategyPath[];
  stopReason: StopReason;
  session: AgentSession;
}

const UNCERTAINTY_LINE = /^\s*uncertainty:\s*(.+?)\s*$/gim;
const RESOLVED_LINE = /^\s*resolved:\s*(.+?)\s*$/gim;
const PROTOCOL_LINE = /^\s*(?:uncertainty|resolved):.*$\n?/gim;

/**
 * Apply the model's "Uncertainty:" and "Resolved:" lines to the state
 */
export function trackUncertainties(state: CognitiveState, text: string): void {
  for (const match of text.matchAll(UNCERTAINTY_LINE)) {
    state.addUncertainty(match[1]);
  }
  for (const match of text.matchAll(RESOLVED_LINE)) {
    state.removeUncertainty(match[1]);
  }
}

export function stripProtocolLines(text: string): string {
  return text.replace(PROTOCOL_LINE, '').trim();
}

function nudgeFor(path: StrategyPath): string {
  const action = path.suggestedAction ? ` ${path.suggestedAction}.` : '';
  return `[Strategy: ${path.decision}] ${path.reason}.${action}`;
}

export class ProblemSolvingAgent {
  private config: ProblemSolvingAgentConfig;
  private client: ChatClient;
  private tools: ToolRegistry;
  private retry: RetryPolicy;
  private clock?: Clock;

  constructor(deps: ProblemSolvingAgentDeps, config: Partial<ProblemSolvingAgentConfig> = {}) {
    this.config = { ...DEFAULT_AGENT_CONFIG, ...config };
    this.client = deps.client;
    this.tools = deps.tools;
    this.clock = deps.clock;
    this.retry = new RetryPolicy(this.config.retry, {
      sleep: deps.sleep,
      onRetry: (attempt, delayMs, error) => {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[ProblemSolvingAgent] LLM retry ${attempt} after ${delayMs}ms: ${message}`);
      }
    });
  }

  createSession(problem: string): AgentSession {
    return {
      problem,
      registry: new ProvenanceRegistry({ clock: this.clock }),
      state: new CognitiveState({ goalStatement: problem }),
      gate: new StrategyGate(this.config.gate),
      policy: new MinimalCommitmentPolicy(this.config.riskThresholds),
      extractor: new ClaimExtractor(),
      generator: new GroundedAnswerGenerator(this.config.generator)
    };
  }

  async solve(problem: string): Promise<SolveResult> {
    const session = this.createSession(problem);
    const { registry, state, gate } = session;
    const messages: ChatMessage[] = [{ role: 'user', content: problem }];
    const decisions: StrategyPath[] = [];
    let lastText = '';

    while (state.iterationCount < this.config.maxIterations) {
      state.incrementIteration();
      this.log(`Iteration ${state.iterationCount}/${this.config.maxIterations}`);

      const response = await this.complete(session, messages, this.offeredTools(session));
      const text = response.content ?? '';
      if (text) {
        lastText = text;
        trackUncertainties(state, text);
      }
      messages.push({
        role: 'assistant',
        content: response.content,
        toolCalls: response.toolCalls.length > 0 ? response.toolCalls : undefined
      });

      if (response.toolCalls.length === 0) {
        decisions.push(gate.evaluate(state, registry));
        return this.finish(session, lastText, decisions, 'final_answer');
      }

      const gained = await this.runToolCalls(session, response.toolCalls, messages);
      if (gained) {
        state.markProgress();
      } else {
        state.markStall();
      }

      const valid = registry.getValidObservations(0);
      if (valid.length > 0) {
        state.updateConfidence(valid.reduce((sum, o) => sum + o.confidence, 0) / valid.length);
      }

      const path = gate.evaluate(state, registry);
      decisions.push(path);
      this.log(`Decision: ${path.decision} (${path.reason})`);

      switch (path.decision) {
        case StrategyDecision.CONCLUDE:
        case StrategyDecision.DEGRADE: {
          const finalText = await this.requestFinalAnswer(session, messages, path);
          return this.finish(
            session,
            finalText || lastText,
            decisions,
            path.decision === StrategyDecision.CONCLUDE ? 'concluded' : 'degraded'
          );
        }
        case StrategyDecision.ASK_USER:
        case StrategyDecision.REQUEST_MORE_INFO:
        case StrategyDecision.PIVOT:
          messages.push({ role: 'user', content: nudgeFor(path) });
          break;
        default:
          break;
      }
    }

    this.log('Iteration limit reached');
    return this.finish(session, lastText, decisions, 'max_iterations');
  }

  // ==========================================
  // LOOP STEPS
  // ==========================================

  /**
   * Tools the policy admits at the current confidence, safest first
   */
  private offeredTools(session: AgentSession): ChatToolDefinition[] {
    const admitted = session.policy.rankTools(this.tools.riskProfile(), session.state.confidence);
    return this.tools.toChatTools(admitted);
  }

  private async complete(
    session: AgentSession,
    messages: readonly ChatMessage[],
    tools: readonly ChatToolDefinition[]
  ): Promise<ChatResponse> {
    const system = buildSystemPrompt({ registry: session.registry, state: session.state });
    return this.retry.execute(() => this.client.complete([{ role: 'system', content: system }, ...messages], tools));
  }

  /**
   * Execute each call and record its observation. Returns whether any call
   * produced usable evidence.
   */
  private async runToolCalls(session: AgentSession, calls: readonly ToolCall[], messages: ChatMessage[]): Promise<boolean> {
    const { registry, state } = session;
    let gained = false;

    for (const call of calls) {
      const outcome = await this.executeAdmitted(session, call);
      const observation = outcomeToObservation(outcome, call.name);

      registry.addObservation(observation);
      state.recordObservation(observation.confidence);
      state.lastToolUsed = call.name;
      if (observation.confidence > 0 && !observation.isExpired(registry.now())) {
        gained = true;
      }

      this.log(`→ ${call.name} [${observation.id}] confidence ${Math.round(observation.confidence * 100)}%`);
      messages.push({
        role: 'tool',
        toolCallId: call.id,
        content: `[${observation.id}] ${outcomeText(outcome)}`
      });
    }

    return gained;
  }

  private async executeAdmitted(session: AgentSession, call: ToolCall): Promise<ExecutionOutcome> {
    const tool = this.tools.get(call.name);
    if (tool) {
      const risk = tool.metadata.riskLevel;
      const confidence = session.state.confidence;
      if (!session.policy.shouldProceed(risk, confidence)) {
        const needed = Math.round(session.policy.thresholdFor(risk) * 100);
        return {
          kind: 'with_provenance',
          result: ToolResult.fromError(
            `${call.name} is a ${risk} risk tool and needs confidence of at least ${needed}% (current ${Math.round(confidence * 100)}%)`,
            call.name
          )
        };
      }
    }
    return this.tools.execute(call.name, call.arguments);
  }

  private async requestFinalAnswer(session: AgentSession, messages: ChatMessage[], path: StrategyPath): Promise<string> {
    messages.push({
      role: 'user',
      content: `${nudgeFor(path)} Write your final answer now. Cite the observation ids you rely on.`
    });
    const response = await this.complete(session, messages, []);
    messages.push({ role: 'assistant', content: response.content });
    return response.content ?? '';
  }

  private finish(
    session: AgentSession,
    rawText: string,
    decisions: StrategyPath[],
    stopReason: StopReason
  ): SolveResult {
    const text = stripProtocolLines(rawText);
    const claims = session.extractor.extractAndRecord(text, session.registry);
    const answer = session.generator.generate(text, session.registry, claims);
    this.log(`Finished (${stopReason}): ${answer.degradationLevel}, ${claims.length} claim(s)`);

    return {
      answer,
      iterations: session.state.iterationCount,
      decisions,
      stopReason,
      session
    };
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.log(`[ProblemSolvingAgent] ${message}`);
    }
  }
}
