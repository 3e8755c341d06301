/**
 * Configuration
 *
 * Default configuration and environment variable loading.
 */

import { config as loadDotenv } from 'dotenv';
import { DEFAULT_STRATEGY_GATE_CONFIG } from '../cognitive/types.js';

loadDotenv();

export interface LLMConfig {
  apiKey?: string;
  baseURL: string;
  model: string;
  temperature: number;
}

export interface AgentConfig {
  maxIterations: number;
  confidenceThreshold: number;
  stallThreshold: number;
  enableBash: boolean;
  verbose: boolean;
}

export interface GroundworkConfig {
  llm: LLMConfig;
  agent: AgentConfig;
}

export interface GroundworkConfigOverrides {
  llm?: Partial<LLMConfig>;
  agent?: Partial<AgentConfig>;
}

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_MAX_ITERATIONS = 10;
export const DEFAULT_TEMPERATURE = 0.7;

export function getDefaultConfig(env: NodeJS.ProcessEnv = process.env): GroundworkConfig {
  return {
    llm: {
      apiKey: env.OPENAI_API_KEY || undefined,
      baseURL: env.OPENAI_BASE_URL ?? DEFAULT_BASE_URL,
      model: env.MODEL_NAME ?? DEFAULT_MODEL,
      temperature: parseFloat(env.GROUNDWORK_TEMPERATURE ?? String(DEFAULT_TEMPERATURE))
    },
    agent: {
      maxIterations: parseInt(env.GROUNDWORK_MAX_ITERATIONS ?? String(DEFAULT_MAX_ITERATIONS), 10),
      confidenceThreshold: parseFloat(
        env.GROUNDWORK_CONFIDENCE_THRESHOLD ?? String(DEFAULT_STRATEGY_GATE_CONFIG.confidenceThreshold)
      ),
      stallThreshold: parseInt(env.GROUNDWORK_STALL_THRESHOLD ?? String(DEFAULT_STRATEGY_GATE_CONFIG.stallThreshold), 10),
      enableBash: env.GROUNDWORK_ENABLE_BASH !== 'false',
      verbose: env.GROUNDWORK_VERBOSE === 'true'
    }
  };
}

export function validateConfig(config: GroundworkConfig): string[] {
  const errors: string[] = [];

  if (!config.llm.apiKey) {
    errors.push('OPENAI_API_KEY environment variable is required');
  }

  if (!Number.isFinite(config.llm.temperature) || config.llm.temperature < 0 || config.llm.temperature > 2) {
    errors.push('temperature must be between 0 and 2');
  }

  if (!Number.isInteger(config.agent.maxIterations) || config.agent.maxIterations <= 0) {
    errors.push('maxIterations must be a positive integer');
  }

  if (
    !Number.isFinite(config.agent.confidenceThreshold) ||
    config.agent.confidenceThreshold < 0 ||
    config.agent.confidenceThreshold > 1
  ) {
    errors.push('confidenceThreshold must be between 0 and 1');
  }

  if (!Number.isInteger(config.agent.stallThreshold) || config.agent.stallThreshold <= 0) {
    errors.push('stallThreshold must be a positive integer');
  }

  return errors;
}

export function mergeConfig(base: GroundworkConfig, overrides: GroundworkConfigOverrides): GroundworkConfig {
  return {
    llm: { ...base.llm, ...overrides.llm },
    agent: { ...base.agent, ...overrides.agent }
  };
}
