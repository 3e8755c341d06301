import { describe, it, expect } from 'vitest';
import { getDefaultConfig, mergeConfig, validateConfig, DEFAULT_MODEL, DEFAULT_BASE_URL } from './config.js';

describe('config', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(getDefaultConfig({})).toEqual({
      llm: {
        apiKey: undefined,
        baseURL: DEFAULT_BASE_URL,
        model: DEFAULT_MODEL,
        temperature: 0.7
      },
      agent: {
        maxIterations: 10,
        confidenceThreshold: 0.7,
        stallThreshold: 3,
        enableBash: true,
        verbose: false
      }
    });
  });

  it('reads overrides from the environment', () => {
    const config = getDefaultConfig({
      OPENAI_API_KEY: 'test-key',
      OPENAI_BASE_URL: 'http://localhost:11434/v1',
      MODEL_NAME: 'local-model',
      GROUNDWORK_TEMPERATURE: '0.2',
      GROUNDWORK_MAX_ITERATIONS: '4',
      GROUNDWORK_ENABLE_BASH: 'false',
      GROUNDWORK_VERBOSE: 'true'
    });

    expect(config.llm).toEqual({
      apiKey: 'test-key',
      baseURL: 'http://localhost:11434/v1',
      model: 'local-model',
      temperature: 0.2
    });
    expect(config.agent.maxIterations).toBe(4);
    expect(config.agent.enableBash).toBe(false);
    expect(config.agent.verbose).toBe(true);
    expect(validateConfig(config)).toEqual([]);
  });

  it('requires an API key', () => {
    expect(validateConfig(getDefaultConfig({}))).toEqual(['OPENAI_API_KEY environment variable is required']);
  });

  it('reports every invalid value', () => {
    const config = getDefaultConfig({
      OPENAI_API_KEY: 'test-key',
      GROUNDWORK_TEMPERATURE: '3',
      GROUNDWORK_MAX_ITERATIONS: 'many',
      GROUNDWORK_CONFIDENCE_THRESHOLD: '1.5',
      GROUNDWORK_STALL_THRESHOLD: '0'
    });

    expect(validateConfig(config)).toEqual([
      'temperature must be between 0 and 2',
      'maxIterations must be a positive integer',
      'confidenceThreshold must be between 0 and 1',
      'stallThreshold must be a positive integer'
    ]);
  });

  it('merges partial overrides', () => {
    const merged = mergeConfig(getDefaultConfig({}), { llm: { model: 'other-model' }, agent: { maxIterations: 2 } });
    expect(merged.llm.model).toBe('other-model');
    expect(merged.llm.baseURL).toBe(DEFAULT_BASE_URL);
    expect(merged.agent.maxIterations).toBe(2);
    expect(merged.agent.stallThreshold).toBe(3);
  });
});
