import { describe, it, expect } from 'vitest';
import { OpenAIChatClient, parseToolArguments } from './OpenAIChatClient.js';

describe('parseToolArguments', () => {
  it('parses JSON arguments', () => {
    expect(parseToolArguments('{"file_path":"notes.txt"}')).toEqual({ file_path: 'notes.txt' });
  });

  it('treats empty arguments as an empty object', () => {
    expect(parseToolArguments('')).toEqual({});
    expect(parseToolArguments('   ')).toEqual({});
  });

  it('keeps malformed JSON as the raw string', () => {
    expect(parseToolArguments('{"file_path":')).toBe('{"file_path":');
  });
});

describe('OpenAIChatClient', () => {
  it('requires an API key', () => {
    expect(() => new OpenAIChatClient({
      apiKey: '',
      baseURL: 'http://localhost:11434/v1',
      model: 'local-model',
      temperature: 0.7
    })).toThrow('OpenAI API key is required');
  });

  it('reports its model', () => {
    const client = new OpenAIChatClient({
      apiKey: 'test-key',
      baseURL: 'http://localhost:11434/v1',
      model: 'local-model',
      temperature: 0.7
    });
    expect(client.getModel()).toBe('local-model');
  });
});
