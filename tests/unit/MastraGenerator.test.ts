/**
 * Unit tests for the agent-backed generator
 */

import type { Prompt } from '@domain/rag/ports';
import { MastraGenerator, type TextAgent } from '@infrastructure/llm/MastraGenerator';

const PROMPT: Prompt = [
  { role: 'system', content: 'SYSTEM' },
  { role: 'user', content: 'What is ROS 2?' },
];

function agentReturning(text: string): TextAgent & { prompts: Prompt[] } {
  const prompts: Prompt[] = [];
  return {
    prompts,
    async generate(prompt: Prompt) {
      prompts.push(prompt);
      return { text };
    },
  };
}

describe('MastraGenerator', () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should pass the prompt through and return the trimmed answer', async () => {
    const agent = agentReturning('  ROS 2 is a robotics middleware.\n');

    const answer = await new MastraGenerator(agent, 'gpt-4o-mini').generate(PROMPT);

    expect(answer).toBe('ROS 2 is a robotics middleware.');
    expect(agent.prompts).toEqual([PROMPT]);

    const entry = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(entry).toMatchObject({
      type: 'LLM_SUCCESS',
      model: 'gpt-4o-mini',
      messageCount: 2,
      promptLength: 20,
      answerLength: 31,
    });
  });

  it('should reject an empty answer', async () => {
    await expect(
      new MastraGenerator(agentReturning('   '), 'm').generate(PROMPT)
    ).rejects.toThrow('Model returned an empty answer');

    const entry = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(entry).toMatchObject({ type: 'LLM_FAILURE', message: 'Model returned an empty answer' });
  });

  it('should rethrow agent errors unchanged', async () => {
    const failure = new Error('model overloaded');
    const agent: TextAgent = {
      generate: async () => {
        throw failure;
      },
    };

    await expect(new MastraGenerator(agent, 'm').generate(PROMPT)).rejects.toBe(failure);
  });
});
