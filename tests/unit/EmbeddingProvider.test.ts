/**
 * Unit tests for the OpenAI embedder against a scripted embeddings API
 */

import { type EmbeddingsApi, OpenAIEmbedder } from '@infrastructure/llm/EmbeddingProvider';

type CreateBody = Parameters<EmbeddingsApi['embeddings']['create']>[0];
type CreateResult = Awaited<ReturnType<EmbeddingsApi['embeddings']['create']>>;

class ScriptedEmbeddings implements EmbeddingsApi {
  public readonly requests: CreateBody[] = [];

  constructor(private readonly respond: (body: CreateBody) => Promise<CreateResult>) {}

  embeddings = {
    create: (body: CreateBody): Promise<CreateResult> => {
      this.requests.push(body);
      return this.respond(body);
    },
  };
}

describe('OpenAIEmbedder', () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should embed a trimmed single text with the configured model', async () => {
    const api = new ScriptedEmbeddings(async () => ({ data: [{ embedding: [0.1, 0.2], index: 0 }] }));

    const vector = await new OpenAIEmbedder(api, 'text-embedding-3-small').embed('  What is ROS 2?  ');

    expect(vector).toEqual([0.1, 0.2]);
    expect(api.requests).toEqual([{ model: 'text-embedding-3-small', input: 'What is ROS 2?' }]);
  });

  it('should return batch vectors in input order', async () => {
    const api = new ScriptedEmbeddings(async () => ({
      data: [
        { embedding: [2], index: 1 },
        { embedding: [1], index: 0 },
      ],
    }));

    await expect(new OpenAIEmbedder(api, 'm').embedBatch(['a', 'b'])).resolves.toEqual([[1], [2]]);
    expect(api.requests[0].input).toEqual(['a', 'b']);
  });

  it('should not call the API for an empty batch', async () => {
    const api = new ScriptedEmbeddings(async () => ({ data: [] }));

    await expect(new OpenAIEmbedder(api, 'm').embedBatch([])).resolves.toEqual([]);
    expect(api.requests).toEqual([]);
  });

  it('should reject a response with the wrong number of vectors', async () => {
    const api = new ScriptedEmbeddings(async () => ({ data: [{ embedding: [1], index: 0 }] }));

    await expect(new OpenAIEmbedder(api, 'm').embedBatch(['a', 'b'])).rejects.toThrow(
      'Embedding API returned invalid data'
    );
  });

  it('should reject an empty vector', async () => {
    const api = new ScriptedEmbeddings(async () => ({ data: [{ embedding: [], index: 0 }] }));

    await expect(new OpenAIEmbedder(api, 'm').embed('q')).rejects.toThrow(
      'Embedding API returned invalid data'
    );
  });

  it('should log a failure event and rethrow API errors', async () => {
    const failure = Object.assign(new Error('rate limited'), { status: 429 });
    const api = new ScriptedEmbeddings(async () => {
      throw failure;
    });

    await expect(new OpenAIEmbedder(api, 'm').embed('q')).rejects.toBe(failure);

    const entry = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(entry).toMatchObject({
      type: 'EMBEDDING_FAILURE',
      model: 'm',
      batchSize: 1,
      message: 'rate limited',
    });
  });
});
