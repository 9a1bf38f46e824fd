/**
 * HTTP tests for the Express app, driven end to end with in-process providers
 */

import { createApp } from '../../src/app';
import { ChatUseCase } from '@app/chat/ChatUseCase';
import { IngestUseCase } from '@app/ingest/IngestUseCase';
import { SearchUseCase } from '@app/search/SearchUseCase';
import type { UpstreamPolicy } from '@config/index';
import request from 'supertest';
import {
  CallLog,
  FakeEmbedder,
  FakeGenerator,
  FakeRetriever,
  FakeVectorStore,
  NO_RETRY_POLICY,
  hangs,
  rejects,
  resolves,
} from '../helpers/fakes';

const CORS_ORIGIN = 'https://docs.example.test';

function setup(upstream: UpstreamPolicy = NO_RETRY_POLICY) {
  const log: CallLog = [];
  const embedder = new FakeEmbedder(log);
  const retriever = new FakeRetriever(
    log,
    resolves([{ text: 'ROS2 is...', source: 'doc1', score: 0.9 }])
  );
  const generator = new FakeGenerator(log, resolves('ROS 2 is a robotics middleware.'));
  const vectorStore = new FakeVectorStore(log);

  const app = createApp({
    chat: new ChatUseCase({
      embedder,
      retriever,
      generator,
      rag: { topK: 5, systemPrompt: 'SYSTEM' },
      upstream,
    }),
    ingest: new IngestUseCase({ embedder, vectorStore, chunkSize: 800, upstream }),
    search: new SearchUseCase({ embedder, retriever, defaultLimit: 5, upstream }),
    version: '9.9.9',
    corsOrigin: CORS_ORIGIN,
  });

  return { app, log, embedder, retriever, generator };
}

describe('HTTP API', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();
    jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('POST /chat', () => {
    it.each(['/chat', '/api/chat'])('should answer with sources at %s', async (path) => {
      const { app, log } = setup();

      const res = await request(app)
        .post(path)
        .send({ message: 'What is ROS 2?', conversation_history: [] });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        response: 'ROS 2 is a robotics middleware.',
        sources: ['doc1'],
      });
      expect(log).toEqual(['embed', 'retrieve', 'generate']);
    });

    it('should default a missing conversation history to empty', async () => {
      const { app, generator } = setup();

      const res = await request(app).post('/chat').send({ message: 'hi' });

      expect(res.status).toBe(200);
      expect(generator.prompts[0]).toHaveLength(3);
    });

    it('should forward conversation history to the model', async () => {
      const { app, generator } = setup();

      await request(app)
        .post('/chat')
        .send({
          message: 'And then?',
          conversation_history: [
            { role: 'user', content: 'First?' },
            { role: 'assistant', content: 'Yes.' },
          ],
        });

      expect(generator.prompts[0].slice(2)).toEqual([
        { role: 'user', content: 'First?' },
        { role: 'assistant', content: 'Yes.' },
        { role: 'user', content: 'And then?' },
      ]);
    });

    it('should reject an empty message with 400 and make no provider calls', async () => {
      const { app, log } = setup();

      const res = await request(app).post('/chat').send({ message: '  ' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Message is required' });
      expect(log).toEqual([]);
    });

    it('should reject a body without a message', async () => {
      const { app } = setup();

      const res = await request(app).post('/chat').send({});

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Invalid request: message: Required' });
    });

    it('should reject an unknown history role', async () => {
      const { app } = setup();

      const res = await request(app)
        .post('/chat')
        .send({ message: 'q', conversation_history: [{ role: 'system', content: 'x' }] });

      expect(res.status).toBe(400);
      expect(res.body.error).toMatch(/^Invalid request: conversation_history\.0\.role: /);
    });

    it('should reject malformed JSON', async () => {
      const { app } = setup();

      const res = await request(app)
        .post('/chat')
        .set('Content-Type', 'application/json')
        .send('{"message": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Request body must be valid JSON' });
    });

    it('should reject an unsupported body charset with 415', async () => {
      const { app, log } = setup();

      const res = await request(app)
        .post('/chat')
        .set('Content-Type', 'application/json; charset=latin1')
        .send('{"message": "q"}');

      expect(res.status).toBe(415);
      expect(res.body.error).toMatch(/^unsupported charset/);
      expect(log).toEqual([]);
    });

    it('should map a provider failure to 502 without leaking details', async () => {
      const { app, retriever } = setup();
      retriever.passages = rejects(new Error('password authentication failed'));

      const res = await request(app).post('/chat').send({ message: 'q' });

      expect(res.status).toBe(502);
      expect(res.body).toEqual({
        error: 'The assistant is temporarily unavailable. Please try again.',
      });
    });

    it('should map a provider timeout to 504', async () => {
      const { app, generator } = setup({ timeoutMs: 20, maxRetries: 0, retryBaseDelayMs: 0 });
      generator.answer = hangs();

      const res = await request(app).post('/chat').send({ message: 'q' });

      expect(res.status).toBe(504);
      expect(res.body).toEqual({
        error: 'The assistant took too long to respond. Please try again.',
      });
    });

    it('should map an unexpected error to 500', async () => {
      const app = createApp({
        chat: {
          handle: async () => {
            throw new Error('boom');
          },
        },
        ingest: { ingest: async () => ({ source: 's', totalChunks: 0, ids: [] }) },
        search: { search: async () => ({ query: 'q', results: [] }) },
        version: '9.9.9',
        corsOrigin: '*',
      });

      const res = await request(app).post('/chat').send({ message: 'q' });

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'Internal server error' });
    });
  });

  describe('GET /health', () => {
    it.each(['/health', '/api/health'])('should report status at %s', async (path) => {
      const { app, log } = setup();

      const res = await request(app).get(path);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        status: 'ok',
        service: 'docs-chat-backend',
        version: '9.9.9',
      });
      expect(log).toEqual([]);
    });
  });

  describe('POST /api/documents/ingest', () => {
    it('should ingest a document', async () => {
      const { app } = setup();

      const res = await request(app)
        .post('/api/documents/ingest')
        .send({ source: 'guide.md', content: '# Guide\n\nRun the server.' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        status: 'ok',
        source: 'guide.md',
        totalChunks: 1,
        ids: ['guide.md#0'],
      });
    });

    it('should reject a body over the size limit with 413', async () => {
      const { app } = setup();

      const res = await request(app)
        .post('/api/documents/ingest')
        .send({ source: 'big.md', content: 'a'.repeat(7 * 1024 * 1024) });

      expect(res.status).toBe(413);
      expect(res.body).toEqual({ error: 'Request body is too large' });
    });
  });

  describe('POST /api/search', () => {
    it('should return ranked passages', async () => {
      const { app, log } = setup();

      const res = await request(app).post('/api/search').send({ query: 'ros', limit: 3 });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        query: 'ros',
        results: [{ text: 'ROS2 is...', source: 'doc1', score: 0.9 }],
      });
      expect(log).toEqual(['embed', 'retrieve']);
    });

    it('should reject an out-of-range limit', async () => {
      const { app } = setup();

      const res = await request(app).post('/api/search').send({ query: 'ros', limit: 0 });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: 'Invalid request: limit: Number must be greater than or equal to 1',
      });
    });
  });

  describe('CORS and routing', () => {
    it('should answer preflight requests with 204', async () => {
      const { app } = setup();

      const res = await request(app).options('/chat');

      expect(res.status).toBe(204);
      expect(res.headers['access-control-allow-origin']).toBe(CORS_ORIGIN);
      expect(res.headers['access-control-allow-methods']).toBe('GET, POST, OPTIONS');
    });

    it('should add CORS headers to regular responses', async () => {
      const { app } = setup();

      const res = await request(app).get('/health');

      expect(res.headers['access-control-allow-origin']).toBe(CORS_ORIGIN);
      expect(res.headers['x-powered-by']).toBeUndefined();
    });

    it('should return 404 for unknown routes', async () => {
      const { app } = setup();

      const res = await request(app).get('/nope');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Route GET /nope not found' });
    });
  });
});
