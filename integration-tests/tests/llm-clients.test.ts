/**
 * OpenAI Client Tests
 *
 * The SDK talks to an in-process stand-in for the OpenAI HTTP API.
 */

import type { Server } from 'http';
import express from 'express';
import OpenAI from 'openai';
import {
  OpenAiEmbedder,
  OpenAiTextGenerator,
  UpstreamCapabilityError,
} from '@civic-appeals/shared';

interface FakeApiState {
  completion: string | null;
  embedding: number[];
  status: number;
  requests: unknown[];
}

const state: FakeApiState = { completion: 'ok', embedding: [0.5, 0.25, -1], status: 200, requests: [] };

function fakeOpenAiApi(): express.Express {
  const app = express();
  app.use(express.json());

  app.post('/v1/chat/completions', (req, res) => {
    state.requests.push(req.body);
    if (state.status !== 200) {
      res.status(state.status).json({ error: { message: 'upstream down', type: 'server_error' } });
      return;
    }
    res.json({
      id: 'chatcmpl-test',
      object: 'chat.completion',
      created: 0,
      model: 'test-model',
      choices: [{ index: 0, message: { role: 'assistant', content: state.completion }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    });
  });

  app.post('/v1/embeddings', (req, res) => {
    state.requests.push(req.body);
    if (state.status !== 200) {
      res.status(state.status).json({ error: { message: 'upstream down', type: 'server_error' } });
      return;
    }
    // The SDK may ask for base64-packed float32 vectors
    const embedding =
      req.body.encoding_format === 'base64'
        ? Buffer.from(new Float32Array(state.embedding).buffer).toString('base64')
        : state.embedding;
    res.json({
      object: 'list',
      data: [{ object: 'embedding', index: 0, embedding }],
      model: 'test-embedding',
      usage: { prompt_tokens: 3, total_tokens: 3 },
    });
  });

  return app;
}

describe('OpenAI clients', () => {
  let server: Server;
  let openai: OpenAI;

  beforeAll(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    server = await new Promise<Server>((resolve) => {
      const listening = fakeOpenAiApi().listen(0, () => resolve(listening));
    });
    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    openai = new OpenAI({ apiKey: 'test-key', baseURL: `http://127.0.0.1:${port}/v1`, maxRetries: 0 });
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    jest.restoreAllMocks();
  });

  beforeEach(() => {
    state.completion = 'ok';
    state.embedding = [0.5, 0.25, -1];
    state.status = 200;
    state.requests = [];
  });

  describe('OpenAiTextGenerator', () => {
    it('sends the prompt as one user message with the given temperature', async () => {
      state.completion = 'Прошу усунути.';
      const generator = new OpenAiTextGenerator(openai, 'test-model');

      const text = await generator.generate('Draft a letter', 0.7);

      expect(text).toBe('Прошу усунути.');
      expect(state.requests).toEqual([
        { model: 'test-model', messages: [{ role: 'user', content: 'Draft a letter' }], temperature: 0.7 },
      ]);
    });

    it('fails with empty_completion on a blank completion', async () => {
      state.completion = '   ';
      const generator = new OpenAiTextGenerator(openai, 'test-model');

      await expect(generator.generate('x', 0)).rejects.toMatchObject({
        name: 'UpstreamCapabilityError',
        capability: 'generation',
        kind: 'empty_completion',
      });
    });

    it('wraps provider errors as request_failed', async () => {
      state.status = 500;
      const generator = new OpenAiTextGenerator(openai, 'test-model');

      const failure = generator.generate('x', 0);

      await expect(failure).rejects.toBeInstanceOf(UpstreamCapabilityError);
      await expect(failure).rejects.toMatchObject({ capability: 'generation', kind: 'request_failed' });
      expect(state.requests).toHaveLength(1);
    });
  });

  describe('OpenAiEmbedder', () => {
    it('requests the configured model and dimensions', async () => {
      const embedder = new OpenAiEmbedder(openai, 'test-embedding', 3);

      const embedding = await embedder.embed('Немає води');

      expect(embedding).toEqual([0.5, 0.25, -1]);
      expect(state.requests).toHaveLength(1);
      expect(state.requests[0]).toMatchObject({ model: 'test-embedding', input: 'Немає води', dimensions: 3 });
    });

    it('fails with empty_completion on an empty vector', async () => {
      state.embedding = [];
      const embedder = new OpenAiEmbedder(openai, 'test-embedding', 3);

      await expect(embedder.embed('x')).rejects.toMatchObject({
        capability: 'embedding',
        kind: 'empty_completion',
      });
    });
  });
});
