import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { createApp } from '../app';
import { loadConfig } from '../config/env';
import type { GenerationRequest } from '../services/geminiService';
import { ProviderError } from '../utils/errorHandler';
import { sampleReport } from './fixtures';

function stubProvider(respond: (request: GenerationRequest) => Promise<string>) {
  return { generate: vi.fn(respond) };
}

function buildApp(env: NodeJS.ProcessEnv, respond: (request: GenerationRequest) => Promise<string>) {
  const provider = stubProvider(respond);
  const app = createApp({ config: loadConfig({ NODE_ENV: 'test', ...env }), provider });
  return { app, provider };
}

const markdownEnv = { GEMINI_API_KEY: 'test-key' };
const jsonEnv = { GEMINI_API_KEY: 'test-key', ANALYSIS_MODE: 'json' };

describe('POST /api/generate_analysis', () => {
  describe('without a configured API key', () => {
    it('fails with 500 for valid input without calling the provider', async () => {
      const { app, provider } = buildApp({}, async () => 'unused');

      const res = await request(app).post('/api/generate_analysis').send({ userInput: 'Should we expand?' });

      expect(res.status).toBe(500);
      expect(res.body).toEqual({
        success: false,
        error:
          'Server configuration error: Gemini API key is missing. Please set the GEMINI_API_KEY environment variable.',
      });
      expect(provider.generate).not.toHaveBeenCalled();
    });

    it('fails with 500 even for empty input', async () => {
      const { app } = buildApp({}, async () => 'unused');

      const res = await request(app).post('/api/generate_analysis').send({});

      expect(res.status).toBe(500);
      expect(res.body.success).toBe(false);
    });

    it('fails with 500 for a body that is not valid JSON', async () => {
      const { app } = buildApp({}, async () => 'unused');

      const res = await request(app)
        .post('/api/generate_analysis')
        .set('Content-Type', 'application/json')
        .send('{"userInput": ');

      expect(res.status).toBe(500);
      expect(res.body).toEqual({
        success: false,
        error:
          'Server configuration error: Gemini API key is missing. Please set the GEMINI_API_KEY environment variable.',
      });
    });
  });

  describe('input validation', () => {
    it.each([
      ['an empty body', {}],
      ['an empty string', { userInput: '' }],
      ['a non-string value', { userInput: 42 }],
    ])('rejects %s with 400', async (_label, body) => {
      const { app, provider } = buildApp(markdownEnv, async () => 'unused');

      const res = await request(app).post('/api/generate_analysis').send(body);

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, error: 'No user input provided for analysis.' });
      expect(provider.generate).not.toHaveBeenCalled();
    });

    it('rejects a body that is not valid JSON with 400', async () => {
      const { app } = buildApp(markdownEnv, async () => 'unused');

      const res = await request(app)
        .post('/api/generate_analysis')
        .set('Content-Type', 'application/json')
        .send('{"userInput": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, error: 'Request body must be valid JSON.' });
    });

    it('rejects a body over the size limit with 413', async () => {
      const { app, provider } = buildApp(markdownEnv, async () => 'unused');

      const res = await request(app).post('/api/generate_analysis').send({ userInput: 'a'.repeat(1_500_000) });

      expect(res.status).toBe(413);
      expect(res.body).toEqual({
        success: false,
        error: 'Request body is too large. Please shorten the input and try again.',
      });
      expect(provider.generate).not.toHaveBeenCalled();
    });

    it('forwards whitespace-only text to the provider', async () => {
      const { app, provider } = buildApp(markdownEnv, async () => 'Nothing to analyse.');

      const res = await request(app).post('/api/generate_analysis').send({ userInput: '   ' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true, analysisText: 'Nothing to analyse.' });
      expect(provider.generate).toHaveBeenCalledTimes(1);
    });
  });

  describe('markdown mode', () => {
    it('returns the provider text as analysisText', async () => {
      const { app } = buildApp(markdownEnv, async () => '# Report\n\nKeep the lease.');

      const res = await request(app).post('/api/generate_analysis').send({ userInput: 'Renew the lease?' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true, analysisText: '# Report\n\nKeep the lease.' });
      expect(res.headers['x-analysis-contract']).toBe('markdown/v1');
    });

    it('accepts userQuery as an alias', async () => {
      const { app, provider } = buildApp(markdownEnv, async () => 'done');

      const res = await request(app).post('/api/generate_analysis').send({ userQuery: 'Renew the lease?' });

      expect(res.status).toBe(200);
      expect(provider.generate.mock.calls[0][0].prompt).toContain('\nRenew the lease?\n');
    });

    it('prefers userInput when both keys are sent', async () => {
      const { app, provider } = buildApp(markdownEnv, async () => 'done');

      await request(app).post('/api/generate_analysis').send({ userInput: 'first', userQuery: 'second' });

      expect(provider.generate.mock.calls[0][0].prompt).toContain('\nfirst\n');
      expect(provider.generate.mock.calls[0][0].prompt).not.toContain('second');
    });

    it('returns identical envelopes for identical requests', async () => {
      const { app } = buildApp(markdownEnv, async ({ prompt }) => `echo:${prompt.length}`);

      const first = await request(app).post('/api/generate_analysis').send({ userInput: 'Same question' });
      const second = await request(app).post('/api/generate_analysis').send({ userInput: 'Same question' });

      expect(first.status).toBe(200);
      expect(second.body).toEqual(first.body);
    });
  });

  describe('json mode', () => {
    it('returns the parsed report as analysisData', async () => {
      const { app, provider } = buildApp(jsonEnv, async () => JSON.stringify(sampleReport));

      const res = await request(app).post('/api/generate_analysis').send({ userInput: 'Open a second warehouse?' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true, analysisData: sampleReport });
      expect(res.headers['x-analysis-contract']).toBe('framework-analysis/v1');
      expect(provider.generate.mock.calls[0][0].json).toBe(true);
    });

    it('reports malformed provider output with 500', async () => {
      const { app } = buildApp(jsonEnv, async () => '{"title": "unterminated');

      const res = await request(app).post('/api/generate_analysis').send({ userInput: 'Open a second warehouse?' });

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ success: false, error: 'The AI returned a malformed analysis. Please try again.' });
    });
  });

  describe('provider failures', () => {
    it('embeds the provider message', async () => {
      const { app } = buildApp(markdownEnv, async () => {
        throw new ProviderError('Resource has been exhausted', 429);
      });

      const res = await request(app).post('/api/generate_analysis').send({ userInput: 'Anything' });

      expect(res.status).toBe(500);
      expect(res.body).toEqual({
        success: false,
        error: 'AI generation failed due to API error: Resource has been exhausted',
      });
    });

    it('answers unexpected errors with a generic message', async () => {
      const { app } = buildApp(markdownEnv, async () => {
        throw new TypeError('Cannot read properties of undefined');
      });

      const res = await request(app).post('/api/generate_analysis').send({ userInput: 'Anything' });

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ success: false, error: 'An unexpected server error occurred during processing.' });
    });
  });
});

describe('other routes', () => {
  it('reports whether the provider is configured', async () => {
    const { app } = buildApp({}, async () => 'unused');

    const res = await request(app).get('/api/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: 'ok',
      providerConfigured: false,
      mode: 'markdown',
      model: 'gemini-2.5-flash',
    });
  });

  it('serves the landing page and the app shell', async () => {
    const { app } = buildApp(markdownEnv, async () => 'unused');

    const landing = await request(app).get('/');
    const shell = await request(app).get('/app');

    expect(landing.status).toBe(200);
    expect(landing.headers['content-type']).toContain('text/html');
    expect(landing.text).toContain('<h1>Decision Analysis</h1>');
    expect(shell.status).toBe(200);
    expect(shell.text).toContain('<form id="analysis-form">');
  });

  it('answers unknown routes with a 404 envelope', async () => {
    const { app } = buildApp(markdownEnv, async () => 'unused');

    const res = await request(app).get('/api/unknown');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, error: 'Route not found: GET /api/unknown' });
  });

  it('tags every response with a request id', async () => {
    const { app } = buildApp(markdownEnv, async () => 'unused');

    const res = await request(app).get('/api/health');

    expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });
});
