import { describe, it, expect } from 'vitest';
import {
  ChatProxyHandler,
  NO_TEXT_REPLY,
  SAFETY_BLOCKED_REPLY,
  extractUpstreamMessage,
  type ChatResult,
} from '../src/handler.js';
import {
  ConfigurationError,
  InternalError,
  UpstreamRejectionError,
  UpstreamShapeError,
  UpstreamTransportError,
} from '../src/errors.js';
import {
  jsonResponse,
  noKeyConfig,
  spyLogger,
  stubClient,
  testConfig,
  textEnvelope,
  textResponse,
} from './helpers.js';

function expectReply(result: ChatResult): string {
  if (!result.ok) throw new Error(`expected a reply, got ${result.error.detail}`);
  return result.reply;
}

function expectError(result: ChatResult) {
  if (result.ok) throw new Error(`expected an error, got reply ${result.reply}`);
  return result.error;
}

describe('ChatProxyHandler', () => {
  it('sends the message as the only content part', async () => {
    const client = stubClient(() => jsonResponse(textEnvelope('ok')));
    const handler = new ChatProxyHandler({ config: testConfig(), client, logger: spyLogger() });

    await handler.handle('What is TypeScript?');

    expect(client.calls).toEqual([{ contents: [{ parts: [{ text: 'What is TypeScript?' }] }] }]);
  });

  it('returns upstream text trimmed', async () => {
    const client = stubClient(() => jsonResponse(textEnvelope('  Hello there!  ')));
    const handler = new ChatProxyHandler({ config: testConfig(), client, logger: spyLogger() });

    expect(expectReply(await handler.handle('Hi'))).toBe('Hello there!');
  });

  it('describes a function call instead of failing', async () => {
    const functionCall = { name: 'get_weather', args: { city: 'Paris' } };
    const client = stubClient(() =>
      jsonResponse({ candidates: [{ content: { parts: [{ functionCall }] }, finishReason: 'STOP' }] })
    );
    const logger = spyLogger();
    const handler = new ChatProxyHandler({ config: testConfig(), client, logger });

    const reply = expectReply(await handler.handle('Weather in Paris?'));

    expect(reply).toBe('Received a function call: {"name":"get_weather","args":{"city":"Paris"}}');
    expect(reply).toContain('function call');
    expect(logger.warn).toHaveBeenCalledWith('Warning: Received a function call, not text.');
  });

  it('returns the fixed placeholder when no text came back', async () => {
    const client = stubClient(() => jsonResponse({ candidates: [{ content: { parts: [{}] }, finishReason: 'STOP' }] }));
    const handler = new ChatProxyHandler({ config: testConfig(), client, logger: spyLogger() });

    expect(expectReply(await handler.handle('Hi'))).toBe(NO_TEXT_REPLY);
  });

  it('replaces a safety-blocked candidate with the blocked notice and logs the ratings', async () => {
    const ratings = [{ category: 'HARM_CATEGORY_DANGEROUS_CONTENT', probability: 'HIGH' }];
    const client = stubClient(() =>
      jsonResponse({
        candidates: [{ content: { parts: [{ text: '' }] }, finishReason: 'SAFETY', safetyRatings: ratings }],
      })
    );
    const logger = spyLogger();
    const handler = new ChatProxyHandler({ config: testConfig(), client, logger });

    const reply = expectReply(await handler.handle('Hi'));

    expect(reply).toBe('Response blocked due to safety settings.');
    expect(reply).toBe(SAFETY_BLOCKED_REPLY);
    expect(logger.warn).toHaveBeenCalledWith(`Safety Ratings: ${JSON.stringify(ratings)}`);
  });

  it('fails with a server error naming the block reason when the prompt is blocked', async () => {
    const client = stubClient(() =>
      jsonResponse({
        promptFeedback: {
          blockReason: 'SAFETY',
          safetyRatings: [{ category: 'HARM_CATEGORY_HARASSMENT', probability: 'HIGH' }],
        },
      })
    );
    const handler = new ChatProxyHandler({ config: testConfig(), client, logger: spyLogger() });

    const error = expectError(await handler.handle('Hi'));

    expect(error).toBeInstanceOf(UpstreamRejectionError);
    expect(error.status).toBe(500);
    expect(error.detail).toContain('SAFETY');
    expect(error.detail).toBe(
      'Error processing your request: Prompt blocked due to SAFETY. ' +
        'Safety Ratings: [{"category":"HARM_CATEGORY_HARASSMENT","probability":"HIGH"}]'
    );
  });

  it('passes the upstream status and message through on an HTTP error', async () => {
    const client = stubClient(() =>
      jsonResponse({ error: { code: 429, message: 'rate limited', status: 'RESOURCE_EXHAUSTED' } }, 429, 'Too Many Requests')
    );
    const handler = new ChatProxyHandler({ config: testConfig(), client, logger: spyLogger() });

    const error = expectError(await handler.handle('Hi'));

    expect(error).toBeInstanceOf(UpstreamTransportError);
    expect(error.status).toBe(429);
    expect(error.detail).toContain('rate limited');
    expect(error.detail).toBe('HTTP error occurred: 429 Too Many Requests - rate limited');
  });

  it('falls back to the raw body when the error body is not JSON', async () => {
    const client = stubClient(() => textResponse('upstream down', 503, 'Service Unavailable'));
    const handler = new ChatProxyHandler({ config: testConfig(), client, logger: spyLogger() });

    const error = expectError(await handler.handle('Hi'));

    expect(error.status).toBe(503);
    expect(error.detail).toBe('HTTP error occurred: 503 Service Unavailable - upstream down');
  });

  it('refuses without a credential before calling upstream', async () => {
    const client = stubClient(() => jsonResponse(textEnvelope('never')));
    const logger = spyLogger();
    const handler = new ChatProxyHandler({ config: noKeyConfig(), client, logger });

    const error = expectError(await handler.handle('Hi'));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.status).toBe(500);
    expect(error.detail).toBe('Google API Key not configured.');
    expect(client.calls).toHaveLength(0);
    expect(logger.error).toHaveBeenCalledWith('Gemini API error: Google API Key not configured.');
  });

  it('refuses without a credential even when no client was given', async () => {
    const handler = new ChatProxyHandler({ config: noKeyConfig(), logger: spyLogger() });

    expect(expectError(await handler.handle('Hi'))).toBeInstanceOf(ConfigurationError);
  });

  it('wraps a thrown transport fault as an internal error', async () => {
    const client = stubClient(() => {
      throw new Error('socket hang up');
    });
    const handler = new ChatProxyHandler({ config: testConfig(), client, logger: spyLogger() });

    const error = expectError(await handler.handle('Hi'));

    expect(error).toBeInstanceOf(InternalError);
    expect(error.status).toBe(500);
    expect(error.detail).toBe('Error processing your request: socket hang up');
  });

  it('reports a non-JSON success body as an unexpected shape', async () => {
    const client = stubClient(() => textResponse('<html>oops</html>', 200, 'OK'));
    const handler = new ChatProxyHandler({ config: testConfig(), client, logger: spyLogger() });

    const error = expectError(await handler.handle('Hi'));

    expect(error).toBeInstanceOf(UpstreamShapeError);
    expect(error.detail).toBe('Error processing your request: Upstream returned a non-JSON body: <html>oops</html>');
  });

  it('includes the raw envelope when neither candidates nor feedback are present', async () => {
    const client = stubClient(() => jsonResponse({ usageMetadata: { promptTokenCount: 3 } }));
    const handler = new ChatProxyHandler({ config: testConfig(), client, logger: spyLogger() });

    const error = expectError(await handler.handle('Hi'));

    expect(error).toBeInstanceOf(UpstreamShapeError);
    expect(error.status).toBe(500);
    expect(error.detail).toBe(
      'Error processing your request: Unexpected response structure from Gemini: {"usageMetadata":{"promptTokenCount":3}}'
    );
  });

  it('gives identical replies for the same message', async () => {
    const client = stubClient((body) => jsonResponse(textEnvelope(`echo: ${body.contents[0]?.parts[0]?.text ?? ''}`)));
    const handler = new ChatProxyHandler({ config: testConfig(), client, logger: spyLogger() });

    const first = await handler.handle('same');
    const second = await handler.handle('same');

    expect(first).toEqual({ ok: true, reply: 'echo: same' });
    expect(second).toEqual(first);
  });

  it('keeps concurrent calls independent', async () => {
    const client = stubClient(async (body) => {
      const text = body.contents[0]?.parts[0]?.text ?? '';
      await new Promise((resolve) => setTimeout(resolve, text === 'slow' ? 20 : 0));
      return jsonResponse(textEnvelope(text.toUpperCase()));
    });
    const handler = new ChatProxyHandler({ config: testConfig(), client, logger: spyLogger() });

    const [slow, fast] = await Promise.all([handler.handle('slow'), handler.handle('fast')]);

    expect(slow).toEqual({ ok: true, reply: 'SLOW' });
    expect(fast).toEqual({ ok: true, reply: 'FAST' });
  });
});

describe('extractUpstreamMessage', () => {
  it('prefers error.message', () => {
    expect(extractUpstreamMessage('{"error":{"message":"API key not valid"}}')).toBe('API key not valid');
  });

  it('re-serialises JSON without an error message', () => {
    expect(extractUpstreamMessage('{"code": 5}')).toBe('{"code":5}');
  });

  it('returns raw text when the body is not JSON', () => {
    expect(extractUpstreamMessage('Bad Gateway')).toBe('Bad Gateway');
  });
});
