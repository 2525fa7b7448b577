/**
 * Google Generative Language API client.
 *
 * Only the non-streaming `generateContent` call is used. The client reports
 * every HTTP outcome back as an {@link UpstreamResponse}; interpreting the
 * status and body is the handler's job.
 *
 * @packageDocumentation
 */

export interface GeminiPart {
  text: string;
}

export interface GeminiContent {
  role?: 'user' | 'model';
  parts: GeminiPart[];
}

export interface GenerationConfig {
  temperature?: number;
  maxOutputTokens?: number;
  topP?: number;
  topK?: number;
}

/**
 * Request body for `models/{model}:generateContent`.
 * `systemInstruction` and `generationConfig` are accepted by the API but the
 * proxy never sets them.
 */
export interface GenerateContentRequest {
  contents: GeminiContent[];
  systemInstruction?: { parts: GeminiPart[] };
  generationConfig?: GenerationConfig;
}

export interface UpstreamResponse {
  ok: boolean;
  status: number;
  statusText: string;
  bodyText: string;
}

export interface GenerativeClient {
  generateContent(body: GenerateContentRequest): Promise<UpstreamResponse>;
}

export interface FetchClientOptions {
  baseUrl: string;
  model: string;
  apiKey: string;
  timeoutMs: number;
  /** Replaceable for tests; defaults to the global fetch. */
  fetch?: typeof fetch;
}

export function buildGenerateRequest(message: string): GenerateContentRequest {
  return {
    contents: [
      {
        parts: [{ text: message }],
      },
    ],
  };
}

export function buildGenerateUrl(baseUrl: string, model: string, apiKey: string): string {
  return `${baseUrl}/models/${encodeURIComponent(model)}:generateContent?key=${encodeURIComponent(apiKey)}`;
}

/**
 * Forward non-streaming requests to Gemini with the global fetch
 */
export class FetchGenerativeClient implements GenerativeClient {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: FetchClientOptions) {
    this.url = buildGenerateUrl(opts.baseUrl, opts.model, opts.apiKey);
    this.timeoutMs = opts.timeoutMs;
    this.fetchImpl = opts.fetch ?? fetch;
  }

  async generateContent(body: GenerateContentRequest): Promise<UpstreamResponse> {
    const response = await this.fetchImpl(this.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    return {
      ok: response.ok,
      status: response.status,
      statusText: response.statusText,
      bodyText: await response.text(),
    };
  }
}
