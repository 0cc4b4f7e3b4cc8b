import Anthropic from '@anthropic-ai/sdk';
import { jsonObjectSchema } from '../contracts/index.js';
import { formatIssues } from '../contracts/versioned.js';
import { MAX_TIMEOUT_MS } from '../remote/transport.js';
import type { DesignArtifact, JsonObject } from '../types/index.js';
import { DESIGN_SYSTEM_PROMPT, buildDesignPrompt } from './prompt.js';

export interface InferenceBackend {
  name: string;
  type: 'anthropic' | 'ollama';
  model: string;
  baseUrl?: string;
  apiKey?: string;
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

/**
 * Turns a natural-language prompt into a design artifact. Opaque to the
 * pipeline: it is awaited before any dependency is called and any throw is
 * fatal for the request.
 */
export interface Generator {
  generate(prompt: string, context: JsonObject, options?: GenerateOptions): Promise<DesignArtifact>;
}

export interface InferenceRouterOptions {
  timeoutMs: number;
  maxTokens?: number;
  fetchImpl?: typeof fetch;
}

export function parseArtifact(output: string): DesignArtifact {
  const unfenced = output.replace(/```(?:json)?/gi, '');
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new Error('Model output contains no JSON object');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(unfenced.slice(start, end + 1));
  } catch (error) {
    throw new Error('Model output is not valid JSON', { cause: error });
  }

  const artifact = jsonObjectSchema.safeParse(parsed);
  if (!artifact.success) {
    throw new Error(`Model output is not a design object: ${formatIssues(artifact.error)}`);
  }
  return artifact.data;
}

export class InferenceRouter implements Generator {
  private backends: Map<string, InferenceBackend> = new Map();
  private anthropic?: Anthropic;
  private defaultBackend: string;

  constructor(
    backends: InferenceBackend[],
    defaultBackend: string,
    private readonly options: InferenceRouterOptions
  ) {
    for (const backend of backends) {
      this.backends.set(backend.name, backend);
    }

    this.defaultBackend = defaultBackend;
  }

  async generate(prompt: string, context: JsonObject, options: GenerateOptions = {}): Promise<DesignArtifact> {
    const backend = this.backends.get(this.defaultBackend);
    if (!backend) {
      throw new Error(`Backend ${this.defaultBackend} not configured`);
    }

    const input = buildDesignPrompt(prompt, context);
    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), Math.min(this.options.timeoutMs, MAX_TIMEOUT_MS));
    const onAbort = () => deadline.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const output =
        backend.type === 'anthropic'
          ? await this.inferAnthropic(input, backend, deadline.signal)
          : await this.inferOllama(input, backend, deadline.signal);
      return parseArtifact(output);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  private async inferAnthropic(input: string, backend: InferenceBackend, signal: AbortSignal): Promise<string> {
    // Created on first use so a missing key only matters when the backend is picked
    const anthropic = (this.anthropic ??= new Anthropic(backend.apiKey ? { apiKey: backend.apiKey } : {}));

    const response = await anthropic.messages.create(
      {
        model: backend.model,
        max_tokens: this.options.maxTokens ?? 2048,
        system: DESIGN_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: input }]
      },
      { signal }
    );

    return response.content.flatMap(block => (block.type === 'text' ? [block.text] : [])).join('\n');
  }

  private async inferOllama(input: string, backend: InferenceBackend, signal: AbortSignal): Promise<string> {
    const baseUrl = backend.baseUrl || 'http://localhost:11434';
    const doFetch = this.options.fetchImpl ?? fetch;

    const response = await doFetch(`${baseUrl}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: backend.model,
        prompt: input,
        system: DESIGN_SYSTEM_PROMPT,
        format: 'json',
        stream: false
      }),
      signal
    });

    if (!response.ok) {
      throw new Error(`Ollama error: ${response.status}`);
    }

    const data: unknown = await response.json();
    if (typeof data !== 'object' || data === null || !('response' in data) || typeof data.response !== 'string') {
      throw new Error('Ollama returned no response text');
    }
    return data.response;
  }

  getAvailableBackends(): string[] {
    return Array.from(this.backends.keys());
  }
}
