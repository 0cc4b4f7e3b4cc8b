import pino from 'pino';
import { RequestCancelled } from '../src/errors/index.js';
import type { Generator } from '../src/generation/index.js';
import type { ReachResult, Transport, TransportRequestOptions, TransportResult } from '../src/remote/index.js';
import type { DesignArtifact, JsonObject } from '../src/types/index.js';

export const silentLogger = pino({ level: 'silent' });

export function createClock(start = 1_700_000_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    }
  };
}

export type Responder = (
  url: string,
  body: unknown,
  options: TransportRequestOptions
) => TransportResult | Promise<TransportResult>;

export interface RecordedCall {
  url: string;
  body: unknown;
  options: TransportRequestOptions;
}

export const ok = (body: unknown): TransportResult => ({ ok: true, status: 200, body });
export const fail = (reason: string, status?: number): TransportResult => ({ ok: false, reason, status });

// Never settles until the caller aborts, like a dependency that stopped answering.
export const hangUntilAborted: Responder = (_url, _body, options) =>
  new Promise((_resolve, reject) => {
    options.signal?.addEventListener('abort', () => reject(new RequestCancelled('aborted in test')), { once: true });
  });

/**
 * In-process stand-in for the network. POST routes are matched by the end
 * of the URL; unmatched reach targets are treated as unreachable.
 */
export class FakeTransport implements Transport {
  calls: RecordedCall[] = [];
  reachCalls: string[] = [];

  constructor(
    private readonly routes: Record<string, Responder>,
    private readonly reachable: Record<string, number> = {}
  ) {}

  async postJson(url: string, body: unknown, options: TransportRequestOptions): Promise<TransportResult> {
    this.calls.push({ url, body, options });
    const key = Object.keys(this.routes).find(suffix => url.endsWith(suffix));
    const responder = key === undefined ? undefined : this.routes[key];
    if (!responder) {
      return fail('connection error');
    }
    return responder(url, body, options);
  }

  async reach(url: string): Promise<ReachResult> {
    this.reachCalls.push(url);
    const status = this.reachable[url];
    return status === undefined ? { reached: false, reason: 'connection error' } : { reached: true, status };
  }

  callsTo(suffix: string): RecordedCall[] {
    return this.calls.filter(call => call.url.endsWith(suffix));
  }
}

export class StubGenerator implements Generator {
  calls: Array<{ prompt: string; context: JsonObject }> = [];

  constructor(private readonly produce: (prompt: string, context: JsonObject) => DesignArtifact | Promise<DesignArtifact>) {}

  async generate(prompt: string, context: JsonObject): Promise<DesignArtifact> {
    this.calls.push({ prompt, context });
    return this.produce(prompt, context);
  }
}

export const sampleArtifact: DesignArtifact = {
  design_type: 'house',
  stories: 2,
  dimensions: { length: 12, width: 9, height: 7 },
  rooms: ['kitchen', 'living', 'bedroom', 'bedroom']
};
