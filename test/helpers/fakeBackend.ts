import type { PrefixRegistry } from '../../src/lib/prefix.js';
import type { Technology, TripleStoreBackend } from '../../src/lib/sparql/backend.js';
import type { RunResult, SparqlRow } from '../../src/lib/sparql/http.js';

export type RecordedCall =
  | { kind: 'query' | 'update'; text: string; prefixes: string[] }
  | { kind: 'nquads'; content: string }
  | { kind: 'turtle'; content: string; graphUri?: string };

/**
 * In-process backend: records every call and answers SELECTs from a handler.
 */
export class FakeBackend implements TripleStoreBackend {
  readonly technology: Technology = 'Generic';
  readonly connection = { url: 'http://store.test/sparql' };
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly answer: (text: string) => SparqlRow[] = () => [],
    readonly uniqueInsert: boolean = false
  ) {}

  async executeQuery(text: string, prefixes: PrefixRegistry): Promise<RunResult> {
    this.calls.push({ kind: 'query', text, prefixes: prefixes.shorts() });
    return this.answer(text);
  }

  async executeUpdate(text: string, prefixes: PrefixRegistry): Promise<RunResult> {
    this.calls.push({ kind: 'update', text, prefixes: prefixes.shorts() });
    return undefined;
  }

  async uploadNquadsChunk(content: string): Promise<void> {
    this.calls.push({ kind: 'nquads', content });
  }

  async uploadTurtleChunk(content: string, graphUri?: string): Promise<void> {
    this.calls.push({ kind: 'turtle', content, graphUri });
  }

  async dumpAll(): Promise<string> {
    return '';
  }

  updates(): string[] {
    return this.calls.flatMap((c) => (c.kind === 'update' ? [c.text] : []));
  }

  queries(): string[] {
    return this.calls.flatMap((c) => (c.kind === 'query' ? [c.text] : []));
  }
}

/** Answers queries whose leading comment marker matches. */
export function byMarker(answers: Record<string, SparqlRow[]>): (text: string) => SparqlRow[] {
  return (text) => {
    const marker = /#\s*([\w.]+)/.exec(text)?.[1] ?? '';
    return answers[marker] ?? [];
  };
}

export type FetchCall = {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string;
};

export function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'content-type': 'application/sparql-results+json' }
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

export function bindings(rows: Record<string, { type: string; value: string; datatype?: string }>[]): unknown {
  return { head: { vars: [] }, results: { bindings: rows } };
}

/**
 * Stand-in for the global fetch: records requests, replies from `respond`.
 */
export function recordingFetch(respond: (call: FetchCall, index: number) => Response) {
  const calls: FetchCall[] = [];
  const fn = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const call: FetchCall = {
      url: String(input),
      method: init?.method ?? 'GET',
      headers,
      body: typeof init?.body === 'string' ? init.body : ''
    };
    calls.push(call);
    return respond(call, calls.length - 1);
  };
  return { fn, calls };
}

/** The form field of a urlencoded body. */
export function formField(body: string, name: string): string | null {
  return new URLSearchParams(body).get(name);
}
