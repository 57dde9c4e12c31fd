/**
 * testing/client.ts
 *
 * Minimal MCP client over the SSE transport, for tests and examples.
 *
 *   const client = await McpSseClient.connect('http://127.0.0.1:8080');
 *   await client.initialize();
 *   const result = await client.callTool('add', { a: 1, b: 2 });
 *   McpSseClient.extractText(result);
 *   await client.close();
 */

import {
  CallToolResult,
  InitializeResult,
  JsonRpcResponse,
  ToolDescriptor
} from '../core/types';
import { TransportError, errorMessage } from '../core/errors';
import {
  describeErrors,
  isCallToolResult,
  isInitializeResult,
  isJsonRpcResponse,
  isListToolsResult
} from '../core/schemas';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('testing/client');

/** A JSON-RPC error returned by the server. */
export class McpRemoteError extends Error {
  constructor(readonly code: number, message: string, readonly data?: unknown) {
    super(message);
    this.name = 'McpRemoteError';
  }
}

interface PendingCall {
  resolve: (response: JsonRpcResponse) => void;
  reject: (error: Error) => void;
}

type ResponseBody = NonNullable<Response['body']>;

interface SseEvent {
  event: string;
  data: string;
}

function parseEvent(block: string): SseEvent | undefined {
  let event = 'message';
  const data: string[] = [];
  for (const line of block.split('\n')) {
    if (line.startsWith('event:')) event = line.slice(6).trim();
    else if (line.startsWith('data:')) data.push(line.slice(5).trimStart());
  }
  return data.length > 0 ? { event, data: data.join('\n') } : undefined;
}

export class McpSseClient {
  private nextId = 1;
  private readonly pending = new Map<number, PendingCall>();
  private readonly endpoint: Promise<string>;
  private resolveEndpoint: (url: string) => void = () => undefined;
  private rejectEndpoint: (error: Error) => void = () => undefined;
  private pumping: Promise<void> = Promise.resolve();
  private closed = false;
  private ended?: TransportError;

  private constructor(
    private readonly baseUrl: string,
    private readonly controller: AbortController
  ) {
    this.endpoint = new Promise<string>((resolve, reject) => {
      this.resolveEndpoint = resolve;
      this.rejectEndpoint = reject;
    });
  }

  /** Opens the SSE stream and waits for the server to announce its message endpoint. */
  static async connect(baseUrl: string): Promise<McpSseClient> {
    const controller = new AbortController();
    let res: Response;
    try {
      res = await fetch(new URL('/sse', baseUrl), {
        headers: { Accept: 'text/event-stream' },
        signal: controller.signal
      });
    } catch (e) {
      throw new TransportError(`SSE connect failed: ${errorMessage(e)}`, { baseUrl });
    }
    if (!res.ok || !res.body) {
      controller.abort();
      throw new TransportError(`SSE connect failed with status ${res.status}`, { baseUrl, status: res.status });
    }

    const client = new McpSseClient(baseUrl, controller);
    client.pumping = client.pump(res.body);
    await client.endpoint;
    return client;
  }

  static extractText(result: CallToolResult): string {
    return result.content
      .filter(c => c.type === 'text')
      .map(c => c.text)
      .join('\n');
  }

  // -----------------------------------------------------------------------
  // MCP methods
  // -----------------------------------------------------------------------

  async initialize(protocolVersion = '2024-11-05'): Promise<InitializeResult> {
    const result = await this.request('initialize', {
      protocolVersion,
      capabilities: {},
      clientInfo: { name: 'commander-mcp-test-client', version: '0.1.0' }
    });
    if (!isInitializeResult(result)) {
      throw new TransportError(`Unexpected initialize result: ${describeErrors(isInitializeResult.errors, 'result')}`);
    }
    await this.notify('notifications/initialized');
    return result;
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const result = await this.request('tools/list', {});
    if (!isListToolsResult(result)) {
      throw new TransportError(`Unexpected tools/list result: ${describeErrors(isListToolsResult.errors, 'result')}`);
    }
    return result.tools;
  }

  async callTool(name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> {
    const result = await this.request('tools/call', { name, arguments: args });
    if (!isCallToolResult(result)) {
      throw new TransportError(`Unexpected tools/call result: ${describeErrors(isCallToolResult.errors, 'result')}`);
    }
    return result;
  }

  /** Ends the session. Pending calls reject. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.controller.abort();
    await this.pumping;
  }

  // -----------------------------------------------------------------------
  // JSON-RPC plumbing
  // -----------------------------------------------------------------------

  private async request(method: string, params: Record<string, unknown>): Promise<unknown> {
    const endpoint = await this.endpoint;
    if (this.ended) throw this.ended;
    const id = this.nextId++;

    // Registered before posting: the answer can arrive on the stream
    // before the POST resolves.
    const reply = new Promise<JsonRpcResponse>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
    });

    try {
      const [response] = await Promise.all([
        reply,
        this.post(endpoint, { jsonrpc: '2.0', id, method, params })
      ]);
      if (response.error) {
        throw new McpRemoteError(response.error.code, response.error.message, response.error.data);
      }
      return response.result;
    } finally {
      this.pending.delete(id);
    }
  }

  private async notify(method: string): Promise<void> {
    await this.post(await this.endpoint, { jsonrpc: '2.0', method });
  }

  private async post(endpoint: string, body: Record<string, unknown>): Promise<void> {
    let res: Response;
    try {
      res = await fetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body)
      });
    } catch (e) {
      throw new TransportError(`Failed to post message: ${errorMessage(e)}`, { endpoint });
    }
    if (res.status !== 202) {
      throw new TransportError(`Message rejected with status ${res.status}: ${await res.text()}`, { status: res.status });
    }
  }

  private async pump(body: ResponseBody): Promise<void> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    let failure = new TransportError('SSE stream closed');

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;

        buffer += decoder.decode(value, { stream: true }).replace(/\r\n/g, '\n');
        let boundary = buffer.indexOf('\n\n');
        while (boundary !== -1) {
          const event = parseEvent(buffer.slice(0, boundary));
          buffer = buffer.slice(boundary + 2);
          if (event) this.onEvent(event);
          boundary = buffer.indexOf('\n\n');
        }
      }
    } catch (e) {
      if (!this.closed) {
        log.warn({ baseUrl: this.baseUrl, error: errorMessage(e) }, 'SSE stream failed');
        failure = new TransportError(`SSE stream failed: ${errorMessage(e)}`);
      }
    }

    this.ended = failure;
    this.rejectEndpoint(failure);
    for (const call of this.pending.values()) call.reject(failure);
    this.pending.clear();
  }

  private onEvent(event: SseEvent): void {
    switch (event.event) {
      case 'endpoint': {
        this.resolveEndpoint(new URL(event.data, this.baseUrl).toString());
        return;
      }

      case 'message': {
        let message: unknown;
        try {
          message = JSON.parse(event.data);
        } catch (e) {
          log.warn({ error: errorMessage(e) }, 'Ignoring malformed SSE message');
          return;
        }
        if (!isJsonRpcResponse(message) || typeof message.id !== 'number') {
          log.warn({ data: event.data }, 'Ignoring SSE message that is not a response to this client');
          return;
        }
        this.pending.get(message.id)?.resolve(message);
        return;
      }

      default:
        log.debug({ event: event.event }, 'Ignoring SSE event');
    }
  }
}
