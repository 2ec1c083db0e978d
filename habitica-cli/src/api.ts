import type { z } from 'zod';
import { ApiError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import {
  ContentSchema,
  EnvelopeSchema,
  PartySchema,
  ServerStatusSchema,
  TaskListSchema,
  TaskSchema,
  UserSchema,
  parseShape,
  type Content,
  type Party,
  type ServerStatus,
  type Task,
  type User,
} from './schemas.js';
import type { Direction } from './task-value.js';
import type { BatchOp, Credentials, HabiticaApi, TaskFields, TaskType } from './types.js';

export const DEFAULT_TIMEOUT_MS = 30_000;
// Client model version the batch-update endpoint expects.
const BATCH_MODEL_VERSION = 137;

type HttpMethod = 'GET' | 'POST' | 'PUT';

export interface HabiticaClientOptions {
  credentials: Credentials;
  timeoutMs?: number;
  logger?: Logger;
  fetch?: typeof fetch;
  now?: () => number;
}

interface RequestOptions {
  query?: Record<string, string>;
  body?: unknown;
  allowNotFound?: boolean;
}

export class HabiticaClient implements HabiticaApi {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(options: HabiticaClientOptions) {
    const { credentials } = options;
    this.baseUrl = `${credentials.url.replace(/\/+$/, '')}/api/v3`;
    this.headers = {
      'content-type': 'application/json',
      'x-api-user': credentials.userId,
      'x-api-key': credentials.apiKey,
      'x-client': `${credentials.userId}-habitica-cli`,
    };
    this.timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  async getUser(): Promise<User> {
    return this.request('GET', '/user', UserSchema);
  }

  async getServerStatus(): Promise<ServerStatus> {
    return this.request('GET', '/status', ServerStatusSchema);
  }

  async getPartyStatus(): Promise<Party | null> {
    return this.requestOptional('GET', '/groups/party', PartySchema);
  }

  async getContent(): Promise<Content> {
    return this.request('GET', '/content', ContentSchema);
  }

  async listTasks(type: TaskType): Promise<Task[]> {
    return this.request('GET', '/tasks/user', TaskListSchema, { query: { type } });
  }

  async postTaskDirection(id: string, direction: Direction): Promise<void> {
    await this.send('POST', `/tasks/${encodeURIComponent(id)}/score/${direction}`, {});
  }

  async putTask(id: string, fields: TaskFields): Promise<Task> {
    return this.request('PUT', `/tasks/${encodeURIComponent(id)}`, TaskSchema, { body: fields });
  }

  async postTask(fields: TaskFields): Promise<Task> {
    return this.request('POST', '/tasks/user', TaskSchema, { body: fields });
  }

  async postBatchOps(resource: 'user', ops: BatchOp[]): Promise<User> {
    return this.request('POST', `/${resource}/batch-update`, UserSchema, {
      query: { _v: String(BATCH_MODEL_VERSION), data: String(this.now()) },
      body: { ops },
    });
  }

  private async request<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: S,
    options: RequestOptions = {}
  ): Promise<z.output<S>> {
    const data = await this.send(method, path, options);
    return parseShape(schema, data, `${method} ${path}`);
  }

  private async requestOptional<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: S
  ): Promise<z.output<S> | null> {
    const data = await this.send(method, path, { allowNotFound: true });
    if (data === null) return null;
    return parseShape(schema, data, `${method} ${path}`);
  }

  /** Performs one round-trip and returns the envelope's `data`, or null for an allowed 404. */
  private async send(method: HttpMethod, path: string, options: RequestOptions): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const startedAt = this.now();

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: this.headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (err) {
      const message = timedOut
        ? `${method} ${path} timed out after ${this.timeoutMs} ms`
        : `${method} ${path} failed: ${errorMessage(err)}`;
      this.logger.debug('request failed', { method, path, timedOut });
      throw new ApiError(0, timedOut ? 'Timeout' : 'NetworkError', message, { cause: err });
    } finally {
      clearTimeout(timeout);
    }

    this.logger.debug('request', {
      method,
      path,
      status: response.status,
      latencyMs: this.now() - startedAt,
    });

    if (response.status === 404 && options.allowNotFound) {
      return null;
    }

    const envelope = EnvelopeSchema.safeParse(safeJsonParse(text));
    if (!response.ok || !envelope.success || !envelope.data.success) {
      const serverCode = envelope.success ? envelope.data.error ?? '' : '';
      const detail = envelope.success ? envelope.data.message ?? serverCode : text.slice(0, 200);
      throw new ApiError(
        response.status,
        serverCode,
        `${method} ${path} failed with HTTP ${response.status}${detail ? `: ${detail}` : ''}`
      );
    }
    return envelope.data.data ?? null;
  }
}

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
