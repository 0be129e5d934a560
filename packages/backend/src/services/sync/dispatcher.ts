import type {
  DeliveryResult,
  EventSnapshot,
  ReflectorCredentials,
  SyncHealth,
  SyncMessage,
} from '@event-scoring/shared';
import { AsyncQueue } from './queue.js';
import { describeMessage, reflectorBaseUrl, toReflectorRequest } from './reflector.js';
import type { ReflectorPath } from './reflector.js';
import { SyncDeliveryError, ValidationError, describeError } from '../../utils/errors.js';
import { createSignal } from '../../utils/signal.js';

export const DEFAULT_SYNC_TIMEOUT_MS = 5000;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface SyncDispatcherOptions {
  timeoutMs?: number;
  maxPending?: number; // oldest messages are dropped beyond this
  fetch?: FetchLike;
}

/**
 * What the event controller needs from the sync layer
 */
export interface SyncSink {
  configure(credentials: ReflectorCredentials): void;
  enqueue(message: SyncMessage): void;
  forceSync(snapshot: EventSnapshot): Promise<DeliveryResult>;
  stop(): Promise<void>;
  health(): SyncHealth;
}

const STOP = Symbol('stop');
type QueueItem = SyncMessage | typeof STOP;

/**
 * Relays event state to the reflector from a single background worker.
 *
 * Producers enqueue without waiting. Nothing is sent until credentials are configured; until
 * then messages are buffered. Each message is attempted once, in enqueue order, and a failed
 * delivery is logged and dropped. forceSync bypasses the queue and is not ordered against it.
 */
export class SyncDispatcher implements SyncSink {
  private readonly queue: AsyncQueue<QueueItem>;
  private readonly credentialsReady = createSignal();
  private readonly stopRequested = createSignal();
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private credentials: ReflectorCredentials | null = null;
  private worker: Promise<void> | null = null;
  private running = false;
  private delivered = 0;
  private failed = 0;
  private restarts = 0;
  private lastError: string | null = null;

  constructor(options: SyncDispatcherOptions = {}) {
    this.queue = new AsyncQueue<QueueItem>(options.maxPending);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SYNC_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  get isConfigured(): boolean {
    return this.credentials !== null;
  }

  /**
   * Supply reflector credentials. The first call releases the worker; later calls replace the
   * credentials used for subsequent requests.
   */
  configure(credentials: ReflectorCredentials): void {
    const missing = (['syncUrl', 'eventCode', 'apiKey'] as const).filter(
      (key) => typeof credentials[key] !== 'string' || credentials[key].trim() === ''
    );
    if (missing.length > 0) {
      throw new ValidationError(`Missing reflector settings: ${missing.join(', ')}`);
    }

    this.credentials = { ...credentials };
    this.credentialsReady.set();
    console.log(`[sync] Reflector configured for event ${credentials.eventCode}`);
  }

  start(): void {
    if (this.worker) return;
    this.worker = this.supervise();
  }

  enqueue(message: SyncMessage): void {
    if (this.stopRequested.isSet) {
      console.warn(`[sync] Ignoring ${describeMessage(message)}: dispatcher is stopped`);
      return;
    }

    const dropped = this.queue.push(message);
    if (dropped !== undefined && dropped !== STOP) {
      console.warn(`[sync] Queue full, dropped ${describeMessage(dropped)}`);
    }
  }

  /**
   * Request an orderly stop. Messages queued before the call are attempted first.
   */
  async stop(): Promise<void> {
    if (!this.stopRequested.isSet) {
      this.stopRequested.set();
      this.queue.pushUnbounded(STOP);
    }
    await this.worker;
  }

  /**
   * Post a full snapshot to /sync right away, outside the queue
   */
  async forceSync(snapshot: EventSnapshot): Promise<DeliveryResult> {
    if (!this.credentials) {
      return { delivered: false, error: 'Reflector credentials are not configured' };
    }
    const result = await this.attempt('/sync', snapshot);
    this.record('/sync', result);
    return result;
  }

  health(): SyncHealth {
    return {
      running: this.running,
      configured: this.isConfigured,
      pending: this.queue.size,
      delivered: this.delivered,
      failed: this.failed,
      restarts: this.restarts,
      lastError: this.lastError,
    };
  }

  private async supervise(): Promise<void> {
    this.running = true;
    try {
      for (;;) {
        try {
          await this.run();
          return;
        } catch (error) {
          // The message being handled is lost; the loop resumes with the next one
          this.restarts++;
          this.lastError = describeError(error);
          console.error('[sync] Worker failed unexpectedly, restarting:', error);
        }
      }
    } finally {
      this.running = false;
    }
  }

  private async run(): Promise<void> {
    await Promise.race([this.credentialsReady.promise, this.stopRequested.promise]);

    if (!this.credentials) {
      const discarded = this.queue.drain().filter((item) => item !== STOP);
      if (discarded.length > 0) {
        console.warn(
          `[sync] Stopped before reflector credentials were configured, discarded ${discarded.length} message(s)`
        );
      }
      return;
    }

    for (;;) {
      const item = await this.queue.shift();
      if (item === STOP) {
        return;
      }
      const request = toReflectorRequest(item);
      const result = await this.attempt(request.path, request.body);
      this.record(request.path, result);
    }
  }

  private async attempt(path: ReflectorPath, body: unknown): Promise<DeliveryResult> {
    try {
      const status = await this.post(path, body);
      return { delivered: true, status };
    } catch (error) {
      return {
        delivered: false,
        status: error instanceof SyncDeliveryError ? error.status : undefined,
        error: describeError(error),
      };
    }
  }

  private async post(path: ReflectorPath, body: unknown): Promise<number> {
    const credentials = this.credentials;
    if (!credentials) {
      throw new SyncDeliveryError('Reflector credentials are not configured');
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${reflectorBaseUrl(credentials)}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', apikey: credentials.apiKey },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      // Only the status matters
      await response.body?.cancel();
    } catch (error) {
      throw new SyncDeliveryError(`POST ${path} failed: ${describeError(error)}`, undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new SyncDeliveryError(`POST ${path} returned ${response.status}`, response.status);
    }
    return response.status;
  }

  private record(path: ReflectorPath, result: DeliveryResult): void {
    if (result.delivered) {
      this.delivered++;
      console.log(`[sync] POST ${path} -> ${result.status}`);
    } else {
      this.failed++;
      this.lastError = result.error ?? null;
      console.warn(`[sync] POST ${path} not delivered: ${result.error}`);
    }
  }
}
