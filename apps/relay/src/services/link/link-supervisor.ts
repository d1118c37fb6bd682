import { setTimeout as delay } from 'node:timers/promises';
import { LinkError } from '@trackside/domain';
import type { ByteSource, Frame, LinkConnector, LinkState, LinkStatus } from '@trackside/domain';
import type { FrameFramer } from '@trackside/codec';

export type FrameSink = (frame: Frame) => void;
export type LinkStatusListener = (status: LinkStatus) => void;
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs: number;
  factor?: number;
}

export interface LinkSupervisorOptions {
  /** A read that yields nothing for this long counts as a dropped link. */
  readTimeoutMs: number;
  backoff: BackoffOptions;
  readBufferSize?: number;
  sleep?: Sleep;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

const messageOf = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/** Exponential backoff: initial, initial·factor, … capped at maxDelayMs. */
export function backoffDelays(options: BackoffOptions): () => number {
  const factor = options.factor ?? 2;
  let next = options.initialDelayMs;
  return () => {
    const current = next;
    next = Math.min(next * factor, options.maxDelayMs);
    return Math.min(current, options.maxDelayMs);
  };
}

/**
 * Owns the vehicle link: connects with backoff, reads and frames bytes, hands
 * each complete frame to the sink, and reconnects when the link drops.
 *
 *   idle → connecting → streaming → reconnecting → connecting … | stopped
 */
export class LinkSupervisor {
  private status: LinkStatus = { state: 'idle', attempt: 0, since: new Date() };
  private readonly listeners = new Set<LinkStatusListener>();
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;
  private readonly sleep: Sleep;

  constructor(
    private readonly connector: LinkConnector,
    private readonly framer: FrameFramer,
    private readonly sink: FrameSink,
    private readonly options: LinkSupervisorOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  get state(): LinkState {
    return this.status.state;
  }

  get linkStatus(): LinkStatus {
    return this.status;
  }

  onStatusChange(listener: LinkStatusListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Start the link loop. Resolves once the supervisor has been stopped. */
  start(): Promise<void> {
    if (this.running) return this.running;
    if (this.status.state === 'stopped') {
      return Promise.reject(new Error('link supervisor is stopped'));
    }
    this.controller = new AbortController();
    this.running = this.run(this.controller.signal);
    return this.running;
  }

  /** Abort any connect or read in flight and release the link. Terminal. */
  async stop(): Promise<void> {
    if (this.status.state === 'stopped') return;
    this.controller?.abort(new LinkError('dropped', 'link supervisor stopped'));
    if (this.running) await this.running;
    this.transition('stopped', 0, this.status.lastError);
    console.log(`[link-supervisor] stopped (${this.connector.description})`);
  }

  private transition(state: LinkState, attempt: number, lastError?: string): void {
    this.status = { state, attempt, lastError, since: new Date() };
    for (const listener of this.listeners) listener(this.status);
  }

  private async run(signal: AbortSignal): Promise<void> {
    let nextDelay = backoffDelays(this.options.backoff);
    let attempt = 0;

    while (!signal.aborted) {
      attempt++;
      this.transition('connecting', attempt, this.status.lastError);

      let source: ByteSource;
      try {
        source = await this.connector.open(signal);
      } catch (err) {
        if (signal.aborted) break;
        const wait = nextDelay();
        this.status = { ...this.status, lastError: messageOf(err) };
        console.warn(
          `[link-supervisor] connect attempt ${attempt} to ${this.connector.description} failed: ${messageOf(err)}; retrying in ${wait} ms`,
        );
        if (!(await this.pause(wait, signal))) break;
        continue;
      }

      attempt = 0;
      nextDelay = backoffDelays(this.options.backoff);
      const lastError = await this.stream(source, signal);
      if (signal.aborted) break;

      this.transition('reconnecting', 0, lastError);
      console.warn(`[link-supervisor] link ${source.description} lost: ${lastError}`);
      if (!(await this.pause(this.options.backoff.initialDelayMs, signal))) break;
    }
  }

  /** Stream until the link ends or fails; always releases `source`. */
  private async stream(source: ByteSource, signal: AbortSignal): Promise<string> {
    this.transition('streaming', 0);
    console.log(`[link-supervisor] streaming from ${source.description}`);

    const buffer = new Uint8Array(this.options.readBufferSize ?? 4096);
    try {
      for (;;) {
        const n = await this.readWithTimeout(source, buffer, signal);
        if (n === 0) return 'stream ended';
        for (const frame of this.framer.push(buffer.subarray(0, n))) this.deliver(frame);
      }
    } catch (err) {
      return messageOf(err);
    } finally {
      // A frame cut short by the drop must never be completed by the next link's bytes.
      this.framer.reset();
      await source.close().catch((err) => {
        console.warn(`[link-supervisor] closing ${source.description} failed`, messageOf(err));
      });
    }
  }

  private deliver(frame: Frame): void {
    try {
      this.sink(frame);
    } catch (err) {
      console.error('[link-supervisor] frame sink failed', err);
    }
  }

  private async readWithTimeout(source: ByteSource, buffer: Uint8Array, signal: AbortSignal): Promise<number> {
    const { readTimeoutMs } = this.options;
    const read = new AbortController();
    const onAbort = (): void => read.abort(signal.reason);
    const timer = setTimeout(() => {
      read.abort(new LinkError('timeout', `no data from ${source.description} for ${readTimeoutMs} ms`));
    }, readTimeoutMs);
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
    try {
      return await source.read(buffer, read.signal);
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    }
  }

  /** Resolves false when the wait was cut short by shutdown. */
  private async pause(ms: number, signal: AbortSignal): Promise<boolean> {
    try {
      await this.sleep(ms, signal);
    } catch (err) {
      if (signal.aborted) return false;
      throw err;
    }
    return !signal.aborted;
  }
}
