import type { Channel, ChannelCapabilities, MessageFormat } from '../../src/types/channels.js';
import type { DocumentSource, Period, WeekLetterDocument } from '../../src/types/delivery.js';
import { periodKey } from '../../src/utils/period.js';

export type FakeChannelMode = 'ok' | 'fail' | 'hang';

export interface FakeChannelOptions {
  platformId: string;
  preferredFormat?: MessageFormat;
  enabled?: boolean;
  interactive?: boolean;
  capabilities?: Partial<ChannelCapabilities>;
  /** Recipients the channel can reach; omit to reach everyone. */
  reachable?: string[];
  mode?: FakeChannelMode;
  failWith?: string;
  /** Delay before an `ok` send resolves. */
  sendDelayMs?: number;
}

const BASE_CAPABILITIES: ChannelCapabilities = {
  supportsBold: true,
  supportsItalic: true,
  supportsCode: false,
  supportsCodeBlocks: false,
  supportsLinks: true,
  supportsButtons: false,
  supportsImages: false,
  supportsFiles: false,
  supportsThreads: false,
  supportsEmojis: true,
  maxMessageLength: 4000,
  supportedFormatTags: [],
};

/** In-process channel that records what it was asked to send. */
export class FakeChannel implements Channel {
  readonly platformId: string;
  readonly displayName: string;
  readonly preferredFormat: MessageFormat;
  readonly supportsInteractivity: boolean;
  readonly capabilities: ChannelCapabilities;
  enabled: boolean;
  mode: FakeChannelMode;
  failWith: string;

  readonly sent: Array<{ recipientId: string; text: string }> = [];
  attempts = 0;
  started = 0;
  stopped = 0;

  readonly #reachable: Set<string> | null;
  readonly #sendDelayMs: number;

  constructor(options: FakeChannelOptions) {
    this.platformId = options.platformId;
    this.displayName = `Fake ${options.platformId}`;
    this.preferredFormat = options.preferredFormat ?? 'plain';
    this.supportsInteractivity = options.interactive ?? false;
    this.capabilities = { ...BASE_CAPABILITIES, ...options.capabilities };
    this.enabled = options.enabled ?? true;
    this.mode = options.mode ?? 'ok';
    this.failWith = options.failWith ?? `${options.platformId} is down`;
    this.#reachable = options.reachable ? new Set(options.reachable) : null;
    this.#sendDelayMs = options.sendDelayMs ?? 0;
  }

  canReach(recipientId: string): boolean {
    return this.#reachable === null || this.#reachable.has(recipientId);
  }

  async send(recipientId: string, text: string): Promise<void> {
    this.attempts += 1;
    if (this.mode === 'fail') {
      throw new Error(this.failWith);
    }
    if (this.mode === 'hang') {
      await new Promise<never>(() => undefined);
    }
    if (this.#sendDelayMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.#sendDelayMs));
    }
    this.sent.push({ recipientId, text });
  }

  async testConnection(): Promise<boolean> {
    return this.mode === 'ok';
  }

  async start(): Promise<void> {
    this.started += 1;
  }

  async stop(): Promise<void> {
    this.stopped += 1;
  }
}

/** Document source backed by a map, for tests that publish letters over time. */
export class MemoryDocumentSource implements DocumentSource {
  readonly #letters = new Map<string, string>();
  failure: Error | null = null;
  fetches = 0;

  publish(recipientId: string, period: Period, rawContent: string): void {
    this.#letters.set(periodKey(recipientId, period), rawContent);
  }

  async fetch(recipientId: string, period: Period): Promise<WeekLetterDocument | null> {
    this.fetches += 1;
    if (this.failure) throw this.failure;
    const rawContent = this.#letters.get(periodKey(recipientId, period));
    return rawContent === undefined ? null : { recipientId, period, rawContent };
  }
}

/** A mutable clock for code that takes a `now` function. */
export function createClock(start: string): { now: () => Date; set: (iso: string) => void; advanceHours: (hours: number) => void } {
  let current = new Date(start);
  return {
    now: () => current,
    set: (iso) => {
      current = new Date(iso);
    },
    advanceHours: (hours) => {
      current = new Date(current.getTime() + hours * 60 * 60 * 1000);
    },
  };
}
