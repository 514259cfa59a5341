/** Text dialects a channel can be fed. */
export type MessageFormat = 'markdown' | 'html' | 'plain';

/** Formatting and interaction features a platform declares. */
export interface ChannelCapabilities {
    supportsBold: boolean;
    supportsItalic: boolean;
    supportsCode: boolean;
    supportsCodeBlocks: boolean;
    supportsLinks: boolean;
    supportsButtons: boolean;
    supportsImages: boolean;
    supportsFiles: boolean;
    supportsThreads: boolean;
    supportsEmojis: boolean;
    maxMessageLength: number;
    supportedFormatTags: string[];
}

/**
 * Selection predicate over channel capabilities. Unset fields do not constrain;
 * set boolean fields must equal the channel's flag.
 */
export interface ChannelCapabilityFilter {
    requiresInteractivity?: boolean;
    requiresBold?: boolean;
    requiresLinks?: boolean;
    requiresButtons?: boolean;
    requiresImages?: boolean;
    minMessageLength?: number;
}

/**
 * A messaging platform adapter. Each channel owns its own connection, so
 * sends to different channels can run concurrently.
 */
export interface Channel {
    readonly platformId: string;
    readonly displayName: string;
    readonly enabled: boolean;
    readonly supportsInteractivity: boolean;
    readonly preferredFormat: MessageFormat;
    readonly capabilities: ChannelCapabilities;

    /** Whether this channel has a destination configured for the recipient. */
    canReach(recipientId: string): boolean;
    /** Deliver one message. Rejects on any platform or network failure. */
    send(recipientId: string, text: string): Promise<void>;
    testConnection(): Promise<boolean>;
    start(): Promise<void>;
    stop(): Promise<void>;
}

export type ChannelOutcome =
    | { ok: true; chunks: number; durationMs: number }
    | { ok: false; error: string; durationMs: number };

/** Aggregate of one fan-out. */
export interface BroadcastReport {
    outcomes: Record<string, ChannelOutcome>;
    succeeded: string[];
    failed: string[];
    anySucceeded: boolean;
    /** True when no enabled, capable channel could reach the recipient. */
    noRecipients: boolean;
}

/** Per-format renderings of one document; `plain` is always present. */
export type RenderedContent = Partial<Record<MessageFormat, string>> & { plain: string };
