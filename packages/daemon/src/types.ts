/**
 * Shared types for the agent core and the capability interfaces it drives.
 */

/** A text message observed in the channel. */
export interface InboundMessage {
  body: string;
  /** Server-assigned timestamp, transport-native milliseconds */
  serverTimestamp: number;
  channelId: string;
  eventId?: string;
  sender?: string;
}

export interface CommandOutcome {
  /** Text to send back on the channel; null means stay silent */
  reply: string | null;
  stopRequested: boolean;
}

export interface SyncResult {
  events: InboundMessage[];
  /**
   * Server clock observed during the sync (epoch ms), when the transport knows
   * it. Must not be earlier than any message the sync returned.
   */
  serverClock?: number;
}

export interface ChannelSession {
  userId: string;
  deviceId?: string;
}

/**
 * Chat transport used by the channel loop. Timestamps must be non-decreasing
 * per channel for replay filtering to hold.
 */
export interface ChannelTransport {
  /** @throws AuthenticationError on rejected credentials */
  authenticate(user: string, secret: string): Promise<ChannelSession>;
  join(channelId: string): Promise<void>;
  sync(timeoutMs: number): Promise<SyncResult>;
  send(channelId: string, text: string): Promise<void>;
  /** Long-poll for events newer than the last sync or poll */
  poll(timeoutMs: number): Promise<InboundMessage[]>;
  close(): Promise<void>;
}

export interface ProcessInfo {
  pid: number;
  name: string;
  commandLine: string;
}

export interface ProcessCapability {
  listProcesses(): Promise<ProcessInfo[]>;
  /** Graceful stop request (SIGTERM or platform equivalent) */
  terminate(pid: number): Promise<void>;
  kill(pid: number): Promise<void>;
}

/** The auto-start artifact that relaunches the agent. */
export interface PersistenceArtifact {
  readonly path: string;
  exists(): Promise<boolean>;
  /** False when the artifact is missing or could not be hidden */
  hide(): Promise<boolean>;
  /** False when the artifact is missing or could not be removed */
  delete(): Promise<boolean>;
}

export interface HostPower {
  shutdown(delaySeconds: number): Promise<boolean>;
  restart(delaySeconds: number): Promise<boolean>;
}
