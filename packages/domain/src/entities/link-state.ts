export type LinkState = 'idle' | 'connecting' | 'streaming' | 'reconnecting' | 'stopped';

export type SubscriberState = 'connected' | 'slow' | 'disconnected';

export interface LinkStatus {
  readonly state: LinkState;
  readonly attempt: number;
  readonly lastError?: string;
  readonly since: Date;
}
