export type SessionState = 'connecting' | 'open' | 'closed';

export type CloseReason =
  | { kind: 'graceful'; code: number; reason: string }
  | { kind: 'fault'; errorType: string; message: string };

export interface SessionOutcome {
  sessionId: string;
  messagesEchoed: number;
  reason: CloseReason;
}

export interface SessionDetails {
  clientHost: string;
  clientPort: number;
  path: string;
  userAgent?: string;
}

export interface SessionInfo extends SessionDetails {
  sessionId: string;
  connectedAt: Date;
  metadata: Record<string, unknown>;
}
