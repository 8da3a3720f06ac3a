/**
 * Typed event definitions for structured run logging.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  ticketId?: number;
  repoId?: string;
  requestId?: string;
  data?: Record<string, unknown>;
}

export interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  source: string;
  message: string;
}

// ── Run-level events ──

export interface RunStartedEvent {
  type: 'run-started';
  ticketCount: number;
  organization: string;
  project: string;
}

export interface RunCompletedEvent {
  type: 'run-completed';
  rows: number;
  failures: number;
  stats: Record<string, number>;
}

// ── Fetch failures ──

export interface TicketFailedEvent {
  type: 'ticket-failed';
  ticketId: number;
  error: string;
}

export interface RequestFailedEvent {
  type: 'request-failed';
  ticketId: number;
  repoId: string;
  requestId: string;
  error: string;
}

export type RunEvent =
  | RunStartedEvent
  | RunCompletedEvent
  | TicketFailedEvent
  | RequestFailedEvent;
