import type { AUDIT_STAGES, ERROR_CODES, WS_EVENTS } from './constants';

export type AuditStage = (typeof AUDIT_STAGES)[number];
export type ErrorCode = (typeof ERROR_CODES)[number];

export interface WsMessage {
  event: (typeof WS_EVENTS)[keyof typeof WS_EVENTS];
  data: unknown;
  timestamp: string;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: ErrorCode | 'NotFound' | 'Conflict';
  reasons?: string[];
}
