export type {
  Principal,
  RejectionReason,
  SessionState,
  TokenKind,
  TokenPairResponse,
  FamilySummary,
} from '@tokenline/shared';
export * from './token.js';
export * from './hono.js';
