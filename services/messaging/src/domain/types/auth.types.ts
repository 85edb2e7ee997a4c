import type { UserId } from './message.types';

export interface AuthContext {
  userId: UserId;
  scope: string[];
  issuedAt: number;
  expiresAt: number;
}
