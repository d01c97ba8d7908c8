import type { Rejected, Unavailable } from '../../common/types/outcome';
import type { IssuedToken, Subject } from '../auth/auth.types';

export const DEFAULT_SIMILARITY_THRESHOLD = 90;

export type VerificationRejection = 'no_face' | 'no_match';

export type VerificationResult =
  | { outcome: 'verified'; subject: Subject; similarity: number; token: IssuedToken }
  | Rejected<VerificationRejection>
  | Unavailable;

export interface VerificationResponseDto {
  success: boolean;
  user_id?: string;
  similarity?: number;
  token?: string;
  token_type?: 'bearer';
  expires_in?: number;
  code?: string;
  message: string;
}
