import type { Rejected, Unavailable } from '../../common/types/outcome';
import type { Subject } from '../auth/auth.types';

export interface EnrollmentOptions {
  /** Return the existing face record when the same subject re-enrolls a matching image. */
  deduplicate: boolean;
  duplicateSimilarityThreshold: number;
}

export type EnrollmentResult =
  | { outcome: 'enrolled'; subject: Subject; matchId: string; duplicate: false; confidence: number }
  | { outcome: 'enrolled'; subject: Subject; matchId: string; duplicate: true; similarity: number }
  | Rejected<'no_face'>
  | Unavailable;

export interface RegistrationResponseDto {
  success: boolean;
  user_id?: string;
  face_id?: string;
  confidence?: number;
  duplicate?: boolean;
  code?: string;
  message: string;
}
