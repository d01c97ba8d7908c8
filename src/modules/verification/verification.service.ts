import { AppError } from '../../common/errors/app-error';
import { logPrefix, type RequestContext } from '../../common/types/outcome';
import type { CredentialIssuer } from '../auth/auth.types';
import { GatewayError } from '../face/face.errors';
import type { FaceGateway, FaceImage, GatewaySearchOutcome } from '../face/face.types';
import { DEFAULT_SIMILARITY_THRESHOLD, VerificationResult } from './verification.types';

export class VerificationService {
  constructor(
    private readonly gateway: FaceGateway,
    private readonly issuer: CredentialIssuer,
  ) {}

  /**
   * Matches the probe image against enrolled faces and mints a session token for
   * the best match. A token is issued only when the match clears `minSimilarity`.
   */
  async verify(
    image: FaceImage,
    minSimilarity: number = DEFAULT_SIMILARITY_THRESHOLD,
    context?: RequestContext,
  ): Promise<VerificationResult> {
    if (!Number.isFinite(minSimilarity) || minSimilarity < 0 || minSimilarity > 100) {
      throw new AppError(400, 'INVALID_SIMILARITY_THRESHOLD', 'similarity_threshold must be between 0 and 100');
    }
    const prefix = logPrefix(context, 'verification');

    let match: GatewaySearchOutcome;
    try {
      match = await this.gateway.search(image, minSimilarity);
    } catch (error) {
      if (error instanceof GatewayError) {
        console.error(`${prefix} Gateway failure (${error.reason}) during ${error.operation}: ${error.detail}`);
        return { outcome: 'unavailable', reason: error.reason, message: error.message };
      }
      throw error;
    }

    if (match.kind === 'no_face') {
      console.warn(`${prefix} Rejected: no face detected`);
      return { outcome: 'rejected', reason: 'no_face', message: 'No face detected in the image' };
    }
    if (match.kind === 'no_match' || match.similarity < minSimilarity) {
      console.warn(`${prefix} Rejected: no match at threshold ${minSimilarity}`);
      return { outcome: 'rejected', reason: 'no_match', message: 'No matching face found' };
    }

    const token = await this.issuer.issue(match.subjectId);
    console.log(`${prefix} Verified ${match.subjectId} with similarity ${match.similarity.toFixed(2)}`);

    return {
      outcome: 'verified',
      subject: match.subjectId,
      similarity: match.similarity,
      token,
    };
  }
}
