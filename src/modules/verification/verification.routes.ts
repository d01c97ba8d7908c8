import { Router } from 'express';
import { unavailableCode } from '../../common/types/outcome';
import { faceImageUpload, readFaceImage } from '../../middleware/upload';
import { parseRequest } from '../../middleware/validation';
import '../../types/express';
import { VerificationService } from './verification.service';
import { VerificationResponseDto, VerificationResult } from './verification.types';
import { verifySchema } from './verification.validation';

export function toVerificationResponse(result: VerificationResult): { httpStatus: number; body: VerificationResponseDto } {
  switch (result.outcome) {
    case 'verified':
      return {
        httpStatus: 200,
        body: {
          success: true,
          user_id: result.subject,
          similarity: result.similarity,
          token: result.token.token,
          token_type: result.token.tokenType,
          expires_in: result.token.expiresInSeconds,
          message: 'Face verified successfully',
        },
      };
    case 'rejected':
      return {
        httpStatus: 200,
        body: {
          success: false,
          code: result.reason === 'no_face' ? 'NO_FACE_DETECTED' : 'NO_MATCH',
          message: result.message,
        },
      };
    case 'unavailable':
      return { httpStatus: 503, body: { success: false, code: unavailableCode(result.reason), message: result.message } };
  }
}

export function createVerificationRouter(service: VerificationService, defaultSimilarityThreshold: number): Router {
  const router = Router();

  router.post('/verify', faceImageUpload, async (req, res, next) => {
    try {
      const { similarity_threshold: threshold = defaultSimilarityThreshold } = parseRequest(verifySchema, req.body);
      const image = readFaceImage(req);
      console.log(`[${req.requestId ?? '-'}] Verifying face with similarity threshold ${threshold}`);

      const result = await service.verify(image, threshold, { requestId: req.requestId });
      const { httpStatus, body } = toVerificationResponse(result);
      res.status(httpStatus).json(body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
