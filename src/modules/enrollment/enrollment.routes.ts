import { Router } from 'express';
import { unavailableCode } from '../../common/types/outcome';
import { faceImageUpload, readFaceImage } from '../../middleware/upload';
import { parseRequest } from '../../middleware/validation';
import '../../types/express';
import { EnrollmentService } from './enrollment.service';
import { EnrollmentResult, RegistrationResponseDto } from './enrollment.types';
import { registerSchema } from './enrollment.validation';

export function toRegistrationResponse(result: EnrollmentResult): { httpStatus: number; body: RegistrationResponseDto } {
  switch (result.outcome) {
    case 'enrolled':
      return {
        httpStatus: 200,
        body: {
          success: true,
          user_id: result.subject,
          face_id: result.matchId,
          ...(result.duplicate ? {} : { confidence: result.confidence }),
          duplicate: result.duplicate,
          message: result.duplicate ? 'User already registered with this face' : 'User registered successfully',
        },
      };
    case 'rejected':
      return { httpStatus: 200, body: { success: false, code: 'NO_FACE_DETECTED', message: result.message } };
    case 'unavailable':
      return { httpStatus: 503, body: { success: false, code: unavailableCode(result.reason), message: result.message } };
  }
}

export function createEnrollmentRouter(service: EnrollmentService): Router {
  const router = Router();

  router.post('/register', faceImageUpload, async (req, res, next) => {
    try {
      const { user_id: subject, full_name: fullName } = parseRequest(registerSchema, req.body);
      const image = readFaceImage(req);
      console.log(`[${req.requestId ?? '-'}] Registering user ${subject}${fullName ? ` (${fullName})` : ''}`);

      const result = await service.enroll(subject, image, { requestId: req.requestId });
      const { httpStatus, body } = toRegistrationResponse(result);
      res.status(httpStatus).json(body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
