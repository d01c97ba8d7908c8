import { Router } from 'express';
import type { AppConfig } from '../config';
import { AccessGuard } from '../modules/auth/auth.guard';
import type { CredentialIssuer } from '../modules/auth/auth.types';
import { createEnrollmentRouter } from '../modules/enrollment/enrollment.routes';
import { EnrollmentService } from '../modules/enrollment/enrollment.service';
import type { FaceGateway } from '../modules/face/face.types';
import { createUsersRouter } from '../modules/users/users.routes';
import { UsersService } from '../modules/users/users.service';
import { createVerificationRouter } from '../modules/verification/verification.routes';
import { VerificationService } from '../modules/verification/verification.service';
import { createClientErrorResponse } from '../common/dto/api-response.dto';

export interface ApiDependencies {
  config: AppConfig;
  gateway: FaceGateway;
  issuer: CredentialIssuer;
}

export function createApiRouter({ config, gateway, issuer }: ApiDependencies): Router {
  const apiRouter = Router();
  const guard = new AccessGuard(issuer);

  apiRouter.get('/', (_req, res) => {
    res.status(200).json({ message: 'Welcome to Face Lock Server' });
  });

  apiRouter.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'healthy',
      version: config.version,
      timestamp: new Date().toISOString(),
    });
  });

  // Password grants are not supported; clients authenticate through /verify/.
  apiRouter.post('/token', (req, res) => {
    res.status(400).json(createClientErrorResponse(
      'USE_FACE_VERIFICATION',
      'This server uses facial recognition for authentication. Please use /verify/ endpoint.',
      undefined,
      req.requestId,
    ));
  });

  apiRouter.use(createEnrollmentRouter(new EnrollmentService(gateway, config.enrollment)));
  apiRouter.use(createVerificationRouter(
    new VerificationService(gateway, issuer),
    config.verification.defaultSimilarityThreshold,
  ));
  apiRouter.use('/users', createUsersRouter(guard, new UsersService(gateway)));

  return apiRouter;
}
