import express, { type Express } from 'express';
import cors from 'cors';
import type { AppConfig } from './config';
import { createClientErrorResponse } from './common/dto/api-response.dto';
import { requestLogger } from './middleware/request-logger';
import { errorHandler } from './middleware/error-handler';
import { JwtCredentialIssuer } from './modules/auth/token.service';
import type { CredentialIssuer } from './modules/auth/auth.types';
import type { FaceGateway } from './modules/face/face.types';
import { createApiRouter } from './routes';
import './types/express';

export interface AppDependencies {
  config: AppConfig;
  gateway: FaceGateway;
  issuer?: CredentialIssuer;
}

export function createApp({ config, gateway, issuer = new JwtCredentialIssuer(config.auth) }: AppDependencies): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(cors({ origin: config.corsOrigin }));
  app.use(requestLogger);
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: false }));

  app.use(createApiRouter({ config, gateway, issuer }));

  app.use((req, res) => {
    res.status(404).json(createClientErrorResponse('NOT_FOUND', 'Route not found', undefined, req.requestId));
  });

  app.use(errorHandler);

  return app;
}
