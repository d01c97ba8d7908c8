import 'dotenv/config';
import { z } from 'zod';

export const SIGNING_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type SigningAlgorithm = (typeof SIGNING_ALGORITHMS)[number];

export interface AuthConfig {
  secret: string;
  algorithm: SigningAlgorithm;
  accessTokenTtlSeconds: number;
}

export interface RekognitionConfig {
  region: string;
  collectionId: string;
  requestTimeoutMs: number;
}

export interface EnrollmentConfig {
  deduplicate: boolean;
  duplicateSimilarityThreshold: number;
}

export interface AppConfig {
  env: string;
  port: number;
  version: string;
  corsOrigin: string | string[];
  auth: AuthConfig;
  verification: {
    defaultSimilarityThreshold: number;
  };
  enrollment: EnrollmentConfig;
  rekognition: RekognitionConfig;
}

// Only ever used outside production; loadConfig refuses to start a production process without AUTH_SECRET.
const DEVELOPMENT_SECRET = 'development-only-secret';

const flag = z
  .string()
  .default('false')
  .transform((value) => ['true', '1', 'yes'].includes(value.trim().toLowerCase()));

const similarity = z.coerce.number().min(0).max(100);

const envSchema = z
  .object({
    NODE_ENV: z.string().min(1).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    APP_VERSION: z.string().min(1).default('1.0.0'),
    CORS_ORIGIN: z.string().min(1).default('*'),
    AUTH_SECRET: z.string().min(1).optional(),
    AUTH_ALGORITHM: z.enum(SIGNING_ALGORITHMS).default('HS256'),
    ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().min(1 / 60, 'must be at least one second').default(30),
    DEFAULT_SIMILARITY_THRESHOLD: similarity.default(90),
    AWS_REGION: z.string().min(1).default('us-east-1'),
    REKOGNITION_COLLECTION_ID: z
      .string()
      .regex(/^[a-zA-Z0-9_.-]{1,255}$/)
      .default('FaceLockUsers'),
    REKOGNITION_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    ENROLLMENT_DEDUPLICATE: flag,
    ENROLLMENT_DUPLICATE_SIMILARITY: similarity.default(99),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'production' && env.AUTH_SECRET === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AUTH_SECRET'],
        message: 'AUTH_SECRET is required in production',
      });
    }
  });

function parseCorsOrigin(raw: string): string | string[] {
  const origins = raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  if (origins.length === 1 && origins[0] === '*') {
    return '*';
  }
  return origins;
}

/**
 * Reads the process environment once and returns an immutable configuration.
 * Throws with every invalid variable listed when the environment is unusable.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const env = parsed.data;
  const config: AppConfig = {
    env: env.NODE_ENV,
    port: env.PORT,
    version: env.APP_VERSION,
    corsOrigin: parseCorsOrigin(env.CORS_ORIGIN),
    auth: Object.freeze({
      secret: env.AUTH_SECRET ?? DEVELOPMENT_SECRET,
      algorithm: env.AUTH_ALGORITHM,
      accessTokenTtlSeconds: Math.round(env.ACCESS_TOKEN_EXPIRE_MINUTES * 60),
    }),
    verification: Object.freeze({
      defaultSimilarityThreshold: env.DEFAULT_SIMILARITY_THRESHOLD,
    }),
    enrollment: Object.freeze({
      deduplicate: env.ENROLLMENT_DEDUPLICATE,
      duplicateSimilarityThreshold: env.ENROLLMENT_DUPLICATE_SIMILARITY,
    }),
    rekognition: Object.freeze({
      region: env.AWS_REGION,
      collectionId: env.REKOGNITION_COLLECTION_ID,
      requestTimeoutMs: env.REKOGNITION_TIMEOUT_MS,
    }),
  };

  return Object.freeze(config);
}
