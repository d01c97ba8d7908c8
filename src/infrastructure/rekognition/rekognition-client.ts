import { RekognitionClient } from '@aws-sdk/client-rekognition';
import type { RekognitionConfig } from '../../config';

export class CallTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Rekognition request timed out after ${timeoutMs}ms`);
    this.name = 'CallTimeoutError';
  }
}

// A failed call is reported once; retrying is left to the caller.
export function createRekognitionClient(config: RekognitionConfig): RekognitionClient {
  return new RekognitionClient({
    region: config.region,
    maxAttempts: 1,
  });
}

export function hasErrorName(error: unknown, ...names: string[]): boolean {
  return error instanceof Error && names.includes(error.name);
}

/**
 * Bounds a pending call. The underlying request is not cancelled; its eventual
 * result is ignored.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (!timeoutMs) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(new CallTimeoutError(timeoutMs));
    }, timeoutMs);

    promise
      .then((value) => {
        clearTimeout(timeoutId);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      });
  });
}
