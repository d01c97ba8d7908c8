import { AppError } from '../../common/errors/app-error';
import { unavailableCode, type GatewayFailureReason } from '../../common/types/outcome';
import type { GatewayOperation } from './face.types';

export class GatewayError extends AppError {
  public readonly operation: GatewayOperation;
  public readonly reason: GatewayFailureReason;
  /** Underlying failure description, for logs only. */
  public readonly detail: string;

  constructor(operation: GatewayOperation, reason: GatewayFailureReason, detail: string) {
    super(
      503,
      unavailableCode(reason),
      reason === 'timeout'
        ? 'Face matching service timed out, please retry later'
        : 'Face matching service is unavailable, please retry later',
    );
    this.operation = operation;
    this.reason = reason;
    this.detail = detail;
  }
}

/** Client-side image problems reported by the matching engine. */
export class InvalidFaceImageError extends AppError {
  constructor(detail: string) {
    super(400, 'INVALID_FACE_IMAGE', 'face_image is not a supported image', { reason: detail });
  }
}
