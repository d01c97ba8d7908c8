import { logPrefix, type RequestContext, type Unavailable } from '../../common/types/outcome';
import type { Subject } from '../auth/auth.types';
import { GatewayError } from '../face/face.errors';
import type { FaceGateway, FaceImage } from '../face/face.types';
import { EnrollmentOptions, EnrollmentResult } from './enrollment.types';

const NO_FACE_MESSAGE = 'No face detected in the image';

export class EnrollmentService {
  constructor(
    private readonly gateway: FaceGateway,
    private readonly options: EnrollmentOptions,
  ) {}

  /**
   * Adds a face record for `subject`. Without deduplication every call indexes a
   * new record, so repeated enrollments accumulate under the same subject.
   */
  async enroll(subject: Subject, image: FaceImage, context?: RequestContext): Promise<EnrollmentResult> {
    const prefix = logPrefix(context, 'enrollment');

    try {
      if (this.options.deduplicate) {
        const existing = await this.gateway.search(image, this.options.duplicateSimilarityThreshold);
        if (existing.kind === 'no_face') {
          console.warn(`${prefix} Rejected ${subject}: no face detected`);
          return { outcome: 'rejected', reason: 'no_face', message: NO_FACE_MESSAGE };
        }
        if (existing.kind === 'match' && existing.subjectId === subject) {
          console.log(`${prefix} ${subject} already enrolled as ${existing.faceHandle}`);
          return {
            outcome: 'enrolled',
            subject,
            matchId: existing.faceHandle,
            duplicate: true,
            similarity: existing.similarity,
          };
        }
      }

      const enrolled = await this.gateway.enroll(subject, image);
      if (enrolled.kind === 'no_face') {
        console.warn(`${prefix} Rejected ${subject}: no face detected`);
        return { outcome: 'rejected', reason: 'no_face', message: NO_FACE_MESSAGE };
      }

      console.log(`${prefix} Registered ${subject} with face ID ${enrolled.faceHandle}`);
      return {
        outcome: 'enrolled',
        subject,
        matchId: enrolled.faceHandle,
        duplicate: false,
        confidence: enrolled.confidence,
      };
    } catch (error) {
      if (error instanceof GatewayError) {
        console.error(`${prefix} Gateway failure (${error.reason}) during ${error.operation}: ${error.detail}`);
        const unavailable: Unavailable = { outcome: 'unavailable', reason: error.reason, message: error.message };
        return unavailable;
      }
      throw error;
    }
  }
}
