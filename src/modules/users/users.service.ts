import { ForbiddenError, NotFoundError } from '../../common/errors/app-error';
import { logPrefix, type RequestContext } from '../../common/types/outcome';
import type { Subject } from '../auth/auth.types';
import type { FaceGateway } from '../face/face.types';

export interface DeletedSubject {
  subject: Subject;
  deletedCount: number;
}

export class UsersService {
  constructor(private readonly gateway: FaceGateway) {}

  listSubjects(): Promise<Subject[]> {
    return this.gateway.listSubjects();
  }

  /** Removes every face record of `target`. Callers may only delete themselves. */
  async deleteSubject(caller: Subject, target: Subject, context?: RequestContext): Promise<DeletedSubject> {
    const prefix = logPrefix(context, 'users');
    if (caller !== target) {
      console.warn(`${prefix} ${caller} attempted to delete data for ${target}`);
      throw new ForbiddenError('You can only delete your own user data');
    }

    const outcome = await this.gateway.deleteBySubject(target);
    if (outcome.kind === 'not_found') {
      throw new NotFoundError(`No faces found for user ${target}`);
    }

    console.log(`${prefix} Deleted ${outcome.deletedCount} faces for ${target}`);
    return { subject: target, deletedCount: outcome.deletedCount };
  }
}
