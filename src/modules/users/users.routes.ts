import { Router } from 'express';
import '../../types/express';
import { AccessGuard, requireAuth, requireSubject } from '../auth/auth.guard';
import { UsersService } from './users.service';

export function createUsersRouter(guard: AccessGuard, service: UsersService): Router {
  const router = Router();
  router.use(requireAuth(guard));

  // No profile store: profile fields are always null.
  router.get('/me', (req, res) => {
    res.status(200).json({ user_id: requireSubject(req), email: null, full_name: null });
  });

  router.get('/', async (req, res, next) => {
    try {
      const caller = requireSubject(req);
      console.log(`[${req.requestId ?? '-'}] ${caller} requested the list of users`);
      const users = await service.listSubjects();
      res.status(200).json({ success: true, users, total_count: users.length });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:user_id', async (req, res, next) => {
    try {
      const caller = requireSubject(req);
      const target = req.params.user_id;
      const deleted = await service.deleteSubject(caller, target, { requestId: req.requestId });
      res.status(200).json({
        message: `User ${deleted.subject} deleted successfully`,
        user_id: deleted.subject,
        deleted_face_count: deleted.deletedCount,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
