import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../src/app';
import { loadConfig } from '../src/config';
import { MAX_FACE_IMAGE_BYTES } from '../src/middleware/upload';
import { JwtCredentialIssuer } from '../src/modules/auth/token.service';
import { GatewayError } from '../src/modules/face/face.errors';
import { DETECTION_CONFIDENCE, InMemoryFaceGateway, faceImage } from './support/in-memory-face-gateway';

const config = loadConfig({ NODE_ENV: 'test', AUTH_SECRET: 'test-secret', APP_VERSION: '1.0.0' });

const asDataUrl = (identity: string): string =>
  'data:image/jpeg;base64,' + faceImage(identity).toString('base64');

describe('API endpoints', () => {
  let gateway: InMemoryFaceGateway;
  let issuer: JwtCredentialIssuer;
  let app: Express;

  const tokenFor = async (subject: string): Promise<string> => (await issuer.issue(subject)).token;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    gateway = new InMemoryFaceGateway();
    issuer = new JwtCredentialIssuer(config.auth);
    app = createApp({ config, gateway, issuer });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('POST /register/', () => {
    it('enrolls an uploaded face', async () => {
      const res = await request(app)
        .post('/register/')
        .field('user_id', 'alice')
        .field('full_name', 'Alice Example')
        .field('email', '')
        .attach('face_image', faceImage('face:alice'), 'alice.jpg')
        .expect(200);

      expect(res.body).toEqual({
        success: true,
        user_id: 'alice',
        face_id: 'face-1',
        confidence: DETECTION_CONFIDENCE,
        duplicate: false,
        message: 'User registered successfully',
      });
    });

    it('accepts a base64 image from JSON clients', async () => {
      const res = await request(app)
        .post('/register/')
        .send({ user_id: 'carol', face_image: asDataUrl('face:carol') })
        .expect(200);

      expect(res.body).toMatchObject({ success: true, user_id: 'carol', face_id: 'face-1' });
      await expect(gateway.listSubjects()).resolves.toEqual(['carol']);
    });

    it('rejects an image without a face and never issues a token', async () => {
      const issue = jest.spyOn(issuer, 'issue');

      const res = await request(app)
        .post('/register/')
        .field('user_id', 'alice')
        .attach('face_image', faceImage('no-face:wall'), 'wall.jpg')
        .expect(200);

      expect(res.body).toEqual({
        success: false,
        code: 'NO_FACE_DETECTED',
        message: 'No face detected in the image',
      });
      expect(issue).not.toHaveBeenCalled();
    });

    it('requires an image', async () => {
      const res = await request(app)
        .post('/register/')
        .field('user_id', 'alice')
        .expect(400);

      expect(res.body).toMatchObject({
        success: false,
        code: 'FACE_IMAGE_REQUIRED',
        message: 'face_image must contain an image',
      });
    });

    it('rejects an oversized upload with 413', async () => {
      const res = await request(app)
        .post('/register/')
        .field('user_id', 'alice')
        .attach('face_image', Buffer.alloc(MAX_FACE_IMAGE_BYTES + 1), 'big.jpg')
        .expect(413);

      expect(res.body).toMatchObject({
        success: false,
        code: 'FACE_IMAGE_TOO_LARGE',
        message: `face_image exceeds ${MAX_FACE_IMAGE_BYTES} bytes`,
      });
      expect(gateway.faceCount).toBe(0);
    });

    it('rejects an oversized base64 image with 413', async () => {
      const oversized = 'data:image/jpeg;base64,' + Buffer.alloc(MAX_FACE_IMAGE_BYTES + 3).toString('base64');

      const res = await request(app)
        .post('/register/')
        .send({ user_id: 'alice', face_image: oversized })
        .expect(413);

      expect(res.body).toMatchObject({
        success: false,
        code: 'FACE_IMAGE_TOO_LARGE',
        message: `face_image exceeds ${MAX_FACE_IMAGE_BYTES} bytes`,
      });
      expect(gateway.faceCount).toBe(0);
    });

    it('returns the existing face when deduplication is enabled', async () => {
      const dedupConfig = loadConfig({
        NODE_ENV: 'test',
        AUTH_SECRET: 'test-secret',
        ENROLLMENT_DEDUPLICATE: 'true',
      });
      const dedupApp = createApp({ config: dedupConfig, gateway, issuer });

      await request(dedupApp)
        .post('/register/')
        .field('user_id', 'alice')
        .attach('face_image', faceImage('face:alice'), 'alice.jpg')
        .expect(200);

      const res = await request(dedupApp)
        .post('/register/')
        .field('user_id', 'alice')
        .attach('face_image', faceImage('face:alice'), 'alice.jpg')
        .expect(200);

      expect(res.body).toEqual({
        success: true,
        user_id: 'alice',
        face_id: 'face-1',
        duplicate: true,
        message: 'User already registered with this face',
      });
      expect(gateway.faceCount).toBe(1);
    });

    it('validates the user id', async () => {
      const res = await request(app)
        .post('/register/')
        .field('user_id', 'alice smith')
        .attach('face_image', faceImage('face:alice'), 'alice.jpg')
        .expect(400);

      expect(res.body.code).toBe('VALIDATION_ERROR');
      expect(res.body.details.user_id).toEqual([
        'user_id may only contain letters, digits and the characters _ . - :',
      ]);
    });

    it('returns 503 when the matching service fails', async () => {
      gateway.failWith(new GatewayError('enroll', 'service_error', 'InternalServerError: boom'));

      const res = await request(app)
        .post('/register/')
        .field('user_id', 'alice')
        .attach('face_image', faceImage('face:alice'), 'alice.jpg')
        .expect(503);

      expect(res.body).toEqual({
        success: false,
        code: 'GATEWAY_UNAVAILABLE',
        message: 'Face matching service is unavailable, please retry later',
      });
    });
  });

  describe('POST /verify/', () => {
    beforeEach(async () => {
      await gateway.enroll('alice', faceImage('face:alice'));
    });

    it('issues a token for an enrolled face', async () => {
      const res = await request(app)
        .post('/verify/')
        .field('similarity_threshold', '90')
        .attach('face_image', faceImage('face:alice'), 'alice.jpg')
        .expect(200);

      expect(res.body).toMatchObject({
        success: true,
        user_id: 'alice',
        token_type: 'bearer',
        expires_in: 1800,
        message: 'Face verified successfully',
      });
      expect(res.body.similarity).toBeGreaterThanOrEqual(90);
      expect(typeof res.body.token).toBe('string');
      await expect(issuer.validate(res.body.token)).resolves.toBe('alice');
    });

    it('uses the configured default threshold', async () => {
      const search = jest.spyOn(gateway, 'search');

      await request(app)
        .post('/verify/')
        .attach('face_image', faceImage('face:alice'), 'alice.jpg')
        .expect(200);

      expect(search).toHaveBeenCalledWith(expect.any(Buffer), 90);
    });

    it('rejects an unenrolled face without a token', async () => {
      const res = await request(app)
        .post('/verify/')
        .field('similarity_threshold', '90')
        .attach('face_image', faceImage('face:stranger'), 'stranger.jpg')
        .expect(200);

      expect(res.body).toEqual({
        success: false,
        code: 'NO_MATCH',
        message: 'No matching face found',
      });
      expect(res.body.token).toBeUndefined();
    });

    it('refuses an out-of-range threshold', async () => {
      const res = await request(app)
        .post('/verify/')
        .field('similarity_threshold', '150')
        .attach('face_image', faceImage('face:alice'), 'alice.jpg')
        .expect(400);

      expect(res.body.code).toBe('VALIDATION_ERROR');
    });

    it('keeps gateway failures distinct from rejections', async () => {
      gateway.failWith(new GatewayError('search', 'timeout', 'Rekognition request timed out after 10000ms'));

      const res = await request(app)
        .post('/verify/')
        .set('X-Request-Id', 'req-verify')
        .attach('face_image', faceImage('face:alice'), 'alice.jpg')
        .expect(503);

      expect(res.body).toEqual({
        success: false,
        code: 'GATEWAY_TIMEOUT',
        message: 'Face matching service timed out, please retry later',
      });
      expect(console.error).toHaveBeenCalledWith(
        '[req-verify] [verification] Gateway failure (timeout) during search: Rekognition request timed out after 10000ms',
      );
      expect(console.warn).not.toHaveBeenCalled();
    });
  });

  describe('protected user routes', () => {
    beforeEach(async () => {
      await gateway.enroll('alice', faceImage('face:alice'));
      await gateway.enroll('bob', faceImage('face:bob'));
    });

    it('requires a bearer credential to list users', async () => {
      const res = await request(app).get('/users/').expect(401);

      expect(res.headers['www-authenticate']).toBe('Bearer');
      expect(res.body).toMatchObject({ success: false, code: 'UNAUTHENTICATED', message: 'Not authenticated' });
    });

    it('rejects tokens it did not sign', async () => {
      const forged = await new JwtCredentialIssuer({ ...config.auth, secret: 'other-secret' }).issue('alice');

      const res = await request(app)
        .get('/users/me/')
        .set('Authorization', `Bearer ${forged.token}`)
        .expect(401);

      expect(res.body.message).toBe('Could not validate credentials');
    });

    it('ignores non-bearer authorization schemes', async () => {
      await request(app)
        .get('/users/me/')
        .set('Authorization', 'Basic YWxpY2U6c2VjcmV0')
        .expect(401);
    });

    it('returns the caller', async () => {
      const res = await request(app)
        .get('/users/me/')
        .set('Authorization', `Bearer ${await tokenFor('alice')}`)
        .expect(200);

      expect(res.body).toEqual({ user_id: 'alice', email: null, full_name: null });
    });

    it('lists enrolled users', async () => {
      const res = await request(app)
        .get('/users/')
        .set('Authorization', `Bearer ${await tokenFor('alice')}`)
        .expect(200);

      expect(res.body).toEqual({ success: true, users: ['alice', 'bob'], total_count: 2 });
    });

    it('forbids deleting another user and leaves the gateway alone', async () => {
      const deleteBySubject = jest.spyOn(gateway, 'deleteBySubject');

      const res = await request(app)
        .delete('/users/alice/')
        .set('Authorization', `Bearer ${await tokenFor('bob')}`)
        .expect(403);

      expect(res.body).toMatchObject({
        success: false,
        code: 'FORBIDDEN',
        message: 'You can only delete your own user data',
      });
      expect(deleteBySubject).not.toHaveBeenCalled();
    });

    it('lets a user delete themselves, then reports them as not found', async () => {
      const token = await tokenFor('alice');

      const res = await request(app)
        .delete('/users/alice/')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(res.body).toEqual({
        message: 'User alice deleted successfully',
        user_id: 'alice',
        deleted_face_count: 1,
      });

      const again = await request(app)
        .delete('/users/alice/')
        .set('Authorization', `Bearer ${token}`)
        .expect(404);
      expect(again.body).toMatchObject({ code: 'NOT_FOUND', message: 'No faces found for user alice' });
    });

    it('returns 503 when listing fails in the gateway', async () => {
      gateway.failWith(new GatewayError('list', 'service_error', 'InternalServerError: boom'));

      const res = await request(app)
        .get('/users/')
        .set('Authorization', `Bearer ${await tokenFor('alice')}`)
        .expect(503);

      expect(res.body).toMatchObject({ success: false, code: 'GATEWAY_UNAVAILABLE' });
      expect(res.body.details).toBeUndefined();
    });

    it('hides unexpected failures behind a generic 500', async () => {
      jest.spyOn(gateway, 'listSubjects').mockRejectedValueOnce(new Error('connection pool exhausted'));

      const res = await request(app)
        .get('/users/')
        .set('Authorization', `Bearer ${await tokenFor('alice')}`)
        .set('X-Request-Id', 'req-500')
        .expect(500);

      expect(res.body).toEqual({
        success: false,
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        requestId: 'req-500',
        timestamp: expect.any(String),
      });
    });
  });

  describe('end-to-end', () => {
    it('enrolls, verifies and uses the issued token', async () => {
      await request(app)
        .post('/register/')
        .field('user_id', 'alice')
        .attach('face_image', faceImage('face:alice'), 'alice.jpg')
        .expect(200);

      const verified = await request(app)
        .post('/verify/')
        .attach('face_image', faceImage('face:alice'), 'alice.jpg')
        .expect(200);

      const me = await request(app)
        .get('/users/me/')
        .set('Authorization', `Bearer ${verified.body.token}`)
        .expect(200);

      expect(me.body).toEqual({ user_id: 'alice', email: null, full_name: null });
    });
  });

  describe('service routes', () => {
    it('reports health without authentication', async () => {
      const res = await request(app).get('/health').expect(200);

      expect(res.body).toEqual({ status: 'healthy', version: '1.0.0', timestamp: expect.any(String) });
    });

    it('welcomes clients at the root', async () => {
      const res = await request(app).get('/').expect(200);

      expect(res.body).toEqual({ message: 'Welcome to Face Lock Server' });
    });

    it('directs password grants to face verification', async () => {
      const res = await request(app).post('/token').expect(400);

      expect(res.body.code).toBe('USE_FACE_VERIFICATION');
    });

    it('echoes the request id', async () => {
      const res = await request(app).get('/health').set('X-Request-Id', 'req-health').expect(200);

      expect(res.headers['x-request-id']).toBe('req-health');
    });

    it('answers unknown routes with 404', async () => {
      const res = await request(app).get('/nope').expect(404);

      expect(res.body).toMatchObject({ success: false, code: 'NOT_FOUND', message: 'Route not found' });
    });
  });
});
