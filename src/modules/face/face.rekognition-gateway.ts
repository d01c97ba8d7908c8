import {
  CreateCollectionCommand,
  DeleteFacesCommand,
  IndexFacesCommand,
  ListFacesCommand,
  RekognitionClient,
  SearchFacesByImageCommand,
} from '@aws-sdk/client-rekognition';
import { AppError } from '../../common/errors/app-error';
import type { RekognitionConfig } from '../../config';
import {
  CallTimeoutError,
  createRekognitionClient,
  hasErrorName,
  withTimeout,
} from '../../infrastructure/rekognition/rekognition-client';
import { GatewayError, InvalidFaceImageError } from './face.errors';
import {
  FaceGateway,
  FaceImage,
  GatewayDeleteOutcome,
  GatewayEnrollOutcome,
  GatewayOperation,
  GatewaySearchOutcome,
} from './face.types';

const LIST_PAGE_SIZE = 1000;
const DELETE_BATCH_SIZE = 4096;

const IMAGE_ERROR_NAMES = ['InvalidImageFormatException', 'ImageTooLargeException'];

interface FaceRecordRef {
  faceId: string;
  subjectId: string;
}

export class RekognitionFaceGateway implements FaceGateway {
  private readonly collectionId: string;
  private readonly timeoutMs: number;

  constructor(
    config: RekognitionConfig,
    private readonly client: RekognitionClient = createRekognitionClient(config),
  ) {
    this.collectionId = config.collectionId;
    this.timeoutMs = config.requestTimeoutMs;
  }

  async ensureCollection(): Promise<void> {
    await this.execute('setup', async () => {
      try {
        await this.client.send(new CreateCollectionCommand({ CollectionId: this.collectionId }));
        console.log(`[rekognition] Created collection ${this.collectionId}`);
      } catch (error) {
        if (hasErrorName(error, 'ResourceAlreadyExistsException')) {
          console.log(`[rekognition] Collection ${this.collectionId} already exists`);
          return;
        }
        throw error;
      }
    });
  }

  async enroll(subjectId: string, image: FaceImage): Promise<GatewayEnrollOutcome> {
    const response = await this.execute('enroll', () =>
      this.rejectBadImages(
        this.client.send(
          new IndexFacesCommand({
            CollectionId: this.collectionId,
            Image: { Bytes: image },
            ExternalImageId: subjectId,
            MaxFaces: 1,
            QualityFilter: 'AUTO',
            DetectionAttributes: ['DEFAULT'],
          }),
        ),
      ),
    );

    const face = response.FaceRecords?.[0]?.Face;
    if (!face?.FaceId) {
      return { kind: 'no_face' };
    }

    return {
      kind: 'enrolled',
      faceHandle: face.FaceId,
      confidence: face.Confidence ?? 0,
    };
  }

  async search(image: FaceImage, minSimilarity: number): Promise<GatewaySearchOutcome> {
    const response = await this.execute('search', async () => {
      try {
        return await this.rejectBadImages(
          this.client.send(
            new SearchFacesByImageCommand({
              CollectionId: this.collectionId,
              Image: { Bytes: image },
              MaxFaces: 1,
              FaceMatchThreshold: minSimilarity,
            }),
          ),
        );
      } catch (error) {
        // Raised when the probe image contains no detectable face.
        if (hasErrorName(error, 'InvalidParameterException')) {
          return undefined;
        }
        throw error;
      }
    });

    if (response === undefined) {
      return { kind: 'no_face' };
    }

    const best = response.FaceMatches?.[0];
    const subjectId = best?.Face?.ExternalImageId;
    if (!best || !subjectId || best.Similarity === undefined) {
      return { kind: 'no_match' };
    }

    return {
      kind: 'match',
      subjectId,
      faceHandle: best.Face?.FaceId ?? '',
      similarity: best.Similarity,
    };
  }

  async deleteBySubject(subjectId: string): Promise<GatewayDeleteOutcome> {
    const faceIds = (await this.listFaceRecords('delete'))
      .filter((record) => record.subjectId === subjectId)
      .map((record) => record.faceId);

    if (faceIds.length === 0) {
      return { kind: 'not_found' };
    }

    let deletedCount = 0;
    for (let i = 0; i < faceIds.length; i += DELETE_BATCH_SIZE) {
      const batch = faceIds.slice(i, i + DELETE_BATCH_SIZE);
      const response = await this.execute('delete', () =>
        this.client.send(
          new DeleteFacesCommand({
            CollectionId: this.collectionId,
            FaceIds: batch,
          }),
        ),
      );
      deletedCount += response.DeletedFaces?.length ?? 0;
    }

    return { kind: 'deleted', deletedCount };
  }

  async listSubjects(): Promise<string[]> {
    const subjects = new Set((await this.listFaceRecords('list')).map((record) => record.subjectId));
    return Array.from(subjects).sort();
  }

  private async listFaceRecords(operation: GatewayOperation): Promise<FaceRecordRef[]> {
    const records: FaceRecordRef[] = [];
    let nextToken: string | undefined;

    do {
      const response = await this.execute(operation, () =>
        this.client.send(
          new ListFacesCommand({
            CollectionId: this.collectionId,
            MaxResults: LIST_PAGE_SIZE,
            NextToken: nextToken,
          }),
        ),
      );

      for (const face of response.Faces ?? []) {
        if (face.FaceId && face.ExternalImageId) {
          records.push({ faceId: face.FaceId, subjectId: face.ExternalImageId });
        }
      }

      nextToken = response.NextToken;
    } while (nextToken);

    return records;
  }

  private async rejectBadImages<T>(call: Promise<T>): Promise<T> {
    try {
      return await call;
    } catch (error) {
      if (hasErrorName(error, ...IMAGE_ERROR_NAMES)) {
        throw new InvalidFaceImageError(error instanceof Error ? error.name : 'unknown');
      }
      throw error;
    }
  }

  private async execute<T>(operation: GatewayOperation, call: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(call(), this.timeoutMs);
    } catch (error) {
      throw toGatewayError(operation, error);
    }
  }
}

function toGatewayError(operation: GatewayOperation, error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof CallTimeoutError) {
    return new GatewayError(operation, 'timeout', error.message);
  }

  const detail = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  return new GatewayError(operation, 'service_error', detail);
}
