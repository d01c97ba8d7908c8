/** Raw encoded image bytes (JPEG or PNG) as received from the client. */
export type FaceImage = Uint8Array;

export type GatewayOperation = 'setup' | 'enroll' | 'search' | 'delete' | 'list';

export type GatewayEnrollOutcome =
  | { kind: 'enrolled'; faceHandle: string; confidence: number }
  | { kind: 'no_face' };

export type GatewaySearchOutcome =
  | { kind: 'match'; subjectId: string; faceHandle: string; similarity: number }
  | { kind: 'no_match' }
  | { kind: 'no_face' };

export type GatewayDeleteOutcome =
  | { kind: 'deleted'; deletedCount: number }
  | { kind: 'not_found' };

/**
 * Face registry and matcher. Expected negative outcomes come back as tagged
 * results; infrastructure failures are thrown as `GatewayError`.
 */
export interface FaceGateway {
  enroll(subjectId: string, image: FaceImage): Promise<GatewayEnrollOutcome>;
  /** Best single match whose similarity (0-100) is at least `minSimilarity`. */
  search(image: FaceImage, minSimilarity: number): Promise<GatewaySearchOutcome>;
  deleteBySubject(subjectId: string): Promise<GatewayDeleteOutcome>;
  /** Sorted, unique subject ids that own at least one face record. */
  listSubjects(): Promise<string[]>;
}
