/** Record kinds; each string is also the remote item label that classifies the record */
export type RecordKind = 'article' | 'anchor point' | 'annotation';

/** Upload lifecycle of one article graph */
export type UploadStage = 'unsubmitted' | 'article_uploaded' | 'annotations_uploaded' | 'linked';

export const UPLOAD_STAGES: readonly UploadStage[] = [
  'unsubmitted',
  'article_uploaded',
  'annotations_uploaded',
  'linked',
];

/** The term found in the text */
export interface Annotation {
  kind: 'annotation';
  term: string;
  length: number;
  wikidataCode: string;
  dictionary: string;
  timeCode: string;
  instanceOf?: string;
  id?: string;
}

/** One located occurrence of a term in the article text */
export interface AnchorPoint {
  kind: 'anchor point';
  precedingPhrase: string;
  followingPhrase: string;
  distanceToPreceding: number;
  distanceToFollowing: number;
  characterNumber: number;
  timeCode: string;
  instanceOf?: string;
  scienceSourceTitle?: string;
  /** Remote id of the owning article item */
  anchorPointIn?: string;
  /** Remote id of the previous anchor point, or of the article for the first one */
  precedingAnchor?: string;
  /** Remote id of the next anchor point, or of the terminus for the last one */
  followingAnchor?: string;
  /** Remote id of the annotation item */
  anchors?: string;
  id?: string;
  annotation: Annotation;
}

export interface Article {
  kind: 'article';
  wikidataCode: string;
  title: string;
  publicationDate: string;
  timeCode: string;
  /** Passed through untouched; usually 0 */
  characterNumber: number;
  precedingPhrase: string;
  followingPhrase: string;
  instanceOf?: string;
  scienceSourceTitle?: string;
  pageId?: number;
  followingAnchor?: string;
  id?: string;
  stage: UploadStage;
  /** Document order */
  anchorPoints: AnchorPoint[];
}

/** Discriminated union — all uploadable records */
export type SyncRecord = Article | AnchorPoint | Annotation;

/** Resolved label → remote id maps for one session */
export interface TagMaps {
  readonly properties: ReadonlyMap<string, string>;
  readonly items: ReadonlyMap<string, string>;
}

/** A value attached to an item under a property id */
export type PropertyValue =
  | { type: 'string'; value: string }
  | { type: 'quantity'; value: number }
  | { type: 'item'; id: string };

/** Payload for one remote item: property id → value */
export type PropertyPayload = Record<string, PropertyValue>;

export type ArticleFields = Omit<Article, 'kind' | 'stage' | 'anchorPoints'>;
export type AnchorPointFields = Omit<AnchorPoint, 'kind' | 'annotation'>;
export type AnnotationFields = Omit<Annotation, 'kind'>;

export function createAnnotation(fields: AnnotationFields): Annotation {
  return { kind: 'annotation', ...fields };
}

export function createAnchorPoint(fields: AnchorPointFields, annotation: Annotation): AnchorPoint {
  return { kind: 'anchor point', ...fields, annotation };
}

export function createArticle(fields: ArticleFields, anchorPoints: AnchorPoint[] = []): Article {
  return { kind: 'article', ...fields, stage: 'unsubmitted', anchorPoints };
}

export function stageIndex(stage: UploadStage): number {
  return UPLOAD_STAGES.indexOf(stage);
}
