import type { Article, AnchorPoint, Annotation, RecordKind } from './types.js';

/** How a field's value is represented remotely */
export type ValueKind = 'string' | 'quantity' | 'item';

/** Label role: property ids key values, item ids classify or terminate */
export type TagRole = 'property' | 'item';

export interface FieldSpec<T> {
  key: keyof T & string;
  label: string;
  value: ValueKind;
}

/** Static description of one record kind: its own item label plus its tagged fields */
export interface RecordSchema<T> {
  kind: RecordKind;
  /** Item labels referenced by values but not classifying any record */
  references: readonly string[];
  fields: readonly FieldSpec<T>[];
}

/** Sentinel item closing an article's anchor chain */
export const TERMINUS_LABEL = 'terminus';

export const annotationSchema: RecordSchema<Annotation> = {
  kind: 'annotation',
  references: [],
  fields: [
    { key: 'term', label: 'term found', value: 'string' },
    { key: 'length', label: 'length of term found', value: 'quantity' },
    { key: 'wikidataCode', label: 'Wikidata item code', value: 'string' },
    { key: 'dictionary', label: 'dictionary name', value: 'string' },
    { key: 'timeCode', label: 'time code1', value: 'string' },
    { key: 'instanceOf', label: 'instance of', value: 'item' },
  ],
};

export const anchorPointSchema: RecordSchema<AnchorPoint> = {
  kind: 'anchor point',
  references: [TERMINUS_LABEL],
  fields: [
    { key: 'precedingPhrase', label: 'preceding phrase', value: 'string' },
    { key: 'followingPhrase', label: 'following phrase', value: 'string' },
    { key: 'distanceToPreceding', label: 'distance to preceding', value: 'quantity' },
    { key: 'distanceToFollowing', label: 'distance to following', value: 'quantity' },
    { key: 'characterNumber', label: 'character number', value: 'quantity' },
    { key: 'timeCode', label: 'time code1', value: 'string' },
    { key: 'instanceOf', label: 'instance of', value: 'item' },
    { key: 'scienceSourceTitle', label: 'ScienceSource article title', value: 'string' },
    { key: 'anchorPointIn', label: 'anchor point in', value: 'item' },
    { key: 'precedingAnchor', label: 'preceding anchor point', value: 'item' },
    { key: 'followingAnchor', label: 'following anchor point', value: 'item' },
    { key: 'anchors', label: 'anchors', value: 'item' },
  ],
};

export const articleSchema: RecordSchema<Article> = {
  kind: 'article',
  references: [TERMINUS_LABEL],
  fields: [
    { key: 'wikidataCode', label: 'Wikidata item code', value: 'string' },
    { key: 'title', label: 'article text title', value: 'string' },
    { key: 'publicationDate', label: 'publication date', value: 'string' },
    { key: 'timeCode', label: 'time code1', value: 'string' },
    { key: 'characterNumber', label: 'character number', value: 'quantity' },
    { key: 'precedingPhrase', label: 'preceding phrase', value: 'string' },
    { key: 'followingPhrase', label: 'following phrase', value: 'string' },
    { key: 'instanceOf', label: 'instance of', value: 'item' },
    { key: 'scienceSourceTitle', label: 'ScienceSource article title', value: 'string' },
    { key: 'pageId', label: 'page ID', value: 'quantity' },
    { key: 'followingAnchor', label: 'following anchor point', value: 'item' },
  ],
};

/** Anything the tag registry can inspect */
export interface LabelSource {
  kind?: string;
  references?: readonly string[];
  fields: readonly { label: string }[];
}

export const ALL_SCHEMAS: readonly LabelSource[] = [annotationSchema, anchorPointSchema, articleSchema];

/** Fields each record kind only learns once the anchor chain is closed */
export const LINK_FIELDS = {
  'anchor point': ['precedingAnchor', 'followingAnchor'],
  article: ['followingAnchor'],
} as const satisfies { 'anchor point': readonly (keyof AnchorPoint & string)[]; article: readonly (keyof Article & string)[] };
