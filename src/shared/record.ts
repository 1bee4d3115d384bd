import { z } from 'zod';
import type { Article, AnchorPoint, Annotation } from './types.js';
import { inferStage } from '../sync/graph.js';
import { warn } from './log.js';

/*
 * On-disk layout: one object per article, keyed as in the published
 * ScienceSource data schema. Unset text is "" and an unset page id is 0,
 * the same as other tools reading these files expect.
 */

const text = z.string().default('');
const count = z.number().default(0);

export const annotationRecordSchema = z.object({
  term: text,
  length: count,
  wikidata: text,
  dictionary: text,
  time: text,
  instance_of: text,
  id: text,
});

export const anchorPointRecordSchema = z.object({
  preceding_phrase: text,
  following_phrase: text,
  preceding_distance: count,
  following_distance: count,
  character: count,
  time: text,
  instance_of: text,
  science_source_title: text,
  point: text,
  preceding_anchor: text,
  following_anchor: text,
  anchors: text,
  id: text,
  annotation: annotationRecordSchema,
});

export const articleRecordSchema = z.object({
  wikidata: text,
  title: text,
  publication_date: text,
  time: text,
  character: count,
  preceding_phrase: text,
  following_phrase: text,
  instance_of: text,
  science_source_title: text,
  page_id: z.number().int().nonnegative().default(0),
  following_anchor: text,
  id: text,
  stage: z.enum(['unsubmitted', 'article_uploaded', 'annotations_uploaded', 'linked']).optional(),
  annotations: z.array(anchorPointRecordSchema).default([]),
});

export type AnnotationRecord = z.output<typeof annotationRecordSchema>;
export type AnchorPointRecord = z.output<typeof anchorPointRecordSchema>;
export type ArticleRecord = z.output<typeof articleRecordSchema>;

function present(value: string): string | undefined {
  return value === '' ? undefined : value;
}

export function annotationToRecord(a: Annotation): AnnotationRecord {
  return {
    term: a.term,
    length: a.length,
    wikidata: a.wikidataCode,
    dictionary: a.dictionary,
    time: a.timeCode,
    instance_of: a.instanceOf ?? '',
    id: a.id ?? '',
  };
}

export function anchorPointToRecord(p: AnchorPoint): AnchorPointRecord {
  return {
    preceding_phrase: p.precedingPhrase,
    following_phrase: p.followingPhrase,
    preceding_distance: p.distanceToPreceding,
    following_distance: p.distanceToFollowing,
    character: p.characterNumber,
    time: p.timeCode,
    instance_of: p.instanceOf ?? '',
    science_source_title: p.scienceSourceTitle ?? '',
    point: p.anchorPointIn ?? '',
    preceding_anchor: p.precedingAnchor ?? '',
    following_anchor: p.followingAnchor ?? '',
    anchors: p.anchors ?? '',
    id: p.id ?? '',
    annotation: annotationToRecord(p.annotation),
  };
}

export function articleToRecord(a: Article): ArticleRecord {
  return {
    wikidata: a.wikidataCode,
    title: a.title,
    publication_date: a.publicationDate,
    time: a.timeCode,
    character: a.characterNumber,
    preceding_phrase: a.precedingPhrase,
    following_phrase: a.followingPhrase,
    instance_of: a.instanceOf ?? '',
    science_source_title: a.scienceSourceTitle ?? '',
    page_id: a.pageId ?? 0,
    following_anchor: a.followingAnchor ?? '',
    id: a.id ?? '',
    stage: a.stage,
    annotations: a.anchorPoints.map(anchorPointToRecord),
  };
}

export function annotationFromRecord(r: AnnotationRecord): Annotation {
  return {
    kind: 'annotation',
    term: r.term,
    length: r.length,
    wikidataCode: r.wikidata,
    dictionary: r.dictionary,
    timeCode: r.time,
    instanceOf: present(r.instance_of),
    id: present(r.id),
  };
}

export function anchorPointFromRecord(r: AnchorPointRecord): AnchorPoint {
  return {
    kind: 'anchor point',
    precedingPhrase: r.preceding_phrase,
    followingPhrase: r.following_phrase,
    distanceToPreceding: r.preceding_distance,
    distanceToFollowing: r.following_distance,
    characterNumber: r.character,
    timeCode: r.time,
    instanceOf: present(r.instance_of),
    scienceSourceTitle: present(r.science_source_title),
    anchorPointIn: present(r.point),
    precedingAnchor: present(r.preceding_anchor),
    followingAnchor: present(r.following_anchor),
    anchors: present(r.anchors),
    id: present(r.id),
    annotation: annotationFromRecord(r.annotation),
  };
}

/** Records written before stage markers existed get a stage derived from their fields */
export function articleFromRecord(r: ArticleRecord): Article {
  const article: Article = {
    kind: 'article',
    wikidataCode: r.wikidata,
    title: r.title,
    publicationDate: r.publication_date,
    timeCode: r.time,
    characterNumber: r.character,
    precedingPhrase: r.preceding_phrase,
    followingPhrase: r.following_phrase,
    instanceOf: present(r.instance_of),
    scienceSourceTitle: present(r.science_source_title),
    pageId: r.page_id === 0 ? undefined : r.page_id,
    followingAnchor: present(r.following_anchor),
    id: present(r.id),
    stage: 'unsubmitted',
    anchorPoints: r.annotations.map(anchorPointFromRecord),
  };
  if (r.stage !== undefined) {
    article.stage = r.stage;
  } else {
    article.stage = inferStage(article);
    warn(`"${article.title}" has no stage marker; inferred ${article.stage}`);
  }
  return article;
}
