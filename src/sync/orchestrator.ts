import type { AnchorPoint, Article, TagMaps, UploadStage } from '../shared/types.js';
import type { RecordSchema } from '../shared/schema.js';
import { anchorPointSchema, annotationSchema, articleSchema, LINK_FIELDS, TERMINUS_LABEL } from '../shared/schema.js';
import type { KnowledgeStoreClient } from './store-client.js';
import { StageError, StoreRequestError, SyncError, UploadError } from './errors.js';
import { advanceStage, assignId, computeAnchorChain } from './graph.js';
import { classify, itemIdFor, translateFields } from './translate.js';
import { log } from '../shared/log.js';

export interface SyncContext {
  client: KnowledgeStoreClient;
  maps: TagMaps;
  /** Awaited after every confirmed remote write; persist the graph here */
  checkpoint?: (article: Article) => Promise<void>;
}

/**
 * Push the article text and record the page id it was given.
 * Store errors propagate as thrown.
 */
export async function uploadArticle(client: KnowledgeStoreClient, article: Article, content: string): Promise<number> {
  const title = article.scienceSourceTitle ?? article.title;
  const pageId = await client.createArticle(title, content);
  article.scienceSourceTitle = title;
  article.pageId = pageId;
  return pageId;
}

async function uploadArticleItem(article: Article, content: string, ctx: SyncContext): Promise<void> {
  if (article.pageId === undefined) {
    await uploadArticle(ctx.client, article, content);
    await save(article, ctx);
  }

  if (article.id === undefined) {
    classify(article, ctx.maps);
    const properties = translateFields(article, articleSchema, ctx.maps, creationFields(articleSchema, LINK_FIELDS.article));
    assignId(article, await ctx.client.createItem(article.kind, properties));
    await save(article, ctx);
  }

  for (const point of article.anchorPoints) {
    point.anchorPointIn = article.id;
    point.scienceSourceTitle = article.scienceSourceTitle;
  }
}

async function uploadAnnotations(article: Article, ctx: SyncContext): Promise<void> {
  for (const point of article.anchorPoints) {
    const annotation = point.annotation;
    if (annotation.id === undefined) {
      classify(annotation, ctx.maps);
      const properties = translateFields(annotation, annotationSchema, ctx.maps);
      assignId(annotation, await ctx.client.createItem(annotation.kind, properties));
      await save(article, ctx);
    }

    if (point.id === undefined) {
      point.anchors = annotation.id;
      classify(point, ctx.maps);
      const properties = translateFields(point, anchorPointSchema, ctx.maps, creationFields(anchorPointSchema, LINK_FIELDS['anchor point']));
      assignId(point, await ctx.client.createItem(point.kind, properties));
      await save(article, ctx);
    }
  }
}

async function linkAnchorPoints(article: Article, ctx: SyncContext): Promise<void> {
  if (article.anchorPoints.length === 0) return;

  const chain = computeAnchorChain(article, itemIdFor(ctx.maps, TERMINUS_LABEL));

  for (const [i, point] of article.anchorPoints.entries()) {
    if (point.precedingAnchor !== undefined && point.followingAnchor !== undefined) continue;
    const link = chain.links[i];
    const linked: AnchorPoint = { ...point, precedingAnchor: link.preceding, followingAnchor: link.following };
    const properties = translateFields(linked, anchorPointSchema, ctx.maps, LINK_FIELDS['anchor point']);
    // Only update locally once the store has confirmed the references
    await ctx.client.updateItem(requireId(point.id), properties);
    point.precedingAnchor = link.preceding;
    point.followingAnchor = link.following;
    await save(article, ctx);
  }

  if (article.followingAnchor === undefined && chain.articleFollowing !== undefined) {
    const linked: Article = { ...article, followingAnchor: chain.articleFollowing };
    const properties = translateFields(linked, articleSchema, ctx.maps, LINK_FIELDS.article);
    await ctx.client.updateItem(requireId(article.id), properties);
    article.followingAnchor = chain.articleFollowing;
    await save(article, ctx);
  }
}

type StageStep = (article: Article, content: string, ctx: SyncContext) => Promise<void>;

const STEPS: ReadonlyArray<{ from: UploadStage; to: UploadStage; run: StageStep }> = [
  { from: 'unsubmitted', to: 'article_uploaded', run: uploadArticleItem },
  { from: 'article_uploaded', to: 'annotations_uploaded', run: (article, _content, ctx) => uploadAnnotations(article, ctx) },
  { from: 'annotations_uploaded', to: 'linked', run: (article, _content, ctx) => linkAnchorPoints(article, ctx) },
];

/**
 * Drive `article` from its current stage to `linked`.
 *
 * Records that already carry their remote id are not uploaded again, so a
 * failed run can be repeated on the reloaded graph. On failure the article
 * keeps the last stage it completed.
 */
export async function syncArticle(article: Article, content: string, ctx: SyncContext): Promise<Article> {
  for (const step of STEPS) {
    if (article.stage !== step.from) continue;
    try {
      await step.run(article, content, ctx);
    } catch (err) {
      // Local faults (schema, stage, persistence) are not upload failures
      if (err instanceof SyncError && !(err instanceof StoreRequestError)) throw err;
      throw new UploadError(step.from, article.title, err);
    }
    advanceStage(article, step.to);
    log(`"${article.title}" reached ${step.to}`);
    await save(article, ctx);
  }
  return article;
}

function creationFields<T>(schema: RecordSchema<T>, exclude: readonly string[]): (keyof T & string)[] {
  return schema.fields.map(f => f.key).filter(key => !exclude.includes(key));
}

function requireId(id: string | undefined): string {
  if (id === undefined) {
    throw new StageError('Record has no remote id to update');
  }
  return id;
}

async function save(article: Article, ctx: SyncContext): Promise<void> {
  if (!ctx.checkpoint) return;
  await ctx.checkpoint(article);
  log(`checkpoint "${article.title}" at ${article.stage}`);
}
