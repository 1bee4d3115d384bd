import type { Article, UploadStage } from '../shared/types.js';
import { stageIndex } from '../shared/types.js';
import { StageError } from './errors.js';

/** Preceding/following references for one anchor point */
export interface AnchorLink {
  preceding: string;
  following: string;
}

export interface AnchorChain {
  /** Same order as `article.anchorPoints` */
  links: AnchorLink[];
  /** First anchor point; absent when the article has none */
  articleFollowing?: string;
}

/** Record a remote id. Once set, an id never changes. */
export function assignId(record: { kind: string; id?: string }, id: string): void {
  if (record.id !== undefined && record.id !== id) {
    throw new StageError(`${record.kind} already has remote id ${record.id}, refusing to replace it with ${id}`);
  }
  record.id = id;
}

/** Move the article one stage forward */
export function advanceStage(article: Article, next: UploadStage): void {
  if (stageIndex(next) !== stageIndex(article.stage) + 1) {
    throw new StageError(`Cannot move "${article.title}" from ${article.stage} to ${next}`);
  }
  article.stage = next;
}

/**
 * Work out the chain references once every record has its remote id.
 *
 * The article item heads the chain and the terminus item closes it.
 */
export function computeAnchorChain(article: Article, terminusId: string): AnchorChain {
  const articleId = article.id;
  if (articleId === undefined) {
    throw new StageError(`Article "${article.title}" has no remote id yet`);
  }
  const ids = article.anchorPoints.map((point, i) => {
    if (point.id === undefined) {
      throw new StageError(`Anchor point ${i} of "${article.title}" has no remote id yet`);
    }
    return point.id;
  });

  const links = ids.map((_, i) => ({
    preceding: i === 0 ? articleId : ids[i - 1],
    following: i === ids.length - 1 ? terminusId : ids[i + 1],
  }));

  return ids.length > 0 ? { links, articleFollowing: ids[0] } : { links };
}

/**
 * Check the chain against the ids it should hold: the article heads it, each
 * anchor point references both neighbours, and the last one references the
 * terminus. Without `terminusId` the last reference only has to be present.
 * Returns one message per broken link; empty means consistent.
 */
export function verifyAnchorChain(article: Article, terminusId?: string): string[] {
  const problems: string[] = [];
  const points = article.anchorPoints;

  if (article.id === undefined) problems.push('article has no remote id');

  for (let i = 0; i < points.length; i++) {
    const point = points[i];
    if (point.id === undefined) {
      problems.push(`anchor point ${i} has no remote id`);
      continue;
    }

    const preceding = i === 0 ? article.id : points[i - 1].id;
    if (point.precedingAnchor === undefined) {
      problems.push(`anchor point ${i} has no preceding reference`);
    } else if (preceding !== undefined && point.precedingAnchor !== preceding) {
      problems.push(`anchor point ${i} should follow ${i === 0 ? 'the article ' : ''}${preceding}, found ${point.precedingAnchor}`);
    }

    const last = i === points.length - 1;
    const following = last ? terminusId : points[i + 1].id;
    if (point.followingAnchor === undefined) {
      problems.push(`anchor point ${i} has no following reference`);
    } else if (following !== undefined && point.followingAnchor !== following) {
      problems.push(`anchor point ${i} should lead to ${last ? 'the terminus ' : ''}${following}, found ${point.followingAnchor}`);
    }
  }

  const first = points.length > 0 ? points[0].id : undefined;
  if (first !== undefined && article.followingAnchor !== first) {
    problems.push(`article should lead to anchor point 0 ${first}, found ${article.followingAnchor ?? '(none)'}`);
  }

  return problems;
}

/**
 * Derive the stage from which fields are filled in.
 * Used for records saved without a stage marker.
 */
export function inferStage(article: Article): UploadStage {
  if (article.pageId === undefined || article.id === undefined) return 'unsubmitted';

  // The first stage ends by pointing every anchor point at the article item
  const points = article.anchorPoints;
  if (points.some(p => p.anchorPointIn !== article.id)) return 'unsubmitted';
  if (points.some(p => p.id === undefined || p.annotation.id === undefined)) return 'article_uploaded';

  const linked = points.every(p => p.precedingAnchor !== undefined && p.followingAnchor !== undefined)
    && (points.length === 0 || article.followingAnchor !== undefined);
  return linked ? 'linked' : 'annotations_uploaded';
}
