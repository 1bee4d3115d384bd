import { readFile, writeFile, rename } from 'node:fs/promises';
import type { Article } from '../shared/types.js';
import { articleFromRecord, articleRecordSchema, articleToRecord } from '../shared/record.js';
import { PersistenceError } from '../sync/errors.js';

/**
 * JSON file holding one article graph, with atomic writes.
 *
 * Uses a write queue so checkpoints issued in quick succession land in order.
 * Reads are always from disk so a resumed run sees exactly what the last
 * confirmed checkpoint wrote.
 */
export class ArticleStorage {
  readonly filePath: string;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async load(): Promise<Article> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      throw new PersistenceError(this.filePath, 'Failed to read article', err);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError(this.filePath, 'Article file is not valid JSON', err);
    }

    const parsed = articleRecordSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new PersistenceError(this.filePath, `Invalid article record at "${issue.path.join('.')}": ${issue.message}`);
    }
    return articleFromRecord(parsed.data);
  }

  /**
   * Write the graph as it is now. The article is serialised before the write
   * is queued, so later in-memory changes do not leak into this snapshot.
   */
  async save(article: Article): Promise<void> {
    const json = JSON.stringify(articleToRecord(article), null, 2) + '\n';
    let error: unknown;

    this.writeQueue = this.writeQueue
      .then(async () => {
        const tmpPath = this.filePath + '.tmp';
        await writeFile(tmpPath, json, 'utf-8');
        await rename(tmpPath, this.filePath);
      })
      .catch((err) => {
        error = err;
      });

    await this.writeQueue;
    if (error !== undefined) throw new PersistenceError(this.filePath, 'Failed to write article', error);
  }
}

export function saveArticle(article: Article, destination: string): Promise<void> {
  return new ArticleStorage(destination).save(article);
}

export function loadArticle(source: string): Promise<Article> {
  return new ArticleStorage(source).load();
}
