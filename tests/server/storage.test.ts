import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFileSync, readFileSync, existsSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ArticleStorage, loadArticle, saveArticle } from '../../src/server/storage.js';
import { PersistenceError } from '../../src/sync/errors.js';
import { syncArticle } from '../../src/sync/orchestrator.js';
import { FakeStoreClient, makeArticle, makeTagMaps } from '../helpers/fixtures.js';

const TEST_DIR = join(tmpdir(), 'ss-storage-' + Date.now());
const TEST_FILE = join(TEST_DIR, 'article.json');

describe('ArticleStorage', () => {
  beforeEach(() => {
    if (!existsSync(TEST_DIR)) mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  describe('save', () => {
    it('writes the short-key layout', async () => {
      const article = makeArticle(['malaria']);
      article.pageId = 5000;
      article.anchorPoints[0].precedingAnchor = 'Q100';

      await new ArticleStorage(TEST_FILE).save(article);

      const data = JSON.parse(readFileSync(TEST_FILE, 'utf-8'));
      expect(data.title).toBe('Test Article');
      expect(data.page_id).toBe(5000);
      expect(data.following_anchor).toBe('');
      expect(data.stage).toBe('unsubmitted');
      expect(data.annotations[0].preceding_anchor).toBe('Q100');
      expect(data.annotations[0].character).toBe(100);
      expect(data.annotations[0].annotation).toEqual({
        term: 'malaria',
        length: 7,
        wikidata: 'Q12345',
        dictionary: 'test dictionary',
        time: '2018-06-01T12:00:00Z',
        instance_of: '',
        id: '',
      });
    });

    it('ends the file with a newline and leaves no temp file behind', async () => {
      await new ArticleStorage(TEST_FILE).save(makeArticle());

      expect(readFileSync(TEST_FILE, 'utf-8').endsWith('}\n')).toBe(true);
      expect(existsSync(TEST_FILE + '.tmp')).toBe(false);
    });

    it('writes queued snapshots in order', async () => {
      const storage = new ArticleStorage(TEST_FILE);
      const article = makeArticle();

      const first = storage.save(article);
      article.stage = 'article_uploaded';
      const second = storage.save(article);
      await Promise.all([first, second]);

      expect((await storage.load()).stage).toBe('article_uploaded');
    });

    it('reports a write into a missing directory as a persistence error', async () => {
      const storage = new ArticleStorage(join(TEST_DIR, 'missing', 'article.json'));

      await expect(storage.save(makeArticle())).rejects.toBeInstanceOf(PersistenceError);
    });
  });

  describe('load', () => {
    it('round-trips an article without anchor points', async () => {
      const article = makeArticle();

      await saveArticle(article, TEST_FILE);

      expect(await loadArticle(TEST_FILE)).toEqual(article);
    });

    it('round-trips a partially uploaded graph in document order', async () => {
      const article = makeArticle(['malaria', 'fever', 'cough']);
      article.stage = 'article_uploaded';
      article.pageId = 5000;
      article.id = 'Q100';
      article.instanceOf = 'Q4';
      article.scienceSourceTitle = 'Test Article';
      article.anchorPoints[0].annotation.id = 'Q101';
      article.anchorPoints[0].id = 'Q102';
      article.anchorPoints[0].anchors = 'Q101';
      for (const point of article.anchorPoints) point.anchorPointIn = 'Q100';

      await saveArticle(article, TEST_FILE);
      const loaded = await loadArticle(TEST_FILE);

      expect(loaded).toEqual(article);
      expect(loaded.anchorPoints.map(p => p.annotation.term)).toEqual(['malaria', 'fever', 'cough']);
    });

    it('keeps a non-zero article character number as given', async () => {
      const article = makeArticle();
      article.characterNumber = 42;

      await saveArticle(article, TEST_FILE);

      expect((await loadArticle(TEST_FILE)).characterNumber).toBe(42);
    });

    it('infers the stage of a record saved without one', async () => {
      writeFileSync(TEST_FILE, JSON.stringify({
        title: 'Legacy',
        page_id: 7,
        id: 'Q9',
        annotations: [],
      }), 'utf-8');

      const loaded = await loadArticle(TEST_FILE);

      expect(loaded.stage).toBe('linked');
      expect(loaded.title).toBe('Legacy');
      expect(loaded.wikidataCode).toBe('');
      expect(loaded.pageId).toBe(7);
    });

    it('reads an empty optional string and a zero page id back as absent', async () => {
      const article = makeArticle();
      article.scienceSourceTitle = '';
      article.pageId = 0;

      await saveArticle(article, TEST_FILE);
      const loaded = await loadArticle(TEST_FILE);

      expect(loaded.scienceSourceTitle).toBeUndefined();
      expect(loaded.pageId).toBeUndefined();
    });

    it('warns when it has to infer a stage', async () => {
      const warnings = vi.spyOn(console, 'warn').mockImplementation(() => {});
      writeFileSync(TEST_FILE, JSON.stringify({ title: 'Legacy', annotations: [] }), 'utf-8');

      await loadArticle(TEST_FILE);

      expect(warnings).toHaveBeenCalledWith('[sciencesource-sync] "Legacy" has no stage marker; inferred unsubmitted');
      warnings.mockRestore();
    });

    it('reruns the article stage for a record whose anchor points do not reference the article', async () => {
      writeFileSync(TEST_FILE, JSON.stringify({
        title: 'Legacy',
        page_id: 7,
        id: 'Q9',
        annotations: [{ character: 12, annotation: { term: 'fever' } }],
      }), 'utf-8');

      const loaded = await loadArticle(TEST_FILE);
      expect(loaded.stage).toBe('unsubmitted');

      const client = new FakeStoreClient();
      await syncArticle(loaded, '<p>fever</p>', { client, maps: makeTagMaps() });

      expect(client.callsOf('createArticle')).toEqual([]);
      expect(client.created.map(c => `${c.itemType}:${c.id}`)).toEqual(['annotation:Q100', 'anchor point:Q101']);
      expect(client.created[1].properties.P13).toEqual({ type: 'item', id: 'Q9' });
      expect(loaded.anchorPoints[0].anchorPointIn).toBe('Q9');
    });

    it('fills defaults for keys other tools leave out', async () => {
      writeFileSync(TEST_FILE, JSON.stringify({
        title: 'Sparse',
        annotations: [{ character: 12, annotation: { term: 'fever' } }],
      }), 'utf-8');

      const loaded = await loadArticle(TEST_FILE);

      expect(loaded.stage).toBe('unsubmitted');
      expect(loaded.pageId).toBeUndefined();
      expect(loaded.anchorPoints[0].characterNumber).toBe(12);
      expect(loaded.anchorPoints[0].precedingPhrase).toBe('');
      expect(loaded.anchorPoints[0].annotation.term).toBe('fever');
      expect(loaded.anchorPoints[0].annotation.id).toBeUndefined();
    });

    it('fails when the file does not exist', async () => {
      await expect(loadArticle(TEST_FILE)).rejects.toThrow(/^Failed to read article \(/);
    });

    it('fails on corrupted JSON', async () => {
      writeFileSync(TEST_FILE, 'not valid json!!!', 'utf-8');

      await expect(loadArticle(TEST_FILE)).rejects.toBeInstanceOf(PersistenceError);
    });

    it('names the offending key of an invalid record', async () => {
      writeFileSync(TEST_FILE, JSON.stringify({ title: 'Bad', annotations: [{ character: 'twelve' }] }), 'utf-8');

      await expect(loadArticle(TEST_FILE)).rejects.toThrow('Invalid article record at "annotations.0.character"');
    });

    it('rejects an unknown stage marker', async () => {
      writeFileSync(TEST_FILE, JSON.stringify({ title: 'Bad', stage: 'done' }), 'utf-8');

      await expect(loadArticle(TEST_FILE)).rejects.toThrow('Invalid article record at "stage"');
    });
  });
});
