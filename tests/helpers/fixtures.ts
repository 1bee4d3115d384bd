import type { AnchorPoint, Article, Annotation, PropertyPayload, TagMaps } from '../../src/shared/types.js';
import { createAnchorPoint, createAnnotation, createArticle } from '../../src/shared/types.js';
import type { KnowledgeStoreClient } from '../../src/sync/store-client.js';
import { StoreRequestError } from '../../src/sync/errors.js';
import { collectLabels } from '../../src/sync/registry.js';

/** Property labels get P1.., item labels Q1.., in registry order */
export function makeTagMaps(): TagMaps {
  return {
    properties: new Map(collectLabels('property').map((label, i) => [label, `P${i + 1}`])),
    items: new Map(collectLabels('item').map((label, i) => [label, `Q${i + 1}`])),
  };
}

export function makeAnnotation(term: string): Annotation {
  return createAnnotation({
    term,
    length: term.length,
    wikidataCode: 'Q12345',
    dictionary: 'test dictionary',
    timeCode: '2018-06-01T12:00:00Z',
  });
}

export function makeAnchorPoint(term: string, character: number): AnchorPoint {
  return createAnchorPoint(
    {
      precedingPhrase: `before ${term}`,
      followingPhrase: `after ${term}`,
      distanceToPreceding: 10,
      distanceToFollowing: 20,
      characterNumber: character,
      timeCode: '2018-06-01T12:00:00Z',
    },
    makeAnnotation(term),
  );
}

export function makeArticle(terms: string[] = []): Article {
  return createArticle(
    {
      wikidataCode: 'Q2001',
      title: 'Test Article',
      publicationDate: '2018-06-01',
      timeCode: '2018-06-01T12:00:00Z',
      characterNumber: 0,
      precedingPhrase: '',
      followingPhrase: '',
    },
    terms.map((term, i) => makeAnchorPoint(term, (i + 1) * 100)),
  );
}

export type FakeOp = 'resolvePropertyLabel' | 'resolveItemLabel' | 'createArticle' | 'createItem' | 'updateItem';

export interface FakeCall {
  op: FakeOp;
  args: unknown[];
}

/**
 * In-memory store. Resolves labels from `makeTagMaps()`, hands out item ids
 * Q100, Q101, ... and page ids 5000, 5001, ...
 */
export class FakeStoreClient implements KnowledgeStoreClient {
  readonly calls: FakeCall[] = [];
  readonly created: Array<{ id: string; itemType: string; properties: PropertyPayload }> = [];
  readonly updates: Array<{ itemId: string; properties: PropertyPayload }> = [];
  private readonly maps = makeTagMaps();
  private nextItem = 100;
  private nextPage = 5000;
  private shouldFail: ((call: FakeCall, nth: number) => boolean) | undefined;

  /** Fail every call matching `predicate`; `nth` counts calls of that op, from 1 */
  failWhen(predicate: (call: FakeCall, nth: number) => boolean): void {
    this.shouldFail = predicate;
  }

  failOn(op: FakeOp, nth: number): void {
    this.failWhen((call, n) => call.op === op && n === nth);
  }

  clearFailures(): void {
    this.shouldFail = undefined;
  }

  callsOf(op: FakeOp): FakeCall[] {
    return this.calls.filter(c => c.op === op);
  }

  async resolvePropertyLabel(label: string): Promise<string> {
    this.record('resolvePropertyLabel', [label]);
    const id = this.maps.properties.get(label);
    if (id === undefined) throw new StoreRequestError('not-found', `No property labelled "${label}"`);
    return id;
  }

  async resolveItemLabel(label: string): Promise<string> {
    this.record('resolveItemLabel', [label]);
    const id = this.maps.items.get(label);
    if (id === undefined) throw new StoreRequestError('not-found', `No item labelled "${label}"`);
    return id;
  }

  async createArticle(title: string, content: string): Promise<number> {
    this.record('createArticle', [title, content]);
    return this.nextPage++;
  }

  async createItem(itemType: string, properties: PropertyPayload): Promise<string> {
    this.record('createItem', [itemType, properties]);
    const id = `Q${this.nextItem++}`;
    this.created.push({ id, itemType, properties });
    return id;
  }

  async updateItem(itemId: string, properties: PropertyPayload): Promise<void> {
    this.record('updateItem', [itemId, properties]);
    this.updates.push({ itemId, properties });
  }

  private record(op: FakeOp, args: unknown[]): void {
    const call = { op, args };
    this.calls.push(call);
    if (this.shouldFail?.(call, this.callsOf(op).length)) {
      throw new StoreRequestError('injected', `${op} failed`);
    }
  }
}
