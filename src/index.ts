export type {
  Article,
  AnchorPoint,
  Annotation,
  RecordKind,
  UploadStage,
  TagMaps,
  PropertyValue,
  PropertyPayload,
} from './shared/types.js';
export { createArticle, createAnchorPoint, createAnnotation } from './shared/types.js';
export { TERMINUS_LABEL, annotationSchema, anchorPointSchema, articleSchema } from './shared/schema.js';
export { collectLabels, listLabels } from './sync/registry.js';
export { resolvePropertyLabels, resolveItemLabels, resolveTagMaps } from './sync/resolver.js';
export { translateFields } from './sync/translate.js';
export { computeAnchorChain, verifyAnchorChain, inferStage } from './sync/graph.js';
export { uploadArticle, syncArticle } from './sync/orchestrator.js';
export type { SyncContext } from './sync/orchestrator.js';
export type { KnowledgeStoreClient } from './sync/store-client.js';
export * from './sync/errors.js';
export { ArticleStorage, saveArticle, loadArticle } from './server/storage.js';
export { WikibaseClient } from './server/wikibase.js';
export type { WikibaseClientOptions } from './server/wikibase.js';
export { loadStoreConfig } from './config.js';
