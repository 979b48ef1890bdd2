export * from './diff/index.js';

export type { RoamApiBlock, RoamBatchAction, RoamBlockFields, RoamLocation, RoamViewType } from './types/roam.js';
export type { FetchCapability } from './types/fetch.js';

export { extractRefs, collectRefs, collectUnresolvedRefs, spliceRefs } from './refs/refs.js';
export { RefResolver } from './refs/resolver.js';

export type { OutputMode, FormatOptions } from './format/formatter.js';
export { formatBlocks, formatTree, isTableBlock, isCodeBlock, formatRefBlock, expandRefsInText } from './format/formatter.js';

export { RoamGraphFetcher, createFetcherFromEnv } from './store/roam-fetcher.js';

export type { PageSyncOptions, PageSyncResult, RenderPageOptions } from './sync/page-sync.js';
export { planPageSync, renderPage } from './sync/page-sync.js';

export type { SyncConfig } from './config/environment.js';
export { loadSyncConfig, validateEnvironment, DEFAULT_REF_LEVEL } from './config/environment.js';

export type { ValidationError, ValidationResult, TreeValidationOptions } from './shared/validation.js';
export { validateBlockTree, validateUid, validateHeading, formatValidationErrors } from './shared/validation.js';
export { PlanStructureError } from './shared/errors.js';

export { generateBlockUid } from './utils/uid.js';
export { printDebug } from './utils/log.js';
