export { MetadataExtractor, Scope, scopeKey, mergeMethods } from './extractor.js';
export type { ExtractionScope, OwnerMetadata, ExtractionFailure, ExtractedOwner, ExtractionResult } from './extractor.js';
export { isExcludedField, bodyFields, normalizeDataType, LAYOUT_DATA_TYPES } from './field-filter.js';
