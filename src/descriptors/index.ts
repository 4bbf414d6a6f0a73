export { buildDescriptors, buildCrudDescriptors, buildMethodDescriptor, describeEndpoint, exampleBodyFor } from './builder.js';
export { placeholderFor } from './placeholders.js';
export { resourcePath, methodPath, ownerTypeOfPath, encodeSegment, RESOURCE_PREFIX, METHOD_PREFIX, ID_PLACEHOLDER } from './paths.js';
export type { EndpointDescriptor, EndpointKind, HttpVerb, JsonObject, JsonValue } from './types.js';
