/**
 * Endpoint descriptor types.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type HttpVerb = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type EndpointKind = 'list' | 'retrieve' | 'create' | 'update' | 'delete' | 'method';

export interface EndpointDescriptor {
  /** Leaf name in the collection; unique within the owner's folder. */
  readonly name: string;
  readonly kind: EndpointKind;
  readonly verb: HttpVerb;
  readonly pathTemplate: string;
  readonly description: string;
  readonly exampleBody: JsonObject | null;
  /** SHA-256 over (verb, pathTemplate, exampleBody). Equal hashes mean equivalent descriptors. */
  readonly contentHash: string;
}
