/**
 * Endpoint descriptor builder: five CRUD endpoints per owner type plus one
 * POST endpoint per exported method.
 */

import { bodyFields } from '../extractor/field-filter.js';
import type { FieldSpec, MethodSpec } from '../registry/types.js';
import { contentHash } from '../utils/hash.js';
import { methodPath, resourcePath } from './paths.js';
import { placeholderFor } from './placeholders.js';
import type { EndpointDescriptor, EndpointKind, HttpVerb, JsonObject } from './types.js';

export function describeEndpoint(input: {
  name: string;
  kind: EndpointKind;
  verb: HttpVerb;
  pathTemplate: string;
  description: string;
  exampleBody: JsonObject | null;
}): EndpointDescriptor {
  return Object.freeze({
    ...input,
    contentHash: contentHash(input.verb, input.pathTemplate, input.exampleBody),
  });
}

/** Placeholder body of non-excluded fields, in declaration order. */
export function exampleBodyFor(fields: readonly FieldSpec[]): JsonObject {
  const body: JsonObject = {};
  const seen = new Set<string>();
  for (const field of bodyFields(fields)) {
    if (seen.has(field.name)) continue;
    seen.add(field.name);
    body[field.name] = placeholderFor(field.dataType);
  }
  return body;
}

export function buildCrudDescriptors(ownerType: string, fields: readonly FieldSpec[]): EndpointDescriptor[] {
  const collection = resourcePath(ownerType);
  const item = resourcePath(ownerType, true);

  return [
    describeEndpoint({
      name: `List ${ownerType}`,
      kind: 'list',
      verb: 'GET',
      pathTemplate: collection,
      description: `Get list of ${ownerType} records`,
      exampleBody: null,
    }),
    describeEndpoint({
      name: `Retrieve ${ownerType}`,
      kind: 'retrieve',
      verb: 'GET',
      pathTemplate: item,
      description: `Get a specific ${ownerType} record by id`,
      exampleBody: null,
    }),
    describeEndpoint({
      name: `Create ${ownerType}`,
      kind: 'create',
      verb: 'POST',
      pathTemplate: collection,
      description: `Create a new ${ownerType} record`,
      exampleBody: exampleBodyFor(fields),
    }),
    describeEndpoint({
      name: `Update ${ownerType}`,
      kind: 'update',
      verb: 'PUT',
      pathTemplate: item,
      description: `Update an existing ${ownerType} record`,
      exampleBody: exampleBodyFor(fields),
    }),
    describeEndpoint({
      name: `Delete ${ownerType}`,
      kind: 'delete',
      verb: 'DELETE',
      pathTemplate: item,
      description: `Delete a ${ownerType} record`,
      exampleBody: null,
    }),
  ];
}

export function buildMethodDescriptor(ownerType: string, method: MethodSpec): EndpointDescriptor {
  const params = method.parameterNames.join(', ');
  return describeEndpoint({
    name: method.name,
    kind: 'method',
    verb: 'POST',
    pathTemplate: methodPath(ownerType, method.name),
    description: `Call ${ownerType}.${method.name}(${params}), defined in ${method.sourceLocation}`,
    exampleBody: { args: [...method.parameterNames] },
  });
}

/**
 * All descriptors for one owner type: List, Retrieve, Create, Update,
 * Delete, then one per method in the order given. Methods with a name
 * already used are skipped. Output depends only on the arguments.
 */
export function buildDescriptors(
  ownerType: string,
  fields: readonly FieldSpec[],
  methods: readonly MethodSpec[],
): EndpointDescriptor[] {
  const descriptors = buildCrudDescriptors(ownerType, fields);
  const usedNames = new Set(descriptors.map((d) => d.name));
  for (const method of methods) {
    if (usedNames.has(method.name)) continue;
    usedNames.add(method.name);
    descriptors.push(buildMethodDescriptor(ownerType, method));
  }
  return descriptors;
}
