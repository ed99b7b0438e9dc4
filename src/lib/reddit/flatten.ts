import type { CommentRecord, JsonObject, JsonValue, ThreadPayload } from './types.js';

const BODY_FIELD = 'body';

const isJsonObject = (value: JsonValue): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function* walk(node: JsonValue, path: string[]): Generator<CommentRecord> {
  if (Array.isArray(node)) {
    for (const [index, item] of node.entries()) {
      yield* walk(item, [...path, String(index)]);
    }
    return;
  }

  if (!isJsonObject(node)) {
    return;
  }

  // Emit the node before its replies so parents precede children.
  const body = node[BODY_FIELD];
  if (typeof body === 'string') {
    yield { path, body };
  }

  for (const [key, value] of Object.entries(node)) {
    yield* walk(value, [...path, key]);
  }
}

/**
 * Walks the thread payload depth-first and yields every object that carries a
 * string `body` field. Nodes without one are skipped silently.
 *
 * Each call starts a fresh traversal, so the result can be iterated repeatedly.
 */
export const flattenComments = (payload: ThreadPayload): Generator<CommentRecord> => walk(payload, []);

export const collectComments = (payload: ThreadPayload): CommentRecord[] => [...flattenComments(payload)];
