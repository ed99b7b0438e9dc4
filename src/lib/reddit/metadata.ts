import { MissingFieldError } from './errors.js';
import type { JsonObject, JsonValue, ThreadMetadata, ThreadPayload } from './types.js';

const isJsonObject = (value: JsonValue | undefined): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readObject = (value: JsonValue | undefined, field: string): JsonObject => {
  if (!isJsonObject(value)) {
    throw new MissingFieldError(field);
  }
  return value;
};

const readFirst = (value: JsonValue | undefined, field: string): JsonValue => {
  if (!Array.isArray(value) || value.length === 0) {
    throw new MissingFieldError(field);
  }
  return value[0];
};

const readString = (record: JsonObject, key: string, field: string): string => {
  const value = record[key];
  if (typeof value !== 'string') {
    throw new MissingFieldError(field);
  }
  return value;
};

/**
 * Reads the post title and self text from the first listing of a thread payload
 * (`[0].data.children[0].data`). Unlike the comment walk this is strict: any
 * missing step throws `MissingFieldError`.
 */
export const extractMetadata = (payload: ThreadPayload): ThreadMetadata => {
  const listing = readObject(readFirst(payload, '[0]'), '[0]');
  const listingData = readObject(listing.data, '[0].data');
  const child = readObject(readFirst(listingData.children, '[0].data.children[0]'), '[0].data.children[0]');
  const post = readObject(child.data, '[0].data.children[0].data');

  return {
    title: readString(post, 'title', '[0].data.children[0].data.title'),
    selftext: readString(post, 'selftext', '[0].data.children[0].data.selftext')
  };
};
