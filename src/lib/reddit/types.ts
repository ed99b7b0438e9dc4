export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Raw listing document returned by a thread's `.json` endpoint. */
export type ThreadPayload = JsonValue;

/** Object keys and stringified array indices from the payload root to the comment node. */
export type CommentRecord = {
  path: string[];
  body: string;
};

export type ThreadMetadata = {
  title: string;
  selftext: string;
};
