export type ContentType = 'news' | 'video' | 'blog' | (string & {});

/**
 * A projection of an entry in the local content index.
 */
export interface LocalResult {
  readonly id: string;
  readonly type: ContentType;
  readonly title: string;
  readonly content?: string;
  readonly indexedAt?: Date;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * A single web result as returned by the external provider. Fields the
 * provider leaves out are empty strings.
 */
export interface ExternalResult {
  readonly title: string;
  readonly url: string;
  readonly description: string;
  readonly age: string;
}
