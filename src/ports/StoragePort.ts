export type JsonReadResult =
  | { kind: 'ok'; value: unknown }
  | { kind: 'missing' }
  | { kind: 'invalid'; reason: string };

/** JSON documents on local storage, addressed by path. */
export interface StoragePort {
  readJson(path: string): Promise<JsonReadResult>;
  /** Replaces the document in one step; readers never see a partial write. */
  writeJson(path: string, data: unknown): Promise<void>;
}
