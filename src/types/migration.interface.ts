import { Readable } from 'stream';

export type FolderDiscoveryMode = 'suffix' | 'content-type';

export interface ObjectRef {
  readonly name: string;
  readonly checksum: string;
  readonly size: number;
  readonly lastModified: Date;
  readonly contentType: string;
}

/** An open download; `body` must be consumed or destroyed by the caller. */
export interface StoredObject extends ObjectRef {
  readonly body: Readable;
}

export interface ObjectPayload {
  body: Readable | Uint8Array;
  size: number;
}

export type ObjectMetadata = Record<string, string>;

/**
 * A single bucket or container on a remote object store. Checksums are
 * returned without surrounding quotes, lower-cased.
 */
export interface ObjectStore {
  /** Bucket or container name, used in log lines. */
  readonly location: string;
  list(signal?: AbortSignal): AsyncIterable<ObjectRef>;
  /** Resolves to `null` when the object does not exist. */
  headMetadata(name: string): Promise<string | null>;
  getObject(name: string): Promise<StoredObject>;
  putObject(
    name: string,
    payload: ObjectPayload,
    contentType: string,
    metadata: ObjectMetadata
  ): Promise<void>;
  newPlaceholder(name: string, metadata: ObjectMetadata): Promise<void>;
  containerExists(): Promise<boolean>;
  createContainer(): Promise<void>;
}

export interface ExistingState {
  folders: Set<string>;
  files: Map<string, string>;
}

export interface PipelineContext {
  readonly source: ObjectStore;
  readonly destination: ObjectStore;
  readonly discovery: FolderDiscoveryMode;
  readonly existing?: ExistingState;
}

export interface StageStats {
  processed: number;
  skipped: number;
  failed: number;
}

export interface PipelineReport {
  elapsedMs: number;
  cancelled: boolean;
  error?: Error;
}

export interface MigrationOptions {
  source: ObjectStore;
  destination: ObjectStore;
  discovery: FolderDiscoveryMode;
  preload: boolean;
  createDestination: boolean;
  exclude: string[];
  knownFolders?: string[];
}

export interface MigrationSummary {
  elapsedMs: number;
  cancelled: boolean;
  listed: number;
  filtered: number;
  foldersCreated: number;
  foldersExisting: number;
  skippedExisting: number;
  uploaded: number;
  verified: number;
  mismatched: number;
  failed: number;
  error?: string;
}

export interface IMigrationService {
  migrate(options: MigrationOptions, signal?: AbortSignal): Promise<MigrationSummary>;
}
