export type RefKind = 'single-item' | 'collection';

export interface PlaylistRef {
  readonly kind: RefKind;
  readonly url: string;
  /** Output name for a single item. With it the item is described without a metadata lookup. */
  readonly name?: string;
}

export interface ItemDescriptor {
  readonly id: string;
  readonly title: string;
  readonly sequenceIndex: number;
  /** Watch URL handed back to the backend that produced this descriptor. */
  readonly handle: string;
}

export type Outcome =
  | { readonly status: 'success'; readonly item: ItemDescriptor; readonly filePath: string }
  | {
      readonly status: 'failure';
      readonly item: ItemDescriptor;
      readonly filePath: string;
      readonly reason: string;
      readonly error: Error;
    }
  | { readonly status: 'skipped'; readonly item: ItemDescriptor; readonly filePath: string };

export type OutcomeStatus = Outcome['status'];

export interface StatsLedger {
  total: number;
  successful: number;
  failed: number;
  skipped: number;
}

export interface RunConfig {
  readonly outputDir: string;
  /** Target MP3 bitrate in kbps. */
  readonly quality: number;
  readonly apiKey?: string;
  readonly concurrency: number;
  readonly interItemDelayMs: number;
}

export type RunState = 'idle' | 'resolving' | 'iterating' | 'reporting' | 'done' | 'failed';

export type ProgressEvent =
  | { readonly type: 'run-start'; readonly ref: PlaylistRef; readonly source: string }
  | { readonly type: 'resolved'; readonly ref: PlaylistRef; readonly total: number }
  | { readonly type: 'item-start'; readonly item: ItemDescriptor; readonly filePath: string }
  | { readonly type: 'item-progress'; readonly item: ItemDescriptor; readonly ratio: number }
  | { readonly type: 'item-complete'; readonly item: ItemDescriptor; readonly filePath: string }
  | { readonly type: 'item-skipped'; readonly item: ItemDescriptor; readonly filePath: string }
  | { readonly type: 'item-error'; readonly item: ItemDescriptor; readonly reason: string }
  | { readonly type: 'run-failed'; readonly ref: PlaylistRef; readonly reason: string }
  | { readonly type: 'run-complete'; readonly ref: PlaylistRef; readonly stats: StatsLedger; readonly outputDir: string };
