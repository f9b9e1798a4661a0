export type PipelineErrorType = 'RESOLUTION_FAILED' | 'ITEM_FETCH_FAILED' | 'FILESYSTEM';

export class PipelineError extends Error {
  readonly type: PipelineErrorType;

  constructor(type: PipelineErrorType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.type = type;
  }
}

/**
 * The playlist reference could not be turned into an item list: bad URL,
 * unreachable catalog, or no readable entries.
 */
export class ResolutionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RESOLUTION_FAILED', message, options);
  }
}

export class ItemFetchError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ITEM_FETCH_FAILED', message, options);
  }
}

export class FilesystemError extends PipelineError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('FILESYSTEM', message, options);
    this.path = path;
  }
}

export const toErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
