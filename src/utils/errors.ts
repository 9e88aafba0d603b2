export class ConverterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid invocation or configuration. Fatal, raised before any file is read. */
export class ConfigError extends ConverterError {}

/** The source tree could not be enumerated. Fatal. */
export class DiscoveryError extends ConverterError {}

export class InvalidPathError extends ConverterError {
  constructor(readonly path: string, readonly root: string) {
    super(`${path}: Not under ${root}`);
  }
}

export class FileSystemError extends ConverterError {
  constructor(readonly path: string, cause: unknown) {
    super(describeError(cause), { cause });
  }
}

export type TranslationErrorKind = 'network' | 'status' | 'remote' | 'empty';

export class TranslationError extends ConverterError {
  readonly status: number | undefined;

  constructor(
    readonly kind: TranslationErrorKind,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.status = options.status;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
