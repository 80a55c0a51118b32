export type AppErrorOptions = {
  code: string;
  cause?: unknown;
};

export class AppError extends Error {
  readonly code: string;

  constructor(message: string, options: AppErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AppError";
    this.code = options.code;
  }
}

export const isAppError = (err: unknown): err is AppError => err instanceof AppError;
