export class InputNotFoundError extends Error {
  readonly path: string;

  constructor(inputPath: string) {
    super(`The input path ${inputPath} does not exist`);
    this.name = "InputNotFoundError";
    this.path = inputPath;
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
