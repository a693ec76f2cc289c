export class TaskAlreadyRunningError extends Error {
  constructor(readonly key: string) {
    super(`A monitoring task for ${key} is already running`);
    this.name = TaskAlreadyRunningError.name;
  }
}

export class InvalidTaskSpecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = InvalidTaskSpecError.name;
  }
}

export const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));
