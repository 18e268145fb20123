/** The four failure kinds a core operation can report */
export type TaskError =
  | { readonly type: 'not-found'; readonly taskId: string }
  | { readonly type: 'forbidden'; readonly taskId: string }
  | { readonly type: 'invalid-argument'; readonly message: string }
  | { readonly type: 'conflict'; readonly taskId: string; readonly message: string };

export type TaskResult =
  | { readonly type: 'success'; readonly message: string }
  | TaskError;

export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | TaskError;

// Helper functions
export function isSuccess<T>(r: DataResult<T>): r is { type: 'success'; data: T; message: string };
export function isSuccess(r: TaskResult): r is { type: 'success'; message: string };
export function isSuccess(r: TaskResult | DataResult<unknown>): boolean {
  return r.type === 'success';
}

export function isError(r: TaskResult | DataResult<unknown>): r is TaskError {
  return r.type !== 'success';
}

export function invalidArgument(message: string): TaskError {
  return { type: 'invalid-argument', message };
}

export function notFound(taskId: string): TaskError {
  return { type: 'not-found', taskId };
}

export function forbidden(taskId: string): TaskError {
  return { type: 'forbidden', taskId };
}

export function conflict(taskId: string, message: string): TaskError {
  return { type: 'conflict', taskId, message };
}

/** Human-readable line for an error result */
export function describeError(err: TaskError): string {
  switch (err.type) {
    case 'not-found': return `Could not find task with id ${err.taskId}`;
    case 'forbidden': return `Task ${err.taskId} belongs to another user`;
    case 'invalid-argument': return err.message;
    case 'conflict': return err.message;
  }
}
