export class UsageError extends Error {
}

export class CompileError extends UsageError {
}

export function throwError(message: string): never {
  // A good place to set a breakpoint
  throw new Error(message);
}

export function assertUnreachable(value: never): never {
  throwError('Internal compiler error (reached unexpected code path)');
}
