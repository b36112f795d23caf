export const assertUnreachable = (value: never, message?: string): never => {
  throw new Error(message ?? `Unreachable case: ${JSON.stringify(value)}`);
};
