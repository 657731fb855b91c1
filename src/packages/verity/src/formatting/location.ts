const frame = /^\s*at (?:.*? \()?(.+?:\d+:\d+)\)?$/;

export const locationFromStack = (
  stack: string | undefined,
): string | undefined => {
  if (!stack) return undefined;

  for (const line of stack.split('\n')) {
    const match = frame.exec(line);
    if (match?.[1]) return match[1];
  }

  return undefined;
};

/**
 * Returns `file:line:column` of the code that called `boundary`, skipping
 * `boundary` itself and every frame above it.
 */
export const captureLocation = (
  boundary: (...args: never[]) => unknown,
): string | undefined => {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary);

  return locationFromStack(holder.stack);
};
