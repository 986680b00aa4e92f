/**
 * @description Clone original error properties, except for 'message' and 'stack', to the target error.
 * */
export function cloneErrorProperties<T extends Error>(original: unknown, target: T): T {
  if (typeof original !== 'object' || original === null) {
    return target;
  }
  const exclude = ['message', 'stack'];
  Object.keys(original).forEach((key) => {
    if (exclude.includes(key)) return;
    Reflect.set(target, key, Reflect.get(original, key));
  });
  return target;
}

/**
 * @description Normalise an unknown thrown value into an Error.
 * */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
