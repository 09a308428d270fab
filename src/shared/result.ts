import { toRigErrorPayload, type RigErrorPayload } from './errors';

export type RigResult<T> = { ok: true; value: T } | { ok: false; error: RigErrorPayload };

export const ok = <T>(value: T): RigResult<T> => ({ ok: true, value });
export const fail = (error: RigErrorPayload): RigResult<never> => ({ ok: false, error });

/** Runs `fn`, turning anything it throws into a failed result. */
export const attempt = <T>(fn: () => T): RigResult<T> => {
  try {
    return ok(fn());
  } catch (err) {
    return fail(toRigErrorPayload(err));
  }
};
